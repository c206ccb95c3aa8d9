import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import serializationConfig from './config/serialization.config';
import catalogConfig from './config/catalog.config';
import { SerializationModule } from './serialization/serialization.module';
import { CatalogModule } from './catalog/catalog.module';

/**
 * Root application module
 * Module order matters: Config → Serialization → Catalog
 */
@Module({
  imports: [
    // Configuration - loaded first, available globally
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [serializationConfig, catalogConfig],
    }),

    SerializationModule,
    CatalogModule,
  ],
})
export class AppModule {}
