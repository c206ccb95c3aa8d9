import { Module } from '@nestjs/common';
import { SerializationModule } from '../serialization/serialization.module';
import { CatalogService } from './catalog.service';

/**
 * Catalog module exposes the configured table schemas
 */
@Module({
  imports: [SerializationModule],
  providers: [
    CatalogService
  ],
  exports: [
    CatalogService
  ],
})
export class CatalogModule {}
