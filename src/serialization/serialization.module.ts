import { Module } from '@nestjs/common';
import { SerializationService } from './serialization.service';

/**
 * Serialization module provides the type/schema serializer
 * Exports SerializationService for catalog import and export
 */
@Module({
  providers: [
    SerializationService
  ],
  exports: [
    SerializationService
  ],
})
export class SerializationModule {}
