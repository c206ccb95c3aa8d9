import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Schema } from '../schema/schema';
import { truncateForLog } from '../common/logging.utils';
import { deserialize, deserializeSchema, deserializeType, serialize } from './serializer';
import type { Serializable } from './serializer';
import type { SerializationConfig } from '../config/serialization.config';
import type { Type } from '../types/type';

/**
 * Injectable front for the serializer
 * Applies configured output settings and logs failures with a preview of the input
 */
@Injectable()
export class SerializationService {
  private readonly logger = new Logger(SerializationService.name);
  private readonly indent: number;

  constructor(private configService: ConfigService) {
    this.indent = this.configService.get<SerializationConfig>('serialization')?.indent ?? 0;
  }

  serialize(value: Serializable): string {
    const text = serialize(value, { indent: this.indent });
    this.logger.debug(`Serialized ${describe(value)} (${text.length} chars)`);
    return text;
  }

  deserialize(text: string): Serializable {
    return this.read(text, deserialize);
  }

  deserializeType(text: string): Type {
    return this.read(text, deserializeType);
  }

  deserializeSchema(text: string): Schema {
    return this.read(text, deserializeSchema);
  }

  private read<T extends Serializable>(text: string, reader: (text: string) => T): T {
    try {
      const value = reader(text);
      this.logger.debug(`Deserialized ${describe(value)}`);
      return value;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to deserialize ${truncateForLog(text)}: ${reason}`);
      throw error;
    }
  }
}

function describe(value: Serializable): string {
  return value instanceof Schema
    ? `schema ${value.schemaId} with ${value.columns().length} columns`
    : `type ${truncateForLog(value.toString())}`;
}
