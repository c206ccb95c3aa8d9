import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SerializationService } from '../serialization/serialization.service';
import type { Schema } from '../schema/schema';

/**
 * Holds the table schemas loaded from the catalog file
 * Tables can be exported to and imported from serialized text
 */
@Injectable()
export class CatalogService implements OnModuleInit {
  private readonly logger = new Logger(CatalogService.name);
  private readonly tables = new Map<string, Schema>();

  constructor(
    private configService: ConfigService,
    private serializationService: SerializationService
  ) {}

  /**
   * Load table schemas from configuration on startup
   */
  onModuleInit() {
    const tables = this.configService.get<Map<string, Schema>>('catalog');

    if (!tables || tables.size === 0) {
      this.logger.warn('No table schemas loaded');
      return;
    }

    for (const [tableName, schema] of tables.entries()) {
      this.tables.set(tableName, schema);
    }

    this.logger.log(`Initialized catalog with ${this.tables.size} tables: ${this.listTables().join(', ')}`);
  }

  listTables(): string[] {
    return Array.from(this.tables.keys());
  }

  findTable(tableName: string): Schema | undefined {
    return this.tables.get(tableName);
  }

  getTable(tableName: string): Schema {
    const schema = this.tables.get(tableName);
    if (!schema) {
      throw new Error(`Unknown table: ${tableName}. Available tables: ${this.listTables().join(', ')}`);
    }
    return schema;
  }

  /**
   * Serialized text of a table schema
   */
  exportTable(tableName: string): string {
    return this.serializationService.serialize(this.getTable(tableName));
  }

  /**
   * Register a table from serialized text, replacing any existing schema
   */
  importTable(tableName: string, text: string): Schema {
    const schema = this.serializationService.deserializeSchema(text);
    const replaced = this.tables.has(tableName);
    this.tables.set(tableName, schema);
    this.logger.log(`${replaced ? 'Replaced' : 'Imported'} table ${tableName} (schema ${schema.schemaId}, highest field id ${schema.highestFieldId})`);
    return schema;
  }
}
