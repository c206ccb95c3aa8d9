import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { Logger } from '@nestjs/common';
import { Schema } from '../schema/schema';
import { schemaFromJson } from '../serialization/schema-json';
import type { YamlCatalogFile, YamlTableConfig } from './catalog.types';

const logger = new Logger('CatalogConfig');

/**
 * Loads table schemas from the catalog YAML file
 * Every table is fully parsed and validated at config load time
 * Fails fast if the file is missing or any table is invalid
 */
export default registerAs('catalog', (): Map<string, Schema> => {
  const tables = new Map<string, Schema>();

  // Get catalog file path from environment or use default
  const catalogPath = process.env.CATALOG_PATH || './catalog.yaml';

  try {
    logger.log(`Loading table schemas from: ${catalogPath}`);

    const yamlContent = readFileSync(catalogPath, 'utf-8');
    const catalog = parseCatalogFile(load(yamlContent));

    for (const [tableName, tableConfig] of Object.entries(catalog.tables)) {
      try {
        tables.set(tableName, buildTableSchema(tableName, tableConfig));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid schema for table '${tableName}': ${reason}`, { cause: error });
      }
    }

    logger.log(`Loaded ${tables.size} table schemas: ${Array.from(tables.keys()).join(', ')}`);

    // Fail if no tables were loaded
    if (tables.size === 0) {
      throw new Error('No tables found in catalog file. At least one table must be defined.');
    }

  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      logger.error(`Catalog file not found at ${catalogPath}`);
      throw new Error(`Catalog file not found: ${catalogPath}. Please ensure the file exists or set CATALOG_PATH environment variable.`);
    } else {
      logger.error('Failed to load table schemas');
      throw error;
    }
  }

  return tables;
});

/**
 * Build one table schema, numbering ids when the table asks for it
 */
export function buildTableSchema(tableName: string, tableConfig: YamlTableConfig): Schema {
  let lastId = 0;
  const assignIds = tableConfig['auto-assign-ids'] ? () => ++lastId : undefined;

  const schema = schemaFromJson(
    {
      type: 'struct',
      'schema-id': tableConfig['schema-id'],
      'identifier-field-ids': tableConfig['identifier-field-ids'],
      fields: tableConfig.fields,
    },
    { assignIds },
    `tables.${tableName}`,
  );

  const identifierNames = tableConfig['identifier-field-names'];
  if (!identifierNames || identifierNames.length === 0) {
    return schema;
  }

  const identifierFieldIds = identifierNames.map((name) => {
    const field = schema.fieldByName(name);
    if (!field) {
      throw new Error(`Identifier field '${name}' not found`);
    }
    return field.id;
  });
  return new Schema(schema.columns(), {
    schemaId: schema.schemaId,
    identifierFieldIds: [...schema.identifierFieldIds, ...identifierFieldIds],
  });
}

function parseCatalogFile(data: unknown): YamlCatalogFile {
  if (!isRecord(data) || !isRecord(data.tables)) {
    throw new Error('Invalid catalog file: must contain a "tables" section');
  }

  const tables: Record<string, YamlTableConfig> = {};
  for (const [tableName, entry] of Object.entries(data.tables)) {
    if (!isRecord(entry) || !Array.isArray(entry.fields) || entry.fields.length === 0) {
      throw new Error(`Table '${tableName}' must have at least one field defined`);
    }

    const schemaId = entry['schema-id'];
    if (schemaId !== undefined && !isInteger(schemaId)) {
      throw new Error(`Table '${tableName}' has invalid 'schema-id': expected an integer`);
    }

    tables[tableName] = {
      'schema-id': isInteger(schemaId) ? schemaId : undefined,
      'identifier-field-ids': readList(entry['identifier-field-ids'], isInteger, tableName, 'identifier-field-ids'),
      'identifier-field-names': readList(entry['identifier-field-names'], isString, tableName, 'identifier-field-names'),
      'auto-assign-ids': entry['auto-assign-ids'] === true,
      fields: entry.fields,
    };
  }
  return { tables };
}

function readList<T>(
  value: unknown,
  isItem: (item: unknown) => item is T,
  tableName: string,
  key: string,
): T[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every(isItem)) {
    throw new Error(`Table '${tableName}' has invalid '${key}': expected a list`);
  }
  return value;
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
