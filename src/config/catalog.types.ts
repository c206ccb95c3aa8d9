// Types for table schemas loaded from the catalog YAML file

/**
 * A single table entry
 * `fields` use the same shape as persisted schema JSON; with `auto-assign-ids`
 * field ids may be omitted and are numbered from 1 in construction order
 */
export interface YamlTableConfig {
  'schema-id'?: number;
  'identifier-field-ids'?: number[];
  'identifier-field-names'?: string[];  // Dotted names, resolved after ids are known
  'auto-assign-ids'?: boolean;
  fields: unknown[];
}

/**
 * Top-level structure of the catalog file (catalog.yaml)
 */
export interface YamlCatalogFile {
  tables: Record<string, YamlTableConfig>;
}
