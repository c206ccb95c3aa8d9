import { DeserializationError } from '../common/errors';
import { TypeId } from '../types/type-id';
import { NestedField } from '../types/nested-field';
import { ListType, MapType, StructType } from '../types/nested';
import { parsePrimitiveType } from '../types/primitives';
import { Schema } from '../schema/schema';
import type { Type } from '../types/type';

/**
 * Plain JSON form of types and schemas, as stored in table metadata
 *
 * Primitives are their type string (`"long"`, `"decimal(9, 2)"`); nested types
 * are objects tagged by `type`. Doc keys are only written when a doc exists.
 */
export type TypeJson = string | StructJson | ListJson | MapJson;

export interface FieldJson {
  id: number;
  name: string;
  required: boolean;
  type: TypeJson;
  doc?: string;
}

export interface StructJson {
  type: 'struct';
  fields: FieldJson[];
}

export interface SchemaJson extends StructJson {
  'schema-id': number;
  'identifier-field-ids'?: number[];
}

export interface ListJson {
  type: 'list';
  'element-id': number;
  element: TypeJson;
  'element-required': boolean;
  'element-doc'?: string;
}

export interface MapJson {
  type: 'map';
  'key-id': number;
  key: TypeJson;
  'key-doc'?: string;
  'value-id': number;
  value: TypeJson;
  'value-required': boolean;
  'value-doc'?: string;
}

/**
 * Deepest nesting of struct, list and map types accepted on read
 */
export const MAX_NESTING_DEPTH = 1000;

export interface ReadOptions {
  /**
   * Allocate ids instead of reading them; a struct's fields are numbered
   * before their children, a map's key and value before either subtree.
   * Input must then carry no ids of its own.
   */
  assignIds?: () => number;
}

export function typeToJson(type: Type): TypeJson {
  switch (type.typeId) {
    case TypeId.Struct:
      return structToJson(type);
    case TypeId.List: {
      const json: ListJson = {
        type: 'list',
        'element-id': type.elementId,
        element: typeToJson(type.elementType),
        'element-required': !type.isElementOptional,
      };
      if (type.elementDoc !== undefined) {
        json['element-doc'] = type.elementDoc;
      }
      return json;
    }
    case TypeId.Map: {
      const json: MapJson = {
        type: 'map',
        'key-id': type.keyId,
        key: typeToJson(type.keyType),
        'value-id': type.valueId,
        value: typeToJson(type.valueType),
        'value-required': !type.isValueOptional,
      };
      if (type.keyDoc !== undefined) {
        json['key-doc'] = type.keyDoc;
      }
      if (type.valueDoc !== undefined) {
        json['value-doc'] = type.valueDoc;
      }
      return json;
    }
    default:
      return type.toString();
  }
}

export function schemaToJson(schema: Schema): SchemaJson {
  const json: SchemaJson = {
    type: 'struct',
    'schema-id': schema.schemaId,
    fields: structToJson(schema.asStruct()).fields,
  };
  if (schema.identifierFieldIds.length > 0) {
    json['identifier-field-ids'] = [...schema.identifierFieldIds];
  }
  return json;
}

function structToJson(struct: StructType): StructJson {
  return {
    type: 'struct',
    fields: struct.fields.map((field) => {
      const json: FieldJson = {
        id: field.id,
        name: field.name,
        required: field.isRequired,
        type: typeToJson(field.type),
      };
      if (field.doc !== undefined) {
        json.doc = field.doc;
      }
      return json;
    }),
  };
}

/**
 * Read a type from its JSON form
 * Any problem surfaces as a DeserializationError pointing at the failing path
 */
export function typeFromJson(json: unknown, options: ReadOptions = {}, path = '$'): Type {
  return readType(json, path, options, 0);
}

export function schemaFromJson(json: unknown, options: ReadOptions = {}, path = '$'): Schema {
  const object = expectRecord(json, path);
  if (object.type !== TypeId.Struct) {
    throw new DeserializationError(`Schema must be a struct, got type ${JSON.stringify(object.type)}`, path);
  }

  const schemaId = object['schema-id'] === undefined ? undefined : expectInteger(object, 'schema-id', path);
  const identifierFieldIds = readIdentifierFieldIds(object, path);
  const fields = readStructFields(object, path, options, 0);

  return construct(path, () => new Schema(fields, { schemaId, identifierFieldIds }));
}

function readType(json: unknown, path: string, options: ReadOptions, depth: number): Type {
  if (typeof json === 'string') {
    return construct(path, () => parsePrimitiveType(json));
  }
  if (depth >= MAX_NESTING_DEPTH) {
    throw new DeserializationError(`Type nesting too deep (limit ${MAX_NESTING_DEPTH})`, path);
  }

  const object = expectRecord(json, path);
  switch (object.type) {
    case TypeId.Struct: {
      const fields = readStructFields(object, path, options, depth + 1);
      return construct(path, () => StructType.of(...fields));
    }
    case TypeId.List:
      return readList(object, path, options, depth + 1);
    case TypeId.Map:
      return readMap(object, path, options, depth + 1);
    default:
      throw new DeserializationError(`Unknown nested type ${JSON.stringify(object.type)}`, `${path}.type`);
  }
}

function readStructFields(
  object: Record<string, unknown>,
  path: string,
  options: ReadOptions,
  depth: number,
): NestedField[] {
  const fieldsPath = `${path}.fields`;
  const fields = object.fields;
  if (!Array.isArray(fields)) {
    throw new DeserializationError('Expected an array of fields', fieldsPath);
  }

  const entries = fields.map((entry: unknown, index) => expectRecord(entry, `${fieldsPath}[${index}]`));
  const ids = entries.map((entry, index) => {
    const fieldPath = `${fieldsPath}[${index}]`;
    return options.assignIds
      ? assignId(entry, 'id', fieldPath, options.assignIds)
      : expectInteger(entry, 'id', fieldPath);
  });

  return entries.map((entry, index) => {
    const fieldPath = `${fieldsPath}[${index}]`;
    const name = expectString(entry, 'name', fieldPath);
    const required = expectBoolean(entry, 'required', fieldPath);
    const type = readType(entry.type, `${fieldPath}.type`, options, depth);
    const doc = readDoc(entry, 'doc', fieldPath);
    return construct(fieldPath, () => NestedField.of(ids[index], !required, name, type, doc));
  });
}

function readList(object: Record<string, unknown>, path: string, options: ReadOptions, depth: number): ListType {
  const elementId = options.assignIds
    ? assignId(object, 'element-id', path, options.assignIds)
    : expectInteger(object, 'element-id', path);
  const elementType = readType(object.element, `${path}.element`, options, depth);
  const elementRequired = expectBoolean(object, 'element-required', path);
  const elementDoc = readDoc(object, 'element-doc', path);

  return construct(path, () => ListType.of(elementId, elementType, !elementRequired, elementDoc));
}

function readMap(object: Record<string, unknown>, path: string, options: ReadOptions, depth: number): MapType {
  const keyId = options.assignIds
    ? assignId(object, 'key-id', path, options.assignIds)
    : expectInteger(object, 'key-id', path);
  const valueId = options.assignIds
    ? assignId(object, 'value-id', path, options.assignIds)
    : expectInteger(object, 'value-id', path);
  const keyType = readType(object.key, `${path}.key`, options, depth);
  const valueType = readType(object.value, `${path}.value`, options, depth);
  const valueRequired = expectBoolean(object, 'value-required', path);
  const keyDoc = readDoc(object, 'key-doc', path);
  const valueDoc = readDoc(object, 'value-doc', path);

  return construct(path, () => MapType.of(keyId, valueId, keyType, valueType, !valueRequired, keyDoc, valueDoc));
}

function readIdentifierFieldIds(object: Record<string, unknown>, path: string): number[] | undefined {
  const ids = object['identifier-field-ids'];
  if (ids === undefined) {
    return undefined;
  }
  const idsPath = `${path}.identifier-field-ids`;
  if (!Array.isArray(ids)) {
    throw new DeserializationError('Expected an array of field ids', idsPath);
  }
  return ids.map((id: unknown, index) => {
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      throw new DeserializationError(`Expected an integer, got ${JSON.stringify(id)}`, `${idsPath}[${index}]`);
    }
    return id;
  });
}

/**
 * Next allocated id; an id already present in the input would be lost, so it is rejected
 */
function assignId(
  object: Record<string, unknown>,
  key: string,
  path: string,
  allocate: () => number,
): number {
  const existing = object[key];
  if (existing !== undefined) {
    const owner = typeof object.name === 'string' ? `Field '${object.name}'` : 'Type';
    throw new DeserializationError(
      `${owner} sets '${key}' ${JSON.stringify(existing)} but ids are assigned automatically`,
      `${path}.${key}`,
    );
  }
  return allocate();
}

/**
 * A missing key and `null` both mean "no doc"; anything else must be a string
 */
function readDoc(object: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = object[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new DeserializationError(`Expected a string, got ${JSON.stringify(value)}`, `${path}.${key}`);
  }
  return value;
}

/**
 * Run a model constructor, reporting its failure at the current path
 */
function construct<T>(path: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof DeserializationError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new DeserializationError(message, path, error);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new DeserializationError(`Expected an object, got ${describe(value)}`, path);
  }
  return value;
}

function expectInteger(object: Record<string, unknown>, key: string, path: string): number {
  const value = object[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new DeserializationError(`Expected an integer, got ${describe(value)}`, `${path}.${key}`);
  }
  return value;
}

function expectString(object: Record<string, unknown>, key: string, path: string): string {
  const value = object[key];
  if (typeof value !== 'string') {
    throw new DeserializationError(`Expected a string, got ${describe(value)}`, `${path}.${key}`);
  }
  return value;
}

function expectBoolean(object: Record<string, unknown>, key: string, path: string): boolean {
  const value = object[key];
  if (typeof value !== 'boolean') {
    throw new DeserializationError(`Expected a boolean, got ${describe(value)}`, `${path}.${key}`);
  }
  return value;
}

function describe(value: unknown): string {
  if (value === undefined) {
    return 'nothing';
  }
  if (Array.isArray(value)) {
    return 'an array';
  }
  return value === null ? 'null' : typeof value;
}
