import { DeserializationError } from '../common/errors';
import { Schema } from '../schema/schema';
import { schemaFromJson, schemaToJson, typeFromJson, typeToJson } from './schema-json';
import type { SchemaJson, TypeJson } from './schema-json';
import type { Type } from '../types/type';

export const FORMAT_VERSION = 1;

export type Serializable = Type | Schema;

export type SerializedEnvelope =
  | { 'format-version': number; kind: 'type'; type: TypeJson }
  | { 'format-version': number; kind: 'schema'; schema: SchemaJson };

export interface SerializeOptions {
  /** Spaces per indentation level; 0 writes compact JSON */
  indent?: number;
}

/**
 * Serialize a type or schema to JSON text
 */
export function serialize(value: Serializable, options: SerializeOptions = {}): string {
  const envelope: SerializedEnvelope = value instanceof Schema
    ? { 'format-version': FORMAT_VERSION, kind: 'schema', schema: schemaToJson(value) }
    : { 'format-version': FORMAT_VERSION, kind: 'type', type: typeToJson(value) };

  return JSON.stringify(envelope, null, options.indent ?? 0);
}

/**
 * Rebuild a type or schema from text written by `serialize`
 *
 * Stateless primitives come back as the shared registry instances; the call
 * either returns a complete value or throws a DeserializationError.
 */
export function deserialize(text: string): Serializable {
  const envelope = readEnvelope(text);
  return envelope.kind === 'schema'
    ? schemaFromJson(envelope.body, {}, '$.schema')
    : typeFromJson(envelope.body, {}, '$.type');
}

export function deserializeType(text: string): Type {
  const envelope = readEnvelope(text);
  if (envelope.kind !== 'type') {
    throw new DeserializationError(`Expected a serialized type, found a ${envelope.kind}`, '$.kind');
  }
  return typeFromJson(envelope.body, {}, '$.type');
}

export function deserializeSchema(text: string): Schema {
  const envelope = readEnvelope(text);
  if (envelope.kind !== 'schema') {
    throw new DeserializationError(`Expected a serialized schema, found a ${envelope.kind}`, '$.kind');
  }
  return schemaFromJson(envelope.body, {}, '$.schema');
}

export function roundTrip(value: Schema): Schema;
export function roundTrip(value: Type): Type;
export function roundTrip(value: Serializable): Serializable {
  const text = serialize(value);
  return value instanceof Schema ? deserializeSchema(text) : deserializeType(text);
}

interface Envelope {
  kind: 'type' | 'schema';
  body: unknown;
}

function readEnvelope(text: string): Envelope {
  if (typeof text !== 'string') {
    throw new DeserializationError(`Expected text, got ${typeof text}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DeserializationError(`Malformed or truncated JSON (${reason})`, '$', error);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new DeserializationError('Expected an envelope object');
  }

  const version: unknown = Reflect.get(parsed, 'format-version');
  if (version !== FORMAT_VERSION) {
    throw new DeserializationError(`Unsupported format version ${JSON.stringify(version)}`, '$.format-version');
  }

  const kind: unknown = Reflect.get(parsed, 'kind');
  if (kind !== 'type' && kind !== 'schema') {
    throw new DeserializationError(`Unknown kind ${JSON.stringify(kind)}`, '$.kind');
  }

  const body: unknown = Reflect.get(parsed, kind);
  if (body === undefined) {
    throw new DeserializationError(`Missing '${kind}' section`, `$.${kind}`);
  }
  return { kind, body };
}
