import 'reflect-metadata';

export * from './types';
export { Schema, newSchema, DEFAULT_SCHEMA_ID } from './schema/schema';
export type { SchemaOptions, FreshIdSchemaOptions } from './schema/schema';
export {
  TypeSystemError,
  InvalidTypeParameterError,
  InvalidFieldError,
  DuplicateFieldIdError,
  DuplicateFieldNameError,
  UnknownTypeError,
  InvalidSchemaError,
  InvalidIdentifierFieldError,
  DeserializationError,
} from './common/errors';
export { typeToJson, typeFromJson, schemaToJson, schemaFromJson, MAX_NESTING_DEPTH } from './serialization/schema-json';
export type { TypeJson, FieldJson, StructJson, SchemaJson, ListJson, MapJson, ReadOptions } from './serialization/schema-json';
export {
  serialize,
  deserialize,
  deserializeType,
  deserializeSchema,
  roundTrip,
  FORMAT_VERSION,
} from './serialization/serializer';
export type { Serializable, SerializeOptions, SerializedEnvelope } from './serialization/serializer';
export { SerializationModule } from './serialization/serialization.module';
export { SerializationService } from './serialization/serialization.service';
export { CatalogModule } from './catalog/catalog.module';
export { CatalogService } from './catalog/catalog.service';
