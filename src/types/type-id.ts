/**
 * Closed set of logical type variants
 * String values double as the textual form of the stateless primitives
 */
export enum TypeId {
  // Stateless primitives
  Boolean = 'boolean',
  Integer = 'int',
  Long = 'long',
  Float = 'float',
  Double = 'double',
  Date = 'date',
  Time = 'time',
  Timestamp = 'timestamp',      // without zone
  TimestampTz = 'timestamptz',  // with zone
  String = 'string',
  UUID = 'uuid',
  Binary = 'binary',

  // Parameterized primitives
  Decimal = 'decimal',
  Fixed = 'fixed',

  // Nested
  Struct = 'struct',
  List = 'list',
  Map = 'map',
}

export type StatelessTypeId =
  | TypeId.Boolean
  | TypeId.Integer
  | TypeId.Long
  | TypeId.Float
  | TypeId.Double
  | TypeId.Date
  | TypeId.Time
  | TypeId.Timestamp
  | TypeId.TimestampTz
  | TypeId.String
  | TypeId.UUID
  | TypeId.Binary;

export type NestedTypeId = TypeId.Struct | TypeId.List | TypeId.Map;

export const STATELESS_TYPE_IDS: readonly StatelessTypeId[] = Object.freeze([
  TypeId.Boolean,
  TypeId.Integer,
  TypeId.Long,
  TypeId.Float,
  TypeId.Double,
  TypeId.Date,
  TypeId.Time,
  TypeId.Timestamp,
  TypeId.TimestampTz,
  TypeId.String,
  TypeId.UUID,
  TypeId.Binary,
]);

const STATELESS = new Set<TypeId>(STATELESS_TYPE_IDS);

export function isStatelessTypeId(typeId: TypeId): typeId is StatelessTypeId {
  return STATELESS.has(typeId);
}

export function isNestedTypeId(typeId: TypeId): typeId is NestedTypeId {
  return typeId === TypeId.Struct || typeId === TypeId.List || typeId === TypeId.Map;
}
