export { TypeId, STATELESS_TYPE_IDS, isStatelessTypeId, isNestedTypeId } from './type-id';
export type { StatelessTypeId, NestedTypeId } from './type-id';
export type { Type, PrimitiveType, NestedType } from './type';
export { isNestedType, isPrimitiveType, isStructType, isListType, isMapType } from './type';
export {
  BasicType,
  DecimalType,
  FixedType,
  MAX_DECIMAL_PRECISION,
  primitive,
  decimalOf,
  fixedOf,
  parsePrimitiveType,
  booleanType,
  intType,
  longType,
  floatType,
  doubleType,
  dateType,
  timeType,
  timestampType,
  timestamptzType,
  stringType,
  uuidType,
  binaryType,
} from './primitives';
export { NestedField, MAX_FIELD_ID, required, optional } from './nested-field';
export {
  StructType,
  ListType,
  MapType,
  structOf,
  listOf,
  mapOf,
  LIST_ELEMENT_NAME,
  MAP_KEY_NAME,
  MAP_VALUE_NAME,
} from './nested';
export { typesEqual, fieldsEqual, fieldListsEqual } from './equality';
export {
  childFields,
  visitFields,
  indexById,
  indexByName,
  indexParents,
  highestFieldId,
  assignFreshIds,
  assignFreshFieldIds,
} from './type-utils';
export type { NameIndex } from './type-utils';
