import { TypeId, isNestedTypeId } from './type-id';
import type { BasicType, DecimalType, FixedType } from './primitives';
import type { StructType, ListType, MapType } from './nested';

export type PrimitiveType = BasicType | DecimalType | FixedType;
export type NestedType = StructType | ListType | MapType;

/**
 * Any logical type, discriminated by `typeId`
 */
export type Type = PrimitiveType | NestedType;

export function isNestedType(type: Type): type is NestedType {
  return isNestedTypeId(type.typeId);
}

export function isPrimitiveType(type: Type): type is PrimitiveType {
  return !isNestedTypeId(type.typeId);
}

export function isStructType(type: Type): type is StructType {
  return type.typeId === TypeId.Struct;
}

export function isListType(type: Type): type is ListType {
  return type.typeId === TypeId.List;
}

export function isMapType(type: Type): type is MapType {
  return type.typeId === TypeId.Map;
}
