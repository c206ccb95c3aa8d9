import { TypeId } from './type-id';
import type { Type } from './type';
import type { NestedField } from './nested-field';

/**
 * Structural type equality
 * Same variant and same parameters; nested types compare their fields in order
 */
export function typesEqual(a: Type, b: Type): boolean {
  if (a === b) {
    return true;
  }
  if (a.typeId !== b.typeId) {
    return false;
  }

  switch (a.typeId) {
    case TypeId.Decimal:
      return b.typeId === TypeId.Decimal && a.precision === b.precision && a.scale === b.scale;
    case TypeId.Fixed:
      return b.typeId === TypeId.Fixed && a.length === b.length;
    case TypeId.Struct:
      return b.typeId === TypeId.Struct && fieldListsEqual(a.fields, b.fields);
    case TypeId.List:
      return b.typeId === TypeId.List && fieldsEqual(a.elementField, b.elementField);
    case TypeId.Map:
      return b.typeId === TypeId.Map
        && fieldsEqual(a.keyField, b.keyField)
        && fieldsEqual(a.valueField, b.valueField);
    default:
      // Stateless primitives: one instance per kind
      return true;
  }
}

/**
 * Field equality covers id, name, optionality, doc and type
 */
export function fieldsEqual(a: NestedField, b: NestedField): boolean {
  if (a === b) {
    return true;
  }
  return a.id === b.id
    && a.name === b.name
    && a.isOptional === b.isOptional
    && a.doc === b.doc
    && typesEqual(a.type, b.type);
}

export function fieldListsEqual(a: readonly NestedField[], b: readonly NestedField[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((field, index) => fieldsEqual(field, b[index]));
}
