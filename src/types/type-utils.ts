import { DuplicateFieldIdError, DuplicateFieldNameError } from '../common/errors';
import { TypeId } from './type-id';
import { NestedField } from './nested-field';
import { ListType, MapType, StructType, LIST_ELEMENT_NAME, MAP_VALUE_NAME } from './nested';
import type { Type } from './type';

/**
 * Direct child fields of a type; primitives have none
 */
export function childFields(type: Type): readonly NestedField[] {
  switch (type.typeId) {
    case TypeId.Struct:
    case TypeId.List:
    case TypeId.Map:
      return type.fields;
    default:
      return [];
  }
}

/**
 * Visit every field in the tree, parents before children
 */
export function visitFields(
  type: Type,
  visitor: (field: NestedField, parent: NestedField | undefined) => void,
  parent?: NestedField,
): void {
  for (const field of childFields(type)) {
    visitor(field, parent);
    visitFields(field.type, visitor, field);
  }
}

/**
 * Index every field by id, at any depth
 * Throws DuplicateFieldIdError when an id appears twice anywhere in the tree
 */
export function indexById(type: Type): Map<number, NestedField> {
  const index = new Map<number, NestedField>();
  visitFields(type, (field) => {
    if (index.has(field.id)) {
      throw new DuplicateFieldIdError(field.id, 'schema');
    }
    index.set(field.id, field);
  });
  return index;
}

/**
 * Map each nested field id to the id of the field that contains it
 * Top-level fields have no entry
 */
export function indexParents(type: Type): Map<number, number> {
  const index = new Map<number, number>();
  visitFields(type, (field, parent) => {
    if (parent) {
      index.set(field.id, parent.id);
    }
  });
  return index;
}

export interface NameIndex {
  /** Full dotted names, including `element`, `key` and `value` segments */
  byFullName: Map<string, number>;
  /** Names that skip the `element`/`value` segment above a struct */
  byShortName: Map<string, number>;
}

/**
 * Index field ids by dotted name path
 *
 * Struct children are `parent.child`; list elements `list.element`; map
 * entries `map.key` and `map.value`. Children of a struct that is a list
 * element or map value are also reachable without that segment
 * (`points.x` next to `points.element.x`).
 */
export function indexByName(type: Type): NameIndex {
  const index: NameIndex = { byFullName: new Map(), byShortName: new Map() };
  collectNames(type, [], [], index);
  return index;
}

function collectNames(type: Type, fullPath: string[], shortPath: string[], index: NameIndex): void {
  for (const field of childFields(type)) {
    const fullName = [...fullPath, field.name];
    const joined = fullName.join('.');
    if (index.byFullName.has(joined)) {
      throw new DuplicateFieldNameError(joined, 'schema');
    }
    index.byFullName.set(joined, field.id);

    const shortName = [...shortPath, field.name];
    const shortJoined = shortName.join('.');
    if (shortJoined !== joined && !index.byShortName.has(shortJoined)) {
      index.byShortName.set(shortJoined, field.id);
    }

    const skipsSegment = field.type.typeId === TypeId.Struct
      && (field.name === LIST_ELEMENT_NAME || field.name === MAP_VALUE_NAME)
      && type.typeId !== TypeId.Struct;
    collectNames(field.type, fullName, skipsSegment ? shortPath : shortName, index);
  }
}

export function highestFieldId(type: Type): number {
  let highest = 0;
  visitFields(type, (field) => {
    highest = Math.max(highest, field.id);
  });
  return highest;
}

/**
 * Rebuild a type with ids drawn from `nextId`
 * A struct's fields are numbered before their children; a map numbers key and
 * value before descending into either.
 */
export function assignFreshIds(type: Type, nextId: () => number): Type {
  switch (type.typeId) {
    case TypeId.Struct:
      return StructType.of(...assignFreshFieldIds(type.fields, nextId));
    case TypeId.List: {
      const elementId = nextId();
      return ListType.of(
        elementId,
        assignFreshIds(type.elementType, nextId),
        type.isElementOptional,
        type.elementDoc,
      );
    }
    case TypeId.Map: {
      const keyId = nextId();
      const valueId = nextId();
      return MapType.of(
        keyId,
        valueId,
        assignFreshIds(type.keyType, nextId),
        assignFreshIds(type.valueType, nextId),
        type.isValueOptional,
        type.keyDoc,
        type.valueDoc,
      );
    }
    default:
      return type;
  }
}

export function assignFreshFieldIds(fields: readonly NestedField[], nextId: () => number): NestedField[] {
  const ids = fields.map(() => nextId());
  return fields.map((field, index) =>
    NestedField.of(ids[index], field.isOptional, field.name, assignFreshIds(field.type, nextId), field.doc),
  );
}
