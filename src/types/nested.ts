import { DuplicateFieldIdError, DuplicateFieldNameError, InvalidTypeParameterError } from '../common/errors';
import { TypeId } from './type-id';
import { NestedField } from './nested-field';
import { typesEqual } from './equality';
import type { Type } from './type';

export const LIST_ELEMENT_NAME = 'element';
export const MAP_KEY_NAME = 'key';
export const MAP_VALUE_NAME = 'value';

/**
 * Ordered sequence of uniquely named, uniquely identified fields
 */
export class StructType {
  readonly typeId = TypeId.Struct;
  readonly fields: readonly NestedField[];

  private readonly fieldsById: ReadonlyMap<number, NestedField>;
  private readonly fieldsByName: ReadonlyMap<string, NestedField>;
  private readonly fieldsByLowerCaseName: ReadonlyMap<string, NestedField>;

  private constructor(fields: readonly NestedField[]) {
    const byId = new Map<number, NestedField>();
    const byName = new Map<string, NestedField>();
    const byLowerCaseName = new Map<string, NestedField>();

    for (const field of fields) {
      if (byId.has(field.id)) {
        throw new DuplicateFieldIdError(field.id, 'struct');
      }
      if (byName.has(field.name)) {
        throw new DuplicateFieldNameError(field.name, 'struct');
      }
      byId.set(field.id, field);
      byName.set(field.name, field);

      // First field wins when names differ only by case
      const lowerCaseName = field.name.toLowerCase();
      if (!byLowerCaseName.has(lowerCaseName)) {
        byLowerCaseName.set(lowerCaseName, field);
      }
    }

    this.fields = Object.freeze([...fields]);
    this.fieldsById = byId;
    this.fieldsByName = byName;
    this.fieldsByLowerCaseName = byLowerCaseName;
    Object.freeze(this);
  }

  static of(...fields: NestedField[]): StructType {
    return new StructType(fields);
  }

  fieldById(id: number): NestedField | undefined {
    return this.fieldsById.get(id);
  }

  fieldByName(name: string): NestedField | undefined {
    return this.fieldsByName.get(name);
  }

  caseInsensitiveFieldByName(name: string): NestedField | undefined {
    return this.fieldsByLowerCaseName.get(name.toLowerCase());
  }

  fieldType(name: string): Type | undefined {
    return this.fieldsByName.get(name)?.type;
  }

  equals(other: Type): boolean {
    return typesEqual(this, other);
  }

  toString(): string {
    return `struct<${this.fields.map((field) => field.toString()).join(', ')}>`;
  }
}

/**
 * A single element field carrying its own id, optionality and doc
 */
export class ListType {
  readonly typeId = TypeId.List;
  readonly fields: readonly NestedField[];

  private constructor(readonly elementField: NestedField) {
    this.fields = Object.freeze([elementField]);
    Object.freeze(this);
  }

  static of(elementId: number, elementType: Type, optional: boolean, doc?: string | null): ListType {
    checkNestedId(elementId, 'List element');
    return new ListType(NestedField.of(elementId, optional, LIST_ELEMENT_NAME, elementType, doc));
  }

  static ofOptional(elementId: number, elementType: Type, doc?: string | null): ListType {
    return ListType.of(elementId, elementType, true, doc);
  }

  static ofRequired(elementId: number, elementType: Type, doc?: string | null): ListType {
    return ListType.of(elementId, elementType, false, doc);
  }

  get elementId(): number {
    return this.elementField.id;
  }

  get elementType(): Type {
    return this.elementField.type;
  }

  get elementDoc(): string | undefined {
    return this.elementField.doc;
  }

  get isElementOptional(): boolean {
    return this.elementField.isOptional;
  }

  fieldById(id: number): NestedField | undefined {
    return this.elementField.id === id ? this.elementField : undefined;
  }

  fieldByName(name: string): NestedField | undefined {
    return name === LIST_ELEMENT_NAME ? this.elementField : undefined;
  }

  equals(other: Type): boolean {
    return typesEqual(this, other);
  }

  toString(): string {
    return `list<${this.elementType.toString()}>`;
  }
}

/**
 * Key and value fields; the key is always required
 */
export class MapType {
  readonly typeId = TypeId.Map;
  readonly fields: readonly NestedField[];

  private constructor(readonly keyField: NestedField, readonly valueField: NestedField) {
    this.fields = Object.freeze([keyField, valueField]);
    Object.freeze(this);
  }

  static of(
    keyId: number,
    valueId: number,
    keyType: Type,
    valueType: Type,
    optionalValue: boolean,
    keyDoc?: string | null,
    valueDoc?: string | null,
  ): MapType {
    checkNestedId(keyId, 'Map key');
    checkNestedId(valueId, 'Map value');
    if (keyId === valueId) {
      throw new DuplicateFieldIdError(keyId, 'map key and value');
    }
    return new MapType(
      NestedField.required(keyId, MAP_KEY_NAME, keyType, keyDoc),
      NestedField.of(valueId, optionalValue, MAP_VALUE_NAME, valueType, valueDoc),
    );
  }

  static ofOptional(
    keyId: number,
    valueId: number,
    keyType: Type,
    valueType: Type,
    keyDoc?: string | null,
    valueDoc?: string | null,
  ): MapType {
    return MapType.of(keyId, valueId, keyType, valueType, true, keyDoc, valueDoc);
  }

  static ofRequired(
    keyId: number,
    valueId: number,
    keyType: Type,
    valueType: Type,
    keyDoc?: string | null,
    valueDoc?: string | null,
  ): MapType {
    return MapType.of(keyId, valueId, keyType, valueType, false, keyDoc, valueDoc);
  }

  get keyId(): number {
    return this.keyField.id;
  }

  get valueId(): number {
    return this.valueField.id;
  }

  get keyType(): Type {
    return this.keyField.type;
  }

  get valueType(): Type {
    return this.valueField.type;
  }

  get keyDoc(): string | undefined {
    return this.keyField.doc;
  }

  get valueDoc(): string | undefined {
    return this.valueField.doc;
  }

  get isValueOptional(): boolean {
    return this.valueField.isOptional;
  }

  fieldById(id: number): NestedField | undefined {
    return this.fields.find((field) => field.id === id);
  }

  fieldByName(name: string): NestedField | undefined {
    return this.fields.find((field) => field.name === name);
  }

  equals(other: Type): boolean {
    return typesEqual(this, other);
  }

  toString(): string {
    return `map<${this.keyType.toString()}, ${this.valueType.toString()}>`;
  }
}

function checkNestedId(id: number, role: string): void {
  if (!Number.isInteger(id) || id < 0) {
    throw new InvalidTypeParameterError(`${role} id must be a non-negative integer, got ${id}`);
  }
}

export function structOf(...fields: NestedField[]): StructType {
  return StructType.of(...fields);
}

export function listOf(elementId: number, elementType: Type, optional: boolean, doc?: string | null): ListType {
  return ListType.of(elementId, elementType, optional, doc);
}

export function mapOf(
  keyId: number,
  valueId: number,
  keyType: Type,
  valueType: Type,
  optionalValue: boolean,
  keyDoc?: string | null,
  valueDoc?: string | null,
): MapType {
  return MapType.of(keyId, valueId, keyType, valueType, optionalValue, keyDoc, valueDoc);
}
