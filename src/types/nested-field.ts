import { InvalidFieldError } from '../common/errors';
import { fieldsEqual } from './equality';
import type { Type } from './type';

export const MAX_FIELD_ID = 2 ** 31 - 1;

/**
 * A named, identified, documented binding of a field to a type
 *
 * `id` is the only identifier that survives renames; `name` lookups are a
 * convenience over the same structure. A missing doc is `undefined`, an empty
 * string is a doc.
 */
export class NestedField {
  readonly doc: string | undefined;

  private constructor(
    readonly id: number,
    readonly name: string,
    readonly type: Type,
    readonly isOptional: boolean,
    doc: string | null | undefined,
  ) {
    if (!Number.isInteger(id) || id < 0 || id > MAX_FIELD_ID) {
      throw new InvalidFieldError(`Field id must be an integer in [0, ${MAX_FIELD_ID}], got ${id}`);
    }
    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidFieldError(`Field ${id} must have a non-empty name`);
    }
    this.doc = doc ?? undefined;
    Object.freeze(this);
  }

  static of(id: number, isOptional: boolean, name: string, type: Type, doc?: string | null): NestedField {
    return new NestedField(id, name, type, isOptional, doc);
  }

  static required(id: number, name: string, type: Type, doc?: string | null): NestedField {
    return new NestedField(id, name, type, false, doc);
  }

  static optional(id: number, name: string, type: Type, doc?: string | null): NestedField {
    return new NestedField(id, name, type, true, doc);
  }

  get isRequired(): boolean {
    return !this.isOptional;
  }

  equals(other: NestedField): boolean {
    return fieldsEqual(this, other);
  }

  toString(): string {
    const optionality = this.isOptional ? 'optional' : 'required';
    const doc = this.doc !== undefined ? ` (${this.doc})` : '';
    return `${this.id}: ${this.name}: ${optionality} ${this.type.toString()}${doc}`;
  }
}

export const required = NestedField.required;
export const optional = NestedField.optional;
