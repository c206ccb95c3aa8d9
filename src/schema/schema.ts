import { InvalidIdentifierFieldError, InvalidSchemaError } from '../common/errors';
import { TypeId } from '../types/type-id';
import { NestedField } from '../types/nested-field';
import { StructType } from '../types/nested';
import { isPrimitiveType } from '../types/type';
import {
  assignFreshFieldIds,
  highestFieldId,
  indexById,
  indexByName,
  indexParents,
} from '../types/type-utils';

export const DEFAULT_SCHEMA_ID = 0;

export interface SchemaOptions {
  schemaId?: number;
  identifierFieldIds?: Iterable<number>;
}

export interface FreshIdSchemaOptions {
  schemaId?: number;
  /** Dotted names resolved after ids are assigned */
  identifierFieldNames?: Iterable<string>;
}

/**
 * Top-level collection of columns with id and name indices
 *
 * Built once and immutable; evolving a table produces a new Schema.
 * `highestFieldId` is the watermark new ids are allocated above.
 */
export class Schema {
  readonly schemaId: number;
  readonly highestFieldId: number;
  readonly identifierFieldIds: readonly number[];

  private readonly struct: StructType;
  private readonly idToField: ReadonlyMap<number, NestedField>;
  private readonly nameToId: ReadonlyMap<string, number>;
  private readonly shortNameToId: ReadonlyMap<string, number>;
  private readonly lowerCaseNameToId: ReadonlyMap<string, number>;
  private readonly idToName: ReadonlyMap<number, string>;
  private readonly idToParent: ReadonlyMap<number, number>;

  constructor(fields: readonly NestedField[], options: SchemaOptions = {}) {
    const schemaId = options.schemaId ?? DEFAULT_SCHEMA_ID;
    if (!Number.isInteger(schemaId) || schemaId < 0) {
      throw new InvalidSchemaError(`Schema id must be a non-negative integer, got ${schemaId}`);
    }

    this.struct = StructType.of(...fields);
    this.idToField = indexById(this.struct);

    const names = indexByName(this.struct);
    this.nameToId = names.byFullName;
    this.shortNameToId = names.byShortName;

    const idToName = new Map<number, string>();
    const lowerCaseNameToId = new Map<string, number>();
    for (const [name, id] of names.byFullName) {
      idToName.set(id, name);
      const lowerCaseName = name.toLowerCase();
      if (!lowerCaseNameToId.has(lowerCaseName)) {
        lowerCaseNameToId.set(lowerCaseName, id);
      }
    }
    for (const [name, id] of names.byShortName) {
      const lowerCaseName = name.toLowerCase();
      if (!lowerCaseNameToId.has(lowerCaseName)) {
        lowerCaseNameToId.set(lowerCaseName, id);
      }
    }
    this.idToName = idToName;
    this.lowerCaseNameToId = lowerCaseNameToId;
    this.idToParent = indexParents(this.struct);

    this.schemaId = schemaId;
    this.highestFieldId = highestFieldId(this.struct);
    this.identifierFieldIds = Object.freeze(this.validateIdentifierFields(options.identifierFieldIds ?? []));
    Object.freeze(this);
  }

  static of(...fields: NestedField[]): Schema {
    return new Schema(fields);
  }

  /**
   * Build a schema whose ids are reassigned from 1 in construction order:
   * top-level columns first, then nested fields level by level per subtree
   */
  static withFreshIds(fields: readonly NestedField[], options: FreshIdSchemaOptions = {}): Schema {
    let lastId = 0;
    const fresh = new Schema(assignFreshFieldIds(fields, () => ++lastId), { schemaId: options.schemaId });
    if (!options.identifierFieldNames) {
      return fresh;
    }

    const identifierFieldIds = Array.from(options.identifierFieldNames, (name) => {
      const field = fresh.fieldByName(name);
      if (!field) {
        throw new InvalidIdentifierFieldError(`Cannot find identifier field '${name}'`);
      }
      return field.id;
    });
    return new Schema(fresh.columns(), { schemaId: options.schemaId, identifierFieldIds });
  }

  columns(): readonly NestedField[] {
    return this.struct.fields;
  }

  asStruct(): StructType {
    return this.struct;
  }

  fieldById(id: number): NestedField | undefined {
    return this.idToField.get(id);
  }

  /**
   * Look up a field by dotted path; full names take precedence over short names
   */
  fieldByName(name: string): NestedField | undefined {
    const id = this.nameToId.get(name) ?? this.shortNameToId.get(name);
    return id === undefined ? undefined : this.idToField.get(id);
  }

  caseInsensitiveFieldByName(name: string): NestedField | undefined {
    const id = this.lowerCaseNameToId.get(name.toLowerCase());
    return id === undefined ? undefined : this.idToField.get(id);
  }

  /**
   * Full dotted name of a field id
   */
  findColumnName(id: number): string | undefined {
    return this.idToName.get(id);
  }

  idsByName(): ReadonlyMap<string, number> {
    return this.nameToId;
  }

  identifierFieldNames(): string[] {
    return this.identifierFieldIds.map((id) => this.idToName.get(id) ?? String(id));
  }

  /**
   * Schemas are equal when their root structs are equal
   */
  equals(other: Schema): boolean {
    return this.struct.equals(other.struct);
  }

  toString(): string {
    const columns = this.struct.fields.map((field) => `  ${field.toString()}`).join('\n');
    return `table {\n${columns}\n}`;
  }

  /**
   * Identifier fields must be required primitives (not float or double)
   * reachable through required structs only
   */
  private validateIdentifierFields(ids: Iterable<number>): number[] {
    const result: number[] = [];
    for (const id of ids) {
      if (result.includes(id)) {
        continue;
      }

      const field = this.idToField.get(id);
      if (!field) {
        throw new InvalidIdentifierFieldError(`Cannot use field ${id} as an identifier field: not found`);
      }
      if (!isPrimitiveType(field.type)) {
        throw new InvalidIdentifierFieldError(
          `Cannot use field '${field.name}' as an identifier field: not a primitive type, got ${field.type.toString()}`,
        );
      }
      if (field.type.typeId === TypeId.Float || field.type.typeId === TypeId.Double) {
        throw new InvalidIdentifierFieldError(
          `Cannot use field '${field.name}' as an identifier field: must not be ${field.type.typeId}`,
        );
      }
      if (field.isOptional) {
        throw new InvalidIdentifierFieldError(
          `Cannot use field '${field.name}' as an identifier field: not a required field`,
        );
      }

      let parentId = this.idToParent.get(id);
      while (parentId !== undefined) {
        const parent = this.idToField.get(parentId);
        if (!parent) {
          break;
        }
        if (parent.type.typeId !== TypeId.Struct) {
          throw new InvalidIdentifierFieldError(
            `Cannot use field '${field.name}' as an identifier field: must not be nested in ${parent.type.typeId}`,
          );
        }
        if (parent.isOptional) {
          throw new InvalidIdentifierFieldError(
            `Cannot use field '${field.name}' as an identifier field: must not be nested in optional field '${parent.name}'`,
          );
        }
        parentId = this.idToParent.get(parentId);
      }

      result.push(id);
    }
    return result;
  }
}

export function newSchema(...fields: NestedField[]): Schema {
  return new Schema(fields);
}
