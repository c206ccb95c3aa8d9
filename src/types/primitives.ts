import { InvalidTypeParameterError, UnknownTypeError } from '../common/errors';
import { TypeId, STATELESS_TYPE_IDS, isStatelessTypeId, type StatelessTypeId } from './type-id';
import { typesEqual } from './equality';
import type { Type } from './type';

export const MAX_DECIMAL_PRECISION = 38;

/**
 * A primitive type without parameters
 *
 * Instances only exist inside the registry below, one per kind, so two
 * references to the same kind are always the same object. The registry is
 * built when this module is evaluated and never written afterwards.
 */
export class BasicType {
  private static readonly registry: ReadonlyMap<StatelessTypeId, BasicType> = new Map(
    STATELESS_TYPE_IDS.map((typeId): [StatelessTypeId, BasicType] => [typeId, new BasicType(typeId)]),
  );

  private constructor(readonly typeId: StatelessTypeId) {
    Object.freeze(this);
  }

  /**
   * Shared instance for a stateless kind
   */
  static get(typeId: StatelessTypeId): BasicType {
    const instance = BasicType.registry.get(typeId);
    if (!instance) {
      throw new InvalidTypeParameterError(`'${typeId}' is not a stateless primitive type`);
    }
    return instance;
  }

  equals(other: Type): boolean {
    return typesEqual(this, other);
  }

  toString(): string {
    return this.typeId;
  }
}

/**
 * Fixed-precision decimal; equal parameters compare equal, identity is not shared
 */
export class DecimalType {
  readonly typeId = TypeId.Decimal;

  private constructor(readonly precision: number, readonly scale: number) {
    Object.freeze(this);
  }

  static of(precision: number, scale: number): DecimalType {
    if (!Number.isInteger(precision) || precision < 1 || precision > MAX_DECIMAL_PRECISION) {
      throw new InvalidTypeParameterError(
        `Decimal precision must be an integer in [1, ${MAX_DECIMAL_PRECISION}], got ${precision}`,
      );
    }
    if (!Number.isInteger(scale) || scale < 0 || scale > precision) {
      throw new InvalidTypeParameterError(
        `Decimal scale must be an integer in [0, ${precision}], got ${scale}`,
      );
    }
    return new DecimalType(precision, scale);
  }

  equals(other: Type): boolean {
    return typesEqual(this, other);
  }

  toString(): string {
    return `decimal(${this.precision}, ${this.scale})`;
  }
}

/**
 * Fixed-length binary
 */
export class FixedType {
  readonly typeId = TypeId.Fixed;

  private constructor(readonly length: number) {
    Object.freeze(this);
  }

  static ofLength(length: number): FixedType {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new InvalidTypeParameterError(`Fixed length must be a non-negative integer, got ${length}`);
    }
    return new FixedType(length);
  }

  equals(other: Type): boolean {
    return typesEqual(this, other);
  }

  toString(): string {
    return `fixed[${this.length}]`;
  }
}

export function primitive(typeId: StatelessTypeId): BasicType {
  return BasicType.get(typeId);
}

export function decimalOf(precision: number, scale: number): DecimalType {
  return DecimalType.of(precision, scale);
}

export function fixedOf(length: number): FixedType {
  return FixedType.ofLength(length);
}

export const booleanType = (): BasicType => BasicType.get(TypeId.Boolean);
export const intType = (): BasicType => BasicType.get(TypeId.Integer);
export const longType = (): BasicType => BasicType.get(TypeId.Long);
export const floatType = (): BasicType => BasicType.get(TypeId.Float);
export const doubleType = (): BasicType => BasicType.get(TypeId.Double);
export const dateType = (): BasicType => BasicType.get(TypeId.Date);
export const timeType = (): BasicType => BasicType.get(TypeId.Time);
export const timestampType = (): BasicType => BasicType.get(TypeId.Timestamp);
export const timestamptzType = (): BasicType => BasicType.get(TypeId.TimestampTz);
export const stringType = (): BasicType => BasicType.get(TypeId.String);
export const uuidType = (): BasicType => BasicType.get(TypeId.UUID);
export const binaryType = (): BasicType => BasicType.get(TypeId.Binary);

const FIXED_PATTERN = /^fixed\[\s*(\d+)\s*\]$/;
const DECIMAL_PATTERN = /^decimal\(\s*(\d+)\s*,\s*(\d+)\s*\)$/;

/**
 * Parse the textual form of a primitive type (`int`, `decimal(9, 2)`, `fixed[16]`)
 * Case-insensitive; stateless names resolve to the shared registry instance
 */
export function parsePrimitiveType(text: string): BasicType | DecimalType | FixedType {
  const normalized = text.trim().toLowerCase();

  const typeId = Object.values(TypeId).find((id) => id === normalized);
  if (typeId !== undefined && isStatelessTypeId(typeId)) {
    return BasicType.get(typeId);
  }

  const fixed = FIXED_PATTERN.exec(normalized);
  if (fixed) {
    return FixedType.ofLength(Number(fixed[1]));
  }

  const decimal = DECIMAL_PATTERN.exec(normalized);
  if (decimal) {
    return DecimalType.of(Number(decimal[1]), Number(decimal[2]));
  }

  throw new UnknownTypeError(text);
}
