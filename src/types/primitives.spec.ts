import {
  BasicType,
  DecimalType,
  FixedType,
  primitive,
  decimalOf,
  fixedOf,
  parsePrimitiveType,
  stringType,
  intType,
  timestampType,
  timestamptzType,
} from './primitives';
import { TypeId, STATELESS_TYPE_IDS } from './type-id';
import { InvalidTypeParameterError, UnknownTypeError } from '../common/errors';

describe('primitives', () => {
  describe('registry', () => {
    it('should return the same instance for every stateless kind', () => {
      for (const typeId of STATELESS_TYPE_IDS) {
        expect(primitive(typeId)).toBe(primitive(typeId));
        expect(BasicType.get(typeId)).toBe(primitive(typeId));
        expect(primitive(typeId).typeId).toBe(typeId);
      }
    });

    it('should expose named shortcuts backed by the registry', () => {
      expect(stringType()).toBe(primitive(TypeId.String));
      expect(intType()).toBe(primitive(TypeId.Integer));
    });

    it('should keep timestamps with and without zone distinct', () => {
      expect(timestampType()).not.toBe(timestamptzType());
      expect(timestampType().equals(timestamptzType())).toBe(false);
    });

    it('should freeze shared instances', () => {
      expect(Object.isFrozen(stringType())).toBe(true);
    });
  });

  describe('decimalOf', () => {
    it('should build equal but independent instances', () => {
      const a = decimalOf(9, 3);
      const b = decimalOf(9, 3);

      expect(a).not.toBe(b);
      expect(a.equals(b)).toBe(true);
      expect(a.precision).toBe(9);
      expect(a.scale).toBe(3);
    });

    it('should accept the boundaries', () => {
      expect(decimalOf(1, 0).toString()).toBe('decimal(1, 0)');
      expect(decimalOf(38, 38).toString()).toBe('decimal(38, 38)');
    });

    it('should distinguish by precision and scale', () => {
      expect(decimalOf(9, 3).equals(decimalOf(9, 2))).toBe(false);
      expect(decimalOf(9, 3).equals(decimalOf(10, 3))).toBe(false);
    });

    it('should reject out-of-range parameters', () => {
      expect(() => decimalOf(0, 0)).toThrow(InvalidTypeParameterError);
      expect(() => decimalOf(39, 2)).toThrow(InvalidTypeParameterError);
      expect(() => decimalOf(9, -1)).toThrow(InvalidTypeParameterError);
      expect(() => decimalOf(9.5, 2)).toThrow(InvalidTypeParameterError);
    });

    it('should reject a scale larger than the precision', () => {
      expect(() => decimalOf(4, 5)).toThrow('Decimal scale must be an integer in [0, 4], got 5');
    });
  });

  describe('fixedOf', () => {
    it('should compare by length', () => {
      expect(fixedOf(4).equals(fixedOf(4))).toBe(true);
      expect(fixedOf(4).equals(fixedOf(34))).toBe(false);
      expect(fixedOf(0).length).toBe(0);
    });

    it('should reject negative or fractional lengths', () => {
      expect(() => fixedOf(-1)).toThrow(InvalidTypeParameterError);
      expect(() => fixedOf(1.5)).toThrow(InvalidTypeParameterError);
    });

    it('should not equal a decimal or a binary', () => {
      expect(fixedOf(16).equals(decimalOf(16, 0))).toBe(false);
      expect(fixedOf(16).equals(primitive(TypeId.Binary))).toBe(false);
    });
  });

  describe('parsePrimitiveType', () => {
    it('should resolve stateless names to the registry instance', () => {
      expect(parsePrimitiveType('string')).toBe(stringType());
      expect(parsePrimitiveType('  TimestampTZ ')).toBe(timestamptzType());
      expect(parsePrimitiveType('INT')).toBe(intType());
    });

    it('should parse decimal and fixed with optional whitespace', () => {
      const decimal = parsePrimitiveType('decimal( 9 ,2 )');
      expect(decimal).toBeInstanceOf(DecimalType);
      expect(decimal.equals(decimalOf(9, 2))).toBe(true);

      const fixed = parsePrimitiveType('FIXED[ 16 ]');
      expect(fixed).toBeInstanceOf(FixedType);
      expect(fixed.equals(fixedOf(16))).toBe(true);
    });

    it('should read back every textual form', () => {
      for (const typeId of STATELESS_TYPE_IDS) {
        expect(parsePrimitiveType(primitive(typeId).toString())).toBe(primitive(typeId));
      }
      expect(parsePrimitiveType(decimalOf(38, 2).toString()).equals(decimalOf(38, 2))).toBe(true);
      expect(parsePrimitiveType(fixedOf(34).toString()).equals(fixedOf(34))).toBe(true);
    });

    it('should reject unknown names and nested type names', () => {
      expect(() => parsePrimitiveType('varchar')).toThrow(UnknownTypeError);
      expect(() => parsePrimitiveType('struct')).toThrow(UnknownTypeError);
      expect(() => parsePrimitiveType('decimal(9)')).toThrow("Cannot parse type string: 'decimal(9)'");
    });

    it('should validate parsed parameters', () => {
      expect(() => parsePrimitiveType('decimal(2, 3)')).toThrow(InvalidTypeParameterError);
      expect(() => parsePrimitiveType('decimal(40, 3)')).toThrow(InvalidTypeParameterError);
    });
  });
});
