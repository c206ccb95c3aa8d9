import { typesEqual, fieldsEqual, fieldListsEqual } from './equality';
import { ListType, MapType, StructType } from './nested';
import { required, optional } from './nested-field';
import { booleanType, decimalOf, fixedOf, intType, longType, stringType } from './primitives';

describe('equality', () => {
  describe('typesEqual', () => {
    it('should compare primitives by variant and parameters', () => {
      expect(typesEqual(intType(), intType())).toBe(true);
      expect(typesEqual(intType(), longType())).toBe(false);
      expect(typesEqual(decimalOf(11, 0), decimalOf(11, 0))).toBe(true);
      expect(typesEqual(fixedOf(4), fixedOf(4))).toBe(true);
      expect(typesEqual(fixedOf(4), booleanType())).toBe(false);
    });

    it('should compare structs field by field, in order', () => {
      const a = StructType.of(required(1, 'a', intType()), optional(2, 'b', stringType()));
      const b = StructType.of(required(1, 'a', intType()), optional(2, 'b', stringType()));
      const reordered = StructType.of(optional(2, 'b', stringType()), required(1, 'a', intType()));

      expect(typesEqual(a, b)).toBe(true);
      expect(typesEqual(a, reordered)).toBe(false);
    });

    it('should compare nested trees recursively', () => {
      const build = (precision: number) => MapType.ofRequired(
        10,
        11,
        stringType(),
        StructType.of(required(12, 'amount', decimalOf(precision, 2))),
      );

      expect(typesEqual(build(9), build(9))).toBe(true);
      expect(typesEqual(build(9), build(10))).toBe(false);
    });

    it('should compare list element fields', () => {
      expect(typesEqual(ListType.ofOptional(1, intType()), ListType.ofOptional(1, intType()))).toBe(true);
      expect(typesEqual(ListType.ofOptional(1, intType()), ListType.ofRequired(1, intType()))).toBe(false);
      expect(typesEqual(ListType.ofOptional(1, intType()), ListType.ofOptional(2, intType()))).toBe(false);
      expect(typesEqual(ListType.ofOptional(1, intType(), 'doc'), ListType.ofOptional(1, intType()))).toBe(false);
    });

    it('should not equal across nested variants', () => {
      expect(typesEqual(ListType.ofOptional(1, intType()), StructType.of())).toBe(false);
    });
  });

  describe('fieldsEqual', () => {
    const base = required(1, 'a', intType(), 'doc');

    it('should require every attribute to match', () => {
      expect(fieldsEqual(base, required(1, 'a', intType(), 'doc'))).toBe(true);
      expect(fieldsEqual(base, required(2, 'a', intType(), 'doc'))).toBe(false);
      expect(fieldsEqual(base, required(1, 'b', intType(), 'doc'))).toBe(false);
      expect(fieldsEqual(base, optional(1, 'a', intType(), 'doc'))).toBe(false);
      expect(fieldsEqual(base, required(1, 'a', longType(), 'doc'))).toBe(false);
    });

    it('should distinguish an absent doc from an empty one', () => {
      expect(fieldsEqual(required(1, 'a', intType()), required(1, 'a', intType(), ''))).toBe(false);
      expect(fieldsEqual(required(1, 'a', intType()), required(1, 'a', intType(), null))).toBe(true);
    });
  });

  it('should compare field lists by length first', () => {
    expect(fieldListsEqual([required(1, 'a', intType())], [])).toBe(false);
  });
});
