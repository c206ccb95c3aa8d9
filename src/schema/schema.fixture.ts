import { Schema } from './schema';
import { ListType, MapType, StructType } from '../types/nested';
import { required, optional } from '../types/nested-field';
import { booleanType, doubleType, floatType, intType, longType, stringType } from '../types/primitives';

/**
 * Table mixing scalars, a nested struct, a map of structs, a list of structs
 * and a struct-keyed map, with ids 1 to 24
 */
export function buildTestSchema(): Schema {
  return new Schema([
    required(1, 'id', intType()),
    optional(2, 'data', stringType()),
    optional(3, 'preferences', StructType.of(
      required(8, 'feature1', booleanType()),
      optional(9, 'feature2', booleanType()),
    ), 'user preferences'),
    required(4, 'locations', MapType.ofRequired(10, 11, stringType(), StructType.of(
      required(12, 'lat', floatType()),
      required(13, 'long', floatType()),
    ))),
    optional(5, 'points', ListType.ofOptional(14, StructType.of(
      required(15, 'x', longType()),
      required(16, 'y', longType()),
    ))),
    required(6, 'doubles', ListType.ofRequired(17, doubleType())),
    optional(7, 'properties', MapType.ofOptional(18, 19, stringType(), stringType())),
    required(20, 'complex_key_map', MapType.ofOptional(21, 22, StructType.of(
      required(23, 'x', longType()),
      optional(24, 'y', longType()),
    ), stringType())),
  ]);
}
