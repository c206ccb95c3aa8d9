import { schemaFromJson, schemaToJson, typeFromJson, typeToJson } from './schema-json';
import { Schema } from '../schema/schema';
import { ListType, MapType, StructType } from '../types/nested';
import { required, optional } from '../types/nested-field';
import { isListType, isMapType, isStructType } from '../types/type';
import { decimalOf, fixedOf, intType, longType, stringType, timestamptzType } from '../types/primitives';
import { DeserializationError } from '../common/errors';

describe('schema-json', () => {
  describe('typeToJson', () => {
    it('should write primitives as type strings', () => {
      expect(typeToJson(longType())).toBe('long');
      expect(typeToJson(timestamptzType())).toBe('timestamptz');
      expect(typeToJson(decimalOf(9, 2))).toBe('decimal(9, 2)');
      expect(typeToJson(fixedOf(16))).toBe('fixed[16]');
    });

    it('should write struct fields with docs only when present', () => {
      const struct = StructType.of(
        required(1, 'id', longType(), 'row key'),
        optional(2, 'note', stringType()),
      );

      expect(typeToJson(struct)).toEqual({
        type: 'struct',
        fields: [
          { id: 1, name: 'id', required: true, type: 'long', doc: 'row key' },
          { id: 2, name: 'note', required: false, type: 'string' },
        ],
      });
    });

    it('should write list and map fields', () => {
      expect(typeToJson(ListType.ofRequired(3, intType(), 'counts'))).toEqual({
        type: 'list',
        'element-id': 3,
        element: 'int',
        'element-required': true,
        'element-doc': 'counts',
      });
      expect(typeToJson(MapType.ofOptional(4, 5, stringType(), intType(), null, 'value doc'))).toEqual({
        type: 'map',
        'key-id': 4,
        key: 'string',
        'value-id': 5,
        value: 'int',
        'value-required': false,
        'value-doc': 'value doc',
      });
    });
  });

  describe('schemaToJson', () => {
    it('should include schema id and identifier fields when set', () => {
      const schema = new Schema([required(1, 'id', longType())], { schemaId: 4, identifierFieldIds: [1] });

      expect(schemaToJson(schema)).toEqual({
        type: 'struct',
        'schema-id': 4,
        'identifier-field-ids': [1],
        fields: [{ id: 1, name: 'id', required: true, type: 'long' }],
      });
    });

    it('should omit empty identifier fields', () => {
      const json = schemaToJson(new Schema([required(1, 'id', longType())]));

      expect(json['identifier-field-ids']).toBeUndefined();
      expect(json['schema-id']).toBe(0);
    });
  });

  describe('typeFromJson', () => {
    it('should read docs, treating null as absent', () => {
      const type = typeFromJson({
        type: 'struct',
        fields: [
          { id: 1, name: 'a', required: true, type: 'int', doc: null },
          { id: 2, name: 'b', required: false, type: 'int', doc: '' },
        ],
      });

      expect(isStructType(type)).toBe(true);
      if (!isStructType(type)) return;
      expect(type.fieldById(1)?.doc).toBeUndefined();
      expect(type.fieldById(2)?.doc).toBe('');
    });

    it('should report the path of a missing attribute', () => {
      const json = { type: 'struct', fields: [{ id: 1, name: 'a', type: 'int' }] };

      expect(() => typeFromJson(json)).toThrow('Cannot deserialize at $.fields[0].required: Expected a boolean, got nothing');
    });

    it('should report non-integer ids', () => {
      const json = { type: 'list', 'element-id': 'one', element: 'int', 'element-required': true };

      expect(() => typeFromJson(json)).toThrow('Cannot deserialize at $.element-id: Expected an integer, got string');
    });

    it('should reject unknown nested tags', () => {
      expect(() => typeFromJson({ type: 'union' })).toThrow('Cannot deserialize at $.type: Unknown nested type "union"');
      expect(() => typeFromJson(null)).toThrow('Cannot deserialize at $: Expected an object, got null');
      expect(() => typeFromJson([])).toThrow('Cannot deserialize at $: Expected an object, got an array');
    });

    it('should wrap model violations with their cause', () => {
      const json = {
        type: 'map',
        'key-id': 1,
        key: 'string',
        'value-id': 1,
        value: 'int',
        'value-required': true,
      };

      let caught: unknown;
      try {
        typeFromJson(json, {}, '$.type');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DeserializationError);
      expect(caught instanceof Error && caught.message)
        .toBe('Cannot deserialize at $.type: Duplicate field id 1 in map key and value');
      expect(caught instanceof Error && caught.cause).toBeInstanceOf(Error);
    });

    it('should allocate ids in fresh-id order when asked', () => {
      let lastId = 0;
      const type = typeFromJson(
        {
          type: 'struct',
          fields: [
            { name: 'id', required: true, type: 'long' },
            {
              name: 'attrs',
              required: false,
              type: { type: 'map', key: 'string', value: { type: 'list', element: 'int', 'element-required': true }, 'value-required': true },
            },
            { name: 'name', required: false, type: 'string' },
          ],
        },
        { assignIds: () => ++lastId },
      );

      expect(isStructType(type)).toBe(true);
      if (!isStructType(type)) return;
      expect(type.fields.map(field => field.id)).toEqual([1, 2, 3]);

      const map = type.fieldById(2)?.type;
      expect(map !== undefined && isMapType(map)).toBe(true);
      if (map === undefined || !isMapType(map)) return;
      expect([map.keyId, map.valueId]).toEqual([4, 5]);

      const list = map.valueType;
      expect(isListType(list) && list.elementId).toBe(6);
    });

    it('should reject ids written in input whose ids are assigned', () => {
      let lastId = 0;
      const assignIds = () => ++lastId;

      expect(() => typeFromJson(
        { type: 'struct', fields: [{ id: 100, name: 'event_id', required: true, type: 'long' }] },
        { assignIds },
      )).toThrow("Cannot deserialize at $.fields[0].id: Field 'event_id' sets 'id' 100 but ids are assigned automatically");

      expect(() => typeFromJson(
        { type: 'list', 'element-id': 3, element: 'int', 'element-required': true },
        { assignIds },
      )).toThrow("Cannot deserialize at $.element-id: Type sets 'element-id' 3 but ids are assigned automatically");
    });
  });

  describe('schemaFromJson', () => {
    it('should read schema id and identifier fields', () => {
      const schema = schemaFromJson({
        type: 'struct',
        'schema-id': 3,
        'identifier-field-ids': [1],
        fields: [{ id: 1, name: 'id', required: true, type: 'uuid' }],
      });

      expect(schema.schemaId).toBe(3);
      expect(schema.identifierFieldIds).toEqual([1]);
      expect(schema.fieldByName('id')?.type.toString()).toBe('uuid');
    });

    it('should default a missing schema id', () => {
      expect(schemaFromJson({ type: 'struct', fields: [] }).schemaId).toBe(0);
    });

    it('should reject a non-struct schema', () => {
      expect(() => schemaFromJson({ type: 'list' }))
        .toThrow('Cannot deserialize at $: Schema must be a struct, got type "list"');
    });

    it('should reject invalid identifier fields at the schema path', () => {
      const json = {
        type: 'struct',
        'identifier-field-ids': [2],
        fields: [{ id: 1, name: 'id', required: true, type: 'long' }],
      };

      expect(() => schemaFromJson(json, {}, 'tables.events'))
        .toThrow('Cannot deserialize at tables.events: Cannot use field 2 as an identifier field: not found');
    });

    it('should reject non-integer identifier field ids', () => {
      const json = { type: 'struct', 'identifier-field-ids': ['id'], fields: [] };

      expect(() => schemaFromJson(json)).toThrow('Cannot deserialize at $.identifier-field-ids[0]: Expected an integer, got "id"');
    });
  });
});
