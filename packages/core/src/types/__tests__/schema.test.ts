/**
 * Tests for the Schema node model
 */

import { describe, it, expect } from 'vitest';
import { t } from '../descriptor.js';
import { escapeRefName, isSchema, Ref, Schema } from '../schema.js';

describe('Schema', () => {
  describe('toJSON', () => {
    it('emits keywords in a fixed order', () => {
      const schema = new Schema({
        type: 'object',
        properties: { a: new Schema({ type: 'string' }) },
        required: ['a'],
        title: 'T',
      });

      expect(JSON.stringify(schema)).toBe(
        '{"title":"T","required":["a"],"properties":{"a":{"type":"string"}},"type":"object"}'
      );
    });

    it('puts extra keywords last, sorted', () => {
      const schema = new Schema({ type: 'string' })
        .setExtraProperty('x-b', 1)
        .setExtraProperty('deprecated', true);

      expect(JSON.stringify(schema)).toBe(
        '{"type":"string","deprecated":true,"x-b":1}'
      );
    });

    it('omits non-serialized fields', () => {
      const schema = new Schema({ type: 'integer' });
      schema.parent = new Schema({ type: 'object' });
      schema.reflectType = t.integer();

      expect(schema.toJSON()).toEqual({ type: 'integer' });
    });

    it('keeps boolean sub-schemas', () => {
      const schema = new Schema({ type: 'object', additionalProperties: false });
      expect(schema.toJSON()).toEqual({
        additionalProperties: false,
        type: 'object',
      });
    });
  });

  describe('type helpers', () => {
    it('addType collapses a single type', () => {
      const schema = new Schema();
      schema.addType('string');
      expect(schema.type).toBe('string');
      schema.addType('null');
      expect(schema.type).toEqual(['string', 'null']);
      schema.addType('null');
      expect(schema.type).toEqual(['string', 'null']);
    });

    it('prependType puts the type first', () => {
      const schema = new Schema({ type: 'integer' }).prependType('null');
      expect(schema.type).toEqual(['null', 'integer']);
    });

    it('removeType drops the type and collapses', () => {
      const schema = new Schema({ type: ['null', 'integer'] }).removeType('null');
      expect(schema.type).toBe('integer');
      schema.removeType('integer');
      expect(schema.type).toBeUndefined();
    });

    it('addRequired does not duplicate', () => {
      const schema = new Schema().addRequired('a').addRequired('b').addRequired('a');
      expect(schema.required).toEqual(['a', 'b']);
    });
  });

  describe('isTrivial', () => {
    it('accepts a single type with annotations', () => {
      expect(new Schema({ type: 'string', title: 'Name' }).isTrivial()).toBe(true);
      expect(new Schema({ type: ['string', 'null'] }).isTrivial()).toBe(true);
    });

    it('rejects constraints', () => {
      expect(new Schema({ type: 'string', minLength: 1 }).isTrivial()).toBe(false);
      expect(new Schema({ type: 'string', format: 'uuid' }).isTrivial()).toBe(false);
      expect(new Schema({ enum: ['a'] }).isTrivial()).toBe(false);
      expect(new Schema({ required: ['a'] }).isTrivial()).toBe(false);
    });

    it('rejects several non-null types', () => {
      expect(new Schema({ type: ['string', 'integer'] }).isTrivial()).toBe(false);
    });

    it('looks at nested schemas', () => {
      const trivial = new Schema({
        type: 'object',
        properties: { a: new Schema({ type: 'string' }) },
      });
      const constrained = new Schema({
        type: 'array',
        items: new Schema({ type: 'string', pattern: '^a' }),
      });
      expect(trivial.isTrivial()).toBe(true);
      expect(constrained.isTrivial()).toBe(false);
    });

    it('follows references only with a resolver', () => {
      const schema = new Schema({ $ref: '#/definitions/Name' });
      const resolve = (ref: string): Schema | undefined =>
        ref === '#/definitions/Name' ? new Schema({ type: 'string' }) : undefined;

      expect(schema.isTrivial()).toBe(false);
      expect(schema.isTrivial(resolve)).toBe(true);
      expect(new Schema({ $ref: '#/definitions/Other' }).isTrivial(resolve)).toBe(false);
    });
  });

  describe('isPureReference', () => {
    it('allows annotations beside $ref', () => {
      const schema = new Schema({
        $ref: '#/definitions/A',
        description: 'about A',
        readOnly: true,
      }).setExtraProperty('deprecated', true);
      expect(schema.isPureReference()).toBe(true);
    });

    it('rejects constraints beside $ref', () => {
      expect(
        new Schema({ $ref: '#/definitions/A', default: {} }).isPureReference()
      ).toBe(false);
      expect(new Schema({ type: 'string' }).isPureReference()).toBe(false);
    });
  });

  describe('fromJSON', () => {
    it('decodes nested schemas and keeps unknown keywords', () => {
      const decoded = Schema.fromJSON({
        type: 'array',
        items: [{ type: 'string' }, true],
        'x-enum-names': ['A'],
      });

      expect(isSchema(decoded)).toBe(true);
      if (!isSchema(decoded)) return;
      expect(Array.isArray(decoded.items)).toBe(true);
      expect(decoded.extraProperties).toEqual({ 'x-enum-names': ['A'] });
      expect(decoded.toJSON()).toEqual({
        items: [{ type: 'string' }, true],
        type: 'array',
        'x-enum-names': ['A'],
      });
    });

    it('returns booleans as they are', () => {
      expect(Schema.fromJSON(false)).toBe(false);
    });

    it('rejects keywords of the wrong shape', () => {
      expect(() => Schema.fromJSON({ type: 'text' })).toThrow(
        'invalid "type" keyword: expected simple type name or list of names'
      );
      expect(() => Schema.fromJSON({ minLength: '1' })).toThrow(
        'invalid "minLength" keyword: expected number'
      );
      expect(() => Schema.fromJSON([])).toThrow(
        'schema must be an object or a boolean'
      );
    });
  });

  describe('copies', () => {
    it('clone is deep', () => {
      const original = new Schema({
        properties: { a: new Schema({ type: 'string' }) },
      });
      const copy = original.clone();
      copy.addRequired('a');
      const a = copy.properties?.['a'];
      if (isSchema(a)) a.minLength = 2;

      expect(original.toJSON()).toEqual({ properties: { a: { type: 'string' } } });
    });

    it('replaceWith swaps keywords and keeps reflection fields', () => {
      const type = t.string();
      const schema = new Schema({ title: 'old', type: 'object' });
      schema.reflectType = type;
      schema.replaceWith(new Schema({ type: 'string', format: 'email' }));

      expect(schema.toJSON()).toEqual({ type: 'string', format: 'email' });
      expect(schema.reflectType).toBe(type);
    });

    it('jsonSchema exposes a copy', () => {
      const schema = new Schema({ type: 'boolean' });
      const exposed = schema.jsonSchema();
      expect(exposed).not.toBe(schema);
      expect(exposed.toJSON()).toEqual({ type: 'boolean' });
    });
  });
});

describe('Ref', () => {
  it('escapes the definition name', () => {
    expect(escapeRefName('a/b~c%')).toBe('a~1b~0c%25');
    expect(new Ref('#/definitions/', 'a/b').toString()).toBe('#/definitions/a~1b');
  });

  it('the root reference is #', () => {
    expect(new Ref('#', '').toSchema().toJSON()).toEqual({ $ref: '#' });
  });
});
