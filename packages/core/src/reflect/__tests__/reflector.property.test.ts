/**
 * Property-based checks and an Ajv oracle over reflected schemas
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import { t, type TypeDescriptor } from '../../types/descriptor.js';
import { reflect } from '../reflector.js';

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

function createAjv(): InstanceType<typeof Ajv> {
  const ajv = new Ajv({ strict: false, allErrors: true });
  addFormats(ajv);
  return ajv;
}

const FC_PARAMS = {
  seed: Number(process.env['TEST_SEED'] ?? 424242),
  numRuns: Number(process.env['FC_NUM_RUNS'] ?? 100),
};

const FIELD_KINDS = ['string', 'integer', 'number', 'boolean', 'nick', 'list'] as const;
type FieldKind = (typeof FIELD_KINDS)[number];

function describeKind(kind: FieldKind): TypeDescriptor {
  switch (kind) {
    case 'string':
      return t.string();
    case 'integer':
      return t.integer();
    case 'number':
      return t.number();
    case 'boolean':
      return t.boolean();
    case 'nick':
      return t.pointer(t.string());
    case 'list':
      return t.array(t.integer());
  }
}

const fieldSpecs = fc.uniqueArray(
  fc.record({
    name: fc.constantFrom('a', 'b', 'c', 'd', 'e', 'f', 'g'),
    kind: fc.constantFrom(...FIELD_KINDS),
    required: fc.boolean(),
  }),
  { selector: (spec) => spec.name, maxLength: 7 }
);

type FieldSpec = { name: string; kind: FieldKind; required: boolean };

function buildStruct(specs: readonly FieldSpec[]): TypeDescriptor {
  return t.struct(
    'Generated',
    specs.map((spec) =>
      t.field(spec.name.toUpperCase(), describeKind(spec.kind), {
        json: spec.name,
        ...(spec.required ? { required: 'true' } : {}),
      })
    )
  );
}

describe('reflected structs (property-based)', () => {
  it('produce identical documents on every run', () => {
    fc.assert(
      fc.property(fieldSpecs, (specs) => {
        const type = buildStruct(specs);
        const first = JSON.stringify(reflect(type).unwrap());
        const second = JSON.stringify(reflect(type).unwrap());
        expect(first).toBe(second);
      }),
      FC_PARAMS
    );
  });

  it('keep declaration order and required fields', () => {
    fc.assert(
      fc.property(fieldSpecs, (specs) => {
        const schema = reflect(buildStruct(specs)).unwrap();
        const required = specs.filter((s) => s.required).map((s) => s.name);

        expect(Object.keys(schema.properties ?? {})).toEqual(specs.map((s) => s.name));
        expect(schema.required).toEqual(required.length > 0 ? required : undefined);
      }),
      FC_PARAMS
    );
  });

  it('are valid draft-07 documents', () => {
    const ajv = createAjv();
    fc.assert(
      fc.property(fieldSpecs, (specs) => {
        const document = reflect(buildStruct(specs)).unwrap().toJSON();
        expect(ajv.validateSchema(document)).toBe(true);
      }),
      FC_PARAMS
    );
  });
});

describe('Ajv oracle', () => {
  const LineItem = t.struct(
    'LineItem',
    [
      t.field('SKU', t.string(), { json: 'sku', required: 'true', pattern: '^[A-Z]+$' }),
      t.field('Qty', t.unsigned(), { json: 'qty' }),
    ],
    { module: 'shop' }
  );
  const Order = t.struct(
    'Order',
    [
      t.field('ID', t.uuid(), { json: 'id', required: 'true' }),
      t.field('Created', t.dateTime(), { json: 'created' }),
      t.field('Items', t.array(LineItem), { json: 'items', minItems: '1' }),
      t.field('Note', t.pointer(t.string()), { json: 'note' }),
    ],
    { module: 'shop' }
  );

  const validate = createAjv().compile(reflect(Order).unwrap().toJSON());
  const valid = {
    id: '248df4b7-aa70-47b8-a036-33ac447e668d',
    created: '2024-01-02T03:04:05Z',
    items: [{ sku: 'AB', qty: 2 }],
    note: null,
  };

  it('emits the expected document', () => {
    expect(reflect(Order).unwrap().toJSON()).toEqual({
      definitions: {
        ShopLineItem: {
          required: ['sku'],
          properties: {
            sku: { pattern: '^[A-Z]+$', type: 'string' },
            qty: { minimum: 0, type: 'integer' },
          },
          type: 'object',
        },
      },
      required: ['id'],
      properties: {
        id: {
          examples: ['248df4b7-aa70-47b8-a036-33ac447e668d'],
          type: 'string',
          format: 'uuid',
        },
        created: { type: 'string', format: 'date-time' },
        items: {
          items: { $ref: '#/definitions/ShopLineItem' },
          minItems: 1,
          type: ['array', 'null'],
        },
        note: { type: ['null', 'string'] },
      },
      type: 'object',
    });
  });

  it('accepts conforming instances', () => {
    expect(validate(valid)).toBe(true);
    expect(validate({ id: valid.id, items: null })).toBe(true);
  });

  it('rejects instances that break a constraint', () => {
    expect(validate({ ...valid, items: [{ sku: 'ab', qty: 2 }] })).toBe(false);
    expect(validate({ ...valid, items: [{ sku: 'AB', qty: -1 }] })).toBe(false);
    expect(validate({ ...valid, items: [] })).toBe(false);
    expect(validate({ ...valid, created: 'yesterday' })).toBe(false);
    expect(validate({ created: valid.created })).toBe(false);
  });
});
