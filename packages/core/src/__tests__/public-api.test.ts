import { describe, it, expect } from 'vitest';
import {
  defineStruct,
  ErrorCode,
  isReflectError,
  oneOf,
  reflect,
  Reflector,
  rootRef,
  Schema,
  t,
  type InterceptSchemaFunc,
} from '../index.js';

describe('public API surface', () => {
  it('reflects a registered class through the entry point', () => {
    class Pet {
      name = 'rex';
      age = 3;
    }
    defineStruct(Pet, [
      t.field('name', t.string(), { json: 'name', required: 'true' }),
      t.field('age', t.integer(), { json: 'age', minimum: '0' }),
    ]);

    expect(reflect(new Pet(), rootRef).unwrap().toJSON()).toEqual({
      $ref: '#/definitions/Pet',
      definitions: {
        Pet: {
          required: ['name'],
          properties: {
            name: { type: 'string' },
            age: { minimum: 0, type: 'integer' },
          },
          type: 'object',
        },
      },
    });
  });

  it('exposes the reflector, combinators and hook types', () => {
    const reflector = new Reflector();
    const hook: InterceptSchemaFunc = ({ schema }) => {
      schema.$comment = 'seen';
    };
    reflector.defaultOptions = [(rc) => rc.hooks.schema.push(hook)];

    const schema = reflector.reflect(oneOf(t.boolean())).unwrap();
    expect(schema).toBeInstanceOf(Schema);
    expect(schema.oneOf?.length).toBe(1);
  });

  it('surfaces failures as typed errors', () => {
    const result = reflect(t.func());
    expect(result._tag).toBe('Err');
    if (result._tag !== 'Err') return;
    expect(isReflectError(result.error)).toBe(true);
    expect(result.error.errorCode).toBe(ErrorCode.UNSUPPORTED_TYPE);
    expect(result.error.message).toBe('type is not supported: function');
  });
});
