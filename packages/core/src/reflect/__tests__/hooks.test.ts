import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import { defineType, t } from '../../types/descriptor.js';
import { ErrSkipProperty, HookError } from '../../types/errors.js';
import { Schema } from '../../types/schema.js';
import { ReflectContext } from '../context.js';
import { HookPipeline } from '../hooks.js';
import {
  collectDefinitions,
  interceptDefName,
  interceptNullability,
  interceptProp,
  interceptSchema,
  rootRef,
  type ReflectOption,
} from '../options.js';
import { reflect } from '../reflector.js';

function reflectJSON(value: unknown, ...options: ReflectOption[]): unknown {
  const result = reflect(value, ...options);
  if (result._tag === 'Err') throw result.error;
  return result.value.toJSON();
}

const Person = t.struct('Person', [
  t.field('Name', t.string(), { json: 'name', required: 'true' }),
  t.field('Age', t.integer(), { json: 'age' }),
]);

describe('HookPipeline', () => {
  it('stops schema hooks at the first that returns true', () => {
    const pipeline = new HookPipeline();
    const calls: string[] = [];
    pipeline.schema.push(() => {
      calls.push('first');
      return false;
    });
    pipeline.schema.push(() => {
      calls.push('second');
      return true;
    });
    pipeline.schema.push(() => {
      calls.push('third');
      return false;
    });

    const stopped = pipeline.runSchema({
      context: new ReflectContext(),
      value: undefined,
      type: t.string(),
      schema: new Schema(),
      processed: false,
    });
    expect(stopped).toBe(true);
    expect(calls).toEqual(['first', 'second']);
  });

  it('feeds definition names through every hook', () => {
    const pipeline = new HookPipeline();
    pipeline.defName.push((_type, name) => `${name}V1`);
    pipeline.defName.push((_type, name) => name.toLowerCase());
    expect(pipeline.runDefName(t.string(), 'User')).toBe('userv1');
  });
});

describe('schema interceptors', () => {
  it('a pre-expansion stop keeps only what the hook wrote', () => {
    const option = interceptSchema(({ processed, type, schema }) => {
      if (processed || type.kind !== 'integer') return false;
      schema.type = 'string';
      return true;
    });

    expect(reflectJSON(Person, option)).toEqual({
      required: ['name'],
      properties: { name: { type: 'string' }, age: { type: 'string' } },
      type: 'object',
    });
  });

  it('a post-expansion stop skips the preparer', () => {
    class Celsius {
      prepareJsonSchema(schema: Schema): void {
        schema.minimum = -273.15;
      }
    }
    const CelsiusType = defineType(Celsius, t.named('Celsius', t.number()));

    expect(reflectJSON(CelsiusType)).toEqual({ minimum: -273.15, type: 'number' });
    expect(reflectJSON(CelsiusType, interceptSchema(({ processed }) => processed))).toEqual({
      type: 'number',
    });
  });

  it('wraps hook failures with the path', () => {
    const option = interceptSchema(({ type }) => {
      if (type.kind === 'integer') throw new Error('boom');
      return false;
    });
    const result = reflect(Person, option);

    expect(result._tag).toBe('Err');
    if (result._tag !== 'Err') return;
    expect(result.error).toBeInstanceOf(HookError);
    expect(result.error.errorCode).toBe(ErrorCode.HOOK_FAILED);
    expect(result.error.message).toBe('age: boom');
  });
});

describe('property interceptors', () => {
  it('drop a property with ErrSkipProperty', () => {
    const option = interceptProp(({ name, processed }) => {
      if (name === 'age' && !processed) throw ErrSkipProperty;
    });

    expect(reflectJSON(Person, option)).toEqual({
      required: ['name'],
      properties: { name: { type: 'string' } },
      type: 'object',
    });
  });

  it('a skip after reflection drops the property and its requirement', () => {
    const option = interceptProp(({ name, processed }) => {
      if (name === 'name' && processed) throw ErrSkipProperty;
    });

    expect(reflectJSON(Person, option)).toEqual({
      properties: { age: { type: 'integer' } },
      type: 'object',
    });
  });

  it('see the finished property schema and its path', () => {
    const paths: string[] = [];
    const option = interceptProp(({ path, processed, propertySchema }) => {
      if (!processed || !propertySchema) return;
      paths.push(path.join('.'));
      propertySchema.description = 'seen';
    });

    expect(reflectJSON(Person, option)).toEqual({
      required: ['name'],
      properties: {
        name: { description: 'seen', type: 'string' },
        age: { description: 'seen', type: 'integer' },
      },
      type: 'object',
    });
    expect(paths).toEqual(['#.name', '#.age']);
  });
});

describe('nullability interceptors', () => {
  const Profile = t.struct('Profile', [
    t.field('Nick', t.pointer(t.string()), { json: 'nick' }),
    t.field('Name', t.string(), { json: 'name' }),
  ]);

  it('receive the schema before and after', () => {
    const seen: Array<[boolean, unknown, unknown]> = [];
    reflect(
      Profile,
      interceptNullability(({ nullAdded, origSchema, schema }) => {
        seen.push([nullAdded, origSchema.toJSON(), schema.toJSON()]);
      })
    ).unwrap();

    expect(seen).toEqual([
      [true, { type: 'string' }, { type: ['null', 'string'] }],
      [false, { type: 'string' }, { type: 'string' }],
    ]);
  });

  it('may undo the decision', () => {
    const option = interceptNullability(({ nullAdded, schema }) => {
      if (nullAdded) schema.removeType('null');
    });

    expect(reflectJSON(Profile, option)).toEqual({
      properties: { nick: { type: 'string' }, name: { type: 'string' } },
      type: 'object',
    });
  });
});

describe('definition name interceptors', () => {
  it('rename definitions and references', () => {
    const Address = t.struct('Address', [t.field('City', t.string(), { json: 'city' })]);
    const User = t.struct('User', [t.field('Home', Address, { json: 'home' })]);
    const names: string[] = [];

    const schema = reflectJSON(
      User,
      rootRef,
      interceptDefName((_type, name) => `Api${name}`),
      collectDefinitions((name) => names.push(name))
    );

    expect(schema).toEqual({ $ref: '#/definitions/ApiUser' });
    expect(names).toEqual(['ApiAddress', 'ApiUser']);
  });
});
