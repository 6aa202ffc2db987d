/**
 * Sample resolution
 *
 * Turns whatever was handed to the reflector into a (descriptor, value)
 * pair: explicit samples and descriptors are taken as they are, virtual
 * structs and registered class instances are looked up, and anything else
 * is described from its run-time shape.
 */

import {
  deepIndirect,
  defineType,
  fieldsOf,
  isTypeDescriptor,
  t,
  typeDisplayName,
  TypedSample,
  typeOfClass,
  registeredTypeOf,
  resolveType,
  type FieldDescriptor,
  type TypeDescriptor,
} from '../types/descriptor.js';
import { isPlainRecord, Schema } from '../types/schema.js';
import type { ReflectContext } from './context.js';
import type { TypeKey } from './definitions.js';
import { Struct } from './struct.js';

// Schema instances expose themselves (see Schema#jsonSchema)
defineType(Schema, { kind: 'unknown' });

export interface Sample {
  type: TypeDescriptor;
  /** Undefined for a zero sample of the type */
  value: unknown;
  /** Set when the sample is a virtual struct */
  struct?: Struct;
}

export function resolveSample(input: unknown, rc: ReflectContext): Sample {
  if (input instanceof TypedSample) {
    const base = deepIndirect(input.type);
    if (isDynamic(base) && input.value !== undefined && input.value !== null) {
      return resolveSample(input.value, rc);
    }
    return { type: input.type, value: input.value };
  }
  if (isTypeDescriptor(input)) return { type: input, value: undefined };
  if (input instanceof Struct) {
    return { type: structType(input, rc), value: input, struct: input };
  }
  if (typeof input === 'function') {
    const type = typeOfClass(input);
    if (type) return { type, value: undefined };
  }
  if (typeof input === 'object' && input !== null) {
    const type = registeredTypeOf(input);
    if (type) return { type, value: input };
  }
  return { type: inferType(input, rc), value: input };
}

/** Anonymous `unknown`: the value's own type is reflected instead */
export function isDynamic(type: TypeDescriptor): boolean {
  return (
    type.kind === 'unknown' && type.name === undefined && type.proto === undefined
  );
}

/**
 * Descriptor for a plain value. Arrays, maps and objects are cached per
 * context so that cyclic object graphs resolve to one descriptor.
 */
export function inferType(value: unknown, rc: ReflectContext): TypeDescriptor {
  switch (typeof value) {
    case 'undefined':
      return t.unknown();
    case 'boolean':
      return t.boolean();
    case 'number':
      return Number.isInteger(value) ? t.integer() : t.number();
    case 'bigint':
      return t.integer();
    case 'string':
      return t.string();
    case 'function':
      return t.func();
    case 'symbol':
      return t.symbol();
    default:
      break;
  }
  if (typeof value !== 'object' || value === null) return t.unknown();
  if (value instanceof Date) return t.dateTime();
  if (value instanceof Uint8Array) return t.bytes();

  const target: object = value;
  const cached = rc.inferred.get(target);
  if (cached) return cached;

  let type: TypeDescriptor;
  if (Array.isArray(target)) {
    type = t.array(() => inferElement(target, rc));
  } else if (target instanceof Map) {
    type = t.map(() => inferElement(target, rc));
  } else {
    const keys = Object.keys(target);
    type = t.object(() =>
      keys.map((key) =>
        t.field(key, () => inferType(Reflect.get(target, key), rc), {
          json: key,
        })
      )
    );
  }
  rc.inferred.set(target, type);
  return type;
}

function inferElement(value: unknown, rc: ReflectContext): TypeDescriptor {
  const first = firstElement(value);
  return first === undefined ? t.unknown() : inferType(first, rc);
}

/** First item of an array, or first value of a Map or record */
export function firstElement(value: unknown): unknown {
  if (Array.isArray(value)) return value[0];
  if (value instanceof Map) {
    for (const item of value.values()) return item;
    return undefined;
  }
  if (isPlainRecord(value)) {
    for (const key of Object.keys(value)) return value[key];
  }
  return undefined;
}

/**
 * Struct descriptor of a virtual struct, built once per context. Field
 * types come from the field sample values.
 */
export function structType(s: Struct, rc: ReflectContext): TypeDescriptor {
  const cached = rc.inferred.get(s);
  if (cached) return cached;

  const name =
    s.defName !== '' ? s.defName : `struct${rc.nextAnonymousIndex()}`;
  const type = t.struct(name, () =>
    s.fields.map((f) =>
      t.field(f.name, () => resolveSample(f.value, rc).type, f.tags)
    )
  );
  rc.inferred.set(s, type);
  return type;
}

/**
 * Identity of a type within a run. Named types are compared by their
 * qualified name, anonymous ones by descriptor object.
 */
export function typeKey(type: TypeDescriptor): TypeKey {
  if (type.name === undefined) return type;
  return `named:${qualifiedName(type)}`;
}

export function structKey(s: Struct, rc: ReflectContext): TypeKey {
  const name = structType(s, rc).name ?? '';
  return `struct.${name}`;
}

function qualifiedName(type: TypeDescriptor): string {
  const base = `${type.module ?? ''}.${type.name ?? ''}`;
  if (!type.typeArgs || type.typeArgs.length === 0) return base;
  const args = type.typeArgs.map((arg) =>
    arg.name === undefined ? typeDisplayName(arg) : qualifiedName(arg)
  );
  return `${base}[${args.join(',')}]`;
}

/** Own property of a sample object, undefined for zero samples */
export function readField(value: unknown, name: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  if (value instanceof Map) return value.get(name);
  return Reflect.get(value, name);
}

/**
 * Array or map type embedded into a struct; such structs reflect as the
 * collection itself.
 */
export function findEmbeddedCollection(
  type: TypeDescriptor
): FieldDescriptor | undefined {
  if (type.kind !== 'struct') return undefined;
  return fieldsOf(type).find((field) => {
    if (!field.embedded) return false;
    const base = deepIndirect(resolveType(field.type));
    return base.kind === 'array' || base.kind === 'map';
  });
}
