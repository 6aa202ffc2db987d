/**
 * Runtime type descriptors
 *
 * TypeScript types are erased at run time, so reflection works on explicit
 * descriptors: a kind plus the facts the reflector needs (element and field
 * types, field metadata, the prototype carrying capability methods).
 * Descriptors are plain frozen objects; element and field lists may be
 * thunks so that recursive types can refer to themselves.
 */

export type Kind =
  | 'boolean'
  | 'integer'
  | 'unsigned'
  | 'number'
  | 'string'
  | 'unknown'
  | 'raw'
  | 'struct'
  | 'array'
  | 'map'
  | 'pointer'
  | 'function'
  | 'symbol';

export type Lazy<T> = T | (() => T);

/** Field metadata: annotation key → raw string value */
export type FieldTags = Readonly<Record<string, string>>;

export interface FieldDescriptor {
  /** Declared field name; `_` marks a field that configures its parent */
  readonly name: string;
  readonly type: Lazy<TypeDescriptor>;
  readonly tags?: FieldTags;
  /** Embedded (anonymous) field whose properties are promoted */
  readonly embedded?: boolean;
}

export interface TypeDescriptor {
  readonly kind: Kind;
  /** Declared name; named types can earn a shared definition */
  readonly name?: string;
  /** Declaring module path, e.g. `app/models` */
  readonly module?: string;
  /** Arguments of a generic instantiation */
  readonly typeArgs?: readonly TypeDescriptor[];
  /** Element of array, map and pointer kinds */
  readonly elem?: Lazy<TypeDescriptor>;
  readonly fields?: Lazy<readonly FieldDescriptor[]>;
  /** String format for well-known string types */
  readonly format?: string;
  /** Examples attached by well-known types */
  readonly examples?: readonly unknown[];
  /** Object whose methods are probed for capabilities */
  readonly proto?: object;
}

export interface TypeOptions {
  module?: string;
  typeArgs?: readonly TypeDescriptor[];
  proto?: object;
}

/**
 * A value paired with the descriptor it should be reflected as.
 */
export class TypedSample<T = unknown> {
  constructor(
    public readonly type: TypeDescriptor,
    public readonly value: T
  ) {}
}

export function sample<T>(type: TypeDescriptor, value: T): TypedSample<T> {
  return new TypedSample(type, value);
}

export function resolveType(type: Lazy<TypeDescriptor>): TypeDescriptor {
  return typeof type === 'function' ? type() : type;
}

export function elemOf(type: TypeDescriptor): TypeDescriptor {
  return type.elem === undefined ? t.unknown() : resolveType(type.elem);
}

export function fieldsOf(type: TypeDescriptor): readonly FieldDescriptor[] {
  const fields = type.fields;
  if (fields === undefined) return [];
  return typeof fields === 'function' ? fields() : fields;
}

export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof TypedSample) &&
    typeof Reflect.get(value, 'kind') === 'string' &&
    KINDS.has(String(Reflect.get(value, 'kind')))
  );
}

const KINDS: ReadonlySet<string> = new Set<Kind>([
  'boolean',
  'integer',
  'unsigned',
  'number',
  'string',
  'unknown',
  'raw',
  'struct',
  'array',
  'map',
  'pointer',
  'function',
  'symbol',
]);

/** Strips pointer layers */
export function deepIndirect(type: TypeDescriptor): TypeDescriptor {
  let current = type;
  while (current.kind === 'pointer') current = elemOf(current);
  return current;
}

/** Human-readable type name used in error messages */
export function typeDisplayName(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'pointer':
      return `${typeDisplayName(elemOf(type))} | null`;
    case 'array':
      return type.name ?? `${typeDisplayName(elemOf(type))}[]`;
    case 'map':
      return type.name ?? `Record<string, ${typeDisplayName(elemOf(type))}>`;
    default: {
      if (type.name === undefined) return type.kind;
      return type.module ? `${type.module}.${type.name}` : type.name;
    }
  }
}

function freeze(type: TypeDescriptor): TypeDescriptor {
  return Object.freeze(type);
}

function named(
  kind: Kind,
  name: string | undefined,
  opts: TypeOptions & { elem?: Lazy<TypeDescriptor> } = {}
): TypeDescriptor {
  return freeze({
    kind,
    name,
    module: opts.module,
    typeArgs: opts.typeArgs,
    proto: opts.proto,
    elem: opts.elem,
  });
}

/**
 * Descriptor builders
 *
 * @example
 * const User = t.struct('User', [
 *   t.field('Name', t.string(), { json: 'name', required: 'true' }),
 *   t.field('Age', t.integer(), { json: 'age' }),
 * ], { module: 'app' });
 */
export const t = {
  boolean: (): TypeDescriptor => freeze({ kind: 'boolean' }),
  integer: (): TypeDescriptor => freeze({ kind: 'integer' }),
  unsigned: (): TypeDescriptor => freeze({ kind: 'unsigned' }),
  number: (): TypeDescriptor => freeze({ kind: 'number' }),
  string: (format?: string): TypeDescriptor =>
    freeze({ kind: 'string', format }),
  unknown: (): TypeDescriptor => freeze({ kind: 'unknown' }),
  func: (): TypeDescriptor => freeze({ kind: 'function' }),
  symbol: (): TypeDescriptor => freeze({ kind: 'symbol' }),

  /** Pre-encoded JSON: accepts anything, never nullable */
  rawJSON: (): TypeDescriptor => freeze({ kind: 'raw' }),
  dateTime: (): TypeDescriptor =>
    freeze({ kind: 'string', format: 'date-time' }),
  date: (): TypeDescriptor => freeze({ kind: 'string', format: 'date' }),
  bytes: (): TypeDescriptor => freeze({ kind: 'string', format: 'base64' }),
  uuid: (): TypeDescriptor =>
    freeze({
      kind: 'string',
      format: 'uuid',
      examples: ['248df4b7-aa70-47b8-a036-33ac447e668d'],
    }),

  array: (elem: Lazy<TypeDescriptor>): TypeDescriptor =>
    freeze({ kind: 'array', elem }),
  map: (elem: Lazy<TypeDescriptor>): TypeDescriptor =>
    freeze({ kind: 'map', elem }),
  pointer: (elem: Lazy<TypeDescriptor>): TypeDescriptor =>
    freeze({ kind: 'pointer', elem }),

  /** Anonymous struct */
  object: (fields: Lazy<readonly FieldDescriptor[]>): TypeDescriptor =>
    freeze({ kind: 'struct', fields }),

  /** Named struct */
  struct: (
    name: string,
    fields: Lazy<readonly FieldDescriptor[]>,
    opts: TypeOptions = {}
  ): TypeDescriptor =>
    freeze({
      kind: 'struct',
      name,
      module: opts.module,
      typeArgs: opts.typeArgs,
      proto: opts.proto,
      fields,
    }),

  /** Named type over a non-struct base, e.g. a string enumeration */
  named: (
    name: string,
    base: TypeDescriptor,
    opts: TypeOptions = {}
  ): TypeDescriptor =>
    freeze({
      ...base,
      name,
      module: opts.module,
      typeArgs: opts.typeArgs,
      proto: opts.proto ?? base.proto,
    }),

  /** Named array or map type */
  namedCollection: (
    kind: 'array' | 'map',
    name: string,
    elem: Lazy<TypeDescriptor>,
    opts: TypeOptions = {}
  ): TypeDescriptor => named(kind, name, { ...opts, elem }),

  field: (
    name: string,
    type: Lazy<TypeDescriptor>,
    tags?: FieldTags,
    opts: { embedded?: boolean } = {}
  ): FieldDescriptor =>
    Object.freeze({ name, type, tags, embedded: opts.embedded }),

  /** Embedded field; its properties are promoted into the parent */
  embed: (type: Lazy<TypeDescriptor>, tags?: FieldTags): FieldDescriptor =>
    Object.freeze({
      name: embeddedFieldName(type),
      type,
      tags,
      embedded: true,
    }),
};

function embeddedFieldName(type: Lazy<TypeDescriptor>): string {
  const resolved = typeof type === 'function' ? undefined : deepIndirect(type);
  return resolved?.name ?? 'embedded';
}

// ---------------------------------------------------------------------------
// class registry

type AnyConstructor = abstract new (...args: never[]) => unknown;

const classTypes = new WeakMap<object, TypeDescriptor>();

/**
 * Associates a class with a descriptor so that instances reflect as it.
 * The class prototype becomes the capability carrier.
 */
export function defineType(
  ctor: AnyConstructor,
  type: TypeDescriptor
): TypeDescriptor {
  const prototype: unknown = ctor.prototype;
  const registered =
    type.proto === undefined && typeof prototype === 'object' && prototype
      ? freeze({ ...type, proto: prototype })
      : type;
  classTypes.set(ctor, registered);
  return registered;
}

/**
 * Declares a named struct for a class.
 *
 * @example
 * class Pet { name = ''; }
 * defineStruct(Pet, [t.field('name', t.string(), { json: 'name' })]);
 */
export function defineStruct(
  ctor: AnyConstructor & { name: string },
  fields: Lazy<readonly FieldDescriptor[]>,
  opts: TypeOptions & { name?: string } = {}
): TypeDescriptor {
  return defineType(ctor, t.struct(opts.name ?? ctor.name, fields, opts));
}

/** Descriptor registered for the value's class, walking up the chain */
export function registeredTypeOf(value: object): TypeDescriptor | undefined {
  let proto: unknown = Object.getPrototypeOf(value);
  while (typeof proto === 'object' && proto !== null) {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor === 'function') {
      const type = classTypes.get(ctor);
      if (type) return type;
    }
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}

export function typeOfClass(ctor: object): TypeDescriptor | undefined {
  return classTypes.get(ctor);
}
