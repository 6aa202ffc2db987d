/* eslint-disable max-lines */
/**
 * Schema node model for the draft-07 dialect
 *
 * A mutable tree produced by the reflector. Serialization goes through
 * toJSON(), which emits keywords in a fixed order and omits absent ones so
 * that repeated runs produce byte-identical documents.
 */

import type { TypeDescriptor } from './descriptor.js';

export type SimpleType =
  | 'array'
  | 'boolean'
  | 'integer'
  | 'null'
  | 'number'
  | 'object'
  | 'string';

const SIMPLE_TYPES: ReadonlySet<string> = new Set<SimpleType>([
  'array',
  'boolean',
  'integer',
  'null',
  'number',
  'object',
  'string',
]);

export type SchemaOrBool = Schema | boolean;

/**
 * Keyword fields accepted by the Schema constructor
 */
export interface SchemaKeywords {
  $schema?: string;
  $id?: string;
  $ref?: string;
  $comment?: string;
  title?: string;
  description?: string;
  default?: unknown;
  readOnly?: boolean;
  writeOnly?: boolean;
  examples?: unknown[];
  multipleOf?: number;
  maximum?: number;
  exclusiveMaximum?: number;
  minimum?: number;
  exclusiveMinimum?: number;
  maxLength?: number;
  minLength?: number;
  pattern?: string;
  additionalItems?: SchemaOrBool;
  items?: SchemaOrBool | SchemaOrBool[];
  maxItems?: number;
  minItems?: number;
  uniqueItems?: boolean;
  contains?: SchemaOrBool;
  maxProperties?: number;
  minProperties?: number;
  required?: string[];
  additionalProperties?: SchemaOrBool;
  definitions?: Record<string, SchemaOrBool>;
  properties?: Record<string, SchemaOrBool>;
  patternProperties?: Record<string, SchemaOrBool>;
  dependencies?: Record<string, SchemaOrBool | string[]>;
  propertyNames?: SchemaOrBool;
  const?: unknown;
  enum?: unknown[];
  type?: SimpleType | SimpleType[];
  format?: string;
  contentMediaType?: string;
  contentEncoding?: string;
  if?: SchemaOrBool;
  then?: SchemaOrBool;
  else?: SchemaOrBool;
  allOf?: SchemaOrBool[];
  anyOf?: SchemaOrBool[];
  oneOf?: SchemaOrBool[];
  not?: SchemaOrBool;
  /** Vendor and unknown keywords (x-*, deprecated) */
  extraProperties?: Record<string, unknown>;
}

// Keywords that may sit next to $ref without changing validation
const REF_SIBLING_KEYWORDS: ReadonlySet<string> = new Set([
  '$ref',
  '$comment',
  'title',
  'description',
  'readOnly',
  'writeOnly',
  'extraProperties',
]);

export class Schema implements SchemaKeywords {
  $schema?: string;
  $id?: string;
  $ref?: string;
  $comment?: string;
  title?: string;
  description?: string;
  default?: unknown;
  readOnly?: boolean;
  writeOnly?: boolean;
  examples?: unknown[];
  multipleOf?: number;
  maximum?: number;
  exclusiveMaximum?: number;
  minimum?: number;
  exclusiveMinimum?: number;
  maxLength?: number;
  minLength?: number;
  pattern?: string;
  additionalItems?: SchemaOrBool;
  items?: SchemaOrBool | SchemaOrBool[];
  maxItems?: number;
  minItems?: number;
  uniqueItems?: boolean;
  contains?: SchemaOrBool;
  maxProperties?: number;
  minProperties?: number;
  required?: string[];
  additionalProperties?: SchemaOrBool;
  definitions?: Record<string, SchemaOrBool>;
  properties?: Record<string, SchemaOrBool>;
  patternProperties?: Record<string, SchemaOrBool>;
  dependencies?: Record<string, SchemaOrBool | string[]>;
  propertyNames?: SchemaOrBool;
  const?: unknown;
  enum?: unknown[];
  type?: SimpleType | SimpleType[];
  format?: string;
  contentMediaType?: string;
  contentEncoding?: string;
  if?: SchemaOrBool;
  then?: SchemaOrBool;
  else?: SchemaOrBool;
  allOf?: SchemaOrBool[];
  anyOf?: SchemaOrBool[];
  oneOf?: SchemaOrBool[];
  not?: SchemaOrBool;
  extraProperties?: Record<string, unknown>;

  /** Enclosing schema while a property is being placed (not serialized) */
  parent?: Schema;
  /** Descriptor the schema was reflected from (not serialized) */
  reflectType?: TypeDescriptor;

  constructor(init: SchemaKeywords = {}) {
    Object.assign(this, init);
  }

  /** Types as a list, regardless of the single/array form */
  typeList(): SimpleType[] {
    if (this.type === undefined) return [];
    return Array.isArray(this.type) ? [...this.type] : [this.type];
  }

  hasType(type: SimpleType): boolean {
    return this.typeList().includes(type);
  }

  /** Appends a type, keeping the single-type form when possible */
  addType(type: SimpleType): this {
    const types = this.typeList();
    if (types.includes(type)) return this;
    types.push(type);
    this.type = types.length === 1 ? types[0] : types;
    return this;
  }

  /** Adds a type in front of the existing ones */
  prependType(type: SimpleType): this {
    const types = this.typeList();
    if (types.includes(type)) return this;
    types.unshift(type);
    this.type = types.length === 1 ? types[0] : types;
    return this;
  }

  removeType(type: SimpleType): this {
    const types = this.typeList().filter((t) => t !== type);
    if (types.length === 0) this.type = undefined;
    else this.type = types.length === 1 ? types[0] : types;
    return this;
  }

  addRequired(name: string): this {
    const required = this.required ?? [];
    if (!required.includes(name)) required.push(name);
    this.required = required;
    return this;
  }

  setExtraProperty(key: string, value: unknown): this {
    this.extraProperties = { ...(this.extraProperties ?? {}), [key]: value };
    return this;
  }

  /** True when only keywords allowed beside $ref are set */
  isPureReference(): boolean {
    if (this.$ref === undefined) return false;
    return presentKeywords(this).every((k) => REF_SIBLING_KEYWORDS.has(k));
  }

  /**
   * Reports whether the schema constrains nothing beyond a single type
   * (plus null). Annotations do not count; references are followed with
   * the resolver when given and treated as constraining otherwise.
   */
  isTrivial(
    resolveRef?: (ref: string) => SchemaOrBool | undefined
  ): boolean {
    return isTrivialSchema(this, resolveRef, new Set());
  }

  /** Exposes the schema as-is when used as a sample value */
  jsonSchema(): Schema {
    return this.clone();
  }

  /** Replaces every keyword with a copy of the other schema's keywords */
  replaceWith(other: Schema): this {
    const copy = other.clone();
    for (const keyword of SCHEMA_KEYWORDS) copyKeyword(this, copy, keyword);
    return this;
  }

  /** Marker: a Schema used as a mapping target keeps the source name */
  ignoreTypeName(): void {}

  /** Deep copy of the keyword content (parent and reflectType excluded) */
  clone(): Schema {
    const copy = Schema.fromJSON(this.toJSON());
    return typeof copy === 'boolean' ? new Schema() : copy;
  }

  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    const put = (key: string, value: unknown): void => {
      if (value !== undefined) out[key] = value;
    };

    put('$schema', this.$schema);
    put('$id', this.$id);
    put('$ref', this.$ref);
    put('$comment', this.$comment);
    put('title', this.title);
    put('description', this.description);
    put('default', this.default);
    put('readOnly', this.readOnly);
    put('writeOnly', this.writeOnly);
    put('examples', this.examples);
    put('multipleOf', this.multipleOf);
    put('maximum', this.maximum);
    put('exclusiveMaximum', this.exclusiveMaximum);
    put('minimum', this.minimum);
    put('exclusiveMinimum', this.exclusiveMinimum);
    put('maxLength', this.maxLength);
    put('minLength', this.minLength);
    put('pattern', this.pattern);
    put('additionalItems', encode(this.additionalItems));
    put(
      'items',
      Array.isArray(this.items) ? this.items.map(encode) : encode(this.items)
    );
    put('maxItems', this.maxItems);
    put('minItems', this.minItems);
    put('uniqueItems', this.uniqueItems);
    put('contains', encode(this.contains));
    put('maxProperties', this.maxProperties);
    put('minProperties', this.minProperties);
    put('required', this.required);
    put('additionalProperties', encode(this.additionalProperties));
    put('definitions', encodeMap(this.definitions));
    put('properties', encodeMap(this.properties));
    put('patternProperties', encodeMap(this.patternProperties));
    put('dependencies', encodeDependencies(this.dependencies));
    put('propertyNames', encode(this.propertyNames));
    put('const', this.const);
    put('enum', this.enum);
    put('type', this.type);
    put('format', this.format);
    put('contentMediaType', this.contentMediaType);
    put('contentEncoding', this.contentEncoding);
    put('if', encode(this.if));
    put('then', encode(this.then));
    put('else', encode(this.else));
    put('allOf', this.allOf?.map(encode));
    put('anyOf', this.anyOf?.map(encode));
    put('oneOf', this.oneOf?.map(encode));
    put('not', encode(this.not));

    if (this.extraProperties) {
      for (const key of Object.keys(this.extraProperties).sort()) {
        put(key, this.extraProperties[key]);
      }
    }
    return out;
  }

  /**
   * Decode a JSON document into a schema tree. Unknown keywords are kept
   * in extraProperties; known keywords of the wrong shape throw.
   */
  static fromJSON(value: unknown): SchemaOrBool {
    if (typeof value === 'boolean') return value;
    if (!isPlainRecord(value)) {
      throw new TypeError('schema must be an object or a boolean');
    }
    return decodeSchema(value);
  }
}

const SCHEMA_KEYWORDS = [
  '$schema',
  '$id',
  '$ref',
  '$comment',
  'title',
  'description',
  'default',
  'readOnly',
  'writeOnly',
  'examples',
  'multipleOf',
  'maximum',
  'exclusiveMaximum',
  'minimum',
  'exclusiveMinimum',
  'maxLength',
  'minLength',
  'pattern',
  'additionalItems',
  'items',
  'maxItems',
  'minItems',
  'uniqueItems',
  'contains',
  'maxProperties',
  'minProperties',
  'required',
  'additionalProperties',
  'definitions',
  'properties',
  'patternProperties',
  'dependencies',
  'propertyNames',
  'const',
  'enum',
  'type',
  'format',
  'contentMediaType',
  'contentEncoding',
  'if',
  'then',
  'else',
  'allOf',
  'anyOf',
  'oneOf',
  'not',
  'extraProperties',
] as const satisfies ReadonlyArray<keyof SchemaKeywords>;

function copyKeyword<K extends keyof SchemaKeywords>(
  to: Schema,
  from: Schema,
  keyword: K
): void {
  to[keyword] = from[keyword];
}

export function isSchema(value: unknown): value is Schema {
  return value instanceof Schema;
}

/**
 * Reference into the definitions map: path prefix plus definition name.
 * The root document is Ref('#', '').
 */
export class Ref {
  constructor(
    public readonly path: string,
    public readonly name: string
  ) {}

  toString(): string {
    return this.path + escapeRefName(this.name);
  }

  toSchema(): Schema {
    return new Schema({ $ref: this.toString() });
  }
}

export function escapeRefName(name: string): string {
  return name.replace(/~/g, '~0').replace(/\//g, '~1').replace(/%/g, '%25');
}

// ---------------------------------------------------------------------------
// triviality

const CONSTRAINING_KEYWORDS = [
  'multipleOf',
  'maximum',
  'exclusiveMaximum',
  'minimum',
  'exclusiveMinimum',
  'maxLength',
  'minLength',
  'pattern',
  'format',
  'additionalItems',
  'maxItems',
  'minItems',
  'uniqueItems',
  'contains',
  'maxProperties',
  'minProperties',
  'patternProperties',
  'dependencies',
  'propertyNames',
  'const',
  'enum',
  'if',
  'then',
  'else',
  'allOf',
  'anyOf',
  'oneOf',
  'not',
  'extraProperties',
] as const satisfies ReadonlyArray<keyof SchemaKeywords>;

function isTrivialSchema(
  node: SchemaOrBool,
  resolveRef: ((ref: string) => SchemaOrBool | undefined) | undefined,
  seen: Set<string>
): boolean {
  if (typeof node === 'boolean') return node;
  const schema: Schema = node;

  if (CONSTRAINING_KEYWORDS.some((k) => schema[k] !== undefined)) {
    return false;
  }
  if (schema.required !== undefined && schema.required.length > 0) {
    return false;
  }
  if (schema.typeList().filter((t) => t !== 'null').length > 1) return false;

  if (schema.$ref !== undefined) {
    if (!resolveRef || seen.has(schema.$ref)) return false;
    const target = resolveRef(schema.$ref);
    if (target === undefined) return false;
    seen.add(schema.$ref);
    if (!isTrivialSchema(target, resolveRef, seen)) return false;
  }

  if (Array.isArray(schema.items)) return false;
  if (
    schema.items !== undefined &&
    !isTrivialSchema(schema.items, resolveRef, seen)
  ) {
    return false;
  }
  if (
    schema.additionalProperties !== undefined &&
    !isTrivialSchema(schema.additionalProperties, resolveRef, seen)
  ) {
    return false;
  }
  for (const property of Object.values(schema.properties ?? {})) {
    if (!isTrivialSchema(property, resolveRef, seen)) return false;
  }
  return true;
}

function presentKeywords(schema: Schema): string[] {
  return Object.keys(schema.toJSON()).map((k) =>
    schema.extraProperties && k in schema.extraProperties
      ? 'extraProperties'
      : k
  );
}

// ---------------------------------------------------------------------------
// encoding

function encode(value: SchemaOrBool | undefined): unknown {
  if (value === undefined || typeof value === 'boolean') return value;
  return value.toJSON();
}

function encodeMap(
  map: Record<string, SchemaOrBool> | undefined
): Record<string, unknown> | undefined {
  if (map === undefined) return undefined;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(map)) out[key] = encode(value);
  return out;
}

function encodeDependencies(
  deps: Record<string, SchemaOrBool | string[]> | undefined
): Record<string, unknown> | undefined {
  if (deps === undefined) return undefined;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(deps)) {
    out[key] = Array.isArray(value) ? [...value] : encode(value);
  }
  return out;
}

// ---------------------------------------------------------------------------
// decoding

const KNOWN_KEYWORDS: ReadonlySet<string> = new Set<string>(
  SCHEMA_KEYWORDS.filter((k) => k !== 'extraProperties')
);

export function isPlainRecord(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(keyword: string, expected: string): TypeError {
  return new TypeError(`invalid "${keyword}" keyword: expected ${expected}`);
}

/* eslint-disable-next-line max-lines-per-function */
function decodeSchema(raw: Record<string, unknown>): Schema {
  const str = (k: string): string | undefined => {
    const v = raw[k];
    if (v === undefined) return undefined;
    if (typeof v !== 'string') throw invalid(k, 'string');
    return v;
  };
  const num = (k: string): number | undefined => {
    const v = raw[k];
    if (v === undefined) return undefined;
    if (typeof v !== 'number') throw invalid(k, 'number');
    return v;
  };
  const bool = (k: string): boolean | undefined => {
    const v = raw[k];
    if (v === undefined) return undefined;
    if (typeof v !== 'boolean') throw invalid(k, 'boolean');
    return v;
  };
  const sub = (k: string): SchemaOrBool | undefined =>
    raw[k] === undefined ? undefined : Schema.fromJSON(raw[k]);
  const list = (k: string): unknown[] | undefined => {
    const v = raw[k];
    if (v === undefined) return undefined;
    if (!Array.isArray(v)) throw invalid(k, 'array');
    return [...v];
  };
  const subList = (k: string): SchemaOrBool[] | undefined =>
    list(k)?.map((item) => Schema.fromJSON(item));
  const subMap = (k: string): Record<string, SchemaOrBool> | undefined => {
    const v = raw[k];
    if (v === undefined) return undefined;
    if (!isPlainRecord(v)) throw invalid(k, 'object');
    const out: Record<string, SchemaOrBool> = {};
    for (const [key, item] of Object.entries(v)) {
      out[key] = Schema.fromJSON(item);
    }
    return out;
  };

  const schema = new Schema({
    $schema: str('$schema'),
    $id: str('$id'),
    $ref: str('$ref'),
    $comment: str('$comment'),
    title: str('title'),
    description: str('description'),
    default: raw['default'],
    readOnly: bool('readOnly'),
    writeOnly: bool('writeOnly'),
    examples: list('examples'),
    multipleOf: num('multipleOf'),
    maximum: num('maximum'),
    exclusiveMaximum: num('exclusiveMaximum'),
    minimum: num('minimum'),
    exclusiveMinimum: num('exclusiveMinimum'),
    maxLength: num('maxLength'),
    minLength: num('minLength'),
    pattern: str('pattern'),
    additionalItems: sub('additionalItems'),
    items: Array.isArray(raw['items']) ? subList('items') : sub('items'),
    maxItems: num('maxItems'),
    minItems: num('minItems'),
    uniqueItems: bool('uniqueItems'),
    contains: sub('contains'),
    maxProperties: num('maxProperties'),
    minProperties: num('minProperties'),
    required: decodeStringList(raw['required'], 'required'),
    additionalProperties: sub('additionalProperties'),
    definitions: subMap('definitions'),
    properties: subMap('properties'),
    patternProperties: subMap('patternProperties'),
    dependencies: decodeDependencies(raw['dependencies']),
    propertyNames: sub('propertyNames'),
    const: raw['const'],
    enum: list('enum'),
    type: decodeType(raw['type']),
    format: str('format'),
    contentMediaType: str('contentMediaType'),
    contentEncoding: str('contentEncoding'),
    if: sub('if'),
    then: sub('then'),
    else: sub('else'),
    allOf: subList('allOf'),
    anyOf: subList('anyOf'),
    oneOf: subList('oneOf'),
    not: sub('not'),
  });

  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_KEYWORDS.has(key)) schema.setExtraProperty(key, value);
  }
  return schema;
}

function isSimpleType(value: unknown): value is SimpleType {
  return typeof value === 'string' && SIMPLE_TYPES.has(value);
}

function decodeType(value: unknown): SimpleType | SimpleType[] | undefined {
  if (value === undefined) return undefined;
  if (isSimpleType(value)) return value;
  if (Array.isArray(value) && value.every(isSimpleType)) return [...value];
  throw invalid('type', 'simple type name or list of names');
}

function decodeStringList(
  value: unknown,
  keyword: string
): string[] | undefined {
  if (value === undefined) return undefined;
  if (
    !Array.isArray(value) ||
    !value.every((v): v is string => typeof v === 'string')
  ) {
    throw invalid(keyword, 'list of strings');
  }
  return [...value];
}

function decodeDependencies(
  value: unknown
): Record<string, SchemaOrBool | string[]> | undefined {
  if (value === undefined) return undefined;
  if (!isPlainRecord(value)) throw invalid('dependencies', 'object');
  const out: Record<string, SchemaOrBool | string[]> = {};
  for (const [key, dep] of Object.entries(value)) {
    out[key] = Array.isArray(dep)
      ? (decodeStringList(dep, 'dependencies') ?? [])
      : Schema.fromJSON(dep);
  }
  return out;
}
