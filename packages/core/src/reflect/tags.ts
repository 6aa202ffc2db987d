/* eslint-disable complexity */
/**
 * Constraint extractor
 *
 * Translates field metadata into schema keywords. Values are raw strings;
 * parse failures raise TagParseError with the dotted property path and
 * the offending key.
 */

import type { FieldTags } from '../types/descriptor.js';
import { TagParseError, toError } from '../types/errors.js';
import type { Schema, SchemaOrBool } from '../types/schema.js';

const TRUE_LITERALS: ReadonlySet<string> = new Set([
  '1',
  't',
  'T',
  'TRUE',
  'true',
  'True',
]);
const FALSE_LITERALS: ReadonlySet<string> = new Set([
  '0',
  'f',
  'F',
  'FALSE',
  'false',
  'False',
]);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseBoolLiteral(raw: string): boolean | undefined {
  if (TRUE_LITERALS.has(raw)) return true;
  if (FALSE_LITERALS.has(raw)) return false;
  return undefined;
}

export function parseIntLiteral(raw: string): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function parseFloatLiteral(raw: string): number | undefined {
  if (!FLOAT_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function lookupTag(
  tags: FieldTags | undefined,
  key: string
): string | undefined {
  if (!tags || !Object.prototype.hasOwnProperty.call(tags, key)) {
    return undefined;
  }
  return tags[key];
}

export function readBoolTag(
  tags: FieldTags | undefined,
  key: string,
  path: string
): boolean | undefined {
  const raw = lookupTag(tags, key);
  if (raw === undefined) return undefined;
  const value = parseBoolLiteral(raw);
  if (value === undefined) {
    throw new TagParseError({
      path,
      keyword: key,
      value: raw,
      reason: 'invalid boolean',
    });
  }
  return value;
}

function readNumberTag(
  tags: FieldTags | undefined,
  key: string,
  path: string,
  integer: boolean
): number | undefined {
  const raw = lookupTag(tags, key);
  if (raw === undefined) return undefined;
  const value = integer ? parseIntLiteral(raw) : parseFloatLiteral(raw);
  if (value === undefined) {
    throw new TagParseError({
      path,
      keyword: key,
      value: raw,
      reason: integer ? 'invalid integer' : 'invalid number',
    });
  }
  return value;
}

type StringKeyword =
  | 'title'
  | 'description'
  | 'format'
  | 'pattern'
  | 'contentMediaType'
  | 'contentEncoding';
type NumberKeyword =
  | 'multipleOf'
  | 'maximum'
  | 'exclusiveMaximum'
  | 'minimum'
  | 'exclusiveMinimum';
type IntegerKeyword =
  | 'maxLength'
  | 'minLength'
  | 'maxItems'
  | 'minItems'
  | 'maxProperties'
  | 'minProperties';
type BooleanKeyword = 'uniqueItems' | 'readOnly' | 'writeOnly';

const STRING_KEYWORDS: readonly StringKeyword[] = [
  'title',
  'description',
  'format',
  'pattern',
  'contentMediaType',
  'contentEncoding',
];
const NUMBER_KEYWORDS: readonly NumberKeyword[] = [
  'multipleOf',
  'maximum',
  'exclusiveMaximum',
  'minimum',
  'exclusiveMinimum',
];
const INTEGER_KEYWORDS: readonly IntegerKeyword[] = [
  'maxLength',
  'minLength',
  'maxItems',
  'minItems',
  'maxProperties',
  'minProperties',
];
const BOOLEAN_KEYWORDS: readonly BooleanKeyword[] = [
  'uniqueItems',
  'readOnly',
  'writeOnly',
];

/**
 * Copies recognized keyword tags onto the schema. A string tag set to `-`
 * clears a value the schema already carries.
 */
export function populateFromTags(
  schema: Schema,
  tags: FieldTags | undefined,
  path: string
): void {
  if (!tags) return;

  for (const keyword of STRING_KEYWORDS) {
    const raw = lookupTag(tags, keyword);
    if (raw === undefined) continue;
    const current = schema[keyword];
    schema[keyword] =
      raw === '-' && current !== undefined && current !== '' ? undefined : raw;
  }

  const comment = lookupTag(tags, 'comment');
  if (comment !== undefined) {
    schema.$comment =
      comment === '-' && schema.$comment ? undefined : comment;
  }

  for (const keyword of NUMBER_KEYWORDS) {
    const value = readNumberTag(tags, keyword, path, false);
    if (value !== undefined) schema[keyword] = value;
  }
  for (const keyword of INTEGER_KEYWORDS) {
    const value = readNumberTag(tags, keyword, path, true);
    if (value !== undefined) schema[keyword] = value;
  }
  for (const keyword of BOOLEAN_KEYWORDS) {
    const value = readBoolTag(tags, keyword, path);
    if (value !== undefined) schema[keyword] = value;
  }
}

/**
 * Decodes a default/const/example literal according to the schema's type.
 * Returns undefined when nothing should be set.
 */
export function decodeLiteral(
  raw: string,
  typeSource: Schema,
  resolveRef: (ref: string) => SchemaOrBool | undefined
): unknown {
  const types = typeSource.typeList();

  if (typeSource.hasType('number')) {
    const value = parseFloatLiteral(raw);
    if (value !== undefined) return value;
  }
  if (typeSource.hasType('integer')) {
    const value = parseIntLiteral(raw);
    if (value !== undefined) return value;
  }
  if (typeSource.hasType('boolean')) {
    const value = parseBoolLiteral(raw);
    if (value !== undefined) return value;
  }
  if (typeSource.hasType('string')) return raw;
  if (types.length === 1 && types[0] === 'null') return undefined;
  if (raw === '') return undefined;

  const parsed = parseJSON(raw);
  if (parsed.ok) return parsed.value === null ? undefined : parsed.value;

  if (
    raw.startsWith('[') &&
    raw.endsWith(']') &&
    itemsAreStrings(typeSource, resolveRef)
  ) {
    return raw.slice(1, -1).split(',');
  }
  throw parsed.error;
}

type ParsedJSON = { ok: true; value: unknown } | { ok: false; error: Error };

function parseJSON(raw: string): ParsedJSON {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

function itemsAreStrings(
  schema: Schema,
  resolveRef: (ref: string) => SchemaOrBool | undefined
): boolean {
  const items = schema.items;
  if (items === undefined || typeof items === 'boolean' || Array.isArray(items)) {
    return false;
  }
  if (items.$ref !== undefined) {
    const target = resolveRef(items.$ref);
    return typeof target === 'object' && target.hasType('string');
  }
  return items.hasType('string');
}

/**
 * Reads a typed literal tag, reporting parse failures as TagParseError.
 */
export function readLiteralTag(
  tags: FieldTags | undefined,
  key: 'default' | 'const' | 'example',
  typeSource: Schema,
  resolveRef: (ref: string) => SchemaOrBool | undefined,
  path: string
): unknown {
  const raw = lookupTag(tags, key);
  if (raw === undefined) return undefined;
  try {
    return decodeLiteral(raw, typeSource, resolveRef);
  } catch (error) {
    const cause = toError(error);
    throw new TagParseError({
      path,
      keyword: key,
      value: raw,
      reason: `parsing ${key} as JSON: ${cause.message}`,
      cause,
    });
  }
}

/** `examples` holds a JSON array */
export function readExamplesTag(
  tags: FieldTags | undefined,
  path: string
): unknown[] | undefined {
  const raw = lookupTag(tags, 'examples');
  if (raw === undefined) return undefined;

  const parsed = parseJSON(raw);
  if (!parsed.ok) {
    throw new TagParseError({
      path,
      keyword: 'examples',
      value: raw,
      reason: parsed.error.message,
      cause: parsed.error,
    });
  }
  if (!Array.isArray(parsed.value)) {
    throw new TagParseError({
      path,
      keyword: 'examples',
      value: raw,
      reason: 'expected a JSON array',
    });
  }
  return [...parsed.value];
}

/** `enum` holds a JSON array or a comma-separated list of strings */
export function readEnumTag(tags: FieldTags | undefined): unknown[] | undefined {
  const raw = lookupTag(tags, 'enum');
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseJSON(raw);
  if (parsed.ok && Array.isArray(parsed.value)) return [...parsed.value];
  return raw.split(',');
}
