/**
 * Capability probes
 *
 * A capability is a method a value (or its type's prototype) may carry to
 * customize its schema. Probes look at the sample value first and fall
 * back to the descriptor's `proto`, so zero samples of a type still expose
 * the type's capabilities.
 */

import type { TypeDescriptor } from '../types/descriptor.js';
import { isPlainRecord, Schema } from '../types/schema.js';

export interface Described {
  jsonSchemaDescription(): string;
}

export interface Titled {
  jsonSchemaTitle(): string;
}

/** Exposes a structured schema that replaces default reflection */
export interface Exposer {
  jsonSchema(): Schema | Record<string, unknown>;
}

/** Exposes an encoded JSON schema document */
export interface RawExposer {
  jsonSchemaBytes(): string | Uint8Array;
}

/** Adjusts the schema after default reflection */
export interface Preparer {
  prepareJsonSchema(schema: Schema): void;
}

export interface Enum {
  jsonSchemaEnum(): unknown[];
}

/** Enumeration with display names, emitted as `x-enum-names` */
export interface NamedEnum {
  jsonSchemaNamedEnum(): [values: unknown[], names: string[]];
}

export interface OneOfExposer {
  jsonSchemaOneOf(): unknown[];
}

export interface AnyOfExposer {
  jsonSchemaAnyOf(): unknown[];
}

export interface AllOfExposer {
  jsonSchemaAllOf(): unknown[];
}

export interface NotExposer {
  jsonSchemaNot(): unknown;
}

export interface IfExposer {
  jsonSchemaIf(): unknown;
}

export interface ThenExposer {
  jsonSchemaThen(): unknown;
}

export interface ElseExposer {
  jsonSchemaElse(): unknown;
}

/** Marker: the type never earns a shared definition */
export interface SchemaInliner {
  inlineJsonSchema(): void;
}

/** Marker: an embedded field of this type is referenced through allOf */
export interface EmbedReferencer {
  referEmbedded(): void;
}

/** Marker: a mapping target that keeps the source type's name */
export interface IgnoreTypeName {
  ignoreTypeName(): void;
}

export const XEnumNames = 'x-enum-names';

export interface CapabilityTarget {
  readonly value: unknown;
  readonly type: TypeDescriptor;
}

type Probe = { found: false } | { found: true; result: unknown };

function isMethodHost(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) ||
    typeof value === 'function'
  );
}

/** Finds and invokes a capability method; throws what the method throws */
export function probe(
  target: CapabilityTarget,
  method: string,
  ...args: unknown[]
): Probe {
  const hosts: Array<[host: object, self: unknown]> = [];
  if (isMethodHost(target.value)) hosts.push([target.value, target.value]);
  if (target.type.proto) {
    hosts.push([target.type.proto, target.value ?? target.type.proto]);
  }

  for (const [host, self] of hosts) {
    const candidate: unknown = Reflect.get(host, method);
    if (typeof candidate === 'function') {
      const result: unknown = Reflect.apply(candidate, self, args);
      return { found: true, result };
    }
  }
  return { found: false };
}

export function hasCapability(
  target: CapabilityTarget,
  method: string
): boolean {
  if (
    isMethodHost(target.value) &&
    typeof Reflect.get(target.value, method) === 'function'
  ) {
    return true;
  }
  const proto = target.type.proto;
  return proto !== undefined && typeof Reflect.get(proto, method) === 'function';
}

function expectString(method: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${method} must return a string`);
  }
  return value;
}

function expectList(method: string, value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`${method} must return an array`);
  }
  return [...value];
}

export function titleOf(target: CapabilityTarget): string | undefined {
  const p = probe(target, 'jsonSchemaTitle');
  return p.found ? expectString('jsonSchemaTitle', p.result) : undefined;
}

export function descriptionOf(target: CapabilityTarget): string | undefined {
  const p = probe(target, 'jsonSchemaDescription');
  return p.found ? expectString('jsonSchemaDescription', p.result) : undefined;
}

/** Structured schema from an Exposer, copied so callers may mutate it */
export function exposedSchema(target: CapabilityTarget): Schema | undefined {
  const p = probe(target, 'jsonSchema');
  if (!p.found) return undefined;
  if (p.result instanceof Schema) return p.result.clone();
  if (isPlainRecord(p.result)) {
    const decoded = Schema.fromJSON(p.result);
    if (decoded instanceof Schema) return decoded;
  }
  throw new TypeError('jsonSchema must return a Schema or a schema object');
}

export function exposedSchemaBytes(
  target: CapabilityTarget
): string | Uint8Array | undefined {
  const p = probe(target, 'jsonSchemaBytes');
  if (!p.found) return undefined;
  if (typeof p.result === 'string' || p.result instanceof Uint8Array) {
    return p.result;
  }
  throw new TypeError('jsonSchemaBytes must return a string or bytes');
}

export interface EnumValues {
  items: unknown[];
  names?: string[];
}

/** Plain enumeration wins over named values; names are kept either way */
export function enumOf(target: CapabilityTarget): EnumValues | undefined {
  let out: EnumValues | undefined;

  const named = probe(target, 'jsonSchemaNamedEnum');
  if (named.found) {
    const pair = expectList('jsonSchemaNamedEnum', named.result);
    const items = expectList('jsonSchemaNamedEnum', pair[0]);
    const names = expectList('jsonSchemaNamedEnum', pair[1]).map((n) =>
      expectString('jsonSchemaNamedEnum', n)
    );
    out = { items, names };
  }

  const plain = probe(target, 'jsonSchemaEnum');
  if (plain.found) {
    out = { ...out, items: expectList('jsonSchemaEnum', plain.result) };
  }
  return out;
}

export function listExposed(
  target: CapabilityTarget,
  method: 'jsonSchemaOneOf' | 'jsonSchemaAnyOf' | 'jsonSchemaAllOf'
): unknown[] | undefined {
  const p = probe(target, method);
  return p.found ? expectList(method, p.result) : undefined;
}

export function valueExposed(
  target: CapabilityTarget,
  method: 'jsonSchemaNot' | 'jsonSchemaIf' | 'jsonSchemaThen' | 'jsonSchemaElse'
): Probe {
  return probe(target, method);
}

export function prepare(target: CapabilityTarget, schema: Schema): boolean {
  return probe(target, 'prepareJsonSchema', schema).found;
}

export function isSchemaInliner(target: CapabilityTarget): boolean {
  return hasCapability(target, 'inlineJsonSchema');
}

export function isEmbedReferencer(target: CapabilityTarget): boolean {
  return hasCapability(target, 'referEmbedded');
}

export function ignoresTypeName(value: unknown): boolean {
  return (
    isMethodHost(value) &&
    typeof Reflect.get(value, 'ignoreTypeName') === 'function'
  );
}
