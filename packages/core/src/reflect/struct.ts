/**
 * Virtual structs and composition helpers
 */

import { defineType, type FieldTags } from '../types/descriptor.js';
import type { Schema } from '../types/schema.js';
import type {
  AllOfExposer,
  AnyOfExposer,
  OneOfExposer,
  Preparer,
  SchemaInliner,
} from './capabilities.js';

export interface StructField {
  name: string;
  /** Sample value; the field is reflected as the value's type */
  value: unknown;
  tags?: FieldTags;
}

export interface StructInit {
  title?: string;
  description?: string;
  nullable?: boolean;
  defName?: string;
  fields?: StructField[];
}

/**
 * Object shape assembled at run time, for values that have no declared
 * type. Reflects like a named struct called `defName`; unnamed structs
 * receive `struct1`, `struct2`, ... per reflection run.
 *
 * @example
 * const filter = new Struct({ defName: 'Filter' })
 *   .addField('query', '', { json: 'q', minLength: '3' })
 *   .addField('limit', 0, { json: 'limit' });
 */
export class Struct {
  title?: string;
  description?: string;
  /** Use-sites accept null, as with an optional reference */
  nullable: boolean;
  defName: string;
  fields: StructField[];

  constructor(init: StructInit = {}) {
    this.title = init.title;
    this.description = init.description;
    this.nullable = init.nullable ?? false;
    this.defName = init.defName ?? '';
    this.fields = [...(init.fields ?? [])];
  }

  addField(name: string, value: unknown, tags?: FieldTags): this {
    this.fields.push({ name, value, tags });
    return this;
  }
}

function clearShape(schema: Schema): void {
  schema.type = undefined;
  schema.items = undefined;
}

export class OneOf implements OneOfExposer, SchemaInliner, Preparer {
  readonly values: readonly unknown[];

  constructor(values: readonly unknown[]) {
    this.values = values;
  }

  jsonSchemaOneOf(): unknown[] {
    return [...this.values];
  }

  inlineJsonSchema(): void {}

  prepareJsonSchema(schema: Schema): void {
    clearShape(schema);
  }
}

export class AnyOf implements AnyOfExposer, SchemaInliner, Preparer {
  readonly values: readonly unknown[];

  constructor(values: readonly unknown[]) {
    this.values = values;
  }

  jsonSchemaAnyOf(): unknown[] {
    return [...this.values];
  }

  inlineJsonSchema(): void {}

  prepareJsonSchema(schema: Schema): void {
    clearShape(schema);
  }
}

export class AllOf implements AllOfExposer, SchemaInliner, Preparer {
  readonly values: readonly unknown[];

  constructor(values: readonly unknown[]) {
    this.values = values;
  }

  jsonSchemaAllOf(): unknown[] {
    return [...this.values];
  }

  inlineJsonSchema(): void {}

  prepareJsonSchema(schema: Schema): void {
    clearShape(schema);
  }
}

// Carriers only: the schema is the composition keyword, always inline
defineType(OneOf, { kind: 'unknown' });
defineType(AnyOf, { kind: 'unknown' });
defineType(AllOf, { kind: 'unknown' });

/** Exposes the values as alternatives: `{"oneOf":[...]}` */
export function oneOf(...values: unknown[]): OneOf {
  return new OneOf(values);
}

export function anyOf(...values: unknown[]): AnyOf {
  return new AnyOf(values);
}

export function allOf(...values: unknown[]): AllOf {
  return new AllOf(values);
}
