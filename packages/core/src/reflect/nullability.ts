/**
 * Nullability resolver
 *
 * Decides whether a property schema accepts null. The explicit `nullable`
 * tag wins outright; otherwise `omitempty` disables null, and the first
 * structural rule that applies decides:
 *
 * 1. reference: envelope as `anyOf [null, $ref]` when the field is
 *    optional or the definition is a container, the definition itself does
 *    not accept null, and envelopes are enabled;
 * 2. array, or object without declared properties: null appended;
 * 3. optional (pointer) field: null prepended, except for raw JSON.
 *
 * Schemas without a type already accept null and are left alone.
 */

import { deepIndirect, type TypeDescriptor } from '../types/descriptor.js';
import { Schema } from '../types/schema.js';
import type { ReflectContext } from './context.js';

export interface NullabilityInput {
  /** Declared field type */
  type: TypeDescriptor;
  omitEmpty: boolean;
  /** Value of the `nullable` tag, when present */
  nullable?: boolean;
  /** Use-sites accept null (pointer field, nullable virtual struct) */
  optional: boolean;
}

function envelope(schema: Schema): void {
  const ref = new Schema({ $ref: schema.$ref });
  schema.$ref = undefined;
  schema.anyOf = [new Schema({ type: 'null' }), ref, ...(schema.anyOf ?? [])];
}

export function resolveNullability(
  schema: Schema,
  rc: ReflectContext,
  input: NullabilityInput
): void {
  const origSchema = schema.clone();
  const refDef =
    schema.$ref === undefined ? undefined : rc.getDefinition(schema.$ref);

  let nullAdded = false;
  if (input.nullable !== undefined) {
    nullAdded = applyOverride(schema, refDef, input.nullable);
  } else if (!input.omitEmpty) {
    nullAdded = applyStructural(schema, rc, input, refDef);
  }

  rc.guard(() =>
    rc.hooks.runNullability({
      context: rc,
      origSchema,
      schema,
      type: input.type,
      omitEmpty: input.omitEmpty,
      nullAdded,
      refDef,
    })
  );
}

function applyOverride(
  schema: Schema,
  refDef: Schema | undefined,
  nullable: boolean
): boolean {
  if (!nullable) {
    if (schema.$ref === undefined) schema.removeType('null');
    return false;
  }
  if (schema.$ref !== undefined) {
    if (refDef?.hasType('null')) return false;
    envelope(schema);
    return true;
  }
  if (schema.type === undefined) return false;
  schema.addType('null');
  return true;
}

function applyStructural(
  schema: Schema,
  rc: ReflectContext,
  input: NullabilityInput,
  refDef: Schema | undefined
): boolean {
  if (schema.$ref !== undefined) {
    const container =
      refDef !== undefined &&
      (refDef.hasType('array') || refDef.hasType('object'));
    if (
      input.type.kind !== 'struct' &&
      (container || input.optional) &&
      !(refDef?.hasType('null') ?? false) &&
      rc.config.envelopNullability
    ) {
      envelope(schema);
      return true;
    }
    return false;
  }

  if (
    schema.hasType('array') ||
    (schema.hasType('object') &&
      Object.keys(schema.properties ?? {}).length === 0)
  ) {
    schema.addType('null');
    return true;
  }

  if (
    input.optional &&
    schema.type !== undefined &&
    deepIndirect(input.type).kind !== 'raw'
  ) {
    schema.prependType('null');
    return true;
  }
  return false;
}
