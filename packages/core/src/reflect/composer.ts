/**
 * Sub-schema composer
 *
 * Attaches the schemas of values exposed through the composition
 * capabilities. Each exposed value is reflected with the shared context
 * under a path segment named after its keyword.
 */

import type { Schema } from '../types/schema.js';
import {
  listExposed,
  valueExposed,
  type CapabilityTarget,
} from './capabilities.js';
import type { ReflectContext } from './context.js';

type Walk = (input: unknown) => Schema;

const LIST_EXPOSERS = [
  ['jsonSchemaOneOf', 'oneOf'],
  ['jsonSchemaAnyOf', 'anyOf'],
  ['jsonSchemaAllOf', 'allOf'],
] as const;

const VALUE_EXPOSERS = [
  ['jsonSchemaNot', 'not'],
  ['jsonSchemaIf', 'if'],
  ['jsonSchemaThen', 'then'],
  ['jsonSchemaElse', 'else'],
] as const;

export function applySubSchemas(
  target: CapabilityTarget,
  schema: Schema,
  rc: ReflectContext,
  walk: Walk
): void {
  for (const [method, keyword] of LIST_EXPOSERS) {
    const values = rc.guard(() => listExposed(target, method));
    if (values === undefined) continue;
    schema[keyword] = values.map((value) => rc.enter(keyword, () => walk(value)));
  }

  for (const [method, keyword] of VALUE_EXPOSERS) {
    const exposed = rc.guard(() => valueExposed(target, method));
    if (!exposed.found) continue;
    schema[keyword] = rc.enter(keyword, () => walk(exposed.result));
  }
}
