/**
 * Configuration for a single reflection run
 *
 * All fields have conservative defaults; options (see reflect/options.ts)
 * mutate a fresh copy of DEFAULT_REFLECT_CONFIG before traversal starts.
 */

import type { Schema } from './schema.js';

export interface ReflectConfig {
  /** Prefix of synthesized reference strings (default: '#/definitions/') */
  definitionsPrefix: string;
  /** Field metadata key holding the property name (default: 'json') */
  propertyNameTag: string;
  /** Fallback keys consulted when the primary key is absent (default: []) */
  propertyNameAdditionalTags: string[];
  /** Declared field name → property name, checked before tags (default: undefined) */
  propertyNameMapping?: Readonly<Record<string, string>>;
  /** Receives definitions instead of the root `definitions` map (default: undefined) */
  collectDefinitions?: (name: string, schema: Schema) => void;
  /** Never emit shared definitions, inline everything (default: false) */
  inlineRefs: boolean;
  /** Register the root type as a definition and return a reference (default: false) */
  rootRef: boolean;
  /** Add null to the root schema type (default: false) */
  rootNullable: boolean;
  /** Skip fields without a property name tag (default: false) */
  requireNameTag: boolean;
  /** Reflect structs embedding an array or map as plain objects (default: false) */
  skipEmbeddedMapsSlices: boolean;
  /** Drop properties of unsupported kinds instead of failing (default: false) */
  skipUnsupportedProperties: boolean;
  /** Ignore default, example and examples metadata (default: false) */
  skipNonConstraints: boolean;
  /** Wrap nullable references as anyOf [null, $ref] (default: false) */
  envelopNullability: boolean;
  /** Only `_` fields carrying the name tag configure the parent (default: false) */
  unnamedFieldWithTag: boolean;
}

export const DEFAULT_DEFINITIONS_PREFIX = '#/definitions/';
export const DEFAULT_PROPERTY_NAME_TAG = 'json';

export const DEFAULT_REFLECT_CONFIG: Readonly<ReflectConfig> = Object.freeze({
  definitionsPrefix: DEFAULT_DEFINITIONS_PREFIX,
  propertyNameTag: DEFAULT_PROPERTY_NAME_TAG,
  propertyNameAdditionalTags: [],
  inlineRefs: false,
  rootRef: false,
  rootNullable: false,
  requireNameTag: false,
  skipEmbeddedMapsSlices: false,
  skipUnsupportedProperties: false,
  skipNonConstraints: false,
  envelopNullability: false,
  unnamedFieldWithTag: false,
});

/** Fresh mutable configuration seeded with defaults */
export function createReflectConfig(): ReflectConfig {
  return {
    ...DEFAULT_REFLECT_CONFIG,
    propertyNameAdditionalTags: [],
  };
}
