/**
 * Hook pipeline
 *
 * Interceptors are kept as ordered lists on the context. Schema
 * interceptors stop at the first one that returns true; property
 * interceptors stop at the first one that throws (ErrSkipProperty
 * included); definition-name interceptors feed each other's output.
 */

import type { FieldDescriptor, TypeDescriptor } from '../types/descriptor.js';
import type { Schema } from '../types/schema.js';
import type { ReflectContext } from './context.js';

export interface InterceptSchemaParams {
  context: ReflectContext;
  /** Sample value being reflected (undefined for a zero value) */
  value: unknown;
  type: TypeDescriptor;
  schema: Schema;
  /** False before default expansion, true after it */
  processed: boolean;
}

/** Returns true to stop further processing of the type */
export type InterceptSchemaFunc = (
  params: InterceptSchemaParams
) => boolean | void;

export interface InterceptPropParams {
  context: ReflectContext;
  path: readonly string[];
  name: string;
  field: FieldDescriptor;
  /** Set only once the property has been reflected */
  propertySchema?: Schema;
  parentSchema: Schema;
  processed: boolean;
}

/** Throw ErrSkipProperty to drop the property */
export type InterceptPropFunc = (params: InterceptPropParams) => void;

export interface InterceptNullabilityParams {
  context: ReflectContext;
  /** Property schema before nullability was resolved */
  origSchema: Schema;
  schema: Schema;
  /** Declared field type */
  type: TypeDescriptor;
  omitEmpty: boolean;
  nullAdded: boolean;
  /** Referenced definition, when the property is a reference */
  refDef?: Schema;
}

export type InterceptNullabilityFunc = (
  params: InterceptNullabilityParams
) => void;

export type InterceptDefNameFunc = (
  type: TypeDescriptor,
  defaultDefName: string
) => string;

export class HookPipeline {
  readonly schema: InterceptSchemaFunc[] = [];
  readonly prop: InterceptPropFunc[] = [];
  readonly nullability: InterceptNullabilityFunc[] = [];
  readonly defName: InterceptDefNameFunc[] = [];

  runSchema(params: InterceptSchemaParams): boolean {
    for (const hook of this.schema) {
      if (hook(params) === true) return true;
    }
    return false;
  }

  runProp(params: InterceptPropParams): void {
    for (const hook of this.prop) hook(params);
  }

  runNullability(params: InterceptNullabilityParams): void {
    for (const hook of this.nullability) hook(params);
  }

  runDefName(type: TypeDescriptor, defaultDefName: string): string {
    return this.defName.reduce((name, hook) => hook(type, name), defaultDefName);
  }
}
