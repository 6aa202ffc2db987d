// @schemacast/core entry point
//
// Public API:
// - reflect() and the Reflector class turn samples into draft-07 schemas.
// - Type descriptors (t.*, defineStruct, defineType, sample) describe the
//   shapes TypeScript erases at run time.
// - Options are plain mutators applied to a per-run ReflectContext.

export { Reflector, reflect, makePropertyNameMapping } from './reflect/reflector.js';
export * from './reflect/options.js';
export {
  ReflectContext,
  type ReflectNote,
  type ReflectNoteCode,
} from './reflect/context.js';
export type {
  InterceptSchemaParams,
  InterceptSchemaFunc,
  InterceptPropParams,
  InterceptPropFunc,
  InterceptNullabilityParams,
  InterceptNullabilityFunc,
  InterceptDefNameFunc,
} from './reflect/hooks.js';
export {
  XEnumNames,
  type Described,
  type Titled,
  type Exposer,
  type RawExposer,
  type Preparer,
  type Enum,
  type NamedEnum,
  type OneOfExposer,
  type AnyOfExposer,
  type AllOfExposer,
  type NotExposer,
  type IfExposer,
  type ThenExposer,
  type ElseExposer,
  type SchemaInliner,
  type EmbedReferencer,
  type IgnoreTypeName,
} from './reflect/capabilities.js';
export {
  Struct,
  OneOf,
  AnyOf,
  AllOf,
  oneOf,
  anyOf,
  allOf,
  type StructField,
  type StructInit,
} from './reflect/struct.js';

export * from './types/schema.js';
export * from './types/descriptor.js';
export * from './types/options.js';
export * from './types/result.js';

// Errors
export { ErrorCode } from './errors/codes.js';
export {
  ReflectError,
  UnsupportedTypeError,
  TagParseError,
  HookError,
  ConfigError,
  SkipPropertySignal,
  ErrSkipProperty,
  isSkipProperty,
  isReflectError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
