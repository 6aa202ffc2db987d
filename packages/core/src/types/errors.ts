/**
 * Error hierarchy for schema reflection
 * Every failure carries a stable code and the dotted path of the property
 * being reflected when it happened.
 */

import { ErrorCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Dotted reflection path (e.g., '#.items.address')
  keyword?: string; // Field metadata key that failed to parse
  typeName?: string; // Display name of the offending type
  value?: unknown; // Offending raw value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  path?: string;
}

interface ReflectErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all reflection errors
 */
export abstract class ReflectError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ReflectErrorParams) {
    const { message, errorCode, context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Reflection path the error was raised at, if known */
  get path(): string | undefined {
    return this.context?.path;
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and offending value
   * - prod: excludes stack and value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      context: env === 'prod' ? withoutValue(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      path: this.context?.path,
    };
  }
}

/** Prefixes the message with the path; the root has none */
function atPath(path: string, message: string): string {
  return path === '' ? message : `${path}: ${message}`;
}

function withoutValue(context?: ErrorContext): ErrorContext | undefined {
  if (!context || !('value' in context)) return context;
  const { value: _value, ...rest } = context;
  return rest;
}

/**
 * A kind with no schema mapping (functions, symbols) and no override.
 */
export class UnsupportedTypeError extends ReflectError {
  constructor(params: { path: string; typeName: string }) {
    super({
      message: atPath(params.path, `type is not supported: ${params.typeName}`),
      errorCode: ErrorCode.UNSUPPORTED_TYPE,
      context: { path: params.path, typeName: params.typeName },
    });
  }
}

/**
 * Malformed value in field metadata.
 */
export class TagParseError extends ReflectError {
  public readonly keyword: string;

  constructor(params: {
    path: string;
    keyword: string;
    value: string;
    reason: string;
    cause?: Error;
  }) {
    super({
      message: atPath(
        params.path,
        `failed to parse ${params.keyword} ${JSON.stringify(params.value)}: ${params.reason}`
      ),
      errorCode: params.cause
        ? ErrorCode.TAG_LITERAL_INVALID
        : ErrorCode.TAG_PARSE_FAILED,
      context: {
        path: params.path,
        keyword: params.keyword,
        value: params.value,
      },
      cause: params.cause,
    });
    this.keyword = params.keyword;
  }
}

/**
 * A hook or capability method threw, or exposed an unusable schema.
 */
export class HookError extends ReflectError {
  constructor(params: {
    path: string;
    message: string;
    errorCode?: ErrorCode.HOOK_FAILED | ErrorCode.RAW_SCHEMA_INVALID;
    cause?: Error;
  }) {
    super({
      message: atPath(params.path, params.message),
      errorCode: params.errorCode ?? ErrorCode.HOOK_FAILED,
      context: { path: params.path },
      cause: params.cause,
    });
  }
}

/**
 * Invalid reflector configuration (type mappings, option values).
 */
export class ConfigError extends ReflectError {
  constructor(params: { message: string; context?: ErrorContext }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
    });
  }
}

/**
 * Sentinel thrown by property interceptors to drop a property.
 * Recovered at the property boundary and never surfaced to callers.
 */
export class SkipPropertySignal extends Error {
  constructor() {
    super('skip property');
    this.name = 'SkipPropertySignal';
  }
}

export const ErrSkipProperty = new SkipPropertySignal();

export function isSkipProperty(error: unknown): error is SkipPropertySignal {
  return error instanceof SkipPropertySignal;
}

export function isReflectError(error: unknown): error is ReflectError {
  return error instanceof ReflectError;
}

/** Normalize an unknown thrown value into an Error */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
