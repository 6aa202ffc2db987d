/**
 * Per-invocation reflection state
 *
 * A context is created for every top-level reflect call and discarded when
 * it returns; nothing in it is shared between runs.
 */

import type { TypeDescriptor } from '../types/descriptor.js';
import {
  HookError,
  isReflectError,
  isSkipProperty,
  toError,
} from '../types/errors.js';
import { createReflectConfig, type ReflectConfig } from '../types/options.js';
import type { Schema, SchemaOrBool } from '../types/schema.js';
import { CycleDetector } from './cycles.js';
import { DefinitionRegistry } from './definitions.js';
import { HookPipeline } from './hooks.js';

export type ReflectNoteCode =
  | 'DEFINITION_RENAMED'
  | 'PROPERTY_SKIPPED'
  | 'CYCLE_REFERENCE'
  | 'REFERENCE_WRAPPED';

export const SKIP_OUTSIDE_PROPERTY = 'property skip requested outside a property';

export interface ReflectNote {
  code: ReflectNoteCode;
  /** Dotted reflection path, e.g. `#.items.owner` */
  path: string;
  details?: Record<string, unknown>;
}

export class ReflectContext {
  readonly config: ReflectConfig = createReflectConfig();
  readonly hooks = new HookPipeline();
  readonly definitions = new DefinitionRegistry();
  readonly cycles = new CycleDetector();
  readonly notes: ReflectNote[] = [];
  noteListeners: Array<(note: ReflectNote) => void> = [];

  /** Current traversal path; `#` is the root */
  readonly path: string[] = ['#'];

  /** Descriptors inferred from plain values and virtual structs */
  readonly inferred = new WeakMap<object, TypeDescriptor>();

  private anonymousIndex = 0;
  private propertyDepth = 0;

  get isRoot(): boolean {
    return this.path.length === 1;
  }

  /** True while a property boundary can recover ErrSkipProperty */
  get inProperty(): boolean {
    return this.propertyDepth > 0;
  }

  /** Runs fn as the reflection of a single property */
  withinProperty<T>(fn: () => T): T {
    this.propertyDepth += 1;
    try {
      return fn();
    } finally {
      this.propertyDepth -= 1;
    }
  }

  /** Path rendered for diagnostics and errors */
  pathString(extra?: string): string {
    const segments = extra === undefined ? this.path : [...this.path, extra];
    return segments.join('.');
  }

  /** Path as reported in errors: dotted, without the root marker */
  errorPath(extra?: string): string {
    const segments = this.path.slice(1);
    if (extra !== undefined) segments.push(extra);
    return segments.join('.');
  }

  /**
   * Runs user code (a hook or capability method). Failures other than
   * reflection errors become HookError at the current path; so does the
   * skip signal when no property encloses the call.
   */
  guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isReflectError(error)) throw error;
      if (isSkipProperty(error)) {
        if (this.inProperty) throw error;
        throw new HookError({
          path: this.errorPath(),
          message: SKIP_OUTSIDE_PROPERTY,
        });
      }
      const cause = toError(error);
      throw new HookError({ path: this.errorPath(), message: cause.message, cause });
    }
  }

  /** Runs fn with a path segment pushed */
  enter<T>(segment: string, fn: () => T): T {
    this.path.push(segment);
    try {
      return fn();
    } finally {
      this.path.pop();
    }
  }

  /** Per-run counter for synthesized names */
  nextAnonymousIndex(): number {
    this.anonymousIndex += 1;
    return this.anonymousIndex;
  }

  note(
    code: ReflectNoteCode,
    details?: Record<string, unknown>,
    path: string = this.pathString()
  ): void {
    const note: ReflectNote = { code, path, details };
    this.notes.push(note);
    for (const listener of this.noteListeners) listener(note);
  }

  /** Completed definition behind a reference, if registered */
  getDefinition(ref: string): Schema | undefined {
    return this.definitions.resolve(ref);
  }

  /** Resolver suitable for Schema#isTrivial */
  readonly resolveRef = (ref: string): SchemaOrBool | undefined =>
    this.getDefinition(ref);
}
