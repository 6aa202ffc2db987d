/**
 * Cycle detector
 *
 * Each expansion owns a slot for as long as it runs. A type that re-enters
 * its own expansion gets a reference to the slot's definition name; the
 * slot is flagged so the finished schema is registered under that name
 * even when inlining policies would otherwise keep it inline.
 */

import type { TypeDescriptor } from '../types/descriptor.js';
import type { TypeKey } from './definitions.js';

export interface ExpansionSlot {
  readonly key: TypeKey;
  readonly type: TypeDescriptor;
  /** Definition name; allocated on re-entry for inline and anonymous types */
  defName: string;
  readonly isRoot: boolean;
  /** Set once a recursive use handed out a reference to this slot */
  referenced: boolean;
}

export class CycleDetector {
  private readonly active = new Map<TypeKey, ExpansionSlot>();

  lookup(key: TypeKey): ExpansionSlot | undefined {
    return this.active.get(key);
  }

  get depth(): number {
    return this.active.size;
  }

  /** Runs the expansion with the slot marked active */
  expand<T>(slot: ExpansionSlot, fn: () => T): T {
    this.active.set(slot.key, slot);
    try {
      return fn();
    } finally {
      this.active.delete(slot.key);
    }
  }
}
