/**
 * Definition registry
 *
 * Owns the identity → name allocation and the identity → completed schema
 * map of one reflection run. Named types are keyed by their qualified
 * name string, anonymous types by their descriptor object.
 */

import { Ref, type Schema } from '../types/schema.js';

export type TypeKey = string | object;

export interface NameClaim {
  name: string;
  /** True when the preferred name was taken by another identity */
  renamed: boolean;
}

export class DefinitionRegistry {
  private readonly owners = new Map<string, TypeKey>();
  private readonly refs = new Map<TypeKey, Ref>();
  private readonly schemas = new Map<TypeKey, Schema>();
  private readonly byRef = new Map<string, Schema>();

  /**
   * Reserves a name for the identity. `candidate(attempt)` yields the
   * name to try; attempts start at 1 and grow while the name belongs to
   * a different identity. The same identity always gets its name back.
   */
  claimName(key: TypeKey, candidate: (attempt: number) => string): NameClaim {
    for (let attempt = 1; ; attempt++) {
      const name = candidate(attempt);
      const owner = this.owners.get(name);
      if (owner === undefined || owner === key) {
        this.owners.set(name, key);
        return { name, renamed: attempt > 1 };
      }
    }
  }

  refOf(key: TypeKey): Ref | undefined {
    return this.refs.get(key);
  }

  register(key: TypeKey, ref: Ref, schema: Schema): void {
    this.refs.set(key, ref);
    this.schemas.set(key, schema);
    this.byRef.set(ref.toString(), schema);
  }

  /** Completed definition behind a reference string */
  resolve(ref: string): Schema | undefined {
    return this.byRef.get(ref);
  }

  get size(): number {
    return this.schemas.size;
  }

  /** Registered definitions ordered by name */
  entries(): Array<[string, Schema]> {
    const out: Array<[string, Schema]> = [];
    for (const [key, ref] of this.refs) {
      const schema = this.schemas.get(key);
      if (schema) out.push([ref.name, schema]);
    }
    return out.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
}
