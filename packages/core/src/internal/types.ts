/**
 * Core type definitions
 */

import { TransientClosedError } from '../errors';

/**
 * Ownership token for a transient session. Every node created while the
 * session is open is stamped with it; only nodes carrying the token of an
 * open session may be mutated in place.
 */
export class Edit {
  private open = true;

  constructor(readonly label: string) {}

  get isOpen(): boolean {
    return this.open;
  }

  close(): void {
    this.open = false;
  }

  assertOpen(): void {
    if (!this.open) throw new TransientClosedError(this.label);
  }
}

// Transient owner for structural sharing
export type Owner = Edit | undefined;

/** Hash function and equality predicate a trie is keyed by. */
export interface KeyOps<K> {
  hash(key: K): number;
  equals(a: K, b: K): boolean;
}

/**
 * Values that define their own hash and equality. Persistent collections and
 * lazy values implement it so they can be used inside other collections.
 *
 * `a.equals(b)` must imply `a.hashCode() === b.hashCode()`.
 */
export interface Hashable {
  hashCode(): number;
  equals(other: unknown): boolean;
}
