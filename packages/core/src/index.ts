/**
 * stratum – persistent collections on a hash array mapped trie
 *
 * - Trie / TransientTrie → the HAMT engine and its batch-edit session
 * - PMap / PSet / PList  → insertion-ordered map, set and sequence
 * - TMap / TSet / TList  → their transients
 * - Lazy, LazyMap, LazyList → memoized deferred values and collections that force them
 * - produce(...)         → one batch edit on any of the above
 */

export { Trie } from './trie';
export { TransientTrie } from './transient';
export { PMap, TMap, LazyMap } from './map';
export { PSet, TSet, type SetRelation } from './set';
export { PList, TList, LazyList } from './list';
export { Lazy, lazy, isLazy, unlazy } from './lazy';
export { TransientClosedError, ConcurrentModificationError, LazyError } from './errors';
export { hashKey, keyEquals, isHashable, defaultKeyOps, indexKeyOps } from './internal/hash';
export type { KeyOps, Hashable } from './internal/types';

/** Anything with a transient twin that a recipe can edit. */
export interface Producible<D, P> {
  withMutations(recipe: (draft: D) => void): P;
}

/**
 * Immutable update with structural sharing.
 * Opens a transient on `base`, hands it to `recipe`, and returns the
 * persistent result. Returns `base` itself when the recipe changed nothing.
 */
export function produce<D, P>(base: Producible<D, P>, recipe: (draft: D) => void): P {
  return base.withMutations(recipe);
}
