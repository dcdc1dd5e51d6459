/**
 * Trie - persistent handle onto an immutable HAMT
 */

import {
  defaultKeyOps,
  hamtDelete,
  hamtEmpty,
  hamtFind,
  hamtSet,
  hamtUpdate,
  hashKey,
  hashUnordered,
  keyEquals,
  nodeEntries,
  type Hashable,
  type HEntry,
  type HMap,
  type HNode,
  type KeyOps,
} from './internal';
import { TransientTrie } from './transient';

/**
 * An immutable hash trie from `K` to `V`.
 *
 * Every edit returns a new `Trie` that shares all untouched subtrees with
 * its receiver; the receiver is never changed. Copying a `Trie` is free.
 *
 * Keys must hash consistently with their equality: `ops.equals(a, b)`
 * implies `ops.hash(a) === ops.hash(b)`. The trie does not detect
 * violations.
 */
export class Trie<K, V> implements Iterable<[K, V]>, Hashable {
  private hash: number | undefined;

  /** @internal */
  constructor(private readonly map: HMap<K, V>) {}

  static empty<K, V>(ops: KeyOps<K> = defaultKeyOps): Trie<K, V> {
    return new Trie(hamtEmpty<K, V>(ops));
  }

  static from<K, V>(entries: Iterable<readonly [K, V]>, ops: KeyOps<K> = defaultKeyOps): Trie<K, V> {
    const session = TransientTrie.open(Trie.empty<K, V>(ops));
    for (const [k, v] of entries) session.set(k, v);
    return session.freeze();
  }

  get size(): number {
    return this.map.size;
  }

  get ops(): KeyOps<K> {
    return this.map.ops;
  }

  /** @internal */
  get root(): HNode<K, V> {
    return this.map.root;
  }

  /** Returns the stored entry for `key`, or `undefined` on a miss. */
  lookup(key: K): HEntry<K, V> | undefined {
    return hamtFind(this.map, key);
  }

  get(key: K): V | undefined;
  get<D>(key: K, notFound: D): V | D;
  get<D>(key: K, notFound?: D): V | D | undefined {
    const e = hamtFind(this.map, key);
    return e ? e.value : notFound;
  }

  has(key: K): boolean {
    return hamtFind(this.map, key) !== undefined;
  }

  set(key: K, value: V): Trie<K, V> {
    return this.wrap(hamtSet(this.map, undefined, key, value));
  }

  delete(key: K): Trie<K, V> {
    return this.wrap(hamtDelete(this.map, undefined, key));
  }

  /** `set(key, fn(get(key)))` in a single descent. */
  update(key: K, fn: (value: V | undefined) => V): Trie<K, V> {
    return this.wrap(hamtUpdate(this.map, undefined, key, fn));
  }

  transient(): TransientTrie<K, V> {
    return TransientTrie.open(this);
  }

  withMutations(recipe: (draft: TransientTrie<K, V>) => void): Trie<K, V> {
    const session = this.transient();
    recipe(session);
    return session.freeze();
  }

  *entries(): IterableIterator<[K, V]> {
    for (const e of nodeEntries(this.map.root)) yield [e.key, e.value];
  }

  *keys(): IterableIterator<K> {
    for (const e of nodeEntries(this.map.root)) yield e.key;
  }

  *values(): IterableIterator<V> {
    for (const e of nodeEntries(this.map.root)) yield e.value;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /** Structural equality: same size and every entry present with an equal value. */
  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof Trie) || other.size !== this.size) return false;
    if (other.root === this.map.root) return true;
    for (const e of nodeEntries(this.map.root)) {
      const found: HEntry<unknown, unknown> | undefined = other.lookup(e.key);
      if (!found || !keyEquals(e.value, found.value)) return false;
    }
    return true;
  }

  hashCode(): number {
    if (this.hash === undefined) {
      const { ops } = this.map;
      this.hash = hashUnordered(
        Array.from(nodeEntries(this.map.root), (e) => (ops.hash(e.key) ^ hashKey(e.value)) >>> 0)
      );
    }
    return this.hash;
  }

  toString(): string {
    return `Trie(${this.size})`;
  }

  private wrap(map: HMap<K, V>): Trie<K, V> {
    return map === this.map ? this : new Trie(map);
  }
}

