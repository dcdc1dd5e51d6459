/**
 * PMap / TMap / LazyMap - insertion-ordered persistent mapping over the HAMT
 */

import { ConcurrentModificationError } from './errors';
import {
  defaultKeyOps,
  Edit,
  FORMAT_MAX_LENGTH,
  formatSeq,
  hamtFind,
  hashKey,
  hashUnordered,
  keyEquals,
  orderedDelete,
  orderedEmpty,
  orderedEntries,
  orderedSet,
  orderedUpdate,
  show,
  type Hashable,
  type KeyOps,
  type Ordered,
} from './internal';
import { Lazy, isLazy, showLazy, unlazy } from './lazy';

/**
 * A persistent mapping that iterates in insertion order.
 *
 * `set` on an existing key keeps the key's position. Equality ignores order.
 */
export class PMap<K, V> implements Iterable<[K, V]>, Hashable {
  private hash: number | undefined;

  /** @internal */
  constructor(readonly state: Ordered<K, V>) {}

  static empty<K, V>(ops: KeyOps<K> = defaultKeyOps): PMap<K, V> {
    return new PMap(orderedEmpty<K, V>(ops));
  }

  static from<K, V>(entries: Iterable<readonly [K, V]>, ops: KeyOps<K> = defaultKeyOps): PMap<K, V> {
    const t = TMap.empty<K, V>(ops);
    for (const [k, v] of entries) t.set(k, v);
    return t.persistent();
  }

  static of<V>(record: Record<string, V>): PMap<string, V> {
    return PMap.from(Object.entries(record));
  }

  get size(): number {
    return this.state.map.size;
  }

  get(key: K): V | undefined;
  get<D>(key: K, notFound: D): V | D;
  get<D>(key: K, notFound?: D): V | D | undefined {
    const e = hamtFind(this.state.map, key);
    return e ? e.value : notFound;
  }

  has(key: K): boolean {
    return hamtFind(this.state.map, key) !== undefined;
  }

  set(key: K, value: V): PMap<K, V> {
    return this.wrap(orderedSet(this.state, undefined, key, value));
  }

  update(key: K, fn: (value: V | undefined) => V): PMap<K, V> {
    return this.wrap(orderedUpdate(this.state, undefined, key, fn));
  }

  delete(key: K): PMap<K, V> {
    return this.wrap(orderedDelete(this.state, undefined, key));
  }

  /** Returns the value at `key` (or `undefined`) and the map without it. */
  pop(key: K): [V | undefined, PMap<K, V>] {
    const e = hamtFind(this.state.map, key);
    if (e === undefined) return [undefined, this];
    return [e.value, this.delete(key)];
  }

  merge(entries: Iterable<readonly [K, V]>): PMap<K, V> {
    return this.withMutations((t) => {
      for (const [k, v] of entries) t.set(k, v);
    });
  }

  clear(): PMap<K, V> {
    return this.size === 0 ? this : PMap.empty(this.state.map.ops);
  }

  transient(): TMap<K, V> {
    return new TMap(this.state, this);
  }

  withMutations(recipe: (draft: TMap<K, V>) => void): PMap<K, V> {
    const t = this.transient();
    recipe(t);
    return t.persistent();
  }

  entries(): IterableIterator<[K, V]> {
    return orderedEntries(this.state);
  }

  *keys(): IterableIterator<K> {
    for (const [k] of orderedEntries(this.state)) yield k;
  }

  *values(): IterableIterator<V> {
    for (const [, v] of orderedEntries(this.state)) yield v;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  forEach(fn: (value: V, key: K, map: PMap<K, V>) => void): void {
    for (const [k, v] of this) fn(v, k, this);
  }

  toMap(): Map<K, V> {
    return new Map(this);
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (other instanceof LazyMap) return other.equals(this);
    if (!(other instanceof PMap) || other.size !== this.size) return false;
    for (const [k, v] of orderedEntries(this.state)) {
      const e = hamtFind(other.state.map, k);
      if (e === undefined || !keyEquals(v, e.value)) return false;
    }
    return true;
  }

  hashCode(): number {
    if (this.hash === undefined) {
      this.hash = hashEntries(this.state);
    }
    return this.hash;
  }

  toString(): string {
    return `PMap({${formatSeq(this, ([k, v]) => `${show(k)}: ${show(v)}`, FORMAT_MAX_LENGTH)}})`;
  }

  private wrap(state: Ordered<K, V>): PMap<K, V> {
    return state === this.state ? this : new PMap(state);
  }
}

function hashEntries<K, V>(state: Ordered<K, V>): number {
  const { ops } = state.map;
  return hashUnordered(
    Array.from(orderedEntries(state), ([k, v]) => (ops.hash(k) ^ hashKey(v)) >>> 0)
  );
}

/**
 * Batch-edit twin of {@link PMap}. Edits happen in place on nodes this
 * transient owns; `persistent()` publishes the result and closes it.
 */
export class TMap<K, V> implements Iterable<[K, V]> {
  private readonly edit = new Edit('TMap');
  private version = 0;
  private modified = false;

  /** @internal */
  constructor(private state: Ordered<K, V>, private readonly origin?: PMap<K, V>) {}

  static empty<K, V>(ops: KeyOps<K> = defaultKeyOps): TMap<K, V> {
    return new TMap(orderedEmpty<K, V>(ops));
  }

  get size(): number {
    this.edit.assertOpen();
    return this.state.map.size;
  }

  get(key: K): V | undefined;
  get<D>(key: K, notFound: D): V | D;
  get<D>(key: K, notFound?: D): V | D | undefined {
    this.edit.assertOpen();
    const e = hamtFind(this.state.map, key);
    return e ? e.value : notFound;
  }

  has(key: K): boolean {
    this.edit.assertOpen();
    return hamtFind(this.state.map, key) !== undefined;
  }

  set(key: K, value: V): this {
    return this.update(key, () => value);
  }

  update(key: K, fn: (value: V | undefined) => V): this {
    this.edit.assertOpen();
    this.commit(orderedUpdate(this.state, this.edit, key, fn));
    return this;
  }

  delete(key: K): boolean {
    this.edit.assertOpen();
    const before = this.state;
    this.commit(orderedDelete(this.state, this.edit, key));
    return this.state !== before;
  }

  /** Removes `key` and returns its value, or `notFound` when absent. */
  pop(key: K): V | undefined;
  pop<D>(key: K, notFound: D): V | D;
  pop<D>(key: K, notFound?: D): V | D | undefined {
    this.edit.assertOpen();
    const e = hamtFind(this.state.map, key);
    if (e === undefined) return notFound;
    this.commit(orderedDelete(this.state, this.edit, key));
    return e.value;
  }

  clear(): void {
    this.edit.assertOpen();
    if (this.state.map.size === 0) return;
    this.state = orderedEmpty(this.state.map.ops);
    this.version++;
    this.modified = true;
  }

  *entries(): IterableIterator<[K, V]> {
    this.edit.assertOpen();
    const version = this.version;
    for (const entry of orderedEntries(this.state)) {
      if (this.version !== version) throw new ConcurrentModificationError('TMap');
      yield entry;
    }
  }

  *keys(): IterableIterator<K> {
    for (const [k] of this.entries()) yield k;
  }

  *values(): IterableIterator<V> {
    for (const [, v] of this.entries()) yield v;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  persistent(): PMap<K, V> {
    this.edit.assertOpen();
    this.edit.close();
    if (!this.modified && this.origin) return this.origin;
    return new PMap(this.state);
  }

  private commit(next: Ordered<K, V>): void {
    if (next === this.state) return;
    if (next.map.size !== this.state.map.size) this.version++;
    this.state = next;
    this.modified = true;
  }
}

/**
 * A {@link PMap} whose values may be {@link Lazy}. Reads force lazy values;
 * `getLazy` and `toPMap` expose them unforced.
 */
export class LazyMap<K, V> implements Iterable<[K, V]>, Hashable {
  private constructor(private readonly raw: PMap<K, V | Lazy<V>>) {}

  static empty<K, V>(ops: KeyOps<K> = defaultKeyOps): LazyMap<K, V> {
    return new LazyMap(PMap.empty<K, V | Lazy<V>>(ops));
  }

  /** Wraps a map or transient of raw values, or builds one from entries. */
  static from<K, V>(
    source: PMap<K, V | Lazy<V>> | TMap<K, V | Lazy<V>> | Iterable<readonly [K, V | Lazy<V>]>,
    ops: KeyOps<K> = defaultKeyOps
  ): LazyMap<K, V> {
    if (source instanceof PMap) return new LazyMap(source);
    if (source instanceof TMap) return new LazyMap(source.persistent());
    return new LazyMap(PMap.from(source, ops));
  }

  get size(): number {
    return this.raw.size;
  }

  get(key: K): V | undefined;
  get<D>(key: K, notFound: D): V | D;
  get<D>(key: K, notFound?: D): V | D | undefined {
    const e = hamtFind(this.raw.state.map, key);
    return e ? unlazy(e.value) : notFound;
  }

  getLazy(key: K): V | Lazy<V> | undefined {
    return this.raw.get(key);
  }

  has(key: K): boolean {
    return this.raw.has(key);
  }

  /** Whether `key` maps to a `Lazy`, evaluated or not. */
  isLazy(key: K): boolean {
    return isLazy(this.raw.get(key));
  }

  /** Whether the value at `key` can be returned without evaluating anything. */
  isReady(key: K): boolean {
    const v = this.raw.get(key);
    return !isLazy(v) || v.isEvaluated();
  }

  readyAll(): this {
    for (const v of this.raw.values()) unlazy(v);
    return this;
  }

  set(key: K, value: V | Lazy<V>): LazyMap<K, V> {
    return this.wrap(this.raw.set(key, value));
  }

  delete(key: K): LazyMap<K, V> {
    return this.wrap(this.raw.delete(key));
  }

  clear(): LazyMap<K, V> {
    return this.wrap(this.raw.clear());
  }

  /** Transient over the raw values; rewrap with `LazyMap.from(t)`. */
  transient(): TMap<K, V | Lazy<V>> {
    return this.raw.transient();
  }

  withMutations(recipe: (draft: TMap<K, V | Lazy<V>>) => void): LazyMap<K, V> {
    return this.wrap(this.raw.withMutations(recipe));
  }

  toPMap(): PMap<K, V | Lazy<V>> {
    return this.raw;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [k, v] of this.raw) yield [k, unlazy(v)];
  }

  keys(): IterableIterator<K> {
    return this.raw.keys();
  }

  *values(): IterableIterator<V> {
    for (const v of this.raw.values()) yield unlazy(v);
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    const that = other instanceof LazyMap ? other.raw : other;
    if (!(that instanceof PMap) || that.size !== this.size) return false;
    for (const [k, v] of this.raw) {
      const e = hamtFind(that.state.map, k);
      if (e === undefined || !keyEquals(unlazy(v), unlazy(e.value))) return false;
    }
    return true;
  }

  hashCode(): number {
    return this.raw.hashCode();
  }

  toString(): string {
    return `LazyMap({${formatSeq(this.raw, ([k, v]) => `${show(k)}: ${showLazy(v)}`, FORMAT_MAX_LENGTH)}})`;
  }

  private wrap(raw: PMap<K, V | Lazy<V>>): LazyMap<K, V> {
    return raw === this.raw ? this : new LazyMap(raw);
  }
}
