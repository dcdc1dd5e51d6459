/**
 * PList / TList / LazyList - persistent sequence over an index-keyed HAMT
 *
 * Element i lives at trie key `start + i`. Moving `start` lets prepend and
 * front deletion touch one path instead of renumbering every element.
 */

import { ConcurrentModificationError } from './errors';
import {
  Edit,
  FORMAT_MAX_LENGTH,
  formatSeq,
  hamtDelete,
  hamtEmpty,
  hamtFind,
  hamtSet,
  hashKey,
  hashOrdered,
  indexKeyOps,
  keyEquals,
  show,
  type Hashable,
  type HMap,
  type Owner,
} from './internal';
import { Lazy, isLazy, showLazy, unlazy } from './lazy';

export interface ListState<T> {
  map: HMap<number, T>;
  start: number;
}

function emptyState<T>(): ListState<T> {
  return { map: hamtEmpty(indexKeyOps), start: 0 };
}

// Resolves a possibly negative index; -1 when out of range
function resolve(length: number, index: number): number {
  const i = index < 0 ? index + length : index;
  return Number.isInteger(i) && i >= 0 && i < length ? i : -1;
}

function valueAt<T>(map: HMap<number, T>, pos: number): T {
  const e = hamtFind(map, pos);
  if (e === undefined) throw new RangeError(`list position ${pos} is empty`);
  return e.value;
}

function slot<T>(s: ListState<T>, i: number): T {
  return valueAt(s.map, s.start + i);
}

function listSet<T>(s: ListState<T>, owner: Owner, i: number, value: T): ListState<T> {
  const map = hamtSet(s.map, owner, s.start + i, value);
  return map === s.map ? s : { map, start: s.start };
}

function listPush<T>(s: ListState<T>, owner: Owner, value: T): ListState<T> {
  return { map: hamtSet(s.map, owner, s.start + s.map.size, value), start: s.start };
}

function listPrepend<T>(s: ListState<T>, owner: Owner, value: T): ListState<T> {
  const start = s.start - 1;
  return { map: hamtSet(s.map, owner, start, value), start };
}

// Shifts the shorter side of the list to open a slot at i (0 <= i <= n)
function listInsert<T>(s: ListState<T>, owner: Owner, i: number, value: T): ListState<T> {
  const n = s.map.size;
  let { map, start } = s;
  if (n - i <= i) {
    for (let k = n - 1; k >= i; k--) {
      map = hamtSet(map, owner, start + k + 1, valueAt(map, start + k));
    }
  } else {
    for (let k = 0; k < i; k++) {
      map = hamtSet(map, owner, start + k - 1, valueAt(map, start + k));
    }
    start -= 1;
  }
  return { map: hamtSet(map, owner, start + i, value), start };
}

// Closes the gap left by removing slot i (0 <= i < n) from the shorter side
function listDelete<T>(s: ListState<T>, owner: Owner, i: number): ListState<T> {
  const n = s.map.size;
  let { map, start } = s;
  if (n - i <= i) {
    for (let k = i; k < n - 1; k++) {
      map = hamtSet(map, owner, start + k, valueAt(map, start + k + 1));
    }
    map = hamtDelete(map, owner, start + n - 1);
  } else {
    for (let k = i; k > 0; k--) {
      map = hamtSet(map, owner, start + k, valueAt(map, start + k - 1));
    }
    map = hamtDelete(map, owner, start);
    start += 1;
  }
  return { map, start };
}

function* listValues<T>(s: ListState<T>): IterableIterator<T> {
  const n = s.map.size;
  for (let i = 0; i < n; i++) yield slot(s, i);
}

// Runs fn with a short-lived owner so a multi-slot edit copies each path once
function batch<T>(fn: (owner: Owner) => ListState<T>): ListState<T> {
  const edit = new Edit('PList');
  try {
    return fn(edit);
  } finally {
    edit.close();
  }
}

/** A persistent sequence. */
export class PList<T> implements Iterable<T>, Hashable {
  private hash: number | undefined;

  /** @internal */
  constructor(readonly state: ListState<T>) {}

  static empty<T>(): PList<T> {
    return new PList(emptyState<T>());
  }

  static from<T>(values: Iterable<T>): PList<T> {
    if (values instanceof PList) return values;
    const t = TList.empty<T>();
    for (const v of values) t.push(v);
    return t.persistent();
  }

  static of<T>(...values: T[]): PList<T> {
    return PList.from(values);
  }

  get length(): number {
    return this.state.map.size;
  }

  /** Element at `index`; negative indices count from the end. */
  get(index: number): T | undefined {
    const i = resolve(this.length, index);
    return i < 0 ? undefined : slot(this.state, i);
  }

  set(index: number, value: T): PList<T> {
    const i = resolve(this.length, index);
    if (i < 0) throw new RangeError(`PList index ${index} out of range`);
    return this.wrap(listSet(this.state, undefined, i, value));
  }

  push(value: T): PList<T> {
    return new PList(listPush(this.state, undefined, value));
  }

  prepend(value: T): PList<T> {
    return new PList(listPrepend(this.state, undefined, value));
  }

  /** Inserts before `index`; out-of-range indices clamp to either end. */
  insert(index: number, value: T): PList<T> {
    const n = this.length;
    const i = Math.min(Math.max(index < 0 ? index + n : index, 0), n);
    if (i === 0) return this.prepend(value);
    if (i === n) return this.push(value);
    return new PList(batch((owner) => listInsert(this.state, owner, i, value)));
  }

  /** Removes the element at `index` (default: last). */
  delete(index = -1): PList<T> {
    const n = this.length;
    if (n === 0) throw new RangeError('delete from empty PList');
    const i = resolve(n, index);
    if (i < 0) throw new RangeError(`PList index ${index} out of range`);
    if (n === 1) return PList.empty();
    if (i === 0 || i === n - 1) {
      return new PList(listDelete(this.state, undefined, i));
    }
    return new PList(batch((owner) => listDelete(this.state, owner, i)));
  }

  /** Copy of `[start, end)`, with negative bounds counted from the end. */
  slice(start = 0, end = this.length): PList<T> {
    const n = this.length;
    const from = Math.min(Math.max(start < 0 ? start + n : start, 0), n);
    const to = Math.min(Math.max(end < 0 ? end + n : end, 0), n);
    if (from === 0 && to === n) return this;
    const t = TList.empty<T>();
    for (let i = from; i < to; i++) t.push(slot(this.state, i));
    return t.persistent();
  }

  concat(...others: Iterable<T>[]): PList<T> {
    return this.withMutations((t) => {
      for (const other of others) {
        for (const v of other) t.push(v);
      }
    });
  }

  indexOf(value: T): number {
    let i = 0;
    for (const v of this) {
      if (keyEquals(v, value)) return i;
      i++;
    }
    return -1;
  }

  clear(): PList<T> {
    return this.length === 0 ? this : PList.empty();
  }

  transient(): TList<T> {
    return new TList(this.state, this);
  }

  withMutations(recipe: (draft: TList<T>) => void): PList<T> {
    const t = this.transient();
    recipe(t);
    return t.persistent();
  }

  values(): IterableIterator<T> {
    return listValues(this.state);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  toArray(): T[] {
    return [...this];
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (other instanceof LazyList) return other.equals(this);
    if (!(other instanceof PList) || other.length !== this.length) return false;
    const n = this.length;
    for (let i = 0; i < n; i++) {
      if (!keyEquals(slot(this.state, i), slot(other.state, i))) return false;
    }
    return true;
  }

  hashCode(): number {
    if (this.hash === undefined) {
      this.hash = hashOrdered(Array.from(this, hashKey));
    }
    return this.hash;
  }

  /** Lexicographic comparison under `cmp`; shorter prefixes sort first. */
  compare(other: PList<T>, cmp: (a: T, b: T) => number): number {
    const n = Math.min(this.length, other.length);
    for (let i = 0; i < n; i++) {
      const c = cmp(slot(this.state, i), slot(other.state, i));
      if (c !== 0) return c < 0 ? -1 : 1;
    }
    return Math.sign(this.length - other.length);
  }

  toString(): string {
    return `PList([${formatSeq(this, show, FORMAT_MAX_LENGTH)}])`;
  }

  private wrap(state: ListState<T>): PList<T> {
    return state === this.state ? this : new PList(state);
  }
}

/** Batch-edit twin of {@link PList}. */
export class TList<T> implements Iterable<T> {
  private readonly edit = new Edit('TList');
  private version = 0;

  /** @internal */
  constructor(private state: ListState<T>, private readonly origin?: PList<T>) {}

  static empty<T>(): TList<T> {
    return new TList(emptyState<T>());
  }

  get length(): number {
    this.edit.assertOpen();
    return this.state.map.size;
  }

  get(index: number): T | undefined {
    this.edit.assertOpen();
    const i = resolve(this.state.map.size, index);
    return i < 0 ? undefined : slot(this.state, i);
  }

  set(index: number, value: T): this {
    this.edit.assertOpen();
    const i = resolve(this.state.map.size, index);
    if (i < 0) throw new RangeError(`TList index ${index} out of range`);
    this.commit(listSet(this.state, this.edit, i, value));
    return this;
  }

  push(value: T): this {
    this.edit.assertOpen();
    this.commit(listPush(this.state, this.edit, value));
    return this;
  }

  prepend(value: T): this {
    this.edit.assertOpen();
    this.commit(listPrepend(this.state, this.edit, value));
    return this;
  }

  insert(index: number, value: T): this {
    this.edit.assertOpen();
    const n = this.state.map.size;
    const i = Math.min(Math.max(index < 0 ? index + n : index, 0), n);
    this.commit(listInsert(this.state, this.edit, i, value));
    return this;
  }

  /** Removes and returns the element at `index` (default: last). */
  delete(index = -1): T {
    this.edit.assertOpen();
    const n = this.state.map.size;
    if (n === 0) throw new RangeError('delete from empty TList');
    const i = resolve(n, index);
    if (i < 0) throw new RangeError(`TList index ${index} out of range`);
    const removed = slot(this.state, i);
    this.commit(listDelete(this.state, this.edit, i));
    return removed;
  }

  clear(): void {
    this.edit.assertOpen();
    if (this.state.map.size === 0) return;
    this.commit(emptyState<T>());
  }

  *values(): IterableIterator<T> {
    this.edit.assertOpen();
    const version = this.version;
    for (let i = 0; i < this.state.map.size; i++) {
      if (this.version !== version) throw new ConcurrentModificationError('TList');
      yield slot(this.state, i);
    }
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  persistent(): PList<T> {
    this.edit.assertOpen();
    this.edit.close();
    if (this.version === 0 && this.origin) return this.origin;
    return new PList(this.state);
  }

  private commit(next: ListState<T>): void {
    if (next === this.state) return;
    this.state = next;
    this.version++;
  }
}

/**
 * A {@link PList} whose elements may be {@link Lazy}. Reads force lazy
 * elements; `getLazy` and `toPList` expose them unforced.
 */
export class LazyList<T> implements Iterable<T>, Hashable {
  private constructor(private readonly raw: PList<T | Lazy<T>>) {}

  static empty<T>(): LazyList<T> {
    return new LazyList(PList.empty<T | Lazy<T>>());
  }

  static from<T>(source: PList<T | Lazy<T>> | TList<T | Lazy<T>> | Iterable<T | Lazy<T>>): LazyList<T> {
    if (source instanceof PList) return new LazyList(source);
    if (source instanceof TList) return new LazyList(source.persistent());
    return new LazyList(PList.from(source));
  }

  get length(): number {
    return this.raw.length;
  }

  get(index: number): T | undefined {
    const v = this.raw.get(index);
    return v === undefined ? undefined : unlazy(v);
  }

  getLazy(index: number): T | Lazy<T> | undefined {
    return this.raw.get(index);
  }

  isLazy(index: number): boolean {
    return isLazy(this.raw.get(index));
  }

  isReady(index: number): boolean {
    const v = this.raw.get(index);
    return !isLazy(v) || v.isEvaluated();
  }

  readyAll(): this {
    for (const v of this.raw) unlazy(v);
    return this;
  }

  set(index: number, value: T | Lazy<T>): LazyList<T> {
    return this.wrap(this.raw.set(index, value));
  }

  push(value: T | Lazy<T>): LazyList<T> {
    return this.wrap(this.raw.push(value));
  }

  prepend(value: T | Lazy<T>): LazyList<T> {
    return this.wrap(this.raw.prepend(value));
  }

  insert(index: number, value: T | Lazy<T>): LazyList<T> {
    return this.wrap(this.raw.insert(index, value));
  }

  delete(index = -1): LazyList<T> {
    return this.wrap(this.raw.delete(index));
  }

  slice(start?: number, end?: number): LazyList<T> {
    return this.wrap(this.raw.slice(start, end));
  }

  clear(): LazyList<T> {
    return this.wrap(this.raw.clear());
  }

  /** Transient over the raw elements; rewrap with `LazyList.from(t)`. */
  transient(): TList<T | Lazy<T>> {
    return this.raw.transient();
  }

  withMutations(recipe: (draft: TList<T | Lazy<T>>) => void): LazyList<T> {
    return this.wrap(this.raw.withMutations(recipe));
  }

  toPList(): PList<T | Lazy<T>> {
    return this.raw;
  }

  *values(): IterableIterator<T> {
    for (const v of this.raw) yield unlazy(v);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  toArray(): T[] {
    return [...this];
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    const that = other instanceof LazyList ? other.raw : other;
    if (!(that instanceof PList) || that.length !== this.length) return false;
    const n = this.length;
    for (let i = 0; i < n; i++) {
      if (!keyEquals(unlazy(slot(this.raw.state, i)), unlazy(slot(that.state, i)))) return false;
    }
    return true;
  }

  hashCode(): number {
    return this.raw.hashCode();
  }

  toString(): string {
    return `LazyList([${formatSeq(this.raw, showLazy, FORMAT_MAX_LENGTH)}])`;
  }

  private wrap(raw: PList<T | Lazy<T>>): LazyList<T> {
    return raw === this.raw ? this : new LazyList(raw);
  }
}
