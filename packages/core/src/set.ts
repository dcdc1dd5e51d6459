/**
 * PSet / TSet - insertion-ordered persistent set over the HAMT
 */

import { ConcurrentModificationError } from './errors';
import {
  defaultKeyOps,
  Edit,
  FORMAT_MAX_LENGTH,
  formatSeq,
  hamtHas,
  hashUnordered,
  orderedDelete,
  orderedEmpty,
  orderedSet,
  orderIter,
  show,
  type Hashable,
  type KeyOps,
  type Ordered,
} from './internal';

/** How two sets relate, as reported by {@link PSet.compare}. */
export type SetRelation = 'equal' | 'subset' | 'superset' | 'disjoint' | 'overlap';

/** A persistent set that iterates in insertion order. */
export class PSet<T> implements Iterable<T>, Hashable {
  private hash: number | undefined;

  /** @internal */
  constructor(readonly state: Ordered<T, true>) {}

  static empty<T>(ops: KeyOps<T> = defaultKeyOps): PSet<T> {
    return new PSet(orderedEmpty<T, true>(ops));
  }

  static from<T>(values: Iterable<T>, ops: KeyOps<T> = defaultKeyOps): PSet<T> {
    if (values instanceof PSet) return values;
    const t = TSet.empty<T>(ops);
    for (const v of values) t.add(v);
    return t.persistent();
  }

  static of<T>(...values: T[]): PSet<T> {
    return PSet.from(values);
  }

  get size(): number {
    return this.state.map.size;
  }

  has(value: T): boolean {
    return hamtHas(this.state.map, value);
  }

  add(value: T): PSet<T> {
    return this.wrap(orderedSet(this.state, undefined, value, true));
  }

  delete(value: T): PSet<T> {
    return this.wrap(orderedDelete(this.state, undefined, value));
  }

  clear(): PSet<T> {
    return this.size === 0 ? this : PSet.empty(this.state.map.ops);
  }

  union(other: Iterable<T>): PSet<T> {
    return this.withMutations((t) => {
      for (const v of other) t.add(v);
    });
  }

  intersection(other: Iterable<T>): PSet<T> {
    const that = PSet.from(other, this.state.map.ops);
    return this.withMutations((t) => {
      for (const v of this) {
        if (!that.has(v)) t.delete(v);
      }
    });
  }

  difference(other: Iterable<T>): PSet<T> {
    return this.withMutations((t) => {
      for (const v of other) t.delete(v);
    });
  }

  symmetricDifference(other: Iterable<T>): PSet<T> {
    const that = PSet.from(other, this.state.map.ops);
    return this.withMutations((t) => {
      for (const v of that) {
        if (this.has(v)) t.delete(v);
        else t.add(v);
      }
    });
  }

  isSubsetOf(other: PSet<T>): boolean {
    if (this.size > other.size) return false;
    for (const v of this) {
      if (!other.has(v)) return false;
    }
    return true;
  }

  isSupersetOf(other: PSet<T>): boolean {
    return other.isSubsetOf(this);
  }

  isDisjointFrom(other: PSet<T>): boolean {
    const [small, large] = this.size <= other.size ? [this, other] : [other, this];
    for (const v of small) {
      if (large.has(v)) return false;
    }
    return true;
  }

  /**
   * Two empty sets are equal; an empty set is a subset of any non-empty one.
   */
  compare(other: PSet<T>): SetRelation {
    const [small, large] = this.size <= other.size ? [this, other] : [other, this];
    let shared = 0;
    for (const v of small) {
      if (large.has(v)) shared++;
    }
    if (shared === 0) {
      if (small.size !== 0) return 'disjoint';
      if (large.size === 0) return 'equal';
      return small === this ? 'subset' : 'superset';
    }
    if (shared < small.size) return 'overlap';
    if (this.size === other.size) return 'equal';
    return this.size < other.size ? 'subset' : 'superset';
  }

  transient(): TSet<T> {
    return new TSet(this.state, this);
  }

  withMutations(recipe: (draft: TSet<T>) => void): PSet<T> {
    const t = this.transient();
    recipe(t);
    return t.persistent();
  }

  values(): IterableIterator<T> {
    return orderIter(this.state.order);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  forEach(fn: (value: T, set: PSet<T>) => void): void {
    for (const v of this) fn(v, this);
  }

  toSet(): Set<T> {
    return new Set(this);
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof PSet) || other.size !== this.size) return false;
    for (const v of this) {
      if (!other.has(v)) return false;
    }
    return true;
  }

  hashCode(): number {
    if (this.hash === undefined) {
      const { ops } = this.state.map;
      this.hash = hashUnordered(Array.from(this, (v) => ops.hash(v) >>> 0));
    }
    return this.hash;
  }

  toString(): string {
    return `PSet({${formatSeq(this, show, FORMAT_MAX_LENGTH)}})`;
  }

  private wrap(state: Ordered<T, true>): PSet<T> {
    return state === this.state ? this : new PSet(state);
  }
}

/** Batch-edit twin of {@link PSet}. */
export class TSet<T> implements Iterable<T> {
  private readonly edit = new Edit('TSet');
  private version = 0;

  /** @internal */
  constructor(private state: Ordered<T, true>, private readonly origin?: PSet<T>) {}

  static empty<T>(ops: KeyOps<T> = defaultKeyOps): TSet<T> {
    return new TSet(orderedEmpty<T, true>(ops));
  }

  get size(): number {
    this.edit.assertOpen();
    return this.state.map.size;
  }

  has(value: T): boolean {
    this.edit.assertOpen();
    return hamtHas(this.state.map, value);
  }

  add(value: T): this {
    this.edit.assertOpen();
    this.commit(orderedSet(this.state, this.edit, value, true));
    return this;
  }

  /** Removes `value`; returns whether it was present. */
  delete(value: T): boolean {
    this.edit.assertOpen();
    return this.commit(orderedDelete(this.state, this.edit, value));
  }

  /** Removes `value` if present, without reporting whether it was. */
  discard(value: T): this {
    this.delete(value);
    return this;
  }

  clear(): void {
    this.edit.assertOpen();
    if (this.state.map.size === 0) return;
    this.commit(orderedEmpty(this.state.map.ops));
  }

  *values(): IterableIterator<T> {
    this.edit.assertOpen();
    const version = this.version;
    for (const v of orderIter(this.state.order)) {
      if (this.version !== version) throw new ConcurrentModificationError('TSet');
      yield v;
    }
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  persistent(): PSet<T> {
    this.edit.assertOpen();
    this.edit.close();
    if (this.version === 0 && this.origin) return this.origin;
    return new PSet(this.state);
  }

  private commit(next: Ordered<T, true>): boolean {
    if (next === this.state || next.map === this.state.map) return false;
    this.state = next;
    this.version++;
    return true;
  }
}
