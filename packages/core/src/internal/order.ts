/**
 * OrderIndex - Maintains insertion order for maps and sets
 * Two tries: key → position and position → key. Deleted positions become
 * holes that are compacted away once they dominate.
 */

import { ORDER_COMPACT_MIN, ORDER_COMPACT_RATIO } from './constants';
import { indexKeyOps } from './hash';
import {
  hamtDelete,
  hamtEmpty,
  hamtFind,
  hamtSet,
  hamtUpdate,
  type HMap,
} from './hamt';
import type { KeyOps, Owner } from './types';

export interface OrderIndex<K> {
  next: number;
  keyToIdx: HMap<K, number>;
  idxToKey: HMap<number, K>;
  holes: number;
}

export function orderEmpty<K>(ops: KeyOps<K>): OrderIndex<K> {
  return { next: 0, keyToIdx: hamtEmpty(ops), idxToKey: hamtEmpty(indexKeyOps), holes: 0 };
}

export function orderAppend<K>(ord: OrderIndex<K>, owner: Owner, key: K): OrderIndex<K> {
  const idx = ord.next;
  return {
    next: idx + 1,
    keyToIdx: hamtSet(ord.keyToIdx, owner, key, idx),
    idxToKey: hamtSet(ord.idxToKey, owner, idx, key),
    holes: ord.holes,
  };
}

export function orderCompact<K>(ord: OrderIndex<K>, owner: Owner): OrderIndex<K> {
  if (ord.holes === 0) return ord;
  let compacted = orderEmpty(ord.keyToIdx.ops);
  for (const k of orderIter(ord)) {
    compacted = orderAppend(compacted, owner, k);
  }
  return compacted;
}

export function orderDelete<K>(ord: OrderIndex<K>, owner: Owner, key: K): OrderIndex<K> {
  const found = hamtFind(ord.keyToIdx, key);
  if (found === undefined) return ord;
  const newHoles = ord.holes + 1;
  const result: OrderIndex<K> = {
    next: ord.next,
    keyToIdx: hamtDelete(ord.keyToIdx, owner, key),
    idxToKey: hamtDelete(ord.idxToKey, owner, found.value),
    holes: newHoles,
  };
  if (newHoles > ord.next * ORDER_COMPACT_RATIO && ord.next > ORDER_COMPACT_MIN) {
    return orderCompact(result, owner);
  }
  return result;
}

export function* orderIter<K>(ord: OrderIndex<K>): IterableIterator<K> {
  const { idxToKey, next } = ord;
  for (let i = 0; i < next; i++) {
    const e = hamtFind(idxToKey, i);
    if (e !== undefined) yield e.value;
  }
}

// Keyed map plus its insertion order
export interface Ordered<K, V> {
  map: HMap<K, V>;
  order: OrderIndex<K>;
}

export function orderedEmpty<K, V>(ops: KeyOps<K>): Ordered<K, V> {
  return { map: hamtEmpty(ops), order: orderEmpty(ops) };
}

export function orderedUpdate<K, V>(
  s: Ordered<K, V>,
  owner: Owner,
  key: K,
  fn: (value: V | undefined) => V
): Ordered<K, V> {
  const map = hamtUpdate(s.map, owner, key, fn);
  if (map === s.map) return s;
  const order = map.size > s.map.size ? orderAppend(s.order, owner, key) : s.order;
  return { map, order };
}

export function orderedSet<K, V>(s: Ordered<K, V>, owner: Owner, key: K, value: V): Ordered<K, V> {
  return orderedUpdate(s, owner, key, () => value);
}

export function orderedDelete<K, V>(s: Ordered<K, V>, owner: Owner, key: K): Ordered<K, V> {
  const map = hamtDelete(s.map, owner, key);
  if (map === s.map) return s;
  return { map, order: orderDelete(s.order, owner, key) };
}

export function* orderedEntries<K, V>(s: Ordered<K, V>): IterableIterator<[K, V]> {
  for (const k of orderIter(s.order)) {
    const e = hamtFind(s.map, k);
    if (e !== undefined) yield [e.key, e.value];
  }
}
