/**
 * HAMT - Hash Array Mapped Trie
 * Bitmap-indexed trie shared by every stratum collection
 */

import { BITS, MASK } from './constants';
import { popcount } from './utils';
import type { KeyOps, Owner } from './types';

// Types
export interface HEntry<K, V> {
  kind: 'entry';
  hash: number;
  key: K;
  value: V;
}

/** Entries whose full 32-bit hashes are equal. Always holds 2+ entries. */
export interface HBucket<K, V> {
  kind: 'bucket';
  owner?: Owner;
  hash: number;
  entries: HEntry<K, V>[];
}

export interface HBranch<K, V> {
  kind: 'branch';
  owner?: Owner;
  bitmap: number;
  children: HChild<K, V>[];
}

export interface HEmpty {
  kind: 'empty';
}

export type HChild<K, V> = HEntry<K, V> | HBucket<K, V> | HBranch<K, V>;
export type HNode<K, V> = HChild<K, V> | HEmpty;

export interface HMap<K, V> {
  root: HNode<K, V>;
  size: number;
  ops: KeyOps<K>;
}

export const EMPTY: HEmpty = Object.freeze({ kind: 'empty' as const });

export function hamtEmpty<K, V>(ops: KeyOps<K>): HMap<K, V> {
  return { root: EMPTY, size: 0, ops };
}

function entry<K, V>(hash: number, key: K, value: V): HEntry<K, V> {
  return { kind: 'entry', hash, key, value };
}

function isEditable(node: HBranch<unknown, unknown> | HBucket<unknown, unknown>, owner: Owner): boolean {
  return owner !== undefined && owner.isOpen && node.owner === owner;
}

function ensureEditableBranch<K, V>(node: HBranch<K, V>, owner: Owner): HBranch<K, V> {
  if (isEditable(node, owner)) return node;
  return {
    kind: 'branch',
    owner,
    bitmap: node.bitmap,
    children: node.children.slice(),
  };
}

function ensureEditableBucket<K, V>(node: HBucket<K, V>, owner: Owner): HBucket<K, V> {
  if (isEditable(node, owner)) return node;
  return {
    kind: 'bucket',
    owner,
    hash: node.hash,
    entries: node.entries.slice(),
  };
}

function hashOf<K, V>(node: HEntry<K, V> | HBucket<K, V>): number {
  return node.hash;
}

// Build the branch chain that separates two children with different hashes
function mergeChildren<K, V>(
  a: HEntry<K, V> | HBucket<K, V>,
  b: HEntry<K, V> | HBucket<K, V>,
  owner: Owner,
  shift: number
): HBranch<K, V> {
  const idxA = (hashOf(a) >>> shift) & MASK;
  const idxB = (hashOf(b) >>> shift) & MASK;

  if (idxA === idxB) {
    return {
      kind: 'branch',
      owner,
      bitmap: 1 << idxA,
      children: [mergeChildren(a, b, owner, shift + BITS)],
    };
  }
  return {
    kind: 'branch',
    owner,
    bitmap: (1 << idxA) | (1 << idxB),
    children: idxA < idxB ? [a, b] : [b, a],
  };
}

export function nodeFind<K, V>(
  root: HNode<K, V>,
  hash: number,
  key: K,
  equals: KeyOps<K>['equals']
): HEntry<K, V> | undefined {
  let node = root;
  let shift = 0;

  while (true) {
    switch (node.kind) {
      case 'empty':
        return undefined;
      case 'entry':
        return node.hash === hash && equals(node.key, key) ? node : undefined;
      case 'bucket':
        if (node.hash !== hash) return undefined;
        for (const e of node.entries) {
          if (equals(e.key, key)) return e;
        }
        return undefined;
      case 'branch': {
        const bit = 1 << ((hash >>> shift) & MASK);
        if ((node.bitmap & bit) === 0) return undefined;
        node = node.children[popcount(node.bitmap & (bit - 1))];
        shift += BITS;
      }
    }
  }
}

export interface AssocResult<K, V> {
  node: HChild<K, V>;
  added: boolean;
  changed: boolean;
}

/**
 * Associates `key` with `compute(existing)` below `node`.
 *
 * Nodes owned by `owner` are edited in place; every other node on the path
 * is copied. Returns the original node with `changed: false` when the
 * computed value is identical to the stored one.
 */
export function nodeAssoc<K, V>(
  node: HNode<K, V>,
  owner: Owner,
  shift: number,
  hash: number,
  key: K,
  compute: (existing: HEntry<K, V> | undefined) => V,
  equals: KeyOps<K>['equals']
): AssocResult<K, V> {
  switch (node.kind) {
    case 'empty':
      return { node: entry(hash, key, compute(undefined)), added: true, changed: true };

    case 'entry': {
      if (node.hash === hash && equals(node.key, key)) {
        const value = compute(node);
        if (Object.is(value, node.value)) {
          return { node, added: false, changed: false };
        }
        return { node: entry(hash, node.key, value), added: false, changed: true };
      }
      const added = entry(hash, key, compute(undefined));
      if (node.hash === hash) {
        return {
          node: { kind: 'bucket', owner, hash, entries: [node, added] },
          added: true,
          changed: true,
        };
      }
      return { node: mergeChildren(node, added, owner, shift), added: true, changed: true };
    }

    case 'bucket': {
      if (node.hash !== hash) {
        const added = entry(hash, key, compute(undefined));
        return { node: mergeChildren(node, added, owner, shift), added: true, changed: true };
      }
      const entries = node.entries;
      let idx = -1;
      for (let i = 0; i < entries.length; i++) {
        if (equals(entries[i].key, key)) {
          idx = i;
          break;
        }
      }

      if (idx >= 0) {
        const existing = entries[idx];
        const value = compute(existing);
        if (Object.is(value, existing.value)) {
          return { node, added: false, changed: false };
        }
        const editable = ensureEditableBucket(node, owner);
        editable.entries[idx] = entry(hash, existing.key, value);
        return { node: editable, added: false, changed: true };
      }
      const editable = ensureEditableBucket(node, owner);
      editable.entries.push(entry(hash, key, compute(undefined)));
      return { node: editable, added: true, changed: true };
    }

    case 'branch': {
      const bit = 1 << ((hash >>> shift) & MASK);
      const packedIdx = popcount(node.bitmap & (bit - 1));

      if ((node.bitmap & bit) === 0) {
        const editable = ensureEditableBranch(node, owner);
        editable.children.splice(packedIdx, 0, entry(hash, key, compute(undefined)));
        editable.bitmap |= bit;
        return { node: editable, added: true, changed: true };
      }

      const res = nodeAssoc(node.children[packedIdx], owner, shift + BITS, hash, key, compute, equals);
      if (!res.changed) {
        return { node, added: false, changed: false };
      }
      const editable = ensureEditableBranch(node, owner);
      editable.children[packedIdx] = res.node;
      return { node: editable, added: res.added, changed: true };
    }
  }
}

export interface DissocResult<K, V> {
  /** Replacement for the visited node; `undefined` once nothing is left. */
  node: HChild<K, V> | undefined;
  removed: HEntry<K, V> | undefined;
}

/**
 * Removes `key` below `node`, collapsing any branch left with a single
 * entry or bucket into that child so the shape stays minimal.
 */
export function nodeDissoc<K, V>(
  node: HChild<K, V>,
  owner: Owner,
  shift: number,
  hash: number,
  key: K,
  equals: KeyOps<K>['equals']
): DissocResult<K, V> {
  const miss: DissocResult<K, V> = { node, removed: undefined };

  switch (node.kind) {
    case 'entry':
      if (node.hash === hash && equals(node.key, key)) {
        return { node: undefined, removed: node };
      }
      return miss;

    case 'bucket': {
      if (node.hash !== hash) return miss;
      const entries = node.entries;
      const idx = entries.findIndex((e) => equals(e.key, key));
      if (idx === -1) return miss;
      if (entries.length === 2) {
        return { node: entries[1 - idx], removed: entries[idx] };
      }
      const editable = ensureEditableBucket(node, owner);
      editable.entries.splice(idx, 1);
      return { node: editable, removed: entries[idx] };
    }

    case 'branch': {
      const bit = 1 << ((hash >>> shift) & MASK);
      if ((node.bitmap & bit) === 0) return miss;

      const packedIdx = popcount(node.bitmap & (bit - 1));
      const res = nodeDissoc(node.children[packedIdx], owner, shift + BITS, hash, key, equals);
      if (!res.removed) return miss;

      if (res.node === undefined) {
        if (node.bitmap === bit) {
          return { node: undefined, removed: res.removed };
        }
        if (node.children.length === 2) {
          const sibling = node.children[1 - packedIdx];
          if (sibling.kind !== 'branch') {
            return { node: sibling, removed: res.removed };
          }
        }
        const editable = ensureEditableBranch(node, owner);
        editable.children.splice(packedIdx, 1);
        editable.bitmap ^= bit;
        return { node: editable, removed: res.removed };
      }

      if (res.node.kind !== 'branch' && node.children.length === 1) {
        return { node: res.node, removed: res.removed };
      }
      const editable = ensureEditableBranch(node, owner);
      editable.children[packedIdx] = res.node;
      return { node: editable, removed: res.removed };
    }
  }
}

/** Depth-first, slot-ascending walk over the entries below `root`. */
export function* nodeEntries<K, V>(root: HNode<K, V>): IterableIterator<HEntry<K, V>> {
  if (root.kind === 'empty') return;

  const stack: HChild<K, V>[] = [root];
  let node = stack.pop();
  while (node) {
    if (node.kind === 'entry') {
      yield node;
    } else if (node.kind === 'bucket') {
      yield* node.entries;
    } else {
      const children = node.children;
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
    node = stack.pop();
  }
}

export function hamtFind<K, V>(map: HMap<K, V>, key: K): HEntry<K, V> | undefined {
  if (map.size === 0) return undefined;
  return nodeFind(map.root, map.ops.hash(key) >>> 0, key, map.ops.equals);
}

export function hamtGet<K, V>(map: HMap<K, V>, key: K): V | undefined {
  return hamtFind(map, key)?.value;
}

export function hamtHas<K, V>(map: HMap<K, V>, key: K): boolean {
  return hamtFind(map, key) !== undefined;
}

export function hamtUpdate<K, V>(
  map: HMap<K, V>,
  owner: Owner,
  key: K,
  fn: (value: V | undefined) => V
): HMap<K, V> {
  const hash = map.ops.hash(key) >>> 0;
  const res = nodeAssoc(map.root, owner, 0, hash, key, (e) => fn(e?.value), map.ops.equals);
  if (!res.changed) return map;
  return {
    root: res.node,
    size: map.size + (res.added ? 1 : 0),
    ops: map.ops,
  };
}

export function hamtSet<K, V>(map: HMap<K, V>, owner: Owner, key: K, value: V): HMap<K, V> {
  return hamtUpdate(map, owner, key, () => value);
}

export function hamtDelete<K, V>(map: HMap<K, V>, owner: Owner, key: K): HMap<K, V> {
  if (map.root.kind === 'empty') return map;
  const hash = map.ops.hash(key) >>> 0;
  const res = nodeDissoc(map.root, owner, 0, hash, key, map.ops.equals);
  if (!res.removed) return map;
  return {
    root: res.node ?? EMPTY,
    size: map.size - 1,
    ops: map.ops,
  };
}

export function* hamtIter<K, V>(map: HMap<K, V>): IterableIterator<[K, V]> {
  for (const e of nodeEntries(map.root)) {
    yield [e.key, e.value];
  }
}

export function hamtToEntries<K, V>(map: HMap<K, V>): [K, V][] {
  return [...hamtIter(map)];
}
