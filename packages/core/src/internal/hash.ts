/**
 * Key hashing and equality
 */

import { mix32 } from './utils';
import type { Hashable, KeyOps } from './types';

// Hash caches
const OBJ_HASH = new WeakMap<object, number>();
let OBJ_SEQ = 1;
const SYM_HASH = new Map<symbol, number>();
let SYM_SEQ = 1;

// Murmur3 32-bit hash over UTF-16 code units, two per block
function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let k: number;
  let i = 0;

  while (i + 2 <= key.length) {
    k = key.charCodeAt(i) | (key.charCodeAt(i + 1) << 16);
    i += 2;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  if (i < key.length) {
    k = key.charCodeAt(i);
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
  }

  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

export function isHashable(value: unknown): value is Hashable {
  if (value === null || typeof value !== 'object') return false;
  return (
    'hashCode' in value &&
    typeof value.hashCode === 'function' &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

/**
 * Hashes any value to an unsigned 32-bit integer.
 *
 * Primitives hash by value, `Hashable` objects by their own `hashCode()`,
 * and every other object by identity.
 */
export function hashKey(key: unknown): number {
  switch (typeof key) {
    case 'string':
      return murmur3(key);
    case 'number': {
      const n = Object.is(key, -0) ? 0 : key;
      return mix32((n | 0) ^ Math.imul((n * 4294967296) | 0, 0x9e3779b1));
    }
    case 'boolean':
      return key ? 0x27d4eb2d : 0x165667b1;
    case 'bigint': {
      let h = 0;
      const s = key.toString();
      for (let i = 0; i < s.length; i += 4) {
        const chunk = s.slice(i, i + 4);
        let v = 0;
        for (let j = 0; j < chunk.length; j++) {
          v = (v << 8) | chunk.charCodeAt(j);
        }
        h = mix32(h ^ v);
      }
      return h;
    }
    case 'symbol': {
      let id = SYM_HASH.get(key);
      if (id === undefined) {
        id = SYM_SEQ++;
        SYM_HASH.set(key, id);
      }
      return Math.imul(id, 0x9e3779b1) >>> 0;
    }
    case 'object':
      if (key === null) return 0x811c9dc5;
      if (isHashable(key)) return key.hashCode() >>> 0;
      {
        let id = OBJ_HASH.get(key);
        if (id === undefined) {
          id = OBJ_SEQ++;
          OBJ_HASH.set(key, id);
        }
        return Math.imul(id, 0x85ebca77) >>> 0;
      }
    case 'function': {
      let id = OBJ_HASH.get(key);
      if (id === undefined) {
        id = OBJ_SEQ++;
        OBJ_HASH.set(key, id);
      }
      return Math.imul(id, 0x85ebca77) >>> 0;
    }
    default:
      return 0x9747b28c;
  }
}

export function keyEquals(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (a === 0 && b === 0) return true;
  }
  if (Object.is(a, b)) return true;
  if (isHashable(a)) return a.equals(b);
  if (isHashable(b)) return b.equals(a);
  return false;
}

export const defaultKeyOps: KeyOps<unknown> = {
  hash: hashKey,
  equals: keyEquals,
};

/** Dense integer positions: the position itself is the radix source. */
export const indexKeyOps: KeyOps<number> = {
  hash: (index) => index >>> 0,
  equals: (a, b) => a === b,
};

// Order-independent accumulation of entry hashes
export function hashUnordered(hashes: Iterable<number>): number {
  let sum = 0;
  let xor = 0;
  let n = 0;
  for (const h of hashes) {
    sum = (sum + h) | 0;
    xor ^= h;
    n++;
  }
  return mix32(sum ^ Math.imul(xor, 0x85ebca6b) ^ n);
}

export function hashOrdered(hashes: Iterable<number>): number {
  let h = 1;
  let n = 0;
  for (const x of hashes) {
    h = (Math.imul(h, 31) + x) | 0;
    n++;
  }
  return mix32(h ^ n);
}
