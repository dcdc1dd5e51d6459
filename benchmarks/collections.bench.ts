/**
 * Benchmark: persistent vs transient edits vs Native vs Immer
 */

import { bench, describe } from 'vitest';
import { enableMapSet, produce as immerProduce } from 'immer';
import { PList, PMap, Trie, produce } from '../packages/core/src/index';

enableMapSet();

// ===== Setup =====
const SIZE = 1000;
const entries = Array.from({ length: SIZE }, (_, i): [string, number] => [`key${i}`, i]);
const nativeMap = new Map(entries);
const pmap = PMap.from(entries);
const trie = Trie.from(entries);
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
const plist = PList.from(nativeArr);

describe('Single update of key500', () => {
  bench('Native Map (copy)', () => {
    const copy = new Map(nativeMap);
    copy.set('key500', -1);
  });

  bench('PMap.set()', () => {
    pmap.set('key500', -1);
  });

  bench('Trie.set()', () => {
    trie.set('key500', -1);
  });

  bench('Immer produce()', () => {
    immerProduce(nativeMap, (draft) => {
      draft.set('key500', -1);
    });
  });
});

// ===== Batches =====
describe('Insert 100 new keys', () => {
  bench('PMap.set() chain', () => {
    let m = pmap;
    for (let i = 0; i < 100; i++) m = m.set(`new${i}`, i);
  });

  bench('produce() on PMap', () => {
    produce(pmap, (draft) => {
      for (let i = 0; i < 100; i++) draft.set(`new${i}`, i);
    });
  });

  bench('Trie transient', () => {
    trie.withMutations((draft) => {
      for (let i = 0; i < 100; i++) draft.set(`new${i}`, i);
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeMap, (draft) => {
      for (let i = 0; i < 100; i++) draft.set(`new${i}`, i);
    });
  });
});

// ===== Reads =====
describe('Lookup every key', () => {
  bench('Native Map', () => {
    let sum = 0;
    for (const [k] of entries) sum += nativeMap.get(k) ?? 0;
  });

  bench('PMap.get()', () => {
    let sum = 0;
    for (const [k] of entries) sum += pmap.get(k, 0);
  });

  bench('Trie.get()', () => {
    let sum = 0;
    for (const [k] of entries) sum += trie.get(k, 0);
  });
});

// ===== Sequences =====
describe('Push 10 items', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (let i = 0; i < 10; i++) copy.push(i);
  });

  bench('produce() on PList', () => {
    produce(plist, (draft) => {
      for (let i = 0; i < 10; i++) draft.push(i);
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, (draft) => {
      for (let i = 0; i < 10; i++) draft.push(i);
    });
  });
});

describe('Insert at index 10', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy.splice(10, 0, -1);
  });

  bench('PList.insert()', () => {
    plist.insert(10, -1);
  });
});
