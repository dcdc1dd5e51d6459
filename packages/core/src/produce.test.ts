import { describe, it, expect } from 'vitest';
import { PList, PMap, PSet, Trie, produce } from './index';

describe('produce', () => {
  it('should apply a recipe to a map', () => {
    const base = PMap.of({ count: 1 });
    const next = produce(base, (draft) => {
      draft.set('count', 2);
      draft.set('extra', 3);
    });
    expect([...next]).toEqual([
      ['count', 2],
      ['extra', 3],
    ]);
    expect(base.get('count')).toBe(1);
  });

  it('should apply a recipe to a set', () => {
    const next = produce(PSet.of('a'), (draft) => {
      draft.add('b');
      draft.delete('a');
    });
    expect([...next]).toEqual(['b']);
  });

  it('should apply a recipe to a list', () => {
    const next = produce(PList.of(1, 2, 3), (draft) => {
      draft.push(4);
      draft.delete(0);
    });
    expect(next.toArray()).toEqual([2, 3, 4]);
  });

  it('should apply a recipe to a trie', () => {
    const next = produce(Trie.empty<string, number>(), (draft) => {
      draft.set('k', 1);
    });
    expect(next.get('k')).toBe(1);
  });

  it('should return the base for a no-op recipe', () => {
    const map = PMap.of({ a: 1 });
    const list = PList.of(1);
    const trie = Trie.from([['a', 1]]);
    expect(produce(map, (draft) => draft.set('a', 1))).toBe(map);
    expect(produce(list, () => undefined)).toBe(list);
    expect(produce(trie, (draft) => draft.get('a'))).toBe(trie);
  });
});
