import { describe, it, expect } from 'vitest';
import { TransientClosedError } from './errors';
import { TransientTrie } from './transient';
import { Trie } from './trie';

describe('TransientTrie', () => {
  it('should produce the same trie as the persistent path', () => {
    const base = Trie.from(Array.from({ length: 200 }, (_, i): [number, string] => [i, `v${i}`]));

    let persistent = base;
    const session = base.transient();
    for (let i = 0; i < 400; i += 3) {
      persistent = persistent.set(i, `w${i}`);
      session.set(i, `w${i}`);
    }
    for (let i = 0; i < 200; i += 7) {
      persistent = persistent.delete(i);
      session.delete(i);
    }
    const frozen = session.freeze();

    expect(frozen.size).toBe(persistent.size);
    expect(frozen.equals(persistent)).toBe(true);
    expect([...frozen].sort((a, b) => a[0] - b[0])).toEqual([...persistent].sort((a, b) => a[0] - b[0]));
  });

  it('should never change the base trie', () => {
    const base = Trie.from([
      ['a', 1],
      ['b', 2],
    ]);
    const session = TransientTrie.open(base);
    session.set('a', 100).set('c', 3);
    session.delete('b');

    expect(base.size).toBe(2);
    expect(base.get('a')).toBe(1);
    expect(base.get('b')).toBe(2);
    expect(base.has('c')).toBe(false);
    expect(session.base).toBe(base);
  });

  it('should read its own writes', () => {
    const session = Trie.empty<string, number>().transient();
    session.set('x', 1);
    session.update('x', (v) => (v ?? 0) + 1);
    expect(session.get('x')).toBe(2);
    expect(session.get('y', -1)).toBe(-1);
    expect(session.has('x')).toBe(true);
    expect(session.size).toBe(1);
  });

  it('should report whether delete removed a key', () => {
    const session = Trie.from([['k', 1]]).transient();
    expect(session.delete('missing')).toBe(false);
    expect(session.delete('k')).toBe(true);
    expect(session.size).toBe(0);
  });

  it('should return the base when nothing changed', () => {
    const base = Trie.from([['a', 1]]);
    const session = base.transient();
    session.set('a', 1);
    session.delete('zzz');
    expect(session.freeze()).toBe(base);
  });

  it('should reject every call once frozen', () => {
    const session = Trie.empty<string, number>().transient();
    session.set('a', 1);
    const frozen = session.freeze();

    expect(session.isFrozen).toBe(true);
    expect(() => session.set('b', 2)).toThrow(TransientClosedError);
    expect(() => session.delete('a')).toThrow(TransientClosedError);
    expect(() => session.get('a')).toThrow(TransientClosedError);
    expect(() => session.size).toThrow(TransientClosedError);
    expect(() => session.freeze()).toThrow('TransientTrie has been frozen and can no longer be used');
    expect(frozen.get('a')).toBe(1);
  });

  it('should not let a second session disturb a frozen result', () => {
    const base = Trie.from(Array.from({ length: 64 }, (_, i): [number, number] => [i, i]));
    const first = base.transient();
    first.set(1, -1);
    const frozen = first.freeze();

    const second = frozen.transient();
    second.set(1, -2).set(2, -2);
    const next = second.freeze();

    expect(frozen.get(1)).toBe(-1);
    expect(frozen.get(2)).toBe(2);
    expect(next.get(1)).toBe(-2);
    expect(next.get(2)).toBe(-2);
  });
});
