import { describe, it, expect } from 'vitest';
import { ConcurrentModificationError, TransientClosedError } from './errors';
import { lazy } from './lazy';
import { LazyList, PList, TList } from './list';

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const range = (n: number): number[] => Array.from({ length: n }, (_, i) => i);

describe('PList', () => {
  describe('access', () => {
    it('should index from either end', () => {
      const l = PList.of(1, 2, 3);
      expect(l.length).toBe(3);
      expect(l.get(0)).toBe(1);
      expect(l.get(-1)).toBe(3);
      expect(l.get(3)).toBeUndefined();
      expect(l.get(-4)).toBeUndefined();
      expect(l.get(1.5)).toBeUndefined();
    });

    it('should replace one element', () => {
      const l = PList.of('a', 'b', 'c');
      expect(l.set(-1, 'z').toArray()).toEqual(['a', 'b', 'z']);
      expect(l.set(0, 'a')).toBe(l);
      expect(() => l.set(5, 'x')).toThrow('PList index 5 out of range');
    });
  });

  describe('growth', () => {
    it('should push and prepend', () => {
      let l = PList.empty<number>();
      for (let i = 0; i < 100; i++) l = l.prepend(i);
      expect(l.toArray()).toEqual(range(100).reverse());
      expect(l.push(-1).get(-1)).toBe(-1);
      expect(l.length).toBe(100);
    });

    it('should insert near the back by shifting the tail', () => {
      const base = PList.from(range(10));
      expect(base.insert(7, 100).toArray()).toEqual([0, 1, 2, 3, 4, 5, 6, 100, 7, 8, 9]);
      expect(base.toArray()).toEqual(range(10));
    });

    it('should insert near the front by shifting the head', () => {
      const base = PList.from(range(10));
      expect(base.insert(2, 100).toArray()).toEqual([0, 1, 100, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(base.toArray()).toEqual(range(10));
    });

    it('should clamp insert positions', () => {
      const base = PList.of(1, 2);
      expect(base.insert(-10, 0).toArray()).toEqual([0, 1, 2]);
      expect(base.insert(10, 3).toArray()).toEqual([1, 2, 3]);
      expect(base.insert(-1, 9).toArray()).toEqual([1, 9, 2]);
    });
  });

  describe('removal', () => {
    it('should delete by position', () => {
      const base = PList.from(range(10));
      expect(base.delete(7).toArray()).toEqual([0, 1, 2, 3, 4, 5, 6, 8, 9]);
      expect(base.delete(2).toArray()).toEqual([0, 1, 3, 4, 5, 6, 7, 8, 9]);
      expect(base.delete().toArray()).toEqual(range(9));
      expect(base.delete(0).toArray()).toEqual(range(10).slice(1));
      expect(base.toArray()).toEqual(range(10));
    });

    it('should reject impossible deletes', () => {
      expect(() => PList.empty().delete()).toThrow(RangeError);
      expect(() => PList.of(1).delete(1)).toThrow('PList index 1 out of range');
      expect(PList.of(1).delete().length).toBe(0);
    });
  });

  describe('slicing', () => {
    const base = PList.from(range(5));

    it('should accept negative bounds', () => {
      expect(base.slice(1, -1).toArray()).toEqual([1, 2, 3]);
      expect(base.slice(-2).toArray()).toEqual([3, 4]);
      expect(base.slice(3, 1).length).toBe(0);
      expect(base.slice()).toBe(base);
    });

    it('should concatenate', () => {
      expect(PList.of(1).concat([2, 3], PList.of(4)).toArray()).toEqual([1, 2, 3, 4]);
    });

    it('should find elements by equality', () => {
      expect(base.indexOf(3)).toBe(3);
      expect(base.indexOf(9)).toBe(-1);
    });
  });

  it('should agree with an array under random edits', () => {
    const rand = mulberry32(42);
    const model: number[] = [];
    let list = PList.empty<number>();

    for (let step = 0; step < 2000; step++) {
      const r = rand();
      const at = Math.floor(rand() * (model.length + 1));
      if (r < 0.35) {
        model.splice(at, 0, step);
        list = list.insert(at, step);
      } else if (r < 0.5) {
        model.unshift(step);
        list = list.prepend(step);
      } else if (r < 0.8 && model.length > 0) {
        const i = Math.min(at, model.length - 1);
        model.splice(i, 1);
        list = list.delete(i);
      } else if (model.length > 0) {
        const i = Math.min(at, model.length - 1);
        model[i] = -step;
        list = list.set(i, -step);
      }
      expect(list.length).toBe(model.length);
    }
    expect(list.toArray()).toEqual(model);
  });

  describe('equality', () => {
    it('should compare by position', () => {
      const a = PList.of(1, 2);
      const b = PList.empty<number>().prepend(2).prepend(1);
      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
      expect(a.equals(PList.of(2, 1))).toBe(false);
    });

    it('should order lexicographically', () => {
      const cmp = (x: number, y: number): number => x - y;
      expect(PList.of(1, 2).compare(PList.of(1, 3), cmp)).toBe(-1);
      expect(PList.of(1, 2).compare(PList.of(1), cmp)).toBe(1);
      expect(PList.of(1, 2).compare(PList.of(1, 2), cmp)).toBe(0);
    });

    it('should render a bounded preview', () => {
      expect(PList.of(1, 2, 3).toString()).toBe('PList([1, 2, 3])');
      expect(PList.of('a').toString()).toBe('PList(["a"])');
    });
  });
});

describe('TList', () => {
  it('should edit in place and leave the origin alone', () => {
    const base = PList.from(range(6));
    const t = base.transient();
    t.push(6).prepend(-1).insert(3, 99);
    expect(t.delete(0)).toBe(-1);
    expect(t.delete()).toBe(6);
    t.set(0, 10);
    expect(t.get(-1)).toBe(5);
    expect(t.length).toBe(7);

    expect(t.persistent().toArray()).toEqual([10, 1, 99, 2, 3, 4, 5]);
    expect(base.toArray()).toEqual(range(6));
  });

  it('should return the origin when untouched', () => {
    const base = PList.of(1, 2);
    expect(base.transient().persistent()).toBe(base);
  });

  it('should refuse use after persistent()', () => {
    const t = TList.empty<number>();
    t.persistent();
    expect(() => t.push(1)).toThrow(TransientClosedError);
  });

  it('should fail iteration after a change', () => {
    const t = PList.of(1, 2, 3).transient();
    const iter = t.values();
    expect(iter.next().value).toBe(1);
    t.set(2, 30);
    expect(() => iter.next()).toThrow(ConcurrentModificationError);
  });

  it('should clear', () => {
    const t = PList.of(1, 2).transient();
    t.clear();
    expect(t.length).toBe(0);
    expect(t.persistent().toArray()).toEqual([]);
  });
});

describe('LazyList', () => {
  it('should force elements on read only', () => {
    let calls = 0;
    const l = LazyList.from<number>([
      1,
      lazy(() => {
        calls++;
        return 2;
      }),
    ]);

    expect(l.isLazy(1)).toBe(true);
    expect(l.isReady(1)).toBe(false);
    expect(l.toString()).toBe('LazyList([1, <lazy>])');
    expect(calls).toBe(0);

    expect(l.get(1)).toBe(2);
    expect(l.toArray()).toEqual([1, 2]);
    expect(calls).toBe(1);
    expect(l.toString()).toBe('LazyList([1, 2])');
  });

  it('should keep lazies unforced through edits', () => {
    const v = lazy(() => 'late');
    const l = LazyList.empty<string>().push('a').push(v).insert(1, 'b').slice(1);
    expect(l.getLazy(1)).toBe(v);
    expect(v.isEvaluated()).toBe(false);
    expect(l.toPList().length).toBe(2);
    expect(l.values().next().value).toBe('b');
  });

  it('should equal a plain list with the forced elements', () => {
    const l = LazyList.from<number>([lazy(() => 1), 2]);
    const plain = PList.of(1, 2);
    expect(l.equals(plain)).toBe(true);
    expect(plain.equals(l)).toBe(true);
    expect(l.hashCode()).toBe(plain.hashCode());
  });

  it('should rewrap a transient', () => {
    const t = LazyList.empty<number>().transient();
    t.push(lazy(() => 4));
    expect(LazyList.from(t).readyAll().isReady(0)).toBe(true);
  });
});
