import { describe, it, expect } from 'vitest';
import { LazyError } from './errors';
import { hashKey } from './internal';
import { Lazy, isLazy, lazy, showLazy, unlazy } from './lazy';

describe('Lazy', () => {
  it('should evaluate at most once', () => {
    let calls = 0;
    const value = lazy((a: number, b: number) => {
      calls++;
      return a + b;
    }, 2, 3);

    expect(calls).toBe(0);
    expect(value.isEvaluated()).toBe(false);
    for (let i = 0; i < 5; i++) expect(value.get()).toBe(5);
    expect(calls).toBe(1);
    expect(value.isEvaluated()).toBe(true);
  });

  it('should retry after a failure', () => {
    let attempts = 0;
    const flaky = new Lazy(() => {
      attempts++;
      if (attempts < 3) throw new Error('boom');
      return 'ok';
    });

    for (let i = 0; i < 2; i++) {
      try {
        flaky.get();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(LazyError);
        if (err instanceof LazyError) {
          expect(err.cause).toBeInstanceOf(Error);
          expect(err.cause instanceof Error ? err.cause.message : '').toBe('boom');
        }
      }
      expect(flaky.isEvaluated()).toBe(false);
    }

    expect(flaky.get()).toBe('ok');
    expect(flaky.get()).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('should name the function and its arguments when it fails', () => {
    function fail(n: number, s: string): string {
      throw new Error(`${s}${n}`);
    }
    expect(() => new Lazy(fail, 1, 'x').get()).toThrow('lazy raised error during call to fail(1, "x")');
  });

  it('should detect a value that depends on itself', () => {
    const self: Lazy<number> = new Lazy(() => self.get() + 1);
    expect(() => self.get()).toThrow(new LazyError('<anonymous>() depends on its own value'));
    expect(self.isEvaluated()).toBe(false);
  });

  it('should cache falsy results', () => {
    let calls = 0;
    const nothing = lazy(() => {
      calls++;
      return undefined;
    });
    nothing.get();
    nothing.get();
    expect(calls).toBe(1);
  });

  it('should compare and hash by computed value', () => {
    const three = lazy(() => 3);
    expect(three.equals(3)).toBe(true);
    expect(three.equals(lazy(() => 3))).toBe(true);
    expect(three.equals(4)).toBe(false);
    expect(three.hashCode()).toBe(hashKey(3));
  });

  it('should describe its state without forcing', () => {
    const v = lazy(() => 'x');
    expect(v.toString()).toBe('lazy(waiting)');
    expect(v.isEvaluated()).toBe(false);
    v.get();
    expect(v.toString()).toBe('lazy(ready)');
  });

  it('should preview unevaluated lazies as a placeholder and evaluated ones by value', () => {
    const v = lazy(() => 'x');
    expect(showLazy(v)).toBe('<lazy>');
    expect(v.isEvaluated()).toBe(false);
    v.get();
    expect(showLazy(v)).toBe('"x"');
    expect(showLazy(5)).toBe('5');
  });

  it('should unwrap only lazy values', () => {
    expect(unlazy(lazy(() => 7))).toBe(7);
    expect(unlazy(7)).toBe(7);
    expect(isLazy(lazy(() => 7))).toBe(true);
    expect(isLazy(7)).toBe(false);
  });
});
