/**
 * Lazy - deferred, memoized value
 */

import { LazyError } from './errors';
import {
  formatSeq,
  hashKey,
  keyEquals,
  show,
  type Hashable,
} from './internal';

type LazyState<T> =
  | { ready: false; thunk: () => T; name: string; args: readonly unknown[] }
  | { ready: true; value: T };

/**
 * A value computed on first use.
 *
 * `new Lazy(fn, ...args)` captures `fn` and its complete argument list. The
 * first `get()` calls `fn(...args)`, caches the result and drops `fn` and
 * `args`; every later `get()` returns the cached result without calling
 * `fn` again. Evaluation runs to completion synchronously, so no other
 * reader can observe a half-evaluated value.
 *
 * If `fn` throws, `get()` throws a {@link LazyError} whose `cause` is the
 * original error. Failures are not cached: the next `get()` calls `fn`
 * again.
 *
 * Equality and hashing force evaluation and compare the computed values.
 * Lazy values are meant to be stored as collection values, not keys.
 */
export class Lazy<T, A extends readonly unknown[] = readonly unknown[]> implements Hashable {
  private state: LazyState<T>;
  private evaluating = false;

  constructor(fn: (...args: A) => T, ...args: A) {
    if (typeof fn !== 'function') {
      throw new TypeError(`lazy(${String(fn)}) must be given a function`);
    }
    this.state = { ready: false, thunk: () => fn(...args), name: fn.name || '<anonymous>', args };
  }

  isEvaluated(): boolean {
    return this.state.ready;
  }

  get(): T {
    const state = this.state;
    if (state.ready) return state.value;
    if (this.evaluating) {
      throw new LazyError(`${describe(state.name, state.args)} depends on its own value`);
    }
    this.evaluating = true;
    try {
      const value = state.thunk();
      this.state = { ready: true, value };
      return value;
    } catch (err) {
      if (err instanceof LazyError && err.cause === undefined) throw err;
      throw new LazyError(`lazy raised error during call to ${describe(state.name, state.args)}`, {
        cause: err,
      });
    } finally {
      this.evaluating = false;
    }
  }

  hashCode(): number {
    return hashKey(this.get());
  }

  equals(other: unknown): boolean {
    return keyEquals(this.get(), unlazy(other));
  }

  toString(): string {
    return `lazy(${this.state.ready ? 'ready' : 'waiting'})`;
  }
}

function describe(name: string, args: readonly unknown[]): string {
  return `${name}(${formatSeq(args, show)})`;
}

export function lazy<T, A extends readonly unknown[]>(fn: (...args: A) => T, ...args: A): Lazy<T, A> {
  return new Lazy(fn, ...args);
}

export function isLazy(value: unknown): value is Lazy<unknown> {
  return value instanceof Lazy;
}

/** Forces `value` if it is lazy, otherwise returns it unchanged. */
export function unlazy<T>(value: T | Lazy<T>): T {
  return value instanceof Lazy ? value.get() : value;
}

/**
 * Renders unevaluated lazies as `<lazy>` without forcing them. An evaluated
 * lazy renders as its value, so a preview shows what is already known.
 */
export function showLazy(value: unknown): string {
  if (value instanceof Lazy) return value.isEvaluated() ? show(value.get()) : '<lazy>';
  return show(value);
}
