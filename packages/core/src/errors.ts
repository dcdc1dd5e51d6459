/**
 * Errors raised by misuse of the collections. Lookup misses are never errors.
 */

/** A transient was used after `freeze()` / `persistent()` closed it. */
export class TransientClosedError extends Error {
  constructor(what: string) {
    super(`${what} has been frozen and can no longer be used`);
    this.name = 'TransientClosedError';
  }
}

/** A transient collection changed while one of its iterators was live. */
export class ConcurrentModificationError extends Error {
  constructor(what: string) {
    super(`${what} changed during iteration`);
    this.name = 'ConcurrentModificationError';
  }
}

/**
 * Evaluating a lazy value failed. The error thrown by the thunk, if any, is
 * attached as `cause`.
 */
export class LazyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LazyError';
  }
}
