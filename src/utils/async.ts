/**
 * Async utilities for persona-relay
 */

/**
 * Sleep for a specified duration.
 *
 * With a signal, resolves early (never rejects) as soon as the signal aborts;
 * callers check `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Create a deferred promise
 */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

/**
 * Mutual exclusion lock
 */
export interface Mutex {
  acquire(): Promise<void>;
  release(): void;
  withLock<T>(fn: () => T | Promise<T>): Promise<T>;
  isLocked(): boolean;
}

/**
 * Run a function with a lock (mutex)
 */
export function createMutex(): Mutex {
  let locked = false;
  const queue: (() => void)[] = [];

  async function acquire(): Promise<void> {
    if (!locked) {
      locked = true;
      return;
    }

    return new Promise((resolve) => {
      queue.push(resolve);
    });
  }

  function release(): void {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      locked = false;
    }
  }

  async function withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  return { acquire, release, withLock, isLocked: () => locked };
}
