import type { Executor } from '../types/index.js';

/**
 * Default delivery context for completion handlers: the next turn of the
 * event loop, after pending I/O callbacks.
 */
export const mainExecutor: Executor = (work) => {
  setImmediate(work);
};

/**
 * Runs work synchronously in the caller's stack.
 */
export const immediateExecutor: Executor = (work) => {
  work();
};

/**
 * Serial queue: work items run one after another in submission order, each
 * on its own microtask. A throwing item does not stop the queue.
 */
export function createSerialExecutor(onError?: (error: unknown) => void): Executor {
  let tail: Promise<void> = Promise.resolve();
  return (work) => {
    tail = tail.then(work).catch((error: unknown) => {
      onError?.(error);
    });
  };
}

/**
 * Runs `work` on `executor` and resolves with its result once it has run.
 */
export function runOn<T>(executor: Executor, work: () => T | Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    executor(() => {
      try {
        Promise.resolve(work()).then(resolve, reject);
      } catch (error) {
        reject(error);
      }
    });
  });
}
