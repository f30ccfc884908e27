/**
 * One-shot gate. Everything awaiting `wait()` is released when `open()` is
 * called; waits after that resolve immediately. Opening twice is a no-op.
 */
export class Gate {
  private opened = false;
  private release: () => void = () => {};
  private readonly promise: Promise<void>;

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  get isOpen(): boolean {
    return this.opened;
  }

  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.release();
  }

  wait(): Promise<void> {
    return this.promise;
  }
}

/**
 * Promise with its settle functions exposed.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
