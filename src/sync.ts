/**
 * Promise primitives shared by the channel: a settle-once deferred, the
 * single-slot closing signal, a FIFO write lock and a timeout wrapper.
 */

import { OperationTimeoutError } from './errors';

/**
 * A promise together with its settle functions. Settling is one-shot;
 * later calls are ignored.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private resolveFn: (value: T) => void = () => undefined;
  private rejectFn: (reason: unknown) => void = () => undefined;
  private settled = false;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
  }

  get done(): boolean {
    return this.settled;
  }

  resolve(value: T): void {
    if (this.settled) return;
    this.settled = true;
    this.resolveFn(value);
  }

  reject(reason: unknown): void {
    if (this.settled) return;
    this.settled = true;
    this.rejectFn(reason);
  }
}

// Waiters observe the rejection through `promise`; nobody waiting is not an error.
const ignoreRejection = (): void => undefined;

/**
 * Holds exactly one live completion signal. `replace` rejects the current
 * signal if it is still pending and installs a fresh one.
 */
export class CompletionSignal {
  private current: Deferred<void> = CompletionSignal.allocate();

  private static allocate(): Deferred<void> {
    const deferred = new Deferred<void>();
    deferred.promise.catch(ignoreRejection);
    return deferred;
  }

  get promise(): Promise<void> {
    return this.current.promise;
  }

  get done(): boolean {
    return this.current.done;
  }

  resolve(): void {
    this.current.resolve();
  }

  reject(error: unknown): void {
    this.current.reject(error);
  }

  replace(error: unknown): void {
    if (! this.current.done) {
      this.current.reject(error);
    }
    this.current = CompletionSignal.allocate();
  }
}

/**
 * Mutual exclusion for async sections. Callers run in arrival order.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const gate = new Deferred<void>();
    const previous = this.tail;
    this.tail = gate.promise;
    this.holders++;

    await previous;
    try {
      return await fn();
    } finally {
      this.holders--;
      gate.resolve();
    }
  }
}

/**
 * Rejects with an OperationTimeoutError if the promise has not settled
 * within `timeout` milliseconds. Without a timeout the promise is returned as is.
 */
export const withTimeout = <T>(promise: Promise<T>, timeout: number | undefined, operation: string): Promise<T> => {
  if (timeout === undefined) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new OperationTimeoutError(operation, timeout)), timeout);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
};
