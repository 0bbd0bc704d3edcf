/**
 * Registry of in-flight broker requests.
 *
 * A connection owns a root store and every channel takes a child of it.
 * Bulk rejection walks the subtree of the store it is called on, so failing
 * one channel's requests never touches a sibling channel.
 */

import { Deferred } from './sync';

interface Rejectable {
  reject(reason: unknown): void;
}

export class FutureStore {
  private readonly futures = new Set<Rejectable>();
  private readonly children = new Set<FutureStore>();
  private parent: FutureStore | null;

  constructor(parent: FutureStore | null = null) {
    this.parent = parent;
  }

  /**
   * Number of unsettled futures registered directly on this store.
   */
  get size(): number {
    return this.futures.size;
  }

  /**
   * Creates a future tracked by this store until it settles.
   */
  createFuture<T>(): Deferred<T> {
    const future = new Deferred<T>();
    this.add(future);
    return future;
  }

  add<T>(future: Deferred<T>): void {
    if (future.done) return;

    this.futures.add(future);
    const forget = () => {
      this.futures.delete(future);
    };
    future.promise.then(forget, forget);
  }

  /**
   * Tracks an in-flight request. The returned promise settles with the
   * request, or with the error passed to `rejectAll` if that comes first.
   */
  wrap<T>(promise: Promise<T>): Promise<T> {
    const future = this.createFuture<T>();
    promise.then(
      (value) => future.resolve(value),
      (error: unknown) => future.reject(error)
    );
    return future.promise;
  }

  /**
   * Rejects every pending future of this store and its descendants.
   * Futures registered after the call are not affected.
   */
  rejectAll(error: unknown): void {
    const pending = Array.from(this.futures);
    this.futures.clear();

    for (const future of pending) {
      future.reject(error);
    }

    for (const child of this.children) {
      child.rejectAll(error);
    }
  }

  getChild(): FutureStore {
    const child = new FutureStore(this);
    this.children.add(child);
    return child;
  }

  /**
   * Unlinks this store from its parent.
   */
  detach(): void {
    this.parent?.children.delete(this);
    this.parent = null;
  }
}
