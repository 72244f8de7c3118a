/**
 * Collapses concurrent calls for the same key into one in-flight promise.
 * Loaders use it so that parallel evaluations on a cold cache issue a
 * single request per namespace key.
 */
export class RequestDeduplicator<T> {
  private inflight: Map<string, Promise<T>> = new Map();

  dedupe(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const promise = fn().finally(() => {
      this.inflight.delete(key);
    });

    this.inflight.set(key, promise);
    return promise;
  }

  isInflight(key: string): boolean {
    return this.inflight.has(key);
  }

  clear(): void {
    this.inflight.clear();
  }
}
