/**
 * Per-owner memoization keyed by (namespace, key).
 *
 * Entries are never invalidated: the owner is expected to live for one
 * request, so a value computed once stays valid for that lifetime.
 */
export class LookupCache {
  private readonly namespaces = new Map<string, Map<string, unknown>>();

  /**
   * Return the stored value for `(namespace, key)`, computing it with
   * `produce` on first access only.
   */
  public getOrCompute<T>(namespace: string, key: string, produce: () => T): T {
    const bucket = this.bucket(namespace);
    if (bucket.has(key)) {
      return bucket.get(key) as T;
    }
    const value = produce();
    bucket.set(key, value);
    return value;
  }

  /**
   * Async variant: the pending promise itself is memoized so concurrent
   * callers share one producer call. A rejected producer leaves no entry.
   */
  public getOrComputeAsync<T>(
    namespace: string,
    key: string,
    produce: () => Promise<T>,
  ): Promise<T> {
    const bucket = this.bucket(namespace);
    if (bucket.has(key)) {
      return bucket.get(key) as Promise<T>;
    }
    const pending = produce().catch((err: unknown) => {
      if (bucket.get(key) === pending) bucket.delete(key);
      throw err;
    });
    bucket.set(key, pending);
    return pending;
  }

  public has(namespace: string, key: string): boolean {
    return this.namespaces.get(namespace)?.has(key) ?? false;
  }

  /** Entry count for one namespace, or across all of them. */
  public size(namespace?: string): number {
    if (namespace !== undefined) {
      return this.namespaces.get(namespace)?.size ?? 0;
    }
    let total = 0;
    for (const bucket of this.namespaces.values()) total += bucket.size;
    return total;
  }

  private bucket(namespace: string): Map<string, unknown> {
    let bucket = this.namespaces.get(namespace);
    if (!bucket) {
      bucket = new Map<string, unknown>();
      this.namespaces.set(namespace, bucket);
    }
    return bucket;
  }
}
