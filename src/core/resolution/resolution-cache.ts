/**
 * Write-once, per-run cache of group resolutions.
 *
 * A key is claimed by storing its pending promise before the lookup starts,
 * so concurrent requests for the same key share a single lookup. A failed
 * lookup releases its claim; the run aborts on it anyway, but a later caller
 * in the same process (tests, library use) may retry.
 */
export class ResolutionCache<V> {
  private readonly entries = new Map<string, Promise<V>>();
  private lookups = 0;

  /**
   * Return the cached value for `key`, or run `resolve` exactly once for it.
   */
  claim(key: string, resolve: () => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    this.lookups++;
    const pending = resolve();
    this.entries.set(key, pending);
    void pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /** Number of lookups actually dispatched */
  get lookupCount(): number {
    return this.lookups;
  }
}
