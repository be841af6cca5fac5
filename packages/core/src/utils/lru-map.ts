export interface LruEntry<V> {
  value: V;
  createdAt: number;
  lastAccessedAt: number;
}

export interface LruMapOptions {
  /** Entry lifetime in ms; null or undefined = never expire */
  ttlMs?: number | null;
  now?: () => number;
}

/**
 * Access-ordered bounded map. Relies on Map iteration order: re-inserting a key
 * moves it to the end, so the first key is always the least recently used.
 * Not synchronized; callers serialize access.
 */
export class LruMap<V> {
  private readonly entries = new Map<string, LruEntry<V>>();
  private readonly ttlMs: number | null;
  private readonly now: () => number;

  constructor(
    private readonly maxEntries: number,
    options: LruMapOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? null;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  /**
   * Returns the entry and promotes it to most recently used.
   * Expired entries are dropped and reported as absent.
   */
  get(key: string): LruEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }

    entry.lastAccessedAt = this.now();
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(key: string, value: V, createdAt: number = this.now()): void {
    this.entries.delete(key);
    this.entries.set(key, { value, createdAt, lastAccessedAt: this.now() });
    this.evict();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  isExpired(entry: { createdAt: number }): boolean {
    return this.ttlMs !== null && this.now() - entry.createdAt >= this.ttlMs;
  }

  private evict(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
