import pLimit from "p-limit";
import { PersistedCacheEntrySchema } from "@repo/shared";
import type { PersistedCacheEntry } from "@repo/shared";
import type { KeyValueStore, TranslationCache } from "../interfaces";
import type { CacheStats } from "../types";
import type { CacheKey } from "../cache";
import { toStorageKey } from "../cache";
import { LruMap } from "../utils/lru-map";

export interface PersistentTranslationCacheOptions {
  maxMemoryEntries?: number;
  ttlMs?: number | null;
  debug?: boolean;
  now?: () => number;
}

/**
 * Two-tier cache: an LRU memory tier in front of a KeyValueStore.
 *
 * The store is the source of truth for size(). Both tiers sit behind the same
 * lock so a concurrent put and get never see them diverge. A failing or corrupt
 * store read is treated as a miss; failing writes propagate.
 */
export class PersistentTranslationCache implements TranslationCache {
  private readonly memory: LruMap<string>;
  private readonly lock = pLimit(1);
  private readonly debug: boolean;
  private readonly now: () => number;
  private hitCount: number = 0;
  private missCount: number = 0;

  constructor(
    private readonly store: KeyValueStore,
    options: PersistentTranslationCacheOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.memory = new LruMap<string>(Math.max(0, Math.floor(options.maxMemoryEntries ?? 500)), {
      ttlMs: options.ttlMs,
      now: this.now,
    });
    this.debug = options.debug ?? false;
  }

  get(key: CacheKey): Promise<string | null> {
    return this.lock(async () => {
      const storageKey = toStorageKey(key);

      const cached = this.memory.get(storageKey);
      if (cached) {
        this.hitCount++;
        return cached.value;
      }

      const persisted = await this.readPersisted(storageKey);
      if (!persisted) {
        this.missCount++;
        if (this.debug) {
          console.log(`[Cache] MISS: ${key.sourceLang}->${key.targetLang}`);
        }
        return null;
      }

      this.memory.set(storageKey, persisted.value, persisted.createdAt);
      this.hitCount++;
      if (this.debug) {
        console.log(`[Cache] HIT (persistent): ${key.sourceLang}->${key.targetLang}`);
      }
      return persisted.value;
    });
  }

  put(key: CacheKey, value: string): Promise<void> {
    return this.lock(async () => {
      const storageKey = toStorageKey(key);
      const entry: PersistedCacheEntry = { value, createdAt: this.now() };

      // Memory only takes entries the store has accepted
      await this.store.set(storageKey, JSON.stringify(entry));
      this.memory.set(storageKey, value, entry.createdAt);
    });
  }

  remove(key: CacheKey): Promise<void> {
    return this.lock(async () => {
      const storageKey = toStorageKey(key);
      this.memory.delete(storageKey);
      await this.store.remove(storageKey);
    });
  }

  clear(): Promise<void> {
    return this.lock(async () => {
      this.memory.clear();
      await this.store.clear();
    });
  }

  size(): Promise<number> {
    return this.lock(() => this.store.count());
  }

  memorySize(): Promise<number> {
    return this.lock(async () => this.memory.size);
  }

  /**
   * Loads persisted entries into the memory tier, up to its capacity.
   * Returns how many were loaded.
   */
  preload(): Promise<number> {
    return this.lock(async () => {
      const all = await this.store.getAll();
      let loaded = 0;

      for (const [storageKey, raw] of all) {
        if (loaded >= this.memory.capacity) break;
        const entry = this.parseEntry(storageKey, raw);
        if (!entry || this.memory.isExpired(entry)) continue;
        this.memory.set(storageKey, entry.value, entry.createdAt);
        loaded++;
      }

      if (this.debug) {
        console.log(`[Cache] Preloaded ${loaded} of ${all.size} persisted entries`);
      }
      return loaded;
    });
  }

  getStats(): CacheStats {
    return {
      hits: this.hitCount,
      misses: this.missCount,
      memoryEntries: this.memory.size,
    };
  }

  resetStats(): void {
    this.hitCount = 0;
    this.missCount = 0;
  }

  private async readPersisted(storageKey: string): Promise<PersistedCacheEntry | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(storageKey);
    } catch (error) {
      console.error(`[Cache] Persistent read failed for ${storageKey}:`, error);
      return null;
    }
    if (raw === null) return null;

    const entry = this.parseEntry(storageKey, raw);
    if (!entry) return null;

    if (this.memory.isExpired(entry)) {
      await this.store.remove(storageKey).catch((error: unknown) => {
        console.error(`[Cache] Failed to drop expired entry ${storageKey}:`, error);
      });
      return null;
    }
    return entry;
  }

  private parseEntry(storageKey: string, raw: string): PersistedCacheEntry | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = undefined;
    }

    const parsed = PersistedCacheEntrySchema.safeParse(json);
    if (!parsed.success) {
      if (this.debug) {
        console.warn(`[Cache] Ignoring malformed persisted entry ${storageKey}`);
      }
      return null;
    }
    return parsed.data;
  }
}
