import pLimit from "p-limit";
import type { TranslationCache } from "../interfaces";
import type { CacheStats } from "../types";
import type { CacheKey } from "../cache";
import { toStorageKey } from "../cache";
import { LruMap } from "../utils/lru-map";

export interface LruTranslationCacheOptions {
  ttlMs?: number | null;
  debug?: boolean;
  now?: () => number;
}

/**
 * In-memory translation cache with access-order (LRU) eviction.
 * Every operation runs under one lock, so a promoting get racing an
 * evicting put always leaves the map consistent.
 */
export class LruTranslationCache implements TranslationCache {
  private readonly entries: LruMap<string>;
  private readonly lock = pLimit(1);
  private readonly debug: boolean;
  private hitCount: number = 0;
  private missCount: number = 0;

  constructor(maxEntries: number = 1000, options: LruTranslationCacheOptions = {}) {
    this.entries = new LruMap<string>(Math.max(0, Math.floor(maxEntries)), {
      ttlMs: options.ttlMs,
      now: options.now,
    });
    this.debug = options.debug ?? false;
  }

  get(key: CacheKey): Promise<string | null> {
    return this.lock(async () => {
      const entry = this.entries.get(toStorageKey(key));
      if (!entry) {
        this.missCount++;
        if (this.debug) {
          console.log(`[Cache] MISS: ${key.sourceLang}->${key.targetLang}`);
        }
        return null;
      }

      this.hitCount++;
      if (this.debug) {
        console.log(`[Cache] HIT: ${key.sourceLang}->${key.targetLang}`);
      }
      return entry.value;
    });
  }

  put(key: CacheKey, value: string): Promise<void> {
    return this.lock(async () => {
      this.entries.set(toStorageKey(key), value);
    });
  }

  remove(key: CacheKey): Promise<void> {
    return this.lock(async () => {
      this.entries.delete(toStorageKey(key));
    });
  }

  clear(): Promise<void> {
    return this.lock(async () => {
      this.entries.clear();
    });
  }

  size(): Promise<number> {
    return this.lock(async () => this.entries.size);
  }

  getStats(): CacheStats {
    return {
      hits: this.hitCount,
      misses: this.missCount,
      memoryEntries: this.entries.size,
    };
  }

  resetStats(): void {
    this.hitCount = 0;
    this.missCount = 0;
  }
}
