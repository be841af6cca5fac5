import type { CachePolicy } from "@repo/shared";
import type { KeyValueStore, TranslationCache } from "./interfaces";
import { LruTranslationCache } from "./implementations/lru-translation-cache";
import { PersistentTranslationCache } from "./implementations/persistent-translation-cache";

/**
 * Picks the cache shape for a policy. A persistent policy without a store
 * falls back to memory only.
 */
export function buildTranslationCache(
  policy: CachePolicy,
  store?: KeyValueStore,
  debug: boolean = false
): TranslationCache {
  if (policy.persist) {
    if (store) {
      return new PersistentTranslationCache(store, {
        maxMemoryEntries: policy.maxMemoryEntries,
        ttlMs: policy.ttlMs,
        debug,
      });
    }
    console.warn("[Cache] Persistence requested without a key-value store, using memory only");
  }

  return new LruTranslationCache(policy.maxMemoryEntries, {
    ttlMs: policy.ttlMs,
    debug,
  });
}
