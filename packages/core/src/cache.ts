import type { CachePolicy, TranslationContext } from "@repo/shared";
import { simpleHash } from "./utils/hash";

/**
 * Identity of one cached translation. Holds a hash of the original (unmasked)
 * text, never the text itself.
 */
export interface CacheKey {
  readonly sourceLang: string;
  readonly targetLang: string;
  readonly contentHash: string;
  readonly context: TranslationContext;
}

export function createCacheKey(
  text: string,
  sourceLang: string,
  targetLang: string,
  context: TranslationContext
): CacheKey {
  return Object.freeze({
    sourceLang: sourceLang.toLowerCase(),
    targetLang: targetLang.toLowerCase(),
    contentHash: simpleHash(text),
    context,
  });
}

/**
 * `{sourceLang}_{targetLang}_{context}_{hash}`; not reversible to the text.
 */
export function toStorageKey(key: CacheKey): string {
  return `${key.sourceLang}_${key.targetLang}_${key.context}_${key.contentHash}`;
}

export function isSameCacheKey(a: CacheKey, b: CacheKey): boolean {
  return (
    a.sourceLang === b.sourceLang &&
    a.targetLang === b.targetLang &&
    a.contentHash === b.contentHash &&
    a.context === b.context
  );
}

export const DEFAULT_CACHE_POLICY: Readonly<CachePolicy> = Object.freeze({
  maxMemoryEntries: 1000,
  persist: true,
  ttlMs: null,
  cacheFailures: false,
});

export const MEMORY_ONLY_CACHE_POLICY: Readonly<CachePolicy> = Object.freeze({
  ...DEFAULT_CACHE_POLICY,
  persist: false,
});

/** Every lookup misses */
export const NO_CACHE_POLICY: Readonly<CachePolicy> = Object.freeze({
  ...DEFAULT_CACHE_POLICY,
  maxMemoryEntries: 0,
  persist: false,
});
