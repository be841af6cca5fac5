import type { TranslationCache, Translator } from "../interfaces";
import type { PrepareResult, TranslationContext } from "../types";
import { createCacheKey, toStorageKey } from "../cache";
import { PlaceholderMasker } from "../placeholders";
import { UnsupportedLanguageError } from "../errors";
import { LruMap } from "../utils/lru-map";
import { LruTranslationCache } from "./lru-translation-cache";

export interface CachingTranslatorOptions {
  cache?: TranslationCache;
  masker?: PlaceholderMasker;
  protectPlaceholders?: boolean;
  /** Remember UnsupportedLanguageError per key instead of asking the delegate again */
  cacheFailures?: boolean;
  /** Lifetime of remembered failures; null = until clearCache() */
  failureTtlMs?: number | null;
  debug?: boolean;
}

const MAX_REMEMBERED_FAILURES = 500;

/**
 * Decorates a Translator with a translation cache and placeholder protection.
 *
 * Results are cached, failures are not: a rejected delegate call leaves no
 * trace, so the next identical call starts from scratch. Concurrent misses on
 * the same key share one delegate call.
 */
export class CachingTranslator implements Translator {
  private readonly cache: TranslationCache;
  private readonly masker: PlaceholderMasker;
  private readonly protectPlaceholders: boolean;
  private readonly debug: boolean;
  private readonly failures: LruMap<UnsupportedLanguageError> | null;
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(
    private readonly delegate: Translator,
    options: CachingTranslatorOptions = {}
  ) {
    this.debug = options.debug ?? false;
    this.cache = options.cache ?? new LruTranslationCache();
    this.masker =
      options.masker ??
      new PlaceholderMasker({
        onDroppedPlaceholders: (dropped) => {
          if (this.debug) {
            console.warn(`[CachingTranslator] Translator dropped ${dropped.length} placeholder(s)`, dropped);
          }
        },
      });
    this.protectPlaceholders = options.protectPlaceholders ?? true;
    this.failures = options.cacheFailures
      ? new LruMap<UnsupportedLanguageError>(MAX_REMEMBERED_FAILURES, { ttlMs: options.failureTtlMs })
      : null;
  }

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    context: TranslationContext
  ): Promise<string> {
    if (sourceLang.toLowerCase() === targetLang.toLowerCase()) {
      return text;
    }

    if (text.trim().length === 0) {
      return text;
    }

    const key = createCacheKey(text, sourceLang, targetLang, context);
    const storageKey = toStorageKey(key);

    const failure = this.failures?.get(storageKey);
    if (failure) {
      throw failure.value;
    }

    const cached = await this.cache.get(key);
    if (cached !== null) {
      return cached;
    }

    const pending = this.inFlight.get(storageKey);
    if (pending) {
      return pending;
    }

    const promise = this.translateAndStore(text, sourceLang, targetLang, context).finally(() => {
      this.inFlight.delete(storageKey);
    });
    this.inFlight.set(storageKey, promise);
    return promise;
  }

  isReady(sourceLang: string, targetLang: string): Promise<boolean> {
    return this.delegate.isReady(sourceLang, targetLang);
  }

  prepare(sourceLang: string, targetLang: string): Promise<PrepareResult> {
    return this.delegate.prepare(sourceLang, targetLang);
  }

  close(): Promise<void> {
    return this.delegate.close();
  }

  async clearCache(): Promise<void> {
    this.failures?.clear();
    await this.cache.clear();
  }

  getCache(): TranslationCache {
    return this.cache;
  }

  private async translateAndStore(
    text: string,
    sourceLang: string,
    targetLang: string,
    context: TranslationContext
  ): Promise<string> {
    const key = createCacheKey(text, sourceLang, targetLang, context);

    let translated: string;
    try {
      translated = this.protectPlaceholders
        ? await this.masker.translateWithProtection(text, (maskedText) =>
            this.delegate.translate(maskedText, sourceLang, targetLang, context)
          )
        : await this.delegate.translate(text, sourceLang, targetLang, context);
    } catch (error) {
      if (this.failures && error instanceof UnsupportedLanguageError) {
        this.failures.set(toStorageKey(key), error);
      }
      if (this.debug) {
        console.warn(`[CachingTranslator] ${sourceLang}->${targetLang} failed:`, error);
      }
      throw error;
    }

    await this.cache.put(key, translated);
    return translated;
  }
}
