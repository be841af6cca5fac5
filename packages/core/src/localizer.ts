import { EventEmitter } from "node:events";
import pLimit from "p-limit";
import type { CachePolicy, SameLanguageMatch, TranslationContext } from "@repo/shared";
import type { KeyValueStore, TranslationCache, Translator } from "./interfaces";
import type { PrepareResult } from "./types";
import { PREPARE_READY, prepareFailed } from "./types";
import { DEFAULT_CACHE_POLICY } from "./cache";
import { buildTranslationCache } from "./cache-factory";
import { CachingTranslator } from "./implementations/caching-translator";
import { UnsupportedLanguageError, toTranslationError } from "./errors";
import { isSameLanguage, resolveSupportedLanguage } from "./utils/language";

export interface LocalizerOptions {
  /** Language the application's own text is written in */
  sourceLanguage: string;
  /** Languages setLanguage() accepts; empty = any */
  supportedLanguages?: readonly string[];
  /** Defaults to the runtime locale, then the first supported language */
  initialLanguage?: string;
  translator?: Translator | null;
  cachePolicy?: CachePolicy;
  /** Overrides the cache built from cachePolicy */
  cache?: TranslationCache;
  /** Substrate for the persistent tier when cachePolicy.persist is set */
  persistentStore?: KeyValueStore;
  protectPlaceholders?: boolean;
  sameLanguageMatch?: SameLanguageMatch;
  /** Parallel delegate calls in translateMany() */
  batchConcurrency?: number;
  debug?: boolean;
}

export interface LocalizerCacheStats {
  entries: number;
  memoryEntries: number;
  hits: number;
  misses: number;
}

export type LanguageChangeListener = (language: string, previous: string) => void;

/**
 * Application-facing entry point: holds the source language, the current
 * target language and the cached, placeholder-safe translator for that pair.
 *
 * translate() never rejects. When no translation is possible the original
 * text comes back and the failure is logged.
 *
 * ```ts
 * const localizer = new Localizer({
 *   sourceLanguage: "en",
 *   supportedLanguages: ["en", "es", "fr"],
 *   translator: new GoogleTranslateApiKeyTranslator(apiKey),
 * });
 * localizer.setLanguage("es");
 * await localizer.translate("Hello, {name}!");
 * ```
 */
export class Localizer {
  private readonly events = new EventEmitter();
  private readonly sourceLanguage: string;
  private readonly supportedLanguages: readonly string[];
  private readonly cachePolicy: CachePolicy;
  private readonly cache: TranslationCache;
  private readonly protectPlaceholders: boolean;
  private readonly sameLanguageMatch: SameLanguageMatch;
  private readonly batchConcurrency: number;
  private readonly debug: boolean;
  private translator: CachingTranslator | null = null;
  private language: string;

  constructor(options: LocalizerOptions) {
    this.sourceLanguage = options.sourceLanguage;
    this.supportedLanguages = [...(options.supportedLanguages ?? [])];
    this.cachePolicy = options.cachePolicy ?? { ...DEFAULT_CACHE_POLICY };
    this.protectPlaceholders = options.protectPlaceholders ?? true;
    this.sameLanguageMatch = options.sameLanguageMatch ?? "exact";
    this.batchConcurrency = Math.max(1, Math.floor(options.batchConcurrency ?? 4));
    this.debug = options.debug ?? false;
    this.cache =
      options.cache ?? buildTranslationCache(this.cachePolicy, options.persistentStore, this.debug);
    this.language = this.resolveInitialLanguage(options.initialLanguage);

    if (options.translator) {
      this.setTranslator(options.translator);
    }

    if (this.debug) {
      console.log(
        `[Localizer] Initialized: source=${this.sourceLanguage}, language=${this.language}, ` +
          `${this.supportedLanguages.length} supported languages`
      );
    }
  }

  getSourceLanguage(): string {
    return this.sourceLanguage;
  }

  getSupportedLanguages(): string[] {
    return [...this.supportedLanguages];
  }

  getLanguage(): string {
    return this.language;
  }

  /**
   * Switches the target language. Returns the supported tag actually applied
   * ("es-MX" resolves to "es" when only "es" is supported).
   */
  setLanguage(languageTag: string): string {
    const resolved = this.resolveLanguage(languageTag);
    if (!resolved) {
      throw new UnsupportedLanguageError(languageTag);
    }

    const previous = this.language;
    this.language = resolved;
    if (resolved !== previous) {
      if (this.debug) {
        console.log(`[Localizer] Language set to: ${resolved}`);
      }
      this.events.emit("languageChange", resolved, previous);
    }
    return resolved;
  }

  onLanguageChange(listener: LanguageChangeListener): () => void {
    this.events.on("languageChange", listener);
    return () => {
      this.events.off("languageChange", listener);
    };
  }

  /**
   * Wraps a backing translator with this localizer's cache. The previous
   * translator is not closed; its owner decides.
   */
  setTranslator(translator: Translator): void {
    this.translator = new CachingTranslator(translator, {
      cache: this.cache,
      protectPlaceholders: this.protectPlaceholders,
      cacheFailures: this.cachePolicy.cacheFailures,
      failureTtlMs: this.cachePolicy.ttlMs,
      debug: this.debug,
    });
  }

  hasTranslator(): boolean {
    return this.translator !== null;
  }

  async translate(text: string, context: TranslationContext = "UI"): Promise<string> {
    const translator = this.translator;
    if (!translator) {
      if (this.debug) {
        console.warn("[Localizer] No translator configured, returning original text");
      }
      return text;
    }

    const targetLanguage = this.language;
    if (isSameLanguage(this.sourceLanguage, targetLanguage, this.sameLanguageMatch)) {
      return text;
    }

    try {
      return await translator.translate(text, this.sourceLanguage, targetLanguage, context);
    } catch (error) {
      console.error(
        `[Localizer] Translation failed (${this.sourceLanguage}->${targetLanguage}, ${context}, ${text.length} chars):`,
        error
      );
      return text;
    }
  }

  /**
   * Translates a batch for the current language, preserving order.
   */
  async translateMany(texts: readonly string[], context: TranslationContext = "UI"): Promise<string[]> {
    const limit = pLimit(this.batchConcurrency);
    return Promise.all(texts.map((text) => limit(() => this.translate(text, context))));
  }

  async isReady(): Promise<boolean> {
    const translator = this.translator;
    if (!translator) return false;
    if (isSameLanguage(this.sourceLanguage, this.language, this.sameLanguageMatch)) return true;
    return translator.isReady(this.sourceLanguage, this.language);
  }

  /**
   * Warms the translator up for the current pair. Never rejects.
   */
  async prepare(): Promise<PrepareResult> {
    const translator = this.translator;
    if (!translator) return PREPARE_READY;
    if (isSameLanguage(this.sourceLanguage, this.language, this.sameLanguageMatch)) return PREPARE_READY;

    try {
      return await translator.prepare(this.sourceLanguage, this.language);
    } catch (error) {
      console.error(`[Localizer] Preparation failed for ${this.sourceLanguage}->${this.language}:`, error);
      return prepareFailed(toTranslationError(error, "Preparation failed"));
    }
  }

  async clearCache(): Promise<void> {
    if (this.translator) {
      await this.translator.clearCache();
    } else {
      await this.cache.clear();
    }
  }

  async getCacheStats(): Promise<LocalizerCacheStats> {
    const entries = await this.cache.size();
    const { hits, misses, memoryEntries } = this.cache.getStats();
    return { entries, memoryEntries, hits, misses };
  }

  getCachePolicy(): CachePolicy {
    return { ...this.cachePolicy };
  }

  /**
   * Closes the backing translator and drops listeners.
   */
  async close(): Promise<void> {
    const translator = this.translator;
    this.translator = null;
    this.events.removeAllListeners();
    if (translator) {
      await translator.close();
    }
  }

  private resolveLanguage(tag: string): string | null {
    if (this.supportedLanguages.length === 0) {
      return tag.trim() || null;
    }
    return resolveSupportedLanguage(tag, this.supportedLanguages);
  }

  private resolveInitialLanguage(initial?: string): string {
    const candidates = [initial, Intl.DateTimeFormat().resolvedOptions().locale];
    for (const candidate of candidates) {
      if (!candidate) continue;
      const resolved = this.resolveLanguage(candidate);
      if (resolved) return resolved;
    }
    return this.supportedLanguages[0] ?? this.sourceLanguage;
  }
}
