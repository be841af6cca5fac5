import type { CacheKey } from "./cache";
import type { CacheStats, PrepareResult, TranslationContext } from "./types";

/**
 * Contract every backing engine (on-device model, cloud API, stub) satisfies.
 */
export interface Translator {
  /** Rejects with a TranslationError when no output can be produced */
  translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    context: TranslationContext
  ): Promise<string>;
  /** May do I/O (e.g. a model registry lookup) but never downloads */
  isReady(sourceLang: string, targetLang: string): Promise<boolean>;
  /** Resolves to ready immediately when no warm-up is needed */
  prepare(sourceLang: string, targetLang: string): Promise<PrepareResult>;
  /** Idempotent */
  close(): Promise<void>;
}

export interface TranslationCache {
  get(key: CacheKey): Promise<string | null>;
  put(key: CacheKey, value: string): Promise<void>;
  remove(key: CacheKey): Promise<void>;
  clear(): Promise<void>;
  size(): Promise<number>;
  getStats(): CacheStats;
}

/**
 * String-keyed string storage backing the persistent cache tier.
 * Durability is best effort across restarts, not transactional.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  getAll(): Promise<Map<string, string>>;
  set(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
  clear(): Promise<void>;
  count(): Promise<number>;
}

/**
 * Model registry plus inference for an on-device engine.
 * Language codes are the backend's own (see supportedLanguages).
 */
export interface TranslationModelBackend {
  readonly supportedLanguages: readonly string[];
  isModelDownloaded(language: string): Promise<boolean>;
  downloadModel(language: string, onProgress: (progress: number) => void): Promise<void>;
  deleteModel(language: string): Promise<void>;
  listDownloadedModels(): Promise<string[]>;
  translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string>;
  close?(): Promise<void>;
}
