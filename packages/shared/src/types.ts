export const TRANSLATION_CONTEXTS = [
  "UI",
  "BACKEND",
  "USER_CONTENT",
  "SYSTEM",
] as const;

/**
 * Provenance of a piece of text: interface labels, backend payloads,
 * user-authored content or system messages.
 */
export type TranslationContext = (typeof TRANSLATION_CONTEXTS)[number];

export type TranslationProvider = "stub" | "google_api_key";

export type CachePersistence = "none" | "mongo" | "redis";

export type SameLanguageMatch = "exact" | "prefix";

export interface CachePolicy {
  /** Upper bound on entries held in memory; 0 disables the memory tier */
  maxMemoryEntries: number;
  /** Also write entries to the persistent key-value tier */
  persist: boolean;
  /** Entry lifetime in milliseconds, null = never expire */
  ttlMs: number | null;
  /** Remember unsupported-language failures instead of retrying them */
  cacheFailures: boolean;
}

export interface PersistedCacheEntry {
  value: string;
  createdAt: number;
}

export interface TranslateRequest {
  text: string;
  context?: TranslationContext;
}

export interface TranslateBatchRequest {
  texts: string[];
  context?: TranslationContext;
}

export interface TranslateResponse {
  text: string;
  language: string;
}

export interface TranslateBatchResponse {
  texts: string[];
  language: string;
}

export interface SetLanguageRequest {
  language: string;
}

export interface LocaleDTO {
  language: string;
  sourceLanguage: string;
  supportedLanguages: string[];
}

export interface CacheStatsDTO {
  entries: number;
  memoryEntries: number;
  hits: number;
  misses: number;
  policy: CachePolicy;
  persistence: CachePersistence;
}

export type PrepareResultDTO =
  | { status: "ready" }
  | { status: "downloading"; progress: number }
  | { status: "failed"; error: { kind: string; message: string } };
