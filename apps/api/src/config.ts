import dotenv from "dotenv";
import {
  CachePersistenceSchema,
  CachePolicySchema,
  SameLanguageMatchSchema,
  TranslationProviderSchema,
} from "@repo/shared";

dotenv.config();

export type AppConfig = typeof config;

function flag(value: string | undefined, fallback: boolean = false): boolean {
  if (value === undefined || value === "") return fallback;
  return value === "1" || value === "true";
}

function list(value: string | undefined): string[] {
  return (value || "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

const cacheTtlDays = parseInt(process.env.CACHE_TTL_DAYS || "30", 10);

export const config = {
  port: parseInt(process.env.PORT || "3001", 10),
  corsOrigin: process.env.CORS_ORIGIN || "http://localhost:5173",

  sourceLanguage: process.env.SOURCE_LANGUAGE || "en",
  supportedLanguages: list(process.env.SUPPORTED_LANGUAGES || "en,es,fr,de"),
  defaultLanguage: process.env.DEFAULT_LANGUAGE || "",

  translationProvider: TranslationProviderSchema.parse(process.env.TRANSLATION_PROVIDER || "stub"),
  googleCloudApiKey: process.env.GOOGLE_CLOUD_API_KEY || "",
  protectPlaceholders: flag(process.env.PROTECT_PLACEHOLDERS, true),
  sameLanguageMatch: SameLanguageMatchSchema.parse(process.env.SAME_LANGUAGE_MATCH || "exact"),
  translateBatchConcurrency: parseInt(process.env.TRANSLATE_BATCH_CONCURRENCY || "4", 10),

  // Google Translate retry settings
  translatorRetryMax: parseInt(process.env.TRANSLATOR_RETRY_MAX || "3", 10),
  translatorBackoffMinMs: parseInt(process.env.TRANSLATOR_BACKOFF_MIN_MS || "500", 10),
  translatorBackoffMaxMs: parseInt(process.env.TRANSLATOR_BACKOFF_MAX_MS || "8000", 10),

  cachePersistence: CachePersistenceSchema.parse(process.env.CACHE_PERSISTENCE || "none"),
  // CACHE_TTL_DAYS=0 keeps entries forever
  cachePolicy: CachePolicySchema.parse({
    maxMemoryEntries: parseInt(process.env.CACHE_MAX_ENTRIES || "1000", 10),
    persist: (process.env.CACHE_PERSISTENCE || "none") !== "none",
    ttlMs: cacheTtlDays > 0 ? cacheTtlDays * 24 * 60 * 60 * 1000 : null,
    cacheFailures: flag(process.env.CACHE_FAILURES),
  }),
  mongodbUri: process.env.MONGODB_URI || "mongodb://localhost:27017/translations",
  redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
  redisHashKey: process.env.REDIS_CACHE_KEY || "translation-cache",

  debugCache: flag(process.env.DEBUG_CACHE),
  debugGoogle: flag(process.env.DEBUG_GOOGLE),
  debugTranslation: flag(process.env.DEBUG_TRANSLATION),
  debugRedis: flag(process.env.DEBUG_REDIS),
};
