import {
  GoogleTranslateApiKeyTranslator,
  Localizer,
  PersistentTranslationCache,
  StubTranslator,
  buildTranslationCache,
} from "@repo/core";
import type { KeyValueStore, Translator } from "@repo/core";
import { config } from "./config";
import type { AppConfig } from "./config";
import { MongoKeyValueStore } from "./cache/mongoKeyValueStore";
import { RedisKeyValueStore } from "./cache/redisKeyValueStore";
import { getRedisConnection } from "./db/redis";

export function buildTranslator(appConfig: AppConfig = config): Translator {
  switch (appConfig.translationProvider) {
    case "google_api_key":
      if (!appConfig.googleCloudApiKey) {
        console.warn("[Translation] GOOGLE_CLOUD_API_KEY is not set, texts will be returned untranslated");
      }
      return new GoogleTranslateApiKeyTranslator(appConfig.googleCloudApiKey, {
        debug: appConfig.debugGoogle,
        retry: {
          retryMax: appConfig.translatorRetryMax,
          backoffMinMs: appConfig.translatorBackoffMinMs,
          backoffMaxMs: appConfig.translatorBackoffMaxMs,
        },
      });
    case "stub":
      return new StubTranslator();
  }
}

export function buildKeyValueStore(appConfig: AppConfig = config): KeyValueStore | undefined {
  switch (appConfig.cachePersistence) {
    case "mongo":
      return new MongoKeyValueStore(appConfig.debugCache);
    case "redis":
      return new RedisKeyValueStore(getRedisConnection(), appConfig.redisHashKey);
    case "none":
      return undefined;
  }
}

/**
 * Builds the process-wide Localizer. A persistent cache is warmed from its
 * store before the first request.
 */
export async function buildLocalizer(
  store: KeyValueStore | undefined,
  appConfig: AppConfig = config
): Promise<Localizer> {
  const cache = buildTranslationCache(appConfig.cachePolicy, store, appConfig.debugCache);
  if (cache instanceof PersistentTranslationCache) {
    const loaded = await cache.preload();
    console.log(`[Cache] Warmed memory tier with ${loaded} entries`);
  }

  return new Localizer({
    sourceLanguage: appConfig.sourceLanguage,
    supportedLanguages: appConfig.supportedLanguages,
    initialLanguage: appConfig.defaultLanguage || undefined,
    translator: buildTranslator(appConfig),
    cachePolicy: appConfig.cachePolicy,
    cache,
    protectPlaceholders: appConfig.protectPlaceholders,
    sameLanguageMatch: appConfig.sameLanguageMatch,
    batchConcurrency: appConfig.translateBatchConcurrency,
    debug: appConfig.debugTranslation,
  });
}
