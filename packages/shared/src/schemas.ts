import { z } from "zod";
import { TRANSLATION_CONTEXTS } from "./types";

export const TranslationContextSchema = z.enum(TRANSLATION_CONTEXTS);

// BCP 47-ish: "en", "en-US", "zh-Hant-TW", "es_419"
export const LanguageTagSchema = z
  .string()
  .trim()
  .min(2)
  .max(35)
  .regex(/^[A-Za-z]{2,8}(?:[-_][A-Za-z0-9]{1,8})*$/, "Invalid language tag");

export const TranslationProviderSchema = z.enum(["stub", "google_api_key"]);

export const CachePersistenceSchema = z.enum(["none", "mongo", "redis"]);

export const SameLanguageMatchSchema = z.enum(["exact", "prefix"]);

export const CachePolicySchema = z.object({
  maxMemoryEntries: z.number().int().nonnegative().default(1000),
  persist: z.boolean().default(true),
  ttlMs: z.number().int().positive().nullable().default(null),
  cacheFailures: z.boolean().default(false),
});

export const PersistedCacheEntrySchema = z.object({
  value: z.string(),
  createdAt: z.number().int().nonnegative(),
});

export const TranslateRequestSchema = z.object({
  text: z.string().max(20000),
  context: TranslationContextSchema.optional().default("UI"),
});

export const TranslateBatchRequestSchema = z.object({
  texts: z.array(z.string().max(20000)).min(1).max(500),
  context: TranslationContextSchema.optional().default("UI"),
});

export const SetLanguageRequestSchema = z.object({
  language: LanguageTagSchema,
});
