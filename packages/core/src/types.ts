import type { TranslationError } from "./errors";

export type {
  TranslationContext,
  CachePolicy,
  SameLanguageMatch,
} from "@repo/shared";

/**
 * Outcome of Translator.prepare(). "ready" and "failed" are terminal;
 * "downloading" is transient and is resolved by polling prepare() again.
 */
export type PrepareResult =
  | { status: "ready" }
  | { status: "downloading"; progress: number }
  | { status: "failed"; error: TranslationError };

export const PREPARE_READY: PrepareResult = { status: "ready" };

export function prepareDownloading(progress: number): PrepareResult {
  return { status: "downloading", progress: clampProgress(progress) };
}

export function prepareFailed(error: TranslationError): PrepareResult {
  return { status: "failed", error };
}

export type DownloadState =
  | { status: "idle" }
  | { status: "downloading"; progress: number; languageTag: string }
  | { status: "complete" }
  | { status: "failed"; error: TranslationError };

export interface CacheStats {
  hits: number;
  misses: number;
  memoryEntries: number;
}

export function clampProgress(progress: number): number {
  if (!Number.isFinite(progress)) return 0;
  return Math.min(1, Math.max(0, progress));
}
