import type { SameLanguageMatch } from "@repo/shared";

/**
 * Lower-cases a tag and normalizes "_" separators to "-".
 */
export function normalizeLanguageTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/_/g, "-");
}

/** "pt-BR" -> "pt" */
export function baseLanguage(tag: string): string {
  return normalizeLanguageTag(tag).split("-")[0] ?? "";
}

export function isSameLanguage(
  sourceLang: string,
  targetLang: string,
  match: SameLanguageMatch = "exact"
): boolean {
  const source = sourceLang.toLowerCase();
  const target = targetLang.toLowerCase();
  if (source === target) return true;
  if (match === "exact") return false;

  // "en" covers "en-US" but not "eng"
  const s = normalizeLanguageTag(source);
  const t = normalizeLanguageTag(target);
  return t === s || t.startsWith(`${s}-`);
}

/**
 * Picks the supported tag for a requested one: exact (case-insensitive) match
 * first, then a match on the base language in either direction.
 * Returns null when nothing fits.
 */
export function resolveSupportedLanguage(
  requested: string,
  supported: readonly string[]
): string | null {
  const wanted = normalizeLanguageTag(requested);
  if (!wanted) return null;

  const exact = supported.find((tag) => normalizeLanguageTag(tag) === wanted);
  if (exact) return exact;

  const base = baseLanguage(wanted);
  return supported.find((tag) => baseLanguage(tag) === base) ?? null;
}
