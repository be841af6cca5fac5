/**
 * Protects machine-meaningful substrings (format specifiers, brace and template
 * placeholders, markup tags) from a natural-language translator by swapping
 * them for opaque tokens and restoring them afterwards.
 *
 * Tokens look like `⟦PH0⟧`, `⟦PH1⟧`, ... The brackets are U+27E6 / U+27E7,
 * which none of the placeholder patterns can match.
 */

export const TOKEN_OPEN = "⟦";
export const TOKEN_CLOSE = "⟧";

// Translators sometimes pad a token's inside with spaces
const TOKEN_PATTERN = /⟦\s*PH\s*(\d+)\s*⟧/g;
const LITERAL_TOKEN_PATTERN = /^⟦\s*PH\s*\d+\s*⟧$/;

/**
 * Scan order. Token look-alikes already present in the input go first, so the
 * round trip holds for any string.
 */
const PLACEHOLDER_PATTERNS: readonly RegExp[] = [
  TOKEN_PATTERN,
  // %s, %d, %1$s, %2$,d, %1$.2f, %%
  /%(\d+\$)?[,+\-# 0(]*\d*\.?\d*[diouxXeEfFgGaAcsStTbBhHnp%]/g,
  // {name}, {user_name}, {0}; a "${" is left for the template pattern
  /(?<!\$)\{[a-zA-Z_][a-zA-Z0-9_]*\}/g,
  /(?<!\$)\{\d+\}/g,
  // ${name}, ${user.name}
  /\$\{[^}]+\}/g,
  // <b>, </b>, <a href="#">
  /<\/?[a-zA-Z][a-zA-Z0-9]*(?:\s+[^>]*)?>/g,
  // <br/>, <br />
  /<[a-zA-Z][a-zA-Z0-9]*\s*\/>/g,
];

export interface MaskResult {
  maskedText: string;
  /** token -> original substring */
  placeholders: ReadonlyMap<string, string>;
}

export interface PlaceholderMaskerOptions {
  /** Called with the originals whose tokens the translator dropped */
  onDroppedPlaceholders?: (dropped: string[]) => void;
}

export function makeToken(index: number): string {
  return `${TOKEN_OPEN}PH${index}${TOKEN_CLOSE}`;
}

export class PlaceholderMasker {
  private readonly onDroppedPlaceholders?: (dropped: string[]) => void;

  constructor(options: PlaceholderMaskerOptions = {}) {
    this.onDroppedPlaceholders = options.onDroppedPlaceholders;
  }

  mask(text: string): MaskResult {
    let maskedText = text;
    const placeholders = new Map<string, string>();
    let tokenIndex = 0;

    for (const pattern of PLACEHOLDER_PATTERNS) {
      const matches = Array.from(maskedText.matchAll(pattern));

      // Right to left, so earlier offsets stay valid
      for (const match of matches.reverse()) {
        const start = match.index;
        if (start === undefined) continue;

        const original = match[0];
        const end = start + original.length;
        if (maskedText.slice(start, end) !== original) continue;

        const token = makeToken(tokenIndex++);
        placeholders.set(token, original);
        maskedText = maskedText.slice(0, start) + token + maskedText.slice(end);
      }
    }

    return { maskedText, placeholders };
  }

  /**
   * Whole-token replacement, so ⟦PH1⟧ never matches inside ⟦PH10⟧. An original
   * that encloses earlier tokens (a template or tag that contained a format
   * specifier) is expanded in turn. Tokens the translator dropped are not
   * reinserted; duplicated ones are all restored.
   */
  unmask(maskedText: string, placeholders: ReadonlyMap<string, string>): string {
    if (placeholders.size === 0) return maskedText;

    return maskedText.replace(TOKEN_PATTERN, (token: string, index: string) => {
      const original = placeholders.get(makeToken(Number(index)));
      if (original === undefined) return token;
      return LITERAL_TOKEN_PATTERN.test(original) ? original : this.unmask(original, placeholders);
    });
  }

  async translateWithProtection(
    text: string,
    translateFn: (maskedText: string) => Promise<string>
  ): Promise<string> {
    const { maskedText, placeholders } = this.mask(text);
    const translated = await translateFn(maskedText);

    if (this.onDroppedPlaceholders && placeholders.size > 0) {
      const dropped = findDroppedPlaceholders(translated, placeholders);
      if (dropped.length > 0) {
        this.onDroppedPlaceholders(dropped);
      }
    }

    return this.unmask(translated, placeholders);
  }
}

/**
 * Originals whose top-level token is missing from a translated, still-masked
 * text. Tokens nested inside another original are not top level and are skipped.
 */
export function findDroppedPlaceholders(
  translatedMasked: string,
  placeholders: ReadonlyMap<string, string>
): string[] {
  const present = new Set<number>();
  for (const match of translatedMasked.matchAll(TOKEN_PATTERN)) {
    present.add(Number(match[1]));
  }

  const nested = new Set<number>();
  for (const original of placeholders.values()) {
    if (LITERAL_TOKEN_PATTERN.test(original)) continue;
    for (const match of original.matchAll(TOKEN_PATTERN)) {
      nested.add(Number(match[1]));
    }
  }

  const dropped: string[] = [];
  placeholders.forEach((original, token) => {
    const index = tokenIndexOf(token);
    if (index === null || nested.has(index) || present.has(index)) return;
    dropped.push(original);
  });
  return dropped;
}

function tokenIndexOf(token: string): number | null {
  const match = /^⟦PH(\d+)⟧$/.exec(token);
  return match ? Number(match[1]) : null;
}
