import he from "he";
import type { Translator } from "../interfaces";
import type { PrepareResult, TranslationContext } from "../types";
import { PREPARE_READY, prepareFailed } from "../types";
import {
  ModelNotAvailableError,
  TransientTranslationError,
  TranslationError,
  UnsupportedLanguageError,
} from "../errors";
import { withRetry } from "../utils/withRetry";
import type { RetryOptions } from "../utils/withRetry";

const MAX_CHUNK_SIZE = 4500;
const ENDPOINT = "https://translation.googleapis.com/language/translate/v2";

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface GoogleTranslateOptions {
  debug?: boolean;
  retry?: Omit<RetryOptions, "label">;
  /** Injected in tests */
  fetch?: FetchFn;
}

type GoogleTranslateResponse = {
  error?: unknown;
  data?: {
    translations?: Array<{ translatedText?: string }>;
  };
};

/**
 * Cloud translator over the Google Translation v2 REST API. Needs no warm-up:
 * it is ready whenever an API key is configured.
 */
export class GoogleTranslateApiKeyTranslator implements Translator {
  private readonly debug: boolean;
  private readonly retry: Omit<RetryOptions, "label">;
  private readonly fetchFn: FetchFn;
  private closed = false;

  constructor(
    private apiKey: string,
    options: GoogleTranslateOptions = {}
  ) {
    this.debug = options.debug ?? false;
    this.retry = options.retry ?? { retryMax: 3, backoffMinMs: 500, backoffMaxMs: 8000 };
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    _context: TranslationContext
  ): Promise<string> {
    if (!text || text.trim().length === 0) {
      return text;
    }
    if (this.closed) {
      throw new TranslationError("Translator has been closed");
    }
    if (!this.apiKey) {
      throw new ModelNotAvailableError(targetLang, "Google Translate API key is not configured");
    }

    if (this.debug) {
      console.debug(
        `[GoogleTranslate] Translating from ${sourceLang} to ${targetLang}, length: ${text.length}`
      );
    }

    try {
      // Split into chunks if needed
      const chunks = this.splitIntoChunks(text, MAX_CHUNK_SIZE);
      const translatedChunks: string[] = [];

      for (const chunk of chunks) {
        const translated = await withRetry(
          () => this.translateChunk(chunk, sourceLang, targetLang),
          { ...this.retry, label: "GoogleTranslate" }
        );
        translatedChunks.push(translated);
      }

      // The API returns HTML entities even with format=text
      const decoded = he.decode(translatedChunks.join("\n"));

      if (this.debug) {
        console.debug(`[GoogleTranslate] Translation successful, length: ${decoded.length}`);
      }

      return decoded;
    } catch (error) {
      if (this.debug) {
        console.debug(`[GoogleTranslate] Error:`, error);
      }
      if (error instanceof TranslationError) throw error;
      throw new TransientTranslationError(
        `Google Translate request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  async isReady(): Promise<boolean> {
    return !this.closed && this.apiKey.trim().length > 0;
  }

  async prepare(_sourceLang: string, targetLang: string): Promise<PrepareResult> {
    if (await this.isReady()) {
      return PREPARE_READY;
    }
    return prepareFailed(
      new ModelNotAvailableError(targetLang, "Google Translate API key is not configured")
    );
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async translateChunk(
    text: string,
    sourceLang: string,
    targetLang: string
  ): Promise<string> {
    const url = `${ENDPOINT}?key=${encodeURIComponent(this.apiKey)}`;

    const body = {
      q: text,
      source: sourceLang,
      target: targetLang,
      format: "text",
    };

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new TransientTranslationError("Google Translate API unreachable", { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      const message = `Google Translate API error: ${response.status} ${response.statusText} - ${errorText}`;

      // 400 is what the API answers for an unknown language code
      if (response.status === 400 && /language/i.test(errorText)) {
        throw new UnsupportedLanguageError(
          /source/i.test(errorText) ? sourceLang : targetLang,
          message
        );
      }
      if (response.status === 429 || response.status >= 500) {
        throw new TransientTranslationError(message, {
          status: response.status,
          retryAfter: response.headers.get("retry-after") ?? undefined,
        });
      }
      throw new TranslationError(message);
    }

    const data = (await response.json()) as GoogleTranslateResponse;

    if (data.error) {
      throw new TranslationError(`Google Translate API error: ${JSON.stringify(data.error)}`);
    }

    const first = data.data?.translations?.[0];
    if (!first) {
      throw new TranslationError("Google Translate API returned no translations");
    }

    return first.translatedText ?? "";
  }

  private splitIntoChunks(text: string, maxSize: number): string[] {
    if (text.length <= maxSize) {
      return [text];
    }

    const chunks: string[] = [];
    let currentChunk = "";

    // Try to split on sentence boundaries first, then on spaces
    const sentences = text.split(/([.!?]\s+)/);

    for (const sentence of sentences) {
      const testChunk = currentChunk + sentence;

      if (testChunk.length <= maxSize) {
        currentChunk = testChunk;
        continue;
      }

      if (currentChunk) {
        chunks.push(currentChunk);
      }

      // If single sentence is too long, split by spaces
      if (sentence.length > maxSize) {
        let wordChunk = "";
        for (const word of sentence.split(/\s+/)) {
          if ((wordChunk + " " + word).length <= maxSize) {
            wordChunk = wordChunk ? wordChunk + " " + word : word;
          } else {
            if (wordChunk) {
              chunks.push(wordChunk);
            }
            wordChunk = word;
          }
        }
        currentChunk = wordChunk;
      } else {
        currentChunk = sentence;
      }
    }

    if (currentChunk) {
      chunks.push(currentChunk);
    }

    return chunks.length > 0 ? chunks : [text];
  }
}
