import { describe, it, expect, vi } from "vitest";
import { GoogleTranslateApiKeyTranslator } from "./google-translate-api-key-translator";
import {
  ModelNotAvailableError,
  TransientTranslationError,
  TranslationError,
  UnsupportedLanguageError,
} from "../errors";

const retry = { retryMax: 3, backoffMinMs: 1, backoffMaxMs: 2, logger: () => {} };

function translationResponse(translatedText: string): Response {
  return new Response(JSON.stringify({ data: { translations: [{ translatedText }] } }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

function errorResponse(status: number, body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

function createFetch(impl: (input: string, init: RequestInit) => Promise<Response>) {
  return vi.fn(impl);
}

describe("GoogleTranslateApiKeyTranslator", () => {
  it("posts the text and decodes HTML entities in the answer", async () => {
    const fetch = createFetch(async () => translationResponse("Hola &amp; adi&oacute;s &#39;amigo&#39;"));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    await expect(translator.translate("Hello & goodbye 'friend'", "en", "es", "UI")).resolves.toBe(
      "Hola & adiós 'amigo'"
    );

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://translation.googleapis.com/language/translate/v2?key=test-key");
    expect(init.method).toBe("POST");
    expect(JSON.parse(String(init.body))).toEqual({
      q: "Hello & goodbye 'friend'",
      source: "en",
      target: "es",
      format: "text",
    });
  });

  it("returns blank text without calling the API", async () => {
    const fetch = createFetch(async () => translationResponse("unused"));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    await expect(translator.translate("  ", "en", "es", "UI")).resolves.toBe("  ");
    expect(fetch).not.toHaveBeenCalled();
  });

  it("splits long text into chunks on sentence boundaries", async () => {
    const fetch = createFetch(async (_input, init) => {
      const body: { q: string } = JSON.parse(String(init.body));
      return translationResponse(body.q);
    });
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });
    const first = `${"a".repeat(2999)}. `;
    const second = "b".repeat(3000);

    await expect(translator.translate(first + second, "en", "es", "UI")).resolves.toBe(`${first}\n${second}`);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("maps a 400 about the target language to UnsupportedLanguageError without retrying", async () => {
    const fetch = createFetch(async () => errorResponse(400, "Invalid Value for target language"));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    const error = await translator.translate("Hello", "en", "xx", "UI").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsupportedLanguageError);
    expect(error).toMatchObject({ languageTag: "xx" });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("blames the source language when the API says so", async () => {
    const fetch = createFetch(async () => errorResponse(400, "Bad language pair: source not supported"));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    await expect(translator.translate("Hello", "zz", "es", "UI")).rejects.toMatchObject({ languageTag: "zz" });
  });

  it("retries server errors", async () => {
    const fetch = createFetch(async () => translationResponse("Hola"));
    fetch.mockResolvedValueOnce(errorResponse(503, "Service Unavailable"));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    await expect(translator.translate("Hello", "en", "es", "UI")).resolves.toBe("Hola");
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("waits as long as the Retry-After header asks", async () => {
    const logger = vi.fn();
    const fetch = createFetch(async () => translationResponse("Hola"));
    fetch.mockResolvedValueOnce(errorResponse(429, "Too Many Requests", { "Retry-After": "0" }));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry: { ...retry, logger } });

    await expect(translator.translate("Hello", "en", "es", "UI")).resolves.toBe("Hola");
    expect(logger).toHaveBeenCalledWith("[GoogleTranslate] retry", { attempt: 1, status: 429, waitMs: 0 });
  });

  it("does not retry other client errors", async () => {
    const fetch = createFetch(async () => errorResponse(403, "Forbidden"));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    const error = await translator.translate("Hello", "en", "es", "UI").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranslationError);
    expect(error).not.toBeInstanceOf(TransientTranslationError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("reports an unreachable API as transient after the last attempt", async () => {
    const fetch = createFetch(async () => {
      throw new TypeError("fetch failed");
    });
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    await expect(translator.translate("Hello", "en", "es", "UI")).rejects.toThrow(
      new TransientTranslationError("Google Translate API unreachable")
    );
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it("fails when the answer holds no translation", async () => {
    const fetch = createFetch(async () => new Response(JSON.stringify({ data: { translations: [] } })));
    const translator = new GoogleTranslateApiKeyTranslator("test-key", { fetch, retry });

    await expect(translator.translate("Hello", "en", "es", "UI")).rejects.toThrow(
      "Google Translate API returned no translations"
    );
  });

  it("is not ready without an API key", async () => {
    const fetch = createFetch(async () => translationResponse("unused"));
    const translator = new GoogleTranslateApiKeyTranslator("", { fetch, retry });

    await expect(translator.isReady()).resolves.toBe(false);
    const result = await translator.prepare("en", "es");
    expect(result.status).toBe("failed");
    await expect(translator.translate("Hello", "en", "es", "UI")).rejects.toBeInstanceOf(ModelNotAvailableError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("is ready with a key and refuses work once closed", async () => {
    const translator = new GoogleTranslateApiKeyTranslator("test-key", {
      fetch: createFetch(async () => translationResponse("Hola")),
      retry,
    });

    await expect(translator.prepare("en", "es")).resolves.toEqual({ status: "ready" });
    await translator.close();

    await expect(translator.isReady()).resolves.toBe(false);
    await expect(translator.translate("Hello", "en", "es", "UI")).rejects.toThrow("Translator has been closed");
  });
});
