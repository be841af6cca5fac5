import { describe, it, expect, vi } from "vitest";
import { CachingTranslator } from "./caching-translator";
import { LruTranslationCache } from "./lru-translation-cache";
import { TransientTranslationError, UnsupportedLanguageError } from "../errors";
import type { Translator } from "../interfaces";
import type { PrepareResult } from "../types";
import { PREPARE_READY } from "../types";

type TranslateImpl = (text: string, sourceLang: string, targetLang: string) => Promise<string>;

function createDelegate(impl: TranslateImpl = async (text, _source, target) => `[${target}] ${text}`) {
  return {
    translate: vi.fn(impl),
    isReady: vi.fn(async () => true),
    prepare: vi.fn(async (): Promise<PrepareResult> => PREPARE_READY),
    close: vi.fn(async () => {}),
  } satisfies Translator;
}

describe("CachingTranslator", () => {
  it("returns the text untouched for the same language", async () => {
    const delegate = createDelegate();
    const cache = new LruTranslationCache(10);
    const translator = new CachingTranslator(delegate, { cache });

    await expect(translator.translate("Hello", "EN", "en", "UI")).resolves.toBe("Hello");
    await expect(translator.translate("", "fr", "fr", "SYSTEM")).resolves.toBe("");
    expect(delegate.translate).not.toHaveBeenCalled();
    await expect(cache.size()).resolves.toBe(0);
  });

  it("returns blank text untouched", async () => {
    const delegate = createDelegate();
    const translator = new CachingTranslator(delegate);

    await expect(translator.translate("   ", "en", "es", "UI")).resolves.toBe("   ");
    expect(delegate.translate).not.toHaveBeenCalled();
  });

  it("calls the delegate once per key", async () => {
    const delegate = createDelegate();
    const translator = new CachingTranslator(delegate);

    await expect(translator.translate("Hello", "en", "es", "UI")).resolves.toBe("[es] Hello");
    await expect(translator.translate("Hello", "EN", "ES", "UI")).resolves.toBe("[es] Hello");
    await expect(translator.translate("Hello", "en", "es", "BACKEND")).resolves.toBe("[es] Hello");

    expect(delegate.translate).toHaveBeenCalledTimes(2);
  });

  it("shares a cache passed in", async () => {
    const cache = new LruTranslationCache(10);
    const translator = new CachingTranslator(createDelegate(), { cache });

    await translator.translate("Hello", "en", "es", "UI");

    expect(translator.getCache()).toBe(cache);
    await expect(cache.size()).resolves.toBe(1);
  });

  it("misses every key after clearCache", async () => {
    const delegate = createDelegate();
    const translator = new CachingTranslator(delegate);
    await translator.translate("One", "en", "es", "UI");
    await translator.translate("Two", "en", "es", "UI");

    await translator.clearCache();

    await expect(translator.getCache().size()).resolves.toBe(0);
    await translator.translate("One", "en", "es", "UI");
    await translator.translate("Two", "en", "es", "UI");
    expect(delegate.translate).toHaveBeenCalledTimes(4);
  });

  it("sends masked text and restores the placeholders", async () => {
    const delegate = createDelegate();
    const translator = new CachingTranslator(delegate);

    await expect(translator.translate("Hi {name}, %d new", "en", "es", "UI")).resolves.toBe(
      "[es] Hi {name}, %d new"
    );
    expect(delegate.translate).toHaveBeenCalledWith("Hi ⟦PH1⟧, ⟦PH0⟧ new", "en", "es", "UI");
  });

  it("sends raw text with protection off", async () => {
    const delegate = createDelegate();
    const translator = new CachingTranslator(delegate, { protectPlaceholders: false });

    await translator.translate("Hi {name}", "en", "es", "UI");

    expect(delegate.translate).toHaveBeenCalledWith("Hi {name}", "en", "es", "UI");
  });

  it("does not cache failures", async () => {
    const delegate = createDelegate();
    delegate.translate.mockRejectedValueOnce(new TransientTranslationError("timeout"));
    const translator = new CachingTranslator(delegate);

    await expect(translator.translate("Hello", "en", "es", "UI")).rejects.toThrow("timeout");
    await expect(translator.translate("Hello", "en", "es", "UI")).resolves.toBe("[es] Hello");
    expect(delegate.translate).toHaveBeenCalledTimes(2);
  });

  it("asks again after an unsupported language by default", async () => {
    const delegate = createDelegate(async () => {
      throw new UnsupportedLanguageError("xx");
    });
    const translator = new CachingTranslator(delegate);

    await expect(translator.translate("Hello", "en", "xx", "UI")).rejects.toBeInstanceOf(UnsupportedLanguageError);
    await expect(translator.translate("Hello", "en", "xx", "UI")).rejects.toBeInstanceOf(UnsupportedLanguageError);
    expect(delegate.translate).toHaveBeenCalledTimes(2);
  });

  it("remembers unsupported languages when failure caching is on", async () => {
    const delegate = createDelegate(async () => {
      throw new UnsupportedLanguageError("xx");
    });
    const translator = new CachingTranslator(delegate, { cacheFailures: true });

    await expect(translator.translate("Hello", "en", "xx", "UI")).rejects.toBeInstanceOf(UnsupportedLanguageError);
    await expect(translator.translate("Hello", "en", "xx", "UI")).rejects.toBeInstanceOf(UnsupportedLanguageError);
    expect(delegate.translate).toHaveBeenCalledTimes(1);

    await translator.clearCache();
    await expect(translator.translate("Hello", "en", "xx", "UI")).rejects.toBeInstanceOf(UnsupportedLanguageError);
    expect(delegate.translate).toHaveBeenCalledTimes(2);
  });

  it("never remembers transient failures", async () => {
    const delegate = createDelegate();
    delegate.translate.mockRejectedValueOnce(new TransientTranslationError("busy", { status: 503 }));
    const translator = new CachingTranslator(delegate, { cacheFailures: true });

    await expect(translator.translate("Hello", "en", "es", "UI")).rejects.toThrow("busy");
    await expect(translator.translate("Hello", "en", "es", "UI")).resolves.toBe("[es] Hello");
  });

  it("joins an in-flight translation of the same text", async () => {
    let release: (value: string) => void = () => {};
    const delegate = createDelegate(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );
    const translator = new CachingTranslator(delegate);

    const first = translator.translate("Hello", "en", "es", "UI");
    await vi.waitFor(() => expect(delegate.translate).toHaveBeenCalledTimes(1));
    const second = translator.translate("Hello", "en", "es", "UI");

    release("Hola");

    await expect(Promise.all([first, second])).resolves.toEqual(["Hola", "Hola"]);
    expect(delegate.translate).toHaveBeenCalledTimes(1);
  });

  it("passes readiness and close through to the delegate", async () => {
    const delegate = createDelegate();
    const translator = new CachingTranslator(delegate);

    await expect(translator.isReady("en", "es")).resolves.toBe(true);
    await expect(translator.prepare("en", "es")).resolves.toEqual({ status: "ready" });
    await translator.close();

    expect(delegate.isReady).toHaveBeenCalledWith("en", "es");
    expect(delegate.close).toHaveBeenCalledTimes(1);
  });
});
