import { EventEmitter } from "node:events";
import type { TranslationModelBackend, Translator } from "../interfaces";
import type { DownloadState, PrepareResult, TranslationContext } from "../types";
import { PREPARE_READY, clampProgress, prepareDownloading, prepareFailed } from "../types";
import {
  ModelDownloadError,
  ModelNotAvailableError,
  TransientTranslationError,
  TranslationError,
  UnsupportedLanguageError,
  toTranslationError,
} from "../errors";
import { baseLanguage, resolveSupportedLanguage } from "../utils/language";

export interface OnDeviceTranslatorOptions {
  /**
   * When false, prepare() starts a missing download and returns "downloading"
   * right away; callers poll prepare() until it reports ready or failed. A
   * failed download is reported to the next poll before a new one starts.
   */
  awaitDownload?: boolean;
  debug?: boolean;
}

type Preparation = {
  promise: Promise<PrepareResult>;
  progress: number;
};

/**
 * Translator for engines that run local models which must be downloaded per
 * language before use. Model bookkeeping and inference live in the backend.
 */
export class OnDeviceTranslator implements Translator {
  private readonly events = new EventEmitter();
  private readonly preparations = new Map<string, Preparation>();
  // Failures no poller has seen yet, by pair
  private readonly failedPreparations = new Map<string, PrepareResult>();
  private readonly awaitDownload: boolean;
  private readonly debug: boolean;
  private state: DownloadState = { status: "idle" };
  private closed = false;

  constructor(
    private readonly backend: TranslationModelBackend,
    options: OnDeviceTranslatorOptions = {}
  ) {
    this.awaitDownload = options.awaitDownload ?? true;
    this.debug = options.debug ?? false;
  }

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    _context: TranslationContext
  ): Promise<string> {
    if (text.trim().length === 0) return text;
    this.assertOpen();

    const source = this.toModelLanguage(sourceLang);
    const target = this.toModelLanguage(targetLang);
    if (source === target) return text;

    for (const language of [source, target]) {
      if (!(await this.backend.isModelDownloaded(language))) {
        throw new ModelNotAvailableError(language);
      }
    }

    try {
      return await this.backend.translate(text, source, target);
    } catch (error) {
      if (error instanceof TranslationError) throw error;
      throw new TransientTranslationError(
        `Translation failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  async isReady(sourceLang: string, targetLang: string): Promise<boolean> {
    if (this.closed) return false;

    const source = this.findModelLanguage(sourceLang);
    const target = this.findModelLanguage(targetLang);
    if (!source || !target) return false;

    try {
      const [sourceReady, targetReady] = await Promise.all([
        this.backend.isModelDownloaded(source),
        this.backend.isModelDownloaded(target),
      ]);
      return sourceReady && targetReady;
    } catch (error) {
      if (this.debug) {
        console.warn(`[OnDeviceTranslator] Model registry lookup failed:`, error);
      }
      return false;
    }
  }

  /**
   * Downloads whatever models the pair is missing. Concurrent calls for the
   * same pair share one download.
   */
  async prepare(sourceLang: string, targetLang: string): Promise<PrepareResult> {
    if (this.closed) {
      return prepareFailed(new TranslationError("Translator has been closed"));
    }

    let source: string;
    let target: string;
    try {
      source = this.toModelLanguage(sourceLang);
      target = this.toModelLanguage(targetLang);
    } catch (error) {
      return prepareFailed(toTranslationError(error));
    }

    const pairKey = `${source}:${target}`;
    const failed = this.failedPreparations.get(pairKey);
    if (failed) {
      this.failedPreparations.delete(pairKey);
      return failed;
    }

    let preparation = this.preparations.get(pairKey);
    if (!preparation) {
      const created: Preparation = { progress: 0, promise: Promise.resolve(PREPARE_READY) };
      created.promise = this.download([source, target], created)
        .then((result) => {
          if (result.status === "failed" && !this.awaitDownload) {
            this.failedPreparations.set(pairKey, result);
          }
          return result;
        })
        .finally(() => {
          this.preparations.delete(pairKey);
        });
      this.preparations.set(pairKey, created);
      preparation = created;
    }

    if (this.awaitDownload) {
      return preparation.promise;
    }

    // Settled downloads resolve on the next tick; report them as they are
    const settled = await Promise.race([
      preparation.promise,
      new Promise<null>((resolve) => setImmediate(() => resolve(null))),
    ]);
    if (!settled) {
      return prepareDownloading(preparation.progress);
    }
    this.failedPreparations.delete(pairKey);
    return settled;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.failedPreparations.clear();
    this.events.removeAllListeners();
    await this.backend.close?.();
  }

  getDownloadState(): DownloadState {
    return this.state;
  }

  /**
   * Subscribes to download state changes. Unsubscribing has no effect on the
   * download itself.
   */
  onDownloadState(listener: (state: DownloadState) => void): () => void {
    this.events.on("downloadState", listener);
    return () => {
      this.events.off("downloadState", listener);
    };
  }

  async deleteModel(languageTag: string): Promise<boolean> {
    const language = this.findModelLanguage(languageTag);
    if (!language) return false;

    try {
      await this.backend.deleteModel(language);
      return true;
    } catch (error) {
      console.error(`[OnDeviceTranslator] Failed to delete model ${language}:`, error);
      return false;
    }
  }

  getDownloadedModels(): Promise<string[]> {
    return this.backend.listDownloadedModels();
  }

  private async download(languages: string[], preparation: Preparation): Promise<PrepareResult> {
    const missing: string[] = [];
    try {
      for (const language of new Set(languages)) {
        if (!(await this.backend.isModelDownloaded(language))) {
          missing.push(language);
        }
      }
    } catch (error) {
      const failure = toTranslationError(error, "Preparation failed");
      this.setState({ status: "failed", error: failure });
      return prepareFailed(failure);
    }
    if (missing.length === 0) {
      return PREPARE_READY;
    }

    for (const [position, language] of missing.entries()) {
      this.setState({ status: "downloading", progress: preparation.progress, languageTag: language });

      try {
        await this.backend.downloadModel(language, (progress) => {
          // Overall progress across every missing model
          preparation.progress = clampProgress((position + clampProgress(progress)) / missing.length);
          this.setState({ status: "downloading", progress: preparation.progress, languageTag: language });
        });
      } catch (error) {
        const failure = new ModelDownloadError(language, undefined, error);
        this.setState({ status: "failed", error: failure });
        return prepareFailed(failure);
      }

      preparation.progress = (position + 1) / missing.length;
    }

    this.setState({ status: "complete" });
    if (this.debug) {
      console.log(`[OnDeviceTranslator] Downloaded models: ${missing.join(", ")}`);
    }
    return PREPARE_READY;
  }

  private setState(state: DownloadState): void {
    this.state = state;
    this.events.emit("downloadState", state);
  }

  private findModelLanguage(tag: string): string | null {
    return resolveSupportedLanguage(baseLanguage(tag), this.backend.supportedLanguages);
  }

  private toModelLanguage(tag: string): string {
    const language = this.findModelLanguage(tag);
    if (!language) {
      throw new UnsupportedLanguageError(tag);
    }
    return language;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new TranslationError("Translator has been closed");
    }
  }
}
