export type TranslationErrorKind =
  | "unsupported_language"
  | "model_not_available"
  | "transient"
  | "model_download"
  | "unknown";

export class TranslationError extends Error {
  readonly kind: TranslationErrorKind;

  constructor(
    message: string,
    options: { kind?: TranslationErrorKind; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "TranslationError";
    this.kind = options.kind ?? "unknown";
  }
}

/**
 * The engine has no mapping for the language tag. Never retried.
 */
export class UnsupportedLanguageError extends TranslationError {
  constructor(
    readonly languageTag: string,
    message: string = `Unsupported language: ${languageTag}`,
    cause?: unknown
  ) {
    super(message, { kind: "unsupported_language", cause });
    this.name = "UnsupportedLanguageError";
  }
}

/**
 * The engine knows the language but is not prepared for it yet;
 * resolvable through Translator.prepare().
 */
export class ModelNotAvailableError extends TranslationError {
  constructor(
    readonly languageTag: string,
    message: string = `Language model not available for: ${languageTag}`,
    cause?: unknown
  ) {
    super(message, { kind: "model_not_available", cause });
    this.name = "ModelNotAvailableError";
  }
}

export class TransientTranslationError extends TranslationError {
  /** HTTP status of the failed call, when there was one */
  readonly status?: number;
  /** Retry-After header of the failed call, as sent */
  readonly retryAfter?: string;

  constructor(
    message: string,
    options: { status?: number; retryAfter?: string; cause?: unknown } = {}
  ) {
    super(message, { kind: "transient", cause: options.cause });
    this.name = "TransientTranslationError";
    this.status = options.status;
    this.retryAfter = options.retryAfter;
  }
}

export class ModelDownloadError extends TranslationError {
  constructor(
    readonly languageTag: string,
    message: string = `Failed to download language model for: ${languageTag}`,
    cause?: unknown
  ) {
    super(message, { kind: "model_download", cause });
    this.name = "ModelDownloadError";
  }
}

export function toTranslationError(error: unknown, message = "Translation failed"): TranslationError {
  if (error instanceof TranslationError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new TranslationError(`${message}: ${detail}`, { cause: error });
}
