import { setTimeout as sleep } from "node:timers/promises";
import { TransientTranslationError, TranslationError } from "../errors";

export type RetryOptions = {
  retryMax: number;
  backoffMinMs: number;
  backoffMaxMs: number;
  logger?: (msg: string, meta?: Record<string, unknown>) => void;
  label?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function getStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const response = err.response;
  if (isRecord(response) && typeof response.status === "number") return response.status;
  return typeof err.status === "number" ? err.status : undefined;
}

function getRetryAfter(err: unknown): unknown {
  if (err instanceof TransientTranslationError) return err.retryAfter;
  if (!isRecord(err)) return undefined;
  const source = isRecord(err.response) ? err.response : err;
  const headers = source.headers;
  if (!isRecord(headers)) return undefined;
  return headers["retry-after"] ?? headers["Retry-After"];
}

function isRetryable(err: unknown): boolean {
  // Only transient translation failures fix themselves
  if (err instanceof TranslationError && err.kind !== "transient") {
    return false;
  }
  const status = getStatus(err);
  if (status == null) return true; // network/timeout
  if (status === 429) return true;
  if (status >= 500 && status <= 599) return true;
  return false; // bail other 4xx
}

function parseRetryAfterMs(ra: unknown): number | undefined {
  if (ra == null || ra === "") return;

  // seconds
  const seconds = Number(ra);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

  // HTTP date
  const dateMs = Date.parse(String(ra));
  if (!Number.isNaN(dateMs)) {
    const diff = dateMs - Date.now();
    if (diff > 0) return diff;
  }
}

function backoffMs(attempt: number, minMs: number, maxMs: number): number {
  const exp = minMs * Math.pow(2, attempt - 1);
  const base = Math.min(maxMs, Math.max(minMs, exp));
  const jitter = Math.random() * base * 0.2; // 0..20%
  const wait = base + jitter;
  return Math.max(minMs, Math.min(maxMs, Math.floor(wait)));
}

export async function withRetry<T>(
  fn: (ctx: { attempt: number }) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  const {
    retryMax,
    backoffMinMs,
    backoffMaxMs,
    logger = (msg) => console.warn(msg),
    label = "withRetry",
  } = opts;
  const attempts = Math.max(1, Math.floor(retryMax));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn({ attempt });
    } catch (err: unknown) {
      const status = getStatus(err);

      if (!isRetryable(err)) {
        throw err;
      }

      if (attempt >= attempts) {
        logger(`[${label}] final fail`, { attempt, status });
        throw err;
      }

      const raMs = parseRetryAfterMs(getRetryAfter(err));
      const waitMs = raMs ?? backoffMs(attempt, backoffMinMs, backoffMaxMs);

      logger(`[${label}] retry`, { attempt, status, waitMs });
      await sleep(waitMs);
    }
  }
}
