import type { RetryPolicy } from "../types.js";
import { emitStatus } from "./run-context.js";
import { STATUS_CODES } from "../events/events.js";

interface ResilienceOptions<T> {
  /** The outbound call to wrap */
  fn: () => Promise<T>;
  policy?: RetryPolicy;
  /** Used in status events, e.g. the capability name */
  label?: string;
  /** AbortSignal to respect cancellation */
  abortSignal?: AbortSignal;
  /** Overrides `isRetryableError` for errors the caller can classify itself */
  retryable?: (error: Error) => boolean;
}

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const NON_RETRYABLE_STATUS_CODES = new Set([400, 401, 403, 404, 422]);

/**
 * Classifies whether an error is retryable.
 * Retryable: 429, 500-504, timeouts, network errors, "overloaded"/"capacity".
 * Not retryable: AbortError, auth errors (401/403), validation errors (400/422).
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error.name === "AbortError") return false;

  const statusProp: unknown = Reflect.get(error, "status") ?? Reflect.get(error, "statusCode");
  if (typeof statusProp === "number") {
    if (RETRYABLE_STATUS_CODES.has(statusProp)) return true;
    if (NON_RETRYABLE_STATUS_CODES.has(statusProp)) return false;
  }

  const message = error.message.toLowerCase();

  const statusMatch = message.match(/\b(\d{3})\b/);
  if (statusMatch) {
    const status = Number(statusMatch[1]);
    if (RETRYABLE_STATUS_CODES.has(status)) return true;
    if (NON_RETRYABLE_STATUS_CODES.has(status)) return false;
  }

  if (
    error.name === "TimeoutError" ||
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("network") ||
    message.includes("fetch failed") ||
    message.includes("socket hang up")
  ) {
    return true;
  }

  if (message.includes("overloaded") || message.includes("capacity")) {
    return true;
  }

  return message.includes("rate limit") || message.includes("too many requests");
}

function computeDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, jitterFactor: number): number {
  const exponential = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  const jitter = exponential * jitterFactor * Math.random();
  return exponential + jitter;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(Object.assign(new Error("Aborted"), { name: "AbortError" }));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(Object.assign(new Error("Aborted"), { name: "AbortError" }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Retry wrapper with exponential backoff and jitter.
 *
 * Only retryable errors are retried, at most `policy.maxRetries` times
 * (default 0). The last error is rethrown once retries are exhausted.
 */
export async function withResilience<T>(opts: ResilienceOptions<T>): Promise<T> {
  const { fn, policy, label, abortSignal, retryable = isRetryableError } = opts;

  const maxRetries = policy?.maxRetries ?? 0;
  const baseDelayMs = policy?.baseDelayMs ?? 250;
  const maxDelayMs = policy?.maxDelayMs ?? 5000;
  const jitterFactor = policy?.jitterFactor ?? 0.2;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (lastError.name === "AbortError" || abortSignal?.aborted) throw lastError;
      if (attempt >= maxRetries || !retryable(lastError)) throw lastError;

      const delay = computeDelay(attempt, baseDelayMs, maxDelayMs, jitterFactor);
      emitStatus({
        code: STATUS_CODES.RETRYING,
        message: `Retrying (attempt ${attempt + 1}/${maxRetries})`,
        capability: label,
        metadata: { attempt: attempt + 1, maxRetries, delay },
      });
      await sleep(delay, abortSignal);
    }
  }
}
