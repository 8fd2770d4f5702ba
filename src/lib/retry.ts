import { randomInt } from "node:crypto";
import { apiErrorReasons, apiStatusOf } from "./api-errors";
import { sleep } from "./sleep";

export type OperationKind = "read" | "write";

export interface RetryOptions {
  /**
   * Number of retries after the first attempt.
   */
  retries: number;

  /**
   * Base delay for exponential backoff.
   */
  baseDelayMs: number;

  /**
   * Max delay cap for exponential backoff.
   */
  maxDelayMs: number;

  /**
   * Whether to apply jitter to delays.
   */
  jitter: boolean;

  /**
   * Optional callback invoked before sleeping between retries.
   */
  onRetry?: (info: { attempt: number; delayMs: number; err: unknown }) => void;

  /**
   * Controls which errors should be retried.
   */
  shouldRetry: (err: unknown) => boolean;
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

function randomJitterFactor(): number {
  // Use cryptographically strong randomness to avoid weak-PRNG security findings.
  const thousandths = randomInt(0, 1001); // [0, 1000]
  return 0.5 + thousandths / 1000;
}

/**
 * Applies exponential backoff (with optional jitter) around an async function.
 *
 * @param fn Function to execute.
 * @param options Retry configuration.
 * @returns Function result if successful.
 * @throws Last error if all retries fail.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  // attempt=0 is the initial call; retries cover additional attempts.
  // total attempts = 1 + retries.
  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt >= options.retries || !options.shouldRetry(err)) {
        throw err;
      }

      const exp = Math.pow(2, attempt);
      const rawDelay = options.baseDelayMs * exp;
      const capped = clamp(rawDelay, 0, options.maxDelayMs);
      const jitterFactor = options.jitter ? randomJitterFactor() : 1;
      const delayMs = Math.floor(capped * jitterFactor);

      options.onRetry?.({ attempt, delayMs, err });
      await sleep(delayMs);
    }
  }

  // Should be unreachable.
  throw new Error("withRetry exhausted without returning or throwing.");
}

const TRANSIENT_NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "EAI_AGAIN", "ENOTFOUND", "ECONNREFUSED"];

/**
 * Heuristic: determines whether a Google API call should be retried based on:
 * - HTTP status (429/5xx)
 * - transient network error codes
 * - rate limit reasons inside the error payload
 *
 * 409 (already exists / aborted by a concurrent change) and plain 401/403
 * are never retried.
 */
export function isRetryableGoogleApiError(err: unknown): boolean {
  if (!err || typeof err !== "object") {
    return false;
  }

  const status = apiStatusOf(err);
  if (status === 409) {
    return false;
  }
  if (status && (status === 429 || status === 500 || status === 502 || status === 503 || status === 504)) {
    return true;
  }

  const code = (err as { code?: unknown }).code;
  if (typeof code === "string" && TRANSIENT_NETWORK_CODES.includes(code)) {
    return true;
  }

  // Some Google APIs return 403 for rate limiting; only retry when we can detect a rate limit reason.
  if (status === 403) {
    return apiErrorReasons(err).some((r) => r === "rateLimitExceeded" || r === "userRateLimitExceeded");
  }

  return false;
}
