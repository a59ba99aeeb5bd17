import type { Logger } from "@docsift/logger";
import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Retries after the first attempt. Default: 3 */
  maxRetries?: number;
  /** Delay before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Ceiling for any single delay. Default: 10000 */
  maxDelayMs?: number;
  /** Only these error codes are retried, when given. */
  retryableErrors?: string[];
  /** Label used in log lines. */
  operation?: string;
  logger?: Logger;
}

const DEFAULT_RETRY_OPTIONS = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
} as const;

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Client errors (4xx) are final. Server errors and anything that is not an
 * AppError (network, driver) are retried unless a code filter says otherwise.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  const filtered = retryableErrors !== undefined && retryableErrors.length > 0;

  if (AppError.isAppError(error)) {
    if (error.statusCode >= 400 && error.statusCode < 500) return false;
    if (filtered) return retryableErrors.includes(error.code);
    return error.statusCode >= 500;
  }

  if (filtered) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/** min(maxDelay, baseDelay * 2^attempt) scaled by a jitter in [0.5, 1.0). */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  return Math.floor(capped * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const operation = options?.operation ?? "operation";

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || !isRetryable(error, options?.retryableErrors)) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      options?.logger?.warn(
        { operation, attempt: attempt + 1, maxRetries, delayMs: delay, err: error },
        `${operation} failed, retrying`,
      );
      await sleep(delay);
    }
  }

  throw lastError;
}
