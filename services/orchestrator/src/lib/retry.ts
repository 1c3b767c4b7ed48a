/**
 * Retry utility with exponential backoff
 */

import { ClipcastError, getRetryAfterMs, isRetryableError, TimeoutError } from "./errors";
import type { ILogger } from "./logger";

export type RetryConfig = {
  /** Maximum number of retries (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 500) */
  initialDelayMs?: number;
  /** Maximum single delay in milliseconds (default: 10000) */
  maxDelayMs?: number;
  /** Upper bound on the sum of all delays (default: 30000) */
  maxTotalDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Timeout for each attempt in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback for retry logging */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  logger?: ILogger;
  /** Operation name for logging context */
  operationName?: string;
};

type InternalConfig = Required<Omit<RetryConfig, "onRetry" | "logger" | "operationName">> &
  Pick<RetryConfig, "onRetry" | "logger" | "operationName">;

const DEFAULT_CONFIG: InternalConfig = {
  maxRetries: 3,
  initialDelayMs: 500,
  maxDelayMs: 10000,
  maxTotalDelayMs: 30000,
  backoffMultiplier: 2,
  timeoutMs: 15000,
  isRetryable: isRetryableError,
  onRetry: undefined,
  logger: undefined,
  operationName: undefined,
};

/**
 * Sleep for the specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep that resolves early (to false) when the signal aborts
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with timeout
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (!settled) {
        settled = true;
        reject(new TimeoutError(operationName || "operation", timeoutMs));
      }
    }, timeoutMs);

    fn()
      .then((result) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve(result);
        }
      })
      .catch((error: unknown) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          reject(error);
        }
      });
  });
}

/**
 * Calculate delay with jitter for backoff
 */
function calculateDelay(attempt: number, config: InternalConfig): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const jitter = Math.random() * 0.3 * exponentialDelay; // 30% jitter
  return Math.min(exponentialDelay + jitter, config.maxDelayMs);
}

export type BackoffPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter as a fraction of the delay, applied in both directions */
  jitterRatio: number;
  minDelayMs: number;
};

export const RECONNECT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 2000,
  maxDelayMs: 300000,
  jitterRatio: 0.3,
  minDelayMs: 1000,
};

/**
 * Delay before the given attempt: base * 2^attempt, capped, with symmetric jitter
 */
export function backoffDelay(
  attempt: number,
  policy: BackoffPolicy = RECONNECT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponentialDelay = Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
  const jitter = (random() * 2 - 1) * policy.jitterRatio * exponentialDelay;
  return Math.max(policy.minDelayMs, Math.round(exponentialDelay + jitter));
}

/**
 * Execute a function with retry and exponential backoff.
 * A retry-after hint from the error replaces the computed delay.
 * Gives up with the last error once the next delay would exceed maxTotalDelayMs.
 */
export async function withRetry<T>(fn: () => Promise<T>, config: RetryConfig = {}): Promise<T> {
  const mergedConfig: InternalConfig = { ...DEFAULT_CONFIG, ...config };
  let lastError: unknown;
  let totalDelayMs = 0;

  for (let attempt = 0; attempt <= mergedConfig.maxRetries; attempt++) {
    try {
      return await withTimeout(fn, mergedConfig.timeoutMs, mergedConfig.operationName);
    } catch (error) {
      lastError = error;

      const isLastAttempt = attempt === mergedConfig.maxRetries;
      const shouldRetry = !isLastAttempt && mergedConfig.isRetryable(error);

      if (!shouldRetry) {
        throw error;
      }

      const hintedMs = getRetryAfterMs(error);
      const delayMs = hintedMs !== undefined ? hintedMs : calculateDelay(attempt, mergedConfig);

      if (totalDelayMs + delayMs > mergedConfig.maxTotalDelayMs) {
        mergedConfig.logger?.warn("retry_budget_exhausted", {
          operation: mergedConfig.operationName,
          attempt: attempt + 1,
          totalDelayMs,
          nextDelayMs: delayMs,
        });
        throw error;
      }
      totalDelayMs += delayMs;

      if (mergedConfig.logger) {
        mergedConfig.logger.warn("retry_attempt", {
          operation: mergedConfig.operationName,
          attempt: attempt + 1,
          maxRetries: mergedConfig.maxRetries,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
          errorCode: error instanceof ClipcastError ? error.code : undefined,
        });
      }

      if (mergedConfig.onRetry) {
        mergedConfig.onRetry(attempt + 1, error, delayMs);
      }

      await sleep(delayMs);
    }
  }

  throw lastError;
}
