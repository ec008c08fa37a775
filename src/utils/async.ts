/**
 * @fileoverview Async Utilities
 *
 * Timeouts and bounded retries shared by the evidence providers and the
 * model-backed capabilities.
 *
 * @packageDocumentation
 */

import { getErrorMessage } from './errors.js';

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Custom error code to attach to timeout errors */
  errorCode?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly code?: string;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string, errorCode?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.code = errorCode;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - Timeout in milliseconds (if <= 0 or undefined, returns promise as-is)
 * @throws TimeoutError if the promise does not resolve within timeoutMs
 *
 * @example
 * ```typescript
 * const results = await withTimeout(backend.search(query), 10_000, { context: 'web search' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context, options?.errorCode));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// RETRY
// ============================================================================

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** 0 disables jitter */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 5_000,
  backoffMultiplier: 2,
  jitterFactor: 0.2,
};

export function computeRetryDelayMs(
  attempt: number,
  config: RetryConfig,
  randomFn: () => number = Math.random
): number {
  if (attempt <= 0) return 0;
  const baseDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  const capped = Math.min(config.maxDelayMs, baseDelay);
  if (!config.jitterFactor) {
    return Math.max(0, Math.round(capped));
  }
  const jitter = capped * config.jitterFactor * (randomFn() - 0.5);
  const withJitter = capped + jitter;
  return Math.min(config.maxDelayMs, Math.max(0, Math.round(withJitter)));
}

export interface RetryOptions {
  config?: Partial<RetryConfig>;
  /** Return false to stop retrying on this error */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, backoffMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
}

/**
 * Run `fn` until it succeeds or the retry budget is spent. The last error is
 * rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const sleep = options.sleep ?? delay;
  const maxAttempts = config.maxRetries + 1;
  let lastError: unknown = new Error('retryWithBackoff: no attempts made');

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    if (options.signal?.aborted) {
      throw new Error(`Aborted before attempt ${attempt + 1}: ${getErrorMessage(options.signal.reason)}`);
    }
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;
      if (attempt >= config.maxRetries) break;
      if (options.shouldRetry && !options.shouldRetry(error, attempt)) break;
      const backoffMs = computeRetryDelayMs(attempt + 1, config);
      options.onRetry?.(error, attempt + 1, backoffMs);
      await sleep(backoffMs);
    }
  }

  throw lastError;
}
