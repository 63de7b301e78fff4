/**
 * Retry handler with exponential backoff
 */
import { toError } from '../errors.js';
import { logger } from './logger.js';

export interface RetryOptions {
  retries?: number;          // Attempts after the first one
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  onFailed?: (error: Error, attempts: number) => void;
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number }
  | { success: false; error: Error; attempts: number };

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const {
    retries = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    shouldRetry = isRetryableError,
    onRetry,
    onFailed,
  } = options;

  const maxAttempts = retries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      const data = await fn(attempt);
      return { success: true, data, attempts: attempt };
    } catch (caught) {
      const error = toError(caught);

      if (attempt >= maxAttempts || !shouldRetry(error)) {
        onFailed?.(error, attempt);
        return { success: false, error, attempts: attempt };
      }

      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(error, attempt, delay);
      logger.debug(`Retry ${attempt}/${retries} after ${delay}ms: ${error.message}`);

      await sleep(delay);
    }
  }
}

export async function withRetryThrow<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const result = await withRetry(fn, options);

  if (result.success) {
    return result.data;
  }

  throw result.error;
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Transient failures: timeouts, rate limits, 5xx and dropped connections
 */
export function isRetryableError(error: unknown): boolean {
  // Agent and HTTP errors classify themselves
  const flag = retryableFlag(error);
  if (flag !== undefined) {
    return flag;
  }
  return isRateLimitError(error) || isNetworkError(error) || hasRetryableStatus(error);
}

function retryableFlag(error: unknown): boolean | undefined {
  if (!error || typeof error !== 'object' || !('retryable' in error)) return undefined;
  return typeof error.retryable === 'boolean' ? error.retryable : undefined;
}

function hasRetryableStatus(error: unknown): boolean {
  const status = statusOf(error);
  return status !== undefined && RETRYABLE_STATUSES.has(status);
}

/**
 * Check if an error is a rate limit error (429)
 */
export function isRateLimitError(error: unknown): boolean {
  return statusOf(error) === 429;
}

/**
 * Check if an error is a network/timeout error
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const cause = error.cause;
  const causeCode = cause && typeof cause === 'object' && 'code' in cause ? String(cause.code) : '';
  const text = `${error.name} ${error.message} ${causeCode}`;

  return /timeout|network|fetch failed|socket hang up|ENOTFOUND|ECONNREFUSED|ECONNRESET|ETIMEDOUT|EPIPE|UND_ERR_/i.test(text);
}

/**
 * HTTP status of a failure: on the error itself, or in an agent error's context
 */
export function statusOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;

  const context = 'context' in error ? error.context : undefined;
  if (context && typeof context === 'object' && 'status' in context && typeof context.status === 'number') {
    return context.status;
  }
  return undefined;
}
