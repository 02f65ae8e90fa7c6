import type { Logger } from './logger.js';
import { OracleRequestError, errorMessage } from './errors.js';

/** Backoff for a single transient request. Stage-level work is never retried here. */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryOn?: (error: unknown) => boolean;
}

const DEFAULTS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  retryOn: isRetryableError,
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: Logger,
  label: string,
  options?: RetryOptions,
): Promise<T> {
  const opts: Required<RetryOptions> = {
    maxAttempts: options?.maxAttempts ?? DEFAULTS.maxAttempts,
    initialDelayMs: options?.initialDelayMs ?? DEFAULTS.initialDelayMs,
    maxDelayMs: options?.maxDelayMs ?? DEFAULTS.maxDelayMs,
    backoffMultiplier: options?.backoffMultiplier ?? DEFAULTS.backoffMultiplier,
    retryOn: options?.retryOn ?? DEFAULTS.retryOn,
  };
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      const message = errorMessage(err);

      if (attempt >= opts.maxAttempts || !opts.retryOn(err)) {
        logger.error({ attempt, label, error: message }, 'Request failed, not retrying');
        throw err;
      }

      logger.warn(
        { attempt, maxAttempts: opts.maxAttempts, label, error: message, nextRetryMs: delay },
        'Transient failure, retrying',
      );

      await sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}

/** Rate limits, server errors and dropped connections. Client errors are final. */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof OracleRequestError) {
    return err.status === 429 || err.status >= 500;
  }
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();

  if (msg.includes('429') || msg.includes('rate limit') || msg.includes('too many requests')) return true;
  if (msg.includes('502') || msg.includes('503') || msg.includes('504') || msg.includes('overloaded')) return true;
  if (msg.includes('econnreset') || msg.includes('etimedout') || msg.includes('fetch failed') || msg.includes('socket hang up')) return true;

  return false;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
