import type { Logger } from './logger.js';

/** Retry with exponential backoff. Used by the API client only; the pipeline never retries. */

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
  retryOn: () => true,
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: Logger,
  label: string,
  options?: RetryOptions,
): Promise<T> {
  const opts = { ...DEFAULTS, ...options };
  let lastError: unknown;
  let delay = Math.min(opts.initialDelayMs, opts.maxDelayMs);

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      const message = err instanceof Error ? err.message : String(err);

      if (attempt >= opts.maxAttempts || !opts.retryOn(err)) {
        if (attempt > 1) {
          logger.error({ attempt, label, error: message }, 'All retries exhausted');
        }
        throw err;
      }

      logger.warn(
        { attempt, maxAttempts: opts.maxAttempts, label, error: message, nextRetryMs: delay },
        'Retrying after failure',
      );

      await sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError;
}

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

/**
 * Transient failures only: rate limiting, server errors and dropped connections.
 * A 403 quotaExceeded is a daily limit and is not retried.
 */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;

  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return RETRYABLE_STATUS.has(err.statusCode);
  }

  const msg = err.message.toLowerCase();
  if (msg.includes('econnreset') || msg.includes('etimedout') || msg.includes('fetch failed')) return true;
  if (msg.includes('socket hang up') || msg.includes('network')) return true;

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
