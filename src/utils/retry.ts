import { logger } from './logger.js';
import { sleep } from './time.js';
import { classifyError, errorMessage, RateLimitedError, TransientNetworkError } from './errors.js';

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Default retry options
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

/**
 * Calculate backoff delay with jitter
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.multiplier, attempt);
  const clampedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitterAmount = clampedDelay * options.jitter * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(clampedDelay + jitterAmount));
}

/**
 * Default retry predicate: only transient network failures and throttling
 */
export function isRetryableError(error: unknown): boolean {
  return classifyError(error).retryable;
}

/**
 * Execute a function with retry logic
 */
export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const log = logger('Retry');

  let lastError: unknown;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const shouldRetry = opts.retryOn ? opts.retryOn(error) : isRetryableError(error);

      if (!shouldRetry || attempt === opts.maxAttempts - 1) {
        throw error;
      }

      // Honour the governor's cool-down when it is longer than our backoff
      const backoff = calculateDelay(attempt, opts);
      const delayMs = error instanceof RateLimitedError ? Math.max(backoff, error.retryAfterMs) : backoff;

      if (opts.onRetry) {
        opts.onRetry(attempt + 1, error, delayMs);
      } else {
        log.warn(`Attempt ${attempt + 1} failed, retrying in ${delayMs}ms`, {
          error: errorMessage(error),
        });
      }

      await sleep(delayMs);
    }
  }

  // Unreachable with maxAttempts >= 1
  throw lastError;
}

/**
 * Race a promise against a timer; a timeout surfaces as a transient failure
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TransientNetworkError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
