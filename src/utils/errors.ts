import axios from 'axios';
import { HTTP_TOO_MANY_REQUESTS, RATE_LIMIT_KEYWORDS } from '../config/constants.js';

/**
 * Base class for errors raised by the replication engine
 */
export abstract class ReplicationError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network failure, timeout or 5xx - retry with backoff
 */
export class TransientNetworkError extends ReplicationError {
  override readonly retryable = true;
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
  }
}

/**
 * Throttled by the exchange or refused by the rate governor
 */
export class RateLimitedError extends ReplicationError {
  override readonly retryable = true;
  readonly statusCode: number | null;
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number = 0, statusCode: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.retryAfterMs = retryAfterMs;
    this.statusCode = statusCode;
  }
}

/**
 * The exchange refused an order for a reason retrying cannot fix
 */
export class SubmissionRejectedError extends ReplicationError {
  override readonly retryable = false;
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Order rejected: ${reason}`, options);
    this.reason = reason;
  }
}

/**
 * Invalid or incomplete configuration - fatal at startup
 */
export class ConfigurationError extends ReplicationError {
  override readonly retryable = false;
}

/**
 * Check whether a status/message pair describes throttling
 */
export function isRateLimitSignal(statusCode: number | null | undefined, error?: string | null): boolean {
  if (statusCode === HTTP_TOO_MANY_REQUESTS) {
    return true;
  }
  if (error) {
    const lower = error.toLowerCase();
    return RATE_LIMIT_KEYWORDS.some((keyword) => lower.includes(keyword));
  }
  return false;
}

/**
 * Extract the HTTP status an error carries, if any
 */
export function getStatusCode(error: unknown): number | null {
  if (error instanceof TransientNetworkError || error instanceof RateLimitedError) {
    return error.statusCode;
  }
  if (axios.isAxiosError(error)) {
    return error.response?.status ?? null;
  }
  return null;
}

/**
 * Stringify an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map an arbitrary failure from an external collaborator onto the engine's error kinds.
 * Errors that are already typed pass through unchanged.
 */
export function classifyError(error: unknown): ReplicationError {
  if (error instanceof ReplicationError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    // No response at all: connection refused, reset, DNS, client timeout
    if (status === undefined) {
      return new TransientNetworkError(error.message, null, { cause: error });
    }
    if (status === HTTP_TOO_MANY_REQUESTS) {
      return new RateLimitedError(error.message, 0, status, { cause: error });
    }
    if (status >= 500 || status === 408) {
      return new TransientNetworkError(error.message, status, { cause: error });
    }
    return new SubmissionRejectedError(`HTTP ${status}: ${error.message}`, { cause: error });
  }

  const message = errorMessage(error);
  if (isRateLimitSignal(null, message)) {
    return new RateLimitedError(message, 0, null, { cause: error });
  }

  const lower = message.toLowerCase();
  if (
    lower.includes('network') ||
    lower.includes('timeout') ||
    lower.includes('timed out') ||
    lower.includes('econnrefused') ||
    lower.includes('econnreset') ||
    lower.includes('etimedout') ||
    lower.includes('socket hang up')
  ) {
    return new TransientNetworkError(message, null, { cause: error });
  }

  return new SubmissionRejectedError(message, { cause: error });
}
