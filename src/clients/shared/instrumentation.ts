/**
 * API call instrumentation
 *
 * Every exchange call passes through one ApiCallTracker: it asks the rate
 * governor before the call and records the outcome to the call ledger and the
 * metrics registry after it.
 */

import type { AccountDataSource, AccountSnapshot } from './interfaces.js';
import type { CallLedger } from '../../services/callLedger/CallLedger.js';
import type { RateGovernor } from '../../services/rateGovernor/RateGovernor.js';
import { API_ENDPOINTS } from '../../config/constants.js';
import { classifyError, getStatusCode, RateLimitedError } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import { rateLimitWaits, recordApiCall } from '../../utils/metrics.js';
import { sleep } from '../../utils/time.js';

const HTTP_OK = 200;

export interface ApiCallTrackerOptions {
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export class ApiCallTracker {
  private log: Logger;
  private ledger: CallLedger;
  private governor: RateGovernor;
  private sleepFn: (ms: number) => Promise<void>;

  constructor(ledger: CallLedger, governor: RateGovernor, options: ApiCallTrackerOptions = {}) {
    this.ledger = ledger;
    this.governor = governor;
    this.sleepFn = options.sleep ?? sleep;
    this.log = logger('ApiCallTracker');
  }

  /**
   * Run `fn` and record its latency and outcome. Rethrows the classified error.
   */
  async track<T>(endpoint: string, fn: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();

    try {
      const result = await fn();
      const durationMs = Date.now() - startedAt;
      recordApiCall(endpoint, 'success', durationMs);
      await this.ledger.record(endpoint, durationMs, HTTP_OK);
      return result;
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      const classified = classifyError(error);
      recordApiCall(endpoint, 'error', durationMs);
      await this.ledger.record(endpoint, durationMs, getStatusCode(classified), classified.message);
      throw classified;
    }
  }

  /**
   * Wait out a governor delay, or throw when the governor refuses the call
   */
  async guard(endpoint: string): Promise<void> {
    const decision = await this.governor.shouldCall(endpoint);

    if (decision.type === 'delay') {
      this.log.debug('Delaying call', { endpoint, delayMs: decision.delayMs });
      rateLimitWaits.labels(endpoint).observe(decision.delayMs);
      await this.sleepFn(decision.delayMs);
      return;
    }

    if (decision.type === 'reject') {
      throw new RateLimitedError(`Call to ${endpoint} refused: ${decision.reason}`, decision.retryAfterMs);
    }
  }

  /**
   * Guarded and recorded call
   */
  async call<T>(endpoint: string, fn: () => Promise<T>): Promise<T> {
    await this.guard(endpoint);
    return this.track(endpoint, fn);
  }
}

/**
 * Records every account fetch. Admission is left to the state cache, which
 * consults the governor itself so it can fall back to stale data.
 */
export class TrackedAccountDataSource implements AccountDataSource {
  private inner: AccountDataSource;
  private tracker: ApiCallTracker;

  constructor(inner: AccountDataSource, tracker: ApiCallTracker) {
    this.inner = inner;
    this.tracker = tracker;
  }

  fetchAccountState(address: string): Promise<AccountSnapshot> {
    return this.tracker.track(API_ENDPOINTS.CLEARINGHOUSE_STATE, () => this.inner.fetchAccountState(address));
  }
}
