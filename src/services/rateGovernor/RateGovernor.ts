/**
 * Rate Governor
 *
 * Decides whether the next exchange call may go out, based on the calls every
 * process sharing the ledger made in the last 60 seconds.
 *
 * Policy:
 * - a rate-limit response seen within the cool-down window: reject
 * - at or above the hard threshold: reject until the window rolls below it
 * - at or above the soft threshold: delay proportionally to the overshoot
 * - otherwise: allow
 */

import type { CallLedger } from '../callLedger/CallLedger.js';
import { isRateLimitRecord } from '../callLedger/callStats.js';
import type { CallRecord } from '../callLedger/types.js';
import type { RateLimitConfig } from '../../config/schema.js';
import { RATE_WINDOW_MS } from '../../config/constants.js';
import { errorMessage } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import { governorCallsPerMinute, governorDecisions } from '../../utils/metrics.js';

export type GovernorDecision =
  | { type: 'allow' }
  | { type: 'delay'; delayMs: number }
  | { type: 'reject'; reason: string; retryAfterMs: number };

/**
 * Point-in-time view of call rates across the shared ledger
 */
export interface RateSnapshot {
  timestamp: number;
  /** Calls in the last 60s, all processes */
  callsPerMinute: number;
  /** Calls in the last 60s made by this process */
  ownCallsPerMinute: number;
  perProcess: Record<string, number>;
  perEndpoint: Record<string, number>;
  lastRateLimit: CallRecord | null;
  softLimitPerMinute: number;
  hardLimitPerMinute: number;
}

export class RateGovernor {
  private log: Logger;
  private ledger: CallLedger;
  private config: RateLimitConfig;

  constructor(ledger: CallLedger, config: RateLimitConfig) {
    this.ledger = ledger;
    this.config = config;
    this.log = logger('RateGovernor');
  }

  /**
   * Decide on one prospective call to `endpoint`
   */
  async shouldCall(endpoint: string): Promise<GovernorDecision> {
    let records: CallRecord[];
    try {
      records = await this.ledger.callsSince(Math.max(RATE_WINDOW_MS, this.config.cooldownMs));
    } catch (error) {
      // Without a readable ledger there is nothing to count against
      this.log.warn('Call ledger unreadable, allowing call', { endpoint, error: errorMessage(error) });
      return this.note(endpoint, { type: 'allow' });
    }

    const nowMs = Date.now();
    const decision = this.decide(records, nowMs);

    if (decision.type !== 'allow') {
      this.log.debug('Call throttled', { endpoint, ...decision });
    }

    return this.note(endpoint, decision);
  }

  /**
   * Aggregate, per-process and per-endpoint counts over the last 60s
   */
  async getRateSnapshot(): Promise<RateSnapshot> {
    const records = await this.ledger.callsSince(Math.max(RATE_WINDOW_MS, this.config.cooldownMs));
    const nowMs = Date.now();
    const inWindow = records.filter((r) => r.startedAt >= nowMs - RATE_WINDOW_MS);

    const perProcess: Record<string, number> = {};
    const perEndpoint: Record<string, number> = {};
    for (const record of inWindow) {
      perProcess[record.processId] = (perProcess[record.processId] ?? 0) + 1;
      perEndpoint[record.endpoint] = (perEndpoint[record.endpoint] ?? 0) + 1;
    }

    governorCallsPerMinute.set(inWindow.length);

    return {
      timestamp: nowMs,
      callsPerMinute: inWindow.length,
      ownCallsPerMinute: perProcess[this.ledger.getProcessId()] ?? 0,
      perProcess,
      perEndpoint,
      lastRateLimit: findLastRateLimit(records),
      softLimitPerMinute: this.config.softLimitPerMinute,
      hardLimitPerMinute: this.config.hardLimitPerMinute,
    };
  }

  private decide(records: CallRecord[], nowMs: number): GovernorDecision {
    const { softLimitPerMinute, hardLimitPerMinute, cooldownMs, delayPerCallMs, maxDelayMs } = this.config;

    const lastRateLimit = findLastRateLimit(records);
    if (lastRateLimit) {
      const seenAt = lastRateLimit.startedAt + lastRateLimit.durationMs;
      const elapsed = nowMs - seenAt;
      if (elapsed < cooldownMs) {
        return {
          type: 'reject',
          reason: `rate limit response on ${lastRateLimit.endpoint} ${elapsed}ms ago`,
          retryAfterMs: cooldownMs - elapsed,
        };
      }
    }

    const windowStart = nowMs - RATE_WINDOW_MS;
    const inWindow = records.filter((r) => r.startedAt >= windowStart);
    const count = inWindow.length;
    governorCallsPerMinute.set(count);

    if (count >= hardLimitPerMinute) {
      // The window drops below the hard limit once this record ages out
      const releasing = inWindow[count - hardLimitPerMinute];
      const retryAfterMs = releasing ? Math.max(0, releasing.startedAt + RATE_WINDOW_MS - nowMs) : RATE_WINDOW_MS;
      return {
        type: 'reject',
        reason: `${count} calls in the last 60s (hard limit ${hardLimitPerMinute})`,
        retryAfterMs,
      };
    }

    if (count >= softLimitPerMinute) {
      const overshoot = count - softLimitPerMinute + 1;
      return { type: 'delay', delayMs: Math.min(delayPerCallMs * overshoot, maxDelayMs) };
    }

    return { type: 'allow' };
  }

  private note(endpoint: string, decision: GovernorDecision): GovernorDecision {
    governorDecisions.labels(endpoint, decision.type).inc();
    return decision;
  }
}

function findLastRateLimit(records: CallRecord[]): CallRecord | null {
  for (let i = records.length - 1; i >= 0; i--) {
    const record = records[i];
    if (record && isRateLimitRecord(record)) {
      return record;
    }
  }
  return null;
}
