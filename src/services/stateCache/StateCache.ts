/**
 * State Cache
 *
 * Last-fetched account snapshot per address and endpoint. Shields the rate
 * governor from redundant fetches and serves stale data when a fresh fetch is
 * refused or fails.
 */

import type { AccountSnapshot } from '../../clients/shared/interfaces.js';
import type { RateGovernor } from '../rateGovernor/RateGovernor.js';
import { classifyError, errorMessage, RateLimitedError } from '../../utils/errors.js';
import { logger, shortAddress, type Logger } from '../../utils/logger.js';
import { cacheLookups, rateLimitWaits } from '../../utils/metrics.js';
import { sleep } from '../../utils/time.js';

export interface CacheEntry {
  key: string;
  value: AccountSnapshot;
  fetchedAt: number;
  ttlMs: number;
}

export interface CacheResult {
  snapshot: AccountSnapshot;
  fetchedAt: number;
  /** Older than its TTL; served because a fresh fetch was refused or failed */
  stale: boolean;
  fromCache: boolean;
}

export interface StateCacheOptions {
  /** Used when a caller passes no TTL */
  defaultTtlMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: StateCacheOptions = {
  defaultTtlMs: 60000,
};

export class StateCache {
  private log: Logger;
  private entries: Map<string, CacheEntry> = new Map();
  private governor: RateGovernor;
  private options: StateCacheOptions;
  private sleepFn: (ms: number) => Promise<void>;

  constructor(governor: RateGovernor, options: Partial<StateCacheOptions> = {}) {
    this.governor = governor;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.sleepFn = this.options.sleep ?? sleep;
    this.log = logger('StateCache');
  }

  /**
   * Cached snapshot when fresh, otherwise a governed fetch with stale fallback
   */
  async getOrFetch(
    address: string,
    endpoint: string,
    fetchFn: () => Promise<AccountSnapshot>,
    ttlMs: number = this.options.defaultTtlMs
  ): Promise<CacheResult> {
    const key = cacheKey(address, endpoint);
    const existing = this.entries.get(key);
    const nowMs = Date.now();

    if (existing && nowMs - existing.fetchedAt < ttlMs) {
      cacheLookups.labels(endpoint, 'hit').inc();
      return { snapshot: existing.value, fetchedAt: existing.fetchedAt, stale: false, fromCache: true };
    }

    let decision = await this.governor.shouldCall(endpoint);

    if (decision.type === 'delay') {
      rateLimitWaits.labels(endpoint).observe(decision.delayMs);
      await this.sleepFn(decision.delayMs);
      decision = await this.governor.shouldCall(endpoint);
    }

    if (decision.type === 'reject') {
      const refused = new RateLimitedError(`Fetch of ${endpoint} refused: ${decision.reason}`, decision.retryAfterMs);
      return this.fallback(key, address, endpoint, refused);
    }

    // A second delay is taken as permission; the sleep already paid for it
    try {
      const snapshot = await fetchFn();
      const fetchedAt = Date.now();
      this.entries.set(key, { key, value: snapshot, fetchedAt, ttlMs });
      cacheLookups.labels(endpoint, 'miss').inc();
      return { snapshot, fetchedAt, stale: false, fromCache: false };
    } catch (error) {
      return this.fallback(key, address, endpoint, classifyError(error));
    }
  }

  /**
   * Entry regardless of age
   */
  peek(address: string, endpoint: string): CacheEntry | undefined {
    return this.entries.get(cacheKey(address, endpoint));
  }

  invalidate(address: string, endpoint: string): void {
    this.entries.delete(cacheKey(address, endpoint));
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  private fallback(key: string, address: string, endpoint: string, error: Error): CacheResult {
    const existing = this.entries.get(key);

    if (!existing) {
      throw error;
    }

    cacheLookups.labels(endpoint, 'stale').inc();
    this.log.warn('Serving stale snapshot', {
      address: shortAddress(address),
      endpoint,
      ageMs: Date.now() - existing.fetchedAt,
      reason: errorMessage(error),
    });

    return { snapshot: existing.value, fetchedAt: existing.fetchedAt, stale: true, fromCache: true };
  }
}

function cacheKey(address: string, endpoint: string): string {
  return `${address.toLowerCase()}:${endpoint}`;
}
