import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CallLedger, InMemoryAppendLog, type CallRecord } from '../../src/services/callLedger/index.js';
import { RateGovernor } from '../../src/services/rateGovernor/index.js';
import { StateCache } from '../../src/services/stateCache/index.js';
import { RateLimitedError, TransientNetworkError } from '../../src/utils/errors.js';
import { createMockPosition, createMockSnapshot, TARGET_ADDRESS } from '../mocks/hyperliquid.js';

const T0 = 1_700_000_000_000;
const ENDPOINT = 'clearinghouseState';

describe('StateCache', () => {
  let store: InMemoryAppendLog<CallRecord>;
  let governor: RateGovernor;
  const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
  let cache: StateCache;

  async function seedCalls(count: number): Promise<void> {
    const now = Date.now();
    for (let i = 0; i < count; i++) {
      await store.append({
        endpoint: ENDPOINT,
        startedAt: now - 30000 + i,
        durationMs: 0,
        statusCode: 200,
        error: null,
        processId: 'other',
      });
    }
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
    store = new InMemoryAppendLog<CallRecord>((r) => r.startedAt);
    governor = new RateGovernor(new CallLedger(store), {
      softLimitPerMinute: 15,
      hardLimitPerMinute: 20,
      cooldownMs: 30000,
      delayPerCallMs: 2000,
      maxDelayMs: 15000,
    });
    sleep.mockClear();
    cache = new StateCache(governor, { defaultTtlMs: 60000, sleep });
  });

  it('should fetch on a miss and serve the entry while fresh', async () => {
    const snapshot = createMockSnapshot([createMockPosition()], { timestamp: T0 });
    const fetchFn = vi.fn().mockResolvedValue(snapshot);

    const first = await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);
    vi.setSystemTime(T0 + 59999);
    const second = await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(first).toEqual({ snapshot, fetchedAt: T0, stale: false, fromCache: false });
    expect(second).toEqual({ snapshot, fetchedAt: T0, stale: false, fromCache: true });
  });

  it('should refetch once the TTL has passed', async () => {
    const fetchFn = vi
      .fn()
      .mockResolvedValueOnce(createMockSnapshot([], { timestamp: T0 }))
      .mockResolvedValueOnce(createMockSnapshot([createMockPosition()], { timestamp: T0 + 60000 }));

    await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);
    vi.setSystemTime(T0 + 60000);
    const result = await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(result.fromCache).toBe(false);
    expect(Object.keys(result.snapshot.positions)).toEqual(['BTC']);
  });

  it('should honour a per-call TTL', async () => {
    const fetchFn = vi.fn().mockResolvedValue(createMockSnapshot([], { timestamp: T0 }));

    await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn, 1000);
    vi.setSystemTime(T0 + 1000);
    await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn, 1000);

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should serve the stale entry when the governor refuses', async () => {
    const snapshot = createMockSnapshot([createMockPosition()], { timestamp: T0 });
    const fetchFn = vi.fn().mockResolvedValue(snapshot);
    await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);

    vi.setSystemTime(T0 + 120000);
    await seedCalls(50);
    const result = await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ snapshot, fetchedAt: T0, stale: true, fromCache: true });
  });

  it('should raise the refusal when nothing is cached', async () => {
    await seedCalls(20);
    const fetchFn = vi.fn();

    await expect(cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn)).rejects.toBeInstanceOf(RateLimitedError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should sleep through a delay then fetch', async () => {
    await seedCalls(16);
    const snapshot = createMockSnapshot([], { timestamp: T0 });
    const fetchFn = vi.fn().mockResolvedValue(snapshot);

    const result = await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);

    expect(sleep).toHaveBeenCalledWith(4000);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(result.fromCache).toBe(false);
  });

  it('should serve the stale entry when the fetch fails', async () => {
    const snapshot = createMockSnapshot([createMockPosition()], { timestamp: T0 });
    const fetchFn = vi.fn().mockResolvedValueOnce(snapshot).mockRejectedValueOnce(new Error('socket hang up'));
    await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);

    vi.setSystemTime(T0 + 61000);
    const result = await cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn);

    expect(result.stale).toBe(true);
    expect(result.snapshot).toBe(snapshot);
  });

  it('should raise a classified error when the fetch fails with nothing cached', async () => {
    const fetchFn = vi.fn().mockRejectedValue(new Error('socket hang up'));

    await expect(cache.getOrFetch(TARGET_ADDRESS, ENDPOINT, fetchFn)).rejects.toBeInstanceOf(TransientNetworkError);
  });

  it('should key entries by lowercased address and endpoint', async () => {
    const fetchFn = vi.fn().mockResolvedValue(createMockSnapshot([], { timestamp: T0 }));

    await cache.getOrFetch(TARGET_ADDRESS.toUpperCase().replace('0X', '0x'), ENDPOINT, fetchFn);

    expect(cache.peek(TARGET_ADDRESS, ENDPOINT)).toBeDefined();
    expect(cache.peek(TARGET_ADDRESS, 'meta')).toBeUndefined();

    cache.invalidate(TARGET_ADDRESS, ENDPOINT);
    expect(cache.size()).toBe(0);
  });
});
