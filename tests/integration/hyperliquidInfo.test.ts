/**
 * Integration tests for the info client against an in-process HTTP server
 */

import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { HyperliquidInfoClient } from '../../src/clients/hyperliquid/index.js';
import { ApiCallTracker, TrackedAccountDataSource } from '../../src/clients/shared/instrumentation.js';
import { CallLedger, InMemoryAppendLog, type CallRecord } from '../../src/services/callLedger/index.js';
import { RateGovernor } from '../../src/services/rateGovernor/index.js';
import { RateLimitedError } from '../../src/utils/errors.js';
import { MockInfoServer } from '../mocks/infoServer.js';

const TARGET = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01';

describe('HyperliquidInfoClient Integration', () => {
  const server = new MockInfoServer();
  let client: HyperliquidInfoClient;

  beforeAll(async () => {
    const url = await server.start();
    client = new HyperliquidInfoClient({ baseUrl: url, timeoutMs: 2000 });
  });

  afterAll(async () => {
    await server.stop();
  });

  beforeEach(() => {
    server.reset();
  });

  it('should map the clearinghouse state onto a snapshot', async () => {
    server.setAccount(TARGET, {
      accountValue: '12500.5',
      positions: {
        BTC: { szi: '-0.5', leverage: 10, type: 'isolated', entryPx: '50000.0' },
        ETH: { szi: '0.0', leverage: 5 },
      },
    });

    const snapshot = await client.fetchAccountState(TARGET);

    expect(server.requests).toEqual([{ type: 'clearinghouseState', user: TARGET }]);
    expect(snapshot.address).toBe(TARGET.toLowerCase());
    expect(snapshot.equity).toBe(12500.5);
    expect(snapshot.positions).toEqual({
      BTC: {
        symbol: 'BTC',
        side: 'short',
        size: 0.5,
        entryPrice: 50000,
        leverage: 10,
        marginMode: 'isolated',
        liquidationPrice: null,
      },
    });
  });

  it('should load instrument metadata', async () => {
    const instruments = await client.fetchInstruments();

    expect(instruments.size()).toBe(2);
    expect(instruments.getInstrument('ETH')).toEqual({
      symbol: 'ETH',
      assetIndex: 1,
      szDecimals: 4,
      maxLeverage: 25,
      onlyIsolated: false,
    });
  });

  it('should parse mid prices', async () => {
    await expect(client.fetchMidPrices()).resolves.toEqual({ BTC: 50123.5, ETH: 3000 });
  });

  it('should record a throttled fetch in the ledger as a rate-limit hit', async () => {
    server.throttle = true;
    const ledger = new CallLedger(new InMemoryAppendLog<CallRecord>((r) => r.startedAt), { processId: 'engine' });
    const governor = new RateGovernor(ledger, {
      softLimitPerMinute: 15,
      hardLimitPerMinute: 20,
      cooldownMs: 30000,
      delayPerCallMs: 2000,
      maxDelayMs: 15000,
    });
    const source = new TrackedAccountDataSource(client, new ApiCallTracker(ledger, governor));

    await expect(source.fetchAccountState(TARGET)).rejects.toBeInstanceOf(RateLimitedError);

    const [record] = await ledger.callsSince(60000);
    expect(record).toMatchObject({ endpoint: 'clearinghouseState', statusCode: 429 });
    expect((await governor.shouldCall('clearinghouseState')).type).toBe('reject');
  });
});
