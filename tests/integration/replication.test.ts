/**
 * Integration tests for the replication cycle: polling through the state cache
 * and rate governor, diffing, sizing and order submission against in-process
 * stand-ins for the exchange.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ApiCallTracker, TrackedAccountDataSource } from '../../src/clients/shared/instrumentation.js';
import type { Position } from '../../src/clients/shared/interfaces.js';
import { CallLedger, InMemoryAppendLog, type CallRecord } from '../../src/services/callLedger/index.js';
import { RateGovernor } from '../../src/services/rateGovernor/index.js';
import { StateCache } from '../../src/services/stateCache/index.js';
import {
  ReplicationController,
  ReplicationState,
  SizingCalculator,
  type PositionChangeEvent,
} from '../../src/services/replication/index.js';
import { ConfigurationError, TransientNetworkError } from '../../src/utils/errors.js';
import {
  CONTROLLER_ADDRESS,
  createMockPosition,
  MockAccountSource,
  MockInstrumentRegistry,
  MockOrderSink,
  TARGET_ADDRESS,
} from '../mocks/hyperliquid.js';

const T0 = 1_700_000_000_000;
const POLL_MS = 30000;

interface HarnessOptions {
  watermark?: number;
  targetEquity?: number;
  controllerEquity?: number;
  orderRetryAttempts?: number;
}

function createHarness(options: HarnessOptions = {}) {
  const store = new InMemoryAppendLog<CallRecord>((r) => r.startedAt);
  const ledger = new CallLedger(store, { processId: 'engine' });
  const governor = new RateGovernor(ledger, {
    softLimitPerMinute: 15,
    hardLimitPerMinute: 20,
    cooldownMs: 30000,
    delayPerCallMs: 2000,
    maxDelayMs: 15000,
  });
  const noSleep = async (_ms: number): Promise<void> => undefined;
  const tracker = new ApiCallTracker(ledger, governor, { sleep: noSleep });
  const cache = new StateCache(governor, { defaultTtlMs: 10000, sleep: noSleep });

  const target = new MockAccountSource();
  const controllerAccount = new MockAccountSource();
  const sink = new MockOrderSink();
  const targetEquity = options.targetEquity ?? 100000;
  target.setAccount(TARGET_ADDRESS, [], targetEquity);
  controllerAccount.setAccount(CONTROLLER_ADDRESS, [], options.controllerEquity ?? 10000);

  const state = new ReplicationState(options.watermark ?? T0);
  const sizing = new SizingCalculator(new MockInstrumentRegistry([{ symbol: 'BTC' }, { symbol: 'ETH' }]), {
    sizingMode: 'equity',
    fixedRatio: 1,
    marginModePolicy: 'isolated',
  });

  const controller = new ReplicationController(
    {
      targetAddress: TARGET_ADDRESS,
      controllerAddress: CONTROLLER_ADDRESS,
      pollIntervalMs: POLL_MS,
      cacheTtlMs: 10000,
      executionTimeoutMs: 1000,
      orderRetryAttempts: options.orderRetryAttempts ?? 3,
      orderRetryDelayMs: 1,
    },
    {
      targetSource: new TrackedAccountDataSource(target, tracker),
      controllerSource: new TrackedAccountDataSource(controllerAccount, tracker),
      orderSink: sink,
      cache,
      sizing,
      state,
      ledger,
    }
  );

  let clock = T0;
  const setTarget = (positions: Position[]): void => target.setAccount(TARGET_ADDRESS, positions, targetEquity);

  /** Move the clock one poll interval forward, set the target's positions, run a cycle */
  const step = async (positions: Position[]) => {
    clock += POLL_MS;
    vi.setSystemTime(clock);
    setTarget(positions);
    return controller.runCycle();
  };

  return { store, ledger, target, controllerAccount, sink, state, controller, setTarget, step };
}

describe('Replication Integration', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
  });

  describe('position lifecycle', () => {
    it('should open, increase and close at the equity ratio', async () => {
      const h = createHarness();

      const baseline = await h.controller.runCycle();
      expect(baseline?.baseline).toBe(true);

      await h.step([createMockPosition({ size: 10 })]);
      await h.step([createMockPosition({ size: 15 })]);
      await h.step([]);

      expect(h.sink.submitted.map((o) => [o.kind, o.side, o.size, o.reduceOnly])).toEqual([
        ['opened', 'buy', 1, false],
        ['increased', 'buy', 0.5, false],
        ['closed', 'sell', 1.5, true],
      ]);
      expect(h.sink.submitted[0]).toEqual({
        eventId: `BTC:opened:${T0 + POLL_MS}`,
        kind: 'opened',
        symbol: 'BTC',
        side: 'buy',
        size: 1,
        reduceOnly: false,
        marginMode: 'isolated',
        leverage: 5,
      });
      expect(h.state.mirroredCount()).toBe(0);
      expect(h.controller.getStats()).toMatchObject({
        cyclesCompleted: 4,
        eventsDetected: 3,
        ordersAccepted: 3,
      });
    });

    it('should track the mirrored position between cycles', async () => {
      const h = createHarness();
      await h.controller.runCycle();

      await h.step([createMockPosition({ size: 10 })]);
      await h.step([createMockPosition({ size: 15 })]);

      expect(h.controller.getState().mirroredPositions).toEqual([
        {
          symbol: 'BTC',
          side: 'long',
          size: 1.5,
          leverage: 5,
          marginMode: 'isolated',
          openedAt: T0 + POLL_MS,
          updatedAt: T0 + 2 * POLL_MS,
        },
      ]);
    });

    it('should close then reopen on a side flip', async () => {
      const h = createHarness();
      await h.controller.runCycle();

      await h.step([createMockPosition({ side: 'long', size: 10 })]);
      await h.step([createMockPosition({ side: 'short', size: 5 })]);

      expect(h.sink.submitted.map((o) => [o.kind, o.side, o.size, o.reduceOnly])).toEqual([
        ['opened', 'buy', 1, false],
        ['closed', 'sell', 1, true],
        ['opened', 'sell', 0.5, false],
      ]);
      expect(h.state.getMirrored('BTC')).toMatchObject({ side: 'short', size: 0.5 });
    });

    it('should submit nothing when the scaled size rounds to zero', async () => {
      const h = createHarness({ targetEquity: 10000, controllerEquity: 100 });
      await h.controller.runCycle();

      const summary = await h.step([createMockPosition({ size: 2 })]);

      expect(summary).toMatchObject({ events: 1, submitted: 0 });
      expect(h.sink.submitted).toEqual([]);
      expect(h.controller.getStats().sizingUnderflows).toBe(1);
    });

    it('should emit a change event per transition', async () => {
      const h = createHarness();
      const seen: PositionChangeEvent[] = [];
      h.controller.on('positionChange', (event: PositionChangeEvent) => seen.push(event));
      await h.controller.runCycle();

      await h.step([createMockPosition({ size: 10 })]);
      await h.step([]);

      expect(seen.map((e) => e.kind)).toEqual(['opened', 'closed']);
      expect(h.controller.getRecentEvents().map((e) => e.kind)).toEqual(['closed', 'opened']);
    });
  });

  describe('watermark', () => {
    it('should leave positions held at startup alone for their whole lifecycle', async () => {
      const h = createHarness();
      h.setTarget([createMockPosition({ size: 10 })]);
      await h.controller.runCycle();

      await h.step([createMockPosition({ size: 20 })]);
      await h.step([]);
      expect(h.sink.submitted).toEqual([]);

      await h.step([createMockPosition({ size: 5 })]);
      expect(h.sink.submitted.map((o) => [o.kind, o.size])).toEqual([['opened', 0.5]]);
    });

    it('should not mirror positions opened before the watermark', async () => {
      const h = createHarness({ watermark: T0 + 80000 });
      await h.controller.runCycle();

      await h.step([createMockPosition({ symbol: 'ETH', size: 10 })]);
      await h.step([createMockPosition({ symbol: 'ETH', size: 10 })]);
      await h.step([createMockPosition({ symbol: 'ETH', size: 10 }), createMockPosition({ symbol: 'BTC', size: 10 })]);

      expect(h.sink.submitted.map((o) => [o.symbol, o.kind])).toEqual([['BTC', 'opened']]);
      expect(h.controller.getState().preexistingSymbols).toEqual(['ETH']);
    });
  });

  describe('idempotence', () => {
    it('should not resubmit for an unchanged target', async () => {
      const h = createHarness();
      await h.controller.runCycle();

      await h.step([createMockPosition({ size: 10 })]);
      await h.step([createMockPosition({ size: 10 })]);
      await h.step([createMockPosition({ size: 10 })]);

      expect(h.sink.submitted).toHaveLength(1);
    });

    it('should replay an open after a cycle that failed before submitting', async () => {
      const h = createHarness();
      await h.controller.runCycle();

      h.controllerAccount.failNext(new Error('socket hang up'));
      const failed = await h.step([createMockPosition({ size: 10 })]);

      expect(failed).toBeNull();
      expect(h.sink.submitted).toEqual([]);
      expect(h.controller.getState().lastError).toBe('Controller equity unavailable: socket hang up');
      expect(h.controller.getRecentEvents()).toEqual([]);

      await h.step([createMockPosition({ size: 10 })]);

      expect(h.sink.submitted.map((o) => o.eventId)).toEqual([`BTC:opened:${T0 + 2 * POLL_MS}`]);
      expect(h.controller.getStats().cyclesFailed).toBe(1);
    });
  });

  describe('order failures', () => {
    it('should retry a transient submission failure', async () => {
      const h = createHarness();
      await h.controller.runCycle();
      h.sink.respondWith(new TransientNetworkError('connection reset'));

      await h.step([createMockPosition({ size: 10 })]);

      expect(h.sink.submitted).toHaveLength(2);
      expect(h.controller.getStats().ordersAccepted).toBe(1);
      expect(h.state.getMirrored('BTC')?.size).toBe(1);
    });

    it('should close a leftover mirrored position on a later cycle', async () => {
      const h = createHarness({ orderRetryAttempts: 1 });
      await h.controller.runCycle();
      await h.step([createMockPosition({ size: 10 })]);

      h.sink.respondWith(new TransientNetworkError('connection reset'));
      await h.step([]);
      expect(h.controller.getStats().ordersFailed).toBe(1);
      expect(h.state.getMirrored('BTC')?.size).toBe(1);

      await h.step([]);

      expect(h.sink.submitted.map((o) => [o.kind, o.side, o.size])).toEqual([
        ['opened', 'buy', 1],
        ['closed', 'sell', 1],
        ['closed', 'sell', 1],
      ]);
      expect(h.state.mirroredCount()).toBe(0);
    });

    it('should close the stale side and reopen after a flip whose close failed', async () => {
      const h = createHarness({ orderRetryAttempts: 1 });
      await h.controller.runCycle();
      await h.step([createMockPosition({ side: 'long', size: 10 })]);

      h.sink.respondWith(new TransientNetworkError('connection reset'));
      await h.step([createMockPosition({ side: 'short', size: 10 })]);
      expect(h.state.getMirrored('BTC')).toMatchObject({ side: 'long', size: 1 });

      await h.step([createMockPosition({ side: 'short', size: 20 })]);

      expect(h.sink.submitted.map((o) => [o.kind, o.side, o.size, o.reduceOnly])).toEqual([
        ['opened', 'buy', 1, false],
        ['closed', 'sell', 1, true],
        ['closed', 'sell', 1, true],
        ['opened', 'sell', 2, false],
      ]);
      expect(h.state.getMirrored('BTC')).toMatchObject({ side: 'short', size: 2 });
    });

    it('should keep a position whose close could not match and close it next cycle', async () => {
      const h = createHarness();
      await h.controller.runCycle();
      await h.step([createMockPosition({ size: 10 })]);

      h.sink.respondWith({
        status: 'rejected',
        reason: 'Order could not immediately match against any resting orders.',
      });
      await h.step([]);
      expect(h.controller.getStats().ordersRejected).toBe(1);
      expect(h.state.getMirrored('BTC')?.size).toBe(1);

      await h.step([]);

      expect(h.sink.submitted.map((o) => [o.kind, o.side, o.size])).toEqual([
        ['opened', 'buy', 1],
        ['closed', 'sell', 1],
        ['closed', 'sell', 1],
      ]);
      expect(h.state.mirroredCount()).toBe(0);
    });

    it('should drop the mirrored entry when the exchange has nothing to reduce', async () => {
      const h = createHarness();
      await h.controller.runCycle();
      await h.step([createMockPosition({ size: 10 })]);

      h.sink.respondWith({ status: 'rejected', reason: 'Reduce only order would increase position' });
      await h.step([]);
      await h.step([]);

      expect(h.sink.submitted).toHaveLength(2);
      expect(h.state.mirroredCount()).toBe(0);
    });

    it('should give up on a close after repeated rejections', async () => {
      const h = createHarness();
      await h.controller.runCycle();
      await h.step([createMockPosition({ size: 10 })]);

      for (let i = 0; i < 3; i++) {
        h.sink.respondWith({ status: 'rejected', reason: 'Order could not immediately match' });
        await h.step([]);
      }
      expect(h.state.mirroredCount()).toBe(0);

      await h.step([]);

      expect(h.sink.submitted.map((o) => o.kind)).toEqual(['opened', 'closed', 'closed', 'closed']);
      expect(h.controller.getStats().ordersRejected).toBe(3);
    });
  });

  describe('rate limiting', () => {
    it('should fall back to the cached snapshot when the shared window is over the hard limit', async () => {
      const h = createHarness();
      h.setTarget([createMockPosition({ size: 10 })]);
      await h.controller.runCycle();
      expect(h.target.calls).toBe(1);

      // Another process sharing the ledger has used the budget
      for (let i = 0; i < 50; i++) {
        await h.store.append({
          endpoint: 'clearinghouseState',
          startedAt: T0 + 1000 + i * 100,
          durationMs: 50,
          statusCode: 200,
          error: null,
          processId: 'other-process',
        });
      }

      const summary = await h.step([]);

      expect(h.target.calls).toBe(1);
      expect(summary).toMatchObject({ stale: true, events: 0, submitted: 0 });
      expect(h.controller.getStats().staleCycles).toBe(1);
    });

    it('should record every fetch in the shared ledger', async () => {
      const h = createHarness();
      await h.controller.runCycle();
      await h.step([createMockPosition({ size: 10 })]);

      const calls = await h.controller.getRecentCalls();

      expect(calls.map((c) => [c.endpoint, c.processId])).toEqual([
        ['clearinghouseState', 'engine'],
        ['clearinghouseState', 'engine'],
        ['clearinghouseState', 'engine'],
      ]);
    });
  });

  describe('lifecycle', () => {
    it('should refuse to start with the controller as its own target', async () => {
      const h = createHarness();
      const governor = new RateGovernor(h.ledger, {
        softLimitPerMinute: 15,
        hardLimitPerMinute: 20,
        cooldownMs: 30000,
        delayPerCallMs: 2000,
        maxDelayMs: 15000,
      });
      const sizing = new SizingCalculator(new MockInstrumentRegistry(), {
        sizingMode: 'equity',
        fixedRatio: 1,
        marginModePolicy: 'isolated',
      });
      const controller = new ReplicationController(
        {
          targetAddress: TARGET_ADDRESS,
          controllerAddress: TARGET_ADDRESS,
          pollIntervalMs: POLL_MS,
          cacheTtlMs: 10000,
          executionTimeoutMs: 1000,
          orderRetryAttempts: 3,
          orderRetryDelayMs: 1,
        },
        {
          targetSource: h.target,
          controllerSource: h.controllerAccount,
          orderSink: h.sink,
          cache: new StateCache(governor),
          sizing,
          state: new ReplicationState(T0),
        }
      );

      await expect(controller.start()).rejects.toThrow(ConfigurationError);
      expect(controller.getState().state).toBe('stopped');
      expect(h.target.calls).toBe(0);
    });

    it('should run a first cycle on start and stop cleanly', async () => {
      const h = createHarness();

      await h.controller.start();
      expect(h.controller.isRunning()).toBe(true);
      await h.controller.stop();

      const view = h.controller.getState();
      expect(view.state).toBe('stopped');
      expect(view.isRunning).toBe(false);
      expect(view.cycleCount).toBe(1);
      expect(view.lastSnapshotAt).toBe(T0);
      await expect(h.controller.start()).rejects.toThrow('cannot be restarted');
    });
  });
});
