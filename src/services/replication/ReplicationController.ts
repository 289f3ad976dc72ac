/**
 * Replication Controller
 *
 * Orchestrates one polling loop over the target account:
 * poll (state cache) -> diff -> size -> submit, then wait for the next interval.
 * Cycles never overlap, so ReplicationState needs no locking. Nothing a
 * collaborator throws escapes a cycle; a cycle that fails before any submission
 * leaves the baseline where it was so the next cycle sees the same changes.
 */

import { EventEmitter } from 'events';
import type {
  AccountDataSource,
  AccountSnapshot,
  OrderInstruction,
  OrderResult,
  OrderSink,
} from '../../clients/shared/interfaces.js';
import type { CallLedger } from '../callLedger/CallLedger.js';
import type { CallRecord } from '../callLedger/types.js';
import type { StateCache } from '../stateCache/StateCache.js';
import { diffPositions, eventId } from './PositionDiffer.js';
import type { SizingCalculator } from './SizingCalculator.js';
import type { ReplicationState } from './ReplicationState.js';
import type {
  CycleSummary,
  PositionChangeEvent,
  ReplicationStats,
  ReplicationStateView,
} from './types.js';
import {
  API_ENDPOINTS,
  CHANGE_KINDS,
  CONTROLLER_STATES,
  type ControllerState,
} from '../../config/constants.js';
import { classifyError, ConfigurationError, errorMessage, SubmissionRejectedError } from '../../utils/errors.js';
import { logger, shortAddress, type Logger } from '../../utils/logger.js';
import { isRetryableError, retry, withTimeout } from '../../utils/retry.js';
import { interruptibleSleep } from '../../utils/time.js';
import { mean } from '../../utils/math.js';
import * as metrics from '../../utils/metrics.js';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const CYCLE_DURATION_SAMPLES = 100;
// Consecutive rejected closes before a mirrored position is dropped
const MAX_CLOSE_REJECTIONS = 3;
// Rejections that mean the controller holds nothing to reduce
const NOTHING_TO_REDUCE = /reduce only order would increase position|no position/i;

export interface ReplicationControllerConfig {
  targetAddress: string;
  /** Account the controller's equity is read from */
  controllerAddress: string;
  pollIntervalMs: number;
  cacheTtlMs: number;
  executionTimeoutMs: number;
  orderRetryAttempts: number;
  orderRetryDelayMs: number;
}

export interface ReplicationControllerDeps {
  targetSource: AccountDataSource;
  controllerSource: AccountDataSource;
  orderSink: OrderSink;
  cache: StateCache;
  sizing: SizingCalculator;
  state: ReplicationState;
  /** Backs getRecentCalls */
  ledger?: CallLedger;
}

export class ReplicationController extends EventEmitter {
  private log: Logger;
  private config: ReplicationControllerConfig;
  private deps: ReplicationControllerDeps;

  private controllerState: ControllerState = CONTROLLER_STATES.IDLE;
  private running = false;
  private loopPromise: Promise<void> | null = null;
  private pendingSleep: { promise: Promise<void>; cancel: () => void } | null = null;

  private cycleCount = 0;
  private lastCycleAt: number | null = null;
  private lastError: string | null = null;
  private cycleDurations: number[] = [];
  private stats = {
    cyclesCompleted: 0,
    cyclesFailed: 0,
    staleCycles: 0,
    eventsDetected: 0,
    ordersAccepted: 0,
    ordersRejected: 0,
    ordersFailed: 0,
    sizingUnderflows: 0,
    eventsSkipped: 0,
  };

  constructor(config: ReplicationControllerConfig, deps: ReplicationControllerDeps) {
    super();
    this.config = config;
    this.deps = deps;
    this.log = logger('ReplicationController');
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Validate configuration and begin polling. Throws ConfigurationError and
   * never starts when the configuration is unusable.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.log.warn('Replication already running');
      return;
    }
    if (this.controllerState === CONTROLLER_STATES.STOPPED) {
      throw new ConfigurationError('Replication controller cannot be restarted after stop');
    }

    const problems = this.validate();
    if (problems.length > 0) {
      this.setState(CONTROLLER_STATES.STOPPED);
      throw new ConfigurationError(`Invalid replication configuration: ${problems.join('; ')}`);
    }

    this.running = true;
    this.log.info('Starting replication', {
      target: shortAddress(this.config.targetAddress),
      watermark: new Date(this.deps.state.watermark).toISOString(),
      pollIntervalMs: this.config.pollIntervalMs,
    });
    this.emit('started');

    this.loopPromise = this.loop().catch((error: unknown) => {
      // runCycle contains its own failures; reaching here is a bug
      this.log.error('Replication loop crashed', { error: errorMessage(error) });
      this.running = false;
      this.setState(CONTROLLER_STATES.STOPPED);
    });
  }

  /**
   * Stop after the in-flight cycle; resolves once it has finished
   */
  async stop(): Promise<void> {
    if (!this.running) {
      this.setState(CONTROLLER_STATES.STOPPED);
      return;
    }

    this.log.info('Stopping replication');
    this.running = false;
    this.pendingSleep?.cancel();

    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }

    this.setState(CONTROLLER_STATES.STOPPED);
    this.emit('stopped');
    this.log.info('Replication stopped', { cycles: this.cycleCount });
  }

  isRunning(): boolean {
    return this.running;
  }

  private async loop(): Promise<void> {
    while (this.running) {
      await this.runCycle();

      if (!this.running) {
        break;
      }

      this.pendingSleep = interruptibleSleep(this.config.pollIntervalMs);
      await this.pendingSleep.promise;
      this.pendingSleep = null;
    }
  }

  private validate(): string[] {
    const problems: string[] = [];
    if (!ADDRESS_PATTERN.test(this.config.targetAddress)) {
      problems.push('target address must be a 0x-prefixed 20-byte hex address');
    }
    if (this.config.controllerAddress.length === 0) {
      problems.push('controller address is required');
    }
    if (this.config.targetAddress.toLowerCase() === this.config.controllerAddress.toLowerCase()) {
      problems.push('target and controller accounts must differ');
    }
    if (!(this.config.pollIntervalMs > 0)) {
      problems.push('poll interval must be positive');
    }
    if (!(this.config.orderRetryAttempts >= 1)) {
      problems.push('order retry attempts must be at least 1');
    }
    return problems;
  }

  // ============================================
  // Cycle
  // ============================================

  /**
   * Run one poll/diff/size/submit cycle. Never throws; returns null when the
   * cycle failed before any submission.
   */
  async runCycle(): Promise<CycleSummary | null> {
    const cycle = ++this.cycleCount;
    const startedAt = Date.now();
    const { state } = this.deps;

    this.setState(CONTROLLER_STATES.POLLING);

    let current: AccountSnapshot;
    let stale: boolean;
    try {
      const result = await this.deps.cache.getOrFetch(
        this.config.targetAddress,
        API_ENDPOINTS.CLEARINGHOUSE_STATE,
        () => this.deps.targetSource.fetchAccountState(this.config.targetAddress),
        this.config.cacheTtlMs
      );
      current = result.snapshot;
      stale = result.stale;
    } catch (error) {
      return this.failCycle(cycle, startedAt, 'Target snapshot unavailable', error);
    }

    if (stale) {
      this.stats.staleCycles++;
      metrics.staleSnapshotsUsed.inc();
      this.log.warn('Proceeding on stale target snapshot', {
        cycle,
        ageMs: Date.now() - current.timestamp,
      });
    }

    if (!state.hasBaseline()) {
      state.recordBaseline(current);
      this.log.info('Recorded baseline; existing positions will not be mirrored', {
        positions: Object.keys(current.positions),
      });
      return this.completeCycle({
        cycle,
        durationMs: Date.now() - startedAt,
        events: 0,
        submitted: 0,
        stale,
        baseline: true,
      });
    }

    this.setState(CONTROLLER_STATES.DIFFING);
    const events = this.detectChanges(state.getPrevious(), current);

    let controllerEquity = 0;
    const pending = events.filter((event) => !(event.kind === CHANGE_KINDS.OPENED && state.isOpenHandled(event.id)));
    if (pending.some((event) => this.deps.sizing.needsRatio(event))) {
      this.setState(CONTROLLER_STATES.SIZING);
      try {
        controllerEquity = await this.fetchControllerEquity();
      } catch (error) {
        return this.failCycle(cycle, startedAt, 'Controller equity unavailable', error);
      }
    }

    this.announce(events);

    let submitted = 0;
    for (const event of events) {
      if (event.kind === CHANGE_KINDS.OPENED && state.isOpenHandled(event.id)) {
        this.log.debug('Opened event already handled', { eventId: event.id });
        continue;
      }

      this.setState(CONTROLLER_STATES.SIZING);
      const outcome = this.deps.sizing.evaluate(
        event,
        current.equity,
        controllerEquity,
        current.positions[event.symbol] ?? null,
        state.getMirrored(event.symbol)
      );

      if (outcome.type === 'deferred') {
        this.stats.eventsSkipped++;
        this.log.warn('Open deferred; mirrored position on the other side is still open', {
          eventId: event.id,
          reason: outcome.reason,
        });
        continue;
      }

      if (event.kind === CHANGE_KINDS.OPENED) {
        state.markOpenHandled(event.id);
      }

      if (outcome.type === 'underflow') {
        this.stats.sizingUnderflows++;
        continue;
      }
      if (outcome.type === 'skip') {
        this.stats.eventsSkipped++;
        continue;
      }

      this.setState(CONTROLLER_STATES.SUBMITTING);
      await this.submit(outcome.instruction, event);
      submitted++;
    }

    // Advances whatever the submissions did
    state.advance(current);
    metrics.mirroredPositions.set(state.mirroredCount());

    return this.completeCycle({
      cycle,
      durationMs: Date.now() - startedAt,
      events: events.length,
      submitted,
      stale,
      baseline: false,
    });
  }

  /**
   * Diff the snapshots, then sweep mirrored positions the target no longer
   * holds on the same side. A side mismatch also reopens on the target's side.
   */
  private detectChanges(previous: AccountSnapshot | null, current: AccountSnapshot): PositionChangeEvent[] {
    const { state } = this.deps;
    const events = diffPositions(previous, current, {
      watermark: state.watermark,
      preexisting: state.getPreexisting(),
    });

    for (const mirrored of state.getMirroredPositions()) {
      const held = current.positions[mirrored.symbol];
      if (held && held.side === mirrored.side) {
        continue;
      }
      const pending = (kind: string) => events.some((e) => e.symbol === mirrored.symbol && e.kind === kind);
      if (pending(CHANGE_KINDS.CLOSED)) {
        continue;
      }

      // Left over from a partial fill, a failed close or a failed flip
      events.push({
        id: eventId(mirrored.symbol, CHANGE_KINDS.CLOSED, current.timestamp),
        symbol: mirrored.symbol,
        kind: CHANGE_KINDS.CLOSED,
        previousSize: previous?.positions[mirrored.symbol]?.size ?? 0,
        newSize: 0,
        side: mirrored.side,
        detectedAt: current.timestamp,
      });

      if (held && !pending(CHANGE_KINDS.OPENED)) {
        events.push({
          id: eventId(mirrored.symbol, CHANGE_KINDS.OPENED, current.timestamp),
          symbol: mirrored.symbol,
          kind: CHANGE_KINDS.OPENED,
          previousSize: 0,
          newSize: held.size,
          side: held.side,
          detectedAt: current.timestamp,
        });
      }
    }

    // Stable sort keeps closed ahead of opened within a symbol
    return events.sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
  }

  private announce(events: PositionChangeEvent[]): void {
    const { state } = this.deps;
    for (const event of events) {
      state.recordEvent(event);
      this.stats.eventsDetected++;
      metrics.changeEventsDetected.labels(event.kind).inc();
      this.log.info('Position change detected', {
        symbol: event.symbol,
        kind: event.kind,
        side: event.side,
        previousSize: event.previousSize,
        newSize: event.newSize,
      });
      this.emit('positionChange', event);
    }
  }

  private async fetchControllerEquity(): Promise<number> {
    const result = await this.deps.cache.getOrFetch(
      this.config.controllerAddress,
      API_ENDPOINTS.CLEARINGHOUSE_STATE,
      () => this.deps.controllerSource.fetchAccountState(this.config.controllerAddress),
      this.config.cacheTtlMs
    );
    if (result.stale) {
      this.log.warn('Sizing with stale controller equity', { ageMs: Date.now() - result.fetchedAt });
    }
    return result.snapshot.equity;
  }

  /**
   * Submit with bounded retry; rejections are final for the event
   */
  private async submit(instruction: OrderInstruction, event: PositionChangeEvent): Promise<void> {
    const { state } = this.deps;

    this.log.info('Submitting order', {
      symbol: instruction.symbol,
      kind: instruction.kind,
      side: instruction.side,
      size: instruction.size,
      reduceOnly: instruction.reduceOnly,
      marginMode: instruction.marginMode,
      leverage: instruction.leverage,
    });

    let result: OrderResult;
    try {
      result = await retry(
        () => withTimeout(this.deps.orderSink.submitOrder(instruction), this.config.executionTimeoutMs, 'Order submission'),
        {
          maxAttempts: this.config.orderRetryAttempts,
          initialDelayMs: this.config.orderRetryDelayMs,
          retryOn: isRetryableError,
        }
      );
    } catch (error) {
      const classified = classifyError(error);
      if (classified instanceof SubmissionRejectedError) {
        result = { status: 'rejected', reason: classified.reason };
      } else {
        this.stats.ordersFailed++;
        metrics.ordersSubmitted.labels(instruction.kind, 'failed').inc();
        this.log.error('Order submission failed', { eventId: instruction.eventId, error: classified.message });
        this.emit('orderFailed', instruction, classified);
        return;
      }
    }

    if (result.status === 'rejected') {
      this.stats.ordersRejected++;
      metrics.ordersSubmitted.labels(instruction.kind, 'rejected').inc();
      this.log.warn('Order rejected', { eventId: instruction.eventId, reason: result.reason });
      if (instruction.kind === CHANGE_KINDS.CLOSED) {
        this.handleRejectedClose(instruction.symbol, result.reason);
      }
      this.emit('orderSubmitted', instruction, result);
      return;
    }

    const filled = result.filledSize ?? instruction.size;
    state.applyFill(instruction, event.side, filled, Date.now());

    this.stats.ordersAccepted++;
    metrics.ordersSubmitted.labels(instruction.kind, 'accepted').inc();
    this.log.info('Order accepted', {
      eventId: instruction.eventId,
      orderId: result.orderId,
      filledSize: filled,
      averagePrice: result.averagePrice,
    });
    this.emit('orderSubmitted', instruction, result);
  }

  /**
   * The position stays mirrored so the sweep closes it again next cycle,
   * unless the exchange says there is nothing to reduce or closing keeps failing.
   */
  private handleRejectedClose(symbol: string, reason: string): void {
    const { state } = this.deps;

    if (NOTHING_TO_REDUCE.test(reason)) {
      state.forget(symbol);
      return;
    }

    const rejections = state.noteCloseRejected(symbol);
    if (rejections >= MAX_CLOSE_REJECTIONS) {
      this.log.error('Giving up on closing mirrored position; close it manually', {
        symbol,
        rejections,
        reason,
      });
      state.forget(symbol);
    }
  }

  private completeCycle(summary: CycleSummary): CycleSummary {
    this.stats.cyclesCompleted++;
    this.lastCycleAt = Date.now();
    this.lastError = null;
    this.noteDuration(summary.durationMs);
    metrics.cycleDuration.labels('completed').observe(summary.durationMs);
    this.setState(CONTROLLER_STATES.IDLE);
    this.emit('cycleCompleted', summary);
    return summary;
  }

  private failCycle(cycle: number, startedAt: number, context: string, error: unknown): null {
    const classified = classifyError(error);
    const durationMs = Date.now() - startedAt;

    this.stats.cyclesFailed++;
    this.lastCycleAt = Date.now();
    this.lastError = `${context}: ${classified.message}`;
    this.noteDuration(durationMs);
    metrics.cycleDuration.labels('failed').observe(durationMs);

    this.log.warn('Cycle failed; baseline unchanged', { cycle, context, error: classified.message });
    this.setState(CONTROLLER_STATES.IDLE);
    this.emit('cycleFailed', classified);
    return null;
  }

  private noteDuration(durationMs: number): void {
    this.cycleDurations.push(durationMs);
    if (this.cycleDurations.length > CYCLE_DURATION_SAMPLES) {
      this.cycleDurations.shift();
    }
  }

  private setState(next: ControllerState): void {
    if (this.controllerState === next) {
      return;
    }
    this.controllerState = next;
    this.emit('stateChanged', next);
  }

  // ============================================
  // Read-only accessors
  // ============================================

  getState(): ReplicationStateView {
    const { state } = this.deps;
    return {
      state: this.controllerState,
      isRunning: this.running,
      targetAddress: this.config.targetAddress,
      watermark: state.watermark,
      cycleCount: this.cycleCount,
      lastCycleAt: this.lastCycleAt,
      lastSnapshotAt: state.getPrevious()?.timestamp ?? null,
      lastError: this.lastError,
      preexistingSymbols: [...state.getPreexisting()].sort(),
      mirroredPositions: state.getMirroredPositions(),
    };
  }

  getRecentEvents(limit: number = 50): PositionChangeEvent[] {
    return this.deps.state.getRecentEvents(limit);
  }

  /**
   * Newest first, from every process sharing the ledger
   */
  async getRecentCalls(limit: number = 50, windowMs: number = 300000): Promise<CallRecord[]> {
    if (!this.deps.ledger) {
      return [];
    }
    return this.deps.ledger.recentCalls(windowMs, limit);
  }

  getStats(): ReplicationStats {
    return {
      ...this.stats,
      avgCycleDurationMs: mean(this.cycleDurations),
    };
  }
}
