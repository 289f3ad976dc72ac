/**
 * Replication Types
 *
 * Type definitions for the position replication engine
 */

import type { ChangeKind, ControllerState, MarginMode, PositionSide } from '../../config/constants.js';
import type { OrderInstruction, OrderResult } from '../../clients/shared/interfaces.js';

// ============================================
// Change Detection
// ============================================

/**
 * One position transition observed on the target account
 */
export interface PositionChangeEvent {
  id: string;
  symbol: string;
  kind: ChangeKind;
  /** Absolute size before the change, 0 for opened */
  previousSize: number;
  /** Absolute size after the change, 0 for closed */
  newSize: number;
  /** Side of the position this event concerns */
  side: PositionSide;
  /** Timestamp of the snapshot the change was seen in */
  detectedAt: number;
}

/**
 * Context the differ needs besides the two snapshots
 */
export interface DiffContext {
  /** Epoch milliseconds; snapshots before it never open a lifecycle */
  watermark: number;
  /** Symbols already open on the target before the watermark */
  preexisting: ReadonlySet<string>;
}

// ============================================
// Replication State
// ============================================

/**
 * Controller-side position opened by the engine
 */
export interface MirroredPosition {
  symbol: string;
  side: PositionSide;
  size: number;
  leverage: number;
  marginMode: MarginMode;
  openedAt: number;
  updatedAt: number;
}

/**
 * Read-only view of the controller's state for presentation layers
 */
export interface ReplicationStateView {
  state: ControllerState;
  isRunning: boolean;
  targetAddress: string;
  watermark: number;
  cycleCount: number;
  lastCycleAt: number | null;
  lastSnapshotAt: number | null;
  lastError: string | null;
  preexistingSymbols: string[];
  mirroredPositions: MirroredPosition[];
}

export interface ReplicationStats {
  cyclesCompleted: number;
  cyclesFailed: number;
  staleCycles: number;
  eventsDetected: number;
  ordersAccepted: number;
  ordersRejected: number;
  ordersFailed: number;
  sizingUnderflows: number;
  eventsSkipped: number;
  avgCycleDurationMs: number;
}

// ============================================
// Controller Events
// ============================================

export interface CycleSummary {
  cycle: number;
  durationMs: number;
  events: number;
  submitted: number;
  stale: boolean;
  /** Set on the first cycle, which only records the baseline */
  baseline: boolean;
}

export interface ReplicationControllerEvents {
  positionChange: (event: PositionChangeEvent) => void;
  orderSubmitted: (instruction: OrderInstruction, result: OrderResult) => void;
  orderFailed: (instruction: OrderInstruction, error: Error) => void;
  cycleCompleted: (summary: CycleSummary) => void;
  cycleFailed: (error: Error) => void;
  stateChanged: (state: ControllerState) => void;
  started: () => void;
  stopped: () => void;
}
