/**
 * Position Replication Module
 *
 * Mirrors a target account's perpetual positions onto the controller account.
 *
 * Main Components:
 * - ReplicationController: polling loop and cycle state machine
 * - diffPositions: snapshot pair -> change events
 * - SizingCalculator: change event -> order instruction
 * - ReplicationState: state carried across cycles
 */

export {
  ReplicationController,
  type ReplicationControllerConfig,
  type ReplicationControllerDeps,
} from './ReplicationController.js';
export { diffPositions, eventId } from './PositionDiffer.js';
export { SizingCalculator, type SizingConfig, type SizingOutcome } from './SizingCalculator.js';
export { ReplicationState } from './ReplicationState.js';

export type {
  PositionChangeEvent,
  DiffContext,
  MirroredPosition,
  ReplicationStateView,
  ReplicationStats,
  CycleSummary,
  ReplicationControllerEvents,
} from './types.js';
