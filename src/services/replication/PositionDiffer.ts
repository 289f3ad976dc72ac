/**
 * Position Differ
 *
 * Turns two consecutive target snapshots into position change events. Pure:
 * the same pair and context always yield the same events, ids included.
 */

import type { AccountSnapshot, Position } from '../../clients/shared/interfaces.js';
import { CHANGE_KINDS, type ChangeKind, type PositionSide } from '../../config/constants.js';
import { isEffectivelyZero } from '../../utils/math.js';
import type { DiffContext, PositionChangeEvent } from './types.js';

/**
 * Compute change events between `previous` and `current`.
 *
 * Events are ordered by symbol, and within a symbol a `closed` precedes the
 * `opened` of a side flip. Without a previous snapshot nothing is emitted.
 */
export function diffPositions(
  previous: AccountSnapshot | null,
  current: AccountSnapshot,
  context: DiffContext
): PositionChangeEvent[] {
  if (previous === null) {
    return [];
  }

  const symbols = new Set([...Object.keys(previous.positions), ...Object.keys(current.positions)]);
  const afterWatermark = current.timestamp >= context.watermark;
  const events: PositionChangeEvent[] = [];

  for (const symbol of [...symbols].sort()) {
    const before = openPosition(previous.positions[symbol]);
    const after = openPosition(current.positions[symbol]);
    const preexisting = context.preexisting.has(symbol);

    const emit = (kind: ChangeKind, previousSize: number, newSize: number, side: PositionSide): void => {
      events.push({
        id: eventId(symbol, kind, current.timestamp),
        symbol,
        kind,
        previousSize,
        newSize,
        side,
        detectedAt: current.timestamp,
      });
    };

    if (!before && after) {
      if (afterWatermark && !preexisting) {
        emit(CHANGE_KINDS.OPENED, 0, after.size, after.side);
      }
      continue;
    }

    if (before && !after) {
      if (!preexisting) {
        emit(CHANGE_KINDS.CLOSED, before.size, 0, before.side);
      }
      continue;
    }

    if (!before || !after) {
      continue;
    }

    if (before.side !== after.side) {
      if (!preexisting) {
        emit(CHANGE_KINDS.CLOSED, before.size, 0, before.side);
      }
      // A flip starts a new lifecycle, even on a symbol held before the watermark
      if (afterWatermark) {
        emit(CHANGE_KINDS.OPENED, 0, after.size, after.side);
      }
      continue;
    }

    if (preexisting || isEffectivelyZero(after.size - before.size)) {
      continue;
    }

    const kind = after.size > before.size ? CHANGE_KINDS.INCREASED : CHANGE_KINDS.DECREASED;
    emit(kind, before.size, after.size, after.side);
  }

  return events;
}

/**
 * Stable identifier for an event
 */
export function eventId(symbol: string, kind: ChangeKind, detectedAt: number): string {
  return `${symbol}:${kind}:${detectedAt}`;
}

function openPosition(position: Readonly<Position> | undefined): Readonly<Position> | null {
  if (!position || isEffectivelyZero(position.size)) {
    return null;
  }
  return position;
}
