/**
 * Sizing Calculator
 *
 * Converts a target-account change event into a controller-account order:
 * - opened: target size scaled by the account ratio
 * - increased / decreased: scaled delta only
 * - closed: exactly the mirrored size, reduce-only
 *
 * The ratio is controller equity over target equity, or a configured fixed ratio.
 * Sizes are floored to the instrument's size increment; a size that floors to
 * zero is an underflow, handled as a no-op.
 */

import type { InstrumentInfo, InstrumentRegistry, OrderInstruction, Position } from '../../clients/shared/interfaces.js';
import type { ReplicationConfig } from '../../config/schema.js';
import {
  CHANGE_KINDS,
  MARGIN_MODES,
  ORDER_SIDES,
  POSITION_SIDES,
  type MarginMode,
  type OrderSide,
  type PositionSide,
} from '../../config/constants.js';
import { floorToDecimals } from '../../utils/math.js';
import { logger, type Logger } from '../../utils/logger.js';
import { sizingUnderflows } from '../../utils/metrics.js';
import type { MirroredPosition, PositionChangeEvent } from './types.js';

export type SizingConfig = Pick<ReplicationConfig, 'sizingMode' | 'fixedRatio' | 'marginModePolicy' | 'maxLeverage'>;

/**
 * Result of sizing one event
 */
export type SizingOutcome =
  | { type: 'order'; instruction: OrderInstruction }
  /** Scaled size rounded to zero */
  | { type: 'underflow'; scaledSize: number }
  /** Event cannot be sized (no mirrored lifecycle, unknown instrument, ...) */
  | { type: 'skip'; reason: string }
  /** Opening blocked until the mirrored position on the other side is closed */
  | { type: 'deferred'; reason: string };

export class SizingCalculator {
  private log: Logger;
  private instruments: InstrumentRegistry;
  private config: SizingConfig;

  constructor(instruments: InstrumentRegistry, config: SizingConfig) {
    this.instruments = instruments;
    this.config = config;
    this.log = logger('SizingCalculator');
  }

  /**
   * Whether sizing `event` needs the equity ratio (and so the controller's equity)
   */
  needsRatio(event: PositionChangeEvent): boolean {
    return this.config.sizingMode === 'equity' && event.kind !== CHANGE_KINDS.CLOSED;
  }

  /**
   * Controller-to-target scale factor; null when it cannot be computed
   */
  ratio(targetEquity: number, controllerEquity: number): number | null {
    if (this.config.sizingMode === 'fixed') {
      return this.config.fixedRatio;
    }
    if (!(targetEquity > 0) || !(controllerEquity >= 0)) {
      return null;
    }
    return controllerEquity / targetEquity;
  }

  /**
   * Order for `event`, or null when nothing should be submitted
   */
  sizeFor(
    event: PositionChangeEvent,
    targetEquity: number,
    controllerEquity: number,
    targetPosition: Readonly<Position> | null,
    mirrored?: MirroredPosition
  ): OrderInstruction | null {
    const outcome = this.evaluate(event, targetEquity, controllerEquity, targetPosition, mirrored);
    return outcome.type === 'order' ? outcome.instruction : null;
  }

  evaluate(
    event: PositionChangeEvent,
    targetEquity: number,
    controllerEquity: number,
    targetPosition: Readonly<Position> | null,
    mirrored?: MirroredPosition
  ): SizingOutcome {
    const instrument = this.instruments.getInstrument(event.symbol);
    if (!instrument) {
      return this.skip(event, `unknown instrument ${event.symbol}`);
    }

    if (event.kind === CHANGE_KINDS.CLOSED) {
      if (!mirrored) {
        return this.skip(event, 'no mirrored position to close');
      }
      return this.order(event, closingSide(mirrored.side), mirrored.size, true, mirrored.marginMode, mirrored.leverage);
    }

    const ratio = this.ratio(targetEquity, controllerEquity);
    if (ratio === null) {
      return this.skip(event, `cannot compute ratio from equities ${controllerEquity}/${targetEquity}`);
    }

    switch (event.kind) {
      case CHANGE_KINDS.OPENED: {
        if (mirrored && mirrored.side !== event.side) {
          this.log.debug('Event deferred', { eventId: event.id, mirroredSide: mirrored.side });
          return { type: 'deferred', reason: `mirrored ${mirrored.side} still open` };
        }
        if (mirrored) {
          return this.skip(event, 'lifecycle already mirrored');
        }
        if (!targetPosition) {
          return this.skip(event, 'target position missing from snapshot');
        }
        const size = floorToDecimals(targetPosition.size * ratio, instrument.szDecimals);
        if (size <= 0) {
          return this.underflow(event, targetPosition.size * ratio);
        }
        return this.order(
          event,
          openingSide(event.side),
          size,
          false,
          this.marginModeFor(targetPosition.marginMode, instrument),
          this.leverageFor(targetPosition.leverage, instrument)
        );
      }

      case CHANGE_KINDS.INCREASED: {
        if (!mirrored) {
          return this.skip(event, 'lifecycle not mirrored');
        }
        if (mirrored.side !== event.side) {
          return this.skip(event, `mirrored position is ${mirrored.side}`);
        }
        const scaled = (event.newSize - event.previousSize) * ratio;
        const size = floorToDecimals(scaled, instrument.szDecimals);
        if (size <= 0) {
          return this.underflow(event, scaled);
        }
        return this.order(event, openingSide(mirrored.side), size, false, mirrored.marginMode, mirrored.leverage);
      }

      case CHANGE_KINDS.DECREASED: {
        if (!mirrored) {
          return this.skip(event, 'lifecycle not mirrored');
        }
        if (mirrored.side !== event.side) {
          return this.skip(event, `mirrored position is ${mirrored.side}`);
        }
        const scaled = (event.previousSize - event.newSize) * ratio;
        const size = Math.min(floorToDecimals(scaled, instrument.szDecimals), mirrored.size);
        if (size <= 0) {
          return this.underflow(event, scaled);
        }
        return this.order(event, closingSide(mirrored.side), size, true, mirrored.marginMode, mirrored.leverage);
      }

      default:
        return this.skip(event, 'unsupported change kind');
    }
  }

  /**
   * Target leverage capped by the instrument and the configured maximum
   */
  leverageFor(targetLeverage: number, instrument: InstrumentInfo): number {
    let leverage = Math.min(Math.floor(targetLeverage), instrument.maxLeverage);
    if (this.config.maxLeverage !== undefined) {
      leverage = Math.min(leverage, this.config.maxLeverage);
    }
    return Math.max(1, leverage);
  }

  marginModeFor(targetMode: MarginMode, instrument: InstrumentInfo): MarginMode {
    if (instrument.onlyIsolated || this.config.marginModePolicy === 'isolated') {
      return MARGIN_MODES.ISOLATED;
    }
    return targetMode;
  }

  private order(
    event: PositionChangeEvent,
    side: OrderSide,
    size: number,
    reduceOnly: boolean,
    marginMode: MarginMode,
    leverage: number
  ): SizingOutcome {
    return {
      type: 'order',
      instruction: {
        eventId: event.id,
        kind: event.kind,
        symbol: event.symbol,
        side,
        size,
        reduceOnly,
        marginMode,
        leverage,
      },
    };
  }

  private underflow(event: PositionChangeEvent, scaledSize: number): SizingOutcome {
    sizingUnderflows.inc();
    this.log.info('Scaled size rounds to zero, nothing to submit', {
      eventId: event.id,
      kind: event.kind,
      scaledSize,
    });
    return { type: 'underflow', scaledSize };
  }

  private skip(event: PositionChangeEvent, reason: string): SizingOutcome {
    this.log.debug('Event not sized', { eventId: event.id, reason });
    return { type: 'skip', reason };
  }
}

function openingSide(side: PositionSide): OrderSide {
  return side === POSITION_SIDES.LONG ? ORDER_SIDES.BUY : ORDER_SIDES.SELL;
}

function closingSide(side: PositionSide): OrderSide {
  return side === POSITION_SIDES.LONG ? ORDER_SIDES.SELL : ORDER_SIDES.BUY;
}
