import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ORDER_SIDES, POSITION_SIDES, type PositionSide } from '../../config/constants.js';
import type {
  AccountDataSource,
  AccountSnapshot,
  OrderInstruction,
  OrderResult,
  OrderSink,
  Position,
} from '../../clients/shared/interfaces.js';
import { createSnapshot } from '../../clients/shared/interfaces.js';
import type { MidPriceSource } from '../../clients/hyperliquid/HyperliquidOrderSink.js';
import { errorMessage } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import { isEffectivelyZero } from '../../utils/math.js';

/**
 * Paper trade configuration
 */
export interface PaperTradingConfig {
  /** Account value reported for the simulated controller account */
  initialEquity: number;
  /** Address the simulated account reports */
  address: string;
}

/**
 * Paper Trading Engine
 * Simulates the controller account: fills every valid order in full at the
 * current mid price and tracks the resulting positions.
 */
export class PaperTradingEngine extends EventEmitter implements OrderSink, AccountDataSource {
  private log: Logger;
  private config: PaperTradingConfig;
  private positions: Map<string, Position> = new Map();
  private prices: MidPriceSource | null;
  private fills: Array<{ orderId: string; instruction: OrderInstruction; price: number; at: number }> = [];

  constructor(config: Partial<PaperTradingConfig> = {}, prices: MidPriceSource | null = null) {
    super();
    this.log = logger('PaperTradingEngine');
    this.config = {
      initialEquity: config.initialEquity ?? 10000,
      address: config.address ?? 'paper',
    };
    this.prices = prices;

    this.log.info('Paper trading initialized', { initialEquity: this.config.initialEquity });
  }

  getAddress(): string {
    return this.config.address;
  }

  /**
   * Fill an order against the simulated account
   */
  async submitOrder(instruction: OrderInstruction): Promise<OrderResult> {
    if (!(instruction.size > 0)) {
      return { status: 'rejected', reason: `Invalid size ${instruction.size}` };
    }

    const existing = this.positions.get(instruction.symbol);
    const orderSide: PositionSide = instruction.side === ORDER_SIDES.BUY ? POSITION_SIDES.LONG : POSITION_SIDES.SHORT;

    if (instruction.reduceOnly && (!existing || existing.side === orderSide)) {
      return { status: 'rejected', reason: 'Reduce only order would increase position' };
    }

    const price = await this.markPrice(instruction.symbol, existing?.entryPrice ?? 0);
    let filledSize = instruction.size;

    if (!existing) {
      this.positions.set(instruction.symbol, {
        symbol: instruction.symbol,
        side: orderSide,
        size: filledSize,
        entryPrice: price,
        leverage: instruction.leverage,
        marginMode: instruction.marginMode,
        liquidationPrice: null,
      });
    } else if (existing.side === orderSide) {
      const size = existing.size + filledSize;
      this.positions.set(instruction.symbol, {
        ...existing,
        size,
        entryPrice: size > 0 ? (existing.entryPrice * existing.size + price * filledSize) / size : price,
        leverage: instruction.leverage,
      });
    } else {
      // Reduce-only orders never flip the position
      if (instruction.reduceOnly) {
        filledSize = Math.min(filledSize, existing.size);
      }
      const remaining = existing.size - filledSize;
      if (isEffectivelyZero(remaining)) {
        this.positions.delete(instruction.symbol);
      } else if (remaining > 0) {
        this.positions.set(instruction.symbol, { ...existing, size: remaining });
      } else {
        this.positions.set(instruction.symbol, {
          ...existing,
          side: orderSide,
          size: -remaining,
          entryPrice: price,
        });
      }
    }

    const orderId = `paper:${uuidv4()}`;
    this.fills.push({ orderId, instruction, price, at: Date.now() });

    this.log.info('Paper order filled', {
      orderId,
      symbol: instruction.symbol,
      side: instruction.side,
      size: filledSize,
      price,
      reduceOnly: instruction.reduceOnly,
    });
    this.emit('orderFilled', instruction, filledSize, price);

    return { status: 'accepted', orderId, filledSize, averagePrice: price };
  }

  /**
   * Snapshot of the simulated account; the address argument is ignored
   */
  async fetchAccountState(_address: string): Promise<AccountSnapshot> {
    return createSnapshot(this.config.address, Date.now(), [...this.positions.values()], this.config.initialEquity);
  }

  getPosition(symbol: string): Position | undefined {
    return this.positions.get(symbol);
  }

  getFillCount(): number {
    return this.fills.length;
  }

  private async markPrice(symbol: string, fallback: number): Promise<number> {
    if (!this.prices) {
      return fallback;
    }
    try {
      const mids = await this.prices.fetchMidPrices();
      return mids[symbol] ?? fallback;
    } catch (error) {
      this.log.warn('Mid price unavailable, using last entry price', { symbol, error: errorMessage(error) });
      return fallback;
    }
  }
}
