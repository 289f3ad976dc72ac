/**
 * Hyperliquid Order Sink
 *
 * Places each instruction as a marketable IOC limit order at mid price plus or
 * minus the slippage allowance. Opening orders set the instrument's leverage
 * and margin mode first.
 */

import { floatToWire, slippagePrice } from './signing.js';
import type { ExchangeResponse, OrderWire } from './types.js';
import type { InstrumentRegistry, OrderInstruction, OrderResult, OrderSink } from '../shared/interfaces.js';
import { MARGIN_MODES, ORDER_SIDES } from '../../config/constants.js';
import { isRateLimitSignal, RateLimitedError } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import { roundTo } from '../../utils/math.js';

/**
 * The `/exchange` actions the sink places; HyperliquidExchangeClient or a tracked wrapper
 */
export interface ExchangeActions {
  updateLeverage(asset: number, isCross: boolean, leverage: number): Promise<ExchangeResponse>;
  placeOrders(orders: OrderWire[]): Promise<ExchangeResponse>;
}

export interface MidPriceSource {
  fetchMidPrices(): Promise<Record<string, number>>;
}

export interface HyperliquidOrderSinkConfig {
  slippagePercent: number;
}

export class HyperliquidOrderSink implements OrderSink {
  private log: Logger;
  private exchange: ExchangeActions;
  private instruments: InstrumentRegistry;
  private prices: MidPriceSource;
  private config: HyperliquidOrderSinkConfig;

  constructor(
    exchange: ExchangeActions,
    instruments: InstrumentRegistry,
    prices: MidPriceSource,
    config: HyperliquidOrderSinkConfig
  ) {
    this.exchange = exchange;
    this.instruments = instruments;
    this.prices = prices;
    this.config = config;
    this.log = logger('HyperliquidOrderSink');
  }

  async submitOrder(instruction: OrderInstruction): Promise<OrderResult> {
    const instrument = this.instruments.getInstrument(instruction.symbol);
    if (!instrument) {
      return { status: 'rejected', reason: `Unknown instrument ${instruction.symbol}` };
    }

    if (!instruction.reduceOnly) {
      const leverageResponse = await this.exchange.updateLeverage(
        instrument.assetIndex,
        instruction.marginMode === MARGIN_MODES.CROSS,
        instruction.leverage
      );
      if (leverageResponse.status === 'err') {
        throwIfRateLimited(leverageResponse.response);
        // The order still goes out at the account's current leverage
        this.log.warn('Could not set leverage', {
          symbol: instruction.symbol,
          leverage: instruction.leverage,
          reason: leverageResponse.response,
        });
      }
    }

    const mids = await this.prices.fetchMidPrices();
    const mid = mids[instruction.symbol];
    if (mid === undefined || !(mid > 0)) {
      return { status: 'rejected', reason: `No mid price for ${instruction.symbol}` };
    }

    const isBuy = instruction.side === ORDER_SIDES.BUY;
    const order: OrderWire = {
      a: instrument.assetIndex,
      b: isBuy,
      p: floatToWire(slippagePrice(mid, isBuy, this.config.slippagePercent, instrument.szDecimals)),
      s: floatToWire(roundTo(instruction.size, instrument.szDecimals)),
      r: instruction.reduceOnly,
      t: { limit: { tif: 'Ioc' } },
    };

    return interpretOrderResponse(await this.exchange.placeOrders([order]));
  }
}

/**
 * Map an `/exchange` order response onto an OrderResult
 */
export function interpretOrderResponse(response: ExchangeResponse): OrderResult {
  if (response.status === 'err') {
    throwIfRateLimited(response.response);
    return { status: 'rejected', reason: response.response };
  }

  const status = response.response?.data?.statuses[0];
  if (!status) {
    return { status: 'rejected', reason: 'Exchange returned no order status' };
  }

  if ('filled' in status) {
    return {
      status: 'accepted',
      orderId: String(status.filled.oid),
      filledSize: Number(status.filled.totalSz),
      averagePrice: Number(status.filled.avgPx),
    };
  }

  if ('resting' in status) {
    return { status: 'accepted', orderId: String(status.resting.oid) };
  }

  throwIfRateLimited(status.error);
  return { status: 'rejected', reason: status.error };
}

/**
 * Throttling message carried by an otherwise successful HTTP response, if any
 */
export function rateLimitMessage(response: ExchangeResponse): string | null {
  if (response.status === 'err') {
    return isRateLimitSignal(null, response.response) ? response.response : null;
  }
  for (const status of response.response?.data?.statuses ?? []) {
    if ('error' in status && isRateLimitSignal(null, status.error)) {
      return status.error;
    }
  }
  return null;
}

function throwIfRateLimited(message: string): void {
  if (isRateLimitSignal(null, message)) {
    throw new RateLimitedError(message);
  }
}
