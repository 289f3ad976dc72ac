import type { ChangeKind, MarginMode, OrderSide, PositionSide } from '../../config/constants.js';

// ============================================
// Account State Types
// ============================================

/**
 * One open perpetual position
 */
export interface Position {
  /** Instrument symbol (coin name on Hyperliquid) */
  symbol: string;
  side: PositionSide;
  /** Absolute size in base units, always > 0 */
  size: number;
  entryPrice: number;
  /** Integer leverage */
  leverage: number;
  marginMode: MarginMode;
  /** Null when the exchange reports none (e.g. fully collateralised) */
  liquidationPrice: number | null;
}

/**
 * Point-in-time view of an account. Frozen once captured; a newer snapshot supersedes it.
 */
export interface AccountSnapshot {
  readonly address: string;
  /** Capture time in epoch milliseconds */
  readonly timestamp: number;
  readonly positions: Readonly<Record<string, Readonly<Position>>>;
  /** Total account value in USD */
  readonly equity: number;
}

// ============================================
// Order Types
// ============================================

/**
 * Order the replication engine wants placed on the controller account
 */
export interface OrderInstruction {
  /** Change event this order was derived from */
  eventId: string;
  /** Change kind this order answers */
  kind: ChangeKind;
  symbol: string;
  side: OrderSide;
  size: number;
  reduceOnly: boolean;
  marginMode: MarginMode;
  leverage: number;
}

/**
 * Outcome of an order submission
 */
export type OrderResult =
  | {
      status: 'accepted';
      orderId?: string;
      /** Size actually filled; absent when the sink cannot tell */
      filledSize?: number;
      averagePrice?: number;
    }
  | {
      status: 'rejected';
      reason: string;
    };

// ============================================
// Instrument Metadata
// ============================================

/**
 * Trading rules for one perpetual instrument
 */
export interface InstrumentInfo {
  symbol: string;
  /** Asset index used on the wire */
  assetIndex: number;
  /** Size increment is 10^-szDecimals */
  szDecimals: number;
  maxLeverage: number;
  onlyIsolated: boolean;
}

/**
 * Lookup of instrument metadata by symbol
 */
export interface InstrumentRegistry {
  getInstrument(symbol: string): InstrumentInfo | undefined;
}

// ============================================
// Collaborator Boundaries
// ============================================

/**
 * Read side of the exchange
 */
export interface AccountDataSource {
  fetchAccountState(address: string): Promise<AccountSnapshot>;
}

/**
 * The only mutating boundary. Throws on transport failure; resolves with
 * `rejected` when the exchange refuses the order.
 */
export interface OrderSink {
  submitOrder(instruction: OrderInstruction): Promise<OrderResult>;
}

/**
 * Build a frozen snapshot, dropping flat positions
 */
export function createSnapshot(
  address: string,
  timestamp: number,
  positions: Position[],
  equity: number
): AccountSnapshot {
  const bySymbol: Record<string, Readonly<Position>> = {};
  for (const position of positions) {
    if (position.size > 0) {
      bySymbol[position.symbol] = Object.freeze({ ...position });
    }
  }

  return Object.freeze({
    address: address.toLowerCase(),
    timestamp,
    positions: Object.freeze(bySymbol),
    equity,
  });
}
