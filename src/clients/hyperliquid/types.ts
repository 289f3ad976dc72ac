import { z } from 'zod';

// ============================================
// Info API responses
// ============================================

// Hyperliquid sends decimals as strings
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'expected a decimal string');

export const HyperliquidLeverageSchema = z.object({
  type: z.enum(['cross', 'isolated']),
  value: z.number(),
  rawUsd: decimalString.optional(),
});

export const HyperliquidPositionSchema = z.object({
  coin: z.string(),
  szi: decimalString,
  entryPx: decimalString.nullable().optional(),
  leverage: HyperliquidLeverageSchema,
  liquidationPx: decimalString.nullable().optional(),
  positionValue: decimalString.optional(),
  marginUsed: decimalString.optional(),
  unrealizedPnl: decimalString.optional(),
});

export const ClearinghouseStateSchema = z.object({
  marginSummary: z.object({
    accountValue: decimalString,
    totalNtlPos: decimalString.optional(),
    totalMarginUsed: decimalString.optional(),
  }),
  withdrawable: decimalString.optional(),
  assetPositions: z.array(
    z.object({
      type: z.string().optional(),
      position: HyperliquidPositionSchema,
    })
  ),
  time: z.number().optional(),
});

export const MetaSchema = z.object({
  universe: z.array(
    z.object({
      name: z.string(),
      szDecimals: z.number().int().nonnegative(),
      maxLeverage: z.number().int().positive(),
      onlyIsolated: z.boolean().optional(),
      isDelisted: z.boolean().optional(),
    })
  ),
});

export const AllMidsSchema = z.record(z.string(), decimalString);

export type HyperliquidPosition = z.infer<typeof HyperliquidPositionSchema>;
export type ClearinghouseState = z.infer<typeof ClearinghouseStateSchema>;
export type Meta = z.infer<typeof MetaSchema>;
export type AllMids = z.infer<typeof AllMidsSchema>;

// ============================================
// Exchange API
// ============================================

/**
 * Order as it goes on the wire. Key order is part of the signed hash.
 */
export interface OrderWire {
  a: number; // asset index
  b: boolean; // is buy
  p: string; // limit price
  s: string; // size
  r: boolean; // reduce only
  t: { limit: { tif: 'Ioc' | 'Gtc' | 'Alo' } };
}

export interface OrderAction {
  type: 'order';
  orders: OrderWire[];
  grouping: 'na';
}

export interface UpdateLeverageAction {
  type: 'updateLeverage';
  asset: number;
  isCross: boolean;
  leverage: number;
}

export type ExchangeAction = OrderAction | UpdateLeverageAction;

export interface ExchangeSignature {
  r: string;
  s: string;
  v: number;
}

export interface ExchangeRequest {
  action: ExchangeAction;
  nonce: number;
  signature: ExchangeSignature;
  vaultAddress: string | null;
}

const OrderStatusSchema = z.union([
  z.object({ filled: z.object({ totalSz: decimalString, avgPx: decimalString, oid: z.number() }) }),
  z.object({ resting: z.object({ oid: z.number() }) }),
  z.object({ error: z.string() }),
]);

export const ExchangeResponseSchema = z.union([
  z.object({
    status: z.literal('ok'),
    response: z
      .object({
        type: z.string(),
        data: z.object({ statuses: z.array(OrderStatusSchema) }).optional(),
      })
      .optional(),
  }),
  z.object({
    status: z.literal('err'),
    response: z.string(),
  }),
]);

export type OrderStatus = z.infer<typeof OrderStatusSchema>;
export type ExchangeResponse = z.infer<typeof ExchangeResponseSchema>;
