// Hyperliquid API endpoints
export const HYPERLIQUID_ENDPOINTS = {
  MAINNET: 'https://api.hyperliquid.xyz',
  TESTNET: 'https://api.hyperliquid-testnet.xyz',
} as const;

// Endpoint names as they appear in the call ledger
export const API_ENDPOINTS = {
  CLEARINGHOUSE_STATE: 'clearinghouseState',
  META: 'meta',
  ALL_MIDS: 'allMids',
  ORDER: 'order',
  UPDATE_LEVERAGE: 'updateLeverage',
} as const;

// Position sides
export const POSITION_SIDES = {
  LONG: 'long',
  SHORT: 'short',
} as const;

export type PositionSide = (typeof POSITION_SIDES)[keyof typeof POSITION_SIDES];

// Order sides
export const ORDER_SIDES = {
  BUY: 'buy',
  SELL: 'sell',
} as const;

export type OrderSide = (typeof ORDER_SIDES)[keyof typeof ORDER_SIDES];

// Margin modes
export const MARGIN_MODES = {
  ISOLATED: 'isolated',
  CROSS: 'cross',
} as const;

export type MarginMode = (typeof MARGIN_MODES)[keyof typeof MARGIN_MODES];

// Position change kinds
export const CHANGE_KINDS = {
  OPENED: 'opened',
  CLOSED: 'closed',
  INCREASED: 'increased',
  DECREASED: 'decreased',
} as const;

export type ChangeKind = (typeof CHANGE_KINDS)[keyof typeof CHANGE_KINDS];

// Replication controller states
export const CONTROLLER_STATES = {
  IDLE: 'idle',
  POLLING: 'polling',
  DIFFING: 'diffing',
  SIZING: 'sizing',
  SUBMITTING: 'submitting',
  STOPPED: 'stopped',
} as const;

export type ControllerState = (typeof CONTROLLER_STATES)[keyof typeof CONTROLLER_STATES];

// Rolling window the rate governor counts calls over
export const RATE_WINDOW_MS = 60_000;

// HTTP status the exchange uses for throttling
export const HTTP_TOO_MANY_REQUESTS = 429;

// Error message fragments that indicate throttling when no status is available
export const RATE_LIMIT_KEYWORDS = [
  'rate limit',
  'too many requests',
  'throttle',
  'quota exceeded',
  'limit exceeded',
] as const;

// Sizes below this are treated as flat
export const SIZE_EPSILON = 1e-9;

// Hyperliquid perps allow at most this many price decimals (minus szDecimals)
export const MAX_PERP_PRICE_DECIMALS = 6;

// Significant figures accepted in a price
export const PRICE_SIGNIFICANT_FIGURES = 5;
