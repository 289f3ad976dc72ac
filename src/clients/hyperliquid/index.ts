export {
  HyperliquidInfoClient,
  HyperliquidInstrumentRegistry,
  type HyperliquidInfoClientConfig,
} from './HyperliquidInfoClient.js';
export { HyperliquidExchangeClient, type HyperliquidExchangeClientConfig } from './HyperliquidExchangeClient.js';
export {
  HyperliquidOrderSink,
  interpretOrderResponse,
  rateLimitMessage,
  type ExchangeActions,
  type HyperliquidOrderSinkConfig,
  type MidPriceSource,
} from './HyperliquidOrderSink.js';
export { TrackedExchangeClient } from './TrackedExchangeClient.js';
export { actionHash, floatToWire, signL1Action, slippagePrice } from './signing.js';
export type * from './types.js';
