/**
 * Exchange actions routed through the API call tracker, so that leverage
 * updates and order placements are each admitted by the rate governor and
 * recorded in the call ledger under their own endpoint.
 */

import type { ExchangeActions } from './HyperliquidOrderSink.js';
import { rateLimitMessage } from './HyperliquidOrderSink.js';
import type { ExchangeResponse, OrderWire } from './types.js';
import type { ApiCallTracker } from '../shared/instrumentation.js';
import { API_ENDPOINTS } from '../../config/constants.js';
import { RateLimitedError } from '../../utils/errors.js';

export class TrackedExchangeClient implements ExchangeActions {
  private inner: ExchangeActions;
  private tracker: ApiCallTracker;

  constructor(inner: ExchangeActions, tracker: ApiCallTracker) {
    this.inner = inner;
    this.tracker = tracker;
  }

  updateLeverage(asset: number, isCross: boolean, leverage: number): Promise<ExchangeResponse> {
    return this.tracker.call(API_ENDPOINTS.UPDATE_LEVERAGE, () =>
      surfaceThrottling(this.inner.updateLeverage(asset, isCross, leverage))
    );
  }

  placeOrders(orders: OrderWire[]): Promise<ExchangeResponse> {
    return this.tracker.call(API_ENDPOINTS.ORDER, () => surfaceThrottling(this.inner.placeOrders(orders)));
  }
}

// Throttling reported in the body is recorded as a rate-limit hit
async function surfaceThrottling(pending: Promise<ExchangeResponse>): Promise<ExchangeResponse> {
  const response = await pending;
  const message = rateLimitMessage(response);
  if (message !== null) {
    throw new RateLimitedError(message);
  }
  return response;
}
