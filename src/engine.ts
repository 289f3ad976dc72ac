/**
 * Engine wiring
 *
 * Builds every component explicitly from configuration and hands each one its
 * collaborators. No component reaches for a shared instance on its own.
 */

import type { Config } from './config/index.js';
import { getApiUrl, validateEngineConfig } from './config/index.js';
import { API_ENDPOINTS } from './config/constants.js';
import type { AccountDataSource, OrderSink } from './clients/shared/interfaces.js';
import { ApiCallTracker, TrackedAccountDataSource } from './clients/shared/instrumentation.js';
import {
  HyperliquidExchangeClient,
  HyperliquidInfoClient,
  HyperliquidOrderSink,
  TrackedExchangeClient,
  type MidPriceSource,
} from './clients/hyperliquid/index.js';
import { CallLedger } from './services/callLedger/index.js';
import { RateGovernor } from './services/rateGovernor/index.js';
import { StateCache } from './services/stateCache/index.js';
import { PaperTradingEngine } from './services/paperTrading/index.js';
import { ReplicationController, ReplicationState, SizingCalculator } from './services/replication/index.js';
import { ConfigurationError } from './utils/errors.js';
import { logger } from './utils/logger.js';

const log = logger('Engine');

export interface Engine {
  controller: ReplicationController;
  ledger: CallLedger;
  governor: RateGovernor;
  tracker: ApiCallTracker;
  cache: StateCache;
}

/**
 * Assemble the replication engine. Fetches instrument metadata once.
 */
export async function createEngine(config: Config): Promise<Engine> {
  const validation = validateEngineConfig(config);
  const targetAddress = config.replication.targetAddress;
  if (!validation.valid || !targetAddress) {
    throw new ConfigurationError(`Missing configuration: ${validation.missing.join(', ')}`);
  }

  const ledger = CallLedger.fromConfig(config.callLedger);
  const governor = new RateGovernor(ledger, config.rateLimit);
  const tracker = new ApiCallTracker(ledger, governor);
  const cache = new StateCache(governor, { defaultTtlMs: config.replication.cacheTtlMs });

  const baseUrl = getApiUrl(config);
  const info = new HyperliquidInfoClient({ baseUrl, timeoutMs: config.hyperliquid.requestTimeoutMs });
  const targetSource = new TrackedAccountDataSource(info, tracker);

  const instruments = await tracker.call(API_ENDPOINTS.META, () => info.fetchInstruments());
  log.info('Loaded instrument metadata', { instruments: instruments.size() });

  const prices: MidPriceSource = {
    fetchMidPrices: () => tracker.call(API_ENDPOINTS.ALL_MIDS, () => info.fetchMidPrices()),
  };

  let controllerSource: AccountDataSource;
  let orderSink: OrderSink;
  let controllerAddress: string;

  if (config.trading.paperTrading) {
    const paper = new PaperTradingEngine({ initialEquity: config.trading.paperTradingEquity }, prices);
    controllerSource = paper;
    orderSink = paper;
    controllerAddress = paper.getAddress();
  } else {
    const privateKey = config.hyperliquid.controllerPrivateKey;
    const tradingAddress = config.hyperliquid.vaultAddress ?? config.hyperliquid.controllerAddress;
    if (!privateKey || !tradingAddress) {
      throw new ConfigurationError('Live trading needs CONTROLLER_PRIVATE_KEY and a trading address');
    }

    const exchange = new HyperliquidExchangeClient({
      baseUrl,
      privateKey,
      vaultAddress: config.hyperliquid.vaultAddress ?? null,
      isMainnet: config.hyperliquid.network === 'mainnet',
      timeoutMs: config.hyperliquid.requestTimeoutMs,
    });

    controllerSource = targetSource;
    orderSink = new HyperliquidOrderSink(new TrackedExchangeClient(exchange, tracker), instruments, prices, {
      slippagePercent: config.replication.slippagePercent,
    });
    controllerAddress = tradingAddress;
  }

  const watermark = (config.replication.watermarkStart ?? new Date()).getTime();
  const state = new ReplicationState(watermark, config.replication.recentEventsLimit);
  const sizing = new SizingCalculator(instruments, config.replication);

  const controller = new ReplicationController(
    {
      targetAddress,
      controllerAddress,
      pollIntervalMs: config.replication.pollIntervalMs,
      cacheTtlMs: config.replication.cacheTtlMs,
      executionTimeoutMs: config.trading.executionTimeoutMs,
      orderRetryAttempts: config.trading.orderRetryAttempts,
      orderRetryDelayMs: config.trading.orderRetryDelayMs,
    },
    { targetSource, controllerSource, orderSink, cache, sizing, state, ledger }
  );

  return { controller, ledger, governor, tracker, cache };
}
