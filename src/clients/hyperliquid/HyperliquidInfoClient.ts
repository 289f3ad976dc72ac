import axios, { type AxiosInstance } from 'axios';
import type { z } from 'zod';
import type {
  AccountDataSource,
  AccountSnapshot,
  InstrumentInfo,
  InstrumentRegistry,
  Position,
} from '../shared/interfaces.js';
import { createSnapshot } from '../shared/interfaces.js';
import { AllMidsSchema, ClearinghouseStateSchema, MetaSchema, type HyperliquidPosition, type Meta } from './types.js';
import { API_ENDPOINTS, POSITION_SIDES } from '../../config/constants.js';
import { logger, shortAddress, type Logger } from '../../utils/logger.js';

export interface HyperliquidInfoClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Instrument metadata from the `meta` universe; the asset index is the array position
 */
export class HyperliquidInstrumentRegistry implements InstrumentRegistry {
  private bySymbol: Map<string, InstrumentInfo> = new Map();

  constructor(meta: Meta) {
    meta.universe.forEach((asset, assetIndex) => {
      this.bySymbol.set(asset.name, {
        symbol: asset.name,
        assetIndex,
        szDecimals: asset.szDecimals,
        maxLeverage: asset.maxLeverage,
        onlyIsolated: asset.onlyIsolated ?? false,
      });
    });
  }

  getInstrument(symbol: string): InstrumentInfo | undefined {
    return this.bySymbol.get(symbol);
  }

  size(): number {
    return this.bySymbol.size;
  }
}

/**
 * Read-only client for the Hyperliquid `/info` endpoint
 */
export class HyperliquidInfoClient implements AccountDataSource {
  private http: AxiosInstance;
  private log: Logger;

  constructor(config: HyperliquidInfoClientConfig) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
    this.log = logger('HyperliquidInfoClient');
  }

  /**
   * Perpetual positions and account value for `address`
   */
  async fetchAccountState(address: string): Promise<AccountSnapshot> {
    const state = await this.post(ClearinghouseStateSchema, { type: API_ENDPOINTS.CLEARINGHOUSE_STATE, user: address });

    const positions: Position[] = [];
    for (const { position } of state.assetPositions) {
      const mapped = toPosition(position);
      if (mapped) {
        positions.push(mapped);
      }
    }

    const snapshot = createSnapshot(address, Date.now(), positions, Number(state.marginSummary.accountValue));

    this.log.debug('Fetched account state', {
      address: shortAddress(address),
      positions: positions.length,
      equity: snapshot.equity,
    });

    return snapshot;
  }

  async fetchMeta(): Promise<Meta> {
    return this.post(MetaSchema, { type: API_ENDPOINTS.META });
  }

  async fetchInstruments(): Promise<HyperliquidInstrumentRegistry> {
    return new HyperliquidInstrumentRegistry(await this.fetchMeta());
  }

  /**
   * Mid price per symbol
   */
  async fetchMidPrices(): Promise<Record<string, number>> {
    const mids = await this.post(AllMidsSchema, { type: API_ENDPOINTS.ALL_MIDS });

    const prices: Record<string, number> = {};
    for (const [symbol, price] of Object.entries(mids)) {
      prices[symbol] = Number(price);
    }
    return prices;
  }

  private async post<T>(schema: z.ZodType<T>, body: Record<string, unknown>): Promise<T> {
    const response = await this.http.post<unknown>('/info', body);
    return schema.parse(response.data);
  }
}

function toPosition(raw: HyperliquidPosition): Position | null {
  const signedSize = Number(raw.szi);
  if (!Number.isFinite(signedSize) || signedSize === 0) {
    return null;
  }

  return {
    symbol: raw.coin,
    side: signedSize > 0 ? POSITION_SIDES.LONG : POSITION_SIDES.SHORT,
    size: Math.abs(signedSize),
    entryPrice: raw.entryPx ? Number(raw.entryPx) : 0,
    leverage: Math.round(raw.leverage.value),
    marginMode: raw.leverage.type,
    liquidationPrice: raw.liquidationPx ? Number(raw.liquidationPx) : null,
  };
}
