import axios, { type AxiosInstance } from 'axios';
import { Wallet } from 'ethers';
import { signL1Action } from './signing.js';
import {
  ExchangeResponseSchema,
  type ExchangeAction,
  type ExchangeRequest,
  type ExchangeResponse,
  type OrderWire,
} from './types.js';
import { logger, shortAddress, type Logger } from '../../utils/logger.js';

export interface HyperliquidExchangeClientConfig {
  baseUrl: string;
  privateKey: string;
  /** Trade on behalf of this vault or subaccount */
  vaultAddress: string | null;
  isMainnet: boolean;
  timeoutMs: number;
}

/**
 * Signed client for the Hyperliquid `/exchange` endpoint
 */
export class HyperliquidExchangeClient {
  private http: AxiosInstance;
  private wallet: Wallet;
  private config: HyperliquidExchangeClientConfig;
  private log: Logger;
  private lastNonce = 0;

  constructor(config: HyperliquidExchangeClientConfig) {
    this.config = config;
    this.wallet = new Wallet(config.privateKey);
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
    this.log = logger('HyperliquidExchangeClient');
    this.log.info('Exchange client ready', {
      signer: shortAddress(this.wallet.address),
      vault: config.vaultAddress ? shortAddress(config.vaultAddress) : null,
      network: config.isMainnet ? 'mainnet' : 'testnet',
    });
  }

  getSignerAddress(): string {
    return this.wallet.address;
  }

  /**
   * Place orders as one `na`-grouped batch
   */
  async placeOrders(orders: OrderWire[]): Promise<ExchangeResponse> {
    return this.postAction({ type: 'order', orders, grouping: 'na' });
  }

  async updateLeverage(asset: number, isCross: boolean, leverage: number): Promise<ExchangeResponse> {
    return this.postAction({ type: 'updateLeverage', asset, isCross, leverage });
  }

  private async postAction(action: ExchangeAction): Promise<ExchangeResponse> {
    const nonce = this.nextNonce();
    const signature = await signL1Action(
      this.wallet,
      action,
      this.config.vaultAddress,
      nonce,
      this.config.isMainnet
    );

    const request: ExchangeRequest = {
      action,
      nonce,
      signature,
      vaultAddress: this.config.vaultAddress,
    };

    const response = await this.http.post<unknown>('/exchange', request);
    return ExchangeResponseSchema.parse(response.data);
  }

  // Nonces must be unique and increasing per signer
  private nextNonce(): number {
    const nonce = Math.max(Date.now(), this.lastNonce + 1);
    this.lastNonce = nonce;
    return nonce;
  }
}
