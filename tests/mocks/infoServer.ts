/**
 * Mock Hyperliquid info server for testing
 * Serves clearinghouseState, meta and allMids from in-memory fixtures over HTTP
 */

import type { Server } from 'http';
import express from 'express';

export interface MockAccountState {
  accountValue: string;
  /** coin -> signed size, e.g. '-0.5' for a short */
  positions: Record<string, { szi: string; leverage: number; type?: 'cross' | 'isolated'; entryPx?: string }>;
}

export class MockInfoServer {
  private server: Server | null = null;
  private accounts: Map<string, MockAccountState> = new Map();
  private url: string | null = null;

  /** Bodies of every request received, oldest first */
  requests: unknown[] = [];
  /** Answer every request with HTTP 429 */
  throttle = false;

  universe: Array<{ name: string; szDecimals: number; maxLeverage: number; onlyIsolated?: boolean }> = [
    { name: 'BTC', szDecimals: 5, maxLeverage: 50 },
    { name: 'ETH', szDecimals: 4, maxLeverage: 25 },
  ];
  mids: Record<string, string> = { BTC: '50123.5', ETH: '3000' };

  setAccount(address: string, state: MockAccountState): void {
    this.accounts.set(address.toLowerCase(), state);
  }

  /**
   * Start listening on an ephemeral port
   */
  async start(): Promise<string> {
    const app = express();
    app.use(express.json());

    app.post('/info', (req, res) => {
      const body: unknown = req.body;
      this.requests.push(body);

      if (this.throttle) {
        res.status(429).json({ error: 'Too Many Requests' });
        return;
      }

      const type = typeof body === 'object' && body !== null && 'type' in body ? body.type : undefined;
      const user = typeof body === 'object' && body !== null && 'user' in body ? String(body.user) : '';

      switch (type) {
        case 'clearinghouseState':
          res.json(this.clearinghouseState(user));
          return;
        case 'meta':
          res.json({ universe: this.universe });
          return;
        case 'allMids':
          res.json(this.mids);
          return;
        default:
          res.status(400).json({ error: `Unknown request type ${String(type)}` });
      }
    });

    const server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Mock info server has no port');
    }
    this.url = `http://127.0.0.1:${address.port}`;
    return this.url;
  }

  /**
   * Stop the mock server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  getUrl(): string {
    if (!this.url) {
      throw new Error('Mock info server not started');
    }
    return this.url;
  }

  reset(): void {
    this.requests = [];
    this.throttle = false;
    this.accounts.clear();
  }

  private clearinghouseState(user: string) {
    const account = this.accounts.get(user.toLowerCase()) ?? { accountValue: '0.0', positions: {} };
    return {
      marginSummary: { accountValue: account.accountValue, totalNtlPos: '0.0', totalMarginUsed: '0.0' },
      withdrawable: account.accountValue,
      assetPositions: Object.entries(account.positions).map(([coin, position]) => ({
        type: 'oneWay',
        position: {
          coin,
          szi: position.szi,
          entryPx: position.entryPx ?? null,
          leverage: { type: position.type ?? 'cross', value: position.leverage },
          liquidationPx: null,
        },
      })),
      time: Date.now(),
    };
  }
}
