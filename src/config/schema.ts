import { z } from 'zod';

const addressSchema = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'must be a 0x-prefixed 20-byte hex address');

// Hyperliquid connection and credentials
const HyperliquidConfigSchema = z.object({
  network: z.enum(['mainnet', 'testnet']).default('mainnet'),
  apiUrl: z.string().url().optional(),
  // Controller credentials - only required for live trading
  controllerAddress: addressSchema.optional(),
  controllerPrivateKey: z.string().optional(),
  // Trade on behalf of a vault or subaccount
  vaultAddress: addressSchema.optional(),
  requestTimeoutMs: z.number().positive().default(10000),
});

// Replication engine configuration
const ReplicationConfigSchema = z.object({
  targetAddress: addressSchema.optional(),
  // Positions opened on the target before this instant are never mirrored
  watermarkStart: z.coerce.date().optional(),
  pollIntervalMs: z.number().positive().default(30000),
  cacheTtlMs: z.number().positive().default(60000),
  sizingMode: z.enum(['equity', 'fixed']).default('equity'),
  fixedRatio: z.number().positive().default(1),
  // Isolated margin on the controller side regardless of the target's mode
  marginModePolicy: z.enum(['isolated', 'mirror']).default('isolated'),
  maxLeverage: z.number().int().positive().optional(),
  slippagePercent: z.number().min(0).max(50).default(2),
  recentEventsLimit: z.number().int().positive().default(200),
});

// Rate governor thresholds (calls per rolling 60s window, all processes)
const RateLimitConfigSchema = z
  .object({
    softLimitPerMinute: z.number().int().positive().default(15),
    hardLimitPerMinute: z.number().int().positive().default(20),
    cooldownMs: z.number().positive().default(30000),
    delayPerCallMs: z.number().positive().default(2000),
    maxDelayMs: z.number().positive().default(15000),
  })
  .refine((cfg) => cfg.softLimitPerMinute <= cfg.hardLimitPerMinute, {
    message: 'softLimitPerMinute must not exceed hardLimitPerMinute',
    path: ['softLimitPerMinute'],
  });

// Shared cross-process call ledger
const CallLedgerConfigSchema = z.object({
  directory: z.string().min(1),
  retentionMs: z.number().positive().default(300000),
  segmentMs: z.number().positive().default(60000),
  // Refresh period of the standalone monitor process
  monitorIntervalMs: z.number().positive().default(5000),
});

// Order execution
const TradingConfigSchema = z.object({
  paperTrading: z.boolean().default(true),
  paperTradingEquity: z.number().positive().default(10000),
  executionTimeoutMs: z.number().positive().default(10000),
  orderRetryAttempts: z.number().int().min(1).max(10).default(3),
  orderRetryDelayMs: z.number().positive().default(1000),
});

// Status API configuration
const ApiConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().min(1).max(65535).default(3000),
  enableMetrics: z.boolean().default(true),
});

// File logging
const LoggingConfigSchema = z.object({
  fileLoggingEnabled: z.boolean().default(false),
  directory: z.string().default('./logs'),
});

// Main configuration schema
export const ConfigSchema = z.object({
  env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  hyperliquid: HyperliquidConfigSchema,
  replication: ReplicationConfigSchema,
  rateLimit: RateLimitConfigSchema,
  callLedger: CallLedgerConfigSchema,
  trading: TradingConfigSchema,
  api: ApiConfigSchema,
  logging: LoggingConfigSchema,
});

// Export types
export type Config = z.infer<typeof ConfigSchema>;
export type HyperliquidConfig = z.infer<typeof HyperliquidConfigSchema>;
export type ReplicationConfig = z.infer<typeof ReplicationConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type CallLedgerConfig = z.infer<typeof CallLedgerConfigSchema>;
export type TradingConfig = z.infer<typeof TradingConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
