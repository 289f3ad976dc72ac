import * as dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigSchema, type Config } from './schema.js';
import { HYPERLIQUID_ENDPOINTS } from './constants.js';
import { ConfigurationError } from '../utils/errors.js';

// Load environment variables
dotenv.config();

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse an optional number; unset or unparsable values stay undefined
 */
function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Empty strings count as unset
 */
function optionalString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Build configuration object from environment variables
 */
function buildConfigFromEnv(): unknown {
  const env = process.env;

  return {
    env: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',

    hyperliquid: {
      network: env['HYPERLIQUID_NETWORK'] || 'mainnet',
      apiUrl: optionalString(env['HYPERLIQUID_API_URL']),
      controllerAddress: optionalString(env['CONTROLLER_ADDRESS']),
      controllerPrivateKey: optionalString(env['CONTROLLER_PRIVATE_KEY']),
      vaultAddress: optionalString(env['VAULT_ADDRESS']),
      requestTimeoutMs: parseNumber(env['HYPERLIQUID_TIMEOUT_MS'], 10000),
    },

    replication: {
      targetAddress: optionalString(env['TARGET_ADDRESS']),
      watermarkStart: optionalString(env['WATERMARK_START']),
      pollIntervalMs: parseNumber(env['POLL_INTERVAL_MS'], 30000),
      cacheTtlMs: parseNumber(env['CACHE_TTL_MS'], 60000),
      sizingMode: env['SIZING_MODE'] || 'equity',
      fixedRatio: parseNumber(env['FIXED_RATIO'], 1),
      marginModePolicy: env['MARGIN_MODE_POLICY'] || 'isolated',
      maxLeverage: parseOptionalNumber(env['MAX_LEVERAGE']),
      slippagePercent: parseNumber(env['SLIPPAGE_PERCENT'], 2),
      recentEventsLimit: parseNumber(env['RECENT_EVENTS_LIMIT'], 200),
    },

    rateLimit: {
      softLimitPerMinute: parseNumber(env['RATE_SOFT_LIMIT'], 15),
      hardLimitPerMinute: parseNumber(env['RATE_HARD_LIMIT'], 20),
      cooldownMs: parseNumber(env['RATE_COOLDOWN_MS'], 30000),
      delayPerCallMs: parseNumber(env['RATE_DELAY_PER_CALL_MS'], 2000),
      maxDelayMs: parseNumber(env['RATE_MAX_DELAY_MS'], 15000),
    },

    callLedger: {
      // Every process on the host must agree on this directory
      directory: env['CALL_LEDGER_DIR'] || path.join(os.tmpdir(), 'perp-mirror-calls'),
      retentionMs: parseNumber(env['CALL_LEDGER_RETENTION_MS'], 300000),
      segmentMs: parseNumber(env['CALL_LEDGER_SEGMENT_MS'], 60000),
      monitorIntervalMs: parseNumber(env['MONITOR_INTERVAL_MS'], 5000),
    },

    trading: {
      paperTrading: parseBoolean(env['PAPER_TRADING'], true),
      paperTradingEquity: parseNumber(env['PAPER_TRADING_EQUITY'], 10000),
      executionTimeoutMs: parseNumber(env['EXECUTION_TIMEOUT_MS'], 10000),
      orderRetryAttempts: parseNumber(env['ORDER_RETRY_ATTEMPTS'], 3),
      orderRetryDelayMs: parseNumber(env['ORDER_RETRY_DELAY_MS'], 1000),
    },

    api: {
      enabled: parseBoolean(env['API_ENABLED'], true),
      port: parseNumber(env['API_PORT'], 3000),
      enableMetrics: parseBoolean(env['ENABLE_METRICS'], true),
    },

    logging: {
      fileLoggingEnabled: parseBoolean(env['FILE_LOGGING_ENABLED'], false),
      directory: env['LOG_DIRECTORY'] || './logs',
    },
  };
}

/**
 * Validate and load configuration
 */
function loadConfig(): Config {
  const rawConfig = buildConfigFromEnv();

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
      throw new ConfigurationError(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }
}

// Singleton config instance
let configInstance: Config | null = null;

/**
 * Get the configuration instance (lazy loaded)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reload configuration from environment (useful for testing)
 */
export function reloadConfig(): Config {
  configInstance = loadConfig();
  return configInstance;
}

/**
 * Resolve the Hyperliquid base URL for the configured network
 */
export function getApiUrl(config: Config = getConfig()): string {
  if (config.hyperliquid.apiUrl) {
    return config.hyperliquid.apiUrl;
  }
  return config.hyperliquid.network === 'mainnet' ? HYPERLIQUID_ENDPOINTS.MAINNET : HYPERLIQUID_ENDPOINTS.TESTNET;
}

/**
 * Check what the engine needs before it may start
 */
export function validateEngineConfig(config: Config = getConfig()): { valid: boolean; missing: string[] } {
  const missing: string[] = [];

  if (!config.replication.targetAddress) {
    missing.push('TARGET_ADDRESS');
  }

  if (!config.trading.paperTrading) {
    if (!config.hyperliquid.controllerPrivateKey) {
      missing.push('CONTROLLER_PRIVATE_KEY');
    }
    if (!config.hyperliquid.controllerAddress && !config.hyperliquid.vaultAddress) {
      missing.push('CONTROLLER_ADDRESS or VAULT_ADDRESS');
    }
  }

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Check if running in paper trading mode
 */
export function isPaperTrading(): boolean {
  return getConfig().trading.paperTrading;
}

// Re-export types and constants
export * from './schema.js';
export * from './constants.js';
