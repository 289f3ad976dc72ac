/**
 * Call ledger monitor
 *
 * Separate process that reads the shared call ledger and logs the aggregate
 * call rate, per-process and per-endpoint counts, latency and rate-limit hits.
 * It writes nothing to the ledger.
 */

import { getConfig } from './config/index.js';
import { RATE_WINDOW_MS } from './config/constants.js';
import { CallLedger, summarizeCalls, type CallStats } from './services/callLedger/index.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { formatDuration, interruptibleSleep } from './utils/time.js';

const log = logger('Monitor');

function report(minute: CallStats, retention: CallStats, hardLimit: number, softLimit: number): void {
  const level = minute.totalCalls >= hardLimit ? 'error' : minute.totalCalls >= softLimit ? 'warn' : 'info';

  log[level]('Call rate', {
    callsLastMinute: minute.totalCalls,
    softLimitPerMinute: softLimit,
    hardLimitPerMinute: hardLimit,
    byProcess: minute.byProcess,
    byEndpoint: minute.byEndpoint,
    avgDurationMs: Math.round(minute.avgDurationMs),
    maxDurationMs: minute.maxDurationMs,
    failedCalls: minute.failedCalls,
  });

  if (retention.rateLimitHits > 0) {
    log.warn('Rate limit responses in retention window', {
      hits: retention.rateLimitHits,
      window: formatDuration(retention.windowMs),
      recent: retention.recentRateLimitEvents.map((r) => ({
        endpoint: r.endpoint,
        processId: r.processId,
        at: new Date(r.startedAt).toISOString(),
        error: r.error,
      })),
    });
  }
}

async function main(): Promise<void> {
  const config = getConfig();
  const intervalMs = config.callLedger.monitorIntervalMs;
  const ledger = CallLedger.fromConfig(config.callLedger, { processId: `monitor-${process.pid}` });

  log.info('Monitoring call ledger', { directory: config.callLedger.directory, interval: formatDuration(intervalMs) });

  let running = true;
  let pending: { promise: Promise<void>; cancel: () => void } | null = null;
  const stop = (signal: string): void => {
    log.info(`Received ${signal}, stopping monitor`);
    running = false;
    pending?.cancel();
  };
  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  while (running) {
    try {
      const records = await ledger.callsSince(config.callLedger.retentionMs);
      const cutoff = Date.now() - RATE_WINDOW_MS;
      const minute = summarizeCalls(
        records.filter((r) => r.startedAt >= cutoff),
        RATE_WINDOW_MS
      );
      const retention = summarizeCalls(records, config.callLedger.retentionMs);
      report(minute, retention, config.rateLimit.hardLimitPerMinute, config.rateLimit.softLimitPerMinute);
    } catch (error) {
      log.error('Failed to read call ledger', { error: errorMessage(error) });
    }

    pending = interruptibleSleep(intervalMs);
    await pending.promise;
  }
}

main().catch((error: unknown) => {
  log.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
