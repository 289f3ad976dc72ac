import type { CallRecord, CallStats } from './types.js';
import { isRateLimitSignal } from '../../utils/errors.js';
import { RATE_WINDOW_MS } from '../../config/constants.js';

const MAX_RATE_LIMIT_EVENTS = 10;

/**
 * Whether a record shows the exchange throttling us
 */
export function isRateLimitRecord(record: CallRecord): boolean {
  return isRateLimitSignal(record.statusCode, record.error);
}

/**
 * Summarize a window of call records for the status API and the monitor
 */
export function summarizeCalls(records: CallRecord[], windowMs: number): CallStats {
  const byEndpoint: Record<string, number> = {};
  const byProcess: Record<string, number> = {};
  const rateLimitEvents: CallRecord[] = [];

  let successfulCalls = 0;
  let totalDuration = 0;
  let minDurationMs = Number.POSITIVE_INFINITY;
  let maxDurationMs = 0;

  for (const record of records) {
    byEndpoint[record.endpoint] = (byEndpoint[record.endpoint] ?? 0) + 1;
    byProcess[record.processId] = (byProcess[record.processId] ?? 0) + 1;

    if (record.error === null) {
      successfulCalls++;
    }
    if (isRateLimitRecord(record)) {
      rateLimitEvents.push(record);
    }

    totalDuration += record.durationMs;
    minDurationMs = Math.min(minDurationMs, record.durationMs);
    maxDurationMs = Math.max(maxDurationMs, record.durationMs);
  }

  const totalCalls = records.length;
  const windowMinutes = windowMs / RATE_WINDOW_MS;

  return {
    windowMs,
    totalCalls,
    successfulCalls,
    failedCalls: totalCalls - successfulCalls,
    rateLimitHits: rateLimitEvents.length,
    callsPerMinute: windowMinutes > 0 ? totalCalls / windowMinutes : 0,
    avgDurationMs: totalCalls > 0 ? totalDuration / totalCalls : 0,
    minDurationMs: totalCalls > 0 ? minDurationMs : 0,
    maxDurationMs,
    byEndpoint,
    byProcess,
    activeProcesses: Object.keys(byProcess).sort(),
    recentRateLimitEvents: rateLimitEvents.slice(-MAX_RATE_LIMIT_EVENTS),
  };
}
