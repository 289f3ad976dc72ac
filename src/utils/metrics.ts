import client, { Counter, Gauge, Histogram, Registry } from 'prom-client';

// Create a custom registry
const registry = new Registry();

// Add default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================
// API Call Metrics
// ============================================

export const apiCalls = new Counter({
  name: 'api_calls_total',
  help: 'Total exchange API calls made by this process',
  labelNames: ['endpoint', 'status'] as const,
  registers: [registry],
});

export const apiLatency = new Histogram({
  name: 'api_call_latency_ms',
  help: 'Exchange API call latency in milliseconds',
  labelNames: ['endpoint'] as const,
  buckets: [25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [registry],
});

export const ledgerWriteFailures = new Counter({
  name: 'call_ledger_write_failures_total',
  help: 'Call ledger appends that failed and were dropped',
  registers: [registry],
});

export const ledgerSegmentsEvicted = new Counter({
  name: 'call_ledger_segments_evicted_total',
  help: 'Call ledger segment files removed by retention',
  registers: [registry],
});

// ============================================
// Rate Governor Metrics
// ============================================

export const governorDecisions = new Counter({
  name: 'rate_governor_decisions_total',
  help: 'Rate governor decisions',
  labelNames: ['endpoint', 'decision'] as const,
  registers: [registry],
});

export const governorCallsPerMinute = new Gauge({
  name: 'rate_governor_calls_per_minute',
  help: 'Aggregate calls in the last 60s across all processes sharing the ledger',
  registers: [registry],
});

export const rateLimitWaits = new Histogram({
  name: 'rate_limit_wait_ms',
  help: 'Time spent delayed by the rate governor in milliseconds',
  labelNames: ['endpoint'] as const,
  buckets: [100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [registry],
});

// ============================================
// State Cache Metrics
// ============================================

export const cacheLookups = new Counter({
  name: 'state_cache_lookups_total',
  help: 'State cache lookups by outcome',
  labelNames: ['endpoint', 'result'] as const, // result: hit | miss | stale
  registers: [registry],
});

// ============================================
// Replication Metrics
// ============================================

export const changeEventsDetected = new Counter({
  name: 'replication_change_events_total',
  help: 'Position change events detected on the target account',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const ordersSubmitted = new Counter({
  name: 'replication_orders_total',
  help: 'Orders submitted to the controller account',
  labelNames: ['kind', 'result'] as const, // result: accepted | rejected | failed
  registers: [registry],
});

export const sizingUnderflows = new Counter({
  name: 'replication_sizing_underflows_total',
  help: 'Change events whose scaled size rounded to zero',
  registers: [registry],
});

export const mirroredPositions = new Gauge({
  name: 'replication_mirrored_positions',
  help: 'Positions currently mirrored on the controller account',
  registers: [registry],
});

export const cycleDuration = new Histogram({
  name: 'replication_cycle_duration_ms',
  help: 'Duration of one poll/diff/size/submit cycle',
  labelNames: ['outcome'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [registry],
});

export const staleSnapshotsUsed = new Counter({
  name: 'replication_stale_snapshots_total',
  help: 'Cycles that proceeded on a stale target snapshot',
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Get all metrics as string for Prometheus scraping
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get content type for metrics response
 */
export function getContentType(): string {
  return registry.contentType;
}

/**
 * Helper to record an API call outcome
 */
export function recordApiCall(endpoint: string, status: 'success' | 'error', durationMs: number): void {
  apiCalls.labels(endpoint, status).inc();
  apiLatency.labels(endpoint).observe(durationMs);
}
