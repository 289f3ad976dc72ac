import { z } from 'zod';

/**
 * One API call as seen by the ledger
 */
export interface CallRecord {
  /** Logical endpoint name (e.g. clearinghouseState, order) */
  endpoint: string;
  /** Epoch milliseconds when the call began */
  startedAt: number;
  durationMs: number;
  /** HTTP status, or null when no response arrived */
  statusCode: number | null;
  error: string | null;
  /** Writer process identity; several processes share one ledger */
  processId: string;
}

export const CallRecordSchema = z.object({
  endpoint: z.string().min(1),
  startedAt: z.number().finite(),
  durationMs: z.number().nonnegative(),
  statusCode: z.number().int().nullable(),
  error: z.string().nullable(),
  processId: z.string().min(1),
});

/**
 * Append-only store, readable by processes other than the writer
 */
export interface AppendLog<T> {
  append(entry: T): Promise<void>;
  /** Entries whose timestamp is at or after `sinceMs`, oldest first */
  scanSince(sinceMs: number): Promise<T[]>;
}

/**
 * Aggregated view over a window of call records
 */
export interface CallStats {
  windowMs: number;
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  rateLimitHits: number;
  callsPerMinute: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  byEndpoint: Record<string, number>;
  byProcess: Record<string, number>;
  activeProcesses: string[];
  recentRateLimitEvents: CallRecord[];
}
