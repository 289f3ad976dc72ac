/**
 * Call Ledger
 *
 * Shared, time-windowed record of every exchange API call. The trading process
 * writes it, the monitor process and the rate governor read it. Recording never
 * fails the caller: a lost record is logged and counted, not thrown.
 */

import { CallRecordSchema, type AppendLog, type CallRecord } from './types.js';
import { FileAppendLog } from './FileAppendLog.js';
import type { CallLedgerConfig } from '../../config/schema.js';
import { errorMessage } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import { ledgerWriteFailures } from '../../utils/metrics.js';

export interface CallLedgerOptions {
  /** Defaults to this process's pid */
  processId?: string;
}

export class CallLedger {
  private log: Logger;
  private store: AppendLog<CallRecord>;
  private processId: string;

  constructor(store: AppendLog<CallRecord>, options: CallLedgerOptions = {}) {
    this.store = store;
    this.processId = options.processId ?? String(process.pid);
    this.log = logger('CallLedger');
  }

  /**
   * Ledger backed by segment files in a shared directory
   */
  static fromConfig(config: CallLedgerConfig, options: CallLedgerOptions = {}): CallLedger {
    const store = new FileAppendLog<CallRecord>({
      directory: config.directory,
      schema: CallRecordSchema,
      timestampOf: (record) => record.startedAt,
      segmentMs: config.segmentMs,
      retentionMs: config.retentionMs,
      prefix: 'calls',
    });
    return new CallLedger(store, options);
  }

  getProcessId(): string {
    return this.processId;
  }

  /**
   * Record a completed call. Never rejects.
   */
  async record(endpoint: string, durationMs: number, statusCode: number | null, error?: string | null): Promise<void> {
    const finishedAt = Date.now();
    const entry: CallRecord = {
      endpoint,
      startedAt: finishedAt - Math.max(0, Math.round(durationMs)),
      durationMs: Math.max(0, Math.round(durationMs)),
      statusCode,
      error: error ?? null,
      processId: this.processId,
    };

    try {
      await this.store.append(entry);
    } catch (err) {
      ledgerWriteFailures.inc();
      this.log.warn('Failed to write call record', { endpoint, error: errorMessage(err) });
    }
  }

  /**
   * Records from every process that started within the last `windowMs`
   */
  async callsSince(windowMs: number): Promise<CallRecord[]> {
    return this.store.scanSince(Date.now() - windowMs);
  }

  /**
   * Most recent records, newest first
   */
  async recentCalls(windowMs: number, limit: number): Promise<CallRecord[]> {
    const records = await this.callsSince(windowMs);
    return records.slice(-limit).reverse();
  }
}
