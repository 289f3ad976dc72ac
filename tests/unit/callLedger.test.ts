import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  CallLedger,
  CallRecordSchema,
  FileAppendLog,
  InMemoryAppendLog,
  summarizeCalls,
  type AppendLog,
  type CallRecord,
} from '../../src/services/callLedger/index.js';

const T0 = 1_700_000_000_000;

function fileLog(directory: string): FileAppendLog<CallRecord> {
  return new FileAppendLog<CallRecord>({
    directory,
    schema: CallRecordSchema,
    timestampOf: (r) => r.startedAt,
    segmentMs: 60000,
    retentionMs: 300000,
    prefix: 'calls',
  });
}

function record(overrides: Partial<CallRecord> = {}): CallRecord {
  return {
    endpoint: 'clearinghouseState',
    startedAt: T0,
    durationMs: 100,
    statusCode: 200,
    error: null,
    processId: 'p1',
    ...overrides,
  };
}

describe('Call Ledger', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
  });

  describe('CallLedger over an in-memory log', () => {
    it('should record a call with its start time and process id', async () => {
      const ledger = new CallLedger(new InMemoryAppendLog<CallRecord>((r) => r.startedAt), { processId: 'worker-a' });

      await ledger.record('meta', 250, 200);

      const calls = await ledger.callsSince(60000);
      expect(calls).toEqual([
        {
          endpoint: 'meta',
          startedAt: T0 - 250,
          durationMs: 250,
          statusCode: 200,
          error: null,
          processId: 'worker-a',
        },
      ]);
    });

    it('should default the process id to the pid', () => {
      const ledger = new CallLedger(new InMemoryAppendLog<CallRecord>((r) => r.startedAt));
      expect(ledger.getProcessId()).toBe(String(process.pid));
    });

    it('should only return calls inside the window', async () => {
      const ledger = new CallLedger(new InMemoryAppendLog<CallRecord>((r) => r.startedAt));

      await ledger.record('meta', 0, 200);
      vi.setSystemTime(T0 + 90000);
      await ledger.record('allMids', 0, 200);

      const calls = await ledger.callsSince(60000);
      expect(calls.map((c) => c.endpoint)).toEqual(['allMids']);
    });

    it('should see records from every writer sharing the log', async () => {
      const shared = new InMemoryAppendLog<CallRecord>((r) => r.startedAt);
      const a = new CallLedger(shared, { processId: 'a' });
      const b = new CallLedger(shared, { processId: 'b' });

      await a.record('clearinghouseState', 0, 200);
      await b.record('order', 0, 429, 'Too Many Requests');

      const fromA = await a.callsSince(60000);
      expect(fromA.map((c) => c.processId)).toEqual(['a', 'b']);
    });

    it('should never reject when the store fails', async () => {
      const broken: AppendLog<CallRecord> = {
        append: async () => {
          throw new Error('disk full');
        },
        scanSince: async () => [],
      };
      const ledger = new CallLedger(broken);

      await expect(ledger.record('meta', 10, 200)).resolves.toBeUndefined();
    });

    it('should return recent calls newest first', async () => {
      const ledger = new CallLedger(new InMemoryAppendLog<CallRecord>((r) => r.startedAt));
      await ledger.record('meta', 0, 200);
      vi.setSystemTime(T0 + 1000);
      await ledger.record('allMids', 0, 200);
      vi.setSystemTime(T0 + 2000);
      await ledger.record('order', 0, 200);

      const recent = await ledger.recentCalls(60000, 2);
      expect(recent.map((c) => c.endpoint)).toEqual(['order', 'allMids']);
    });
  });

  describe('FileAppendLog', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-test-'));
    });

    afterEach(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    it('should write one JSON line per record into the minute segment', async () => {
      const log = fileLog(directory);
      await log.append(record({ startedAt: T0 }));
      await log.append(record({ startedAt: T0 + 5 }));

      const segmentStart = Math.floor(T0 / 60000) * 60000;
      const content = await fs.readFile(path.join(directory, `calls-${segmentStart}.jsonl`), 'utf8');
      expect(content.trim().split('\n')).toHaveLength(2);
    });

    it('should be readable by a second instance on the same directory', async () => {
      await fileLog(directory).append(record({ processId: 'writer' }));

      const reader = fileLog(directory);
      const entries = await reader.scanSince(T0 - 1000);
      expect(entries).toEqual([record({ processId: 'writer' })]);
    });

    it('should skip a torn trailing line and invalid records', async () => {
      const log = fileLog(directory);
      await log.append(record());

      const segmentStart = Math.floor(T0 / 60000) * 60000;
      const file = path.join(directory, `calls-${segmentStart}.jsonl`);
      await fs.appendFile(file, '{"endpoint":"meta","startedAt":17\n');
      await fs.appendFile(file, `${JSON.stringify({ endpoint: 'meta' })}\n`);
      await fs.appendFile(file, '{"endpoint":"ord');

      const entries = await log.scanSince(T0 - 1000);
      expect(entries).toHaveLength(1);
    });

    it('should return an empty list when the directory does not exist', async () => {
      const log = fileLog(path.join(directory, 'missing'));
      await expect(log.scanSince(0)).resolves.toEqual([]);
    });

    it('should return entries across segments oldest first', async () => {
      const log = fileLog(directory);
      await log.append(record({ startedAt: T0 + 61000, endpoint: 'order' }));
      await log.append(record({ startedAt: T0, endpoint: 'meta' }));

      const entries = await log.scanSince(T0 - 1000);
      expect(entries.map((e) => e.endpoint)).toEqual(['meta', 'order']);
    });

    it('should delete whole segments older than retention', async () => {
      const log = fileLog(directory);
      await log.append(record({ startedAt: T0 }));

      const removed = await log.evictExpired(T0 + 600000);

      expect(removed).toBe(1);
      expect(await fs.readdir(directory)).toEqual([]);
    });

    it('should keep segments still inside retention', async () => {
      const log = fileLog(directory);
      await log.append(record({ startedAt: T0 }));

      const removed = await log.evictExpired(T0 + 60000);

      expect(removed).toBe(0);
      expect(await fs.readdir(directory)).toHaveLength(1);
    });

    it('should evict opportunistically on append', async () => {
      const log = fileLog(directory);
      await log.append(record({ startedAt: T0 }));
      const oldSegment = `calls-${Math.floor(T0 / 60000) * 60000}.jsonl`;
      expect(await fs.readdir(directory)).toEqual([oldSegment]);

      vi.setSystemTime(T0 + 600000);
      await log.append(record({ startedAt: T0 + 600000 }));

      const newSegment = `calls-${Math.floor((T0 + 600000) / 60000) * 60000}.jsonl`;
      expect(await fs.readdir(directory)).toEqual([newSegment]);
    });
  });

  describe('summarizeCalls', () => {
    it('should aggregate counts, durations and rate-limit hits', () => {
      const records = [
        record({ durationMs: 100, processId: 'a' }),
        record({ durationMs: 300, processId: 'b', endpoint: 'order' }),
        record({ durationMs: 200, processId: 'a', statusCode: 429, error: 'Request failed with status code 429' }),
        record({ durationMs: 400, processId: 'b', statusCode: null, error: 'Quota exceeded for user' }),
      ];

      const stats = summarizeCalls(records, 120000);

      expect(stats.totalCalls).toBe(4);
      expect(stats.successfulCalls).toBe(2);
      expect(stats.failedCalls).toBe(2);
      expect(stats.rateLimitHits).toBe(2);
      expect(stats.callsPerMinute).toBe(2);
      expect(stats.avgDurationMs).toBe(250);
      expect(stats.minDurationMs).toBe(100);
      expect(stats.maxDurationMs).toBe(400);
      expect(stats.byEndpoint).toEqual({ clearinghouseState: 3, order: 1 });
      expect(stats.byProcess).toEqual({ a: 2, b: 2 });
      expect(stats.activeProcesses).toEqual(['a', 'b']);
      expect(stats.recentRateLimitEvents).toHaveLength(2);
    });

    it('should report zeros for an empty window', () => {
      const stats = summarizeCalls([], 60000);
      expect(stats.totalCalls).toBe(0);
      expect(stats.avgDurationMs).toBe(0);
      expect(stats.minDurationMs).toBe(0);
      expect(stats.callsPerMinute).toBe(0);
    });
  });
});
