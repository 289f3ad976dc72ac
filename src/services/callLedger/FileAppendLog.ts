/**
 * File Append Log
 *
 * Directory of JSON-lines segment files, one per time segment. Every append is a
 * single O_APPEND write of one line, so concurrent writers in separate processes
 * never interleave partial records. Retention deletes whole segment files.
 * Readers tolerate a torn trailing line by skipping anything that fails to parse.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { z } from 'zod';
import type { AppendLog } from './types.js';
import { logger, type Logger } from '../../utils/logger.js';
import { ledgerSegmentsEvicted } from '../../utils/metrics.js';

export interface FileAppendLogConfig<T> {
  directory: string;
  /** Validates each line read back */
  schema: z.ZodType<T>;
  /** Timestamp used for segment placement and window scans */
  timestampOf: (entry: T) => number;
  segmentMs: number;
  retentionMs: number;
  /** File name prefix, segments are `<prefix>-<segmentStart>.jsonl` */
  prefix: string;
}

const SEGMENT_EXTENSION = '.jsonl';

export class FileAppendLog<T> implements AppendLog<T> {
  private log: Logger;
  private config: FileAppendLogConfig<T>;
  private directoryReady = false;
  private lastEvictionAt = 0;

  constructor(config: FileAppendLogConfig<T>) {
    this.config = config;
    this.log = logger('FileAppendLog');
  }

  async append(entry: T): Promise<void> {
    await this.ensureDirectory();

    const segmentStart = this.segmentStartFor(this.config.timestampOf(entry));
    const file = path.join(this.config.directory, this.segmentName(segmentStart));

    await fs.appendFile(file, `${JSON.stringify(entry)}\n`, { encoding: 'utf8', flag: 'a' });

    await this.maybeEvict();
  }

  async scanSince(sinceMs: number): Promise<T[]> {
    const segments = await this.listSegments();
    const entries: T[] = [];

    for (const segment of segments) {
      // Segment cannot hold anything newer than its end
      if (segment.start + this.config.segmentMs <= sinceMs) {
        continue;
      }

      const content = await this.readSegment(segment.file);
      if (content === null) {
        continue;
      }

      for (const line of content.split('\n')) {
        const entry = this.parseLine(line);
        if (entry !== null && this.config.timestampOf(entry) >= sinceMs) {
          entries.push(entry);
        }
      }
    }

    return entries.sort((a, b) => this.config.timestampOf(a) - this.config.timestampOf(b));
  }

  /**
   * Delete segments that ended before the retention window
   */
  async evictExpired(nowMs: number = Date.now()): Promise<number> {
    const cutoff = nowMs - this.config.retentionMs;
    const segments = await this.listSegments();
    let removed = 0;

    for (const segment of segments) {
      if (segment.start + this.config.segmentMs > cutoff) {
        continue;
      }

      try {
        await fs.unlink(segment.file);
        removed++;
      } catch (error) {
        // Another process got there first
        if (isErrnoCode(error, 'ENOENT')) {
          continue;
        }
        throw error;
      }
    }

    if (removed > 0) {
      ledgerSegmentsEvicted.inc(removed);
      this.log.debug('Evicted ledger segments', { removed });
    }

    return removed;
  }

  private async maybeEvict(): Promise<void> {
    const nowMs = Date.now();
    if (nowMs - this.lastEvictionAt < this.config.segmentMs) {
      return;
    }
    this.lastEvictionAt = nowMs;
    await this.evictExpired(nowMs);
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await fs.mkdir(this.config.directory, { recursive: true });
    this.directoryReady = true;
  }

  private async listSegments(): Promise<Array<{ start: number; file: string }>> {
    let names: string[];
    try {
      names = await fs.readdir(this.config.directory);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const prefix = `${this.config.prefix}-`;
    const segments: Array<{ start: number; file: string }> = [];

    for (const name of names) {
      if (!name.startsWith(prefix) || !name.endsWith(SEGMENT_EXTENSION)) {
        continue;
      }
      const start = Number(name.slice(prefix.length, -SEGMENT_EXTENSION.length));
      if (Number.isFinite(start)) {
        segments.push({ start, file: path.join(this.config.directory, name) });
      }
    }

    return segments.sort((a, b) => a.start - b.start);
  }

  private async readSegment(file: string): Promise<string | null> {
    try {
      return await fs.readFile(file, 'utf8');
    } catch (error) {
      // Evicted between listing and reading
      if (isErrnoCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  private parseLine(line: string): T | null {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      return null;
    }

    const parsed = this.config.schema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  private segmentStartFor(timestamp: number): number {
    return Math.floor(timestamp / this.config.segmentMs) * this.config.segmentMs;
  }

  private segmentName(segmentStart: number): string {
    return `${this.config.prefix}-${segmentStart}${SEGMENT_EXTENSION}`;
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
