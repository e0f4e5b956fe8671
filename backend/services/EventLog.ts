/**
 * Event Log
 * Append-only JSON-lines record of every detection, one file per UTC calendar day,
 * with retention pruning, newest-first reads and aggregate statistics.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DECISIONS } from '../types/index.js';
import type { Clock, Decision, LogRecord, LogStats } from '../types/index.js';
import { EventLogWriteError } from '../utils/errorHandler.js';
import { createLogger } from '../utils/LoggerUtils.js';

const logger = createLogger('EVENT LOG');

const PARTITION_PREFIX = 'detections_';
const PARTITION_SUFFIX = '.jsonl';
const PARTITION_PATTERN = /^detections_(\d{4}-\d{2}-\d{2})\.jsonl$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface EventLogOptions {
  logDirectory: string;
  retentionDays: number;
  now?: Clock;
}

/**
 * UTC calendar date (YYYY-MM-DD) used as the partition key.
 */
export function partitionKey(timestamp: string | number | Date): string {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid record timestamp: ${String(timestamp)}`);
  }
  return date.toISOString().slice(0, 10);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDecision(value: unknown): value is Decision {
  return DECISIONS.some(decision => decision === value);
}

/**
 * Shape check for a parsed line. Only the fields every schema version carries are
 * required; unknown extra fields are allowed.
 */
export function isLogRecord(value: unknown): value is LogRecord {
  if (!isObject(value)) return false;
  const { result, model } = value;
  return (
    typeof value.timestamp === 'string' &&
    typeof value.requestId === 'string' &&
    typeof value.fingerprint === 'string' &&
    typeof value.cacheHit === 'boolean' &&
    typeof value.processingTimeMs === 'number' &&
    isObject(result) &&
    isDecision(result.decision) &&
    typeof result.confidence === 'number' &&
    isObject(model) &&
    typeof model.name === 'string'
  );
}

export class EventLog {
  private readonly logDirectory: string;
  private readonly retentionDays: number;
  private readonly now: Clock;
  private readonly writeQueues = new Map<string, Promise<void>>();

  constructor(options: EventLogOptions) {
    this.logDirectory = path.resolve(options.logDirectory);
    this.retentionDays = options.retentionDays;
    this.now = options.now ?? Date.now;
  }

  /**
   * Creates the log directory and drops partitions past retention.
   */
  static async open(options: EventLogOptions): Promise<EventLog> {
    const eventLog = new EventLog(options);
    await fs.mkdir(eventLog.logDirectory, { recursive: true });
    await eventLog.prune(eventLog.retentionDays);
    return eventLog;
  }

  get directory(): string {
    return this.logDirectory;
  }

  partitionPath(key: string): string {
    return path.join(this.logDirectory, `${PARTITION_PREFIX}${key}${PARTITION_SUFFIX}`);
  }

  /**
   * Appends one record to the partition of its timestamp's UTC date.
   * Appends to one partition are queued behind each other; other partitions are not affected.
   * Rejects with EventLogWriteError when the write fails.
   */
  async append(record: LogRecord): Promise<void> {
    const key = partitionKey(record.timestamp);
    const line = `${JSON.stringify(record)}\n`;
    const filePath = this.partitionPath(key);

    const previous = this.writeQueues.get(key) ?? Promise.resolve();
    const write = previous.then(() => fs.appendFile(filePath, line, 'utf8'));
    // The queue moves on after a failed write; the failure reaches the caller through `write`
    const tail = write.then(
      () => undefined,
      () => undefined
    );
    this.writeQueues.set(key, tail);

    try {
      await write;
    } catch (error) {
      throw new EventLogWriteError(key, { cause: error });
    } finally {
      if (this.writeQueues.get(key) === tail) {
        this.writeQueues.delete(key);
      }
    }
  }

  /**
   * Live partition dates, newest first.
   */
  async partitions(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.logDirectory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    }

    const keys: string[] = [];
    for (const name of names) {
      const match = PARTITION_PATTERN.exec(name);
      if (match) keys.push(match[1]);
    }
    // YYYY-MM-DD sorts lexically in date order
    return keys.sort().reverse();
  }

  /**
   * Most recent records, newest first, spanning partitions as needed.
   */
  async recent(limit: number): Promise<LogRecord[]> {
    if (!Number.isFinite(limit) || limit <= 0) return [];

    const entries: LogRecord[] = [];
    for (const key of await this.partitions()) {
      if (entries.length >= limit) break;

      const records = await this.readPartition(key);
      if (!records) continue;

      for (let i = records.length - 1; i >= 0 && entries.length < limit; i--) {
        entries.push(records[i]);
      }
    }
    return entries;
  }

  /**
   * Full read-only scan of every live partition.
   */
  async aggregateStats(): Promise<LogStats> {
    const decisions: Record<Decision, number> = { ai: 0, real: 0, uncertain: 0, error: 0 };
    let total = 0;
    let cacheHits = 0;

    const keys = await this.partitions();
    for (const key of keys) {
      const records = await this.readPartition(key);
      if (!records) continue;

      for (const record of records) {
        total++;
        decisions[record.result.decision]++;
        if (record.cacheHit) cacheHits++;
      }
    }

    return {
      total,
      positiveDecisions: decisions.ai,
      cacheHits,
      cacheHitRate: total > 0 ? cacheHits / total : 0,
      decisions,
      partitions: keys.length
    };
  }

  /**
   * Deletes whole partitions dated before the UTC date `retentionDays` ago.
   * The cutoff day itself is kept. Returns the removed partition dates.
   */
  async prune(retentionDays: number): Promise<string[]> {
    if (!Number.isFinite(retentionDays) || retentionDays < 0) {
      throw new RangeError(`Retention must be a non-negative number of days, got ${retentionDays}`);
    }

    const cutoff = partitionKey(this.now() - retentionDays * DAY_MS);
    const removed: string[] = [];

    for (const key of await this.partitions()) {
      if (key >= cutoff) continue;

      try {
        await fs.unlink(this.partitionPath(key));
        removed.push(key);
        logger.info(`Cleaned up old log partition: ${PARTITION_PREFIX}${key}${PARTITION_SUFFIX}`);
      } catch (error) {
        logger.warn(`Error removing log partition ${key}`, error instanceof Error ? error.message : String(error));
      }
    }

    return removed;
  }

  /**
   * Reads one partition in file order. Corrupt lines are skipped; an unreadable file yields null.
   */
  private async readPartition(key: string): Promise<LogRecord[] | null> {
    let content: string;
    try {
      content = await fs.readFile(this.partitionPath(key), 'utf8');
    } catch (error) {
      logger.warn(`Error reading log partition ${key}`, error instanceof Error ? error.message : String(error));
      return null;
    }

    const records: LogRecord[] = [];
    const lines = content.split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isLogRecord(parsed)) {
          records.push(parsed);
        } else {
          logger.warn(`Skipping malformed record in ${key} at line ${index + 1}`);
        }
      } catch {
        logger.warn(`Skipping unparseable line in ${key} at line ${index + 1}`);
      }
    });
    return records;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
