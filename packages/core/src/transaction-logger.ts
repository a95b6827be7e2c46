/**
 * Append-only transaction log
 *
 * Invariants:
 * - transactionId strictly increases with append order and file order
 * - A record is durable in the file before it becomes visible in memory
 * - Prior lines are never rewritten; only clearLog() truncates the file
 * - Ids continue from the highest id in the file after a restart
 */

import * as fs from "node:fs/promises";
import { dirname } from "node:path";
import { ClosedError, CorruptedLogError, LogPersistenceError } from "./errors.js";
import { atomicWrite, ensureDirectory, readTextFile, syncHandle } from "./io.js";
import { Mutex } from "./lock.js";
import { logger, describeError } from "./observability/logs.js";
import { decodeRecord, encodeRecord, epochMicros, formatTimestamp, freezeRecord } from "./record.js";
import type {
  JsonValue,
  Operation,
  RecordMetadata,
  ShowOptions,
  StatsSummary,
  TransactionLoggerOptions,
  TransactionRecord,
} from "./types.js";
import { validateShowOptions } from "./validation.js";

export class TransactionLogger {
  #logFile: string | undefined;
  #fsync: boolean;
  #records: TransactionRecord[];
  #lastId: number;
  #mutex = new Mutex();
  #handle: fs.FileHandle | null = null;
  #closed = false;

  private constructor(options: TransactionLoggerOptions, records: TransactionRecord[]) {
    this.#logFile = options.logFile;
    this.#fsync = options.fsync ?? true;
    this.#records = records;
    this.#lastId = records.reduce((max, record) => Math.max(max, record.transactionId), 0);
  }

  /**
   * Open a logger, loading any existing log file
   * @throws CorruptedLogError if an existing line is malformed
   */
  static async open(options: TransactionLoggerOptions = {}): Promise<TransactionLogger> {
    const records = options.logFile ? await loadRecords(options.logFile) : [];
    const txlog = new TransactionLogger(options, records);

    if (options.logFile) {
      logger.info("log.loaded", { file: options.logFile, records: records.length });
    }

    return txlog;
  }

  /** Path of the log file, if persisted */
  get logFile(): string | undefined {
    return this.#logFile;
  }

  /** Highest id assigned so far (0 when empty) */
  get lastTransactionId(): number {
    return this.#lastId;
  }

  /**
   * Append a record
   *
   * The id and timestamp are assigned under the logger's mutex, so id order,
   * timestamp order and file order agree.
   *
   * @throws LogPersistenceError if the line cannot be written; the file is truncated
   *   back and the id is not consumed
   */
  async log(
    operation: Operation,
    key: string | null,
    value: JsonValue | null = null,
    oldValue: JsonValue | null = null,
    metadata: RecordMetadata = {}
  ): Promise<TransactionRecord> {
    this.#assertOpen();

    return this.#mutex.runExclusive(async () => {
      this.#assertOpen();

      const record = freezeRecord({
        transactionId: this.#lastId + 1,
        operation,
        timestamp: formatTimestamp(epochMicros()),
        key,
        value: value === null ? null : structuredClone(value),
        oldValue: oldValue === null ? null : structuredClone(oldValue),
        metadata: { ...metadata },
      });

      if (this.#logFile) {
        await this.#append(this.#logFile, `${encodeRecord(record)}\n`, record.transactionId);
      }

      this.#lastId = record.transactionId;
      this.#records.push(record);

      logger.debug("log.appended", { id: record.transactionId, operation, key });
      return record;
    });
  }

  /**
   * Return matching records, oldest first
   *
   * Filters apply first; `limit` then keeps the most recent matches.
   *
   * @throws InvalidQueryError on an unknown operation or a negative limit
   */
  show(options: ShowOptions = {}): TransactionRecord[] {
    validateShowOptions(options);
    const { operation, key, limit } = options;

    const matches = this.#records.filter(
      (record) =>
        (operation === undefined || record.operation === operation) &&
        (key === undefined || record.key === key)
    );

    if (limit === undefined) {
      return matches;
    }
    return limit === 0 ? [] : matches.slice(-limit);
  }

  /**
   * Aggregate counts and durations over the whole log
   */
  stats(): StatsSummary {
    const operations: StatsSummary["operations"] = { PUT: 0, GET: 0, DELETE: 0, CLEAR: 0 };
    const keys = new Set<string>();
    let min = Infinity;
    let max = -Infinity;
    let sum = 0;
    let count = 0;

    for (const record of this.#records) {
      operations[record.operation]++;
      if (record.key !== null) {
        keys.add(record.key);
      }
      const duration = record.metadata.durationMs;
      if (typeof duration === "number" && Number.isFinite(duration)) {
        min = Math.min(min, duration);
        max = Math.max(max, duration);
        sum += duration;
        count++;
      }
    }

    const first = this.#records[0];
    const last = this.#records[this.#records.length - 1];

    return {
      total: this.#records.length,
      operations,
      distinctKeys: keys.size,
      durationMs: count === 0 ? null : { min, max, avg: round3(sum / count) },
      firstTimestamp: first?.timestamp ?? null,
      lastTimestamp: last?.timestamp ?? null,
    };
  }

  /** Number of records held */
  size(): number {
    return this.#records.length;
  }

  /**
   * Remove every record, truncate the file and reset ids to start at 1
   * @returns Number of records removed
   */
  async clearLog(): Promise<number> {
    this.#assertOpen();

    return this.#mutex.runExclusive(async () => {
      this.#assertOpen();
      const removed = this.#records.length;

      if (this.#logFile) {
        const file = this.#logFile;
        await this.#closeHandle();
        try {
          await atomicWrite(file, "");
        } catch (err) {
          logger.error("log.clear_failed", { file, ...describeError(err) });
          throw new LogPersistenceError(file, { cause: err });
        }
      }

      this.#records = [];
      this.#lastId = 0;

      logger.info("log.cleared", { removed });
      return removed;
    });
  }

  /**
   * Close the log file; later calls to log() or clearLog() fail with ClosedError
   */
  async close(): Promise<void> {
    if (this.#closed) return;

    await this.#mutex.runExclusive(async () => {
      this.#closed = true;
      await this.#closeHandle();
    });
  }

  /**
   * Append one line; on failure the file is truncated back to its previous length
   */
  async #append(file: string, line: string, id: number): Promise<void> {
    let offset: number | null = null;
    try {
      if (!this.#handle) {
        await ensureDirectory(dirname(file));
        this.#handle = await fs.open(file, "a");
      }
      offset = (await this.#handle.stat()).size;
      await this.#handle.appendFile(line, "utf-8");
      if (this.#fsync) {
        await syncHandle(this.#handle);
      }
    } catch (err) {
      logger.error("log.append_failed", { file, ...describeError(err) });
      // Reopen on the next append rather than reuse a handle in an unknown state
      await this.#closeHandle().catch((closeErr: unknown) => {
        logger.debug("log.handle_close_failed", { file, ...describeError(closeErr) });
      });
      if (offset !== null) {
        await this.#rollback(file, offset, id);
      }
      throw new LogPersistenceError(file, { cause: err });
    }
  }

  async #rollback(file: string, offset: number, id: number): Promise<void> {
    try {
      await fs.truncate(file, offset);
    } catch (err) {
      // The line may still be in the file; never hand its id out again
      this.#lastId = Math.max(this.#lastId, id);
      logger.error("log.rollback_failed", { file, offset, id, ...describeError(err) });
    }
  }

  async #closeHandle(): Promise<void> {
    const handle = this.#handle;
    this.#handle = null;
    if (handle) {
      await handle.close();
    }
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new ClosedError("transaction log");
    }
  }
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

/**
 * Read and validate every line of an existing log file
 */
async function loadRecords(file: string): Promise<TransactionRecord[]> {
  const content = await readTextFile(file);
  if (content === null) {
    return [];
  }

  const records: TransactionRecord[] = [];
  const lines = content.split("\n");

  for (const [index, text] of lines.entries()) {
    if (text.trim() === "") continue;

    let record: TransactionRecord;
    try {
      record = decodeRecord(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CorruptedLogError(file, index + 1, reason, { cause: err });
    }

    const previous = records[records.length - 1];
    if (previous && record.transactionId <= previous.transactionId) {
      throw new CorruptedLogError(
        file,
        index + 1,
        `transaction_id ${record.transactionId} does not follow ${previous.transactionId}`
      );
    }

    records.push(record);
  }

  return records;
}

/**
 * Open a transaction logger
 */
export function openTransactionLogger(
  options: TransactionLoggerOptions = {}
): Promise<TransactionLogger> {
  return TransactionLogger.open(options);
}
