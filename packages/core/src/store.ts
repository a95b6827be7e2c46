/**
 * Main store implementation
 */

import { performance } from "node:perf_hooks";
import { threadId } from "node:worker_threads";
import {
  ClosedError,
  CorruptedStoreError,
  KeyNotFoundError,
  StorePersistenceError,
} from "./errors.js";
import { atomicWrite, readTextFile } from "./io.js";
import { Mutex, ReadWriteLock } from "./lock.js";
import { logger, describeError } from "./observability/logs.js";
import type { TransactionLogger } from "./transaction-logger.js";
import type { JsonValue, Operation, RecordMetadata, StoreOptions } from "./types.js";
import { validateKey, validateValue } from "./validation.js";

/**
 * Thread-safe key-value store with write-through JSON persistence
 *
 * Reads share a reader-writer lock; mutations hold it exclusively while the
 * in-memory map is changed and the whole map is atomically written to disk.
 * The transaction record for a mutation is emitted after the lock is released,
 * so the log never describes a change that is not yet durable. A slot in
 * #logOrder is reserved while the lock is still held, which keeps records in
 * the same order as the mutations they describe.
 *
 * @example
 * ```typescript
 * const transactions = await openTransactionLogger({ logFile: "./kv_store_log.json" });
 * const store = await openStore({ dataFile: "./kv_store_data.json", transactions });
 *
 * await store.put("user:1", { name: "Ada" });
 * await store.get("user:1"); // { name: "Ada" }
 * await store.close();
 * ```
 */
export class Store {
  #data: Map<string, JsonValue>;
  #lock = new ReadWriteLock();
  #logOrder = new Mutex();
  #dataFile: string | undefined;
  #transactions: TransactionLogger | undefined;
  #logReads: boolean;
  #closed = false;

  private constructor(options: StoreOptions, data: Map<string, JsonValue>) {
    this.#data = data;
    this.#dataFile = options.dataFile;
    this.#transactions = options.transactions;
    this.#logReads = options.logReads ?? false;
  }

  /**
   * Open a store, loading the data file if it exists
   * @throws CorruptedStoreError if the file is not a JSON object
   */
  static async open(options: StoreOptions = {}): Promise<Store> {
    const data = options.dataFile ? await loadData(options.dataFile) : new Map<string, JsonValue>();

    if (options.dataFile) {
      logger.info("store.loaded", { file: options.dataFile, keys: data.size });
    }

    return new Store(options, data);
  }

  /** Path of the data file, if persisted */
  get dataFile(): string | undefined {
    return this.#dataFile;
  }

  /** Logger receiving this store's records, if any */
  get transactions(): TransactionLogger | undefined {
    return this.#transactions;
  }

  /**
   * Store or replace a value
   *
   * @returns The displaced value, or null if the key was new
   * @throws {InvalidKeyError} If the key is not a non-empty string
   * @throws {SerializationError} If the value is not representable as JSON
   * @throws {StorePersistenceError} If the data file cannot be written (nothing changes)
   * @throws {LogPersistenceError} If the record cannot be logged (the write stays)
   */
  async put(key: string, value: JsonValue): Promise<JsonValue | null> {
    validateKey(key);
    validateValue(value);
    const copy = structuredClone(value);
    const started = performance.now();

    const { result: oldValue, logTurn } = await this.#mutate(() => {
      const had = this.#data.has(key);
      const previous = this.#data.get(key) ?? null;
      this.#data.set(key, copy);

      return {
        result: previous,
        rollback: () => {
          if (had) {
            this.#data.set(key, previous);
          } else {
            this.#data.delete(key);
          }
        },
      };
    });

    await this.#record(logTurn, "PUT", key, copy, oldValue, started);
    return oldValue === null ? null : structuredClone(oldValue);
  }

  /**
   * Read a value
   * @throws {KeyNotFoundError} If the key is absent
   */
  async get(key: string): Promise<JsonValue> {
    validateKey(key);
    const started = performance.now();

    const value = await this.#read(() => {
      if (!this.#data.has(key)) {
        throw new KeyNotFoundError(key);
      }
      return this.#data.get(key) ?? null;
    });

    if (this.#logReads) {
      await this.#record(null, "GET", key, null, null, started);
    }
    return structuredClone(value);
  }

  /**
   * Remove a key
   * @returns The removed value
   * @throws {KeyNotFoundError} If the key is absent (nothing changes)
   */
  async delete(key: string): Promise<JsonValue> {
    validateKey(key);
    const started = performance.now();

    const { result: oldValue, logTurn } = await this.#mutate(() => {
      if (!this.#data.has(key)) {
        throw new KeyNotFoundError(key);
      }
      const previous = this.#data.get(key) ?? null;
      this.#data.delete(key);

      return {
        result: previous,
        rollback: () => {
          this.#data.set(key, previous);
        },
      };
    });

    await this.#record(logTurn, "DELETE", key, null, oldValue, started);
    return structuredClone(oldValue);
  }

  /**
   * Remove every key
   * @returns Number of entries removed
   */
  async clear(): Promise<number> {
    const started = performance.now();

    const { result: removed, logTurn } = await this.#mutate(() => {
      const previous = this.#data;
      this.#data = new Map();

      return {
        result: previous.size,
        rollback: () => {
          this.#data = previous;
        },
      };
    });

    await this.#record(logTurn, "CLEAR", null, null, null, started, { removed });
    return removed;
  }

  /**
   * Snapshot of all keys
   */
  async listKeys(): Promise<string[]> {
    return this.#read(() => [...this.#data.keys()]);
  }

  /**
   * Snapshot of all values
   */
  async values(): Promise<JsonValue[]> {
    return this.#read(() => [...this.#data.values()].map((value) => structuredClone(value)));
  }

  /**
   * Snapshot of all key/value pairs
   */
  async items(): Promise<Array<[string, JsonValue]>> {
    return this.#read(() =>
      [...this.#data.entries()].map(([key, value]): [string, JsonValue] => [
        key,
        structuredClone(value),
      ])
    );
  }

  async has(key: string): Promise<boolean> {
    validateKey(key);
    return this.#read(() => this.#data.has(key));
  }

  async size(): Promise<number> {
    return this.#read(() => this.#data.size);
  }

  /**
   * Wait for in-flight operations, then reject any further calls
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    await this.#lock.withWrite(() => {
      this.#closed = true;
    });
    // Let mutations that already committed finish logging
    await this.#logOrder.runExclusive(() => undefined);
  }

  async #read<T>(fn: () => T): Promise<T> {
    this.#assertOpen();
    return this.#lock.withRead(() => {
      this.#assertOpen();
      return fn();
    });
  }

  /**
   * Apply a change under the write lock and persist it.
   * A failed write rolls the change back before the lock is released.
   */
  async #mutate<T>(apply: () => { result: T; rollback: () => void }): Promise<Committed<T>> {
    this.#assertOpen();
    return this.#lock.withWrite(async () => {
      this.#assertOpen();
      const { result, rollback } = apply();

      try {
        await this.#persist();
      } catch (err) {
        rollback();
        throw err;
      }

      // Must stay the last step under the lock: nothing may throw after the slot is taken
      const logTurn = this.#transactions ? this.#logOrder.acquire() : null;
      return { result, logTurn };
    });
  }

  async #persist(): Promise<void> {
    const file = this.#dataFile;
    if (!file) return;

    try {
      await atomicWrite(file, serializeData(this.#data));
      logger.debug("store.persisted", { file, keys: this.#data.size });
    } catch (err) {
      logger.error("store.persist_failed", { file, ...describeError(err) });
      throw new StorePersistenceError(file, { cause: err });
    }
  }

  /**
   * Emit a record; `logTurn` is the slot reserved by #mutate, null for reads
   */
  async #record(
    logTurn: Promise<void> | null,
    operation: Operation,
    key: string | null,
    value: JsonValue | null,
    oldValue: JsonValue | null,
    started: number,
    extra: RecordMetadata = {}
  ): Promise<void> {
    const transactions = this.#transactions;
    if (!transactions) return;

    const metadata: RecordMetadata = {
      threadId,
      pid: process.pid,
      durationMs: Math.round((performance.now() - started) * 1000) / 1000,
      ...extra,
    };

    if (logTurn === null) {
      await transactions.log(operation, key, value, oldValue, metadata);
      return;
    }

    await logTurn;
    try {
      await transactions.log(operation, key, value, oldValue, metadata);
    } finally {
      this.#logOrder.release();
    }
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new ClosedError("store");
    }
  }
}

interface Committed<T> {
  result: T;
  /** Resolves when this mutation may append its record */
  logTurn: Promise<void> | null;
}

/**
 * Serialize the mapping as a JSON object with sorted keys
 */
export function serializeData(data: Map<string, JsonValue>): string {
  const sorted = [...data.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(Object.fromEntries(sorted), null, 2) + "\n";
}

/**
 * Load the mapping from a data file
 *
 * A missing or blank file yields an empty map; anything other than a JSON
 * object is rejected rather than discarded.
 */
async function loadData(file: string): Promise<Map<string, JsonValue>> {
  const content = await readTextFile(file);
  if (content === null || content.trim() === "") {
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new CorruptedStoreError(file, "invalid JSON", { cause: err });
  }

  if (!isJsonObject(parsed)) {
    throw new CorruptedStoreError(file, "top-level value must be a JSON object");
  }

  return new Map(Object.entries(parsed));
}

function isJsonObject(value: unknown): value is Record<string, JsonValue> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Open a store
 */
export function openStore(options: StoreOptions = {}): Promise<Store> {
  return Store.open(options);
}
