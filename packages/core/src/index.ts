/**
 * kvlog core
 *
 * A concurrency-controlled key-value store with write-through JSON
 * persistence and an append-only transaction log
 */

// Re-export types
export type {
  JsonValue,
  Operation,
  RecordMetadata,
  TransactionRecord,
  ShowOptions,
  DurationSummary,
  StatsSummary,
  StoreOptions,
  TransactionLoggerOptions,
  SessionOptions,
} from "./types.js";
export { OPERATIONS } from "./types.js";

// Components
export { Store, openStore, serializeData } from "./store.js";
export { TransactionLogger, openTransactionLogger } from "./transaction-logger.js";
export { openSession, withSession } from "./session.js";
export type { Session } from "./session.js";
export { Mutex, ReadWriteLock } from "./lock.js";

// Record wire format
export { encodeRecord, decodeRecord, toRecordLine, formatTimestamp } from "./record.js";
export type { RecordLine } from "./record.js";

// Validation
export { validateKey, validateValue, isOperation } from "./validation.js";

// I/O operations
export { atomicWrite, readTextFile, ensureDirectory } from "./io.js";

// Diagnostics
export { logger, Logger } from "./observability/logs.js";
export type { LogLevel, LogEvent, LogSink } from "./observability/logs.js";

// Errors
export {
  KVStoreError,
  InvalidKeyError,
  SerializationError,
  KeyNotFoundError,
  CorruptedStoreError,
  CorruptedLogError,
  StorePersistenceError,
  LogPersistenceError,
  InvalidQueryError,
  ClosedError,
} from "./errors.js";
