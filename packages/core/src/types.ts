/**
 * Core type definitions for kvlog
 */

import type { TransactionLogger } from "./transaction-logger.js";

/**
 * Any value the store accepts verbatim
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Operations recorded in the transaction log
 */
export const OPERATIONS = ["PUT", "GET", "DELETE", "CLEAR"] as const;

export type Operation = (typeof OPERATIONS)[number];

/**
 * Free-form record metadata (thread id, duration, counts)
 */
export type RecordMetadata = Record<string, string | number | boolean | null>;

/**
 * One immutable logged event describing a single operation's effect
 */
export interface TransactionRecord {
  /** Strictly increasing with append order, never reused */
  readonly transactionId: number;
  readonly operation: Operation;
  /** ISO-8601 UTC with microsecond precision */
  readonly timestamp: string;
  /** Null for CLEAR */
  readonly key: string | null;
  /** New value for PUT (and GET when reads are logged), null otherwise */
  readonly value: JsonValue | null;
  /** Value displaced by PUT or removed by DELETE */
  readonly oldValue: JsonValue | null;
  readonly metadata: Readonly<RecordMetadata>;
}

/**
 * Filters for TransactionLogger.show()
 */
export interface ShowOptions {
  /** Exact operation match */
  operation?: Operation;
  /** Exact key match */
  key?: string;
  /** Keep only the most recent N matches */
  limit?: number;
}

export interface DurationSummary {
  min: number;
  max: number;
  avg: number;
}

/**
 * Aggregates over the transaction log
 */
export interface StatsSummary {
  total: number;
  operations: Record<Operation, number>;
  /** Distinct non-null keys touched */
  distinctKeys: number;
  /** From metadata.durationMs; null when no record carries a duration */
  durationMs: DurationSummary | null;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
}

export interface TransactionLoggerOptions {
  /** NDJSON log file; omit for an in-memory log */
  logFile?: string;
  /** datasync after every append (default: true) */
  fsync?: boolean;
}

export interface StoreOptions {
  /** JSON data file; omit for an in-memory store */
  dataFile?: string;
  /** Logger that receives a record for every mutation */
  transactions?: TransactionLogger;
  /** Also log successful GETs (default: false) */
  logReads?: boolean;
}

export interface SessionOptions extends TransactionLoggerOptions {
  dataFile?: string;
  logReads?: boolean;
}
