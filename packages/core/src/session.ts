/**
 * Explicit open/close scope for a store and its transaction log
 */

import { openStore, type Store } from "./store.js";
import { openTransactionLogger, type TransactionLogger } from "./transaction-logger.js";
import type { SessionOptions } from "./types.js";

export interface Session {
  readonly store: Store;
  readonly transactions: TransactionLogger;
  /** Close the store, then the log */
  close(): Promise<void>;
}

/**
 * Open a transaction logger and a store that records into it
 *
 * If the store cannot be opened (e.g. a corrupted data file), the logger that
 * was already opened is closed before the error propagates.
 */
export async function openSession(options: SessionOptions = {}): Promise<Session> {
  const transactions = await openTransactionLogger({
    logFile: options.logFile,
    fsync: options.fsync,
  });

  let store: Store;
  try {
    store = await openStore({
      dataFile: options.dataFile,
      transactions,
      logReads: options.logReads,
    });
  } catch (err) {
    await transactions.close();
    throw err;
  }

  return {
    store,
    transactions,
    async close(): Promise<void> {
      try {
        await store.close();
      } finally {
        await transactions.close();
      }
    },
  };
}

/**
 * Execute a function with an open session, closing it afterwards
 */
export async function withSession<T>(
  options: SessionOptions,
  fn: (session: Session) => Promise<T>
): Promise<T> {
  const session = await openSession(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
