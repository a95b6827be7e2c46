/**
 * Error types for key-value store and transaction log operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Input errors are thrown before any lock is taken or state is touched
 */

/**
 * Base class for all kvlog errors
 */
export abstract class KVStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a key is not a non-empty string
 */
export class InvalidKeyError extends KVStoreError {
  readonly code = "INVALID_KEY";

  constructor(
    public readonly key: unknown,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid key ${JSON.stringify(String(key))}: ${reason}`, options);
  }
}

/**
 * Thrown when a value cannot be represented as JSON
 */
export class SerializationError extends KVStoreError {
  readonly code = "SERIALIZATION_ERROR";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Value cannot be serialized: ${reason}`, options);
  }
}

/**
 * Thrown when a requested key is absent
 */
export class KeyNotFoundError extends KVStoreError {
  readonly code = "KEY_NOT_FOUND";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key not found: ${key}`, options);
  }
}

/**
 * Thrown at load time when the data file is not a JSON object
 */
export class CorruptedStoreError extends KVStoreError {
  readonly code = "CORRUPTED_STORE";

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Corrupted data file ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown at load time when a line of the transaction log is malformed
 */
export class CorruptedLogError extends KVStoreError {
  readonly code = "CORRUPTED_LOG";

  constructor(
    filePath: string,
    public readonly line: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Corrupted transaction log ${filePath} at line ${line}: ${reason}`, options);
  }
}

/**
 * Thrown when the data file cannot be written; the mutation is rolled back
 */
export class StorePersistenceError extends KVStoreError {
  readonly code = "STORE_PERSISTENCE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to persist data file: ${filePath}`, options);
  }
}

/**
 * Thrown when a record cannot be appended to the transaction log.
 * A store mutation that preceded the append is not undone.
 */
export class LogPersistenceError extends KVStoreError {
  readonly code = "LOG_PERSISTENCE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write transaction log: ${filePath}`, options);
  }
}

/**
 * Thrown when a log query has an unknown operation or a bad limit
 */
export class InvalidQueryError extends KVStoreError {
  readonly code = "INVALID_QUERY";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid log query: ${reason}`, options);
  }
}

/**
 * Thrown when a store or logger is used after close()
 */
export class ClosedError extends KVStoreError {
  readonly code = "CLOSED";

  constructor(component: "store" | "transaction log", options?: ErrorOptions) {
    super(`The ${component} is closed`, options);
  }
}
