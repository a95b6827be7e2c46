/**
 * Validation utilities for store operations
 */

import { InvalidKeyError, InvalidQueryError, SerializationError } from "./errors.js";
import { OPERATIONS, type JsonValue, type Operation, type ShowOptions } from "./types.js";

/**
 * Validate a store key
 * @throws InvalidKeyError if the key is not a non-empty string
 */
export function validateKey(key: unknown): asserts key is string {
  if (typeof key !== "string") {
    throw new InvalidKeyError(key, "key must be a string");
  }

  if (key.trim().length === 0) {
    throw new InvalidKeyError(key, "key cannot be empty");
  }
}

/**
 * Validate that a value is representable as JSON without loss
 *
 * Rejects undefined, functions, symbols, bigints, non-finite numbers,
 * cycles, and objects that are not plain objects or arrays.
 *
 * @throws SerializationError naming the offending path
 */
export function validateValue(value: unknown): asserts value is JsonValue {
  const ancestors = new Set<object>();

  const visit = (current: unknown, path: string): void => {
    if (current === null) return;

    switch (typeof current) {
      case "string":
      case "boolean":
        return;
      case "number":
        if (!Number.isFinite(current)) {
          throw new SerializationError(`non-finite number at ${path}`);
        }
        return;
      case "object":
        break;
      default:
        throw new SerializationError(`unsupported ${typeof current} at ${path}`);
    }

    if (ancestors.has(current)) {
      throw new SerializationError(`circular reference at ${path}`);
    }

    if (Array.isArray(current)) {
      ancestors.add(current);
      for (let index = 0; index < current.length; index++) {
        if (!(index in current)) {
          throw new SerializationError(`sparse array hole at ${path}[${index}]`);
        }
        visit(current[index], `${path}[${index}]`);
      }
      ancestors.delete(current);
      return;
    }

    const proto: unknown = Object.getPrototypeOf(current);
    if (proto !== Object.prototype && proto !== null) {
      throw new SerializationError(`non-plain object at ${path}`);
    }

    ancestors.add(current);
    for (const [k, v] of Object.entries(current)) {
      visit(v, `${path}.${k}`);
    }
    ancestors.delete(current);
  };

  visit(value, "$");
}

/**
 * Type guard for operation names
 */
export function isOperation(value: unknown): value is Operation {
  return OPERATIONS.some((op) => op === value);
}

/**
 * Validate log query options
 * @throws InvalidQueryError on an unknown operation or a bad limit
 */
export function validateShowOptions(options: ShowOptions): void {
  if (options.operation !== undefined && !isOperation(options.operation)) {
    throw new InvalidQueryError(
      `unknown operation "${String(options.operation)}" (expected one of ${OPERATIONS.join(", ")})`
    );
  }

  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 0)) {
    throw new InvalidQueryError(`limit must be a non-negative integer, got ${options.limit}`);
  }
}
