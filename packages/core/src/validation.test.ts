import { describe, it, expect } from "vitest";
import { isOperation, validateKey, validateShowOptions, validateValue } from "./validation.js";
import { InvalidKeyError, InvalidQueryError, SerializationError } from "./errors.js";

describe("validateKey", () => {
  it("should accept non-empty strings", () => {
    expect(() => validateKey("user:1")).not.toThrow();
    expect(() => validateKey(" padded ")).not.toThrow();
  });

  it("should reject non-strings", () => {
    expect(() => validateKey(42)).toThrow(InvalidKeyError);
    expect(() => validateKey(undefined)).toThrow("key must be a string");
  });

  it("should reject empty and blank strings", () => {
    expect(() => validateKey("")).toThrow('Invalid key "": key cannot be empty');
    expect(() => validateKey("\t ")).toThrow("key cannot be empty");
  });
});

describe("validateValue", () => {
  it("should accept JSON values", () => {
    for (const value of ["s", 1, 0, true, null, [], {}, { a: [{ b: null }] }]) {
      expect(() => validateValue(value)).not.toThrow();
    }
  });

  it("should accept objects without a prototype", () => {
    const bare: object = Object.create(null);
    expect(() => validateValue(bare)).not.toThrow();
  });

  it("should accept shared references that are not cycles", () => {
    const shared = { x: 1 };
    expect(() => validateValue({ a: shared, b: shared })).not.toThrow();
  });

  it("should reject values with no JSON form", () => {
    expect(() => validateValue(undefined)).toThrow("unsupported undefined at $");
    expect(() => validateValue(() => 1)).toThrow("unsupported function at $");
    expect(() => validateValue(10n)).toThrow("unsupported bigint at $");
    expect(() => validateValue(Symbol("s"))).toThrow("unsupported symbol at $");
  });

  it("should reject non-finite numbers with their path", () => {
    expect(() => validateValue({ a: [1, Infinity] })).toThrow(SerializationError);
    expect(() => validateValue({ a: [1, Infinity] })).toThrow("non-finite number at $.a[1]");
  });

  it("should reject class instances", () => {
    expect(() => validateValue({ when: new Date(0) })).toThrow("non-plain object at $.when");
    expect(() => validateValue(new Map())).toThrow("non-plain object at $");
  });

  it("should reject holes in sparse arrays", () => {
    expect(() => validateValue({ list: [, 1] })).toThrow("sparse array hole at $.list[0]");
    expect(() => validateValue(new Array(2))).toThrow("sparse array hole at $[0]");
  });

  it("should reject cycles", () => {
    const list: unknown[] = [];
    list.push(list);
    expect(() => validateValue(list)).toThrow("circular reference at $[0]");
  });
});

describe("isOperation", () => {
  it("should recognise the four operations only", () => {
    expect(["PUT", "GET", "DELETE", "CLEAR"].every(isOperation)).toBe(true);
    expect(isOperation("put")).toBe(false);
    expect(isOperation(null)).toBe(false);
  });
});

describe("validateShowOptions", () => {
  it("should accept empty and valid options", () => {
    expect(() => validateShowOptions({})).not.toThrow();
    expect(() => validateShowOptions({ operation: "PUT", key: "a", limit: 0 })).not.toThrow();
  });

  it("should reject bad limits", () => {
    expect(() => validateShowOptions({ limit: -2 })).toThrow(InvalidQueryError);
  });
});
