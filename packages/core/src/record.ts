/**
 * Transaction record construction and the NDJSON wire format
 *
 * On disk each record is one JSON object per line with snake_case fields:
 * {"transaction_id":1,"operation":"PUT","timestamp":"...","key":"a","value":"1","old_value":null,"metadata":{}}
 */

import { performance } from "node:perf_hooks";
import { z } from "zod";
import { OPERATIONS, type JsonValue, type TransactionRecord } from "./types.js";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

const MetadataSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]));

/**
 * Schema for one persisted log line. Fields other than the id, operation and
 * timestamp may be absent in hand-edited files and default to null / {}.
 */
export const RecordLineSchema = z.object({
  transaction_id: z.number().int().positive(),
  operation: z.enum(OPERATIONS),
  timestamp: z.string().min(1),
  key: z.string().nullable().default(null),
  value: JsonValueSchema.default(null),
  old_value: JsonValueSchema.default(null),
  metadata: MetadataSchema.default({}),
});

export type RecordLine = z.infer<typeof RecordLineSchema>;

/**
 * Current wall-clock time in whole microseconds since the epoch.
 * Derived from the monotonic clock, so successive calls never go backwards.
 */
export function epochMicros(): number {
  return Math.round((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * Format epoch microseconds as ISO-8601 UTC with six fractional digits
 * @example formatTimestamp(1792315002123456) // "2026-10-18T09:16:42.123456Z"
 */
export function formatTimestamp(micros: number): string {
  const ms = Math.floor(micros / 1000);
  const rest = micros - ms * 1000;
  const iso = new Date(ms).toISOString();
  return `${iso.slice(0, -1)}${String(rest).padStart(3, "0")}Z`;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Freeze a record and everything it references
 */
export function freezeRecord(record: TransactionRecord): TransactionRecord {
  return deepFreeze(record);
}

/**
 * Map a record to its wire shape
 */
export function toRecordLine(record: TransactionRecord): RecordLine {
  return {
    transaction_id: record.transactionId,
    operation: record.operation,
    timestamp: record.timestamp,
    key: record.key,
    value: record.value,
    old_value: record.oldValue,
    metadata: { ...record.metadata },
  };
}

/**
 * Serialize a record as one log line (without the trailing newline)
 */
export function encodeRecord(record: TransactionRecord): string {
  return JSON.stringify(toRecordLine(record));
}

/**
 * Map a validated wire line to a frozen record
 */
export function fromRecordLine(line: RecordLine): TransactionRecord {
  return freezeRecord({
    transactionId: line.transaction_id,
    operation: line.operation,
    timestamp: line.timestamp,
    key: line.key,
    value: line.value,
    oldValue: line.old_value,
    metadata: line.metadata,
  });
}

/**
 * Parse one log line
 * @throws Error describing why the line is not a valid record
 */
export function decodeRecord(text: string): TransactionRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`invalid JSON (${err instanceof Error ? err.message : String(err)})`, {
      cause: err,
    });
  }

  const parsed = RecordLineSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid record (${issues})`, { cause: parsed.error });
  }

  return fromRecordLine(parsed.data);
}
