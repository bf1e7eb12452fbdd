import { z } from "zod";
import { DecodeError } from "../errors";
import { SourceImages, SourceTableName, TableHandler } from "../model/tables";
import {
  Cursor,
  epochMillisToCursor,
  formatEpochMicros,
} from "../model/timestamps";
import { describeIssues } from "../transform/rowTransformer";
import { isRecord } from "../utils/records";

export type ChangeOperation = "create" | "update" | "delete";

interface EventMeta {
  table: SourceTableName;
  /** Commit time at the source, when the envelope carries one. */
  sourceTs: Cursor | null;
}

export type ChangeEvent<T extends SourceTableName> =
  | (EventMeta & { op: "create"; after: SourceImages[T] })
  | (EventMeta & {
      op: "update";
      before: SourceImages[T] | null;
      after: SourceImages[T];
    })
  | (EventMeta & { op: "delete"; before: SourceImages[T] });

// "r" is a snapshot read, emitted while the connector copies existing rows
const OPERATIONS: ReadonlyMap<string, ChangeOperation> = new Map<string, ChangeOperation>([
  ["c", "create"],
  ["r", "create"],
  ["u", "update"],
  ["d", "delete"],
]);

const envelopeSchema = z.object({
  op: z.string(),
  before: z.unknown().optional(),
  after: z.unknown().optional(),
  source: z
    .object({
      table: z.string().optional(),
      ts_ms: z.number().int().optional(),
      ts_us: z.number().int().optional(),
    })
    .passthrough()
    .optional(),
  ts_ms: z.number().int().optional(),
  ts_us: z.number().int().optional(),
});

interface EventTimes {
  ts_ms?: number;
  ts_us?: number;
}

/**
 * Commit time of the change. `ts_us` (sent by newer connectors) keeps the
 * microseconds a delete's tombstone needs to order after an update committed
 * in the same millisecond.
 */
function readSourceTs(table: SourceTableName, times: EventTimes): Cursor | null {
  if (times.ts_us !== undefined) {
    if (!Number.isSafeInteger(times.ts_us)) {
      throw new DecodeError(`${table}: source timestamp out of range: ${times.ts_us}`);
    }
    return formatEpochMicros(times.ts_us);
  }
  if (times.ts_ms === undefined) {
    return null;
  }
  const cursor = epochMillisToCursor(times.ts_ms);
  if (cursor === null) {
    throw new DecodeError(`${table}: source timestamp out of range: ${times.ts_ms}`);
  }
  return cursor;
}

/** Schema Registry framing: magic byte 0 followed by a 4-byte schema id. */
export const stripSchemaRegistryFrame = (payload: Buffer): Buffer =>
  payload.length >= 5 && payload[0] === 0x00 ? payload.subarray(5) : payload;

const parseJson = (payload: Buffer): unknown => {
  try {
    return JSON.parse(stripSchemaRegistryFrame(payload).toString("utf8"));
  } catch (error) {
    throw new DecodeError(
      `payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
};

/** Unwraps the Kafka Connect `{schema, payload}` JSON converter wrapper. */
const unwrapConnectEnvelope = (value: unknown): unknown =>
  isRecord(value) && "schema" in value && "payload" in value
    ? value.payload
    : value;

/**
 * Converts the flattened `ExtractNewRecordState` form (row fields plus
 * `__op`, `__table`, `__source_ts_ms` and `__deleted`) to the standard
 * envelope.
 */
const normalizeFlattened = (value: Record<string, unknown>): unknown => {
  if (!("__op" in value) && !("__deleted" in value)) {
    return value;
  }
  const row: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (!key.startsWith("__")) {
      row[key] = field;
    }
  }
  const deleted = value.__deleted === true || value.__deleted === "true";
  const op = deleted ? "d" : value.__op;
  const tsMs = value.__source_ts_ms ?? value.__ts_ms;
  const tsUs = value.__source_ts_us ?? value.__ts_us;
  return {
    op,
    before: op === "d" ? row : null,
    after: op === "d" ? null : row,
    source: {
      table: value.__table,
      ...(typeof tsMs === "number" && { ts_ms: tsMs }),
      ...(typeof tsUs === "number" && { ts_us: tsUs }),
    },
  };
};

function validateImage<T extends SourceTableName>(
  handler: TableHandler<T>,
  image: unknown,
  label: string,
): SourceImages[T] {
  if (!isRecord(image)) {
    throw new DecodeError(
      `${handler.source.name}: ${label} image is missing`,
    );
  }
  const parsed = handler.image.safeParse(image);
  if (!parsed.success) {
    throw new DecodeError(
      `${handler.source.name}: invalid ${label} image: ${describeIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

/**
 * Decodes a raw change message for the table bound to its topic.
 *
 * Returns null for an empty value (a compaction tombstone), which is not a
 * change event. Anything malformed raises DecodeError.
 */
export function decodeChangeEvent<T extends SourceTableName>(
  payload: Buffer | null,
  handler: TableHandler<T>,
): ChangeEvent<T> | null {
  if (payload === null || payload.length === 0) {
    return null;
  }
  const table = handler.source.name;

  let value = unwrapConnectEnvelope(parseJson(payload));
  if (!isRecord(value)) {
    throw new DecodeError(`${table}: change event is not a JSON object`);
  }
  value = normalizeFlattened(value);

  const envelope = envelopeSchema.safeParse(value);
  if (!envelope.success) {
    throw new DecodeError(
      `${table}: malformed change envelope: ${describeIssues(envelope.error)}`,
    );
  }
  const { op: rawOp, before, after, source } = envelope.data;

  const op = OPERATIONS.get(rawOp);
  if (op === undefined) {
    throw new DecodeError(`${table}: unknown operation "${rawOp}"`);
  }
  if (source?.table !== undefined && source.table !== table) {
    throw new DecodeError(
      `${table}: event belongs to table "${source.table}"`,
    );
  }

  const times =
    source !== undefined && (source.ts_us ?? source.ts_ms) !== undefined
      ? source
      : envelope.data;
  const meta: EventMeta = { table, sourceTs: readSourceTs(table, times) };

  switch (op) {
    case "create":
      return {
        ...meta,
        op,
        after: validateImage(handler, after, "after"),
      };
    case "update":
      return {
        ...meta,
        op,
        before: isRecord(before) ? validateImage(handler, before, "before") : null,
        after: validateImage(handler, after, "after"),
      };
    case "delete":
      return { ...meta, op, before: validateImage(handler, before, "before") };
  }
}
