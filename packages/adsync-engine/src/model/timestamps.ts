/**
 * Canonical time values shared by both pipelines.
 *
 * Timestamps are UTC strings of the form `YYYY-MM-DD HH:MM:SS.ffffff`. The
 * width is fixed, so comparing two canonical strings lexically compares the
 * instants they denote. ClickHouse parses the same text into DateTime64(6).
 */

/** A canonical timestamp marking a point in a source table's cursor column. */
export type Cursor = string;

const MICROS_PER_MILLI = 1000;
const MILLIS_PER_DAY = 86_400_000;

// bounds of a four-digit year: 0000-01-01 and 9999-12-31 23:59:59.999
const MIN_EPOCH_MILLIS = -62_167_219_200_000;
const MAX_EPOCH_MILLIS = 253_402_300_799_999;

const CANONICAL_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{6}$/;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

export const isCanonicalTimestamp = (value: string): boolean =>
  CANONICAL_PATTERN.test(value);

/** Formats microseconds since the Unix epoch. */
export function formatEpochMicros(micros: number): Cursor {
  if (!Number.isSafeInteger(micros)) {
    throw new RangeError(`Not an integer microsecond timestamp: ${micros}`);
  }
  const millis = Math.floor(micros / MICROS_PER_MILLI);
  const remainder = micros - millis * MICROS_PER_MILLI;
  const iso = new Date(millis).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 23)}${String(remainder).padStart(3, "0")}`;
}

/**
 * Milliseconds since the epoch as a cursor, or null when the instant has no
 * integer microsecond form.
 */
export function epochMillisToCursor(millis: number): Cursor | null {
  const micros = Math.trunc(millis) * MICROS_PER_MILLI;
  return Number.isSafeInteger(micros) ? formatEpochMicros(micros) : null;
}

export function formatEpochMillis(millis: number): Cursor {
  const cursor = epochMillisToCursor(millis);
  if (cursor === null) {
    throw new RangeError(`Not a representable millisecond timestamp: ${millis}`);
  }
  return cursor;
}

const offsetMinutes = (zone: string | undefined): number => {
  if (zone === undefined || zone === "Z" || zone === "z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
};

/**
 * Parses ISO-8601 and PostgreSQL text timestamps into microseconds since the
 * epoch. A missing zone means UTC. Fractions beyond microseconds are truncated.
 */
export function parseTimestampMicros(text: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "", zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(millis);
  if (
    Number.isNaN(millis) ||
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }

  const micros = Number(fraction.padEnd(6, "0").slice(0, 6));
  return (
    (millis - offsetMinutes(zone) * 60_000) * MICROS_PER_MILLI + micros
  );
}

/**
 * Normalizes a timestamp as it arrives from PostgreSQL text output, Debezium
 * (`MicroTimestamp` integers, `ZonedTimestamp` strings) or a Date.
 */
export function toCanonicalTimestamp(value: unknown): Cursor | null {
  if (value instanceof Date) {
    const millis = value.getTime();
    return Number.isNaN(millis) ? null : epochMillisToCursor(millis);
  }
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? formatEpochMicros(value) : null;
  }
  if (typeof value === "string") {
    const micros = parseTimestampMicros(value);
    return micros !== null && Number.isSafeInteger(micros)
      ? formatEpochMicros(micros)
      : null;
  }
  return null;
}

/**
 * Normalizes a calendar date: `YYYY-MM-DD` text, a timestamp (its UTC date) or a
 * Debezium `Date` integer counting days since the epoch.
 */
export function toCanonicalDate(value: unknown): string | null {
  if (typeof value === "number") {
    const millis = value * MILLIS_PER_DAY;
    return Number.isSafeInteger(value) &&
      millis >= MIN_EPOCH_MILLIS &&
      millis <= MAX_EPOCH_MILLIS
      ? new Date(millis).toISOString().slice(0, 10)
      : null;
  }
  const timestamp = toCanonicalTimestamp(value);
  return timestamp === null ? null : timestamp.slice(0, 10);
}

/** The event date a fact row is partitioned by. */
export const eventDateOf = (timestamp: Cursor): string => timestamp.slice(0, 10);

export const compareCursors = (a: Cursor, b: Cursor): number =>
  a < b ? -1 : a > b ? 1 : 0;

export function maxCursor(
  a: Cursor | null | undefined,
  b: Cursor | null | undefined,
): Cursor | null {
  if (a === null || a === undefined) {
    return b ?? null;
  }
  if (b === null || b === undefined) {
    return a;
  }
  return compareCursors(a, b) >= 0 ? a : b;
}

export function addMicros(timestamp: Cursor, micros: number): Cursor {
  const base = parseTimestampMicros(timestamp);
  if (base === null) {
    throw new RangeError(`Not a timestamp: ${timestamp}`);
  }
  return formatEpochMicros(base + micros);
}
