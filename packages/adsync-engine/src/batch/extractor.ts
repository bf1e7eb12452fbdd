import { Pool } from "pg";
import { withTimeout } from "../commons";
import {
  ConnectionError,
  SourceQueryError,
  SyncError,
  errorCode,
  errorMessage,
  isConnectionFailure,
} from "../errors";
import { SourceColumn, SourceTable } from "../model/tables";
import { Cursor, compareCursors, isCanonicalTimestamp } from "../model/timestamps";

/**
 * Read access to the transactional store.
 */
export interface SourceClient {
  query(
    text: string,
    values: readonly unknown[],
  ): Promise<Record<string, unknown>[]>;
}

export class PgSourceClient implements SourceClient {
  constructor(private readonly pool: Pool) {}

  async query(
    text: string,
    values: readonly unknown[],
  ): Promise<Record<string, unknown>[]> {
    try {
      const result = await this.pool.query(text, [...values]);
      return result.rows;
    } catch (error) {
      throw classifyPgError(error);
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

// SQLSTATE class 08 is connection exception, 57P01-57P03 server shutdown
const isPgConnectionState = (code: string): boolean =>
  code.startsWith("08") || code.startsWith("57P0");

export function classifyPgError(error: unknown): SyncError {
  if (error instanceof SyncError) {
    return error;
  }
  const code = errorCode(error);
  if (
    isConnectionFailure(error) ||
    (code !== undefined && isPgConnectionState(code)) ||
    /timeout|terminated|Connection/i.test(errorMessage(error))
  ) {
    return new ConnectionError(`source unavailable: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return new SourceQueryError(
    `source query failed${code ? ` (${code})` : ""}: ${errorMessage(error)}`,
    { cause: error },
  );
}

export const quotePgIdentifier = (name: string): string =>
  `"${name.replace(/"/g, '""')}"`;

export const CURSOR_FIELD = "__cursor";
export const KEY_FIELD = "__key";

const TIMESTAMP_FORMAT = "YYYY-MM-DD HH24:MI:SS.US";

const selectColumn = (column: SourceColumn): string => {
  const name = quotePgIdentifier(column.name);
  switch (column.type) {
    case "timestamp":
      return `to_char(t.${name}, '${TIMESTAMP_FORMAT}') AS ${name}`;
    case "date":
      return `to_char(t.${name}, 'YYYY-MM-DD') AS ${name}`;
    default:
      return `t.${name}`;
  }
};

/**
 * Keyset page query. Parameters: $1 watermark, $2/$3 the (cursor, key) pair
 * the previous page ended on, $4 page size. Null parameters disable their
 * predicate.
 */
export function buildExtractQuery(table: SourceTable, schema: string): string {
  const cursor = `t.${quotePgIdentifier(table.cursorColumn)}`;
  const key = `t.${quotePgIdentifier(table.keyColumn)}`;
  const columns = table.columns.map(selectColumn).join(", ");
  return [
    `SELECT ${columns}, to_char(${cursor}, '${TIMESTAMP_FORMAT}') AS ${CURSOR_FIELD}, ${key} AS ${KEY_FIELD}`,
    `FROM ${quotePgIdentifier(schema)}.${quotePgIdentifier(table.name)} AS t`,
    `WHERE ${cursor} IS NOT NULL`,
    `AND ($1::timestamptz IS NULL OR ${cursor} > $1::timestamptz)`,
    `AND ($2::timestamptz IS NULL OR (${cursor}, ${key}) > ($2::timestamptz, $3::bigint))`,
    `ORDER BY ${cursor} ASC, ${key} ASC`,
    `LIMIT $4`,
  ].join("\n");
}

export interface ExtractedRow {
  cursor: Cursor;
  key: string | number;
  values: Record<string, unknown>;
}

export interface ExtractedPage {
  rows: ExtractedRow[];
  /** Largest cursor on the page; the watermark candidate so far. */
  maxCursor: Cursor;
}

export interface ExtractorOptions {
  schema: string;
  pageSize: number;
  timeoutMs: number;
}

const toExtractedRow = (
  table: SourceTable,
  row: Record<string, unknown>,
): ExtractedRow => {
  const { [CURSOR_FIELD]: cursor, [KEY_FIELD]: key, ...values } = row;
  if (typeof cursor !== "string" || !isCanonicalTimestamp(cursor)) {
    throw new SourceQueryError(
      `${table.name}: unexpected cursor value ${String(cursor)}`,
    );
  }
  if (typeof key !== "string" && typeof key !== "number") {
    throw new SourceQueryError(`${table.name}: row without a key`);
  }
  return { cursor, key, values };
};

/**
 * Pages through the rows of a table whose cursor column is strictly greater
 * than the watermark, oldest first. Nothing is held beyond the current page.
 */
export class IncrementalExtractor {
  constructor(
    private readonly source: SourceClient,
    private readonly options: ExtractorOptions,
  ) {}

  async *pages(
    table: SourceTable,
    since: Cursor | null,
  ): AsyncGenerator<ExtractedPage, void, undefined> {
    const text = buildExtractQuery(table, this.options.schema);
    let after: ExtractedRow | undefined;

    while (true) {
      const raw = await withTimeout(
        `extract ${table.name}`,
        this.options.timeoutMs,
        () =>
          this.source.query(text, [
            since,
            after?.cursor ?? null,
            after?.key ?? null,
            this.options.pageSize,
          ]),
      );
      if (raw.length === 0) {
        return;
      }

      const rows = raw.map((row) => toExtractedRow(table, row));
      const maxCursor = rows.reduce(
        (max, row) => (compareCursors(row.cursor, max) > 0 ? row.cursor : max),
        rows[0].cursor,
      );
      yield { rows, maxCursor };

      if (raw.length < this.options.pageSize) {
        return;
      }
      after = rows[rows.length - 1];
    }
  }
}
