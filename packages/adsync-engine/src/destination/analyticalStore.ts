import { ClickHouseError, ClickHouseSettings } from "@clickhouse/client";
import { z } from "zod";
import {
  ConnectionError,
  SyncError,
  WriteError,
  errorMessage,
} from "../errors";
import { AnalyticalRow, TargetTable } from "../model/tables";
import { Sql, quoteIdentifier, sql, toQuery } from "../sqlHelpers";

/** The parts of the ClickHouse client the stores use. */
export interface ClickHouseLike {
  query(params: {
    query: string;
    query_params?: Record<string, unknown>;
    format: "JSONEachRow";
  }): Promise<{ json(): Promise<unknown> }>;
  insert(params: {
    table: string;
    values: readonly object[];
    format: "JSONEachRow";
    abort_signal?: AbortSignal;
    clickhouse_settings?: ClickHouseSettings;
  }): Promise<unknown>;
}

export interface InsertOptions {
  signal?: AbortSignal;
}

/**
 * Destination of both pipelines. An insert is one unit: it either stores
 * every row or throws, and nothing of a failed insert counts as committed.
 */
export interface AnalyticalStore {
  insert(
    target: TargetTable,
    rows: readonly AnalyticalRow[],
    options?: InsertOptions,
  ): Promise<void>;
  /** Current rows: latest version per key, tombstones excluded. */
  countCurrent(target: TargetTable): Promise<number>;
}

export function classifyClickHouseError(
  error: unknown,
  operation: string,
): SyncError {
  if (error instanceof SyncError) {
    return error;
  }
  if (error instanceof ClickHouseError) {
    return new WriteError(
      `${operation} rejected by ClickHouse (code ${error.code}): ${error.message}`,
      { cause: error },
    );
  }
  return new ConnectionError(`${operation} failed: ${errorMessage(error)}`, {
    cause: error,
  });
}

const countRows = z.array(
  z.object({ count: z.union([z.string(), z.number()]).pipe(z.coerce.number()) }),
);

export const currentCountQuery = (target: TargetTable): Sql => {
  const key = sql.raw(quoteIdentifier(target.keyColumn));
  if (target.versionColumn === undefined || target.deletedColumn === undefined) {
    return sql`SELECT uniqExact(${key}) AS count FROM ${target}`;
  }
  const version = sql.raw(quoteIdentifier(target.versionColumn));
  const deleted = sql.raw(quoteIdentifier(target.deletedColumn));
  return sql`SELECT count() AS count FROM (SELECT ${key}, argMax(${deleted}, ${version}) AS deleted FROM ${target} GROUP BY ${key}) WHERE deleted = 0`;
};

export class ClickHouseAnalyticalStore implements AnalyticalStore {
  constructor(private readonly client: ClickHouseLike) {}

  async insert(
    target: TargetTable,
    rows: readonly AnalyticalRow[],
    options: InsertOptions = {},
  ): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    try {
      await this.client.insert({
        table: target.name,
        values: rows,
        format: "JSONEachRow",
        abort_signal: options.signal,
        clickhouse_settings: {
          // acknowledge only after the block is stored
          wait_end_of_query: 1,
        },
      });
    } catch (error) {
      throw classifyClickHouseError(error, `insert into ${target.name}`);
    }
  }

  async countCurrent(target: TargetTable): Promise<number> {
    const [query, query_params] = toQuery(currentCountQuery(target));
    try {
      const result = await this.client.query({
        query,
        query_params,
        format: "JSONEachRow",
      });
      const rows = countRows.parse(await result.json());
      return rows[0]?.count ?? 0;
    } catch (error) {
      throw classifyClickHouseError(error, `count of ${target.name}`);
    }
  }
}
