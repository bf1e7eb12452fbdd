import { z } from "zod";
import {
  ClickHouseLike,
  classifyClickHouseError,
} from "../destination/analyticalStore";
import {
  SourceTableName,
  TargetTable,
  isSourceTableName,
} from "../model/tables";
import {
  Cursor,
  compareCursors,
  formatEpochMillis,
} from "../model/timestamps";
import { sql, toQuery } from "../sqlHelpers";

/**
 * Per-table high-water marks of the batch pipeline.
 *
 * `get` returns null for a table that has never synced, which means a full
 * initial load. `set` never moves a mark backwards.
 */
export interface WatermarkStore {
  get(table: SourceTableName): Promise<Cursor | null>;
  set(table: SourceTableName, cursor: Cursor): Promise<void>;
}

export class InMemoryWatermarkStore implements WatermarkStore {
  private readonly marks = new Map<SourceTableName, Cursor>();

  constructor(initial: Partial<Record<SourceTableName, Cursor>> = {}) {
    for (const [table, cursor] of Object.entries(initial)) {
      if (cursor !== undefined && isSourceTableName(table)) {
        this.marks.set(table, cursor);
      }
    }
  }

  async get(table: SourceTableName): Promise<Cursor | null> {
    return this.marks.get(table) ?? null;
  }

  async set(table: SourceTableName, cursor: Cursor): Promise<void> {
    const current = this.marks.get(table);
    if (current === undefined || compareCursors(cursor, current) > 0) {
      this.marks.set(table, cursor);
    }
  }
}

export const WATERMARK_TABLE: TargetTable = {
  name: "etl_watermarks",
  kind: "dimension",
  keyColumn: "table_name",
  versionColumn: "updated_at",
};

const watermarkRows = z.array(z.object({ cursor: z.string() }));

/**
 * Watermarks kept as rows of `etl_watermarks`, one per advance. The largest
 * cursor per table wins, so neither the write clock nor the order rows land
 * in can move a mark backwards. A single-row insert is atomic, and each table
 * has exactly one writer (its batch orchestrator).
 */
export class ClickHouseWatermarkStore implements WatermarkStore {
  constructor(
    private readonly client: ClickHouseLike,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async get(table: SourceTableName): Promise<Cursor | null> {
    const [query, query_params] = toQuery(
      sql`SELECT max(cursor) AS cursor FROM ${WATERMARK_TABLE} WHERE table_name = ${table} GROUP BY table_name`,
    );
    try {
      const result = await this.client.query({
        query,
        query_params,
        format: "JSONEachRow",
      });
      const rows = watermarkRows.parse(await result.json());
      return rows.length > 0 ? rows[0].cursor : null;
    } catch (error) {
      throw classifyClickHouseError(error, `read watermark of ${table}`);
    }
  }

  async set(table: SourceTableName, cursor: Cursor): Promise<void> {
    const current = await this.get(table);
    if (current !== null && compareCursors(cursor, current) <= 0) {
      return;
    }
    try {
      await this.client.insert({
        table: WATERMARK_TABLE.name,
        values: [
          {
            table_name: table,
            cursor,
            updated_at: formatEpochMillis(this.now().getTime()),
          },
        ],
        format: "JSONEachRow",
        clickhouse_settings: { wait_end_of_query: 1 },
      });
    } catch (error) {
      throw classifyClickHouseError(error, `write watermark of ${table}`);
    }
  }
}
