import { Logger } from "./commons";
import { SourceClient, quotePgIdentifier } from "./batch/extractor";
import { WatermarkStore } from "./batch/watermarkStore";
import { AnalyticalStore } from "./destination/analyticalStore";
import { SourceQueryError } from "./errors";
import {
  SOURCE_TABLES,
  SourceTableName,
  TABLE_REGISTRY,
  TableRegistry,
} from "./model/tables";
import { Cursor } from "./model/timestamps";

export interface TableReconciliation {
  table: SourceTableName;
  target: string;
  sourceRows: number;
  destinationRows: number;
  /** Source rows not (yet) current in the destination; negative means extra rows. */
  drift: number;
  watermark: Cursor | null;
}

export interface ReconcileDeps {
  source: SourceClient;
  destination: AnalyticalStore;
  watermarks: WatermarkStore;
  schema: string;
  registry?: TableRegistry;
}

async function countSourceRows(
  source: SourceClient,
  schema: string,
  table: SourceTableName,
): Promise<number> {
  const rows = await source.query(
    `SELECT count(*)::text AS count FROM ${quotePgIdentifier(schema)}.${quotePgIdentifier(table)}`,
    [],
  );
  const count = Number(rows[0]?.count);
  if (!Number.isSafeInteger(count)) {
    throw new SourceQueryError(`${table}: unexpected count ${String(rows[0]?.count)}`);
  }
  return count;
}

/**
 * Compares each source table with the current rows of its destination
 * table. Drift right after a batch run points at deletes the batch path
 * cannot see or rows changed since the last watermark.
 */
export async function reconcile(
  deps: ReconcileDeps,
): Promise<TableReconciliation[]> {
  const registry = deps.registry ?? TABLE_REGISTRY;
  const results: TableReconciliation[] = [];
  for (const table of SOURCE_TABLES) {
    const target = registry[table].target;
    const sourceRows = await countSourceRows(deps.source, deps.schema, table);
    const destinationRows = await deps.destination.countCurrent(target);
    results.push({
      table,
      target: target.name,
      sourceRows,
      destinationRows,
      drift: sourceRows - destinationRows,
      watermark: await deps.watermarks.get(table),
    });
  }
  return results;
}

export const formatReconciliation = (
  results: readonly TableReconciliation[],
): string[] =>
  results.map(
    (result) =>
      `${result.table} -> ${result.target}: source ${result.sourceRows}, current ${result.destinationRows}, drift ${result.drift}, watermark ${result.watermark ?? "unset"}`,
  );

export const logReconciliation = (
  logger: Logger,
  results: readonly TableReconciliation[],
): void => {
  for (const line of formatReconciliation(results)) {
    logger.log(line);
  }
};
