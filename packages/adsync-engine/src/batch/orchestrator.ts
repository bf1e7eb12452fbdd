import { Logger, buildLogger, logError } from "../commons";
import { errorMessage } from "../errors";
import {
  SourceTable,
  SourceTableName,
  TABLE_REGISTRY,
  TableRegistry,
  TargetTable,
  mapTables,
} from "../model/tables";
import { Cursor, compareCursors, maxCursor } from "../model/timestamps";
import { TransformOutcome, transformRow } from "../transform/rowTransformer";
import { runWithSyncContext } from "../utils/structured-logging";
import { IncrementalExtractor } from "./extractor";
import { BatchLoader, LoadItem } from "./loader";
import { WatermarkStore } from "./watermarkStore";

export type RunState =
  | "IDLE"
  | "EXTRACTING"
  | "TRANSFORMING"
  | "LOADING"
  | "COMMITTING"
  | "FAILED";

const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  IDLE: ["EXTRACTING", "FAILED"],
  EXTRACTING: ["TRANSFORMING", "COMMITTING", "FAILED"],
  TRANSFORMING: ["LOADING", "FAILED"],
  LOADING: ["EXTRACTING", "FAILED"],
  COMMITTING: ["IDLE", "FAILED"],
  FAILED: [],
};

/**
 * State of one table's sync within a run. Extract, transform and load repeat
 * per page; the watermark is committed once, after the last page loaded.
 */
export class TableRun {
  private current: RunState = "IDLE";
  readonly history: RunState[] = ["IDLE"];

  constructor(readonly table: SourceTableName) {}

  get state(): RunState {
    return this.current;
  }

  transition(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(
        `${this.table}: invalid run transition ${this.current} -> ${next}`,
      );
    }
    this.current = next;
    this.history.push(next);
  }

  fail(): void {
    if (this.current !== "FAILED") {
      this.transition("FAILED");
    }
  }
}

export type TableOutcome = "synced" | "failed" | "skipped";

export interface TableReport {
  table: SourceTableName;
  outcome: TableOutcome;
  states: RunState[];
  rowsExtracted: number;
  rowsLoaded: number;
  rowsSkipped: number;
  watermarkBefore: Cursor | null;
  watermarkAfter: Cursor | null;
  error?: Error;
}

export interface BatchRunReport {
  startedAt: Date;
  finishedAt: Date;
  tables: TableReport[];
  ok: boolean;
}

/** A table with its row types erased, bound once at startup. */
interface TableSync {
  source: SourceTable;
  target: TargetTable;
  transform: (raw: unknown) => TransformOutcome<SourceTableName>;
}

export const bindTableSyncs = (registry: TableRegistry): TableSync[] =>
  mapTables<TableSync>(registry, (handler) => ({
    source: handler.source,
    target: handler.target,
    transform: (raw: unknown) => transformRow(handler, raw),
  }));

export interface BatchOrchestratorDeps {
  extractor: IncrementalExtractor;
  loader: BatchLoader;
  watermarks: WatermarkStore;
}

export interface BatchOrchestratorOptions {
  registry?: TableRegistry;
  /** Starting cursors for tables that have no stored watermark. */
  watermarkOverrides?: Partial<Record<SourceTableName, Cursor>>;
  loggerFor?: (table: SourceTableName) => Logger;
}

/**
 * Runs extract, transform, load and commit for every table, dimensions
 * before the facts that reference them. A failed table keeps its watermark
 * and the tables depending on it are skipped until the next run.
 */
export class BatchOrchestrator {
  private readonly syncs: TableSync[];
  private readonly overrides: Partial<Record<SourceTableName, Cursor>>;
  private readonly loggerFor: (table: SourceTableName) => Logger;
  private running = false;
  private stopRequested = false;

  constructor(
    private readonly deps: BatchOrchestratorDeps,
    options: BatchOrchestratorOptions = {},
  ) {
    this.syncs = bindTableSyncs(options.registry ?? TABLE_REGISTRY);
    this.overrides = options.watermarkOverrides ?? {};
    this.loggerFor =
      options.loggerFor ?? ((table) => buildLogger(`batch:${table}`));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Stops the current run before its next table. */
  requestStop(): void {
    this.stopRequested = true;
  }

  async runOnce(): Promise<BatchRunReport> {
    if (this.running) {
      throw new Error("A batch run is already in progress");
    }
    this.running = true;
    this.stopRequested = false;
    const startedAt = new Date();
    const reports: TableReport[] = [];
    try {
      for (const sync of this.syncs) {
        if (this.stopRequested) {
          break;
        }
        const blocked = sync.source.dependsOn.filter((dependency) =>
          reports.some(
            (report) => report.table === dependency && report.outcome !== "synced",
          ),
        );
        if (blocked.length > 0) {
          this.loggerFor(sync.source.name).warn(
            `Skipped: dependency ${blocked.join(", ")} did not sync in this run`,
          );
          reports.push(emptyReport(sync.source.name, "skipped"));
          continue;
        }
        reports.push(
          await runWithSyncContext(
            { pipeline: "batch", table: sync.source.name },
            () => this.syncTable(sync),
          ),
        );
      }
    } finally {
      this.running = false;
    }
    return {
      startedAt,
      finishedAt: new Date(),
      tables: reports,
      ok: reports.every((report) => report.outcome === "synced"),
    };
  }

  private async syncTable(sync: TableSync): Promise<TableReport> {
    const table = sync.source.name;
    const logger = this.loggerFor(table);
    const run = new TableRun(table);
    const report = emptyReport(table, "synced");
    report.states = run.history;

    try {
      run.transition("EXTRACTING");
      const stored = await this.deps.watermarks.get(table);
      const since = stored ?? this.overrides[table] ?? null;
      report.watermarkBefore = stored;
      report.watermarkAfter = stored;
      logger.log(`Extracting rows after ${since ?? "the beginning"}`);

      let loadedMax: Cursor | null = null;
      for await (const page of this.deps.extractor.pages(sync.source, since)) {
        report.rowsExtracted += page.rows.length;

        run.transition("TRANSFORMING");
        const items: LoadItem[] = [];
        for (const row of page.rows) {
          const outcome = sync.transform(row.values);
          if (outcome.ok) {
            items.push({ row: outcome.row, cursor: row.cursor });
          } else {
            report.rowsSkipped += 1;
            logger.warn(`Skipped row ${row.key}: ${outcome.reason}`);
          }
        }

        run.transition("LOADING");
        const result = await this.deps.loader.load(sync.target, items, page.maxCursor);
        report.rowsLoaded += result.loaded;
        loadedMax = maxCursor(loadedMax, result.maxCursor);
        run.transition("EXTRACTING");
      }

      run.transition("COMMITTING");
      if (
        loadedMax !== null &&
        (since === null || compareCursors(loadedMax, since) > 0)
      ) {
        await this.deps.watermarks.set(table, loadedMax);
        report.watermarkAfter = loadedMax;
      }
      run.transition("IDLE");

      logger.log(
        `Synced ${report.rowsLoaded} rows into ${sync.target.name} (${report.rowsSkipped} skipped), watermark ${report.watermarkAfter ?? "unset"}`,
      );
      return report;
    } catch (error) {
      run.fail();
      report.outcome = "failed";
      report.watermarkAfter = report.watermarkBefore;
      report.error = error instanceof Error ? error : new Error(errorMessage(error));
      logger.error(`Run failed in ${run.history[run.history.length - 2]}`);
      logError(logger, error);
      return report;
    }
  }
}

const emptyReport = (
  table: SourceTableName,
  outcome: TableOutcome,
): TableReport => ({
  table,
  outcome,
  states: [],
  rowsExtracted: 0,
  rowsLoaded: 0,
  rowsSkipped: 0,
  watermarkBefore: null,
  watermarkAfter: null,
});
