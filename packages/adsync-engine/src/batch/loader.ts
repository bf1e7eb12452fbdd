import { withTimeout } from "../commons";
import { AnalyticalStore } from "../destination/analyticalStore";
import { AnalyticalRow, TargetTable } from "../model/tables";
import { Cursor, maxCursor } from "../model/timestamps";

export interface LoadItem {
  row: AnalyticalRow;
  /** Cursor of the source row the item came from. */
  cursor: Cursor;
}

export interface LoadResult {
  loaded: number;
  /**
   * Largest cursor the load confirms: the rows written and, once they are
   * stored, the page they came from. Null when nothing was confirmed.
   */
  maxCursor: Cursor | null;
}

/**
 * Writes one page of transformed rows as a single insert. A failure throws
 * and confirms nothing, so the caller keeps its watermark.
 *
 * `pageCursor` is the largest cursor of the extracted page, rows that failed
 * to transform included; a successful load confirms it too so those rows are
 * not extracted again.
 */
export class BatchLoader {
  constructor(
    private readonly store: AnalyticalStore,
    private readonly timeoutMs: number,
  ) {}

  async load(
    target: TargetTable,
    items: readonly LoadItem[],
    pageCursor: Cursor | null = null,
  ): Promise<LoadResult> {
    if (items.length > 0) {
      await withTimeout(`load ${target.name}`, this.timeoutMs, (signal) =>
        this.store.insert(
          target,
          items.map((item) => item.row),
          { signal },
        ),
      );
    }
    return {
      loaded: items.length,
      maxCursor: items.reduce<Cursor | null>(
        (max, item) => maxCursor(max, item.cursor),
        pageCursor,
      ),
    };
  }
}
