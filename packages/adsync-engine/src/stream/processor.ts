import { withTimeout } from "../commons";
import { AnalyticalStore } from "../destination/analyticalStore";
import { SourceTableName, TableHandler } from "../model/tables";
import {
  TransformOutcome,
  tombstoneFor,
  transformImage,
} from "../transform/rowTransformer";
import { ChangeEvent, ChangeOperation } from "./decoder";

export type ProcessOutcome =
  | {
      action: "written";
      table: SourceTableName;
      target: string;
      op: ChangeOperation;
      tombstone: boolean;
    }
  | { action: "skipped"; table: SourceTableName; reason: string };

/**
 * Applies one change event to the destination: a versioned row for
 * dimension creates and updates, a tombstone for dimension deletes, a fact
 * row for fact creates. Writing the same event twice yields the same row.
 */
export class StreamProcessor {
  constructor(
    private readonly store: AnalyticalStore,
    private readonly writeTimeoutMs: number,
  ) {}

  async process<T extends SourceTableName>(
    handler: TableHandler<T>,
    event: ChangeEvent<T>,
  ): Promise<ProcessOutcome> {
    const table = handler.source.name;
    const outcome = this.toOutcome(handler, event);
    if (!outcome.ok) {
      return { action: "skipped", table, reason: outcome.reason };
    }

    await withTimeout(
      `write ${outcome.target.name}`,
      this.writeTimeoutMs,
      (signal) => this.store.insert(outcome.target, [outcome.row], { signal }),
    );
    return {
      action: "written",
      table,
      target: outcome.target.name,
      op: event.op,
      tombstone: event.op === "delete",
    };
  }

  private toOutcome<T extends SourceTableName>(
    handler: TableHandler<T>,
    event: ChangeEvent<T>,
  ): TransformOutcome<T> {
    switch (event.op) {
      case "create":
        return transformImage(handler, event.after);
      case "update":
        if (handler.source.kind === "fact") {
          return {
            ok: false,
            reason: `${handler.source.name} is append-only; update of ${event.after.id} ignored`,
          };
        }
        return transformImage(handler, event.after);
      case "delete":
        return tombstoneFor(handler, event.before, event.sourceTs);
    }
  }
}
