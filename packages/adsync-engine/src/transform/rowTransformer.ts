import { z } from "zod";
import {
  SourceImages,
  SourceTableName,
  TableHandler,
  TargetRows,
  TargetTable,
} from "../model/tables";
import { Cursor } from "../model/timestamps";

export type TransformOutcome<T extends SourceTableName> =
  | { ok: true; target: TargetTable; row: TargetRows[T] }
  | { ok: false; reason: string };

export const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");

/**
 * Maps a validated source image to its analytical row. Shared by the batch
 * loader and the stream processor so both paths write identical versions.
 */
export function transformImage<T extends SourceTableName>(
  handler: TableHandler<T>,
  image: SourceImages[T],
): TransformOutcome<T> {
  const row = handler.toRow(image);
  if (row === null) {
    return {
      ok: false,
      reason: `${handler.source.name} row ${image.id} has no ${handler.source.kind === "dimension" ? "version timestamp" : "event time or campaign"}`,
    };
  }
  return { ok: true, target: handler.target, row };
}

/** Validates a raw source row, then maps it. Invalid rows map to zero rows. */
export function transformRow<T extends SourceTableName>(
  handler: TableHandler<T>,
  raw: unknown,
): TransformOutcome<T> {
  const parsed = handler.image.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      reason: `invalid ${handler.source.name} row: ${describeIssues(parsed.error)}`,
    };
  }
  return transformImage(handler, parsed.data);
}

export function tombstoneFor<T extends SourceTableName>(
  handler: TableHandler<T>,
  image: SourceImages[T],
  deletedAt: Cursor | null,
): TransformOutcome<T> {
  if (handler.source.kind === "fact") {
    return {
      ok: false,
      reason: `${handler.source.name} is append-only; delete of ${image.id} ignored`,
    };
  }
  const row = handler.toTombstone(image, deletedAt);
  if (row === null) {
    return {
      ok: false,
      reason: `${handler.source.name} delete of ${image.id} carries no version`,
    };
  }
  return { ok: true, target: handler.target, row };
}
