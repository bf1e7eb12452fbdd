import { z } from "zod";
import {
  Cursor,
  addMicros,
  eventDateOf,
  maxCursor,
  toCanonicalDate,
  toCanonicalTimestamp,
} from "./timestamps";
import { isRecord } from "../utils/records";

export type SourceTableName = "advertiser" | "campaign" | "impressions" | "clicks";

/** Sync order: every table comes after the tables it depends on. */
export const SOURCE_TABLES: readonly SourceTableName[] = [
  "advertiser",
  "campaign",
  "impressions",
  "clicks",
];

export const isSourceTableName = (name: string): name is SourceTableName =>
  SOURCE_TABLES.some((table) => table === name);

export type TableKind = "dimension" | "fact";

export type ColumnType = "key" | "text" | "numeric" | "timestamp" | "date";

export interface SourceColumn {
  name: string;
  type: ColumnType;
}

export interface SourceTable<T extends SourceTableName = SourceTableName> {
  name: T;
  kind: TableKind;
  keyColumn: string;
  /** Monotonic column the batch watermark tracks. */
  cursorColumn: string;
  columns: readonly SourceColumn[];
  dependsOn: readonly SourceTableName[];
}

export interface TargetTable {
  name: string;
  kind: TableKind;
  keyColumn: string;
  /** ReplacingMergeTree version column; facts have none. */
  versionColumn?: string;
  deletedColumn?: string;
}

export interface DimAdvertiserRow {
  advertiser_id: number;
  name: string;
  updated_at: string;
  created_at: string;
  is_deleted: 0 | 1;
}

export interface DimCampaignRow {
  campaign_id: number;
  name: string;
  bid: number;
  budget: number;
  start_date: string | null;
  end_date: string | null;
  advertiser_id: number | null;
  updated_at: string;
  created_at: string;
  is_deleted: 0 | 1;
}

export interface FactImpressionRow {
  impression_id: number;
  campaign_id: number;
  event_date: string;
  event_time: string;
  created_at: string;
}

export interface FactClickRow {
  click_id: number;
  campaign_id: number;
  event_date: string;
  event_time: string;
  created_at: string;
}

const rowId = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .refine((id) => Number.isSafeInteger(id) && id >= 0, {
    message: "expected a non-negative integer id",
  });

const timestampValue = z
  .union([z.string(), z.number(), z.date()])
  .transform((value, ctx) => {
    const timestamp = toCanonicalTimestamp(value);
    if (timestamp === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid timestamp: ${String(value)}`,
      });
      return z.NEVER;
    }
    return timestamp;
  });

const dateValue = z
  .union([z.string(), z.number(), z.date()])
  .transform((value, ctx) => {
    const date = toCanonicalDate(value);
    if (date === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid date: ${String(value)}`,
      });
      return z.NEVER;
    }
    return date;
  });

// numeric columns arrive as text from pg and from Debezium's string decimal mode
const moneyValue = z
  .union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/).transform(parseFloat)])
  .refine(Number.isFinite, { message: "expected a finite amount" });

/**
 * Accepts the key under the analytical name as well, e.g. `campaign_id` for a
 * campaign image.
 */
const withKeyAlias =
  (alias: string) =>
  (value: unknown): unknown => {
    if (!isRecord(value) || (value.id !== undefined && value.id !== null)) {
      return value;
    }
    const aliased = value[alias];
    return aliased === undefined ? value : { ...value, id: aliased };
  };

const advertiserImage = z.preprocess(
  withKeyAlias("advertiser_id"),
  z.object({
    id: rowId,
    name: z.string().nullish(),
    updated_at: timestampValue.nullish(),
    created_at: timestampValue.nullish(),
  }),
);

const campaignImage = z.preprocess(
  withKeyAlias("campaign_id"),
  z.object({
    id: rowId,
    name: z.string().nullish(),
    bid: moneyValue.nullish(),
    budget: moneyValue.nullish(),
    start_date: dateValue.nullish(),
    end_date: dateValue.nullish(),
    advertiser_id: rowId.nullish(),
    updated_at: timestampValue.nullish(),
    created_at: timestampValue.nullish(),
  }),
);

const eventFields = {
  id: rowId,
  campaign_id: rowId.nullish(),
  event_time: timestampValue.nullish(),
  created_at: timestampValue.nullish(),
};

const impressionImage = z.preprocess(
  withKeyAlias("impression_id"),
  z.object(eventFields),
);

const clickImage = z.preprocess(withKeyAlias("click_id"), z.object(eventFields));

/** Validated source row images, per table. */
export interface SourceImages {
  advertiser: z.infer<typeof advertiserImage>;
  campaign: z.infer<typeof campaignImage>;
  impressions: z.infer<typeof impressionImage>;
  clicks: z.infer<typeof clickImage>;
}

/** Analytical rows, per source table. */
export interface TargetRows {
  advertiser: DimAdvertiserRow;
  campaign: DimCampaignRow;
  impressions: FactImpressionRow;
  clicks: FactClickRow;
}

export type AnalyticalRow = TargetRows[SourceTableName];

export interface TableHandler<T extends SourceTableName> {
  source: SourceTable<T>;
  target: TargetTable;
  image: z.ZodType<SourceImages[T], z.ZodTypeDef, unknown>;
  toRow: (image: SourceImages[T]) => TargetRows[T] | null;
  /** Logical delete of the row the image describes; facts have none. */
  toTombstone: (
    image: SourceImages[T],
    deletedAt: Cursor | null,
  ) => TargetRows[T] | null;
}

export type TableRegistry = { readonly [T in SourceTableName]: TableHandler<T> };

/**
 * A tombstone must supersede the last live version even when the delete's
 * source time is coarser (milliseconds) than the version column.
 */
export const tombstoneVersion = (
  lastVersion: Cursor | null | undefined,
  deletedAt: Cursor | null,
): Cursor | null =>
  maxCursor(
    lastVersion === null || lastVersion === undefined
      ? null
      : addMicros(lastVersion, 1),
    deletedAt,
  );

const noTombstone = (): null => null;

export const TABLE_REGISTRY: TableRegistry = {
  advertiser: {
    source: {
      name: "advertiser",
      kind: "dimension",
      keyColumn: "id",
      cursorColumn: "updated_at",
      columns: [
        { name: "id", type: "key" },
        { name: "name", type: "text" },
        { name: "updated_at", type: "timestamp" },
        { name: "created_at", type: "timestamp" },
      ],
      dependsOn: [],
    },
    target: {
      name: "dim_advertiser",
      kind: "dimension",
      keyColumn: "advertiser_id",
      versionColumn: "updated_at",
      deletedColumn: "is_deleted",
    },
    image: advertiserImage,
    toRow: (image) => {
      const version = image.updated_at ?? image.created_at;
      if (!version) {
        return null;
      }
      return {
        advertiser_id: image.id,
        name: image.name ?? "",
        updated_at: version,
        created_at: image.created_at ?? version,
        is_deleted: 0,
      };
    },
    toTombstone: (image, deletedAt) => {
      const version = tombstoneVersion(
        image.updated_at ?? image.created_at,
        deletedAt,
      );
      if (version === null) {
        return null;
      }
      return {
        advertiser_id: image.id,
        name: image.name ?? "",
        updated_at: version,
        created_at: image.created_at ?? version,
        is_deleted: 1,
      };
    },
  },

  campaign: {
    source: {
      name: "campaign",
      kind: "dimension",
      keyColumn: "id",
      cursorColumn: "updated_at",
      columns: [
        { name: "id", type: "key" },
        { name: "name", type: "text" },
        { name: "bid", type: "numeric" },
        { name: "budget", type: "numeric" },
        { name: "start_date", type: "date" },
        { name: "end_date", type: "date" },
        { name: "advertiser_id", type: "key" },
        { name: "updated_at", type: "timestamp" },
        { name: "created_at", type: "timestamp" },
      ],
      dependsOn: ["advertiser"],
    },
    target: {
      name: "dim_campaign",
      kind: "dimension",
      keyColumn: "campaign_id",
      versionColumn: "updated_at",
      deletedColumn: "is_deleted",
    },
    image: campaignImage,
    toRow: (image) => {
      const version = image.updated_at ?? image.created_at;
      if (!version) {
        return null;
      }
      return {
        campaign_id: image.id,
        name: image.name ?? "",
        bid: image.bid ?? 0,
        budget: image.budget ?? 0,
        start_date: image.start_date ?? null,
        end_date: image.end_date ?? null,
        advertiser_id: image.advertiser_id ?? null,
        updated_at: version,
        created_at: image.created_at ?? version,
        is_deleted: 0,
      };
    },
    toTombstone: (image, deletedAt) => {
      const version = tombstoneVersion(
        image.updated_at ?? image.created_at,
        deletedAt,
      );
      if (version === null) {
        return null;
      }
      return {
        campaign_id: image.id,
        name: image.name ?? "",
        bid: image.bid ?? 0,
        budget: image.budget ?? 0,
        start_date: image.start_date ?? null,
        end_date: image.end_date ?? null,
        advertiser_id: image.advertiser_id ?? null,
        updated_at: version,
        created_at: image.created_at ?? version,
        is_deleted: 1,
      };
    },
  },

  impressions: {
    source: {
      name: "impressions",
      kind: "fact",
      keyColumn: "id",
      cursorColumn: "created_at",
      columns: [
        { name: "id", type: "key" },
        { name: "campaign_id", type: "key" },
        { name: "created_at", type: "timestamp" },
      ],
      dependsOn: ["campaign"],
    },
    target: {
      name: "fact_impressions",
      kind: "fact",
      keyColumn: "impression_id",
    },
    image: impressionImage,
    toRow: (image) => {
      const eventTime = image.event_time ?? image.created_at;
      if (!eventTime || image.campaign_id === null || image.campaign_id === undefined) {
        return null;
      }
      return {
        impression_id: image.id,
        campaign_id: image.campaign_id,
        event_date: eventDateOf(eventTime),
        event_time: eventTime,
        created_at: image.created_at ?? eventTime,
      };
    },
    toTombstone: noTombstone,
  },

  clicks: {
    source: {
      name: "clicks",
      kind: "fact",
      keyColumn: "id",
      cursorColumn: "created_at",
      columns: [
        { name: "id", type: "key" },
        { name: "campaign_id", type: "key" },
        { name: "created_at", type: "timestamp" },
      ],
      dependsOn: ["campaign"],
    },
    target: {
      name: "fact_clicks",
      kind: "fact",
      keyColumn: "click_id",
    },
    image: clickImage,
    toRow: (image) => {
      const eventTime = image.event_time ?? image.created_at;
      if (!eventTime || image.campaign_id === null || image.campaign_id === undefined) {
        return null;
      }
      return {
        click_id: image.id,
        campaign_id: image.campaign_id,
        event_date: eventDateOf(eventTime),
        event_time: eventTime,
        created_at: image.created_at ?? eventTime,
      };
    },
    toTombstone: noTombstone,
  },
};

/** Calls `visit` once per table, in sync order, with the table's own row types. */
export interface TableVisitor<R> {
  <T extends SourceTableName>(handler: TableHandler<T>): R;
}

export const mapTables = <R>(
  registry: TableRegistry,
  visit: TableVisitor<R>,
): R[] => [
  visit(registry.advertiser),
  visit(registry.campaign),
  visit(registry.impressions),
  visit(registry.clicks),
];
