import { z } from "zod";
import { ConfigurationError } from "../errors";
import {
  SOURCE_TABLES,
  SourceTableName,
  isSourceTableName,
} from "../model/tables";
import { toCanonicalTimestamp } from "../model/timestamps";
import { isRecord } from "../utils/records";
import { describeIssues } from "../transform/rowTransformer";
import { readConfigFile } from "./configFile";

export const ENV_PREFIX = "ADSYNC_";

export function parseBool(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return undefined;
  }
}

const boolSetting = z.preprocess(
  (value) => (typeof value === "string" ? (parseBool(value) ?? value) : value),
  z.boolean(),
);

const positiveInt = z.coerce.number().int().positive();

const requiredText = z.string().trim().min(1);

const postgresConfigSchema = z.object({
  host: requiredText,
  port: positiveInt.default(5432),
  user: requiredText,
  password: z.string().default(""),
  db_name: requiredText,
  schema: requiredText.default("public"),
  pool_size: positiveInt.default(4),
});

const clickhouseConfigSchema = z.object({
  host: requiredText,
  host_port: positiveInt.default(8123),
  user: requiredText.default("default"),
  password: z.string().default(""),
  db_name: requiredText.default("analytics"),
  use_ssl: boolSetting.default(false),
});

const kafkaConfigSchema = z.object({
  broker: requiredText,
  client_id: requiredText.default("adsync"),
  group_id: requiredText.default("adsync-stream"),
  from_beginning: boolSetting.default(true),
  topic_prefix: requiredText.default("postgres"),
  topics: z.record(requiredText).default({}),
  dead_letter_topic: requiredText.optional(),
  session_timeout_ms: positiveInt.default(30000),
  sasl_username: z.string().optional(),
  sasl_password: z.string().optional(),
  sasl_mechanism: z.string().optional(),
  security_protocol: z.string().optional(),
});

const syncConfigSchema = z.object({
  sync_interval_ms: positiveInt.default(300_000),
  page_size: positiveInt.default(1000),
  extract_timeout_ms: positiveInt.default(30_000),
  load_timeout_ms: positiveInt.default(30_000),
  retry_backoff_ms: positiveInt.default(5_000),
  watermark_store: z.enum(["clickhouse", "memory"]).default("clickhouse"),
  watermark_overrides: z
    .record(
      z.string().transform((value, ctx) => {
        const cursor = toCanonicalTimestamp(value);
        if (cursor === null) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `invalid timestamp: ${value}`,
          });
          return z.NEVER;
        }
        return cursor;
      }),
    )
    .default({}),
});

const connectorConfigSchema = z.object({
  url: requiredText,
  name: requiredText.default("adsync-postgres-connector"),
  slot_name: requiredText.default("adsync"),
  publication_name: requiredText.default("adsync_publication"),
  // host of the database as Kafka Connect sees it
  database_host: requiredText.optional(),
  retries: positiveInt.default(30),
  retry_delay_ms: positiveInt.default(10_000),
});

const loggingConfigSchema = z.object({
  format: z.enum(["text", "json"]).default("text"),
});

const syncSettingsSchema = z.object({
  postgres_config: postgresConfigSchema.optional(),
  clickhouse_config: clickhouseConfigSchema.optional(),
  kafka_config: kafkaConfigSchema.optional(),
  sync_config: syncConfigSchema.default({}),
  connector_config: connectorConfigSchema.optional(),
  logging: loggingConfigSchema.default({}),
});

export type PostgresConfig = z.infer<typeof postgresConfigSchema>;
export type ClickHouseConfig = z.infer<typeof clickhouseConfigSchema>;
export type KafkaConfig = z.infer<typeof kafkaConfigSchema>;
export type SyncOptions = z.infer<typeof syncConfigSchema>;
export type ConnectorConfig = z.infer<typeof connectorConfigSchema>;
export type SyncSettings = z.infer<typeof syncSettingsSchema>;

const envValue = (
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined => {
  const value = env[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const setPath = (
  target: Record<string, unknown>,
  keys: readonly string[],
  value: string,
): void => {
  const [head, ...rest] = keys;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const child: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
  target[head] = child;
  setPath(child, rest, value);
};

/**
 * Overlays `ADSYNC_<SECTION>__<KEY>[__<SUBKEY>]` variables on the file
 * contents, e.g. `ADSYNC_KAFKA_CONFIG__TOPICS__CLICKS`.
 */
export function applyEnvOverrides(
  content: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...content };
  const names = Object.keys(env)
    .filter((name) => name.startsWith(ENV_PREFIX) && name.includes("__"))
    .sort();
  for (const name of names) {
    const value = envValue(env, name);
    if (value === undefined) {
      continue;
    }
    const keys = name
      .slice(ENV_PREFIX.length)
      .split("__")
      .map((key) => key.toLowerCase());
    if (keys.some((key) => key.length === 0)) {
      continue;
    }
    setPath(merged, keys, value);
  }
  return merged;
}

const checkTableKeys = (
  section: string,
  record: Readonly<Record<string, unknown>>,
): void => {
  const unknownTables = Object.keys(record).filter(
    (name) => !isSourceTableName(name),
  );
  if (unknownTables.length > 0) {
    throw new ConfigurationError(
      `${section} names unknown tables: ${unknownTables.join(", ")} (known: ${SOURCE_TABLES.join(", ")})`,
    );
  }
};

export function parseSyncSettings(
  content: Record<string, unknown>,
  source = "configuration",
): SyncSettings {
  const parsed = syncSettingsSchema.safeParse(content);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${source}: ${describeIssues(parsed.error)}`,
    );
  }
  const settings = parsed.data;
  checkTableKeys("sync_config.watermark_overrides", settings.sync_config.watermark_overrides);
  if (settings.kafka_config) {
    checkTableKeys("kafka_config.topics", settings.kafka_config.topics);
  }
  return settings;
}

export interface LoadOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolves the settings from adsync.config.toml and the environment.
 * Validation failures are ConfigurationErrors; sections a command needs are
 * checked by the `require*` helpers.
 */
export async function loadSyncSettings(
  options: LoadOptions = {},
): Promise<SyncSettings> {
  const file = await readConfigFile(options);
  const merged = applyEnvOverrides(file.content, options.env ?? process.env);
  return parseSyncSettings(merged, file.path ?? "configuration");
}

const missing = (section: string, keys: string): ConfigurationError =>
  new ConfigurationError(
    `[${section}] is required: set ${keys} in adsync.config.toml or ${ENV_PREFIX}${section.toUpperCase()}__<KEY>`,
  );

export function requirePostgres(settings: SyncSettings): PostgresConfig {
  if (!settings.postgres_config) {
    throw missing("postgres_config", "host, user and db_name");
  }
  return settings.postgres_config;
}

export function requireClickHouse(settings: SyncSettings): ClickHouseConfig {
  if (!settings.clickhouse_config) {
    throw missing("clickhouse_config", "host");
  }
  return settings.clickhouse_config;
}

export function requireKafka(settings: SyncSettings): KafkaConfig {
  if (!settings.kafka_config) {
    throw missing("kafka_config", "broker");
  }
  return settings.kafka_config;
}

export function requireConnector(settings: SyncSettings): ConnectorConfig {
  if (!settings.connector_config) {
    throw missing("connector_config", "url");
  }
  return settings.connector_config;
}

/** Topic carrying a table's change events: `<prefix>.<schema>.<table>` unless configured. */
export const topicForTable = (
  kafka: KafkaConfig,
  sourceSchema: string,
  table: SourceTableName,
): string => kafka.topics[table] ?? `${kafka.topic_prefix}.${sourceSchema}.${table}`;
