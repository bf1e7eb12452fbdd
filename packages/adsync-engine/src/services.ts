import { ClickHouseClient } from "@clickhouse/client";
import { Producer } from "kafkajs";
import {
  Logger,
  buildLogger,
  createProducerConfig,
  getClickhouseClient,
  getKafkaClient,
  getPostgresPool,
} from "./commons";
import { IncrementalExtractor, PgSourceClient } from "./batch/extractor";
import { BatchLoader } from "./batch/loader";
import { BatchOrchestrator } from "./batch/orchestrator";
import { BatchScheduler } from "./batch/scheduler";
import {
  ClickHouseWatermarkStore,
  InMemoryWatermarkStore,
  WatermarkStore,
} from "./batch/watermarkStore";
import {
  ClickHouseConfig,
  PostgresConfig,
  SyncSettings,
  requireClickHouse,
  requireKafka,
  requirePostgres,
  topicForTable,
} from "./config/runtime";
import { ClickHouseAnalyticalStore } from "./destination/analyticalStore";
import { TABLE_REGISTRY } from "./model/tables";
import { StreamConsumerLoop, buildRoutes } from "./stream/consumer";
import { KafkaDeadLetterSink } from "./stream/deadLetter";
import { StreamProcessor } from "./stream/processor";

// keeps a redelivery wait below the consumer session timeout
const MAX_STREAM_RETRY_MS = 10_000;

export const createClickHouse = (
  config: ClickHouseConfig,
  requestTimeoutMs?: number,
  database: string = config.db_name,
): ClickHouseClient =>
  getClickhouseClient({
    host: config.host,
    port: config.host_port,
    username: config.user,
    password: config.password,
    database,
    useSSL: config.use_ssl,
    requestTimeoutMs,
  });

export const createSourceClient = (
  config: PostgresConfig,
  statementTimeoutMs: number,
): PgSourceClient =>
  new PgSourceClient(
    getPostgresPool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.db_name,
      poolSize: config.pool_size,
      statementTimeoutMs,
    }),
  );

export const createWatermarkStore = (
  settings: SyncSettings,
  clickhouse: ClickHouseClient,
): WatermarkStore =>
  settings.sync_config.watermark_store === "memory"
    ? new InMemoryWatermarkStore()
    : new ClickHouseWatermarkStore(clickhouse);

export interface BatchServices {
  orchestrator: BatchOrchestrator;
  scheduler: BatchScheduler;
  close(): Promise<void>;
}

export function createBatchServices(
  settings: SyncSettings,
  logger: Logger = buildLogger("batch"),
): BatchServices {
  const postgres = requirePostgres(settings);
  const sync = settings.sync_config;
  const clickhouse = createClickHouse(
    requireClickHouse(settings),
    sync.load_timeout_ms,
  );
  const source = createSourceClient(postgres, sync.extract_timeout_ms);

  const orchestrator = new BatchOrchestrator(
    {
      extractor: new IncrementalExtractor(source, {
        schema: postgres.schema,
        pageSize: sync.page_size,
        timeoutMs: sync.extract_timeout_ms,
      }),
      loader: new BatchLoader(
        new ClickHouseAnalyticalStore(clickhouse),
        sync.load_timeout_ms,
      ),
      watermarks: createWatermarkStore(settings, clickhouse),
    },
    { watermarkOverrides: sync.watermark_overrides },
  );
  const scheduler = new BatchScheduler(orchestrator, {
    intervalMs: sync.sync_interval_ms,
    retryBackoffMs: sync.retry_backoff_ms,
    onRun: (report) => {
      const summary = report.tables
        .map((table) => `${table.table}=${table.outcome}(${table.rowsLoaded})`)
        .join(" ");
      logger.log(`Run finished ${report.ok ? "ok" : "with failures"}: ${summary}`);
    },
  });

  return {
    orchestrator,
    scheduler,
    close: async () => {
      await scheduler.stop();
      await source.end();
      await clickhouse.close();
    },
  };
}

export interface StreamServices {
  loop: StreamConsumerLoop;
  close(): Promise<void>;
}

export async function createStreamServices(
  settings: SyncSettings,
  logger: Logger = buildLogger("stream"),
): Promise<StreamServices> {
  const kafka = requireKafka(settings);
  const sync = settings.sync_config;
  const sourceSchema = settings.postgres_config?.schema ?? "public";
  const clickhouse = createClickHouse(
    requireClickHouse(settings),
    sync.load_timeout_ms,
  );

  const client = getKafkaClient(
    {
      clientId: kafka.client_id,
      broker: kafka.broker,
      securityProtocol: kafka.security_protocol,
      saslUsername: kafka.sasl_username,
      saslPassword: kafka.sasl_password,
      saslMechanism: kafka.sasl_mechanism,
    },
    logger,
  );

  let producer: Producer | undefined;
  if (kafka.dead_letter_topic !== undefined) {
    producer = client.producer(createProducerConfig());
    logger.log("Connecting dead-letter producer...");
    await producer.connect();
  }

  const routes = buildRoutes(
    TABLE_REGISTRY,
    (table) => topicForTable(kafka, sourceSchema, table),
    new StreamProcessor(
      new ClickHouseAnalyticalStore(clickhouse),
      sync.load_timeout_ms,
    ),
  );
  const consumer = client.consumer({
    groupId: kafka.group_id,
    sessionTimeout: kafka.session_timeout_ms,
    heartbeatInterval: Math.floor(kafka.session_timeout_ms / 10),
    allowAutoTopicCreation: false,
  });

  const loop = new StreamConsumerLoop(consumer, routes, {
    fromBeginning: kafka.from_beginning,
    retryBackoffMs: Math.min(sync.retry_backoff_ms, MAX_STREAM_RETRY_MS),
    retryCapMs: MAX_STREAM_RETRY_MS,
    deadLetters:
      producer && kafka.dead_letter_topic !== undefined
        ? new KafkaDeadLetterSink(producer, kafka.dead_letter_topic)
        : undefined,
  });

  return {
    loop,
    close: async () => {
      await loop.stop();
      if (producer) {
        await producer.disconnect();
        logger.log("Producer is shutting down...");
      }
      await clickhouse.close();
    },
  };
}
