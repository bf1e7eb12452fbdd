#!/usr/bin/env node

// Entry point of the `adsync` CLI. Each command loads adsync.config.toml
// (plus ADSYNC_* environment overrides) and runs one part of the sync engine.

import { Command } from "commander";
import { buildLogger, logError } from "./commons";
import {
  SyncSettings,
  loadSyncSettings,
  requireClickHouse,
  requireConnector,
  requirePostgres,
} from "./config/runtime";
import { ClickHouseAnalyticalStore } from "./destination/analyticalStore";
import {
  DEFAULT_SCHEMA_PATH,
  applySchema,
  createDatabase,
  readSchemaFile,
} from "./destination/schema";
import { SOURCE_TABLES } from "./model/tables";
import { logReconciliation, reconcile } from "./reconcile";
import {
  createBatchServices,
  createClickHouse,
  createSourceClient,
  createStreamServices,
  createWatermarkStore,
} from "./services";
import { buildConnectorDefinition, ensureConnector } from "./stream/connector";
import { setupStructuredConsole } from "./utils/structured-logging";

interface GlobalOptions {
  config?: string;
}

const logger = buildLogger("adsync");

const loadSettings = async (options: GlobalOptions): Promise<SyncSettings> => {
  const settings = await loadSyncSettings({ configPath: options.config });
  setupStructuredConsole(settings.logging.format);
  return settings;
};

/** Runs `stop` once on SIGINT or SIGTERM, then exits. */
const onShutdown = (stop: () => Promise<void>): void => {
  let stopping = false;
  const handler = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.log(`Received ${signal}, shutting down...`);
    stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError(logger, error);
        process.exit(1);
      });
  };
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
};

const runCommand =
  <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
  async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      logError(logger, error);
      process.exit(1);
    }
  };

const program = new Command();

program
  .name("adsync")
  .description("Sync advertising data from PostgreSQL to ClickHouse")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to adsync.config.toml");

program
  .command("batch")
  .description("Run the incremental batch pipeline on its schedule")
  .action(
    runCommand(async () => {
      const settings = await loadSettings(program.opts<GlobalOptions>());
      const services = createBatchServices(settings);
      onShutdown(services.close);
      services.scheduler.start();
    }),
  );

program
  .command("run-once")
  .description("Run the batch pipeline once and exit")
  .action(
    runCommand(async () => {
      const settings = await loadSettings(program.opts<GlobalOptions>());
      const services = createBatchServices(settings);
      try {
        const report = await services.orchestrator.runOnce();
        for (const table of report.tables) {
          logger.log(
            `${table.table}: ${table.outcome}, ${table.rowsLoaded} loaded, watermark ${table.watermarkAfter ?? "unset"}`,
          );
        }
        process.exitCode = report.ok ? 0 : 1;
      } finally {
        await services.close();
      }
    }),
  );

program
  .command("stream")
  .description("Consume CDC topics and apply change events")
  .action(
    runCommand(async () => {
      const settings = await loadSettings(program.opts<GlobalOptions>());
      const services = await createStreamServices(settings);
      onShutdown(services.close);
      await services.loop.start();
    }),
  );

program
  .command("init-schema")
  .description("Create the destination database, tables and views")
  .option("--schema <path>", "DDL file to apply", DEFAULT_SCHEMA_PATH)
  .action(
    runCommand(async (options: { schema: string }) => {
      const settings = await loadSettings(program.opts<GlobalOptions>());
      const config = requireClickHouse(settings);
      const script = await readSchemaFile(options.schema);

      const admin = createClickHouse(config, undefined, "default");
      try {
        await createDatabase(admin, config.db_name, logger);
      } finally {
        await admin.close();
      }
      const client = createClickHouse(config);
      try {
        await applySchema(client, script, logger);
      } finally {
        await client.close();
      }
    }),
  );

program
  .command("register-connector")
  .description("Register the Debezium PostgreSQL connector with Kafka Connect")
  .action(
    runCommand(async () => {
      const settings = await loadSettings(program.opts<GlobalOptions>());
      const connector = requireConnector(settings);
      const definition = buildConnectorDefinition(
        connector,
        requirePostgres(settings),
        settings.kafka_config,
        SOURCE_TABLES,
      );
      await ensureConnector(definition, {
        url: connector.url,
        retries: connector.retries,
        retryDelayMs: connector.retry_delay_ms,
        logger,
      });
    }),
  );

program
  .command("reconcile")
  .description("Compare source row counts with current destination rows")
  .action(
    runCommand(async () => {
      const settings = await loadSettings(program.opts<GlobalOptions>());
      const postgres = requirePostgres(settings);
      const sync = settings.sync_config;
      const clickhouse = createClickHouse(requireClickHouse(settings));
      const source = createSourceClient(postgres, sync.extract_timeout_ms);
      try {
        const results = await reconcile({
          source,
          destination: new ClickHouseAnalyticalStore(clickhouse),
          watermarks: createWatermarkStore(settings, clickhouse),
          schema: postgres.schema,
        });
        logReconciliation(logger, results);
      } finally {
        await source.end();
        await clickhouse.close();
      }
    }),
  );

program.parse();
