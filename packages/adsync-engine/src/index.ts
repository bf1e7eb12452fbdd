export * from "./errors";
export {
  type Logger,
  backoffDelay,
  buildLogger,
  getClickhouseClient,
  getKafkaClient,
  getPostgresPool,
  withTimeout,
} from "./commons";

export * from "./model/timestamps";
export * from "./model/tables";
export * from "./transform/rowTransformer";

export * from "./config/runtime";
export { CONFIG_FILE_NAME, findConfigFile, readConfigFile } from "./config/configFile";

export * from "./destination/analyticalStore";
export * from "./destination/schema";

export * from "./batch/watermarkStore";
export * from "./batch/extractor";
export * from "./batch/loader";
export * from "./batch/orchestrator";
export * from "./batch/scheduler";

export * from "./stream/decoder";
export * from "./stream/processor";
export * from "./stream/deadLetter";
export * from "./stream/consumer";
export * from "./stream/connector";

export * from "./reconcile";
export * from "./services";

export {
  type LogFormat,
  type Pipeline,
  type SyncLogContext,
  runWithSyncContext,
  setupStructuredConsole,
} from "./utils/structured-logging";
