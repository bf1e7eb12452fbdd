import { createClient, ClickHouseClient } from "@clickhouse/client";
import { Kafka, KafkaConfig, ProducerConfig, SASLOptions } from "kafkajs";
import { Pool } from "pg";
import { TimeoutError } from "./errors";

export const MAX_RETRIES = 150;
export const MAX_RETRY_TIME_MS = 1000;
export const RETRY_INITIAL_TIME_MS = 100;

export const MAX_RETRIES_PRODUCER = 150;

export const ACKs = -1;

/**
 * Interface for logging functionality
 */
export interface Logger {
  logPrefix: string;
  log: (message: string) => void;
  error: (message: string) => void;
  warn: (message: string) => void;
}

export const buildLogger = (logPrefix: string): Logger => ({
  logPrefix,
  log: (message: string): void => {
    console.log(`${logPrefix}: ${message}`);
  },
  error: (message: string): void => {
    console.error(`${logPrefix}: ${message}`);
  },
  warn: (message: string): void => {
    console.warn(`${logPrefix}: ${message}`);
  },
});

export const logError = (logger: Logger, e: unknown): void => {
  if (!(e instanceof Error)) {
    logger.error(String(e));
    return;
  }
  logger.error(`${e.name}: ${e.message}`);
  const stack = e.stack;
  if (stack) {
    logger.error(stack);
  }
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** `base * 2^(attempt - 1)`, capped. `attempt` counts from 1. */
export const backoffDelay = (
  attempt: number,
  baseMs: number,
  capMs: number,
): number => Math.min(capMs, baseMs * 2 ** Math.max(0, attempt - 1));

/**
 * Races `run` against a timer. The abort signal handed to `run` fires when the
 * bound expires so clients that accept one can cancel their request.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

interface ClickHouseClientConfig {
  username: string;
  password: string;
  database: string;
  useSSL: boolean;
  host: string;
  port: number;
  requestTimeoutMs?: number;
}

export const getClickhouseClient = ({
  username,
  password,
  database,
  useSSL,
  host,
  port,
  requestTimeoutMs,
}: ClickHouseClientConfig): ClickHouseClient => {
  const protocol = useSSL ? "https" : "http";
  console.log(`Connecting to Clickhouse at ${protocol}://${host}:${port}`);
  return createClient({
    url: `${protocol}://${host}:${port}`,
    username,
    password,
    database,
    application: "adsync",
    ...(requestTimeoutMs !== undefined && { request_timeout: requestTimeoutMs }),
    // wait_end_of_query is set per insert so a write is confirmed only once stored
  });
};

interface PostgresClientConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolSize: number;
  statementTimeoutMs: number;
}

/**
 * The session time zone is pinned to UTC so cursor text rendered with
 * `to_char` is comparable across sessions.
 */
export const getPostgresPool = ({
  host,
  port,
  user,
  password,
  database,
  poolSize,
  statementTimeoutMs,
}: PostgresClientConfig): Pool => {
  console.log(`Connecting to Postgres at ${host}:${port}/${database}`);
  return new Pool({
    host,
    port,
    user,
    password,
    database,
    max: poolSize,
    application_name: "adsync",
    statement_timeout: statementTimeoutMs,
    query_timeout: statementTimeoutMs,
    connectionTimeoutMillis: statementTimeoutMs,
    options: "-c TimeZone=UTC",
  });
};

/**
 * Creates the producer configuration used for dead-letter publishing.
 * Sends wait for all in-sync replicas before the source offset is committed.
 */
export function createProducerConfig(): ProducerConfig {
  return {
    idempotent: false,
    allowAutoTopicCreation: false,
    retry: {
      retries: MAX_RETRIES_PRODUCER,
      maxRetryTime: MAX_RETRY_TIME_MS,
    },
  };
}

/**
 * Parses a comma-separated broker string into an array of valid broker addresses.
 * Handles whitespace trimming and filters out empty elements.
 *
 * @param brokerString - Comma-separated broker addresses (e.g., "broker1:9092, broker2:9092, , broker3:9092")
 * @returns Array of trimmed, non-empty broker addresses
 */
export const parseBrokerString = (brokerString: string): string[] =>
  brokerString
    .split(",")
    .map((b) => b.trim())
    .filter((b) => b.length > 0);

export type KafkaClientConfig = {
  clientId: string;
  broker: string;
  securityProtocol?: string; // e.g. "SASL_SSL" or "PLAINTEXT"
  saslUsername?: string;
  saslPassword?: string;
  saslMechanism?: string; // e.g. "scram-sha-256", "plain"
};

/**
 * Builds SASL configuration for Kafka client authentication
 */
export const buildSaslConfig = (
  logger: Logger,
  args: KafkaClientConfig,
): SASLOptions | undefined => {
  if (!args.saslMechanism) {
    return undefined;
  }
  const mechanism = args.saslMechanism.toLowerCase();
  const username = args.saslUsername ?? "";
  const password = args.saslPassword ?? "";
  switch (mechanism) {
    case "plain":
      return { mechanism: "plain", username, password };
    case "scram-sha-256":
      return { mechanism: "scram-sha-256", username, password };
    case "scram-sha-512":
      return { mechanism: "scram-sha-512", username, password };
    default:
      logger.warn(`Unsupported SASL mechanism: ${args.saslMechanism}`);
      return undefined;
  }
};

export const buildKafkaConfig = (
  cfg: KafkaClientConfig,
  logger: Logger,
): KafkaConfig => {
  const brokers = parseBrokerString(cfg.broker);
  if (brokers.length === 0) {
    throw new Error(`No valid broker addresses found in: "${cfg.broker}"`);
  }
  const sasl = buildSaslConfig(logger, cfg);
  return {
    clientId: cfg.clientId,
    brokers,
    ssl: cfg.securityProtocol === "SASL_SSL" || cfg.securityProtocol === "SSL",
    ...(sasl && { sasl }),
    retry: {
      initialRetryTime: RETRY_INITIAL_TIME_MS,
      maxRetryTime: MAX_RETRY_TIME_MS,
      retries: MAX_RETRIES,
    },
  };
};

/**
 * Creates a KafkaJS client configured with provided settings.
 */
export const getKafkaClient = (cfg: KafkaClientConfig, logger: Logger): Kafka => {
  const config = buildKafkaConfig(cfg, logger);

  logger.log(`Creating Kafka client with brokers: ${config.brokers}`);
  logger.log(`Security protocol: ${cfg.securityProtocol || "plaintext"}`);
  logger.log(`Client ID: ${cfg.clientId}`);

  return new Kafka(config);
};
