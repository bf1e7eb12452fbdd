import { z } from "zod";
import { Logger, sleep } from "../commons";
import {
  ConnectorConfig,
  KafkaConfig,
  PostgresConfig,
} from "../config/runtime";
import { ConfigurationError, ConnectionError, errorMessage } from "../errors";
import { SourceTableName } from "../model/tables";

export interface ConnectorDefinition {
  name: string;
  config: Record<string, string>;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init?: { method?: string; headers?: Record<string, string>; body?: string },
) => Promise<HttpResponseLike>;

const JSON_CONVERTER = "org.apache.kafka.connect.json.JsonConverter";

/**
 * Debezium PostgreSQL connector capturing the synced tables. Decimals are
 * emitted as strings and timestamps as microseconds, the forms the decoder
 * reads.
 */
export function buildConnectorDefinition(
  connector: ConnectorConfig,
  postgres: PostgresConfig,
  kafka: KafkaConfig | undefined,
  tables: readonly SourceTableName[],
): ConnectorDefinition {
  return {
    name: connector.name,
    config: {
      "connector.class": "io.debezium.connector.postgresql.PostgresConnector",
      "plugin.name": "pgoutput",
      "database.hostname": connector.database_host ?? postgres.host,
      "database.port": String(postgres.port),
      "database.user": postgres.user,
      "database.password": postgres.password,
      "database.dbname": postgres.db_name,
      "topic.prefix": kafka?.topic_prefix ?? "postgres",
      "schema.include.list": postgres.schema,
      "table.include.list": tables
        .map((table) => `${postgres.schema}.${table}`)
        .join(","),
      "slot.name": connector.slot_name,
      "publication.name": connector.publication_name,
      "publication.autocreate.mode": "filtered",
      "decimal.handling.mode": "string",
      "time.precision.mode": "adaptive_time_microseconds",
      "tombstones.on.delete": "true",
      "key.converter": JSON_CONVERTER,
      "key.converter.schemas.enable": "false",
      "value.converter": JSON_CONVERTER,
      "value.converter.schemas.enable": "false",
    },
  };
}

const connectorNames = z.array(z.string());

export type RegistrationResult = "created" | "exists";

export interface RegisterOptions {
  url: string;
  retries: number;
  retryDelayMs: number;
  logger: Logger;
  fetch?: FetchLike;
}

async function listConnectors(
  options: RegisterOptions,
  fetchFn: FetchLike,
): Promise<string[]> {
  let lastError = "no attempt made";
  for (let attempt = 1; attempt <= options.retries; attempt++) {
    try {
      const response = await fetchFn(`${options.url}/connectors`);
      if (response.ok) {
        return connectorNames.parse(await response.json());
      }
      lastError = `HTTP ${response.status}`;
    } catch (error) {
      lastError = errorMessage(error);
    }
    options.logger.warn(
      `Kafka Connect not ready (${lastError}); attempt ${attempt}/${options.retries}`,
    );
    if (attempt < options.retries) {
      await sleep(options.retryDelayMs);
    }
  }
  throw new ConnectionError(
    `Kafka Connect at ${options.url} unreachable: ${lastError}`,
  );
}

/**
 * Registers the connector with Kafka Connect unless one with the same name
 * already exists. Waits for Connect to come up first.
 */
export async function ensureConnector(
  definition: ConnectorDefinition,
  options: RegisterOptions,
): Promise<RegistrationResult> {
  const fetchFn: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const existing = await listConnectors(options, fetchFn);
  if (existing.includes(definition.name)) {
    options.logger.log(`Connector ${definition.name} already registered`);
    return "exists";
  }

  let response: HttpResponseLike;
  try {
    response = await fetchFn(`${options.url}/connectors`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(definition),
    });
  } catch (error) {
    throw new ConnectionError(
      `Kafka Connect at ${options.url} unreachable: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  if (response.status === 409) {
    options.logger.log(`Connector ${definition.name} already registered`);
    return "exists";
  }
  if (!response.ok) {
    throw new ConfigurationError(
      `Kafka Connect rejected ${definition.name} (HTTP ${response.status}): ${await response.text()}`,
    );
  }
  options.logger.log(`Registered connector ${definition.name}`);
  return "created";
}
