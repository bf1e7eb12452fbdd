import fs from "node:fs";
import path from "node:path";
import { ClickHouseClient } from "@clickhouse/client";
import { Logger } from "../commons";
import { ConfigurationError } from "../errors";
import { quoteIdentifier } from "../sqlHelpers";
import { classifyClickHouseError } from "./analyticalStore";

export const DEFAULT_SCHEMA_PATH = path.resolve(__dirname, "../../sql/schema.sql");

/** Splits a DDL script into statements, dropping `--` comment lines. */
export const splitStatements = (script: string): string[] =>
  script
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

export async function readSchemaFile(
  schemaPath: string = DEFAULT_SCHEMA_PATH,
): Promise<string> {
  if (!fs.existsSync(schemaPath)) {
    throw new ConfigurationError(`Schema file not found: ${schemaPath}`);
  }
  return fs.promises.readFile(schemaPath, "utf-8");
}

/**
 * Creates the destination database objects. Runs statement by statement since
 * the HTTP interface takes one statement per request.
 */
export async function applySchema(
  client: ClickHouseClient,
  script: string,
  logger: Logger,
): Promise<number> {
  const statements = splitStatements(script);
  for (const statement of statements) {
    const firstLine = statement.split("\n")[0];
    logger.log(`Applying: ${firstLine}`);
    try {
      await client.command({
        query: statement,
        clickhouse_settings: { wait_end_of_query: 1 },
      });
    } catch (error) {
      throw classifyClickHouseError(error, `schema statement "${firstLine}"`);
    }
  }
  logger.log(`Applied ${statements.length} schema statements`);
  return statements.length;
}

export async function createDatabase(
  client: ClickHouseClient,
  database: string,
  logger: Logger,
): Promise<void> {
  logger.log(`Ensuring database ${database}`);
  try {
    await client.command({
      query: `CREATE DATABASE IF NOT EXISTS ${quoteIdentifier(database)}`,
    });
  } catch (error) {
    throw classifyClickHouseError(error, `create database ${database}`);
  }
}
