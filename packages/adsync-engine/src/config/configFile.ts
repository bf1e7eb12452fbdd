import fs from "node:fs";
import path from "node:path";
import * as toml from "toml";
import { ConfigurationError, errorMessage } from "../errors";
import { isRecord } from "../utils/records";

export const CONFIG_FILE_NAME = "adsync.config.toml";

/**
 * Walks up the directory tree to find adsync.config.toml
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root directory
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Reads and parses a TOML config file. An explicit path must exist; without
 * one the file is looked up from `cwd` and its absence yields an empty table,
 * leaving the environment to supply every setting.
 */
export async function readConfigFile(options: {
  configPath?: string;
  cwd?: string;
}): Promise<{ path: string | null; content: Record<string, unknown> }> {
  const configPath = options.configPath
    ? path.resolve(options.cwd ?? process.cwd(), options.configPath)
    : findConfigFile(options.cwd);

  if (configPath === null) {
    return { path: null, content: {} };
  }
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    const configContent = await fs.promises.readFile(configPath, "utf-8");
    parsed = toml.parse(configContent);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${configPath}: ${errorMessage(error)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${configPath} does not contain a TOML table`);
  }
  return { path: configPath, content: parsed };
}
