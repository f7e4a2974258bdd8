/**
 * Resolution of sync settings from flags, the config file and the environment.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { SyncError, SyncErrorCode } from "@refsync/core";
import {
  DEFAULT_THROTTLE,
  ENV_KEYS,
  type ConfigFile,
  type SyncFlags,
  type SyncSettings,
} from "./config.js";
import { hasUnresolvedReference } from "./parser.js";

/**
 * First value that is set and not a dangling ${VAR} reference.
 */
function firstValue(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed && !hasUnresolvedReference(trimmed)) {
      return trimmed;
    }
  }
  return undefined;
}

/**
 * Combine the three sources, flags first, then the config file, then the environment.
 * A CSV path from the config file is relative to the config file.
 *
 * @param configPath - Path of the config file, used to resolve its csv_path
 * @throws SyncError (CONFIG_INVALID) if the token or database id is missing
 * or the CSV path does not name an existing file
 */
export async function resolveSettings(
  flags: SyncFlags,
  config: ConfigFile | null,
  env: NodeJS.ProcessEnv = process.env,
  configPath?: string
): Promise<SyncSettings> {
  const configCsv =
    config?.csv_path && configPath && !path.isAbsolute(config.csv_path)
      ? path.resolve(path.dirname(configPath), config.csv_path)
      : config?.csv_path;

  const token = firstValue(flags.token, config?.notion?.token, env[ENV_KEYS.token]);
  const databaseId = firstValue(
    flags.database,
    config?.notion?.database_id,
    env[ENV_KEYS.databaseId]
  );
  const csvPath = firstValue(flags.csv, configCsv, env[ENV_KEYS.csvPath]);

  if (!token || !databaseId) {
    throw new SyncError(
      SyncErrorCode.CONFIG_INVALID,
      "settings",
      "Notion token and DB ID are required."
    );
  }

  if (!csvPath || !(await isFile(csvPath))) {
    throw new SyncError(
      SyncErrorCode.CONFIG_INVALID,
      "settings",
      "Please select a valid Zotero CSV file."
    );
  }

  return {
    csvPath,
    token,
    databaseId,
    throttle: config?.throttle
      ? { maxReqs: config.throttle.max_reqs, intervalSec: config.throttle.interval_sec }
      : { ...DEFAULT_THROTTLE },
    timeoutMs: config?.timeout_sec !== undefined ? config.timeout_sec * 1000 : undefined,
  };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
