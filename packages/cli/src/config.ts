/**
 * Type definitions for the JSONC configuration file format and the
 * settings a sync run is resolved to.
 */

import type { ThrottleConfig } from "@refsync/core";

/**
 * Notion credentials (as they appear in JSONC).
 * Environment variables are resolved after parsing.
 */
export interface NotionConfigRaw {
  token?: string;
  database_id?: string;
}

/**
 * Throttle configuration (as it appears in JSONC).
 * Uses snake_case to match JSONC format.
 */
export interface ThrottleConfigRaw {
  max_reqs: number;
  interval_sec: number;
}

/**
 * Complete configuration file structure (as it appears in JSONC).
 * Every section is optional; flags and the environment fill the gaps.
 */
export interface ConfigFile {
  notion?: NotionConfigRaw;
  csv_path?: string;
  throttle?: ThrottleConfigRaw;
  timeout_sec?: number;
}

/**
 * Values given on the command line.
 */
export interface SyncFlags {
  csv?: string;
  token?: string;
  database?: string;
}

/**
 * Everything a sync run needs, fully resolved.
 */
export interface SyncSettings {
  csvPath: string;
  token: string;
  databaseId: string;
  throttle?: ThrottleConfig;
  timeoutMs?: number;
}

/**
 * Environment variable names of the credential file.
 */
export const ENV_KEYS = {
  token: "NOTION_TOKEN",
  databaseId: "NOTION_DB_ID",
  csvPath: "ZOTERO_CSV_PATH",
} as const;

/**
 * Notion accepts an average of three requests per second per integration.
 */
export const DEFAULT_THROTTLE: ThrottleConfig = {
  maxReqs: 3,
  intervalSec: 1,
};
