/**
 * JSONC configuration file parsing and environment variable expansion.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import { SyncError, SyncErrorCode, errorMessage } from "@refsync/core";
import type { ConfigFile } from "./config.js";

/**
 * Load and parse a JSONC configuration file.
 * @param configPath - Path to the JSONC configuration file
 * @returns Parsed configuration object
 * @throws SyncError (CONFIG_INVALID) if the file cannot be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);

  try {
    const content = await fs.readFile(fullPath, "utf-8");
    return parseConfig(content);
  } catch (error) {
    throw new SyncError(
      SyncErrorCode.CONFIG_INVALID,
      "config",
      `Failed to load config from ${fullPath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Parse and validate JSONC configuration text (comments and trailing commas allowed).
 */
export function parseConfig(content: string): ConfigFile {
  const errors: ParseError[] = [];
  const config: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors.map(
      (e) => `Error at offset ${e.offset}: ${printParseErrorCode(e.error)}`
    );
    throw new Error(`Failed to parse JSONC file: ${errorMessages.join(", ")}`);
  }

  validateConfig(config);
  return config;
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * @returns Expanded string
 */
function expandEnvVar(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(
    /\$\{([^}:-]+)(?::-(.+?))?\}/g,
    (match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      // Keep the reference so an unset variable is recognizable later
      return match;
    }
  );
}

/**
 * True when a value still holds a ${VAR} reference no variable filled.
 */
export function hasUnresolvedReference(value: string): boolean {
  return /\$\{[^}]+\}/.test(value);
}

/**
 * Expand environment variables in the configuration.
 * @param config - Raw configuration object
 * @returns Configuration with environment variables expanded
 */
export function expandEnvironmentVariables(
  config: ConfigFile,
  env: NodeJS.ProcessEnv = process.env
): ConfigFile {
  const expand = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : expandEnvVar(value, env);

  return {
    ...config,
    notion: config.notion
      ? {
          token: expand(config.notion.token),
          database_id: expand(config.notion.database_id),
        }
      : undefined,
    csv_path: expand(config.csv_path),
  };
}

function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertOptionalString(
  value: unknown,
  name: string
): asserts value is string | undefined {
  if (value !== undefined && typeof value !== "string") {
    throw new Error(`'${name}' must be a string`);
  }
}

function assertPositiveNumber(value: unknown, name: string): asserts value is number {
  if (typeof value !== "number" || !(value > 0)) {
    throw new Error(`'${name}' must be a positive number`);
  }
}

/**
 * Validate the structure of the configuration object.
 * @throws Error if configuration is invalid
 */
function validateConfig(config: unknown): asserts config is ConfigFile {
  if (!isObject(config)) {
    throw new Error("Configuration file must contain an object");
  }

  if (config.notion !== undefined) {
    if (!isObject(config.notion)) {
      throw new Error("'notion' must be an object");
    }
    assertOptionalString(config.notion.token, "notion.token");
    assertOptionalString(config.notion.database_id, "notion.database_id");
  }

  assertOptionalString(config.csv_path, "csv_path");

  // Throttle is optional, but if present must be valid
  if (config.throttle !== undefined) {
    if (!isObject(config.throttle)) {
      throw new Error("'throttle' must be an object");
    }
    assertPositiveNumber(config.throttle.max_reqs, "throttle.max_reqs");
    assertPositiveNumber(config.throttle.interval_sec, "throttle.interval_sec");
  }

  if (config.timeout_sec !== undefined) {
    assertPositiveNumber(config.timeout_sec, "timeout_sec");
  }
}
