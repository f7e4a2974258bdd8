#!/usr/bin/env node
/**
 * refsync CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import { config } from "dotenv";
import type { ConfigFile, SyncFlags } from "./config.js";
import { ENV_KEYS } from "./config.js";
import {
  defaultEnvFilePath,
  loadCredentials,
  maskSecret,
  saveCredentials,
} from "./credentials.js";
import { expandEnvironmentVariables, loadConfigFile } from "./parser.js";
import { EXIT_CODES, describeFatalError, runSync } from "./runner.js";
import { resolveSettings } from "./settings.js";

interface SyncCommandOptions extends SyncFlags {
  config?: string;
  envFile?: string;
}

interface SaveCommandOptions extends SyncFlags {
  envFile?: string;
}

const program = new Command();

program
  .name("refsync")
  .description("Push Zotero CSV exports into a Notion database without creating duplicates")
  .version("0.1.0");

program
  .command("sync")
  .description("Push every item of the export that Notion does not have yet")
  .option("--csv <path>", "Path to the Zotero CSV export")
  .option("--token <token>", "Notion integration token")
  .option("--database <id>", "Notion database ID")
  .option("-c, --config <path>", "Path to a JSONC configuration file")
  .option("--env-file <path>", "Credential file to load (default: per-user config directory)")
  .action(async (options: SyncCommandOptions) => {
    const envFile = path.resolve(options.envFile ?? defaultEnvFilePath());
    // A missing credential file is not an error
    config({ path: envFile });

    try {
      let fileConfig: ConfigFile | null = null;
      let configPath: string | undefined;
      if (options.config) {
        configPath = path.resolve(options.config);
        fileConfig = expandEnvironmentVariables(await loadConfigFile(configPath));
      }

      const settings = await resolveSettings(options, fileConfig, process.env, configPath);
      const outcome = await runSync(settings, (line) => console.log(line));

      if (outcome.status === "completed") {
        const { pushed, skipped, failed } = outcome.result;
        console.log(`\nCompleted: ${pushed} pushed, ${skipped} skipped, ${failed} failed`);
      }
      process.exit(EXIT_CODES.ok);
    } catch (error) {
      const report = describeFatalError(error);
      console.error(`${report.title}: ${report.message}`);
      process.exit(report.exitCode);
    }
  });

program
  .command("save")
  .description("Save credentials and the CSV path to the credential file")
  .option("--csv <path>", "Path to the Zotero CSV export")
  .option("--token <token>", "Notion integration token")
  .option("--database <id>", "Notion database ID")
  .option("--env-file <path>", "Credential file to write (default: per-user config directory)")
  .action(async (options: SaveCommandOptions) => {
    const envFile = path.resolve(options.envFile ?? defaultEnvFilePath());

    try {
      // Values not given keep what the file already holds
      const existing = (await loadCredentials(envFile)) ?? {};
      const credentials = {
        token: options.token ?? existing.token,
        databaseId: options.database ?? existing.databaseId,
        csvPath: options.csv ? path.resolve(options.csv) : existing.csvPath,
      };

      if (!credentials.token || !credentials.databaseId || !credentials.csvPath) {
        console.warn("Warning: one or more values are empty.");
      }

      await saveCredentials(envFile, credentials);
      console.log(`Saved configuration to: ${envFile}`);
      process.exit(EXIT_CODES.ok);
    } catch (error) {
      console.error("Failed to save configuration:", error);
      process.exit(EXIT_CODES.failure);
    }
  });

program
  .command("show-config")
  .description("Show where the credential file lives and what it holds")
  .option("--env-file <path>", "Credential file to read (default: per-user config directory)")
  .action(async (options: { envFile?: string }) => {
    const envFile = path.resolve(options.envFile ?? defaultEnvFilePath());
    console.log(`Configuration file location: ${envFile}`);

    try {
      const credentials = await loadCredentials(envFile);
      if (!credentials) {
        console.log(`No configuration file found at: ${envFile}`);
        process.exit(EXIT_CODES.ok);
      }

      console.log(
        `  ${ENV_KEYS.token}: ${credentials.token ? maskSecret(credentials.token) : "(not set)"}`
      );
      console.log(`  ${ENV_KEYS.databaseId}: ${credentials.databaseId ?? "(not set)"}`);
      console.log(`  ${ENV_KEYS.csvPath}: ${credentials.csvPath ?? "(not set)"}`);
      process.exit(EXIT_CODES.ok);
    } catch (error) {
      console.error("Error loading configuration:", error);
      process.exit(EXIT_CODES.failure);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without syncing")
  .option("-c, --config <path>", "Path to JSONC configuration file", "refsync.jsonc")
  .action(async (options: { config: string }) => {
    try {
      const configPath = path.resolve(options.config);
      const fileConfig = expandEnvironmentVariables(await loadConfigFile(configPath));

      console.log(`✓ Configuration file is valid: ${configPath}`);
      console.log(`  Token: ${fileConfig.notion?.token ? "set" : "(not set)"}`);
      console.log(`  Database: ${fileConfig.notion?.database_id ?? "(not set)"}`);
      console.log(`  CSV: ${fileConfig.csv_path ?? "(not set)"}`);
      if (fileConfig.throttle) {
        console.log(
          `  Throttle: ${fileConfig.throttle.max_reqs} request(s) per ${fileConfig.throttle.interval_sec}s`
        );
      }

      process.exit(EXIT_CODES.ok);
    } catch (error) {
      console.error("Configuration validation failed:", error);
      process.exit(EXIT_CODES.failure);
    }
  });

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(EXIT_CODES.failure);
});
