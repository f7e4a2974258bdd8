/**
 * The per-user credential file: three KEY=value lines read with dotenv.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { parse as parseDotenv } from "dotenv";
import { ENV_KEYS } from "./config.js";

export const APP_DIR_NAME = "refsync";

/**
 * Values stored in the credential file. Missing lines are undefined.
 */
export interface StoredCredentials {
  token?: string;
  databaseId?: string;
  csvPath?: string;
}

/**
 * Per-user configuration directory for the given platform.
 */
export function resolveConfigDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string {
  if (platform === "darwin") {
    return path.join(home, "Library", "Application Support", APP_DIR_NAME);
  }
  if (platform === "win32") {
    return path.join(env.APPDATA || path.join(home, "AppData", "Roaming"), APP_DIR_NAME);
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(home, ".config"), APP_DIR_NAME);
}

/**
 * Location of the credential file when --env-file is not given.
 */
export function defaultEnvFilePath(): string {
  return path.join(resolveConfigDir(), ".env");
}

/**
 * Quote a value when dotenv would otherwise cut or trim it.
 */
function formatValue(value: string): string {
  if (!/[#"'`]|^\s|\s$/.test(value)) {
    return value;
  }
  return value.includes('"') ? `'${value}'` : `"${value}"`;
}

/**
 * Render the credential file contents.
 */
export function formatCredentials(credentials: StoredCredentials): string {
  return (
    [
      `${ENV_KEYS.token}=${formatValue(credentials.token ?? "")}`,
      `${ENV_KEYS.databaseId}=${formatValue(credentials.databaseId ?? "")}`,
      `${ENV_KEYS.csvPath}=${formatValue(credentials.csvPath ?? "")}`,
    ].join("\n") + "\n"
  );
}

/**
 * Parse credential file contents; blank lines and # comments are ignored.
 */
export function parseCredentials(content: string): StoredCredentials {
  const values = parseDotenv(content);
  const pick = (key: string): string | undefined => values[key] || undefined;

  return {
    token: pick(ENV_KEYS.token),
    databaseId: pick(ENV_KEYS.databaseId),
    csvPath: pick(ENV_KEYS.csvPath),
  };
}

/**
 * Read the credential file.
 * @returns The stored values, or null when the file does not exist
 */
export async function loadCredentials(filePath: string): Promise<StoredCredentials | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    // fs errors can come from another realm
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
  return parseCredentials(content);
}

/**
 * Write the credential file, creating its directory when needed.
 */
export async function saveCredentials(
  filePath: string,
  credentials: StoredCredentials
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, formatCredentials(credentials), { encoding: "utf-8", mode: 0o600 });
}

/**
 * Hide most of a secret for display.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return "****";
  }
  return `${secret.slice(0, 4)}****${secret.slice(-4)}`;
}
