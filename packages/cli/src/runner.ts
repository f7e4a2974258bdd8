/**
 * Wire everything together: parse the CSV export, connect to Notion, run the engine.
 */

import {
  SyncError,
  SyncErrorCode,
  createChildLogger,
  errorMessage,
  parseReferenceCsv,
  syncItems,
  type LogSink,
  type RemoteTable,
  type SyncResult,
} from "@refsync/core";
import { NotionTable } from "@refsync/adapter-notion";
import type { SyncSettings } from "./config.js";

const log = createChildLogger({ component: "runner" });

/**
 * Builds the remote table a run pushes into.
 */
export type TableFactory = (settings: SyncSettings) => RemoteTable;

/**
 * How a run ended when no fatal error occurred.
 */
export type SyncRunOutcome =
  | { status: "completed"; result: SyncResult }
  | { status: "empty" };

/**
 * Process exit codes of the sync command.
 */
export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  auth: 2,
  notFound: 3,
} as const;

/**
 * What to tell the user about a fatal error.
 */
export interface FatalErrorReport {
  exitCode: number;
  title: string;
  message: string;
}

/**
 * Create a NotionTable from resolved settings.
 */
export function createNotionTable(settings: SyncSettings): RemoteTable {
  return new NotionTable({
    token: settings.token,
    databaseId: settings.databaseId,
    timeoutMs: settings.timeoutMs,
  });
}

/**
 * Parse the export and push its new items.
 * @param onLog - Receives every log line of the run
 * @param createTable - Remote table factory (Notion unless overridden)
 * @returns "empty" when the export holds no items; the remote is then never contacted
 * @throws SyncError when the export is unreadable or the remote snapshot fails
 */
export async function runSync(
  settings: SyncSettings,
  onLog: LogSink,
  createTable: TableFactory = createNotionTable
): Promise<SyncRunOutcome> {
  onLog("=== Starting sync ===");

  const items = await parseReferenceCsv(settings.csvPath, onLog);
  if (items.length === 0) {
    onLog("No items parsed — aborting.");
    return { status: "empty" };
  }

  onLog(`Will attempt to push ${items.length} items`);
  const table = createTable(settings);
  const result = await syncItems(items, table, onLog, { throttle: settings.throttle });

  onLog("Sync complete.");
  log.info({ runId: result.runId, status: result.status }, "sync command finished");
  return { status: "completed", result };
}

/**
 * Classify a fatal error so authentication and missing-database failures
 * stand apart from everything else.
 */
export function describeFatalError(error: unknown): FatalErrorReport {
  if (SyncError.isSyncError(error)) {
    switch (error.code) {
      case SyncErrorCode.AUTH_INVALID:
        return {
          exitCode: EXIT_CODES.auth,
          title: "Credential Error",
          message: "Invalid Notion credentials.",
        };
      case SyncErrorCode.DATABASE_NOT_FOUND:
        return {
          exitCode: EXIT_CODES.notFound,
          title: "Database Error",
          message: "Database not found or access denied.",
        };
      case SyncErrorCode.CONFIG_INVALID:
        return {
          exitCode: EXIT_CODES.failure,
          title: "Missing",
          message: error.message,
        };
    }
  }

  return {
    exitCode: EXIT_CODES.failure,
    title: "Sync Error",
    message: `Error: ${errorMessage(error)}`,
  };
}
