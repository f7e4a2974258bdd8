/**
 * @refsync/adapter-notion - Notion database adapter for refsync
 */

export {
  NotionTable,
  toSyncError,
  toRemoteRecord,
  NOTION_VERSION,
  DEFAULT_TIMEOUT_MS,
  type NotionTableOptions,
} from "./notion-table.js";
