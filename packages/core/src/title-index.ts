/**
 * Snapshot of the titles already stored remotely, used to suppress duplicates.
 */

import { SyncError, SyncErrorCode, errorMessage } from "./errors.js";
import type {
  Cursor,
  LogSink,
  RecordPage,
  RemoteRecord,
  RemoteTable,
  RemoteTitleIndex,
} from "./types.js";

/**
 * Largest page the remote query endpoint returns.
 */
export const PAGE_SIZE = 100;

/**
 * Field names that may hold a record's title, checked in order.
 */
export const TITLE_FIELD_CANDIDATES = ["Title", "Name", "title"] as const;

/**
 * Title of a remote record: the first segment of the first candidate field
 * that holds any segments.
 */
export function extractTitle(record: RemoteRecord): string | null {
  for (const key of TITLE_FIELD_CANDIDATES) {
    const segments = record.properties[key]?.title ?? [];
    if (segments.length > 0) {
      return segments[0].text.content;
    }
  }
  return null;
}

/**
 * Page through the whole remote table and collect the titles it holds.
 * Any page failure aborts the build; a partial index is never returned.
 */
export async function buildTitleIndex(
  table: RemoteTable,
  sink: LogSink = () => {}
): Promise<RemoteTitleIndex> {
  const titles = new Set<string>();
  let cursor: Cursor = { value: null };
  let hasMore = true;

  while (hasMore) {
    let page: RecordPage;
    try {
      page = await table.queryPage(cursor, PAGE_SIZE);
    } catch (error) {
      sink(`Failed to fetch existing pages from Notion: ${errorMessage(error)}`);
      throw error;
    }

    for (const record of page.records) {
      const title = extractTitle(record);
      if (title !== null) {
        titles.add(title);
      }
    }

    if (page.hasMore && page.nextCursor.value === null) {
      const message = "Query reported more results but returned no cursor";
      sink(`Failed to fetch existing pages from Notion: ${message}`);
      throw new SyncError(SyncErrorCode.REMOTE_REJECTED, "query", message);
    }

    hasMore = page.hasMore;
    cursor = page.nextCursor;
  }

  sink(`Found ${titles.size} existing titles in Notion.`);
  return titles;
}
