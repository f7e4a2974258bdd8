/**
 * Core type definitions and contracts for refsync.
 * These interfaces define the protocol that remote table adapters must implement.
 */

/**
 * One bibliographic record read from a reference manager export.
 */
export interface BibliographicItem {
  /** Never empty; rows without a title are dropped while parsing. */
  title: string;
  /** Display names in "First Last" order. */
  authors: string[];
  /** Raw date string as exported; normalized only when a record is built. */
  date: string;
  /** Raw DOI string, possibly empty. */
  doi: string;
}

/**
 * Receives every human-readable event of a run, in order.
 */
export type LogSink = (line: string) => void;

/**
 * Represents a cursor position for pagination.
 * The value is opaque to the engine; adapters decide the format.
 */
export interface Cursor {
  value: string | null;
}

/**
 * A run of text inside a title or rich text value.
 */
export interface TextSegment {
  text: {
    content: string;
  };
}

/**
 * Values the engine writes when creating a record, keyed by field type.
 */
export type PropertyValue =
  | { title: TextSegment[] }
  | { rich_text: TextSegment[] }
  | { url: string }
  | { date: { start: string } };

/**
 * Property map of a creation request, keyed by field name.
 */
export type PropertyMap = { [fieldName: string]: PropertyValue };

/**
 * A field of a record already stored remotely.
 * Only title fields carry their segments; the engine never reads the rest.
 */
export interface RemoteProperty {
  type: string;
  title?: TextSegment[];
}

/**
 * A record already stored in the remote table.
 */
export interface RemoteRecord {
  id: string;
  properties: { [fieldName: string]: RemoteProperty };
}

/**
 * One page of a cursor-paginated query.
 */
export interface RecordPage {
  records: RemoteRecord[];
  hasMore: boolean;
  nextCursor: Cursor;
}

/**
 * Field name to declared field type ("title", "rich_text", "url", "date", ...).
 */
export type FieldTypeMap = ReadonlyMap<string, string>;

/**
 * Titles already present in the remote table.
 */
export type RemoteTitleIndex = ReadonlySet<string>;

/**
 * Adapter interface for the hosted table records are pushed into.
 * Implementations raise SyncError for every remote failure.
 */
export interface RemoteTable {
  /**
   * Fetch one page of records.
   * @param cursor - Continuation cursor from the previous page ({ value: null } for the first)
   * @param pageSize - Maximum number of records to return
   */
  queryPage(cursor: Cursor, pageSize: number): Promise<RecordPage>;

  /**
   * Fetch the table's field definitions.
   */
  retrieveSchema(): Promise<FieldTypeMap>;

  /**
   * Create a new record.
   * @returns The identifier the remote assigned to it
   */
  createRecord(properties: PropertyMap): Promise<{ id: string }>;
}

/**
 * A title that could not be pushed and why.
 */
export interface PushFailure {
  title: string;
  message: string;
  detail?: string;
}

/**
 * Summary of a sync run.
 */
export interface SyncResult {
  runId: string;
  startedAt: Date;
  endedAt: Date;
  status: "success" | "partial" | "failed";
  pushed: number;
  skipped: number;
  failed: number;
  failures: PushFailure[];
  log: string[];
}
