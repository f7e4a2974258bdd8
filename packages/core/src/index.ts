/**
 * @refsync/core - Core contracts and sync engine for refsync
 *
 * This package provides:
 * - Type definitions and contracts (BibliographicItem, RemoteTable, SyncResult)
 * - CSV parsing, date normalization and payload construction
 * - SyncEngine for pushing new items without duplicates
 *
 * Core never imports adapters; the CLI wires everything together at runtime.
 */

export type {
  BibliographicItem,
  LogSink,
  Cursor,
  TextSegment,
  PropertyValue,
  PropertyMap,
  RemoteProperty,
  RemoteRecord,
  RecordPage,
  FieldTypeMap,
  RemoteTitleIndex,
  RemoteTable,
  PushFailure,
  SyncResult,
} from "./types.js";

export { SyncError, SyncErrorCode, errorMessage, type SyncErrorData } from "./errors.js";
export { logger, createChildLogger } from "./logger.js";
export { normalizeDate } from "./dates.js";
export {
  parseAuthors,
  parseReferenceRows,
  parseCsvBuffer,
  parseReferenceCsv,
  type CsvRow,
} from "./csv.js";
export {
  buildTitleIndex,
  extractTitle,
  PAGE_SIZE,
  TITLE_FIELD_CANDIDATES,
} from "./title-index.js";
export { inspectSchema } from "./schema.js";
export {
  buildProperties,
  encodeDoi,
  toDoiUrl,
  DEFAULT_DOI_TYPE,
  DOI_RESOLVER,
  FIELDS,
} from "./payload.js";
export {
  SyncEngine,
  syncItems,
  type EngineConfig,
  type SyncOptions,
  type ThrottleConfig,
} from "./engine.js";
