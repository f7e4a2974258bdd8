/**
 * Parsing of Zotero CSV exports into bibliographic items.
 */

import * as fs from "fs/promises";
import { TextDecoder } from "util";
import { parse } from "csv-parse/sync";
import { SyncError, SyncErrorCode } from "./errors.js";
import { createChildLogger } from "./logger.js";
import type { BibliographicItem, LogSink } from "./types.js";

const log = createChildLogger({ component: "csv" });

/**
 * A data row keyed by header name. Cells missing from a short row are absent.
 */
export type CsvRow = { [column: string]: string | undefined };

/**
 * Split a semicolon-delimited author field into "First Last" display names.
 * "Last, First" entries are reordered; entries without a comma are kept as-is.
 */
export function parseAuthors(field: string | undefined): string[] {
  if (!field) {
    return [];
  }

  const authors: string[] = [];
  for (const entry of field.split(";")) {
    const author = entry.trim();
    if (!author) {
      continue;
    }

    const comma = author.indexOf(",");
    if (comma === -1) {
      authors.push(author);
      continue;
    }

    const last = author.slice(0, comma).trim();
    const first = author.slice(comma + 1).trim();
    // "Doe," has no given name; keep the family name alone
    authors.push(`${first} ${last}`.trim());
  }

  return authors;
}

/**
 * Turn parsed rows into items, dropping rows without a title.
 * Row order is kept and duplicate titles are not collapsed.
 */
export function parseReferenceRows(rows: CsvRow[]): BibliographicItem[] {
  const items: BibliographicItem[] = [];

  for (const row of rows) {
    const title = row["Title"];
    if (!title) {
      continue;
    }

    items.push({
      title,
      authors: parseAuthors(row["Author"]),
      date: row["Date"] ?? "",
      doi: row["DOI"] ?? "",
    });
  }

  return items;
}

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((cell) => cell === undefined || typeof cell === "string")
  );
}

/**
 * Decode and parse CSV text with a header row.
 * @throws SyncError (INPUT_UNREADABLE) if the bytes are not UTF-8 or the table is malformed
 */
export function parseCsvBuffer(buffer: Uint8Array, source: string): CsvRow[] {
  let text: string;
  try {
    // Strips a leading byte-order mark
    text = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch (error) {
    throw SyncError.wrap(
      error,
      SyncErrorCode.INPUT_UNREADABLE,
      "csv",
      `Could not decode ${source} as UTF-8`
    );
  }

  let records: unknown;
  try {
    records = parse(text, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw SyncError.wrap(
      error,
      SyncErrorCode.INPUT_UNREADABLE,
      "csv",
      `Could not parse ${source} as CSV`
    );
  }

  if (!Array.isArray(records) || !records.every(isCsvRow)) {
    throw new SyncError(
      SyncErrorCode.INPUT_UNREADABLE,
      "csv",
      `Could not parse ${source} as CSV: unexpected row shape`
    );
  }

  return records;
}

/**
 * Read a Zotero CSV export and return its items in row order.
 * @param path - Path to the exported file
 * @param sink - Receives the "Reading" and "Parsed" log lines
 * @throws SyncError (INPUT_UNREADABLE) if the file cannot be opened or decoded
 */
export async function parseReferenceCsv(
  path: string,
  sink: LogSink = () => {}
): Promise<BibliographicItem[]> {
  sink(`Reading Zotero data from: ${path}`);

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(path);
  } catch (error) {
    throw SyncError.wrap(
      error,
      SyncErrorCode.INPUT_UNREADABLE,
      "csv",
      `Could not open ${path}`
    );
  }

  const rows = parseCsvBuffer(buffer, path);
  const items = parseReferenceRows(rows);
  log.debug({ path, rows: rows.length, items: items.length }, "parsed csv export");

  sink(`Parsed ${items.length} items from CSV.`);
  return items;
}
