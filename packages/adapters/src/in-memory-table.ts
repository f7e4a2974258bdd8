/**
 * InMemoryTable - An in-memory implementation of RemoteTable for testing.
 * Stores records in memory and simulates cursor-based pagination.
 */

import type {
  Cursor,
  FieldTypeMap,
  PropertyMap,
  RecordPage,
  RemoteProperty,
  RemoteRecord,
  RemoteTable,
} from "@refsync/core";

/**
 * Field types of a table laid out the way the engine writes records.
 */
export const DEFAULT_SCHEMA: { [fieldName: string]: string } = {
  Title: "title",
  Authors: "rich_text",
  Date: "date",
  DOI: "rich_text",
};

/**
 * Configuration options for InMemoryTable.
 */
export interface InMemoryTableOptions {
  /**
   * Titles already stored in the table, written to the "Title" field.
   */
  initialTitles?: string[];
  /**
   * Field name to field type map returned by retrieveSchema().
   */
  schema?: { [fieldName: string]: string };
  /**
   * Upper bound on the page size, to force pagination in small tables.
   */
  maxPageSize?: number;
}

/**
 * Decides whether a creation request fails; return the error to throw or null.
 */
export type CreateFailure = (properties: PropertyMap) => Error | null;

/**
 * In-memory table that stores records and serves them page by page.
 * Useful for testing and development without external API dependencies.
 */
export class InMemoryTable implements RemoteTable {
  private records: RemoteRecord[];
  private created: PropertyMap[];
  private schema: { [fieldName: string]: string };
  private maxPageSize: number;
  private nextId: number;
  private queryError: Error | null;
  private schemaError: Error | null;
  private createFailure: CreateFailure | null;

  /** Number of queryPage() calls served so far. */
  public queryCount: number;

  constructor(options: InMemoryTableOptions = {}) {
    this.records = [];
    this.created = [];
    this.schema = { ...(options.schema ?? DEFAULT_SCHEMA) };
    this.maxPageSize = options.maxPageSize ?? Number.POSITIVE_INFINITY;
    this.nextId = 1;
    this.queryError = null;
    this.schemaError = null;
    this.createFailure = null;
    this.queryCount = 0;

    for (const title of options.initialTitles ?? []) {
      this.addTitle(title);
    }
  }

  /**
   * Return the records after the cursor offset.
   */
  async queryPage(cursor: Cursor, pageSize: number): Promise<RecordPage> {
    this.queryCount++;
    if (this.queryError) {
      throw this.queryError;
    }

    const start = cursor.value ? parseInt(cursor.value, 10) : 0;
    const size = Math.min(pageSize, this.maxPageSize);
    const end = start + size;
    const hasMore = end < this.records.length;

    return {
      records: this.records.slice(start, end).map((record) => ({
        id: record.id,
        properties: { ...record.properties },
      })),
      hasMore,
      nextCursor: { value: hasMore ? String(end) : null },
    };
  }

  async retrieveSchema(): Promise<FieldTypeMap> {
    if (this.schemaError) {
      throw this.schemaError;
    }
    return new Map(Object.entries(this.schema));
  }

  /**
   * Store a new record built from the creation request.
   */
  async createRecord(properties: PropertyMap): Promise<{ id: string }> {
    const error = this.createFailure ? this.createFailure(properties) : null;
    if (error) {
      throw error;
    }

    const id = `mem_${this.nextId++}`;
    this.created.push(properties);
    this.records.push({ id, properties: toRemoteProperties(properties) });
    return { id };
  }

  /**
   * Manually add a record holding only a title (useful for testing).
   * @param field - Field that carries the title, "Title" by default
   */
  addTitle(title: string, field: string = "Title"): RemoteRecord {
    const record: RemoteRecord = {
      id: `mem_${this.nextId++}`,
      properties: {
        [field]: { type: "title", title: [{ text: { content: title } }] },
      },
    };
    this.records.push(record);
    return record;
  }

  /**
   * Manually add a fully formed record (useful for testing).
   */
  addRecord(record: RemoteRecord): void {
    this.records.push(record);
  }

  /**
   * Make every queryPage() call fail with the given error (null to stop).
   */
  failQueries(error: Error | null): void {
    this.queryError = error;
  }

  /**
   * Make retrieveSchema() fail with the given error (null to stop).
   */
  failSchema(error: Error | null): void {
    this.schemaError = error;
  }

  /**
   * Decide per request whether createRecord() fails (null to stop).
   */
  failCreates(decide: CreateFailure | null): void {
    this.createFailure = decide;
  }

  /**
   * Property maps of every successful creation request, in order.
   */
  getCreated(): PropertyMap[] {
    return [...this.created];
  }

  /**
   * Titles of every successful creation request, in order.
   */
  getCreatedTitles(): string[] {
    return this.created.map((properties) => {
      const title = properties["Title"];
      return title && "title" in title ? title.title[0].text.content : "";
    });
  }

  /**
   * Get all current records (useful for testing/debugging).
   */
  getAllRecords(): RemoteRecord[] {
    return [...this.records];
  }

  /**
   * Clear all records and injected failures.
   */
  clear(): void {
    this.records = [];
    this.created = [];
    this.nextId = 1;
    this.queryError = null;
    this.schemaError = null;
    this.createFailure = null;
    this.queryCount = 0;
  }
}

/**
 * Describe created values the way a query would return them.
 */
function toRemoteProperties(properties: PropertyMap): {
  [fieldName: string]: RemoteProperty;
} {
  const remote: { [fieldName: string]: RemoteProperty } = {};
  for (const [name, value] of Object.entries(properties)) {
    if ("title" in value) {
      remote[name] = { type: "title", title: value.title };
    } else if ("rich_text" in value) {
      remote[name] = { type: "rich_text" };
    } else if ("url" in value) {
      remote[name] = { type: "url" };
    } else {
      remote[name] = { type: "date" };
    }
  }
  return remote;
}
