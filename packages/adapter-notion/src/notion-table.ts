/**
 * NotionTable - A Notion implementation of RemoteTable.
 * Connects to a Notion database using the official Notion API client.
 */

import {
  APIErrorCode,
  APIResponseError,
  Client,
  LogLevel,
  RequestTimeoutError,
  UnknownHTTPResponseError,
  isFullPage,
} from "@notionhq/client";
import type {
  GetDatabaseResponse,
  PageObjectResponse,
} from "@notionhq/client/build/src/api-endpoints";
import {
  SyncError,
  SyncErrorCode,
  createChildLogger,
  errorMessage,
  type Cursor,
  type FieldTypeMap,
  type PropertyMap,
  type RecordPage,
  type RemoteProperty,
  type RemoteRecord,
  type RemoteTable,
} from "@refsync/core";

/**
 * API version sent with every request.
 */
export const NOTION_VERSION = "2022-06-28";

/**
 * Time after which a request counts as failed.
 */
export const DEFAULT_TIMEOUT_MS = 30_000;

type NotionClientOptions = NonNullable<ConstructorParameters<typeof Client>[0]>;

/**
 * Configuration options for NotionTable.
 */
export interface NotionTableOptions {
  /**
   * Integration token ("secret_..." or "ntn_...").
   */
  token: string;
  /**
   * ID of the database records are pushed into.
   */
  databaseId: string;
  /**
   * Request timeout in milliseconds (default 30s).
   */
  timeoutMs?: number;
  /**
   * Fetch implementation handed to the Notion client.
   */
  fetch?: NotionClientOptions["fetch"];
}

const log = createChildLogger({ component: "notion" });

/**
 * Route the Notion client's own logging into the package logger.
 */
function clientLogger(
  level: LogLevel,
  message: string,
  extraInfo: Record<string, unknown>
): void {
  switch (level) {
    case LogLevel.DEBUG:
      log.debug(extraInfo, message);
      break;
    case LogLevel.INFO:
      log.info(extraInfo, message);
      break;
    case LogLevel.WARN:
      log.warn(extraInfo, message);
      break;
    case LogLevel.ERROR:
      log.error(extraInfo, message);
      break;
  }
}

/**
 * Map a Notion client failure onto the refsync error taxonomy.
 * @param context - Operation that failed ("query", "schema", "create")
 */
export function toSyncError(error: unknown, context: string): SyncError {
  if (SyncError.isSyncError(error)) {
    return error;
  }

  if (APIResponseError.isAPIResponseError(error)) {
    const data = { status: error.status, detail: error.body, cause: error };
    switch (error.code) {
      case APIErrorCode.Unauthorized:
        return new SyncError(SyncErrorCode.AUTH_INVALID, context, error.message, data);
      case APIErrorCode.ObjectNotFound:
        return new SyncError(SyncErrorCode.DATABASE_NOT_FOUND, context, error.message, data);
      case APIErrorCode.RateLimited:
        return new SyncError(SyncErrorCode.RATE_LIMITED, context, error.message, data);
      default:
        return new SyncError(SyncErrorCode.REMOTE_REJECTED, context, error.message, data);
    }
  }

  if (UnknownHTTPResponseError.isUnknownHTTPResponseError(error)) {
    const data = { status: error.status, detail: error.body, cause: error };
    const code =
      error.status === 401
        ? SyncErrorCode.AUTH_INVALID
        : error.status === 404
          ? SyncErrorCode.DATABASE_NOT_FOUND
          : SyncErrorCode.REMOTE_REJECTED;
    return new SyncError(code, context, error.message, data);
  }

  if (RequestTimeoutError.isRequestTimeoutError(error)) {
    return new SyncError(SyncErrorCode.TIMEOUT, context, error.message, { cause: error });
  }

  // No response at all: DNS, connection reset, TLS, ...
  return new SyncError(SyncErrorCode.NETWORK_ERROR, context, errorMessage(error), {
    cause: error,
  });
}

/**
 * Describe a Notion page the way the engine reads remote records.
 * Only title fields keep their segments.
 */
export function toRemoteRecord(page: PageObjectResponse): RemoteRecord {
  const properties: { [fieldName: string]: RemoteProperty } = {};

  for (const [name, property] of Object.entries(page.properties)) {
    if (property.type === "title") {
      properties[name] = {
        type: "title",
        title: property.title.map((segment) => ({
          text: {
            content: segment.type === "text" ? segment.text.content : segment.plain_text,
          },
        })),
      };
    } else {
      properties[name] = { type: property.type };
    }
  }

  return { id: page.id, properties };
}

/**
 * Notion database exposed as a RemoteTable.
 */
export class NotionTable implements RemoteTable {
  private client: Client;
  private databaseId: string;

  constructor(options: NotionTableOptions) {
    // Validate required options
    if (!options.token) {
      throw new SyncError(SyncErrorCode.CONFIG_INVALID, "notion", "NotionTable requires token");
    }
    if (!options.databaseId) {
      throw new SyncError(
        SyncErrorCode.CONFIG_INVALID,
        "notion",
        "NotionTable requires databaseId"
      );
    }

    this.client = new Client({
      auth: options.token,
      notionVersion: NOTION_VERSION,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      fetch: options.fetch,
      logLevel: LogLevel.WARN,
      logger: clientLogger,
    });
    this.databaseId = options.databaseId;
  }

  /**
   * Query one page of the database.
   * The cursor value is Notion's next_cursor, passed back as start_cursor.
   */
  async queryPage(cursor: Cursor, pageSize: number): Promise<RecordPage> {
    try {
      const response = await this.client.databases.query({
        database_id: this.databaseId,
        page_size: pageSize,
        ...(cursor.value ? { start_cursor: cursor.value } : {}),
      });

      const records: RemoteRecord[] = [];
      for (const result of response.results) {
        // Partial objects carry no properties and cannot hold a title
        if (isFullPage(result)) {
          records.push(toRemoteRecord(result));
        }
      }

      return {
        records,
        hasMore: response.has_more,
        nextCursor: { value: response.next_cursor },
      };
    } catch (error) {
      throw toSyncError(error, "query");
    }
  }

  /**
   * Retrieve the database and map each property name to its type.
   */
  async retrieveSchema(): Promise<FieldTypeMap> {
    let database: GetDatabaseResponse;
    try {
      database = await this.client.databases.retrieve({
        database_id: this.databaseId,
      });
    } catch (error) {
      throw toSyncError(error, "schema");
    }

    if (!("properties" in database)) {
      throw new SyncError(
        SyncErrorCode.REMOTE_REJECTED,
        "schema",
        `Database ${this.databaseId} was returned without its properties`
      );
    }

    return new Map<string, string>(
      Object.entries(database.properties).map(
        ([name, property]): [string, string] => [name, property.type]
      )
    );
  }

  /**
   * Create a page in the database.
   */
  async createRecord(properties: PropertyMap): Promise<{ id: string }> {
    try {
      const page = await this.client.pages.create({
        parent: { database_id: this.databaseId },
        properties,
      });
      return { id: page.id };
    } catch (error) {
      throw toSyncError(error, "create");
    }
  }
}
