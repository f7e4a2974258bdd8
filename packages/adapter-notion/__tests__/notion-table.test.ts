/**
 * Tests for NotionTable
 * The Notion client is given a fake fetch, so no request leaves the process.
 */

import { SyncErrorCode } from "@refsync/core";
import { NotionTable, NOTION_VERSION, type NotionTableOptions } from "../src/notion-table";

interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: { [name: string]: string } | undefined;
  body: unknown;
}

interface FakeResponse {
  status: number;
  body: string;
}

/**
 * Fetch stand-in that answers with queued responses and records every request.
 */
function createFakeFetch(responses: Array<FakeResponse | Error>): {
  fetch: NonNullable<NotionTableOptions["fetch"]>;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fetch: NonNullable<NotionTableOptions["fetch"]> = async (url, init) => {
    requests.push({
      url,
      method: init?.method,
      headers: init?.headers,
      body: init?.body === undefined ? undefined : JSON.parse(init.body),
    });

    const next = responses.shift();
    if (next === undefined) {
      throw new Error(`Unexpected request to ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }

    return {
      ok: next.status >= 200 && next.status < 300,
      status: next.status,
      headers: {},
      text: async () => next.body,
    };
  };

  return { fetch, requests };
}

function json(status: number, body: object): FakeResponse {
  return { status, body: JSON.stringify(body) };
}

function page(id: string, title: string): object {
  return {
    object: "page",
    id,
    url: `https://www.notion.so/${id}`,
    properties: {
      Title: {
        id: "title",
        type: "title",
        title: [{ type: "text", text: { content: title, link: null }, plain_text: title }],
      },
      Authors: { id: "a1", type: "rich_text", rich_text: [] },
    },
  };
}

function createTable(responses: Array<FakeResponse | Error>): {
  table: NotionTable;
  requests: RecordedRequest[];
} {
  const { fetch, requests } = createFakeFetch(responses);
  const table = new NotionTable({ token: "test-secret", databaseId: "db-123", fetch });
  return { table, requests };
}

describe("NotionTable", () => {
  describe("constructor", () => {
    it("should require a token and a database id", () => {
      expect(() => new NotionTable({ token: "", databaseId: "db-123" })).toThrow(
        "NotionTable requires token"
      );
      expect(() => new NotionTable({ token: "test-secret", databaseId: "" })).toThrow(
        "NotionTable requires databaseId"
      );
    });
  });

  describe("queryPage", () => {
    it("should query the database and pass the cursor back as start_cursor", async () => {
      const { table, requests } = createTable([
        json(200, {
          object: "list",
          results: [page("p1", "Paper A")],
          has_more: true,
          next_cursor: "cursor-2",
        }),
        json(200, {
          object: "list",
          results: [page("p2", "Paper B"), { object: "page", id: "p3" }],
          has_more: false,
          next_cursor: null,
        }),
      ]);

      const first = await table.queryPage({ value: null }, 100);
      const second = await table.queryPage(first.nextCursor, 100);

      expect(first).toEqual({
        records: [
          {
            id: "p1",
            properties: {
              Title: { type: "title", title: [{ text: { content: "Paper A" } }] },
              Authors: { type: "rich_text" },
            },
          },
        ],
        hasMore: true,
        nextCursor: { value: "cursor-2" },
      });
      // Partial page objects are left out
      expect(second.records.map((r) => r.id)).toEqual(["p2"]);
      expect(second.nextCursor).toEqual({ value: null });

      expect(requests[0].url).toBe("https://api.notion.com/v1/databases/db-123/query");
      expect(requests[0].method).toBe("POST");
      expect(requests[0].headers).toMatchObject({ "Notion-Version": NOTION_VERSION });
      expect(requests[0].body).toEqual({ page_size: 100 });
      expect(requests[1].body).toEqual({ page_size: 100, start_cursor: "cursor-2" });
    });
  });

  describe("retrieveSchema", () => {
    it("should map each property name to its type", async () => {
      const { table, requests } = createTable([
        json(200, {
          object: "database",
          id: "db-123",
          properties: {
            Title: { id: "title", name: "Title", type: "title", title: {} },
            DOI: { id: "d1", name: "DOI", type: "url", url: {} },
            Date: { id: "d2", name: "Date", type: "date", date: {} },
          },
        }),
      ]);

      const fieldTypes = await table.retrieveSchema();

      expect([...fieldTypes]).toEqual([
        ["Title", "title"],
        ["DOI", "url"],
        ["Date", "date"],
      ]);
      expect(requests[0].url).toBe("https://api.notion.com/v1/databases/db-123");
      expect(requests[0].method).toBe("GET");
    });
  });

  describe("createRecord", () => {
    it("should create a page under the database", async () => {
      const { table, requests } = createTable([json(200, { object: "page", id: "p-new" })]);
      const properties = {
        Title: { title: [{ text: { content: "Paper B" } }] },
        DOI: { url: "https://doi.org/10.1000/xyz" },
      };

      const result = await table.createRecord(properties);

      expect(result).toEqual({ id: "p-new" });
      expect(requests[0].url).toBe("https://api.notion.com/v1/pages");
      expect(requests[0].method).toBe("POST");
      expect(requests[0].body).toEqual({
        parent: { database_id: "db-123" },
        properties,
      });
    });
  });

  describe("error mapping", () => {
    it("should report rejected credentials as AUTH_INVALID", async () => {
      const { table } = createTable([
        json(401, {
          object: "error",
          status: 401,
          code: "unauthorized",
          message: "API token is invalid.",
        }),
      ]);

      await expect(table.queryPage({ value: null }, 100)).rejects.toMatchObject({
        code: SyncErrorCode.AUTH_INVALID,
        context: "query",
        status: 401,
        message: "API token is invalid.",
      });
    });

    it("should report a missing database as DATABASE_NOT_FOUND", async () => {
      const { table } = createTable([
        json(404, {
          object: "error",
          status: 404,
          code: "object_not_found",
          message: "Could not find database with ID: db-123.",
        }),
      ]);

      await expect(table.retrieveSchema()).rejects.toMatchObject({
        code: SyncErrorCode.DATABASE_NOT_FOUND,
        context: "schema",
        status: 404,
      });
    });

    it("should keep the response body of a rejected creation as detail", async () => {
      const body = {
        object: "error",
        status: 400,
        code: "validation_error",
        message: "DOI is expected to be url.",
      };
      const { table } = createTable([json(400, body)]);

      await expect(
        table.createRecord({ DOI: { rich_text: [{ text: { content: "x" } }] } })
      ).rejects.toMatchObject({
        code: SyncErrorCode.REMOTE_REJECTED,
        context: "create",
        status: 400,
        message: "DOI is expected to be url.",
        detail: JSON.stringify(body),
      });
    });

    it("should report rate limiting as RATE_LIMITED", async () => {
      const { table } = createTable([
        json(429, {
          object: "error",
          status: 429,
          code: "rate_limited",
          message: "You have been rate limited.",
        }),
      ]);

      await expect(table.queryPage({ value: null }, 100)).rejects.toMatchObject({
        code: SyncErrorCode.RATE_LIMITED,
      });
    });

    it("should map unrecognized error responses by status", async () => {
      const { table } = createTable([
        { status: 401, body: "<html>Unauthorized</html>" },
        { status: 502, body: "<html>Bad Gateway</html>" },
      ]);

      await expect(table.queryPage({ value: null }, 100)).rejects.toMatchObject({
        code: SyncErrorCode.AUTH_INVALID,
        status: 401,
      });
      await expect(table.queryPage({ value: null }, 100)).rejects.toMatchObject({
        code: SyncErrorCode.REMOTE_REJECTED,
        status: 502,
        detail: "<html>Bad Gateway</html>",
      });
    });

    it("should report transport failures as NETWORK_ERROR", async () => {
      const { table } = createTable([new Error("getaddrinfo ENOTFOUND api.notion.com")]);

      await expect(table.retrieveSchema()).rejects.toMatchObject({
        code: SyncErrorCode.NETWORK_ERROR,
        message: "getaddrinfo ENOTFOUND api.notion.com",
      });
    });
  });
});
