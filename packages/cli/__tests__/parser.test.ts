import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { SyncErrorCode } from "@refsync/core";
import {
  expandEnvironmentVariables,
  hasUnresolvedReference,
  loadConfigFile,
  parseConfig,
} from "../src/parser";

describe("parseConfig", () => {
  it("should accept comments and trailing commas", () => {
    const config = parseConfig(`{
      // Notion integration
      "notion": { "token": "\${NOTION_TOKEN}", "database_id": "db-123", },
      "csv_path": "./My Library.csv",
      /* three requests per second */
      "throttle": { "max_reqs": 3, "interval_sec": 1 },
      "timeout_sec": 30,
    }`);

    expect(config).toEqual({
      notion: { token: "${NOTION_TOKEN}", database_id: "db-123" },
      csv_path: "./My Library.csv",
      throttle: { max_reqs: 3, interval_sec: 1 },
      timeout_sec: 30,
    });
  });

  it("should accept an empty object", () => {
    expect(parseConfig("{}")).toEqual({});
  });

  it("should reject malformed JSONC", () => {
    expect(() => parseConfig('{ "csv_path": }')).toThrow("Failed to parse JSONC file");
  });

  it("should reject values of the wrong type", () => {
    expect(() => parseConfig("[]")).toThrow("Configuration file must contain an object");
    expect(() => parseConfig('{ "notion": "token" }')).toThrow("'notion' must be an object");
    expect(() => parseConfig('{ "notion": { "token": 42 } }')).toThrow(
      "'notion.token' must be a string"
    );
    expect(() => parseConfig('{ "csv_path": true }')).toThrow("'csv_path' must be a string");
  });

  it("should reject throttle and timeout values that are not positive", () => {
    expect(() => parseConfig('{ "throttle": { "max_reqs": 0, "interval_sec": 1 } }')).toThrow(
      "'throttle.max_reqs' must be a positive number"
    );
    expect(() => parseConfig('{ "throttle": { "max_reqs": 3 } }')).toThrow(
      "'throttle.interval_sec' must be a positive number"
    );
    expect(() => parseConfig('{ "timeout_sec": -5 }')).toThrow(
      "'timeout_sec' must be a positive number"
    );
  });
});

describe("expandEnvironmentVariables", () => {
  it("should substitute variables and defaults", () => {
    const config = expandEnvironmentVariables(
      {
        notion: { token: "${TOKEN}", database_id: "${DB_ID:-db-default}" },
        csv_path: "${HOME_DIR}/exports/${FILE:-library.csv}",
        timeout_sec: 10,
      },
      { TOKEN: "test-secret", HOME_DIR: "/home/tester" }
    );

    expect(config).toEqual({
      notion: { token: "test-secret", database_id: "db-default" },
      csv_path: "/home/tester/exports/library.csv",
      timeout_sec: 10,
    });
  });

  it("should keep references to unset variables", () => {
    const config = expandEnvironmentVariables({ notion: { token: "${MISSING}" } }, {});

    expect(config.notion?.token).toBe("${MISSING}");
    expect(hasUnresolvedReference("${MISSING}")).toBe(true);
  });

  it("should prefer a set variable over its default", () => {
    const config = expandEnvironmentVariables(
      { csv_path: "${CSV:-fallback.csv}" },
      { CSV: "chosen.csv" }
    );

    expect(config.csv_path).toBe("chosen.csv");
  });
});

describe("hasUnresolvedReference", () => {
  it("should only flag ${...} references", () => {
    expect(hasUnresolvedReference("plain-value")).toBe(false);
    expect(hasUnresolvedReference("$HOME/file.csv")).toBe(false);
    expect(hasUnresolvedReference("prefix-${VAR}")).toBe(true);
  });
});

describe("loadConfigFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "refsync-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should load a config file from disk", async () => {
    const file = path.join(dir, "refsync.jsonc");
    await fs.writeFile(file, '{ "csv_path": "refs.csv" } // trailing comment\n', "utf-8");

    await expect(loadConfigFile(file)).resolves.toEqual({ csv_path: "refs.csv" });
  });

  it("should fail with CONFIG_INVALID when the file is missing", async () => {
    const file = path.join(dir, "missing.jsonc");

    await expect(loadConfigFile(file)).rejects.toMatchObject({
      code: SyncErrorCode.CONFIG_INVALID,
      message: expect.stringContaining(`Failed to load config from ${file}`),
    });
  });

  it("should fail with CONFIG_INVALID when validation fails", async () => {
    const file = path.join(dir, "bad.jsonc");
    await fs.writeFile(file, '{ "timeout_sec": "soon" }', "utf-8");

    await expect(loadConfigFile(file)).rejects.toMatchObject({
      code: SyncErrorCode.CONFIG_INVALID,
      message: `Failed to load config from ${file}: 'timeout_sec' must be a positive number`,
    });
  });
});
