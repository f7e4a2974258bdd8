/**
 * SyncEngine - pushes new bibliographic items into a remote table.
 * Implements the index-schema-push loop: one snapshot of the remote state,
 * then one creation attempt per item that is not already there.
 */

import { SyncError, SyncErrorCode, errorMessage } from "./errors.js";
import { createChildLogger } from "./logger.js";
import { DEFAULT_DOI_TYPE, FIELDS, buildProperties } from "./payload.js";
import { inspectSchema } from "./schema.js";
import { buildTitleIndex } from "./title-index.js";
import type {
  BibliographicItem,
  FieldTypeMap,
  LogSink,
  PushFailure,
  RemoteTable,
  RemoteTitleIndex,
  SyncResult,
} from "./types.js";

/**
 * Throttle configuration to avoid rate limiting.
 */
export interface ThrottleConfig {
  maxReqs: number;
  intervalSec: number;
}

/**
 * Options of a single run.
 */
export interface SyncOptions {
  /** Limit the rate of creation requests; unlimited when omitted. */
  throttle?: ThrottleConfig;
}

/**
 * Full configuration of an engine.
 */
export interface EngineConfig extends SyncOptions {
  table: RemoteTable;
  onLog?: LogSink;
}

/**
 * Result of one creation attempt.
 */
type SubmitOutcome =
  | { ok: true; id: string }
  | { ok: false; error: SyncError };

/**
 * Throttler for rate limiting API calls.
 */
class Throttler {
  private requests: Date[] = [];
  private maxReqs: number;
  private intervalSec: number;

  constructor(config: ThrottleConfig) {
    this.maxReqs = config.maxReqs;
    this.intervalSec = config.intervalSec;
  }

  /**
   * Wait if necessary to respect rate limits.
   */
  async throttle(): Promise<void> {
    const now = new Date();
    const cutoff = new Date(now.getTime() - this.intervalSec * 1000);

    // Remove old requests outside the window
    this.requests = this.requests.filter((req) => req > cutoff);

    if (this.requests.length >= this.maxReqs) {
      // Wait until the oldest request leaves the window
      const oldest = this.requests[0];
      const waitUntil = new Date(oldest.getTime() + this.intervalSec * 1000);
      const waitMs = waitUntil.getTime() - now.getTime();
      if (waitMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, waitMs));
        return this.throttle();
      }
    }

    this.requests.push(new Date());
  }
}

/**
 * SyncEngine creates remote records for items whose title is not yet present.
 */
export class SyncEngine {
  private table: RemoteTable;
  private sink: LogSink;
  private throttler: Throttler | null;
  private lines: string[] = [];
  private logger = createChildLogger({ component: "engine" });

  constructor(config: EngineConfig) {
    if (config.throttle && config.throttle.maxReqs < 1) {
      throw new SyncError(
        SyncErrorCode.CONFIG_INVALID,
        "engine",
        "throttle.maxReqs must be at least 1"
      );
    }

    this.table = config.table;
    this.sink = config.onLog ?? (() => {});
    this.throttler = config.throttle ? new Throttler(config.throttle) : null;
  }

  /**
   * Execute one sync run over the given items.
   * 1. Snapshot remote titles and field types
   * 2. Skip items whose title is already remote
   * 3. Create the rest, one request each, without retry
   *
   * Titles pushed during the run are not added to the snapshot, so two rows
   * with the same new title are both created.
   *
   * @throws SyncError when the title index or the schema cannot be fetched
   */
  async run(items: BibliographicItem[]): Promise<SyncResult> {
    const runId = this.generateRunId();
    const startedAt = new Date();
    this.lines = [];
    this.logger.info({ runId, items: items.length }, "starting sync run");

    let existingTitles: RemoteTitleIndex;
    let fieldTypes: FieldTypeMap;
    try {
      existingTitles = await buildTitleIndex(this.table, (line) => this.log(line));
      fieldTypes = await inspectSchema(this.table, (line) => this.log(line));
    } catch (error) {
      this.logger.error({ runId, err: error }, "sync run aborted");
      throw error;
    }

    const doiType = fieldTypes.get(FIELDS.doi) ?? DEFAULT_DOI_TYPE;
    this.log(`DOI property type: ${doiType}`);

    let pushed = 0;
    let skipped = 0;
    const failures: PushFailure[] = [];

    for (const item of items) {
      if (existingTitles.has(item.title)) {
        this.log(`Skipping existing item: ${item.title}`);
        skipped++;
        continue;
      }

      const outcome = await this.submit(item, doiType);
      if (outcome.ok) {
        this.log(`Pushed: ${item.title}`);
        pushed++;
        continue;
      }

      const { error } = outcome;
      this.log(`Failed to push '${item.title}': ${error.message}`);
      if (error.detail) {
        this.log(`   Reason: ${error.detail}`);
      }
      failures.push({
        title: item.title,
        message: error.message,
        detail: error.detail,
      });
    }

    this.log(`Finished. pushed=${pushed}, skipped=${skipped}`);

    const status =
      failures.length > 0 ? (pushed > 0 ? "partial" : "failed") : "success";
    const summary: SyncResult = {
      runId,
      startedAt,
      endedAt: new Date(),
      status,
      pushed,
      skipped,
      failed: failures.length,
      failures,
      log: [...this.lines],
    };

    this.logger.info(
      { runId, status, pushed, skipped, failed: failures.length },
      "sync run finished"
    );
    return summary;
  }

  /**
   * Send one creation request. Never throws.
   */
  private async submit(
    item: BibliographicItem,
    doiType: string
  ): Promise<SubmitOutcome> {
    try {
      if (this.throttler) {
        await this.throttler.throttle();
      }
      const { id } = await this.table.createRecord(buildProperties(item, doiType));
      return { ok: true, id };
    } catch (error) {
      this.logger.warn({ title: item.title, err: error }, "push failed");
      return {
        ok: false,
        error: SyncError.isSyncError(error)
          ? error
          : new SyncError(SyncErrorCode.UNKNOWN, "push", errorMessage(error), {
              cause: error,
            }),
      };
    }
  }

  private log(line: string): void {
    this.lines.push(line);
    this.sink(line);
  }

  /**
   * Generate a unique run ID.
   */
  private generateRunId(): string {
    return `run_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }
}

/**
 * Push items into a remote table, reporting progress to onLog.
 */
export async function syncItems(
  items: BibliographicItem[],
  table: RemoteTable,
  onLog: LogSink,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const engine = new SyncEngine({ table, onLog, ...options });
  return engine.run(items);
}
