/**
 * NetSuite stream adapter: one stream's list → detail pipeline.
 *
 * Each stream registers as its own adapter with the engine, so it gets its own
 * state file, cursor and failure isolation, while the credential provider is
 * shared across all of them.
 *
 * Records are appended to `records.jsonl` as soon as they are expanded
 * (at-least-once). The replication cursor only moves once the whole list has
 * been walked without a failed record: list order is not replication-key
 * order, so a partial walk says nothing about what is still unseen.
 * A full run writes to a staging file that replaces `records.jsonl` only
 * when the walk completes.
 */

import type {
  Adapter,
  OutputWriter,
  SyncContext,
  SyncError,
  SyncResult,
} from "../core/index.js";
import {
  ApiError,
  AuthenticationError,
  createOutputWriter,
  CursorTracker,
  errorMessage,
  isAbortError,
} from "../core/index.js";
import type { CredentialProvider, FetchFn } from "./auth.js";
import { NetsuiteClient } from "./client.js";
import type { NetsuiteClientOptions } from "./client.js";
import { DetailExpander } from "./detail-expander.js";
import { fetchIndex } from "./index-fetcher.js";
import type {
  DetailRecord,
  NetsuiteConfig,
  StreamDefinition,
} from "./types.js";

// ─── Constants ───

export const RECORDS_FILE = "records.jsonl";
/** Full-mode output, promoted over the records file once the walk completes. */
export const STAGING_FILE = "records.jsonl.partial";
export const STREAM_META_FILE = "_meta/stream.json";
const DEFAULT_MAX_CONSECUTIVE_DETAIL_FAILURES = 5;

type ClientTuning = Pick<
  NetsuiteClientOptions,
  | "extraRetryStatuses"
  | "maxRetries"
  | "baseRetryDelayMs"
  | "maxRetryDelayMs"
  | "requestTimeoutMs"
>;

export interface NetsuiteStreamAdapterOptions {
  stream: StreamDefinition;
  config: NetsuiteConfig;
  credentials: CredentialProvider;
  fetch?: FetchFn;
  baseUrl?: string;
  /** Consecutive failed detail fetches after which the stream is aborted. */
  maxConsecutiveDetailFailures?: number;
  client?: ClientTuning;
}

class SystemicFailureError extends Error {
  constructor(count: number, last: unknown) {
    super(
      `Aborting stream after ${count} consecutive detail failures; last: ${errorMessage(last)}`,
    );
    this.name = "SystemicFailureError";
  }
}

// ─── Adapter ───

export class NetsuiteStreamAdapter implements Adapter {
  readonly name: string;
  private readonly opts: NetsuiteStreamAdapterOptions;

  constructor(opts: NetsuiteStreamAdapterOptions) {
    this.opts = opts;
    this.name = opts.stream.name;
  }

  async sync(ctx: SyncContext): Promise<SyncResult> {
    const startTime = Date.now();
    const { stream, config } = this.opts;
    const errors: SyncError[] = [];
    let itemsSynced = 0;
    let itemsFailed = 0;

    const client = new NetsuiteClient({
      ...this.opts.client,
      config,
      credentials: this.opts.credentials,
      rateLimiter: ctx.rateLimiter,
      logger: ctx.logger,
      signal: ctx.signal,
      ...(this.opts.fetch && { fetch: this.opts.fetch }),
      ...(this.opts.baseUrl && { baseUrl: this.opts.baseUrl }),
    });
    const expander = new DetailExpander({ client, stream, logger: ctx.logger });
    const out = createOutputWriter(ctx.outputDir);
    const tracker = new CursorTracker(ctx.state, {
      key: stream.name,
      ...(config.startDate !== undefined && { startDate: config.startDate }),
      ignorePersisted: ctx.mode === "full",
    });
    const cursor = stream.replicationKey ? tracker.start() : null;
    const maxConsecutive =
      this.opts.maxConsecutiveDetailFailures ??
      DEFAULT_MAX_CONSECUTIVE_DETAIL_FAILURES;

    const target = ctx.mode === "full" ? STAGING_FILE : RECORDS_FILE;
    if (ctx.mode === "full") {
      await out.writeJsonl(STAGING_FILE, []);
    }
    ctx.logger.info(
      cursor
        ? `Fetching ${stream.listPath} modified after ${cursor}`
        : `Fetching all of ${stream.listPath}`,
    );

    let completed = false;
    let consecutiveFailures = 0;
    try {
      for await (const event of fetchIndex(client, stream, {
        cursor,
        signal: ctx.signal,
      })) {
        if (event.type === "page-complete") {
          if (event.totalResults !== undefined) {
            ctx.logger.progress(
              event.offset + event.count,
              event.totalResults,
              "Listed",
            );
          }
          continue;
        }

        const { record } = event;
        let detail: DetailRecord | null;
        try {
          detail = await expander.expand(record);
        } catch (err) {
          if (err instanceof AuthenticationError || isAbortError(err)) throw err;
          itemsFailed++;
          consecutiveFailures++;
          errors.push({
            entity: `${stream.name}/${record.id}`,
            error: errorMessage(err),
            retryable: err instanceof ApiError ? err.retryable : false,
          });
          ctx.logger.warn(`Failed to fetch ${record.id}: ${errorMessage(err)}`);
          if (consecutiveFailures >= maxConsecutive) {
            throw new SystemicFailureError(consecutiveFailures, err);
          }
          continue;
        }
        consecutiveFailures = 0;
        if (detail === null) continue;

        if (stream.replicationKey) {
          tracker.observe(detail[stream.replicationKey]);
        }
        await out.appendJsonl(target, [detail]);
        itemsSynced++;
      }
      completed = true;
    } catch (err) {
      if (err instanceof AuthenticationError) {
        if (ctx.mode === "full") await out.remove(STAGING_FILE);
        throw err;
      }
      if (isAbortError(err)) {
        ctx.logger.warn("Sync aborted, cursor left unchanged");
        errors.push({ entity: "sync", error: "Sync aborted", retryable: true });
      } else {
        ctx.logger.error(`Stream failed: ${errorMessage(err)}`);
        errors.push({
          entity: stream.name,
          error: errorMessage(err),
          retryable: err instanceof ApiError ? err.retryable : false,
        });
      }
    }

    if (ctx.mode === "full") {
      if (completed) {
        await out.move(STAGING_FILE, RECORDS_FILE);
        // The old cursor described the replaced file.
        delete ctx.state.cursors[stream.name];
      } else {
        await out.remove(STAGING_FILE);
      }
    }
    if (completed && itemsFailed === 0 && tracker.commit()) {
      ctx.logger.info(`Cursor advanced to ${tracker.value}`);
    } else if (completed && itemsFailed > 0) {
      ctx.logger.warn(
        `${itemsFailed} record(s) failed; cursor left at ${tracker.value ?? "none"}`,
      );
    }
    await ctx.state.checkpoint();
    await this.writeStreamMeta(out, tracker.value, completed);

    return {
      adapter: this.name,
      mode: ctx.mode,
      itemsSynced,
      itemsFailed,
      errors,
      durationMs: Date.now() - startTime,
    };
  }

  private async writeStreamMeta(
    out: OutputWriter,
    cursor: string | null,
    completed: boolean,
  ): Promise<void> {
    const { stream } = this.opts;
    await out.writeMeta(STREAM_META_FILE, {
      stream: stream.name,
      keyProperties: stream.keyProperties,
      replicationKey: stream.replicationKey ?? null,
      customFieldPrefix: stream.customFieldPrefix ?? null,
      cursor,
      completed,
      lastRunAt: new Date().toISOString(),
    });
  }
}
