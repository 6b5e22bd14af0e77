import { AbortError, FatalApiError } from "../core/index.js";
import type { NetsuiteClient } from "./client.js";
import { buildQueryParams, nextPage } from "./paginator.js";
import type { IndexRecord, PageToken, StreamDefinition } from "./types.js";

export type IndexEvent =
  | { type: "record"; record: IndexRecord }
  | {
      type: "page-complete";
      offset: number;
      count: number;
      totalResults?: number;
      nextToken: PageToken;
    };

export interface FetchIndexOptions {
  /** Replication cursor for the `q` filter; ignored without a replication key. */
  cursor?: string | null;
  signal: AbortSignal;
}

/**
 * Walk a list endpoint page by page.
 *
 * Lazy: the next page is requested only once the consumer has pulled every
 * record of the current one, and pages are requested strictly in offset
 * order. A `page-complete` event follows the last record of each page.
 */
export async function* fetchIndex(
  client: NetsuiteClient,
  stream: StreamDefinition,
  opts: FetchIndexOptions,
): AsyncGenerator<IndexEvent> {
  let token: PageToken = null;

  do {
    if (opts.signal.aborted) throw new AbortError();

    const params = buildQueryParams({
      replicationKey: stream.replicationKey,
      cursor: opts.cursor,
      pageToken: token,
    });
    const page = await client.listPage(stream.listPath, params);

    for (const record of page.items) {
      if (opts.signal.aborted) throw new AbortError();
      yield { type: "record", record };
    }

    const next = nextPage(token, page);
    if (next !== null && page.count === 0) {
      throw new FatalApiError(
        `Pagination did not advance at offset ${page.offset}`,
        { status: 200, url: client.buildUrl(stream.listPath, params) },
      );
    }
    yield {
      type: "page-complete",
      offset: page.offset,
      count: page.count,
      ...(page.totalResults !== undefined && {
        totalResults: page.totalResults,
      }),
      nextToken: next,
    };
    token = next;
  } while (token !== null);
}

/** Convenience wrapper yielding only the index records. */
export async function* fetchIndexRecords(
  client: NetsuiteClient,
  stream: StreamDefinition,
  opts: FetchIndexOptions,
): AsyncGenerator<IndexRecord> {
  for await (const event of fetchIndex(client, stream, opts)) {
    if (event.type === "record") yield event.record;
  }
}
