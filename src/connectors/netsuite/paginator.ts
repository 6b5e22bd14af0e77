/**
 * Offset pagination and incremental filtering for SuiteTalk list endpoints.
 */

import { ConfigError } from "../core/index.js";
import type { ListResponse, PageToken } from "./types.js";

/** SuiteTalk's maximum page size. */
export const PAGE_SIZE = 1000;

/**
 * Token for the page after `body`, or null once the server reports no more.
 *
 * `previousToken` is not consulted: the server echoes the offset it served,
 * which is authoritative.
 */
export function nextPage(
  _previousToken: PageToken,
  body: Pick<ListResponse, "hasMore" | "offset" | "count">,
): PageToken {
  if (!body.hasMore) return null;
  return body.offset + body.count;
}

/** `DD/MM/YYYY` in UTC, the date format SuiteQL-style `q` filters accept. */
export function formatCursorDate(value: string | Date): string {
  const date = typeof value === "string" ? new Date(value) : value;
  if (Number.isNaN(date.getTime())) {
    throw new ConfigError(`Invalid replication cursor: ${String(value)}`);
  }
  const dd = String(date.getUTCDate()).padStart(2, "0");
  const mm = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${dd}/${mm}/${date.getUTCFullYear()}`;
}

export interface QueryParamsInput {
  replicationKey?: string;
  cursor?: string | null;
  pageToken?: PageToken;
}

export function buildQueryParams(input: QueryParamsInput): Record<string, string> {
  const params: Record<string, string> = { limit: String(PAGE_SIZE) };
  if (input.pageToken !== undefined && input.pageToken !== null) {
    params.offset = String(input.pageToken);
  }
  if (input.replicationKey && input.cursor) {
    params.q = `${input.replicationKey} AFTER "${formatCursorDate(input.cursor)}"`;
  }
  return params;
}
