import { vi } from "vitest";
import type { Logger, RateLimiter } from "../../../src/connectors/core/index.js";
import type { FetchFn } from "../../../src/connectors/netsuite/auth.js";
import type { NetsuiteConfig } from "../../../src/connectors/netsuite/types.js";

export const TEST_CONFIG: NetsuiteConfig = {
  clientId: "test-client",
  clientSecret: "test-secret",
  refreshToken: "test-refresh-token",
  accountIdentifier: "1234567_SB1",
};

export const RECORD_BASE =
  "https://1234567-sb1.suitetalk.api.netsuite.com/services/rest/record/v1";

export const TOKEN_URL =
  "https://1234567-sb1.suitetalk.api.netsuite.com/services/rest/auth/oauth2/v1/token";

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function listBody(
  ids: string[],
  offset: number,
  hasMore: boolean,
  totalResults?: number,
): Record<string, unknown> {
  return {
    items: ids.map((id) => ({
      id,
      links: [{ rel: "self", href: `${RECORD_BASE}/record/${id}` }],
    })),
    hasMore,
    offset,
    count: ids.length,
    ...(totalResults !== undefined && { totalResults }),
  };
}

export interface RecordedCall {
  url: string;
  init?: RequestInit;
}

export type Handler = (
  url: URL,
  init: RequestInit | undefined,
) => Response | Promise<Response>;

/** A `fetch` stand-in that records every call and delegates to `handler`. */
export function fakeFetch(handler: Handler): {
  fetch: FetchFn;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const fn: FetchFn = async (input, init) => {
    const url =
      typeof input === "string"
        ? input
        : input instanceof URL
          ? input.href
          : input.url;
    calls.push({ url, ...(init !== undefined && { init }) });
    return handler(new URL(url), init);
  };
  return { fetch: fn, calls };
}

/** Handler that answers the token endpoint and delegates everything else. */
export function withTokenEndpoint(handler: Handler, token = "test-token"): Handler {
  return (url, init) => {
    if (url.pathname.endsWith("/oauth2/v1/token")) {
      return jsonResponse({ access_token: token, expires_in: 3600 });
    }
    return handler(url, init);
  };
}

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    progress: vi.fn(),
  };
}

export function makeRateLimiter(): RateLimiter {
  return {
    acquire: vi.fn(async () => {}),
    backoff: vi.fn(),
    updateFromHeaders: vi.fn(),
  };
}

export const staticCredentials = {
  getToken: async () => "test-token",
};

/** Client tuning that keeps retry backoff in the low milliseconds. */
export const FAST_RETRY = {
  maxRetries: 3,
  baseRetryDelayMs: 1,
  maxRetryDelayMs: 5,
};

export function headerOf(call: RecordedCall, name: string): string | null {
  return new Headers(call.init?.headers).get(name);
}

export function listCalls(calls: RecordedCall[], path: string): URL[] {
  return calls
    .map((c) => new URL(c.url))
    .filter((u) => u.pathname.endsWith(path));
}
