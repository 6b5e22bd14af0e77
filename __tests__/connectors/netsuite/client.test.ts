import { describe, expect, it, vi } from "vitest";
import {
  FatalApiError,
  RetriableApiError,
} from "../../../src/connectors/core/errors.js";
import type {
  CredentialProvider,
  FetchFn,
} from "../../../src/connectors/netsuite/auth.js";
import {
  NetsuiteClient,
  recordApiBase,
} from "../../../src/connectors/netsuite/client.js";
import type { NetsuiteConfig } from "../../../src/connectors/netsuite/types.js";
import {
  FAST_RETRY,
  fakeFetch,
  headerOf,
  jsonResponse,
  makeLogger,
  makeRateLimiter,
  RECORD_BASE,
  staticCredentials,
  TEST_CONFIG,
} from "./helpers.js";

function makeClient(
  fetch: FetchFn,
  overrides: {
    config?: NetsuiteConfig;
    credentials?: CredentialProvider;
    extraRetryStatuses?: number[];
    signal?: AbortSignal;
  } = {},
) {
  const rateLimiter = makeRateLimiter();
  const logger = makeLogger();
  const client = new NetsuiteClient({
    ...FAST_RETRY,
    config: overrides.config ?? TEST_CONFIG,
    credentials: overrides.credentials ?? staticCredentials,
    rateLimiter,
    logger,
    signal: overrides.signal ?? new AbortController().signal,
    fetch,
    ...(overrides.extraRetryStatuses && {
      extraRetryStatuses: overrides.extraRetryStatuses,
    }),
  });
  return { client, rateLimiter, logger };
}

describe("NetsuiteClient", () => {
  it("targets the account's record API", () => {
    expect(recordApiBase("1234567_SB1")).toBe(RECORD_BASE);
  });

  it("encodes list parameters into the query string", () => {
    const { client } = makeClient(fakeFetch(() => jsonResponse({})).fetch);
    expect(
      client.buildUrl("/customer", {
        limit: "1000",
        q: 'lastModifiedDate AFTER "05/03/2024"',
      }),
    ).toBe(
      `${RECORD_BASE}/customer?limit=1000&q=lastModifiedDate+AFTER+%2205%2F03%2F2024%22`,
    );
  });

  it("sends bearer auth, form content type and the configured user agent", async () => {
    const { fetch, calls } = fakeFetch(() => jsonResponse({ id: "1" }));
    const { client } = makeClient(fetch, {
      config: { ...TEST_CONFIG, userAgent: "mirror-test/1.0" },
    });

    await client.getRecord("/customer/1");

    const call = calls[0];
    expect(call.url).toBe(`${RECORD_BASE}/customer/1`);
    expect(call.init?.method).toBe("GET");
    expect(headerOf(call, "authorization")).toBe("Bearer test-token");
    expect(headerOf(call, "content-type")).toBe(
      "application/x-www-form-urlencoded",
    );
    expect(headerOf(call, "user-agent")).toBe("mirror-test/1.0");
  });

  it("omits User-Agent when not configured", async () => {
    const { fetch, calls } = fakeFetch(() => jsonResponse({ id: "1" }));
    const { client } = makeClient(fetch);

    await client.getRecord("/customer/1");
    expect(headerOf(calls[0], "user-agent")).toBeNull();
  });

  it("parses list pages and keeps only id and links per item", async () => {
    const { fetch } = fakeFetch(() =>
      jsonResponse({
        items: [
          {
            id: "7",
            links: [{ rel: "self", href: `${RECORD_BASE}/record/7` }],
            extra: true,
          },
        ],
        hasMore: false,
        offset: 0,
        count: 1,
        totalResults: 1,
      }),
    );
    const { client } = makeClient(fetch);

    const page = await client.listPage("/customer", { limit: "1000" });
    expect(page).toEqual({
      items: [
        {
          id: "7",
          links: [{ rel: "self", href: `${RECORD_BASE}/record/7` }],
        },
      ],
      hasMore: false,
      offset: 0,
      count: 1,
      totalResults: 1,
    });
  });

  it("coerces numeric ids to strings and defaults missing links", async () => {
    const { fetch } = fakeFetch(() =>
      jsonResponse({ items: [{ id: 42 }], hasMore: false, offset: 0, count: 1 }),
    );
    const { client } = makeClient(fetch);

    const page = await client.listPage("/customer", { limit: "1000" });
    expect(page.items).toEqual([{ id: "42", links: [] }]);
  });

  it("turns HTTP 400 on a list into an empty final page", async () => {
    const { fetch, calls } = fakeFetch(() =>
      jsonResponse({ title: "Bad Request" }, 400),
    );
    const { client } = makeClient(fetch);

    const page = await client.listPage("/customer", {
      limit: "1000",
      offset: "2000",
    });
    expect(page).toEqual({ items: [], hasMore: false, offset: 2000, count: 0 });
    expect(calls).toHaveLength(1);
  });

  it("returns null for HTTP 400 on a record", async () => {
    const { fetch } = fakeFetch(() => jsonResponse({}, 400));
    const { client } = makeClient(fetch);
    await expect(client.getRecord("/customer/9")).resolves.toBeNull();
  });

  it("fails fast on other 4xx responses", async () => {
    const { fetch, calls } = fakeFetch(() =>
      jsonResponse({ title: "Not Found" }, 404),
    );
    const { client } = makeClient(fetch);

    const err = await client.getRecord("/customer/9").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FatalApiError);
    if (!(err instanceof FatalApiError)) return;
    expect(err.status).toBe(404);
    expect(err.url).toBe(`${RECORD_BASE}/customer/9`);
    expect(err.body).toBe('{"title":"Not Found"}');
    expect(calls).toHaveLength(1);
  });

  it("retries 5xx and succeeds", async () => {
    let attempt = 0;
    const { fetch, calls } = fakeFetch(() => {
      attempt++;
      return attempt === 1
        ? jsonResponse({}, 500)
        : jsonResponse({ id: "5", displayName: "Widget" });
    });
    const { client, logger } = makeClient(fetch);

    await expect(client.getRecord("/inventoryItem/5")).resolves.toEqual({
      id: "5",
      displayName: "Widget",
    });
    expect(calls).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("drops a rejected token and retries with a fresh one", async () => {
    const invalidate = vi.fn();
    const credentials: CredentialProvider = {
      getToken: async () => `token-${invalidate.mock.calls.length + 1}`,
      invalidate,
    };
    let attempt = 0;
    const { fetch, calls } = fakeFetch(() => {
      attempt++;
      return attempt === 1
        ? jsonResponse({ title: "Unauthorized" }, 401)
        : jsonResponse({ id: "1" });
    });
    const { client } = makeClient(fetch, { credentials });

    await expect(client.getRecord("/customer/1")).resolves.toEqual({ id: "1" });
    expect(invalidate).toHaveBeenCalledTimes(1);
    expect(calls.map((c) => headerOf(c, "authorization"))).toEqual([
      "Bearer token-1",
      "Bearer token-2",
    ]);
  });

  it("gives up after the retry budget with the last retriable error", async () => {
    const { fetch, calls } = fakeFetch(() => jsonResponse({}, 503));
    const { client } = makeClient(fetch);

    await expect(client.getRecord("/customer/1")).rejects.toBeInstanceOf(
      RetriableApiError,
    );
    expect(calls).toHaveLength(FAST_RETRY.maxRetries + 1);
  });

  it("retries 429 and honours Retry-After", async () => {
    let attempt = 0;
    const { fetch } = fakeFetch(() => {
      attempt++;
      return attempt === 1
        ? jsonResponse({}, 429, { "retry-after": "2" })
        : jsonResponse({ id: "1" });
    });
    const { client, rateLimiter } = makeClient(fetch);

    await client.getRecord("/customer/1");
    expect(rateLimiter.backoff).toHaveBeenCalledWith(2000);
    expect(rateLimiter.acquire).toHaveBeenCalledTimes(2);
  });

  it("retries statuses configured as extra retry statuses", async () => {
    let attempt = 0;
    const { fetch, calls } = fakeFetch(() => {
      attempt++;
      return attempt === 1 ? jsonResponse({}, 409) : jsonResponse({ id: "1" });
    });
    const { client } = makeClient(fetch, { extraRetryStatuses: [409] });

    await client.getRecord("/customer/1");
    expect(calls).toHaveLength(2);
  });

  it("retries network failures", async () => {
    let attempt = 0;
    const { fetch, calls } = fakeFetch(() => {
      attempt++;
      if (attempt === 1) throw new TypeError("fetch failed");
      return jsonResponse({ id: "1" });
    });
    const { client } = makeClient(fetch);

    await expect(client.getRecord("/customer/1")).resolves.toEqual({ id: "1" });
    expect(calls).toHaveLength(2);
  });

  it("rejects malformed list pages", async () => {
    const { fetch } = fakeFetch(() => jsonResponse({ items: [] }));
    const { client } = makeClient(fetch);

    await expect(
      client.listPage("/customer", { limit: "1000" }),
    ).rejects.toBeInstanceOf(FatalApiError);
  });

  it("feeds response headers to the rate limiter", async () => {
    const { fetch } = fakeFetch(() =>
      jsonResponse({ id: "1" }, 200, { "x-ratelimit-remaining": "9" }),
    );
    const { client, rateLimiter } = makeClient(fetch);

    await client.getRecord("/customer/1");
    expect(rateLimiter.updateFromHeaders).toHaveBeenCalledWith(
      expect.objectContaining({ "x-ratelimit-remaining": "9" }),
    );
  });

  it("issues no request once the signal is aborted", async () => {
    const fetch = vi.fn<FetchFn>();
    const ac = new AbortController();
    ac.abort();
    const { client } = makeClient(fetch, { signal: ac.signal });

    await expect(client.getRecord("/customer/1")).rejects.toThrow("Sync aborted");
    expect(fetch).not.toHaveBeenCalled();
  });
});
