/**
 * SuiteTalk REST record API client.
 *
 * Every request acquires the shared rate limiter, carries a bearer token from
 * the run's credential provider, and is classified into retriable / fatal /
 * "not found" outcomes before the caller sees it. Retries use the core
 * `withRetry` helper with exponential backoff.
 */

import { z } from "zod";
import type { Logger, RateLimiter } from "../core/index.js";
import {
  AbortError,
  errorMessage,
  FatalApiError,
  parseRetryAfter,
  RetriableApiError,
  withRetry,
} from "../core/index.js";
import type { CredentialProvider, FetchFn } from "./auth.js";
import { accountHost } from "./auth.js";
import type { IndexRecord, ListResponse, NetsuiteConfig } from "./types.js";

// ─── Constants ───

const MAX_RETRIES = 5;
const BASE_RETRY_DELAY_MS = 1_000;
const MAX_RETRY_DELAY_MS = 60_000;
const REQUEST_TIMEOUT_MS = 300_000;
const DEFAULT_EXTRA_RETRY_STATUSES = [429];

export function recordApiBase(accountIdentifier: string): string {
  return `https://${accountHost(accountIdentifier)}.suitetalk.api.netsuite.com/services/rest/record/v1`;
}

// ─── Response shapes ───

const idSchema = z.union([z.string(), z.number()]).transform(String);

const listResponseSchema = z.object({
  items: z
    .array(
      z
        .object({
          id: idSchema,
          links: z
            .array(z.object({ rel: z.string(), href: z.string() }))
            .default([]),
        })
        .passthrough(),
    )
    .default([]),
  hasMore: z.boolean(),
  offset: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  totalResults: z.number().int().nonnegative().optional(),
});

/** Outcome of a request that the API answered with HTTP 400. */
export const NOT_FOUND = Symbol("not-found");

export interface NetsuiteClientOptions {
  config: NetsuiteConfig;
  credentials: CredentialProvider;
  rateLimiter: RateLimiter;
  logger: Logger;
  signal: AbortSignal;
  fetch?: FetchFn;
  /** Overrides the account's record API base URL. */
  baseUrl?: string;
  /** Statuses below 500 that should be retried. Defaults to [429]. */
  extraRetryStatuses?: number[];
  maxRetries?: number;
  baseRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  requestTimeoutMs?: number;
}

// ─── Client ───

export class NetsuiteClient {
  private readonly opts: NetsuiteClientOptions;
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly extraRetryStatuses: ReadonlySet<number>;

  constructor(opts: NetsuiteClientOptions) {
    this.opts = opts;
    this.fetchFn = opts.fetch ?? fetch;
    this.baseUrl = (
      opts.baseUrl ?? recordApiBase(opts.config.accountIdentifier)
    ).replace(/\/+$/, "");
    this.extraRetryStatuses = new Set(
      opts.extraRetryStatuses ?? DEFAULT_EXTRA_RETRY_STATUSES,
    );
  }

  /**
   * Fetch one page of a list endpoint. HTTP 400 means "no records" and comes
   * back as an empty, final page.
   */
  async listPage(
    path: string,
    params: Record<string, string>,
  ): Promise<ListResponse> {
    const url = this.buildUrl(path, params);
    const body = await this.get(url);
    if (body === NOT_FOUND) {
      this.opts.logger.info(`No records found for ${path}`, { params });
      const offset = Number(params.offset ?? 0);
      return { items: [], hasMore: false, offset, count: 0 };
    }
    const parsed = listResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FatalApiError(
        `Malformed list response from ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        { status: 200, url, body: JSON.stringify(body) },
      );
    }
    const items: IndexRecord[] = parsed.data.items.map((item) => ({
      id: item.id,
      links: item.links,
    }));
    return { ...parsed.data, items };
  }

  /** Fetch a single record. HTTP 400 yields null. */
  async getRecord(path: string): Promise<Record<string, unknown> | null> {
    const url = this.buildUrl(path);
    const body = await this.get(url);
    if (body === NOT_FOUND) return null;
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw new FatalApiError(`Malformed record response from ${path}`, {
        status: 200,
        url,
        body: JSON.stringify(body),
      });
    }
    return Object.fromEntries(Object.entries(body));
  }

  buildUrl(path: string, params?: Record<string, string>): string {
    const normalized = path.startsWith("/") ? path : `/${path}`;
    const query = params ? new URLSearchParams(params).toString() : "";
    return `${this.baseUrl}${normalized}${query ? `?${query}` : ""}`;
  }

  // ─── Low-level: rate-limited + retried GET ───

  private async get(url: string): Promise<unknown> {
    const maxRetries = this.opts.maxRetries ?? MAX_RETRIES;
    return withRetry(() => this.attempt(url), {
      maxRetries,
      baseDelayMs: this.opts.baseRetryDelayMs ?? BASE_RETRY_DELAY_MS,
      maxDelayMs: this.opts.maxRetryDelayMs ?? MAX_RETRY_DELAY_MS,
      signal: this.opts.signal,
      onRetry: (err, retry, delayMs) => {
        this.opts.logger.warn(
          `${errorMessage(err)}; retrying in ${Math.round(delayMs / 1000)}s (retry ${retry}/${maxRetries})`,
          { url },
        );
      },
    });
  }

  private async attempt(url: string): Promise<unknown> {
    this.checkAbort();
    await this.opts.rateLimiter.acquire();
    const token = await this.opts.credentials.getToken();
    this.checkAbort();

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/x-www-form-urlencoded",
    };
    if (this.opts.config.userAgent) {
      headers["User-Agent"] = this.opts.config.userAgent;
    }

    const response = await this.fetchWithTimeout(url, headers);
    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });
    this.opts.rateLimiter.updateFromHeaders(responseHeaders);

    const text = await response.text();
    const outcome = this.validateResponse(response, url, text);
    if (outcome === NOT_FOUND) return NOT_FOUND;
    if (text.trim() === "") return {};
    try {
      return JSON.parse(text);
    } catch {
      throw new FatalApiError(`Response from ${url} is not JSON`, {
        status: response.status,
        url,
        body: text,
      });
    }
  }

  /**
   * 400 is how the record API reports an empty result. 401 drops the held
   * token and retries, as do 5xx and the extra retry statuses. Any other 4xx
   * is fatal.
   */
  private validateResponse(
    response: Response,
    url: string,
    text: string,
  ): typeof NOT_FOUND | "ok" {
    const { status } = response;
    if (status === 400) return NOT_FOUND;

    if (status === 401) {
      // Token revoked before its expiry; the retry fetches a new one.
      this.opts.credentials.invalidate?.();
      throw new RetriableApiError(
        `401 ${response.statusText || "Unauthorized"} for ${url}`,
        { status, url, body: text },
      );
    }

    if (this.extraRetryStatuses.has(status) || status >= 500) {
      if (status === 429) {
        const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
        if (retryAfterMs !== undefined) {
          this.opts.rateLimiter.backoff(retryAfterMs);
        }
      }
      throw new RetriableApiError(
        `${status} ${response.statusText || "Server Error"} for ${url}`,
        { status, url, body: text },
      );
    }

    if (status >= 400) {
      throw new FatalApiError(
        `${status} ${response.statusText || "Client Error"} for ${url}: ${text.slice(0, 200)}`,
        { status, url, body: text },
      );
    }

    if (!response.ok) {
      throw new FatalApiError(`Unexpected HTTP ${status} for ${url}`, {
        status,
        url,
        body: text,
      });
    }
    return "ok";
  }

  private async fetchWithTimeout(
    url: string,
    headers: Record<string, string>,
  ): Promise<Response> {
    const timeoutMs = this.opts.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    const ac = new AbortController();
    const onAbort = () => ac.abort(new AbortError());
    this.opts.signal.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => {
      const timeout = new Error(`Request timed out after ${timeoutMs}ms: ${url}`);
      timeout.name = "TimeoutError";
      ac.abort(timeout);
    }, timeoutMs);

    try {
      return await this.fetchFn(url, {
        method: "GET",
        headers,
        signal: ac.signal,
      });
    } finally {
      clearTimeout(timer);
      this.opts.signal.removeEventListener("abort", onAbort);
    }
  }

  private checkAbort(): void {
    if (this.opts.signal.aborted) {
      throw new AbortError();
    }
  }
}
