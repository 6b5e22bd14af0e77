import type { AdapterRegistration, Logger, RateLimiterConfig } from "../core/index.js";
import { createRateLimiter } from "../core/index.js";
import type { FetchFn } from "./auth.js";
import { NetsuiteCredentialProvider } from "./auth.js";
import type { NetsuiteStreamAdapterOptions } from "./adapter.js";
import { NetsuiteStreamAdapter } from "./adapter.js";
import { selectStreams } from "./streams.js";
import type { NetsuiteConfig } from "./types.js";

// Adapter
export {
  NetsuiteStreamAdapter,
  RECORDS_FILE,
  STAGING_FILE,
  STREAM_META_FILE,
} from "./adapter.js";
export type { NetsuiteStreamAdapterOptions } from "./adapter.js";
// Auth
export {
  accountHost,
  NetsuiteCredentialProvider,
  tokenUrl,
} from "./auth.js";
export type {
  CredentialProvider,
  CredentialProviderOptions,
  FetchFn,
} from "./auth.js";
// HTTP client (for advanced use / testing)
export { NetsuiteClient, NOT_FOUND, recordApiBase } from "./client.js";
export type { NetsuiteClientOptions } from "./client.js";
// Config
export {
  hasEnvCredentials,
  loadConfigFile,
  loadConfigFromEnv,
  parseConfig,
} from "./config.js";
// Pipeline
export {
  DetailExpander,
  detailPathFor,
  foldCustomFields,
} from "./detail-expander.js";
export { fetchIndex, fetchIndexRecords } from "./index-fetcher.js";
export type { FetchIndexOptions, IndexEvent } from "./index-fetcher.js";
export {
  buildQueryParams,
  formatCursorDate,
  nextPage,
  PAGE_SIZE,
} from "./paginator.js";
export type { QueryParamsInput } from "./paginator.js";
export { selectStreams, STREAMS, streamNames } from "./streams.js";
// Types
export type {
  DetailRecord,
  IndexRecord,
  ListResponse,
  NetsuiteConfig,
  PageToken,
  RecordLink,
  StreamDefinition,
} from "./types.js";

/** NetSuite governs request volume per account, so every stream shares one limiter. */
export const DEFAULT_RATE_LIMIT: RateLimiterConfig = {
  maxRequests: 100,
  windowMs: 60_000,
  minDelayMs: 50,
};

export interface NetsuiteRegistrationOptions {
  logger?: Logger;
  fetch?: FetchFn;
  rateLimiterConfig?: RateLimiterConfig;
  adapter?: Pick<
    NetsuiteStreamAdapterOptions,
    "baseUrl" | "maxConsecutiveDetailFailures" | "client"
  >;
}

/**
 * One engine registration per selected stream. All of them share a single
 * credential provider and rate limiter, since both are per-account.
 */
export function createNetsuiteRegistrations(
  config: NetsuiteConfig,
  opts: NetsuiteRegistrationOptions = {},
): AdapterRegistration[] {
  const credentials = new NetsuiteCredentialProvider(config, {
    ...(opts.fetch && { fetch: opts.fetch }),
    ...(opts.logger && { logger: opts.logger }),
  });
  const rateLimiter = createRateLimiter(
    opts.rateLimiterConfig ?? DEFAULT_RATE_LIMIT,
  );
  return selectStreams(config.streams).map((stream) => ({
    adapter: new NetsuiteStreamAdapter({
      ...opts.adapter,
      stream,
      config,
      credentials,
      ...(opts.fetch && { fetch: opts.fetch }),
    }),
    rateLimiter,
  }));
}
