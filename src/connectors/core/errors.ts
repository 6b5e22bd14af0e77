/**
 * Error taxonomy shared by the engine and the NetSuite client.
 *
 * Retry predicates and the engine switch on these classes rather than on
 * message text, so every HTTP failure is wrapped in one of them.
 */

const BODY_EXCERPT_LENGTH = 500;

export interface ApiErrorDetails {
  status: number;
  url: string;
  body?: string;
  cause?: unknown;
}

export abstract class ApiError extends Error {
  readonly status: number;
  readonly url: string;
  readonly body: string;
  abstract readonly retryable: boolean;

  constructor(message: string, details: ApiErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.status = details.status;
    this.url = details.url;
    this.body = (details.body ?? "").slice(0, BODY_EXCERPT_LENGTH);
  }
}

/** 5xx, 429 and the extra statuses a client marks retriable. */
export class RetriableApiError extends ApiError {
  readonly retryable = true;

  constructor(message: string, details: ApiErrorDetails) {
    super(message, details);
    this.name = "RetriableApiError";
  }
}

/** 4xx responses that retrying cannot fix. */
export class FatalApiError extends ApiError {
  readonly retryable = false;

  constructor(message: string, details: ApiErrorDetails) {
    super(message, details);
    this.name = "FatalApiError";
  }
}

/** The token endpoint refused the credentials. Aborts the whole run. */
export class AuthenticationError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = "AuthenticationError";
    this.status = status;
    this.body = body;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class AbortError extends Error {
  constructor(message = "Sync aborted") {
    super(message);
    this.name = "AbortError";
  }
}

export function isAbortError(err: unknown): boolean {
  return (
    err instanceof AbortError ||
    (err instanceof Error && err.name === "AbortError")
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNetworkError(err: unknown): boolean {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    return (
      msg.includes("econnreset") ||
      msg.includes("etimedout") ||
      msg.includes("enotfound") ||
      msg.includes("socket hang up") ||
      msg.includes("fetch failed")
    );
  }
  return false;
}
