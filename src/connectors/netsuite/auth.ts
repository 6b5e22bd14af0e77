/**
 * OAuth2 refresh-token authentication for the SuiteTalk REST API.
 *
 * One provider is created per run and handed to every stream's client, so all
 * streams share the same access token. Refreshes are single-flight: callers
 * arriving while a refresh is in progress await that same promise.
 */

import type { Logger } from "../core/index.js";
import { AuthenticationError } from "../core/index.js";
import type { NetsuiteConfig } from "./types.js";

const DEFAULT_EXPIRES_IN_SEC = 3600;
const TOKEN_REQUEST_TIMEOUT_MS = 60_000;

export type FetchFn = typeof fetch;

export interface CredentialProvider {
  getToken(): Promise<string>;
  /** Forget a token the API rejected so the next `getToken` refreshes. */
  invalidate?(): void;
}

export interface CredentialProviderOptions {
  fetch?: FetchFn;
  logger?: Logger;
  /** Clock override for tests. */
  now?: () => number;
}

/** NetSuite hostnames use lower case and '-' where account ids have '_'. */
export function accountHost(accountIdentifier: string): string {
  return accountIdentifier.toLowerCase().replace(/_/g, "-");
}

export function tokenUrl(accountIdentifier: string): string {
  return `https://${accountHost(accountIdentifier)}.suitetalk.api.netsuite.com/services/rest/auth/oauth2/v1/token`;
}

interface HeldToken {
  accessToken: string;
  expiresAt: number;
}

export class NetsuiteCredentialProvider implements CredentialProvider {
  private readonly config: NetsuiteConfig;
  private readonly fetchFn: FetchFn;
  private readonly logger?: Logger;
  private readonly now: () => number;

  private token: HeldToken | null = null;
  private inflight: Promise<string> | null = null;

  constructor(config: NetsuiteConfig, opts: CredentialProviderOptions = {}) {
    this.config = config;
    this.fetchFn = opts.fetch ?? fetch;
    this.logger = opts.logger;
    this.now = opts.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.accessToken;
    }
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  invalidate(): void {
    this.token = null;
  }

  private async refresh(): Promise<string> {
    const requestTime = this.now();

    const basic = Buffer.from(
      `${this.config.clientId}:${this.config.clientSecret}`,
    ).toString("base64");
    const body = new URLSearchParams({
      refresh_token: this.config.refreshToken,
      grant_type: "refresh_token",
    });

    const response = await this.fetchFn(
      tokenUrl(this.config.accountIdentifier),
      {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: body.toString(),
        signal: AbortSignal.timeout(TOKEN_REQUEST_TIMEOUT_MS),
      },
    );

    const text = await response.text();
    if (!response.ok) {
      throw new AuthenticationError(
        `Failed OAuth login (HTTP ${response.status}), response was '${text}'`,
        response.status,
        text,
      );
    }

    const parsed = parseTokenResponse(text);
    if (!parsed) {
      throw new AuthenticationError(
        "OAuth response did not contain an access_token",
        response.status,
        text,
      );
    }

    const expiresIn = parsed.expiresIn ?? DEFAULT_EXPIRES_IN_SEC;
    this.token = {
      accessToken: parsed.accessToken,
      expiresAt: requestTime + expiresIn * 1000,
    };
    this.logger?.info("OAuth authorization attempt was successful.", {
      expiresIn,
    });
    return parsed.accessToken;
  }
}

function parseTokenResponse(
  text: string,
): { accessToken: string; expiresIn?: number } | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof json !== "object" || json === null) return null;
  if (!("access_token" in json) || typeof json.access_token !== "string") {
    return null;
  }
  const expires = "expires_in" in json ? Number(json.expires_in) : Number.NaN;
  return {
    accessToken: json.access_token,
    ...(Number.isFinite(expires) && expires > 0 && { expiresIn: expires }),
  };
}
