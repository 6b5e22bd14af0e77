/** Core type definitions for netsuite-mirror. */

export type SyncMode = "full" | "incremental";

// ─── Adapter Interface ───

export interface Adapter {
  name: string;
  sync(ctx: SyncContext): Promise<SyncResult>;
}

// ─── Sync Context (injected by engine) ───

export interface SyncContext {
  mode: SyncMode;
  outputDir: string;
  state: AdapterState;
  rateLimiter: RateLimiter;
  logger: Logger;
  signal: AbortSignal;
}

// ─── Adapter State ───

export interface AdapterState {
  lastSyncAt: string | null;
  cursors: Record<string, string>;
  metadata: Record<string, unknown>;
  checkpoint(): Promise<void>;
}

// ─── Sync Result ───

export interface SyncResult {
  adapter: string;
  mode: SyncMode;
  itemsSynced: number;
  itemsFailed: number;
  errors: SyncError[];
  durationMs: number;
}

export interface SyncError {
  entity: string;
  error: string;
  retryable: boolean;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
  minDelayMs?: number;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  backoff(retryAfterMs: number): void;
  updateFromHeaders(headers: Record<string, string>): void;
}

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Output Writer ───

export interface OutputWriter {
  writeMeta(relativePath: string, data: Record<string, unknown>): Promise<void>;
  writeJsonl(
    relativePath: string,
    records: Record<string, unknown>[],
  ): Promise<void>;
  appendJsonl(
    relativePath: string,
    records: Record<string, unknown>[],
  ): Promise<void>;
  /** Renames one output file over another. */
  move(fromPath: string, toPath: string): Promise<void>;
  remove(relativePath: string): Promise<void>;
}

// ─── Engine Config ───

export interface SyncEngineConfig {
  outputDir: string;
  stateDir: string;
  adapters: AdapterRegistration[];
  /** Adapters run side by side, at most this many at once. Defaults to 1. */
  concurrency?: number;
  /** Skip the SIGINT handler (tests, embedding). */
  handleSignals?: boolean;
  createLogger?: (name: string) => Logger;
}

export interface AdapterRegistration {
  adapter: Adapter;
  rateLimiterConfig?: RateLimiterConfig;
  /**
   * Shared limiter for adapters hitting the same account. Takes precedence
   * over `rateLimiterConfig`.
   */
  rateLimiter?: RateLimiter;
}

// ─── Persisted State Shape ───

export interface PersistedState {
  lastSyncAt: string | null;
  cursors: Record<string, string>;
  metadata: Record<string, unknown>;
}
