import * as path from "node:path";
import { AuthenticationError, errorMessage } from "./errors.js";
import { createLogger as createConsoleLogger } from "./logger.js";
import { createRateLimiter } from "./rate-limiter.js";
import { Semaphore } from "./semaphore.js";
import { StateManager } from "./state.js";
import type {
  AdapterRegistration,
  SyncContext,
  SyncEngineConfig,
  SyncMode,
  SyncResult,
} from "./types.js";

export function stateFilePath(stateDir: string, adapterName: string): string {
  return path.join(stateDir, adapterName, "_meta", "state.json");
}

export class SyncEngine {
  private readonly config: SyncEngineConfig;

  constructor(config: SyncEngineConfig) {
    this.config = config;
  }

  /**
   * Run every registered adapter. A failing adapter does not stop its
   * siblings; an AuthenticationError aborts the whole run and is rethrown
   * once in-flight adapters have settled.
   */
  async syncAll(mode: SyncMode): Promise<SyncResult[]> {
    const run = new AbortController();
    const semaphore = new Semaphore(this.config.concurrency ?? 1);
    const fatal: AuthenticationError[] = [];

    const release = this.installSignalHandler(run);
    try {
      const results = await Promise.all(
        this.config.adapters.map((reg) =>
          semaphore.run(async (): Promise<SyncResult | null> => {
            if (run.signal.aborted) return null;
            try {
              return await this.runAdapter(reg, mode, run.signal);
            } catch (err) {
              if (err instanceof AuthenticationError) {
                fatal.push(err);
                run.abort();
                return null;
              }
              throw err;
            }
          }),
        ),
      );
      if (fatal.length > 0) throw fatal[0];
      return results.filter((r): r is SyncResult => r !== null);
    } finally {
      release();
    }
  }

  async syncOne(adapterName: string, mode: SyncMode): Promise<SyncResult> {
    const reg = this.config.adapters.find(
      (a) => a.adapter.name === adapterName,
    );
    if (!reg) {
      throw new Error(
        `Adapter "${adapterName}" not found. Available: ${this.listAdapters().join(", ")}`,
      );
    }
    const run = new AbortController();
    const release = this.installSignalHandler(run);
    try {
      return await this.runAdapter(reg, mode, run.signal);
    } finally {
      release();
    }
  }

  listAdapters(): string[] {
    return this.config.adapters.map((a) => a.adapter.name);
  }

  private installSignalHandler(run: AbortController): () => void {
    if (this.config.handleSignals === false) return () => {};
    // Handle SIGINT gracefully
    const sigHandler = () => {
      console.warn("Received interrupt, finishing current operation...");
      run.abort();
    };
    process.on("SIGINT", sigHandler);
    return () => {
      process.removeListener("SIGINT", sigHandler);
    };
  }

  private async runAdapter(
    reg: AdapterRegistration,
    mode: SyncMode,
    runSignal: AbortSignal,
  ): Promise<SyncResult> {
    const { adapter, rateLimiterConfig } = reg;
    const logger = (this.config.createLogger ?? createConsoleLogger)(
      adapter.name,
    );
    const outputDir = path.join(this.config.outputDir, adapter.name);
    const startTime = Date.now();

    let effectiveMode = mode;
    try {
      const stateManager = new StateManager(
        stateFilePath(this.config.stateDir, adapter.name),
      );
      const adapterState = stateManager.getAdapterState();

      // If incremental but no prior state, fall back to full
      effectiveMode =
        mode === "incremental" && !adapterState.lastSyncAt ? "full" : mode;

      const ctx: SyncContext = {
        mode: effectiveMode,
        outputDir,
        state: adapterState,
        rateLimiter: reg.rateLimiter ?? createRateLimiter(rateLimiterConfig),
        logger,
        signal: runSignal,
      };

      logger.info(`Starting ${effectiveMode} sync`);
      const result = await adapter.sync(ctx);
      await stateManager.save();
      logger.info(
        `Sync complete: ${result.itemsSynced} items, ${result.itemsFailed} failed`,
        { durationMs: result.durationMs },
      );
      return result;
    } catch (err) {
      if (err instanceof AuthenticationError) {
        logger.error(`Authentication failed, aborting run: ${err.message}`);
        throw err;
      }
      const errorMsg = errorMessage(err);
      logger.error(`Sync failed: ${errorMsg}`);
      return {
        adapter: adapter.name,
        mode: effectiveMode,
        itemsSynced: 0,
        itemsFailed: 0,
        errors: [{ entity: "sync", error: errorMsg, retryable: false }],
        durationMs: Date.now() - startTime,
      };
    }
  }
}
