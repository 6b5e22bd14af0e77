#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import {
  createNetsuiteRegistrations,
  hasEnvCredentials,
  loadConfigFile,
  loadConfigFromEnv,
  STREAMS,
  streamNames,
} from "../netsuite/index.js";
import type { NetsuiteConfig } from "../netsuite/index.js";
import { SyncEngine, stateFilePath } from "./engine.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { readPersistedState } from "./state.js";
import type { SyncResult } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

interface SyncOptions {
  full?: boolean;
  stream?: string;
  output: string;
  config?: string;
  concurrency: string;
}

interface StatusOptions {
  output: string;
}

function loadConfig(configPath?: string): NetsuiteConfig {
  if (configPath) return loadConfigFile(configPath);
  if (!hasEnvCredentials()) {
    throw new ConfigError(
      "No credentials: pass --config <file> or set NETSUITE_CLIENT_ID and NETSUITE_REFRESH_TOKEN",
    );
  }
  return loadConfigFromEnv();
}

function printResults(results: SyncResult[]): void {
  console.log("\n═══ Sync Summary ═══\n");
  for (const r of results) {
    const status = r.errors.length === 0 ? "✓" : "⚠";
    console.log(
      `${status} ${r.adapter} (${r.mode}): ${r.itemsSynced} synced, ${r.itemsFailed} failed [${(r.durationMs / 1000).toFixed(1)}s]`,
    );
    for (const err of r.errors.slice(0, 5)) {
      console.log(`  ✗ ${err.entity}: ${err.error}`);
    }
    if (r.errors.length > 5) {
      console.log(`  ... and ${r.errors.length - 5} more errors`);
    }
  }
}

function fail(err: unknown): never {
  console.error(`✗ ${errorMessage(err)}`);
  process.exit(1);
}

const program = new Command()
  .name("netsuite-mirror")
  .description("Mirror NetSuite records into local JSON Lines files")
  .version("0.1.0");

program
  .command("sync")
  .description("Sync configured streams")
  .option("--full", "Ignore saved cursors and re-enumerate every record")
  .option("--stream <names>", "Comma-separated streams to sync")
  .option("--output <dir>", "Output directory", "./data")
  .option("--config <file>", "JSON or YAML config file (default: NETSUITE_* env)")
  .option("--concurrency <n>", "Streams to run at once", "1")
  .action(async (opts: SyncOptions) => {
    try {
      const config = loadConfig(opts.config);
      if (opts.stream) {
        config.streams = opts.stream.split(",").map((s) => s.trim());
      }
      const concurrency = parseInt(opts.concurrency, 10);
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new Error(`--concurrency must be a positive integer`);
      }

      const engine = new SyncEngine({
        outputDir: opts.output,
        stateDir: opts.output,
        concurrency,
        adapters: createNetsuiteRegistrations(config, {
          logger: createLogger("auth"),
        }),
      });

      const results = await engine.syncAll(opts.full ? "full" : "incremental");
      printResults(results);

      const hasErrors = results.some((r) => r.errors.length > 0);
      process.exit(hasErrors ? 1 : 0);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("status")
  .description("Show last sync time and cursor for each stream")
  .option("--output <dir>", "Output directory", "./data")
  .action((opts: StatusOptions) => {
    try {
      for (const name of streamNames()) {
        const state = readPersistedState(stateFilePath(opts.output, name));
        if (!state) {
          console.log(`${name}: no sync state found`);
          continue;
        }
        const cursor = state.cursors[name] ?? "none";
        console.log(
          `${name}: last synced ${state.lastSyncAt ?? "never"}, cursor ${cursor}`,
        );
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("streams")
  .description("List available streams")
  .action(() => {
    for (const s of STREAMS) {
      console.log(
        `  - ${s.name} (${s.listPath}, replication key: ${s.replicationKey ?? "none"})`,
      );
    }
  });

program.parseAsync().catch(fail);
