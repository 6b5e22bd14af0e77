import * as fs from "node:fs";
import * as path from "node:path";
import type { AdapterState, PersistedState } from "./types.js";

function defaultState(): PersistedState {
  return { lastSyncAt: null, cursors: {}, metadata: {} };
}

function isPersistedState(value: unknown): value is PersistedState {
  if (typeof value !== "object" || value === null) return false;
  if (!("lastSyncAt" in value && "cursors" in value && "metadata" in value)) {
    return false;
  }
  return (
    (value.lastSyncAt === null || typeof value.lastSyncAt === "string") &&
    typeof value.cursors === "object" &&
    value.cursors !== null &&
    typeof value.metadata === "object" &&
    value.metadata !== null
  );
}

export class StateManager {
  private state: PersistedState;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.state = this.loadFromDisk();
  }

  private loadFromDisk(): PersistedState {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return defaultState();
      }
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isPersistedState(parsed)) {
      throw new Error(`Malformed state file: ${this.filePath}`);
    }
    return parsed;
  }

  private async writeToDisk(): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.promises.mkdir(dir, { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(this.state, null, 2));
    await fs.promises.rename(tmp, this.filePath);
  }

  getAdapterState(): AdapterState {
    const self = this;
    return {
      get lastSyncAt() {
        return self.state.lastSyncAt;
      },
      set lastSyncAt(val: string | null) {
        self.state.lastSyncAt = val;
      },
      get cursors() {
        return self.state.cursors;
      },
      set cursors(val: Record<string, string>) {
        self.state.cursors = val;
      },
      get metadata() {
        return self.state.metadata;
      },
      set metadata(val: Record<string, unknown>) {
        self.state.metadata = val;
      },
      async checkpoint() {
        await self.writeToDisk();
      },
    };
  }

  async save(): Promise<void> {
    this.state.lastSyncAt = new Date().toISOString();
    await this.writeToDisk();
  }

  getRawState(): PersistedState {
    return { ...this.state };
  }
}

/** Read a state file without creating a manager, for `status`. */
export function readPersistedState(filePath: string): PersistedState | null {
  if (!fs.existsSync(filePath)) return null;
  return new StateManager(filePath).getRawState();
}

// ─── Replication cursor ───

export interface CursorTrackerOptions {
  /** Key under `state.cursors`. */
  key: string;
  /** Lower bound when nothing is persisted yet (or in full mode). */
  startDate?: string;
  /** Ignore the persisted cursor and start from `startDate`. */
  ignorePersisted?: boolean;
}

/**
 * Tracks the highest replication-key value seen for one stream.
 *
 * `observe` only moves the pending maximum; `commit` copies it into adapter
 * state. Nothing reaches disk until the adapter checkpoints.
 */
export class CursorTracker {
  private readonly state: AdapterState;
  private readonly opts: CursorTrackerOptions;
  private pending: { raw: string; ms: number } | null = null;

  constructor(state: AdapterState, opts: CursorTrackerOptions) {
    this.state = state;
    this.opts = opts;
  }

  /** The lower bound for this run's first list request. */
  start(): string | null {
    if (!this.opts.ignorePersisted) {
      const persisted = this.state.cursors[this.opts.key];
      if (persisted) return persisted;
    }
    return this.opts.startDate ?? null;
  }

  observe(value: unknown): void {
    if (typeof value !== "string") return;
    const ms = Date.parse(value);
    if (Number.isNaN(ms)) return;
    if (!this.pending || ms > this.pending.ms) {
      this.pending = { raw: value, ms };
    }
  }

  /** Write the pending maximum into state if it moves the cursor forward. */
  commit(): boolean {
    if (!this.pending) return false;
    const current = this.state.cursors[this.opts.key];
    const currentMs = current ? Date.parse(current) : Number.NaN;
    if (!Number.isNaN(currentMs) && currentMs >= this.pending.ms) {
      return false;
    }
    this.state.cursors[this.opts.key] = this.pending.raw;
    return true;
  }

  get value(): string | null {
    return this.state.cursors[this.opts.key] ?? null;
  }
}
