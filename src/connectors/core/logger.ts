import type { Logger } from "./types.js";

export class ConsoleLogger implements Logger {
  private readonly prefix: string;

  constructor(streamName: string) {
    this.prefix = `[${streamName}]`;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${msg}${formatExtra(data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ⚠ ${msg}${formatExtra(data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ✗ ${msg}${formatExtra(data)}`);
  }

  progress(current: number, total: number, label: string): void {
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    if (!process.stdout.isTTY) {
      console.log(`${this.prefix} ${label}: ${current}/${total} (${pct}%)`);
      return;
    }
    process.stdout.write(
      `\r${this.prefix} ${label}: ${current}/${total} (${pct}%)`,
    );
    if (current >= total) process.stdout.write("\n");
  }
}

function formatExtra(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export function createLogger(streamName: string): Logger {
  return new ConsoleLogger(streamName);
}
