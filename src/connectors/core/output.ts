import * as fs from "node:fs";
import * as path from "node:path";
import type { OutputWriter } from "./types.js";

export class FileOutputWriter implements OutputWriter {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  private resolve(relativePath: string): string {
    return path.join(this.baseDir, relativePath);
  }

  private async ensureDir(filePath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  }

  private async atomicWrite(filePath: string, content: string): Promise<void> {
    await this.ensureDir(filePath);
    const tmp = `${filePath}.tmp`;
    await fs.promises.writeFile(tmp, content);
    await fs.promises.rename(tmp, filePath);
  }

  async writeMeta(
    relativePath: string,
    data: Record<string, unknown>,
  ): Promise<void> {
    await this.atomicWrite(
      this.resolve(relativePath),
      JSON.stringify(data, null, 2),
    );
  }

  async writeJsonl(
    relativePath: string,
    records: Record<string, unknown>[],
  ): Promise<void> {
    await this.atomicWrite(this.resolve(relativePath), toJsonl(records));
  }

  async appendJsonl(
    relativePath: string,
    records: Record<string, unknown>[],
  ): Promise<void> {
    if (records.length === 0) return;
    const filePath = this.resolve(relativePath);
    await this.ensureDir(filePath);
    await fs.promises.appendFile(filePath, toJsonl(records));
  }

  async move(fromPath: string, toPath: string): Promise<void> {
    const target = this.resolve(toPath);
    await this.ensureDir(target);
    await fs.promises.rename(this.resolve(fromPath), target);
  }

  /** Deletes a file; a missing file is not an error. */
  async remove(relativePath: string): Promise<void> {
    await fs.promises.rm(this.resolve(relativePath), { force: true });
  }
}

function toJsonl(records: Record<string, unknown>[]): string {
  if (records.length === 0) return "";
  return `${records.map((r) => JSON.stringify(r)).join("\n")}\n`;
}

export function createOutputWriter(baseDir: string): OutputWriter {
  return new FileOutputWriter(baseDir);
}
