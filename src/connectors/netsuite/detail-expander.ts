import type { Logger } from "../core/index.js";
import type { NetsuiteClient } from "./client.js";
import type { DetailRecord, IndexRecord, StreamDefinition } from "./types.js";

/**
 * Collect every top-level field starting with `prefix` into `row[prefix]` as
 * a list of one-key objects, keeping the prefixed fields in place.
 *
 * The bucket key itself is never collected, so folding an already folded
 * record gives an equal record.
 */
export function foldCustomFields(
  row: Record<string, unknown>,
  prefix: string,
): Record<string, unknown> {
  const bucket = Object.entries(row)
    .filter(([key]) => key !== prefix && key.startsWith(prefix))
    .map(([key, value]) => ({ [key]: value }));
  return { ...row, [prefix]: bucket };
}

export function detailPathFor(stream: StreamDefinition, id: string): string {
  return stream.detailPath.replace("{id}", encodeURIComponent(id));
}

export interface DetailExpanderOptions {
  client: NetsuiteClient;
  stream: StreamDefinition;
  logger: Logger;
}

/**
 * Turns index records into full records via the per-id detail endpoint.
 *
 * One instance lives for one fetch cycle of one stream; it remembers which
 * ids it has expanded so an id repeated across offset pages is fetched once.
 */
export class DetailExpander {
  private readonly client: NetsuiteClient;
  private readonly stream: StreamDefinition;
  private readonly logger: Logger;
  private readonly expanded = new Set<string>();

  constructor(opts: DetailExpanderOptions) {
    this.client = opts.client;
    this.stream = opts.stream;
    this.logger = opts.logger;
  }

  /** Null means "skip this record", never an error. */
  async expand(index: IndexRecord): Promise<DetailRecord | null> {
    if (this.expanded.has(index.id)) {
      this.logger.warn(`Skipping duplicate id ${index.id}`);
      return null;
    }
    this.expanded.add(index.id);

    const row = await this.client.getRecord(detailPathFor(this.stream, index.id));
    if (row === null) {
      this.logger.warn(`Record ${index.id} not found, skipping`);
      return null;
    }
    return this.postProcess(index, row);
  }

  postProcess(
    index: IndexRecord,
    row: Record<string, unknown>,
  ): DetailRecord | null {
    const rawId = row.id;
    const id =
      typeof rawId === "string" || typeof rawId === "number"
        ? String(rawId)
        : null;
    if (id !== index.id) {
      this.logger.warn(`Detail for ${index.id} carried id ${String(rawId)}, dropping`);
      return null;
    }

    const folded = this.stream.customFieldPrefix
      ? foldCustomFields(row, this.stream.customFieldPrefix)
      : row;
    return { ...folded, id };
  }

  get expandedCount(): number {
    return this.expanded.size;
  }
}
