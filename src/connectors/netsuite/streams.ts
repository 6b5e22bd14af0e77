import { ConfigError } from "../core/index.js";
import type { StreamDefinition } from "./types.js";

const REPLICATION_KEY = "lastModifiedDate";

export const STREAMS: readonly StreamDefinition[] = [
  {
    name: "customers",
    listPath: "/customer",
    detailPath: "/customer/{id}",
    keyProperties: ["id"],
    replicationKey: REPLICATION_KEY,
    customFieldPrefix: "custentity",
  },
  {
    name: "inventory_items",
    listPath: "/inventoryItem",
    detailPath: "/inventoryItem/{id}",
    keyProperties: ["id"],
    replicationKey: REPLICATION_KEY,
    customFieldPrefix: "custitem",
  },
  {
    name: "purchase_orders",
    listPath: "/purchaseOrder",
    detailPath: "/purchaseOrder/{id}",
    keyProperties: ["id"],
    replicationKey: REPLICATION_KEY,
    customFieldPrefix: "custbody",
  },
  {
    name: "sales_orders",
    listPath: "/salesOrder",
    detailPath: "/salesOrder/{id}",
    keyProperties: ["id"],
    replicationKey: REPLICATION_KEY,
    customFieldPrefix: "custbody",
  },
];

export function streamNames(): string[] {
  return STREAMS.map((s) => s.name);
}

/** All streams, or the named subset in definition order. */
export function selectStreams(names?: string[]): StreamDefinition[] {
  if (!names || names.length === 0) return [...STREAMS];
  const known = new Set(streamNames());
  const unknown = names.filter((n) => !known.has(n));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown stream(s): ${unknown.join(", ")}. Available: ${streamNames().join(", ")}`,
    );
  }
  const wanted = new Set(names);
  return STREAMS.filter((s) => wanted.has(s.name));
}
