/**
 * NetSuite adapter type definitions.
 *
 * Shapes follow the SuiteTalk REST record API (`/services/rest/record/v1`).
 */

// ─── Config ───

export interface NetsuiteConfig {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** Account id as shown in the NetSuite URL, e.g. `1234567` or `1234567_SB1`. */
  accountIdentifier: string;
  /** ISO datetime; lower bound for streams with no persisted cursor. */
  startDate?: string;
  userAgent?: string;
  /** Restrict the run to these stream names. */
  streams?: string[];
}

// ─── Wire shapes ───

export interface RecordLink {
  rel: string;
  href: string;
}

/** Entry of a list page: just enough to address the detail endpoint. */
export interface IndexRecord {
  id: string;
  links: RecordLink[];
}

export interface ListResponse {
  items: IndexRecord[];
  hasMore: boolean;
  offset: number;
  count: number;
  totalResults?: number;
}

export type DetailRecord = Record<string, unknown> & { id: string };

// ─── Streams ───

export interface StreamDefinition {
  name: string;
  /** List endpoint, relative to the record API base. */
  listPath: string;
  /** Detail endpoint template; `{id}` is replaced per record. */
  detailPath: string;
  keyProperties: string[];
  replicationKey?: string;
  /** Top-level keys starting with this are folded into one array field. */
  customFieldPrefix?: string;
}

/** Next list offset, or null when the list is exhausted. */
export type PageToken = number | null;
