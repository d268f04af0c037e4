export type TimestampSource = "document" | "fetch";

export type Classification = "NEW" | "DUPLICATE";

export type DecisionReason =
  | "no_prior_record"
  | "content_changed"
  | "newer_publication"
  | "unchanged"
  | "regenerated_same_publication";

export interface DownloadRecord {
  contentHash: string;
  /** ISO-8601 with the source's UTC offset, e.g. 2026-10-19T10:30:00+05:30 */
  publicationTimestamp: string;
  timestampSource: TimestampSource;
  /** Relative to the downloads directory, `/` separated */
  savedFilename: string;
  sourceUrl: string;
  byteLength: number;
  savedAt: string;
}

export interface FetchedArtifact {
  rawBytes: Buffer;
  retrievedAt: Date;
  sourceUrl: string;
  contentType?: string;
}

export interface RunOutcome {
  runId: string;
  classification: Classification;
  reason: DecisionReason;
  contentHash: string;
  publicationTimestamp: string;
  timestampSource: TimestampSource;
  savedFilename?: string;
  sourceUrl: string;
  extractionError?: string;
  ratesExported: number;
  dryRun: boolean;
  decidedAt: string;
}
