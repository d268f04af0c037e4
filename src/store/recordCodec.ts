import type { DownloadRecord } from "../types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isDownloadRecord(value: unknown): value is DownloadRecord {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value.contentHash === "string" &&
    /^[0-9a-f]{64}$/.test(value.contentHash) &&
    typeof value.publicationTimestamp === "string" &&
    (value.timestampSource === "document" || value.timestampSource === "fetch") &&
    typeof value.savedFilename === "string" &&
    typeof value.sourceUrl === "string" &&
    typeof value.byteLength === "number" &&
    typeof value.savedAt === "string"
  );
}

/** Copies only the known fields, in a stable order. */
export function normalizeRecord(record: DownloadRecord): DownloadRecord {
  return {
    contentHash: record.contentHash,
    publicationTimestamp: record.publicationTimestamp,
    timestampSource: record.timestampSource,
    savedFilename: record.savedFilename,
    sourceUrl: record.sourceUrl,
    byteLength: record.byteLength,
    savedAt: record.savedAt,
  };
}
