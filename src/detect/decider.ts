import type { NoveltyPolicy } from "../config";
import { parseIsoTimestamp, timestampToEpochMs, type PublicationTimestamp } from "../extract/timestamp";
import type { Classification, DecisionReason, DownloadRecord } from "../types";

export interface NoveltyCandidate {
  contentHash: string;
  /** Timestamp read from the document; absent when extraction failed. */
  documentTimestamp?: PublicationTimestamp;
}

export interface NoveltyDecision {
  classification: Classification;
  reason: DecisionReason;
}

function storedDocumentEpoch(record: DownloadRecord): number | undefined {
  if (record.timestampSource !== "document") {
    return undefined;
  }
  const parsed = parseIsoTimestamp(record.publicationTimestamp);
  return parsed ? timestampToEpochMs(parsed) : undefined;
}

/**
 * Classifies a freshly fetched sheet against the last saved one.
 *
 * `hash_or_newer`: new content, or a strictly later printed timestamp, is NEW.
 * `hash_and_timestamp`: changed content only counts when the printed timestamp
 * changed too, so a re-rendered copy of the same edition stays DUPLICATE.
 *
 * Timestamps are compared only when both sides were read from the documents;
 * otherwise the decision rests on the hash alone.
 */
export function decideNovelty(
  candidate: NoveltyCandidate,
  stored: DownloadRecord | undefined,
  policy: NoveltyPolicy = "hash_or_newer",
): NoveltyDecision {
  if (!stored) {
    return { classification: "NEW", reason: "no_prior_record" };
  }

  const hashChanged = candidate.contentHash !== stored.contentHash;
  const storedEpoch = storedDocumentEpoch(stored);
  const candidateEpoch = candidate.documentTimestamp ? timestampToEpochMs(candidate.documentTimestamp) : undefined;

  if (policy === "hash_and_timestamp") {
    if (!hashChanged) {
      return { classification: "DUPLICATE", reason: "unchanged" };
    }
    if (storedEpoch !== undefined && candidateEpoch === storedEpoch) {
      return { classification: "DUPLICATE", reason: "regenerated_same_publication" };
    }
    return { classification: "NEW", reason: "content_changed" };
  }

  if (hashChanged) {
    return { classification: "NEW", reason: "content_changed" };
  }
  if (storedEpoch !== undefined && candidateEpoch !== undefined && candidateEpoch > storedEpoch) {
    return { classification: "NEW", reason: "newer_publication" };
  }
  return { classification: "DUPLICATE", reason: "unchanged" };
}
