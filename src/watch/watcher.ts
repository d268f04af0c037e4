import { stateLockPath, type AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import type { FetchFn } from "../core/fetch";
import { decideNovelty, type NoveltyDecision } from "../detect/decider";
import { computeFingerprint } from "../detect/fingerprint";
import { fetchArtifact } from "../download/fetcher";
import { extractPublication, type ExtractionResult } from "../extract/extractor";
import type { PdfParserFactory } from "../extract/pdfText";
import { formatIsoTimestamp, timestampFromInstant, type PublicationTimestamp } from "../extract/timestamp";
import type { Logger, MetricsRegistry } from "../observability";
import { withStateLock } from "../persist/lock";
import { persistArtifact } from "../persist/persister";
import { exportRates } from "../rates/exporter";
import type { Sink } from "../sink";
import type { RecordStore } from "../store";
import type { DownloadRecord, RunOutcome, TimestampSource } from "../types";

export interface WatcherDeps {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  store: RecordStore;
  sink: Sink;
  dryRun?: boolean;
  fetchFn?: FetchFn;
  parserFactory?: PdfParserFactory;
  now?: () => Date;
}

interface Settled {
  decision: NoveltyDecision;
  record?: DownloadRecord;
  ratesExported: number;
}

/**
 * One complete pass: fetch, fingerprint, read the printed timestamp, classify,
 * and on NEW save the sheet and its record. Fetch and persistence failures
 * propagate; a missing timestamp degrades to hash-only comparison.
 */
export async function runWatcher(deps: WatcherDeps): Promise<RunOutcome> {
  const { config, logger, metrics, store, sink } = deps;
  const now = deps.now ?? (() => new Date());
  const dryRun = deps.dryRun ?? false;

  const artifact = await fetchArtifact({ config, logger, metrics, fetchFn: deps.fetchFn, now });
  const contentHash = computeFingerprint(artifact.rawBytes);

  const stopExtractTimer = metrics.startTimer("extract_ms");
  const extraction = await extractPublication(artifact.rawBytes, {
    utcOffset: config.sourceUtcOffset,
    parserFactory: deps.parserFactory,
    logger,
  });
  const extractMs = stopExtractTimer();

  const timestamp: PublicationTimestamp = extraction.ok
    ? extraction.timestamp
    : timestampFromInstant(artifact.retrievedAt, config.sourceUtcOffset);
  const timestampSource: TimestampSource = extraction.ok ? "document" : "fetch";
  if (extraction.ok) {
    metrics.incrementCounter("extraction_ok", 1);
    logger.info("extraction_ok", { publicationTimestamp: formatIsoTimestamp(timestamp), durationMs: extractMs });
  } else {
    metrics.incrementCounter("extraction_degraded", 1);
    logger.warn("extraction_degraded", {
      error: extraction.error.message,
      fallback: "hash_only",
      fallbackTimestamp: formatIsoTimestamp(timestamp),
      durationMs: extractMs,
    });
  }

  const settle = async (): Promise<Settled> => {
    const stored = await store.readCurrent();
    const decision = decideNovelty(
      { contentHash, documentTimestamp: extraction.ok ? extraction.timestamp : undefined },
      stored,
      config.noveltyPolicy,
    );
    if (decision.classification === "DUPLICATE" || dryRun) {
      return { decision, ratesExported: 0 };
    }

    const stopPersistTimer = metrics.startTimer("persist_ms");
    const record = await persistArtifact(
      { config, store, logger, now },
      { artifact, contentHash, timestamp, timestampSource },
    );
    stopPersistTimer();

    // Rate CSVs are rewritten in place; rebuild-rates takes the same lock.
    const ratesExported = await exportRatesSafely(deps, extraction, record);
    return { decision, record, ratesExported };
  };

  // A dry run writes nothing, the lock file included.
  const { decision, record, ratesExported } = dryRun
    ? await settle()
    : await withStateLock(
        { lockPath: stateLockPath(config), runId: deps.runId, staleAfterMs: config.lockStaleMinutes * 60_000, logger, now },
        settle,
      );

  metrics.incrementCounter(decision.classification === "NEW" ? "classified_new" : "classified_duplicate", 1);

  const outcome: RunOutcome = {
    runId: deps.runId,
    classification: decision.classification,
    reason: decision.reason,
    contentHash,
    publicationTimestamp: formatIsoTimestamp(timestamp),
    timestampSource,
    savedFilename: record?.savedFilename,
    sourceUrl: artifact.sourceUrl,
    extractionError: extraction.ok ? undefined : extraction.error.message,
    ratesExported,
    dryRun,
    decidedAt: now().toISOString(),
  };

  logger.info("outcome", {
    classification: outcome.classification,
    reason: outcome.reason,
    contentHash,
    publicationTimestamp: outcome.publicationTimestamp,
    timestampSource,
    savedFilename: outcome.savedFilename,
    dryRun,
    action: record ? "saved" : "none",
  });

  if (!dryRun) {
    try {
      await sink.publishOutcome(outcome);
    } catch (error) {
      logger.warn("sink_publish_failed", { error: errorMessage(error) });
    }
  }

  return outcome;
}

/**
 * Rate CSVs are derived from the saved sheet; failing to refresh them does not
 * undo the save. Rows are dated by the printed timestamp; a sheet without one
 * contributes none.
 */
async function exportRatesSafely(
  deps: WatcherDeps,
  extraction: ExtractionResult,
  record: DownloadRecord,
): Promise<number> {
  if (!extraction.ok) {
    deps.logger.warn("rates_skipped", { reason: "no publication timestamp", savedFilename: record.savedFilename });
    return 0;
  }

  try {
    const rows = await exportRates(
      { config: deps.config, logger: deps.logger, metrics: deps.metrics },
      { pages: extraction.pages, text: extraction.text, timestamp: extraction.timestamp, pdfFile: record.savedFilename },
    );
    return rows.length;
  } catch (error) {
    deps.logger.warn("rates_export_failed", { error: errorMessage(error), savedFilename: record.savedFilename });
    return 0;
  }
}
