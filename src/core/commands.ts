import fs from "node:fs";
import path from "node:path";
import { stateLockPath, type AppConfig } from "../config";
import { extractPublication } from "../extract/extractor";
import type { PdfParserFactory } from "../extract/pdfText";
import type { Logger, MetricsRegistry } from "../observability";
import { withStateLock } from "../persist/lock";
import { exportRates } from "../rates/exporter";
import type { Sink } from "../sink";
import type { RecordStore } from "../store";
import type { RunOutcome } from "../types";
import { runWatcher } from "../watch/watcher";
import type { FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: RecordStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchFn;
  parserFactory?: PdfParserFactory;
  now?: () => Date;
}

export interface RebuildSummary {
  processed: number;
  exported: number;
  skipped: number;
}

export async function runWatch(ctx: CommandContext, dryRun: boolean): Promise<RunOutcome> {
  ctx.logger.info("watch_start", { sourceUrls: ctx.config.sourceUrls, dryRun, store: ctx.store.location });
  const outcome = await runWatcher({ ...ctx, dryRun });
  ctx.logger.info("watch_complete", { classification: outcome.classification, reason: outcome.reason });
  return outcome;
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start", { store: ctx.store.location });
  const record = await ctx.store.readCurrent();
  const history = await ctx.store.listHistory(10);
  ctx.logger.info("status_complete", {
    hasRecord: record !== undefined,
    record,
    historyCount: history.length,
    history,
  });
}

async function listPdfFiles(dir: string): Promise<string[]> {
  if (!fs.existsSync(dir)) {
    return [];
  }
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listPdfFiles(entryPath)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(".pdf")) {
      files.push(entryPath);
    }
  }
  return files.sort();
}

/** Re-derives the rate CSVs from every saved sheet, oldest file name first. */
export async function runRebuildRates(ctx: CommandContext): Promise<RebuildSummary> {
  const downloadsDir = path.resolve(ctx.config.outputDirs.downloads);
  ctx.logger.info("rebuild_rates_start", { downloadsDir });

  const summary = await withStateLock(
    {
      lockPath: stateLockPath(ctx.config),
      runId: ctx.runId,
      staleAfterMs: ctx.config.lockStaleMinutes * 60_000,
      logger: ctx.logger,
      now: ctx.now,
    },
    async (): Promise<RebuildSummary> => {
      const files = await listPdfFiles(downloadsDir);
      let exported = 0;
      let skipped = 0;

      for (const filePath of files) {
        const pdfFile = path.relative(downloadsDir, filePath).split(path.sep).join("/");
        const bytes = await fs.promises.readFile(filePath);
        const extraction = await extractPublication(bytes, {
          utcOffset: ctx.config.sourceUtcOffset,
          parserFactory: ctx.parserFactory,
          logger: ctx.logger,
        });

        if (!extraction.ok) {
          skipped += 1;
          ctx.logger.warn("rebuild_rates_skipped", { pdfFile, error: extraction.error.message });
          continue;
        }

        const rows = await exportRates(
          { config: ctx.config, logger: ctx.logger, metrics: ctx.metrics },
          { pages: extraction.pages, text: extraction.text, timestamp: extraction.timestamp, pdfFile },
        );
        if (rows.length > 0) {
          exported += 1;
        } else {
          skipped += 1;
        }
      }

      return { processed: files.length, exported, skipped };
    },
  );

  ctx.logger.info("rebuild_rates_complete", { ...summary });
  return summary;
}
