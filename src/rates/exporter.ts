import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { formatCsvDate, type PublicationTimestamp } from "../extract/timestamp";
import type { Logger, MetricsRegistry } from "../observability";
import { writeFileAtomic } from "../persist/atomicWrite";
import { formatCsv, parseCsv } from "./csv";
import { parseCurrencyRates, RATE_COLUMNS, selectRatesText, type CurrencyRates } from "./parser";

export const CSV_HEADERS = ["DATE", "PDF FILE", ...RATE_COLUMNS] as const;

export interface RatesExportDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface RatesExportInput {
  pages: string[];
  text: string;
  timestamp: PublicationTimestamp;
  /** Saved PDF, relative to the downloads directory. */
  pdfFile: string;
}

export function ratesCsvPath(config: AppConfig, currencyCode: string): string {
  return path.resolve(config.outputDirs.rates, `${config.ratesFilePrefix}_${currencyCode}.csv`);
}

function toRow(date: string, pdfFile: string, rates: string[]): string[] {
  return [date, pdfFile, ...RATE_COLUMNS.map((_, index) => rates[index] ?? "")];
}

async function readRows(filePath: string): Promise<string[][]> {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  const rows = parseCsv(await fs.promises.readFile(filePath, "utf-8"));
  // First row is the header.
  return rows.slice(1).filter((row) => row.length > 0 && row[0] !== "");
}

/** Upserts one row keyed by DATE; later writes for the same DATE replace earlier ones. */
export async function mergeCurrencyRow(filePath: string, row: string[]): Promise<void> {
  const byDate = new Map<string, string[]>();
  for (const existing of await readRows(filePath)) {
    byDate.set(existing[0], existing);
  }
  byDate.set(row[0], row);

  const sorted = [...byDate.values()].sort((a, b) => a[0].localeCompare(b[0]));
  await writeFileAtomic(filePath, formatCsv(CSV_HEADERS, sorted));
}

/** Returns the currencies written. */
export async function exportRates(deps: RatesExportDeps, input: RatesExportInput): Promise<CurrencyRates[]> {
  const { config, logger, metrics } = deps;
  const rows = parseCurrencyRates(selectRatesText(input.pages, input.text));
  if (rows.length === 0) {
    logger.warn("rates_not_found", { pdfFile: input.pdfFile });
    return [];
  }

  const date = formatCsvDate(input.timestamp);
  for (const row of rows) {
    if (row.rates.length !== RATE_COLUMNS.length) {
      logger.warn("rates_column_mismatch", {
        currency: row.currencyCode,
        expected: RATE_COLUMNS.length,
        found: row.rates.length,
      });
    }
    await mergeCurrencyRow(ratesCsvPath(config, row.currencyCode), toRow(date, input.pdfFile, row.rates));
  }

  metrics.incrementCounter("rates_rows_written", rows.length);
  logger.info("rates_exported", { date, currencies: rows.map((row) => row.currencyCode) });
  return rows;
}
