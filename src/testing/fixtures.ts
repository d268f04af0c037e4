import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG, type AppConfig } from "../config";
import type { FetchFn } from "../core/fetch";
import type { PdfParserFactory } from "../extract/pdfText";
import { Logger } from "../observability";
import type { DownloadRecord } from "../types";

export const FIXED_NOW = new Date("2026-10-19T06:00:00.000Z");

export const USD_LINE = "USD/INR 83.10 83.90 82.95 84.05 82.90 84.10 82.50 84.50";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "forex-watcher-"));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(root: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    sourceUrls: ["https://primary.test/FOREX_CARD_RATES.pdf", "https://mirror.test/FOREX_CARD_RATES.pdf"],
    statePath: path.join(root, "data", "last_download.json"),
    sqlitePath: path.join(root, "data", "state.sqlite"),
    outputDirs: {
      downloads: path.join(root, "downloads"),
      rates: path.join(root, "data", "rates"),
      manifests: path.join(root, "data", "manifests"),
    },
    sinkType: "none",
    ...overrides,
  };
}

export function testLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run" });
}

/** Body of a fake rate sheet; pages are separated by form feeds. */
export function sheet(...lines: string[]): string {
  return ["%PDF-1.4", ...lines].join("\n");
}

/** Treats the bytes as the document text, so fixtures stay readable. */
export function fakePdfParser(
  options: { info?: unknown; failWith?: string; infoFailWith?: string } = {},
): PdfParserFactory {
  return (data) => {
    const text = data.toString("utf-8");
    const pages = text.split("\f");
    return {
      getText: async () => {
        if (options.failWith) {
          throw new Error(options.failWith);
        }
        return { text, total: pages.length, pages: pages.map((page) => ({ text: page })) };
      },
      getInfo: async () => {
        if (options.infoFailWith) {
          throw new Error(options.infoFailWith);
        }
        return { info: options.info ?? {} };
      },
      destroy: async () => undefined,
    };
  };
}

export function pdfResponse(body: string): Response {
  return new Response(body, { status: 200, headers: { "content-type": "application/pdf" } });
}

/** Serves `bodies` in order, one per call; the last body repeats. */
export function sequenceFetch(bodies: string[]): FetchFn {
  let call = 0;
  return async () => {
    const body = bodies[Math.min(call, bodies.length - 1)];
    call += 1;
    return pdfResponse(body);
  };
}

export function makeRecord(overrides: Partial<DownloadRecord> = {}): DownloadRecord {
  return {
    contentHash: "a".repeat(64),
    publicationTimestamp: "2026-10-19T10:30:00+05:30",
    timestampSource: "document",
    savedFilename: "2026/FOREX_CARD_RATES_2026-10-19_1030.pdf",
    sourceUrl: "https://primary.test/FOREX_CARD_RATES.pdf",
    byteLength: 1024,
    savedAt: "2026-10-19T06:00:00.000Z",
    ...overrides,
  };
}
