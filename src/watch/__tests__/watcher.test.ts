import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { stateLockPath, type AppConfig } from "../../config";
import { PersistenceError } from "../../core/errors";
import { computeFingerprint } from "../../detect/fingerprint";
import { MetricsRegistry, type Logger } from "../../observability";
import { LocalJsonlSink, NoopSink, type Sink } from "../../sink";
import { JsonRecordStore } from "../../store";
import {
  fakePdfParser,
  FIXED_NOW,
  makeTempDir,
  removeTempDir,
  sequenceFetch,
  sheet,
  testConfig,
  testLogger,
  USD_LINE,
} from "../../testing/fixtures";
import { runWatcher } from "../watcher";

const SHEET_A = sheet("Date: 19/10/2026", "Time: 10:30 AM", USD_LINE);
const SHEET_B = sheet("Rates withdrawn pending revision");

describe("runWatcher", () => {
  let root: string;
  let config: AppConfig;
  let store: JsonRecordStore;

  beforeEach(() => {
    root = makeTempDir();
    config = testConfig(root);
    store = new JsonRecordStore(config.statePath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempDir(root);
  });

  function run(
    body: string,
    options: { dryRun?: boolean; sink?: Sink; metrics?: MetricsRegistry; logger?: Logger } = {},
  ) {
    return runWatcher({
      runId: "watch_test",
      config,
      logger: options.logger ?? testLogger(),
      metrics: options.metrics ?? new MetricsRegistry(),
      store,
      sink: options.sink ?? new NoopSink(),
      dryRun: options.dryRun,
      fetchFn: sequenceFetch([body]),
      parserFactory: fakePdfParser(),
      now: () => FIXED_NOW,
    });
  }

  function downloadedFiles(): string[] {
    const yearDir = path.join(config.outputDirs.downloads, "2026");
    return fs.existsSync(yearDir) ? fs.readdirSync(yearDir).sort() : [];
  }

  it("saves the first sheet it sees", async () => {
    const metrics = new MetricsRegistry();
    const outcome = await run(SHEET_A, { metrics });

    expect(outcome).toMatchObject({
      classification: "NEW",
      reason: "no_prior_record",
      contentHash: computeFingerprint(Buffer.from(SHEET_A, "utf-8")),
      publicationTimestamp: "2026-10-19T10:30:00+05:30",
      timestampSource: "document",
      savedFilename: "2026/FOREX_CARD_RATES_2026-10-19_1030.pdf",
      sourceUrl: "https://primary.test/FOREX_CARD_RATES.pdf",
      ratesExported: 1,
      dryRun: false,
    });
    expect(downloadedFiles()).toEqual(["FOREX_CARD_RATES_2026-10-19_1030.pdf"]);
    expect(fs.readFileSync(path.join(config.outputDirs.downloads, "2026", downloadedFiles()[0]), "utf-8")).toBe(SHEET_A);
    await expect(store.readCurrent()).resolves.toMatchObject({
      contentHash: outcome.contentHash,
      savedFilename: "2026/FOREX_CARD_RATES_2026-10-19_1030.pdf",
    });
    expect(fs.existsSync(stateLockPath(config))).toBe(false);
    expect(metrics.getCounters()).toMatchObject({ fetch_ok: 1, extraction_ok: 1, classified_new: 1 });
  });

  it("writes nothing when the same sheet is fetched again", async () => {
    await run(SHEET_A);
    const stateBefore = fs.readFileSync(config.statePath, "utf-8");

    const outcome = await run(SHEET_A);

    expect(outcome.classification).toBe("DUPLICATE");
    expect(outcome.reason).toBe("unchanged");
    expect(outcome.savedFilename).toBeUndefined();
    expect(outcome.ratesExported).toBe(0);
    expect(downloadedFiles()).toEqual(["FOREX_CARD_RATES_2026-10-19_1030.pdf"]);
    expect(fs.readFileSync(config.statePath, "utf-8")).toBe(stateBefore);
  });

  it("saves changed content even when no timestamp can be read", async () => {
    await run(SHEET_A);
    const metrics = new MetricsRegistry();

    const outcome = await run(SHEET_B, { metrics });

    // Fetch time 06:00Z is 11:30 at +05:30.
    expect(outcome).toMatchObject({
      classification: "NEW",
      reason: "content_changed",
      timestampSource: "fetch",
      publicationTimestamp: "2026-10-19T11:30:00+05:30",
      savedFilename: "2026/FOREX_CARD_RATES_2026-10-19_1130.pdf",
      extractionError: "no publication date found in document text",
      ratesExported: 0,
    });
    expect(downloadedFiles()).toEqual([
      "FOREX_CARD_RATES_2026-10-19_1030.pdf",
      "FOREX_CARD_RATES_2026-10-19_1130.pdf",
    ]);
    await expect(store.readCurrent()).resolves.toMatchObject({ timestampSource: "fetch" });
    expect(metrics.getCounters().extraction_degraded).toBe(1);
  });

  it("keeps an unreadable sheet that did not change as a duplicate", async () => {
    await run(SHEET_B);
    const outcome = await run(SHEET_B);

    expect(outcome.classification).toBe("DUPLICATE");
    expect(downloadedFiles()).toEqual(["FOREX_CARD_RATES_2026-10-19_1130.pdf"]);
  });

  it("classifies without writing anything on a dry run", async () => {
    const sink = new LocalJsonlSink(config);
    const outcome = await run(SHEET_A, { dryRun: true, sink });

    expect(outcome.classification).toBe("NEW");
    expect(outcome.dryRun).toBe(true);
    expect(outcome.savedFilename).toBeUndefined();
    expect(downloadedFiles()).toEqual([]);
    await expect(store.readCurrent()).resolves.toBeUndefined();
    expect(fs.existsSync(stateLockPath(config))).toBe(false);
    expect(fs.existsSync(sink.runsPath)).toBe(false);
  });

  it("records saved sheets in the manifest and leaves it alone on duplicates", async () => {
    const sink = new LocalJsonlSink(config);
    await run(SHEET_A, { sink });
    const manifestBefore = fs.readFileSync(sink.runsPath, "utf-8");

    const outcome = await run(SHEET_A, { sink });

    expect(outcome.classification).toBe("DUPLICATE");
    expect(fs.readFileSync(sink.runsPath, "utf-8")).toBe(manifestBefore);
    expect(manifestBefore.trimEnd().split("\n").map((line) => JSON.parse(line).classification)).toEqual(["NEW"]);
  });

  it("does not export rates from a sheet whose timestamp cannot be read", async () => {
    const outcome = await run(sheet("Forex card rates", USD_LINE));

    expect(outcome).toMatchObject({ classification: "NEW", timestampSource: "fetch", ratesExported: 0 });
    expect(fs.existsSync(path.join(config.outputDirs.rates, "REFERENCE_RATES_USD.csv"))).toBe(false);
  });

  it("writes the rate files while holding the state lock", async () => {
    const logger = testLogger();
    const lockHeld: boolean[] = [];
    vi.spyOn(logger, "info").mockImplementation((msg: string) => {
      if (msg === "rates_exported") {
        lockHeld.push(fs.existsSync(stateLockPath(config)));
      }
    });

    await run(SHEET_A, { logger });

    expect(lockHeld).toEqual([true]);
    expect(fs.existsSync(stateLockPath(config))).toBe(false);
  });

  it("fails with a persistence error while another run holds the lock", async () => {
    const lockPath = stateLockPath(config);
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, JSON.stringify({ pid: 1, runId: "other-run" }), "utf-8");
    fs.utimesSync(lockPath, FIXED_NOW, FIXED_NOW);

    await expect(run(SHEET_A)).rejects.toBeInstanceOf(PersistenceError);
    expect(downloadedFiles()).toEqual([]);
    await expect(store.readCurrent()).resolves.toBeUndefined();
  });
});
