import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FetchFn, FetchInit } from "../../core/fetch";
import { makeTempDir, removeTempDir, testConfig } from "../../testing/fixtures";
import type { RunOutcome } from "../../types";
import { createSink, HttpSink, LocalJsonlSink, NoopSink } from "../index";

const OUTCOME: RunOutcome = {
  runId: "watch_test",
  classification: "NEW",
  reason: "no_prior_record",
  contentHash: "c".repeat(64),
  publicationTimestamp: "2026-10-19T10:30:00+05:30",
  timestampSource: "document",
  savedFilename: "2026/FOREX_CARD_RATES_2026-10-19_1030.pdf",
  sourceUrl: "https://primary.test/FOREX_CARD_RATES.pdf",
  ratesExported: 3,
  dryRun: false,
  decidedAt: "2026-10-19T06:00:00.000Z",
};

describe("LocalJsonlSink", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it("appends one line per saved sheet to runs.jsonl", async () => {
    const sink = new LocalJsonlSink(testConfig(root));
    const second = { ...OUTCOME, runId: "watch_next", savedFilename: "2026/FOREX_CARD_RATES_2026-10-20_1030.pdf" };
    await sink.publishOutcome(OUTCOME);
    await sink.publishOutcome(second);

    expect(sink.runsPath).toBe(path.join(root, "data", "manifests", "runs.jsonl"));
    const lines = fs.readFileSync(sink.runsPath, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(OUTCOME);
    expect(JSON.parse(lines[1])).toEqual(second);
  });

  it("writes nothing for a duplicate run", async () => {
    const sink = new LocalJsonlSink(testConfig(root));
    await sink.publishOutcome({ ...OUTCOME, classification: "DUPLICATE", reason: "unchanged", savedFilename: undefined });

    expect(fs.existsSync(sink.runsPath)).toBe(false);
  });
});

describe("HttpSink", () => {
  it("posts the outcome with an idempotency key and bearer token", async () => {
    const calls: Array<{ url: string; init: FetchInit }> = [];
    const fetchFn: FetchFn = async (url, init) => {
      calls.push({ url, init });
      return new Response("", { status: 202 });
    };

    await new HttpSink({ endpoint: "https://hooks.test/rates", token: "test-secret", fetchFn }).publishOutcome(OUTCOME);

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("https://hooks.test/rates");
    expect(calls[0].init.method).toBe("POST");
    expect(calls[0].init.headers).toEqual({
      "content-type": "application/json",
      "idempotency-key": `watch_test:${"c".repeat(64)}`,
      authorization: "Bearer test-secret",
    });
    const body: unknown = JSON.parse(calls[0].init.body ?? "");
    expect(body).toMatchObject({ outcome: OUTCOME });
  });

  it("fails on a non-success status", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("boom", { status: 500 }));
    const sink = new HttpSink({ endpoint: "https://hooks.test/rates", fetchFn });

    await expect(sink.publishOutcome(OUTCOME)).rejects.toThrow("HTTP sink error 500: boom");
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("fails when no endpoint is configured", async () => {
    await expect(new HttpSink().publishOutcome(OUTCOME)).rejects.toThrow("HTTP sink is not configured");
  });
});

describe("createSink", () => {
  it("builds the sink named by sinkType", () => {
    const root = "/tmp/unused";
    expect(createSink(testConfig(root, { sinkType: "local_jsonl" }))).toBeInstanceOf(LocalJsonlSink);
    expect(createSink(testConfig(root, { sinkType: "http", httpSinkEndpoint: "https://hooks.test" }))).toBeInstanceOf(
      HttpSink,
    );
    expect(createSink(testConfig(root, { sinkType: "none" }))).toBeInstanceOf(NoopSink);
  });
});
