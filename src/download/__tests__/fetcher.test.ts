import { describe, expect, it } from "vitest";
import { FetchError } from "../../core/errors";
import type { FetchFn, FetchInit } from "../../core/fetch";
import { MetricsRegistry } from "../../observability";
import { FIXED_NOW, pdfResponse, sheet, testConfig, testLogger } from "../../testing/fixtures";
import { fetchArtifact, looksLikePdf } from "../fetcher";

const PRIMARY = "https://primary.test/FOREX_CARD_RATES.pdf";
const MIRROR = "https://mirror.test/FOREX_CARD_RATES.pdf";

function routes(table: Record<string, () => Promise<Response>>): FetchFn {
  return async (url) => {
    const route = table[url];
    if (!route) {
      throw new Error(`unexpected url ${url}`);
    }
    return route();
  };
}

function deps(fetchFn: FetchFn, requestTimeoutMs = 30_000) {
  return {
    config: testConfig("/tmp/unused", { requestTimeoutMs }),
    logger: testLogger(),
    metrics: new MetricsRegistry(),
    fetchFn,
    now: () => FIXED_NOW,
  };
}

describe("looksLikePdf", () => {
  it("accepts a body that starts with the signature", () => {
    expect(looksLikePdf(Buffer.from("%PDF-1.7\n..."))).toBe(true);
  });

  it("rejects html, short bodies and signatures after the first byte", () => {
    expect(looksLikePdf(Buffer.from("<!doctype html><html></html>"))).toBe(false);
    expect(looksLikePdf(Buffer.from("%PDF"))).toBe(false);
    expect(looksLikePdf(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("%PDF-1.4")]))).toBe(false);
    expect(looksLikePdf(Buffer.from("\n%PDF-1.4"))).toBe(false);
  });
});

describe("fetchArtifact", () => {
  it("returns the primary document with request headers applied", async () => {
    const seen: FetchInit[] = [];
    const fetchFn: FetchFn = async (_url, init) => {
      seen.push(init);
      return pdfResponse(sheet("Date: 19/10/2026"));
    };

    const artifact = await fetchArtifact(deps(fetchFn));

    expect(artifact.sourceUrl).toBe(PRIMARY);
    expect(artifact.retrievedAt).toBe(FIXED_NOW);
    expect(artifact.contentType).toBe("application/pdf");
    expect(artifact.rawBytes.toString("utf-8")).toBe("%PDF-1.4\nDate: 19/10/2026");
    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe("GET");
    expect(seen[0].headers["user-agent"]).toBe("forex-rates-watcher/1.0");
    expect(seen[0].dispatcher).toBeUndefined();
  });

  it("falls back to the mirror when the primary answers with an error", async () => {
    const fetchDeps = deps(
      routes({
        [PRIMARY]: async () => new Response("unavailable", { status: 503 }),
        [MIRROR]: async () => pdfResponse(sheet("mirror copy")),
      }),
    );

    const artifact = await fetchArtifact(fetchDeps);

    expect(artifact.sourceUrl).toBe(MIRROR);
    expect(fetchDeps.metrics.getCounters().fetch_ok).toBe(1);
  });

  it("treats an html error page served with status 200 as a failure", async () => {
    const artifact = await fetchArtifact(
      deps(
        routes({
          [PRIMARY]: async () => new Response("<html>Maintenance</html>", { headers: { "content-type": "text/html" } }),
          [MIRROR]: async () => pdfResponse(sheet("mirror copy")),
        }),
      ),
    );

    expect(artifact.sourceUrl).toBe(MIRROR);
  });

  it("raises a FetchError listing every failed url", async () => {
    const fetchDeps = deps(
      routes({
        [PRIMARY]: async () => new Response("unavailable", { status: 503 }),
        [MIRROR]: async () => new Response("", { status: 200 }),
      }),
    );

    const attempt = fetchArtifact(fetchDeps);

    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    const error = await attempt.catch((caught: unknown) => caught);
    expect(error instanceof FetchError && error.failures).toEqual([
      { url: PRIMARY, statusCode: 503, error: "HTTP 503" },
      { url: MIRROR, error: "empty response body" },
    ]);
    expect(error instanceof FetchError && error.exitCode).toBe(2);
    expect(fetchDeps.metrics.getCounters().fetch_failed).toBe(1);
  });

  it("records network errors and timeouts", async () => {
    const hang: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener("abort", () => {
          reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
        });
      });
    const fetchFn: FetchFn = async (url, init) => {
      if (url === PRIMARY) {
        throw new Error("getaddrinfo ENOTFOUND primary.test");
      }
      return hang(url, init);
    };

    const error = await fetchArtifact(deps(fetchFn, 20)).catch((caught: unknown) => caught);

    expect(error instanceof FetchError && error.failures).toEqual([
      { url: PRIMARY, statusCode: undefined, error: "getaddrinfo ENOTFOUND primary.test" },
      { url: MIRROR, statusCode: undefined, error: "request timed out" },
    ]);
  });
});
