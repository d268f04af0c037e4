import type { AppConfig } from "../config";
import { defaultFetch, getFetchDispatcher, type FetchFn } from "../core/fetch";
import { errorMessage, FetchError, type FetchFailure } from "../core/errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { FetchedArtifact } from "../types";

const PDF_SIGNATURE = Buffer.from("%PDF-", "latin1");

export interface FetcherDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  now?: () => Date;
}

export function looksLikePdf(bytes: Buffer): boolean {
  return bytes.subarray(0, PDF_SIGNATURE.length).equals(PDF_SIGNATURE);
}

class HttpStatusError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number) {
    super(`HTTP ${statusCode}`);
    this.statusCode = statusCode;
  }
}

async function fetchOnce(url: string, config: AppConfig, fetchFn: FetchFn): Promise<{ bytes: Buffer; contentType?: string; resolvedUrl: string }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);
  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": config.userAgent,
        accept: "application/pdf,*/*",
      },
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status);
    }

    // Read the body before the timer is cleared so a stalled transfer still aborts.
    const bytes = Buffer.from(await response.arrayBuffer());
    return {
      bytes,
      contentType: response.headers.get("content-type") ?? undefined,
      resolvedUrl: response.url || url,
    };
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Downloads the rate sheet from the first source url that answers with a PDF.
 * The remaining urls are mirrors and are only tried when an earlier one fails.
 */
export async function fetchArtifact(deps: FetcherDeps): Promise<FetchedArtifact> {
  const { config, logger, metrics } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const now = deps.now ?? (() => new Date());
  const failures: FetchFailure[] = [];

  for (const url of config.sourceUrls) {
    const stopTimer = metrics.startTimer("fetch_ms");
    logger.info("fetch_attempt_start", { url });

    try {
      const result = await fetchOnce(url, config, fetchFn);
      const durationMs = stopTimer();

      if (result.bytes.length === 0) {
        failures.push({ url, error: "empty response body" });
        logger.warn("fetch_empty_body", { url, durationMs });
        continue;
      }

      if (!looksLikePdf(result.bytes)) {
        failures.push({ url, error: `response is not a PDF (content-type ${result.contentType ?? "unknown"})` });
        logger.warn("fetch_not_pdf", { url, durationMs, contentType: result.contentType, bytes: result.bytes.length });
        continue;
      }

      metrics.incrementCounter("fetch_ok", 1);
      logger.info("fetch_ok", { url, durationMs, bytes: result.bytes.length, contentType: result.contentType });
      return {
        rawBytes: result.bytes,
        retrievedAt: now(),
        sourceUrl: result.resolvedUrl,
        contentType: result.contentType,
      };
    } catch (error) {
      const durationMs = stopTimer();
      const statusCode = error instanceof HttpStatusError ? error.statusCode : undefined;
      const message = controllerAbortMessage(error) ?? errorMessage(error);
      failures.push({ url, statusCode, error: message });
      logger.warn("fetch_attempt_failed", { url, durationMs, statusCode, error: message });
    }
  }

  metrics.incrementCounter("fetch_failed", 1);
  throw new FetchError(failures);
}

function controllerAbortMessage(error: unknown): string | undefined {
  if (error instanceof Error && error.name === "AbortError") {
    return "request timed out";
  }
  return undefined;
}
