import { defaultFetch, getFetchDispatcher, type FetchFn } from "../core/fetch";
import type { RunOutcome } from "../types";
import { BaseSink } from "./baseSink";

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
  ignoreHttpsErrors?: boolean;
}

/**
 * Posts each run outcome to a webhook. One attempt per run; the next
 * scheduled run publishes again.
 */
export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly ignoreHttpsErrors: boolean;

  constructor(options: HttpSinkOptions = {}) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.ignoreHttpsErrors = options.ignoreHttpsErrors ?? false;
  }

  async publishOutcome(outcome: RunOutcome): Promise<void> {
    const endpoint = this.requireSetting("HTTP", this.endpoint);

    const headers: Record<string, string> = {
      "content-type": "application/json",
      "idempotency-key": `${outcome.runId}:${outcome.contentHash}`,
    };
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({ sentAt: new Date().toISOString(), outcome }),
        dispatcher: getFetchDispatcher(this.ignoreHttpsErrors),
        signal: controller.signal,
      });
      if (!response.ok) {
        const responseText = await response.text();
        throw new Error(`HTTP sink error ${response.status}: ${responseText}`);
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
