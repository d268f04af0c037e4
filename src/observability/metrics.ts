import type { Logger } from "./logger";
import type { MetricCounterName, MetricTimerName } from "./types";

interface TimerSummary {
  count: number;
  totalMs: number;
  maxMs: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      fetch_ok: this.counters.get("fetch_ok") ?? 0,
      fetch_failed: this.counters.get("fetch_failed") ?? 0,
      extraction_ok: this.counters.get("extraction_ok") ?? 0,
      extraction_degraded: this.counters.get("extraction_degraded") ?? 0,
      classified_new: this.counters.get("classified_new") ?? 0,
      classified_duplicate: this.counters.get("classified_duplicate") ?? 0,
      rates_rows_written: this.counters.get("rates_rows_written") ?? 0,
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      fetch_ms: this.summarize("fetch_ms"),
      extract_ms: this.summarize("extract_ms"),
      persist_ms: this.summarize("persist_ms"),
    };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    });
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    let totalMs = 0;
    let maxMs = 0;
    for (const value of values) {
      totalMs += value;
      maxMs = Math.max(maxMs, value);
    }
    return { count: values.length, totalMs, maxMs };
  }
}
