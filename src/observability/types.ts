export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  contentHash?: string;
  classification?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "fetch_ok"
  | "fetch_failed"
  | "extraction_ok"
  | "extraction_degraded"
  | "classified_new"
  | "classified_duplicate"
  | "rates_rows_written";

export type MetricTimerName = "fetch_ms" | "extract_ms" | "persist_ms";
