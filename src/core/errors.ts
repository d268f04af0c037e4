export type WatcherErrorCode = "fetch_failed" | "extraction_failed" | "persistence_failed" | "config_invalid";

export abstract class WatcherError extends Error {
  abstract readonly code: WatcherErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface FetchFailure {
  url: string;
  statusCode?: number;
  error: string;
}

export class FetchError extends WatcherError {
  readonly code = "fetch_failed";
  readonly exitCode = 2;
  readonly failures: FetchFailure[];

  constructor(failures: FetchFailure[]) {
    const summary = failures.map((failure) => `${failure.url}: ${failure.error}`).join("; ");
    super(`Unable to retrieve a valid PDF (${summary || "no source urls configured"})`);
    this.failures = failures;
  }
}

/** Recoverable: returned inside an extraction result, never thrown across the pipeline. */
export class ExtractionError extends WatcherError {
  readonly code = "extraction_failed";
  readonly exitCode = 1;
}

export class PersistenceError extends WatcherError {
  readonly code = "persistence_failed";
  readonly exitCode = 3;
}

export class ConfigError extends WatcherError {
  readonly code = "config_invalid";
  readonly exitCode = 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof WatcherError ? error.exitCode : 1;
}
