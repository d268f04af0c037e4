export interface OutputDirs {
  downloads: string;
  rates: string;
  manifests: string;
}

export type StoreMode = "json" | "sqlite";

export type NoveltyPolicy = "hash_or_newer" | "hash_and_timestamp";

export type SinkType = "local_jsonl" | "http" | "none";

export interface AppConfig {
  /** Tried in order; later entries are mirrors of the first. */
  sourceUrls: string[];
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  /** Offset of the wall-clock times printed in the PDF, `+HH:MM` or `-HH:MM`. */
  sourceUtcOffset: string;
  noveltyPolicy: NoveltyPolicy;
  filePrefix: string;
  ratesFilePrefix: string;
  storeMode: StoreMode;
  statePath: string;
  sqlitePath: string;
  lockStaleMinutes: number;
  outputDirs: OutputDirs;
  logFilePath?: string;
  sinkType: SinkType;
  httpSinkEndpoint?: string;
  httpSinkToken?: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
