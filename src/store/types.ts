import type { DownloadRecord } from "../types";

export interface RecordStore {
  /** Human-readable location, for logs. */
  readonly location: string;
  readCurrent(): Promise<DownloadRecord | undefined>;
  /** Atomically replaces the current record; readers never observe a partial write. */
  replaceCurrent(record: DownloadRecord): Promise<void>;
  /** Most recent first. Stores that keep no history return at most the current record. */
  listHistory(limit: number): Promise<DownloadRecord[]>;
  close(): Promise<void>;
}
