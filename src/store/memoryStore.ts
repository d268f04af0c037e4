import type { DownloadRecord } from "../types";
import { normalizeRecord } from "./recordCodec";
import type { RecordStore } from "./types";

export class InMemoryRecordStore implements RecordStore {
  readonly location = "memory";
  private readonly history: DownloadRecord[] = [];

  constructor(initial?: DownloadRecord) {
    if (initial) {
      this.history.push(normalizeRecord(initial));
    }
  }

  async readCurrent(): Promise<DownloadRecord | undefined> {
    const current = this.history[this.history.length - 1];
    return current ? { ...current } : undefined;
  }

  async replaceCurrent(record: DownloadRecord): Promise<void> {
    this.history.push(normalizeRecord(record));
  }

  async listHistory(limit: number): Promise<DownloadRecord[]> {
    if (limit <= 0) {
      return [];
    }
    return this.history.slice(-limit).reverse().map((record) => ({ ...record }));
  }

  async close(): Promise<void> {
    return;
  }
}
