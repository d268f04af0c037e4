import fs from "node:fs";
import path from "node:path";
import { errorMessage, PersistenceError } from "../core/errors";
import { writeFileAtomic } from "../persist/atomicWrite";
import type { DownloadRecord } from "../types";
import { isDownloadRecord, normalizeRecord } from "./recordCodec";
import type { RecordStore } from "./types";

/** Keeps the single current record in a JSON file, replaced by write-temp-then-rename. */
export class JsonRecordStore implements RecordStore {
  readonly location: string;

  constructor(statePath: string) {
    this.location = path.resolve(statePath);
  }

  async readCurrent(): Promise<DownloadRecord | undefined> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.location, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw new PersistenceError(`Unable to read state file ${this.location}: ${errorMessage(error)}`, { cause: error });
    }

    if (raw.trim() === "") {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`State file ${this.location} is not valid JSON`, { cause: error });
    }
    if (!isDownloadRecord(parsed)) {
      throw new PersistenceError(`State file ${this.location} does not hold a download record`);
    }
    return normalizeRecord(parsed);
  }

  async replaceCurrent(record: DownloadRecord): Promise<void> {
    try {
      await writeFileAtomic(this.location, `${JSON.stringify(normalizeRecord(record), null, 2)}\n`);
    } catch (error) {
      throw new PersistenceError(`Unable to write state file ${this.location}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listHistory(limit: number): Promise<DownloadRecord[]> {
    const current = await this.readCurrent();
    return current && limit > 0 ? [current] : [];
  }

  async close(): Promise<void> {
    return;
  }
}
