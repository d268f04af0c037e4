import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { errorMessage, PersistenceError } from "../core/errors";
import type { DownloadRecord } from "../types";
import { isDownloadRecord, normalizeRecord } from "./recordCodec";
import type { RecordStore } from "./types";

const RECORD_COLUMNS = "contentHash, publicationTimestamp, timestampSource, savedFilename, sourceUrl, byteLength, savedAt";

/**
 * Current record in a single-row table, plus an append-only history of every
 * saved sheet. Both are written in one transaction.
 */
export class SqliteRecordStore implements RecordStore {
  readonly location: string;
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.location = path.resolve(dbPath);
    try {
      fs.mkdirSync(path.dirname(this.location), { recursive: true });
      this.db = new Database(this.location);
      this.db.pragma("journal_mode = WAL");
      this.initializeSchema();
    } catch (error) {
      throw new PersistenceError(`Unable to open state database ${this.location}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async readCurrent(): Promise<DownloadRecord | undefined> {
    const row: unknown = this.db.prepare(`SELECT ${RECORD_COLUMNS} FROM current_record WHERE id = 1`).get();
    if (row === undefined) {
      return undefined;
    }
    if (!isDownloadRecord(row)) {
      throw new PersistenceError(`State database ${this.location} holds a malformed current record`);
    }
    return normalizeRecord(row);
  }

  async replaceCurrent(record: DownloadRecord): Promise<void> {
    const params = normalizeRecord(record);
    const replace = this.db.transaction((row: DownloadRecord) => {
      this.db
        .prepare(
          `
          INSERT INTO downloads (${RECORD_COLUMNS})
          VALUES (@contentHash, @publicationTimestamp, @timestampSource, @savedFilename, @sourceUrl, @byteLength, @savedAt)
        `,
        )
        .run(row);
      this.db
        .prepare(
          `
          INSERT INTO current_record (id, ${RECORD_COLUMNS})
          VALUES (1, @contentHash, @publicationTimestamp, @timestampSource, @savedFilename, @sourceUrl, @byteLength, @savedAt)
          ON CONFLICT(id) DO UPDATE SET
            contentHash = excluded.contentHash,
            publicationTimestamp = excluded.publicationTimestamp,
            timestampSource = excluded.timestampSource,
            savedFilename = excluded.savedFilename,
            sourceUrl = excluded.sourceUrl,
            byteLength = excluded.byteLength,
            savedAt = excluded.savedAt
        `,
        )
        .run(row);
    });

    try {
      replace(params);
    } catch (error) {
      throw new PersistenceError(`Unable to write state database ${this.location}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listHistory(limit: number): Promise<DownloadRecord[]> {
    const rows: unknown[] = this.db
      .prepare(`SELECT ${RECORD_COLUMNS} FROM downloads ORDER BY id DESC LIMIT ?`)
      .all(Math.max(limit, 0));
    return rows.filter(isDownloadRecord).map(normalizeRecord);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS current_record (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        contentHash TEXT NOT NULL,
        publicationTimestamp TEXT NOT NULL,
        timestampSource TEXT NOT NULL,
        savedFilename TEXT NOT NULL,
        sourceUrl TEXT NOT NULL,
        byteLength INTEGER NOT NULL,
        savedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS downloads (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        contentHash TEXT NOT NULL,
        publicationTimestamp TEXT NOT NULL,
        timestampSource TEXT NOT NULL,
        savedFilename TEXT NOT NULL,
        sourceUrl TEXT NOT NULL,
        byteLength INTEGER NOT NULL,
        savedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_downloads_content_hash ON downloads(contentHash);
    `);
  }
}
