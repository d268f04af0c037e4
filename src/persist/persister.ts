import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { errorMessage, PersistenceError } from "../core/errors";
import { fingerprintFile } from "../detect/fingerprint";
import { formatFileStamp, formatIsoTimestamp, type PublicationTimestamp } from "../extract/timestamp";
import type { Logger } from "../observability";
import type { RecordStore } from "../store";
import type { DownloadRecord, FetchedArtifact, TimestampSource } from "../types";
import { writeFileAtomic } from "./atomicWrite";

export interface PersistDeps {
  config: AppConfig;
  store: RecordStore;
  logger: Logger;
  now?: () => Date;
}

export interface PersistInput {
  artifact: FetchedArtifact;
  contentHash: string;
  timestamp: PublicationTimestamp;
  timestampSource: TimestampSource;
}

interface Destination {
  absolutePath: string;
  relativePath: string;
  alreadyPresent: boolean;
}

function toRelative(downloadsDir: string, absolutePath: string): string {
  return path.relative(downloadsDir, absolutePath).split(path.sep).join("/");
}

async function existingHash(filePath: string): Promise<string | undefined> {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  return fingerprintFile(filePath);
}

/**
 * `<prefix>_<YYYY-MM-DD_HHmm>.pdf` under a per-year directory. A name already
 * taken by different bytes gets the first 8 hash characters appended.
 */
async function chooseDestination(config: AppConfig, input: PersistInput): Promise<Destination> {
  const downloadsDir = path.resolve(config.outputDirs.downloads);
  const yearDir = path.join(downloadsDir, String(input.timestamp.year));
  const baseName = `${config.filePrefix}_${formatFileStamp(input.timestamp)}`;
  const candidates = [`${baseName}.pdf`, `${baseName}_${input.contentHash.slice(0, 8)}.pdf`];

  for (const fileName of candidates) {
    const absolutePath = path.join(yearDir, fileName);
    const hash = await existingHash(absolutePath);
    if (hash === undefined || hash === input.contentHash) {
      return {
        absolutePath,
        relativePath: toRelative(downloadsDir, absolutePath),
        alreadyPresent: hash !== undefined,
      };
    }
  }

  throw new PersistenceError(`Every candidate file name for ${baseName} is taken by different content`);
}

/**
 * Saves the sheet, then swaps in the new record. The record is only replaced
 * once the file is in place, so a crash in between leaves the old record valid.
 */
export async function persistArtifact(deps: PersistDeps, input: PersistInput): Promise<DownloadRecord> {
  const { config, store, logger } = deps;
  const now = deps.now ?? (() => new Date());

  let destination: Destination;
  try {
    destination = await chooseDestination(config, input);
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`Unable to inspect downloads directory: ${errorMessage(error)}`, { cause: error });
  }

  if (destination.alreadyPresent) {
    logger.info("persist_file_reused", { path: destination.relativePath });
  } else {
    try {
      await writeFileAtomic(destination.absolutePath, input.artifact.rawBytes, { tempSuffix: ".part" });
    } catch (error) {
      throw new PersistenceError(`Unable to write ${destination.absolutePath}: ${errorMessage(error)}`, { cause: error });
    }
    logger.info("persist_file_written", { path: destination.relativePath, bytes: input.artifact.rawBytes.length });
  }

  const record: DownloadRecord = {
    contentHash: input.contentHash,
    publicationTimestamp: formatIsoTimestamp(input.timestamp),
    timestampSource: input.timestampSource,
    savedFilename: destination.relativePath,
    sourceUrl: input.artifact.sourceUrl,
    byteLength: input.artifact.rawBytes.length,
    savedAt: now().toISOString(),
  };

  await store.replaceCurrent(record);
  logger.info("persist_record_replaced", { store: store.location, contentHash: record.contentHash });
  return record;
}
