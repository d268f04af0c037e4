import fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { errorMessage, PersistenceError } from "../core/errors";
import type { Logger } from "../observability";

export interface StateLockOptions {
  lockPath: string;
  runId: string;
  staleAfterMs: number;
  logger: Logger;
  now?: () => Date;
}

interface LockOwner {
  pid: number;
  runId: string;
  acquiredAt: string;
}

interface HeldLock {
  takeoverMarker?: string;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function tryCreate(lockPath: string, owner: LockOwner): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await fs.promises.open(lockPath, "wx");
  } catch (error) {
    if (isErrnoCode(error, "EEXIST")) {
      return false;
    }
    throw new PersistenceError(`Unable to create lock file ${lockPath}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    await handle.writeFile(JSON.stringify(owner));
  } finally {
    await handle.close();
  }
  return true;
}

async function describeHolder(lockPath: string): Promise<string> {
  try {
    const raw = await fs.promises.readFile(lockPath, "utf-8");
    return raw.trim() || "unknown holder";
  } catch (error) {
    return `unreadable lock (${errorMessage(error)})`;
  }
}

async function readHolderRunId(lockPath: string): Promise<string | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(lockPath, "utf-8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return undefined;
    }
    throw error;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === "object" && parsed !== null && "runId" in parsed && typeof parsed.runId === "string"
      ? parsed.runId
      : undefined;
  } catch {
    return undefined;
  }
}

async function statLock(lockPath: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.promises.stat(lockPath);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return undefined;
    }
    throw new PersistenceError(`Unable to inspect lock file ${lockPath}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Replaces a stale lock with our own. Only one run may take over a given stale
 * lock: the marker file is keyed to its inode and mtime and created with O_EXCL.
 * The stale file is moved aside rather than deleted, so a lock created by
 * another run in the meantime is noticed and put back.
 *
 * Returns the marker path on success; the marker is removed on release.
 */
async function takeOverStale(
  options: StateLockOptions,
  owner: LockOwner,
  stale: fs.Stats,
  ageMs: number,
): Promise<string | undefined> {
  const marker = `${options.lockPath}.takeover-${stale.ino}-${Math.trunc(stale.mtimeMs)}`;
  if (!(await tryCreate(marker, owner))) {
    return undefined;
  }

  const aside = `${options.lockPath}.stale-${options.runId}`;
  let acquired = false;
  try {
    try {
      await fs.promises.rename(options.lockPath, aside);
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return undefined;
      }
      throw error;
    }

    const moved = await fs.promises.stat(aside);
    if (moved.ino !== stale.ino || moved.mtimeMs !== stale.mtimeMs) {
      await fs.promises.link(aside, options.lockPath);
      await fs.promises.rm(aside, { force: true });
      return undefined;
    }

    const holder = await describeHolder(aside);
    await fs.promises.rm(aside, { force: true });
    options.logger.warn("state_lock_stale_removed", { lockPath: options.lockPath, ageMs, holder });
    acquired = await tryCreate(options.lockPath, owner);
    return acquired ? marker : undefined;
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`Unable to take over stale lock ${options.lockPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  } finally {
    if (!acquired) {
      await fs.promises.rm(marker, { force: true });
    }
  }
}

async function acquire(options: StateLockOptions): Promise<HeldLock> {
  const now = options.now ?? (() => new Date());
  const owner: LockOwner = { pid: process.pid, runId: options.runId, acquiredAt: now().toISOString() };
  await fs.promises.mkdir(path.dirname(options.lockPath), { recursive: true });

  if (await tryCreate(options.lockPath, owner)) {
    return {};
  }

  const stats = await statLock(options.lockPath);
  // The holder released it between our two calls.
  if (stats === undefined) {
    if (await tryCreate(options.lockPath, owner)) {
      return {};
    }
  } else {
    const ageMs = now().getTime() - stats.mtimeMs;
    if (ageMs > options.staleAfterMs) {
      const takeoverMarker = await takeOverStale(options, owner, stats, ageMs);
      if (takeoverMarker !== undefined) {
        return { takeoverMarker };
      }
    }
  }

  const holder = await describeHolder(options.lockPath);
  throw new PersistenceError(`State is locked by another run: ${holder}`);
}

async function release(options: StateLockOptions, held: HeldLock): Promise<void> {
  try {
    const holder = await readHolderRunId(options.lockPath);
    if (holder === options.runId) {
      await fs.promises.rm(options.lockPath);
    } else {
      options.logger.warn("state_lock_not_owned", { lockPath: options.lockPath, holder: holder ?? null });
    }
    if (held.takeoverMarker !== undefined) {
      await fs.promises.rm(held.takeoverMarker, { force: true });
    }
  } catch (error) {
    options.logger.error("state_lock_release_failed", { lockPath: options.lockPath, error: errorMessage(error) });
  }
}

/** Runs `fn` while holding the exclusive state lock; the lock is released on every exit path. */
export async function withStateLock<T>(options: StateLockOptions, fn: () => Promise<T>): Promise<T> {
  const held = await acquire(options);
  options.logger.debug("state_lock_acquired", { lockPath: options.lockPath });
  try {
    return await fn();
  } finally {
    await release(options, held);
  }
}
