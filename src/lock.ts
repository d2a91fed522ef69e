import { mkdir, stat } from "node:fs/promises";
import { join } from "node:path";

import { CatalogError, describeCause } from "./errors.js";
import { isDirectory, pathExists, readJsonFile, removePath, writeJsonFile } from "./fs-utils.js";
import { errnoCode, isPlainObject } from "./type-guards.js";

export const LOCK_DIR_NAME = ".catalog.lock";

const STALE_LOCK_MINUTES = 30;
const STALE_LOCK_MS = STALE_LOCK_MINUTES * 60 * 1000;

export type LockInfo = {
  pid?: number;
  started?: string;
  target?: string;
};

export type LockStatus = {
  exists: boolean;
  stale: boolean;
  lockDir: string;
  infoPath: string;
  info?: LockInfo;
};

function parseLockInfo(raw: unknown): LockInfo {
  if (!isPlainObject(raw)) return {};
  const pid = typeof raw.pid === "number" && Number.isInteger(raw.pid) ? raw.pid : undefined;
  const started = typeof raw.started === "string" ? raw.started : undefined;
  const target = typeof raw.target === "string" ? raw.target : undefined;
  return { pid, started, target };
}

function isStale(args: { startedIso: string | undefined; fallbackStartedMs: number | null; nowMs: number }): boolean {
  const startedMs = args.startedIso ? Date.parse(args.startedIso) : Number.NaN;
  const baseMs = Number.isFinite(startedMs) ? startedMs : args.fallbackStartedMs;
  if (baseMs === null) return false;
  return args.nowMs - baseMs > STALE_LOCK_MS;
}

function lockPaths(rootDir: string): { lockDir: string; infoPath: string } {
  const lockDir = join(rootDir, LOCK_DIR_NAME);
  return { lockDir, infoPath: join(lockDir, "info.json") };
}

export async function getLockStatus(rootDir: string, now: Date = new Date()): Promise<LockStatus> {
  const { lockDir, infoPath } = lockPaths(rootDir);

  if (!(await pathExists(lockDir))) {
    return { exists: false, stale: false, lockDir, infoPath };
  }

  let fallbackStartedMs: number | null = null;
  try {
    const s = await stat(lockDir);
    if (s.isDirectory()) fallbackStartedMs = s.mtimeMs;
  } catch {
    fallbackStartedMs = null;
  }

  let info: LockInfo | undefined;
  if (await pathExists(infoPath)) {
    try {
      info = parseLockInfo(await readJsonFile(infoPath));
    } catch {
      // A half-written info.json falls back to the directory mtime.
      info = {};
    }
  }

  return {
    exists: true,
    stale: isStale({ startedIso: info?.started, fallbackStartedMs, nowMs: now.getTime() }),
    lockDir,
    infoPath,
    info
  };
}

export async function clearStaleLock(rootDir: string, now: Date = new Date()): Promise<boolean> {
  const status = await getLockStatus(rootDir, now);
  if (!status.exists) return false;
  if (!(await isDirectory(status.lockDir))) {
    throw new CatalogError(`Lock path exists but is not a directory: ${status.lockDir}`);
  }
  if (!status.stale) {
    throw new CatalogError(`Lock is active; refusing to clear. Use after ${STALE_LOCK_MINUTES} minutes or stop the other writer.`);
  }
  await removePath(status.lockDir);
  return true;
}

async function acquireLockDir(rootDir: string, lockDir: string): Promise<void> {
  for (let attempt = 0; attempt < 3; attempt++) {
    try {
      await mkdir(lockDir);
      return;
    } catch (err: unknown) {
      if (errnoCode(err) !== "EEXIST") {
        throw new CatalogError(`Failed to acquire catalog lock: ${describeCause(err)}`, "metadata", 1, { cause: err });
      }

      if (!(await isDirectory(lockDir))) {
        throw new CatalogError(`Lock path exists but is not a directory: ${lockDir}`);
      }

      const status = await getLockStatus(rootDir);
      if (!status.stale) {
        throw new CatalogError(
          `Another writer holds the catalog lock (started=${status.info?.started ?? "unknown"} pid=${status.info?.pid ?? "unknown"} target=${
            status.info?.target ?? "unknown"
          }).`
        );
      }

      await removePath(lockDir);
    }
  }

  throw new CatalogError(`Failed to acquire catalog lock after clearing a stale lock; another writer likely acquired it.`);
}

/** Runs `fn` while holding `<root>/.catalog.lock`; the lock directory is removed afterwards even if `fn` throws. */
export async function withWriteLock<T>(rootDir: string, meta: { target?: string }, fn: () => Promise<T>): Promise<T> {
  const { lockDir, infoPath } = lockPaths(rootDir);

  await acquireLockDir(rootDir, lockDir);

  try {
    await writeJsonFile(infoPath, {
      pid: process.pid,
      started: new Date().toISOString(),
      target: meta.target ?? null
    });
    return await fn();
  } finally {
    await removePath(lockDir);
  }
}
