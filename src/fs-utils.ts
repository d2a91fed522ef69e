import type { Dirent } from "node:fs";
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { MetadataError, describeCause } from "./errors.js";
import { errnoCode } from "./type-guards.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryableRenameError(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "EBUSY" || code === "EPERM" || code === "EACCES";
}

async function retryIo<T>(op: () => Promise<T>, attempts: number): Promise<T> {
  let last: unknown;
  for (let i = 0; i < attempts; i += 1) {
    try {
      return await op();
    } catch (err: unknown) {
      last = err;
      if (!isRetryableRenameError(err) || i === attempts - 1) throw err;
      await sleep(40 * (i + 1));
    }
  }
  throw last;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const s = await stat(path);
    return s.isDirectory();
  } catch {
    return false;
  }
}

export async function ensureDir(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (err: unknown) {
    throw new MetadataError(`failed to create directory ${path}`, err);
  }
}

export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Immediate entries of a directory, ordered by name so that every scan
 * sees the same iteration order regardless of the underlying filesystem.
 * Errors from the read propagate untouched; callers decide how to wrap them.
 */
export async function listDirectory(path: string): Promise<Dirent[]> {
  const entries = await readdir(path, { withFileTypes: true });
  return entries.sort(byName);
}

export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err: unknown) {
    throw new MetadataError(`failed to read ${path}`, err);
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (err: unknown) {
    throw new MetadataError(`invalid JSON in ${path}`, err);
  }
}

export async function writeJsonFile(path: string, payload: unknown): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
  } catch (err: unknown) {
    throw new MetadataError(`failed to write ${path}`, err);
  }
}

function tempPathFor(path: string): string {
  const suffix = `${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
  return join(dirname(path), `.${basename(path)}.${suffix}.tmp`);
}

/**
 * Writes `payload` as pretty-printed JSON next to `path` and renames it into
 * place. The temp file is hidden so directory scans never pick it up, and it
 * is removed whenever the rename does not happen.
 */
export async function writeJsonFileAtomic(path: string, payload: unknown): Promise<void> {
  let contents: string;
  try {
    contents = `${JSON.stringify(payload, null, 2)}\n`;
  } catch (err: unknown) {
    throw new MetadataError(`failed to encode ${path}`, err);
  }

  const tmpPath = tempPathFor(path);
  let renamed = false;
  try {
    await writeFile(tmpPath, contents, "utf8");
    await retryIo(() => rename(tmpPath, path), 5);
    renamed = true;
  } catch (err: unknown) {
    throw new MetadataError(`failed to write ${path}`, err);
  } finally {
    if (!renamed) {
      try {
        await rm(tmpPath, { force: true });
      } catch (cleanupErr: unknown) {
        process.stderr.write(`WARN: failed to remove temp file ${tmpPath}: ${describeCause(cleanupErr)}\n`);
      }
    }
  }
}

export async function removePath(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err: unknown) {
    throw new MetadataError(`failed to remove ${path}`, err);
  }
}
