import { isAbsolute, join, resolve, sep } from "node:path";

import { CatalogError } from "./errors.js";

export function rejectPathTraversalInput(inputPath: string, label: string): void {
  const normalized = inputPath.replaceAll("\\", "/");
  const parts = normalized.split("/").filter(Boolean);
  if (parts.includes("..")) {
    throw new CatalogError(`${label} must not contain '..' path traversal segments.`);
  }
}

/** True when `name` can be joined under a directory as exactly one child entry. */
export function isSingleSegment(name: string): boolean {
  if (name.length === 0 || name === "." || name === "..") return false;
  if (isAbsolute(name)) return false;
  return !name.includes("/") && !name.includes("\\") && !name.includes("\0");
}

export function isInsideRoot(rootAbs: string, absolutePath: string): boolean {
  const root = rootAbs.endsWith(sep) ? rootAbs : `${rootAbs}${sep}`;
  return absolutePath === rootAbs || absolutePath.startsWith(root);
}

/**
 * Joins one child segment under `rootAbs`. Returns null for names that are
 * not a single segment or that would resolve outside the root.
 */
export function childPath(rootAbs: string, name: string): string | null {
  if (!isSingleSegment(name)) return null;
  const abs = resolve(join(rootAbs, name));
  return isInsideRoot(resolve(rootAbs), abs) ? abs : null;
}
