import type { Dirent } from "node:fs";
import { basename, extname } from "node:path";

import { type ChapterNumber, chapterNumberFromFloat } from "./chapter-number.js";
import { listDirectory } from "./fs-utils.js";
import type { Chapter, Series } from "./records.js";

export const DEFAULT_DESCRIPTION = "No description available";
export const DEFAULT_STATUS = "Unknown";

const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([".jpg", ".jpeg", ".png"]);
const CHAPTER_PREFIXES = ["chapter-", "chapter", "ch"] as const;

export function isImageFileName(name: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(name).toLowerCase());
}

export function titleFromDirName(name: string): string {
  return name.replaceAll("-", " ");
}

async function listOrEmpty(dirPath: string): Promise<Dirent[]> {
  try {
    return await listDirectory(dirPath);
  } catch {
    return [];
  }
}

function isCoverCandidate(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.includes("cover") || lower === "thumbnail.jpg" || lower === "thumbnail.png";
}

export function pickCoverImage(entries: Dirent[]): string {
  const files = entries.filter((e) => !e.isDirectory());
  const named = files.find((e) => isCoverCandidate(e.name));
  if (named) return named.name;
  return files.find((e) => isImageFileName(e.name))?.name ?? "";
}

/**
 * Chapter number from a directory name such as "chapter-12", "Ch3" or
 * "chapter 1.5". One leading token is stripped; names that do not reduce
 * to a positive decimal fall back to 1, so several such directories in one
 * series share that number.
 */
export function inferChapterNumber(dirName: string): ChapterNumber {
  let rest = dirName.toLowerCase();
  for (const prefix of CHAPTER_PREFIXES) {
    if (rest.startsWith(prefix)) {
      rest = rest.slice(prefix.length);
      break;
    }
  }
  rest = rest.replace(/^[\s_-]+/, "").trimEnd();
  if (/^\d+(?:\.\d+)?$/.test(rest)) {
    const n = chapterNumberFromFloat(Number(rest));
    if (n.thousandths > 0) return n;
  }
  return chapterNumberFromFloat(1);
}

export type InferSeriesArgs = {
  dirPath: string;
  now: Date;
  /** Chapter count for the synthesized series; a rejection counts as zero chapters. */
  countChapters: (series: Series) => Promise<number>;
};

export async function inferSeries(args: InferSeriesArgs): Promise<Series> {
  const name = basename(args.dirPath);
  const entries = await listOrEmpty(args.dirPath);

  const series: Series = {
    id: name,
    title: titleFromDirName(name),
    description: DEFAULT_DESCRIPTION,
    author: "",
    coverImage: pickCoverImage(entries),
    genres: [],
    status: DEFAULT_STATUS,
    lastUpdated: args.now.toISOString(),
    chapterCount: 0,
    path: args.dirPath
  };

  try {
    series.chapterCount = await args.countChapters(series);
  } catch {
    series.chapterCount = 0;
  }
  return series;
}

export type InferChapterArgs = {
  seriesId: string;
  dirPath: string;
  now: Date;
};

export async function inferChapter(args: InferChapterArgs): Promise<Chapter> {
  const name = basename(args.dirPath);
  const entries = await listOrEmpty(args.dirPath);
  const pageCount = entries.filter((e) => !e.isDirectory() && isImageFileName(e.name)).length;

  return {
    id: name,
    seriesId: args.seriesId,
    number: inferChapterNumber(name),
    title: titleFromDirName(name),
    releaseDate: args.now.toISOString(),
    pageCount,
    special: false,
    path: args.dirPath
  };
}
