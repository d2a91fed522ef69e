import type { Dirent } from "node:fs";
import { stat } from "node:fs/promises";
import { extname, join } from "node:path";
import sharp from "sharp";

import { type ChapterNumber, formatChapterNumber } from "./chapter-number.js";
import { ChapterNotFoundError, MetadataError, describeCause } from "./errors.js";
import { isHiddenName, listDirectory, pathExists } from "./fs-utils.js";
import { type Chapter, type Page, SIDECAR_FILE_NAME, validatePage } from "./records.js";

export function isMetadataFileName(name: string): boolean {
  return name === SIDECAR_FILE_NAME || extname(name).toLowerCase() === ".json";
}

/** Page number from a file stem ("007.jpg" -> 7); null when the stem is not a positive integer. */
export function parsePageNumber(fileName: string): number | null {
  const ext = extname(fileName);
  const stem = ext.length > 0 ? fileName.slice(0, -ext.length) : fileName;
  if (!/^\d+$/.test(stem)) return null;
  const n = Number.parseInt(stem, 10);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

/**
 * Pages of a chapter, ascending by number. Files whose stem does not parse
 * are numbered by discovery order (`count so far + 1`); ties keep discovery
 * order. Also sets `chapter.pageCount`.
 */
export async function listPages(chapter: Chapter): Promise<Page[]> {
  let entries: Dirent[];
  try {
    entries = await listDirectory(chapter.path);
  } catch (err: unknown) {
    throw new ChapterNotFoundError(
      `cannot read pages for chapter ${formatChapterNumber(chapter.number)} of series ${chapter.seriesId}: ${describeCause(err)}`
    );
  }

  const pages: Page[] = [];
  for (const entry of entries) {
    if (entry.isDirectory() || isHiddenName(entry.name) || isMetadataFileName(entry.name)) continue;
    const page: Page = {
      number: parsePageNumber(entry.name) ?? pages.length + 1,
      chapterId: chapter.id,
      seriesId: chapter.seriesId,
      imagePath: join(chapter.path, entry.name)
    };
    validatePage(page);
    pages.push(page);
  }

  pages.sort((a, b) => a.number - b.number);
  chapter.pageCount = pages.length;
  return pages;
}

export function nextPageNumber(page: Page): number {
  return page.number + 1;
}

export function prevPageNumber(page: Page): number | null {
  return page.number <= 1 ? null : page.number - 1;
}

export type ChapterAdjacency = {
  nextChapter?: ChapterNumber;
  prevChapter?: ChapterNumber;
};

/**
 * Chapter neighbours by position in the scanned list, not by numeric order.
 * The next chapter is offered from the last page, the previous one from page 1.
 */
export function resolveChapterAdjacency(args: {
  chapters: readonly Chapter[];
  index: number;
  pageNumber: number;
  totalPages: number;
}): ChapterAdjacency {
  const out: ChapterAdjacency = {};
  const next = args.chapters[args.index + 1];
  if (args.pageNumber >= args.totalPages && next) out.nextChapter = next.number;
  const prev = args.index > 0 ? args.chapters[args.index - 1] : undefined;
  if (args.pageNumber === 1 && prev) out.prevChapter = prev.number;
  return out;
}

export type PageView = {
  seriesId: string;
  chapterId: string;
  chapterNumber: ChapterNumber;
  pageNumber: number;
  totalPages: number;
  page: Page;
  nextPage: number;
  prevPage: number | null;
} & ChapterAdjacency;

export function buildPageView(args: { chapters: readonly Chapter[]; index: number; pages: readonly Page[]; page: Page }): PageView {
  const chapter = args.chapters[args.index];
  if (!chapter) throw new ChapterNotFoundError(`no chapter at scan index ${args.index}`);
  return {
    seriesId: chapter.seriesId,
    chapterId: chapter.id,
    chapterNumber: chapter.number,
    pageNumber: args.page.number,
    totalPages: args.pages.length,
    page: args.page,
    nextPage: nextPageNumber(args.page),
    prevPage: prevPageNumber(args.page),
    ...resolveChapterAdjacency({
      chapters: args.chapters,
      index: args.index,
      pageNumber: args.page.number,
      totalPages: args.pages.length
    })
  };
}

export async function pageImageExists(page: Page): Promise<boolean> {
  return pathExists(page.imagePath);
}

/** Returns a copy of `page` with size, dimensions and MIME type read from the image file. */
export async function loadPageImageMetadata(page: Page): Promise<Page> {
  let fileSize: number;
  try {
    fileSize = (await stat(page.imagePath)).size;
  } catch (err: unknown) {
    throw new MetadataError(`failed to stat page image ${page.imagePath}`, err);
  }

  let meta: sharp.Metadata;
  try {
    meta = await sharp(page.imagePath).metadata();
  } catch (err: unknown) {
    throw new MetadataError(`failed to decode page image ${page.imagePath}`, err);
  }

  return {
    ...page,
    fileSize,
    ...(meta.width !== undefined ? { width: meta.width } : {}),
    ...(meta.height !== undefined ? { height: meta.height } : {}),
    ...(meta.format !== undefined ? { mimeType: `image/${meta.format}` } : {})
  };
}
