import { basename, dirname } from "node:path";

import {
  type ChapterNumber,
  chapterNumberFromFloat,
  chapterNumberToFloat,
  formatChapterNumber,
  isPositiveChapterNumber
} from "./chapter-number.js";
import { MetadataError, ValidationError } from "./errors.js";
import { readJsonFile, writeJsonFileAtomic } from "./fs-utils.js";
import { isPlainObject } from "./type-guards.js";

export const SIDECAR_FILE_NAME = "metadata.json";

const EPOCH_ISO = new Date(0).toISOString();

export type Series = {
  id: string;
  title: string;
  description: string;
  author: string;
  artist?: string;
  /** File name of the cover image inside the series directory; empty when none. */
  coverImage: string;
  genres: string[];
  status: string;
  publishedYear?: number;
  lastUpdated: string;
  /** Derived from a chapter scan; not authoritative. */
  chapterCount: number;
  altTitles?: string[];
  /** Owning directory. Recomputed from the sidecar location, never serialized. */
  path: string;
};

export type Chapter = {
  id: string;
  seriesId: string;
  number: ChapterNumber;
  title: string;
  releaseDate: string;
  /** Authoritative only after the chapter's pages have been listed. */
  pageCount: number;
  volume?: number;
  special: boolean;
  path: string;
};

export type Page = {
  number: number;
  chapterId: string;
  seriesId: string;
  /** Absolute path of the image file; internal only. */
  imagePath: string;
  width?: number;
  height?: number;
  fileSize?: number;
  mimeType?: string;
};

function requireTimestamp(value: string, field: string): void {
  if (!Number.isFinite(Date.parse(value))) throw new ValidationError(`${field} must be an ISO-8601 timestamp (got ${value})`);
}

function requireInteger(value: number | undefined, field: string): void {
  if (value !== undefined && !Number.isSafeInteger(value)) throw new ValidationError(`${field} must be an integer (got ${value})`);
}

/** Everything `loadSeries` would reject is rejected here too, so a saved sidecar always loads back. */
export function validateSeries(series: Series): void {
  if (series.id.trim().length === 0) throw new ValidationError("series id is required");
  if (series.title.trim().length === 0) throw new ValidationError("series title is required");
  requireTimestamp(series.lastUpdated, "lastUpdated");
  requireInteger(series.chapterCount, "chapterCount");
  requireInteger(series.publishedYear, "publishedYear");
}

export function validateChapter(chapter: Chapter): void {
  if (chapter.seriesId.trim().length === 0) throw new ValidationError("series id is required");
  if (!isPositiveChapterNumber(chapter.number)) {
    throw new ValidationError(`chapter number must be positive (got ${formatChapterNumber(chapter.number)})`);
  }
  requireTimestamp(chapter.releaseDate, "releaseDate");
  requireInteger(chapter.pageCount, "pageCount");
  requireInteger(chapter.volume, "volume");
}

export function validatePage(page: Page): void {
  if (!Number.isInteger(page.number) || page.number <= 0) throw new ValidationError(`page number must be a positive integer (got ${page.number})`);
  if (page.chapterId.length === 0) throw new ValidationError("chapter id is required");
  if (page.imagePath.length === 0) throw new ValidationError("image path is required");
}

function requireString(obj: Record<string, unknown>, field: string, file: string): string {
  const v = obj[field];
  if (typeof v !== "string") throw new MetadataError(`invalid ${file}: '${field}' must be a string`);
  return v;
}

function optionalString(obj: Record<string, unknown>, field: string, file: string): string | undefined {
  const v = obj[field];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new MetadataError(`invalid ${file}: '${field}' must be a string when present`);
  return v;
}

function optionalInt(obj: Record<string, unknown>, field: string, file: string): number | undefined {
  const v = obj[field];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isInteger(v)) throw new MetadataError(`invalid ${file}: '${field}' must be an int when present`);
  return v;
}

function optionalBool(obj: Record<string, unknown>, field: string, file: string): boolean | undefined {
  const v = obj[field];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "boolean") throw new MetadataError(`invalid ${file}: '${field}' must be a boolean when present`);
  return v;
}

function optionalStringArray(obj: Record<string, unknown>, field: string, file: string): string[] | undefined {
  const v = obj[field];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v)) throw new MetadataError(`invalid ${file}: '${field}' must be a string array when present`);
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== "string") throw new MetadataError(`invalid ${file}: '${field}' must be a string array when present`);
    out.push(item);
  }
  return out;
}

function optionalTimestamp(obj: Record<string, unknown>, field: string, file: string): string {
  const raw = optionalString(obj, field, file);
  if (raw === undefined || raw.length === 0) return EPOCH_ISO;
  if (!Number.isFinite(Date.parse(raw))) throw new MetadataError(`invalid ${file}: '${field}' must be an ISO-8601 timestamp`);
  return raw;
}

function uniqueInOrder(values: string[]): string[] {
  return [...new Set(values)];
}

export function decodeSeries(raw: unknown, file: string): Omit<Series, "path"> {
  if (!isPlainObject(raw)) throw new MetadataError(`invalid ${file}: must be a JSON object`);
  const artist = optionalString(raw, "artist", file);
  const publishedYear = optionalInt(raw, "publishedYear", file);
  const altTitles = optionalStringArray(raw, "altTitles", file);
  return {
    id: requireString(raw, "id", file),
    title: requireString(raw, "title", file),
    description: optionalString(raw, "description", file) ?? "",
    author: optionalString(raw, "author", file) ?? "",
    ...(artist ? { artist } : {}),
    coverImage: optionalString(raw, "coverImage", file) ?? "",
    genres: uniqueInOrder(optionalStringArray(raw, "genres", file) ?? []),
    status: optionalString(raw, "status", file) ?? "",
    ...(publishedYear !== undefined && publishedYear !== 0 ? { publishedYear } : {}),
    lastUpdated: optionalTimestamp(raw, "lastUpdated", file),
    chapterCount: optionalInt(raw, "chapterCount", file) ?? 0,
    ...(altTitles && altTitles.length > 0 ? { altTitles } : {})
  };
}

/** Sidecar object with a fixed key order; `path` is never written. */
export function encodeSeries(series: Series): Record<string, unknown> {
  const out: Record<string, unknown> = {
    id: series.id,
    title: series.title,
    description: series.description,
    author: series.author
  };
  if (series.artist) out.artist = series.artist;
  out.coverImage = series.coverImage;
  out.genres = uniqueInOrder(series.genres);
  out.status = series.status;
  if (series.publishedYear !== undefined && series.publishedYear !== 0) out.publishedYear = series.publishedYear;
  out.lastUpdated = series.lastUpdated;
  out.chapterCount = series.chapterCount;
  if (series.altTitles && series.altTitles.length > 0) out.altTitles = series.altTitles;
  return out;
}

export function decodeChapter(raw: unknown, file: string): Omit<Chapter, "path"> {
  if (!isPlainObject(raw)) throw new MetadataError(`invalid ${file}: must be a JSON object`);
  const number = raw.number;
  if (typeof number !== "number" || !Number.isFinite(number)) throw new MetadataError(`invalid ${file}: 'number' must be a number`);
  const volume = optionalInt(raw, "volume", file);
  return {
    id: optionalString(raw, "id", file) ?? "",
    seriesId: requireString(raw, "seriesId", file),
    number: chapterNumberFromFloat(number),
    title: optionalString(raw, "title", file) ?? "",
    releaseDate: optionalTimestamp(raw, "releaseDate", file),
    pageCount: optionalInt(raw, "pageCount", file) ?? 0,
    ...(volume !== undefined && volume !== 0 ? { volume } : {}),
    special: optionalBool(raw, "special", file) ?? false
  };
}

export function encodeChapter(chapter: Chapter): Record<string, unknown> {
  const out: Record<string, unknown> = {
    id: chapter.id,
    seriesId: chapter.seriesId,
    number: chapterNumberToFloat(chapter.number),
    title: chapter.title,
    releaseDate: chapter.releaseDate,
    pageCount: chapter.pageCount
  };
  if (chapter.volume !== undefined && chapter.volume !== 0) out.volume = chapter.volume;
  if (chapter.special) out.special = true;
  return out;
}

/** Public view of a page; the absolute image path stays internal. */
export function encodePage(page: Page): Record<string, unknown> {
  const out: Record<string, unknown> = {
    number: page.number,
    chapterId: page.chapterId,
    seriesId: page.seriesId
  };
  if (page.width !== undefined) out.width = page.width;
  if (page.height !== undefined) out.height = page.height;
  if (page.fileSize !== undefined) out.fileSize = page.fileSize;
  if (page.mimeType !== undefined) out.mimeType = page.mimeType;
  return out;
}

export async function loadSeries(sidecarPath: string): Promise<Series> {
  const raw = await readJsonFile(sidecarPath);
  const series: Series = { ...decodeSeries(raw, sidecarPath), path: dirname(sidecarPath) };
  validateSeries(series);
  return series;
}

export async function saveSeries(series: Series, sidecarPath: string): Promise<void> {
  validateSeries(series);
  await writeJsonFileAtomic(sidecarPath, encodeSeries(series));
}

export async function loadChapter(sidecarPath: string): Promise<Chapter> {
  const raw = await readJsonFile(sidecarPath);
  const dir = dirname(sidecarPath);
  const decoded = decodeChapter(raw, sidecarPath);
  const chapter: Chapter = { ...decoded, id: decoded.id.length > 0 ? decoded.id : basename(dir), path: dir };
  validateChapter(chapter);
  return chapter;
}

export async function saveChapter(chapter: Chapter, sidecarPath: string): Promise<void> {
  validateChapter(chapter);
  await writeJsonFileAtomic(sidecarPath, encodeChapter(chapter));
}
