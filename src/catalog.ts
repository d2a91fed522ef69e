import type { Dirent } from "node:fs";
import { basename, join } from "node:path";

import { type ChapterNumber, chapterNumbersEqual, formatChapterNumber, isPositiveChapterNumber } from "./chapter-number.js";
import {
  CatalogError,
  ChapterNotFoundError,
  ConflictError,
  MetadataError,
  PageNotFoundError,
  SeriesNotFoundError,
  ValidationError,
  describeCause
} from "./errors.js";
import { ensureDir, isDirectory, isHiddenName, listDirectory, pathExists } from "./fs-utils.js";
import { DEFAULT_STATUS, inferChapter, inferSeries } from "./inference.js";
import { LOCK_DIR_NAME, withWriteLock } from "./lock.js";
import { type PageView, buildPageView, listPages } from "./navigation.js";
import { type Chapter, type Page, SIDECAR_FILE_NAME, type Series, loadChapter, loadSeries, saveChapter, saveSeries } from "./records.js";
import { childPath } from "./safe-path.js";
import { type SeriesQuery, searchSeries } from "./search.js";
import { createSlug } from "./slug.js";

export type CatalogEngineOptions = {
  rootDir: string;
  /** Clock for inferred timestamps and edits. */
  now?: () => Date;
  /** Receives one message per directory skipped during a scan. */
  onWarning?: (message: string) => void;
};

/** Where a directory's record comes from: its sidecar file, or inference from the directory itself. */
export type EntrySource = { kind: "sidecar"; dirPath: string; sidecarPath: string } | { kind: "inferred"; dirPath: string };

export async function locateEntry(dirPath: string): Promise<EntrySource> {
  const sidecarPath = join(dirPath, SIDECAR_FILE_NAME);
  if (await pathExists(sidecarPath)) return { kind: "sidecar", dirPath, sidecarPath };
  return { kind: "inferred", dirPath };
}

export type ChapterLookup = {
  series: Series;
  chapters: Chapter[];
  index: number;
  chapter: Chapter;
};

export type NewSeriesInput = {
  title: string;
  description?: string;
  author?: string;
  artist?: string;
  genres?: string[];
  status?: string;
};

export type SeriesPatch = Partial<NewSeriesInput>;

export type NewChapterInput = {
  number: ChapterNumber;
  title?: string;
  volume?: number;
  special?: boolean;
};

export type ChapterPatch = {
  title?: string;
  volume?: number;
  special?: boolean;
};

function defaultWarning(message: string): void {
  process.stderr.write(`WARN: ${message}\n`);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

function chapterIdFor(number: ChapterNumber): string {
  return createSlug(`chapter-${formatChapterNumber(number).replace(".", "-")}`);
}

export class CatalogEngine {
  public readonly rootDir: string;
  private readonly now: () => Date;
  private readonly warn: (message: string) => void;

  constructor(options: CatalogEngineOptions) {
    this.rootDir = options.rootDir;
    this.now = options.now ?? (() => new Date());
    this.warn = options.onWarning ?? defaultWarning;
  }

  private async listSubdirectories(dirPath: string, label: string, skip: (name: string) => boolean): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await listDirectory(dirPath);
    } catch (err: unknown) {
      throw new MetadataError(`failed to read ${label} ${dirPath}`, err);
    }
    return entries.filter((e) => e.isDirectory() && !skip(e.name)).map((e) => join(dirPath, e.name));
  }

  private async resolveSeries(source: EntrySource): Promise<Series> {
    switch (source.kind) {
      case "sidecar":
        return loadSeries(source.sidecarPath);
      case "inferred":
        return inferSeries({
          dirPath: source.dirPath,
          now: this.now(),
          countChapters: async (series) => (await this.scanChapters(series)).length
        });
    }
  }

  private async resolveChapter(seriesId: string, source: EntrySource): Promise<Chapter> {
    switch (source.kind) {
      case "sidecar":
        return loadChapter(source.sidecarPath);
      case "inferred":
        return inferChapter({ seriesId, dirPath: source.dirPath, now: this.now() });
    }
  }

  /**
   * Every series directory under the root, in directory-name order; only the
   * lock directory is left out. A series
   * whose sidecar cannot be loaded is reported and left out; only an
   * unreadable root fails the scan.
   */
  async scanSeries(): Promise<Series[]> {
    const dirs = await this.listSubdirectories(this.rootDir, "root directory", (name) => name === LOCK_DIR_NAME);
    const out: Series[] = [];
    for (const dirPath of dirs) {
      try {
        out.push(await this.resolveSeries(await locateEntry(dirPath)));
      } catch (err: unknown) {
        if (!(err instanceof CatalogError)) throw err;
        this.warn(`Skipped series directory ${basename(dirPath)}: ${describeCause(err)}`);
      }
    }
    return out;
  }

  private async findSeries(id: string): Promise<Series | null> {
    const dirPath = childPath(this.rootDir, id);
    if (dirPath) {
      const sidecarPath = join(dirPath, SIDECAR_FILE_NAME);
      if (await pathExists(sidecarPath)) return loadSeries(sidecarPath);
    }
    const all = await this.scanSeries();
    return all.find((s) => s.id === id) ?? null;
  }

  /** Direct sidecar lookup by directory name, then a full scan matching on `id`. */
  async getSeriesById(id: string): Promise<Series> {
    const series = await this.findSeries(id);
    if (!series) throw new SeriesNotFoundError(`no series with id ${id}`);
    return series;
  }

  async scanChapters(series: Series): Promise<Chapter[]> {
    const dirs = await this.listSubdirectories(series.path, "series directory", isHiddenName);
    const out: Chapter[] = [];
    for (const dirPath of dirs) {
      try {
        out.push(await this.resolveChapter(series.id, await locateEntry(dirPath)));
      } catch (err: unknown) {
        if (!(err instanceof CatalogError)) throw err;
        this.warn(`Skipped chapter directory ${basename(series.path)}/${basename(dirPath)}: ${describeCause(err)}`);
      }
    }
    return out;
  }

  async getChapter(seriesId: string, number: ChapterNumber): Promise<ChapterLookup> {
    const series = await this.getSeriesById(seriesId);
    const chapters = await this.scanChapters(series);
    const index = chapters.findIndex((c) => chapterNumbersEqual(c.number, number));
    const chapter = chapters[index];
    if (!chapter) throw new ChapterNotFoundError(`no chapter ${formatChapterNumber(number)} in series ${seriesId}`);
    return { series, chapters, index, chapter };
  }

  async getChapterDetail(seriesId: string, number: ChapterNumber): Promise<{ chapter: Chapter; pages: Page[] }> {
    const { chapter } = await this.getChapter(seriesId, number);
    const pages = await listPages(chapter);
    return { chapter, pages };
  }

  async getPage(seriesId: string, number: ChapterNumber, pageNumber: number): Promise<PageView> {
    const { chapters, index, chapter } = await this.getChapter(seriesId, number);
    const pages = await listPages(chapter);
    const page = pages.find((p) => p.number === pageNumber);
    if (!page) {
      throw new PageNotFoundError(`page ${pageNumber} not found in chapter ${formatChapterNumber(number)} of series ${seriesId}`);
    }
    return buildPageView({ chapters, index, pages, page });
  }

  async search(query: SeriesQuery): Promise<Series[]> {
    return searchSeries(await this.scanSeries(), query);
  }

  async createSeries(input: NewSeriesInput): Promise<Series> {
    if (input.title.trim().length === 0) throw new ValidationError("series title is required");
    const id = createSlug(input.title);
    const dirPath = childPath(this.rootDir, id);
    if (!dirPath) throw new ValidationError(`title does not produce a usable id: ${input.title}`);

    return withWriteLock(this.rootDir, { target: id }, async () => {
      if ((await isDirectory(dirPath)) || (await this.findSeries(id))) {
        throw new ConflictError(`series with id ${id} already exists`);
      }

      const series: Series = {
        id,
        title: input.title,
        description: input.description ?? "",
        author: input.author ?? "",
        ...(nonEmpty(input.artist) ? { artist: input.artist } : {}),
        coverImage: "",
        genres: [...new Set(input.genres ?? [])],
        status: nonEmpty(input.status) ?? DEFAULT_STATUS,
        lastUpdated: this.now().toISOString(),
        chapterCount: 0,
        path: dirPath
      };
      await ensureDir(dirPath);
      await saveSeries(series, join(dirPath, SIDECAR_FILE_NAME));
      return series;
    });
  }

  async updateSeries(id: string, patch: SeriesPatch): Promise<Series> {
    return withWriteLock(this.rootDir, { target: id }, async () => {
      const series = await this.getSeriesById(id);
      const title = nonEmpty(patch.title);
      const description = nonEmpty(patch.description);
      const author = nonEmpty(patch.author);
      const artist = nonEmpty(patch.artist);
      const status = nonEmpty(patch.status);
      if (title) series.title = title;
      if (description) series.description = description;
      if (author) series.author = author;
      if (artist) series.artist = artist;
      if (status) series.status = status;
      if (patch.genres && patch.genres.length > 0) series.genres = [...new Set(patch.genres)];
      series.lastUpdated = this.now().toISOString();
      await saveSeries(series, join(series.path, SIDECAR_FILE_NAME));
      return series;
    });
  }

  async createChapter(seriesId: string, input: NewChapterInput): Promise<Chapter> {
    if (!isPositiveChapterNumber(input.number)) {
      throw new ValidationError(`chapter number must be positive (got ${formatChapterNumber(input.number)})`);
    }

    return withWriteLock(this.rootDir, { target: seriesId }, async () => {
      const series = await this.getSeriesById(seriesId);
      const chapters = await this.scanChapters(series);
      if (chapters.some((c) => chapterNumbersEqual(c.number, input.number))) {
        throw new ConflictError(`chapter ${formatChapterNumber(input.number)} already exists in series ${seriesId}`);
      }

      const id = chapterIdFor(input.number);
      const dirPath = join(series.path, id);
      if (await isDirectory(dirPath)) throw new ConflictError(`chapter directory ${id} already exists in series ${seriesId}`);

      const chapter: Chapter = {
        id,
        seriesId: series.id,
        number: input.number,
        title: nonEmpty(input.title) ?? `Chapter ${formatChapterNumber(input.number)}`,
        releaseDate: this.now().toISOString(),
        pageCount: 0,
        ...(input.volume !== undefined ? { volume: input.volume } : {}),
        special: input.special ?? false,
        path: dirPath
      };
      await ensureDir(dirPath);
      await saveChapter(chapter, join(dirPath, SIDECAR_FILE_NAME));
      return chapter;
    });
  }

  async updateChapter(seriesId: string, number: ChapterNumber, patch: ChapterPatch): Promise<Chapter> {
    return withWriteLock(this.rootDir, { target: seriesId }, async () => {
      const { chapter } = await this.getChapter(seriesId, number);
      const title = nonEmpty(patch.title);
      if (title) chapter.title = title;
      if (patch.volume !== undefined) chapter.volume = patch.volume;
      if (patch.special !== undefined) chapter.special = patch.special;
      await saveChapter(chapter, join(chapter.path, SIDECAR_FILE_NAME));
      return chapter;
    });
  }
}
