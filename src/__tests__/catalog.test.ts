import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import test from "node:test";

import { CatalogEngine, locateEntry } from "../catalog.js";
import { formatChapterNumber, parseChapterNumber } from "../chapter-number.js";
import { ChapterNotFoundError, ConflictError, MetadataError, PageNotFoundError, SeriesNotFoundError, ValidationError } from "../errors.js";
import { pathExists } from "../fs-utils.js";
import { LOCK_DIR_NAME } from "../lock.js";
import { type Series, SIDECAR_FILE_NAME, loadChapter, saveSeries } from "../records.js";

const NOW = new Date("2026-01-02T03:04:05.000Z");

async function writeJson(absPath: string, payload: unknown): Promise<void> {
  await mkdir(dirname(absPath), { recursive: true });
  await writeFile(absPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

async function touch(absPath: string): Promise<void> {
  await mkdir(dirname(absPath), { recursive: true });
  await writeFile(absPath, "x", "utf8");
}

/**
 * blue-harbor: sidecar series, chapters 1..3 inferred with 3/2/1 pages.
 * night-market: no sidecar; ch1 and ch2; a hidden directory.
 * broken: undecodable sidecar.
 */
async function setupCatalog(): Promise<{ rootDir: string; engine: CatalogEngine; warnings: string[] }> {
  const rootDir = await mkdtemp(join(tmpdir(), "catalog-engine-"));

  await writeJson(join(rootDir, "blue-harbor", SIDECAR_FILE_NAME), {
    id: "blue-harbor",
    title: "Blue Harbor",
    description: "A lighthouse keeper's log.",
    author: "Test Author",
    coverImage: "cover.jpg",
    genres: ["Drama"],
    status: "ongoing",
    lastUpdated: "2025-12-01T00:00:00.000Z",
    chapterCount: 3,
    altTitles: ["Aoi Minato"]
  });
  for (const f of ["1.jpg", "2.jpg", "3.jpg"]) await touch(join(rootDir, "blue-harbor", "chapter-1", f));
  for (const f of ["1.jpg", "2.jpg"]) await touch(join(rootDir, "blue-harbor", "chapter-2", f));
  await touch(join(rootDir, "blue-harbor", "chapter-3", "1.jpg"));

  await touch(join(rootDir, "night-market", "cover.png"));
  await touch(join(rootDir, "night-market", "ch1", "1.png"));
  await touch(join(rootDir, "night-market", "ch2", "1.png"));
  await touch(join(rootDir, "night-market", ".trash", "1.png"));

  await mkdir(join(rootDir, "broken"), { recursive: true });
  await writeFile(join(rootDir, "broken", SIDECAR_FILE_NAME), "{ not json", "utf8");

  await writeFile(join(rootDir, "notes.txt"), "not a series", "utf8");

  const warnings: string[] = [];
  const engine = new CatalogEngine({ rootDir, now: () => NOW, onWarning: (m) => warnings.push(m) });
  return { rootDir, engine, warnings };
}

test("locateEntry picks the sidecar branch only when metadata.json exists", async () => {
  const { rootDir } = await setupCatalog();
  assert.deepEqual(await locateEntry(join(rootDir, "blue-harbor")), {
    kind: "sidecar",
    dirPath: join(rootDir, "blue-harbor"),
    sidecarPath: join(rootDir, "blue-harbor", SIDECAR_FILE_NAME)
  });
  assert.deepEqual(await locateEntry(join(rootDir, "night-market")), { kind: "inferred", dirPath: join(rootDir, "night-market") });
});

test("scanSeries merges sidecar and inferred series and skips bad entries with a warning", async () => {
  const { rootDir, engine, warnings } = await setupCatalog();
  const all = await engine.scanSeries();

  assert.deepEqual(
    all.map((s) => s.id),
    ["blue-harbor", "night-market"]
  );
  assert.equal(warnings.length, 1);
  assert.ok(warnings[0]?.startsWith("Skipped series directory broken: Metadata error: invalid JSON"));

  const inferred = all[1];
  assert.equal(inferred?.title, "night market");
  assert.equal(inferred?.coverImage, "cover.png");
  assert.equal(inferred?.chapterCount, 2);
  assert.equal(inferred?.lastUpdated, NOW.toISOString());
  assert.equal(inferred?.path, join(rootDir, "night-market"));
});

test("scanSeries lists dot-prefixed series directories and leaves out only the lock directory", async () => {
  const { rootDir, engine, warnings } = await setupCatalog();
  await touch(join(rootDir, ".archive", "chapter-1", "1.jpg"));
  await mkdir(join(rootDir, LOCK_DIR_NAME));

  assert.deepEqual(
    (await engine.scanSeries()).map((s) => s.id),
    [".archive", "blue-harbor", "night-market"]
  );
  assert.equal(warnings.length, 1);

  const archived = await engine.getSeriesById(".archive");
  assert.equal(archived.path, join(rootDir, ".archive"));
  assert.equal(archived.chapterCount, 1);
  assert.deepEqual(
    (await engine.search({ query: "archive" })).map((s) => s.id),
    [".archive"]
  );
});

test("scanSeries fails only when the root cannot be read", async () => {
  const rootDir = await mkdtemp(join(tmpdir(), "catalog-engine-"));
  const engine = new CatalogEngine({ rootDir: join(rootDir, "missing"), onWarning: () => undefined });
  await assert.rejects(engine.scanSeries(), MetadataError);
});

test("getSeriesById loads a sidecar series directly", async () => {
  const { rootDir, engine } = await setupCatalog();
  const series = await engine.getSeriesById("blue-harbor");
  assert.equal(series.title, "Blue Harbor");
  assert.equal(series.path, join(rootDir, "blue-harbor"));
});

test("getSeriesById finds inferred series and ids that differ from their directory", async () => {
  const { rootDir, engine } = await setupCatalog();
  await writeJson(join(rootDir, "renamed-dir", SIDECAR_FILE_NAME), { id: "true-id", title: "True Title" });

  assert.equal((await engine.getSeriesById("night-market")).title, "night market");
  const renamed = await engine.getSeriesById("true-id");
  assert.equal(renamed.title, "True Title");
  assert.equal(renamed.path, join(rootDir, "renamed-dir"));
});

test("getSeriesById surfaces not-found and load errors", async () => {
  const { engine } = await setupCatalog();
  await assert.rejects(engine.getSeriesById("missing"), SeriesNotFoundError);
  await assert.rejects(engine.getSeriesById("../escape"), SeriesNotFoundError);
  await assert.rejects(engine.getSeriesById("broken"), MetadataError);
});

test("getSeriesById returns what saveSeries wrote, with the path recomputed", async () => {
  const { rootDir, engine } = await setupCatalog();
  const series: Series = {
    id: "tide-clock",
    title: "Tide Clock",
    description: "",
    author: "Test Author",
    artist: "Test Artist",
    coverImage: "",
    genres: ["Mystery"],
    status: "completed",
    publishedYear: 2001,
    lastUpdated: "2026-01-01T00:00:00.000Z",
    chapterCount: 0,
    path: "/somewhere/else"
  };
  await mkdir(join(rootDir, "tide-clock"));
  await saveSeries(series, join(rootDir, "tide-clock", SIDECAR_FILE_NAME));

  assert.deepEqual(await engine.getSeriesById("tide-clock"), { ...series, path: join(rootDir, "tide-clock") });
});

test("scanChapters lists non-hidden chapter directories", async () => {
  const { engine } = await setupCatalog();
  const series = await engine.getSeriesById("blue-harbor");
  const chapters = await engine.scanChapters(series);

  assert.deepEqual(
    chapters.map((c) => [formatChapterNumber(c.number), c.id, c.pageCount]),
    [
      ["1", "chapter-1", 3],
      ["2", "chapter-2", 2],
      ["3", "chapter-3", 1]
    ]
  );
  assert.ok(chapters.every((c) => c.seriesId === "blue-harbor"));

  const night = await engine.scanChapters(await engine.getSeriesById("night-market"));
  assert.deepEqual(
    night.map((c) => c.id),
    ["ch1", "ch2"]
  );
});

test("scanChapters skips a chapter whose sidecar is invalid", async () => {
  const { rootDir, engine, warnings } = await setupCatalog();
  await writeJson(join(rootDir, "blue-harbor", "chapter-4", SIDECAR_FILE_NAME), { seriesId: "blue-harbor", number: -2 });

  const chapters = await engine.scanChapters(await engine.getSeriesById("blue-harbor"));
  assert.equal(chapters.length, 3);
  assert.equal(warnings.length, 1);
  assert.ok(warnings[0]?.startsWith("Skipped chapter directory blue-harbor/chapter-4: Validation error"));
});

test("getChapterDetail returns ordered pages and the updated page count", async () => {
  const { engine } = await setupCatalog();
  const detail = await engine.getChapterDetail("blue-harbor", parseChapterNumber("1"));
  assert.equal(detail.chapter.id, "chapter-1");
  assert.equal(detail.chapter.pageCount, 3);
  assert.deepEqual(
    detail.pages.map((p) => p.number),
    [1, 2, 3]
  );
});

test("getPage offers the next chapter from the last page and the previous chapter from page 1", async () => {
  const { engine } = await setupCatalog();

  const last = await engine.getPage("blue-harbor", parseChapterNumber("2"), 2);
  assert.equal(last.totalPages, 2);
  assert.deepEqual(last.nextChapter, { thousandths: 3000 });
  assert.equal(last.prevChapter, undefined);
  assert.equal(last.nextPage, 3);
  assert.equal(last.prevPage, 1);

  const first = await engine.getPage("blue-harbor", parseChapterNumber("2"), 1);
  assert.deepEqual(first.prevChapter, { thousandths: 1000 });
  assert.equal(first.nextChapter, undefined);
  assert.equal(first.prevPage, null);
});

test("getPage surfaces chapter and page not-found errors", async () => {
  const { engine } = await setupCatalog();
  await assert.rejects(engine.getPage("blue-harbor", parseChapterNumber("9"), 1), ChapterNotFoundError);
  await assert.rejects(engine.getPage("blue-harbor", parseChapterNumber("1"), 4), PageNotFoundError);
  await assert.rejects(engine.getPage("missing", parseChapterNumber("1"), 1), SeriesNotFoundError);
});

test("search filters scanned series by text and genre", async () => {
  const { engine } = await setupCatalog();
  assert.deepEqual(
    (await engine.search({ query: "minato" })).map((s) => s.id),
    ["blue-harbor"]
  );
  assert.deepEqual(
    (await engine.search({ genre: "drama" })).map((s) => s.id),
    ["blue-harbor"]
  );
  assert.deepEqual(
    (await engine.search({})).map((s) => s.id),
    ["blue-harbor", "night-market"]
  );
});

test("createSeries writes a sidecar under the slug of the title", async () => {
  const { rootDir, engine } = await setupCatalog();
  const created = await engine.createSeries({ title: "One Piece!", author: "Test Author", genres: ["Adventure", "Adventure"] });

  assert.equal(created.id, "one-piece");
  assert.equal(created.path, join(rootDir, "one-piece"));
  assert.equal(created.status, "Unknown");
  assert.deepEqual(created.genres, ["Adventure"]);
  assert.equal(created.lastUpdated, NOW.toISOString());
  assert.deepEqual(await engine.getSeriesById("one-piece"), created);
  assert.equal(await pathExists(join(rootDir, LOCK_DIR_NAME)), false);

  await assert.rejects(engine.createSeries({ title: "one piece" }), ConflictError);
  await assert.rejects(engine.createSeries({ title: "Night Market" }), ConflictError);
  await assert.rejects(engine.createSeries({ title: "!!!" }), ValidationError);
  await assert.rejects(engine.createSeries({ title: "   " }), ValidationError);
});

test("updateSeries materializes a sidecar for an inferred series", async () => {
  const { rootDir, engine } = await setupCatalog();
  const later = new Date("2026-02-03T04:05:06.000Z");
  const laterEngine = new CatalogEngine({ rootDir, now: () => later, onWarning: () => undefined });

  const updated = await laterEngine.updateSeries("night-market", { title: "Night Market", description: "", genres: ["Slice of Life"] });
  assert.equal(updated.title, "Night Market");
  assert.equal(updated.description, "No description available");
  assert.equal(updated.lastUpdated, later.toISOString());

  assert.equal(await pathExists(join(rootDir, "night-market", SIDECAR_FILE_NAME)), true);
  const reloaded = await engine.getSeriesById("night-market");
  assert.equal(reloaded.title, "Night Market");
  assert.deepEqual(reloaded.genres, ["Slice of Life"]);
  assert.equal(reloaded.chapterCount, 2);

  await assert.rejects(engine.updateSeries("missing", { title: "x" }), SeriesNotFoundError);
});

test("createChapter adds a fractional chapter that is found by exact number", async () => {
  const { rootDir, engine } = await setupCatalog();
  const created = await engine.createChapter("blue-harbor", { number: parseChapterNumber("1.5"), volume: 1, special: true });

  assert.equal(created.id, "chapter-1-5");
  assert.equal(created.title, "Chapter 1.5");
  assert.equal(created.path, join(rootDir, "blue-harbor", "chapter-1-5"));

  const raw: unknown = JSON.parse(await readFile(join(created.path, SIDECAR_FILE_NAME), "utf8"));
  assert.deepEqual(raw, {
    id: "chapter-1-5",
    seriesId: "blue-harbor",
    number: 1.5,
    title: "Chapter 1.5",
    releaseDate: NOW.toISOString(),
    pageCount: 0,
    volume: 1,
    special: true
  });

  const lookup = await engine.getChapter("blue-harbor", parseChapterNumber("1.50"));
  assert.equal(lookup.chapter.id, "chapter-1-5");
  assert.equal(lookup.index, 1);

  await assert.rejects(engine.createChapter("blue-harbor", { number: parseChapterNumber("2") }), ConflictError);
  await assert.rejects(engine.createChapter("blue-harbor", { number: parseChapterNumber("0") }), ValidationError);
  await assert.rejects(engine.createChapter("missing", { number: parseChapterNumber("1") }), SeriesNotFoundError);
});

test("updateChapter writes title, volume and special flag to the chapter sidecar", async () => {
  const { rootDir, engine } = await setupCatalog();
  const updated = await engine.updateChapter("blue-harbor", parseChapterNumber("2"), { title: "The Storm", volume: 1, special: true });
  assert.equal(updated.title, "The Storm");

  const reloaded = await loadChapter(join(rootDir, "blue-harbor", "chapter-2", SIDECAR_FILE_NAME));
  assert.equal(reloaded.title, "The Storm");
  assert.equal(reloaded.volume, 1);
  assert.equal(reloaded.special, true);
  assert.equal(reloaded.number.thousandths, 2000);

  const untouched = await engine.updateChapter("blue-harbor", parseChapterNumber("2"), { title: "" });
  assert.equal(untouched.title, "The Storm");
  assert.equal(untouched.special, true);

  await assert.rejects(engine.updateChapter("blue-harbor", parseChapterNumber("7"), { title: "x" }), ChapterNotFoundError);
});
