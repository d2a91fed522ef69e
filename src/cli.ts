#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { CatalogEngine } from "./catalog.js";
import { formatChapterNumber, parseChapterNumber } from "./chapter-number.js";
import { resolveCatalogRoot } from "./config.js";
import { CatalogError } from "./errors.js";
import { clearStaleLock, getLockStatus } from "./lock.js";
import { loadPageImageMetadata } from "./navigation.js";
import { errJson, okJson, pageViewJson, printJson } from "./output.js";
import { type Series, encodeChapter, encodePage, encodeSeries } from "./records.js";

type GlobalOpts = {
  json?: boolean;
  root?: string;
};

type SeriesOpts = {
  title?: string;
  description?: string;
  author?: string;
  artist?: string;
  genre?: string[];
  status?: string;
};

type Session = {
  engine: CatalogEngine;
  json: boolean;
  warnings: string[];
};

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
};

const processIo: CliIo = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  }
};

function detectCommandName(argv: string[]): string {
  const words: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    if (token === "--") break;
    if (token === "--root") {
      i += 1;
      continue;
    }
    if (token.startsWith("-")) continue;
    words.push(token);
    if (words.length === 2 || !["series", "chapter", "lock"].includes(words[0] ?? "")) break;
  }
  return words.length > 0 ? words.join(" ") : "unknown";
}

function isJsonMode(argv: string[]): boolean {
  return argv.includes("--json");
}

export function parseIntArg(value: string, label: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) throw new CatalogError(`Invalid ${label}: ${value}`);
  const n = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(n)) throw new CatalogError(`Invalid ${label}: ${value}`);
  return n;
}

export function parsePositiveIntArg(value: string, label: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) throw new CatalogError(`Invalid ${label}: ${value}`);
  const n = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(n) || n <= 0) throw new CatalogError(`Invalid ${label}: ${value}`);
  return n;
}

function seriesLine(series: Series): string {
  return `${series.id}\t${series.title}\t${series.status}\tchapters=${series.chapterCount}`;
}

function finish(io: CliIo, session: Session, command: string, data: Record<string, unknown>, lines: () => string[]): void {
  if (session.json) {
    printJson(okJson(command, data, session.warnings), io.out);
    return;
  }
  for (const w of session.warnings) io.err(`WARN: ${w}\n`);
  for (const line of lines()) io.out(`${line}\n`);
}

function addSeriesFieldOptions(cmd: Command): Command {
  return cmd
    .option("--description <text>", "Series description.")
    .option("--author <name>", "Author.")
    .option("--artist <name>", "Artist.")
    .option("--genre <name...>", "Genre tags (repeatable).")
    .option("--status <label>", "Lifecycle label, e.g. ongoing or completed.");
}

function buildProgram(argv: string[], io: CliIo): Command {
  const jsonMode = isJsonMode(argv);

  const program = new Command();
  program.name("catalog").description("Browse and edit a directory-backed series/chapter/page catalog.");
  program.option("--json", "Emit machine-readable JSON (single object).");
  program.option("--root <dir>", "Catalog root directory (defaults to $CATALOG_ROOT, then the working directory).");

  program.configureOutput({
    writeOut: (str) => io.out(str),
    writeErr: (str) => {
      if (!jsonMode) io.err(str);
    }
  });

  program.showHelpAfterError(false);
  program.showSuggestionAfterError(false);
  program.exitOverride();

  async function openSession(): Promise<Session> {
    const opts = program.opts<GlobalOpts>();
    const rootDir = await resolveCatalogRoot({ cwd: process.cwd(), rootOverride: opts.root, env: process.env });
    const warnings: string[] = [];
    const engine = new CatalogEngine({ rootDir, onWarning: (message) => warnings.push(message) });
    return { engine, json: Boolean(opts.json), warnings };
  }

  const series = program.command("series").description("List, inspect, search and edit series.");

  series
    .command("list")
    .description("List every series under the root.")
    .action(async () => {
      const session = await openSession();
      const all = await session.engine.scanSeries();
      finish(io, session, "series list", { series: all.map(encodeSeries) }, () => all.map(seriesLine));
    });

  series
    .command("show")
    .description("Show one series.")
    .argument("<id>", "Series id.")
    .action(async (id: string) => {
      const session = await openSession();
      const found = await session.engine.getSeriesById(id);
      const data = encodeSeries(found);
      finish(io, session, "series show", { series: data }, () => [JSON.stringify(data, null, 2)]);
    });

  series
    .command("search")
    .description("Search titles, descriptions and alternate titles; optionally filter by genre.")
    .option("--query <text>", "Case-insensitive substring.")
    .option("--genre <name>", "Exact genre, case-insensitive.")
    .action(async (localOpts: { query?: string; genre?: string }) => {
      const session = await openSession();
      const results = await session.engine.search({ query: localOpts.query, genre: localOpts.genre });
      finish(io, session, "series search", { series: results.map(encodeSeries) }, () => results.map(seriesLine));
    });

  addSeriesFieldOptions(
    series.command("add").description("Create a series; its id is the slug of the title.").requiredOption("--title <title>", "Series title.")
  ).action(async (localOpts: SeriesOpts & { title: string }) => {
    const session = await openSession();
    const created = await session.engine.createSeries({
      title: localOpts.title,
      description: localOpts.description,
      author: localOpts.author,
      artist: localOpts.artist,
      genres: localOpts.genre,
      status: localOpts.status
    });
    finish(io, session, "series add", { series: encodeSeries(created) }, () => [`Created series ${created.id}.`]);
  });

  addSeriesFieldOptions(
    series.command("update").description("Update a series; empty values leave fields unchanged.").argument("<id>", "Series id.").option("--title <title>", "New title.")
  ).action(async (id: string, localOpts: SeriesOpts) => {
    const session = await openSession();
    const updated = await session.engine.updateSeries(id, {
      title: localOpts.title,
      description: localOpts.description,
      author: localOpts.author,
      artist: localOpts.artist,
      genres: localOpts.genre,
      status: localOpts.status
    });
    finish(io, session, "series update", { series: encodeSeries(updated) }, () => [`Updated series ${updated.id}.`]);
  });

  program
    .command("chapters")
    .description("List the chapters of a series in scan order.")
    .argument("<seriesId>", "Series id.")
    .action(async (seriesId: string) => {
      const session = await openSession();
      const found = await session.engine.getSeriesById(seriesId);
      const chapters = await session.engine.scanChapters(found);
      finish(io, session, "chapters", { seriesId: found.id, chapters: chapters.map(encodeChapter) }, () =>
        chapters.map((c) => `${formatChapterNumber(c.number)}\t${c.id}\t${c.title}\tpages=${c.pageCount}`)
      );
    });

  const chapter = program.command("chapter").description("Inspect and edit chapters.");

  chapter
    .command("show")
    .description("Show a chapter and its ordered pages.")
    .argument("<seriesId>", "Series id.")
    .argument("<number>", "Chapter number, e.g. 3 or 1.5.")
    .action(async (seriesId: string, numberRaw: string) => {
      const number = parseChapterNumber(numberRaw);
      const session = await openSession();
      const detail = await session.engine.getChapterDetail(seriesId, number);
      finish(io, session, "chapter show", { chapter: encodeChapter(detail.chapter), pages: detail.pages.map(encodePage) }, () => [
        `Chapter ${formatChapterNumber(detail.chapter.number)}: ${detail.chapter.title}`,
        `Pages (${detail.chapter.pageCount}): ${detail.pages.map((p) => p.number).join(", ")}`
      ]);
    });

  chapter
    .command("add")
    .description("Create a chapter directory with its metadata.json.")
    .argument("<seriesId>", "Series id.")
    .requiredOption("--number <n>", "Chapter number, e.g. 3 or 1.5.")
    .option("--title <title>", "Chapter title.")
    .option("--volume <n>", "Volume number.")
    .option("--special", "Mark as a special chapter.")
    .action(async (seriesId: string, localOpts: { number: string; title?: string; volume?: string; special?: boolean }) => {
      const number = parseChapterNumber(localOpts.number);
      const volume = localOpts.volume !== undefined ? parsePositiveIntArg(localOpts.volume, "volume") : undefined;
      const session = await openSession();
      const created = await session.engine.createChapter(seriesId, { number, title: localOpts.title, volume, special: localOpts.special });
      finish(io, session, "chapter add", { chapter: encodeChapter(created) }, () => [`Created chapter ${created.id} in ${seriesId}.`]);
    });

  chapter
    .command("update")
    .description("Update a chapter's title, volume or special flag.")
    .argument("<seriesId>", "Series id.")
    .argument("<number>", "Chapter number.")
    .option("--title <title>", "New title.")
    .option("--volume <n>", "Volume number.")
    .option("--special", "Mark as a special chapter.")
    .option("--no-special", "Clear the special flag.")
    .action(async (seriesId: string, numberRaw: string, localOpts: { title?: string; volume?: string; special?: boolean }) => {
      const number = parseChapterNumber(numberRaw);
      const volume = localOpts.volume !== undefined ? parsePositiveIntArg(localOpts.volume, "volume") : undefined;
      const session = await openSession();
      const updated = await session.engine.updateChapter(seriesId, number, { title: localOpts.title, volume, special: localOpts.special });
      finish(io, session, "chapter update", { chapter: encodeChapter(updated) }, () => [`Updated chapter ${updated.id} in ${seriesId}.`]);
    });

  program
    .command("page")
    .description("Resolve one page with its page and chapter neighbours.")
    .argument("<seriesId>", "Series id.")
    .argument("<number>", "Chapter number.")
    .argument("<page>", "Page number.")
    .option("--image-info", "Read image size, dimensions and MIME type.")
    .action(async (seriesId: string, numberRaw: string, pageRaw: string, localOpts: { imageInfo?: boolean }) => {
      const number = parseChapterNumber(numberRaw);
      const pageNumber = parseIntArg(pageRaw, "page number");
      const session = await openSession();
      const view = await session.engine.getPage(seriesId, number, pageNumber);
      if (localOpts.imageInfo) view.page = await loadPageImageMetadata(view.page);
      const data = pageViewJson(view);
      finish(io, session, "page", data, () => {
        const lines = [
          `Page ${view.pageNumber}/${view.totalPages} of ${view.seriesId} chapter ${formatChapterNumber(view.chapterNumber)}`,
          `Next page: ${view.nextPage}`,
          `Prev page: ${view.prevPage ?? "none"}`
        ];
        if (view.nextChapter) lines.push(`Next chapter: ${formatChapterNumber(view.nextChapter)}`);
        if (view.prevChapter) lines.push(`Prev chapter: ${formatChapterNumber(view.prevChapter)}`);
        if (view.page.width !== undefined && view.page.height !== undefined) {
          lines.push(`Image: ${view.page.width}x${view.page.height} ${view.page.mimeType ?? ""} ${view.page.fileSize ?? 0} bytes`.trimEnd());
        }
        return lines;
      });
    });

  const lock = program.command("lock").description("Manage the catalog write lock (.catalog.lock).");

  lock
    .command("status")
    .description("Show lock status.")
    .action(async () => {
      const session = await openSession();
      const status = await getLockStatus(session.engine.rootDir);
      finish(io, session, "lock status", { rootDir: session.engine.rootDir, ...status }, () => {
        if (!status.exists) return ["No lock."];
        return [
          `Lock present${status.stale ? " (stale)" : ""}: started=${status.info?.started ?? "unknown"} pid=${status.info?.pid ?? "unknown"} target=${
            status.info?.target ?? "unknown"
          }`
        ];
      });
    });

  lock
    .command("clear")
    .description("Clear a stale lock (or fail if the lock is active).")
    .action(async () => {
      const session = await openSession();
      const cleared = await clearStaleLock(session.engine.rootDir);
      finish(io, session, "lock clear", { rootDir: session.engine.rootDir, cleared }, () => [cleared ? "Cleared stale lock." : "No lock to clear."]);
    });

  return program;
}

export async function main(argv: string[] = process.argv.slice(2), io: CliIo = processIo): Promise<number> {
  const jsonMode = isJsonMode(argv);
  const program = buildProgram(argv, io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return Number(process.exitCode ?? 0);
  } catch (err: unknown) {
    const command = detectCommandName(argv);
    if (err instanceof CatalogError) {
      if (jsonMode) {
        printJson(errJson(command, err.message, err.kind), io.out);
      } else {
        io.err(`${err.message}\n`);
      }
      return err.exitCode;
    }

    if (err instanceof CommanderError) {
      if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
        return 0;
      }
      // Outside JSON mode commander has already written the message through writeErr.
      if (jsonMode) printJson(errJson(command, err.message, err.code), io.out);
      return err.exitCode;
    }

    const message = err instanceof Error ? err.message : String(err);
    if (jsonMode) {
      printJson(errJson(command, message), io.out);
    } else {
      io.err(`${message}\n`);
    }
    return 1;
  }
}

const entryPath = process.argv[1] ? resolve(process.argv[1]) : null;
if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.stack ?? err.message : String(err);
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}
