import { chapterNumberToFloat } from "./chapter-number.js";
import type { PageView } from "./navigation.js";
import { encodePage } from "./records.js";

export type CliOk = {
  ok: true;
  command: string;
  data: Record<string, unknown>;
  warnings?: string[];
};

export type CliErr = {
  ok: false;
  command: string;
  error: { message: string; code?: string };
};

export function okJson(command: string, data: Record<string, unknown> = {}, warnings: string[] = []): CliOk {
  return warnings.length > 0 ? { ok: true, command, data, warnings } : { ok: true, command, data };
}

export function errJson(command: string, message: string, code?: string): CliErr {
  return { ok: false, command, error: { message, code } };
}

export function printJson(payload: CliOk | CliErr, write: (text: string) => void = (text) => process.stdout.write(text)): void {
  write(`${JSON.stringify(payload)}\n`);
}

export function pageViewJson(view: PageView): Record<string, unknown> {
  const out: Record<string, unknown> = {
    seriesId: view.seriesId,
    chapterId: view.chapterId,
    chapterNumber: chapterNumberToFloat(view.chapterNumber),
    pageNumber: view.pageNumber,
    totalPages: view.totalPages,
    page: encodePage(view.page),
    nextPage: view.nextPage,
    prevPage: view.prevPage
  };
  if (view.nextChapter) out.nextChapter = chapterNumberToFloat(view.nextChapter);
  if (view.prevChapter) out.prevChapter = chapterNumberToFloat(view.prevChapter);
  return out;
}
