import { CatalogError } from "./errors.js";

export const CHAPTER_NUMBER_SCALE = 1000;

/**
 * Fixed-point chapter key: an integer count of thousandths, so `1.5` and
 * `1.50` compare equal and `1.1` never drifts by a float epsilon.
 */
export type ChapterNumber = {
  readonly thousandths: number;
};

export function chapterNumberFromFloat(value: number): ChapterNumber {
  return { thousandths: Math.round(value * CHAPTER_NUMBER_SCALE) };
}

export function chapterNumberToFloat(n: ChapterNumber): number {
  return n.thousandths / CHAPTER_NUMBER_SCALE;
}

export function chapterNumbersEqual(a: ChapterNumber, b: ChapterNumber): boolean {
  return a.thousandths === b.thousandths;
}

export function isPositiveChapterNumber(n: ChapterNumber): boolean {
  return Number.isSafeInteger(n.thousandths) && n.thousandths > 0;
}

/** Shortest decimal form: 3000 -> "3", 1500 -> "1.5", 1250 -> "1.25". */
export function formatChapterNumber(n: ChapterNumber): string {
  const sign = n.thousandths < 0 ? "-" : "";
  const abs = Math.abs(n.thousandths);
  const whole = Math.floor(abs / CHAPTER_NUMBER_SCALE);
  const frac = abs % CHAPTER_NUMBER_SCALE;
  if (frac === 0) return `${sign}${whole}`;
  const digits = String(frac).padStart(3, "0").replace(/0+$/, "");
  return `${sign}${whole}.${digits}`;
}

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Parses user input such as "12" or "1.5"; rejects anything that is not a finite decimal. */
export function parseChapterNumber(input: string): ChapterNumber {
  const trimmed = input.trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new CatalogError(`Invalid chapter number: ${input}`);
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new CatalogError(`Invalid chapter number: ${input}`);
  }
  return chapterNumberFromFloat(value);
}
