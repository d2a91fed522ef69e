import type { Series } from "./records.js";

export type SeriesQuery = {
  query?: string;
  genre?: string;
};

function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

function matchesQuery(series: Series, query: string): boolean {
  if (containsIgnoreCase(series.title, query) || containsIgnoreCase(series.description, query)) return true;
  return (series.altTitles ?? []).some((alt) => containsIgnoreCase(alt, query));
}

function matchesGenre(series: Series, genre: string): boolean {
  const wanted = genre.toLowerCase();
  return series.genres.some((g) => g.toLowerCase() === wanted);
}

/** Filters in input order; empty criteria match everything. */
export function searchSeries(series: readonly Series[], q: SeriesQuery): Series[] {
  const query = q.query?.trim() ?? "";
  const genre = q.genre?.trim() ?? "";
  return series.filter((s) => (query.length === 0 || matchesQuery(s, query)) && (genre.length === 0 || matchesGenre(s, genre)));
}
