import type { AnalysisResult, PageDuration, PageRange } from "./types.js";
import { EmptyRangeError, InvalidArgumentError } from "./errors.js";

export function parsePageRange(str: string): PageRange {
  const match = str.trim().match(/^(\d+)\s*-\s*(\d+)$/);
  const start = match ? parseInt(match[1], 10) : NaN;
  const end = match ? parseInt(match[2], 10) : NaN;

  if (isNaN(start) || isNaN(end) || start < 1 || start > end) {
    throw new InvalidArgumentError(
      `Invalid page range '${str}'. Use 'START-END' with 1 <= START <= END, e.g. '335-340'`
    );
  }

  return { start, end };
}

export function aggregateRange(
  rows: PageDuration[],
  bookTitle: string,
  range: PageRange
): { result: AnalysisResult; pages: PageDuration[] } {
  const perPage = new Map<number, number>();

  for (const row of rows) {
    if (row.page < range.start || row.page > range.end) {
      continue;
    }
    perPage.set(row.page, (perPage.get(row.page) ?? 0) + row.duration);
  }

  // Unvisited pages stay out of the average instead of counting as zero.
  const pages = Array.from(perPage.entries())
    .filter(([, duration]) => duration > 0)
    .map(([page, duration]) => ({ page, duration }))
    .sort((a, b) => a.page - b.page);

  if (pages.length === 0) {
    throw new EmptyRangeError(bookTitle, range.start, range.end);
  }

  const totalDuration = pages.reduce((sum, p) => sum + p.duration, 0);

  return {
    result: {
      bookTitle,
      pageRange: { ...range },
      pagesAnalyzed: pages.length,
      totalDuration,
      avgDurationPerPage: totalDuration / pages.length,
    },
    pages,
  };
}
