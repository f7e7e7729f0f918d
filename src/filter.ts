import type { PageEvent, RawEvent } from "./types.js";
import { AmbiguousTitleError, NoMatchError, UnparseablePageError } from "./errors.js";

// zathura puts "[12/340]" after the file name; other viewers append " - 12"
const BRACKET_PAGE = /\s*\[[^\]]*?(\d+)\/(\d+)[^\]]*?\].*$/;
const TRAILING_PAGE = /\s+-\s+(\d+)\s*$/;

export interface ParsedTitle {
  bookTitle: string;
  page: number;
  totalPages?: number;
}

export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, "i");
  } catch {
    return new RegExp(pattern.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "i");
  }
}

export function parseWindowTitle(title: string): ParsedTitle | null {
  const bracket = title.match(BRACKET_PAGE);
  if (bracket) {
    const page = parseInt(bracket[1], 10);
    if (page < 1) return null;
    return {
      bookTitle: title.slice(0, bracket.index).trim(),
      page,
      totalPages: parseInt(bracket[2], 10),
    };
  }

  const trailing = title.match(TRAILING_PAGE);
  if (trailing) {
    const page = parseInt(trailing[1], 10);
    if (page < 1) return null;
    return { bookTitle: title.slice(0, trailing.index).trim(), page };
  }

  return null;
}

export function filterPageEvents(
  events: RawEvent[],
  pattern: string,
  onSkip: (error: UnparseablePageError) => void = (error) => console.warn(`Warning: ${error.message}`)
): PageEvent[] {
  const regex = compilePattern(pattern);
  const pageEvents: PageEvent[] = [];

  for (const event of events) {
    if (!regex.test(event.windowTitle)) {
      continue;
    }

    const parsed = parseWindowTitle(event.windowTitle);
    if (!parsed) {
      onSkip(new UnparseablePageError(event.windowTitle));
      continue;
    }

    pageEvents.push({
      page: parsed.page,
      timestamp: event.timestamp,
      duration: event.duration,
      bookTitle: parsed.bookTitle,
      ...(parsed.totalPages !== undefined && { totalPages: parsed.totalPages }),
    });
  }

  return pageEvents;
}

export function selectBook(pageEvents: PageEvent[], pattern: string): string {
  const titles = Array.from(new Set(pageEvents.map((e) => e.bookTitle)));

  if (titles.length === 0) {
    throw new NoMatchError(pattern);
  }
  if (titles.length > 1) {
    throw new AmbiguousTitleError(pattern, titles);
  }

  return titles[0];
}
