import { InvalidArgumentError } from "./errors.js";
import type { TimeRange } from "./types.js";

export const USAGE = `
pagetime - reading time per page from ActivityWatch

Usage:
  pagetime <book_title> <START-END> [options]

Arguments:
  book_title              Regex or substring of the book title, case-insensitive
  START-END               Page range to analyze, e.g. 335-340

Options:
  -i, --initial-file PATH Raw or cleaned snapshot taken before the session;
                          only time added since then is reported
  --from YYYY-MM-DD       Only fetch events from this day on
  --to YYYY-MM-DD         Only fetch events up to the end of this day
  -h, --help              Show this help

Environment (.env is read if present):
  AW_API_URL              ActivityWatch server (default http://localhost:5600)
  AW_EVENT_LIMIT          Max events fetched per bucket (default 10000)
  VIEWER_APP              Window app id of the viewer (default org.pwmt.zathura)
  OUTPUT_DIR              Where CSV snapshots and the chart go (default .)
`;

function parseDate(str: string | undefined): Date {
  const date = new Date(str ?? "");
  if (isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Invalid date: ${str}`);
  }
  return date;
}

export interface CliArgs {
  help: boolean;
  bookTitle: string;
  pageRange: string;
  initialFile?: string;
  timeRange: TimeRange;
}

export function parseArgs(args: string[]): CliArgs {
  const positional: string[] = [];
  const timeRange: TimeRange = {};
  let initialFile: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help" || arg === "help") {
      help = true;
    } else if (arg === "-i" || arg === "--initial-file") {
      initialFile = args[++i];
      if (!initialFile) {
        throw new InvalidArgumentError(`${arg} requires a file path`);
      }
    } else if (arg === "--from") {
      timeRange.start = parseDate(args[++i]);
    } else if (arg === "--to") {
      const end = parseDate(args[++i]);
      end.setUTCHours(23, 59, 59, 999);
      timeRange.end = end;
    } else {
      positional.push(arg);
    }
  }

  if (help) {
    return { help, bookTitle: "", pageRange: "", timeRange };
  }

  if (positional.length !== 2) {
    throw new InvalidArgumentError("Expected <book_title> and <START-END>. Run with --help for usage.");
  }

  return {
    help,
    bookTitle: positional[0],
    pageRange: positional[1],
    initialFile,
    timeRange,
  };
}
