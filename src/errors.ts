export type Stage =
  | "cli"
  | "fetch"
  | "filter"
  | "clean"
  | "snapshot"
  | "delta"
  | "aggregate"
  | "plot";

export class PageTimeError extends Error {
  constructor(
    public readonly stage: Stage,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class SourceUnavailableError extends PageTimeError {
  constructor(message: string) {
    super("fetch", message);
  }
}

export class NoMatchError extends PageTimeError {
  constructor(public readonly pattern: string) {
    super("filter", `No book titles found matching the pattern: '${pattern}'`);
  }
}

export class AmbiguousTitleError extends PageTimeError {
  constructor(
    public readonly pattern: string,
    public readonly titles: string[]
  ) {
    super(
      "filter",
      `Pattern '${pattern}' matched multiple books, refine it:\n` +
        titles.map((t) => `- ${t}`).join("\n")
    );
  }
}

export class UnparseablePageError extends PageTimeError {
  constructor(public readonly windowTitle: string) {
    super("filter", `No page number in window title: '${windowTitle}'`);
  }
}

export class EmptyRangeError extends PageTimeError {
  constructor(bookTitle: string, start: number, end: number) {
    super("aggregate", `No reading time recorded for pages ${start}-${end} in '${bookTitle}'`);
  }
}

export class MalformedSnapshotError extends PageTimeError {
  constructor(
    public readonly file: string,
    detail: string
  ) {
    super("snapshot", `${file}: ${detail}`);
  }
}

export class InvalidArgumentError extends PageTimeError {
  constructor(message: string) {
    super("cli", message);
  }
}

export class StageError extends PageTimeError {
  constructor(stage: Stage, cause: unknown) {
    super(stage, cause instanceof Error ? cause.message : String(cause));
    this.cause = cause;
  }
}

export function formatError(error: unknown): string {
  if (error instanceof PageTimeError) {
    return `[${error.stage}] ${error.message}`;
  }
  return `Fatal error: ${error instanceof Error ? error.message : String(error)}`;
}
