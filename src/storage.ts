import { readFile, writeFile, mkdir } from "fs/promises";
import { existsSync } from "fs";
import path from "path";
import { z } from "zod";
import type { CleanedRecord, DeltaRecord, RawEvent, Snapshot } from "./types.js";
import { MalformedSnapshotError } from "./errors.js";
import { parseCsv, stringifyCsv, type CsvRow } from "./csv.js";

export const RAW_COLUMNS = ["timestamp", "duration", "window_title"] as const;
export const CLEANED_COLUMNS = ["page", "total_duration", "first_seen", "last_seen"] as const;
export const DELTA_COLUMNS = ["page", "delta_duration"] as const;

const numeric = z.string().trim().min(1, "empty value").pipe(z.coerce.number().finite());
const instant = z
  .string()
  .trim()
  .refine((value) => !isNaN(new Date(value).getTime()), "not an ISO-8601 timestamp");

const rawRowSchema = z.object({
  timestamp: instant,
  duration: numeric.pipe(z.number().min(0)),
  window_title: z.string(),
});

const cleanedRowSchema = z.object({
  page: numeric.pipe(z.number().int().min(1)),
  total_duration: numeric.pipe(z.number().min(0)),
  first_seen: instant,
  last_seen: instant,
});

async function ensureDir(file: string): Promise<void> {
  const dir = path.dirname(file);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
}

function requireColumns(file: string, header: string[], required: readonly string[]): void {
  const missing = required.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new MalformedSnapshotError(file, `missing column(s): ${missing.join(", ")}`);
  }
}

async function loadRows(
  file: string,
  required: readonly string[]
): Promise<{ header: string[]; rows: CsvRow[] }> {
  if (!existsSync(file)) {
    throw new MalformedSnapshotError(file, "file not found");
  }

  const { header, rows } = parseCsv(await readFile(file, "utf-8"));
  if (header.length === 0) {
    throw new MalformedSnapshotError(file, "missing header row");
  }

  requireColumns(file, header, required);
  return { header, rows };
}

function validateRows<T extends z.ZodTypeAny>(
  file: string,
  rows: CsvRow[],
  schema: T
): z.output<T>[] {
  return rows.map((row, i) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      // header is line 1
      throw new MalformedSnapshotError(
        file,
        `line ${i + 2}, column '${issue.path.join(".")}': ${issue.message}`
      );
    }
    return parsed.data;
  });
}

function toRawEvents(file: string, rows: CsvRow[]): RawEvent[] {
  return validateRows(file, rows, rawRowSchema).map((row) => ({
    timestamp: row.timestamp,
    duration: row.duration,
    windowTitle: row.window_title,
  }));
}

function toCleanedRecords(file: string, rows: CsvRow[]): CleanedRecord[] {
  const records = validateRows(file, rows, cleanedRowSchema).map((row) => ({
    page: row.page,
    totalDuration: row.total_duration,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
  }));

  const seen = new Set<number>();
  for (const record of records) {
    if (seen.has(record.page)) {
      throw new MalformedSnapshotError(file, `duplicate page ${record.page}`);
    }
    seen.add(record.page);
  }

  return records;
}

export async function readRawSnapshot(file: string): Promise<RawEvent[]> {
  const { rows } = await loadRows(file, RAW_COLUMNS);
  return toRawEvents(file, rows);
}

export async function readCleanedSnapshot(file: string): Promise<CleanedRecord[]> {
  const { rows } = await loadRows(file, CLEANED_COLUMNS);
  return toCleanedRecords(file, rows);
}

export async function readSnapshot(file: string): Promise<Snapshot> {
  const { header, rows } = await loadRows(file, []);

  if (header.includes("page") && header.includes("total_duration")) {
    requireColumns(file, header, CLEANED_COLUMNS);
    return { kind: "cleaned", records: toCleanedRecords(file, rows) };
  }

  requireColumns(file, header, RAW_COLUMNS);
  return { kind: "raw", events: toRawEvents(file, rows) };
}

export async function writeRawSnapshot(file: string, events: RawEvent[]): Promise<void> {
  await ensureDir(file);
  const rows = events.map((e) => ({
    timestamp: e.timestamp,
    duration: String(e.duration),
    window_title: e.windowTitle,
  }));
  await writeFile(file, stringifyCsv(RAW_COLUMNS, rows), "utf-8");
}

export async function writeCleanedSnapshot(file: string, records: CleanedRecord[]): Promise<void> {
  await ensureDir(file);
  const rows = records.map((r) => ({
    page: String(r.page),
    total_duration: String(r.totalDuration),
    first_seen: r.firstSeen,
    last_seen: r.lastSeen,
  }));
  await writeFile(file, stringifyCsv(CLEANED_COLUMNS, rows), "utf-8");
}

export async function writeDeltaSnapshot(file: string, deltas: DeltaRecord[]): Promise<void> {
  await ensureDir(file);
  const rows = deltas.map((d) => ({
    page: String(d.page),
    delta_duration: String(d.deltaDuration),
  }));
  await writeFile(file, stringifyCsv(DELTA_COLUMNS, rows), "utf-8");
}
