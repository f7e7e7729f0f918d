import path from "path";
import type {
  AnalysisResult,
  CleanedRecord,
  Config,
  PageDuration,
  PageRange,
  Snapshot,
  TimeRange,
} from "./types.js";
import { PageTimeError, StageError, type Stage } from "./errors.js";
import type { EventSource } from "./history.js";
import type { ChartRenderer } from "./report.js";
import { chartFilename } from "./report.js";
import { filterPageEvents, selectBook } from "./filter.js";
import { cleanPageEvents } from "./cleaner.js";
import { computeDelta, totalDelta } from "./delta.js";
import { aggregateRange } from "./aggregate.js";
import {
  readSnapshot,
  writeCleanedSnapshot,
  writeDeltaSnapshot,
  writeRawSnapshot,
} from "./storage.js";

export interface AnalysisOptions {
  pattern: string;
  pageRange: PageRange;
  initialFile?: string;
  timeRange?: TimeRange;
}

export interface AnalysisDeps {
  config: Config;
  source: EventSource;
  renderer: ChartRenderer;
}

export interface AnalysisOutput {
  result: AnalysisResult;
  pages: PageDuration[];
  chartPath: string;
  deltaTotal?: number;
}

async function stage<T>(name: Stage, run: () => Promise<T> | T): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof PageTimeError) {
      throw error;
    }
    throw new StageError(name, error);
  }
}

function baselineFrom(snapshot: Snapshot, pattern: string): CleanedRecord[] {
  if (snapshot.kind === "cleaned") {
    return snapshot.records;
  }
  // An initial capture from before the book was opened is an empty baseline.
  return cleanPageEvents(filterPageEvents(snapshot.events, pattern));
}

export async function runAnalysis(
  options: AnalysisOptions,
  { config, source, renderer }: AnalysisDeps
): Promise<AnalysisOutput> {
  const { pattern, pageRange } = options;
  const output = (filename: string) => path.join(config.outputDir, filename);

  // Read before anything is written: the initial file may be last run's own snapshot.
  const initialFile = options.initialFile;
  const initial = initialFile ? await stage("delta", () => readSnapshot(initialFile)) : undefined;

  console.log("Step 1: Fetching AFK and window events...");
  const events = await stage("fetch", async () => {
    const fetched = await source.fetchEvents(options.timeRange ?? {});
    await writeRawSnapshot(output(config.rawCsvFilename), fetched);
    return fetched;
  });
  console.log(`   Found ${events.length} ${config.viewerApp} events.`);

  console.log("Step 2: Cleaning page events...");
  const { bookTitle, records } = await stage("clean", async () => {
    const pageEvents = await stage("filter", () => filterPageEvents(events, pattern));
    const title = await stage("filter", () => selectBook(pageEvents, pattern));
    const cleaned = cleanPageEvents(pageEvents);
    await writeCleanedSnapshot(output(config.cleanedCsvFilename), cleaned);
    return { bookTitle: title, records: cleaned };
  });
  console.log(`   Cleaned ${records.length} pages of '${bookTitle}'.`);

  let rows: PageDuration[] = records.map((r) => ({ page: r.page, duration: r.totalDuration }));
  let deltaTotal: number | undefined;

  if (initial) {
    console.log(`Step 3: Computing session delta against ${initialFile}...`);
    const deltas = await stage("delta", async () => {
      const computed = computeDelta(baselineFrom(initial, pattern), records);
      await writeDeltaSnapshot(output(config.deltaCsvFilename), computed);
      return computed;
    });
    deltaTotal = totalDelta(deltas);
    rows = deltas.map((d) => ({ page: d.page, duration: d.deltaDuration }));
    console.log(`   Session delta: ${(deltaTotal / 60).toFixed(2)} minutes.`);
  }

  console.log("Step 4: Analyzing page range...");
  const { result, pages } = await stage("aggregate", () => aggregateRange(rows, bookTitle, pageRange));

  const chartPath = await stage("plot", () =>
    renderer.render(result, pages, output(chartFilename(result)))
  );

  return { result, pages, chartPath, deltaTotal };
}
