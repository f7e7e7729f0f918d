import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { copyFile, mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { fileURLToPath } from "url";
import { runAnalysis } from "../src/pipeline.js";
import { loadConfig } from "../src/config.js";
import { readRawSnapshot, readCleanedSnapshot } from "../src/storage.js";
import {
  EmptyRangeError,
  MalformedSnapshotError,
  NoMatchError,
  SourceUnavailableError,
  StageError,
} from "../src/errors.js";
import type { EventSource } from "../src/history.js";
import type { ChartRenderer } from "../src/report.js";
import type { AnalysisResult, Config, PageDuration, RawEvent } from "../src/types.js";

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");

function fixtureSource(name: string): EventSource {
  return { fetchEvents: () => readRawSnapshot(path.join(FIXTURES, name)) };
}

function staticSource(events: RawEvent[]): EventSource {
  return { fetchEvents: async () => events };
}

function fakeRenderer() {
  const render = vi.fn(async (_result: AnalysisResult, _pages: PageDuration[], file: string) => file);
  return { render };
}

let config: Config;

beforeEach(async () => {
  const outputDir = await mkdtemp(path.join(tmpdir(), "pagetime-pipeline-"));
  config = loadConfig({ OUTPUT_DIR: outputDir });
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(config.outputDir, { recursive: true, force: true });
});

describe("runAnalysis", () => {
  it("reports a full capture", async () => {
    const renderer = fakeRenderer();

    const output = await runAnalysis(
      { pattern: "signals", pageRange: { start: 335, end: 339 } },
      { config, source: fixtureSource("initial_raw.csv"), renderer }
    );

    expect(output.result.bookTitle).toBe("Signals and Systems.pdf");
    expect(output.result.pagesAnalyzed).toBe(4);
    expect(output.result.totalDuration / 60).toBeCloseTo(37.65, 10);
    expect(output.result.avgDurationPerPage / 60).toBeCloseTo(9.4125, 10);
    expect(output.deltaTotal).toBeUndefined();
    expect(output.pages).toEqual([
      { page: 335, duration: 600 },
      { page: 337, duration: 300 },
      { page: 338, duration: 1200 },
      { page: 339, duration: 159 },
    ]);

    const chartPath = path.join(config.outputDir, "Signals and Systems_p335-339_analysis.png");
    expect(output.chartPath).toBe(chartPath);
    expect(renderer.render).toHaveBeenCalledWith(output.result, output.pages, chartPath);

    expect(existsSync(path.join(config.outputDir, "zathura_activity_raw.csv"))).toBe(true);
    const cleaned = await readCleanedSnapshot(path.join(config.outputDir, "zathura_activity_cleaned.csv"));
    expect(cleaned.map((r) => [r.page, r.totalDuration])).toEqual([
      [335, 600],
      [336, 0],
      [337, 300],
      [338, 1200],
      [339, 159],
    ]);
  });

  it("reports only the session delta with an initial file", async () => {
    const output = await runAnalysis(
      {
        pattern: "signals",
        pageRange: { start: 340, end: 341 },
        initialFile: path.join(FIXTURES, "initial_raw.csv"),
      },
      { config, source: fixtureSource("current_raw.csv"), renderer: fakeRenderer() }
    );

    expect((output.deltaTotal ?? 0) / 60).toBeCloseTo(1.53, 10);
    expect(output.result.totalDuration / 60).toBeCloseTo(1.42, 10);
    expect(output.result.pagesAnalyzed).toBe(2);
    expect(output.result.avgDurationPerPage / 60).toBeCloseTo(0.71, 10);

    expect(await readFile(path.join(config.outputDir, "zathura_activity_delta.csv"), "utf-8")).toBe(
      "page,delta_duration\n335,0\n336,0\n337,0\n338,0\n339,0\n340,60\n341,25.2\n342,6.6\n"
    );
  });

  it("accepts a cleaned snapshot as the baseline", async () => {
    const output = await runAnalysis(
      {
        pattern: "signals",
        pageRange: { start: 335, end: 342 },
        initialFile: path.join(FIXTURES, "cleaned.csv"),
      },
      { config, source: fixtureSource("current_raw.csv"), renderer: fakeRenderer() }
    );

    // pages 335 and 336 are fully covered by the baseline
    expect(output.pages.map((p) => p.page)).toEqual([337, 338, 339, 340, 341, 342]);
  });

  it("reads last run's raw snapshot before overwriting it", async () => {
    const previous = path.join(config.outputDir, config.rawCsvFilename);
    await copyFile(path.join(FIXTURES, "initial_raw.csv"), previous);

    const output = await runAnalysis(
      { pattern: "signals", pageRange: { start: 335, end: 342 }, initialFile: previous },
      { config, source: fixtureSource("current_raw.csv"), renderer: fakeRenderer() }
    );

    expect((output.deltaTotal ?? 0) / 60).toBeCloseTo(1.53, 10);
    expect(output.pages.map((p) => p.page)).toEqual([340, 341, 342]);
    expect(await readRawSnapshot(previous)).toHaveLength(12);
  });

  it("reads last run's cleaned snapshot before overwriting it", async () => {
    const previous = path.join(config.outputDir, config.cleanedCsvFilename);
    await copyFile(path.join(FIXTURES, "cleaned.csv"), previous);

    const output = await runAnalysis(
      { pattern: "signals", pageRange: { start: 335, end: 342 }, initialFile: previous },
      { config, source: fixtureSource("current_raw.csv"), renderer: fakeRenderer() }
    );

    expect(output.pages.map((p) => p.page)).toEqual([337, 338, 339, 340, 341, 342]);
    expect((await readCleanedSnapshot(previous)).map((r) => r.page)).toEqual([335, 336, 337, 338, 339, 340, 341, 342]);
  });

  it("rejects a malformed initial file before fetching", async () => {
    const source = { fetchEvents: vi.fn(async (): Promise<RawEvent[]> => []) };

    await expect(
      runAnalysis(
        {
          pattern: "signals",
          pageRange: { start: 1, end: 9 },
          initialFile: path.join(FIXTURES, "missing_column.csv"),
        },
        { config, source, renderer: fakeRenderer() }
      )
    ).rejects.toThrow(MalformedSnapshotError);
    expect(source.fetchEvents).not.toHaveBeenCalled();
    expect(existsSync(path.join(config.outputDir, config.rawCsvFilename))).toBe(false);
  });

  it("fails with EmptyRangeError when the session did not touch the range", async () => {
    const renderer = fakeRenderer();

    await expect(
      runAnalysis(
        {
          pattern: "signals",
          pageRange: { start: 335, end: 339 },
          initialFile: path.join(FIXTURES, "initial_raw.csv"),
        },
        { config, source: fixtureSource("current_raw.csv"), renderer }
      )
    ).rejects.toThrow(EmptyRangeError);
    expect(renderer.render).not.toHaveBeenCalled();
  });

  it("fails with NoMatchError and writes no cleaned snapshot", async () => {
    await expect(
      runAnalysis(
        { pattern: "thermodynamics", pageRange: { start: 1, end: 9 } },
        { config, source: fixtureSource("initial_raw.csv"), renderer: fakeRenderer() }
      )
    ).rejects.toThrow(NoMatchError);

    expect(existsSync(path.join(config.outputDir, "zathura_activity_cleaned.csv"))).toBe(false);
  });

  it("propagates source failures", async () => {
    const source: EventSource = {
      fetchEvents: async () => {
        throw new SourceUnavailableError("Could not reach ActivityWatch");
      },
    };

    await expect(
      runAnalysis({ pattern: "signals", pageRange: { start: 1, end: 9 } }, { config, source, renderer: fakeRenderer() })
    ).rejects.toThrow(SourceUnavailableError);
    expect(existsSync(path.join(config.outputDir, "zathura_activity_raw.csv"))).toBe(false);
  });

  it("tags unexpected renderer failures with the plot stage", async () => {
    const renderer: ChartRenderer = {
      render: async () => {
        throw new Error("no fonts");
      },
    };
    const source = staticSource([
      { timestamp: "2025-03-10T18:00:00.000Z", duration: 30, windowTitle: "Signals and Systems.pdf [1/9]" },
    ]);

    const error = await runAnalysis({ pattern: "signals", pageRange: { start: 1, end: 9 } }, { config, source, renderer }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({ stage: "plot", message: "no fonts" });
  });
});
