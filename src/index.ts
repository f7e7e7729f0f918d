#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { parsePageRange } from "./aggregate.js";
import { ActivityWatchSource } from "./history.js";
import { PngChartRenderer } from "./report.js";
import { runAnalysis } from "./pipeline.js";
import { formatError } from "./errors.js";
import { USAGE, parseArgs } from "./cli.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const pageRange = parsePageRange(args.pageRange);

  const { result, chartPath, deltaTotal } = await runAnalysis(
    {
      pattern: args.bookTitle,
      pageRange,
      timeRange: args.timeRange,
      initialFile: args.initialFile,
    },
    {
      config,
      source: new ActivityWatchSource(config),
      renderer: new PngChartRenderer(),
    }
  );

  console.log(`\n--- Analysis Results for '${result.bookTitle}' (Pages ${pageRange.start}-${pageRange.end}) ---`);
  if (deltaTotal !== undefined) {
    console.log(`Session Delta (all pages): ${(deltaTotal / 60).toFixed(2)} minutes`);
  }
  console.log(`Total Unique Pages Analyzed: ${result.pagesAnalyzed}`);
  console.log(`Total Duration in Range: ${(result.totalDuration / 60).toFixed(2)} minutes`);
  console.log(`Average Duration per Page: ${(result.avgDurationPerPage / 60).toFixed(2)} minutes`);
  console.log("-".repeat(60));
  console.log(`Bar plot saved as: ${chartPath}`);
}

main().catch((error) => {
  console.error(formatError(error));
  process.exit(1);
});
