import path from "path";
import type { Config } from "./types.js";
import { InvalidArgumentError } from "./errors.js";

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  return {
    apiUrl: (env.AW_API_URL || "http://localhost:5600").replace(/\/+$/, ""),
    eventLimit: parsePositiveInt("AW_EVENT_LIMIT", env.AW_EVENT_LIMIT, 10000),
    viewerApp: env.VIEWER_APP || "org.pwmt.zathura",
    outputDir: path.resolve(cwd, env.OUTPUT_DIR || "."),
    rawCsvFilename: env.RAW_CSV_FILENAME || "zathura_activity_raw.csv",
    cleanedCsvFilename: env.CLEANED_CSV_FILENAME || "zathura_activity_cleaned.csv",
    deltaCsvFilename: env.DELTA_CSV_FILENAME || "zathura_activity_delta.csv",
  };
}
