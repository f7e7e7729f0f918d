import { readFile, mkdir } from "fs/promises";
import { existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import Handlebars from "handlebars";
import sharp from "sharp";
import type { AnalysisResult, PageDuration } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEMPLATES_DIR = path.join(__dirname, "..", "templates");

const WIDTH = 1000;
const HEIGHT = 600;
const MARGIN = { top: 80, right: 30, bottom: 90, left: 80 };

export interface ChartRenderer {
  render(result: AnalysisResult, pages: PageDuration[], file: string): Promise<string>;
}

export function chartFilename(result: AnalysisResult): string {
  const title = result.bookTitle.replace(/\.pdf$/i, "").replace(/[/\\]/g, "_");
  return `${title}_p${result.pageRange.start}-${result.pageRange.end}_analysis.png`;
}

function niceStep(raw: number): number {
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const normalized = raw / magnitude;
  if (normalized <= 1) return magnitude;
  if (normalized <= 2) return 2 * magnitude;
  if (normalized <= 5) return 5 * magnitude;
  return 10 * magnitude;
}

function formatTick(value: number): string {
  return Number(value.toFixed(2)).toString();
}

export function buildChartData(result: AnalysisResult, pages: PageDuration[]) {
  const plotWidth = WIDTH - MARGIN.left - MARGIN.right;
  const plotHeight = HEIGHT - MARGIN.top - MARGIN.bottom;
  const baseline = MARGIN.top + plotHeight;

  const minutes = pages.map((p) => p.duration / 60);
  const average = result.avgDurationPerPage / 60;
  const peak = Math.max(average, ...minutes);

  const step = niceStep(peak / 5);
  const yMax = Math.ceil(peak / step) * step;
  const scale = (value: number) => (value / yMax) * plotHeight;

  const slot = plotWidth / pages.length;
  const bars = pages.map((page, i) => {
    const height = scale(minutes[i]);
    const x = MARGIN.left + i * slot + slot * 0.1;
    return {
      x: x.toFixed(1),
      y: (baseline - height).toFixed(1),
      width: (slot * 0.8).toFixed(1),
      height: height.toFixed(1),
      label: String(page.page),
      labelX: (x + slot * 0.4).toFixed(1),
      minutes: minutes[i].toFixed(2),
    };
  });

  const ticks = [];
  for (let i = 0; i * step <= yMax + step / 1000; i++) {
    ticks.push({ y: (baseline - scale(i * step)).toFixed(1), label: formatTick(i * step) });
  }

  return {
    width: WIDTH,
    height: HEIGHT,
    left: MARGIN.left,
    right: WIDTH - MARGIN.right,
    top: MARGIN.top,
    baseline,
    labelY: baseline + 24,
    centerX: MARGIN.left + plotWidth / 2,
    centerY: MARGIN.top + plotHeight / 2,
    title: `Reading Duration per Page: ${result.bookTitle}`,
    subtitle: `(Pages ${result.pageRange.start} to ${result.pageRange.end})`,
    bars,
    ticks,
    averageY: (baseline - scale(average)).toFixed(1),
    averageLabel: `Average (${average.toFixed(2)} min)`,
  };
}

export async function renderChartSvg(
  result: AnalysisResult,
  pages: PageDuration[],
  templatesDir: string = TEMPLATES_DIR
): Promise<string> {
  const templateContent = await readFile(path.join(templatesDir, "chart.svg.hbs"), "utf-8");
  const template = Handlebars.compile(templateContent);
  return template(buildChartData(result, pages));
}

export class PngChartRenderer implements ChartRenderer {
  constructor(private readonly templatesDir: string = TEMPLATES_DIR) {}

  async render(result: AnalysisResult, pages: PageDuration[], file: string): Promise<string> {
    const svg = await renderChartSvg(result, pages, this.templatesDir);

    const dir = path.dirname(file);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    await sharp(Buffer.from(svg)).png().toFile(file);
    return file;
  }
}
