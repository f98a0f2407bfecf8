// ---------------------------------------------------------------------------
// Chart rendering adapters: engine output -> chart specifications.
// ---------------------------------------------------------------------------

import type {
  BarChartSpec,
  CategoryCount,
  ChartSpec,
  ChartStyle,
  HistogramBin,
  StatisticsSection,
  YearCount,
} from "../core/types.js";
import { cellText } from "../domain/dataset/dataset.js";

/**
 * Turns query-engine output into chart specifications for the dashboard
 * shell to draw. Renderers shape data only; they never filter it.
 */
export interface ChartRenderer {
  readonly style: ChartStyle;

  /** Inscriptions per year. */
  timeline(counts: readonly YearCount[], title: string): ChartSpec;

  /** One categorical breakdown from the statistics page. */
  breakdown(section: StatisticsSection, counts: readonly CategoryCount[]): ChartSpec;
}

function barChart(title: string, categories: string[], values: number[]): BarChartSpec {
  return { kind: "bar", title, categories, values };
}

function breakdownBars(section: StatisticsSection, counts: readonly CategoryCount[]): BarChartSpec {
  return barChart(
    section.label,
    counts.map((c) => cellText(c.value)),
    counts.map((c) => c.count),
  );
}

// ── Native bar charts ───────────────────────────────────────────────────────

/** Every chart is a plain bar chart of counts. */
export class BarChartRenderer implements ChartRenderer {
  readonly style = "bar" as const;

  timeline(counts: readonly YearCount[], title: string): ChartSpec {
    return barChart(
      title,
      counts.map((c) => String(c.year)),
      counts.map((c) => c.count),
    );
  }

  breakdown(section: StatisticsSection, counts: readonly CategoryCount[]): ChartSpec {
    return breakdownBars(section, counts);
  }
}

// ── Plot charts ─────────────────────────────────────────────────────────────

/**
 * Histogram timeline, and pie or bar breakdowns as each section asks.
 */
export class PlotChartRenderer implements ChartRenderer {
  readonly style = "plot" as const;
  private readonly binCount: number;

  constructor(binCount: number) {
    if (!Number.isInteger(binCount) || binCount < 1) {
      throw new RangeError("binCount must be a positive integer");
    }
    this.binCount = binCount;
  }

  timeline(counts: readonly YearCount[], title: string): ChartSpec {
    return { kind: "histogram", title, bins: histogramBins(counts, this.binCount) };
  }

  breakdown(section: StatisticsSection, counts: readonly CategoryCount[]): ChartSpec {
    if (section.chart !== "pie") {
      return breakdownBars(section, counts);
    }
    return {
      kind: "pie",
      title: section.label,
      slices: counts.map((c) => ({
        label: cellText(c.value),
        value: c.count,
        percentage: c.percentage,
      })),
    };
  }
}

/**
 * Split `[min year, max year]` into `binCount` equal-width bins. Every bin is
 * half-open except the last, which also takes the max year. A single-year
 * series becomes one bin of width 1. `counts` must be in ascending year
 * order, as `timeSeriesCounts` returns them.
 */
export function histogramBins(counts: readonly YearCount[], binCount: number): HistogramBin[] {
  const first = counts[0];
  const last = counts[counts.length - 1];
  if (first === undefined || last === undefined) {
    return [];
  }

  const min = first.year;
  const max = last.year;
  if (min === max) {
    return [{ start: min, end: min + 1, count: first.count }];
  }

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const { year, count } of counts) {
    const index = Math.min(Math.floor((year - min) / width), binCount - 1);
    const bin = bins[index];
    if (bin) bin.count += count;
  }

  return bins;
}

export function createChartRenderer(style: ChartStyle, histogramBinCount: number): ChartRenderer {
  return style === "plot" ? new PlotChartRenderer(histogramBinCount) : new BarChartRenderer();
}
