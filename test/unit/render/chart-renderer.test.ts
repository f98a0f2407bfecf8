// ---------------------------------------------------------------------------
// Tests for the bar and plot chart renderers.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  BarChartRenderer,
  PlotChartRenderer,
  createChartRenderer,
  histogramBins,
} from "../../../src/render/chart-renderer.js";
import type { CategoryCount, StatisticsSection } from "../../../src/core/types.js";

const GENDER_COUNTS: CategoryCount[] = [
  { value: "Male", count: 3, percentage: 60 },
  { value: "Female", count: 2, percentage: 40 },
];

const pieSection: StatisticsSection = { field: "gender", label: "Gender Distribution", chart: "pie" };
const barSection: StatisticsSection = { field: "gender", label: "Gender Distribution", chart: "bar" };

describe("histogramBins", () => {
  it("splits the year range into equal bins, closing the last one", () => {
    const bins = histogramBins(
      [
        { year: 80, count: 1 },
        { year: 90, count: 1 },
        { year: 200, count: 1 },
      ],
      4,
    );

    expect(bins).toEqual([
      { start: 80, end: 110, count: 2 },
      { start: 110, end: 140, count: 0 },
      { start: 140, end: 170, count: 0 },
      { start: 170, end: 200, count: 1 },
    ]);
  });

  it("puts a single year in one unit-wide bin", () => {
    expect(histogramBins([{ year: 100, count: 3 }], 20)).toEqual([
      { start: 100, end: 101, count: 3 },
    ]);
  });

  it("returns no bins for an empty series", () => {
    expect(histogramBins([], 20)).toEqual([]);
  });
});

describe("BarChartRenderer", () => {
  const renderer = new BarChartRenderer();

  it("draws the timeline as bars labelled by year", () => {
    const chart = renderer.timeline(
      [
        { year: 80, count: 1 },
        { year: 120, count: 2 },
      ],
      "Inscriptions Over Time",
    );

    expect(chart).toEqual({
      kind: "bar",
      title: "Inscriptions Over Time",
      categories: ["80", "120"],
      values: [1, 2],
    });
  });

  it("draws breakdowns as bars even when a pie is asked for", () => {
    expect(renderer.breakdown(pieSection, GENDER_COUNTS)).toEqual({
      kind: "bar",
      title: "Gender Distribution",
      categories: ["Male", "Female"],
      values: [3, 2],
    });
  });
});

describe("PlotChartRenderer", () => {
  const renderer = new PlotChartRenderer(2);

  it("rejects a bin count below one", () => {
    expect(() => new PlotChartRenderer(0)).toThrow(RangeError);
  });

  it("draws the timeline as a histogram", () => {
    const chart = renderer.timeline(
      [
        { year: 100, count: 2 },
        { year: 200, count: 5 },
      ],
      "Inscriptions Over Time",
    );

    expect(chart).toEqual({
      kind: "histogram",
      title: "Inscriptions Over Time",
      bins: [
        { start: 100, end: 150, count: 2 },
        { start: 150, end: 200, count: 5 },
      ],
    });
  });

  it("draws pie sections as pies", () => {
    expect(renderer.breakdown(pieSection, GENDER_COUNTS)).toEqual({
      kind: "pie",
      title: "Gender Distribution",
      slices: [
        { label: "Male", value: 3, percentage: 60 },
        { label: "Female", value: 2, percentage: 40 },
      ],
    });
  });

  it("draws other sections as bars", () => {
    expect(renderer.breakdown(barSection, GENDER_COUNTS).kind).toBe("bar");
  });
});

describe("createChartRenderer", () => {
  it("picks the renderer for the chart style", () => {
    expect(createChartRenderer("bar", 20)).toBeInstanceOf(BarChartRenderer);
    expect(createChartRenderer("plot", 20)).toBeInstanceOf(PlotChartRenderer);
  });
});
