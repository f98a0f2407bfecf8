// ---------------------------------------------------------------------------
// Tests for dashboard profile loading.
// ---------------------------------------------------------------------------

import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  PROFILES_DIR,
  loadDashboardProfile,
  parseDashboardProfile,
  resolveProfilePath,
} from "../../../src/config/dashboard-profile.js";
import { ConfigurationError } from "../../../src/core/errors.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function writeTempProfile(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "inscriptions-profile-"));
  tempDirs.push(dir);
  const file = path.join(dir, "custom.yaml");
  fs.writeFileSync(file, contents);
  return file;
}

describe("bundled profiles", () => {
  it("classic shows three pages with bar charts", () => {
    const profile = loadDashboardProfile("classic");

    expect(profile.title).toBe("Latin Inscriptions Dashboard");
    expect(profile.chartStyle).toBe("bar");
    expect(profile.pages).toEqual(["overview", "search", "statistics"]);
    expect(profile.search.selectFields).toEqual(["gender", "age_category"]);
    expect(profile.statistics.sections.map((s) => s.field)).toEqual([
      "gender",
      "age_category",
      "inscription_type",
      "case",
    ]);
    expect(profile.statistics.sections.every((s) => s.chart === "bar")).toBe(true);
  });

  it("extended adds the about page and pie charts", () => {
    const profile = loadDashboardProfile("extended");

    expect(profile.chartStyle).toBe("plot");
    expect(profile.pages).toContain("about");
    expect(profile.overview.histogramBins).toBe(20);
    expect(profile.statistics.sections[0]).toEqual({
      field: "gender",
      label: "Gender Distribution",
      chart: "pie",
    });
    expect(profile.about.text.startsWith("Browse, filter and chart")).toBe(true);
  });
});

describe("resolveProfilePath", () => {
  it("maps bare names to the bundled directory", () => {
    expect(resolveProfilePath("classic")).toBe(path.join(PROFILES_DIR, "classic.yaml"));
  });

  it("rejects names that could leave the directory", () => {
    expect(() => resolveProfilePath("../secrets")).toThrow(ConfigurationError);
  });
});

describe("loadDashboardProfile", () => {
  it("loads a profile from a YAML path and fills defaults", () => {
    const file = writeTempProfile("title: Custom\nchartStyle: plot\npages: [search]\n");

    const profile = loadDashboardProfile(file);

    expect(profile).toEqual({
      title: "Custom",
      footer: "",
      chartStyle: "plot",
      pages: ["search"],
      overview: { recentCount: 10, yearField: "year", histogramBins: 20 },
      search: {
        selectFields: ["gender", "age_category"],
        exportFileName: "filtered_inscriptions.csv",
        pageSize: 100,
      },
      statistics: { sections: [] },
      about: { text: "" },
    });
  });

  it("fails for an unknown bundled profile", () => {
    expect(() => loadDashboardProfile("no-such-profile")).toThrow(/^Dashboard profile not found: /);
  });

  it("fails for invalid YAML", () => {
    const file = writeTempProfile("title: [unclosed\n");
    expect(() => loadDashboardProfile(file)).toThrow(/is not valid YAML$/);
  });
});

describe("parseDashboardProfile", () => {
  it("names the offending setting", () => {
    expect(() =>
      parseDashboardProfile({ title: "T", chartStyle: "pie", pages: ["overview"] }, "inline"),
    ).toThrow(/^Invalid dashboard profile inline: chartStyle: /);
  });

  it("rejects an export name that is not a plain CSV file", () => {
    expect(() =>
      parseDashboardProfile({
        title: "T",
        chartStyle: "bar",
        pages: ["search"],
        search: { exportFileName: "../out.txt" },
      }),
    ).toThrow(ConfigurationError);
  });
});
