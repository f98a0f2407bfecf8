// ---------------------------------------------------------------------------
// Tests for DatasetSession.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { DatasetSession } from "../../../src/session/dataset-session.js";
import { sampleDataset } from "../../../src/domain/dataset/sample-data.js";
import { emptyDataset } from "../../../src/domain/dataset/dataset.js";
import { loadedFrom, silentLogger } from "../../helpers.js";

describe("DatasetSession", () => {
  it("exposes the dataset it was created with", () => {
    const dataset = sampleDataset();
    const session = new DatasetSession(loadedFrom(dataset), silentLogger());

    expect(session.dataset).toBe(dataset);
    expect(session.loaded.source.label).toBe("test.csv");
  });

  it("replaces the dataset wholesale", () => {
    const session = new DatasetSession(loadedFrom(sampleDataset()), silentLogger());
    const next = loadedFrom(emptyDataset(["name"]), "other.csv");

    session.replace(next);

    expect(session.loaded).toBe(next);
    expect(session.dataset.rows).toEqual([]);
  });

  it("describes the current dataset", () => {
    const session = new DatasetSession(loadedFrom(sampleDataset()), silentLogger());

    expect(session.describe()).toEqual({
      source: { kind: "file", label: "test.csv" },
      loadedAt: "2024-01-01T00:00:00.000Z",
      notice: { level: "success", message: "Real data loaded!" },
      rowCount: 10,
      columns: ["person_id", "name", "gender", "age_category", "year", "case", "inscription_type"],
    });
  });
});
