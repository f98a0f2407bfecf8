// ---------------------------------------------------------------------------
// Tests for search request parsing.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { parseSearchRequest, typedFilters } from "../../../src/api/search-params.js";
import { QueryValidationError } from "../../../src/core/errors.js";
import { sampleDataset } from "../../../src/domain/dataset/sample-data.js";

describe("parseSearchRequest", () => {
  it("applies defaults", () => {
    expect(parseSearchRequest({}, 100)).toEqual({ query: "", filters: {}, limit: 100, offset: 0 });
  });

  it("collects f.-prefixed filters and keeps the query untrimmed", () => {
    expect(
      parseSearchRequest(
        { q: " felix", "f.gender": "Female", "f.year": "150", limit: "5", offset: "10", other: "x" },
        100,
      ),
    ).toEqual({
      query: " felix",
      filters: { gender: "Female", year: "150" },
      limit: 5,
      offset: 10,
    });
  });

  it("rejects bad paging values", () => {
    expect(() => parseSearchRequest({ limit: "abc" }, 100)).toThrow(QueryValidationError);
    expect(() => parseSearchRequest({ limit: "1001" }, 100)).toThrow(/^Invalid parameter "limit"/);
    expect(() => parseSearchRequest({ offset: "-1" }, 100)).toThrow(/^Invalid parameter "offset"/);
  });
});

describe("typedFilters", () => {
  it("converts values for numeric columns only", () => {
    expect(typedFilters(sampleDataset(), { year: "150", gender: "Female", place: "7" })).toEqual({
      year: 150,
      gender: "Female",
      place: "7",
    });
  });
});
