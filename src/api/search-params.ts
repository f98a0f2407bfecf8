// ---------------------------------------------------------------------------
// Search request parsing: `q`, `f.<field>` filters, and paging.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { Dataset, FieldFilters } from "../core/types.js";
import { QueryValidationError } from "../core/errors.js";
import { parseFieldValue } from "../domain/query/query-engine.js";

/** Query-string prefix marking a per-field equality filter. */
export const FIELD_FILTER_PREFIX = "f.";

export interface SearchRequest {
  /** Free-text query, passed through untrimmed; empty means no text filter. */
  query: string;
  /** Field name → raw filter value as it arrived. */
  filters: Record<string, string>;
  limit: number;
  offset: number;
}

const PagingSchema = z.object({
  limit: z.coerce.number().int().min(1).max(1_000).optional(),
  offset: z.coerce.number().int().min(0).default(0),
});

/**
 * Parse the flat query-string map of a search request.
 *
 * @throws {QueryValidationError} when `limit` or `offset` is not a valid
 *   integer in range, or a filter key names no field.
 */
export function parseSearchRequest(
  params: Record<string, string>,
  defaultLimit: number,
): SearchRequest {
  const paging = PagingSchema.safeParse({ limit: params["limit"], offset: params["offset"] });
  if (!paging.success) {
    const issue = paging.error.issues[0];
    throw new QueryValidationError(
      String(issue?.path[0] ?? "paging"),
      issue?.message ?? "invalid value",
    );
  }

  const filters: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (!key.startsWith(FIELD_FILTER_PREFIX)) continue;
    const field = key.slice(FIELD_FILTER_PREFIX.length);
    if (field === "") {
      throw new QueryValidationError(key, "filter key must name a field");
    }
    filters[field] = value;
  }

  return {
    query: params["q"] ?? "",
    filters,
    limit: paging.data.limit ?? defaultLimit,
    offset: paging.data.offset,
  };
}

/** Convert each raw filter value to its column's type. */
export function typedFilters(dataset: Dataset, filters: Record<string, string>): FieldFilters {
  return Object.fromEntries(
    Object.entries(filters).map(([field, raw]) => [field, parseFieldValue(dataset, field, raw)]),
  );
}
