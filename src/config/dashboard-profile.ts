// ---------------------------------------------------------------------------
// Dashboard profile loader.
// Reads a YAML profile, validates it with Zod, and returns a typed
// DashboardProfile describing pages, chart style and statistics sections.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parse } from "yaml";
import type { DashboardProfile } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

/** Directory holding the bundled `<name>.yaml` profiles. */
export const PROFILES_DIR = fileURLToPath(new URL("./profiles/", import.meta.url));

const PROFILE_NAME_RE = /^[a-z0-9][a-z0-9-]*$/;

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const StatisticsSectionSchema = z.object({
  field: z.string().min(1),
  label: z.string().min(1),
  chart: z.enum(["bar", "pie"]).default("bar"),
});

export const DashboardProfileSchema = z.object({
  title: z.string().min(1),
  footer: z.string().default(""),
  chartStyle: z.enum(["bar", "plot"]),
  pages: z.array(z.enum(["overview", "search", "statistics", "about"])).min(1),
  overview: z
    .object({
      recentCount: z.number().int().positive().default(10),
      yearField: z.string().min(1).default("year"),
      histogramBins: z.number().int().positive().max(200).default(20),
    })
    .default({}),
  search: z
    .object({
      selectFields: z.array(z.string().min(1)).default(["gender", "age_category"]),
      exportFileName: z
        .string()
        .regex(/^[\w.-]+\.csv$/, "must be a plain *.csv file name")
        .default("filtered_inscriptions.csv"),
      pageSize: z.number().int().positive().max(1_000).default(100),
    })
    .default({}),
  statistics: z
    .object({
      sections: z.array(StatisticsSectionSchema).default([]),
    })
    .default({}),
  about: z
    .object({
      text: z.string().default(""),
    })
    .default({}),
});

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Resolve a profile reference to a file path. A bare name such as
 * `classic` means a bundled profile; anything ending in `.yaml`/`.yml` is a
 * path relative to the working directory.
 */
export function resolveProfilePath(nameOrPath: string): string {
  if (nameOrPath.endsWith(".yaml") || nameOrPath.endsWith(".yml")) {
    return path.resolve(nameOrPath);
  }
  if (!PROFILE_NAME_RE.test(nameOrPath)) {
    throw new ConfigurationError(`Invalid dashboard profile name "${nameOrPath}"`);
  }
  return path.join(PROFILES_DIR, `${nameOrPath}.yaml`);
}

/** Validate an already-parsed profile document. */
export function parseDashboardProfile(document: unknown, origin = "profile"): DashboardProfile {
  const result = DashboardProfileSchema.safeParse(document);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid dashboard profile ${origin}: ${problems}`);
  }

  return result.data;
}

/**
 * Load and validate a dashboard profile by name or path.
 *
 * @throws {ConfigurationError} when the file is missing or invalid.
 */
export function loadDashboardProfile(nameOrPath: string): DashboardProfile {
  const filePath = resolveProfilePath(nameOrPath);

  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Dashboard profile not found: ${filePath}`);
  }

  let document: unknown;
  try {
    document = parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Dashboard profile ${filePath} is not valid YAML`, {
      cause: err,
    });
  }

  return parseDashboardProfile(document, filePath);
}
