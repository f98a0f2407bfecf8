// ---------------------------------------------------------------------------
// Tests for the environment configuration loader.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      env: "development",
      port: 3000,
      logLevel: "info",
      profile: "classic",
      dataset: {
        path: "inscriptions_data.csv",
        fallback: "sample",
        uploadMaxBytes: 20 * 1024 * 1024,
      },
      cache: {
        enabled: true,
        maxMemoryEntries: 8,
        datasetTtlSeconds: 600,
      },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      DASHBOARD_ENV: "production",
      PORT: "8080",
      LOG_LEVEL: "warn",
      DASHBOARD_PROFILE: "extended",
      DATASET_PATH: "/srv/data/latin.csv",
      DATASET_FALLBACK: "empty",
      UPLOAD_MAX_BYTES: "4096",
      CACHE_ENABLED: "false",
      CACHE_MAX_ENTRIES: "2",
      CACHE_TTL_S: "30",
    });

    expect(config.env).toBe("production");
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("warn");
    expect(config.profile).toBe("extended");
    expect(config.dataset).toEqual({
      path: "/srv/data/latin.csv",
      fallback: "empty",
      uploadMaxBytes: 4096,
    });
    expect(config.cache).toEqual({ enabled: false, maxMemoryEntries: 2, datasetTtlSeconds: 30 });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ DATASET_FALLBACK: "crash" })).toThrow(/^Invalid environment configuration: DATASET_FALLBACK: /);
    expect(() => loadConfig({ CACHE_ENABLED: "yes" })).toThrow(ConfigurationError);
  });
});
