// ---------------------------------------------------------------------------
// Tests for MemoryCache (LRU with per-entry TTL).
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { MemoryCache } from "../../../src/cache/memory-cache.js";

describe("MemoryCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects a capacity below one", () => {
    expect(() => new MemoryCache<number>(0)).toThrow(RangeError);
    expect(() => new MemoryCache<number>(2.5)).toThrow("maxEntries must be a positive integer");
  });

  it("stores and replaces values", () => {
    const cache = new MemoryCache<number>(4);
    expect(cache.get("rows")).toBeNull();

    cache.set("rows", 10);
    cache.set("rows", 12);

    expect(cache.get("rows")).toBe(12);
    expect(cache.size).toBe(1);
  });

  // ── Expiry ──────────────────────────────────────────────────────────────

  it("serves an entry until its TTL has passed", () => {
    const cache = new MemoryCache<string>(4);
    cache.set("file:a.csv", "parsed", 1_000);

    vi.advanceTimersByTime(1_000);
    expect(cache.get("file:a.csv")).toBe("parsed");

    vi.advanceTimersByTime(1);
    expect(cache.get("file:a.csv")).toBeNull();
    expect(cache.size).toBe(0);
  });

  it("defaults to a ten minute TTL", () => {
    const cache = new MemoryCache<string>(4);
    cache.set("k", "v");

    vi.advanceTimersByTime(600_000);
    expect(cache.get("k")).toBe("v");

    vi.advanceTimersByTime(1);
    expect(cache.get("k")).toBeNull();
  });

  // ── Eviction ────────────────────────────────────────────────────────────

  it("evicts the oldest entry when full", () => {
    const cache = new MemoryCache<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("c", 3);

    expect(cache.get("a")).toBeNull();
    expect(cache.get("b")).toBe(2);
    expect(cache.get("c")).toBe(3);
  });

  it("treats a read as a use", () => {
    const cache = new MemoryCache<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.get("a")).toBe(1);
    expect(cache.get("b")).toBeNull();
  });

  // ── Removal ─────────────────────────────────────────────────────────────

  it("deletes single keys and reports whether they existed", () => {
    const cache = new MemoryCache<number>(4);
    cache.set("a", 1);

    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
  });

  it("deletes every key matching a predicate", () => {
    const cache = new MemoryCache<number>(4);
    cache.set("file:/data/a.csv:1:10", 1);
    cache.set("file:/data/a.csv:2:12", 2);
    cache.set("file:/data/b.csv:1:10", 3);

    expect(cache.deleteWhere((key) => key.startsWith("file:/data/a.csv:"))).toBe(2);
    expect(cache.size).toBe(1);
    expect(cache.get("file:/data/b.csv:1:10")).toBe(3);
  });

  it("clears everything", () => {
    const cache = new MemoryCache<number>(4);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.clear();

    expect(cache.size).toBe(0);
  });
});
