/**
 * L0 Tests: ResultCache and cache keys
 */

import { describe, expect, test } from "vitest";
import { ResultCache } from "../../src/result-cache";
import { cacheKey, canonicalJson } from "../../src/cache-key";

describe("L0: ResultCache", () => {
  const ttl = 1_000;

  test("entry older than ttl reads as a miss", () => {
    const cache = new ResultCache(ttl);
    const now = 10_000;
    cache.put("k", { result: "y" }, now - ttl - 1);

    expect(cache.get("k", now)).toBeUndefined();
  });

  test("entry younger than ttl reads as a hit", () => {
    const cache = new ResultCache(ttl);
    const now = 10_000;
    cache.put("k", { result: "y" }, now - ttl + 1);

    expect(cache.get("k", now)).toEqual({ result: "y" });
  });

  test("entry exactly ttl old is expired", () => {
    const cache = new ResultCache(ttl);
    cache.put("k", 1, 0);

    expect(cache.get("k", ttl)).toBeUndefined();
  });

  test("expired entries stay stored until overwritten or cleared", () => {
    const cache = new ResultCache(ttl);
    cache.put("k", "old", 0);

    expect(cache.get("k", 5_000)).toBeUndefined();
    expect(cache.size).toBe(1);

    cache.put("k", "new", 5_000);
    expect(cache.get("k", 5_001)).toBe("new");
    expect(cache.size).toBe(1);
  });

  test("null results are cacheable", () => {
    const cache = new ResultCache(ttl);
    cache.put("k", null, 0);

    expect(cache.get("k", 1)).toBeNull();
  });

  test("clear removes every entry", () => {
    const cache = new ResultCache(ttl);
    cache.put("a", 1, 0);
    cache.put("b", 2, 0);
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.get("a", 1)).toBeUndefined();
  });
});

describe("L0: cacheKey", () => {
  test("is stable across repeated calls", () => {
    const params = { code: "x", options: { depth: 2, flags: ["a", "b"] } };

    expect(cacheKey(params)).toBe(cacheKey(params));
    expect(cacheKey(params)).toMatch(/^[0-9a-f]{64}$/);
  });

  test("ignores object key order at every depth", () => {
    const a = { code: "x", options: { depth: 2, mode: "fast" } };
    const b = { options: { mode: "fast", depth: 2 }, code: "x" };

    expect(cacheKey(a)).toBe(cacheKey(b));
  });

  test("distinguishes different params", () => {
    expect(cacheKey({ code: "x" })).not.toBe(cacheKey({ code: "y" }));
    expect(cacheKey({ items: [1, 2] })).not.toBe(cacheKey({ items: [2, 1] }));
  });

  test("canonical form sorts keys and keeps array order", () => {
    expect(canonicalJson({ b: [2, 1], a: { d: null, c: true } })).toBe(
      '{"a":{"c":true,"d":null},"b":[2,1]}'
    );
  });

  test("matches sha256 of the canonical form", () => {
    // sha256("{}")
    expect(cacheKey({})).toBe("44136fa355b3678a1146ad16f7e8649e94fb4fc21fe77e8310c060f61caaff8a");
  });
});
