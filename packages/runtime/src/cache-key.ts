import { createHash } from "crypto";
import type { JsonValue } from "@tool-agents/types";

/**
 * Serialise a JSON value with object keys sorted at every depth, so that
 * `{a, b}` and `{b, a}` produce the same text.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }

  const entries = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
  return `{${entries.join(",")}}`;
}

/**
 * Derive the cache key for request params: sha256 of the canonical JSON,
 * lowercase hex. Stable across calls and processes.
 */
export function cacheKey(params: JsonValue): string {
  return createHash("sha256").update(canonicalJson(params)).digest("hex");
}
