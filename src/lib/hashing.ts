import { createHash } from "node:crypto";
import * as fs from "node:fs";

export function sha1Hex(data: string | Buffer): string {
  return createHash("sha1").update(data).digest("hex");
}

/** Content hash of a file, in the `sha1:<hex>` form recorded in provenance. */
export function hashFile(fullPath: string): string {
  return `sha1:${sha1Hex(fs.readFileSync(fullPath))}`;
}

/**
 * Deterministic JSON serialization with sorted keys (recursive).
 * Keys with `undefined` values are omitted; dates serialize as ISO strings.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) {
    return "null";
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? "null" : stableStringify(v))).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(
    ([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`,
  );
  return `{${pairs.join(",")}}`;
}
