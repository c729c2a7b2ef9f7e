import { createHash } from "crypto";

/**
 * Canonical string form of a value:
 * - null / undefined fields are dropped
 * - object keys are sorted at every depth
 *
 * Values that differ only in key order or absent fields give the same string,
 * which makes the output usable as a hash input.
 */
export function canonical_stringify(input: unknown): string {
  return JSON.stringify(canonicalize(input));
}

/**
 * hash_sha256("hello")
 *   => "sha256:2cf24dba5...9824"
 */
export function hash_sha256(text: string): string {
  const h = createHash("sha256").update(text, "utf8").digest("hex");
  return `sha256:${h}`;
}

function canonicalize(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(canonicalize);

  if (v !== null && typeof v === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, val] of entries) {
      if (val === null || val === undefined) continue;
      out[k] = canonicalize(val);
    }
    return out;
  }

  return v;
}
