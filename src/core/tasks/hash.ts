// src/core/tasks/hash.ts
// Stable digests of task inputs for cycle detection.

import { createHash } from "node:crypto";

export type Hash = string;

/** Deterministic SHA-256 digest for text. */
export function sha256Text(s: string): Hash {
  return createHash("sha256").update(s, "utf8").digest("hex");
}

/** JSON with object keys sorted at every level; `undefined` members dropped. */
export function stableStringify(x: unknown): string {
  if (x === undefined) return "null";
  if (x === null || typeof x !== "object") return JSON.stringify(x) ?? "null";
  if (Array.isArray(x)) return `[${x.map(stableStringify).join(",")}]`;
  const entries = Object.entries(x)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
}

export function normalizedInputsHash(inputs: Record<string, unknown>): Hash {
  return sha256Text(stableStringify(inputs));
}

/** Key identifying one task invocation in the active call chain. */
export function callKey(name: string, inputs: Record<string, unknown>): string {
  return `${name}:${normalizedInputsHash(inputs)}`;
}
