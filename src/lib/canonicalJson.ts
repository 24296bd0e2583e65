/**
 * Canonical JSON: object keys sorted by code unit, no whitespace, undefined members dropped.
 * Arrays keep their order; callers sort set-like arrays before hashing.
 */

import { createHash } from "node:crypto";
import { InvariantViolationError } from "@/lib/errors";

function byKey(a: [string, unknown], b: [string, unknown]): number {
  if (a[0] === b[0]) return 0;
  return a[0] < b[0] ? -1 : 1;
}

function encode(value: unknown): string | undefined {
  if (value === null) return "null";
  switch (typeof value) {
    case "string":
    case "boolean":
      return JSON.stringify(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw new InvariantViolationError(`Cannot canonicalize non-finite number ${value}`);
      }
      return JSON.stringify(value);
    case "undefined":
    case "function":
    case "symbol":
      return undefined;
    case "bigint":
      throw new InvariantViolationError("Cannot canonicalize bigint values");
  }
  if (typeof value !== "object") return undefined;
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => encode(item) ?? "null").join(",")}]`;
  }
  const entries: [string, unknown][] = Object.entries(value);
  const members: string[] = [];
  for (const [key, member] of entries.sort(byKey)) {
    const encoded = encode(member);
    if (encoded !== undefined) members.push(`${JSON.stringify(key)}:${encoded}`);
  }
  return `{${members.join(",")}}`;
}

export function canonicalJson(value: unknown): string {
  return encode(value) ?? "null";
}

/** SHA-256 (hex) of the canonical JSON form. */
export function sha256Canonical(value: unknown): string {
  return createHash("sha256").update(canonicalJson(value), "utf8").digest("hex");
}
