/**
 * Canonical JSON text for the json codec
 *
 * Invariants:
 * - Pure function: same input always produces the same string
 * - Object keys sorted by code unit order; arrays keep their order
 * - No mutation of input objects
 * - Cycle detection prevents infinite loops
 */

import { CodecError } from "../errors.js";

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param input - Any JSON-serializable value
 * @returns Compact JSON with sorted object keys
 * @throws CodecError on cycles, bigint, or values JSON cannot represent
 */
export function canonicalStringify(input: unknown): string {
  const seen = new WeakSet<object>();

  const normalize = (value: unknown): unknown => {
    if (typeof value === "bigint") {
      throw new CodecError("bigint is not representable in JSON");
    }
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new CodecError(`non-finite number ${value} is not representable in JSON`);
    }
    if (value === null || typeof value !== "object") {
      return value;
    }

    // Detect cycles
    if (seen.has(value)) {
      throw new CodecError("circular reference detected in value");
    }
    seen.add(value);

    try {
      if (Array.isArray(value)) {
        return value.map(normalize);
      }

      const out: Record<string, unknown> = {};
      for (const key of Object.keys(value).sort()) {
        const field: unknown = Reflect.get(value, key);
        if (field === undefined) continue;
        out[key] = normalize(field);
      }
      return out;
    } finally {
      seen.delete(value);
    }
  };

  const text = JSON.stringify(normalize(input));
  if (text === undefined) {
    throw new CodecError(`value of type ${typeof input} is not representable in JSON`);
  }
  return text;
}
