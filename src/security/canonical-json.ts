// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

/**
 * Deterministic JSON for signing: object keys sorted by code unit, arrays kept
 * in order, no whitespace. Devices must sign exactly the bytes they send; this
 * is the serialization the simulator and reference firmware use.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, item] of entries) {
      out[key] = sortKeys(item);
    }
    return out;
  }
  return value;
}
