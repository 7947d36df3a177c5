/**
 * Purpose: Merge dataset attributes with a value spec's own overrides.
 * Intent: Keep layered attributes a pure function of its two inputs.
 */

import type { AttributeValue, Attributes } from "./types.js";

export function mergeAttributes(base: Attributes, override: Attributes | null): Attributes {
  const out: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(base)) out[key] = typeof value === "string" ? value : [...value];
  if (override) {
    for (const [key, value] of Object.entries(override)) out[key] = typeof value === "string" ? value : [...value];
  }
  for (const value of Object.values(out)) {
    if (Array.isArray(value)) Object.freeze(value);
  }
  return Object.freeze(out);
}
