/**
 * Purpose: Coerce raw table fields into numbers or labels.
 * Intent: Decide each column's kind once per table so reads never re-inspect types.
 */

import type { CellValue, ColumnKind } from "./types.js";

const numberPattern = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseNumberField(raw: string): number | null {
  const trimmed = raw.trim();
  if (!numberPattern.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

export function inferColumnKind(fields: readonly string[]): ColumnKind {
  for (const f of fields) {
    if (parseNumberField(f) === null) return "string";
  }
  return "number";
}

export function coerceField(raw: string, kind: ColumnKind): CellValue {
  if (kind === "string") return raw;
  const n = parseNumberField(raw);
  if (n === null) throw new Error(`coerceField: expected number, got '${raw}'`);
  return n;
}
