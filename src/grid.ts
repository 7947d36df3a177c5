/**
 * Purpose: Index table rows by their rounded parameter values.
 * Intent: Give queries a frozen, ordered key space with exact and per-axis access.
 */

import { ParseError } from "./errors.js";
import { info } from "./shared.js";
import type { GridKey, LoadedTable, ParameterInfo, Row, XsecMessage } from "./types.js";

export interface GridOptions {
  /**
   * "last-wins" (default): a row whose rounded key matches an earlier row replaces it,
   * so the grid always reflects the table's final word for each point.
   * "error": a second row for the same key raises ParseError.
   */
  duplicateKeys?: "last-wins" | "error";
}

export interface Grid<T> {
  readonly parameters: readonly ParameterInfo[];
  readonly size: number;
  keyOf(values: readonly number[]): GridKey;
  has(key: GridKey): boolean;
  get(key: GridKey): T | undefined;
  keys(): GridKey[];
  entries(): [GridKey, T][];
  axisValues(axis: number): number[];
  map<U>(fn: (value: T, key: GridKey) => U): Grid<U>;
}

const SIGNIFICANT_DIGITS = 12;

export function snapToGranularity(value: number, granularity: number | null): number {
  if (granularity === null) return value;
  const snapped = Math.round(value / granularity) * granularity;
  const normalized = Number(snapped.toPrecision(SIGNIFICANT_DIGITS));
  return Object.is(normalized, -0) ? 0 : normalized;
}

export function gridKeyString(key: GridKey): string {
  return key.map((v) => String(v)).join(",");
}

export function compareKeys(a: GridKey, b: GridKey): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    if (d !== 0) return d;
  }
  return a.length - b.length;
}

function createGrid<T>(parameters: readonly ParameterInfo[], map: Map<string, { key: GridKey; value: T }>): Grid<T> {
  const sorted = [...map.values()].sort((a, b) => compareKeys(a.key, b.key));
  const axes = parameters.map((_, axis) => {
    const set = new Set<number>();
    for (const e of sorted) set.add(e.key[axis] ?? 0);
    return [...set].sort((a, b) => a - b);
  });

  const grid: Grid<T> = {
    parameters,
    size: sorted.length,
    keyOf(values: readonly number[]): GridKey {
      if (values.length !== parameters.length) {
        throw new Error(`keyOf: expected ${parameters.length} values, got ${values.length}`);
      }
      return Object.freeze(values.map((v, i) => snapToGranularity(v, parameters[i]?.granularity ?? null)));
    },
    has(key: GridKey): boolean {
      return map.has(gridKeyString(key));
    },
    get(key: GridKey): T | undefined {
      return map.get(gridKeyString(key))?.value;
    },
    keys(): GridKey[] {
      return sorted.map((e) => e.key);
    },
    entries(): [GridKey, T][] {
      return sorted.map((e) => [e.key, e.value]);
    },
    axisValues(axis: number): number[] {
      const values = axes[axis];
      if (!values) throw new Error(`axisValues: no axis ${axis}`);
      return [...values];
    },
    map<U>(fn: (value: T, key: GridKey) => U): Grid<U> {
      const out = new Map<string, { key: GridKey; value: U }>();
      for (const e of sorted) out.set(gridKeyString(e.key), { key: e.key, value: fn(e.value, e.key) });
      return createGrid(parameters, out);
    },
  };
  return Object.freeze(grid);
}

function rowText(row: Row): string {
  return Object.values(row).map(String).join(" ");
}

/**
 * Build the parameter grid of a loaded table.
 *
 * Rows are visited in table order and keyed by `round(v / granularity) * granularity`
 * per parameter. Under the default "last-wins" policy a later row replaces an earlier
 * row with the same key; rows are never averaged. Each replacement is reported as an
 * info diagnostic.
 */
export function buildParameterGrid(
  table: LoadedTable,
  parameters: readonly ParameterInfo[],
  options: GridOptions = {}
): { grid: Grid<Row>; messages: XsecMessage[] } {
  const messages: XsecMessage[] = [];
  const policy = options.duplicateKeys ?? "last-wins";
  const map = new Map<string, { key: GridKey; value: Row }>();
  const rowOfKey = new Map<string, number>();

  table.rows.forEach((row, rowIndex) => {
    const values = parameters.map((p) => {
      const v = row[p.column];
      if (typeof v !== "number") {
        throw new ParseError(rowIndex, rowText(row), `Row ${rowIndex}: parameter ${p.column} is not numeric: ${String(v)}`);
      }
      return snapToGranularity(v, p.granularity);
    });
    const key: GridKey = Object.freeze(values);
    const ks = gridKeyString(key);
    const previous = rowOfKey.get(ks);
    if (previous !== undefined) {
      if (policy === "error") {
        throw new ParseError(
          rowIndex,
          rowText(row),
          `Row ${rowIndex} duplicates grid point (${key.join(", ")}) of row ${previous}`,
          "XS_GRID_DUPLICATE_KEY"
        );
      }
      info(messages, "XS_GRID_DUPLICATE_KEY", `Row ${rowIndex} replaces row ${previous} at (${key.join(", ")})`, {
        line: table.lines[rowIndex],
      });
    }
    rowOfKey.set(ks, rowIndex);
    map.set(ks, { key, value: row });
  });

  return { grid: createGrid(parameters, map), messages };
}
