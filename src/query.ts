/**
 * Purpose: Answer exact, nearest, and interpolated lookups over a resolved grid.
 * Intent: Stateless reads; every failure is a typed, recoverable query error.
 */

import { mergeAttributes } from "./attributes.js";
import { InterpolationUnsupportedError, NotFoundError, OutOfRangeError, QueryInputError } from "./errors.js";
import type { Grid } from "./grid.js";
import { axesTransforms, blend, bracket, cellCorners, fraction, type AxesKind, type Bracket } from "./interpolate.js";
import { isFiniteNumber, isPlainObject } from "./shared.js";
import type { Attributes, Descriptor, GridKey, ResolvedRecord } from "./types.js";

export type ParameterValues = readonly number[] | Readonly<Record<string, number>>;

export type LookupMethod = "nearest" | "linear";

export interface QueryOptions {
  axes?: AxesKind;
  allowExtrapolation?: boolean;
}

export interface ValueSpecSummary {
  index: number;
  column: string;
  unit: string;
  attributes: Attributes;
}

export function normalizePoint(grid: Grid<unknown>, values: ParameterValues): number[] {
  const names = grid.parameters.map((p) => p.column);
  const raw: unknown = values;
  let point: unknown[];
  if (Array.isArray(raw)) {
    if (raw.length !== names.length) {
      throw new QueryInputError(`Expected ${names.length} parameter values (${names.join(", ")}), got ${raw.length}`);
    }
    point = raw;
  } else if (isPlainObject(raw)) {
    for (const key of Object.keys(raw)) {
      if (!names.includes(key)) throw new QueryInputError(`Unknown parameter: ${key}`);
    }
    point = names.map((name) => {
      if (!(name in raw)) throw new QueryInputError(`Missing parameter: ${name}`);
      return raw[name];
    });
  } else {
    throw new QueryInputError("Parameter values must be a list or an object");
  }

  return point.map((v, i) => {
    if (!isFiniteNumber(v)) throw new QueryInputError(`Parameter ${names[i] ?? i} must be a finite number`);
    return v;
  });
}

/** Round the point to the grid's granularity and return the record stored at that key. */
export function lookupExact<T>(grid: Grid<T>, values: ParameterValues): T {
  const key = grid.keyOf(normalizePoint(grid, values));
  const found = grid.get(key);
  if (found === undefined) throw new NotFoundError(key);
  return found;
}

function checkRange(grid: Grid<unknown>, point: readonly number[]): void {
  point.forEach((v, axis) => {
    const values = grid.axisValues(axis);
    const min = values[0];
    const max = values[values.length - 1];
    const name = grid.parameters[axis]?.column ?? String(axis);
    if (min === undefined || max === undefined) throw new OutOfRangeError(name, v, Number.NaN, Number.NaN);
    if (v < min || v > max) throw new OutOfRangeError(name, v, min, max);
  });
}

function scaledDistance(grid: Grid<unknown>, a: readonly number[], b: GridKey): number {
  let sumSq = 0;
  a.forEach((v, axis) => {
    const g = grid.parameters[axis]?.granularity ?? 1;
    const d = (v - (b[axis] ?? 0)) / g;
    sumSq += d * d;
  });
  return sumSq;
}

function lookupNearest(grid: Grid<ResolvedRecord>, point: readonly number[]): ResolvedRecord {
  let best: { record: ResolvedRecord; d: number } | null = null;
  for (const [key, record] of grid.entries()) {
    const d = scaledDistance(grid, point, key);
    if (!best || d < best.d) best = { record, d };
  }
  if (!best) throw new NotFoundError(grid.keyOf(point), "Grid is empty");
  return best.record;
}

function lookupLinear(grid: Grid<ResolvedRecord>, point: readonly number[], options: QueryOptions): ResolvedRecord {
  const { x, y } = axesTransforms(options.axes ?? "linear");
  const brackets: Bracket[] = point.map((v, axis) => {
    const b = bracket(grid.axisValues(axis), v, options.allowExtrapolation ?? false);
    if (!b) {
      const values = grid.axisValues(axis);
      const name = grid.parameters[axis]?.column ?? String(axis);
      throw new OutOfRangeError(name, v, values[0] ?? Number.NaN, values[values.length - 1] ?? Number.NaN);
    }
    return b;
  });
  const fractions = point.map((v, axis) => {
    const b = brackets[axis];
    const name = grid.parameters[axis]?.column ?? String(axis);
    return b ? fraction(b, v, x, name) : 0;
  });

  const corners = cellCorners(brackets, fractions);
  const records = corners.map((c) => {
    const key = grid.keyOf(c.key);
    const record = grid.get(key);
    if (!record) throw new NotFoundError(key, `Grid point (${key.join(", ")}) needed for interpolation is missing`);
    return record;
  });

  const central: number[] = [];
  const upperEdge: number[] = [];
  const lowerEdge: number[] = [];
  for (const r of records) {
    if (typeof r.centralValue !== "number") {
      throw new InterpolationUnsupportedError(`Linear interpolation needs a numeric value, got '${r.centralValue}'`);
    }
    central.push(r.centralValue);
    upperEdge.push(r.centralValue + r.upperUncertainty);
    lowerEdge.push(r.centralValue - r.lowerUncertainty);
  }

  const first = records[0];
  if (!first) throw new NotFoundError(grid.keyOf(point), "Grid is empty");
  const f0 = blend(central, corners, y, "value");
  const fp = blend(upperEdge, corners, y, "upper band edge");
  const fm = blend(lowerEdge, corners, y, "lower band edge");

  return Object.freeze({
    gridKey: Object.freeze([...point]),
    centralValue: f0,
    unit: first.unit,
    lowerUncertainty: f0 - fm,
    upperUncertainty: fp - f0,
    attributes: first.attributes,
    interpolated: true,
  });
}

/**
 * Exact lookup first; when the rounded key is absent, fall back to `method`.
 * Points outside the grid on any axis raise OutOfRangeError unless extrapolation is allowed.
 */
export function lookupInterpolated(
  grid: Grid<ResolvedRecord>,
  values: ParameterValues,
  method: LookupMethod = "linear",
  options: QueryOptions = {}
): ResolvedRecord {
  const point = normalizePoint(grid, values);
  // Range is checked on the raw point; rounding must not pull an outside point onto an edge key.
  if (!options.allowExtrapolation) checkRange(grid, point);
  const exact = grid.get(grid.keyOf(point));
  if (exact) return exact;

  if (method === "nearest") return lookupNearest(grid, point);
  if (method === "linear") return lookupLinear(grid, point, options);
  throw new QueryInputError(`Unknown interpolation method: ${String(method)}`);
}

export function listDatasets(descriptor: Descriptor): ValueSpecSummary[] {
  return descriptor.values.map((spec) => ({
    index: spec.index,
    column: spec.column,
    unit: descriptor.columns.find((c) => c.name === spec.column)?.unit ?? "",
    attributes: mergeAttributes(descriptor.attributes, spec.attributes),
  }));
}
