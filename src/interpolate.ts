/**
 * Purpose: Bracket query points on sorted axes and blend corner values multilinearly.
 * Intent: Keep the numeric core free of grid and record concerns.
 */

import { InterpolationUnsupportedError } from "./errors.js";

export type AxesKind = "linear" | "log" | "loglinear" | "loglog";

export interface Bracket {
  lo: number;
  hi: number;
}

export interface AxisTransform {
  forward(v: number, label: string): number;
  inverse(v: number): number;
}

const identity: AxisTransform = {
  forward: (v) => v,
  inverse: (v) => v,
};

const logarithmic: AxisTransform = {
  forward(v, label) {
    if (!(v > 0)) throw new InterpolationUnsupportedError(`Cannot take log of non-positive ${label}: ${v}`);
    return Math.log(v);
  },
  inverse: (v) => Math.exp(v),
};

export function axesTransforms(kind: AxesKind): { x: AxisTransform; y: AxisTransform } {
  switch (kind) {
    case "linear":
      return { x: identity, y: identity };
    case "log":
      return { x: identity, y: logarithmic };
    case "loglinear":
      return { x: logarithmic, y: identity };
    case "loglog":
      return { x: logarithmic, y: logarithmic };
  }
}

/**
 * Nearest lower and upper axis values around `v`, or null when `v` lies outside
 * the axis. With `extrapolate`, points outside use the outermost pair instead.
 */
export function bracket(axis: readonly number[], v: number, extrapolate = false): Bracket | null {
  const n = axis.length;
  const first = axis[0];
  const last = axis[n - 1];
  if (first === undefined || last === undefined) return null;
  if (v < first || v > last) {
    if (!extrapolate) return null;
    if (n === 1) return { lo: first, hi: first };
    if (v < first) return { lo: first, hi: axis[1] ?? first };
    return { lo: axis[n - 2] ?? last, hi: last };
  }

  let lo = 0;
  let hi = n - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    const m = axis[mid] ?? first;
    if (m === v) return { lo: m, hi: m };
    if (m < v) lo = mid;
    else hi = mid;
  }
  const a = axis[lo] ?? first;
  const b = axis[hi] ?? last;
  if (a === v) return { lo: a, hi: a };
  if (b === v) return { lo: b, hi: b };
  return { lo: a, hi: b };
}

export function fraction(b: Bracket, v: number, x: AxisTransform, label: string): number {
  if (b.lo === b.hi) return 0;
  const lo = x.forward(b.lo, label);
  const hi = x.forward(b.hi, label);
  return (x.forward(v, label) - lo) / (hi - lo);
}

export interface Corner {
  key: number[];
  weight: number;
}

/** All 2^d corners of the bracketing cell with their multilinear weights; degenerate axes collapse. */
export function cellCorners(brackets: readonly Bracket[], fractions: readonly number[]): Corner[] {
  let corners: Corner[] = [{ key: [], weight: 1 }];
  brackets.forEach((b, axis) => {
    const t = fractions[axis] ?? 0;
    const next: Corner[] = [];
    for (const c of corners) {
      if (b.lo === b.hi) {
        next.push({ key: [...c.key, b.lo], weight: c.weight });
        continue;
      }
      next.push({ key: [...c.key, b.lo], weight: c.weight * (1 - t) });
      next.push({ key: [...c.key, b.hi], weight: c.weight * t });
    }
    corners = next;
  });
  return corners;
}

export function blend(values: readonly number[], corners: readonly Corner[], y: AxisTransform, label: string): number {
  let acc = 0;
  corners.forEach((c, i) => {
    acc += c.weight * y.forward(values[i] ?? 0, label);
  });
  return y.inverse(acc);
}
