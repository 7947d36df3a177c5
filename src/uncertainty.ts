/**
 * Purpose: Combine declared uncertainty sources into one lower and one upper band.
 * Intent: Dispatch on the component's type tag and add independent sources in quadrature.
 */

import type { UncertaintyComponent, UncertaintyType, ValueSpec } from "./types.js";

export type Side = "lower" | "upper";

export interface Contribution {
  side: Side;
  magnitude: number;
}

export interface CombineContext {
  /** Numeric central value, or null when the target column holds labels. */
  central: number | null;
  /** Reads a numeric uncertainty field; throws when the column is absent or not numeric. */
  read(column: string): number;
  /** Raised for inconsistent component configuration. */
  fail(column: string | null, message: string): never;
}

type ComponentOf<K extends UncertaintyType> = Extract<UncertaintyComponent, { type: K }>;

type Contributor<K extends UncertaintyType> = (component: ComponentOf<K>, side: Side, ctx: CombineContext) => Contribution[];

const contributors: { [K in UncertaintyType]: Contributor<K> } = {
  relative(component, side, ctx) {
    const central = ctx.central;
    if (central === null) {
      return ctx.fail(component.column, `relative uncertainty ${component.column} needs a numeric central value`);
    }
    const percent = ctx.read(component.column);
    return [{ side, magnitude: (Math.abs(percent) / 100) * Math.abs(central) }];
  },
  absolute(component, side, ctx) {
    return [{ side, magnitude: Math.abs(ctx.read(component.column)) }];
  },
  // Each shift is routed by its own sign; the declaring block does not matter.
  // The parser guarantees exactly two columns.
  "absolute,signed"(component, _side, ctx) {
    const out: Contribution[] = [];
    for (const column of component.columns) {
      const v = ctx.read(column);
      if (v < 0) out.push({ side: "lower", magnitude: -v });
      else if (v > 0) out.push({ side: "upper", magnitude: v });
    }
    return out;
  },
};

function contribute(component: UncertaintyComponent, side: Side, ctx: CombineContext): Contribution[] {
  switch (component.type) {
    case "relative":
      return contributors.relative(component, side, ctx);
    case "absolute":
      return contributors.absolute(component, side, ctx);
    case "absolute,signed":
      return contributors["absolute,signed"](component, side, ctx);
  }
}

export function quadrature(magnitudes: readonly number[]): number {
  let sumSq = 0;
  for (const m of magnitudes) sumSq += m * m;
  return Math.sqrt(sumSq);
}

function signedPairKey(component: UncertaintyComponent): string | null {
  return component.type === "absolute,signed" ? component.columns.join("\u0000") : null;
}

/**
 * Collect every contribution of a value spec and fold each side in quadrature.
 *
 * A signed pair listed in both blocks (or in the symmetric block) is counted once.
 */
export function combineUncertainty(spec: ValueSpec, ctx: CombineContext): { lower: number; upper: number } {
  const blocks: [Side, readonly UncertaintyComponent[]][] = [
    ["lower", spec.uncMinus],
    ["upper", spec.uncPlus],
  ];
  const seenPairs = new Set<string>();
  const lower: number[] = [];
  const upper: number[] = [];

  for (const [side, components] of blocks) {
    for (const component of components) {
      const pair = signedPairKey(component);
      if (pair !== null) {
        if (seenPairs.has(pair)) continue;
        seenPairs.add(pair);
      }
      for (const c of contribute(component, side, ctx)) {
        (c.side === "lower" ? lower : upper).push(c.magnitude);
      }
    }
  }

  return { lower: quadrature(lower), upper: quadrature(upper) };
}
