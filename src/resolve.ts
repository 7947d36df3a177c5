/**
 * Purpose: Turn grid rows into resolved records for one value specification.
 * Intent: Attach central value, unit, combined bands, and merged attributes exactly once per row.
 */

import { mergeAttributes } from "./attributes.js";
import { QueryInputError, UncertaintyConfigError } from "./errors.js";
import type { Grid } from "./grid.js";
import { combineUncertainty, type CombineContext } from "./uncertainty.js";
import type { Attributes, ColumnInfo, Descriptor, GridKey, ResolvedRecord, Row, ValueSpec } from "./types.js";

export interface ResolveContext {
  columns: readonly ColumnInfo[];
  attributes: Attributes;
}

export function resolveRecord(row: Row, spec: ValueSpec, gridKey: GridKey, ctx: ResolveContext): ResolvedRecord {
  const fail = (column: string | null, message: string): never => {
    throw new UncertaintyConfigError(spec.index, column, `values[${spec.index}]: ${message}`);
  };

  const central = row[spec.column];
  if (central === undefined) return fail(spec.column, `column ${spec.column} is absent from the row`);

  const combine: CombineContext = {
    central: typeof central === "number" ? central : null,
    read(column: string): number {
      const v = row[column];
      if (v === undefined) return fail(column, `uncertainty column ${column} is absent from the row`);
      if (typeof v !== "number") return fail(column, `uncertainty column ${column} is not numeric: ${v}`);
      return v;
    },
    fail,
  };
  const { lower, upper } = combineUncertainty(spec, combine);
  const unit = ctx.columns.find((c) => c.name === spec.column)?.unit ?? "";

  return Object.freeze({
    gridKey,
    centralValue: central,
    unit,
    lowerUncertainty: lower,
    upperUncertainty: upper,
    attributes: mergeAttributes(ctx.attributes, spec.attributes),
  });
}

export function resolveValueSpec(grid: Grid<Row>, spec: ValueSpec, descriptor: Descriptor): Grid<ResolvedRecord> {
  const ctx: ResolveContext = { columns: descriptor.columns, attributes: descriptor.attributes };
  return grid.map((row, key) => resolveRecord(row, spec, key, ctx));
}

/** Central value shifted by `level` standard deviations along the matching band. */
export function valueAtLevel(record: ResolvedRecord, level = 0): number {
  if (typeof record.centralValue !== "number") {
    throw new QueryInputError(`valueAtLevel: central value is not numeric: ${record.centralValue}`);
  }
  if (level > 0) return record.centralValue + level * record.upperUncertainty;
  if (level < 0) return record.centralValue + level * record.lowerUncertainty;
  return record.centralValue;
}
