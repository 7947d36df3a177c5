/**
 * Purpose: Declare shared descriptor, table, grid, and record types.
 * Intent: Keep cross-module contracts explicit and stable.
 */

export type XsecSeverity = "error" | "warning" | "info";

export interface XsecMessage {
  severity: XsecSeverity;
  code?: string;
  message: string;
  file?: string;
  line?: number;
  column?: number;
  field?: string;
}

export type AttributeValue = string | string[];

export type Attributes = Readonly<Record<string, AttributeValue>>;

export interface ColumnInfo {
  index: number;
  name: string;
  unit: string;
}

export interface ReaderOptions {
  skiprows: number;
  delimWhitespace: boolean;
  skipinitialspace: boolean;
  delimiter: string;
  comment: string | null;
}

export interface ParameterInfo {
  column: string;
  granularity: number | null;
}

export type UncertaintyType = "relative" | "absolute" | "absolute,signed";

export type UncertaintyComponent =
  | { type: "relative"; column: string }
  | { type: "absolute"; column: string }
  | { type: "absolute,signed"; columns: readonly [string, string] };

export interface ValueSpec {
  index: number;
  column: string;
  uncMinus: readonly UncertaintyComponent[];
  uncPlus: readonly UncertaintyComponent[];
  // true when the spec used the symmetric `unc` block
  symmetric: boolean;
  attributes: Attributes | null;
}

export interface Descriptor {
  document: Readonly<Record<string, unknown>>;
  attributes: Attributes;
  columns: readonly ColumnInfo[];
  readerOptions: ReaderOptions;
  parameters: readonly ParameterInfo[];
  values: readonly ValueSpec[];
}

export type CellValue = number | string;

export type ColumnKind = "number" | "string";

export type Row = Readonly<Record<string, CellValue>>;

export interface LoadedTable {
  columns: readonly ColumnInfo[];
  kinds: Readonly<Record<string, ColumnKind>>;
  rows: readonly Row[];
  // 1-based source line of each row
  lines: readonly number[];
  skippedRows: number;
}

export type GridKey = readonly number[];

export interface ResolvedRecord {
  gridKey: GridKey;
  centralValue: CellValue;
  unit: string;
  lowerUncertainty: number;
  upperUncertainty: number;
  attributes: Attributes;
  interpolated?: boolean;
}
