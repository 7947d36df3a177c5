/**
 * Purpose: Provide stable public exports for descriptor loading and grid queries.
 * Intent: Keep call sites unchanged while internals live in focused modules.
 */

export { loadDataset, loadDatasetFiles } from "./dataset.js";
export type { DatasetHandle, DescriptorSource, LoadOptions, QueryMethod, QueryResult, ValueSpecEntry } from "./dataset.js";

export {
  formatDocument,
  getColumn,
  parseDescriptor,
  parseDescriptorDocument,
  parseDescriptorReporting,
} from "./descriptor_parse.js";
export {
  descriptorFormatOf,
  loadDescriptorFile,
  parseDescriptorText,
  readDescriptorDocument,
  readDescriptorText,
} from "./descriptor_load.js";
export type { DescriptorFormat } from "./descriptor_load.js";

export { loadTable, loadTableFile } from "./table_load.js";
export type { TableLoadOptions } from "./table_load.js";

export { buildParameterGrid, snapToGranularity } from "./grid.js";
export type { Grid, GridOptions } from "./grid.js";

export { combineUncertainty, quadrature } from "./uncertainty.js";
export { mergeAttributes } from "./attributes.js";
export { resolveRecord, resolveValueSpec, valueAtLevel } from "./resolve.js";

export { listDatasets, lookupExact, lookupInterpolated } from "./query.js";
export type { LookupMethod, ParameterValues, QueryOptions, ValueSpecSummary } from "./query.js";
export type { AxesKind } from "./interpolate.js";

export {
  InterpolationUnsupportedError,
  isQueryError,
  NotFoundError,
  OutOfRangeError,
  ParseError,
  QueryInputError,
  SchemaError,
  UncertaintyConfigError,
  XsecError,
} from "./errors.js";
export type { QueryError } from "./errors.js";

export type {
  AttributeValue,
  Attributes,
  CellValue,
  ColumnInfo,
  ColumnKind,
  Descriptor,
  GridKey,
  LoadedTable,
  ParameterInfo,
  ReaderOptions,
  ResolvedRecord,
  Row,
  UncertaintyComponent,
  UncertaintyType,
  ValueSpec,
  XsecMessage,
  XsecSeverity,
} from "./types.js";
