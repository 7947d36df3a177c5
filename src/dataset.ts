/**
 * Purpose: Run descriptor, table, grid, and resolution steps once and expose the query API.
 * Intent: Build everything at load time so handles are immutable and safe to share.
 */

import { readFileSync } from "node:fs";
import { readDescriptorDocument } from "./descriptor_load.js";
import { parseDescriptorReporting } from "./descriptor_parse.js";
import { isQueryError, QueryInputError, SchemaError, UncertaintyConfigError, type QueryError } from "./errors.js";
import { buildParameterGrid, type Grid, type GridOptions } from "./grid.js";
import {
  listDatasets,
  lookupExact,
  lookupInterpolated,
  type LookupMethod,
  type ParameterValues,
  type QueryOptions,
  type ValueSpecSummary,
} from "./query.js";
import { resolveValueSpec } from "./resolve.js";
import { err, isPlainObject } from "./shared.js";
import { loadTable, type TableLoadOptions } from "./table_load.js";
import type { Descriptor, LoadedTable, ResolvedRecord, Row, XsecMessage } from "./types.js";

export interface LoadOptions extends TableLoadOptions, GridOptions {
  /** Defaults applied to every interpolated query of the handle. */
  query?: QueryOptions;
}

export type QueryMethod = "exact" | LookupMethod;

export interface ValueSpecEntry extends ValueSpecSummary {
  error?: UncertaintyConfigError;
}

export type QueryResult =
  | { ok: true; record: ResolvedRecord }
  | { ok: false; error: QueryError | UncertaintyConfigError };

export interface DatasetHandle {
  readonly descriptor: Descriptor;
  readonly table: LoadedTable;
  readonly grid: Grid<Row>;
  readonly messages: readonly XsecMessage[];
  readonly skippedRows: number;
  valueSpecs(): ValueSpecEntry[];
  query(index: number, values: ParameterValues, method?: QueryMethod, options?: QueryOptions): ResolvedRecord;
  tryQuery(index: number, values: ParameterValues, method?: QueryMethod, options?: QueryOptions): QueryResult;
}

/** A validated descriptor, or a raw descriptor document still to be parsed. */
export type DescriptorSource = Descriptor | Readonly<Record<string, unknown>>;

type ResolvedSpec = { grid: Grid<ResolvedRecord> } | { error: UncertaintyConfigError };

function isParsedDescriptor(source: DescriptorSource): source is Descriptor {
  return Object.isFrozen(source) && "readerOptions" in source && "values" in source;
}

export function loadDataset(source: DescriptorSource, content: string, options: LoadOptions = {}): DatasetHandle {
  const messages: XsecMessage[] = [];
  let descriptor: Descriptor;
  if (isParsedDescriptor(source)) {
    descriptor = source;
  } else {
    const parsed = parseDescriptorReporting(source);
    messages.push(...parsed.messages);
    descriptor = parsed.descriptor;
  }
  const loaded = loadTable(descriptor, content, options);
  messages.push(...loaded.messages);
  const built = buildParameterGrid(loaded.table, descriptor.parameters, options);
  messages.push(...built.messages);

  const resolved: ResolvedSpec[] = descriptor.values.map((spec) => {
    try {
      return { grid: resolveValueSpec(built.grid, spec, descriptor) };
    } catch (e) {
      if (!(e instanceof UncertaintyConfigError)) throw e;
      err(messages, e.code, e.message, { field: `values[${spec.index}]` });
      return { error: e };
    }
  });

  const summaries = listDatasets(descriptor);
  const defaults = options.query ?? {};

  function resolvedGrid(index: number): Grid<ResolvedRecord> {
    const entry = resolved[index];
    if (!entry) throw new QueryInputError(`No value specification at index ${index}`);
    if ("error" in entry) throw entry.error;
    return entry.grid;
  }

  const handle: DatasetHandle = {
    descriptor,
    table: loaded.table,
    grid: built.grid,
    messages: Object.freeze(messages),
    skippedRows: loaded.table.skippedRows,
    valueSpecs(): ValueSpecEntry[] {
      return summaries.map((s, i) => {
        const entry = resolved[i];
        return entry && "error" in entry ? { ...s, error: entry.error } : { ...s };
      });
    },
    query(index, values, method = "exact", queryOptions = {}) {
      const grid = resolvedGrid(index);
      if (method === "exact") return lookupExact(grid, values);
      return lookupInterpolated(grid, values, method, { ...defaults, ...queryOptions });
    },
    tryQuery(index, values, method = "exact", queryOptions = {}) {
      try {
        return { ok: true, record: handle.query(index, values, method, queryOptions) };
      } catch (e) {
        if (isQueryError(e) || e instanceof UncertaintyConfigError) return { ok: false, error: e };
        throw e;
      }
    },
  };
  return Object.freeze(handle);
}

export function loadDatasetFiles(descriptorPath: string, tablePath: string, options: LoadOptions = {}): DatasetHandle {
  const doc = readDescriptorDocument(descriptorPath);
  if (!isPlainObject(doc)) throw new SchemaError("document", "Descriptor must be an object");
  return loadDataset(doc, readFileSync(tablePath, "utf8"), options);
}
