/**
 * Purpose: Parse the individual sections of a table descriptor document.
 * Intent: Keep per-field validation deterministic and diagnostics field-stable.
 */

import { asString, bannedKeys, err, isFiniteNumber, isPlainObject, warn } from "./shared.js";
import type {
  AttributeValue,
  ColumnInfo,
  ParameterInfo,
  ReaderOptions,
  UncertaintyComponent,
  UncertaintyType,
  ValueSpec,
  XsecMessage,
} from "./types.js";

export const defaultReaderOptions: ReaderOptions = {
  skiprows: 0,
  delimWhitespace: false,
  skipinitialspace: false,
  delimiter: ",",
  comment: null,
};

const uncertaintyTypes = new Set<string>(["relative", "absolute", "absolute,signed"]);

function isUncertaintyType(v: unknown): v is UncertaintyType {
  return typeof v === "string" && uncertaintyTypes.has(v);
}

function warnUnknownKeys(obj: Record<string, unknown>, known: readonly string[], field: string, messages: XsecMessage[]): void {
  for (const key of Object.keys(obj)) {
    if (known.includes(key)) continue;
    warn(messages, "XS_SCHEMA_UNKNOWN_KEY", `Unknown key '${key}' in ${field}`, { field: `${field}.${key}` });
  }
}

export function parseAttributes(
  raw: unknown,
  field: string,
  messages: XsecMessage[]
): Record<string, AttributeValue> | null {
  if (!isPlainObject(raw)) {
    err(messages, "XS_SCHEMA_ATTRIBUTES_TYPE", `${field} must be an object`, { field });
    return null;
  }
  const out: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (bannedKeys.has(key)) {
      err(messages, "XS_SCHEMA_ATTRIBUTE_KEY", `Disallowed attribute key: ${key}`, { field: `${field}.${key}` });
      continue;
    }
    if (typeof value === "string") {
      out[key] = value;
      continue;
    }
    if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
      out[key] = [...value];
      continue;
    }
    err(messages, "XS_SCHEMA_ATTRIBUTE_VALUE", `Attribute '${key}' must be a string or a list of strings`, {
      field: `${field}.${key}`,
    });
  }
  return out;
}

export function parseColumns(raw: unknown, messages: XsecMessage[]): ColumnInfo[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    err(messages, "XS_SCHEMA_COLUMNS_MISSING", "columns must be a non-empty list", { field: "columns" });
    return [];
  }

  const columns: ColumnInfo[] = [];
  const seen = new Set<string>();
  for (let i = 0; i < raw.length; i++) {
    const entry: unknown = raw[i];
    const field = `columns[${i}]`;
    if (!isPlainObject(entry)) {
      err(messages, "XS_SCHEMA_COLUMN_TYPE", `${field} must be an object`, { field });
      continue;
    }
    warnUnknownKeys(entry, ["index", "name", "unit"], field, messages);

    const name = asString(entry.name);
    if (!name) {
      err(messages, "XS_SCHEMA_COLUMN_NAME", `${field}: name is missing`, { field: `${field}.name` });
      continue;
    }
    if (bannedKeys.has(name)) {
      err(messages, "XS_SCHEMA_COLUMN_NAME", `Disallowed column name: ${name}`, { field: `${field}.name` });
      continue;
    }
    if (entry.unit !== undefined && entry.unit !== null && typeof entry.unit !== "string") {
      err(messages, "XS_SCHEMA_COLUMN_UNIT", `${field}: unit must be a string`, { field: `${field}.unit` });
      continue;
    }
    if (entry.index !== undefined && entry.index !== i) {
      err(messages, "XS_SCHEMA_COLUMN_INDEX", `Mismatched column index: ${i} has ${String(entry.index)}`, {
        field: `${field}.index`,
      });
      continue;
    }
    if (seen.has(name)) {
      err(messages, "XS_SCHEMA_COLUMN_DUPLICATE", `Duplicated column name: ${name}`, { field: `${field}.name` });
      continue;
    }
    seen.add(name);
    columns.push({ index: i, name, unit: typeof entry.unit === "string" ? entry.unit : "" });
  }
  return columns;
}

export function parseReaderOptions(raw: unknown, messages: XsecMessage[]): ReaderOptions {
  const opts: ReaderOptions = { ...defaultReaderOptions };
  if (raw === undefined || raw === null) return opts;
  if (!isPlainObject(raw)) {
    err(messages, "XS_SCHEMA_READER_OPTIONS_TYPE", "reader_options must be an object", { field: "reader_options" });
    return opts;
  }

  for (const [key, value] of Object.entries(raw)) {
    const field = `reader_options.${key}`;
    switch (key) {
      case "skiprows":
        if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
          err(messages, "XS_SCHEMA_READER_OPTION_VALUE", "skiprows must be a non-negative integer", { field });
        } else {
          opts.skiprows = value;
        }
        break;
      case "delim_whitespace":
      case "skipinitialspace":
        if (typeof value !== "boolean") {
          err(messages, "XS_SCHEMA_READER_OPTION_VALUE", `${key} must be a boolean`, { field });
        } else if (key === "delim_whitespace") {
          opts.delimWhitespace = value;
        } else {
          opts.skipinitialspace = value;
        }
        break;
      case "delimiter":
        if (typeof value !== "string" || value.length === 0) {
          err(messages, "XS_SCHEMA_READER_OPTION_VALUE", `${key} must be a non-empty string`, { field });
        } else {
          opts.delimiter = value;
        }
        break;
      case "comment":
        if (typeof value !== "string" || value.length !== 1) {
          err(messages, "XS_SCHEMA_READER_OPTION_VALUE", "comment must be a single character", { field });
        } else {
          opts.comment = value;
        }
        break;
      default:
        err(messages, "XS_SCHEMA_READER_OPTION_UNKNOWN", `Unrecognized reader option: ${key}`, { field });
    }
  }
  return opts;
}

export function parseParameters(raw: unknown, messages: XsecMessage[]): ParameterInfo[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    err(messages, "XS_SCHEMA_PARAMETERS_MISSING", "parameters must be a non-empty list", { field: "parameters" });
    return [];
  }

  const params: ParameterInfo[] = [];
  for (let i = 0; i < raw.length; i++) {
    const entry: unknown = raw[i];
    const field = `parameters[${i}]`;
    if (!isPlainObject(entry)) {
      err(messages, "XS_SCHEMA_PARAMETER_TYPE", `${field} must be an object`, { field });
      continue;
    }
    warnUnknownKeys(entry, ["column", "granularity"], field, messages);

    const column = asString(entry.column);
    if (!column) {
      err(messages, "XS_SCHEMA_PARAMETER_COLUMN", `${field}: column is missing`, { field: `${field}.column` });
      continue;
    }
    const g = entry.granularity;
    if (g === undefined || g === null) {
      params.push({ column, granularity: null });
      continue;
    }
    if (!isFiniteNumber(g) || g <= 0) {
      err(messages, "XS_SCHEMA_GRANULARITY", `${field}: granularity must be a positive number`, {
        field: `${field}.granularity`,
      });
      continue;
    }
    params.push({ column, granularity: g });
  }
  return params;
}

function componentColumns(entry: Record<string, unknown>): string[] | null {
  const raw = entry.columns !== undefined ? entry.columns : entry.column;
  if (typeof raw === "string") return raw ? [raw] : null;
  if (Array.isArray(raw) && raw.every((c): c is string => typeof c === "string" && c.length > 0)) return [...raw];
  return null;
}

export function parseUncertaintyComponents(
  raw: unknown,
  field: string,
  messages: XsecMessage[]
): UncertaintyComponent[] {
  if (!Array.isArray(raw)) {
    err(messages, "XS_SCHEMA_UNCERTAINTY_TYPE", `${field} must be a list of sources`, { field });
    return [];
  }

  const out: UncertaintyComponent[] = [];
  for (let i = 0; i < raw.length; i++) {
    const entry: unknown = raw[i];
    const entryField = `${field}[${i}]`;
    if (!isPlainObject(entry)) {
      err(messages, "XS_SCHEMA_UNCERTAINTY_TYPE", `${entryField} must be an object`, { field: entryField });
      continue;
    }
    warnUnknownKeys(entry, ["column", "columns", "type"], entryField, messages);

    const type = entry.type;
    if (!isUncertaintyType(type)) {
      err(messages, "XS_SCHEMA_UNCERTAINTY_KIND", `${entryField}: unknown uncertainty type: ${String(type)}`, {
        field: `${entryField}.type`,
      });
      continue;
    }
    const cols = componentColumns(entry);
    if (!cols) {
      err(messages, "XS_SCHEMA_UNCERTAINTY_COLUMN", `${entryField}: column is missing`, { field: `${entryField}.column` });
      continue;
    }

    if (type === "absolute,signed") {
      const [a, b] = cols;
      if (cols.length !== 2 || a === undefined || b === undefined) {
        err(messages, "XS_SCHEMA_UNCERTAINTY_ARITY", `${entryField}: absolute,signed needs exactly two columns`, {
          field: `${entryField}.column`,
        });
        continue;
      }
      out.push({ type: "absolute,signed", columns: [a, b] });
      continue;
    }

    const [only] = cols;
    if (cols.length !== 1 || only === undefined) {
      err(messages, "XS_SCHEMA_UNCERTAINTY_ARITY", `${entryField}: ${type} takes exactly one column`, {
        field: `${entryField}.column`,
      });
      continue;
    }
    out.push({ type, column: only });
  }
  return out;
}

export function parseValueSpec(raw: unknown, index: number, messages: XsecMessage[]): ValueSpec | null {
  const field = `values[${index}]`;
  if (!isPlainObject(raw)) {
    err(messages, "XS_SCHEMA_VALUE_TYPE", `${field} must be an object`, { field });
    return null;
  }
  warnUnknownKeys(raw, ["column", "unc", "unc+", "unc-", "attributes"], field, messages);

  const column = asString(raw.column);
  if (!column) {
    err(messages, "XS_SCHEMA_VALUE_COLUMN", `${field}: column is missing`, { field: `${field}.column` });
    return null;
  }

  const hasSym = raw.unc !== undefined;
  const hasAsym = raw["unc+"] !== undefined || raw["unc-"] !== undefined;
  if (hasSym && hasAsym) {
    err(messages, "XS_SCHEMA_UNCERTAINTY_DUPLICATE", `Uncertainty duplicates: ${column} declares unc with unc+/unc-`, {
      field: `${field}.unc`,
    });
    return null;
  }

  let uncPlus: UncertaintyComponent[] = [];
  let uncMinus: UncertaintyComponent[] = [];
  if (hasSym) {
    uncPlus = parseUncertaintyComponents(raw.unc, `${field}.unc`, messages);
    uncMinus = uncPlus;
  } else {
    if (raw["unc+"] !== undefined) uncPlus = parseUncertaintyComponents(raw["unc+"], `${field}.unc+`, messages);
    if (raw["unc-"] !== undefined) uncMinus = parseUncertaintyComponents(raw["unc-"], `${field}.unc-`, messages);
  }
  if (uncPlus.length === 0 && uncMinus.length === 0) {
    warn(messages, "XS_SCHEMA_VALUE_NO_UNCERTAINTY", `Value ${column} lacks uncertainties`, { field });
  }

  let attributes: Record<string, AttributeValue> | null = null;
  if (raw.attributes !== undefined) attributes = parseAttributes(raw.attributes, `${field}.attributes`, messages);

  return { index, column, uncPlus, uncMinus, symmetric: hasSym, attributes };
}
