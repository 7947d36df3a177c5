/**
 * Purpose: Parse a table descriptor document into a validated, frozen Descriptor.
 * Intent: Report every schema problem at parse time so queries never meet a dangling column.
 */

import {
  parseAttributes,
  parseColumns,
  parseParameters,
  parseReaderOptions,
  parseValueSpec,
} from "./descriptor_fields.js";
import { SchemaError } from "./errors.js";
import { deepFreeze, err, firstError, isPlainObject, warn } from "./shared.js";
import type { AttributeValue, ColumnInfo, Descriptor, UncertaintyComponent, ValueSpec, XsecMessage } from "./types.js";

const topLevelKeys = ["document", "attributes", "columns", "reader_options", "parameters", "values"];

function componentColumnNames(c: UncertaintyComponent): readonly string[] {
  return c.type === "absolute,signed" ? c.columns : [c.column];
}

function checkValueReferences(spec: ValueSpec, known: Set<string>, messages: XsecMessage[]): void {
  const field = `values[${spec.index}]`;
  if (!known.has(spec.column)) {
    err(messages, "XS_SCHEMA_UNKNOWN_COLUMN", `Unknown column name: ${spec.column}`, { field: `${field}.column` });
  }
  const sides: [string, readonly UncertaintyComponent[]][] = spec.symmetric
    ? [["unc", spec.uncPlus]]
    : [
        ["unc+", spec.uncPlus],
        ["unc-", spec.uncMinus],
      ];
  for (const [side, components] of sides) {
    components.forEach((c, i) => {
      for (const name of componentColumnNames(c)) {
        if (known.has(name)) continue;
        err(messages, "XS_SCHEMA_UNKNOWN_COLUMN", `Unknown column name: ${name}`, {
          field: `${field}.${side}[${i}].column`,
        });
      }
    });
  }
}

export function parseDescriptorDocument(doc: unknown): { descriptor: Descriptor | null; messages: XsecMessage[] } {
  const messages: XsecMessage[] = [];
  if (!isPlainObject(doc)) {
    err(messages, "XS_SCHEMA_DOCUMENT_TYPE", "Descriptor must be an object", { field: "document" });
    return { descriptor: null, messages };
  }

  for (const key of Object.keys(doc)) {
    if (!topLevelKeys.includes(key)) {
      err(messages, "XS_SCHEMA_UNKNOWN_FIELD", `Unrecognized descriptor field: ${key}`, { field: key });
    }
  }

  let document: Record<string, unknown> = {};
  if (doc.document === undefined || doc.document === null) {
    warn(messages, "XS_SCHEMA_NO_DOCUMENT", "No document is given", { field: "document" });
  } else if (!isPlainObject(doc.document)) {
    err(messages, "XS_SCHEMA_DOCUMENT_TYPE", "document must be an object", { field: "document" });
  } else {
    document = { ...doc.document };
  }

  let attributes: Record<string, AttributeValue> = {};
  if (doc.attributes !== undefined) attributes = parseAttributes(doc.attributes, "attributes", messages) ?? {};

  const columns: ColumnInfo[] = parseColumns(doc.columns, messages);
  const readerOptions = parseReaderOptions(doc.reader_options, messages);
  const parameters = parseParameters(doc.parameters, messages);

  const values: ValueSpec[] = [];
  if (!Array.isArray(doc.values) || doc.values.length === 0) {
    err(messages, "XS_SCHEMA_VALUES_MISSING", "values must be a non-empty list", { field: "values" });
  } else {
    doc.values.forEach((raw: unknown, i: number) => {
      const spec = parseValueSpec(raw, i, messages);
      if (spec) values.push(spec);
    });
  }

  const known = new Set(columns.map((c) => c.name));
  const seenParams = new Set<string>();
  parameters.forEach((p, i) => {
    if (!known.has(p.column)) {
      err(messages, "XS_SCHEMA_UNKNOWN_COLUMN", `Unknown column name: ${p.column}`, { field: `parameters[${i}].column` });
    }
    if (seenParams.has(p.column)) {
      err(messages, "XS_SCHEMA_PARAMETER_DUPLICATE", `Duplicated parameter: ${p.column}`, {
        field: `parameters[${i}].column`,
      });
    }
    seenParams.add(p.column);
  });
  for (const spec of values) checkValueReferences(spec, known, messages);

  if (firstError(messages)) return { descriptor: null, messages };

  const descriptor: Descriptor = deepFreeze({ document, attributes, columns, readerOptions, parameters, values });
  return { descriptor, messages };
}

/** Parse and validate a descriptor, throwing `SchemaError` on the first offending field. */
export function parseDescriptor(doc: unknown): Descriptor {
  return parseDescriptorReporting(doc).descriptor;
}

/** Like `parseDescriptor`, but also hands back the warnings of a valid document. */
export function parseDescriptorReporting(doc: unknown): { descriptor: Descriptor; messages: XsecMessage[] } {
  const { descriptor, messages } = parseDescriptorDocument(doc);
  if (descriptor) return { descriptor, messages };
  const first = firstError(messages);
  const errorCount = messages.filter((m) => m.severity === "error").length;
  const suffix = errorCount > 1 ? ` (and ${errorCount - 1} more)` : "";
  throw new SchemaError(first?.field ?? "document", `${first?.message ?? "Invalid descriptor"}${suffix}`, messages);
}

export function getColumn(descriptor: Descriptor, name: string): ColumnInfo {
  const column = descriptor.columns.find((c) => c.name === name);
  if (!column) throw new SchemaError("columns", `Unknown column name: ${name}`);
  return column;
}

export function formatDocument(descriptor: Descriptor): string {
  const lines = ["[Document]"];
  for (const [key, value] of Object.entries(descriptor.document)) {
    const text = typeof value === "string" ? value : JSON.stringify(value);
    lines.push(`  ${key}: ${text}`);
  }
  return lines.join("\n");
}
