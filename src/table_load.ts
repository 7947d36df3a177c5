/**
 * Purpose: Read a raw cross-section table into typed rows under declared reader options.
 * Intent: Fail loudly on shape mismatches instead of padding or truncating rows.
 */

import { readFileSync } from "node:fs";
import { coerceField, inferColumnKind } from "./cell_types.js";
import { ParseError } from "./errors.js";
import { warn } from "./shared.js";
import type { CellValue, ColumnKind, Descriptor, LoadedTable, ReaderOptions, Row, XsecMessage } from "./types.js";

export interface TableLoadOptions {
  /** "error" (default) aborts on the first malformed row; "skip" drops and counts it. */
  onMalformedRow?: "error" | "skip";
}

interface RawRow {
  line: number;
  raw: string;
  fields: string[];
}

export function splitLine(line: string, opts: ReaderOptions): string[] {
  if (opts.delimWhitespace) return line.trim().split(/\s+/);
  const fields = line.split(opts.delimiter);
  return opts.skipinitialspace ? fields.map((f) => f.replace(/^\s+/, "")) : fields;
}

function stripComment(line: string, comment: string | null): string {
  if (!comment) return line;
  const idx = line.indexOf(comment);
  return idx === -1 ? line : line.slice(0, idx);
}

export function loadTable(
  descriptor: Descriptor,
  content: string,
  options: TableLoadOptions = {}
): { table: LoadedTable; messages: XsecMessage[] } {
  const messages: XsecMessage[] = [];
  const opts = descriptor.readerOptions;
  const columns = descriptor.columns;
  const lenient = options.onMalformedRow === "skip";
  const lines = content.split(/\r?\n/);

  const rawRows: RawRow[] = [];
  let skippedRows = 0;
  let rowIndex = 0;
  for (let i = opts.skiprows; i < lines.length; i++) {
    const raw = lines[i] ?? "";
    const text = stripComment(raw, opts.comment);
    if (!text.trim()) continue;

    const fields = splitLine(text, opts);
    if (fields.length !== columns.length) {
      const message = `Row ${rowIndex} (line ${i + 1}) has ${fields.length} fields, expected ${columns.length}: ${raw}`;
      if (!lenient) throw new ParseError(rowIndex, raw, message);
      warn(messages, "XS_PARSE_ROW_SKIPPED", message, { line: i + 1 });
      skippedRows++;
      rowIndex++;
      continue;
    }
    rawRows.push({ line: i + 1, raw, fields });
    rowIndex++;
  }

  const kinds: Record<string, ColumnKind> = {};
  columns.forEach((c, j) => {
    kinds[c.name] = inferColumnKind(rawRows.map((r) => r.fields[j] ?? ""));
  });

  const rows: Row[] = rawRows.map((r) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((c, j) => {
      row[c.name] = coerceField(r.fields[j] ?? "", kinds[c.name] ?? "string");
    });
    return Object.freeze(row);
  });

  const table: LoadedTable = Object.freeze({
    columns,
    kinds: Object.freeze(kinds),
    rows: Object.freeze(rows),
    lines: Object.freeze(rawRows.map((r) => r.line)),
    skippedRows,
  });
  return { table, messages };
}

export function loadTableFile(
  descriptor: Descriptor,
  path: string,
  options: TableLoadOptions = {}
): { table: LoadedTable; messages: XsecMessage[] } {
  const content = readFileSync(path, "utf8");
  return loadTable(descriptor, content, options);
}
