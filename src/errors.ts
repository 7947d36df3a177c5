/**
 * Purpose: Define the load-time and query-time error taxonomy.
 * Intent: Give callers stable codes to branch on instead of message text.
 */

import type { GridKey, XsecMessage } from "./types.js";

export class XsecError extends Error {
  readonly code: string;
  readonly messages: readonly XsecMessage[];

  constructor(code: string, message: string, messages: readonly XsecMessage[] = []) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.messages = messages;
  }
}

export class SchemaError extends XsecError {
  readonly field: string;

  constructor(field: string, message: string, messages: readonly XsecMessage[] = []) {
    super("XS_SCHEMA", message, messages);
    this.field = field;
  }
}

export class ParseError extends XsecError {
  readonly rowIndex: number;
  readonly raw: string;

  constructor(rowIndex: number, raw: string, message: string, code = "XS_PARSE_ROW") {
    super(code, message);
    this.rowIndex = rowIndex;
    this.raw = raw;
  }
}

export class UncertaintyConfigError extends XsecError {
  readonly valueSpecIndex: number;
  readonly column: string | null;

  constructor(valueSpecIndex: number, column: string | null, message: string) {
    super("XS_UNCERTAINTY_CONFIG", message);
    this.valueSpecIndex = valueSpecIndex;
    this.column = column;
  }
}

export class NotFoundError extends XsecError {
  readonly key: GridKey;

  constructor(key: GridKey, message?: string) {
    super("XS_NOT_FOUND", message ?? `No grid point at (${key.join(", ")})`);
    this.key = key;
  }
}

export class OutOfRangeError extends XsecError {
  readonly axis: string;
  readonly value: number;
  readonly min: number;
  readonly max: number;

  constructor(axis: string, value: number, min: number, max: number) {
    super("XS_OUT_OF_RANGE", `${axis}=${value} is outside the grid range [${min}, ${max}]`);
    this.axis = axis;
    this.value = value;
    this.min = min;
    this.max = max;
  }
}

export class InterpolationUnsupportedError extends XsecError {
  constructor(message: string) {
    super("XS_INTERPOLATION_UNSUPPORTED", message);
  }
}

export class QueryInputError extends XsecError {
  constructor(message: string) {
    super("XS_QUERY_INPUT", message);
  }
}

export type QueryError = NotFoundError | OutOfRangeError | InterpolationUnsupportedError | QueryInputError;

export function isQueryError(e: unknown): e is QueryError {
  return (
    e instanceof NotFoundError ||
    e instanceof OutOfRangeError ||
    e instanceof InterpolationUnsupportedError ||
    e instanceof QueryInputError
  );
}
