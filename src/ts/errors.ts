/**
 * Structured error types for CSV reading
 */

import type { CSVPosition } from "./types.js";

/** Error type categories */
export type CSVErrorType = "Input" | "Quotes";

/** Error codes */
export type CSVErrorCode =
  | "EmptyInput"
  | "UnexpectedQuote"
  | "UnexpectedCharacter"
  | "UnterminatedQuote";

const ERROR_TYPES: Record<CSVErrorCode, CSVErrorType> = {
  EmptyInput: "Input",
  UnexpectedQuote: "Quotes",
  UnexpectedCharacter: "Quotes",
  UnterminatedQuote: "Quotes",
};

const ERROR_DETAILS: Record<CSVErrorCode, string> = {
  EmptyInput: "input is empty",
  UnexpectedQuote: "unexpected quote in unquoted field",
  UnexpectedCharacter: "unexpected character after closing quote",
  UnterminatedQuote: "quoted field is not terminated",
};

/**
 * Format violation at a known position. Fatal for the stream it came from.
 */
export class CSVFormatError extends Error {
  readonly code: CSVErrorCode;
  readonly type: CSVErrorType;
  readonly line: number;
  readonly column: number;
  readonly row: number;
  readonly field: number;

  constructor(code: CSVErrorCode, position: CSVPosition) {
    super(
      `Invalid CSV at line ${position.line}, column ${position.column} ` +
        `(row ${position.row}, field ${position.field}): ${ERROR_DETAILS[code]}`
    );
    this.name = "CSVFormatError";
    this.code = code;
    this.type = ERROR_TYPES[code];
    this.line = position.line;
    this.column = position.column;
    this.row = position.row;
    this.field = position.field;
  }

  get position(): CSVPosition {
    return { line: this.line, column: this.column, row: this.row, field: this.field };
  }
}

/** The character source could not be opened or read */
export class CharacterSourceError extends Error {
  readonly path: string | null;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "CharacterSourceError";
    this.path = options.path ?? null;
  }
}
