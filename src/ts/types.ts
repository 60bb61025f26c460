/**
 * Type definitions for csvrow
 */

/** A parsed row: field strings in source order */
export type Row = string[];

/** Sentinel returned by a character source when input is exhausted */
export const EOF = -1;

/** Sequential single-character producer the row reader pulls from */
export interface CharacterSource {
  /** Next Unicode code point, or {@link EOF}. Throws on I/O failure. */
  read(): number;
  /** Release the underlying resource. Safe to call more than once. */
  close(): void;
}

/** Row reader states */
export enum ParseState {
  /** Start of a field, nothing consumed yet */
  Initial = "Initial",
  /** Inside an unquoted field */
  TextData = "TextData",
  /** Inside a quoted field */
  Quote = "Quote",
  /** Saw a quote inside a quoted field: closing quote or first half of `""` */
  EscapeQuote = "EscapeQuote",
  /** Confirmed `""` inside a quoted field */
  InnerQuote = "InnerQuote",
}

/** Cursor counters, all 1-based */
export interface CSVPosition {
  /** Source line, counting line feeds inside quoted fields */
  line: number;
  /** Column within the current row */
  column: number;
  /** Row number */
  row: number;
  /** Field within the current row */
  field: number;
}

/** What to do with a carriage return inside a quoted field */
export type QuotedCarriageReturnPolicy = "drop" | "keep";

/** What to do with an unterminated last row at end of input */
export type FinalRowPolicy = "discard" | "emit";

/** Row reader options */
export interface CSVRowReaderOptions {
  /** Carriage return inside quotes (default: "drop") */
  quotedCarriageReturn?: QuotedCarriageReturnPolicy;
  /** Last row without a trailing line feed (default: "discard") */
  finalRow?: FinalRowPolicy;
}

/** File-backed character reader options */
export interface CharacterReaderOptions {
  /** Text encoding (default: "utf8") */
  encoding?: BufferEncoding;
  /** Bytes per read (default: 64KiB) */
  chunkSize?: number;
}
