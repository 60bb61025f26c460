/**
 * CSVRowReader - row-at-a-time CSV state machine
 */

import { CSVFormatError } from "./errors.js";
import { StringCharacterSource } from "./source.js";
import {
  EOF,
  ParseState,
  type CharacterSource,
  type CSVPosition,
  type CSVRowReaderOptions,
  type FinalRowPolicy,
  type QuotedCarriageReturnPolicy,
  type Row,
} from "./types.js";

const CR = 0x0d;
const LF = 0x0a;
const COMMA = 0x2c;
const QUOTE = 0x22;

/** Input classes the transition table distinguishes */
export type InputClass = "cr" | "lf" | "comma" | "quote" | "other";

/** Side effect of a single transition */
export type Effect =
  | "ignore"
  | "append"
  | "appendLineFeed"
  | "emitField"
  | "emitRow"
  | "reconsume"
  | "unexpectedQuote"
  | "unexpectedCharacter";

export interface Transition {
  effect: Effect;
  next: ParseState;
}

export function classify(code: number): InputClass {
  switch (code) {
    case CR:
      return "cr";
    case LF:
      return "lf";
    case COMMA:
      return "comma";
    case QUOTE:
      return "quote";
    default:
      return "other";
  }
}

/**
 * The transition table. Total over every (state, input) pair.
 *
 * `reconsume` hands the same character to `next` without reading again; it is
 * only produced by EscapeQuote on a second quote.
 */
export function transition(
  state: ParseState,
  input: InputClass,
  quotedCarriageReturn: QuotedCarriageReturnPolicy = "drop"
): Transition {
  switch (state) {
    case ParseState.Initial:
      switch (input) {
        case "cr":
          return { effect: "ignore", next: state };
        case "lf":
          return { effect: "emitRow", next: ParseState.Initial };
        case "comma":
          return { effect: "emitField", next: ParseState.Initial };
        case "quote":
          return { effect: "ignore", next: ParseState.Quote };
        case "other":
          return { effect: "append", next: ParseState.TextData };
      }

    case ParseState.TextData:
      switch (input) {
        case "cr":
          return { effect: "ignore", next: state };
        case "lf":
          return { effect: "emitRow", next: ParseState.Initial };
        case "comma":
          return { effect: "emitField", next: ParseState.Initial };
        case "quote":
          return { effect: "unexpectedQuote", next: state };
        case "other":
          return { effect: "append", next: state };
      }

    case ParseState.Quote:
      switch (input) {
        case "cr":
          return { effect: quotedCarriageReturn === "keep" ? "append" : "ignore", next: state };
        case "lf":
          return { effect: "appendLineFeed", next: state };
        case "comma":
          return { effect: "append", next: state };
        case "quote":
          return { effect: "ignore", next: ParseState.EscapeQuote };
        case "other":
          return { effect: "append", next: state };
      }

    case ParseState.EscapeQuote:
      switch (input) {
        case "cr":
          return { effect: "ignore", next: state };
        case "lf":
          return { effect: "emitRow", next: ParseState.Initial };
        case "comma":
          return { effect: "emitField", next: ParseState.Initial };
        case "quote":
          return { effect: "reconsume", next: ParseState.InnerQuote };
        case "other":
          return { effect: "unexpectedCharacter", next: state };
      }

    case ParseState.InnerQuote:
      switch (input) {
        case "cr":
          return { effect: "ignore", next: state };
        case "lf":
          return { effect: "emitRow", next: ParseState.Initial };
        case "comma":
          return { effect: "emitField", next: ParseState.Initial };
        case "quote":
          return { effect: "append", next: ParseState.Quote };
        case "other":
          return { effect: "unexpectedCharacter", next: state };
      }
  }
}

const DECODE_CHUNK = 8192;

/** Growable code point buffer, cleared in place between fields */
class FieldBuffer {
  private readonly codes: number[] = [];

  append(code: number): void {
    this.codes.push(code);
  }

  clear(): void {
    this.codes.length = 0;
  }

  toString(): string {
    let text = "";
    for (let i = 0; i < this.codes.length; i += DECODE_CHUNK) {
      text += String.fromCodePoint(...this.codes.slice(i, i + DECODE_CHUNK));
    }
    return text;
  }
}

/**
 * Reads one CSV row per call from a character source.
 *
 * The reader borrows the source and never closes it. A format violation or
 * source failure is fatal: every later call rethrows it.
 *
 * @example
 * ```ts
 * const reader = new CSVRowReader(new StringCharacterSource('a,"b,c"\n'));
 * reader.readRow(); // ["a", "b,c"]
 * reader.readRow(); // null
 * ```
 */
export class CSVRowReader implements Iterable<Row> {
  private readonly source: CharacterSource;
  private readonly quotedCarriageReturn: QuotedCarriageReturnPolicy;
  private readonly finalRow: FinalRowPolicy;
  private readonly buffer = new FieldBuffer();

  private line = 1;
  private row = 1;
  private column = 1;
  private field = 1;

  private consumed = false;
  private ended = false;
  private failure: { error: unknown } | null = null;

  constructor(source: CharacterSource, options: CSVRowReaderOptions = {}) {
    this.source = source;
    this.quotedCarriageReturn = options.quotedCarriageReturn ?? "drop";
    this.finalRow = options.finalRow ?? "discard";
  }

  /**
   * Current cursor counters. Inside a call these point at the character being
   * read; between calls `line` and `row` point at the next row.
   */
  get position(): CSVPosition {
    return { line: this.line, column: this.column, row: this.row, field: this.field };
  }

  /**
   * Read just enough characters to complete one row.
   *
   * @returns the row's fields, or null when no rows are left
   * @throws CSVFormatError when the input breaks quoting rules or is empty
   */
  readRow(): Row | null {
    if (this.failure) {
      throw this.failure.error;
    }
    if (this.ended) {
      return null;
    }

    try {
      return this.step();
    } catch (error) {
      this.failure = { error };
      throw error;
    }
  }

  *[Symbol.iterator](): Iterator<Row> {
    let row: Row | null;
    while ((row = this.readRow()) !== null) {
      yield row;
    }
  }

  private step(): Row | null {
    this.column = 1;
    this.field = 1;
    this.buffer.clear();

    const fields: Row = [];
    let state = ParseState.Initial;

    for (;;) {
      const code = this.source.read();
      if (code === EOF) {
        return this.finish(state, fields);
      }
      this.consumed = true;

      const input = classify(code);
      let { effect, next } = transition(state, input, this.quotedCarriageReturn);
      while (effect === "reconsume") {
        ({ effect, next } = transition(next, input, this.quotedCarriageReturn));
      }

      switch (effect) {
        case "ignore":
          break;
        case "append":
          this.buffer.append(code);
          break;
        case "appendLineFeed":
          this.buffer.append(code);
          this.line++;
          break;
        case "emitField":
          this.emitField(fields);
          break;
        case "emitRow":
          this.emitField(fields);
          this.line++;
          this.row++;
          return fields;
        case "unexpectedQuote":
          throw new CSVFormatError("UnexpectedQuote", this.position);
        case "unexpectedCharacter":
          throw new CSVFormatError("UnexpectedCharacter", this.position);
      }

      state = next;
      this.column++;
    }
  }

  private emitField(fields: Row): void {
    fields.push(this.buffer.toString());
    this.field++;
    this.buffer.clear();
  }

  /**
   * End of input. Nothing read at all is an error; otherwise the stream ends
   * and a dangling row is dropped or emitted according to `finalRow`.
   */
  private finish(state: ParseState, fields: Row): Row | null {
    if (!this.consumed) {
      throw new CSVFormatError("EmptyInput", this.position);
    }
    this.ended = true;

    const pending = state !== ParseState.Initial || fields.length > 0;
    if (this.finalRow === "discard" || !pending) {
      return null;
    }
    if (state === ParseState.Quote) {
      throw new CSVFormatError("UnterminatedQuote", this.position);
    }

    this.emitField(fields);
    this.row++;
    return fields;
  }
}

/**
 * Read every row from a source (or a string) into memory.
 */
export function readAllRows(
  input: CharacterSource | string,
  options: CSVRowReaderOptions = {}
): Row[] {
  const source = typeof input === "string" ? new StringCharacterSource(input) : input;
  return [...new CSVRowReader(source, options)];
}
