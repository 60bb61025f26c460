/**
 * csvrow - strict, row-at-a-time CSV reader
 *
 * @module csvrow
 */

export {
  CSVRowReader,
  readAllRows,
  classify,
  transition,
  type InputClass,
  type Effect,
  type Transition,
} from "./parser.js";
export { CharacterReader, StringCharacterSource, withCharacterReader } from "./source.js";
export { CSVFormatError, CharacterSourceError, type CSVErrorType, type CSVErrorCode } from "./errors.js";
export {
  EOF,
  ParseState,
  type Row,
  type CharacterSource,
  type CSVPosition,
  type CSVRowReaderOptions,
  type CharacterReaderOptions,
  type QuotedCarriageReturnPolicy,
  type FinalRowPolicy,
} from "./types.js";
