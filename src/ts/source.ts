/**
 * Character sources the row reader pulls from
 */

import { closeSync, openSync, readSync } from "fs";
import { StringDecoder } from "string_decoder";
import { CharacterSourceError } from "./errors.js";
import { EOF, type CharacterReaderOptions, type CharacterSource } from "./types.js";

const DEFAULT_CHUNK_SIZE = 64 * 1024;
const BYTE_ORDER_MARK = 0xfeff;

/** Step past the code point at `offset`, returning it and the next offset */
function codePointAt(text: string, offset: number): [number, number] {
  const code = text.codePointAt(offset);
  if (code === undefined) {
    return [EOF, offset];
  }
  return [code, offset + (code > 0xffff ? 2 : 1)];
}

/**
 * In-memory source over a string.
 */
export class StringCharacterSource implements CharacterSource {
  private readonly text: string;
  private offset = 0;
  private closed = false;

  constructor(text: string) {
    this.text = text;
  }

  read(): number {
    if (this.closed) {
      throw new CharacterSourceError("Character source is closed");
    }
    const [code, next] = codePointAt(this.text, this.offset);
    this.offset = next;
    return code;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * File-backed source. Reads fixed-size chunks synchronously and decodes them
 * incrementally, so a multibyte sequence split across two chunks still comes
 * out as one code point. A leading byte-order mark is skipped.
 *
 * @example
 * ```ts
 * const reader = new CharacterReader("data.csv");
 * try {
 *   const rows = new CSVRowReader(reader);
 *   for (const row of rows) console.log(row);
 * } finally {
 *   reader.close();
 * }
 * ```
 */
export class CharacterReader implements CharacterSource {
  readonly path: string;
  private fd: number | null;
  private readonly decoder: StringDecoder;
  private readonly chunk: Buffer;
  private text = "";
  private offset = 0;
  private started = false;
  private exhausted = false;

  constructor(path: string, options: CharacterReaderOptions = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    this.path = path;
    this.decoder = new StringDecoder(options.encoding ?? "utf8");
    this.chunk = Buffer.alloc(chunkSize);

    try {
      this.fd = openSync(path, "r");
    } catch (error) {
      throw new CharacterSourceError(`Failed to open CSV file: ${path}`, { path, cause: error });
    }
  }

  read(): number {
    const fd = this.fd;
    if (fd === null) {
      throw new CharacterSourceError(`CSV file is closed: ${this.path}`, { path: this.path });
    }

    while (this.offset >= this.text.length) {
      if (this.exhausted) {
        return EOF;
      }
      this.fill(fd);
    }

    const [code, next] = codePointAt(this.text, this.offset);
    this.offset = next;
    return code;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  /**
   * Replace the decoded window with the next chunk of the file.
   */
  private fill(fd: number): void {
    let bytesRead: number;
    try {
      bytesRead = readSync(fd, this.chunk, 0, this.chunk.length, null);
    } catch (error) {
      throw new CharacterSourceError(`Failed to read CSV file: ${this.path}`, {
        path: this.path,
        cause: error,
      });
    }

    if (bytesRead === 0) {
      this.text = this.decoder.end();
      this.exhausted = true;
    } else {
      this.text = this.decoder.write(this.chunk.subarray(0, bytesRead));
    }
    this.offset = 0;

    if (!this.started && this.text.length > 0) {
      this.started = true;
      if (this.text.charCodeAt(0) === BYTE_ORDER_MARK) {
        this.offset = 1;
      }
    }
  }
}

/**
 * Open `path`, hand the reader to `fn`, and close it however `fn` exits.
 */
export function withCharacterReader<T>(
  path: string,
  fn: (reader: CharacterReader) => T,
  options: CharacterReaderOptions = {}
): T {
  const reader = new CharacterReader(path, options);
  let result: T;
  try {
    result = fn(reader);
  } catch (error) {
    // fn's error wins over a close failure
    try {
      reader.close();
    } catch (closeError) {
      const message = closeError instanceof Error ? closeError.message : String(closeError);
      console.error(`Warning: Failed to close CSV file ${path}: ${message}`);
    }
    throw error;
  }
  reader.close();
  return result;
}
