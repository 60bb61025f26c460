/**
 * Row reader unit tests
 */

import { describe, test, expect } from "vitest";
import { CSVRowReader, readAllRows } from "../../src/ts/parser.js";
import { StringCharacterSource } from "../../src/ts/source.js";
import type { CSVRowReaderOptions } from "../../src/ts/types.js";

function reader(text: string, options: CSVRowReaderOptions = {}): CSVRowReader {
  return new CSVRowReader(new StringCharacterSource(text), options);
}

describe("CSVRowReader", () => {
  test("reads a simple row then signals end of stream", () => {
    const rows = reader("a,b,c\n");

    expect(rows.readRow()).toEqual(["a", "b", "c"]);
    expect(rows.readRow()).toBeNull();
  });

  test("reads a blank line as one empty field", () => {
    expect(reader("\n").readRow()).toEqual([""]);
  });

  test("keeps commas inside quotes", () => {
    expect(reader('"a,b",c\n').readRow()).toEqual(["a,b", "c"]);
  });

  test("decodes doubled quotes", () => {
    expect(reader('"a""b",c\n').readRow()).toEqual(['a"b', "c"]);
  });

  test("returns rows in source order, one per call", () => {
    const rows = reader("name,age\nAlice,30\nBob,25\n");

    expect(rows.readRow()).toEqual(["name", "age"]);
    expect(rows.readRow()).toEqual(["Alice", "30"]);
    expect(rows.readRow()).toEqual(["Bob", "25"]);
    expect(rows.readRow()).toBeNull();
  });

  test("keeps returning null after end of stream", () => {
    const rows = reader("a\n");

    rows.readRow();
    expect(rows.readRow()).toBeNull();
    expect(rows.readRow()).toBeNull();
  });

  test("handles empty leading and trailing fields", () => {
    expect(readAllRows(",a\na,\n,,\n")).toEqual([
      ["", "a"],
      ["a", ""],
      ["", "", ""],
    ]);
  });

  test("reads an empty quoted field", () => {
    expect(readAllRows('"",x\n""\n')).toEqual([["", "x"], [""]]);
  });

  test("accepts CRLF line endings", () => {
    expect(readAllRows("a,b\r\nc,d\r\n")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  test("drops carriage returns inside unquoted fields", () => {
    expect(readAllRows("a\rb,c\n")).toEqual([["ab", "c"]]);
  });

  test("keeps line feeds inside quoted fields", () => {
    const rows = reader('"line1\nline2",x\nnext\n');

    expect(rows.readRow()).toEqual(["line1\nline2", "x"]);
    expect(rows.position).toMatchObject({ line: 3, row: 2 });
    expect(rows.readRow()).toEqual(["next"]);
    expect(rows.position).toMatchObject({ line: 4, row: 3 });
  });

  test("reads a field that closes right after an escaped quote", () => {
    expect(readAllRows('"a""",b\n')).toEqual([['a"', "b"]]);
  });

  test("reads nested escaped quotes", () => {
    expect(readAllRows('"""deeply""nested""",x\n')).toEqual([['"deeply"nested"', "x"]]);
  });

  test("reads code points outside the BMP", () => {
    expect(readAllRows("😀,b\n")).toEqual([["😀", "b"]]);
  });

  test("reads fields larger than the decode chunk", () => {
    const big = "x".repeat(20000);
    const [row] = readAllRows(`${big},y\n`);

    expect(row?.[0]).toHaveLength(20000);
    expect(row?.[1]).toBe("y");
  });

  test("returns fresh arrays the reader no longer touches", () => {
    const rows = reader("a,b\nc,d\n");
    const first = rows.readRow();
    rows.readRow();

    expect(first).toEqual(["a", "b"]);
  });

  test("is iterable", () => {
    expect([...reader("a\nb\nc\n")]).toEqual([["a"], ["b"], ["c"]]);
  });

  test("gives the same rows for the same input", () => {
    const text = 'id,note\n1,"x, y"\n2,"say ""hi"""\n';
    expect(readAllRows(text)).toEqual(readAllRows(text));
  });
});

describe("position tracking", () => {
  test("counts every line feed, including quoted ones", () => {
    const rows = reader('a,"x\ny\nz"\nb\n');

    rows.readRow();
    expect(rows.position).toMatchObject({ line: 4, row: 2 });
  });

  test("counts one column per character and field per separator", () => {
    const rows = reader("a,b\nc\n");

    rows.readRow();
    expect(rows.position).toEqual({ line: 2, column: 4, row: 2, field: 3 });
  });

  test("counts swallowed carriage returns as columns", () => {
    const rows = reader("a\r\n");

    rows.readRow();
    expect(rows.position.column).toBe(3);
  });
});

describe("quoted carriage return policy", () => {
  test("drops carriage returns inside quotes by default", () => {
    expect(readAllRows('"a\r\nb"\n')).toEqual([["a\nb"]]);
  });

  test("keeps carriage returns inside quotes when asked", () => {
    expect(readAllRows('"a\r\nb"\r\n', { quotedCarriageReturn: "keep" })).toEqual([["a\r\nb"]]);
  });
});

describe("final row policy", () => {
  test("discards an unterminated last row by default", () => {
    const rows = reader("a,b\nc,d");

    expect(rows.readRow()).toEqual(["a", "b"]);
    expect(rows.readRow()).toBeNull();
  });

  test("discards a last row that ends inside quotes by default", () => {
    expect(readAllRows('a\n"open')).toEqual([["a"]]);
  });

  test("emits an unterminated last row when asked", () => {
    expect(readAllRows("a,b\nc,d", { finalRow: "emit" })).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  test("emits a trailing empty field", () => {
    expect(readAllRows("a,", { finalRow: "emit" })).toEqual([["a", ""]]);
  });

  test("emits a closed quoted field", () => {
    expect(readAllRows('"a""b"', { finalRow: "emit" })).toEqual([['a"b']]);
  });

  test("does not invent a row from stray carriage returns", () => {
    expect(readAllRows("a\n\r", { finalRow: "emit" })).toEqual([["a"]]);
  });

  test("does not add a row after a terminated last line", () => {
    expect(readAllRows("a\nb\n", { finalRow: "emit" })).toEqual([["a"], ["b"]]);
  });
});
