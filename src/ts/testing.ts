/**
 * Testing utilities for csvrow
 */

import type { Row } from "./types.js";

export interface GenerateCSVOptions {
  rows: number;
  columns: string[];
  seed?: number;
  includeHeader?: boolean;
}

export interface FuzzCSVOptions {
  includeUnicode?: boolean;
  includeNestedQuotes?: boolean;
  includeHugeFields?: boolean;
  maxFieldSize?: number;
  rows?: number;
}

/** CSV text together with the rows it should read back as */
export interface GeneratedCSV {
  text: string;
  rows: Row[];
}

/** Simple seeded random number generator */
class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  next(): number {
    this.seed = (this.seed * 1103515245 + 12345) & 0x7fffffff;
    return this.seed / 0x7fffffff;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  pick<T>(array: readonly T[]): T {
    const value = array[this.nextInt(0, array.length - 1)];
    if (value === undefined) {
      throw new RangeError("Cannot pick from an empty array");
    }
    return value;
  }
}

/** Quote a field when it holds a comma, quote or line break */
export function quoteField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toLines(rows: Row[]): string {
  return rows.map((row) => row.map(quoteField).join(",")).join("\n") + "\n";
}

const FIRST_NAMES = ["Alice", "Bob", "Charlie", "Diana", "Eve", "Frank"];
const LAST_NAMES = ["Smith", "Johnson", "Williams", "Brown", "Jones", "Davis"];
const CITIES = ["NYC", "LA", "Chicago", "Houston", "Phoenix", "Philadelphia"];
const NOTES = ["ok", "see attached, page 2", 'said "hi"', "line one\nline two", ""];

/** Generate test CSV data */
export function generateCSV(options: GenerateCSVOptions): GeneratedCSV {
  const rng = new SeededRandom(options.seed ?? Date.now());
  const rows: Row[] = [];

  const columns = options.columns.map((col) => {
    const [name = col, type = "string"] = col.split(":");
    return { name, type };
  });

  if (options.includeHeader !== false) {
    rows.push(columns.map((c) => c.name));
  }

  for (let i = 0; i < options.rows; i++) {
    rows.push(
      columns.map((col) => {
        switch (col.type) {
          case "integer":
            return String(rng.nextInt(1, 10000));
          case "float":
            return (rng.next() * 1000).toFixed(2);
          case "date": {
            const year = rng.nextInt(1990, 2024);
            const month = String(rng.nextInt(1, 12)).padStart(2, "0");
            const day = String(rng.nextInt(1, 28)).padStart(2, "0");
            return `${year}-${month}-${day}`;
          }
          case "name":
            return `${rng.pick(FIRST_NAMES)} ${rng.pick(LAST_NAMES)}`;
          case "city":
            return rng.pick(CITIES);
          case "note":
            return rng.pick(NOTES);
          default:
            return `value_${rng.nextInt(1, 1000)}`;
        }
      })
    );
  }

  return { text: toLines(rows), rows };
}

/** Hand-written lines paired with the fields they decode to */
const EDGE_CASES: [string, Row][] = [
  [",,", ["", "", ""]],
  ['"","",""', ["", "", ""]],
  ['"hello ""world""",normal,test', ['hello "world"', "normal", "test"]],
  ['"hello, world",normal,test', ["hello, world", "normal", "test"]],
  ['"line1\nline2",normal,test', ["line1\nline2", "normal", "test"]],
  ['"say ""hello, world""",test,value', ['say "hello, world"', "test", "value"]],
  ["  spaced  , normal , value ", ["  spaced  ", " normal ", " value "]],
  ['"1,234.56","$99.99","50%"', ["1,234.56", "$99.99", "50%"]],
];

const UNICODE_CASES: [string, Row][] = [
  ["日本語,中文,한국어", ["日本語", "中文", "한국어"]],
  ["émoji: 😀,normal,test", ["émoji: 😀", "normal", "test"]],
  ["Ω≈ç√∫,math,symbols", ["Ω≈ç√∫", "math", "symbols"]],
];

const NESTED_QUOTE_CASES: [string, Row][] = [
  ['"""deeply""nested""quotes""",test,value', ['"deeply"nested"quotes"', "test", "value"]],
  ['"He said ""She said """"Hello""""",complex,test', ['He said "She said ""Hello""', "complex", "test"]],
];

/** Generate edge-case CSV for fuzz testing */
export function fuzzCSV(options: FuzzCSVOptions = {}): GeneratedCSV {
  const total = options.rows ?? 100;
  const cases: [string, Row][] = [["field1,field2,field3", ["field1", "field2", "field3"]], ...EDGE_CASES];

  if (options.includeUnicode) {
    cases.push(...UNICODE_CASES);
  }
  if (options.includeNestedQuotes) {
    cases.push(...NESTED_QUOTE_CASES);
  }

  const rng = new SeededRandom(12345);
  for (let i = cases.length; i < total; i++) {
    // Occasionally generate huge fields
    if (options.includeHugeFields && rng.next() < 0.01) {
      const huge = "x".repeat(rng.nextInt(1000, options.maxFieldSize ?? 10000));
      cases.push([`"${huge}",normal,test`, [huge, "normal", "test"]]);
    } else {
      const fields = [`field_${i}`, `value_${rng.nextInt(1, 1000)}`, `data_${rng.nextInt(1, 100)}`];
      cases.push([fields.join(","), fields]);
    }
  }

  return {
    text: cases.map(([line]) => line).join("\n") + "\n",
    rows: cases.map(([, row]) => row),
  };
}
