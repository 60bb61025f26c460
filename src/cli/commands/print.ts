/**
 * print command - Print every row of a CSV file
 */

import { CSVRowReader } from "../../ts/parser.js";
import { withCharacterReader } from "../../ts/source.js";
import type { RunOptions } from "../config.js";
import { formatRow, printSummary } from "../output.js";

export function print(filePath: string, options: RunOptions): number {
  const startTime = performance.now();

  const rowCount = withCharacterReader(
    filePath,
    (source) => {
      let count = 0;
      for (const row of new CSVRowReader(source, options.reader)) {
        console.log(formatRow(row, options.format));
        count++;
      }
      return count;
    },
    { encoding: options.encoding }
  );

  if (options.summary) {
    printSummary(rowCount, startTime);
  }

  return rowCount;
}
