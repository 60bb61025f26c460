/**
 * Output helpers shared by CLI commands
 */

import type { Row } from "../ts/types.js";
import type { OutputFormat } from "./config.js";

/** Format a row for stdout */
export function formatRow(row: Row, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(row);
    case "list":
      return `[${row.join(", ")}]`;
  }
}

/** Print summary stats after operation */
export function printSummary(rowCount: number, startTime: number): void {
  const elapsed = (performance.now() - startTime) / 1000;
  console.error(`✓ Processed ${rowCount.toLocaleString()} rows in ${elapsed.toFixed(2)}s`);
}
