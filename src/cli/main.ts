/**
 * csvrow CLI entry logic
 */

import { parseArgs } from "util";
import { homedir } from "os";
import { print } from "./commands/print.js";
import { loadConfig, mergeConfig, resolveRunOptions } from "./config.js";

/**
 * Printed to stdout for --help. A missing or extra file argument prints it to
 * stderr instead and exits 1.
 */
export const USAGE = "usage: csvrow <filename.csv>";

export const VERSION = "1.0.0";

const OPTIONS = {
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "v" },
} as const;

function parseCommandLine(args: string[]) {
  return parseArgs({ args, options: OPTIONS, allowPositionals: true });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the CLI and return the process exit code.
 */
export function main(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  home: string = homedir()
): number {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(args);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.error(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.version) {
    console.log(`csvrow v${VERSION}`);
    return 0;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const [filePath] = positionals;
  if (positionals.length !== 1 || filePath === undefined) {
    console.error(USAGE);
    return 1;
  }

  const { config: fileConfig, path: configPath } = loadConfig(cwd, home);
  if (configPath && env.CSVROW_DEBUG) {
    console.error(`Loaded config from: ${configPath}`);
  }

  try {
    print(filePath, resolveRunOptions(mergeConfig(fileConfig, env)));
    return 0;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}
