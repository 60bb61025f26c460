/**
 * Config file loader for the csvrow CLI
 * Supports .csvrowrc (JSON) in the current directory or parent directories
 */

import { existsSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { homedir } from "os";
import { type } from "arktype";
import type { CSVRowReaderOptions } from "../ts/types.js";

export type OutputFormat = "list" | "json";

export interface CLIConfig {
  format?: OutputFormat;
  encoding?: string;
  summary?: boolean;
  quotedCarriageReturn?: "drop" | "keep";
  finalRow?: "discard" | "emit";
}

/** Fully resolved settings for a run */
export interface RunOptions {
  format: OutputFormat;
  encoding: BufferEncoding;
  summary: boolean;
  reader: CSVRowReaderOptions;
}

const CLIConfigSchema = type({
  "format?": "'list' | 'json'",
  "encoding?": "string",
  "summary?": "boolean",
  "quotedCarriageReturn?": "'drop' | 'keep'",
  "finalRow?": "'discard' | 'emit'",
});

const CONFIG_FILENAMES = [".csvrowrc", ".csvrowrc.json", "csvrow.config.json"];

/**
 * Search for a config file starting from the given directory, walking up to
 * the filesystem root and finally the home directory.
 */
export function findConfigFile(startDir: string = process.cwd(), home: string = homedir()): string | null {
  let currentDir = startDir;

  for (;;) {
    for (const filename of CONFIG_FILENAMES) {
      const configPath = join(currentDir, filename);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) break;
    currentDir = parentDir;
  }

  const homeConfig = join(home, ".csvrowrc");
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

/**
 * Load configuration from file. A file that cannot be read or does not match
 * the schema is reported on stderr and ignored.
 */
export function loadConfig(startDir?: string, home?: string): { config: CLIConfig; path: string | null } {
  const configPath = findConfigFile(startDir, home);

  if (!configPath) {
    return { config: {}, path: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Warning: Failed to parse config file ${configPath}: ${message}`);
    return { config: {}, path: configPath };
  }

  const config = CLIConfigSchema(raw);
  if (config instanceof type.errors) {
    console.error(`Warning: Invalid config file ${configPath}: ${config.summary}`);
    return { config: {}, path: configPath };
  }

  return { config, path: configPath };
}

function isFlagSet(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Merge configuration sources with proper precedence.
 * environment variables > config file > defaults
 */
export function mergeConfig(fileConfig: CLIConfig, env: NodeJS.ProcessEnv = process.env): CLIConfig {
  const envConfig: CLIConfig = {};

  const format = env.CSVROW_FORMAT;
  if (format === "list" || format === "json") {
    envConfig.format = format;
  } else if (format) {
    console.error(`Warning: Ignoring CSVROW_FORMAT=${format} (expected list or json)`);
  }
  if (env.CSVROW_ENCODING) {
    envConfig.encoding = env.CSVROW_ENCODING;
  }
  if (isFlagSet(env.CSVROW_NO_SUMMARY)) {
    envConfig.summary = false;
  }
  if (isFlagSet(env.CSVROW_KEEP_QUOTED_CR)) {
    envConfig.quotedCarriageReturn = "keep";
  }
  if (isFlagSet(env.CSVROW_EMIT_FINAL_ROW)) {
    envConfig.finalRow = "emit";
  }

  return {
    ...getDefaults(),
    ...fileConfig,
    ...envConfig,
  };
}

/**
 * Get default configuration values.
 */
export function getDefaults(): CLIConfig {
  return {
    format: "list",
    encoding: "utf8",
    summary: true,
    quotedCarriageReturn: "drop",
    finalRow: "discard",
  };
}

/**
 * Turn a merged config into run settings.
 *
 * @throws Error when the encoding is not one Node can decode
 */
export function resolveRunOptions(config: CLIConfig): RunOptions {
  const encoding = config.encoding ?? "utf8";
  if (!Buffer.isEncoding(encoding)) {
    throw new Error(`Unsupported encoding: ${encoding}`);
  }

  return {
    format: config.format ?? "list",
    encoding,
    summary: config.summary ?? true,
    reader: {
      quotedCarriageReturn: config.quotedCarriageReturn ?? "drop",
      finalRow: config.finalRow ?? "discard",
    },
  };
}
