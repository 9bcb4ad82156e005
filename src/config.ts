/**
 * Run configuration
 *
 * Everything a run needs besides its input and output: format names, the
 * operation arguments, and formatter settings. All fields are optional;
 * unset values fall back to DEFAULT_RUN_OPTIONS.
 */

import type { Logger } from "./logger.js";

export const FORMAT_NAMES = ["json", "yaml", "avro", "parquet"] as const;

export type FormatName = (typeof FORMAT_NAMES)[number];

/**
 * Type guard for the built-in format names
 */
export function isFormatName(value: unknown): value is FormatName {
  return FORMAT_NAMES.some((name) => name === value);
}

/** File extensions owned by each built-in format, lower case. */
export const FORMAT_EXTENSIONS: Record<FormatName, readonly string[]> = {
  json: [".json"],
  yaml: [".yaml", ".yml"],
  avro: [".avro"],
  parquet: [".parquet"],
};

export interface RunOptions {
  /** Input format; unset means file extension, then content detection */
  from?: string;
  /** Output format (default: json) */
  to?: string;
  /** Paths to extract */
  pick?: string[];
  /** `path=value` assignments */
  set?: string[];
  /** Paths to remove */
  delete?: string[];
  /** `path=value` conditions, all of which must hold */
  where?: string[];
  /** Rebuild picked values under their original paths */
  preserveHierarchy?: boolean;
  /** Single-line output where the format supports it */
  compact?: boolean;
  /** Spaces per indentation level (default: 2) */
  indent?: number;
  /** Optional logger for run tracing */
  logger?: Logger;
}

export interface ResolvedRunOptions {
  from: string | undefined;
  to: string;
  pick: string[];
  set: string[];
  delete: string[];
  where: string[];
  preserveHierarchy: boolean;
  compact: boolean;
  indent: number;
  logger: Logger | undefined;
}

export const DEFAULT_RUN_OPTIONS: ResolvedRunOptions = {
  from: undefined,
  to: "json",
  pick: [],
  set: [],
  delete: [],
  where: [],
  preserveHierarchy: false,
  compact: false,
  indent: 2,
  logger: undefined,
};

/**
 * Merge user options with defaults.
 * List options are copied so later mutation of the input has no effect.
 */
export function resolveRunOptions(options?: RunOptions): ResolvedRunOptions {
  if (!options) {
    return {
      ...DEFAULT_RUN_OPTIONS,
      pick: [],
      set: [],
      delete: [],
      where: [],
    };
  }
  return {
    from: options.from ?? DEFAULT_RUN_OPTIONS.from,
    to: options.to ?? DEFAULT_RUN_OPTIONS.to,
    pick: [...(options.pick ?? [])],
    set: [...(options.set ?? [])],
    delete: [...(options.delete ?? [])],
    where: [...(options.where ?? [])],
    preserveHierarchy:
      options.preserveHierarchy ?? DEFAULT_RUN_OPTIONS.preserveHierarchy,
    compact: options.compact ?? DEFAULT_RUN_OPTIONS.compact,
    indent: options.indent ?? DEFAULT_RUN_OPTIONS.indent,
    logger: options.logger,
  };
}

/**
 * Extract the file extension, lower-cased and including the dot
 */
function getExtension(filename: string): string {
  const lastDot = filename.lastIndexOf(".");
  const lastSlash = Math.max(
    filename.lastIndexOf("/"),
    filename.lastIndexOf("\\"),
  );
  if (lastDot <= lastSlash + 1) return "";
  return filename.slice(lastDot).toLowerCase();
}

/**
 * Detect a built-in format from a file name's extension
 */
export function formatFromExtension(filename: string): FormatName | undefined {
  const ext = getExtension(filename);
  if (ext === "") return undefined;
  return FORMAT_NAMES.find((name) => FORMAT_EXTENSIONS[name].includes(ext));
}

/** True when `filename` carries one of `extensions`. */
export function hasExtension(
  filename: string,
  extensions: readonly string[],
): boolean {
  return extensions.includes(getExtension(filename));
}
