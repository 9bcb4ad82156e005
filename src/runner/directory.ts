/**
 * Directory mode
 *
 * Processes every file under a directory whose extension belongs to the
 * input format. Each output document is wrapped with the file it came from
 * and its 1-based row. A failing file does not stop the walk; failures are
 * collected and thrown together once every file has been tried.
 */

import type { Dirent } from "node:fs";
import { type FileHandle, open, readdir } from "node:fs/promises";
import { join } from "node:path";
import {
  FORMAT_EXTENSIONS,
  hasExtension,
  isFormatName,
  type RunOptions,
  resolveRunOptions,
} from "../config.js";
import {
  DirectoryProcessingError,
  errorMessage,
  InvalidArgumentError,
} from "../errors.js";
import {
  createDefaultRegistry,
  type FormatRegistry,
} from "../formats/registry.js";
import type { Format, Formatter, OutputSink } from "../formats/types.js";
import type { Logger } from "../logger.js";
import type { Pipeline } from "../operations/index.js";
import { buildPipeline, processDocuments } from "./run.js";

export interface DirectoryParams {
  dir: string;
  output: OutputSink;
  /** `from` selects the file extensions (default: json) */
  options?: RunOptions;
  registry?: FormatRegistry;
  /** Called with user-facing warnings, such as an empty match */
  onWarning?: (message: string) => void;
}

export interface DirectoryReport {
  /** Matching files, in visit order */
  files: string[];
  /** Documents written across all files */
  written: number;
  extensions: readonly string[];
}

export async function processDirectory(
  params: DirectoryParams,
): Promise<DirectoryReport> {
  const options = resolveRunOptions(params.options);
  const registry = params.registry ?? createDefaultRegistry();
  const { logger } = options;

  const formatName = options.from ?? "json";
  if (!isFormatName(formatName)) {
    throw new InvalidArgumentError(
      `unknown format for directory processing: ${formatName}`,
    );
  }
  const extensions = FORMAT_EXTENSIONS[formatName];
  const inputFormat = registry.get(formatName);
  const pipeline = buildPipeline(options);
  const formatter = registry.get(options.to).createFormatter(params.output, {
    compact: options.compact,
    indent: options.indent,
  });

  logger?.info("directory", { dir: params.dir, format: formatName, extensions });

  const failures: Error[] = [];
  const report: DirectoryReport = { files: [], written: 0, extensions };

  try {
    for await (const path of walk(params.dir, failures)) {
      if (!hasExtension(path, extensions)) continue;
      report.files.push(path);
      logger?.info("file", { path });
      try {
        report.written += await processFile(
          path,
          inputFormat,
          pipeline,
          formatter,
          logger,
        );
      } catch (e) {
        logger?.info("file failed", { path, error: errorMessage(e) });
        failures.push(e instanceof Error ? e : new Error(errorMessage(e)));
      }
    }
  } finally {
    await formatter.close();
  }

  if (report.files.length === 0) {
    const message = `no files with extensions ${extensions.join(", ")} found in ${params.dir}`;
    logger?.info(message);
    params.onWarning?.(message);
  }

  if (failures.length > 0) {
    throw new DirectoryProcessingError(failures);
  }
  return report;
}

async function processFile(
  path: string,
  format: Format,
  pipeline: Pipeline,
  formatter: Formatter,
  logger: Logger | undefined,
): Promise<number> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (e) {
    throw new Error(`failed to open ${path}: ${errorMessage(e)}`, { cause: e });
  }

  const stream = handle.createReadStream();
  try {
    const counts = await processDocuments(
      format.createParser({ stream, filePath: path }),
      pipeline,
      (data, row) => formatter.write({ _file: path, _row: row, data }),
      logger,
    );
    return counts.written;
  } catch (e) {
    throw new Error(`failed to process ${path}: ${errorMessage(e)}`, {
      cause: e,
    });
  } finally {
    stream.destroy();
  }
}

/**
 * Depth-first walk yielding file paths, entries sorted by name.
 * Unreadable directories are recorded in `failures` and skipped.
 */
async function* walk(dir: string, failures: Error[]): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    failures.push(
      new Error(`error accessing ${dir}: ${errorMessage(e)}`, { cause: e }),
    );
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(path, failures);
    } else if (entry.isFile()) {
      yield path;
    }
  }
}
