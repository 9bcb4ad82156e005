/**
 * Stream runner
 *
 * One pass over one input: pick the input format, decode documents, push
 * each through the pipeline and write whatever survives.
 */

import {
  formatFromExtension,
  type ResolvedRunOptions,
  type RunOptions,
  resolveRunOptions,
} from "../config.js";
import { type Document, isFiltered } from "../document.js";
import {
  createDefaultRegistry,
  type Detection,
  type FormatRegistry,
} from "../formats/registry.js";
import type {
  FormatInput,
  Formatter,
  OutputSink,
  Parser,
} from "../formats/types.js";
import type { Logger } from "../logger.js";
import {
  DeleteOperation,
  type Operation,
  PickOperation,
  Pipeline,
  SetOperation,
  WhereOperation,
} from "../operations/index.js";

/**
 * Build the pipeline for a run. Filtering comes first so later steps never
 * see rejected documents, then pick, set and delete.
 * Throws on malformed paths, assignments or conditions.
 */
export function buildPipeline(options: RunOptions): Pipeline {
  const operations: Operation[] = [];
  if (options.where?.length) {
    operations.push(WhereOperation.fromPairs(options.where));
  }
  if (options.pick?.length) {
    operations.push(
      new PickOperation(options.pick, {
        preserveHierarchy: options.preserveHierarchy,
      }),
    );
  }
  if (options.set?.length) {
    operations.push(SetOperation.fromPairs(options.set));
  }
  if (options.delete?.length) {
    operations.push(new DeleteOperation(options.delete));
  }
  return new Pipeline(operations);
}

export interface DocumentCounts {
  /** Documents decoded from the input */
  read: number;
  /** Documents that survived the pipeline */
  written: number;
}

/**
 * Decode every document from `parser`, apply `pipeline`, and hand each
 * surviving result to `emit` with its 1-based position in the input.
 */
export async function processDocuments(
  parser: Parser,
  pipeline: Pipeline,
  emit: (document: Document, row: number) => void,
  logger?: Logger,
): Promise<DocumentCounts> {
  const counts: DocumentCounts = { read: 0, written: 0 };
  await parser.forEach((document) => {
    counts.read++;
    const result = pipeline.apply(document);
    if (isFiltered(result)) {
      logger?.debug("filtered", { row: counts.read });
      return;
    }
    emit(result, counts.read);
    counts.written++;
  });
  return counts;
}

/**
 * Input format by priority: explicit name, then the file extension, then
 * content detection.
 */
export async function selectInputFormat(
  input: FormatInput,
  options: ResolvedRunOptions,
  registry: FormatRegistry,
): Promise<Detection> {
  const { logger } = options;
  if (options.from !== undefined) {
    const format = registry.get(options.from);
    logger?.info("input format", { format: format.name, source: "option" });
    return { format, input };
  }

  const byExtension = input.filePath
    ? formatFromExtension(input.filePath)
    : undefined;
  if (byExtension !== undefined && registry.has(byExtension)) {
    logger?.info("input format", { format: byExtension, source: "extension" });
    return { format: registry.get(byExtension), input };
  }

  const detection = await registry.autoDetect(input);
  logger?.info("input format", {
    format: detection.format.name,
    source: "detected",
  });
  return detection;
}

export interface RunStreamParams {
  input: FormatInput;
  output: OutputSink;
  options?: RunOptions;
  /** Defaults to a registry holding the built-in formats */
  registry?: FormatRegistry;
}

export interface RunSummary extends DocumentCounts {
  inputFormat: string;
  outputFormat: string;
}

/**
 * Transform one input stream into `output`.
 * The first decode, pipeline or write error rejects the run.
 */
export async function runStream(params: RunStreamParams): Promise<RunSummary> {
  const options = resolveRunOptions(params.options);
  const registry = params.registry ?? createDefaultRegistry();
  const { logger } = options;

  const pipeline = buildPipeline(options);
  if (!pipeline.isEmpty()) {
    logger?.info("pipeline", { steps: pipeline.describe() });
  }

  const outputFormat = registry.get(options.to);
  const { format, input } = await selectInputFormat(
    params.input,
    options,
    registry,
  );
  const formatter = outputFormat.createFormatter(params.output, {
    compact: options.compact,
    indent: options.indent,
  });

  const counts = await writeAll(
    formatter,
    format.createParser(input),
    pipeline,
    logger,
  );
  logger?.info("done", { ...counts });
  return { ...counts, inputFormat: format.name, outputFormat: outputFormat.name };
}

async function writeAll(
  formatter: Formatter,
  parser: Parser,
  pipeline: Pipeline,
  logger: Logger | undefined,
): Promise<DocumentCounts> {
  try {
    return await processDocuments(
      parser,
      pipeline,
      (document) => formatter.write(document),
      logger,
    );
  } finally {
    await formatter.close();
  }
}
