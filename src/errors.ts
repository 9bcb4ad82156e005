/**
 * Error classes
 *
 * Resolution misses (absent key, wrong container type, index out of range)
 * are never errors anywhere in docsift. Everything below is either a
 * configuration mistake by the caller or a fatal condition for the current
 * stream.
 */

export type PathSyntaxErrorKind =
  | "EmptyPath"
  | "InvalidSegment"
  | "EmptyIndex"
  | "InvalidIndex";

/**
 * Thrown when a path string cannot be parsed.
 * `fragment` is the offending segment (empty for an empty path).
 */
export class PathSyntaxError extends Error {
  readonly name = "PathSyntaxError";

  constructor(
    readonly kind: PathSyntaxErrorKind,
    readonly fragment: string,
    message: string,
  ) {
    super(message);
  }
}

/**
 * Thrown when an assignment or condition string is malformed
 * (missing `=`, empty path).
 */
export class InvalidArgumentError extends Error {
  readonly name = "InvalidArgumentError";
}

/**
 * Wraps the first error raised by a pipeline step with the step's
 * zero-based position and description.
 */
export class PipelineStepError extends Error {
  readonly name = "PipelineStepError";

  constructor(
    readonly index: number,
    readonly description: string,
    readonly cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      description
        ? `pipeline step ${index} (${description}) failed: ${reason}`
        : `pipeline step ${index} failed: ${reason}`,
    );
  }
}

/** Decode or encode failure inside a format driver. */
export class FormatError extends Error {
  readonly name: string = "FormatError";

  constructor(
    readonly format: string,
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
  }
}

export class UnknownFormatError extends FormatError {
  readonly name = "UnknownFormatError";

  constructor(format: string) {
    super(format, `unknown format: ${format}`);
  }
}

/**
 * Requested a formatter from a read-only format. Failing loudly here keeps a
 * writer from looking successful while dropping every document.
 */
export class UnsupportedWriteError extends FormatError {
  readonly name = "UnsupportedWriteError";

  constructor(format: string) {
    super(
      format,
      `${format} format does not support writing (formatter not implemented)`,
    );
  }
}

export class FormatDetectionError extends Error {
  readonly name = "FormatDetectionError";

  constructor() {
    super("unable to detect format from input");
  }
}

/**
 * Thrown after a directory run when at least one file failed.
 * Carries every collected failure in encounter order.
 */
export class DirectoryProcessingError extends Error {
  readonly name = "DirectoryProcessingError";

  constructor(readonly failures: readonly Error[]) {
    super(
      `directory processing completed with ${failures.length} error(s)`,
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
