/**
 * Logger interface for run tracing.
 * Implement this interface to receive runner logs; the path engine and the
 * operations never log.
 */
export interface Logger {
  /** Format selection, files visited, per-file failures */
  info(message: string, data?: Record<string, unknown>): void;
  /** Per-document progress */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger writing one line per message to a stream (stderr for the CLI).
 * Debug lines are only written when `verbose` is set.
 */
export function createStreamLogger(
  stream: { write(chunk: string): unknown },
  verbose = false,
): Logger {
  const line = (level: string, message: string, data?: Record<string, unknown>) =>
    `docsift ${level}: ${message}${data ? ` ${JSON.stringify(data)}` : ""}\n`;
  return {
    info(message, data) {
      stream.write(line("info", message, data));
    },
    debug(message, data) {
      if (verbose) stream.write(line("debug", message, data));
    },
  };
}
