/**
 * Format abstraction
 *
 * A format bundles three independent pieces: a detector that scores a byte
 * prefix, a parser that decodes an input stream into documents, and a
 * formatter that encodes documents onto an output sink. Read-only formats
 * throw UnsupportedWriteError from createFormatter.
 */

import type { Readable } from "node:stream";
import type { Document } from "../document.js";

export interface Detector {
  /**
   * Confidence (0-100) that `prefix` is in this format.
   * 0 means "definitely not"; the prefix is at most 1024 bytes and may be
   * shorter than the whole input.
   */
  detect(prefix: Uint8Array): number;
}

export type DocumentHandler = (document: Document) => void | Promise<void>;

export interface Parser {
  /**
   * Decode the input, calling `handler` once per document in order.
   * The returned promise rejects with the first decode or handler error;
   * no further documents are delivered after that.
   */
  forEach(handler: DocumentHandler): Promise<void>;
}

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface FormatterOptions {
  /** Single-line output where the format supports it */
  compact: boolean;
  /** Spaces per indentation level */
  indent: number;
}

export const defaultFormatterOptions: FormatterOptions = {
  compact: false,
  indent: 2,
};

/** Fill unset formatter options from the defaults. */
export function resolveFormatterOptions(
  options?: Partial<FormatterOptions>,
): FormatterOptions {
  if (!options) {
    return { ...defaultFormatterOptions };
  }
  return {
    compact: options.compact ?? defaultFormatterOptions.compact,
    indent: options.indent ?? defaultFormatterOptions.indent,
  };
}

export interface Formatter {
  write(document: Document): void;
  /** Flush anything buffered. Does not end the sink. */
  close(): Promise<void>;
}

export interface FormatInput {
  stream: Readable;
  /** Set when the input is a regular file; random-access formats need it */
  filePath?: string;
}

export interface Format {
  readonly name: string;
  readonly detector: Detector;
  createParser(input: FormatInput): Parser;
  createFormatter(sink: OutputSink, options?: Partial<FormatterOptions>): Formatter;
}

/** Collect a readable stream into one buffer. */
export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks);
}

export function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  return Buffer.from(String(chunk));
}
