/**
 * Format registry
 *
 * Formats are looked up by name or picked by sniffing the first bytes of
 * an input. Nothing registers itself on import; callers build a registry
 * with `createDefaultRegistry()` or register formats explicitly.
 */

import { Readable } from "node:stream";
import { FormatDetectionError, UnknownFormatError } from "../errors.js";
import { avroFormat } from "./avro/index.js";
import { jsonFormat } from "./json/index.js";
import { parquetFormat } from "./parquet/index.js";
import { type Format, type FormatInput, toBuffer } from "./types.js";
import { yamlFormat } from "./yaml/index.js";

/** Bytes handed to each detector. */
export const PEEK_SIZE = 1024;

export interface Detection {
  format: Format;
  /** The original input, its stream replaying the peeked bytes first */
  input: FormatInput;
}

export class FormatRegistry {
  private readonly formats = new Map<string, Format>();

  /** Add a format, replacing any previous format with the same name. */
  register(format: Format): void {
    this.formats.set(format.name, format);
  }

  get(name: string): Format {
    const format = this.formats.get(name);
    if (!format) {
      throw new UnknownFormatError(name);
    }
    return format;
  }

  has(name: string): boolean {
    return this.formats.has(name);
  }

  /** Registered names, in registration order. */
  list(): string[] {
    return [...this.formats.keys()];
  }

  /**
   * Pick the format whose detector scores the input prefix highest.
   * Ties go to the format registered first. A detector that throws is
   * skipped.
   */
  async autoDetect(input: FormatInput): Promise<Detection> {
    const iterator: AsyncIterator<unknown> =
      input.stream[Symbol.asyncIterator]();
    const head: Buffer[] = [];
    let size = 0;
    let exhausted = false;

    while (size < PEEK_SIZE) {
      const next = await iterator.next();
      if (next.done) {
        exhausted = true;
        break;
      }
      const chunk = toBuffer(next.value);
      head.push(chunk);
      size += chunk.length;
    }

    const prefix = Buffer.concat(head).subarray(0, PEEK_SIZE);

    let best: Format | undefined;
    let bestScore = 0;
    for (const format of this.formats.values()) {
      let score: number;
      try {
        score = format.detector.detect(prefix);
      } catch {
        continue;
      }
      if (score > bestScore) {
        bestScore = score;
        best = format;
      }
    }

    if (!best) {
      input.stream.destroy();
      throw new FormatDetectionError();
    }

    const stream = Readable.from(replay(head, exhausted ? undefined : iterator), {
      objectMode: false,
    });
    return { format: best, input: { ...input, stream } };
  }
}

async function* replay(
  head: Buffer[],
  rest: AsyncIterator<unknown> | undefined,
): AsyncGenerator<Buffer> {
  yield* head;
  if (!rest) return;
  for (;;) {
    const next = await rest.next();
    if (next.done) return;
    yield toBuffer(next.value);
  }
}

/** Register json, yaml, avro and parquet, in that order. */
export function registerBuiltinFormats(registry: FormatRegistry): FormatRegistry {
  registry.register(jsonFormat);
  registry.register(yamlFormat);
  registry.register(avroFormat);
  registry.register(parquetFormat);
  return registry;
}

export function createDefaultRegistry(): FormatRegistry {
  return registerBuiltinFormats(new FormatRegistry());
}
