/**
 * Streaming JSON parser
 *
 * Input may hold one value or several concatenated values separated by
 * whitespace. Values are cut out of the character stream as soon as they
 * are complete, so a large stream of small records never sits in memory at
 * once. When the first value is an array, its elements are the documents.
 */

import type { Readable } from "node:stream";
import { type Document, toDocument } from "../../document.js";
import { errorMessage, FormatError } from "../../errors.js";
import { type DocumentHandler, type Parser, toBuffer } from "../types.js";

const WHITESPACE = new Set([" ", "\t", "\r", "\n"]);
const STRUCTURAL = new Set(["{", "}", "[", "]", ",", ":", '"']);

/**
 * Splits text into the source of complete top-level JSON values.
 * Only tracks nesting and string state; JSON.parse does the validation.
 */
export class JsonValueSplitter {
  private buffer = "";
  private depth = 0;
  private inString = false;
  private escaped = false;
  private inScalar = false;

  push(text: string): string[] {
    const values: string[] = [];

    for (const ch of text) {
      if (this.inString) {
        this.buffer += ch;
        if (this.escaped) {
          this.escaped = false;
        } else if (ch === "\\") {
          this.escaped = true;
        } else if (ch === '"') {
          this.inString = false;
          if (this.depth === 0) this.flush(values);
        }
        continue;
      }

      if (this.inScalar) {
        if (!WHITESPACE.has(ch) && !STRUCTURAL.has(ch)) {
          this.buffer += ch;
          continue;
        }
        this.flush(values);
      }

      if (WHITESPACE.has(ch)) {
        if (this.depth > 0) this.buffer += ch;
        continue;
      }

      switch (ch) {
        case '"':
          this.inString = true;
          this.buffer += ch;
          break;
        case "{":
        case "[":
          this.depth++;
          this.buffer += ch;
          break;
        case "}":
        case "]":
          if (this.depth === 0) {
            throw new FormatError("json", `invalid JSON: unexpected "${ch}"`);
          }
          this.depth--;
          this.buffer += ch;
          if (this.depth === 0) this.flush(values);
          break;
        default:
          this.buffer += ch;
          if (this.depth === 0) this.inScalar = true;
      }
    }

    return values;
  }

  /** Signal end of input; returns a trailing bare scalar if one is open. */
  end(): string[] {
    if (this.inString || this.depth > 0) {
      throw new FormatError("json", "invalid JSON: unexpected end of input");
    }
    const values: string[] = [];
    if (this.inScalar) this.flush(values);
    return values;
  }

  private flush(values: string[]): void {
    values.push(this.buffer);
    this.buffer = "";
    this.inScalar = false;
  }
}

export class JsonParser implements Parser {
  constructor(private readonly stream: Readable) {}

  async forEach(handler: DocumentHandler): Promise<void> {
    const splitter = new JsonValueSplitter();
    const decoder = new TextDecoder();
    let first = true;

    const emit = async (source: string): Promise<void> => {
      const value = decodeValue(source);
      if (first && Array.isArray(value)) {
        first = false;
        for (const element of value) {
          await handler(element);
        }
        return;
      }
      first = false;
      await handler(value);
    };

    for await (const chunk of this.stream) {
      const text = decoder.decode(toBuffer(chunk), { stream: true });
      for (const source of splitter.push(text)) {
        await emit(source);
      }
    }
    for (const source of [...splitter.push(decoder.decode()), ...splitter.end()]) {
      await emit(source);
    }
  }
}

function decodeValue(source: string): Document {
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (e) {
    throw new FormatError("json", `invalid JSON: ${errorMessage(e)}`, e);
  }
  return toDocument(parsed);
}
