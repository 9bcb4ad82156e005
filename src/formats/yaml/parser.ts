/**
 * YAML parser
 *
 * Emits every document of a multi-document stream in order. Input is fed to
 * the tokenizer chunk by chunk, and a document is handed on once the next
 * `---` (or the end of input) has closed it, without waiting for the rest
 * of the stream. Mapping keys of any YAML type (numbers, booleans, null,
 * collections) are rendered as strings at every depth.
 */

import type { Readable } from "node:stream";
import {
  Composer,
  Parser as TokenParser,
  type Document as YamlDocument,
} from "yaml";
import { type Document, toDocument } from "../../document.js";
import { errorMessage, FormatError } from "../../errors.js";
import { type DocumentHandler, type Parser, toBuffer } from "../types.js";

/** Aliases expanded per document before the input is rejected. */
const MAX_ALIAS_COUNT = 100;

export class YamlParser implements Parser {
  constructor(private readonly stream: Readable) {}

  async forEach(handler: DocumentHandler): Promise<void> {
    const documents = new DocumentStream();
    const decoder = new TextDecoder();

    for await (const chunk of this.stream) {
      const text = decoder.decode(toBuffer(chunk), { stream: true });
      for (const doc of documents.push(text)) {
        await handler(decodeDocument(doc));
      }
    }
    for (const doc of documents.end(decoder.decode())) {
      await handler(decodeDocument(doc));
    }
  }
}

/**
 * Incremental tokenizer plus composer.
 *
 * The composer keeps the latest document until another one starts, so a
 * document that is already complete is released at the end of each chunk.
 * A `...` marker arriving after such a release only closes that document
 * and is dropped.
 */
class DocumentStream {
  private readonly tokens = new TokenParser();
  private readonly composer = new Composer();
  private held = false;
  private released = false;

  *push(text: string): Generator<YamlDocument.Parsed> {
    yield* this.feed(text, true);
    if (this.held) {
      yield* this.release();
      this.released = true;
    }
  }

  *end(text: string): Generator<YamlDocument.Parsed> {
    yield* this.feed(text, false);
    yield* this.release();

    const [error] = this.composer.streamInfo().errors;
    if (error) {
      throw new FormatError("yaml", `invalid YAML: ${error.message}`, error);
    }
  }

  private *feed(
    text: string,
    incomplete: boolean,
  ): Generator<YamlDocument.Parsed> {
    for (const token of this.tokens.parse(text, incomplete)) {
      if (token.type === "doc-end" && this.released) {
        this.released = false;
        continue;
      }
      this.released = false;
      yield* this.composer.next(token);
      if (token.type === "document") this.held = true;
    }
  }

  private *release(): Generator<YamlDocument.Parsed> {
    yield* this.composer.end();
    this.held = false;
  }
}

function decodeDocument(doc: YamlDocument.Parsed): Document {
  const [error] = doc.errors;
  if (error) {
    throw new FormatError("yaml", `invalid YAML: ${error.message}`, error);
  }
  let value: unknown;
  try {
    value = doc.toJS({ mapAsMap: true, maxAliasCount: MAX_ALIAS_COUNT });
  } catch (e) {
    throw new FormatError("yaml", `invalid YAML: ${errorMessage(e)}`, e);
  }
  return toDocument(value);
}
