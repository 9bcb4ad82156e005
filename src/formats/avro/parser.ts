/**
 * Avro object container parser
 *
 * Records are decoded block by block with the writer schema embedded in the
 * file header, so no schema needs to be supplied.
 */

import type { Readable } from "node:stream";
import avro from "avsc";
import { toDocument } from "../../document.js";
import { errorMessage, FormatError } from "../../errors.js";
import type { DocumentHandler, Parser } from "../types.js";

export class AvroParser implements Parser {
  constructor(private readonly stream: Readable) {}

  async forEach(handler: DocumentHandler): Promise<void> {
    const decoder = new avro.streams.BlockDecoder();
    this.stream.on("error", (e) => decoder.destroy(e));
    this.stream.pipe(decoder);

    const records: AsyncIterator<unknown> = decoder[Symbol.asyncIterator]();
    for (;;) {
      let next: IteratorResult<unknown>;
      try {
        next = await records.next();
      } catch (e) {
        throw new FormatError("avro", `invalid Avro data: ${errorMessage(e)}`, e);
      }
      if (next.done) return;

      try {
        await handler(toDocument(next.value));
      } catch (e) {
        this.stream.unpipe(decoder);
        this.stream.destroy();
        decoder.destroy();
        throw e;
      }
    }
  }
}
