/**
 * Parquet parser
 *
 * The footer holding the schema and row group index sits at the end of the
 * file, so rows are read through random access on `filePath` rather than
 * from the stream. Row groups are decoded one at a time.
 */

import {
  asyncBufferFromFile,
  parquetMetadataAsync,
  parquetReadObjects,
} from "hyparquet";
import { toDocument } from "../../document.js";
import { errorMessage, FormatError } from "../../errors.js";
import type { DocumentHandler, FormatInput, Parser } from "../types.js";

export class ParquetParser implements Parser {
  constructor(private readonly input: FormatInput) {}

  async forEach(handler: DocumentHandler): Promise<void> {
    const { stream, filePath } = this.input;
    // Rows are read by path; the stream is never consumed.
    stream.destroy();
    if (!filePath) {
      throw new FormatError(
        "parquet",
        "parquet format requires seekable file input (not stdin or pipe)",
      );
    }

    const { file, metadata } = await openParquet(filePath).catch(
      (e: unknown) => {
        throw invalidParquet(e);
      },
    );

    let rowStart = 0;
    for (const group of metadata.row_groups) {
      const rowEnd = rowStart + Number(group.num_rows);
      const rows = await parquetReadObjects({
        file,
        metadata,
        rowStart,
        rowEnd,
      }).catch((e: unknown) => {
        throw invalidParquet(e);
      });
      for (const row of rows) {
        await handler(toDocument(row));
      }
      rowStart = rowEnd;
    }
  }
}

async function openParquet(filePath: string) {
  const file = await asyncBufferFromFile(filePath);
  const metadata = await parquetMetadataAsync(file);
  return { file, metadata };
}

function invalidParquet(cause: unknown): FormatError {
  return new FormatError(
    "parquet",
    `invalid Parquet file: ${errorMessage(cause)}`,
    cause,
  );
}
