import { UnsupportedWriteError } from "../../errors.js";
import type { Format } from "../types.js";
import { parquetDetector } from "./detector.js";
import { ParquetParser } from "./parser.js";

export { PARQUET_MAGIC, parquetDetector } from "./detector.js";
export { ParquetParser } from "./parser.js";

export const parquetFormat: Format = {
  name: "parquet",
  detector: parquetDetector,
  createParser(input) {
    return new ParquetParser(input);
  },
  createFormatter() {
    throw new UnsupportedWriteError("parquet");
  },
};
