import { UnsupportedWriteError } from "../../errors.js";
import type { Format } from "../types.js";
import { avroDetector } from "./detector.js";
import { AvroParser } from "./parser.js";

export { AVRO_MAGIC, avroDetector } from "./detector.js";
export { AvroParser } from "./parser.js";

export const avroFormat: Format = {
  name: "avro",
  detector: avroDetector,
  createParser(input) {
    return new AvroParser(input.stream);
  },
  createFormatter() {
    throw new UnsupportedWriteError("avro");
  },
};
