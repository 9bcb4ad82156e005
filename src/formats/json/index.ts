import {
  type Format,
  resolveFormatterOptions,
} from "../types.js";
import { jsonDetector } from "./detector.js";
import { JsonFormatter } from "./formatter.js";
import { JsonParser } from "./parser.js";

export { jsonDetector } from "./detector.js";
export { JsonFormatter } from "./formatter.js";
export { JsonParser, JsonValueSplitter } from "./parser.js";

export const jsonFormat: Format = {
  name: "json",
  detector: jsonDetector,
  createParser(input) {
    return new JsonParser(input.stream);
  },
  createFormatter(sink, options) {
    return new JsonFormatter(sink, resolveFormatterOptions(options));
  },
};
