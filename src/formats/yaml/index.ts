import { type Format, resolveFormatterOptions } from "../types.js";
import { yamlDetector } from "./detector.js";
import { YamlFormatter } from "./formatter.js";
import { YamlParser } from "./parser.js";

export { yamlDetector } from "./detector.js";
export { YamlFormatter } from "./formatter.js";
export { YamlParser } from "./parser.js";

export const yamlFormat: Format = {
  name: "yaml",
  detector: yamlDetector,
  createParser(input) {
    return new YamlParser(input.stream);
  },
  createFormatter(sink, options) {
    return new YamlFormatter(sink, resolveFormatterOptions(options));
  },
};
