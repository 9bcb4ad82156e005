export { AVRO_MAGIC, AvroParser, avroFormat } from "./avro/index.js";
export {
  JsonFormatter,
  JsonParser,
  JsonValueSplitter,
  jsonFormat,
} from "./json/index.js";
export { PARQUET_MAGIC, ParquetParser, parquetFormat } from "./parquet/index.js";
export {
  createDefaultRegistry,
  type Detection,
  FormatRegistry,
  PEEK_SIZE,
  registerBuiltinFormats,
} from "./registry.js";
export {
  type Detector,
  type DocumentHandler,
  defaultFormatterOptions,
  type Format,
  type FormatInput,
  type Formatter,
  type FormatterOptions,
  type OutputSink,
  type Parser,
  readAll,
  resolveFormatterOptions,
} from "./types.js";
export { YamlFormatter, YamlParser, yamlFormat } from "./yaml/index.js";
