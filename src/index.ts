export {
  DEFAULT_RUN_OPTIONS,
  FORMAT_EXTENSIONS,
  FORMAT_NAMES,
  type FormatName,
  formatFromExtension,
  isFormatName,
  type ResolvedRunOptions,
  type RunOptions,
  resolveRunOptions,
} from "./config.js";
export {
  type Document,
  type DocumentMap,
  FILTERED,
  type Filtered,
  isDocumentArray,
  isDocumentMap,
  isFiltered,
  type StepValue,
  toDocument,
} from "./document.js";
export {
  DirectoryProcessingError,
  FormatDetectionError,
  FormatError,
  InvalidArgumentError,
  PathSyntaxError,
  type PathSyntaxErrorKind,
  PipelineStepError,
  UnknownFormatError,
  UnsupportedWriteError,
} from "./errors.js";
export {
  avroFormat,
  createDefaultRegistry,
  type Detection,
  type Detector,
  type DocumentHandler,
  type Format,
  type FormatInput,
  FormatRegistry,
  type Formatter,
  type FormatterOptions,
  jsonFormat,
  type OutputSink,
  type Parser,
  parquetFormat,
  registerBuiltinFormats,
  yamlFormat,
} from "./formats/index.js";
export { createStreamLogger, type Logger } from "./logger.js";
export {
  type Assignment,
  type Condition,
  compose,
  DeleteOperation,
  formatValue,
  type Operation,
  PickOperation,
  type PickOptions,
  Pipeline,
  SetOperation,
  WhereOperation,
} from "./operations/index.js";
export { deletePath, getPath, type Lookup, setPath } from "./path/accessor.js";
export { expand, expandSteps } from "./path/expand.js";
export {
  type ConcreteStep,
  formatPath,
  hasWildcard,
  type PathStep,
  parsePath,
  WILDCARD,
} from "./path/parser.js";
export {
  type DirectoryParams,
  type DirectoryReport,
  processDirectory,
} from "./runner/directory.js";
export {
  buildPipeline,
  type DocumentCounts,
  processDocuments,
  type RunStreamParams,
  type RunSummary,
  runStream,
  selectInputFormat,
} from "./runner/run.js";
