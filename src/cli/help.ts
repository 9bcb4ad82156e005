/** What a CLI step produced; the process writes and exits with it. */
export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

const NAME = "docsift";

const HELP = `${NAME} - pick, set, delete and filter fields in structured documents

Usage: ${NAME} [OPTIONS] [FILE]

Reads JSON, YAML, Avro or Parquet documents, applies the requested
operations to each one, and writes the results as JSON or YAML.
Operations run in a fixed order: --where, --pick, --set, --delete.

Paths are dotted keys with optional array indexes: user.name,
items[0].id, items[*].tags (every element).

Options:
      --in FILE             read FILE instead of stdin
      --dir DIR             process every matching file under DIR
      --out FILE            write to FILE instead of stdout
      --from FORMAT         input format: json, yaml, avro, parquet
      --to FORMAT           output format: json (default), yaml
      --pick PATH           extract PATH (repeatable)
      --set PATH=VALUE      assign VALUE, parsed as JSON when possible (repeatable)
      --delete PATH         remove PATH (repeatable)
      --where PATH=VALUE    keep documents whose PATH equals VALUE (repeatable, all must match)
      --preserve-hierarchy  keep picked values under their full path
  -c, --compact             one line per document
      --indent N            spaces per indentation level (default: 2)
  -v, --verbose             trace progress on stderr
      --version             print the version and exit
  -h, --help                display this help and exit

Examples:
  ${NAME} --pick user.name --pick user.id < data.json
  ${NAME} config.yaml --set server.port=8080 --delete debug --to json
  ${NAME} --from avro --in events.avro --where type=click -c
  ${NAME} --dir logs/ --from parquet --pick items[*].id

Without --from, the format comes from the file extension, then from the content.
In --dir mode each result is wrapped as {"_file", "_row", "data"}.
`;

export function showHelp(): CliResult {
  return { stdout: HELP, stderr: "", exitCode: 0 };
}

/**
 * Returns an error result for an unknown option
 */
export function unknownOption(option: string): CliResult {
  return usageError(`unrecognized option '${option}'`);
}

/** A usage mistake: message on stderr, exit status 1. */
export function usageError(message: string): CliResult {
  return {
    stdout: "",
    stderr: `${NAME}: ${message}\nTry '${NAME} --help' for more information.\n`,
    exitCode: 1,
  };
}
