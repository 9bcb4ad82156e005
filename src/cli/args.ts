/**
 * Command-line argument parsing
 *
 * Options take their value as the next argument or after `=`. Long options
 * may be written with one dash (`-pick a`) as well as two. Repeatable
 * options accumulate in the order given. A help flag in option position
 * returns the help text at once; as an option's value it is just a value.
 */

import { FORMAT_NAMES, isFormatName, type RunOptions } from "../config.js";
import { type CliResult, showHelp, unknownOption, usageError } from "./help.js";

export interface ParsedArgs {
  /** Input file; stdin when unset */
  input?: string;
  /** Directory to process instead of a single input */
  dir?: string;
  /** Output file; stdout when unset */
  output?: string;
  options: RunOptions & {
    pick: string[];
    set: string[];
    delete: string[];
    where: string[];
  };
  verbose: boolean;
  version: boolean;
}

const VALUE_OPTIONS = new Set([
  "in",
  "dir",
  "out",
  "from",
  "to",
  "pick",
  "set",
  "delete",
  "where",
  "indent",
]);

export function parseArgs(args: string[]): ParsedArgs | CliResult {
  const parsed: ParsedArgs = {
    options: { pick: [], set: [], delete: [], where: [] },
    verbose: false,
    version: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const a = args[i];

    if (a === "-" || !a.startsWith("-")) {
      positional.push(a);
      continue;
    }
    if (a === "-c") {
      parsed.options.compact = true;
      continue;
    }
    if (a === "-v") {
      parsed.verbose = true;
      continue;
    }
    if (a === "-h") return showHelp();

    const body = a.startsWith("--") ? a.slice(2) : a.slice(1);
    const eq = body.indexOf("=");
    const name = eq >= 0 ? body.slice(0, eq) : body;

    if (!VALUE_OPTIONS.has(name)) {
      if (eq >= 0) return unknownOption(a);
      switch (name) {
        case "compact":
          parsed.options.compact = true;
          break;
        case "preserve-hierarchy":
          parsed.options.preserveHierarchy = true;
          break;
        case "verbose":
          parsed.verbose = true;
          break;
        case "version":
          parsed.version = true;
          break;
        case "help":
          return showHelp();
        default:
          return unknownOption(a);
      }
      continue;
    }

    let value: string;
    if (eq >= 0) {
      value = body.slice(eq + 1);
    } else if (i + 1 < args.length) {
      value = args[++i];
    } else {
      return usageError(`option '--${name}' requires an argument`);
    }

    const error = applyValue(parsed, name, value);
    if (error) return error;
  }

  if (positional.length > 1) {
    return usageError(`unexpected argument '${positional[1]}'`);
  }
  if (positional.length === 1 && positional[0] !== "-") {
    if (parsed.input !== undefined) {
      return usageError(`unexpected argument '${positional[0]}'`);
    }
    parsed.input = positional[0];
  }
  if (parsed.input !== undefined && parsed.dir !== undefined) {
    return usageError("--in and --dir cannot be used together");
  }

  return parsed;
}

function applyValue(
  parsed: ParsedArgs,
  name: string,
  value: string,
): CliResult | undefined {
  const { options } = parsed;
  switch (name) {
    case "in":
      parsed.input = value;
      return undefined;
    case "dir":
      parsed.dir = value;
      return undefined;
    case "out":
      parsed.output = value;
      return undefined;
    case "from":
    case "to":
      if (!isFormatName(value)) {
        return usageError(
          `invalid format '${value}' for --${name} (expected ${FORMAT_NAMES.join(", ")})`,
        );
      }
      options[name] = value;
      return undefined;
    case "pick":
    case "set":
    case "delete":
    case "where":
      options[name].push(value);
      return undefined;
    case "indent": {
      const indent = Number(value);
      if (!/^\d+$/.test(value) || indent > 10) {
        return usageError(`invalid indent '${value}' (expected 0-10)`);
      }
      options.indent = indent;
      return undefined;
    }
    default:
      return unknownOption(`--${name}`);
  }
}
