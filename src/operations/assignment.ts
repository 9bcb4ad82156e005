/**
 * Parsing of `path=value` strings shared by Set and Where.
 */

import { type Document, toDocument } from "../document.js";
import { InvalidArgumentError } from "../errors.js";

/**
 * Split on the first `=`. Returns undefined when there is none.
 */
export function splitOnce(
  input: string,
  separator: string,
): [string, string] | undefined {
  const at = input.indexOf(separator);
  if (at < 0) return undefined;
  return [input.slice(0, at), input.slice(at + separator.length)];
}

/**
 * Split and trim a `path=value` pair, rejecting a missing `=` or an empty
 * path. `label` names the kind of pair in error messages.
 */
export function splitPair(pair: string, label: string): [string, string] {
  const parts = splitOnce(pair, "=");
  if (!parts) {
    throw new InvalidArgumentError(
      `invalid ${label} ${JSON.stringify(pair)} (expected path=value)`,
    );
  }
  const path = parts[0].trim();
  if (path === "") {
    throw new InvalidArgumentError(
      `invalid ${label} ${JSON.stringify(pair)}: empty path`,
    );
  }
  return [path, parts[1].trim()];
}

/**
 * JSON first (numbers, booleans, null, objects, arrays, quoted strings),
 * otherwise the literal text, so `name=alice` needs no quoting.
 */
export function parseLooseValue(raw: string): Document {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  return toDocument(parsed);
}
