/**
 * Where - keep documents whose fields equal the given text
 *
 * Conditions are AND'ed. Every comparison is textual: the resolved value is
 * rendered with `formatValue` and compared to the expected string, so
 * `age=30` matches the number 30 and the string "30" alike.
 */

import {
  type Document,
  FILTERED,
  isDocumentArray,
  isDocumentMap,
  isFiltered,
  type StepValue,
} from "../document.js";
import { getPath } from "../path/accessor.js";
import { formatPath, type PathStep, parsePath } from "../path/parser.js";
import { splitPair } from "./assignment.js";
import type { Operation } from "./types.js";

export interface Condition {
  readonly path: readonly PathStep[];
  readonly expected: string;
}

export class WhereOperation implements Operation {
  constructor(private readonly conditions: readonly Condition[]) {}

  /** Build from `path=expected` strings, e.g. `user.name=Alice`. */
  static fromPairs(pairs: readonly string[]): WhereOperation {
    return new WhereOperation(
      pairs.map((pair) => {
        const [path, expected] = splitPair(pair, "where condition");
        return { path: parsePath(path), expected };
      }),
    );
  }

  describe(): string {
    if (this.conditions.length === 0) return "where: (no conditions)";
    const parts = this.conditions.map(
      (c) => `${formatPath(c.path)}=${c.expected}`,
    );
    return `where: ${parts.join(" AND ")}`;
  }

  apply(input: StepValue): StepValue {
    if (isFiltered(input)) return input;
    return this.matches(input) ? input : FILTERED;
  }

  matches(doc: Document): boolean {
    return this.conditions.every((condition) => {
      const hit = getPath(doc, condition.path);
      return hit.found && formatValue(hit.value) === condition.expected;
    });
  }
}

/**
 * Default text rendering of a document value:
 * null as `<nil>`, arrays as `[a b]`, mappings as `map[k:v]` with sorted keys.
 * Numbers use JavaScript's own rendering, so 1000000 is `1000000` and only
 * magnitudes from 1e21 up take exponent form.
 */
export function formatValue(value: Document): string {
  if (value === null) return "<nil>";
  if (isDocumentArray(value)) {
    return `[${value.map(formatValue).join(" ")}]`;
  }
  if (isDocumentMap(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${key}:${formatValue(value[key])}`);
    return `map[${entries.join(" ")}]`;
  }
  return String(value);
}
