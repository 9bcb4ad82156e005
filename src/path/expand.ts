/**
 * Wildcard Expander
 *
 * Resolves `[*]` steps against an actual document. Expansion happens per
 * document, so one path expression can stand for a different index set in
 * every record of a stream.
 */

import { type Document, isDocumentArray, isDocumentMap } from "../document.js";
import { safeHasOwn } from "./safe-object.js";
import {
  type ConcreteStep,
  formatPath,
  type PathStep,
  parsePath,
  WILDCARD,
} from "./parser.js";

/**
 * Every concrete path reachable in `document` for `path`, as strings.
 * Only a malformed path throws; missing data yields an empty list.
 */
export function expand(
  document: Document,
  path: string | readonly PathStep[],
): string[] {
  return expandSteps(document, path).map(formatPath);
}

/**
 * Same walk as `expand`, returning step lists so callers need not re-parse.
 * Order is depth-first with ascending indices at every wildcard.
 */
export function expandSteps(
  document: Document,
  path: string | readonly PathStep[],
): ConcreteStep[][] {
  const steps = typeof path === "string" ? parsePath(path) : path;
  const results: ConcreteStep[][] = [];
  walk(document, steps, 0, [], results);
  return results;
}

function walk(
  value: Document,
  steps: readonly PathStep[],
  position: number,
  prefix: ConcreteStep[],
  results: ConcreteStep[][],
): void {
  if (position === steps.length) {
    results.push(prefix);
    return;
  }

  const step = steps[position];
  if (!isDocumentMap(value) || !safeHasOwn(value, step.key)) return;
  const child = value[step.key];

  if (step.index === undefined) {
    walk(child, steps, position + 1, [...prefix, { key: step.key }], results);
    return;
  }

  if (!isDocumentArray(child)) return;

  if (step.index === WILDCARD) {
    for (let i = 0; i < child.length; i++) {
      walk(
        child[i],
        steps,
        position + 1,
        [...prefix, { key: step.key, index: i }],
        results,
      );
    }
    return;
  }

  if (step.index >= child.length) return;
  walk(
    child[step.index],
    steps,
    position + 1,
    [...prefix, { key: step.key, index: step.index }],
    results,
  );
}
