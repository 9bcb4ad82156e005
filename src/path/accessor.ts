/**
 * Tree Accessor
 *
 * Navigation and mutation of nested mapping/array documents by a list of
 * steps. Reads and deletes treat every mismatch as "not found"; writes
 * replace whatever structure is in the way.
 */

import {
  type Document,
  type DocumentMap,
  isDocumentArray,
  isDocumentMap,
} from "../document.js";
import type { ConcreteStep, PathStep } from "./parser.js";
import { safeDelete, safeHasOwn, safeSet } from "./safe-object.js";

export type Lookup = { found: true; value: Document } | { found: false };

const MISS: Lookup = { found: false };

/**
 * Resolve a path against a document without mutating it.
 * A wildcard index never resolves; expand the path first.
 */
export function getPath(document: Document, steps: readonly PathStep[]): Lookup {
  let current: Document = document;

  for (const step of steps) {
    if (!isDocumentMap(current) || !safeHasOwn(current, step.key)) {
      return MISS;
    }
    current = current[step.key];

    if (step.index !== undefined) {
      if (
        typeof step.index !== "number" ||
        !isDocumentArray(current) ||
        step.index >= current.length
      ) {
        return MISS;
      }
      current = current[step.index];
    }
  }

  return { found: true, value: current };
}

/**
 * Place `value` at `steps` inside `root`, creating intermediate containers
 * and overwriting any value whose type does not fit the next step.
 * Arrays grow to exactly `index + 1`, padded with null; they never shrink.
 */
export function setPath(
  root: DocumentMap,
  steps: readonly ConcreteStep[],
  value: Document,
): void {
  let current = root;

  for (let i = 0; i < steps.length; i++) {
    const { key, index } = steps[i];
    const isLast = i === steps.length - 1;
    const child = safeHasOwn(current, key) ? current[key] : undefined;

    if (index === undefined) {
      if (isLast) {
        safeSet(current, key, value);
        return;
      }
      const next = isDocumentMap(child) ? child : {};
      safeSet(current, key, next);
      current = next;
      continue;
    }

    const array = isDocumentArray(child) ? child : [];
    while (array.length <= index) array.push(null);
    safeSet(current, key, array);

    if (isLast) {
      array[index] = value;
      return;
    }

    const element = array[index];
    const next = isDocumentMap(element) ? element : {};
    array[index] = next;
    current = next;
  }
}

/**
 * Remove the node at `steps` from `root`.
 * A mapping entry is deleted; an array element is spliced out so later
 * elements shift left. Any miss along the way is a no-op.
 */
export function deletePath(
  root: Document,
  steps: readonly ConcreteStep[],
): void {
  if (steps.length === 0) return;

  const parentSteps = steps.slice(0, -1);
  const last = steps[steps.length - 1];

  const parent = getPath(root, parentSteps);
  if (!parent.found || !isDocumentMap(parent.value)) return;

  const container = parent.value;
  if (last.index === undefined) {
    safeDelete(container, last.key);
    return;
  }

  if (!safeHasOwn(container, last.key)) return;
  const array = container[last.key];
  if (!isDocumentArray(array) || last.index >= array.length) return;
  array.splice(last.index, 1);
}
