/**
 * Pick - extract values by path
 *
 * Flattened mode (default) returns bare values the way `jq '.a.b'` would.
 * Hierarchy mode rebuilds each picked path inside a fresh mapping, so the
 * caller can still see where a value lived.
 */

import {
  type Document,
  type DocumentMap,
  isFiltered,
  type StepValue,
} from "../document.js";
import { getPath, setPath } from "../path/accessor.js";
import { expandSteps } from "../path/expand.js";
import {
  type ConcreteStep,
  finalKey,
  hasWildcard,
  type PathStep,
  parsePath,
} from "../path/parser.js";
import { safeSet } from "../path/safe-object.js";
import type { Operation } from "./types.js";

export interface PickOptions {
  /** Rebuild the full path structure instead of returning bare values */
  preserveHierarchy?: boolean;
}

interface PickPath {
  readonly raw: string;
  readonly steps: readonly PathStep[];
  readonly wildcard: boolean;
}

export class PickOperation implements Operation {
  private readonly paths: readonly PickPath[];
  private readonly preserveHierarchy: boolean;

  constructor(paths: readonly string[], options: PickOptions = {}) {
    this.paths = paths.map((raw) => {
      const steps = parsePath(raw);
      return { raw, steps, wildcard: hasWildcard(steps) };
    });
    this.preserveHierarchy = options.preserveHierarchy ?? false;
  }

  describe(): string {
    return `pick(${this.paths.map((p) => p.raw).join(", ")})`;
  }

  apply(input: StepValue): StepValue {
    if (isFiltered(input) || this.paths.length === 0) return input;

    if (this.preserveHierarchy) return this.applyWithHierarchy(input);
    if (this.paths.length === 1) return this.applySinglePath(input, this.paths[0]);
    return this.applyMultiplePaths(input);
  }

  /**
   * One concrete match yields the bare value (null when missing).
   * A wildcard that matches nothing yields [], several matches an array.
   */
  private applySinglePath(doc: Document, path: PickPath): Document {
    const matches = expandSteps(doc, path.steps);

    if (matches.length === 0) {
      return path.wildcard ? [] : null;
    }
    if (matches.length === 1) {
      const hit = getPath(doc, matches[0]);
      return hit.found ? hit.value : null;
    }
    return collect(doc, matches);
  }

  /**
   * Several paths flatten into one mapping keyed by each path's final key.
   * Missing paths are skipped; when nothing matched the result is null.
   */
  private applyMultiplePaths(doc: Document): Document {
    const out: DocumentMap = {};
    let picked = false;

    for (const path of this.paths) {
      const matches = expandSteps(doc, path.steps);
      const key = finalKey(path.steps);

      if (path.wildcard) {
        const values = collect(doc, matches);
        if (values.length > 0) {
          safeSet(out, key, values);
          picked = true;
        }
        continue;
      }

      if (matches.length === 0) continue;
      const hit = getPath(doc, matches[0]);
      if (hit.found) {
        safeSet(out, key, hit.value);
        picked = true;
      }
    }

    return picked ? out : null;
  }

  private applyWithHierarchy(doc: Document): DocumentMap {
    const out: DocumentMap = {};

    for (const path of this.paths) {
      for (const steps of expandSteps(doc, path.steps)) {
        const hit = getPath(doc, steps);
        if (hit.found) setPath(out, steps, hit.value);
      }
    }

    return out;
  }
}

function collect(doc: Document, matches: readonly ConcreteStep[][]): Document[] {
  const values: Document[] = [];
  for (const steps of matches) {
    const hit = getPath(doc, steps);
    if (hit.found) values.push(hit.value);
  }
  return values;
}
