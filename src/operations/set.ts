/**
 * Set - assign values by path
 *
 * Assignments apply in order with overwrite semantics: whatever structure
 * is in the way is replaced, so a set never fails on a type conflict.
 */

import {
  type Document,
  type DocumentMap,
  isDocumentMap,
  isFiltered,
  type StepValue,
} from "../document.js";
import { setPath } from "../path/accessor.js";
import { expandSteps } from "../path/expand.js";
import {
  type ConcreteStep,
  type PathStep,
  parsePath,
  toConcrete,
  WILDCARD,
} from "../path/parser.js";
import { parseLooseValue, splitPair } from "./assignment.js";
import type { Operation } from "./types.js";

export interface Assignment {
  readonly path: string;
  readonly value: Document;
}

interface ParsedAssignment extends Assignment {
  /** The whole path when it has no wildcard */
  readonly concrete: readonly ConcreteStep[] | undefined;
  /** Steps up to and including the last wildcard */
  readonly head: readonly PathStep[];
  /** Concrete steps after the last wildcard, created when missing */
  readonly tail: readonly ConcreteStep[];
}

export class SetOperation implements Operation {
  private readonly assignments: readonly ParsedAssignment[];

  constructor(assignments: readonly Assignment[]) {
    this.assignments = assignments.map((a) => {
      const steps = parsePath(a.path);
      const split = lastWildcard(steps) + 1;
      return {
        ...a,
        concrete: toConcrete(steps),
        head: steps.slice(0, split),
        tail: toConcrete(steps.slice(split)) ?? [],
      };
    });
  }

  /**
   * Build from `path=value` strings, e.g. `user.name=alice`,
   * `flags.debug=true`, `spec.image={"name":"app"}`.
   */
  static fromPairs(pairs: readonly string[]): SetOperation {
    return new SetOperation(
      pairs.map((pair) => {
        const [path, raw] = splitPair(pair, "assignment");
        return { path, value: parseLooseValue(raw) };
      }),
    );
  }

  describe(): string {
    return `set(${this.assignments.map((a) => a.path).join(", ")})`;
  }

  apply(input: StepValue): StepValue {
    if (isFiltered(input)) return input;

    const root: DocumentMap = isDocumentMap(input) ? input : {};

    for (const assignment of this.assignments) {
      if (assignment.concrete) {
        setPath(root, assignment.concrete, structuredClone(assignment.value));
        continue;
      }
      // Wildcards address only elements that already exist; what follows
      // the last one is created like any other set.
      for (const match of expandSteps(root, assignment.head)) {
        setPath(
          root,
          [...match, ...assignment.tail],
          structuredClone(assignment.value),
        );
      }
    }

    return root;
  }
}

function lastWildcard(steps: readonly PathStep[]): number {
  for (let i = steps.length - 1; i >= 0; i--) {
    if (steps[i].index === WILDCARD) return i;
  }
  return -1;
}
