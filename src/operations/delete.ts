/**
 * Delete - remove values by path
 */

import { isFiltered, type StepValue } from "../document.js";
import { deletePath } from "../path/accessor.js";
import { expandSteps } from "../path/expand.js";
import { type PathStep, parsePath } from "../path/parser.js";
import type { Operation } from "./types.js";

export class DeleteOperation implements Operation {
  private readonly paths: readonly { raw: string; steps: readonly PathStep[] }[];

  constructor(paths: readonly string[]) {
    this.paths = paths.map((raw) => ({ raw, steps: parsePath(raw) }));
  }

  describe(): string {
    return `delete(${this.paths.map((p) => p.raw).join(", ")})`;
  }

  /**
   * Paths apply in the order given, each expanded against the document as
   * the previous deletions left it. So `items[0]` twice removes the first
   * two elements.
   */
  apply(input: StepValue): StepValue {
    if (isFiltered(input)) return input;

    for (const path of this.paths) {
      // Highest indices first: splicing must not shift a pending match.
      const matches = expandSteps(input, path.steps).reverse();
      for (const steps of matches) {
        deletePath(input, steps);
      }
    }

    return input;
  }
}
