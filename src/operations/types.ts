import type { StepValue } from "../document.js";

/**
 * A transform applied to one document at a time.
 *
 * Implementations may mutate the input in place; callers always continue
 * with the returned value. Every operation hands FILTERED back unchanged.
 */
export interface Operation {
  apply(input: StepValue): StepValue;
  /** Human-readable form used in pipeline error messages */
  describe(): string;
}
