/**
 * Pipeline - ordered composition of operations
 *
 * Stateless beyond its operation list and reusable across documents, one
 * document at a time. The pipeline does not special-case FILTERED: every
 * operation passes it through, and the caller checks the final value with
 * `isFiltered`.
 */

import type { StepValue } from "../document.js";
import { PipelineStepError } from "../errors.js";
import type { Operation } from "./types.js";

export class Pipeline {
  private readonly operations: Operation[];

  constructor(operations: readonly Operation[] = []) {
    this.operations = [...operations];
  }

  append(...operations: Operation[]): void {
    this.operations.push(...operations);
  }

  isEmpty(): boolean {
    return this.operations.length === 0;
  }

  get size(): number {
    return this.operations.length;
  }

  describe(): string {
    return this.operations.map((op) => op.describe()).join(" | ");
  }

  /**
   * Run every operation in order. The first failure stops the run and is
   * rethrown as a PipelineStepError naming the step.
   */
  apply(input: StepValue): StepValue {
    let current = input;
    for (let index = 0; index < this.operations.length; index++) {
      const op = this.operations[index];
      try {
        current = op.apply(current);
      } catch (e) {
        throw new PipelineStepError(index, safeDescribe(op), e);
      }
    }
    return current;
  }
}

/** Build a pipeline from `operations` and apply it once. */
export function compose(
  input: StepValue,
  ...operations: Operation[]
): StepValue {
  return new Pipeline(operations).apply(input);
}

function safeDescribe(op: Operation): string {
  try {
    return op.describe();
  } catch {
    return "";
  }
}
