/**
 * Path Parser
 *
 * Turns `org.teams[*].members[0].name` into an ordered list of steps.
 * Syntax: `key(.key)*`, each segment optionally suffixed with `[<digits>]`
 * or `[*]`.
 */

import { PathSyntaxError } from "../errors.js";

export const WILDCARD = "*";

export type Wildcard = typeof WILDCARD;

export interface PathStep {
  readonly key: string;
  /** Absent when the step does not index into an array */
  readonly index?: number | Wildcard;
}

/** A step that is safe to hand to the tree accessor as-is */
export interface ConcreteStep extends PathStep {
  readonly index?: number;
}

const INDEX_BODY = /^\d+$/;

export function parsePath(path: string): PathStep[] {
  if (path === "") {
    throw new PathSyntaxError("EmptyPath", "", "empty path");
  }
  return path.split(".").map(parseSegment);
}

function parseSegment(segment: string): PathStep {
  const open = segment.indexOf("[");
  if (open < 0) {
    if (segment === "") {
      throw new PathSyntaxError(
        "InvalidSegment",
        segment,
        "invalid segment \"\": empty key",
      );
    }
    return { key: segment };
  }

  if (open === 0 || !segment.endsWith("]")) {
    throw new PathSyntaxError(
      "InvalidSegment",
      segment,
      `invalid segment ${JSON.stringify(segment)}`,
    );
  }

  const key = segment.slice(0, open);
  const body = segment.slice(open + 1, -1);

  if (body === "") {
    throw new PathSyntaxError(
      "EmptyIndex",
      segment,
      `empty index in ${JSON.stringify(segment)}`,
    );
  }
  if (body === WILDCARD) {
    return { key, index: WILDCARD };
  }
  if (!INDEX_BODY.test(body) || !Number.isSafeInteger(Number(body))) {
    throw new PathSyntaxError(
      "InvalidIndex",
      segment,
      `invalid non-negative index in ${JSON.stringify(segment)}`,
    );
  }
  return { key, index: Number(body) };
}

export function formatPath(steps: readonly PathStep[]): string {
  return steps
    .map((step) =>
      step.index === undefined ? step.key : `${step.key}[${step.index}]`,
    )
    .join(".");
}

export function hasWildcard(steps: readonly PathStep[]): boolean {
  return steps.some((step) => step.index === WILDCARD);
}

/** Narrow a path to concrete steps, or undefined if it holds a wildcard. */
export function toConcrete(
  steps: readonly PathStep[],
): ConcreteStep[] | undefined {
  const concrete: ConcreteStep[] = [];
  for (const step of steps) {
    if (step.index === WILDCARD) return undefined;
    concrete.push(
      step.index === undefined
        ? { key: step.key }
        : { key: step.key, index: step.index },
    );
  }
  return concrete;
}

/** The key of the last step, used to name flattened pick results. */
export function finalKey(steps: readonly PathStep[]): string {
  return steps.length === 0 ? "" : steps[steps.length - 1].key;
}
