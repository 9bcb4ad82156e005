export { type Assignment, SetOperation } from "./set.js";
export { parseLooseValue, splitPair } from "./assignment.js";
export { DeleteOperation } from "./delete.js";
export { PickOperation, type PickOptions } from "./pick.js";
export { compose, Pipeline } from "./pipeline.js";
export type { Operation } from "./types.js";
export { type Condition, formatValue, WhereOperation } from "./where.js";
