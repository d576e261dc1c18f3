/**
 * Reduction error definitions.
 *
 * @module
 */
import type { LambdaTerm } from "../terms/lambda.ts";
import { prettyPrintNameless } from "../terms/prettyPrint.ts";

export class ReductionError extends Error {}

/**
 * Thrown when a reduction needs more β-steps than its budget allows.
 * The term may diverge, or may simply need a larger budget.
 */
export class ReductionLimitError extends ReductionError {
  constructor(public readonly maxSteps: number) {
    super(`reduction exceeded the limit of ${maxSteps} β-steps`);
    this.name = "ReductionLimitError";
  }
}

/**
 * Thrown when weak-head reduction meets an application whose head is a
 * variable. Closed terms never get there, so this signals a term that was
 * built with free variables.
 */
export class StuckTermError extends ReductionError {
  constructor(public readonly term: LambdaTerm) {
    super(`cannot reduce open application ${prettyPrintNameless(term)}`);
    this.name = "StuckTermError";
  }
}
