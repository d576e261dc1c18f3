/**
 * β-reduction.
 *
 * Reduction is normal order and call by name: the function of an
 * application is reduced first, and its argument is substituted without
 * being reduced. Pending arguments wait on an explicit spine stack, so a
 * long reduction costs heap rather than call stack.
 *
 * @example
 * ```ts
 * import { betaReduce, parseTerm, prettyPrintNameless } from "nameless-lambda";
 *
 * const nf = betaReduce(parseTerm("((λx.x) (λy.y))"));
 * console.log(prettyPrintNameless(nf)); // "λ 0"
 * ```
 *
 * @module
 */
import {
  createApplication,
  type LambdaTerm,
  withBody,
} from "../terms/lambda.ts";
import { betaSubstitute } from "./substitution.ts";
import { ReductionLimitError, StuckTermError } from "./reductionError.ts";

interface StepBudget {
  readonly maxSteps: number;
  steps: number;
}

const tick = (budget: StepBudget): void => {
  if (budget.steps >= budget.maxSteps) {
    throw new ReductionLimitError(budget.maxSteps);
  }
  budget.steps++;
};

/**
 * Reduces to weak head normal form. A variable head with pending
 * arguments is returned as the rebuilt application.
 */
const headReduce = (term: LambdaTerm, budget: StepBudget): LambdaTerm => {
  const spine: LambdaTerm[] = [];
  let current = term;

  for (;;) {
    switch (current.kind) {
      case "non-terminal":
        spine.push(current.rgt);
        current = current.lft;
        break;
      case "lambda-abs": {
        const argument = spine.pop();
        if (argument === undefined) {
          return current;
        }
        tick(budget);
        current = betaSubstitute(current.body, argument);
        break;
      }
      case "lambda-var":
        return spine.reduceRight<LambdaTerm>(createApplication, current);
    }
  }
};

const weakHead = (term: LambdaTerm, budget: StepBudget): LambdaTerm => {
  const result = headReduce(term, budget);
  if (result.kind === "non-terminal") {
    throw new StuckTermError(result);
  }
  return result;
};

/**
 * Reduces a closed term to weak head normal form with no step limit.
 * Does not return if the term has no normal form.
 */
export const betaReduce = (term: LambdaTerm): LambdaTerm =>
  weakHead(term, { maxSteps: Infinity, steps: 0 });

/**
 * Same as betaReduce, but throws a ReductionLimitError once more than
 * `maxSteps` β-contractions would be needed.
 */
export const reduceWithBudget = (
  term: LambdaTerm,
  maxSteps: number,
): LambdaTerm => weakHead(term, { maxSteps, steps: 0 });

const normalizeWith = (term: LambdaTerm, budget: StepBudget): LambdaTerm => {
  const whnf = headReduce(term, budget);
  switch (whnf.kind) {
    case "lambda-var":
      return whnf;
    case "lambda-abs":
      return withBody(whnf, normalizeWith(whnf.body, budget));
    case "non-terminal":
      return createApplication(
        normalizeWith(whnf.lft, budget),
        normalizeWith(whnf.rgt, budget),
      );
  }
};

/**
 * Reduces to full β-normal form, including under binders. Open subterms
 * met on the way stay as stuck applications. All reductions share one
 * budget of `maxSteps` β-contractions.
 */
export const normalize = (
  term: LambdaTerm,
  maxSteps = Infinity,
): LambdaTerm => normalizeWith(term, { maxSteps, steps: 0 });
