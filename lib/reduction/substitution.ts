/**
 * Substitution on de Bruijn terms.
 *
 * @module
 */
import {
  createApplication,
  type LambdaTerm,
  mkVar,
  withBody,
} from "../terms/lambda.ts";

/**
 * Adds `delta` to every variable whose index is at least `cutoff`, i.e.
 * every variable bound outside the term.
 */
export const shift = (
  term: LambdaTerm,
  delta: number,
  cutoff = 0,
): LambdaTerm => {
  if (delta === 0) {
    return term;
  }
  switch (term.kind) {
    case "lambda-var":
      return term.idx >= cutoff ? mkVar(term.idx + delta) : term;
    case "lambda-abs":
      return withBody(term, shift(term.body, delta, cutoff + 1));
    case "non-terminal":
      return createApplication(
        shift(term.lft, delta, cutoff),
        shift(term.rgt, delta, cutoff),
      );
  }
};

/**
 * Reports whether every variable in the term is bound inside it, counting
 * `depth` binders already entered.
 */
export const isClosed = (term: LambdaTerm, depth = 0): boolean => {
  switch (term.kind) {
    case "lambda-var":
      return term.idx < depth;
    case "lambda-abs":
      return isClosed(term.body, depth + 1);
    case "non-terminal":
      return isClosed(term.lft, depth) && isClosed(term.rgt, depth);
  }
};

const replaceUnder = (
  term: LambdaTerm,
  index: number,
  replacement: LambdaTerm,
  binders: number,
  closed: boolean,
): LambdaTerm => {
  switch (term.kind) {
    case "lambda-var":
      if (term.idx !== index + binders) {
        return term;
      }
      return closed ? replacement : shift(replacement, binders);
    case "lambda-abs":
      return withBody(
        term,
        replaceUnder(term.body, index, replacement, binders + 1, closed),
      );
    case "non-terminal":
      return createApplication(
        replaceUnder(term.lft, index, replacement, binders, closed),
        replaceUnder(term.rgt, index, replacement, binders, closed),
      );
  }
};

/**
 * Replaces every variable referring to `index` with `replacement`.
 *
 * Entering an abstraction moves the target one binder further away, and
 * the replacement's own outer references with it. A closed replacement is
 * inserted as is.
 */
export const substitute = (
  term: LambdaTerm,
  index: number,
  replacement: LambdaTerm,
): LambdaTerm =>
  replaceUnder(term, index, replacement, 0, isClosed(replacement));

const contract = (
  term: LambdaTerm,
  depth: number,
  argument: LambdaTerm,
  closed: boolean,
): LambdaTerm => {
  switch (term.kind) {
    case "lambda-var":
      if (term.idx === depth) {
        return closed ? argument : shift(argument, depth);
      }
      return term.idx > depth ? mkVar(term.idx - 1) : term;
    case "lambda-abs":
      return withBody(term, contract(term.body, depth + 1, argument, closed));
    case "non-terminal":
      return createApplication(
        contract(term.lft, depth, argument, closed),
        contract(term.rgt, depth, argument, closed),
      );
  }
};

/**
 * Contracts the redex ((λ body) argument): the argument takes the place of
 * index 0 and the binder that disappears is removed from every index above
 * it. Equal to `shift(substitute(body, 0, shift(argument, 1)), -1)`, done
 * in one pass.
 */
export const betaSubstitute = (
  body: LambdaTerm,
  argument: LambdaTerm,
): LambdaTerm => contract(body, 0, argument, isClosed(argument));
