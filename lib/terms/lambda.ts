/**
 * Lambda calculus terms on de Bruijn indices.
 *
 * Variables carry the number of binders between their occurrence and the
 * abstraction that introduced them, so terms need no names and
 * α-equivalence is structural equality. Abstractions optionally carry the
 * argument type of the simply typed variant.
 *
 * @module
 */
import { cons, type ConsCell } from "../cons.ts";
import { type Type, typesLitEq } from "../types/types.ts";

/**
 * A bound variable. An idx of 0 refers to the innermost enclosing abstraction.
 */
export interface LambdaVar {
  kind: "lambda-var";
  idx: number;
}

/**
 * An abstraction introducing exactly one binder.
 *
 * For instance, "(λx:A.x)" parses to an abstraction with ty A whose body is
 * the variable 0.
 */
export interface LambdaAbs {
  kind: "lambda-abs";
  ty?: Type;
  body: LambdaTerm;
}

/**
 * An application of lft to rgt.
 */
export type LambdaApp = ConsCell<LambdaTerm>;

/**
 * The legal terms of the lambda calculus.
 * e ::= n | λ e | λ:T e | e e, where n is a de Bruijn index
 */
export type LambdaTerm =
  | LambdaVar
  | LambdaAbs
  | LambdaApp;

export const mkVar = (idx: number): LambdaVar => {
  if (!Number.isInteger(idx) || idx < 0) {
    throw new RangeError(`invalid de Bruijn index: ${idx}`);
  }
  return { kind: "lambda-var", idx };
};

export const mkAbs = (body: LambdaTerm): LambdaAbs => ({
  kind: "lambda-abs",
  body,
});

export const mkTypedAbs = (ty: Type, body: LambdaTerm): LambdaAbs => ({
  kind: "lambda-abs",
  ty,
  body,
});

/**
 * Rebuilds an abstraction around a new body, keeping its annotation.
 */
export const withBody = (abs: LambdaAbs, body: LambdaTerm): LambdaAbs =>
  abs.ty === undefined ? mkAbs(body) : mkTypedAbs(abs.ty, body);

/**
 * Creates an application of one term to another.
 * @param left the function term
 * @param right the argument term
 * @returns a new application node
 */
export const createApplication = (
  left: LambdaTerm,
  right: LambdaTerm,
): LambdaApp => cons(left, right);

/**
 * Applies terms left to right: apply(f, a, b) is ((f a) b).
 */
export const apply = (fn: LambdaTerm, ...args: LambdaTerm[]): LambdaTerm =>
  args.reduce<LambdaTerm>(createApplication, fn);

export const termsEq = (a: LambdaTerm, b: LambdaTerm): boolean => {
  if (a.kind === "lambda-var" && b.kind === "lambda-var") {
    return a.idx === b.idx;
  } else if (a.kind === "lambda-abs" && b.kind === "lambda-abs") {
    if (a.ty === undefined || b.ty === undefined) {
      return a.ty === b.ty && termsEq(a.body, b.body);
    }
    return typesLitEq(a.ty, b.ty) && termsEq(a.body, b.body);
  } else if (a.kind === "non-terminal" && b.kind === "non-terminal") {
    return termsEq(a.lft, b.lft) && termsEq(a.rgt, b.rgt);
  } else {
    return false;
  }
};

/**
 * Reports whether any abstraction in the term carries a type annotation.
 */
export const isTyped = (term: LambdaTerm): boolean => {
  const pending: LambdaTerm[] = [term];
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    switch (next.kind) {
      case "lambda-abs":
        if (next.ty !== undefined) {
          return true;
        }
        pending.push(next.body);
        break;
      case "non-terminal":
        pending.push(next.rgt, next.lft);
        break;
    }
  }
  return false;
};

/**
 * @param term the term to erase types from.
 * @returns the same term with every annotation dropped.
 */
export const eraseTypes = (term: LambdaTerm): LambdaTerm => {
  switch (term.kind) {
    case "lambda-var":
      return term;
    case "lambda-abs":
      return mkAbs(eraseTypes(term.body));
    case "non-terminal":
      return createApplication(eraseTypes(term.lft), eraseTypes(term.rgt));
  }
};
