import type { LambdaTerm } from "../terms/lambda.ts";
import { arrow, type Type, typesLitEq } from "./types.ts";
import {
  InvalidApplicationError,
  MissingAnnotationError,
  UnboundIndexError,
} from "./typeError.ts";

/**
 * Γ, or capital Gamma, holds the types of the enclosing binders,
 * innermost last, so that index i is found i places from the end.
 */
export type Context = readonly Type[];

export function emptyContext(): Context {
  return [];
}

export const addBinding = (ctx: Context, ty: Type): Context => [...ctx, ty];

export const lookupIndex = (ctx: Context, idx: number): Type | undefined =>
  idx < ctx.length ? ctx[ctx.length - 1 - idx] : undefined;

export const typecheck = (term: LambdaTerm): Type => {
  return typecheckGiven(emptyContext(), term);
};

/**
 * Type checks terms in the simply typed lambda calculus.
 * Throws a TypeError if the term is not well typed.
 *
 * @param ctx the types of the binders enclosing the term
 * @param term a lambda term whose abstractions all carry an argument type
 * @returns the type of the entire term
 */
export const typecheckGiven = (ctx: Context, term: LambdaTerm): Type => {
  switch (term.kind) {
    case "lambda-var": {
      const lookedUp = lookupIndex(ctx, term.idx);

      if (lookedUp === undefined) {
        throw new UnboundIndexError(term.idx, ctx.length);
      }

      return lookedUp;
    }
    case "lambda-abs": {
      if (term.ty === undefined) {
        throw new MissingAnnotationError(term);
      }
      const bodyTy = typecheckGiven(addBinding(ctx, term.ty), term.body);
      return arrow(term.ty, bodyTy);
    }
    case "non-terminal": {
      const functionType = typecheckGiven(ctx, term.lft);
      const argumentType = typecheckGiven(ctx, term.rgt);

      if (
        functionType.kind !== "non-terminal" ||
        !typesLitEq(functionType.lft, argumentType)
      ) {
        throw new InvalidApplicationError({
          function: term.lft,
          functionType,
          argument: term.rgt,
          argumentType,
        });
      }

      return functionType.rgt;
    }
  }
};
