/**
 * Random well-typed term generation.
 *
 * This module generates closed, simply typed terms of a requested type,
 * using a random seed for reproducible results.
 *
 * @module
 */
import {
  addBinding,
  type Context,
  emptyContext,
  lookupIndex,
} from "../types/typedLambda.ts";
import { arrow, prettyPrintTy, type Type, typesLitEq } from "../types/types.ts";
import {
  createApplication,
  type LambdaTerm,
  mkTypedAbs,
  mkVar,
} from "./lambda.ts";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

/**
 * Thrown when no closed term of the requested type exists within the depth.
 */
export class GenerationError extends Error {}

type Strategy = "var" | "abs" | "app";

const shuffle = <T>(rs: RandomSource, items: T[]): T[] => {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = rs.intBetween(0, i);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
};

const randVar = (
  rs: RandomSource,
  ty: Type,
  ctx: Context,
): LambdaTerm | undefined => {
  const candidates: number[] = [];
  for (let idx = 0; idx < ctx.length; idx++) {
    const bound = lookupIndex(ctx, idx);
    if (bound !== undefined && typesLitEq(bound, ty)) {
      candidates.push(idx);
    }
  }
  if (candidates.length === 0) {
    return undefined;
  }
  return mkVar(candidates[rs.intBetween(0, candidates.length - 1)]);
};

/**
 * The type itself and every type it is built from. Applying bound
 * variables can only produce values of these types.
 */
const componentTypes = (ty: Type): Type[] =>
  ty.kind === "base-type"
    ? [ty]
    : [ty, ...componentTypes(ty.lft), ...componentTypes(ty.rgt)];

const randApp = (
  rs: RandomSource,
  ty: Type,
  ctx: Context,
  depth: number,
): LambdaTerm | undefined => {
  const argumentTypes: Type[] = [];
  for (const candidate of ctx.flatMap(componentTypes)) {
    if (!argumentTypes.some((seen) => typesLitEq(seen, candidate))) {
      argumentTypes.push(candidate);
    }
  }
  for (const argumentType of shuffle(rs, argumentTypes)) {
    const fn = genTerm(rs, arrow(argumentType, ty), ctx, depth - 1);
    if (fn === undefined) continue;
    const arg = genTerm(rs, argumentType, ctx, depth - 1);
    if (arg === undefined) continue;
    return createApplication(fn, arg);
  }
  return undefined;
};

/**
 * Tries each way of building a term of type `ty` in random order and
 * returns the first that succeeds. `depth` bounds the nesting of
 * applications; abstractions only ever shrink the target type.
 */
const genTerm = (
  rs: RandomSource,
  ty: Type,
  ctx: Context,
  depth: number,
): LambdaTerm | undefined => {
  const strategies: Strategy[] = depth > 0 ? ["var", "abs", "app"] : [
    "var",
    "abs",
  ];

  for (const strategy of shuffle(rs, strategies)) {
    let term: LambdaTerm | undefined;
    switch (strategy) {
      case "var":
        term = randVar(rs, ty, ctx);
        break;
      case "abs":
        if (ty.kind === "non-terminal") {
          const body = genTerm(rs, ty.rgt, addBinding(ctx, ty.lft), depth);
          term = body === undefined ? undefined : mkTypedAbs(ty.lft, body);
        }
        break;
      case "app":
        term = randApp(rs, ty, ctx, depth);
        break;
    }
    if (term !== undefined) {
      return term;
    }
  }

  return undefined;
};

/**
 * @param rs the random source to use.
 * @param ty the type the generated term must have.
 * @param depth the maximum nesting of applications.
 * @returns a random closed term of type `ty`.
 * @throws GenerationError if the type has no closed term within the depth.
 */
export const randTypedTerm = (
  rs: RandomSource,
  ty: Type,
  depth: number,
): LambdaTerm => {
  const term = genTerm(rs, ty, emptyContext(), depth);
  if (term === undefined) {
    throw new GenerationError(
      `no closed term of type ${prettyPrintTy(ty)} within depth ${depth}`,
    );
  }
  return term;
};
