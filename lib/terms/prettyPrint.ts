/**
 * Term printers.
 *
 * - `prettyPrintTerm` names every binder after its depth and produces text
 *   that `parseTerm` accepts again.
 * - `prettyPrintNameless` prints the raw indices, e.g. `λ 0`.
 * - `debugPrintTerm` prints the node structure.
 *
 * @module
 */
import { debugPrintTy, prettyPrintTy } from "../types/types.ts";
import type { LambdaTerm } from "./lambda.ts";

const baseCharCode = 97; // 'a'
const alphabetSize = 26;

/**
 * Names the binder introduced at the given depth: a, b, …, z, aa, ab, …
 */
export const binderName = (level: number): string => {
  let name = "";
  let n = level + 1;
  while (n > 0) {
    n--;
    name = String.fromCharCode(baseCharCode + (n % alphabetSize)) + name;
    n = Math.floor(n / alphabetSize);
  }
  return name;
};

/**
 * Collects the head and the arguments of an application spine,
 * so that ((f a) b) prints as (f a b).
 */
const spine = (term: LambdaTerm): [LambdaTerm, LambdaTerm[]] => {
  const args: LambdaTerm[] = [];
  let head = term;
  while (head.kind === "non-terminal") {
    args.push(head.rgt);
    head = head.lft;
  }
  return [head, args.reverse()];
};

/**
 * Pretty-prints a term in the surface syntax.
 *
 * Variables whose binder lies outside the printed term have no name to
 * take; they print as their index relative to the top of the term.
 *
 * @param term the term to print
 * @param depth the number of binders already entered
 * @returns a human-readable string representation
 */
export const prettyPrintTerm = (term: LambdaTerm, depth = 0): string => {
  switch (term.kind) {
    case "lambda-var":
      return term.idx < depth
        ? binderName(depth - 1 - term.idx)
        : String(term.idx - depth);
    case "lambda-abs": {
      const annotation = term.ty === undefined
        ? ""
        : `:${prettyPrintTy(term.ty)}`;
      return `(λ${binderName(depth)}${annotation}.` +
        `${prettyPrintTerm(term.body, depth + 1)})`;
    }
    case "non-terminal": {
      const [head, args] = spine(term);
      return `(${
        [head, ...args].map((t) => prettyPrintTerm(t, depth)).join(" ")
      })`;
    }
  }
};

export const prettyPrintNameless = (term: LambdaTerm): string => {
  switch (term.kind) {
    case "lambda-var":
      return String(term.idx);
    case "lambda-abs":
      return term.ty === undefined
        ? `λ ${prettyPrintNameless(term.body)}`
        : `λ:${prettyPrintTy(term.ty)} ${prettyPrintNameless(term.body)}`;
    case "non-terminal": {
      const operand = (t: LambdaTerm) =>
        t.kind === "lambda-abs"
          ? `(${prettyPrintNameless(t)})`
          : prettyPrintNameless(t);
      return `(${operand(term.lft)} ${operand(term.rgt)})`;
    }
  }
};

export const debugPrintTerm = (term: LambdaTerm): string => {
  switch (term.kind) {
    case "lambda-var":
      return `Variable(${term.idx})`;
    case "lambda-abs":
      return term.ty === undefined
        ? `Abstraction(${debugPrintTerm(term.body)})`
        : `Abstraction(${debugPrintTy(term.ty)}, ${
          debugPrintTerm(term.body)
        })`;
    case "non-terminal":
      return `Application(${debugPrintTerm(term.lft)}, ${
        debugPrintTerm(term.rgt)
      })`;
  }
};
