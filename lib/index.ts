/**
 * nameless-lambda: parsing, reduction and type checking of lambda terms.
 *
 * This module re-exports the public API:
 * - the term and type model on de Bruijn indices
 * - the parser, which resolves identifiers to indices
 * - substitution and β-reduction, unbounded or under a step budget
 * - the simply typed checker
 * - printers for the surface syntax, the nameless form and the debug form
 *
 * @example
 * ```ts
 * import { betaReduce, parseTerm, prettyPrintTerm } from "nameless-lambda";
 * const nf = betaReduce(parseTerm("(((λx.(λy.x)) (λa.a)) (λb.(λc.b)))"));
 * console.log(prettyPrintTerm(nf)); // "(λa.a)"
 * ```
 *
 * @module
 */

// Term model exports
export { cons, type ConsCell } from "./cons.ts";
export {
  apply,
  createApplication,
  eraseTypes,
  isTyped,
  type LambdaAbs,
  type LambdaApp,
  type LambdaTerm,
  type LambdaVar,
  mkAbs,
  mkTypedAbs,
  mkVar,
  termsEq,
  withBody,
} from "./terms/lambda.ts";
export {
  arrow,
  arrows,
  type BaseType,
  type FunctionType,
  mkBaseType,
  type Type,
  typesLitEq,
} from "./types/types.ts";

// Parser exports
/** Parses a string representation of a lambda term into its de Bruijn form. */
export { parseTerm } from "./parser/lambda.ts";
/** Parses a string representation of a simple type. */
export { parseType } from "./parser/type.ts";
export {
  ParseError,
  type Span,
  SyntaxError,
  UnboundVariableError,
} from "./parser/parseError.ts";

// Reduction exports
export {
  betaSubstitute,
  isClosed,
  shift,
  substitute,
} from "./reduction/substitution.ts";
export {
  betaReduce,
  normalize,
  reduceWithBudget,
} from "./reduction/reduce.ts";
export {
  ReductionError,
  ReductionLimitError,
  StuckTermError,
} from "./reduction/reductionError.ts";

// Type checker exports
export {
  addBinding,
  type Context,
  emptyContext,
  typecheck,
  typecheckGiven,
} from "./types/typedLambda.ts";
export {
  type InvalidApplication,
  InvalidApplicationError,
  MissingAnnotationError,
  TypeError,
  UnboundIndexError,
} from "./types/typeError.ts";

// Presentation exports
export {
  binderName,
  debugPrintTerm,
  prettyPrintNameless,
  prettyPrintTerm,
} from "./terms/prettyPrint.ts";
export { debugPrintTy, prettyPrintTy } from "./types/types.ts";

// Generator exports
export {
  GenerationError,
  randTypedTerm,
  type RandomSource,
} from "./terms/generator.ts";

export { VERSION } from "./shared/version.ts";
