/**
 * Type error definitions.
 *
 * This module defines the errors raised by the simply typed checker.
 *
 * @module
 */
import type { LambdaAbs, LambdaTerm } from "../terms/lambda.ts";
import { prettyPrintTerm } from "../terms/prettyPrint.ts";
import { prettyPrintTy, type Type } from "./types.ts";

export class TypeError extends Error {}

/**
 * A variable whose index reaches past every binder of the context.
 */
export class UnboundIndexError extends TypeError {
  constructor(
    public readonly idx: number,
    public readonly depth: number,
  ) {
    super(`variable ${idx} is not bound in a context of ${depth} binders`);
    this.name = "UnboundIndexError";
  }
}

/**
 * An abstraction without an argument type, which the checker cannot infer.
 */
export class MissingAnnotationError extends TypeError {
  constructor(public readonly term: LambdaAbs) {
    super(`abstraction ${prettyPrintTerm(term)} has no argument type`);
    this.name = "MissingAnnotationError";
  }
}

export interface InvalidApplication {
  function: LambdaTerm;
  functionType: Type;
  argument: LambdaTerm;
  argumentType: Type;
}

/**
 * An application whose function does not take an argument of the
 * argument's type, or is not a function at all.
 */
export class InvalidApplicationError extends TypeError
  implements InvalidApplication {
  readonly function: LambdaTerm;
  readonly functionType: Type;
  readonly argument: LambdaTerm;
  readonly argumentType: Type;

  constructor(details: InvalidApplication) {
    const { functionType, argumentType } = details;
    const reason = functionType.kind === "non-terminal"
      ? `expected ${prettyPrintTy(functionType.lft)} but found ${
        prettyPrintTy(argumentType)
      }`
      : `${prettyPrintTy(functionType)} is not a function type`;
    super(
      `attempted to apply term ${prettyPrintTerm(details.function)}:` +
        `${prettyPrintTy(functionType)} to term ` +
        `${prettyPrintTerm(details.argument)}:${prettyPrintTy(argumentType)}` +
        ` (${reason})`,
    );
    this.name = "InvalidApplicationError";
    this.function = details.function;
    this.functionType = functionType;
    this.argument = details.argument;
    this.argumentType = argumentType;
  }

  /**
   * The argument type the function expects, if it is a function.
   */
  get expected(): Type | undefined {
    return this.functionType.kind === "non-terminal"
      ? this.functionType.lft
      : undefined;
  }
}
