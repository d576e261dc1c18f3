/**
 * This module parses lambda terms into their de Bruijn representation.
 *
 * Every abstraction and application is parenthesized:
 *
 * ```
 * term        := variable | abstraction | application
 * abstraction := "(" ("λ" | "\") identifier ("." | ":" type ".") term ")"
 * application := "(" term term { term } ")"
 * ```
 *
 * Identifiers are resolved against a binding context while parsing, so the
 * resulting term holds indices instead of names; an identifier without an
 * enclosing binder is rejected.
 *
 * @example
 * ```ts
 * import { parseTerm, prettyPrintNameless } from "nameless-lambda";
 *
 * console.log(prettyPrintNameless(parseTerm("(λx.(λy.x))"))); // "λ λ 1"
 * ```
 *
 * @module
 */

import {
  createApplication,
  type LambdaTerm,
  mkAbs,
  mkTypedAbs,
  mkVar,
} from "../terms/lambda.ts";
import {
  consume,
  matchCh,
  matchLP,
  matchRP,
  parseIdentifier,
  parseOptionalTypeAnnotation,
  type ParserState,
  peek,
  spanAt,
} from "./parserState.ts";
import {
  BACKSLASH,
  DOT,
  IDENTIFIER_CHAR_REGEX,
  LAMBDA,
  LEFT_PAREN,
  RIGHT_PAREN,
} from "./consts.ts";
import {
  bind,
  type BindingContext,
  emptyBindingContext,
  lookup,
} from "./bindingContext.ts";
import { parseArrowType } from "./type.ts";
import { parseWithEOF } from "./eof.ts";
import { SyntaxError, UnboundVariableError } from "./parseError.ts";

/**
 * Parses one term: a variable, or a parenthesized abstraction or application.
 *
 * Returns a pair: [LambdaTerm, updatedState]
 */
export function parseLambdaTerm(
  state: ParserState,
  ctx: BindingContext,
): [LambdaTerm, ParserState] {
  const [peeked, s] = peek(state);

  if (peeked === null) {
    throw new SyntaxError("expected a term but found 'EOF'", spanAt(s, 0));
  } else if (peeked === LEFT_PAREN) {
    const [next, stateAfterLP] = peek(matchLP(s));
    if (next === LAMBDA || next === BACKSLASH) {
      return parseAbstraction(s, consume(stateAfterLP), ctx);
    }
    return parseApplication(s, stateAfterLP, ctx);
  } else if (IDENTIFIER_CHAR_REGEX.test(peeked)) {
    return parseVariable(s, ctx);
  } else {
    throw new SyntaxError(`unexpected '${peeked}'`, spanAt(s));
  }
}

/**
 * Parses the remainder of an abstraction after its lambda, binding the
 * declared identifier for the body only.
 */
function parseAbstraction(
  start: ParserState,
  stateAfterLambda: ParserState,
  ctx: BindingContext,
): [LambdaTerm, ParserState] {
  const [name, stateAfterName] = parseIdentifier(stateAfterLambda);
  const [ty, stateAfterType] = parseOptionalTypeAnnotation(
    stateAfterName,
    parseArrowType,
  );
  const stateAfterDot = matchCh(stateAfterType, DOT);
  const [body, stateAfterBody] = parseLambdaTerm(
    stateAfterDot,
    bind(ctx, name),
  );
  const [next, s] = peek(stateAfterBody);
  if (next !== RIGHT_PAREN) {
    throw new SyntaxError(
      `expected ')' to close the abstraction opened at ${start.idx} but found '${
        next ?? "EOF"
      }'`,
      spanAt(s),
    );
  }
  const term = ty === undefined ? mkAbs(body) : mkTypedAbs(ty, body);
  return [term, matchRP(s)];
}

/**
 * Parses an application of two or more terms, folding them to the left:
 * (f a b) becomes ((f a) b). Every operand starts from the same context.
 */
function parseApplication(
  start: ParserState,
  stateAfterLP: ParserState,
  ctx: BindingContext,
): [LambdaTerm, ParserState] {
  let [result, currentState] = parseLambdaTerm(stateAfterLP, ctx);
  let operands = 1;

  for (;;) {
    const [next, s] = peek(currentState);
    if (next === RIGHT_PAREN) {
      currentState = s;
      break;
    }
    if (next === null) {
      throw new SyntaxError(
        `expected ')' to close the application opened at ${start.idx} but found 'EOF'`,
        spanAt(s, 0),
      );
    }
    const [operand, stateAfterOperand] = parseLambdaTerm(s, ctx);
    result = createApplication(result, operand);
    operands++;
    currentState = stateAfterOperand;
  }

  if (operands < 2) {
    throw new SyntaxError(
      "an application needs at least two terms",
      { start: start.idx, end: currentState.idx + 1 },
    );
  }

  return [result, matchRP(currentState)];
}

function parseVariable(
  state: ParserState,
  ctx: BindingContext,
): [LambdaTerm, ParserState] {
  const [name, stateAfterName] = parseIdentifier(state);
  const idx = lookup(ctx, name);
  if (idx === undefined) {
    throw new UnboundVariableError(name, {
      start: state.idx,
      end: stateAfterName.idx,
    });
  }
  return [mkVar(idx), stateAfterName];
}

/**
 * Parses an input string into a closed lambda term.
 *
 * @throws SyntaxError on malformed input
 * @throws UnboundVariableError on an identifier without a binder
 */
export function parseTerm(input: string): LambdaTerm {
  return parseWithEOF(
    input,
    (state) => parseLambdaTerm(state, emptyBindingContext()),
  );
}
