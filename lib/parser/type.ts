import {
  matchLP,
  matchOptionalArrow,
  matchRP,
  parseIdentifier,
  type ParserState,
  peek,
} from "./parserState.ts";
import { LEFT_PAREN } from "./consts.ts";
import { arrow, mkBaseType, type Type } from "../types/types.ts";
import { parseWithEOF } from "./eof.ts";

/**
 * Parses a "simple" type.
 * Simple types are either a base type or a parenthesized type.
 *
 * Returns a pair: [Type, updatedState]
 */
export function parseSimpleType(state: ParserState): [Type, ParserState] {
  const [ch, s] = peek(state);
  if (ch === LEFT_PAREN) {
    const stateAfterLP = matchLP(s);
    // Recursively parse a full type inside the parentheses.
    const [innerType, stateAfterInner] = parseArrowType(stateAfterLP);
    return [innerType, matchRP(stateAfterInner)];
  } else {
    const [name, stateAfterName] = parseIdentifier(s);
    return [mkBaseType(name), stateAfterName];
  }
}

/**
 * Parses an arrow type.
 * This function implements right associativity: it checks for an arrow following a simple type,
 * and if present, recursively parses the right–hand side.
 *
 * Returns a pair: [Type, updatedState]
 */
export function parseArrowType(state: ParserState): [Type, ParserState] {
  const [leftType, stateAfterLeft] = parseSimpleType(state);
  const stateAfterArrow = matchOptionalArrow(stateAfterLeft);
  if (stateAfterArrow === null) {
    return [leftType, stateAfterLeft];
  }
  const [rightType, stateAfterRight] = parseArrowType(stateAfterArrow);
  return [arrow(leftType, rightType), stateAfterRight];
}

/**
 * Parses a complete type from an input string.
 */
export function parseType(input: string): Type {
  return parseWithEOF(input, parseArrowType);
}
