import {
  ASCII_ARROW,
  ARROW,
  COLON,
  IDENTIFIER_CHAR_REGEX,
  LEFT_PAREN,
  RIGHT_PAREN,
  WHITESPACE_REGEX,
} from "./consts.ts";
import { type Span, SyntaxError } from "./parseError.ts";

export interface ParserState {
  buf: string;
  idx: number;
}

export function createParserState(buf: string): ParserState {
  return { buf, idx: 0 };
}

/**
 * The span of `length` characters starting at the state's index,
 * clipped to the end of the buffer.
 */
export function spanAt(state: ParserState, length = 1): Span {
  return {
    start: state.idx,
    end: Math.min(state.idx + length, state.buf.length),
  };
}

export function skipWhitespace(state: ParserState): ParserState {
  let idx = state.idx;
  while (idx < state.buf.length && WHITESPACE_REGEX.test(state.buf[idx])) {
    idx++;
  }
  return { buf: state.buf, idx };
}

export function peek(state: ParserState): [string | null, ParserState] {
  const newState = skipWhitespace(state);
  if (newState.idx < newState.buf.length) {
    return [newState.buf[newState.idx], newState];
  }
  return [null, newState];
}

export function consume(state: ParserState): ParserState {
  return { buf: state.buf, idx: state.idx + 1 };
}

export function matchCh(state: ParserState, ch: string): ParserState {
  const [next, newState] = peek(state);
  if (next !== ch) {
    throw new SyntaxError(
      `expected '${ch}' but found '${next ?? "EOF"}'`,
      spanAt(newState),
    );
  }
  return consume(newState);
}

export function matchLP(state: ParserState): ParserState {
  return matchCh(state, LEFT_PAREN);
}

export function matchRP(state: ParserState): ParserState {
  return matchCh(state, RIGHT_PAREN);
}

/**
 * Consumes an arrow, written either → or ->, if one comes next.
 * Returns null when the next token is not an arrow.
 */
export function matchOptionalArrow(state: ParserState): ParserState | null {
  const [next, s] = peek(state);
  if (next === ARROW) {
    return consume(s);
  }
  if (s.buf.startsWith(ASCII_ARROW, s.idx)) {
    return { buf: s.buf, idx: s.idx + ASCII_ARROW.length };
  }
  return null;
}

export function parseIdentifier(state: ParserState): [string, ParserState] {
  let id = "";
  let currentState = skipWhitespace(state);
  while (currentState.idx < currentState.buf.length) {
    const ch = currentState.buf[currentState.idx];
    if (!IDENTIFIER_CHAR_REGEX.test(ch)) break;
    id += ch;
    currentState = consume(currentState);
  }
  if (id.length === 0) {
    const found = currentState.buf[currentState.idx] ?? "EOF";
    throw new SyntaxError(
      `expected an identifier but found '${found}'`,
      spanAt(currentState),
    );
  }
  return [id, currentState];
}

export function remaining(state: ParserState): [boolean, ParserState] {
  const newState = skipWhitespace(state);
  return [newState.idx < newState.buf.length, newState];
}

export function parseOptionalTypeAnnotation<T>(
  state: ParserState,
  parseType: (state: ParserState) => [T, ParserState],
): [T | undefined, ParserState] {
  const [nextCh] = peek(state);
  if (nextCh === COLON) {
    const stateAfterColon = matchCh(state, COLON);
    return parseType(stateAfterColon);
  }
  return [undefined, state];
}
