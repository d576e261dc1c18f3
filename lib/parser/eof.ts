import { createParserState, type ParserState, remaining } from "./parserState.ts";
import { SyntaxError } from "./parseError.ts";

/**
 * Wraps a parser function so that after parsing the input,
 * any extra (unconsumed) input causes an error.
 *
 * @param input the input string to parse
 * @param parser a function that parses from a parser state and returns a
 *               pair: [result, updatedState]
 * @returns the result of the parser
 * @throws SyntaxError if there is leftover input after parsing
 */
export function parseWithEOF<T>(
  input: string,
  parser: (state: ParserState) => [T, ParserState],
): T {
  const initialState = createParserState(input);
  const [result, updatedState] = parser(initialState);
  const [hasRemaining, finalState] = remaining(updatedState);
  if (hasRemaining) {
    throw new SyntaxError(
      `unexpected extra input: "${finalState.buf.slice(finalState.idx)}"`,
      { start: finalState.idx, end: finalState.buf.length },
    );
  }
  return result;
}
