/**
 * Parse error definitions.
 *
 * Every parse error carries the span of the input it refers to, as
 * UTF-16 offsets into the parsed string.
 *
 * @module
 */

export interface Span {
  start: number;
  end: number;
}

export class ParseError extends Error {
  constructor(
    public readonly detail: string,
    public readonly span: Span,
  ) {
    super(`${detail} at ${span.start}..${span.end}`);
    this.name = "ParseError";
  }
}

/**
 * An unexpected or missing token.
 */
export class SyntaxError extends ParseError {
  constructor(detail: string, span: Span) {
    super(detail, span);
    this.name = "SyntaxError";
  }
}

/**
 * An identifier used where no enclosing abstraction declares it.
 */
export class UnboundVariableError extends ParseError {
  constructor(
    public readonly identifier: string,
    span: Span,
  ) {
    super(`unbound variable '${identifier}'`, span);
    this.name = "UnboundVariableError";
  }
}
