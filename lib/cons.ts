/**
 * The binary node behind both term application and the function arrow.
 *
 * An application `(f a)` is a cell with `f` on the left and `a` on the
 * right; the type `A→B` is a cell with `A` on the left and `B` on the right.
 * Both share the `"non-terminal"` tag, so printers and checkers narrow on
 * `kind` the same way for terms and types.
 *
 * @example
 * ```ts
 * import { cons, mkVar, prettyPrintNameless } from "nameless-lambda";
 *
 * console.log(prettyPrintNameless(cons(mkVar(1), mkVar(0)))); // "(1 0)"
 * ```
 *
 * @module
 */

export interface ConsCell<E> {
  readonly kind: "non-terminal";
  readonly lft: E;
  readonly rgt: E;
}

/**
 * Joins two subtrees under a fresh node; neither subtree is copied.
 */
export const cons = <E>(lft: E, rgt: E): ConsCell<E> => ({
  kind: "non-terminal",
  lft,
  rgt,
});
