/**
 * The parser's binding context: a mapping from surface identifiers to the
 * de Bruijn index they resolve to at the current point of the parse.
 *
 * Contexts are never mutated. Binding a name produces a new context in
 * which every existing entry is one binder further away, so the two sides
 * of an application always resolve against the same context.
 *
 * @module
 */

export type BindingContext = ReadonlyMap<string, number>;

export const emptyBindingContext = (): BindingContext =>
  new Map<string, number>();

/**
 * Enters an abstraction binding `name`. An inner binder of the same name
 * shadows the outer one.
 */
export const bind = (ctx: BindingContext, name: string): BindingContext => {
  const shifted = new Map<string, number>();
  for (const [key, idx] of ctx) {
    shifted.set(key, idx + 1);
  }
  shifted.set(name, 0);
  return shifted;
};

export const lookup = (
  ctx: BindingContext,
  name: string,
): number | undefined => ctx.get(name);
