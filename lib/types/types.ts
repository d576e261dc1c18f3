/**
 * Simple types.
 *
 * This module defines the types of the simply typed lambda calculus:
 * opaque base types and right-associative function types, along with
 * structural equality and the printers for both output modes.
 *
 * @module
 */

/**
 * An atomic type identified only by its name, e.g. "A".
 */
export interface BaseType {
  kind: "base-type";
  name: string;
}

/**
 * A function type lft→rgt.
 */
export interface FunctionType {
  kind: "non-terminal";
  lft: Type;
  rgt: Type;
}

export type Type = BaseType | FunctionType;

export const mkBaseType = (name: string): BaseType => ({
  kind: "base-type",
  name,
});

export const arrow = (a: Type, b: Type): FunctionType => ({
  kind: "non-terminal",
  lft: a,
  rgt: b,
});

export const arrows = (first: Type, ...rest: Type[]): Type =>
  [first, ...rest].reduceRight((acc, ty) => arrow(ty, acc));

export const typesLitEq = (a: Type, b: Type): boolean => {
  if (a.kind === "base-type" && b.kind === "base-type") {
    return a.name === b.name;
  } else if (a.kind === "non-terminal" && b.kind === "non-terminal") {
    return typesLitEq(a.lft, b.lft) && typesLitEq(a.rgt, b.rgt);
  } else {
    return false;
  }
};

/**
 * Renders a type with →, parenthesizing only function types in argument
 * position, so that the output is accepted by `parseType`.
 * @param ty the type to print
 * @returns a human-readable string representation
 */
export const prettyPrintTy = (ty: Type): string => {
  if (ty.kind === "base-type") {
    return ty.name;
  } else if (ty.lft.kind === "non-terminal") {
    return `(${prettyPrintTy(ty.lft)})→${prettyPrintTy(ty.rgt)}`;
  } else {
    return `${prettyPrintTy(ty.lft)}→${prettyPrintTy(ty.rgt)}`;
  }
};

/**
 * Renders the structure of a type, e.g. `FunctionType(BaseType(A), BaseType(B))`.
 */
export const debugPrintTy = (ty: Type): string => {
  switch (ty.kind) {
    case "base-type":
      return `BaseType(${ty.name})`;
    case "non-terminal":
      return `FunctionType(${debugPrintTy(ty.lft)}, ${debugPrintTy(ty.rgt)})`;
  }
};
