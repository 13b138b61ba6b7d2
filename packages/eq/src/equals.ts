/**
 * Equality over values of an abstract interface type.
 *
 * @module
 */

import type { DynEq } from "./types.js";
import { dynEqMatched, matchTypes } from "./capability.js";
import { assertTotal, partialEq, type Eq } from "./typeclass.js";

/**
 * `true` iff both values have the same concrete type and that type's native
 * equality says so.
 */
export function dynEquals<T extends DynEq>(a: T, b: T): boolean {
  const match = matchTypes(a, b);
  return match !== undefined && dynEqMatched(match);
}

export function dynNotEquals<T extends DynEq>(a: T, b: T): boolean {
  return !dynEquals(a, b);
}

/**
 * A total `Eq` instance for an interface extending {@link DynEq}.
 *
 * @example
 * ```typescript
 * const eqShape = dynEqInstance<Shape>();
 * eqShape.equals(new Circle(1), new Circle(1)); // true
 * eqShape.equals(new Circle(1), new Square(1)); // false
 * ```
 */
export function dynEqInstance<I extends DynEq>(): Eq<I> {
  return assertTotal(partialEq<I>(dynEquals));
}
