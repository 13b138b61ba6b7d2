/**
 * Equality typeclasses.
 *
 * {@link PartialEq} is any equality relation; {@link Eq} additionally carries
 * the {@link TOTAL} brand, a declaration that the relation is a true
 * equivalence (reflexive, symmetric, transitive) over every value of `A`.
 *
 * @module
 */

/** Brand carried by instances declared total. */
export const TOTAL: unique symbol = Symbol.for("polyeq.total");

/**
 * PartialEq typeclass - an equality relation that may not be reflexive.
 *
 * `notEquals` is always the negation of `equals`.
 */
export interface PartialEq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/**
 * Eq typeclass - a total equality relation.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> extends PartialEq<A> {
  readonly [TOTAL]: true;
}

/**
 * Build a {@link PartialEq} from an `equals` function.
 */
export function partialEq<A>(equals: (a: A, b: A) => boolean): PartialEq<A> {
  return {
    equals,
    notEquals: (a, b) => !equals(a, b),
  };
}

/**
 * Declare an equality relation total.
 *
 * Nothing is checked at runtime: the declaration is the caller's promise that
 * the laws on {@link Eq} hold. The returned instance is a new frozen object.
 */
export function assertTotal<A>(instance: PartialEq<A>): Eq<A> {
  return Object.freeze({
    equals: (a: A, b: A) => instance.equals(a, b),
    notEquals: (a: A, b: A) => instance.notEquals(a, b),
    [TOTAL]: true as const,
  });
}

export function isTotal<A>(instance: PartialEq<A>): instance is Eq<A> {
  return TOTAL in instance && instance[TOTAL] === true;
}

/** `===` equality, total for every primitive except `NaN`. */
export function eqStrict<A extends string | number | bigint | boolean | symbol>(): Eq<A> {
  return assertTotal(partialEq<A>((a, b) => a === b));
}

/**
 * Structural equality for aggregates: two values are equal iff every listed
 * field is equal under its own instance.
 *
 * @example
 * ```typescript
 * interface Scene { name: string; shape: Shape }
 * const eqScene = structEq<Scene>({ name: eqStrict(), shape: dynEqInstance<Shape>() });
 * ```
 */
export function structEq<T extends object>(fields: { [K in keyof T]: PartialEq<T[K]> }): PartialEq<T> {
  return partialEq<T>((a, b) => {
    for (const key in fields) {
      if (!fields[key].equals(a[key], b[key])) return false;
    }
    return true;
  });
}
