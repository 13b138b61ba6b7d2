/**
 * Type-erasure bridge.
 *
 * Converts a concrete reference into an {@link ErasedRef} and performs
 * checked downcasts back to a named concrete type. Generated comparison code
 * erases one operand before handing it to {@link dynEq}.
 *
 * @module
 */

import type { Class, DynEq, ErasedRef, TypeId } from "./types.js";
import { typeIdOf } from "./type-id.js";

/**
 * Erase a value's static type, keeping its runtime type identity.
 */
export function erase<T extends DynEq>(value: T): ErasedRef {
  return Object.freeze({ __erased__: true, __typeId: typeIdOf(value), __value: value });
}

export function isErasedRef(value: unknown): value is ErasedRef {
  return (
    typeof value === "object" &&
    value !== null &&
    "__erased__" in value &&
    value.__erased__ === true &&
    "__typeId" in value &&
    "__value" in value
  );
}

/** The type identity recorded when the value was erased. */
export function typeIdOfErased(ref: ErasedRef): TypeId {
  return ref.__typeId;
}

/**
 * Recover a concrete reference from an erased handle.
 *
 * Succeeds only when the erased value's prototype is exactly
 * `target.prototype`; an instance of a subclass is rejected. A mismatch
 * returns `undefined`, never throws.
 *
 * @example
 * ```typescript
 * const ref = erase(new Circle(1));
 * downcast(ref, Circle); // → the circle
 * downcast(ref, Square); // → undefined
 * ```
 */
export function downcast<T extends object>(ref: ErasedRef, target: Class<T>): T | undefined {
  const value = ref.__value;
  if (value instanceof target && typeIdOf(value) === target.prototype) {
    return value;
  }
  return undefined;
}
