/**
 * The equality capability: type-erased comparison for every type with
 * native equality.
 *
 * Two comparison paths exist:
 *
 * - {@link dynEq} (checked) re-validates the peer's type identity itself
 *   and returns `false` on mismatch. Generated code uses this one.
 * - {@link dynEqMatched} (unchecked) skips the check. It only accepts a
 *   {@link TypeMatch}, and the only way to obtain one is
 *   {@link matchTypes}, which performs the identity comparison.
 *
 * @module
 */

import type { DynEq, ErasedRef } from "./types.js";
import { typeIdOf } from "./type-id.js";

export function isDynEq(value: unknown): value is DynEq {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

/**
 * Compare `self` against a type-erased peer.
 *
 * Returns `self.equals(peer)` when the peer's live value has the same type
 * identity as `self`, and `false` otherwise.
 */
export function dynEq(self: DynEq, other: ErasedRef): boolean {
  const peer = other.__value;
  if (!isDynEq(peer) || typeIdOf(peer) !== typeIdOf(self)) {
    return false;
  }
  return self.equals(peer);
}

/**
 * Proof that two values share one runtime type identity.
 */
export class TypeMatch<T extends DynEq> {
  private constructor(
    private readonly left: T,
    private readonly right: T
  ) {}

  static of<T extends DynEq>(left: T, right: T): TypeMatch<T> | undefined {
    return typeIdOf(left) === typeIdOf(right) ? new TypeMatch(left, right) : undefined;
  }

  /** Native equality of the matched pair. */
  compare(): boolean {
    return this.left.equals(this.right);
  }
}

export function matchTypes<T extends DynEq>(left: T, right: T): TypeMatch<T> | undefined {
  return TypeMatch.of(left, right);
}

/**
 * Unchecked comparison: delegates straight to native equality.
 */
export function dynEqMatched<T extends DynEq>(match: TypeMatch<T>): boolean {
  return match.compare();
}
