/**
 * @polyeq/eq - Runtime equality for values typed by an abstract interface
 *
 * Extend {@link DynEq} on an interface and give every implementing class a
 * native `equals`; values then compare across the interface, and values of
 * different concrete types are simply unequal.
 *
 * @example
 * ```typescript
 * import { dynEquals, type DynEq } from "@polyeq/eq";
 *
 * interface Shape extends DynEq {}
 *
 * class Circle implements Shape {
 *   constructor(readonly r: number) {}
 *   equals(o: Circle) { return this.r === o.r; }
 * }
 *
 * dynEquals<Shape>(new Circle(1), new Circle(1)); // true
 * ```
 *
 * @packageDocumentation
 */

export type { NativeEq, DynEq, TypeId, Class, ErasedRef } from "./types.js";

export { typeIdOf, typeName } from "./type-id.js";

export { isDynEq, dynEq, TypeMatch, matchTypes, dynEqMatched } from "./capability.js";

export { erase, isErasedRef, typeIdOfErased, downcast } from "./erasure.js";

export {
  TRANSFERABLE,
  SHAREABLE,
  MARKER_COMBINATIONS,
  markersOf,
  type Transferable,
  type Shareable,
  type MarkerCombination,
  type MarkerName,
  type WithMarkers,
} from "./markers.js";

export {
  TOTAL,
  partialEq,
  assertTotal,
  isTotal,
  eqStrict,
  structEq,
  type PartialEq,
  type Eq,
} from "./typeclass.js";

export { dynEquals, dynNotEquals, dynEqInstance } from "./equals.js";

export { Box, BoxConsumedError } from "./box.js";

export { indexOfDyn, containsDyn, groupByType, dedupDyn } from "./collections.js";
