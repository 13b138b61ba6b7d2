/**
 * Auxiliary capability markers.
 *
 * Equality is generated for an interface on its own and for each
 * combination of these two markers, so a value typed
 * `Shape & Transferable` compares with the same machinery as a bare
 * `Shape`. The markers exist only in the type system; no code reads them.
 *
 * A class that opts into a marker must type `equals` against itself, even
 * when it inherits a working one:
 *
 * ```typescript
 * class SendableCircle extends Circle implements Transferable {
 *   readonly [TRANSFERABLE] = true;
 *   equals(other: SendableCircle): boolean {
 *     return super.equals(other);
 *   }
 * }
 * ```
 *
 * An inherited `equals(other: Circle)` does not satisfy
 * `Shape & Transferable`.
 *
 * @module
 */

export const TRANSFERABLE: unique symbol = Symbol.for("polyeq.transferable");
export const SHAREABLE: unique symbol = Symbol.for("polyeq.shareable");

/** Safe to move to another thread of execution (a worker). */
export interface Transferable {
  readonly [TRANSFERABLE]: true;
}

/** Safe to reference from several threads of execution at once. */
export interface Shareable {
  readonly [SHAREABLE]: true;
}

export type MarkerCombination = "none" | "transferable" | "shareable" | "both";

/** Every combination, in the order expansions are emitted. */
export const MARKER_COMBINATIONS: readonly MarkerCombination[] = [
  "none",
  "transferable",
  "shareable",
  "both",
];

export type MarkerName = "Transferable" | "Shareable";

/** The marker interfaces a combination adds, by exported name. */
export function markersOf(combination: MarkerCombination): readonly MarkerName[] {
  switch (combination) {
    case "none":
      return [];
    case "transferable":
      return ["Transferable"];
    case "shareable":
      return ["Shareable"];
    case "both":
      return ["Transferable", "Shareable"];
  }
}

/**
 * `T` with the markers of a combination attached.
 *
 * @example
 * ```typescript
 * type SendableShape = WithMarkers<Shape, "transferable">; // Shape & Transferable
 * ```
 */
export type WithMarkers<T, M extends MarkerCombination> = M extends "none"
  ? T
  : M extends "transferable"
    ? T & Transferable
    : M extends "shareable"
      ? T & Shareable
      : T & Transferable & Shareable;
