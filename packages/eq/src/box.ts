/**
 * Owning single-value wrapper.
 *
 * `Box<Shape>` holds exactly one `Shape`. Expansions with box support emit
 * an `Eq<Box<Shape>>` that compares the held values.
 *
 * @module
 */

import type { DynEq } from "./types.js";
import { assertTotal, isTotal, partialEq, type Eq, type PartialEq } from "./typeclass.js";
import { dynEquals } from "./equals.js";

/**
 * Thrown when a box is read after its value was moved out with
 * {@link Box.into}.
 */
export class BoxConsumedError extends Error {
  constructor() {
    super("Box value was moved out with into() and can no longer be read");
    this.name = "BoxConsumedError";
  }
}

export class Box<T> {
  private slot: { readonly value: T } | undefined;

  private constructor(value: T) {
    this.slot = { value };
  }

  static of<T>(value: T): Box<T> {
    return new Box(value);
  }

  /**
   * Lift an equality on the held type to an equality on boxes.
   * A total equality stays total. A consumed box equals no box.
   */
  static lift<T>(inner: Eq<T>): Eq<Box<T>>;
  static lift<T>(inner: PartialEq<T>): PartialEq<Box<T>>;
  static lift<T>(inner: PartialEq<T>): PartialEq<Box<T>> {
    const lifted = partialEq<Box<T>>(
      (a, b) => !a.isConsumed() && !b.isConsumed() && inner.equals(a.get(), b.get())
    );
    return isTotal(inner) ? assertTotal(lifted) : lifted;
  }

  get(): T {
    if (this.slot === undefined) {
      throw new BoxConsumedError();
    }
    return this.slot.value;
  }

  /** Swap in a new value, returning the old one. */
  replace(value: T): T {
    const previous = this.get();
    this.slot = { value };
    return previous;
  }

  /** Move the value out. Every later read throws {@link BoxConsumedError}. */
  into(): T {
    const value = this.get();
    this.slot = undefined;
    return value;
  }

  isConsumed(): boolean {
    return this.slot === undefined;
  }

  /** Boxes of comparable values compare by content; a consumed box equals no box. */
  equals(this: Box<DynEq>, other: Box<DynEq>): boolean {
    if (this.isConsumed() || other.isConsumed()) return false;
    return dynEquals(this.get(), other.get());
  }
}
