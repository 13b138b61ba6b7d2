/**
 * Core types for runtime polymorphic equality.
 *
 * An abstract interface becomes comparable by extending {@link DynEq}:
 *
 * ```typescript
 * interface Shape extends DynEq {
 *   area(): number;
 * }
 *
 * class Circle implements Shape {
 *   constructor(readonly radius: number) {}
 *   area() { return Math.PI * this.radius ** 2; }
 *   equals(other: Circle) { return this.radius === other.radius; }
 * }
 * ```
 *
 * @module
 */

/**
 * Native equality - the eligibility precondition for {@link DynEq}.
 *
 * A concrete type compares itself against another instance of the same
 * concrete type. The relation must be total.
 */
export interface NativeEq {
  equals(other: this): boolean;
}

/**
 * The equality capability. Abstract interfaces extend it; concrete classes
 * only ever write `equals`.
 *
 * The type-identity probe and the erased comparison are module functions
 * ({@link typeIdOf}, {@link dynEq}), so no implementer can override them.
 * A class without a compatible `equals` cannot implement an interface that
 * extends `DynEq`; there is no runtime eligibility check.
 */
export interface DynEq extends NativeEq {}

/**
 * Runtime type identity: the prototype object of a value.
 *
 * Every class (including a subclass and its parent) has its own identity.
 * Plain object literals all share `Object.prototype`.
 */
export type TypeId = object;

/** A concrete type, named by its constructor. */
export type Class<T> = abstract new (...args: never[]) => T;

/**
 * A type-erased handle: enough to recover the runtime type identity and to
 * attempt a guarded downcast, nothing else.
 */
export interface ErasedRef {
  readonly __erased__: true;
  readonly __typeId: TypeId;
  readonly __value: unknown;
}
