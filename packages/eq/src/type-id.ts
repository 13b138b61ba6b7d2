/**
 * Runtime type identity.
 *
 * @module
 */

import type { TypeId } from "./types.js";

/** Identity shared by objects created with a `null` prototype. */
const NULL_PROTOTYPE: TypeId = Object.freeze({});

/**
 * The type-identity probe: a value's prototype object.
 */
export function typeIdOf(value: object): TypeId {
  const proto: unknown = Object.getPrototypeOf(value);
  if ((typeof proto === "object" || typeof proto === "function") && proto !== null) {
    return proto;
  }
  return NULL_PROTOTYPE;
}

/**
 * A readable name for a type identity, for messages and debugging.
 */
export function typeName(id: TypeId): string {
  if (id === NULL_PROTOTYPE) return "<null prototype>";
  const name = id.constructor.name;
  return name === "" ? "<anonymous>" : name;
}
