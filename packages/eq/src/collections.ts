/**
 * Searching and de-duplicating heterogeneous lists.
 *
 * @module
 */

import type { DynEq, TypeId } from "./types.js";
import { typeIdOf } from "./type-id.js";
import { dynEquals } from "./equals.js";

export function indexOfDyn<T extends DynEq>(list: readonly T[], item: T): number {
  return list.findIndex((candidate) => dynEquals(candidate, item));
}

export function containsDyn<T extends DynEq>(list: readonly T[], item: T): boolean {
  return indexOfDyn(list, item) !== -1;
}

/**
 * Bucket values by concrete type, in first-seen order.
 */
export function groupByType<T extends DynEq>(list: readonly T[]): Map<TypeId, T[]> {
  const groups = new Map<TypeId, T[]>();
  for (const item of list) {
    const id = typeIdOf(item);
    const bucket = groups.get(id);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(id, [item]);
    }
  }
  return groups;
}

/**
 * Drop every value equal to an earlier one. Keeps the first occurrence and
 * the original order.
 */
export function dedupDyn<T extends DynEq>(list: readonly T[]): T[] {
  const seen = new Map<TypeId, T[]>();
  const result: T[] = [];
  for (const item of list) {
    const id = typeIdOf(item);
    const bucket = seen.get(id) ?? [];
    if (bucket.some((kept) => kept.equals(item))) continue;
    bucket.push(item);
    seen.set(id, bucket);
    result.push(item);
  }
  return result;
}
