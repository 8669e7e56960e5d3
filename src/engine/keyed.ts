/**
 * src/engine/keyed.ts
 * Array comparison. An array whose every element is an object with a scalar
 * "key" entry is a keyed collection (e.g. parameter lists) and compares as a
 * multiset; every other pairing compares position by position.
 */

import { isScalar, type ArrayValue, type Value } from "../types/value.js";

export const KEY_FIELD = "key";

export type ValueEquality = (a: Value, b: Value) => boolean;

export function isKeyedArray(items: readonly Value[]): boolean {
  return items.every((item) => {
    if (item.kind !== "object") return false;
    const key = item.entries.get(KEY_FIELD);
    return key !== undefined && isScalar(key);
  });
}

export function arraysEqual(a: ArrayValue, b: ArrayValue, eq: ValueEquality): boolean {
  if (a.items.length !== b.items.length) return false;
  if (isKeyedArray(a.items) && isKeyedArray(b.items)) {
    return keyedArraysEqual(a.items, b.items, eq);
  }
  return positionalEqual(a.items, b.items, eq);
}

export function positionalEqual(
  a: readonly Value[],
  b: readonly Value[],
  eq: ValueEquality
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!eq(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Multiset equality: a bijection of deeply equal elements must exist.
 * Elements sharing a key but differing elsewhere stay distinct members.
 * Deep equality is an equivalence, so first-fit matching inside a key
 * bucket finds a bijection whenever one exists.
 */
export function keyedArraysEqual(
  a: readonly Value[],
  b: readonly Value[],
  eq: ValueEquality
): boolean {
  if (a.length !== b.length) return false;

  const buckets = new Map<string, Value[]>();
  for (const item of b) {
    const id = keyIdentity(item);
    const bucket = buckets.get(id);
    if (bucket) bucket.push(item);
    else buckets.set(id, [item]);
  }

  for (const item of a) {
    const bucket = buckets.get(keyIdentity(item));
    if (!bucket) return false;
    const at = bucket.findIndex((candidate) => eq(item, candidate));
    if (at === -1) return false;
    bucket.splice(at, 1);
  }
  return true;
}

function keyIdentity(item: Value): string {
  if (item.kind !== "object") return "";
  const key = item.entries.get(KEY_FIELD);
  if (key === undefined || !isScalar(key)) return "";
  // kind prefix keeps 1 and "1" apart; String(-0) === "0" matches -0 === 0
  return `${key.kind}:${String(key.value)}`;
}
