/**
 * src/engine/equal.ts
 * Equality over normalized trees, and the text-level entry points.
 */

import { ABSENT, type Absent, type JsonError, type Value } from "../types/value.js";
import { parse, type ParseOptions } from "../value/model.js";
import { arraysEqual } from "./keyed.js";
import { normalize } from "./normalize.js";
import type { NormalizationPolicy } from "./policy.js";

export function equal(a: Value | Absent, b: Value | Absent): boolean {
  if (a === ABSENT || b === ABSENT) return a === b;
  return valuesEqual(a, b);
}

function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && a.value === b.value;
    case "number":
      return b.kind === "number" && a.value === b.value;
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "array":
      return b.kind === "array" && arraysEqual(a, b, valuesEqual);
    case "object": {
      if (b.kind !== "object" || a.entries.size !== b.entries.size) return false;
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(item, other)) return false;
      }
      return true;
    }
  }
}

export interface ComparisonResult {
  equal: boolean;
  /** Parse failures per side; a failure on either side makes `equal` false. */
  errors: { a?: JsonError; b?: JsonError };
}

export function compareDocuments(
  textA: string,
  textB: string,
  policy: NormalizationPolicy,
  options: ParseOptions = {}
): ComparisonResult {
  const a = parse(textA, options);
  const b = parse(textB, options);
  if (!a.ok || !b.ok) {
    return {
      equal: false,
      errors: {
        ...(a.ok ? {} : { a: a.error }),
        ...(b.ok ? {} : { b: b.error }),
      },
    };
  }
  return {
    equal: equal(normalize(a.value, policy), normalize(b.value, policy)),
    errors: {},
  };
}

/**
 * True when both texts describe the same value once formatting, key order,
 * nulls, optional fields and keyed-array order are discounted.
 * Unparsable input on either side is never equal to anything.
 */
export function semanticEqual(
  textA: string,
  textB: string,
  policy: NormalizationPolicy,
  options: ParseOptions = {}
): boolean {
  return compareDocuments(textA, textB, policy, options).equal;
}
