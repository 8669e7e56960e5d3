/**
 * src/engine/normalize.ts
 * Comparison normal form: nulls, policy-listed fields and containers left
 * empty after filtering all collapse to ABSENT, at every depth.
 */

import { ABSENT, type Absent, type Value } from "../types/value.js";
import type { NormalizationPolicy } from "./policy.js";

export function normalize(value: Value, policy: NormalizationPolicy): Value | Absent {
  switch (value.kind) {
    case "null":
      return ABSENT;

    case "object": {
      const entries = new Map<string, Value>();
      for (const [key, item] of value.entries) {
        if (policy.optionalFields.has(key)) continue;
        const n = normalize(item, policy);
        if (n === ABSENT) continue;
        entries.set(key, n);
      }
      return entries.size === 0 ? ABSENT : { kind: "object", entries };
    }

    case "array": {
      const items: Value[] = [];
      for (const item of value.items) {
        const n = normalize(item, policy);
        if (n !== ABSENT) items.push(n);
      }
      return items.length === 0 ? ABSENT : { kind: "array", items };
    }

    case "bool":
    case "number":
    case "string":
      return value;
  }
}
