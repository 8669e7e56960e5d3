/**
 * Deterministic canonical JSON: keys sorted by UTF-8 bytes, no whitespace,
 * arrays in input order, shortest round-trip numbers.
 * Pure format transform: nulls and optional fields are kept as written.
 */

import { err, ok, type Result, type Value } from "../types/value.js";
import { parse, type ParseOptions } from "../value/model.js";

export function canonicalize(text: string, options: ParseOptions = {}): Result<string> {
  const parsed = parse(text, options);
  if (!parsed.ok) return err(parsed.error);
  return ok(canonicalizeValue(parsed.value));
}

export function canonicalizeValue(value: Value): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "number":
      // Number#toString is the shortest round-trip form; -0 prints as 0
      return JSON.stringify(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "array":
      return `[${value.items.map(canonicalizeValue).join(",")}]`;
    case "object": {
      const keys = Array.from(value.entries.keys(), encodeKey).sort(compareEncodedKeys);
      const parts: string[] = [];
      for (const { key } of keys) {
        const item = value.entries.get(key);
        if (item === undefined) continue;
        parts.push(`${JSON.stringify(key)}:${canonicalizeValue(item)}`);
      }
      return `{${parts.join(",")}}`;
    }
  }
}

/**
 * Byte-wise UTF-8 order. Lone surrogates all encode to U+FFFD, so equal
 * byte strings fall back to UTF-16 order to keep the sort total.
 */
export function compareKeys(a: string, b: string): number {
  return compareEncodedKeys(encodeKey(a), encodeKey(b));
}

interface EncodedKey {
  key: string;
  bytes: Buffer;
}

// encoded once per key, not once per comparison
function encodeKey(key: string): EncodedKey {
  return { key, bytes: Buffer.from(key, "utf8") };
}

function compareEncodedKeys(a: EncodedKey, b: EncodedKey): number {
  const byBytes = Buffer.compare(a.bytes, b.bytes);
  if (byBytes !== 0) return byBytes;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}
