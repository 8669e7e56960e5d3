/**
 * src/value/model.ts
 * JSON text <-> Value tree. Decoding is delegated to JSON.parse; a linear
 * pre-scan enforces the nesting limit before anything recursive runs.
 */

import {
  DepthExceededError,
  ParseError,
  err,
  ok,
  type Result,
  type Value,
} from "../types/value.js";

export const DEFAULT_MAX_DEPTH = 1000;

/**
 * Ceiling for any configured maxDepth. Parsing, normalization, comparison
 * and canonical encoding all recurse once or more per level, and this is
 * the depth they are tested to on a default Node stack.
 */
export const MAX_SUPPORTED_DEPTH = 1000;

export interface ParseOptions {
  /** Maximum container nesting; root scalars are depth 0. */
  maxDepth?: number;
}

export interface RenderOptions {
  indent?: number;
}

/** JSON-compatible plain JS value, as produced by JSON.parse. */
export type PlainJson =
  | null
  | boolean
  | number
  | string
  | PlainJson[]
  | { [key: string]: PlainJson };

/** The limit actually applied: the requested one, capped at MAX_SUPPORTED_DEPTH. */
export function effectiveMaxDepth(options: ParseOptions = {}): number {
  return Math.min(options.maxDepth ?? DEFAULT_MAX_DEPTH, MAX_SUPPORTED_DEPTH);
}

export function parse(text: string, options: ParseOptions = {}): Result<Value> {
  const maxDepth = effectiveMaxDepth(options);
  const tooDeep = scanDepth(text, maxDepth);
  if (tooDeep) return err(tooDeep);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return err(new ParseError(message, positionFrom(message)));
  }
  return fromPlain(raw, { maxDepth });
}

/**
 * Build a Value from an already-decoded JS value (e.g. an HTTP body).
 * Numbers must be finite: JSON.parse turns overflowing literals such as
 * 1e400 into Infinity, which has no JSON spelling.
 */
export function fromPlain(raw: unknown, options: ParseOptions = {}): Result<Value> {
  const maxDepth = effectiveMaxDepth(options);
  try {
    return ok(toValue(raw, 0, maxDepth));
  } catch (e) {
    if (e instanceof ParseError || e instanceof DepthExceededError) return err(e);
    throw e;
  }
}

function toValue(raw: unknown, depth: number, maxDepth: number): Value {
  switch (typeof raw) {
    case "boolean":
      return { kind: "bool", value: raw };
    case "number":
      if (!Number.isFinite(raw)) throw new ParseError(`number out of range: ${raw}`);
      return { kind: "number", value: raw };
    case "string":
      return { kind: "string", value: raw };
    case "object": {
      if (raw === null) return { kind: "null" };
      if (depth >= maxDepth) throw new DepthExceededError(maxDepth);
      if (Array.isArray(raw)) {
        const items: Value[] = [];
        for (const item of raw) items.push(toValue(item, depth + 1, maxDepth));
        return { kind: "array", items };
      }
      const entries = new Map<string, Value>();
      for (const [key, item] of Object.entries(raw)) {
        entries.set(key, toValue(item, depth + 1, maxDepth));
      }
      return { kind: "object", entries };
    }
    default:
      throw new ParseError(`unsupported value of type ${typeof raw}`);
  }
}

export function toPlain(value: Value): PlainJson {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "array":
      return value.items.map(toPlain);
    case "object": {
      // fromEntries defines own properties, so a "__proto__" key survives
      return Object.fromEntries(
        Array.from(value.entries, ([key, item]) => [key, toPlain(item)] as const)
      );
    }
  }
}

/** Valid JSON for a Value; keys keep insertion order. */
export function render(value: Value, options: RenderOptions = {}): string {
  return JSON.stringify(toPlain(value), null, options.indent);
}

/**
 * Returns the error for the first container opened beyond maxDepth,
 * or undefined. Brackets inside string literals are skipped.
 */
export function scanDepth(text: string, maxDepth: number): DepthExceededError | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === 0x5c /* \ */) escaped = true;
      else if (ch === 0x22 /* " */) inString = false;
      continue;
    }
    if (ch === 0x22) {
      inString = true;
    } else if (ch === 0x5b /* [ */ || ch === 0x7b /* { */) {
      depth++;
      if (depth > maxDepth) return new DepthExceededError(maxDepth, i);
    } else if (ch === 0x5d /* ] */ || ch === 0x7d /* } */) {
      if (depth > 0) depth--;
    }
  }
  return undefined;
}

function positionFrom(message: string): number | undefined {
  const m = /at position (\d+)/.exec(message);
  return m ? Number(m[1]) : undefined;
}
