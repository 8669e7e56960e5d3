/**
 * src/types/value.ts
 * Tagged JSON tree shared by the parser, normalizer, comparator and
 * canonical writer, plus the error taxonomy and Result shape they return.
 */

export type Value =
  | { readonly kind: "null" }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "array"; readonly items: readonly Value[] }
  | { readonly kind: "object"; readonly entries: ReadonlyMap<string, Value> };

export type ValueKind = Value["kind"];

export type ScalarValue = Extract<Value, { kind: "bool" | "number" | "string" }>;
export type ArrayValue = Extract<Value, { kind: "array" }>;
export type ObjectValue = Extract<Value, { kind: "object" }>;

/** "No comparable information": a null, a dropped field or an emptied container. */
export const ABSENT: unique symbol = Symbol("semjson.absent");
export type Absent = typeof ABSENT;

export function isAbsent(v: Value | Absent): v is Absent {
  return v === ABSENT;
}

export function isScalar(v: Value): v is ScalarValue {
  return v.kind === "bool" || v.kind === "number" || v.kind === "string";
}

// ---- Errors ----

export type JsonErrorCode = "parse_error" | "depth_exceeded";

export abstract class JsonError extends Error {
  abstract readonly code: JsonErrorCode;
  /** Offset into the input text, when known. */
  abstract readonly position?: number;
}

export class ParseError extends JsonError {
  readonly code = "parse_error" as const;
  readonly position?: number;

  constructor(message: string, position?: number) {
    super(message);
    this.name = "ParseError";
    this.position = position;
  }
}

export class DepthExceededError extends JsonError {
  readonly code = "depth_exceeded" as const;
  readonly maxDepth: number;
  readonly position?: number;

  constructor(maxDepth: number, position?: number) {
    super(
      position === undefined
        ? `JSON nested too deeply: more than ${maxDepth} levels`
        : `JSON nested too deeply: more than ${maxDepth} levels at position ${position}`
    );
    this.name = "DepthExceededError";
    this.maxDepth = maxDepth;
    this.position = position;
  }
}

// ---- Result ----

export type Result<T, E = JsonError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
