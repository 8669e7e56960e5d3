/**
 * src/engine/policy.ts
 * NormalizationPolicy: the set of field names that an upstream API may omit
 * or include inconsistently with their default value. Passed explicitly to
 * every comparison; there is no process-wide default.
 */

export interface NormalizationPolicy {
  readonly optionalFields: ReadonlySet<string>;
}

/** Read-only view over a private Set; there is no add/delete to reach by casting. */
class FieldSet implements ReadonlySet<string> {
  private readonly fields: Set<string>;

  constructor(fields: Iterable<string>) {
    this.fields = new Set(fields);
    Object.freeze(this);
  }

  get size(): number {
    return this.fields.size;
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  forEach(fn: (value: string, key: string, set: ReadonlySet<string>) => void, thisArg?: unknown): void {
    for (const field of this.fields) fn.call(thisArg, field, field, this);
  }

  entries() {
    return this.fields.entries();
  }

  keys() {
    return this.fields.keys();
  }

  values() {
    return this.fields.values();
  }

  [Symbol.iterator]() {
    return this.fields.values();
  }
}

export function createPolicy(optionalFields: Iterable<string> = []): NormalizationPolicy {
  return Object.freeze({ optionalFields: new FieldSet(optionalFields) });
}

export function mergePolicies(...policies: NormalizationPolicy[]): NormalizationPolicy {
  const fields: string[] = [];
  for (const p of policies) fields.push(...p.optionalFields);
  return createPolicy(fields);
}

/** Strips nothing but nulls and emptied containers. */
export const EMPTY_POLICY: NormalizationPolicy = createPolicy();

/**
 * Workflow node flags the workflow API drops when they hold their default
 * (false, or the default error mode for onError).
 */
export const WORKFLOW_NODE_OPTIONAL_FIELDS = [
  "executeOnce",
  "alwaysOutputData",
  "retryOnFail",
  "onError",
  "continueOnFail",
  "disabled",
] as const;

export const workflowNodePolicy: NormalizationPolicy = createPolicy(WORKFLOW_NODE_OPTIONAL_FIELDS);

export const POLICY_PRESETS = {
  "workflow-node": workflowNodePolicy,
} as const satisfies Record<string, NormalizationPolicy>;

export type PolicyPresetName = keyof typeof POLICY_PRESETS;

export function isPolicyPresetName(value: unknown): value is PolicyPresetName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(POLICY_PRESETS, value);
}
