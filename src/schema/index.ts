/**
 * src/schema/index.ts
 * AJV validator for normalization policy files:
 *
 *   { "preset": "workflow-node", "optionalFields": ["pinned"], "maxDepth": 500 }
 */

import fs from "node:fs/promises";
import path from "node:path";
import AjvImport from "ajv";
import type { JSONSchemaType, Options } from "ajv";
import {
  createPolicy,
  mergePolicies,
  POLICY_PRESETS,
  type NormalizationPolicy,
  type PolicyPresetName,
} from "../engine/policy.js";
import { MAX_SUPPORTED_DEPTH } from "../value/model.js";

const Ajv = AjvImport as unknown as new (opts?: Options) => import("ajv").default;

export interface PolicyFile {
  preset?: PolicyPresetName;
  optionalFields?: string[];
  maxDepth?: number;
}

export const ajv = new Ajv({
  allErrors: true,
  strict: "log",
});

const policyFileSchema: JSONSchemaType<PolicyFile> = {
  type: "object",
  properties: {
    preset: { type: "string", enum: ["workflow-node"], nullable: true },
    optionalFields: {
      type: "array",
      items: { type: "string", minLength: 1 },
      uniqueItems: true,
      nullable: true,
    },
    maxDepth: { type: "integer", minimum: 1, maximum: MAX_SUPPORTED_DEPTH, nullable: true },
  },
  additionalProperties: false,
};

export const validatePolicyFile = ajv.compile<PolicyFile>(policyFileSchema);

export class PolicyFileError extends Error {
  readonly file?: string;

  constructor(message: string, file?: string) {
    super(file ? `${file}: ${message}` : message);
    this.name = "PolicyFileError";
    this.file = file;
  }
}

export interface LoadedPolicy {
  policy: NormalizationPolicy;
  maxDepth?: number;
}

export function policyFromFile(doc: PolicyFile): LoadedPolicy {
  const own = createPolicy(doc.optionalFields ?? []);
  const policy = doc.preset ? mergePolicies(POLICY_PRESETS[doc.preset], own) : own;
  return { policy, maxDepth: doc.maxDepth };
}

/** Validate an already-decoded policy document. */
export function parsePolicyFile(raw: unknown, file?: string): LoadedPolicy {
  if (!validatePolicyFile(raw)) {
    throw new PolicyFileError(ajv.errorsText(validatePolicyFile.errors), file);
  }
  return policyFromFile(raw);
}

export async function loadPolicyFile(file: string): Promise<LoadedPolicy> {
  const text = await fs.readFile(path.resolve(file), "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new PolicyFileError(`not valid JSON (${e instanceof Error ? e.message : String(e)})`, file);
  }
  return parsePolicyFile(raw, file);
}
