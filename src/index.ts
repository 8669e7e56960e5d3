export type {
  Value,
  ValueKind,
  ScalarValue,
  ArrayValue,
  ObjectValue,
  Absent,
  Result,
  JsonErrorCode,
} from "./types/value.js";
export { ABSENT, isAbsent, isScalar, JsonError, ParseError, DepthExceededError, ok, err } from "./types/value.js";

export type { ParseOptions, RenderOptions, PlainJson } from "./value/model.js";
export { parse, render, toPlain, fromPlain, scanDepth, effectiveMaxDepth, DEFAULT_MAX_DEPTH, MAX_SUPPORTED_DEPTH } from "./value/model.js";

export type { NormalizationPolicy, PolicyPresetName } from "./engine/policy.js";
export {
  createPolicy,
  mergePolicies,
  EMPTY_POLICY,
  WORKFLOW_NODE_OPTIONAL_FIELDS,
  workflowNodePolicy,
  POLICY_PRESETS,
  isPolicyPresetName,
} from "./engine/policy.js";
export { normalize } from "./engine/normalize.js";
export type { ValueEquality } from "./engine/keyed.js";
export { KEY_FIELD, isKeyedArray, arraysEqual, keyedArraysEqual, positionalEqual } from "./engine/keyed.js";
export type { ComparisonResult } from "./engine/equal.js";
export { equal, semanticEqual, compareDocuments } from "./engine/equal.js";

export { canonicalize, canonicalizeValue, compareKeys } from "./utils/canonical.js";

export type { PolicyFile, LoadedPolicy } from "./schema/index.js";
export { loadPolicyFile, parsePolicyFile, PolicyFileError } from "./schema/index.js";

export type {
  WorkflowNode,
  WorkflowSettings,
  WorkflowResourceModel,
  SaveDataMode,
  PlanValue,
  Unknown,
} from "./types/workflow.js";
export { UNKNOWN, isKnown, DEFAULT_WORKFLOW_SETTINGS } from "./types/workflow.js";
export * from "./plan/index.js";
