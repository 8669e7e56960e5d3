/**
 * src/plan/attribute.ts
 * Attribute-level plan modifier for JSON-encoded string attributes.
 * When the configured text is semantically equal to what is already in
 * state, the state text is planned so no update is proposed.
 */

import { semanticEqual } from "../engine/equal.js";
import type { NormalizationPolicy } from "../engine/policy.js";
import type { ParseOptions } from "../value/model.js";
import { isKnown, type PlanValue } from "../types/workflow.js";

export interface JsonAttributeRequest {
  state: PlanValue;
  config: PlanValue;
  plan: PlanValue;
}

export interface JsonAttributeResponse {
  plan: PlanValue;
  /** True when the planned value was replaced by the state text. */
  suppressed: boolean;
}

export function planJsonAttribute(
  req: JsonAttributeRequest,
  policy: NormalizationPolicy,
  options: ParseOptions = {}
): JsonAttributeResponse {
  const { state, config, plan } = req;
  // nothing to compare on create, for computed-only values, or on destroy
  if (!isKnown(state) || !isKnown(config) || !isKnown(plan)) {
    return { plan, suppressed: false };
  }
  if (state === config) return { plan, suppressed: false };

  if (semanticEqual(state, config, policy, options)) {
    return { plan: state, suppressed: true };
  }
  return { plan, suppressed: false };
}
