/**
 * src/plan/workflow.ts
 * Resource-level plan modification for workflows. When nothing but computed
 * fields would change, the plan keeps the state's versionId/updatedAt and
 * its nodes/connections text, so no timestamp-only update is proposed.
 */

import { semanticEqual } from "../engine/equal.js";
import type { NormalizationPolicy } from "../engine/policy.js";
import { logger } from "../server/logger.js";
import type { ParseOptions } from "../value/model.js";
import {
  UNKNOWN,
  type PlanValue,
  type WorkflowResourceModel,
  type WorkflowSettings,
} from "../types/workflow.js";

export interface WorkflowPlanResult {
  plan: WorkflowResourceModel;
  contentChanged: boolean;
}

const SETTINGS_FIELDS = [
  "saveExecutionProgress",
  "saveManualExecutions",
  "saveDataErrorExecution",
  "saveDataSuccessExecution",
  "executionTimeout",
  "errorWorkflow",
  "timezone",
  "executionOrder",
] as const satisfies readonly (keyof WorkflowSettings)[];

/**
 * @param state prior state; null on create
 * @param plan proposed plan; null on destroy
 */
export function modifyWorkflowPlan(
  state: WorkflowResourceModel | null,
  plan: WorkflowResourceModel | null,
  policy: NormalizationPolicy,
  options: ParseOptions = {}
): WorkflowPlanResult | null {
  if (!state || !plan) return null;

  const contentChanged = workflowContentChanged(state, plan, policy, options);
  logger.debug("Workflow plan content comparison", {
    contentChanged,
    workflowId: typeof state.id === "string" ? state.id : undefined,
  });

  if (contentChanged) return { plan, contentChanged };

  logger.debug("No content changes detected, keeping state values for computed fields", {
    workflowId: typeof state.id === "string" ? state.id : undefined,
  });
  return {
    plan: {
      ...plan,
      versionId: state.versionId,
      updatedAt: state.updatedAt,
      nodes: state.nodes,
      connections: state.connections,
    },
    contentChanged,
  };
}

export function workflowContentChanged(
  state: WorkflowResourceModel,
  plan: WorkflowResourceModel,
  policy: NormalizationPolicy,
  options: ParseOptions = {}
): boolean {
  if (plan.name !== state.name) return true;
  if (plan.active !== state.active) return true;
  if (jsonChanged(state.nodes, plan.nodes, policy, options)) return true;
  if (jsonChanged(state.connections, plan.connections, policy, options)) return true;
  return settingsChanged(state.settings, plan.settings);
}

/** Unknown on either side defers the decision to apply time. */
function jsonChanged(
  state: PlanValue,
  plan: PlanValue,
  policy: NormalizationPolicy,
  options: ParseOptions
): boolean {
  if (state === UNKNOWN || plan === UNKNOWN) return false;
  if (state === null || plan === null) return state !== plan;
  return !semanticEqual(plan, state, policy, options);
}

export function settingsChanged(a?: WorkflowSettings, b?: WorkflowSettings): boolean {
  if (!a || !b) return !a !== !b;
  return SETTINGS_FIELDS.some((field) => a[field] !== b[field]);
}
