export type { JsonAttributeRequest, JsonAttributeResponse } from "./attribute.js";
export { planJsonAttribute } from "./attribute.js";

export type { WorkflowPlanResult } from "./workflow.js";
export { modifyWorkflowPlan, workflowContentChanged, settingsChanged } from "./workflow.js";

export type { ReconcileOutcome } from "./reconcile.js";
export { reconcileStoredJson } from "./reconcile.js";
