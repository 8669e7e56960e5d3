// Workflow resource model: the JSON-bearing attributes a plan is computed over.

export type SaveDataMode = 'all' | 'none';

export interface WorkflowNode {
  id: string;
  name: string;
  type: string;          // e.g. n8n-nodes-base.httpRequest
  typeVersion: number;
  position: [number, number];
  parameters: Record<string, unknown>;
  credentials?: Record<string, unknown>;
}

export interface WorkflowSettings {
  saveExecutionProgress: boolean;
  saveManualExecutions: boolean;
  saveDataErrorExecution: SaveDataMode;
  saveDataSuccessExecution: SaveDataMode;
  executionTimeout: number;    // seconds, max 3600
  errorWorkflow: string;
  timezone: string;
  executionOrder: string;
}

export const DEFAULT_WORKFLOW_SETTINGS: Readonly<WorkflowSettings> = Object.freeze({
  saveExecutionProgress: true,
  saveManualExecutions: true,
  saveDataErrorExecution: 'all',
  saveDataSuccessExecution: 'all',
  executionTimeout: 3600,
  errorWorkflow: '',
  timezone: 'America/New_York',
  executionOrder: 'v1',
});

/**
 * Plan/state view of a workflow. `nodes` and `connections` are JSON text;
 * any attribute may be unknown until the upstream API has been called.
 */
export interface WorkflowResourceModel {
  id: PlanValue;
  name: PlanValue;
  active: boolean | null | Unknown;
  nodes: PlanValue;
  connections: PlanValue;
  settings?: WorkflowSettings;
  versionId: PlanValue;
  createdAt: PlanValue;
  updatedAt: PlanValue;
}

/** Marker for a value that will only be known after apply. */
export const UNKNOWN: unique symbol = Symbol('semjson.unknown');
export type Unknown = typeof UNKNOWN;

export type PlanValue = string | null | Unknown;

export function isKnown(v: PlanValue): v is string {
  return typeof v === 'string';
}
