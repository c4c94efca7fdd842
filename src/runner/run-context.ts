import { randomUUID } from 'node:crypto';
import type { WorkflowDefinition } from '../types/index.js';
import { ExecutionState } from '../workflow/execution-state.js';

export interface RunContext {
  workflow: WorkflowDefinition;
  state: ExecutionState;
  /** Records accumulated by `save` actions, written once the run ends. */
  outputs: unknown[];
  runId: string;
  startedAt: string;
}

export interface ActionScope {
  stepId: string;
  /** 1 on the step's own page, incremented for each pagination page. */
  pageNumber: number;
}

export function createRunContext(workflow: WorkflowDefinition): RunContext {
  return {
    workflow,
    state: new ExecutionState(),
    outputs: [],
    runId: `run-${Date.now()}-${randomUUID().slice(0, 8)}`,
    startedAt: new Date().toISOString(),
  };
}
