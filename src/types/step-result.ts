export type ErrorKind =
  | 'ConfigError'
  | 'NavigationError'
  | 'SelectorError'
  | 'GeneralizationFailure'
  | 'VariableResolutionError'
  | 'ExtractionError'
  | 'IOError';

export interface RunError {
  kind: ErrorKind;
  message: string;
}

export interface ActionResult {
  ok: boolean;
  error?: RunError;
  /** Step to transition to when this action failed but declared a `next`. */
  divertTo?: string;
}

export interface StepResult {
  stepId: string;
  ok: boolean;
  skipped?: boolean;
  next: string | null;
  error?: RunError;
  iterations?: number;
  pages?: number;
  durationMs?: number;
}

export interface RunResult {
  workflowName: string;
  runId: string;
  startedAt: string;
  success: boolean;
  stepsCompleted: number;
  totalSteps: number;
  dataExtractedCount: number;
  errors: string[];
  outputFile?: string;
  data: unknown[];
  stepResults: StepResult[];
  durationMs: number;
}
