import type { BrowserEngine } from '../engines/browser-engine.js';
import { formatRunError, formatStepError, toRunError } from '../exception/classifier.js';
import { IOError } from '../exception/errors.js';
import type { Logger } from '../logging/logger.js';
import type { RunLogger } from '../logging/run-logger.js';
import type { OutputWriter } from '../output/output-writer.js';
import {
  FINISH_STEP,
  type RunResult,
  type StepDefinition,
  type StepResult,
  type WorkflowDefinition,
} from '../types/index.js';
import { isTruthy } from '../workflow/variables.js';
import type { ActionExecutor } from './action-executor.js';
import { createRunContext, type RunContext } from './run-context.js';

export interface WorkflowEngineDeps {
  engine: BrowserEngine;
  executor: ActionExecutor;
  writer: OutputWriter;
  logger: Logger;
  runLogger?: RunLogger;
}

/**
 * Walks a workflow's steps as a state machine: start at the first step,
 * follow each step's `next` until there is none or it names `finish`.
 * A failed step or a transition to an undefined step halts the run.
 */
export class WorkflowEngine {
  constructor(private readonly deps: WorkflowEngineDeps) {}

  async run(workflow: WorkflowDefinition): Promise<RunResult> {
    const start = Date.now();
    const context = createRunContext(workflow);
    const { logger } = this.deps;
    const errors: string[] = [];
    const stepResults: StepResult[] = [];
    const steps = new Map(workflow.flow.map((step) => [step.name, step]));

    logger.info('workflow started', { workflow: workflow.name, runId: context.runId, steps: workflow.flow.length });

    let stepsCompleted = 0;
    try {
      await this.deps.engine.navigate(workflow.startUrl);
    } catch (error) {
      errors.push(`start page failed: ${formatRunError(toRunError(error, { url: workflow.startUrl }))}`);
    }

    let current: string | null = errors.length === 0 ? workflow.flow[0].name : null;
    while (current !== null && current !== FINISH_STEP) {
      const step = steps.get(current);
      if (!step) {
        errors.push(formatRunError({ kind: 'ConfigError', message: `step "${current}" is not defined` }));
        break;
      }

      const result = await this.executeStep(step, context);
      stepsCompleted++;
      stepResults.push(result);
      await this.record(result);

      if (!result.ok) {
        errors.push(formatStepError(step.name, result.error ?? { kind: 'ExtractionError', message: 'unknown failure' }));
        break;
      }
      current = result.next;
    }

    let outputFile: string | undefined;
    if (context.outputs.length > 0) {
      outputFile = await this.writeOutput(workflow.name, context.outputs);
    }

    const result: RunResult = {
      workflowName: workflow.name,
      runId: context.runId,
      startedAt: context.startedAt,
      success: stepsCompleted > 0 && errors.length === 0,
      stepsCompleted,
      totalSteps: workflow.flow.length,
      dataExtractedCount: context.outputs.length,
      errors,
      outputFile,
      data: context.outputs,
      stepResults,
      durationMs: Date.now() - start,
    };
    logger.info('workflow finished', {
      workflow: workflow.name,
      success: result.success,
      stepsCompleted,
      dataExtractedCount: result.dataExtractedCount,
    });
    return result;
  }

  private async executeStep(step: StepDefinition, context: RunContext): Promise<StepResult> {
    const start = Date.now();
    const { executor, logger } = this.deps;
    const scope = { stepId: step.name, pageNumber: 1 };
    logger.info('executing step', { step: step.name });

    if (step.condition !== undefined && !isTruthy(context.state.resolve(step.condition))) {
      logger.info('step condition is false, skipping', { step: step.name });
      return { stepId: step.name, ok: true, skipped: true, next: step.next, durationMs: Date.now() - start };
    }

    if (step.forEach !== undefined) {
      const { iterations, ...outcome } = await executor.iterate(step.forEach, step.actions, context, scope);
      return this.stepOutcome(step, outcome, start, { iterations });
    }

    const outcome = await executor.executeAll(step.actions, context, scope);
    if (!outcome.ok || !step.pagination) {
      return this.stepOutcome(step, outcome, start, {});
    }

    const pages = await this.paginate(step, context);
    return this.stepOutcome(step, outcome, start, { pages });
  }

  private stepOutcome(
    step: StepDefinition,
    outcome: { ok: boolean; error?: StepResult['error']; divertTo?: string },
    start: number,
    extra: Pick<StepResult, 'iterations' | 'pages'>,
  ): StepResult {
    const durationMs = Date.now() - start;
    if (outcome.divertTo) {
      return { stepId: step.name, ok: true, next: outcome.divertTo, error: outcome.error, durationMs, ...extra };
    }
    if (!outcome.ok) {
      return { stepId: step.name, ok: false, next: null, error: outcome.error, durationMs, ...extra };
    }
    return { stepId: step.name, ok: true, next: step.next, durationMs, ...extra };
  }

  /** `maxPages` counts the step's own page, so at most `maxPages - 1` further pages are visited. */
  private async paginate(step: StepDefinition, context: RunContext): Promise<number> {
    const { engine, executor, logger } = this.deps;
    const pagination = step.pagination;
    if (!pagination) return 1;

    let page = 1;
    while (page < pagination.maxPages) {
      try {
        const [nextButton] = await engine.querySelectorAll(pagination.nextButtonSelector);
        if (!nextButton) {
          logger.info('no next page control, pagination ends', { step: step.name, page });
          break;
        }
        await nextButton.click();
        await engine.waitForNetworkIdle();
      } catch (error) {
        logger.warn('pagination stopped', { step: step.name, page, error: formatRunError(toRunError(error)) });
        break;
      }

      page++;
      const outcome = await executor.executeAll(step.actions, context, { stepId: step.name, pageNumber: page });
      if (!outcome.ok) {
        logger.warn('action failed on paginated page', {
          step: step.name,
          page,
          error: outcome.error ? formatRunError(outcome.error) : undefined,
        });
      }
    }
    return page;
  }

  private async record(result: StepResult): Promise<void> {
    if (!this.deps.runLogger) return;
    try {
      await this.deps.runLogger.logStep(result);
    } catch (error) {
      this.deps.logger.warn('could not append step log', { error: formatRunError(toRunError(error)) });
    }
  }

  private async writeOutput(workflowName: string, outputs: readonly unknown[]): Promise<string | undefined> {
    try {
      const path = await this.deps.writer.writeRunOutput(workflowName, outputs);
      this.deps.logger.info('run output written', { path, records: outputs.length });
      return path;
    } catch (error) {
      if (!(error instanceof IOError)) throw error;
      this.deps.logger.error(error.message, { kind: error.kind });
      return undefined;
    }
  }
}
