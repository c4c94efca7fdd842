import { readdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { OUTPUT } from '../config/defaults.js';
import type { BrowserEngine } from '../engines/browser-engine.js';
import { FieldExtractor } from '../engines/field-extractor.js';
import { createLinkExtractor } from '../engines/link-extractor.js';
import { SchemaExtractor } from '../engines/schema-extractor.js';
import { SelectorGeneralizer } from '../engines/selector-generalizer.js';
import { formatRunError, toRunError } from '../exception/classifier.js';
import { describeCause } from '../exception/errors.js';
import type { Logger } from '../logging/logger.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { OutputWriter } from '../output/output-writer.js';
import type { LinkExtractionMode, RunResult, SessionConfig, WorkflowDefinition } from '../types/index.js';
import { loadWorkflow as loadWorkflowFile } from '../workflow/loader.js';
import { ActionExecutor } from './action-executor.js';
import { WorkflowEngine } from './workflow-engine.js';

export interface WorkflowSession {
  engine: BrowserEngine;
  close(): Promise<void>;
}

export type SessionFactory = (config: SessionConfig) => Promise<WorkflowSession>;

export interface SessionOverrides {
  headless?: boolean;
  outputDirectory?: string;
  linkExtraction?: LinkExtractionMode;
}

export interface BatchRunnerDeps {
  openSession: SessionFactory;
  logger: Logger;
  loadWorkflow?: (path: string) => Promise<WorkflowDefinition>;
  overrides?: SessionOverrides;
  /** Write per-run step logs and a summary under `<output>/runs/`. */
  runLogs?: boolean;
}

export interface BatchEntry {
  file: string;
  result: RunResult;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  results: BatchEntry[];
}

export function createWorkflowEngine(
  engine: BrowserEngine,
  config: SessionConfig,
  logger: Logger,
  runLogger?: RunLogger,
): WorkflowEngine {
  const generalizer = new SelectorGeneralizer(logger.child('generalizer'));
  const extractor = new SchemaExtractor({ logger: logger.child('extractor') });
  const links = createLinkExtractor(config.linkExtraction, {
    generalizer,
    fields: new FieldExtractor(logger.child('fields')),
    logger: logger.child('links'),
  });
  const writer = new OutputWriter(config.outputDirectory);
  const executor = new ActionExecutor({ engine, generalizer, extractor, links, writer, logger: logger.child('actions') });
  return new WorkflowEngine({ engine, executor, writer, logger, runLogger });
}

export async function discoverWorkflowFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && ['.yaml', '.yml'].includes(extname(entry.name).toLowerCase()))
    .map((entry) => join(directory, entry.name))
    .sort();
}

function failedResult(workflowName: string, error: unknown, totalSteps = 0): RunResult {
  return {
    workflowName,
    runId: '',
    startedAt: new Date().toISOString(),
    success: false,
    stepsCompleted: 0,
    totalSteps,
    dataExtractedCount: 0,
    errors: [formatRunError(toRunError(error))],
    data: [],
    stepResults: [],
    durationMs: 0,
  };
}

/** Runs workflow files one after another, each in its own browser session. */
export class BatchRunner {
  private readonly load: (path: string) => Promise<WorkflowDefinition>;

  constructor(private readonly deps: BatchRunnerDeps) {
    this.load = deps.loadWorkflow ?? loadWorkflowFile;
  }

  async runFile(path: string): Promise<RunResult> {
    const { logger } = this.deps;
    let workflow: WorkflowDefinition;
    try {
      workflow = await this.load(path);
    } catch (error) {
      logger.error('workflow could not be loaded', { file: path, error: formatRunError(toRunError(error)) });
      return failedResult(basename(path), error);
    }

    const config = this.applyOverrides(workflow.config);
    let session: WorkflowSession;
    try {
      session = await this.deps.openSession(config);
    } catch (error) {
      logger.error('browser session could not be opened', { workflow: workflow.name, error: String(error) });
      return failedResult(workflow.name, error, workflow.flow.length);
    }

    const runLogger = this.deps.runLogs
      ? new RunLogger(join(config.outputDirectory, OUTPUT.RUNS_SUBDIRECTORY, `${slug(workflow.name)}-${Date.now()}`))
      : undefined;

    try {
      const engine = createWorkflowEngine(session.engine, config, logger.child(workflow.name), runLogger);
      const result = await engine.run({ ...workflow, config });
      if (runLogger) await this.persistRun(runLogger, result, path);
      return result;
    } finally {
      await this.closeSession(session, workflow.name);
    }
  }

  async runFiles(paths: readonly string[]): Promise<BatchSummary> {
    const results: BatchEntry[] = [];
    for (const file of paths) {
      this.deps.logger.info('running workflow file', { file, position: `${results.length + 1}/${paths.length}` });
      let result: RunResult;
      try {
        result = await this.runFile(file);
      } catch (error) {
        result = failedResult(basename(file), error);
      }
      results.push({ file, result });
    }

    const succeeded = results.filter((entry) => entry.result.success).length;
    return { total: results.length, succeeded, failed: results.length - succeeded, results };
  }

  private applyOverrides(config: SessionConfig): SessionConfig {
    const overrides = this.deps.overrides ?? {};
    return {
      ...config,
      headless: overrides.headless ?? config.headless,
      outputDirectory: overrides.outputDirectory ?? config.outputDirectory,
      linkExtraction: overrides.linkExtraction ?? config.linkExtraction,
    };
  }

  // A finished run keeps its result even when the browser fails to shut down.
  private async closeSession(session: WorkflowSession, workflowName: string): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.deps.logger.warn('browser session did not close cleanly', { workflow: workflowName, error: describeCause(error) });
    }
  }

  private async persistRun(runLogger: RunLogger, result: RunResult, workflowFile: string): Promise<void> {
    try {
      await runLogger.saveResult(result);
      await writeSummary({ runDir: runLogger.getRunDir(), result, workflowFile });
    } catch (error) {
      this.deps.logger.warn('run summary could not be written', { error: formatRunError(toRunError(error)) });
    }
  }
}

function slug(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'workflow';
}
