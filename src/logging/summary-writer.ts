import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunResult } from '../types/index.js';

export interface SummaryOptions {
  runDir: string;
  result: RunResult;
  workflowFile?: string;
}

export async function writeSummary(options: SummaryOptions): Promise<void> {
  const md = buildSummaryMarkdown(options);
  await writeFile(join(options.runDir, 'summary.md'), md, 'utf-8');
}

export function buildSummaryMarkdown(options: Omit<SummaryOptions, 'runDir'>): string {
  const { result, workflowFile } = options;
  const skipped = result.stepResults.filter((r) => r.skipped).length;
  const overall = result.success ? 'Success' : 'Failure';

  const lines: string[] = [
    '# Run Summary',
    `- Workflow: ${result.workflowName}`,
    `- Result: ${overall}`,
    `- Duration: ${formatDuration(result.durationMs)}`,
    `- Steps: ${result.stepsCompleted}/${result.totalSteps} executed${skipped > 0 ? ` (${skipped} skipped)` : ''}`,
    `- Records: ${result.dataExtractedCount}`,
    '',
    '## Steps',
  ];

  if (result.stepResults.length === 0) {
    lines.push('- No steps executed');
  }
  result.stepResults.forEach((step, index) => {
    const status = step.skipped ? 'skipped' : step.ok ? 'ok' : 'failed';
    const details: string[] = [];
    if (step.iterations !== undefined) details.push(`${step.iterations} items`);
    if (step.pages !== undefined) details.push(`${step.pages} pages`);
    const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
    lines.push(`${index + 1}. ${step.stepId}: ${status}${suffix}`);
  });

  lines.push('');
  lines.push('## Errors');
  if (result.errors.length === 0) {
    lines.push('- None');
  } else {
    for (const error of result.errors) {
      lines.push(`- ${error}`);
    }
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${result.runId}`);
  lines.push(`- Started at: ${result.startedAt}`);
  if (workflowFile) lines.push(`- Workflow file: ${workflowFile}`);
  lines.push(`- Output file: ${result.outputFile ?? 'none'}`);

  return lines.join('\n') + '\n';
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
