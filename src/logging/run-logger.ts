import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunResult, StepResult } from '../types/index.js';

export class RunLogger {
  private readonly logPath: string;
  private initialized = false;

  constructor(private readonly runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async logStep(result: StepResult): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...result,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  /** Writes the run result without the extracted records, which live in the output file. */
  async saveResult(result: RunResult): Promise<void> {
    await this.ensureDir();
    const { data: _data, ...rest } = result;
    await writeFile(join(this.runDir, 'result.json'), JSON.stringify(rest, null, 2), 'utf-8');
  }

  getRunDir(): string {
    return this.runDir;
  }
}
