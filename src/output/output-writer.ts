import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { IOError } from '../exception/errors.js';
import type { SaveFormat } from '../types/index.js';

const UNSAFE_FILENAME_CHARS = /[\\/*?:"<>|]/g;

const EXTENSIONS: Record<SaveFormat, string> = {
  json: 'json',
  markdown: 'md',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

export function runOutputFileName(workflowName: string): string {
  return `${workflowName.toLowerCase().replace(/ /g, '_')}.json`;
}

export function sanitizeFilename(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, '_');
}

export function defaultSaveFilename(format: SaveFormat, now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `output_${stamp}.${EXTENSIONS[format]}`;
}

export function renderMarkdownRecord(data: unknown): string {
  if (Array.isArray(data)) {
    return data.map(renderMarkdownRecord).join('\n---\n\n');
  }
  if (!isRecord(data)) {
    return `${String(data)}\n`;
  }

  const title = stringField(data, 'title') ?? 'Untitled';
  const date = stringField(data, 'date', 'timestamp') ?? '';
  const url = stringField(data, 'url') ?? '';
  const body = stringField(data, 'content_markdown', 'content', 'raw_content') ?? '';
  return `# ${title}\n\nDate: ${date}\n\nURL: ${url}\n\n${body}\n`;
}

export class OutputWriter {
  constructor(private readonly outputDir: string) {}

  getOutputDir(): string {
    return this.outputDir;
  }

  async writeRunOutput(workflowName: string, records: readonly unknown[]): Promise<string> {
    const path = join(this.outputDir, runOutputFileName(workflowName));
    await this.write(path, JSON.stringify(records, null, 2));
    return path;
  }

  async writeSaveFile(filename: string, data: unknown, format: SaveFormat): Promise<string> {
    const path = join(this.outputDir, sanitizeFilename(filename));
    const body = format === 'markdown' ? renderMarkdownRecord(data) : JSON.stringify(data, null, 2);
    await this.write(path, body);
    return path;
  }

  private async write(path: string, body: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, body, 'utf-8');
    } catch (error) {
      throw new IOError(path, error);
    }
  }
}
