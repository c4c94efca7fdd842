import type { Command } from 'commander';
import { loadCrawlerConfig } from '../crawler/crawler-config.js';
import { PageFetcher } from '../crawler/page-fetcher.js';
import { StaticCrawler } from '../crawler/static-crawler.js';
import { PlaywrightSession } from '../engines/playwright-engine.js';
import { SchemaExtractor } from '../engines/schema-extractor.js';
import { ConsoleLogger, type Logger } from '../logging/logger.js';
import { OutputWriter } from '../output/output-writer.js';
import { BatchRunner, discoverWorkflowFiles, type BatchSummary } from '../runner/batch-runner.js';

interface GlobalOptions {
  debug?: boolean;
}

interface RunOptions {
  output?: string;
  headful?: boolean;
  enhancedLinks?: boolean;
  runLogs?: boolean;
}

interface CrawlOptions {
  output?: string;
}

// ── Helpers ──────────────────────────────────────────────────

function createLogger(program: Command): Logger {
  const { debug } = program.opts<GlobalOptions>();
  return new ConsoleLogger(debug ? 'debug' : 'info');
}

function createBatchRunner(options: RunOptions, logger: Logger): BatchRunner {
  return new BatchRunner({
    logger,
    openSession: (config) => PlaywrightSession.launch(config, logger.child('browser')),
    runLogs: options.runLogs ?? true,
    overrides: {
      outputDirectory: options.output,
      headless: options.headful ? false : undefined,
      linkExtraction: options.enhancedLinks ? 'enhanced' : undefined,
    },
  });
}

function reportBatch(summary: BatchSummary): void {
  for (const { file, result } of summary.results) {
    const { data: _data, stepResults: _steps, ...printable } = result;
    process.stdout.write(JSON.stringify({ file, ...printable }) + '\n');
  }

  process.stderr.write(`\n--- Batch Result ---\n`);
  process.stderr.write(`Workflows: ${String(summary.total)}\n`);
  process.stderr.write(`Succeeded: ${String(summary.succeeded)}\n`);
  process.stderr.write(`Failed:    ${String(summary.failed)}\n`);
  process.exitCode = summary.failed > 0 ? 1 : 0;
}

function addRunOptions(command: Command): Command {
  return command
    .option('-o, --output <dir>', 'override the output directory of every workflow')
    .option('--headful', 'show the browser window')
    .option('--enhanced-links', 'use the enhanced link-extraction strategy')
    .option('--no-run-logs', 'skip per-run step logs and summaries');
}

// ── Commands ─────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  addRunOptions(
    program
      .command('run')
      .description('Run one or more workflow files in order')
      .argument('<workflows...>', 'workflow YAML files'),
  ).action(async (files: string[], options: RunOptions) => {
    const logger = createLogger(program);
    const summary = await createBatchRunner(options, logger).runFiles(files);
    reportBatch(summary);
  });
}

export function registerRunAllCommand(program: Command): void {
  addRunOptions(
    program
      .command('run-all')
      .description('Run every *.yaml / *.yml workflow in a directory')
      .argument('<directory>', 'directory holding workflow files'),
  ).action(async (directory: string, options: RunOptions) => {
    const logger = createLogger(program);
    const files = await discoverWorkflowFiles(directory);
    if (files.length === 0) {
      logger.warn('no workflow files found', { directory });
      process.exitCode = 1;
      return;
    }
    const summary = await createBatchRunner(options, logger).runFiles(files);
    reportBatch(summary);
  });
}

export function registerCrawlCommand(program: Command): void {
  program
    .command('crawl')
    .description('Crawl static pages described by a crawler config file')
    .argument('<config>', 'crawler YAML config')
    .option('-o, --output <dir>', 'override the output directory')
    .action(async (configPath: string, options: CrawlOptions) => {
      const logger = createLogger(program);
      const config = await loadCrawlerConfig(configPath);
      const outputDirectory = options.output ?? config.outputDirectory;

      const crawler = new StaticCrawler(
        { ...config, outputDirectory },
        {
          fetcher: new PageFetcher({
            logger: logger.child('fetch'),
            timeoutMs: config.timeoutMs,
            maxRetries: config.maxRetries,
            delayMs: config.delayMs,
            userAgent: config.userAgent,
          }),
          extractor: new SchemaExtractor({ logger: logger.child('extractor') }),
          writer: new OutputWriter(outputDirectory),
          logger: logger.child('crawler'),
        },
      );

      const summary = await crawler.crawl();
      process.stdout.write(JSON.stringify(summary) + '\n');
      process.exitCode = summary.processed > 0 ? 0 : 1;
    });
}
