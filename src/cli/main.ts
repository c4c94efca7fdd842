#!/usr/bin/env node

/**
 * flowscrape CLI entry point. Workflow and crawl logic lives in the
 * runner and crawler modules; this file only wires commands.
 */

import { Command } from 'commander';

import { registerCrawlCommand, registerRunAllCommand, registerRunCommand } from './commands.js';

const program = new Command();

program
  .name('flowscrape')
  .description('Run YAML-defined web extraction workflows and static crawls.')
  .version('0.1.0')
  .option('--debug', 'verbose logging');

registerRunCommand(program);
registerRunAllCommand(program);
registerCrawlCommand(program);

program.parseAsync().catch((error: unknown) => {
  process.stderr.write(`[error] ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
