export * from './types/index.js';

export { ConfigError, ExtractionError, FlowError, IOError, NavigationError, SelectorError } from './exception/errors.js';
export { classifyError, formatRunError, formatStepError, toRunError } from './exception/classifier.js';

export { ConsoleLogger, type Logger, type LogLevel } from './logging/logger.js';
export { RunLogger } from './logging/run-logger.js';
export { buildSummaryMarkdown, writeSummary } from './logging/summary-writer.js';

export { parseHtml, stripSubtrees, type HtmlDocument, type HtmlNode } from './html/document.js';
export { TurndownMarkdownConverter, type MarkdownConverter } from './html/markdown.js';
export { classifySelector } from './html/selector-kind.js';

export { interpolate, resolveVariables, lookupPath, isTruthy } from './workflow/variables.js';
export { ExecutionState } from './workflow/execution-state.js';
export { loadWorkflow, parseWorkflow, normalizeWorkflow } from './workflow/loader.js';

export type { BrowserEngine, PageElement } from './engines/browser-engine.js';
export { PlaywrightEngine, PlaywrightSession } from './engines/playwright-engine.js';
export { SelectorGeneralizer } from './engines/selector-generalizer.js';
export { SchemaExtractor } from './engines/schema-extractor.js';
export { normalizeExtractionSchema } from './engines/schema-normalizer.js';
export { FieldExtractor, normalizeDate } from './engines/field-extractor.js';
export {
  BaselineLinkExtractor,
  EnhancedLinkExtractor,
  createLinkExtractor,
  type LinkExtractionStrategy,
  type LinkItem,
} from './engines/link-extractor.js';

export { OutputWriter } from './output/output-writer.js';

export { ActionExecutor } from './runner/action-executor.js';
export { WorkflowEngine } from './runner/workflow-engine.js';
export { BatchRunner, createWorkflowEngine, discoverWorkflowFiles, type BatchSummary } from './runner/batch-runner.js';

export { PageFetcher } from './crawler/page-fetcher.js';
export { StaticCrawler, type CrawlSummary } from './crawler/static-crawler.js';
export { loadCrawlerConfig, normalizeCrawlerConfig, type CrawlerConfig } from './crawler/crawler-config.js';
