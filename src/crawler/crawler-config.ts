import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { CRAWLER, OUTPUT, TIMEOUTS } from '../config/defaults.js';
import { normalizeExtractionSchema } from '../engines/schema-normalizer.js';
import { ConfigError, describeCause } from '../exception/errors.js';
import { CrawlerConfigSchema } from '../schemas/crawler.schema.js';
import { formatZodIssues } from '../schemas/issues.js';
import type { ExtractionSchema } from '../types/index.js';

export interface CrawlerConfig {
  name: string;
  startUrl: string;
  baseUrl: string;
  include: RegExp[];
  exclude: RegExp[];
  contentPatterns: RegExp[];
  urlSchema: ExtractionSchema;
  contentSchema: ExtractionSchema;
  outputDirectory: string;
  delayMs: number;
  maxUrls: number;
  maxRetries: number;
  timeoutMs: number;
  userAgent?: string;
}

export function normalizeCrawlerConfig(document: unknown, source = '<inline>'): CrawlerConfig {
  const parsed = CrawlerConfigSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`crawler config ${source} is invalid`, formatZodIssues(parsed.error));
  }
  const raw = parsed.data;
  const settings = raw.crawler_settings ?? {};

  return {
    name: raw.name,
    startUrl: raw.start_url,
    baseUrl: raw.base_url ?? `${new URL(raw.start_url).origin}/`,
    include: raw.url_patterns?.include ?? [],
    exclude: raw.url_patterns?.exclude ?? [],
    contentPatterns: raw.url_patterns?.content ?? [],
    urlSchema: normalizeExtractionSchema(raw.extraction_schema?.urls),
    contentSchema: normalizeExtractionSchema(raw.extraction_schema?.content),
    outputDirectory: raw.output_directory ?? OUTPUT.DIRECTORY,
    // Settings files give seconds.
    delayMs: settings.request_delay === undefined ? CRAWLER.DELAY_MS : settings.request_delay * 1000,
    maxUrls: settings.max_urls ?? CRAWLER.MAX_URLS,
    maxRetries: settings.max_retries ?? CRAWLER.MAX_RETRIES,
    timeoutMs: settings.timeout === undefined ? TIMEOUTS.FETCH_MS : settings.timeout * 1000,
    userAgent: settings.user_agent,
  };
}

export async function loadCrawlerConfig(path: string): Promise<CrawlerConfig> {
  let document: unknown;
  try {
    document = parseYaml(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`cannot read crawler config ${path}`, [describeCause(error)]);
  }
  return normalizeCrawlerConfig(document, path);
}
