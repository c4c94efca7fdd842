import { createHash } from 'node:crypto';
import type { SchemaExtractor } from '../engines/schema-extractor.js';
import { IOError } from '../exception/errors.js';
import { parseHtml } from '../html/document.js';
import { matchesPatterns } from '../html/urls.js';
import type { Logger } from '../logging/logger.js';
import { sanitizeFilename, type OutputWriter } from '../output/output-writer.js';
import type { ContentRecord } from '../types/index.js';
import type { CrawlerConfig } from './crawler-config.js';
import type { PageFetcher } from './page-fetcher.js';

const MAX_TITLE_LENGTH = 50;

export interface StaticCrawlerDeps {
  fetcher: PageFetcher;
  extractor: SchemaExtractor;
  writer: OutputWriter;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface CrawlSummary {
  processed: number;
  failed: number;
  saved: string[];
}

export function pageBaseName(url: string, record: ContentRecord): string {
  const title = typeof record.title === 'string' ? record.title.trim() : '';
  if (title && title !== 'Untitled') {
    return sanitizeFilename(title).replace(/\s+/g, '_').slice(0, MAX_TITLE_LENGTH);
  }

  const lastSegment = new URL(url).pathname.split('/').filter(Boolean).pop();
  if (lastSegment) {
    return sanitizeFilename(decodeURIComponent(lastSegment)).replace(/\.[a-z0-9]+$/i, '');
  }
  return `page_${createHash('md5').update(url).digest('hex').slice(0, 8)}`;
}

/** Breadth-first crawl over static pages, one request at a time. */
export class StaticCrawler {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly config: CrawlerConfig,
    private readonly deps: StaticCrawlerDeps,
  ) {
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = deps.now ?? (() => new Date());
  }

  shouldFollow(url: string): boolean {
    return url.startsWith(this.config.baseUrl) && matchesPatterns(url, this.config.include, this.config.exclude);
  }

  isContentPage(url: string): boolean {
    if (this.config.contentPatterns.length > 0) {
      return this.config.contentPatterns.some((pattern) => pattern.test(url));
    }
    return !new URL(url).pathname.endsWith('/');
  }

  async crawl(): Promise<CrawlSummary> {
    const { fetcher, extractor, logger } = this.deps;
    const queue = [this.config.startUrl];
    const seen = new Set(queue);
    const summary: CrawlSummary = { processed: 0, failed: 0, saved: [] };

    logger.info('crawl started', { name: this.config.name, startUrl: this.config.startUrl });

    while (queue.length > 0 && summary.processed < this.config.maxUrls) {
      const url = queue.shift();
      if (url === undefined) break;

      const html = await fetcher.fetchHtml(url);
      if (html === null) {
        summary.failed++;
      } else {
        summary.processed++;
        const document = parseHtml(html, url);

        for (const link of extractor.extractUrls(document, this.config.urlSchema)) {
          if (!seen.has(link) && this.shouldFollow(link)) {
            seen.add(link);
            queue.push(link);
          }
        }

        if (this.isContentPage(url)) {
          const record = extractor.extractContent(document, this.config.contentSchema);
          if (typeof record.content_markdown === 'string' && record.content_markdown.length > 0) {
            summary.saved.push(...(await this.savePage(url, record)));
          }
        }
      }

      if (queue.length > 0 && this.config.delayMs > 0) {
        await this.sleep(this.config.delayMs);
      }
    }

    logger.info('crawl finished', { ...summary, saved: summary.saved.length });
    return summary;
  }

  private async savePage(url: string, record: ContentRecord): Promise<string[]> {
    const baseName = pageBaseName(url, record);
    const page = { ...record, url, crawled_at: this.now().toISOString() };
    try {
      return [
        await this.deps.writer.writeSaveFile(`${baseName}.md`, page, 'markdown'),
        await this.deps.writer.writeSaveFile(`${baseName}.json`, page, 'json'),
      ];
    } catch (error) {
      if (!(error instanceof IOError)) throw error;
      this.deps.logger.error(error.message, { url });
      return [];
    }
  }
}
