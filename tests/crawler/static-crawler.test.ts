import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { normalizeCrawlerConfig, type CrawlerConfig } from '../../src/crawler/crawler-config.js';
import { PageFetcher } from '../../src/crawler/page-fetcher.js';
import { StaticCrawler, pageBaseName } from '../../src/crawler/static-crawler.js';
import { SchemaExtractor } from '../../src/engines/schema-extractor.js';
import { ConfigError } from '../../src/exception/errors.js';
import { OutputWriter } from '../../src/output/output-writer.js';
import { mockLogger } from '../helpers/logger.js';

const SITE: Record<string, string> = {
  'http://x/docs/': `<html><body><main>
    <a href="/docs/intro">Intro</a>
    <a href="/docs/setup.html">Setup</a>
    <a href="/docs/private/key">Private</a>
    <a href="http://other/docs/x">Other</a>
    <a href="/blog/post">Blog</a>
  </main></body></html>`,
  'http://x/docs/intro': `<html><head><title>Intro</title></head><body>
    <h1>Getting Started</h1>
    <article><p>Welcome</p><a href="/docs/">Back</a></article>
  </body></html>`,
};

function fakeFetch(site: Record<string, string>): typeof fetch {
  return vi.fn(async (input: string | URL | Request) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const body = site[url];
    if (body === undefined) return new Response('missing', { status: 404, statusText: 'Not Found' });
    return new Response(body, { status: 200, headers: { 'content-type': 'text/html' } });
  });
}

const RAW_CONFIG = {
  name: 'docs',
  start_url: 'http://x/docs/',
  url_patterns: { include: ['/docs/'], exclude: ['/docs/private'] },
  extraction_schema: { content: { title: 'h1', content: 'article' } },
  crawler_settings: { request_delay: 0, max_urls: 10, max_retries: 1 },
};

describe('normalizeCrawlerConfig', () => {
  it('converts seconds and fills defaults', () => {
    const config = normalizeCrawlerConfig({
      name: 'docs',
      start_url: 'http://x/docs/',
      crawler_settings: { request_delay: 1.5, timeout: 10 },
    });

    expect(config).toMatchObject({
      baseUrl: 'http://x/',
      include: [],
      exclude: [],
      contentPatterns: [],
      urlSchema: { kind: 'generic' },
      contentSchema: { kind: 'generic' },
      outputDirectory: 'output',
      delayMs: 1500,
      timeoutMs: 10000,
      maxUrls: 100,
      maxRetries: 3,
    });
  });

  it('rejects a config without a valid start url', () => {
    expect(() => normalizeCrawlerConfig({ name: 'docs', start_url: 'not a url' }, 'docs.yaml')).toThrow(ConfigError);
    expect(() => normalizeCrawlerConfig({ name: 'docs' }, 'docs.yaml')).toThrow(/crawler config docs\.yaml is invalid/);
  });

  it('compiles url patterns and rejects invalid ones', () => {
    const config = normalizeCrawlerConfig({
      name: 'docs',
      start_url: 'http://x/docs/',
      url_patterns: { include: ['/docs/'], content: ['\\.html$'] },
    });
    expect(config.include).toEqual([/\/docs\//]);
    expect(config.contentPatterns[0].test('http://x/docs/a.html')).toBe(true);

    expect(() =>
      normalizeCrawlerConfig({ name: 'docs', start_url: 'http://x/docs/', url_patterns: { exclude: ['('] } }, 'docs.yaml'),
    ).toThrow(/crawler config docs\.yaml is invalid: url_patterns\.exclude\.0: invalid pattern "\("/);
  });
});

describe('pageBaseName', () => {
  it('prefers the title', () => {
    expect(pageBaseName('http://x/a/b', { title: 'Hello: World?' })).toBe('Hello__World_');
  });

  it('truncates long titles', () => {
    expect(pageBaseName('http://x/a', { title: 'x'.repeat(80) })).toBe('x'.repeat(50));
  });

  it('uses the last path segment without its extension', () => {
    expect(pageBaseName('http://x/guide/install.html', { title: 'Untitled' })).toBe('install');
  });

  it('hashes the url when nothing else is usable', () => {
    expect(pageBaseName('http://x/', {})).toBe('page_6e8eb82d');
  });
});

describe('StaticCrawler', () => {
  let dir: string;
  let config: CrawlerConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flowscrape-crawl-'));
    config = normalizeCrawlerConfig(RAW_CONFIG);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function crawler(overrides: Partial<CrawlerConfig> = {}) {
    const logger = mockLogger();
    return new StaticCrawler(
      { ...config, ...overrides },
      {
        fetcher: new PageFetcher({ logger, fetchImpl: fakeFetch(SITE), maxRetries: 1, delayMs: 0 }),
        extractor: new SchemaExtractor({ logger }),
        writer: new OutputWriter(dir),
        logger,
        now: () => new Date('2024-06-01T12:00:00.000Z'),
      },
    );
  }

  it('decides which links to follow', () => {
    const subject = crawler();
    expect(subject.shouldFollow('http://x/docs/intro')).toBe(true);
    expect(subject.shouldFollow('http://x/docs/private/key')).toBe(false);
    expect(subject.shouldFollow('http://x/blog/post')).toBe(false);
    expect(subject.shouldFollow('http://other/docs/x')).toBe(false);
  });

  it('treats pages without a trailing slash as content by default', () => {
    const subject = crawler();
    expect(subject.isContentPage('http://x/docs/')).toBe(false);
    expect(subject.isContentPage('http://x/docs/intro')).toBe(true);
    expect(crawler({ contentPatterns: [/\/guide\//] }).isContentPage('http://x/docs/intro')).toBe(false);
  });

  it('crawls breadth-first and saves content pages', async () => {
    const summary = await crawler().crawl();

    expect(summary).toEqual({
      processed: 2,
      failed: 1,
      saved: [join(dir, 'Getting_Started.md'), join(dir, 'Getting_Started.json')],
    });

    const saved: unknown = JSON.parse(await readFile(join(dir, 'Getting_Started.json'), 'utf-8'));
    expect(saved).toMatchObject({
      title: 'Getting Started',
      url: 'http://x/docs/intro',
      crawled_at: '2024-06-01T12:00:00.000Z',
    });
    const markdown = await readFile(join(dir, 'Getting_Started.md'), 'utf-8');
    expect(markdown).toBe('# Getting Started\n\nDate: \n\nURL: http://x/docs/intro\n\nWelcome\n\n[Back](/docs/)\n');
  });

  it('stops after the url limit', async () => {
    const summary = await crawler({ maxUrls: 1 }).crawl();
    expect(summary).toEqual({ processed: 1, failed: 0, saved: [] });
  });
});
