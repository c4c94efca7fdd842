import { describeCause } from '../exception/errors.js';
import { parseHtml, stripSubtrees, type HtmlDocument, type HtmlNode } from '../html/document.js';
import { TurndownMarkdownConverter, type MarkdownConverter } from '../html/markdown.js';
import { isFollowableHref, matchesPatterns, toAbsoluteUrl } from '../html/urls.js';
import type { Logger } from '../logging/logger.js';
import type {
  ContentRecord,
  ExtractionSchema,
  LegacyContentRules,
  LegacyUrlRules,
  SelectorDefinition,
} from '../types/index.js';
import { normalizeExtractionSchema } from './schema-normalizer.js';

const GENERIC_LINK_CONTAINERS = [
  'main',
  'article',
  '.content',
  '.post-content',
  '.article-content',
  '.entry-content',
  '#content',
  '[role="main"]',
];

const GENERIC_TITLE_CANDIDATES = ['h1', 'header h1', '.entry-title', '.post-title', 'article h1', '.headline', 'title'];

const GENERIC_CONTENT_CANDIDATES = [
  'article',
  'main article',
  '.post-content',
  '.article-content',
  '.entry-content',
  '#content',
  'main .content',
  'div[itemprop="articleBody"]',
  '.blog-post',
  '.blog-entry',
  'main',
  'section',
];

const GENERIC_DATE_CANDIDATES = [
  'time',
  '[itemprop="datePublished"]',
  '.published',
  '.post-date',
  'meta[property="article:published_time"]',
];

const GENERIC_AUTHOR_CANDIDATES = ['[itemprop="author"]', '.author', '.byline', '[rel="author"]', 'meta[name="author"]'];

const LEGACY_CONTENT_FALLBACKS = ['article', 'main', '.content', '.entry-content', '.post-content'];

const WHOLE_PAGE_CONTAINERS = ['main', 'article', 'body'];

const FRAGMENT_FIELDS = new Set(['content', 'paragraphs', 'sections']);

export interface SchemaExtractorOptions {
  logger: Logger;
  markdown?: MarkdownConverter;
}

function firstOf(document: HtmlDocument, selectors: readonly string[]): HtmlNode | undefined {
  for (const selector of selectors) {
    const node = document.selectFirst(selector);
    if (node) return node;
  }
  return undefined;
}

function textOf(node: HtmlNode): string {
  return node.text().trim();
}

function metaAwareValue(node: HtmlNode): string {
  if (node.tagName === 'meta') return (node.attr('content') ?? '').trim();
  return (node.attr('datetime') ?? textOf(node)).trim();
}

export class SchemaExtractor {
  private readonly logger: Logger;
  private readonly markdown: MarkdownConverter;

  constructor(options: SchemaExtractorOptions) {
    this.logger = options.logger;
    this.markdown = options.markdown ?? new TurndownMarkdownConverter();
  }

  /** Deduplicated absolute URLs found in the document. Faults yield an empty set. */
  extractUrls(document: HtmlDocument, schema: ExtractionSchema): Set<string> {
    const urls = new Set<string>();
    try {
      switch (schema.kind) {
        case 'selectors':
          for (const definition of schema.selectors) {
            this.collectSelectorUrls(document, definition, urls);
          }
          break;
        case 'legacy':
          this.collectLegacyUrls(document, schema.urls, urls);
          break;
        case 'generic':
          this.collectGenericUrls(document, urls);
          break;
      }
    } catch (error) {
      this.logger.error('url extraction failed', { kind: schema.kind, error: describeCause(error) });
      return new Set();
    }
    return urls;
  }

  extractContent(document: HtmlDocument, schema: ExtractionSchema): ContentRecord {
    try {
      return this.postProcess(document, this.contentFor(document, schema));
    } catch (error) {
      this.logger.error('content extraction failed', { kind: schema.kind, error: describeCause(error) });
      return {};
    }
  }

  extractUrlsFromHtml(html: string, baseUrl: string, rawSchema: unknown): Set<string> {
    if (html.trim().length === 0) return new Set();
    const schema = this.normalize(rawSchema);
    return schema ? this.extractUrls(parseHtml(html, baseUrl), schema) : new Set();
  }

  extractContentFromHtml(html: string, baseUrl: string, rawSchema: unknown): ContentRecord {
    if (html.trim().length === 0) return {};
    const schema = this.normalize(rawSchema);
    return schema ? this.extractContent(parseHtml(html, baseUrl), schema) : {};
  }

  private contentFor(document: HtmlDocument, schema: ExtractionSchema): ContentRecord {
    switch (schema.kind) {
      case 'selectors':
        return this.selectorContent(document, schema.selectors);
      case 'legacy':
        return this.legacyContent(document, schema.content);
      case 'generic':
        return this.genericContent(document);
    }
  }

  private normalize(rawSchema: unknown): ExtractionSchema | undefined {
    try {
      return normalizeExtractionSchema(rawSchema);
    } catch (error) {
      this.logger.error('malformed extraction schema', { error: describeCause(error) });
      return undefined;
    }
  }

  private addUrl(urls: Set<string>, href: string | undefined, baseUrl: string): void {
    if (!isFollowableHref(href)) return;
    const absolute = toAbsoluteUrl(href.trim(), baseUrl);
    if (absolute) urls.add(absolute);
  }

  private collectAnchors(document: HtmlDocument, scope: readonly HtmlNode[], urls: Set<string>): void {
    for (const node of scope) {
      if (node.tagName === 'a') this.addUrl(urls, node.attr('href'), document.baseUrl);
      for (const anchor of node.find('a[href]')) {
        this.addUrl(urls, anchor.attr('href'), document.baseUrl);
      }
    }
  }

  private collectSelectorUrls(document: HtmlDocument, definition: SelectorDefinition, urls: Set<string>): void {
    const urlField = definition.fields.find((field) => field.name === 'url');
    for (const node of document.select(definition.selector)) {
      if (urlField && urlField.type === 'attribute' && urlField.attribute) {
        const target = urlField.selector === '.' ? node : node.find(urlField.selector)[0];
        if (target) this.addUrl(urls, target.attr(urlField.attribute), document.baseUrl);
      } else {
        this.collectAnchors(document, [node], urls);
      }
    }
  }

  private collectLegacyUrls(document: HtmlDocument, rules: LegacyUrlRules, urls: Set<string>): void {
    let links: HtmlNode[];
    const containers = rules.container ? document.select(rules.container) : [];
    if (containers.length > 0) {
      links = containers.flatMap((container) => container.find(rules.linkSelector));
    } else {
      if (rules.container) {
        this.logger.warn('link container not found, scanning whole document', { container: rules.container });
      }
      links = document.select(rules.linkSelector);
    }

    const found = new Set<string>();
    for (const link of links) {
      this.addUrl(found, link.attr(rules.attribute), document.baseUrl);
    }
    for (const url of found) {
      if (matchesPatterns(url, rules.include, rules.exclude)) urls.add(url);
    }
  }

  private collectGenericUrls(document: HtmlDocument, urls: Set<string>): void {
    // Only the first container that yields links counts.
    for (const selector of GENERIC_LINK_CONTAINERS) {
      this.collectAnchors(document, document.select(selector), urls);
      if (urls.size > 0) return;
    }
    this.collectAnchors(document, document.select('body'), urls);
  }

  private selectorContent(document: HtmlDocument, definitions: readonly SelectorDefinition[]): ContentRecord {
    const record: ContentRecord = {};
    const fragments: string[] = [];

    for (const definition of definitions) {
      for (const node of document.select(definition.selector)) {
        for (const field of definition.fields) {
          if (field.name in record) continue;
          const target = field.selector === '.' ? node : node.find(field.selector)[0];
          if (!target) continue;

          if (field.type === 'attribute') {
            const value = field.attribute ? target.attr(field.attribute) : undefined;
            if (value !== undefined) record[field.name] = value.trim();
          } else {
            record[field.name] = textOf(target);
            if (FRAGMENT_FIELDS.has(field.name)) fragments.push(target.outerHtml());
          }
        }

        for (const child of definition.children) {
          const matches = node.find(child.selector);
          if (FRAGMENT_FIELDS.has(child.name)) {
            fragments.push(...matches.map((match) => match.outerHtml()));
          } else if (!(child.name in record)) {
            record[child.name] = matches.map(textOf);
          }
        }
      }
    }

    if (fragments.length > 0) {
      const html = fragments.join('\n');
      record.html_content = html;
      record.content_markdown = this.markdown.toMarkdown(html);
    }
    if (!record.title) {
      const title = document.title();
      if (title) record.title = title;
    }
    return record;
  }

  private legacyContent(document: HtmlDocument, rules: LegacyContentRules): ContentRecord {
    const record: ContentRecord = {};

    const titleNode = document.selectFirst(rules.title);
    record.title = (titleNode && textOf(titleNode)) || document.title() || 'Untitled';

    if (rules.author) {
      const author = document.selectFirst(rules.author);
      if (author) record.author = textOf(author);
    }

    if (rules.date) {
      const date = document.selectFirst(rules.date);
      if (date) {
        record.date = (rules.dateAttribute ? date.attr(rules.dateAttribute) : undefined)?.trim() ?? textOf(date);
      }
    }

    const contentNode = document.selectFirst(rules.content) ?? firstOf(document, LEGACY_CONTENT_FALLBACKS);
    if (contentNode) {
      const html = stripSubtrees(contentNode.outerHtml(), rules.remove);
      const markdown = this.markdown.toMarkdown(html);
      record.html_content = html;
      record.raw_content = markdown;
      record.content_markdown = markdown;
    } else {
      this.logger.warn('content container not found', { selector: rules.content });
    }

    for (const field of rules.customFields) {
      const node = document.selectFirst(field.selector);
      if (!node) continue;
      const value = field.attribute ? node.attr(field.attribute) : textOf(node);
      if (value !== undefined) record[field.name] = value.trim();
    }

    return record;
  }

  private genericContent(document: HtmlDocument): ContentRecord {
    const record: ContentRecord = {};

    for (const selector of GENERIC_TITLE_CANDIDATES) {
      const node = document.selectFirst(selector);
      const text = node ? textOf(node) : '';
      if (text) {
        record.title = text;
        break;
      }
    }
    record.title ??= 'Untitled';

    const contentNode = firstOf(document, GENERIC_CONTENT_CANDIDATES) ?? document.selectFirst('body');
    if (contentNode) {
      const html = contentNode.outerHtml();
      record.html_content = html;
      record.raw_content = this.markdown.toMarkdown(html);
      record.content_markdown = record.raw_content;
    }

    const date = firstOf(document, GENERIC_DATE_CANDIDATES);
    if (date && metaAwareValue(date)) record.date = metaAwareValue(date);

    const author = firstOf(document, GENERIC_AUTHOR_CANDIDATES);
    if (author) {
      const value = author.tagName === 'meta' ? metaAwareValue(author) : textOf(author);
      if (value) record.author = value;
    }

    return record;
  }

  private postProcess(document: HtmlDocument, record: ContentRecord): ContentRecord {
    if (('content' in record || 'html_content' in record) && !record.content_markdown) {
      const html =
        typeof record.html_content === 'string'
          ? record.html_content
          : typeof record.content === 'string'
            ? record.content
            : '';
      if (html) record.content_markdown = this.markdown.toMarkdown(html);
    }

    if (!record.content_markdown) {
      const node = firstOf(document, WHOLE_PAGE_CONTAINERS);
      if (node) record.content_markdown = this.markdown.toMarkdown(node.outerHtml());
      if (!record.title) record.title = document.title() ?? 'Untitled';
    }

    const urls = new Set<string>();
    this.collectAnchors(document, document.select('body'), urls);
    record.urls = [...urls];
    return record;
  }
}
