import { parseHtml, type HtmlDocument, type HtmlNode } from '../html/document.js';
import { classifySelector } from '../html/selector-kind.js';
import { isNavigableHref, toAbsoluteUrl } from '../html/urls.js';
import type { Logger } from '../logging/logger.js';
import type { LinkExtractionMode } from '../types/index.js';
import type { BrowserEngine } from './browser-engine.js';
import type { FieldExtractor } from './field-extractor.js';
import type { SelectorGeneralizer } from './selector-generalizer.js';

export interface LinkItem {
  href: string;
  text: string;
  date?: string;
}

export interface LinkRequest {
  sample: string;
  generalize: boolean;
}

export interface LinkExtractionStrategy {
  readonly mode: LinkExtractionMode;
  extract(engine: BrowserEngine, request: LinkRequest): Promise<LinkItem[]>;
}

interface ResolvedTarget {
  selector: string;
  document: HtmlDocument;
}

abstract class LinkExtractorBase implements LinkExtractionStrategy {
  abstract readonly mode: LinkExtractionMode;

  constructor(
    protected readonly generalizer: SelectorGeneralizer,
    protected readonly logger: Logger,
  ) {}

  abstract extract(engine: BrowserEngine, request: LinkRequest): Promise<LinkItem[]>;

  protected async resolveTarget(engine: BrowserEngine, request: LinkRequest): Promise<ResolvedTarget> {
    const document = parseHtml(await engine.content(), await engine.currentUrl());
    if (!request.generalize) {
      return { selector: request.sample, document };
    }
    const result = this.generalizer.generalize(document, request.sample);
    return { selector: result.success ? result.generalizedSelector : request.sample, document };
  }

  protected async readHandles(
    engine: BrowserEngine,
    selector: string,
    baseUrl: string,
    accept: (href: string | undefined) => boolean,
  ): Promise<LinkItem[]> {
    const items: LinkItem[] = [];
    for (const handle of await engine.querySelectorAll(selector)) {
      const href = (await handle.getAttribute('href')) ?? undefined;
      if (!href || !accept(href)) continue;
      const text = (await handle.textContent()) ?? '';
      items.push({ href: toAbsoluteUrl(href, baseUrl) ?? href, text: text.trim() });
    }
    return items;
  }
}

/** Generalize (optionally), query live handles, read href and text. */
export class BaselineLinkExtractor extends LinkExtractorBase {
  readonly mode = 'baseline';

  async extract(engine: BrowserEngine, request: LinkRequest): Promise<LinkItem[]> {
    const { selector, document } = await this.resolveTarget(engine, request);
    const items = await this.readHandles(engine, selector, document.baseUrl, (href) => Boolean(href));
    this.logger.debug('links extracted', { selector, count: items.length });
    return items;
  }
}

/**
 * Mines list items matched by path-style selectors on a page snapshot and
 * falls back to every navigable anchor when a generalized query finds nothing.
 */
export class EnhancedLinkExtractor extends LinkExtractorBase {
  readonly mode = 'enhanced';

  constructor(
    generalizer: SelectorGeneralizer,
    private readonly fields: FieldExtractor,
    logger: Logger,
  ) {
    super(generalizer, logger);
  }

  async extract(engine: BrowserEngine, request: LinkRequest): Promise<LinkItem[]> {
    const { selector, document } = await this.resolveTarget(engine, request);

    let items: LinkItem[];
    if (classifySelector(selector) === 'xpath') {
      items = document
        .select(selector)
        .map((node) => this.fromNode(node, document.baseUrl))
        .filter((item): item is LinkItem => item !== undefined);
    } else {
      items = await this.readHandles(engine, selector, document.baseUrl, isNavigableHref);
    }

    if (items.length === 0 && request.generalize) {
      this.logger.warn('no links matched, falling back to all page anchors', { selector });
      items = document
        .select('a[href]')
        .map((anchor) => this.fromAnchor(anchor, document.baseUrl))
        .filter((item): item is LinkItem => item !== undefined);
    }

    const unique = dedupe(items);
    this.logger.debug('links extracted', { selector, count: unique.length });
    return unique;
  }

  private fromNode(node: HtmlNode, baseUrl: string): LinkItem | undefined {
    const anchor = node.tagName === 'a' ? node : node.find('a[href]')[0];
    const href = anchor?.attr('href');
    if (!isNavigableHref(href)) return undefined;

    const fields = this.fields.extractFields(node.outerHtml(), {}, baseUrl);
    const item: LinkItem = {
      href: toAbsoluteUrl(href.trim(), baseUrl) ?? href.trim(),
      text: typeof fields.title === 'string' ? fields.title : node.text().trim(),
    };
    if (typeof fields.date === 'string') item.date = fields.date;
    return item;
  }

  private fromAnchor(anchor: HtmlNode, baseUrl: string): LinkItem | undefined {
    const href = anchor.attr('href');
    if (!isNavigableHref(href)) return undefined;
    return { href: toAbsoluteUrl(href.trim(), baseUrl) ?? href.trim(), text: anchor.text().trim() };
  }
}

function dedupe(items: LinkItem[]): LinkItem[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    if (seen.has(item.href)) return false;
    seen.add(item.href);
    return true;
  });
}

export interface LinkExtractorDeps {
  generalizer: SelectorGeneralizer;
  fields: FieldExtractor;
  logger: Logger;
}

export function createLinkExtractor(mode: LinkExtractionMode, deps: LinkExtractorDeps): LinkExtractionStrategy {
  return mode === 'enhanced'
    ? new EnhancedLinkExtractor(deps.generalizer, deps.fields, deps.logger)
    : new BaselineLinkExtractor(deps.generalizer, deps.logger);
}
