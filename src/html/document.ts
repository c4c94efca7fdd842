import { load, type CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { XPathEvaluator } from './xpath.js';
import { classifySelector, stripSelectorPrefix } from './selector-kind.js';

export interface HtmlNode {
  readonly tagName: string;
  attr(name: string): string | undefined;
  classList(): string[];
  text(): string;
  innerHtml(): string;
  outerHtml(): string;
  parent(): HtmlNode | null;
  /** CSS query scoped to this node's descendants. */
  find(selector: string): HtmlNode[];
}

export interface HtmlDocument {
  readonly baseUrl: string;
  /** Accepts CSS or path-style selectors; throws on a malformed selector. */
  select(selector: string): HtmlNode[];
  selectFirst(selector: string): HtmlNode | undefined;
  title(): string | undefined;
  html(): string;
}

class CheerioNode implements HtmlNode {
  constructor(
    private readonly $: CheerioAPI,
    private readonly element: Element,
  ) {}

  get tagName(): string {
    return this.element.tagName.toLowerCase();
  }

  attr(name: string): string | undefined {
    return this.$(this.element).attr(name);
  }

  classList(): string[] {
    return (this.attr('class') ?? '').split(/\s+/).filter((c) => c.length > 0);
  }

  text(): string {
    return this.$(this.element).text();
  }

  innerHtml(): string {
    return this.$(this.element).html() ?? '';
  }

  outerHtml(): string {
    return this.$.html(this.element);
  }

  parent(): HtmlNode | null {
    const parent = this.element.parent;
    return parent && isTag(parent) ? new CheerioNode(this.$, parent) : null;
  }

  find(selector: string): HtmlNode[] {
    return this.$(this.element)
      .find(selector)
      .toArray()
      .map((el) => new CheerioNode(this.$, el));
  }
}

class CheerioDocument implements HtmlDocument {
  private readonly $: CheerioAPI;
  private xpath?: XPathEvaluator;

  constructor(
    private readonly source: string,
    readonly baseUrl: string,
  ) {
    this.$ = load(source);
  }

  select(selector: string): HtmlNode[] {
    const expression = stripSelectorPrefix(selector);
    if (classifySelector(selector) === 'xpath') {
      this.xpath ??= new XPathEvaluator(this.source);
      return this.xpath.evaluate(expression);
    }
    return this.$(expression)
      .toArray()
      .filter((node): node is Element => isTag(node))
      .map((el) => new CheerioNode(this.$, el));
  }

  selectFirst(selector: string): HtmlNode | undefined {
    return this.select(selector)[0];
  }

  title(): string | undefined {
    const title = this.$('title').first().text().trim();
    return title.length > 0 ? title : undefined;
  }

  html(): string {
    return this.source;
  }
}

export function parseHtml(html: string, baseUrl = ''): HtmlDocument {
  return new CheerioDocument(html, baseUrl);
}

/** Returns new markup with every subtree matching `selectors` removed. */
export function stripSubtrees(html: string, selectors: readonly string[]): string {
  if (selectors.length === 0) return html;
  const $ = load(html, null, false);
  for (const selector of selectors) {
    $(selector).remove();
  }
  return $.html();
}
