import { parseHtml, type HtmlDocument, type HtmlNode } from '../html/document.js';
import { isFollowableHref, toAbsoluteUrl } from '../html/urls.js';
import type { Logger } from '../logging/logger.js';

export type FieldValue = string | string[];
export type FieldMap = Record<string, FieldValue>;

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const DATE_IN_TEXT = /\d{4}[-/.]\d{1,2}[-/.]\d{1,2}/;
const DATE_CLASS = /date|time|published|modified/i;
const CONTENT_CLASS = /content|body|article/i;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function format(year: number, month: number, day: number): string | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;
  return `${year}-${pad(month)}-${pad(day)}`;
}

function monthNumber(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

/** Normalizes common date spellings to YYYY-MM-DD; unknown formats pass through trimmed. */
export function normalizeDate(value: string): string {
  const text = value.trim();
  let match: RegExpExecArray | null;

  if ((match = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T\s].*)?$/.exec(text))) {
    return format(Number(match[1]), Number(match[2]), Number(match[3])) ?? text;
  }
  if ((match = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/.exec(text))) {
    return format(Number(match[3]), Number(match[2]), Number(match[1])) ?? text;
  }
  if ((match = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(text))) {
    const month = monthNumber(match[1]);
    return (month && format(Number(match[3]), month, Number(match[2]))) || text;
  }
  if ((match = /^(\d{1,2})\s+([A-Za-z]+)\.?,?\s+(\d{4})$/.exec(text))) {
    const month = monthNumber(match[2]);
    return (month && format(Number(match[3]), month, Number(match[1]))) || text;
  }
  if ((match = /^(\d{4})年(\d{1,2})月(\d{1,2})日/.exec(text))) {
    return format(Number(match[1]), Number(match[2]), Number(match[3])) ?? text;
  }
  return text;
}

/**
 * Mines named fields out of an HTML fragment, either by rules
 * (`css:`, `xpath:`, `regex:` or a bare tag name) or, with no rules, by
 * recognizing common markup for url, title, date, content, summary, author
 * and image.
 */
export class FieldExtractor {
  constructor(private readonly logger: Logger) {}

  extractFields(html: string, mapping: Record<string, string> = {}, baseUrl = ''): FieldMap {
    const document = parseHtml(html, baseUrl);
    const entries = Object.entries(mapping);
    const fields: FieldMap = {};

    if (entries.length === 0) {
      this.autoExtract(document, fields);
      return fields;
    }

    for (const [field, rule] of entries) {
      try {
        const value = this.applyRule(document, field, rule);
        if (value !== undefined && value.length > 0) fields[field] = value;
      } catch (error) {
        this.logger.debug('field rule failed', {
          field,
          rule,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return fields;
  }

  private applyRule(document: HtmlDocument, field: string, rule: string): FieldValue | undefined {
    if (rule.startsWith('regex:')) {
      const match = new RegExp(rule.slice('regex:'.length)).exec(document.selectFirst('body')?.text() ?? '');
      if (!match) return undefined;
      const value = (match[1] ?? match[0]).trim();
      return field === 'date' ? normalizeDate(value) : value;
    }

    let selector = rule;
    if (rule.startsWith('css:')) selector = rule.slice('css:'.length);
    else if (rule.startsWith('xpath:')) selector = `xpath=${rule.slice('xpath:'.length)}`;

    const nodes = document.select(selector);
    const first = nodes[0];

    switch (field) {
      case 'url':
      case 'href':
      case 'link':
        return first ? this.absolute(first.attr('href'), document.baseUrl) : undefined;
      case 'image':
      case 'img':
        return first ? this.absolute(first.attr('src'), document.baseUrl) : undefined;
      case 'tags':
        return nodes.map((node) => node.text().trim()).filter((tag) => tag.length > 0);
      case 'date':
        return first ? normalizeDate(first.attr('datetime') ?? first.text()) : undefined;
      default:
        return first?.text().trim();
    }
  }

  private autoExtract(document: HtmlDocument, fields: FieldMap): void {
    const root = document.selectFirst('body > *');
    const link = root?.tagName === 'a' ? root : document.selectFirst('a[href]');

    const url = link ? this.absolute(link.attr('href'), document.baseUrl) : undefined;
    if (url) fields.url = url;

    const heading = document.selectFirst('h1, h2, h3, h4, h5, h6');
    const title = (heading ?? link)?.text().trim();
    if (title) fields.title = title;

    const date = this.findDate(document);
    if (date) fields.date = date;

    const content = this.firstWithClass(document, CONTENT_CLASS)?.text().trim();
    if (content) fields.content = content;

    const summary = document.selectFirst('.summary, .excerpt, .description, p')?.text().trim();
    if (summary) fields.summary = summary;

    const author = document.selectFirst('.author, [rel="author"], .byline')?.text().trim();
    if (author) fields.author = author;

    const image = document.selectFirst('img[src]');
    const src = image ? this.absolute(image.attr('src'), document.baseUrl) : undefined;
    if (src) fields.image = src;
  }

  private findDate(document: HtmlDocument): string | undefined {
    const node = this.firstWithClass(document, DATE_CLASS) ?? document.selectFirst('time');
    const raw = node ? (node.attr('datetime') ?? node.text()).trim() : '';
    if (raw) return normalizeDate(raw);

    const inText = DATE_IN_TEXT.exec(document.selectFirst('body')?.text() ?? '');
    return inText ? normalizeDate(inText[0]) : undefined;
  }

  private firstWithClass(document: HtmlDocument, pattern: RegExp): HtmlNode | undefined {
    return document.select('[class]').find((node) => node.classList().some((cls) => pattern.test(cls)));
  }

  private absolute(href: string | undefined, baseUrl: string): string | undefined {
    if (!isFollowableHref(href)) return undefined;
    return toAbsoluteUrl(href.trim(), baseUrl) ?? href.trim();
  }
}
