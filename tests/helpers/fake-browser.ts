import { vi } from 'vitest';
import type { BrowserEngine, PageElement } from '../../src/engines/browser-engine.js';
import { parseHtml, type HtmlNode } from '../../src/html/document.js';

/**
 * In-process stand-in for a browser: pages are static HTML keyed by URL,
 * clicking an element with an href navigates to it.
 */
export class FakeBrowserEngine implements BrowserEngine {
  readonly visited: string[] = [];
  readonly clicked: string[] = [];
  private url = 'about:blank';

  readonly waitForNetworkIdle = vi.fn(async () => {});

  constructor(private readonly pages: Record<string, string>) {}

  async navigate(url: string): Promise<void> {
    if (!(url in this.pages)) {
      throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    }
    this.url = url;
    this.visited.push(url);
  }

  async currentUrl(): Promise<string> {
    return this.url;
  }

  async content(): Promise<string> {
    return this.pages[this.url] ?? '<html><body></body></html>';
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    const document = parseHtml(await this.content(), this.url);
    return document.select(selector).map((node) => this.handle(node));
  }

  private handle(node: HtmlNode): PageElement {
    return {
      getAttribute: async (name) => node.attr(name) ?? null,
      textContent: async () => node.text(),
      click: async () => {
        const href = node.attr('href');
        this.clicked.push(href ?? node.tagName);
        if (href) await this.navigate(new URL(href, this.url).toString());
      },
    };
  }
}
