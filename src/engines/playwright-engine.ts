import { chromium, type Browser } from 'playwright';
import { NavigationError } from '../exception/errors.js';
import { classifySelector, stripSelectorPrefix } from '../html/selector-kind.js';
import type { Logger } from '../logging/logger.js';
import type { SessionConfig } from '../types/index.js';
import type { BrowserEngine, PageElement } from './browser-engine.js';

export interface PlaywrightElementHandle {
  getAttribute(name: string): Promise<string | null>;
  textContent(): Promise<string | null>;
  click(): Promise<void>;
}

export interface PlaywrightPage {
  goto(
    url: string,
    options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit'; timeout?: number },
  ): Promise<unknown>;
  waitForLoadState(state?: 'load' | 'domcontentloaded' | 'networkidle', options?: { timeout?: number }): Promise<void>;
  $$(selector: string): Promise<PlaywrightElementHandle[]>;
  url(): string;
  content(): Promise<string>;
}

/** Path-style selectors need Playwright's explicit `xpath=` engine prefix. */
export function toPlaywrightSelector(selector: string): string {
  const expression = stripSelectorPrefix(selector);
  return classifySelector(selector) === 'xpath' ? `xpath=${expression}` : expression;
}

export class PlaywrightEngine implements BrowserEngine {
  constructor(private readonly page: PlaywrightPage) {}

  async navigate(url: string): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'load' });
      await this.page.waitForLoadState('networkidle');
    } catch (error) {
      throw new NavigationError(url, error);
    }
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    return this.page.$$(toPlaywrightSelector(selector));
  }

  async waitForNetworkIdle(): Promise<void> {
    await this.page.waitForLoadState('networkidle');
  }
}

/** One browser, context and page per workflow run. */
export class PlaywrightSession {
  private constructor(
    private readonly browser: Browser,
    readonly engine: BrowserEngine,
    private readonly logger: Logger,
  ) {}

  static async launch(config: SessionConfig, logger: Logger): Promise<PlaywrightSession> {
    const browser = await chromium.launch({
      headless: config.headless,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
    try {
      const context = await browser.newContext(config.userAgent ? { userAgent: config.userAgent } : {});
      const page = await context.newPage();
      page.setDefaultTimeout(config.timeoutMs);
      page.setDefaultNavigationTimeout(config.timeoutMs);
      logger.debug('browser session started', { headless: config.headless });
      return new PlaywrightSession(browser, new PlaywrightEngine(page), logger);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
    this.logger.debug('browser session closed');
  }
}
