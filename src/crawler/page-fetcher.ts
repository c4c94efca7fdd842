import { CRAWLER, TIMEOUTS } from '../config/defaults.js';
import type { Logger } from '../logging/logger.js';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

export interface PageFetcherOptions {
  logger: Logger;
  timeoutMs?: number;
  maxRetries?: number;
  /** Base delay between attempts; attempt n waits `delayMs * n`. */
  delayMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class PageFetcher {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly delayMs: number;
  private readonly userAgent?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: PageFetcherOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.FETCH_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? CRAWLER.MAX_RETRIES);
    this.delayMs = options.delayMs ?? CRAWLER.DELAY_MS;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /** Returns the page markup, or null once every attempt failed or the response is not HTML. */
  async fetchHtml(url: string): Promise<string | null> {
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.fetchOnce(url);
      } catch (error) {
        const retryable = !(error instanceof FetchError) || error.retryable;
        this.logger.warn('fetch failed', {
          url,
          attempt,
          maxRetries: this.maxRetries,
          error: error instanceof Error ? error.message : String(error),
        });
        if (!retryable) return null;
        if (attempt < this.maxRetries) {
          await this.sleep(this.delayMs * attempt);
        }
      }
    }
    return null;
  }

  private async fetchOnce(url: string): Promise<string> {
    const headers: Record<string, string> = { Accept: 'text/html,application/xhtml+xml' };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { headers, signal: controller.signal });
      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, url, response.status, response.status >= 500 || response.status === 429);
      }

      const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
      if (!HTML_CONTENT_TYPES.some((type) => contentType.includes(type))) {
        throw new FetchError(`unsupported content type "${contentType}"`, url, response.status, false);
      }
      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;

      if (error instanceof Error && error.name === 'AbortError') {
        throw new FetchError(`Request timed out after ${this.timeoutMs}ms`, url, 0, true);
      }

      throw new FetchError(error instanceof Error ? error.message : String(error), url, 0, true);
    } finally {
      clearTimeout(timeout);
    }
  }
}
