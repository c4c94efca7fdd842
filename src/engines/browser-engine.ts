export interface PageElement {
  getAttribute(name: string): Promise<string | null>;
  textContent(): Promise<string | null>;
  click(): Promise<void>;
}

/** Page-automation capability consumed by the workflow engine. */
export interface BrowserEngine {
  /** Navigates and waits for network quiescence. */
  navigate(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  content(): Promise<string>;
  /** Accepts CSS or path-style selectors. */
  querySelectorAll(selector: string): Promise<PageElement[]>;
  waitForNetworkIdle(): Promise<void>;
}
