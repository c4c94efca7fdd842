export const TIMEOUTS = {
  NAVIGATION_MS: 30_000,
  WAIT_MS: 1_000,
  FETCH_MS: 30_000,
} as const;

export const OUTPUT = {
  DIRECTORY: 'output',
  RUNS_SUBDIRECTORY: 'runs',
} as const;

export const CRAWLER = {
  DELAY_MS: 2_000,
  MAX_RETRIES: 3,
  MAX_URLS: 100,
} as const;

export const SESSION = {
  HEADLESS: true,
  LINK_EXTRACTION: 'baseline',
} as const;

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';
