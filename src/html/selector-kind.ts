import type { SelectorKind } from '../types/index.js';

const PATH_PREFIXES = ['/', './', '('];

/** Strips an explicit `xpath=` or `css=` engine prefix. */
export function stripSelectorPrefix(selector: string): string {
  const trimmed = selector.trim();
  if (/^xpath=/i.test(trimmed)) return trimmed.slice('xpath='.length);
  if (/^css=/i.test(trimmed)) return trimmed.slice('css='.length);
  return trimmed;
}

export function classifySelector(selector: string): SelectorKind {
  const trimmed = selector.trim();
  if (/^xpath=/i.test(trimmed)) return 'xpath';
  if (/^css=/i.test(trimmed)) return 'css';
  return PATH_PREFIXES.some((prefix) => trimmed.startsWith(prefix)) ? 'xpath' : 'css';
}
