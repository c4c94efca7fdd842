const SKIPPED_SCHEMES = ['javascript:'];
const NON_NAVIGABLE_SCHEMES = ['javascript:', 'mailto:', 'tel:'];

export function toAbsoluteUrl(href: string, baseUrl: string): string | undefined {
  try {
    return baseUrl ? new URL(href, baseUrl).toString() : new URL(href).toString();
  } catch {
    return undefined;
  }
}

/** Empty values, in-page fragments and `javascript:` pseudo-links are not followed. */
export function isFollowableHref(href: string | undefined): href is string {
  if (!href) return false;
  const value = href.trim().toLowerCase();
  if (value.length === 0 || value.startsWith('#')) return false;
  return !SKIPPED_SCHEMES.some((scheme) => value.startsWith(scheme));
}

export function isNavigableHref(href: string | undefined): href is string {
  if (!isFollowableHref(href)) return false;
  const value = href.trim().toLowerCase();
  return !NON_NAVIGABLE_SCHEMES.some((scheme) => value.startsWith(scheme));
}

export function matchesPatterns(url: string, include: readonly RegExp[], exclude: readonly RegExp[]): boolean {
  if (include.length > 0 && !include.some((pattern) => pattern.test(url))) {
    return false;
  }
  return !exclude.some((pattern) => pattern.test(url));
}
