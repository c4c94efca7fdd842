import { describe, it, expect } from 'vitest';
import { parseHtml, stripSubtrees } from '../../src/html/document.js';
import { classifySelector, stripSelectorPrefix } from '../../src/html/selector-kind.js';
import { TurndownMarkdownConverter } from '../../src/html/markdown.js';
import { isFollowableHref, isNavigableHref, matchesPatterns, toAbsoluteUrl } from '../../src/html/urls.js';

const PAGE = `<!doctype html>
<html>
  <head><title> Listing </title></head>
  <body>
    <ul id="items">
      <li class="card card-1"><a href="/p/1">First</a></li>
      <li class="card card-2"><a href="/p/2">Second</a></li>
    </ul>
    <div class="meta"><span data-id="x-1">tag</span></div>
  </body>
</html>`;

describe('classifySelector', () => {
  it.each([
    ['div.card', 'css'],
    ['//div', 'xpath'],
    ['./a', 'xpath'],
    ['(//a)[1]', 'xpath'],
    ['xpath=div/a', 'xpath'],
    ['css=//weird', 'css'],
  ])('classifies %s as %s', (selector, kind) => {
    expect(classifySelector(selector)).toBe(kind);
  });

  it('strips engine prefixes', () => {
    expect(stripSelectorPrefix(' xpath=//a ')).toBe('//a');
    expect(stripSelectorPrefix('css=li > a')).toBe('li > a');
    expect(stripSelectorPrefix('li > a')).toBe('li > a');
  });
});

describe('parseHtml', () => {
  const doc = parseHtml(PAGE, 'http://x/');

  it('selects with CSS', () => {
    const anchors = doc.select('li.card > a');
    expect(anchors.map((a) => a.attr('href'))).toEqual(['/p/1', '/p/2']);
    expect(anchors[0].text()).toBe('First');
    expect(anchors[0].tagName).toBe('a');
  });

  it('selects with path expressions', () => {
    const anchors = doc.select('//ul[@id="items"]/li/a');
    expect(anchors.map((a) => a.text())).toEqual(['First', 'Second']);
    expect(doc.select('xpath=//span')[0].attr('data-id')).toBe('x-1');
  });

  it('exposes node structure', () => {
    const item = doc.selectFirst('li.card-2');
    expect(item?.classList()).toEqual(['card', 'card-2']);
    expect(item?.parent()?.attr('id')).toBe('items');
    expect(item?.find('a').map((a) => a.text())).toEqual(['Second']);
    expect(item?.innerHtml()).toBe('<a href="/p/2">Second</a>');
    expect(item?.outerHtml()).toBe('<li class="card card-2"><a href="/p/2">Second</a></li>');
  });

  it('reads the trimmed document title', () => {
    expect(doc.title()).toBe('Listing');
    expect(parseHtml('<p>no title</p>').title()).toBeUndefined();
  });

  it('returns nothing for unmatched selectors', () => {
    expect(doc.select('table')).toEqual([]);
    expect(doc.selectFirst('//table')).toBeUndefined();
  });

  it('keeps the base URL and source', () => {
    expect(doc.baseUrl).toBe('http://x/');
    expect(doc.html()).toBe(PAGE);
  });
});

describe('stripSubtrees', () => {
  it('removes every matching subtree', () => {
    const html = '<div><p>keep</p><aside>drop</aside><p class="ad">drop too</p></div>';
    expect(stripSubtrees(html, ['aside', '.ad'])).toBe('<div><p>keep</p></div>');
  });

  it('returns the input when nothing is removed', () => {
    expect(stripSubtrees('<p>x</p>', [])).toBe('<p>x</p>');
  });
});

describe('TurndownMarkdownConverter', () => {
  const converter = new TurndownMarkdownConverter();

  it('converts headings and inline emphasis', () => {
    expect(converter.toMarkdown('<h1>Title</h1><p>Hello <strong>world</strong></p>')).toBe(
      '# Title\n\nHello **world**',
    );
  });

  it('drops scripts and styles', () => {
    expect(converter.toMarkdown('<p>Body</p><script>alert(1)</script><style>p{}</style>')).toBe('Body');
  });

  it('returns an empty string for blank input', () => {
    expect(converter.toMarkdown('   ')).toBe('');
  });
});

describe('url helpers', () => {
  it('resolves relative links against a base', () => {
    expect(toAbsoluteUrl('/p/1', 'http://x/list')).toBe('http://x/p/1');
    expect(toAbsoluteUrl('http://y/a', '')).toBe('http://y/a');
    expect(toAbsoluteUrl('relative', '')).toBeUndefined();
  });

  it('filters links that cannot be followed', () => {
    expect(isFollowableHref('#top')).toBe(false);
    expect(isFollowableHref('javascript:void(0)')).toBe(false);
    expect(isFollowableHref('mailto:a@b.c')).toBe(true);
    expect(isNavigableHref('mailto:a@b.c')).toBe(false);
    expect(isNavigableHref('tel:123')).toBe(false);
    expect(isNavigableHref('/p/1')).toBe(true);
    expect(isFollowableHref(undefined)).toBe(false);
  });

  it('applies include and exclude patterns', () => {
    expect(matchesPatterns('http://x/post/1', [/\/post\//], [])).toBe(true);
    expect(matchesPatterns('http://x/tag/1', [/\/post\//], [])).toBe(false);
    expect(matchesPatterns('http://x/post/1?draft', [], [/draft/])).toBe(false);
    expect(matchesPatterns('http://x/anything', [], [])).toBe(true);
  });
});
