import { describe, it, expect } from 'vitest';
import { SelectorGeneralizer } from '../../src/engines/selector-generalizer.js';
import { parseHtml } from '../../src/html/document.js';
import { mockLogger } from '../helpers/logger.js';

const LISTING = `<html><body>
  <nav><a href="/">Home</a><a href="/about">About</a></nav>
  <ul class="list">
    <li class="card-1"><a href="/p/1">P1</a></li>
    <li class="card-2"><a href="/p/2">P2</a></li>
    <li class="card-3"><a href="/p/3">P3</a></li>
    <li class="card-4"><a href="/p/4">P4</a></li>
    <li class="card-5"><a href="/p/5">P5</a></li>
  </ul>
</body></html>`;

describe('SelectorGeneralizer', () => {
  it('replaces a numbered class with a prefix match', () => {
    const generalizer = new SelectorGeneralizer(mockLogger());
    const result = generalizer.generalize(parseHtml(LISTING), 'li.card-1 > a');

    expect(result.success).toBe(true);
    expect(result.originalSelector).toBe('li.card-1 > a');
    expect(result.generalizedSelector).toBe('li[class^="card-"] > a');
    expect(result.selectorType).toBe('css');
    expect(result.matchedCount).toBe(5);
    expect(result.candidates.map((c) => c.strategy)).toEqual(['numeric-suffix', 'parent-child']);
  });

  it('is stable when fed its own output', () => {
    const generalizer = new SelectorGeneralizer(mockLogger());
    const doc = parseHtml(LISTING);
    const first = generalizer.generalize(doc, 'li.card-1 > a');
    const second = generalizer.generalize(doc, first.generalizedSelector);

    expect(second.success).toBe(true);
    expect(second.matchedCount).toBe(first.matchedCount);
    expect(doc.select(second.generalizedSelector).map((n) => n.attr('href'))).toEqual(
      doc.select(first.generalizedSelector).map((n) => n.attr('href')),
    );
  });

  it('prefers tag and class over looser selectors with the same reach', () => {
    const doc = parseHtml(`<html><body><section>
      <div class="item">A</div><div class="item">B</div><div class="item">C</div>
    </section></body></html>`);
    const result = new SelectorGeneralizer(mockLogger()).generalize(doc, 'div.item');

    expect(result.generalizedSelector).toBe('div.item');
    expect(result.candidates[0]).toEqual({ selector: 'div.item', strategy: 'tag-class', confidence: 0.9, count: 3 });
  });

  it('picks the candidate that reaches the most elements', () => {
    const doc = parseHtml(`<html><body><section>
      <div class="item">A</div><div class="item">B</div><div class="other">C</div>
    </section></body></html>`);
    const result = new SelectorGeneralizer(mockLogger()).generalize(doc, 'div.item');

    expect(result.generalizedSelector).toBe('section div');
    expect(result.matchedCount).toBe(3);
  });

  it('offers the selector without pseudo-classes', () => {
    const doc = parseHtml('<html><body><ul><li>a</li><li>b</li><li>c</li></ul></body></html>');
    const result = new SelectorGeneralizer(mockLogger()).generalize(doc, 'ul > li:first-child');

    expect(result.success).toBe(true);
    expect(result.candidates).toContainEqual({ selector: 'ul > li', strategy: 'pseudo-class', confidence: 0.7, count: 3 });
  });

  it('ignores the body as a parent and falls back to the tag name', () => {
    const doc = parseHtml('<html><body><p id="lead">x</p><p>y</p></body></html>');
    const result = new SelectorGeneralizer(mockLogger()).generalize(doc, '#lead');

    expect(result.generalizedSelector).toBe('p');
    expect(result.candidates).toEqual([{ selector: 'p', strategy: 'tag-only', confidence: 0.6, count: 2 }]);
  });

  describe('path-style selectors', () => {
    const TABLE = `<html><body><section>
      <div id="row-1"><a href="/a">a</a></div>
      <div id="row-2"><a href="/b">b</a></div>
      <div id="row-3"><a href="/c">c</a></div>
    </section></body></html>`;

    it('drops positional predicates from an absolute path', () => {
      const result = new SelectorGeneralizer(mockLogger()).generalize(
        parseHtml(TABLE),
        '/html/body/section/div[1]/a',
      );

      expect(result.success).toBe(true);
      expect(result.selectorType).toBe('xpath');
      expect(result.generalizedSelector).toBe('//div/a');
      expect(result.matchedCount).toBe(3);
    });

    it('turns a numbered id into a starts-with test', () => {
      const result = new SelectorGeneralizer(mockLogger()).generalize(parseHtml(TABLE), '//div[@id="row-1"]');

      expect(result.generalizedSelector).toBe("//div[starts-with(@id, 'row-')]");
      expect(result.matchedCount).toBe(3);
    });
  });

  describe('failures', () => {
    it('returns the original selector when the sample matches nothing', () => {
      const logger = mockLogger();
      const result = new SelectorGeneralizer(logger).generalize(parseHtml(LISTING), 'table td');

      expect(result).toMatchObject({
        success: false,
        generalizedSelector: 'table td',
        matchedCount: 0,
        candidates: [],
        error: 'sample selector matched no element',
      });
      expect(logger.warn).toHaveBeenCalledWith('selector generalization failed', {
        sample: 'table td',
        error: 'sample selector matched no element',
      });
    });

    it('fails when nothing repeats', () => {
      const doc = parseHtml('<html><body><h1 id="solo">x</h1></body></html>');
      const result = new SelectorGeneralizer(mockLogger()).generalize(doc, '#solo');

      expect(result.success).toBe(false);
      expect(result.generalizedSelector).toBe('#solo');
      expect(result.matchedCount).toBe(1);
      expect(result.error).toBe('no candidate selector matched more than one element');
    });

    it('reports a malformed sample selector', () => {
      const result = new SelectorGeneralizer(mockLogger()).generalize(parseHtml(LISTING), 'li[');

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^invalid selector: /);
    });
  });
});
