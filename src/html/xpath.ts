import { JSDOM } from 'jsdom';
import type { HtmlNode } from './document.js';

// XPathResult.ORDERED_NODE_SNAPSHOT_TYPE
const ORDERED_NODE_SNAPSHOT_TYPE = 7;
const ELEMENT_NODE = 1;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

class DomNode implements HtmlNode {
  constructor(private readonly element: Element) {}

  get tagName(): string {
    return this.element.tagName.toLowerCase();
  }

  attr(name: string): string | undefined {
    return this.element.getAttribute(name) ?? undefined;
  }

  classList(): string[] {
    return Array.from(this.element.classList);
  }

  text(): string {
    return this.element.textContent ?? '';
  }

  innerHtml(): string {
    return this.element.innerHTML;
  }

  outerHtml(): string {
    return this.element.outerHTML;
  }

  parent(): HtmlNode | null {
    const parent = this.element.parentElement;
    return parent ? new DomNode(parent) : null;
  }

  find(selector: string): HtmlNode[] {
    return Array.from(this.element.querySelectorAll(selector), (el) => new DomNode(el));
  }
}

/** Evaluates path-style selectors against a jsdom parse of the same markup. */
export class XPathEvaluator {
  private dom?: JSDOM;

  constructor(private readonly html: string) {}

  evaluate(expression: string): HtmlNode[] {
    const document = this.document();
    const snapshot = document.evaluate(expression, document, null, ORDERED_NODE_SNAPSHOT_TYPE, null);
    const nodes: HtmlNode[] = [];
    for (let i = 0; i < snapshot.snapshotLength; i++) {
      const node = snapshot.snapshotItem(i);
      if (node && isElement(node)) nodes.push(new DomNode(node));
    }
    return nodes;
  }

  private document(): Document {
    this.dom ??= new JSDOM(this.html);
    return this.dom.window.document;
  }
}
