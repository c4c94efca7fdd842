import type { HtmlDocument, HtmlNode } from '../html/document.js';
import { classifySelector, stripSelectorPrefix } from '../html/selector-kind.js';
import type { Logger } from '../logging/logger.js';
import type {
  GeneralizationResult,
  GeneralizationStrategy,
  SelectorCandidate,
  SelectorKind,
} from '../types/index.js';

interface Proposal {
  selector: string;
  confidence: number;
  strategy: GeneralizationStrategy;
}

const CONFIDENCE: Record<GeneralizationStrategy, number> = {
  'tag-class': 0.9,
  'numeric-suffix': 0.85,
  'class-only': 0.8,
  'path-truncation': 0.8,
  'parent-child': 0.7,
  'pseudo-class': 0.7,
  'tag-only': 0.6,
};

// Parents this generic produce a selector no better than tag-only.
const ROOT_TAGS = new Set(['html', 'body']);

const SAFE_IDENTIFIER = /^[A-Za-z_][\w-]*$/;
const CSS_NUMBERED_TOKEN = /([.#])([A-Za-z_][\w-]*?[-_])\d+(?![\w-])/g;
const CSS_NUMBERED_ATTRIBUTE = /\[([\w-]+)\s*=\s*(["'])([^"']*?[-_])\d+\2\s*\]/g;
const XPATH_NUMBERED_ATTRIBUTE = /@([\w-]+)\s*=\s*(["'])([^"']*?[-_])\d+\2/g;
const NUMBERED_ID = /^(.*[-_])\d+$/;
const PSEUDO_CLASS = /::?[\w-]+(\([^)]*\))?/g;
const POSITIONAL_PREDICATE = /\[\d+\]/g;

function propose(strategy: GeneralizationStrategy, selector: string): Proposal {
  return { selector, strategy, confidence: CONFIDENCE[strategy] };
}

function xpathHasClass(cls: string): string {
  return `contains(concat(' ', normalize-space(@class), ' '), ' ${cls} ')`;
}

/**
 * Turns a selector that matches one sample element into a broader selector
 * that matches its repeated siblings. Candidates must match more than one
 * node; the winner has the highest match count, ties broken by confidence.
 */
export class SelectorGeneralizer {
  constructor(private readonly logger: Logger) {}

  generalize(document: HtmlDocument, sample: string): GeneralizationResult {
    const selectorType = classifySelector(sample);
    const expression = stripSelectorPrefix(sample);

    let sampleNodes: HtmlNode[];
    try {
      sampleNodes = document.select(sample);
    } catch (error) {
      return this.failure(sample, selectorType, `invalid selector: ${error instanceof Error ? error.message : String(error)}`);
    }

    const node = sampleNodes[0];
    if (!node) {
      return this.failure(sample, selectorType, 'sample selector matched no element');
    }

    const proposals =
      selectorType === 'xpath' ? this.xpathProposals(expression, node) : this.cssProposals(expression, node);
    let candidates = this.qualify(document, proposals);

    if (candidates.length === 0) {
      const tagOnly = propose('tag-only', selectorType === 'xpath' ? `//${node.tagName}` : node.tagName);
      candidates = this.qualify(document, [tagOnly]);
    }

    const best = candidates[0];
    if (!best) {
      return this.failure(sample, selectorType, 'no candidate selector matched more than one element', sampleNodes.length);
    }

    this.logger.debug('generalized selector', { sample, selector: best.selector, count: best.count, strategy: best.strategy });
    return {
      success: true,
      originalSelector: sample,
      generalizedSelector: best.selector,
      selectorType: classifySelector(best.selector),
      matchedCount: best.count,
      candidates,
    };
  }

  private cssProposals(expression: string, node: HtmlNode): Proposal[] {
    const tag = node.tagName;
    const classes = node.classList().filter((cls) => SAFE_IDENTIFIER.test(cls));
    const proposals: Proposal[] = [];

    for (const cls of classes) {
      proposals.push(propose('tag-class', `${tag}.${cls}`));
      proposals.push(propose('class-only', `.${cls}`));
    }

    const parent = node.parent();
    if (parent && !ROOT_TAGS.has(parent.tagName)) {
      proposals.push(propose('parent-child', `${parent.tagName} ${tag}`));
    }

    for (const match of expression.matchAll(CSS_NUMBERED_TOKEN)) {
      const attribute = match[1] === '.' ? 'class' : 'id';
      proposals.push(propose('numeric-suffix', replaceAt(expression, match, `[${attribute}^="${match[2]}"]`)));
    }
    for (const match of expression.matchAll(CSS_NUMBERED_ATTRIBUTE)) {
      proposals.push(propose('numeric-suffix', replaceAt(expression, match, `[${match[1]}^="${match[3]}"]`)));
    }
    const idPrefix = NUMBERED_ID.exec(node.attr('id') ?? '');
    if (idPrefix) {
      proposals.push(propose('numeric-suffix', `${tag}[id^="${idPrefix[1]}"]`));
    }

    const withoutPseudo = expression.replace(PSEUDO_CLASS, '').trim();
    if (withoutPseudo.length > 0 && withoutPseudo !== expression) {
      proposals.push(propose('pseudo-class', withoutPseudo));
    }

    return proposals;
  }

  private xpathProposals(expression: string, node: HtmlNode): Proposal[] {
    const tag = node.tagName;
    const classes = node.classList().filter((cls) => SAFE_IDENTIFIER.test(cls));
    const proposals: Proposal[] = [];

    for (const cls of classes) {
      proposals.push(propose('tag-class', `//${tag}[${xpathHasClass(cls)}]`));
      proposals.push(propose('class-only', `//*[${xpathHasClass(cls)}]`));
    }

    const parent = node.parent();
    if (parent && !ROOT_TAGS.has(parent.tagName)) {
      proposals.push(propose('parent-child', `//${parent.tagName}//${tag}`));
    }

    for (const match of expression.matchAll(XPATH_NUMBERED_ATTRIBUTE)) {
      proposals.push(
        propose('numeric-suffix', replaceAt(expression, match, `starts-with(@${match[1]}, '${match[3]}')`)),
      );
    }
    const idPrefix = NUMBERED_ID.exec(node.attr('id') ?? '');
    if (idPrefix) {
      proposals.push(propose('numeric-suffix', `//${tag}[starts-with(@id, '${idPrefix[1]}')]`));
    }

    proposals.push(...truncatePath(expression));
    return proposals;
  }

  private qualify(document: HtmlDocument, proposals: Proposal[]): SelectorCandidate[] {
    const bySelector = new Map<string, SelectorCandidate>();
    for (const proposal of proposals) {
      const existing = bySelector.get(proposal.selector);
      if (existing && existing.confidence >= proposal.confidence) continue;

      let count: number;
      try {
        count = existing?.count ?? document.select(proposal.selector).length;
      } catch (error) {
        this.logger.debug('candidate selector rejected', {
          selector: proposal.selector,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }
      if (count > 1) {
        bySelector.set(proposal.selector, { ...proposal, count });
      }
    }

    return [...bySelector.values()].sort((a, b) => b.count - a.count || b.confidence - a.confidence);
  }

  private failure(sample: string, selectorType: SelectorKind, error: string, matchedCount = 0): GeneralizationResult {
    this.logger.warn('selector generalization failed', { sample, error });
    return {
      success: false,
      originalSelector: sample,
      generalizedSelector: sample,
      selectorType,
      matchedCount,
      candidates: [],
      error,
    };
  }
}

function replaceAt(source: string, match: RegExpMatchArray, replacement: string): string {
  const index = match.index ?? source.indexOf(match[0]);
  return source.slice(0, index) + replacement + source.slice(index + match[0].length);
}

/** Drops positional predicates and re-roots an absolute path as document-relative. */
function truncatePath(expression: string): Proposal[] {
  if (!/\[\d+\]/.test(expression) || !expression.startsWith('/')) return [];

  const segments = expression.split('/').filter((segment) => segment.length > 0);
  const lastIndexed = segments.reduce((found, segment, i) => (/\[\d+\]/.test(segment) ? i : found), -1);
  const strip = (segment: string) => segment.replace(POSITIONAL_PREDICATE, '');

  const proposals = [propose('path-truncation', `//${segments.slice(lastIndexed).map(strip).join('/')}`)];
  const whole = `//${segments.map(strip).join('/')}`;
  if (whole !== proposals[0].selector) {
    proposals.push(propose('path-truncation', whole));
  }
  return proposals;
}
