import type { BrowserEngine } from '../engines/browser-engine.js';
import type { LinkExtractionStrategy, LinkItem } from '../engines/link-extractor.js';
import type { SchemaExtractor } from '../engines/schema-extractor.js';
import type { SelectorGeneralizer } from '../engines/selector-generalizer.js';
import { toRunError } from '../exception/classifier.js';
import { ConfigError, ExtractionError, IOError, NavigationError, SelectorError, describeCause } from '../exception/errors.js';
import { parseHtml, type HtmlDocument, type HtmlNode } from '../html/document.js';
import type { Logger } from '../logging/logger.js';
import { defaultSaveFilename, type OutputWriter } from '../output/output-writer.js';
import type {
  ActionDefinition,
  ActionResult,
  ClickAction,
  ContentRecord,
  ExtractContentAction,
  ExtractLinksAction,
  ForEachAction,
  SaveAction,
  VisitAction,
  WaitAction,
} from '../types/index.js';
import { hasUnresolvedReference } from '../workflow/variables.js';
import type { ActionScope, RunContext } from './run-context.js';

export const CURRENT_ITEM = 'current_item';

const OK: ActionResult = { ok: true };

export interface ActionExecutorDeps {
  engine: BrowserEngine;
  generalizer: SelectorGeneralizer;
  extractor: SchemaExtractor;
  links: LinkExtractionStrategy;
  writer: OutputWriter;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Unresolved references stay in the data verbatim and still count as data.
function isEmptyData(value: unknown): boolean {
  if (value === null || value === undefined || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  return isRecord(value) && Object.keys(value).length === 0;
}

function readValue(node: HtmlNode, attribute: string): string | null {
  switch (attribute.toLowerCase()) {
    case 'text':
      return node.text().trim();
    case 'html':
      return node.innerHtml().trim();
    case 'outerhtml':
      return node.outerHtml();
    default:
      return node.attr(attribute)?.trim() ?? null;
  }
}

function mergeLinks(existing: unknown, incoming: LinkItem[]): LinkItem[] {
  const merged: LinkItem[] = Array.isArray(existing) ? existing.filter(isLinkItem) : [];
  const seen = new Set(merged.map((item) => item.href));
  for (const item of incoming) {
    if (seen.has(item.href)) continue;
    seen.add(item.href);
    merged.push(item);
  }
  return merged;
}

function isLinkItem(value: unknown): value is LinkItem {
  return isRecord(value) && typeof value.href === 'string' && typeof value.text === 'string';
}

export class ActionExecutor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly deps: ActionExecutorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async execute(action: ActionDefinition, context: RunContext, scope: ActionScope): Promise<ActionResult> {
    let result: ActionResult;
    try {
      result = await this.dispatch(action, context, scope);
    } catch (error) {
      result = { ok: false, error: toRunError(error) };
    }

    if (!result.ok && !result.divertTo && action.next) {
      this.deps.logger.warn('action failed, continuing at its declared step', {
        step: scope.stepId,
        action: action.kind,
        next: action.next,
        error: result.error?.message,
      });
      return { ...result, divertTo: action.next };
    }
    return result;
  }

  /** Runs actions in order, stopping at the first failure. */
  async executeAll(actions: readonly ActionDefinition[], context: RunContext, scope: ActionScope): Promise<ActionResult> {
    for (const action of actions) {
      const result = await this.execute(action, context, scope);
      if (!result.ok) return result;
    }
    return OK;
  }

  /** Binds each item of a resolved sequence to `current_item` and runs the actions for it. */
  async iterate(
    itemsRef: unknown,
    actions: readonly ActionDefinition[],
    context: RunContext,
    scope: ActionScope,
  ): Promise<ActionResult & { iterations: number }> {
    const items = context.state.resolve(itemsRef);
    if (!Array.isArray(items) || items.length === 0) {
      const shown = typeof itemsRef === 'string' ? itemsRef : JSON.stringify(itemsRef);
      return {
        ok: false,
        iterations: 0,
        error: new ExtractionError(`for_each items ${shown} did not resolve to a non-empty list`).toRunError(),
      };
    }

    const previous = context.state.has(CURRENT_ITEM) ? context.state.get(CURRENT_ITEM) : undefined;
    let iterations = 0;
    try {
      for (const item of items) {
        context.state.set(CURRENT_ITEM, item);
        const result = await this.executeAll(actions, context, scope);
        iterations++;
        if (!result.ok) return { ...result, iterations };
      }
    } finally {
      context.state.set(CURRENT_ITEM, previous);
    }
    return { ok: true, iterations };
  }

  private async dispatch(action: ActionDefinition, context: RunContext, scope: ActionScope): Promise<ActionResult> {
    switch (action.kind) {
      case 'visit':
        await this.visit(action, context);
        return OK;
      case 'extract':
        if (action.target === 'links') {
          await this.extractLinks(action, context, scope);
        } else {
          await this.extractContent(action, context);
        }
        return OK;
      case 'save':
        await this.save(action, context);
        return OK;
      case 'click':
        await this.click(action, context);
        return OK;
      case 'wait':
        await this.wait(action, context);
        return OK;
      case 'for_each':
        return this.forEach(action, context, scope);
    }
  }

  private async visit(action: VisitAction, context: RunContext): Promise<void> {
    const resolved = context.state.resolve(action.url);
    let url =
      typeof resolved === 'string' && resolved.trim().length > 0 && !hasUnresolvedReference(resolved)
        ? resolved.trim()
        : undefined;

    if (!url) {
      const item = context.state.get(CURRENT_ITEM);
      if (isRecord(item) && typeof item.href === 'string' && item.href.length > 0) {
        url = item.href;
      }
    }
    if (!url) {
      throw new ConfigError(`visit has no url${action.url ? ` ("${action.url}" did not resolve)` : ''} and current_item has no href`);
    }

    this.deps.logger.info('visiting page', { url });
    try {
      await this.deps.engine.navigate(url);
    } catch (error) {
      throw error instanceof NavigationError ? error : new NavigationError(url, error);
    }
  }

  private async snapshot(): Promise<HtmlDocument> {
    const url = await this.deps.engine.currentUrl();
    return parseHtml(await this.deps.engine.content(), url);
  }

  private async extractLinks(action: ExtractLinksAction, context: RunContext, scope: ActionScope): Promise<void> {
    let items: LinkItem[];
    if (action.element) {
      items = await this.deps.links.extract(this.deps.engine, action.element);
    } else if (action.schema) {
      const urls = this.deps.extractor.extractUrls(await this.snapshot(), action.schema);
      items = [...urls].map((href) => ({ href, text: '' }));
    } else {
      items = [];
    }

    this.deps.logger.info('extracted links', { step: scope.stepId, page: scope.pageNumber, count: items.length });
    if (!action.output) return;

    // Later pagination pages add to the first page's links.
    const value = scope.pageNumber > 1 ? mergeLinks(context.state.get(action.output), items) : items;
    context.state.set(action.output, value);
  }

  private async extractContent(action: ExtractContentAction, context: RunContext): Promise<void> {
    const document = await this.snapshot();
    const record: ContentRecord = action.schema ? this.deps.extractor.extractContent(document, action.schema) : {};

    if (action.elements.shape === 'samples') {
      for (const item of action.elements.items) {
        let selector = item.sample;
        if (item.generalize) {
          const generalized = this.deps.generalizer.generalize(document, item.sample);
          if (generalized.success) selector = generalized.generalizedSelector;
        }
        const node = this.selectField(document, item.name, selector);
        record[item.name] = node ? node.text().trim() : '';
      }
    } else {
      for (const field of action.elements.fields) {
        const node = this.selectField(document, field.name, field.selector);
        record[field.name] = node ? readValue(node, field.attribute) : null;
      }
    }

    record.url = document.baseUrl;
    record.timestamp = this.now().toISOString();
    context.state.set(action.output, record);
    this.deps.logger.debug('extracted content', { output: action.output, fields: Object.keys(record).length });
  }

  /** A selector that cannot be parsed costs only its own field. */
  private selectField(document: HtmlDocument, field: string, selector: string): HtmlNode | undefined {
    try {
      return document.selectFirst(selector);
    } catch (error) {
      this.deps.logger.warn('field selector failed', { field, selector, error: describeCause(error) });
      return undefined;
    }
  }

  private async save(action: SaveAction, context: RunContext): Promise<void> {
    const data = context.state.resolve(action.data);
    if (isEmptyData(data)) {
      const shown = typeof action.data === 'string' ? action.data : JSON.stringify(action.data);
      throw new ExtractionError(`save has no data (${shown ?? 'undefined'} resolved to nothing)`);
    }

    if (action.format) {
      const resolvedName = action.filename ? context.state.resolve(action.filename) : undefined;
      const filename =
        resolvedName === undefined ? defaultSaveFilename(action.format, this.now()) : String(resolvedName);
      if (hasUnresolvedReference(filename)) {
        this.deps.logger.warn('save filename still contains an unresolved reference', { filename });
      }

      try {
        const path = await this.deps.writer.writeSaveFile(filename, data, action.format);
        this.deps.logger.info('saved file', { path, format: action.format });
      } catch (error) {
        if (!(error instanceof IOError)) throw error;
        this.deps.logger.error(error.message, { kind: error.kind });
      }
    }

    if (Array.isArray(data)) {
      context.outputs.push(...data);
    } else {
      context.outputs.push(data);
    }
  }

  private async click(action: ClickAction, context: RunContext): Promise<void> {
    const selector = String(context.state.resolve(action.element));
    const [element] = await this.deps.engine.querySelectorAll(selector);
    if (!element) {
      throw new SelectorError(selector);
    }
    await element.click();
    await this.deps.engine.waitForNetworkIdle();
  }

  private async wait(action: WaitAction, context: RunContext): Promise<void> {
    const resolved = context.state.resolve(action.timeoutMs);
    const ms = typeof resolved === 'number' ? resolved : Number(resolved);
    if (!Number.isFinite(ms) || ms < 0) {
      throw new ConfigError(`wait duration "${String(resolved)}" is not a number of milliseconds`);
    }
    await this.sleep(ms);
  }

  private async forEach(action: ForEachAction, context: RunContext, scope: ActionScope): Promise<ActionResult> {
    const { iterations, ...result } = await this.iterate(action.items, action.actions, context, scope);
    this.deps.logger.debug('for_each finished', { step: scope.stepId, iterations });
    return result;
  }
}
