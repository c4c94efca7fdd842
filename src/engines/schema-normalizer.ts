import type { ZodType, ZodTypeDef } from 'zod';
import { ConfigError } from '../exception/errors.js';
import { classifySelector } from '../html/selector-kind.js';
import { formatZodIssues } from '../schemas/issues.js';
import {
  LegacyRulesSchema,
  SelectorsSchema,
  type LegacyRules,
  type RawSelectorDefinition,
} from '../schemas/extraction.schema.js';
import type {
  CustomField,
  ExtractionSchema,
  LegacyContentRules,
  LegacyUrlRules,
  SelectorDefinition,
} from '../types/index.js';

const LEGACY_KEYS = Object.keys(LegacyRulesSchema.shape);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`invalid ${label} extraction schema`, formatZodIssues(parsed.error));
  }
  return parsed.data;
}

function looksLegacy(raw: Record<string, unknown>): boolean {
  const sources = [raw, raw.content, raw.urls].filter(isRecord);
  return sources.some((source) => LEGACY_KEYS.some((key) => key in source));
}

/**
 * Collapses the accepted schema shapes into one tagged variant. Detection
 * order: a `selectors` list wins, then any legacy key, otherwise generic.
 */
export function normalizeExtractionSchema(raw: unknown): ExtractionSchema {
  if (raw === undefined || raw === null) return { kind: 'generic' };
  if (!isRecord(raw)) {
    throw new ConfigError('extraction schema must be a mapping');
  }

  if ('selectors' in raw) {
    const { selectors } = parseWith(SelectorsSchema, raw, 'selectors');
    return { kind: 'selectors', selectors: selectors.map(toSelectorDefinition) };
  }

  if (looksLegacy(raw)) {
    const urlRules = parseWith(LegacyRulesSchema, isRecord(raw.urls) ? raw.urls : raw, 'legacy url');
    const contentRules = parseWith(LegacyRulesSchema, isRecord(raw.content) ? raw.content : raw, 'legacy content');
    return { kind: 'legacy', urls: toUrlRules(urlRules), content: toContentRules(contentRules) };
  }

  return { kind: 'generic' };
}

function toSelectorDefinition(raw: RawSelectorDefinition, index: number): SelectorDefinition {
  let selector: string | undefined;
  if (typeof raw.selector === 'string') {
    selector = raw.selector;
  } else {
    selector = raw.selector.css ?? (raw.selector.xpath ? `xpath=${raw.selector.xpath}` : undefined);
  }
  if (!selector) {
    throw new ConfigError(`selectors[${index}] needs a css or xpath selector`);
  }

  return {
    name: raw.name,
    selector,
    selectorKind: classifySelector(selector),
    fields: Object.entries(raw.fields ?? {}).map(([name, field]) => ({
      name,
      type: field.type === 'attribute' ? 'attribute' : 'text',
      selector: field.selector ?? '.',
      attribute: field.attribute,
    })),
    children: Object.entries(raw.children ?? {})
      .filter(([, child]) => child.type === undefined || child.type === 'elements')
      .map(([name, child]) => ({ name, selector: child.selector })),
  };
}

function toUrlRules(rules: LegacyRules): LegacyUrlRules {
  return {
    container: rules.container ?? rules.container_selector,
    linkSelector: rules.link_selector ?? 'a',
    attribute: rules.attribute ?? rules.url_attribute ?? 'href',
    include: rules.patterns?.include ?? rules.include ?? [],
    exclude: rules.patterns?.exclude ?? rules.exclude ?? [],
  };
}

function toContentRules(rules: LegacyRules): LegacyContentRules {
  const customFields: CustomField[] = Object.entries(rules.custom_fields ?? {}).map(([name, field]) =>
    typeof field === 'string' ? { name, selector: field } : { name, selector: field.selector, attribute: field.attribute },
  );

  return {
    title: rules.title ?? rules.title_selector ?? 'h1',
    author: rules.author ?? rules.author_selector,
    date: rules.date ?? rules.date_selector,
    dateAttribute: rules.date_attribute,
    content: (typeof rules.content === 'string' ? rules.content : undefined) ?? rules.content_container_selector ?? 'article',
    remove: rules.remove ?? [],
    customFields,
  };
}
