import type { SelectorKind } from './selector.js';

export interface LegacyUrlRules {
  container?: string;
  linkSelector: string;
  attribute: string;
  include: RegExp[];
  exclude: RegExp[];
}

export interface CustomField {
  name: string;
  selector: string;
  attribute?: string;
}

export interface LegacyContentRules {
  title: string;
  author?: string;
  date?: string;
  dateAttribute?: string;
  content: string;
  remove: string[];
  customFields: CustomField[];
}

export interface FieldDefinition {
  name: string;
  type: 'attribute' | 'text';
  selector: string;
  attribute?: string;
}

export interface ChildDefinition {
  name: string;
  selector: string;
}

export interface SelectorDefinition {
  name?: string;
  selector: string;
  selectorKind: SelectorKind;
  fields: FieldDefinition[];
  children: ChildDefinition[];
}

export type ExtractionSchema =
  | { kind: 'selectors'; selectors: SelectorDefinition[] }
  | { kind: 'legacy'; urls: LegacyUrlRules; content: LegacyContentRules }
  | { kind: 'generic' };

export type ContentRecord = Record<string, unknown>;
