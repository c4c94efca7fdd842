import type { ExtractionSchema } from './extraction.js';

export type LinkExtractionMode = 'baseline' | 'enhanced';
export type SaveFormat = 'json' | 'markdown';

export interface SessionConfig {
  headless: boolean;
  userAgent?: string;
  timeoutMs: number;
  outputDirectory: string;
  linkExtraction: LinkExtractionMode;
}

export interface ElementSample {
  sample: string;
  generalize: boolean;
}

export interface NamedSample extends ElementSample {
  name: string;
}

export interface FieldSelector {
  name: string;
  selector: string;
  /** `text`, `html`, `outerhtml` or an attribute name. */
  attribute: string;
}

export type ContentElements =
  | { shape: 'samples'; items: NamedSample[] }
  | { shape: 'fields'; fields: FieldSelector[] };

interface ActionBase {
  /** Step to jump to when this action fails instead of halting the run. */
  next?: string;
}

export interface VisitAction extends ActionBase {
  kind: 'visit';
  url?: string;
}

export interface ExtractLinksAction extends ActionBase {
  kind: 'extract';
  target: 'links';
  element?: ElementSample;
  schema?: ExtractionSchema;
  output?: string;
}

export interface ExtractContentAction extends ActionBase {
  kind: 'extract';
  target: 'content';
  elements: ContentElements;
  schema?: ExtractionSchema;
  output: string;
}

export interface SaveAction extends ActionBase {
  kind: 'save';
  data: unknown;
  format?: SaveFormat;
  filename?: string;
}

export interface ClickAction extends ActionBase {
  kind: 'click';
  element: string;
}

export interface WaitAction extends ActionBase {
  kind: 'wait';
  timeoutMs: number | string;
}

export interface ForEachAction extends ActionBase {
  kind: 'for_each';
  items: unknown;
  actions: ActionDefinition[];
}

export type ExtractAction = ExtractLinksAction | ExtractContentAction;

export type ActionDefinition =
  | VisitAction
  | ExtractAction
  | SaveAction
  | ClickAction
  | WaitAction
  | ForEachAction;

export type ActionKind = ActionDefinition['kind'];

export interface PaginationConfig {
  nextButtonSelector: string;
  maxPages: number;
}

export interface StepDefinition {
  name: string;
  actions: ActionDefinition[];
  condition?: unknown;
  forEach?: unknown;
  pagination?: PaginationConfig;
  next: string | null;
}

export interface WorkflowDefinition {
  name: string;
  description?: string;
  version?: string;
  startUrl: string;
  flow: StepDefinition[];
  config: SessionConfig;
}

export const FINISH_STEP = 'finish';
