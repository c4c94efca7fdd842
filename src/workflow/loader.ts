import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { OUTPUT, SESSION, TIMEOUTS } from '../config/defaults.js';
import { normalizeExtractionSchema } from '../engines/schema-normalizer.js';
import { ConfigError, describeCause } from '../exception/errors.js';
import { classifySelector } from '../html/selector-kind.js';
import { formatZodIssues } from '../schemas/issues.js';
import { WorkflowSchema, type RawAction, type RawStep, type RawWorkflow } from '../schemas/workflow.schema.js';
import {
  FINISH_STEP,
  type ActionDefinition,
  type ContentElements,
  type ExtractAction,
  type StepDefinition,
  type WorkflowDefinition,
} from '../types/index.js';

const ACTION_KINDS = new Set(['visit', 'extract', 'save', 'click', 'wait', 'for_each']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export async function loadWorkflow(path: string): Promise<WorkflowDefinition> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read workflow file ${path}`, [describeCause(error)]);
  }
  return parseWorkflow(text, path);
}

export function parseWorkflow(text: string, source = '<inline>'): WorkflowDefinition {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`workflow ${source} is not valid YAML`, [describeCause(error)]);
  }
  return normalizeWorkflow(document, source);
}

/** Validates a parsed workflow document and converts it to its runtime form. */
export function normalizeWorkflow(document: unknown, source = '<inline>'): WorkflowDefinition {
  const unknownActions = findUnknownActions(document);
  if (unknownActions.length > 0) {
    throw new ConfigError(`workflow ${source} uses unknown action kinds`, unknownActions);
  }

  const parsed = WorkflowSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`workflow ${source} is invalid`, formatZodIssues(parsed.error));
  }
  const raw: RawWorkflow = parsed.data;

  const issues: string[] = [];
  const seen = new Set<string>();
  for (const step of raw.flow) {
    if (step.step === FINISH_STEP) {
      issues.push(`step name "${FINISH_STEP}" is reserved for the end of the flow`);
    }
    if (seen.has(step.step)) {
      issues.push(`duplicate step name "${step.step}"`);
    }
    seen.add(step.step);
  }
  if (issues.length > 0) {
    throw new ConfigError(`workflow ${source} is invalid`, issues);
  }

  const config: NonNullable<RawWorkflow['config']> = raw.config ?? {};
  return {
    name: raw.workflow_name,
    description: raw.description,
    version: raw.version === undefined ? undefined : String(raw.version),
    startUrl: raw.start.url,
    flow: raw.flow.map(toStep),
    config: {
      headless: config.headless ?? SESSION.HEADLESS,
      userAgent: config.user_agent,
      timeoutMs: config.timeout ?? TIMEOUTS.NAVIGATION_MS,
      outputDirectory: config.output_directory ?? raw.output_directory ?? OUTPUT.DIRECTORY,
      linkExtraction: config.link_extraction ?? SESSION.LINK_EXTRACTION,
    },
  };
}

function findUnknownActions(document: unknown): string[] {
  const issues: string[] = [];

  const visit = (actions: unknown, path: string): void => {
    if (!Array.isArray(actions)) return;
    actions.forEach((action: unknown, index) => {
      if (!isRecord(action)) return;
      const kind = action.action;
      if (typeof kind === 'string' && !ACTION_KINDS.has(kind)) {
        issues.push(`${path}.${index}: unknown action kind "${kind}"`);
      }
      if (kind === 'for_each') visit(action.actions, `${path}.${index}.actions`);
    });
  };

  if (isRecord(document) && Array.isArray(document.flow)) {
    document.flow.forEach((step: unknown, index) => {
      if (isRecord(step)) visit(step.actions, `flow.${index}.actions`);
    });
  }
  return issues;
}

function toStep(raw: RawStep): StepDefinition {
  const where = `step "${raw.step}"`;
  let pagination: StepDefinition['pagination'];
  if (raw.pagination) {
    const nextButtonSelector = raw.pagination.next_button_selector ?? raw.pagination.next_button;
    if (!nextButtonSelector) {
      throw new ConfigError(`${where}: pagination needs next_button_selector`);
    }
    pagination = { nextButtonSelector, maxPages: raw.pagination.max_pages ?? 1 };
  }

  return {
    name: raw.step,
    actions: raw.actions.map((action, index) => toAction(action, `${where} action ${index}`)),
    condition: raw.condition,
    forEach: raw.for_each,
    pagination,
    next: raw.next ?? null,
  };
}

function toAction(raw: RawAction, where: string): ActionDefinition {
  switch (raw.action) {
    case 'visit':
      return { kind: 'visit', url: raw.url, next: raw.next };
    case 'extract':
      return toExtract(raw, where);
    case 'save':
      return {
        kind: 'save',
        data: raw.data,
        format: raw.format === 'md' ? 'markdown' : raw.format,
        filename: raw.filename,
        next: raw.next,
      };
    case 'click':
      return { kind: 'click', element: raw.element, next: raw.next };
    case 'wait':
      return { kind: 'wait', timeoutMs: raw.timeout_ms ?? raw.timeout ?? TIMEOUTS.WAIT_MS, next: raw.next };
    case 'for_each':
      if (raw.items === undefined) {
        throw new ConfigError(`${where}: for_each needs items`);
      }
      return {
        kind: 'for_each',
        items: raw.items,
        actions: raw.actions.map((action, index) => toAction(action, `${where}.${index}`)),
        next: raw.next,
      };
  }
}

function toExtract(raw: Extract<RawAction, { action: 'extract' }>, where: string): ExtractAction {
  const schema = raw.schema === undefined ? undefined : normalizeExtractionSchema(raw.schema);

  if (raw.target === 'links') {
    if (raw.element === undefined && schema === undefined) {
      throw new ConfigError(`${where}: extract links needs element or schema`);
    }
    const element =
      raw.element === undefined
        ? undefined
        : typeof raw.element === 'string'
          ? { sample: raw.element, generalize: true }
          : { sample: raw.element.sample, generalize: raw.element.generalize ?? true };
    return { kind: 'extract', target: 'links', element, schema, output: raw.output, next: raw.next };
  }

  return {
    kind: 'extract',
    target: 'content',
    elements: toContentElements(raw.elements, where),
    schema,
    output: raw.output ?? 'extracted_data',
    next: raw.next,
  };
}

function toContentElements(raw: Extract<RawAction, { action: 'extract' }>['elements'], where: string): ContentElements {
  if (raw === undefined) return { shape: 'samples', items: [] };
  if (Array.isArray(raw)) {
    return {
      shape: 'samples',
      items: raw.map((item) => ({ name: item.name, sample: item.sample, generalize: item.generalize ?? false })),
    };
  }

  return {
    shape: 'fields',
    fields: Object.entries(raw).map(([name, field]) => {
      const selector = field.selector ?? field.sample;
      if (!selector) {
        throw new ConfigError(`${where}: element "${name}" needs selector or sample`);
      }
      const explicitPath = field.type === 'xpath' && classifySelector(selector) !== 'xpath';
      return {
        name,
        selector: explicitPath ? `xpath=${selector}` : selector,
        attribute: field.attribute ?? 'text',
      };
    }),
  };
}
