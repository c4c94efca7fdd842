import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadWorkflow, normalizeWorkflow, parseWorkflow } from '../../src/workflow/loader.js';
import { ConfigError } from '../../src/exception/errors.js';

const BLOG_WORKFLOW = `
workflow_name: Blog Crawl
description: Collect posts from a listing
version: 2
start:
  url: http://x/
config:
  headless: false
  link_extraction: enhanced
flow:
  - step: list
    actions:
      - action: extract
        target: links
        element: li.card-1 > a
        output: links
    pagination:
      next_button: a.next
      max_pages: 3
    next: detail
  - step: detail
    condition: \${links}
    actions:
      - action: for_each
        items: \${links}
        actions:
          - action: visit
          - action: extract
            target: content
            elements:
              title:
                selector: descendant::h1
                type: xpath
              subtitle:
                selector: //h2
                type: xpath
              image:
                sample: img.hero
                attribute: src
            output: article
          - action: save
            data: \${article}
      - action: wait
        timeout: 250
      - action: save
        data: \${extracted_data}
        format: md
        filename: posts.md
    next: finish
`;

describe('parseWorkflow', () => {
  it('normalizes a complete workflow', () => {
    const workflow = parseWorkflow(BLOG_WORKFLOW, 'blog.yaml');

    expect(workflow.name).toBe('Blog Crawl');
    expect(workflow.version).toBe('2');
    expect(workflow.startUrl).toBe('http://x/');
    expect(workflow.config).toEqual({
      headless: false,
      userAgent: undefined,
      timeoutMs: 30000,
      outputDirectory: 'output',
      linkExtraction: 'enhanced',
    });

    const [list, detail] = workflow.flow;
    expect(list.name).toBe('list');
    expect(list.next).toBe('detail');
    expect(list.pagination).toEqual({ nextButtonSelector: 'a.next', maxPages: 3 });
    expect(list.actions[0]).toEqual({
      kind: 'extract',
      target: 'links',
      element: { sample: 'li.card-1 > a', generalize: true },
      schema: undefined,
      output: 'links',
      next: undefined,
    });

    expect(detail.condition).toBe('${links}');
    expect(detail.next).toBe('finish');
    const forEach = detail.actions[0];
    expect(forEach.kind).toBe('for_each');
    if (forEach.kind !== 'for_each') return;
    expect(forEach.items).toBe('${links}');
    expect(forEach.actions.map((a) => a.kind)).toEqual(['visit', 'extract', 'save']);
    expect(forEach.actions[1]).toMatchObject({
      target: 'content',
      output: 'article',
      elements: {
        shape: 'fields',
        fields: [
          { name: 'title', selector: 'xpath=descendant::h1', attribute: 'text' },
          { name: 'subtitle', selector: '//h2', attribute: 'text' },
          { name: 'image', selector: 'img.hero', attribute: 'src' },
        ],
      },
    });

    expect(detail.actions[1]).toEqual({ kind: 'wait', timeoutMs: 250, next: undefined });
    expect(detail.actions[2]).toMatchObject({ kind: 'save', format: 'markdown', filename: 'posts.md' });
  });

  it('applies defaults for optional settings', () => {
    const workflow = parseWorkflow(`
workflow_name: minimal
start: { url: "http://x/" }
output_directory: results
flow:
  - step: only
    actions:
      - action: extract
        target: content
      - action: wait
`);
    expect(workflow.config).toMatchObject({ headless: true, outputDirectory: 'results', linkExtraction: 'baseline' });
    const [step] = workflow.flow;
    expect(step.next).toBeNull();
    expect(step.actions[0]).toMatchObject({
      target: 'content',
      output: 'extracted_data',
      elements: { shape: 'samples', items: [] },
    });
    expect(step.actions[1]).toMatchObject({ kind: 'wait', timeoutMs: 1000 });
  });

  it('turns a sample list into non-generalized samples', () => {
    const workflow = parseWorkflow(`
workflow_name: samples
start: { url: "http://x/" }
flow:
  - step: s
    actions:
      - action: extract
        target: content
        elements:
          - name: heading
            sample: h1.title
          - name: price
            sample: span.price-1
            generalize: true
`);
    expect(workflow.flow[0].actions[0]).toMatchObject({
      elements: {
        shape: 'samples',
        items: [
          { name: 'heading', sample: 'h1.title', generalize: false },
          { name: 'price', sample: 'span.price-1', generalize: true },
        ],
      },
    });
  });

  it('normalizes an attached extraction schema', () => {
    const workflow = parseWorkflow(`
workflow_name: schema
start: { url: "http://x/" }
flow:
  - step: s
    actions:
      - action: extract
        target: links
        schema:
          container: ul.posts
          link_selector: a.title
`);
    expect(workflow.flow[0].actions[0]).toMatchObject({
      schema: { kind: 'legacy', urls: { container: 'ul.posts', linkSelector: 'a.title', attribute: 'href' } },
    });
  });

  it('rejects malformed YAML', () => {
    expect(() => parseWorkflow('flow: [unclosed', 'bad.yaml')).toThrow(/bad\.yaml is not valid YAML/);
  });
});

describe('normalizeWorkflow validation', () => {
  const base = (flow: unknown[]): Record<string, unknown> => ({
    workflow_name: 'w',
    start: { url: 'http://x/' },
    flow,
  });

  it('requires workflow_name, start and flow', () => {
    try {
      normalizeWorkflow({ flow: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues.some((issue) => issue.startsWith('workflow_name:'))).toBe(true);
      expect(error.issues.some((issue) => issue.startsWith('start:'))).toBe(true);
      expect(error.issues.some((issue) => issue.startsWith('flow:'))).toBe(true);
    }
  });

  it('rejects unknown action kinds, including nested ones', () => {
    const document = base([
      {
        step: 's',
        actions: [
          { action: 'scroll' },
          { action: 'for_each', items: [1], actions: [{ action: 'hover' }] },
        ],
      },
    ]);
    try {
      normalizeWorkflow(document, 'w.yaml');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues).toEqual([
        'flow.0.actions.0: unknown action kind "scroll"',
        'flow.0.actions.1.actions.0: unknown action kind "hover"',
      ]);
    }
  });

  it('rejects duplicate step names', () => {
    const document = base([
      { step: 'a', actions: [] },
      { step: 'a', actions: [] },
    ]);
    expect(() => normalizeWorkflow(document)).toThrow('duplicate step name "a"');
  });

  it('reserves the finish step name', () => {
    expect(() => normalizeWorkflow(base([{ step: 'finish', actions: [] }]))).toThrow(
      'step name "finish" is reserved',
    );
  });

  it('requires a next button for pagination', () => {
    const document = base([{ step: 'p', actions: [], pagination: { max_pages: 2 } }]);
    expect(() => normalizeWorkflow(document)).toThrow('step "p": pagination needs next_button_selector');
  });

  it('requires an element or schema for link extraction', () => {
    const document = base([{ step: 'l', actions: [{ action: 'extract', target: 'links' }] }]);
    expect(() => normalizeWorkflow(document)).toThrow('extract links needs element or schema');
  });

  it('requires items on a for_each action', () => {
    const document = base([
      { step: 'f', actions: [{ action: 'for_each', actions: [{ action: 'visit' }] }] },
    ]);
    expect(() => normalizeWorkflow(document)).toThrow('step "f" action 0: for_each needs items');
  });
});

describe('loadWorkflow', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flowscrape-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a workflow file from disk', async () => {
    const path = join(dir, 'blog.yaml');
    await writeFile(path, BLOG_WORKFLOW, 'utf-8');
    const workflow = await loadWorkflow(path);
    expect(workflow.name).toBe('Blog Crawl');
    expect(workflow.flow).toHaveLength(2);
  });

  it('raises a ConfigError for a missing file', async () => {
    await expect(loadWorkflow(join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(ConfigError);
  });
});
