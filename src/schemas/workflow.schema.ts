import { z } from 'zod';

const ActionBaseSchema = z.object({
  next: z.string().min(1).optional(),
});

export const ElementSampleSchema = z.union([
  z.string().min(1),
  z.object({
    sample: z.string().min(1),
    generalize: z.boolean().optional(),
  }),
]);

export const NamedSampleSchema = z.object({
  name: z.string().min(1),
  sample: z.string().min(1),
  generalize: z.boolean().optional(),
});

export const FieldSelectorSchema = z.object({
  selector: z.string().min(1).optional(),
  sample: z.string().min(1).optional(),
  type: z.enum(['css', 'xpath']).optional(),
  attribute: z.string().optional(),
});

export const ContentElementsSchema = z.union([z.array(NamedSampleSchema), z.record(FieldSelectorSchema)]);

export const VisitActionSchema = ActionBaseSchema.extend({
  action: z.literal('visit'),
  url: z.string().optional(),
});

export const ExtractActionSchema = ActionBaseSchema.extend({
  action: z.literal('extract'),
  target: z.enum(['links', 'content']),
  element: ElementSampleSchema.optional(),
  elements: ContentElementsSchema.optional(),
  schema: z.record(z.unknown()).optional(),
  output: z.string().min(1).optional(),
});

export const SaveActionSchema = ActionBaseSchema.extend({
  action: z.literal('save'),
  data: z.unknown(),
  format: z.enum(['json', 'markdown', 'md']).optional(),
  filename: z.string().min(1).optional(),
});

export const ClickActionSchema = ActionBaseSchema.extend({
  action: z.literal('click'),
  element: z.string().min(1),
});

export const WaitActionSchema = ActionBaseSchema.extend({
  action: z.literal('wait'),
  timeout_ms: z.union([z.number().nonnegative(), z.string()]).optional(),
  timeout: z.union([z.number().nonnegative(), z.string()]).optional(),
});

type VisitActionInput = z.infer<typeof VisitActionSchema>;
type ExtractActionInput = z.infer<typeof ExtractActionSchema>;
type SaveActionInput = z.infer<typeof SaveActionSchema>;
type ClickActionInput = z.infer<typeof ClickActionSchema>;
type WaitActionInput = z.infer<typeof WaitActionSchema>;

export interface ForEachActionInput {
  action: 'for_each';
  items?: unknown;
  actions: RawAction[];
  next?: string;
}

export type RawAction =
  | VisitActionInput
  | ExtractActionInput
  | SaveActionInput
  | ClickActionInput
  | WaitActionInput
  | ForEachActionInput;

export const ForEachActionSchema: z.ZodType<ForEachActionInput> = ActionBaseSchema.extend({
  action: z.literal('for_each'),
  items: z.unknown(),
  actions: z.lazy(() => z.array(ActionSchema).min(1)),
});

export const ActionSchema: z.ZodType<RawAction> = z.lazy(() =>
  z.union([
    VisitActionSchema,
    ExtractActionSchema,
    SaveActionSchema,
    ClickActionSchema,
    WaitActionSchema,
    ForEachActionSchema,
  ]),
);

export const PaginationSchema = z.object({
  next_button_selector: z.string().min(1).optional(),
  next_button: z.string().min(1).optional(),
  max_pages: z.number().int().positive().optional(),
});

export const StepSchema = z.object({
  step: z.string().min(1),
  actions: z.array(ActionSchema),
  condition: z.unknown().optional(),
  for_each: z.unknown().optional(),
  pagination: PaginationSchema.optional(),
  next: z.string().min(1).nullable().optional(),
});

export const SessionConfigSchema = z
  .object({
    headless: z.boolean().optional(),
    user_agent: z.string().optional(),
    timeout: z.number().positive().optional(),
    output_directory: z.string().min(1).optional(),
    link_extraction: z.enum(['baseline', 'enhanced']).optional(),
  })
  .passthrough();

export const WorkflowSchema = z.object({
  workflow_name: z.string().min(1),
  description: z.string().optional(),
  version: z.union([z.string(), z.number()]).optional(),
  start: z.object({ url: z.string().min(1) }),
  flow: z.array(StepSchema).min(1),
  config: SessionConfigSchema.optional(),
  output_directory: z.string().min(1).optional(),
});

export type RawStep = z.infer<typeof StepSchema>;
export type RawWorkflow = z.infer<typeof WorkflowSchema>;
