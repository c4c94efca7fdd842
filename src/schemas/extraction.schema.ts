import { z } from 'zod';

export const SelectorSpecSchema = z.union([
  z.string().min(1),
  z.object({
    css: z.string().min(1).optional(),
    xpath: z.string().min(1).optional(),
  }),
]);

export const RawFieldSchema = z.object({
  type: z.string().optional(),
  selector: z.string().optional(),
  attribute: z.string().optional(),
});

export const RawChildSchema = z.object({
  type: z.string().optional(),
  selector: z.string().min(1),
});

export const RawSelectorDefinitionSchema = z.object({
  name: z.string().optional(),
  type: z.string().optional(),
  selector: SelectorSpecSchema,
  fields: z.record(RawFieldSchema).optional(),
  children: z.record(RawChildSchema).optional(),
});

export const SelectorsSchema = z.object({
  selectors: z.array(RawSelectorDefinitionSchema),
});

export const CustomFieldSchema = z.union([
  z.string().min(1),
  z.object({
    selector: z.string().min(1),
    attribute: z.string().optional(),
  }),
]);

/** URL patterns are compiled once, when the schema is read. */
export const PatternSchema = z.string().transform((source, ctx) => {
  try {
    return new RegExp(source);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid pattern "${source}": ${error instanceof Error ? error.message : String(error)}`,
    });
    return z.NEVER;
  }
});

export const PatternListSchema = z.array(PatternSchema);

export const LegacyRulesSchema = z
  .object({
    container: z.string(),
    container_selector: z.string(),
    link_selector: z.string(),
    attribute: z.string(),
    url_attribute: z.string(),
    title: z.string(),
    title_selector: z.string(),
    author: z.string(),
    author_selector: z.string(),
    date: z.string(),
    date_selector: z.string(),
    date_attribute: z.string(),
    content: z.union([z.string(), z.record(z.unknown())]),
    content_container_selector: z.string(),
    remove: z.array(z.string()),
    custom_fields: z.record(CustomFieldSchema),
    patterns: z.object({ include: PatternListSchema.optional(), exclude: PatternListSchema.optional() }),
    include: PatternListSchema,
    exclude: PatternListSchema,
  })
  .partial();

export type RawSelectorDefinition = z.infer<typeof RawSelectorDefinitionSchema>;
export type LegacyRules = z.infer<typeof LegacyRulesSchema>;
