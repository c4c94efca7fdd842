import { z } from 'zod';
import { PatternListSchema } from './extraction.schema.js';

export const CrawlerConfigSchema = z.object({
  name: z.string().min(1),
  start_url: z.string().url(),
  base_url: z.string().url().optional(),
  url_patterns: z
    .object({
      include: PatternListSchema.optional(),
      exclude: PatternListSchema.optional(),
      content: PatternListSchema.optional(),
    })
    .optional(),
  extraction_schema: z
    .object({
      urls: z.record(z.unknown()).optional(),
      content: z.record(z.unknown()).optional(),
    })
    .optional(),
  output_directory: z.string().min(1).optional(),
  crawler_settings: z
    .object({
      request_delay: z.number().nonnegative().optional(),
      max_urls: z.number().int().positive().optional(),
      max_retries: z.number().int().positive().optional(),
      timeout: z.number().positive().optional(),
      user_agent: z.string().optional(),
    })
    .optional(),
});

export type RawCrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
