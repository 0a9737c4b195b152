import { z } from "zod";
import { InclusionRuleSchema } from "../sources/indexRecords";

const BaseSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  candidate_urls: z.array(z.string().url()).optional(),
  fallback: z.array(z.string().min(1)).default([]),
  fallback_on_empty: z.boolean().default(false)
});

const IndexSourceSchema = BaseSourceSchema.extend({
  kind: z.literal("index"),
  rule: InclusionRuleSchema
});

const TextListSourceSchema = BaseSourceSchema.extend({
  kind: z.literal("text_list")
});

const SourceSchema = z.discriminatedUnion("kind", [IndexSourceSchema, TextListSourceSchema]);

export const SourceRegistrySchema = z.object({
  version: z.string(),
  user_agent: z.string().min(1).optional(),
  sources: z.array(SourceSchema)
});

export type SourceRegistryConfig = z.infer<typeof SourceRegistrySchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;
