import { z } from "zod";

const CompactSchema = z.object({
  max_length: z.number().int().positive().default(200),
  max_value_length: z.number().int().positive().default(80),
}).strict();

export const ProjectConfigSchema = z.object({
  version: z.string().default("1.0"),
  // Default results file; ${ENV.NAME} placeholders are expanded on load
  file: z.string().optional(),
  width: z.number().int().default(100),
  color: z.boolean().default(true),
  compact: CompactSchema.default({}),
}).strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
