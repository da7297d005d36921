import { z } from 'zod';

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z.object({
  input: z.string().min(1).optional(),
  substitutions: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
  join: z.enum(['space', 'none']).optional(),
  header: z.boolean().default(true),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
