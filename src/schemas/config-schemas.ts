import { z } from 'zod';
import { DEFAULT_CHUNK_LIMIT } from '../config/constants';

// Configuration file schema for .mdchunk.ini validation
export const CONFIG_SCHEMA = z.object({
  chunkLimit: z.number().int().positive().default(DEFAULT_CHUNK_LIMIT),
  joinPolicy: z.enum(['space', 'none']).default('space'),
  substitutionsPath: z.string().min(1).optional(),
  substitutionsHeader: z.boolean().default(true),
  configDir: z.string().min(1),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
