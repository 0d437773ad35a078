/**
 * Configuration Schema
 *
 * Shape of ~/.crag/config.toml. Zod gives both the TypeScript type and the
 * runtime validation used by the loader and `crag config set`.
 */

import { z } from 'zod';

/**
 * Generation backend settings
 */
export const GenerationConfigSchema = z.object({
  max_tokens: z
    .number()
    .int()
    .min(1)
    .max(8192)
    .describe('Maximum tokens per generation call (1-8192, default 800)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Deadline for a single generation call in milliseconds (default 60000)'),
});

/**
 * Tool-calling loop settings
 */
export const OrchestratorConfigSchema = z.object({
  max_tool_rounds: z
    .number()
    .int()
    .min(0)
    .max(5)
    .describe('Tool-execution rounds before a final tool-free call (0-5, default 2)'),
  parallel_tool_calls: z
    .boolean()
    .describe('Run the tool uses of one round concurrently (results keep request order)'),
});

export const SearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(50).describe('Chunks returned per search (default 5)'),
});

export const ChunkingConfigSchema = z
  .object({
    chunk_size: z.number().int().min(100).max(10000).describe('Target chunk length in characters'),
    chunk_overlap: z.number().int().min(0).max(5000).describe('Characters of trailing sentences repeated in the next chunk'),
  })
  .refine((c) => c.chunk_overlap < c.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

export const SessionConfigSchema = z.object({
  max_history: z
    .number()
    .int()
    .min(0)
    .max(50)
    .describe('Exchanges remembered per chat session (default 2)'),
});

/**
 * Root configuration schema
 */
export const ConfigSchema = z.object({
  model: z.string().min(1).describe('Anthropic model used for answers'),
  docs_path: z.string().min(1).describe('Folder indexed by `crag index` when none is given'),
  generation: GenerationConfigSchema,
  orchestrator: OrchestratorConfigSchema,
  search: SearchConfigSchema,
  chunking: ChunkingConfigSchema,
  session: SessionConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Sparse overrides as written in config.toml. Every section and field is
 * optional; cross-field rules are checked again on the merged result.
 */
export const PartialConfigSchema = z
  .object({
    model: z.string().min(1),
    docs_path: z.string().min(1),
    generation: GenerationConfigSchema,
    orchestrator: OrchestratorConfigSchema,
    search: SearchConfigSchema,
    chunking: z.object({
      chunk_size: z.number().int().min(100).max(10000),
      chunk_overlap: z.number().int().min(0).max(5000),
    }),
    session: SessionConfigSchema,
  })
  .deepPartial()
  .strict();

export type PartialConfig = z.infer<typeof PartialConfigSchema>;
