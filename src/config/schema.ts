/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const tokenizerConfigSchema = z.object({
  mode: z.enum(['word', 'character', 'line']).default('word'),
  boundary: z.enum(['line', 'paragraph', 'file']).default('line'),
  lowercase: z.boolean().default(false),
});

export const corpusConfigSchema = z.object({
  directories: z.array(z.string()).default(['.']),
  include: z.array(z.string()).default(['**/*.txt']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/.git/**',
  ]),
});

export const generationConfigSchema = z.object({
  maxLength: z.number().int().min(1).default(50),
  count: z.number().int().min(1).max(1000).default(1),
  seed: z.number().int().optional(),
});

export const configSchema = z.object({
  order: z.number().int().min(0).default(2),
  corpus: corpusConfigSchema.default({}),
  tokenizer: tokenizerConfigSchema.default({}),
  generation: generationConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type TokenizerConfig = z.infer<typeof tokenizerConfigSchema>;
export type CorpusConfig = z.infer<typeof corpusConfigSchema>;
export type GenerationConfig = z.infer<typeof generationConfigSchema>;
