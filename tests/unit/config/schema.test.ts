import { describe, it, expect } from 'vitest';
import {
  configSchema,
  corpusConfigSchema,
  generationConfigSchema,
  tokenizerConfigSchema,
} from '../../../src/config/schema.js';

describe('Config Schema', () => {
  describe('configSchema', () => {
    it('fills every section from an empty object', () => {
      const config = configSchema.parse({});

      expect(config.order).toBe(2);
      expect(config.corpus.include).toEqual(['**/*.txt']);
      expect(config.tokenizer.mode).toBe('word');
      expect(config.generation.maxLength).toBe(50);
      expect(config.generation.seed).toBeUndefined();
    });

    it('accepts order 0', () => {
      expect(configSchema.parse({ order: 0 }).order).toBe(0);
    });

    it('rejects negative and fractional orders', () => {
      expect(configSchema.safeParse({ order: -1 }).success).toBe(false);
      expect(configSchema.safeParse({ order: 1.5 }).success).toBe(false);
    });

    it('rejects a non-array directories list', () => {
      const result = configSchema.safeParse({ corpus: { directories: 'texts' } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0].path).toEqual(['corpus', 'directories']);
      }
    });
  });

  describe('tokenizerConfigSchema', () => {
    it('accepts every mode and boundary', () => {
      for (const mode of ['word', 'character', 'line']) {
        expect(tokenizerConfigSchema.safeParse({ mode }).success).toBe(true);
      }
      for (const boundary of ['line', 'paragraph', 'file']) {
        expect(tokenizerConfigSchema.safeParse({ boundary }).success).toBe(true);
      }
    });

    it('rejects unknown modes', () => {
      expect(tokenizerConfigSchema.safeParse({ mode: 'sentence' }).success).toBe(false);
    });
  });

  describe('corpusConfigSchema', () => {
    it('excludes dependency and build directories by default', () => {
      expect(corpusConfigSchema.parse({}).exclude).toEqual([
        '**/node_modules/**',
        '**/dist/**',
        '**/.git/**',
      ]);
    });
  });

  describe('generationConfigSchema', () => {
    it('requires positive lengths and counts', () => {
      expect(generationConfigSchema.safeParse({ maxLength: 0 }).success).toBe(false);
      expect(generationConfigSchema.safeParse({ count: 0 }).success).toBe(false);
      expect(generationConfigSchema.safeParse({ count: 1001 }).success).toBe(false);
    });

    it('accepts an integer seed', () => {
      expect(generationConfigSchema.parse({ seed: 7 }).seed).toBe(7);
    });
  });
});
