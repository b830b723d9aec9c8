/**
 * Config module exports
 */

export {
  configSchema,
  tokenizerConfigSchema,
  corpusConfigSchema,
  generationConfigSchema,
  type Config,
  type TokenizerConfig,
  type CorpusConfig,
  type GenerationConfig,
} from './schema.js';

export {
  CONFIG_FILE_NAMES,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from './loader.js';
