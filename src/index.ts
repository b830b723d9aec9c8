/**
 * markov-chain - variable-order Markov chain models
 *
 * Train models over any sequence of discrete symbols, then predict the most
 * probable continuation or sample a random one.
 */

// Markov core
export * from './markov/index.js';

// Tokenizer
export {
  tokenize,
  detokenize,
  splitSequences,
  type TokenizerMode,
  type SequenceBoundary,
  type TokenizeOptions,
} from './tokenizer/index.js';

// Corpus
export {
  findCorpusFiles,
  trainFromText,
  trainCorpus,
  EmptyCorpusError,
  type CorpusOptions,
  type CorpusResult,
  type TextTrainingOptions,
  type TrainingCounts,
} from './corpus/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
