/**
 * Variable-order Markov chains over arbitrary symbol sequences
 */

// Type exports
export type {
  Outcome,
  RandomSource,
  TableEntry,
  ReadonlyFrequencyTable,
  MarkovModelStats,
} from './types.js';

export {
  END_OF_SEQUENCE,
  symbolOutcome,
  isEndOfSequence,
  outcomeSymbol,
} from './types.js';

// Core
export { ContextWindow } from './sequence.js';
export { FrequencyTable } from './table.js';
export { MarkovModel, InvalidOrderError } from './model.js';

// Wrappers
export { Accumulator } from './accumulator.js';
export { SequenceGenerator } from './generator.js';
export { Predictor } from './predictor.js';

export { createSeededRandom, createRandomSource } from './random.js';
