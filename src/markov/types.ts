/**
 * Type definitions for the Markov chain model
 */

/**
 * A successor observed for a context: either a real symbol or the
 * end-of-sequence marker.
 */
export type Outcome<T> =
  | { readonly kind: 'symbol'; readonly symbol: T }
  | { readonly kind: 'end' };

/**
 * Marker recorded when a training sequence terminated at a context
 */
export const END_OF_SEQUENCE: Outcome<never> = Object.freeze({ kind: 'end' });

export function symbolOutcome<T>(symbol: T): Outcome<T> {
  return { kind: 'symbol', symbol };
}

export function isEndOfSequence<T>(outcome: Outcome<T>): outcome is { readonly kind: 'end' } {
  return outcome.kind === 'end';
}

/**
 * Unwraps an outcome to its symbol. The end marker and a missing outcome
 * both map to `undefined`.
 */
export function outcomeSymbol<T>(outcome: Outcome<T> | undefined): T | undefined {
  return outcome?.kind === 'symbol' ? outcome.symbol : undefined;
}

/**
 * Source of uniformly distributed values in [0, 1)
 */
export type RandomSource = () => number;

/**
 * A single row of a frequency table
 */
export interface TableEntry<T> {
  outcome: Outcome<T>;
  frequency: number;
}

/**
 * Read-only view of a frequency table
 */
export interface ReadonlyFrequencyTable<T> {
  readonly total: number;
  readonly size: number;
  mostFrequent(): Outcome<T> | undefined;
  sample(value: number): Outcome<T> | undefined;
  frequencyOf(outcome: Outcome<T>): number;
  entries(): TableEntry<T>[];
}

/**
 * Summary statistics for a trained model
 */
export interface MarkovModelStats {
  order: number;
  totalContexts: number;
  totalObservations: number;
  distinctSymbols: number;
  endObservations: number;
  largestTable: number;
}
