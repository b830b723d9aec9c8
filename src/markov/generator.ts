/**
 * Random sequence generation from a Markov model
 */

import { ContextWindow } from './sequence.js';
import type { MarkovModel } from './model.js';
import type { RandomSource } from './types.js';

/**
 * Samples successive symbols from a model. Generators never modify the model.
 */
export class SequenceGenerator<T> {
  private readonly model: MarkovModel<T>;
  private context: ContextWindow<T> = ContextWindow.empty();
  private nextRandom: RandomSource;

  /**
   * @param random - Returns values in [0, 1); each call drives one sample
   */
  constructor(model: MarkovModel<T>, random: RandomSource) {
    this.model = model;
    this.nextRandom = random;
  }

  setRandomSource(random: RandomSource): void {
    this.nextRandom = random;
  }

  /**
   * Resets the generator so the next symbol starts a sequence.
   */
  end(): void {
    this.context = ContextWindow.empty();
  }

  /**
   * Samples the next symbol. On `undefined` the context is left as is, so
   * call {@link end} before generating again.
   */
  next(): T | undefined {
    const symbol = this.model.sample(this.context, this.nextRandom());
    if (symbol !== undefined) {
      this.context = this.model.advance(this.context, symbol);
    }
    return symbol;
  }

  /**
   * Generates one sequence of at most `maxLength` symbols and resets.
   */
  generate(maxLength: number = Number.POSITIVE_INFINITY): T[] {
    const result: T[] = [];
    while (result.length < maxLength) {
      const symbol = this.next();
      if (symbol === undefined) break;
      result.push(symbol);
    }
    this.end();
    return result;
  }

  /**
   * Yields symbols until the model produces no successor. A model trained on
   * sequences that never end can make this unbounded; prefer `generate`.
   */
  *[Symbol.iterator](): Iterator<T> {
    for (let symbol = this.next(); symbol !== undefined; symbol = this.next()) {
      yield symbol;
    }
  }
}
