/**
 * Training session over a Markov model
 */

import { ContextWindow } from './sequence.js';
import { END_OF_SEQUENCE, symbolOutcome } from './types.js';
import type { MarkovModel } from './model.js';

/**
 * Feeds symbols into a model one at a time, tracking the current context.
 *
 * An accumulator is the model's only writer while it is in use.
 */
export class Accumulator<T> {
  private readonly model: MarkovModel<T>;
  private context: ContextWindow<T> = ContextWindow.empty();

  constructor(model: MarkovModel<T>) {
    this.model = model;
  }

  /**
   * Records `symbol` as the next symbol of the current sequence.
   */
  add(symbol: T): void {
    this.model.add(this.context, symbolOutcome(symbol));
    this.context = this.model.advance(this.context, symbol);
  }

  /**
   * Marks the end of the current sequence and starts a new one.
   */
  end(): void {
    this.model.add(this.context, END_OF_SEQUENCE);
    this.context = ContextWindow.empty();
  }

  /**
   * Adds a complete sequence, including its end marker.
   */
  addSequence(symbols: Iterable<T>): void {
    for (const symbol of symbols) {
      this.add(symbol);
    }
    this.end();
  }

  /**
   * Most probable next symbol given what has been added so far.
   * `undefined` is returned when the end of a sequence is most likely.
   */
  predict(): T | undefined {
    return this.model.predict(this.context);
  }
}
