/**
 * Most-probable continuation of a sequence
 */

import { ContextWindow } from './sequence.js';
import type { MarkovModel } from './model.js';

export class Predictor<T> {
  private readonly model: MarkovModel<T>;
  private context: ContextWindow<T> = ContextWindow.empty();

  constructor(model: MarkovModel<T>) {
    this.model = model;
  }

  end(): void {
    this.context = ContextWindow.empty();
  }

  /**
   * Supplies a prior symbol without consulting the model.
   */
  given(symbol: T): void {
    this.context = this.model.advance(this.context, symbol);
  }

  /**
   * Predicts the next symbol and advances past it.
   */
  next(): T | undefined {
    const symbol = this.model.predict(this.context);
    if (symbol !== undefined) {
      this.context = this.model.advance(this.context, symbol);
    }
    return symbol;
  }

  /**
   * Predicts the next symbol without advancing.
   */
  predict(): T | undefined {
    return this.model.predict(this.context);
  }

  /**
   * Greedy continuation of at most `maxLength` symbols, then resets.
   */
  complete(maxLength: number): T[] {
    const result: T[] = [];
    while (result.length < maxLength) {
      const symbol = this.next();
      if (symbol === undefined) break;
      result.push(symbol);
    }
    this.end();
    return result;
  }
}
