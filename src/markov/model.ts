/**
 * Variable-order Markov chain model
 */

import { ContextWindow } from './sequence.js';
import { FrequencyTable } from './table.js';
import { outcomeSymbol } from './types.js';
import type { MarkovModelStats, Outcome, ReadonlyFrequencyTable } from './types.js';

export class InvalidOrderError extends Error {
  constructor(order: number) {
    super(`Model order must be a non-negative integer, got ${order}`);
    this.name = 'InvalidOrderError';
  }
}

// Contexts are stored as a trie keyed symbol by symbol, so lookups compare
// windows structurally without serializing symbols.
interface ContextNode<T> {
  children: Map<T, ContextNode<T>>;
  table?: FrequencyTable<T>;
}

function createNode<T>(): ContextNode<T> {
  return { children: new Map() };
}

function readonlyView<T>(table: FrequencyTable<T>): ReadonlyFrequencyTable<T> {
  return Object.freeze({
    get total() {
      return table.total;
    },
    get size() {
      return table.size;
    },
    mostFrequent: () => table.mostFrequent(),
    sample: (value: number) => table.sample(value),
    frequencyOf: (outcome: Outcome<T>) => table.frequencyOf(outcome),
    entries: () => table.entries(),
  });
}

/**
 * A model mapping each observed context window to the frequency table of the
 * outcomes that followed it.
 *
 * `add` needs exclusive access; `advance`, `predict` and `sample` never mutate
 * the model. Nothing here is synchronized.
 */
export class MarkovModel<T> {
  private readonly root: ContextNode<T> = createNode<T>();
  private readonly modelOrder: number;
  private contexts = 0;

  /**
   * @param order - Number of prior symbols each prediction is conditioned on.
   * An order of 0 collapses every context into one unconditional table.
   */
  constructor(order: number) {
    if (!Number.isInteger(order) || order < 0) {
      throw new InvalidOrderError(order);
    }
    this.modelOrder = order;
  }

  static empty<T>(order: number): MarkovModel<T> {
    return new MarkovModel<T>(order);
  }

  get order(): number {
    return this.modelOrder;
  }

  /**
   * Number of contexts with at least one recorded observation
   */
  get contextCount(): number {
    return this.contexts;
  }

  /**
   * Records one observation of `outcome` following `context`. A window longer
   * than the model order is keyed by its last `order` symbols.
   */
  add(context: ContextWindow<T>, outcome: Outcome<T>): void {
    let node = this.root;
    for (const symbol of this.keyOf(context)) {
      let child = node.children.get(symbol);
      if (!child) {
        child = createNode<T>();
        node.children.set(symbol, child);
      }
      node = child;
    }

    if (!node.table) {
      node.table = new FrequencyTable();
      this.contexts++;
    }
    node.table.add(outcome);
  }

  advance(context: ContextWindow<T>, symbol: T): ContextWindow<T> {
    return context.withNext(symbol, this.modelOrder);
  }

  /**
   * Most frequent successor of `context`. Returns `undefined` both for a
   * context that was never observed and for one whose top outcome is the end
   * of a sequence.
   */
  predict(context: ContextWindow<T>): T | undefined {
    return outcomeSymbol(this.lookup(context)?.mostFrequent());
  }

  /**
   * Successor of `context` chosen proportionally to frequency by `value` in
   * [0, 1). See {@link FrequencyTable.sample} for out-of-range values.
   */
  sample(context: ContextWindow<T>, value: number): T | undefined {
    return outcomeSymbol(this.lookup(context)?.sample(value));
  }

  /**
   * Read-only view of the table recorded for `context`. The view follows later
   * training but cannot modify the model.
   */
  tableFor(context: ContextWindow<T>): ReadonlyFrequencyTable<T> | undefined {
    const table = this.lookup(context);
    return table && readonlyView(table);
  }

  stats(): MarkovModelStats {
    const symbols = new Set<T>();
    let totalObservations = 0;
    let endObservations = 0;
    let largestTable = 0;

    for (const table of this.tables(this.root)) {
      totalObservations += table.total;
      largestTable = Math.max(largestTable, table.size);
      for (const { outcome, frequency } of table.entries()) {
        if (outcome.kind === 'symbol') {
          symbols.add(outcome.symbol);
        } else {
          endObservations += frequency;
        }
      }
    }

    return {
      order: this.modelOrder,
      totalContexts: this.contexts,
      totalObservations,
      distinctSymbols: symbols.size,
      endObservations,
      largestTable,
    };
  }

  private lookup(context: ContextWindow<T>): FrequencyTable<T> | undefined {
    let node: ContextNode<T> | undefined = this.root;
    for (const symbol of this.keyOf(context)) {
      node = node.children.get(symbol);
      if (!node) {
        return undefined;
      }
    }
    return node.table;
  }

  private keyOf(context: ContextWindow<T>): readonly T[] {
    const { symbols } = context;
    return symbols.length > this.modelOrder
      ? symbols.slice(symbols.length - this.modelOrder)
      : symbols;
  }

  private *tables(node: ContextNode<T>): Generator<FrequencyTable<T>> {
    if (node.table) {
      yield node.table;
    }
    for (const child of node.children.values()) {
      yield* this.tables(child);
    }
  }
}
