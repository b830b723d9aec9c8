/**
 * Bounded context window addressing chain state
 */

/**
 * Immutable, order-preserving window over the most recent symbols.
 *
 * Windows are values: `withNext` always returns a new window and equality is
 * structural, compared element-wise with the same semantics a `Map` uses for
 * its keys (SameValueZero).
 */
export class ContextWindow<T> {
  private static readonly EMPTY = new ContextWindow<never>([]);

  private readonly items: readonly T[];

  private constructor(items: readonly T[]) {
    this.items = items;
  }

  static empty<T>(): ContextWindow<T> {
    return ContextWindow.EMPTY;
  }

  /**
   * Builds a window from explicit symbols, keeping at most the last `order`.
   */
  static of<T>(symbols: readonly T[], order: number): ContextWindow<T> {
    let window = ContextWindow.empty<T>();
    for (const symbol of symbols) {
      window = window.withNext(symbol, order);
    }
    return window;
  }

  get length(): number {
    return this.items.length;
  }

  get symbols(): readonly T[] {
    return this.items;
  }

  /**
   * Returns the window that results from observing `symbol`. When the window
   * already holds `order` symbols the oldest one is evicted.
   */
  withNext(symbol: T, order: number): ContextWindow<T> {
    if (order <= 0) {
      return ContextWindow.empty<T>();
    }

    const kept = this.items.length < order
      ? this.items
      : this.items.slice(this.items.length + 1 - order);

    return new ContextWindow([...kept, symbol]);
  }

  equals(other: ContextWindow<T>): boolean {
    if (this.items.length !== other.items.length) {
      return false;
    }
    return this.items.every((symbol, i) => sameValueZero(symbol, other.items[i]));
  }

  toArray(): T[] {
    return [...this.items];
  }
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}
