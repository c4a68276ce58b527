/**
 * A set that remembers the order in which values were first added.
 * Adding a value that is already present keeps its original position.
 */
export class OrderedSet<T> implements Iterable<T> {
  private readonly order: T[] = [];
  private readonly seen = new Set<T>();

  static from<T>(values: Iterable<T>): OrderedSet<T> {
    const set = new OrderedSet<T>();
    for (const value of values) {
      set.add(value);
    }
    return set;
  }

  add(value: T): boolean {
    if (this.seen.has(value)) {
      return false;
    }
    this.seen.add(value);
    this.order.push(value);
    return true;
  }

  has(value: T): boolean {
    return this.seen.has(value);
  }

  get size(): number {
    return this.order.length;
  }

  values(): T[] {
    return [...this.order];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.order[Symbol.iterator]();
  }
}
