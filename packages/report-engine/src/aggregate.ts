// Shared result collections for concurrent producers. Every mutation runs to
// completion in a single synchronous call, which makes it the critical section:
// no other task can interleave between the existence check and the insert.

export class AggregateList<T> {
  private readonly items: T[] = [];

  get size(): number {
    return this.items.length;
  }

  append(values: readonly T[]): void {
    for (const value of values) {
      this.items.push(value);
    }
  }

  toArray(): T[] {
    return this.items.slice();
  }
}

export class AggregateMap<K, V> {
  private readonly entries = new Map<K, V>();

  get size(): number {
    return this.entries.size;
  }

  /** First writer wins; returns whether the value was stored. */
  insertIfAbsent(key: K, value: V): boolean {
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, value);
    return true;
  }

  /** Inserts a batch under one critical section; returns how many were new. */
  mergeIfAbsent(values: readonly V[], keyOf: (value: V) => K): number {
    let inserted = 0;
    for (const value of values) {
      if (this.insertIfAbsent(keyOf(value), value)) {
        inserted += 1;
      }
    }
    return inserted;
  }

  toMap(): Map<K, V> {
    return new Map(this.entries);
  }
}
