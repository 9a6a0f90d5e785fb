/**
 * Memory Cache Tier
 *
 * Bounded in-process map with FIFO eviction. Overwriting a key moves it to
 * the newest position ("touch on write"); reads never reorder. This is not
 * LRU: a frequently read entry is still evicted once it becomes the oldest.
 *
 * `update` and `clear` are synchronous, so each runs atomically with
 * respect to other tasks on the event loop.
 */

export class MemoryCacheTier<V> {
  private readonly entries = new Map<string, V>();
  /** Insertion order, oldest first. Always holds exactly the map's keys. */
  private order: string[] = [];

  constructor(private readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 0) {
      throw new RangeError(`Memory cache size must be a non-negative integer, got ${maxSize}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get limit(): number {
    return this.maxSize;
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Insert or overwrite an entry, evicting the oldest when over the bound.
   * With a bound of 0 nothing is stored.
   *
   * @returns the evicted key, if any
   */
  update(key: string, value: V): string | undefined {
    if (typeof key !== 'string') {
      throw new TypeError(`Memory cache key must be a string, got ${key === null ? 'null' : typeof key}`);
    }
    if (this.maxSize === 0) {
      return undefined;
    }

    if (this.entries.has(key)) {
      this.order = this.order.filter((k) => k !== key);
      this.entries.delete(key);
    }

    this.entries.set(key, value);
    this.order.push(key);

    if (this.entries.size > this.maxSize) {
      const oldest = this.order.shift();
      if (oldest !== undefined) {
        this.entries.delete(oldest);
        return oldest;
      }
    }
    return undefined;
  }

  /**
   * Remove every entry.
   *
   * @returns the number of entries removed
   */
  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.order = [];
    return removed;
  }

  /** Keys, oldest first */
  keys(): string[] {
    return [...this.order];
  }

  entriesSnapshot(): Array<[string, V]> {
    return this.order.flatMap((key): Array<[string, V]> => {
      const value = this.entries.get(key);
      return value === undefined ? [] : [[key, value]];
    });
  }
}
