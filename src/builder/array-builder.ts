/**
 * Growable, index-addressable buffer
 *
 * Append is amortized O(1); `set` is the only in-place mutation. Storage is
 * kept across `clear()` so a builder reused between render passes does not
 * reallocate.
 */

import { assertDefined, assertIndexInRange, invariant } from '../dev/invariant';

const DEFAULT_CAPACITY = 10;

/**
 * Borrowed read-only view over the first `count` items of a buffer.
 * Valid until the owning buffer is next mutated.
 */
export class ArrayRange<T> implements Iterable<T> {
  constructor(
    private readonly items: ReadonlyArray<T | undefined>,
    readonly count: number
  ) {}

  at(index: number): T {
    assertIndexInRange(index, this.count, 'ArrayRange.at');
    const item = this.items[index];
    assertDefined(item, `ArrayRange.at: slot ${index} is empty`);
    return item;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      yield this.at(i);
    }
  }

  /** Copies the viewed items out; the copy survives later mutation */
  toArray(): T[] {
    return Array.from(this);
  }
}

export class ArrayBuilder<T> {
  private items: Array<T | undefined>;
  private itemCount = 0;

  constructor(initialCapacity = DEFAULT_CAPACITY) {
    invariant(
      Number.isInteger(initialCapacity) && initialCapacity > 0,
      'ArrayBuilder capacity must be a positive integer',
      { initialCapacity }
    );
    this.items = new Array<T | undefined>(initialCapacity);
  }

  get count(): number {
    return this.itemCount;
  }

  get capacity(): number {
    return this.items.length;
  }

  append(item: T): void {
    if (this.itemCount === this.items.length) {
      this.grow();
    }
    this.items[this.itemCount++] = item;
  }

  get(index: number): T {
    assertIndexInRange(index, this.itemCount, 'ArrayBuilder.get');
    const item = this.items[index];
    assertDefined(item, `ArrayBuilder.get: slot ${index} is empty`);
    return item;
  }

  set(index: number, item: T): void {
    assertIndexInRange(index, this.itemCount, 'ArrayBuilder.set');
    this.items[index] = item;
  }

  clear(): void {
    // Release references so cleared frames (and their handlers) can be collected.
    this.items.fill(undefined, 0, this.itemCount);
    this.itemCount = 0;
  }

  toRange(): ArrayRange<T> {
    return new ArrayRange(this.items, this.itemCount);
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.items.length * 2);
    for (let i = 0; i < this.itemCount; i++) {
      next[i] = this.items[i];
    }
    this.items = next;
  }
}
