// Fixed-capacity circular FIFO
// Holds the modules still pending evaluation in one scheduler invocation.

import { ResourceError, ResourceErrorType } from '../types/errors.js';

export class Ring<T> {
  readonly capacity: number;
  private items: (T | undefined)[];
  private count: number = 0;
  private begin: number = 0;
  private end: number = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Ring capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.items = new Array<T | undefined>(capacity).fill(undefined);
  }

  /**
   * Create a ring pre-loaded with items, in order
   */
  static from<T>(items: readonly T[], capacity: number): Ring<T> {
    const ring = new Ring<T>(capacity);
    for (const item of items) {
      ring.push(item);
    }
    return ring;
  }

  get size(): number {
    return this.count;
  }

  get idxBegin(): number {
    return this.begin;
  }

  get idxEnd(): number {
    return this.end;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  push(item: T): void {
    if (this.count >= this.capacity) {
      throw new ResourceError(
        ResourceErrorType.RING_FULL,
        `Ring is full (capacity ${this.capacity})`
      );
    }
    this.items[this.end] = item;
    this.end = (this.end + 1) % this.capacity;
    this.count++;
  }

  pop(): T {
    const item = this.items[this.begin];
    if (this.count === 0 || item === undefined) {
      throw new ResourceError(ResourceErrorType.RING_EMPTY, 'Ring is empty');
    }
    this.items[this.begin] = undefined;
    this.begin = (this.begin + 1) % this.capacity;
    this.count--;
    return item;
  }

  /**
   * Pending items from head to tail, without removing them
   */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.begin + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }
}
