import { describe, it, expect } from 'vitest';
import { Ring, ResourceError, ResourceErrorType } from '../src/index.js';

describe('Ring', () => {
  it('should pop items in the order they were pushed', () => {
    const ring = new Ring<string>(4);
    ring.push('a');
    ring.push('b');
    ring.push('c');
    expect(ring.pop()).toBe('a');
    expect(ring.pop()).toBe('b');
    expect(ring.pop()).toBe('c');
    expect(ring.isEmpty()).toBe(true);
  });

  it('should wrap its indices around the capacity', () => {
    const ring = new Ring<number>(3);
    ring.push(1);
    ring.push(2);
    ring.push(3);
    expect(ring.isFull()).toBe(true);
    expect(ring.idxEnd).toBe(0);

    expect(ring.pop()).toBe(1);
    expect(ring.idxBegin).toBe(1);

    ring.push(4);
    expect(ring.idxEnd).toBe(1);
    expect(ring.toArray()).toEqual([2, 3, 4]);
  });

  it('should reject a push beyond capacity without overwriting', () => {
    const ring = Ring.from([1, 2], 2);
    expect(() => ring.push(3)).toThrow(ResourceError);
    expect(() => ring.push(3)).toThrow(expect.objectContaining({ type: ResourceErrorType.RING_FULL }));
    expect(ring.toArray()).toEqual([1, 2]);
  });

  it('should reject a pop when empty', () => {
    const ring = new Ring<number>(2);
    expect(() => ring.pop()).toThrow(expect.objectContaining({ type: ResourceErrorType.RING_EMPTY }));
  });

  it('should reject preloading more items than it can hold', () => {
    expect(() => Ring.from([1, 2, 3], 2)).toThrow(expect.objectContaining({
      type: ResourceErrorType.RING_FULL,
    }));
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new Ring<number>(0)).toThrow(RangeError);
  });

  it('should behave like a FIFO queue and keep its invariants', () => {
    const capacity = 3;
    const ring = new Ring<number>(capacity);
    const model: number[] = [];
    const ops = [
      'push', 'push', 'pop', 'push', 'push', 'push', 'push', 'pop', 'pop',
      'push', 'pop', 'pop', 'pop', 'pop', 'push', 'push', 'push', 'pop',
    ];
    let next = 0;

    for (const op of ops) {
      if (op === 'push') {
        if (model.length === capacity) {
          expect(() => ring.push(next)).toThrow(ResourceError);
        } else {
          ring.push(next);
          model.push(next);
        }
        next++;
      } else {
        const expected = model.shift();
        if (expected === undefined) {
          expect(() => ring.pop()).toThrow(ResourceError);
        } else {
          expect(ring.pop()).toBe(expected);
        }
      }

      expect(ring.size).toBe(model.length);
      expect(ring.toArray()).toEqual(model);
      expect(ring.size).toBeGreaterThanOrEqual(0);
      expect(ring.size).toBeLessThanOrEqual(capacity);
      expect(ring.idxBegin).toBeGreaterThanOrEqual(0);
      expect(ring.idxBegin).toBeLessThan(capacity);
      expect(ring.idxEnd).toBeGreaterThanOrEqual(0);
      expect(ring.idxEnd).toBeLessThan(capacity);
    }
  });
});
