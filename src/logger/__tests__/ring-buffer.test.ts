import { describe, it, expect } from 'vitest';
import { RingBuffer } from '../ring-buffer.js';

describe('RingBuffer', () => {
  it('starts empty', () => {
    const buf = new RingBuffer<number>(5);
    expect(buf.size).toBe(0);
    expect(buf.toArray()).toEqual([]);
  });

  it('keeps items in insertion order up to capacity', () => {
    const buf = new RingBuffer<number>(3);
    buf.push(1);
    buf.push(2);
    buf.push(3);
    expect(buf.size).toBe(3);
    expect(buf.toArray()).toEqual([1, 2, 3]);
  });

  it('evicts the oldest items after overflow', () => {
    const buf = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) buf.push(n);
    expect(buf.size).toBe(3);
    expect(buf.toArray()).toEqual([3, 4, 5]);
  });

  it('works with object items', () => {
    const buf = new RingBuffer<{ id: number }>(2);
    buf.push({ id: 1 });
    buf.push({ id: 2 });
    buf.push({ id: 3 });
    expect(buf.toArray()).toEqual([{ id: 2 }, { id: 3 }]);
  });

  it('capacity of 1 holds only the last item', () => {
    const buf = new RingBuffer<number>(1);
    buf.push(10);
    buf.push(20);
    expect(buf.toArray()).toEqual([20]);
  });

  it('handles many overflows', () => {
    const buf = new RingBuffer<number>(3);
    for (let i = 0; i < 100; i++) buf.push(i);
    expect(buf.toArray()).toEqual([97, 98, 99]);
  });

  it('clear() empties the buffer and it fills again from the start', () => {
    const buf = new RingBuffer<number>(2);
    buf.push(1);
    buf.push(2);
    buf.push(3);
    buf.clear();
    expect(buf.size).toBe(0);
    buf.push(4);
    expect(buf.toArray()).toEqual([4]);
  });

  it('rejects a capacity below 1', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(1.5)).toThrow('RingBuffer capacity must be a positive integer, got 1.5');
  });
});
