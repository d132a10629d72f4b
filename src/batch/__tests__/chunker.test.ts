import { describe, it, expect } from 'vitest';
import { chunk } from '../chunker.js';

describe('chunk', () => {
  it('should split into chunks of the given size', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk(['a', 'b'], 25)).toEqual([['a', 'b']]);
    expect(chunk([], 25)).toEqual([]);
  });

  it('should reject sizes that are not positive integers', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
    expect(() => chunk([1], 2.5)).toThrow('Chunk size must be a positive integer, got 2.5');
  });
});
