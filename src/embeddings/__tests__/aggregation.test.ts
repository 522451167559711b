import { describe, it, expect } from 'vitest';
import { getAggregationPolicy, maxAggregation, meanAggregation } from '../aggregation.js';

const vectors = [
  [1, 2, -4],
  [3, 6, 0],
  [2, 1, 1],
];

describe('meanAggregation', () => {
  it('averages element-wise', () => {
    expect(meanAggregation.aggregate(vectors, 3)).toEqual([2, 3, -1]);
  });

  it('does not depend on chunk order', () => {
    const reversed = [...vectors].reverse();
    const rotated = [vectors[1], vectors[2], vectors[0]];
    expect(meanAggregation.aggregate(reversed, 3)).toEqual(meanAggregation.aggregate(vectors, 3));
    expect(meanAggregation.aggregate(rotated, 3)).toEqual(meanAggregation.aggregate(vectors, 3));
  });

  it('returns zeros for no vectors', () => {
    expect(meanAggregation.aggregate([], 3)).toEqual([0, 0, 0]);
  });
});

describe('maxAggregation', () => {
  it('takes the element-wise maximum regardless of order', () => {
    expect(maxAggregation.aggregate(vectors, 3)).toEqual([3, 6, 1]);
    expect(maxAggregation.aggregate([...vectors].reverse(), 3)).toEqual([3, 6, 1]);
  });

  it('returns zeros for no vectors', () => {
    expect(maxAggregation.aggregate([], 2)).toEqual([0, 0]);
  });
});

describe('aggregation policies', () => {
  it('reject vectors of the wrong size', () => {
    expect(() => meanAggregation.aggregate([[1, 2]], 3)).toThrow(RangeError);
    expect(() => maxAggregation.aggregate([[1, 2, 3, 4]], 3)).toThrow(RangeError);
  });

  it('are looked up by name', () => {
    expect(getAggregationPolicy('mean')).toBe(meanAggregation);
    expect(getAggregationPolicy('max')).toBe(maxAggregation);
  });
});
