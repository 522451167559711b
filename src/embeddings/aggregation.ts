/**
 * Chunk vector aggregation
 *
 * Policies must be deterministic and independent of chunk order.
 */

export interface AggregationPolicy {
  readonly name: string;
  aggregate(vectors: number[][], dims: number): number[];
}

function assertDims(vectors: number[][], dims: number): void {
  for (const vector of vectors) {
    if (vector.length !== dims) {
      throw new RangeError(`Cannot aggregate a ${vector.length}-dimensional vector into ${dims} dimensions`);
    }
  }
}

/**
 * Element-wise mean: a running sum and a count
 */
export const meanAggregation: AggregationPolicy = {
  name: 'mean',
  aggregate(vectors, dims) {
    assertDims(vectors, dims);
    const sum = new Array<number>(dims).fill(0);
    if (vectors.length === 0) {
      return sum;
    }
    for (const vector of vectors) {
      for (let i = 0; i < dims; i++) {
        sum[i] += vector[i];
      }
    }
    return sum.map((value) => value / vectors.length);
  },
};

/**
 * Element-wise max pooling
 */
export const maxAggregation: AggregationPolicy = {
  name: 'max',
  aggregate(vectors, dims) {
    assertDims(vectors, dims);
    if (vectors.length === 0) {
      return new Array<number>(dims).fill(0);
    }
    const result = new Array<number>(dims).fill(Number.NEGATIVE_INFINITY);
    for (const vector of vectors) {
      for (let i = 0; i < dims; i++) {
        result[i] = Math.max(result[i], vector[i]);
      }
    }
    return result;
  },
};

export function getAggregationPolicy(name: 'mean' | 'max'): AggregationPolicy {
  return name === 'max' ? maxAggregation : meanAggregation;
}
