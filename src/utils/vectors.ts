/**
 * Sparse vector helpers. A sparse vector maps a vocabulary column to its
 * weight; absent columns are zero.
 */
export type SparseVector = ReadonlyMap<number, number>;

export function magnitude(vector: SparseVector): number {
  let sum = 0;
  for (const value of vector.values()) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Normalize a vector to unit length (L2). The zero vector is returned as is.
 */
export function normalizeVector(vector: SparseVector): SparseVector {
  const length = magnitude(vector);
  if (length === 0) return vector;

  const normalized = new Map<number, number>();
  for (const [column, value] of vector) {
    normalized.set(column, value / length);
  }
  return normalized;
}

/**
 * Dot product; equals cosine similarity for pre-normalized vectors
 */
export function dotProduct(a: SparseVector, b: SparseVector): number {
  // Walk the smaller map
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [column, value] of small) {
    const other = large.get(column);
    if (other !== undefined) {
      sum += value * other;
    }
  }
  return sum;
}
