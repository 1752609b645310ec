/**
 * Dense vector helpers. Vectors are plain `number[]` so they serialize to JSON
 * and cross the embedding / index boundaries unchanged.
 *
 * @module VectorMath
 */

export type Vector = number[];

export function dotProduct(a: Vector, b: Vector): number {
  const len = Math.min(a.length, b.length);
  let sum = 0;

  let i = 0;
  for (; i <= len - 4; i += 4) {
    sum += a[i] * b[i];
    sum += a[i + 1] * b[i + 1];
    sum += a[i + 2] * b[i + 2];
    sum += a[i + 3] * b[i + 3];
  }

  for (; i < len; i++) {
    sum += a[i] * b[i];
  }

  return sum;
}

export function l2Norm(v: Vector): number {
  return Math.sqrt(dotProduct(v, v));
}

/**
 * Scales `v` to unit length. Returns `null` for a zero (or non-finite) vector,
 * which has no direction.
 */
export function normalizeVector(v: Vector): Vector | null {
  const norm = l2Norm(v);
  if (norm === 0 || !Number.isFinite(norm)) {
    return null;
  }
  return v.map(x => x / norm);
}

/**
 * Component-wise arithmetic mean of equally sized vectors.
 */
export function meanVector(vectors: Vector[]): Vector {
  if (vectors.length === 0) {
    throw new RangeError('meanVector needs at least one vector');
  }

  const dimension = vectors[0].length;
  const sum = new Array<number>(dimension).fill(0);

  for (const v of vectors) {
    if (v.length !== dimension) {
      throw new RangeError(`Dimension mismatch: expected ${dimension}, got ${v.length}`);
    }
    for (let i = 0; i < dimension; i++) {
      sum[i] += v[i];
    }
  }

  return sum.map(x => x / vectors.length);
}

export function cosineSimilarity(a: Vector, b: Vector): number {
  const magnitude = l2Norm(a) * l2Norm(b);
  return magnitude > 0 ? dotProduct(a, b) / magnitude : 0;
}
