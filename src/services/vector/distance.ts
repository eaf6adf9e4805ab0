export const dot = (a: readonly number[], b: readonly number[]): number => {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
};

export const norm = (a: readonly number[]): number => Math.sqrt(dot(a, a));

export const squaredL2 = (a: readonly number[], b: readonly number[]): number => {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
};

/** Rounding error below this is treated as exact alignment. */
const COSINE_TOLERANCE = Number.EPSILON * 4;

/**
 * 1 - cosine similarity, in [0, 2]; a zero vector has similarity 0. Parallel
 * vectors score exactly 0 so ties fall back to insertion order. Norms may be
 * passed in precomputed.
 */
export const cosineDistance = (
  a: readonly number[],
  b: readonly number[],
  normA = norm(a),
  normB = norm(b)
): number => {
  if (normA === 0 || normB === 0) return 1;
  const distance = 1 - dot(a, b) / (normA * normB);
  if (Math.abs(distance) <= COSINE_TOLERANCE) return 0;
  return Math.min(2, Math.max(0, distance));
};

export const negatedDot = (a: readonly number[], b: readonly number[]): number => -dot(a, b);
