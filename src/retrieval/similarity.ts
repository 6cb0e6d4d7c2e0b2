export const SIMILARITY_EPSILON = 1e-10;

/**
 * Cosine similarity over the first `min(a.length, b.length)` elements.
 * An all-zero vector scores 0 against anything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0;
  let a2 = 0;
  let b2 = 0;
  for (let i = 0; i < len; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    a2 += av * av;
    b2 += bv * bv;
  }
  return dot / (Math.sqrt(a2) * Math.sqrt(b2) + SIMILARITY_EPSILON);
}
