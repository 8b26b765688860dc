//vector and score helpers

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

//cosine distance clamped to [0,1]: anti-correlated vectors count as fully distant,
//so 1 - distance is always a similarity in [0,1]
export function boundedCosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) throw new RangeError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  let dot = 0, normA = 0, normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0, y = b[i] ?? 0;
    dot += x * y; normA += x * x; normB += y * y;
  }
  if (normA === 0 || normB === 0) return 1;
  return clamp01(1 - dot / Math.sqrt(normA * normB));
}

export function jaccard<T>(a: Set<T>, b: Set<T>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const item of a) if (b.has(item)) intersection++;
  return intersection / (a.size + b.size - intersection);
}
