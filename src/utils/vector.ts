/**
 * Vector helpers shared by the pgvector and in-memory index providers.
 */
export function assertFiniteVector(vector: number[]): void {
  if (vector.length === 0) {
    throw new Error("Vector must not be empty");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("Vector contains a non-finite value");
  }
}

export function toPgVectorLiteral(vector: number[]): string {
  assertFiniteVector(vector);
  return `[${vector.join(",")}]`;
}

export function dotProduct(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const denominator = Math.sqrt(dotProduct(a, a)) * Math.sqrt(dotProduct(b, b));
  return denominator === 0 ? 0 : dotProduct(a, b) / denominator;
}

export function euclideanDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}
