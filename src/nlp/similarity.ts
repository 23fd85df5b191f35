import stringSimilarity from 'string-similarity';

/**
 * Cosine similarity between two dense vectors of equal length.
 * Returns 0 for mismatched lengths or a zero vector.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length === 0 || a.length !== b.length) return 0;

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    if (denominator === 0) return 0;

    return dot / denominator;
}

/**
 * Dice coefficient over character bigrams of two normalized keys (0.0 to 1.0).
 */
export function keySimilarity(a: string, b: string): number {
    if (a === b) return 1;
    return stringSimilarity.compareTwoStrings(a, b);
}

export function isFiniteVector(vector: readonly number[]): boolean {
    return vector.length > 0 && vector.every((x) => Number.isFinite(x));
}
