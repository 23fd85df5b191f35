import type { EmbeddingProvider } from '../types/index.js';
import { bigrams, tokenize } from '../nlp/tokenizer.js';

/** Weight of a token bigram relative to a single token */
const BIGRAM_WEIGHT = 0.5;

/**
 * 32-bit FNV-1a hash.
 */
function fnv1a(text: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < text.length; i++) {
        hash ^= text.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/**
 * Deterministic feature-hashing embedder. Tokens and token bigrams are hashed
 * into a fixed number of signed buckets and the vector is L2-normalized, so
 * texts sharing vocabulary land close in cosine space. Needs no network.
 */
export class HashingEmbedder implements EmbeddingProvider {
    readonly name = 'hashing';

    constructor(readonly dimensions: number = 256) {
        if (!Number.isInteger(dimensions) || dimensions <= 0) {
            throw new RangeError(`dimensions must be a positive integer (got ${dimensions})`);
        }
    }

    async embed(text: string): Promise<number[]> {
        return this.embedSync(text);
    }

    embedSync(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);
        const tokens = tokenize(text);

        const addFeature = (feature: string, weight: number): void => {
            const hash = fnv1a(feature);
            const bucket = hash % this.dimensions;
            const sign = (hash & 0x80000000) === 0 ? 1 : -1;
            vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
        };

        for (const token of tokens) addFeature(token, 1);
        for (const pair of bigrams(tokens)) addFeature(pair, BIGRAM_WEIGHT);

        const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
        return norm === 0 ? vector : vector.map((x) => x / norm);
    }
}
