import type { StrategyHit } from '../types/index.js';
import { isFiniteVector } from '../nlp/similarity.js';

export interface IndexSearchOptions {
    limit: number;

    /** Only sections accepted by the filter are scored */
    filter?: (sectionId: string) => boolean;
}

interface StoredVector {
    vector: Float64Array;
    norm: number;
}

/**
 * Exact nearest-neighbor search over section embeddings by cosine similarity.
 * The dimensionality is fixed by the constructor or by the first vector added.
 */
export class VectorIndex {
    private vectors = new Map<string, StoredVector>();
    private dims: number | null;

    constructor(dimensions?: number) {
        this.dims = dimensions ?? null;
    }

    get dimensions(): number | null {
        return this.dims;
    }

    get size(): number {
        return this.vectors.size;
    }

    add(sectionId: string, vector: readonly number[]): void {
        if (!isFiniteVector(vector)) {
            throw new RangeError(`Embedding for ${sectionId} is empty or not finite`);
        }
        if (this.dims === null) {
            this.dims = vector.length;
        } else if (vector.length !== this.dims) {
            throw new RangeError(
                `Embedding for ${sectionId} has ${vector.length} dimensions, index expects ${this.dims}`
            );
        }

        const stored = Float64Array.from(vector);
        let sum = 0;
        for (const x of stored) sum += x * x;
        this.vectors.set(sectionId, { vector: stored, norm: Math.sqrt(sum) });
    }

    remove(sectionId: string): boolean {
        return this.vectors.delete(sectionId);
    }

    has(sectionId: string): boolean {
        return this.vectors.has(sectionId);
    }

    /**
     * Top sections by cosine similarity, ties broken by section id.
     */
    search(query: readonly number[], options: IndexSearchOptions): StrategyHit[] {
        if (options.limit <= 0 || this.vectors.size === 0) return [];
        if (this.dims !== null && query.length !== this.dims) {
            throw new RangeError(`Query has ${query.length} dimensions, index expects ${this.dims}`);
        }

        let queryNorm = 0;
        for (const x of query) queryNorm += x * x;
        queryNorm = Math.sqrt(queryNorm);
        if (queryNorm === 0) return [];

        const hits: StrategyHit[] = [];
        for (const [sectionId, { vector, norm }] of this.vectors) {
            if (options.filter && !options.filter(sectionId)) continue;
            if (norm === 0) continue;

            let dot = 0;
            for (let i = 0; i < vector.length; i++) {
                dot += (vector[i] ?? 0) * (query[i] ?? 0);
            }
            hits.push({ sectionId, score: dot / (norm * queryNorm) });
        }

        return hits
            .sort((a, b) => b.score - a.score || a.sectionId.localeCompare(b.sectionId))
            .slice(0, options.limit);
    }
}
