import { DEFAULT_CONFIG, type Bm25Config, type StrategyHit } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';
import type { IndexSearchOptions } from './vector-index.js';

/**
 * Inverted index with Okapi BM25 scoring over section text.
 *
 * score(q, d) = Σ idf(t) · tf·(k1 + 1) / (tf + k1·(1 − b + b·|d|/avgdl))
 * idf(t)      = ln((N − df + 0.5) / (df + 0.5) + 1)
 */
export class LexicalIndex {
    /** term → (section id → term frequency) */
    private postings = new Map<string, Map<string, number>>();
    private lengths = new Map<string, number>();
    private totalLength = 0;
    private readonly params: Bm25Config;

    constructor(params: Partial<Bm25Config> = {}) {
        this.params = { ...DEFAULT_CONFIG.retrieval.bm25, ...params };
    }

    get size(): number {
        return this.lengths.size;
    }

    add(sectionId: string, text: string): void {
        if (this.lengths.has(sectionId)) this.remove(sectionId);

        const tokens = tokenize(text);
        this.lengths.set(sectionId, tokens.length);
        this.totalLength += tokens.length;

        const counts = new Map<string, number>();
        for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);

        for (const [term, tf] of counts) {
            let posting = this.postings.get(term);
            if (!posting) {
                posting = new Map();
                this.postings.set(term, posting);
            }
            posting.set(sectionId, tf);
        }
    }

    remove(sectionId: string): boolean {
        const length = this.lengths.get(sectionId);
        if (length === undefined) return false;

        this.lengths.delete(sectionId);
        this.totalLength -= length;
        for (const [term, posting] of this.postings) {
            if (posting.delete(sectionId) && posting.size === 0) {
                this.postings.delete(term);
            }
        }
        return true;
    }

    has(sectionId: string): boolean {
        return this.lengths.has(sectionId);
    }

    /**
     * Number of indexed sections containing `term`.
     */
    documentFrequency(term: string): number {
        return this.postings.get(term)?.size ?? 0;
    }

    idf(term: string): number {
        const n = this.lengths.size;
        const df = this.documentFrequency(term);
        return Math.log((n - df + 0.5) / (df + 0.5) + 1);
    }

    /**
     * Sections with a positive BM25 score for the query, best first,
     * ties broken by section id.
     */
    search(query: string, options: IndexSearchOptions): StrategyHit[] {
        if (options.limit <= 0 || this.lengths.size === 0) return [];

        const terms = [...new Set(tokenize(query))];
        if (terms.length === 0) return [];

        const { k1, b } = this.params;
        const avgdl = this.totalLength / this.lengths.size || 1;
        const scores = new Map<string, number>();

        for (const term of terms) {
            const posting = this.postings.get(term);
            if (!posting) continue;
            const idf = this.idf(term);

            for (const [sectionId, tf] of posting) {
                if (options.filter && !options.filter(sectionId)) continue;
                const dl = this.lengths.get(sectionId) ?? 0;
                const weight = (tf * (k1 + 1)) / (tf + k1 * (1 - b + (b * dl) / avgdl));
                scores.set(sectionId, (scores.get(sectionId) ?? 0) + idf * weight);
            }
        }

        return [...scores.entries()]
            .filter(([, score]) => score > 0)
            .map(([sectionId, score]) => ({ sectionId, score }))
            .sort((x, y) => y.score - x.score || x.sectionId.localeCompare(y.sectionId))
            .slice(0, options.limit);
    }
}
