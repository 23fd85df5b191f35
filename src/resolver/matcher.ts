import type { Entity, EntityType, ResolverConfig } from '../types/index.js';
import type { GraphStore } from '../graph/graph-store.js';
import { STOPWORDS } from '../nlp/stopwords.js';
import { ngrams, normalizeKey } from '../nlp/tokenizer.js';
import { cosineSimilarity, keySimilarity } from '../nlp/similarity.js';
import { AliasTable } from './alias-table.js';

export type MatchSignal = 'exact' | 'alias' | 'near-exact' | 'embedding';

export interface EntityMatch {
    entityId: string;
    signal: MatchSignal;
    score: number;
}

/** Shortest n-gram considered for near-exact query matching */
const MIN_FUZZY_LENGTH = 4;

/**
 * Read-only matching of names and embeddings against canonical entities.
 * Shared by the resolver (same-type matching) and the graph retrieval
 * strategy (query n-gram → seed entity).
 */
export class EntityMatcher {
    constructor(
        private readonly store: GraphStore,
        private readonly aliases: AliasTable,
        private readonly config: ResolverConfig
    ) {}

    /**
     * Existing entities of `type` that match a normalized key or embedding,
     * strongest signal first.
     */
    match(key: string, type: EntityType, embedding: readonly number[] | null): EntityMatch[] {
        const found = new Map<string, EntityMatch>();
        const record = (entityId: string, signal: MatchSignal, score: number): void => {
            if (!found.has(entityId)) found.set(entityId, { entityId, signal, score });
        };

        for (const entity of this.store.findByKey(key)) {
            if (entity.type === type) record(entity.id, 'exact', 1);
        }

        for (const equivalent of this.aliases.equivalentKeys(key)) {
            for (const entity of this.store.findByKey(equivalent)) {
                if (entity.type === type) record(entity.id, 'alias', 1);
            }
        }

        for (const entity of this.store.allEntities(type)) {
            if (found.has(entity.id)) continue;

            const similarity = this.bestKeySimilarity(key, entity);
            if (similarity >= this.config.stringThreshold) {
                record(entity.id, 'near-exact', similarity);
                continue;
            }

            if (embedding && entity.embedding) {
                const cosine = cosineSimilarity(embedding, entity.embedding);
                if (cosine >= this.config.mergeThreshold) {
                    record(entity.id, 'embedding', cosine);
                }
            }
        }

        return [...found.values()];
    }

    /**
     * Whether two normalized keys name the same thing: equal, listed as
     * equivalent in the alias table, or near-exact by Dice coefficient.
     */
    keysMatch(a: string, b: string): boolean {
        if (a === b) return true;
        if (this.aliases.areEquivalent(a, b)) return true;
        return keySimilarity(a, b) >= this.config.stringThreshold;
    }

    embeddingsMatch(a: readonly number[] | null, b: readonly number[] | null): boolean {
        if (!a || !b) return false;
        return cosineSimilarity(a, b) >= this.config.mergeThreshold;
    }

    /**
     * Best Dice coefficient between a key and any alias of an entity.
     */
    bestKeySimilarity(key: string, entity: Entity): number {
        let best = 0;
        for (const alias of entity.aliases) {
            best = Math.max(best, keySimilarity(key, alias));
            if (best === 1) break;
        }
        return best;
    }

    /**
     * Seed entities for a free-text query, of any type.
     * Every 1–4 word n-gram of the normalized query is looked up by exact key,
     * alias-table equivalence and (for longer n-grams) near-exact match.
     *
     * @returns entity id → match score (1 for exact and alias matches)
     */
    seedsForQuery(query: string): Map<string, number> {
        const words = normalizeKey(query).split(' ').filter((word) => word.length > 0);
        const seeds = new Map<string, number>();
        const record = (entityId: string, score: number): void => {
            seeds.set(entityId, Math.max(score, seeds.get(entityId) ?? 0));
        };

        const entities = this.store.allEntities();

        for (const gram of ngrams(words, 1, 4)) {
            if (STOPWORDS.has(gram)) continue;

            for (const key of [gram, ...this.aliases.equivalentKeys(gram)]) {
                for (const entity of this.store.findByKey(key)) record(entity.id, 1);
            }

            if (gram.length < MIN_FUZZY_LENGTH) continue;
            for (const entity of entities) {
                const similarity = this.bestKeySimilarity(gram, entity);
                if (similarity >= this.config.stringThreshold) record(entity.id, similarity);
            }
        }

        return seeds;
    }
}
