import type { EmbeddingProvider, RetrievalStrategy, StrategyHit, StrategyName, StrategyOptions } from '../../types/index.js';
import type { GraphStore } from '../../graph/graph-store.js';
import type { VectorIndex } from '../../indexes/vector-index.js';
import { sectionFilter } from './section-filter.js';

/**
 * Embeds the query and returns the nearest sections by cosine similarity.
 */
export class VectorStrategy implements RetrievalStrategy {
    readonly name: StrategyName = 'vector';

    constructor(
        private readonly store: GraphStore,
        private readonly index: VectorIndex,
        private readonly embedder: EmbeddingProvider
    ) {}

    async search(query: string, options: StrategyOptions): Promise<StrategyHit[]> {
        const embedding = await this.embedder.embed(query, options.signal);
        options.signal.throwIfAborted();

        return this.index.search(embedding, {
            limit: options.limit,
            filter: sectionFilter(this.store, options.domains),
        });
    }
}
