import type { RetrievalStrategy, StrategyHit, StrategyName, StrategyOptions } from '../../types/index.js';
import type { GraphStore } from '../../graph/graph-store.js';
import type { LexicalIndex } from '../../indexes/lexical-index.js';
import { sectionFilter } from './section-filter.js';

export class LexicalStrategy implements RetrievalStrategy {
    readonly name: StrategyName = 'lexical';

    constructor(
        private readonly store: GraphStore,
        private readonly index: LexicalIndex
    ) {}

    async search(query: string, options: StrategyOptions): Promise<StrategyHit[]> {
        return this.index.search(query, {
            limit: options.limit,
            filter: sectionFilter(this.store, options.domains),
        });
    }
}
