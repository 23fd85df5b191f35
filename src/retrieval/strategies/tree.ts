import pLimit from 'p-limit';
import type {
    RetrievalStrategy,
    StrategyHit,
    StrategyName,
    StrategyOptions,
    TreeConfig,
} from '../../types/index.js';
import type { GraphStore } from '../../graph/graph-store.js';
import type { TreeIndex } from '../../tree/tree-index.js';
import { KeywordScorer, searchTree, type NodeScorer } from '../../tree/tree-search.js';
import { sectionFilter } from './section-filter.js';

/** Trees searched at once */
const TREE_CONCURRENCY = 4;

/**
 * Hierarchical narrowing over the trees of the eligible documents. A section
 * scores the best confidence among the returned leaves that link to it.
 *
 * Once the scorer fails on one tree, trees not yet started in the same search
 * use keyword scoring.
 */
export class TreeStrategy implements RetrievalStrategy {
    readonly name: StrategyName = 'tree';

    constructor(
        private readonly store: GraphStore,
        private readonly trees: TreeIndex,
        private readonly scorer: NodeScorer,
        private readonly config: Omit<TreeConfig, 'scorer'>,
        private readonly nodeTimeoutMs?: number
    ) {}

    async search(query: string, options: StrategyOptions): Promise<StrategyHit[]> {
        const domains = options.domains && options.domains.length > 0 ? new Set(options.domains) : null;
        const documents = this.store
            .latestDocuments()
            .filter((document) => !domains || domains.has(document.domain))
            .sort((a, b) => a.id.localeCompare(b.id));

        let scorer = this.scorer;
        const limit = pLimit(TREE_CONCURRENCY);
        const searches = documents.map((document) =>
            limit(async () => {
                const root = this.trees.get(document.id);
                if (!root) return [];
                const { hits, degraded } = await searchTree(root, query, scorer, {
                    nodeBudget: this.config.nodeBudget,
                    pruneThreshold: this.config.pruneThreshold,
                    minConfidence: this.config.minConfidence,
                    aggregate: this.config.aggregate,
                    nodeTimeoutMs: this.nodeTimeoutMs,
                    signal: options.signal,
                });
                if (degraded && !(scorer instanceof KeywordScorer)) scorer = new KeywordScorer();
                return hits;
            })
        );

        const accept = sectionFilter(this.store, options.domains);
        const scores = new Map<string, number>();
        for (const hits of await Promise.all(searches)) {
            for (const hit of hits) {
                for (const sectionId of hit.node.sectionIds) {
                    if (!accept(sectionId)) continue;
                    scores.set(sectionId, Math.max(hit.confidence, scores.get(sectionId) ?? 0));
                }
            }
        }

        return [...scores.entries()]
            .map(([sectionId, score]) => ({ sectionId, score }))
            .sort((a, b) => b.score - a.score || a.sectionId.localeCompare(b.sectionId))
            .slice(0, options.limit);
    }
}
