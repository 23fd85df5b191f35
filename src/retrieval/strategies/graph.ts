import type { RetrievalStrategy, StrategyHit, StrategyName, StrategyOptions } from '../../types/index.js';
import type { GraphStore } from '../../graph/graph-store.js';
import type { CommunityRegistry } from '../../graph/community-registry.js';
import type { EntityMatcher } from '../../resolver/matcher.js';
import { getLogger } from '../../utils/logger.js';
import { sectionFilter } from './section-filter.js';

const logger = getLogger();

/** Multiplier for reached entities that share a community with a seed */
const COMMUNITY_BOOST = 1.25;

export interface GraphStrategyOptions {
    /** Hop limit for the traversal from each seed (1 to 3) */
    maxHops?: number;

    /** When set, entities in a seed's community weigh more */
    communities?: CommunityRegistry;
}

/**
 * Graph traversal retrieval.
 *
 * Query n-grams are matched to seed entities with the resolver's matcher,
 * each seed is expanded breadth-first, and every section discussing a
 * reached entity scores the sum of those entities' weights, where an entity
 * reached at `h` hops from a seed matched with score `s` weighs `s / (1 + h)`.
 */
export class GraphStrategy implements RetrievalStrategy {
    readonly name: StrategyName = 'graph';

    constructor(
        private readonly store: GraphStore,
        private readonly matcher: EntityMatcher,
        private readonly options: GraphStrategyOptions = {}
    ) {}

    async search(query: string, options: StrategyOptions): Promise<StrategyHit[]> {
        const seeds = this.matcher.seedsForQuery(query);
        if (seeds.size === 0) return [];

        const reached = new Map<string, number>();
        const record = (entityId: string, weight: number): void => {
            reached.set(entityId, Math.max(weight, reached.get(entityId) ?? 0));
        };

        for (const [seedId, seedScore] of [...seeds].sort(([a], [b]) => a.localeCompare(b))) {
            options.signal.throwIfAborted();
            record(seedId, seedScore);
            for (const hit of this.store.getNeighbors(seedId, undefined, this.options.maxHops)) {
                record(hit.entityId, seedScore / (1 + hit.hops));
            }
        }

        const mapping = this.options.communities?.current();
        if (mapping) {
            const seedCommunities = new Set<number>();
            for (const seedId of seeds.keys()) {
                const community = mapping.assignment.get(seedId);
                if (community !== undefined) seedCommunities.add(community);
            }
            for (const [entityId, weight] of reached) {
                const community = mapping.assignment.get(entityId);
                if (!seeds.has(entityId) && community !== undefined && seedCommunities.has(community)) {
                    reached.set(entityId, weight * COMMUNITY_BOOST);
                }
            }
        }

        const accept = sectionFilter(this.store, options.domains);
        const hits: StrategyHit[] = [];
        for (const [sectionId, entityIds] of this.store.sectionsForEntities(reached.keys())) {
            if (!accept(sectionId)) continue;
            const score = entityIds.reduce((sum, entityId) => sum + (reached.get(entityId) ?? 0), 0);
            hits.push({ sectionId, score });
        }

        logger.debug({ seeds: seeds.size, reached: reached.size, sections: hits.length }, 'Graph traversal done');

        return hits
            .sort((a, b) => b.score - a.score || a.sectionId.localeCompare(b.sectionId))
            .slice(0, options.limit);
    }
}
