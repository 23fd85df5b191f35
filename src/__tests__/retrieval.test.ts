import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fuseResults, normalizeHits } from '../retrieval/fusion.js';
import { HybridRetriever } from '../retrieval/hybrid-retriever.js';
import { GraphStrategy } from '../retrieval/strategies/graph.js';
import { LexicalStrategy } from '../retrieval/strategies/lexical.js';
import { TreeStrategy } from '../retrieval/strategies/tree.js';
import { VectorStrategy } from '../retrieval/strategies/vector.js';
import { RetrievalCache } from '../cache/retrieval-cache.js';
import { GraphStore } from '../graph/graph-store.js';
import { CommunityRegistry } from '../graph/community-registry.js';
import { EntityMatcher } from '../resolver/matcher.js';
import { AliasTable } from '../resolver/alias-table.js';
import { LexicalIndex } from '../indexes/lexical-index.js';
import { VectorIndex } from '../indexes/vector-index.js';
import { TreeIndex } from '../tree/tree-index.js';
import { KeywordScorer } from '../tree/tree-search.js';
import {
    DEFAULT_CONFIG,
    RelationshipType,
    type EmbeddingProvider,
    type RetrievalStrategy,
    type StrategyHit,
    type StrategyName,
    type StrategyOptions,
} from '../types/index.js';
import { RetrievalUnavailableError } from '../utils/errors.js';
import { makeDocument, newEntity } from './helpers.js';

const corpus = makeDocument('corpus', {
    sections: Array.from({ length: 10 }, (_, i) => ({
        title: `Part ${i}`,
        text: `text ${i}`,
        pageStart: i + 1,
        pageEnd: i + 1,
    })),
});
const sections = new Map(corpus.sections.map((section) => [section.id, section]));
const getSection = (id: string) => sections.get(id);
const sid = (n: number): string => `corpus@v1#${n}`;

function stub(name: StrategyName, search: RetrievalStrategy['search']): RetrievalStrategy {
    return { name, search };
}

function fixed(name: StrategyName, hits: Array<[number, number]>): RetrievalStrategy {
    return stub(name, vi.fn(async () => hits.map(([n, score]) => ({ sectionId: sid(n), score }))));
}

const never = (): Promise<StrategyHit[]> => new Promise(() => undefined);

describe('Fusion', () => {
    it('should min-max normalize and keep the best score per section', () => {
        const normalized = normalizeHits([
            { sectionId: 'a', score: 2 },
            { sectionId: 'b', score: 4 },
            { sectionId: 'c', score: 3 },
            { sectionId: 'a', score: 1 },
        ]);

        expect([...normalized]).toEqual([
            ['a', { raw: 2, normalized: 0 }],
            ['b', { raw: 4, normalized: 1 }],
            ['c', { raw: 3, normalized: 0.5 }],
        ]);
    });

    it('should normalize a single hit to 1', () => {
        expect(normalizeHits([{ sectionId: 'a', score: 0.2 }]).get('a')).toEqual({ raw: 0.2, normalized: 1 });
    });

    it('should sum weighted scores and prefer sections found by more strategies on ties', () => {
        const results = fuseResults(
            [
                { strategy: 'lexical', hits: [{ sectionId: sid(1), score: 10 }, { sectionId: sid(2), score: 4 }] },
                { strategy: 'vector', hits: [{ sectionId: sid(0), score: 0.9 }, { sectionId: sid(1), score: 0.5 }] },
            ],
            { weights: DEFAULT_CONFIG.retrieval.weights, topK: 10, getSection }
        );

        expect(results.map((r) => [r.section.id, r.fusedScore])).toEqual([
            [sid(1), 0.25],
            [sid(0), 0.25],
            [sid(2), 0],
        ]);
        expect(results[0]?.strategies).toEqual(['vector', 'lexical']);
        expect(results[0]?.scores).toEqual({ vector: 0, lexical: 1 });
        expect(results[0]?.rawScores).toEqual({ vector: 0.5, lexical: 10 });
    });

    it('should drop hits for unknown sections', () => {
        const results = fuseResults([{ strategy: 'graph', hits: [{ sectionId: 'gone@v1#0', score: 1 }] }], {
            weights: DEFAULT_CONFIG.retrieval.weights,
            topK: 10,
            getSection,
        });
        expect(results).toEqual([]);
    });
});

describe('HybridRetriever', () => {
    it('should fuse disjoint strategy results into one deduplicated list', async () => {
        const retriever = new HybridRetriever({
            getSection,
            strategies: [
                fixed('vector', [[0, 0.9], [1, 0.8], [2, 0.7]]),
                fixed('graph', [[3, 2], [4, 1]]),
                fixed('lexical', [[5, 4], [6, 3], [7, 2], [8, 1]]),
                fixed('tree', [[9, 0.6]]),
            ],
        });

        const response = await retriever.retrieve('privacy');

        expect(response.results.map((r) => r.section.id)).toEqual(
            [0, 3, 5, 9, 6, 1, 7, 2, 4, 8].map(sid)
        );
        expect(response.results.every((r) => r.strategies.length === 1)).toBe(true);
        expect(response.hitCounts).toEqual({ vector: 3, graph: 2, lexical: 4, tree: 1 });
        expect(response.degraded).toEqual([]);
    });

    it('should return at most topK results', async () => {
        const retriever = new HybridRetriever({
            getSection,
            strategies: [fixed('lexical', [[5, 4], [6, 3], [7, 2], [8, 1]])],
        });

        const response = await retriever.retrieve('privacy', { topK: 2 });

        expect(response.results.map((r) => r.section.id)).toEqual([sid(5), sid(6)]);
    });

    it('should cap each strategy at its topN', async () => {
        const retriever = new HybridRetriever({
            getSection,
            config: { topN: { vector: 2, graph: 10, lexical: 10, tree: 10 } },
            strategies: [fixed('vector', [[0, 0.9], [1, 0.8], [2, 0.7]])],
        });

        const response = await retriever.retrieve('privacy');

        expect(response.hitCounts).toEqual({ vector: 2 });
    });

    it('should pass the domain filter and limit to strategies', async () => {
        const seen: StrategyOptions[] = [];
        const retriever = new HybridRetriever({
            getSection,
            strategies: [
                stub('lexical', async (_query, options) => {
                    seen.push(options);
                    return [];
                }),
            ],
        });

        await retriever.retrieve('privacy', { domains: ['privacy', 'cbdc'] });

        expect(seen[0]?.domains).toEqual(['privacy', 'cbdc']);
        expect(seen[0]?.limit).toBe(10);
    });

    it('should report a timed-out strategy as degraded and fuse the rest', async () => {
        const retriever = new HybridRetriever({
            getSection,
            config: { strategyTimeoutMs: 30 },
            strategies: [fixed('vector', [[0, 1]]), stub('graph', never)],
        });

        const response = await retriever.retrieve('privacy');

        expect(response.results.map((r) => r.section.id)).toEqual([sid(0)]);
        expect(response.degraded.map((d) => [d.strategy, d.reason])).toEqual([['graph', 'timeout']]);
    });

    it('should report a failing strategy as degraded', async () => {
        const retriever = new HybridRetriever({
            getSection,
            strategies: [
                fixed('vector', [[0, 1]]),
                stub('lexical', async () => {
                    throw new Error('index offline');
                }),
            ],
        });

        const response = await retriever.retrieve('privacy');

        expect(response.degraded).toEqual([{ strategy: 'lexical', reason: 'error', message: 'index offline' }]);
    });

    it('should fail when every strategy fails', async () => {
        const retriever = new HybridRetriever({
            getSection,
            config: { strategyTimeoutMs: 20 },
            strategies: [
                stub('vector', never),
                stub('lexical', async () => {
                    throw new Error('index offline');
                }),
            ],
        });

        const failure = await retriever.retrieve('privacy').catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(RetrievalUnavailableError);
        expect(failure instanceof RetrievalUnavailableError && failure.failures).toEqual([
            { strategy: 'vector', reason: 'timeout' },
            { strategy: 'lexical', reason: 'error' },
        ]);
    });

    it('should fail with four timeouts when every strategy hangs', async () => {
        const strategies = (['vector', 'graph', 'lexical', 'tree'] as const).map((name) => stub(name, vi.fn(never)));
        const retriever = new HybridRetriever({ getSection, config: { strategyTimeoutMs: 20 }, strategies });

        const failure = await retriever.retrieve('privacy').catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(RetrievalUnavailableError);
        expect(failure instanceof RetrievalUnavailableError && failure.failures).toEqual([
            { strategy: 'vector', reason: 'timeout' },
            { strategy: 'graph', reason: 'timeout' },
            { strategy: 'lexical', reason: 'timeout' },
            { strategy: 'tree', reason: 'timeout' },
        ]);
        for (const strategy of strategies) {
            expect(strategy.search).toHaveBeenCalledTimes(1);
        }
    });

    it('should fail when no strategies are configured', async () => {
        const retriever = new HybridRetriever({ getSection, strategies: [] });
        await expect(retriever.retrieve('privacy')).rejects.toThrow(RetrievalUnavailableError);
    });

    it('should reject a query that is already cancelled', async () => {
        const controller = new AbortController();
        controller.abort();
        const retriever = new HybridRetriever({ getSection, strategies: [fixed('vector', [[0, 1]])] });

        await expect(retriever.retrieve('privacy', { signal: controller.signal })).rejects.toThrow();
    });

    describe('caching', () => {
        let cache: RetrievalCache;

        beforeEach(() => {
            cache = new RetrievalCache();
        });

        it('should serve a repeated query from the cache', async () => {
            const vector = fixed('vector', [[0, 1]]);
            const retriever = new HybridRetriever({ getSection, cache, strategies: [vector] });

            const first = await retriever.retrieve('Privacy  budgets');
            const second = await retriever.retrieve('privacy budgets');

            expect(first.cached).toBe(false);
            expect(second.cached).toBe(true);
            expect(second.results).toEqual(first.results);
            expect(vector.search).toHaveBeenCalledTimes(1);
        });

        it('should key the cache on the domain filter', async () => {
            const vector = fixed('vector', [[0, 1]]);
            const retriever = new HybridRetriever({ getSection, cache, strategies: [vector] });

            await retriever.retrieve('privacy', { domains: ['cbdc'] });
            await retriever.retrieve('privacy', { domains: ['privacy'] });

            expect(vector.search).toHaveBeenCalledTimes(2);
        });

        it('should not cache degraded responses', async () => {
            const vector = fixed('vector', [[0, 1]]);
            const retriever = new HybridRetriever({
                getSection,
                cache,
                strategies: [
                    vector,
                    stub('lexical', async () => {
                        throw new Error('index offline');
                    }),
                ],
            });

            await retriever.retrieve('privacy');
            const second = await retriever.retrieve('privacy');

            expect(second.cached).toBe(false);
            expect(vector.search).toHaveBeenCalledTimes(2);
        });
    });
});

describe('Retrieval strategies', () => {
    let store: GraphStore;
    const signal = new AbortController().signal;
    const options = (domains: string[] | null = null): StrategyOptions => ({ domains, limit: 10, signal });

    beforeEach(() => {
        store = new GraphStore();
        store.putDocument(
            makeDocument('zk', {
                domain: 'privacy',
                sections: [
                    { title: 'Zero-knowledge proofs', text: 'zero knowledge proof systems', pageStart: 1, pageEnd: 1 },
                    { title: 'Ledger', text: 'ledger design', pageStart: 2, pageEnd: 2 },
                ],
            })
        );
        store.putDocument(
            makeDocument('retail', {
                domain: 'cbdc',
                sections: [{ title: 'Offline payments', text: 'offline token transfers', pageStart: 1, pageEnd: 1 }],
            })
        );

        store.putEntity(newEntity('concept:zero-knowledge-proof', 'Concept', 'Zero-Knowledge Proof'));
        store.putEntity(newEntity('concept:privacy', 'Concept', 'Privacy'));
        store.putEntity(newEntity('concept:ledger', 'Concept', 'Ledger'));
        store.putRelationship({
            type: RelationshipType.RELATED_TO,
            source: { kind: 'entity', id: 'concept:zero-knowledge-proof' },
            target: { kind: 'entity', id: 'concept:privacy' },
        });
        const discusses = (sectionId: string, entityId: string): void => {
            store.putRelationship({
                type: RelationshipType.DISCUSSES,
                source: { kind: 'section', id: sectionId },
                target: { kind: 'entity', id: entityId },
            });
        };
        discusses('zk@v1#0', 'concept:zero-knowledge-proof');
        discusses('zk@v1#1', 'concept:ledger');
        discusses('retail@v1#0', 'concept:privacy');
    });

    describe('GraphStrategy', () => {
        const matcherFor = (graph: GraphStore) => new EntityMatcher(graph, AliasTable.builtin(), DEFAULT_CONFIG.resolver);

        it('should score sections by seed match discounted per hop', async () => {
            const strategy = new GraphStrategy(store, matcherFor(store));

            const hits = await strategy.search('What is a zero knowledge proof?', options());

            expect(hits).toEqual([
                { sectionId: 'zk@v1#0', score: 1 },
                { sectionId: 'retail@v1#0', score: 0.5 },
            ]);
        });

        it('should seed from alias-table abbreviations', async () => {
            const strategy = new GraphStrategy(store, matcherFor(store));

            const hits = await strategy.search('ZKP', options());

            expect(hits[0]).toEqual({ sectionId: 'zk@v1#0', score: 1 });
        });

        it('should apply the domain filter', async () => {
            const strategy = new GraphStrategy(store, matcherFor(store));

            const hits = await strategy.search('zero knowledge proof', options(['privacy']));

            expect(hits.map((h) => h.sectionId)).toEqual(['zk@v1#0']);
        });

        it('should boost entities sharing a community with the seed', async () => {
            const communities = new CommunityRegistry();
            communities.publish({
                version: 0,
                createdAt: '2026-01-01T00:00:00.000Z',
                assignment: new Map([
                    ['concept:zero-knowledge-proof', 0],
                    ['concept:privacy', 0],
                ]),
                communities: [
                    {
                        id: 0,
                        label: 'privacy',
                        members: ['concept:privacy', 'concept:zero-knowledge-proof'],
                        keyEntities: ['concept:privacy'],
                    },
                ],
                modularity: 0,
            });
            const strategy = new GraphStrategy(store, matcherFor(store), { communities });

            const hits = await strategy.search('zero knowledge proof', options());

            expect(hits[1]).toEqual({ sectionId: 'retail@v1#0', score: 0.625 });
        });

        it('should return nothing when no entity matches', async () => {
            const strategy = new GraphStrategy(store, matcherFor(store));
            expect(await strategy.search('mempool congestion', options())).toEqual([]);
        });
    });

    describe('LexicalStrategy', () => {
        it('should only return sections from the latest document version', async () => {
            const index = new LexicalIndex();
            const v2 = makeDocument('zk', {
                version: 2,
                domain: 'privacy',
                sections: [{ title: 'Ledger', text: 'ledger design revisited', pageStart: 1, pageEnd: 1 }],
            });
            store.putDocument(v2);
            for (const section of [...store.listDocuments().flatMap((d) => d.sections)]) {
                index.add(section.id, `${section.title}\n${section.text}`);
            }

            const hits = await new LexicalStrategy(store, index).search('ledger', options());

            expect(hits.map((h) => h.sectionId)).toEqual(['zk@v2#0']);
        });
    });

    describe('VectorStrategy', () => {
        it('should embed the query and filter by domain', async () => {
            const index = new VectorIndex();
            index.add('zk@v1#0', [1, 0]);
            index.add('retail@v1#0', [0.8, 0.6]);
            const embedder: EmbeddingProvider = { name: 'stub', dimensions: 2, embed: vi.fn(async () => [1, 0]) };

            const strategy = new VectorStrategy(store, index, embedder);

            expect((await strategy.search('privacy', options())).map((h) => h.sectionId)).toEqual([
                'zk@v1#0',
                'retail@v1#0',
            ]);
            const filtered = await strategy.search('privacy', options(['cbdc']));
            expect(filtered.map((h) => h.sectionId)).toEqual(['retail@v1#0']);
            expect(filtered[0]?.score).toBeCloseTo(0.8);
        });
    });

    describe('TreeStrategy', () => {
        it('should score sections through their tree leaves', async () => {
            const trees = new TreeIndex();
            for (const document of store.latestDocuments()) trees.register(document);

            const strategy = new TreeStrategy(store, trees, new KeywordScorer(), DEFAULT_CONFIG.tree);

            expect(await strategy.search('offline', options())).toEqual([{ sectionId: 'retail@v1#0', score: 1 }]);
            expect(await strategy.search('offline', options(['privacy']))).toEqual([]);
        });

        it('should use keyword scoring for later trees once the scorer fails', async () => {
            const local = new GraphStore();
            const trees = new TreeIndex();
            for (let i = 0; i < 6; i++) {
                const document = makeDocument(`d${i}`, {
                    sections: [{ title: 'Offline payments', text: 'token transfers', pageStart: 1, pageEnd: 1 }],
                });
                local.putDocument(document);
                trees.register(document);
            }
            const score = vi.fn(async (): Promise<number> => {
                throw new Error('rater offline');
            });

            const strategy = new TreeStrategy(local, trees, { name: 'flaky', score }, DEFAULT_CONFIG.tree);
            const hits = await strategy.search('offline', options());

            expect(hits.map((h) => h.sectionId)).toEqual(['d0@v1#0', 'd1@v1#0', 'd2@v1#0', 'd3@v1#0', 'd4@v1#0', 'd5@v1#0']);
            expect(hits.every((h) => h.score === 1)).toBe(true);
            expect(score.mock.calls.length).toBeLessThanOrEqual(4);
        });
    });
});
