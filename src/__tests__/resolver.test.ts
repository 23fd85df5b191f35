import { describe, it, expect, beforeEach, vi } from 'vitest';
import { GraphStore } from '../graph/graph-store.js';
import { EntityResolver } from '../resolver/entity-resolver.js';
import { AliasTable } from '../resolver/alias-table.js';
import { UnionFind } from '../resolver/union-find.js';
import type { EmbeddingProvider, ExtractedEntity } from '../types/index.js';
import { newEntity } from './helpers.js';

describe('UnionFind', () => {
    it('should group transitively connected items', () => {
        const uf = new UnionFind<string>();
        uf.union('a', 'b');
        uf.union('b', 'c');
        uf.add('d');

        const groups = uf.groups().map((group) => [...group].sort());
        expect(groups).toContainEqual(['a', 'b', 'c']);
        expect(groups).toContainEqual(['d']);
        expect(uf.find('c')).toBe(uf.find('a'));
    });
});

describe('AliasTable', () => {
    it('should treat variants and the canonical name as one group', () => {
        const table = AliasTable.builtin();
        expect(table.areEquivalent('zkp', 'zero knowledge proof')).toBe(true);
        expect(table.equivalentKeys('cbdc')).toContain('central bank digital currency');
        expect(table.canonicalOf('lightning network')).toBe('lightning network');
        expect(table.areEquivalent('zkp', 'cbdc')).toBe(false);
    });
});

describe('EntityResolver', () => {
    let store: GraphStore;
    let resolver: EntityResolver;

    beforeEach(() => {
        store = new GraphStore();
        resolver = new EntityResolver(store, { aliases: AliasTable.builtin() });
    });

    describe('alias resolution', () => {
        it('should resolve "Zero-Knowledge Proof" and "ZKP" to one entity with two aliases', async () => {
            const { assignments } = await resolver.resolveAndApply([
                { name: 'Zero-Knowledge Proof', type: 'Concept' },
                { name: 'ZKP', type: 'Concept' },
            ]);

            expect(assignments.get(0)).toBe('concept:zero-knowledge-proof');
            expect(assignments.get(1)).toBe('concept:zero-knowledge-proof');

            const entities = store.allEntities();
            expect(entities).toHaveLength(1);
            expect(entities[0]?.name).toBe('Zero-Knowledge Proof');
            expect(entities[0]?.aliases).toEqual(['zero knowledge proof', 'zkp']);
        });

        it('should attach a later alias mention to the existing entity', async () => {
            await resolver.resolveAndApply([{ name: 'Zero-Knowledge Proof', type: 'Concept' }], { origin: 's1' });
            const { plan, assignments } = await resolver.resolveAndApply([{ name: 'ZKP', type: 'Concept' }], { origin: 's2' });

            expect(plan.newEntities).toEqual([]);
            expect(plan.aliasAdditions.get('concept:zero-knowledge-proof')).toEqual(['zkp']);
            expect(assignments.get(0)).toBe('concept:zero-knowledge-proof');
        });
    });

    describe('idempotence', () => {
        it('should produce the same ids when resolving the same batch again', async () => {
            const batch: ExtractedEntity[] = [
                { name: 'Pedersen Commitment', type: 'Method' },
                { name: 'Privacy', type: 'Concept' },
            ];

            const first = await resolver.resolveAndApply(batch, { origin: 's1' });
            const before = store.allEntities();
            const second = await resolver.resolveAndApply(batch, { origin: 's1' });

            expect([...second.assignments]).toEqual([...first.assignments]);
            expect(second.plan.newEntities).toEqual([]);
            expect(second.plan.aliasAdditions.size).toBe(0);
            expect(store.allEntities()).toEqual(before);
        });

        it('should not write anything while planning', async () => {
            await resolver.resolve([{ name: 'Mempool', type: 'Concept' }]);
            expect(store.allEntities()).toEqual([]);
        });
    });

    describe('merge correctness', () => {
        it('should merge same-type candidates at or above the embedding threshold', async () => {
            await resolver.resolveAndApply([{ name: 'Alpha Method', type: 'Method', embedding: [1, 0, 0] }]);
            const { assignments } = await resolver.resolveAndApply([
                { name: 'Beta Technique', type: 'Method', embedding: [0.9, 0.1, 0] },
            ]);

            expect(assignments.get(0)).toBe('method:alpha-method');
            expect(store.getEntity('method:alpha-method')?.aliases).toEqual(['alpha method', 'beta technique']);
        });

        it('should keep same-type candidates below the threshold apart', async () => {
            await resolver.resolveAndApply([{ name: 'Alpha Method', type: 'Method', embedding: [1, 0, 0] }]);
            const { assignments } = await resolver.resolveAndApply([
                { name: 'Beta Technique', type: 'Method', embedding: [0.5, 0.866, 0] },
            ]);

            expect(assignments.get(0)).toBe('method:beta-technique');
            expect(store.allEntities()).toHaveLength(2);
        });

        it('should never merge entities of different types', async () => {
            await resolver.resolveAndApply([{ name: 'Alpha Method', type: 'Method', embedding: [1, 0, 0] }]);
            const { assignments } = await resolver.resolveAndApply([
                { name: 'Gamma', type: 'Concept', embedding: [1, 0, 0] },
            ]);

            expect(assignments.get(0)).toBe('concept:gamma');
        });

        it('should merge near-exact keys', async () => {
            await resolver.resolveAndApply([{ name: 'Threshold Signature', type: 'Method' }]);
            const { assignments } = await resolver.resolveAndApply([{ name: 'Threshold Signatures', type: 'Method' }]);

            expect(assignments.get(0)).toBe('method:threshold-signature');
        });

        it('should use the embedding provider when candidates carry no embedding', async () => {
            const embedder: EmbeddingProvider = {
                name: 'fixed',
                dimensions: 2,
                embed: vi.fn(async () => [1, 0]),
            };
            const withEmbedder = new EntityResolver(store, { embedder });

            await withEmbedder.resolveAndApply([{ name: 'Settlement Layer', type: 'Concept' }]);
            const { assignments } = await withEmbedder.resolveAndApply([{ name: 'Finality Layer', type: 'Concept' }]);

            expect(embedder.embed).toHaveBeenCalledWith('Finality Layer');
            expect(assignments.get(0)).toBe('concept:settlement-layer');
        });

        it('should ignore an embedding provider outage', async () => {
            const embedder: EmbeddingProvider = {
                name: 'down',
                dimensions: 2,
                embed: vi.fn(async () => {
                    throw new Error('provider down');
                }),
            };
            const withEmbedder = new EntityResolver(store, { embedder });

            const { assignments, plan } = await withEmbedder.resolveAndApply([{ name: 'Mempool', type: 'Concept' }]);

            expect(assignments.get(0)).toBe('concept:mempool');
            expect(plan.newEntities[0]?.embedding).toBeNull();
        });

        it('should suffix ids that are already taken', async () => {
            store.putEntity(newEntity('concept:privacy', 'Concept', 'Confidentiality'));
            const { assignments } = await resolver.resolveAndApply([{ name: 'Privacy', type: 'Concept' }]);

            expect(assignments.get(0)).toBe('concept:privacy-2');
        });
    });

    describe('type conflicts', () => {
        it('should flag a tied type vote and keep the established type', async () => {
            const { plan, assignments } = await resolver.resolveAndApply(
                [
                    { name: 'Privacy', type: 'Concept' },
                    { name: 'privacy', type: 'Method' },
                ],
                { origin: 'doc@v1#0' }
            );

            expect(plan.flagged).toEqual([
                {
                    index: 1,
                    name: 'privacy',
                    key: 'privacy',
                    claimedType: 'Method',
                    assignedType: 'Concept',
                    votes: { Concept: 1, Method: 1 },
                    reason: 'type-tie',
                },
            ]);
            expect(assignments.get(0)).toBe('concept:privacy');
            expect(assignments.get(1)).toBe('concept:privacy');
        });

        it('should follow the majority of prior assignments', async () => {
            await resolver.resolveAndApply([{ name: 'Privacy', type: 'Concept' }], { origin: 'a' });

            const outvoted = await resolver.resolveAndApply([{ name: 'Privacy', type: 'Method' }], { origin: 'b' });
            expect(outvoted.plan.flagged).toEqual([]);
            expect(outvoted.assignments.get(0)).toBe('concept:privacy');

            const tied = await resolver.resolveAndApply([{ name: 'Privacy', type: 'Method' }], { origin: 'c' });
            expect(tied.plan.flagged).toHaveLength(1);
            expect(tied.assignments.get(0)).toBe('concept:privacy');

            const majority = await resolver.resolveAndApply([{ name: 'Privacy', type: 'Method' }], { origin: 'd' });
            expect(majority.plan.flagged).toEqual([]);
            expect(majority.assignments.get(0)).toBe('method:privacy');
        });

        it('should count an origin once however often it is re-applied', async () => {
            await resolver.resolveAndApply([{ name: 'Privacy', type: 'Concept' }], { origin: 'a' });
            await resolver.resolveAndApply([{ name: 'Privacy', type: 'Method' }], { origin: 'b' });
            await resolver.resolveAndApply([{ name: 'Privacy', type: 'Method' }], { origin: 'b' });

            expect(store.typeVotes('privacy').get('Method')?.size).toBe(1);
        });
    });

    describe('malformed candidates', () => {
        it('should isolate malformed candidates and resolve the rest', async () => {
            const { plan, assignments } = await resolver.resolveAndApply([
                { name: '   ', type: 'Concept' },
                { name: '!!!', type: 'Concept' },
                { name: 'Valid', type: 'Concept', embedding: [Number.NaN] },
                { name: 'Ledger', type: 'Concept' },
            ]);

            expect(plan.unresolved).toEqual([
                { index: 0, name: '', reason: 'empty name' },
                { index: 1, name: '!!!', reason: 'name has no letters or digits' },
                { index: 2, name: 'Valid', reason: 'embedding contains non-finite values' },
            ]);
            expect([...assignments]).toEqual([[3, 'concept:ledger']]);
        });
    });

    describe('consolidation', () => {
        it('should merge entities created side by side, oldest surviving', async () => {
            store.putEntity(newEntity('concept:zkp', 'Concept', 'ZKP'));
            store.putEntity(newEntity('concept:zero-knowledge-proof', 'Concept', 'Zero-Knowledge Proof'));

            const merges = await resolver.consolidate(['concept:zero-knowledge-proof']);

            expect(merges).toEqual([{ survivor: 'concept:zkp', absorbed: 'concept:zero-knowledge-proof' }]);
            expect(store.getEntity('concept:zero-knowledge-proof')?.id).toBe('concept:zkp');
            expect(store.getEntity('concept:zkp')?.aliases).toEqual(['zkp', 'zero knowledge proof']);
        });

        it('should list near-matches that were not merged', async () => {
            await resolver.resolveAndApply([{ name: 'Secret Sharing', type: 'Method' }]);
            await resolver.resolveAndApply([{ name: 'Secret Sharing Scheme', type: 'Method' }]);

            const duplicates = resolver.findPotentialDuplicates();

            expect(duplicates).toHaveLength(1);
            expect(duplicates[0]?.a).toBe('method:secret-sharing');
            expect(duplicates[0]?.b).toBe('method:secret-sharing-scheme');
            expect(duplicates[0]?.similarity).toBeCloseTo(0.8);
        });
    });
});
