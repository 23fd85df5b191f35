import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { z } from 'zod';
import { GraphDatabase } from '../storage/database.js';
import { GraphStore } from '../graph/graph-store.js';
import { CommunityDetector } from '../graph/community-detector.js';
import { CommunityRegistry } from '../graph/community-registry.js';
import { buildTree } from '../tree/tree-index.js';
import { RelationshipType } from '../types/index.js';
import { makeDocument, newEntity } from './helpers.js';

function seededStore(): GraphStore {
    const store = new GraphStore();
    store.putDocument(
        makeDocument('zk', {
            domain: 'privacy',
            sections: [
                { title: 'Intro', text: 'Zero-knowledge proofs hide amounts.', pageStart: 1, pageEnd: 2 },
                { title: 'Costs', text: 'Verification is cheap.', pageStart: 3, pageEnd: 3 },
            ],
        })
    );
    store.putEntity(newEntity('concept:privacy', 'Concept', 'Privacy'));
    store.putEntity(newEntity('concept:zkp', 'Concept', 'ZKP'));
    store.putEntity(newEntity('concept:zero-knowledge-proof', 'Concept', 'Zero-Knowledge Proof'));
    store.putRelationship({
        type: RelationshipType.RELATED_TO,
        source: { kind: 'entity', id: 'concept:zero-knowledge-proof' },
        target: { kind: 'entity', id: 'concept:privacy' },
        weight: 0.5,
    });
    store.putRelationship({
        type: RelationshipType.DISCUSSES,
        source: { kind: 'section', id: 'zk@v1#0' },
        target: { kind: 'entity', id: 'concept:zkp' },
    });
    store.mergeEntities('concept:zkp', 'concept:zero-knowledge-proof');
    store.recordTypeVote('zkp', 'Concept', 'zk@v1#0');
    return store;
}

describe('GraphDatabase', () => {
    let db: GraphDatabase;
    let dbPath: string;

    beforeEach(() => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'groundwork-test-'));
        dbPath = path.join(tmpDir, 'test.db');
        db = new GraphDatabase(dbPath);
    });

    afterEach(() => {
        db.close();
        fs.rmSync(path.dirname(dbPath), { recursive: true, force: true });
    });

    describe('initialization', () => {
        it('should create every table', () => {
            const rows = db
                .getRawDb()
                .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
                .all();
            const names = z.array(z.object({ name: z.string() })).parse(rows).map((row) => row.name);

            expect(names).toEqual([
                'community_assignments',
                'community_versions',
                'documents',
                'entities',
                'entity_aliases',
                'entity_redirects',
                'meta',
                'relationships',
                'sections',
                'trees',
                'type_votes',
            ]);
        });

        it('should set PRAGMA user_version = 1', () => {
            expect(db.getRawDb().pragma('user_version', { simple: true })).toBe(1);
        });

        it('should enable WAL mode', () => {
            expect(db.getRawDb().pragma('journal_mode', { simple: true })).toBe('wal');
        });

        it('should not re-run the migration when reopened', () => {
            db.close();
            db = new GraphDatabase(dbPath);
            expect(db.getRawDb().pragma('user_version', { simple: true })).toBe(1);
        });
    });

    describe('graph', () => {
        it('should load an empty graph from a new database', () => {
            expect(db.loadGraph()).toEqual({
                entities: [],
                redirects: [],
                documents: [],
                relationships: [],
                typeVotes: [],
                counters: { entitySeq: 0, relationshipSeq: 0 },
            });
        });

        it('should round-trip a graph snapshot', () => {
            const state = seededStore().snapshot();

            db.saveGraph(state);

            expect(db.loadGraph()).toEqual(state);
        });

        it('should restore a store that keeps resolving redirects', () => {
            db.saveGraph(seededStore().snapshot());

            const restored = new GraphStore();
            restored.load(db.loadGraph());

            expect(restored.getEntity('concept:zero-knowledge-proof')?.id).toBe('concept:zkp');
            expect(restored.getNeighbors('concept:zkp', undefined, 1).map((hit) => hit.entityId)).toEqual(['concept:privacy']);
            expect(restored.verifyIntegrity().dangling).toEqual([]);
        });

        it('should replace the previous snapshot on save', () => {
            db.saveGraph(seededStore().snapshot());
            db.saveGraph(new GraphStore().snapshot());

            const stats = db.getStats();
            expect(stats.documents).toBe(0);
            expect(stats.entities).toBe(0);
            expect(stats.relationships).toBe(0);
        });
    });

    describe('trees', () => {
        it('should round-trip stored trees', () => {
            const document = seededStore().getDocument('zk');
            if (!document) throw new Error('missing document');
            const root = buildTree(
                'zk',
                {
                    title: 'zk',
                    pageStart: 1,
                    pageEnd: 3,
                    children: [
                        { title: 'Intro', pageStart: 1, pageEnd: 2 },
                        { title: 'Costs', pageStart: 3, pageEnd: 3 },
                    ],
                },
                document.sections,
                3
            );

            db.saveTrees([{ documentId: 'zk', version: 1, pageCount: 3, root }]);

            expect(db.loadTrees()).toEqual([{ documentId: 'zk', version: 1, pageCount: 3, root }]);
        });
    });

    describe('communities', () => {
        it('should return null before any mapping is saved', () => {
            expect(db.loadLatestCommunities()).toBeNull();
        });

        it('should load the latest published mapping', () => {
            const registry = new CommunityRegistry();
            const detected = new CommunityDetector().detect(seededStore().snapshot());
            db.saveCommunities(registry.publish(detected));
            const latest = registry.publish(detected);
            db.saveCommunities(latest);

            const loaded = db.loadLatestCommunities();

            expect(loaded?.version).toBe(2);
            expect(loaded).toEqual(latest);
            expect(db.getStats().communityVersions).toBe(2);
        });
    });

    describe('stats', () => {
        it('should count rows per table and relationships per type', () => {
            db.saveGraph(seededStore().snapshot());

            expect(db.getStats()).toEqual({
                documents: 1,
                sections: 2,
                entities: 2,
                relationships: 4,
                trees: 0,
                communityVersions: 0,
                relationshipsByType: {
                    'contains-section': 2,
                    discusses: 1,
                    'related-to': 1,
                },
            });
        });
    });
});
