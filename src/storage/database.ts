import Database from 'better-sqlite3';
import { z } from 'zod';
import {
    ENTITY_TYPES,
    RelationshipType,
    type Community,
    type CommunityAssignment,
    type Document,
    type Entity,
    type Relationship,
    type Section,
    type TreeNode,
} from '../types/index.js';
import type { GraphState } from '../graph/graph-store.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Documents: one row per ingested version
CREATE TABLE IF NOT EXISTS documents (
  id TEXT NOT NULL,
  version INTEGER NOT NULL,
  domain TEXT NOT NULL,
  title TEXT NOT NULL,
  page_count INTEGER NOT NULL,
  ingested_at TEXT NOT NULL,
  PRIMARY KEY (id, version)
);

-- Sections: immutable retrieval units
CREATE TABLE IF NOT EXISTS sections (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  document_version INTEGER NOT NULL,
  sequence INTEGER NOT NULL,
  title TEXT NOT NULL,
  text TEXT NOT NULL,
  page_start INTEGER NOT NULL,
  page_end INTEGER NOT NULL,
  embedding_json TEXT NOT NULL,
  FOREIGN KEY (document_id, document_version) REFERENCES documents(id, version)
);

-- Entities: canonical nodes
CREATE TABLE IF NOT EXISTS entities (
  id TEXT PRIMARY KEY,
  type TEXT NOT NULL,
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  created_seq INTEGER NOT NULL,
  embedding_json TEXT
);

-- Entity aliases (append-only, ordered)
CREATE TABLE IF NOT EXISTS entity_aliases (
  entity_id TEXT NOT NULL REFERENCES entities(id),
  alias TEXT NOT NULL,
  position INTEGER NOT NULL,
  PRIMARY KEY (entity_id, alias)
);

-- Merge redirects: absorbed id → surviving id
CREATE TABLE IF NOT EXISTS entity_redirects (
  absorbed_id TEXT PRIMARY KEY,
  survivor_id TEXT NOT NULL
);

-- Relationships between entity, document and section nodes
CREATE TABLE IF NOT EXISTS relationships (
  id TEXT PRIMARY KEY,
  type TEXT NOT NULL,
  source_kind TEXT NOT NULL,
  source_id TEXT NOT NULL,
  target_kind TEXT NOT NULL,
  target_id TEXT NOT NULL,
  weight REAL NOT NULL DEFAULT 1.0,
  seq INTEGER NOT NULL
);

-- Type votes per normalized key and origin
CREATE TABLE IF NOT EXISTS type_votes (
  key TEXT NOT NULL,
  type TEXT NOT NULL,
  origin TEXT NOT NULL,
  PRIMARY KEY (key, type, origin)
);

-- Tree index of the latest registered version of each document
CREATE TABLE IF NOT EXISTS trees (
  document_id TEXT PRIMARY KEY,
  version INTEGER NOT NULL,
  page_count INTEGER NOT NULL,
  tree_json TEXT NOT NULL
);

-- Published community mappings
CREATE TABLE IF NOT EXISTS community_versions (
  version INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL,
  modularity REAL NOT NULL,
  communities_json TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS community_assignments (
  version INTEGER NOT NULL REFERENCES community_versions(version),
  entity_id TEXT NOT NULL,
  community_id INTEGER NOT NULL,
  PRIMARY KEY (version, entity_id)
);

-- Counters and other scalar state
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sections_document ON sections(document_id, document_version);
CREATE INDEX IF NOT EXISTS idx_relationships_source ON relationships(source_kind, source_id);
CREATE INDEX IF NOT EXISTS idx_relationships_target ON relationships(target_kind, target_id);
CREATE INDEX IF NOT EXISTS idx_relationships_type ON relationships(type);
`;

// ─── Row schemas ──────────────────────────────────────────────

const vectorJson = z.string().transform((text, ctx) => {
    const parsed = z.array(z.number()).safeParse(JSON.parse(text));
    if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'embedding_json is not a number array' });
        return z.NEVER;
    }
    return parsed.data;
});

const documentRow = z.object({
    id: z.string(),
    version: z.number().int(),
    domain: z.string(),
    title: z.string(),
    page_count: z.number().int(),
    ingested_at: z.string(),
});

const sectionRow = z.object({
    id: z.string(),
    document_id: z.string(),
    document_version: z.number().int(),
    sequence: z.number().int(),
    title: z.string(),
    text: z.string(),
    page_start: z.number().int(),
    page_end: z.number().int(),
    embedding_json: vectorJson,
});

const entityRow = z.object({
    id: z.string(),
    type: z.enum(ENTITY_TYPES),
    name: z.string(),
    description: z.string(),
    created_seq: z.number().int(),
    embedding_json: vectorJson.nullable(),
});

const aliasRow = z.object({ entity_id: z.string(), alias: z.string() });
const redirectRow = z.object({ absorbed_id: z.string(), survivor_id: z.string() });
const nodeKind = z.enum(['entity', 'document', 'section']);

const relationshipRow = z.object({
    id: z.string(),
    type: z.nativeEnum(RelationshipType),
    source_kind: nodeKind,
    source_id: z.string(),
    target_kind: nodeKind,
    target_id: z.string(),
    weight: z.number(),
    seq: z.number().int(),
});

const typeVoteRow = z.object({ key: z.string(), type: z.enum(ENTITY_TYPES), origin: z.string() });
const metaRow = z.object({ value: z.string() });
const countRow = z.object({ count: z.number().int() });

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
    z.object({
        id: z.string(),
        documentId: z.string(),
        title: z.string(),
        summary: z.string(),
        pageStart: z.number().int(),
        pageEnd: z.number().int(),
        children: z.array(treeNodeSchema),
        sectionIds: z.array(z.string()),
    })
);

const treeRow = z.object({
    document_id: z.string(),
    version: z.number().int(),
    page_count: z.number().int(),
    tree_json: z.string(),
});

const communitySchema = z.object({
    id: z.number().int(),
    label: z.string(),
    members: z.array(z.string()),
    keyEntities: z.array(z.string()),
});

const communityVersionRow = z.object({
    version: z.number().int(),
    created_at: z.string(),
    modularity: z.number(),
    communities_json: z.string(),
});

const assignmentRow = z.object({ entity_id: z.string(), community_id: z.number().int() });

export interface StoredTree {
    documentId: string;
    version: number;
    pageCount: number;
    root: TreeNode;
}

export interface DatabaseStats {
    documents: number;
    sections: number;
    entities: number;
    relationships: number;
    trees: number;
    communityVersions: number;
    relationshipsByType: Record<string, number>;
}

/**
 * Persistent snapshot of the engine's state, backed by better-sqlite3.
 * Handles schema migration, WAL mode and foreign keys. Graph saves replace
 * the previous snapshot in one transaction.
 */
export class GraphDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = z.number().parse(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.info('Database migrated to v1');
        }
    }

    // ─── Graph ────────────────────────────────────────────────

    /**
     * Replace the stored graph with `state`.
     */
    saveGraph(state: GraphState): void {
        const insertDocument = this.db.prepare(`
      INSERT INTO documents (id, version, domain, title, page_count, ingested_at)
      VALUES (@id, @version, @domain, @title, @pageCount, @ingestedAt)
    `);
        const insertSection = this.db.prepare(`
      INSERT INTO sections (id, document_id, document_version, sequence, title, text, page_start, page_end, embedding_json)
      VALUES (@id, @documentId, @documentVersion, @sequence, @title, @text, @pageStart, @pageEnd, @embeddingJson)
    `);
        const insertEntity = this.db.prepare(`
      INSERT INTO entities (id, type, name, description, created_seq, embedding_json)
      VALUES (@id, @type, @name, @description, @createdSeq, @embeddingJson)
    `);
        const insertAlias = this.db.prepare('INSERT INTO entity_aliases (entity_id, alias, position) VALUES (?, ?, ?)');
        const insertRedirect = this.db.prepare('INSERT INTO entity_redirects (absorbed_id, survivor_id) VALUES (?, ?)');
        const insertRelationship = this.db.prepare(`
      INSERT INTO relationships (id, type, source_kind, source_id, target_kind, target_id, weight, seq)
      VALUES (@id, @type, @sourceKind, @sourceId, @targetKind, @targetId, @weight, @seq)
    `);
        const insertVote = this.db.prepare('INSERT OR IGNORE INTO type_votes (key, type, origin) VALUES (?, ?, ?)');
        const setMeta = this.db.prepare('INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)');

        const replaceAll = this.db.transaction((graph: GraphState) => {
            for (const table of ['sections', 'documents', 'entity_aliases', 'entities', 'entity_redirects', 'relationships', 'type_votes']) {
                this.db.prepare(`DELETE FROM ${table}`).run();
            }

            for (const document of graph.documents) {
                insertDocument.run({
                    id: document.id,
                    version: document.version,
                    domain: document.domain,
                    title: document.title,
                    pageCount: document.pageCount,
                    ingestedAt: document.ingestedAt,
                });
                for (const section of document.sections) {
                    insertSection.run({
                        id: section.id,
                        documentId: section.documentId,
                        documentVersion: section.documentVersion,
                        sequence: section.sequence,
                        title: section.title,
                        text: section.text,
                        pageStart: section.pageStart,
                        pageEnd: section.pageEnd,
                        embeddingJson: JSON.stringify(section.embedding),
                    });
                }
            }

            for (const entity of graph.entities) {
                insertEntity.run({
                    id: entity.id,
                    type: entity.type,
                    name: entity.name,
                    description: entity.description,
                    createdSeq: entity.createdSeq,
                    embeddingJson: entity.embedding ? JSON.stringify(entity.embedding) : null,
                });
                entity.aliases.forEach((alias, position) => insertAlias.run(entity.id, alias, position));
            }

            for (const [absorbed, survivor] of graph.redirects) {
                insertRedirect.run(absorbed, survivor);
            }

            for (const rel of graph.relationships) {
                insertRelationship.run({
                    id: rel.id,
                    type: rel.type,
                    sourceKind: rel.source.kind,
                    sourceId: rel.source.id,
                    targetKind: rel.target.kind,
                    targetId: rel.target.id,
                    weight: rel.weight,
                    seq: rel.seq,
                });
            }

            for (const vote of graph.typeVotes) {
                insertVote.run(vote.key, vote.type, vote.origin);
            }

            setMeta.run('entity_seq', String(graph.counters.entitySeq));
            setMeta.run('relationship_seq', String(graph.counters.relationshipSeq));
        });

        replaceAll(state);
        logger.debug(
            { documents: state.documents.length, entities: state.entities.length, relationships: state.relationships.length },
            'Graph saved'
        );
    }

    loadGraph(): GraphState {
        const sections = new Map<string, Section[]>();
        for (const raw of this.db.prepare('SELECT * FROM sections ORDER BY document_id, document_version, sequence').all()) {
            const row = sectionRow.parse(raw);
            const key = `${row.document_id}@v${row.document_version}`;
            const section: Section = {
                id: row.id,
                documentId: row.document_id,
                documentVersion: row.document_version,
                sequence: row.sequence,
                title: row.title,
                text: row.text,
                pageStart: row.page_start,
                pageEnd: row.page_end,
                embedding: row.embedding_json,
            };
            const list = sections.get(key);
            if (list) list.push(section);
            else sections.set(key, [section]);
        }

        const documents: Document[] = this.db
            .prepare('SELECT * FROM documents ORDER BY id, version')
            .all()
            .map((raw) => {
                const row = documentRow.parse(raw);
                return {
                    id: row.id,
                    version: row.version,
                    domain: row.domain,
                    title: row.title,
                    pageCount: row.page_count,
                    ingestedAt: row.ingested_at,
                    sections: sections.get(`${row.id}@v${row.version}`) ?? [],
                };
            });

        const aliases = new Map<string, string[]>();
        for (const raw of this.db.prepare('SELECT entity_id, alias FROM entity_aliases ORDER BY entity_id, position').all()) {
            const row = aliasRow.parse(raw);
            const list = aliases.get(row.entity_id);
            if (list) list.push(row.alias);
            else aliases.set(row.entity_id, [row.alias]);
        }

        const entities: Entity[] = this.db
            .prepare('SELECT * FROM entities ORDER BY created_seq')
            .all()
            .map((raw) => {
                const row = entityRow.parse(raw);
                return {
                    id: row.id,
                    type: row.type,
                    name: row.name,
                    aliases: aliases.get(row.id) ?? [],
                    description: row.description,
                    createdSeq: row.created_seq,
                    embedding: row.embedding_json,
                };
            });

        const redirects: Array<[string, string]> = this.db
            .prepare('SELECT absorbed_id, survivor_id FROM entity_redirects ORDER BY absorbed_id')
            .all()
            .map((raw) => {
                const row = redirectRow.parse(raw);
                return [row.absorbed_id, row.survivor_id];
            });

        const relationships: Relationship[] = this.db
            .prepare('SELECT * FROM relationships ORDER BY seq')
            .all()
            .map((raw) => {
                const row = relationshipRow.parse(raw);
                return {
                    id: row.id,
                    type: row.type,
                    source: { kind: row.source_kind, id: row.source_id },
                    target: { kind: row.target_kind, id: row.target_id },
                    weight: row.weight,
                    seq: row.seq,
                };
            });

        const typeVotes = this.db
            .prepare('SELECT key, type, origin FROM type_votes ORDER BY key, type, origin')
            .all()
            .map((raw) => typeVoteRow.parse(raw));

        return {
            entities,
            redirects,
            documents,
            relationships,
            typeVotes,
            counters: {
                entitySeq: this.getCounter('entity_seq'),
                relationshipSeq: this.getCounter('relationship_seq'),
            },
        };
    }

    private getCounter(key: string): number {
        const raw = this.db.prepare('SELECT value FROM meta WHERE key = ?').get(key);
        if (raw === undefined) return 0;
        const value = Number(metaRow.parse(raw).value);
        return Number.isFinite(value) ? value : 0;
    }

    // ─── Trees ────────────────────────────────────────────────

    saveTrees(trees: readonly StoredTree[]): void {
        const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO trees (document_id, version, page_count, tree_json)
      VALUES (?, ?, ?, ?)
    `);

        const insertAll = this.db.transaction((entries: readonly StoredTree[]) => {
            for (const tree of entries) {
                stmt.run(tree.documentId, tree.version, tree.pageCount, JSON.stringify(tree.root));
            }
        });

        insertAll(trees);
    }

    loadTrees(): StoredTree[] {
        return this.db
            .prepare('SELECT * FROM trees ORDER BY document_id')
            .all()
            .map((raw) => {
                const row = treeRow.parse(raw);
                return {
                    documentId: row.document_id,
                    version: row.version,
                    pageCount: row.page_count,
                    root: treeNodeSchema.parse(JSON.parse(row.tree_json)),
                };
            });
    }

    // ─── Communities ──────────────────────────────────────────

    /**
     * Store a published community mapping. Earlier versions are kept.
     */
    saveCommunities(mapping: CommunityAssignment): void {
        const versionStmt = this.db.prepare(`
      INSERT OR REPLACE INTO community_versions (version, created_at, modularity, communities_json)
      VALUES (?, ?, ?, ?)
    `);
        const assignmentStmt = this.db.prepare(`
      INSERT OR REPLACE INTO community_assignments (version, entity_id, community_id)
      VALUES (?, ?, ?)
    `);

        const insertAll = this.db.transaction(() => {
            versionStmt.run(mapping.version, mapping.createdAt, mapping.modularity, JSON.stringify(mapping.communities));
            for (const [entityId, communityId] of mapping.assignment) {
                assignmentStmt.run(mapping.version, entityId, communityId);
            }
        });

        insertAll();
    }

    /**
     * The most recently published community mapping, or null when none was saved.
     */
    loadLatestCommunities(): CommunityAssignment | null {
        const raw = this.db.prepare('SELECT * FROM community_versions ORDER BY version DESC LIMIT 1').get();
        if (raw === undefined) return null;
        const row = communityVersionRow.parse(raw);

        const communities: Community[] = z.array(communitySchema).parse(JSON.parse(row.communities_json));
        const assignment = new Map<string, number>();
        for (const entry of this.db
            .prepare('SELECT entity_id, community_id FROM community_assignments WHERE version = ?')
            .all(row.version)) {
            const parsed = assignmentRow.parse(entry);
            assignment.set(parsed.entity_id, parsed.community_id);
        }

        return {
            version: row.version,
            createdAt: row.created_at,
            assignment,
            communities,
            modularity: row.modularity,
        };
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const count = (table: string): number =>
            countRow.parse(this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get()).count;

        const relationshipsByType: Record<string, number> = {};
        for (const raw of this.db.prepare('SELECT type, COUNT(*) as count FROM relationships GROUP BY type').all()) {
            const row = countRow.extend({ type: z.string() }).parse(raw);
            relationshipsByType[row.type] = row.count;
        }

        return {
            documents: count('documents'),
            sections: count('sections'),
            entities: count('entities'),
            relationships: count('relationships'),
            trees: count('trees'),
            communityVersions: count('community_versions'),
            relationshipsByType,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Get the raw database handle (for tests).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Database closed');
    }
}
