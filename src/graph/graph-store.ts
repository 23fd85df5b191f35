import {
    RelationshipType,
    isEntityType,
    nodeKey,
    relationshipId,
    type Document,
    type Entity,
    type EntityType,
    type GraphConfig,
    type NewEntity,
    type NodeRef,
    type Relationship,
    type Section,
    DEFAULT_CONFIG,
} from '../types/index.js';
import { DanglingEdgeError } from '../utils/errors.js';
import { KeyedMutex } from '../utils/concurrency.js';
import { getLogger } from '../utils/logger.js';
import { breadthFirst, type TraversalHit } from './traversal.js';

const logger = getLogger();

/**
 * Serializable copy of the whole graph. Used for community detection
 * (copy-on-read) and for persistence.
 */
export interface GraphState {
    entities: Entity[];

    /** Absorbed id → surviving id */
    redirects: Array<[string, string]>;

    /** Every version of every document */
    documents: Document[];

    relationships: Relationship[];
    typeVotes: Array<{ key: string; type: EntityType; origin: string }>;
    counters: { entitySeq: number; relationshipSeq: number };
}

export interface RelationshipInput {
    type: RelationshipType;
    source: NodeRef;
    target: NodeRef;
    weight?: number;
}

export interface IntegrityReport {
    checked: number;
    dangling: Relationship[];
}

export interface GraphStats {
    entities: number;
    relationships: number;
    documents: number;
    sections: number;
    redirects: number;
    entitiesByType: Partial<Record<EntityType, number>>;
}

/**
 * In-memory graph of documents, sections and canonical entities.
 *
 * Entity records are replaced, never mutated, so a reader holding an
 * `Entity` always sees a consistent value. Same-entity writers coordinate
 * through `locks` (one promise chain per entity id).
 */
export class GraphStore {
    readonly locks = new KeyedMutex();

    private entities = new Map<string, Entity>();
    private redirectMap = new Map<string, string>();
    private aliasIndex = new Map<string, Set<string>>();
    private votes = new Map<string, Map<EntityType, Set<string>>>();

    private documents = new Map<string, Document[]>();
    private reservedVersions = new Map<string, number>();
    private sectionMap = new Map<string, Section>();

    private relationships = new Map<string, Relationship>();
    private adjacency = new Map<string, Set<string>>();

    private entitySeq = 0;
    private relationshipSeq = 0;
    private readonly config: GraphConfig;

    constructor(config: Partial<GraphConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG.graph, ...config };
    }

    // ─── Entities ───────────────────────────────────────────

    /**
     * Insert an entity. Writing an id that already exists is idempotent:
     * the stored entity keeps its fields and gains any new aliases.
     */
    putEntity(input: NewEntity): Entity {
        if (!isEntityType(input.type)) {
            throw new TypeError(`Unknown entity type: ${String(input.type)}`);
        }

        const existingId = this.canonicalId(input.id);
        if (existingId !== undefined) {
            return this.addAliases(existingId, input.aliases);
        }

        const entity: Entity = {
            ...input,
            aliases: [...new Set(input.aliases)],
            embedding: input.embedding ? [...input.embedding] : null,
            createdSeq: ++this.entitySeq,
        };
        this.entities.set(entity.id, entity);
        this.indexAliases(entity.id, entity.aliases);

        logger.debug({ id: entity.id, type: entity.type }, 'Entity created');
        return entity;
    }

    /**
     * Look up an entity, following merge redirects.
     */
    getEntity(id: string): Entity | undefined {
        const canonical = this.canonicalId(id);
        return canonical === undefined ? undefined : this.entities.get(canonical);
    }

    /**
     * Resolve an id through merge redirects; undefined when unknown.
     */
    canonicalId(id: string): string | undefined {
        let current = id;
        const seen = new Set<string>();
        while (!this.entities.has(current)) {
            const next = this.redirectMap.get(current);
            if (next === undefined || seen.has(next)) return undefined;
            seen.add(current);
            current = next;
        }
        return current;
    }

    /**
     * Append normalized keys to an entity's aliases. Existing aliases are never removed.
     */
    addAliases(id: string, keys: readonly string[]): Entity {
        const canonical = this.canonicalId(id);
        const entity = canonical === undefined ? undefined : this.entities.get(canonical);
        if (!entity) {
            throw new Error(`Unknown entity: ${id}`);
        }

        const additions = keys.filter((key) => key.length > 0 && !entity.aliases.includes(key));
        if (additions.length === 0) return entity;

        const updated: Entity = { ...entity, aliases: [...entity.aliases, ...new Set(additions)] };
        this.entities.set(entity.id, updated);
        this.indexAliases(entity.id, additions);
        return updated;
    }

    /**
     * Merge two entities. The older (lower creation sequence) absorbs the
     * newer regardless of argument order: it keeps its id, gains the newer's
     * aliases and relationships, and the newer id becomes a redirect.
     */
    mergeEntities(a: string, b: string): Entity {
        const idA = this.canonicalId(a);
        const idB = this.canonicalId(b);
        const entityA = idA === undefined ? undefined : this.entities.get(idA);
        const entityB = idB === undefined ? undefined : this.entities.get(idB);
        if (!entityA || !entityB) {
            throw new Error(`Cannot merge unknown entity: ${!entityA ? a : b}`);
        }
        if (entityA.id === entityB.id) return entityA;

        const [survivor, absorbed] = entityA.createdSeq <= entityB.createdSeq ? [entityA, entityB] : [entityB, entityA];

        const merged: Entity = {
            ...survivor,
            aliases: [...survivor.aliases, ...absorbed.aliases.filter((key) => !survivor.aliases.includes(key))],
            description: survivor.description || absorbed.description,
            embedding: survivor.embedding ?? absorbed.embedding,
        };

        this.entities.set(survivor.id, merged);
        this.entities.delete(absorbed.id);
        this.redirectMap.set(absorbed.id, survivor.id);

        for (const key of absorbed.aliases) {
            const ids = this.aliasIndex.get(key);
            ids?.delete(absorbed.id);
        }
        this.indexAliases(survivor.id, merged.aliases);

        // Rewire the absorbed entity's edges onto the survivor
        const absorbedKey = nodeKey({ kind: 'entity', id: absorbed.id });
        const incident = [...(this.adjacency.get(absorbedKey) ?? [])];
        for (const relId of incident) {
            const rel = this.relationships.get(relId);
            if (!rel) continue;
            this.removeRelationship(rel);
            const rewire = (ref: NodeRef): NodeRef =>
                ref.kind === 'entity' && ref.id === absorbed.id ? { kind: 'entity', id: survivor.id } : ref;
            this.upsertRelationship(rel.type, rewire(rel.source), rewire(rel.target), rel.weight);
        }
        this.adjacency.delete(absorbedKey);

        logger.info({ survivor: survivor.id, absorbed: absorbed.id }, 'Entities merged');
        return merged;
    }

    /**
     * Entities carrying `key` as an alias, oldest first.
     */
    findByKey(key: string): Entity[] {
        const ids = this.aliasIndex.get(key);
        if (!ids) return [];
        return [...ids]
            .map((id) => this.entities.get(id))
            .filter((entity): entity is Entity => entity !== undefined)
            .sort((a, b) => a.createdSeq - b.createdSeq);
    }

    /**
     * All canonical entities, oldest first.
     */
    allEntities(type?: EntityType): Entity[] {
        const all = [...this.entities.values()].sort((a, b) => a.createdSeq - b.createdSeq);
        return type === undefined ? all : all.filter((entity) => entity.type === type);
    }

    hasEntityId(id: string): boolean {
        return this.entities.has(id) || this.redirectMap.has(id);
    }

    redirects(): ReadonlyMap<string, string> {
        return this.redirectMap;
    }

    // ─── Type votes ─────────────────────────────────────────

    /**
     * Record that `origin` asserted `key` with `type`. Re-recording the same
     * origin is a no-op, so re-applying a plan does not inflate the count.
     */
    recordTypeVote(key: string, type: EntityType, origin: string): void {
        let byType = this.votes.get(key);
        if (!byType) {
            byType = new Map();
            this.votes.set(key, byType);
        }
        let origins = byType.get(type);
        if (!origins) {
            origins = new Set();
            byType.set(type, origins);
        }
        origins.add(origin);
    }

    typeVotes(key: string): ReadonlyMap<EntityType, ReadonlySet<string>> {
        return this.votes.get(key) ?? new Map();
    }

    // ─── Documents & sections ───────────────────────────────

    /**
     * Reserve the next version number for a document id. Concurrent
     * ingestions of the same id receive distinct versions.
     */
    reserveDocumentVersion(documentId: string): number {
        const stored = this.documents.get(documentId)?.at(-1)?.version ?? 0;
        const reserved = this.reservedVersions.get(documentId) ?? 0;
        const next = Math.max(stored, reserved) + 1;
        this.reservedVersions.set(documentId, next);
        return next;
    }

    /**
     * Register a document version with its section nodes and contains-section edges.
     */
    putDocument(document: Document): void {
        const versions = this.documents.get(document.id) ?? [];
        if (versions.some((v) => v.version === document.version)) {
            throw new Error(`Document ${document.id} version ${document.version} already exists`);
        }

        versions.push(document);
        versions.sort((a, b) => a.version - b.version);
        this.documents.set(document.id, versions);

        const docRef = documentRef(document);
        for (const section of document.sections) {
            this.sectionMap.set(section.id, section);
            this.upsertRelationship(RelationshipType.CONTAINS_SECTION, docRef, { kind: 'section', id: section.id }, 1);
        }

        logger.debug(
            { id: document.id, version: document.version, sections: document.sections.length },
            'Document registered'
        );
    }

    /**
     * A document version (latest when `version` is omitted).
     */
    getDocument(id: string, version?: number): Document | undefined {
        const versions = this.documents.get(id);
        if (!versions) return undefined;
        return version === undefined ? versions.at(-1) : versions.find((v) => v.version === version);
    }

    listDocuments(): Document[] {
        return [...this.documents.values()].flatMap((versions) => versions);
    }

    latestDocuments(): Document[] {
        return [...this.documents.values()]
            .map((versions) => versions.at(-1))
            .filter((doc): doc is Document => doc !== undefined);
    }

    getSection(id: string): Section | undefined {
        return this.sectionMap.get(id);
    }

    /**
     * Domain of the document a section belongs to.
     */
    sectionDomain(sectionId: string): string | undefined {
        const section = this.sectionMap.get(sectionId);
        if (!section) return undefined;
        return this.getDocument(section.documentId, section.documentVersion)?.domain;
    }

    isLatestSection(sectionId: string): boolean {
        const section = this.sectionMap.get(sectionId);
        if (!section) return false;
        return this.getDocument(section.documentId)?.version === section.documentVersion;
    }

    // ─── Relationships ──────────────────────────────────────

    /**
     * Write a relationship. Entity endpoints are resolved through merge
     * redirects. Writing an existing (type, source, target) keeps the higher
     * weight and refreshes recency.
     *
     * @throws DanglingEdgeError when an endpoint is not in the graph
     */
    putRelationship(input: RelationshipInput): Relationship {
        const source = this.resolveRef(input.source);
        const target = this.resolveRef(input.target);

        const missing = [source, target].filter((ref) => !this.hasNode(ref));
        if (missing.length > 0) {
            const error = new DanglingEdgeError(input.type, input.source, input.target, missing);
            logger.warn(
                { type: input.type, source: nodeKey(input.source), target: nodeKey(input.target) },
                'Rejected dangling edge'
            );
            throw error;
        }

        return this.upsertRelationship(input.type, source, target, input.weight ?? 1);
    }

    hasNode(ref: NodeRef): boolean {
        switch (ref.kind) {
            case 'entity':
                return this.entities.has(ref.id);
            case 'section':
                return this.sectionMap.has(ref.id);
            case 'document': {
                const [id, version] = parseDocumentRef(ref.id);
                return version !== null && this.getDocument(id, version) !== undefined;
            }
        }
    }

    getRelationship(id: string): Relationship | undefined {
        return this.relationships.get(id);
    }

    /**
     * Relationships incident to a node, in either direction.
     */
    relationshipsOf(ref: NodeRef): Relationship[] {
        const resolved = this.resolveRef(ref);
        const ids = this.adjacency.get(nodeKey(resolved));
        if (!ids) return [];
        return [...ids]
            .map((id) => this.relationships.get(id))
            .filter((rel): rel is Relationship => rel !== undefined);
    }

    allRelationships(): Relationship[] {
        return [...this.relationships.values()].sort((a, b) => a.seq - b.seq);
    }

    // ─── Traversal ──────────────────────────────────────────

    /**
     * Entities reachable from `entityId` within `maxHops` (1 to 3), breadth-first.
     * Both edge directions are followed; each node contributes at most
     * `fanOut` neighbors (by edge weight, then recency).
     */
    getNeighbors(
        entityId: string,
        relationshipTypes?: readonly RelationshipType[],
        maxHops: number = this.config.maxHops
    ): TraversalHit[] {
        if (!Number.isInteger(maxHops) || maxHops < 1 || maxHops > 3) {
            throw new RangeError(`maxHops must be 1, 2 or 3 (got ${maxHops})`);
        }

        const start = this.canonicalId(entityId);
        if (start === undefined) return [];

        return breadthFirst(start, (id) => this.relationshipsOf({ kind: 'entity', id }), {
            relationshipTypes: relationshipTypes ? new Set(relationshipTypes) : undefined,
            maxHops,
            fanOut: this.config.fanOut,
        });
    }

    /**
     * Sections linked to an entity through discusses edges.
     */
    sectionsDiscussing(entityId: string): string[] {
        return this.relationshipsOf({ kind: 'entity', id: entityId })
            .filter((rel) => rel.type === RelationshipType.DISCUSSES && rel.source.kind === 'section')
            .map((rel) => rel.source.id)
            .sort();
    }

    /**
     * Sections discussing any of the given entities.
     *
     * @returns section id → ids of the given entities it discusses
     */
    sectionsForEntities(entityIds: Iterable<string>): Map<string, string[]> {
        const result = new Map<string, string[]>();
        for (const entityId of new Set(entityIds)) {
            for (const sectionId of this.sectionsDiscussing(entityId)) {
                const entities = result.get(sectionId);
                if (entities) entities.push(entityId);
                else result.set(sectionId, [entityId]);
            }
        }
        return result;
    }

    /**
     * Entities a section discusses.
     */
    entitiesInSection(sectionId: string): string[] {
        return this.relationshipsOf({ kind: 'section', id: sectionId })
            .filter((rel) => rel.type === RelationshipType.DISCUSSES && rel.target.kind === 'entity')
            .map((rel) => rel.target.id)
            .sort();
    }

    // ─── Snapshot & integrity ───────────────────────────────

    /**
     * Deep copy of the current state, in a stable order. Later writes do not affect it.
     */
    snapshot(): GraphState {
        const typeVotes: GraphState['typeVotes'] = [];
        for (const [key, byType] of this.votes) {
            for (const [type, origins] of byType) {
                for (const origin of origins) typeVotes.push({ key, type, origin });
            }
        }

        typeVotes.sort((a, b) => compareText(a.key, b.key) || compareText(a.type, b.type) || compareText(a.origin, b.origin));

        return structuredClone({
            entities: this.allEntities(),
            redirects: [...this.redirectMap.entries()].sort(([a], [b]) => compareText(a, b)),
            documents: this.listDocuments().sort((a, b) => compareText(a.id, b.id) || a.version - b.version),
            relationships: this.allRelationships(),
            typeVotes,
            counters: { entitySeq: this.entitySeq, relationshipSeq: this.relationshipSeq },
        });
    }

    /**
     * Replace the store's contents with a saved state.
     */
    load(state: GraphState): void {
        this.entities.clear();
        this.redirectMap.clear();
        this.aliasIndex.clear();
        this.votes.clear();
        this.documents.clear();
        this.reservedVersions.clear();
        this.sectionMap.clear();
        this.relationships.clear();
        this.adjacency.clear();

        for (const entity of state.entities) {
            this.entities.set(entity.id, entity);
            this.indexAliases(entity.id, entity.aliases);
        }
        for (const [from, to] of state.redirects) this.redirectMap.set(from, to);
        for (const document of state.documents) {
            const versions = this.documents.get(document.id) ?? [];
            versions.push(document);
            versions.sort((a, b) => a.version - b.version);
            this.documents.set(document.id, versions);
            for (const section of document.sections) this.sectionMap.set(section.id, section);
        }
        for (const rel of state.relationships) this.indexRelationship(rel);
        for (const vote of state.typeVotes) this.recordTypeVote(vote.key, vote.type, vote.origin);

        this.entitySeq = state.counters.entitySeq;
        this.relationshipSeq = state.counters.relationshipSeq;
    }

    /**
     * Full scan for relationships with a missing endpoint.
     */
    verifyIntegrity(): IntegrityReport {
        const dangling = [...this.relationships.values()].filter(
            (rel) => !this.hasNode(rel.source) || !this.hasNode(rel.target)
        );
        return { checked: this.relationships.size, dangling };
    }

    stats(): GraphStats {
        const entitiesByType: Partial<Record<EntityType, number>> = {};
        for (const entity of this.entities.values()) {
            entitiesByType[entity.type] = (entitiesByType[entity.type] ?? 0) + 1;
        }
        return {
            entities: this.entities.size,
            relationships: this.relationships.size,
            documents: this.listDocuments().length,
            sections: this.sectionMap.size,
            redirects: this.redirectMap.size,
            entitiesByType,
        };
    }

    // ─── Internals ──────────────────────────────────────────

    private resolveRef(ref: NodeRef): NodeRef {
        if (ref.kind !== 'entity') return ref;
        const canonical = this.canonicalId(ref.id);
        return canonical === undefined ? ref : { kind: 'entity', id: canonical };
    }

    private upsertRelationship(type: RelationshipType, source: NodeRef, target: NodeRef, weight: number): Relationship {
        const id = relationshipId(type, source, target);
        const existing = this.relationships.get(id);
        const rel: Relationship = {
            id,
            type,
            source,
            target,
            weight: Math.max(weight, existing?.weight ?? 0),
            seq: ++this.relationshipSeq,
        };
        this.indexRelationship(rel);
        return rel;
    }

    private indexRelationship(rel: Relationship): void {
        this.relationships.set(rel.id, rel);
        for (const ref of [rel.source, rel.target]) {
            const key = nodeKey(ref);
            let ids = this.adjacency.get(key);
            if (!ids) {
                ids = new Set();
                this.adjacency.set(key, ids);
            }
            ids.add(rel.id);
        }
    }

    private removeRelationship(rel: Relationship): void {
        this.relationships.delete(rel.id);
        this.adjacency.get(nodeKey(rel.source))?.delete(rel.id);
        this.adjacency.get(nodeKey(rel.target))?.delete(rel.id);
    }

    private indexAliases(entityId: string, keys: readonly string[]): void {
        for (const key of keys) {
            let ids = this.aliasIndex.get(key);
            if (!ids) {
                ids = new Set();
                this.aliasIndex.set(key, ids);
            }
            ids.add(entityId);
        }
    }
}

/**
 * Graph reference of a document version: `<id>@v<version>`.
 */
export function documentRef(document: Pick<Document, 'id' | 'version'>): NodeRef {
    return { kind: 'document', id: `${document.id}@v${document.version}` };
}

function parseDocumentRef(ref: string): [string, number | null] {
    const at = ref.lastIndexOf('@v');
    if (at < 0) return [ref, null];
    const version = Number(ref.slice(at + 2));
    return [ref.slice(0, at), Number.isInteger(version) ? version : null];
}

/**
 * Code-unit order, matching SQLite's BINARY collation.
 */
function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
