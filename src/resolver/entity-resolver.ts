import {
    DEFAULT_CONFIG,
    isEntityType,
    type EmbeddingProvider,
    type Entity,
    type EntityType,
    type ExtractedEntity,
    type NewEntity,
    type ResolverConfig,
} from '../types/index.js';
import type { GraphStore } from '../graph/graph-store.js';
import { isFiniteVector, keySimilarity } from '../nlp/similarity.js';
import { normalizeKey, slugify } from '../nlp/tokenizer.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { AliasTable } from './alias-table.js';
import { EntityMatcher } from './matcher.js';
import { UnionFind } from './union-find.js';

const logger = getLogger();

/**
 * Candidate whose claimed type lost (or tied) a vote for its key.
 */
export interface FlaggedCandidate {
    index: number;
    name: string;
    key: string;
    claimedType: EntityType;
    assignedType: EntityType;
    votes: Partial<Record<EntityType, number>>;
    reason: 'type-tie';
}

/**
 * Candidate that could not be resolved. The rest of the batch is unaffected.
 */
export interface UnresolvedCandidate {
    index: number;
    name: string;
    reason: string;
}

export interface EntityMerge {
    survivor: string;
    absorbed: string;
}

/**
 * Outcome of resolving a candidate batch. Planning never writes to the graph;
 * `EntityResolver.apply()` does.
 */
export interface ResolutionPlan {
    /** Who asserted these candidates (a section id, usually); type votes are counted once per origin */
    origin: string;

    /** Candidate index → canonical entity id */
    assignments: Map<number, string>;

    newEntities: NewEntity[];

    /** Existing entity id → normalized keys to append */
    aliasAdditions: Map<string, string[]>;

    merges: EntityMerge[];
    typeVotes: Array<{ key: string; type: EntityType }>;
    flagged: FlaggedCandidate[];
    unresolved: UnresolvedCandidate[];
}

export interface PotentialDuplicate {
    a: string;
    b: string;
    similarity: number;
}

interface PreparedCandidate {
    index: number;
    name: string;
    key: string;
    claimedType: EntityType;
    type: EntityType;
    description: string;
    embedding: number[] | null;
}

const candidateNode = (index: number): string => `c:${index}`;
const entityNode = (id: string): string => `e:${id}`;

/**
 * Deduplicates extracted entities into canonical entities.
 *
 * Signals (same type only): exact key or alias, alias-table equivalence,
 * near-exact key (Dice ≥ stringThreshold), and embedding cosine
 * ≥ mergeThreshold. Matches are clustered transitively with union-find; the
 * earliest-created member of a cluster is canonical.
 */
export class EntityResolver {
    readonly matcher: EntityMatcher;
    private readonly config: ResolverConfig;
    private readonly embedder: EmbeddingProvider | undefined;

    constructor(
        private readonly store: GraphStore,
        options: {
            config?: Partial<ResolverConfig>;
            aliases?: AliasTable;
            embedder?: EmbeddingProvider;
        } = {}
    ) {
        this.config = { ...DEFAULT_CONFIG.resolver, ...options.config };
        this.embedder = options.embedder;
        this.matcher = new EntityMatcher(store, options.aliases ?? new AliasTable(), this.config);
    }

    /**
     * Plan the canonical assignment of a batch of candidates.
     * The same candidates against the same graph state always produce the same plan.
     */
    async resolve(candidates: readonly ExtractedEntity[], options: { origin?: string } = {}): Promise<ResolutionPlan> {
        const origin = options.origin ?? 'batch';
        const plan: ResolutionPlan = {
            origin,
            assignments: new Map(),
            newEntities: [],
            aliasAdditions: new Map(),
            merges: [],
            typeVotes: [],
            flagged: [],
            unresolved: [],
        };

        const prepared = await this.prepare(candidates, plan);
        if (prepared.length === 0) return plan;

        // ── Cluster candidates with existing entities and each other
        const uf = new UnionFind<string>();
        for (const candidate of prepared) {
            uf.add(candidateNode(candidate.index));
            for (const match of this.matcher.match(candidate.key, candidate.type, candidate.embedding)) {
                uf.union(candidateNode(candidate.index), entityNode(match.entityId));
            }
        }
        for (let i = 0; i < prepared.length; i++) {
            for (let j = i + 1; j < prepared.length; j++) {
                const a = prepared[i];
                const b = prepared[j];
                if (!a || !b || a.type !== b.type) continue;
                if (this.matcher.keysMatch(a.key, b.key) || this.matcher.embeddingsMatch(a.embedding, b.embedding)) {
                    uf.union(candidateNode(a.index), candidateNode(b.index));
                }
            }
        }

        // ── One canonical entity per cluster
        const byIndex = new Map(prepared.map((c) => [candidateNode(c.index), c]));
        const plannedIds = new Set<string>();

        for (const group of uf.groups()) {
            const members = group
                .map((node) => byIndex.get(node))
                .filter((c): c is PreparedCandidate => c !== undefined)
                .sort((a, b) => a.index - b.index);
            if (members.length === 0) continue;

            const existing = group
                .filter((node) => node.startsWith('e:'))
                .map((node) => this.store.getEntity(node.slice(2)))
                .filter((entity): entity is Entity => entity !== undefined)
                .sort((a, b) => a.createdSeq - b.createdSeq);

            const keys = [...new Set(members.map((c) => c.key))];
            let canonicalId: string;

            const [survivor, ...absorbed] = existing;
            if (survivor) {
                canonicalId = survivor.id;
                for (const other of absorbed) {
                    plan.merges.push({ survivor: survivor.id, absorbed: other.id });
                }
                const known = new Set(existing.flatMap((entity) => entity.aliases));
                const additions = keys.filter((key) => !known.has(key));
                if (additions.length > 0) plan.aliasAdditions.set(survivor.id, additions);
            } else {
                const [first] = members;
                if (!first) continue;
                canonicalId = this.allocateId(first.type, first.key, plannedIds);
                plannedIds.add(canonicalId);
                plan.newEntities.push({
                    id: canonicalId,
                    type: first.type,
                    name: first.name,
                    aliases: keys,
                    description: members.find((c) => c.description)?.description ?? '',
                    embedding: members.find((c) => c.embedding)?.embedding ?? null,
                });
            }

            for (const candidate of members) {
                plan.assignments.set(candidate.index, canonicalId);
            }
        }

        return plan;
    }

    /**
     * Write a plan through the graph store, holding the lock of every entity it touches.
     *
     * @returns candidate index → canonical id after the write (merges applied)
     */
    async apply(plan: ResolutionPlan): Promise<Map<number, string>> {
        const touched = [
            ...plan.newEntities.map((entity) => entity.id),
            ...plan.aliasAdditions.keys(),
            ...plan.merges.flatMap((merge) => [merge.survivor, merge.absorbed]),
        ];

        await this.store.locks.runMany(touched, () => {
            for (const entity of plan.newEntities) {
                this.store.putEntity(entity);
            }
            for (const [id, keys] of plan.aliasAdditions) {
                this.store.addAliases(id, keys);
            }
            for (const merge of plan.merges) {
                this.store.mergeEntities(merge.survivor, merge.absorbed);
            }
            for (const vote of plan.typeVotes) {
                this.store.recordTypeVote(vote.key, vote.type, plan.origin);
            }
        });

        if (plan.flagged.length > 0) {
            logger.warn(
                { origin: plan.origin, flagged: plan.flagged.map((f) => `${f.name} (${f.claimedType} → ${f.assignedType})`) },
                'Type conflicts flagged for review'
            );
        }

        return new Map(
            [...plan.assignments].map(([index, id]) => [index, this.store.canonicalId(id) ?? id])
        );
    }

    /**
     * Resolve and apply in one step.
     */
    async resolveAndApply(
        candidates: readonly ExtractedEntity[],
        options: { origin?: string } = {}
    ): Promise<{ plan: ResolutionPlan; assignments: Map<number, string> }> {
        const plan = await this.resolve(candidates, options);
        const assignments = await this.apply(plan);
        return { plan, assignments };
    }

    /**
     * Merge duplicates among `entityIds` and the rest of the graph that were
     * created concurrently (e.g. by two documents in the same batch).
     *
     * @returns the merges performed
     */
    async consolidate(entityIds: Iterable<string>): Promise<EntityMerge[]> {
        const uf = new UnionFind<string>();

        for (const id of new Set(entityIds)) {
            const entity = this.store.getEntity(id);
            if (!entity) continue;
            uf.add(entity.id);

            for (const key of entity.aliases) {
                for (const match of this.matcher.match(key, entity.type, entity.embedding)) {
                    if (match.entityId !== entity.id) uf.union(entity.id, match.entityId);
                }
            }
        }

        const merges: EntityMerge[] = [];
        for (const group of uf.groups()) {
            if (group.length < 2) continue;

            await this.store.locks.runMany(group, () => {
                const members = group
                    .map((id) => this.store.getEntity(id))
                    .filter((entity): entity is Entity => entity !== undefined)
                    .sort((a, b) => a.createdSeq - b.createdSeq);
                const [survivor, ...rest] = members;
                if (!survivor) return;

                for (const other of rest) {
                    if (this.store.canonicalId(other.id) === survivor.id) continue;
                    this.store.mergeEntities(survivor.id, other.id);
                    merges.push({ survivor: survivor.id, absorbed: other.id });
                }
            });
        }

        if (merges.length > 0) {
            logger.info({ merges: merges.length }, 'Consolidated duplicate entities');
        }
        return merges;
    }

    /**
     * Same-type entity pairs whose names are similar but below the
     * auto-merge threshold, most similar first.
     */
    findPotentialDuplicates(minSimilarity = 0.7): PotentialDuplicate[] {
        const pairs: PotentialDuplicate[] = [];
        const entities = this.store.allEntities();

        for (let i = 0; i < entities.length; i++) {
            for (let j = i + 1; j < entities.length; j++) {
                const a = entities[i];
                const b = entities[j];
                if (!a || !b || a.type !== b.type) continue;

                let best = 0;
                for (const alias of a.aliases) {
                    best = Math.max(best, this.matcher.bestKeySimilarity(alias, b));
                }
                best = Math.max(best, keySimilarity(normalizeKey(a.name), normalizeKey(b.name)));

                if (best >= minSimilarity && best < this.config.stringThreshold) {
                    pairs.push({ a: a.id, b: b.id, similarity: best });
                }
            }
        }

        return pairs.sort((x, y) => y.similarity - x.similarity || x.a.localeCompare(y.a) || x.b.localeCompare(y.b));
    }

    // ─── Planning helpers ───────────────────────────────────

    /**
     * Validate candidates, settle type conflicts and attach embeddings.
     */
    private async prepare(candidates: readonly ExtractedEntity[], plan: ResolutionPlan): Promise<PreparedCandidate[]> {
        const prepared: PreparedCandidate[] = [];
        const batchVotes = new Map<string, EntityType[]>();

        for (const [index, candidate] of candidates.entries()) {
            const problem = validateCandidate(candidate);
            const name = typeof candidate.name === 'string' ? candidate.name.trim() : '';
            const key = normalizeKey(name);

            if (problem || !key) {
                const reason = problem ?? 'name has no letters or digits';
                plan.unresolved.push({ index, name, reason });
                logger.warn({ index, name, reason }, 'unresolved candidate');
                continue;
            }

            const claimedType = candidate.type;
            const earlier = batchVotes.get(key) ?? [];
            const decision = this.decideType(key, claimedType, earlier, plan.origin);
            batchVotes.set(key, [...earlier, claimedType]);
            plan.typeVotes.push({ key, type: claimedType });

            if (decision.tied) {
                plan.flagged.push({
                    index,
                    name,
                    key,
                    claimedType,
                    assignedType: decision.type,
                    votes: decision.votes,
                    reason: 'type-tie',
                });
            }

            prepared.push({
                index,
                name,
                key,
                claimedType,
                type: decision.type,
                description: candidate.description?.trim() ?? '',
                embedding: await this.embeddingFor(candidate, name),
            });
        }

        return prepared;
    }

    /**
     * Majority vote over every assertion of `key`: recorded votes (one per
     * origin), existing entities carrying the key, earlier candidates of this
     * batch, and this candidate. A tie keeps the established type.
     */
    private decideType(
        key: string,
        claimed: EntityType,
        earlierInBatch: readonly EntityType[],
        origin: string
    ): { type: EntityType; tied: boolean; votes: Partial<Record<EntityType, number>> } {
        const tally = new Map<EntityType, Set<string>>();
        const vote = (type: EntityType, voter: string): void => {
            let voters = tally.get(type);
            if (!voters) {
                voters = new Set();
                tally.set(type, voters);
            }
            voters.add(voter);
        };

        const holders = this.store.findByKey(key);
        for (const entity of holders) vote(entity.type, `entity:${entity.id}`);
        for (const [type, origins] of this.store.typeVotes(key)) {
            for (const voter of origins) vote(type, voter);
        }
        for (const type of earlierInBatch) vote(type, origin);
        vote(claimed, origin);

        const votes: Partial<Record<EntityType, number>> = {};
        for (const [type, voters] of tally) votes[type] = voters.size;

        if (tally.size <= 1) return { type: claimed, tied: false, votes };

        const max = Math.max(...[...tally.values()].map((voters) => voters.size));
        const winners = [...tally.entries()].filter(([, voters]) => voters.size === max).map(([type]) => type);
        const [winner] = winners;
        if (winners.length === 1 && winner !== undefined) {
            return { type: winner, tied: false, votes };
        }

        const established = holders[0]?.type ?? [...this.store.typeVotes(key).keys()][0] ?? earlierInBatch[0] ?? claimed;
        return { type: established, tied: true, votes };
    }

    private async embeddingFor(candidate: ExtractedEntity, name: string): Promise<number[] | null> {
        if (candidate.embedding) return [...candidate.embedding];
        if (!this.embedder) return null;

        try {
            const vector = await this.embedder.embed(name);
            return isFiniteVector(vector) ? vector : null;
        } catch (error) {
            // Embedding is an optional signal; string matching still applies
            logger.debug({ name, error: errorMessage(error) }, 'Candidate embedding unavailable');
            return null;
        }
    }

    /**
     * Deterministic id for a new entity: `<type>:<slug>`, suffixed when taken.
     */
    private allocateId(type: EntityType, key: string, planned: ReadonlySet<string>): string {
        const base = `${type.toLowerCase()}:${slugify(key)}`;
        let id = base;
        for (let n = 2; this.store.hasEntityId(id) || planned.has(id); n++) {
            id = `${base}-${n}`;
        }
        return id;
    }
}

function validateCandidate(candidate: ExtractedEntity): string | null {
    if (typeof candidate.name !== 'string' || candidate.name.trim().length === 0) {
        return 'empty name';
    }
    if (!isEntityType(candidate.type)) {
        return `unknown type: ${String(candidate.type)}`;
    }
    if (candidate.embedding !== undefined && !(Array.isArray(candidate.embedding) && isFiniteVector(candidate.embedding))) {
        return 'embedding contains non-finite values';
    }
    return null;
}
