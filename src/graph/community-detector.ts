import { UndirectedGraph } from 'graphology';
import pagerankModule from 'graphology-metrics/centrality/pagerank.js';
import louvainModule from 'graphology-communities-louvain';
import { RelationshipType, type Community, type CommunityAssignment } from '../types/index.js';
import { buildCorpus, getTopTerms } from '../nlp/tfidf.js';
import { getLogger } from '../utils/logger.js';
import type { GraphState } from './graph-store.js';

// Handle CJS/ESM interop: the typings describe `{ default }`, Node hands over module.exports
const pagerank = 'default' in pagerankModule ? pagerankModule.default : pagerankModule;
const louvain = 'default' in louvainModule ? louvainModule.default : louvainModule;

const logger = getLogger();

export interface CommunityDetectorOptions {
    /** Louvain resolution; higher values give smaller communities */
    resolution?: number;

    /** Seed for Louvain's node ordering, so identical snapshots give identical partitions */
    seed?: number;

    /** Key entities listed per community */
    keyEntities?: number;
}

/**
 * Small seeded PRNG (mulberry32).
 */
function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Undirected, weighted entity graph of a snapshot. Parallel and reverse
 * edges between the same pair are collapsed with their weights summed.
 */
export function buildEntityGraph(state: GraphState): UndirectedGraph {
    const graph = new UndirectedGraph({ allowSelfLoops: false });

    for (const entity of state.entities) {
        graph.addNode(entity.id);
    }

    for (const rel of state.relationships) {
        if (rel.source.kind !== 'entity' || rel.target.kind !== 'entity') continue;
        const a = rel.source.id;
        const b = rel.target.id;
        if (a === b || !graph.hasNode(a) || !graph.hasNode(b)) continue;

        if (graph.hasEdge(a, b)) {
            graph.updateEdgeAttribute(a, b, 'weight', (w: number | undefined) => (w ?? 0) + rel.weight);
        } else {
            graph.addEdge(a, b, { weight: rel.weight });
        }
    }

    return graph;
}

/**
 * Split a community into its connected components (within the community).
 */
function connectedParts(graph: UndirectedGraph, members: readonly string[]): string[][] {
    const inCommunity = new Set(members);
    const seen = new Set<string>();
    const parts: string[][] = [];

    for (const start of [...members].sort()) {
        if (seen.has(start)) continue;

        const part: string[] = [];
        const queue = [start];
        seen.add(start);
        while (queue.length > 0) {
            const node = queue.shift();
            if (node === undefined) break;
            part.push(node);
            for (const neighbor of graph.neighbors(node)) {
                if (inCommunity.has(neighbor) && !seen.has(neighbor)) {
                    seen.add(neighbor);
                    queue.push(neighbor);
                }
            }
        }
        parts.push(part.sort());
    }

    return parts;
}

/**
 * Clusters the resolved entity graph into topic communities.
 *
 * Louvain modularity maximization, followed by a Leiden-style refinement
 * pass that splits any community whose members are not connected inside it.
 * Runs offline on a snapshot; never on the query path.
 */
export class CommunityDetector {
    private readonly resolution: number;
    private readonly seed: number;
    private readonly keyEntityCount: number;

    constructor(options: CommunityDetectorOptions = {}) {
        this.resolution = options.resolution ?? 1.0;
        this.seed = options.seed ?? 42;
        this.keyEntityCount = options.keyEntities ?? 5;
    }

    /**
     * Assign every entity of the snapshot to exactly one community.
     * The result has version 0 until published through a `CommunityRegistry`.
     */
    detect(state: GraphState): CommunityAssignment {
        const graph = buildEntityGraph(state);
        const createdAt = new Date().toISOString();

        if (graph.order === 0) {
            return { version: 0, createdAt, assignment: new Map(), communities: [], modularity: 0 };
        }

        let raw: Record<string, number>;
        let modularity = 0;
        if (graph.size === 0) {
            // No edges: every entity is its own community
            raw = Object.fromEntries(graph.nodes().map((node, i) => [node, i]));
        } else {
            const detailed = louvain.detailed(graph, {
                resolution: this.resolution,
                getEdgeWeight: 'weight',
                rng: seededRandom(this.seed),
            });
            raw = detailed.communities;
            modularity = detailed.modularity;
        }

        // Group members by Louvain community
        const byCommunity = new Map<number, string[]>();
        for (const node of graph.nodes()) {
            const community = raw[node] ?? -1;
            const members = byCommunity.get(community);
            if (members) members.push(node);
            else byCommunity.set(community, [node]);
        }

        // Refinement: disconnected communities become one community per component
        const parts: string[][] = [];
        let splits = 0;
        for (const members of byCommunity.values()) {
            const components = connectedParts(graph, members);
            if (components.length > 1) splits += components.length - 1;
            parts.push(...components);
        }

        // Stable numbering: larger first, then by smallest member id
        parts.sort((a, b) => b.length - a.length || (a[0] ?? '').localeCompare(b[0] ?? ''));

        const scores: Record<string, number> = graph.size > 0
            ? pagerank(graph, { alpha: 0.85, maxIterations: 100, tolerance: 1e-6, getEdgeWeight: 'weight' })
            : {};
        const corpus = buildCorpus(
            state.entities.map((entity) => ({
                id: entity.id,
                text: [entity.name, entity.description, ...entity.aliases].join(' '),
            }))
        );
        const names = new Map(state.entities.map((entity) => [entity.id, entity.name]));

        const assignment = new Map<string, number>();
        const communities: Community[] = parts.map((members, id) => {
            for (const member of members) assignment.set(member, id);

            const keyEntities = [...members]
                .sort((a, b) => (scores[b] ?? 0) - (scores[a] ?? 0) || a.localeCompare(b))
                .slice(0, this.keyEntityCount);
            const terms = getTopTerms(corpus, members, 3);
            const label = terms.length > 0 ? terms.join(' / ') : names.get(keyEntities[0] ?? '') ?? `Community ${id}`;

            return { id, label, members, keyEntities };
        });

        logger.info(
            { entities: graph.order, edges: graph.size, communities: communities.length, splits, modularity },
            'Community detection complete'
        );

        return { version: 0, createdAt, assignment, communities, modularity };
    }
}

/**
 * Entities discussed by sections from more than one document domain.
 */
export function crossDomainEntities(state: GraphState): Array<{ entityId: string; domains: string[] }> {
    const sectionDomain = new Map<string, string>();
    for (const document of state.documents) {
        for (const section of document.sections) sectionDomain.set(section.id, document.domain);
    }

    const domainsOf = new Map<string, Set<string>>();
    for (const rel of state.relationships) {
        if (rel.type !== RelationshipType.DISCUSSES || rel.target.kind !== 'entity') continue;
        const domain = sectionDomain.get(rel.source.id);
        if (domain === undefined) continue;

        let domains = domainsOf.get(rel.target.id);
        if (!domains) {
            domains = new Set();
            domainsOf.set(rel.target.id, domains);
        }
        domains.add(domain);
    }

    return [...domainsOf.entries()]
        .filter(([, domains]) => domains.size > 1)
        .map(([entityId, domains]) => ({ entityId, domains: [...domains].sort() }))
        .sort((a, b) => b.domains.length - a.domains.length || a.entityId.localeCompare(b.entityId));
}
