import type { Relationship, RelationshipType } from '../types/index.js';

export interface TraversalOptions {
    /** Only follow these relationship types (all entity ↔ entity types when omitted) */
    relationshipTypes?: ReadonlySet<RelationshipType>;

    /** Hop limit, at least 1 */
    maxHops: number;

    /** Neighbors considered per node and hop */
    fanOut: number;
}

export interface TraversalHit {
    entityId: string;

    /** Distance from the start entity in hops */
    hops: number;

    /** Entity this one was reached from */
    from: string;

    /** Relationship followed on the last hop */
    via: Relationship;
}

/**
 * Other endpoint of an entity ↔ entity relationship, or null when the
 * relationship does not connect two entities or loops back to `entityId`.
 */
function otherEntity(rel: Relationship, entityId: string): string | null {
    if (rel.source.kind !== 'entity' || rel.target.kind !== 'entity') return null;
    if (rel.source.id === entityId && rel.target.id !== entityId) return rel.target.id;
    if (rel.target.id === entityId && rel.source.id !== entityId) return rel.source.id;
    return null;
}

/**
 * Rank a node's neighbors: strongest edge first, then most recent, then id.
 * Each neighbor appears once, with its best edge.
 */
export function rankNeighbors(
    entityId: string,
    edges: Iterable<Relationship>,
    relationshipTypes?: ReadonlySet<RelationshipType>
): Array<{ entityId: string; via: Relationship }> {
    const best = new Map<string, Relationship>();

    for (const rel of edges) {
        if (relationshipTypes && !relationshipTypes.has(rel.type)) continue;
        const neighbor = otherEntity(rel, entityId);
        if (neighbor === null) continue;

        const current = best.get(neighbor);
        if (!current || compareEdges(rel, current) < 0) {
            best.set(neighbor, rel);
        }
    }

    return [...best.entries()]
        .sort(([idA, a], [idB, b]) => compareEdges(a, b) || idA.localeCompare(idB))
        .map(([id, via]) => ({ entityId: id, via }));
}

function compareEdges(a: Relationship, b: Relationship): number {
    return b.weight - a.weight || b.seq - a.seq;
}

/**
 * Breadth-first, hop-limited traversal over entity ↔ entity relationships.
 * Both directions of every edge are followed. Each expanded node contributes
 * at most `fanOut` neighbors, chosen by edge weight then recency.
 *
 * The start entity is not part of the result.
 */
export function breadthFirst(
    start: string,
    edgesOf: (entityId: string) => Iterable<Relationship>,
    options: TraversalOptions
): TraversalHit[] {
    const visited = new Set<string>([start]);
    const hits: TraversalHit[] = [];
    let frontier = [start];

    for (let hop = 1; hop <= options.maxHops && frontier.length > 0; hop++) {
        const next: string[] = [];

        for (const node of frontier) {
            const neighbors = rankNeighbors(node, edgesOf(node), options.relationshipTypes).slice(0, options.fanOut);

            for (const { entityId, via } of neighbors) {
                if (visited.has(entityId)) continue;
                visited.add(entityId);
                hits.push({ entityId, hops: hop, from: node, via });
                next.push(entityId);
            }
        }

        frontier = next;
    }

    return hits;
}
