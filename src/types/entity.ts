/**
 * Closed set of entity types the graph accepts.
 */
export const ENTITY_TYPES = ['Concept', 'Method', 'Result', 'Author', 'Institution', 'Paper'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export function isEntityType(value: unknown): value is EntityType {
    return ENTITY_TYPES.some((type) => type === value);
}

/**
 * Entity interface: a canonical, deduplicated node.
 * The id never changes; aliases only grow.
 */
export interface Entity {
    /** Immutable canonical identifier (e.g. "concept:zkp") */
    id: string;

    type: EntityType;

    /** Display name taken from the first mention */
    name: string;

    /** Normalized keys that resolve to this entity (append-only) */
    aliases: readonly string[];

    description: string;

    /** Creation order; the lowest value in a cluster is the canonical member */
    createdSeq: number;

    /** Name embedding used for similarity matching (nullable) */
    embedding: number[] | null;
}

/**
 * Entity data for a write, before the store assigns a creation sequence.
 */
export type NewEntity = Omit<Entity, 'createdSeq'>;

/**
 * Candidate entity produced by the extraction collaborator.
 */
export interface ExtractedEntity {
    name: string;
    type: EntityType;
    description?: string;
    embedding?: number[];
}
