/**
 * Community interface: a topic cluster of entities from one detection run.
 * Ids are only meaningful inside the version that produced them.
 */
export interface Community {
    id: number;

    /** Auto-generated label from the top TF-IDF terms of member names and descriptions */
    label: string;

    /** Member entity ids, sorted */
    members: string[];

    /** Up to five members ranked by PageRank inside the community */
    keyEntities: string[];
}

/**
 * Immutable result of one community detection run.
 */
export interface CommunityAssignment {
    /** Monotonic version assigned by the registry on publish (0 before publishing) */
    version: number;

    createdAt: string;

    /** Entity id → community id; every entity of the snapshot appears exactly once */
    assignment: ReadonlyMap<string, number>;

    communities: readonly Community[];

    modularity: number;
}
