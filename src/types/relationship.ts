/**
 * Relationship types supported by the graph.
 *
 * Entity ↔ entity:
 *   CITES, INTRODUCES, USES_METHOD, REPORTS_RESULT, RELATED_TO, APPLIED_TO, AUTHORED_BY
 *
 * Structural (document / section endpoints):
 *   CONTAINS_SECTION, DISCUSSES
 */
export enum RelationshipType {
    AUTHORED_BY = 'authored-by',
    CITES = 'cites',
    INTRODUCES = 'introduces',
    USES_METHOD = 'uses-method',
    REPORTS_RESULT = 'reports-result',
    RELATED_TO = 'related-to',
    APPLIED_TO = 'applied-to',
    DISCUSSES = 'discusses',
    CONTAINS_SECTION = 'contains-section',
}

/** Relationship types created by the ingestion pipeline itself */
export const STRUCTURAL_RELATIONSHIP_TYPES: ReadonlySet<RelationshipType> = new Set([
    RelationshipType.CONTAINS_SECTION,
    RelationshipType.DISCUSSES,
]);

/** Relationship types the extraction collaborator may emit */
export const EXTRACTED_RELATIONSHIP_TYPES: ReadonlySet<RelationshipType> = new Set([
    RelationshipType.AUTHORED_BY,
    RelationshipType.CITES,
    RelationshipType.INTRODUCES,
    RelationshipType.USES_METHOD,
    RelationshipType.REPORTS_RESULT,
    RelationshipType.RELATED_TO,
    RelationshipType.APPLIED_TO,
]);

export function isRelationshipType(value: unknown): value is RelationshipType {
    return Object.values(RelationshipType).some((type) => type === value);
}

export type NodeKind = 'entity' | 'document' | 'section';

/**
 * Reference to a graph node. Documents are addressed by `<id>@v<version>`.
 */
export interface NodeRef {
    kind: NodeKind;
    id: string;
}

/**
 * Relationship interface: a typed, directed edge.
 */
export interface Relationship {
    /** `<type>|<source key>|<target key>`; writing the same triple twice updates the edge */
    id: string;

    type: RelationshipType;
    source: NodeRef;
    target: NodeRef;

    /** Edge weight (0.0 to 1.0), used to rank neighbors under the fan-out cap */
    weight: number;

    /** Write order, used as recency when weights tie */
    seq: number;
}

/**
 * Relationship produced by the extraction collaborator, with endpoints given by entity name.
 */
export interface ExtractedRelationship {
    source: string;
    target: string;
    type: RelationshipType;
    weight?: number;
}

export function nodeKey(ref: NodeRef): string {
    return `${ref.kind}:${ref.id}`;
}

export function relationshipId(type: RelationshipType, source: NodeRef, target: NodeRef): string {
    return `${type}|${nodeKey(source)}|${nodeKey(target)}`;
}
