/**
 * Barrel export for all shared types.
 */
export type { Document, Section, DocumentInput, SectionInput } from './document.js';
export { sectionId } from './document.js';
export { ENTITY_TYPES, isEntityType } from './entity.js';
export type { Entity, EntityType, NewEntity, ExtractedEntity } from './entity.js';
export {
    RelationshipType,
    STRUCTURAL_RELATIONSHIP_TYPES,
    EXTRACTED_RELATIONSHIP_TYPES,
    isRelationshipType,
    nodeKey,
    relationshipId,
} from './relationship.js';
export type { Relationship, NodeRef, NodeKind, ExtractedRelationship } from './relationship.js';
export type { TreeNode, TreeNodeInput, TreeSearchHit } from './tree.js';
export { STRATEGY_NAMES } from './retrieval.js';
export type {
    StrategyName,
    StrategyHit,
    StrategyOptions,
    RetrievalStrategy,
    RetrievalResult,
    RetrievalResponse,
    RetrieveOptions,
    DegradedStrategy,
    Retriever,
} from './retrieval.js';
export type {
    ExtractionResult,
    ExtractionProvider,
    GenerationContext,
    GenerationProvider,
    Citation,
    CritiqueResult,
    CritiqueProvider,
    EmbeddingProvider,
} from './collaborators.js';
export type { Community, CommunityAssignment } from './community.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    GroundworkConfig,
    LogLevel,
    TreeAggregate,
    ResolverConfig,
    GraphConfig,
    Bm25Config,
    RetrievalConfig,
    TreeConfig,
    LoopConfig,
    IngestConfig,
    CacheConfig,
    ProviderConfig,
} from './config.js';
