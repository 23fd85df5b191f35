/**
 * Library entry point.
 */
export * from './types/index.js';
export { GroundworkEngine, type EngineOptions, type EngineInspection } from './builder/engine.js';
export {
    IngestPipeline,
    validateDocument,
    type IngestPipelineOptions,
    type IngestionReport,
    type DocumentReport,
    type DanglingEdgeReport,
} from './builder/ingest-pipeline.js';
export { GraphStore, documentRef, type GraphState, type GraphStats, type IntegrityReport } from './graph/graph-store.js';
export { CommunityDetector, crossDomainEntities, buildEntityGraph } from './graph/community-detector.js';
export { CommunityRegistry } from './graph/community-registry.js';
export {
    EntityResolver,
    type ResolutionPlan,
    type EntityMerge,
    type FlaggedCandidate,
    type UnresolvedCandidate,
    type PotentialDuplicate,
} from './resolver/entity-resolver.js';
export { AliasTable } from './resolver/alias-table.js';
export { VectorIndex, type IndexSearchOptions } from './indexes/vector-index.js';
export { LexicalIndex } from './indexes/lexical-index.js';
export { TreeIndex, buildTree, checkTreeBounds, defaultTreeInput } from './tree/tree-index.js';
export {
    searchTree,
    KeywordScorer,
    GenerationScorer,
    type NodeScorer,
    type TreeSearchOptions,
    type TreeSearchResult,
} from './tree/tree-search.js';
export { HybridRetriever, type HybridRetrieverOptions } from './retrieval/hybrid-retriever.js';
export { fuseResults, type StrategyRun, type FusionOptions } from './retrieval/fusion.js';
export { VectorStrategy } from './retrieval/strategies/vector.js';
export { GraphStrategy, type GraphStrategyOptions } from './retrieval/strategies/graph.js';
export { LexicalStrategy } from './retrieval/strategies/lexical.js';
export { TreeStrategy } from './retrieval/strategies/tree.js';
export { RetrievalCache } from './cache/retrieval-cache.js';
export {
    SelfCorrectionLoop,
    type LoopState,
    type LoopOutcome,
    type LoopTransition,
    type IterationRecord,
    type SelfCorrectionOptions,
    type AnswerOptions,
} from './loop/self-correction.js';
export { parseCitations, validateCitations, formatCitation } from './loop/citations.js';
export { refineQuery, type Refinement, type RefinementKind } from './loop/refiner.js';
export * from './providers/index.js';
export { GraphDatabase, type StoredTree, type DatabaseStats } from './storage/database.js';
export { resolveConfig, mergeConfig, type GroundworkConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './utils/errors.js';
