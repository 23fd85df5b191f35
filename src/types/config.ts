import type { StrategyName } from './retrieval.js';

/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Path-confidence aggregation for tree search.
 */
export type TreeAggregate = 'product' | 'min';

/**
 * Entity resolution thresholds (tunable per corpus).
 */
export interface ResolverConfig {
    /** Minimum cosine similarity of name embeddings for a merge */
    mergeThreshold: number;

    /** Minimum Dice coefficient of normalized keys for a near-exact match */
    stringThreshold: number;
}

/**
 * Graph traversal bounds.
 */
export interface GraphConfig {
    /** Default hop limit (1 to 3) */
    maxHops: number;

    /** Neighbors followed per node and hop, chosen by edge weight then recency */
    fanOut: number;
}

export interface Bm25Config {
    k1: number;
    b: number;
}

/**
 * Retrieval fusion configuration.
 */
export interface RetrievalConfig {
    /** Weight of each strategy in the fused score */
    weights: Record<StrategyName, number>;

    /** Hits requested from each strategy */
    topN: Record<StrategyName, number>;

    /** Maximum fused results returned */
    topK: number;

    /** Per-strategy deadline in milliseconds */
    strategyTimeoutMs: number;

    bm25: Bm25Config;
}

/**
 * Tree search configuration.
 */
export interface TreeConfig {
    /** Maximum node scorings per tree */
    nodeBudget: number;

    /** Branches whose path confidence drops below this are not expanded */
    pruneThreshold: number;

    /** Leaves below this confidence are not returned */
    minConfidence: number;

    aggregate: TreeAggregate;

    /** Node scorer: the generation collaborator, or keyword overlap only */
    scorer: 'generation' | 'keyword';
}

export interface LoopConfig {
    /** Maximum generate attempts per query */
    maxIterations: number;
}

export interface IngestConfig {
    /** Documents processed concurrently */
    concurrency: number;
}

export interface CacheConfig {
    enabled: boolean;
    ttlMs: number;
    maxEntries: number;
}

/**
 * Collaborator provider configuration.
 * `local` uses the built-in deterministic providers and needs no network.
 */
export interface ProviderConfig {
    kind: 'local' | 'openai' | 'ollama';
    model: string;
    embeddingModel: string;
    baseUrl?: string;

    /** Dimensionality of the local hashing embedder */
    dimensions: number;

    requestsPerSecond: number;
    timeoutMs: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface GroundworkConfig {
    /** SQLite database path */
    db: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    resolver: ResolverConfig;
    graph: GraphConfig;
    retrieval: RetrievalConfig;
    tree: TreeConfig;
    loop: LoopConfig;
    ingest: IngestConfig;
    cache: CacheConfig;
    provider: ProviderConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: GroundworkConfig = {
    db: './groundwork.db',
    logLevel: 'info',
    jsonLogs: false,
    resolver: {
        mergeThreshold: 0.85,
        stringThreshold: 0.92,
    },
    graph: {
        maxHops: 2,
        fanOut: 20,
    },
    retrieval: {
        weights: { vector: 0.25, graph: 0.25, lexical: 0.25, tree: 0.25 },
        topN: { vector: 10, graph: 10, lexical: 10, tree: 10 },
        topK: 10,
        strategyTimeoutMs: 5000,
        bm25: { k1: 1.5, b: 0.75 },
    },
    tree: {
        nodeBudget: 40,
        pruneThreshold: 0.05,
        minConfidence: 0.1,
        aggregate: 'product',
        scorer: 'generation',
    },
    loop: {
        maxIterations: 3,
    },
    ingest: {
        concurrency: 4,
    },
    cache: {
        enabled: true,
        ttlMs: 5 * 60 * 1000,
        maxEntries: 256,
    },
    provider: {
        kind: 'local',
        model: 'gpt-4.1-mini',
        embeddingModel: 'text-embedding-3-small',
        dimensions: 256,
        requestsPerSecond: 3,
        timeoutMs: 30_000,
    },
};
