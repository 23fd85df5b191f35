import type { Section } from './document.js';

/**
 * The four retrieval strategies fused by the hybrid retriever.
 */
export type StrategyName = 'vector' | 'graph' | 'lexical' | 'tree';

export const STRATEGY_NAMES: readonly StrategyName[] = ['vector', 'graph', 'lexical', 'tree'];

/**
 * A raw, strategy-specific score for one section.
 */
export interface StrategyHit {
    sectionId: string;
    score: number;
}

export interface StrategyOptions {
    /** Domain filter; null means all domains */
    domains: readonly string[] | null;

    /** Maximum number of hits the strategy may return */
    limit: number;

    /** Aborted when the strategy's deadline passes or the query is cancelled */
    signal: AbortSignal;
}

/**
 * Interface for a retrieval strategy adapter.
 */
export interface RetrievalStrategy {
    readonly name: StrategyName;

    search(query: string, options: StrategyOptions): Promise<StrategyHit[]>;
}

/**
 * RetrievalResult: a ranked, provenance-carrying answer unit.
 */
export interface RetrievalResult {
    section: Section;

    /** Weighted sum of the normalized strategy scores */
    fusedScore: number;

    /** Normalized [0, 1] score per contributing strategy */
    scores: Partial<Record<StrategyName, number>>;

    /** Raw score per contributing strategy */
    rawScores: Partial<Record<StrategyName, number>>;

    /** Strategies that returned this section, in STRATEGY_NAMES order */
    strategies: StrategyName[];
}

export interface DegradedStrategy {
    strategy: StrategyName;
    reason: 'timeout' | 'error';
    message: string;
}

export interface RetrievalResponse {
    query: string;
    domains: readonly string[] | null;
    results: RetrievalResult[];

    /** Strategies that timed out or failed; fusion ran without them */
    degraded: DegradedStrategy[];

    /** Number of hits each successful strategy contributed before fusion */
    hitCounts: Partial<Record<StrategyName, number>>;

    /** Whether the response was served from the retrieval cache */
    cached: boolean;
}

export interface RetrieveOptions {
    domains?: readonly string[] | null;
    topK?: number;
    signal?: AbortSignal;
}

/**
 * Anything that answers a query with a fused result set (the hybrid retriever, or a test double).
 */
export interface Retriever {
    retrieve(query: string, options?: RetrieveOptions): Promise<RetrievalResponse>;
}
