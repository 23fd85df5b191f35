import {
    DEFAULT_CONFIG,
    type DegradedStrategy,
    type RetrievalConfig,
    type RetrievalResponse,
    type RetrievalStrategy,
    type Retriever,
    type RetrieveOptions,
    type Section,
    type StrategyName,
} from '../types/index.js';
import type { RetrievalCache } from '../cache/retrieval-cache.js';
import { RetrievalUnavailableError, StrategyTimeoutError, errorMessage } from '../utils/errors.js';
import { remaining, withTimeout } from '../utils/concurrency.js';
import { getLogger } from '../utils/logger.js';
import { fuseResults, type StrategyRun } from './fusion.js';

const logger = getLogger();

export interface HybridRetrieverOptions {
    strategies: readonly RetrievalStrategy[];
    getSection: (sectionId: string) => Section | undefined;
    config?: Partial<RetrievalConfig>;
    cache?: RetrievalCache;
}

/**
 * Retrieval fusion engine.
 *
 * Fans the query out to every strategy at once, each bounded by a shared
 * deadline of `strategyTimeoutMs`. Strategies that miss the deadline or throw
 * are reported as degraded and contribute nothing; fusion runs over the rest.
 * Only when every strategy fails does `retrieve` throw.
 */
export class HybridRetriever implements Retriever {
    private readonly strategies: readonly RetrievalStrategy[];
    private readonly getSection: (sectionId: string) => Section | undefined;
    private readonly config: RetrievalConfig;
    private readonly cache?: RetrievalCache;

    constructor(options: HybridRetrieverOptions) {
        this.strategies = options.strategies;
        this.getSection = options.getSection;
        this.cache = options.cache;

        const overrides = options.config ?? {};
        this.config = {
            ...DEFAULT_CONFIG.retrieval,
            ...overrides,
            weights: { ...DEFAULT_CONFIG.retrieval.weights, ...overrides.weights },
            topN: { ...DEFAULT_CONFIG.retrieval.topN, ...overrides.topN },
            bm25: { ...DEFAULT_CONFIG.retrieval.bm25, ...overrides.bm25 },
        };
    }

    /**
     * @throws RetrievalUnavailableError when no strategy produced a result set
     */
    async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResponse> {
        const domains = options.domains && options.domains.length > 0 ? [...options.domains] : null;
        const topK = options.topK ?? this.config.topK;
        options.signal?.throwIfAborted();

        const cached = this.cache?.get({ query, domains, topK });
        if (cached) return cached;

        if (this.strategies.length === 0) {
            throw new RetrievalUnavailableError([]);
        }

        const deadline = Date.now() + this.config.strategyTimeoutMs;
        const startTime = Date.now();

        const settled = await Promise.allSettled(
            this.strategies.map((strategy) =>
                withTimeout(
                    (signal) =>
                        strategy.search(query, {
                            domains,
                            limit: this.config.topN[strategy.name],
                            signal,
                        }),
                    remaining(deadline),
                    `${strategy.name} strategy`,
                    options.signal
                )
            )
        );
        options.signal?.throwIfAborted();

        const runs: StrategyRun[] = [];
        const degraded: DegradedStrategy[] = [];
        const hitCounts: Partial<Record<StrategyName, number>> = {};

        settled.forEach((outcome, i) => {
            const strategy = this.strategies[i];
            if (!strategy) return;

            if (outcome.status === 'fulfilled') {
                const hits = outcome.value.slice(0, this.config.topN[strategy.name]);
                runs.push({ strategy: strategy.name, hits });
                hitCounts[strategy.name] = hits.length;
                return;
            }

            const reason = outcome.reason instanceof StrategyTimeoutError ? 'timeout' : 'error';
            degraded.push({ strategy: strategy.name, reason, message: errorMessage(outcome.reason) });
            logger.warn({ strategy: strategy.name, reason, error: errorMessage(outcome.reason) }, 'Strategy degraded');
        });

        if (runs.length === 0) {
            throw new RetrievalUnavailableError(
                degraded.map(({ strategy, reason }) => ({ strategy, reason }))
            );
        }

        const results = fuseResults(runs, {
            weights: this.config.weights,
            topK,
            getSection: this.getSection,
        });

        const response: RetrievalResponse = { query, domains, results, degraded, hitCounts, cached: false };
        if (degraded.length === 0) {
            this.cache?.set({ query, domains, topK }, response);
        }

        logger.info(
            {
                query: query.slice(0, 80),
                results: results.length,
                degraded: degraded.map((d) => d.strategy),
                durationMs: Date.now() - startTime,
            },
            'Retrieval complete'
        );
        return response;
    }
}
