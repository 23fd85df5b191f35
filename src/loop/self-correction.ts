import {
    DEFAULT_CONFIG,
    type Citation,
    type CritiqueProvider,
    type CritiqueResult,
    type DegradedStrategy,
    type GenerationProvider,
    type RetrievalResponse,
    type RetrievalResult,
    type Retriever,
} from '../types/index.js';
import { QueryCancelledError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseCitations, validateCitations } from './citations.js';
import { buildAnswerPrompt } from './prompt.js';
import { normalizeQuery, refineQuery, type RefinementKind } from './refiner.js';

const logger = getLogger();

export type LoopState = 'GENERATE' | 'CRITIQUE' | 'REFINE' | 'RETURN' | 'FAILED';

/**
 * Allowed transitions. RETURN and FAILED are terminal.
 */
const TRANSITIONS: Readonly<Record<LoopState, readonly LoopState[]>> = {
    GENERATE: ['CRITIQUE', 'REFINE', 'FAILED'],
    CRITIQUE: ['RETURN', 'REFINE', 'FAILED'],
    REFINE: ['GENERATE'],
    RETURN: [],
    FAILED: [],
};

export interface LoopTransition {
    from: LoopState;
    to: LoopState;

    /** Generate attempts made so far */
    iteration: number;

    detail?: string;
}

export interface IterationRecord {
    iteration: number;
    query: string;
    domains: readonly string[] | null;
    response: string | null;
    citations: Citation[];
    issues: string[];
    passed: boolean;
}

export interface LoopOutcome {
    state: 'RETURN' | 'FAILED';

    /** True only when the final response passed critique */
    verified: boolean;

    response: string;
    citations: Citation[];

    /** Retrieval context of the final iteration */
    results: RetrievalResult[];

    /** Strategies degraded during the final retrieval */
    degraded: DegradedStrategy[];

    /** Generate attempts made */
    iterations: number;

    trace: LoopTransition[];
    history: IterationRecord[];
}

export interface SelfCorrectionOptions {
    retriever: Retriever;
    generator: GenerationProvider;
    critic: CritiqueProvider;
    maxIterations?: number;
    topK?: number;

    /** Used to pick the least informative term when rephrasing */
    documentFrequency?: (term: string) => number;
}

export interface AnswerOptions {
    domains?: readonly string[] | null;
    signal?: AbortSignal;
}

/**
 * Bounded generate → critique → refine automaton.
 *
 * Each query runs sequentially through GENERATE, CRITIQUE and REFINE until
 * the critique passes (RETURN) or `maxIterations` generate attempts have been
 * made (FAILED, response flagged unverified). A collaborator error counts as
 * a failed iteration. The signal is checked at every state boundary; work
 * finished after cancellation is discarded.
 */
export class SelfCorrectionLoop {
    private readonly retriever: Retriever;
    private readonly generator: GenerationProvider;
    private readonly critic: CritiqueProvider;
    private readonly maxIterations: number;
    private readonly topK?: number;
    private readonly documentFrequency: (term: string) => number;

    constructor(options: SelfCorrectionOptions) {
        this.retriever = options.retriever;
        this.generator = options.generator;
        this.critic = options.critic;
        this.maxIterations = Math.max(1, options.maxIterations ?? DEFAULT_CONFIG.loop.maxIterations);
        this.topK = options.topK;
        this.documentFrequency = options.documentFrequency ?? (() => 0);
    }

    /**
     * @throws RetrievalUnavailableError when the initial retrieval fails entirely
     * @throws QueryCancelledError when the signal aborts
     */
    async answer(query: string, options: AnswerOptions = {}): Promise<LoopOutcome> {
        const { signal } = options;
        const trace: LoopTransition[] = [];
        const history: IterationRecord[] = [];
        const tried = new Set<string>();

        let state: LoopState = 'GENERATE';
        let iteration = 0;
        let currentQuery = query;
        let domains: readonly string[] | null = options.domains && options.domains.length > 0 ? options.domains : null;

        const boundary = (): void => {
            if (signal?.aborted) {
                logger.info({ state, iteration }, 'Query cancelled');
                throw new QueryCancelledError(state);
            }
        };

        const transition = (from: LoopState, to: LoopState, detail?: string): LoopState => {
            if (!TRANSITIONS[from].includes(to)) {
                throw new Error(`Illegal loop transition ${from} → ${to}`);
            }
            trace.push({ from, to, iteration, ...(detail === undefined ? {} : { detail }) });
            logger.debug({ from, to, iteration, detail }, 'Loop transition');
            return to;
        };

        // A failed iteration retries while generate attempts remain
        const afterFailure = (): LoopState => (iteration < this.maxIterations ? 'REFINE' : 'FAILED');

        boundary();
        tried.add(normalizeQuery(currentQuery));
        let retrieval: RetrievalResponse;
        try {
            retrieval = await this.retriever.retrieve(currentQuery, { domains, topK: this.topK, signal });
        } catch (error) {
            boundary();
            throw error;
        }
        let record: IterationRecord | null = null;
        let lastCritique: CritiqueResult | null = null;

        while (state !== 'RETURN' && state !== 'FAILED') {
            boundary();

            switch (state) {
                case 'GENERATE': {
                    iteration++;
                    const feedback = record?.issues ?? [];
                    record = {
                        iteration,
                        query: currentQuery,
                        domains,
                        response: null,
                        citations: [],
                        issues: [],
                        passed: false,
                    };
                    history.push(record);

                    try {
                        const prompt = buildAnswerPrompt(currentQuery, retrieval.results, feedback);
                        record.response = await this.generator.generate(
                            prompt,
                            { query: currentQuery, results: retrieval.results },
                            signal
                        );
                    } catch (error) {
                        boundary();
                        record.issues.push(`Generation failed: ${errorMessage(error)}`);
                        lastCritique = null;
                        logger.warn({ iteration, error: errorMessage(error) }, 'Generation failed');
                        state = transition(state, afterFailure(), 'generation error');
                        break;
                    }

                    state = transition(state, 'CRITIQUE');
                    break;
                }

                case 'CRITIQUE': {
                    if (!record || record.response === null) {
                        throw new Error('CRITIQUE reached without a response');
                    }
                    const response = record.response;
                    record.citations = parseCitations(response);
                    record.issues.push(...validateCitations(record.citations, retrieval.results));

                    let critique: CritiqueResult | null = null;
                    try {
                        critique = await this.critic.critique(response, record.citations, retrieval.results, signal);
                        record.issues.push(...critique.issues);
                    } catch (error) {
                        boundary();
                        record.issues.push(`Critique failed: ${errorMessage(error)}`);
                        logger.warn({ iteration, error: errorMessage(error) }, 'Critique failed');
                    }
                    boundary();
                    lastCritique = critique;

                    record.passed = critique !== null && critique.pass && record.issues.length === 0;
                    state = record.passed
                        ? transition(state, 'RETURN')
                        : transition(state, afterFailure(), record.issues[0] ?? 'critique rejected the response');
                    break;
                }

                case 'REFINE': {
                    const refinement = refineQuery({
                        query: currentQuery,
                        domains,
                        critique: lastCritique,
                        tried,
                        documentFrequency: this.documentFrequency,
                    });
                    currentQuery = refinement.query;
                    domains = refinement.domains;
                    tried.add(normalizeQuery(currentQuery));

                    retrieval = await this.reretrieve(currentQuery, domains, refinement.kind, retrieval, signal);
                    boundary();
                    state = transition(state, 'GENERATE', refinement.kind);
                    break;
                }
            }
        }

        const outcome = this.finish(state, iteration, retrieval.results, retrieval.degraded, trace, history);
        logger.info(
            { query: query.slice(0, 80), state: outcome.state, iterations: outcome.iterations },
            'Query answered'
        );
        return outcome;
    }

    /**
     * Retrieve for a refined query. A failed retrieval keeps the previous context.
     */
    private async reretrieve(
        query: string,
        domains: readonly string[] | null,
        kind: RefinementKind,
        previous: RetrievalResponse,
        signal?: AbortSignal
    ): Promise<RetrievalResponse> {
        try {
            return await this.retriever.retrieve(query, { domains, topK: this.topK, signal });
        } catch (error) {
            if (signal?.aborted) throw new QueryCancelledError('REFINE');
            logger.warn({ query: query.slice(0, 80), kind, error: errorMessage(error) }, 'Re-retrieval failed, keeping previous context');
            return previous;
        }
    }

    private finish(
        state: LoopState,
        iteration: number,
        results: RetrievalResult[],
        degraded: DegradedStrategy[],
        trace: LoopTransition[],
        history: IterationRecord[]
    ): LoopOutcome {
        const last = history.at(-1);

        if (state === 'RETURN' && last && last.response !== null) {
            return {
                state: 'RETURN',
                verified: true,
                response: last.response,
                citations: last.citations,
                results,
                degraded,
                iterations: iteration,
                trace,
                history,
            };
        }

        // Final iteration's response, or the latest one produced if its generation failed
        const best = [...history].reverse().find((entry) => entry.response !== null);
        const response = best?.response ?? '';
        return {
            state: 'FAILED',
            verified: false,
            response,
            citations: best ? (best.citations.length > 0 ? best.citations : parseCitations(response)) : [],
            results,
            degraded,
            iterations: iteration,
            trace,
            history,
        };
    }
}
