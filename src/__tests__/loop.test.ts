import { describe, it, expect, vi } from 'vitest';
import { SelfCorrectionLoop } from '../loop/self-correction.js';
import { HybridRetriever } from '../retrieval/hybrid-retriever.js';
import { formatCitation, parseCitations, validateCitations } from '../loop/citations.js';
import { buildAnswerPrompt } from '../loop/prompt.js';
import { normalizeQuery, refineQuery } from '../loop/refiner.js';
import type {
    CritiqueProvider,
    CritiqueResult,
    GenerationProvider,
    RetrievalResponse,
    RetrievalResult,
    RetrievalStrategy,
    Retriever,
} from '../types/index.js';
import { QueryCancelledError, RetrievalUnavailableError } from '../utils/errors.js';
import { sleep } from '../utils/concurrency.js';
import { makeDocument } from './helpers.js';

const doc = makeDocument('zk', {
    sections: [
        { title: 'Proof systems', text: 'Succinct proofs for payments.', pageStart: 1, pageEnd: 2 },
        { title: 'Costs', text: 'Verification time grows slowly.', pageStart: 3, pageEnd: 3 },
    ],
});

const results: RetrievalResult[] = doc.sections.map((section, i) => ({
    section,
    fusedScore: 1 - i * 0.5,
    scores: { lexical: 1 - i },
    rawScores: { lexical: 2 - i },
    strategies: ['lexical'],
}));

function responseFor(query: string, domains: readonly string[] | null = null): RetrievalResponse {
    return { query, domains, results, degraded: [], hitCounts: { lexical: results.length }, cached: false };
}

function stubRetriever() {
    return {
        retrieve: vi.fn(async (query: string, options?: { domains?: readonly string[] | null }) =>
            responseFor(query, options?.domains ?? null)
        ),
    };
}

function generatorReplying(...replies: string[]): GenerationProvider {
    const queue = [...replies];
    return {
        name: 'stub',
        generate: vi.fn(async () => queue.shift() ?? 'Unsupported claim.'),
    };
}

function criticFrom(...verdicts: CritiqueResult[]): CritiqueProvider {
    const queue = [...verdicts];
    return {
        name: 'stub',
        critique: vi.fn(async () => queue.shift() ?? { pass: false, issues: ['no verdict'] }),
    };
}

const grounded = 'Succinct proofs keep payments private [zk@v1#0 p.1].';
const rejected: CritiqueResult = { pass: false, issues: ['claim not supported'] };
const accepted: CritiqueResult = { pass: true, issues: [] };

describe('SelfCorrectionLoop', () => {
    it('should return after a pass on the third iteration', async () => {
        const loop = new SelfCorrectionLoop({
            retriever: stubRetriever(),
            generator: generatorReplying(grounded, grounded, grounded),
            critic: criticFrom(rejected, rejected, accepted),
        });

        const outcome = await loop.answer('zero knowledge privacy');

        expect(outcome.state).toBe('RETURN');
        expect(outcome.verified).toBe(true);
        expect(outcome.iterations).toBe(3);
        expect(outcome.response).toBe(grounded);
        expect(outcome.citations).toEqual([{ sectionId: 'zk@v1#0', page: 1, marker: '[zk@v1#0 p.1]' }]);
        expect(outcome.trace.map((t) => `${t.from}>${t.to}`)).toEqual([
            'GENERATE>CRITIQUE',
            'CRITIQUE>REFINE',
            'REFINE>GENERATE',
            'GENERATE>CRITIQUE',
            'CRITIQUE>REFINE',
            'REFINE>GENERATE',
            'GENERATE>CRITIQUE',
            'CRITIQUE>RETURN',
        ]);
    });

    it('should rephrase the query between iterations', async () => {
        const retriever = stubRetriever();
        const loop = new SelfCorrectionLoop({
            retriever,
            generator: generatorReplying(grounded, grounded, grounded),
            critic: criticFrom(rejected, rejected, rejected),
        });

        const outcome = await loop.answer('zero knowledge privacy');

        expect(retriever.retrieve.mock.calls.map((call) => call[0])).toEqual([
            'zero knowledge privacy',
            'zero knowledge',
            'zero',
        ]);
        expect(outcome.history.map((h) => h.query)).toEqual(['zero knowledge privacy', 'zero knowledge', 'zero']);
    });

    it('should stop after maxIterations with an unverified response', async () => {
        const loop = new SelfCorrectionLoop({
            retriever: stubRetriever(),
            generator: generatorReplying('first', 'second'),
            critic: criticFrom(rejected, rejected),
            maxIterations: 2,
        });

        const outcome = await loop.answer('privacy');

        expect(outcome.state).toBe('FAILED');
        expect(outcome.verified).toBe(false);
        expect(outcome.iterations).toBe(2);
        expect(outcome.response).toBe('second');
        expect(outcome.trace.at(-1)).toEqual({
            from: 'CRITIQUE',
            to: 'FAILED',
            iteration: 2,
            detail: 'Response contains no citations',
        });
    });

    it('should reject a pass whose citations fall outside the context', async () => {
        const loop = new SelfCorrectionLoop({
            retriever: stubRetriever(),
            generator: generatorReplying('Costs are low [zk@v1#1 p.9].'),
            critic: criticFrom(accepted),
            maxIterations: 1,
        });

        const outcome = await loop.answer('verification cost');

        expect(outcome.state).toBe('FAILED');
        expect(outcome.history[0]?.issues).toEqual([
            '[zk@v1#1 p.9] cites page 9, section covers pages 3-3',
        ]);
        expect(outcome.citations).toEqual([{ sectionId: 'zk@v1#1', page: 9, marker: '[zk@v1#1 p.9]' }]);
    });

    it('should count a generation error as a failed iteration', async () => {
        const generator: GenerationProvider = {
            name: 'flaky',
            generate: vi
                .fn<GenerationProvider['generate']>()
                .mockRejectedValueOnce(new Error('rate limited'))
                .mockResolvedValueOnce(grounded),
        };
        const loop = new SelfCorrectionLoop({
            retriever: stubRetriever(),
            generator,
            critic: criticFrom(accepted),
        });

        const outcome = await loop.answer('privacy');

        expect(outcome.state).toBe('RETURN');
        expect(outcome.iterations).toBe(2);
        expect(outcome.history[0]?.issues).toEqual(['Generation failed: rate limited']);
        expect(outcome.trace[0]).toEqual({ from: 'GENERATE', to: 'REFINE', iteration: 1, detail: 'generation error' });
    });

    it('should keep the previous context when re-retrieval fails', async () => {
        const retriever: Retriever = {
            retrieve: vi
                .fn<Retriever['retrieve']>()
                .mockResolvedValueOnce(responseFor('privacy'))
                .mockRejectedValueOnce(new RetrievalUnavailableError([{ strategy: 'vector', reason: 'timeout' }])),
        };
        const loop = new SelfCorrectionLoop({
            retriever,
            generator: generatorReplying(grounded, grounded),
            critic: criticFrom(rejected, accepted),
        });

        const outcome = await loop.answer('privacy budgets');

        expect(outcome.state).toBe('RETURN');
        expect(outcome.results).toBe(results);
    });

    it('should surface a failed initial retrieval', async () => {
        const retriever: Retriever = {
            retrieve: vi.fn(async () => {
                throw new RetrievalUnavailableError([]);
            }),
        };
        const loop = new SelfCorrectionLoop({ retriever, generator: generatorReplying(), critic: criticFrom() });

        await expect(loop.answer('privacy')).rejects.toThrow(RetrievalUnavailableError);
    });

    it('should stop at the next state boundary when cancelled', async () => {
        const controller = new AbortController();
        const critic = criticFrom(accepted);
        const generator: GenerationProvider = {
            name: 'slow',
            generate: vi.fn(async () => {
                controller.abort();
                return grounded;
            }),
        };
        const loop = new SelfCorrectionLoop({ retriever: stubRetriever(), generator, critic });

        const failure = await loop.answer('privacy', { signal: controller.signal }).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(QueryCancelledError);
        expect(failure instanceof QueryCancelledError && failure.state).toBe('CRITIQUE');
        expect(critic.critique).not.toHaveBeenCalled();
    });

    it('should report cancellation during the first retrieval as a cancelled query', async () => {
        const controller = new AbortController();
        const slowLexical: RetrievalStrategy = {
            name: 'lexical',
            search: async () => {
                await sleep(100);
                return [{ sectionId: 'zk@v1#0', score: 1 }];
            },
        };
        const retriever = new HybridRetriever({
            strategies: [slowLexical],
            getSection: (id) => doc.sections.find((section) => section.id === id),
        });
        const generator = generatorReplying(grounded);
        const loop = new SelfCorrectionLoop({ retriever, generator, critic: criticFrom(accepted) });
        setTimeout(() => controller.abort(), 10);

        const failure = await loop.answer('privacy', { signal: controller.signal }).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(QueryCancelledError);
        expect(failure instanceof QueryCancelledError && failure.state).toBe('GENERATE');
        expect(generator.generate).not.toHaveBeenCalled();
    });

    it('should pass through a retrieval failure that is not a cancellation', async () => {
        const controller = new AbortController();
        const retriever: Retriever = {
            retrieve: vi.fn(async () => {
                throw new RetrievalUnavailableError([{ strategy: 'lexical', reason: 'error' }]);
            }),
        };
        const loop = new SelfCorrectionLoop({ retriever, generator: generatorReplying(), critic: criticFrom() });

        await expect(loop.answer('privacy', { signal: controller.signal })).rejects.toThrow(RetrievalUnavailableError);
    });

    it('should widen the domain filter before rephrasing', async () => {
        const retriever = stubRetriever();
        const loop = new SelfCorrectionLoop({
            retriever,
            generator: generatorReplying(grounded, grounded),
            critic: criticFrom(rejected, accepted),
        });

        await loop.answer('privacy budgets', { domains: ['cbdc'] });

        expect(retriever.retrieve.mock.calls.map((call) => call[1]?.domains)).toEqual([['cbdc'], null]);
    });
});

describe('Citations', () => {
    it('should parse markers in order without repeats', () => {
        expect(parseCitations('See [zk@v1#0 p.2] and [zk@v1#0 p.2], also [retail-2@v3#1 p.10].')).toEqual([
            { sectionId: 'zk@v1#0', page: 2, marker: '[zk@v1#0 p.2]' },
            { sectionId: 'retail-2@v3#1', page: 10, marker: '[retail-2@v3#1 p.10]' },
        ]);
    });

    it('should format a marker', () => {
        expect(formatCitation({ id: 'zk@v1#0' }, 2)).toBe('[zk@v1#0 p.2]');
    });

    it('should flag missing, foreign and out-of-range citations', () => {
        expect(validateCitations([], results)).toEqual(['Response contains no citations']);
        expect(validateCitations(parseCitations('[other@v1#0 p.1] [zk@v1#0 p.3] [zk@v1#0 p.2]'), results)).toEqual([
            '[other@v1#0 p.1] cites a section outside the retrieved context',
            '[zk@v1#0 p.3] cites page 3, section covers pages 1-2',
        ]);
    });
});

describe('buildAnswerPrompt', () => {
    it('should list sources with their markers and append feedback', () => {
        const prompt = buildAnswerPrompt('How fast is verification?', results, ['claim not supported']);
        const lines = prompt.split('\n');

        expect(lines).toContain('Source 1 [zk@v1#0 p.1] (pages 1-2)');
        expect(lines).toContain('Source 2 [zk@v1#1 p.3] (pages 3-3)');
        expect(lines).toContain('Question: How fast is verification?');
        expect(lines.slice(-2)).toEqual(['A previous answer was rejected:', '- claim not supported']);
    });
});

describe('refineQuery', () => {
    const frequencies = new Map([
        ['privacy', 5],
        ['ledger', 2],
        ['settlement', 5],
    ]);
    const base = {
        domains: null,
        critique: null,
        tried: new Set<string>(),
        documentFrequency: (term: string) => frequencies.get(term) ?? 0,
    };

    it('should prefer an untried suggested query', () => {
        const refinement = refineQuery({
            ...base,
            query: 'privacy',
            critique: { pass: false, issues: [], suggestedQueries: ['Privacy', 'offline privacy'] },
            tried: new Set(['privacy']),
        });

        expect(refinement).toEqual({ kind: 'suggested-query', query: 'offline privacy', domains: null });
    });

    it('should widen the domain filter next', () => {
        expect(refineQuery({ ...base, query: 'privacy', domains: ['cbdc'] })).toEqual({
            kind: 'widen-domains',
            query: 'privacy',
            domains: null,
        });
    });

    it('should drop the most common term', () => {
        expect(refineQuery({ ...base, query: 'privacy ledger settlement' })).toEqual({
            kind: 'drop-term',
            query: 'privacy ledger',
            domains: null,
        });
    });

    it('should keep the query when nothing else applies', () => {
        expect(refineQuery({ ...base, query: 'privacy' }).kind).toBe('unchanged');
    });

    it('should normalize queries for comparison', () => {
        expect(normalizeQuery('  Zero   Knowledge ')).toBe('zero knowledge');
    });
});
