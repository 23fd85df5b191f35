import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    CitationCritic,
    DictionaryExtractor,
    ExtractiveGenerator,
    HashingEmbedder,
    OpenAiCompatibleProvider,
    createProviders,
} from '../providers/index.js';
import { DEFAULT_CONFIG, RelationshipType, type ProviderConfig, type RetrievalResult } from '../types/index.js';
import { EmbeddingUnavailableError, ExtractionUnavailableError } from '../utils/errors.js';
import { makeDocument } from './helpers.js';

const doc = makeDocument('zk', {
    sections: [
        { title: 'Costs', text: 'Succinct proofs for payments. Verification time grows slowly.', pageStart: 1, pageEnd: 2 },
        { title: 'Ledger', text: 'Ledger entries settle daily.', pageStart: 3, pageEnd: 3 },
    ],
});

const context: RetrievalResult[] = doc.sections.map((section) => ({
    section,
    fusedScore: 1,
    scores: { lexical: 1 },
    rawScores: { lexical: 1 },
    strategies: ['lexical'],
}));

describe('HashingEmbedder', () => {
    it('should produce unit vectors of the configured size', async () => {
        const embedder = new HashingEmbedder(8);
        const vector = await embedder.embed('privacy ledger');

        expect(vector).toHaveLength(8);
        expect(Math.hypot(...vector)).toBeCloseTo(1);
    });

    it('should be deterministic', () => {
        const embedder = new HashingEmbedder(16);
        expect(embedder.embedSync('settlement finality')).toEqual(embedder.embedSync('settlement finality'));
    });

    it('should return a zero vector for text without terms', () => {
        expect(new HashingEmbedder(4).embedSync('the')).toEqual([0, 0, 0, 0]);
    });

    it('should reject a non-positive size', () => {
        expect(() => new HashingEmbedder(0)).toThrow(RangeError);
    });
});

describe('DictionaryExtractor', () => {
    it('should find lexicon entries and link co-occurring entities', async () => {
        const extractor = new DictionaryExtractor({
            Concept: ['privacy'],
            Method: ['Pedersen commitment'],
            Result: ['throughput'],
        });

        const result = await extractor.extract(
            'Pedersen commitment protects privacy. Throughput drops with Pedersen commitment.'
        );

        expect(result.entities).toEqual([
            { name: 'privacy', type: 'Concept' },
            { name: 'Pedersen commitment', type: 'Method' },
            { name: 'throughput', type: 'Result' },
        ]);
        expect(result.relationships).toEqual([
            { source: 'Pedersen commitment', target: 'privacy', type: RelationshipType.APPLIED_TO, weight: 1 },
            { source: 'Pedersen commitment', target: 'throughput', type: RelationshipType.REPORTS_RESULT, weight: 1 },
        ]);
    });

    it('should pick up acronym definitions', async () => {
        const result = await new DictionaryExtractor({}).extract('Audits rely on Weak Sentinel Protocol (WSP).');

        expect(result.entities).toEqual([
            { name: 'Weak Sentinel Protocol', type: 'Concept', description: 'Abbreviated WSP' },
        ]);
        expect(result.relationships).toEqual([]);
    });

    it('should load the built-in lexicon', async () => {
        const result = await new DictionaryExtractor().extract('Utreexo shrinks the UTXO set.');
        expect(result.entities.map((entity) => entity.name)).toEqual(['UTXO', 'Utreexo']);
    });
});

describe('ExtractiveGenerator', () => {
    it('should quote the best sentence of each source with its citation', async () => {
        const answer = await new ExtractiveGenerator().generate('', { query: 'verification time', results: context });

        expect(answer.split('\n')).toEqual([
            'Verification time grows slowly. [zk@v1#0 p.1]',
            'Ledger entries settle daily. [zk@v1#1 p.3]',
        ]);
    });

    it('should say so when there is no context', async () => {
        const answer = await new ExtractiveGenerator().generate('', { query: 'verification time', results: [] });
        expect(answer).toBe('No source in the corpus addresses: verification time');
    });
});

describe('CitationCritic', () => {
    const critic = new CitationCritic();

    it('should pass cited claims supported by their sources', async () => {
        const verdict = await critic.critique('Verification time grows slowly [zk@v1#0 p.1].', [], context);
        expect(verdict).toEqual({ pass: true, issues: [], score: 1 });
    });

    it('should flag uncited lines', async () => {
        const verdict = await critic.critique(
            'Verification time grows slowly [zk@v1#0 p.1].\nProofs are succinct.',
            [],
            context
        );
        expect(verdict).toEqual({ pass: false, issues: ['Uncited claim: Proofs are succinct.'], score: 0.5 });
    });

    it('should flag claims the cited section does not support', async () => {
        const verdict = await critic.critique('Ledgers are centralized [zk@v1#0 p.1].', [], context);
        expect(verdict.issues).toEqual(['Claim not supported by [zk@v1#0 p.1]']);
        expect(verdict.pass).toBe(false);
    });
});

describe('createProviders', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('should build the local providers by default', () => {
        const providers = createProviders(DEFAULT_CONFIG.provider);

        expect(providers.extractor).toBeInstanceOf(DictionaryExtractor);
        expect(providers.generator).toBeInstanceOf(ExtractiveGenerator);
        expect(providers.critic).toBeInstanceOf(CitationCritic);
        expect(providers.embedder).toBeInstanceOf(HashingEmbedder);
        expect(providers.embedder.dimensions).toBe(256);
        expect(providers.scoresTreeNodes).toBe(false);
    });

    it('should share one HTTP provider for the openai kind', () => {
        vi.stubEnv('OPENAI_API_KEY', 'test-secret');
        const providers = createProviders({ ...DEFAULT_CONFIG.provider, kind: 'openai' });

        expect(providers.generator).toBeInstanceOf(OpenAiCompatibleProvider);
        expect(providers.extractor).toBe(providers.generator);
        expect(providers.generator.name).toBe('openai:gpt-4.1-mini');
        expect(providers.scoresTreeNodes).toBe(true);
    });
});

describe('OpenAiCompatibleProvider', () => {
    const config: ProviderConfig = { ...DEFAULT_CONFIG.provider, kind: 'openai', dimensions: 3 };

    function replyWith(body: unknown, status = 200) {
        const fetchMock = vi.fn(
            async (_url: string, _init?: RequestInit) =>
                new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
        );
        vi.stubGlobal('fetch', fetchMock);
        return fetchMock;
    }

    const chatReply = (content: string) => ({ choices: [{ message: { content } }] });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should request embeddings with the API key', async () => {
        const fetchMock = replyWith({ data: [{ embedding: [0.1, 0.2, 0.3] }] });
        const provider = new OpenAiCompatibleProvider({ config, apiKey: 'test-secret' });

        expect(await provider.embed('privacy')).toEqual([0.1, 0.2, 0.3]);
        expect(fetchMock).toHaveBeenCalledWith(
            'https://api.openai.com/v1/embeddings',
            expect.objectContaining({
                method: 'POST',
                headers: expect.objectContaining({ Authorization: 'Bearer test-secret' }),
                body: JSON.stringify({ model: 'text-embedding-3-small', input: 'privacy', dimensions: 3 }),
            })
        );
    });

    it('should reject embeddings of the wrong size', async () => {
        replyWith({ data: [{ embedding: [0.1, 0.2] }] });
        const provider = new OpenAiCompatibleProvider({ config, apiKey: 'test-secret' });

        await expect(provider.embed('privacy')).rejects.toThrow(
            'Embedding call failed: expected 3 dimensions, got 2'
        );
    });

    it('should wrap an authentication failure', async () => {
        replyWith({ error: 'invalid key' }, 401);
        const provider = new OpenAiCompatibleProvider({ config, apiKey: 'test-secret' });

        await expect(provider.embed('privacy')).rejects.toThrow(EmbeddingUnavailableError);
    });

    it('should parse a fenced extraction reply and drop unknown relationship types', async () => {
        const content = [
            '```json',
            JSON.stringify({
                entities: [{ name: 'Utreexo', type: 'Method' }],
                relationships: [
                    { source: 'Utreexo', target: 'UTXO', type: 'applied-to', weight: 0.8 },
                    { source: 'Utreexo', target: 'UTXO', type: 'invented' },
                ],
            }),
            '```',
        ].join('\n');
        replyWith(chatReply(content));
        const provider = new OpenAiCompatibleProvider({ config, apiKey: 'test-secret' });

        const result = await provider.extract('Utreexo shrinks the UTXO set.');

        expect(result.entities).toEqual([{ name: 'Utreexo', type: 'Method' }]);
        expect(result.relationships).toEqual([
            { source: 'Utreexo', target: 'UTXO', type: RelationshipType.APPLIED_TO, weight: 0.8 },
        ]);
    });

    it('should raise ExtractionUnavailableError for a reply that is not JSON', async () => {
        replyWith(chatReply('I cannot help with that.'));
        const provider = new OpenAiCompatibleProvider({ config, apiKey: 'test-secret' });

        await expect(provider.extract('Utreexo')).rejects.toThrow(ExtractionUnavailableError);
    });

    it('should parse a critique verdict', async () => {
        replyWith(chatReply(JSON.stringify({ pass: false, issues: ['unsupported'], suggestedQueries: ['utxo accumulator'] })));
        const provider = new OpenAiCompatibleProvider({ config: { ...config, kind: 'ollama' } });

        const verdict = await provider.critique('Utreexo is fast [zk@v1#0 p.1].', [], context);

        expect(verdict).toEqual({ pass: false, issues: ['unsupported'], suggestedQueries: ['utxo accumulator'] });
    });
});
