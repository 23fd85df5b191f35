import { z } from 'zod';
import {
    ENTITY_TYPES,
    EXTRACTED_RELATIONSHIP_TYPES,
    isRelationshipType,
    type Citation,
    type CritiqueProvider,
    type CritiqueResult,
    type EmbeddingProvider,
    type ExtractionProvider,
    type ExtractionResult,
    type GenerationContext,
    type GenerationProvider,
    type ProviderConfig,
    type RetrievalResult,
} from '../types/index.js';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { EmbeddingUnavailableError, ExtractionUnavailableError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const DEFAULT_BASE_URLS = {
    openai: 'https://api.openai.com/v1',
    ollama: 'http://localhost:11434/v1',
} as const;

// ─── Response schemas ───────────────────────────────────────

const chatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            })
        )
        .min(1),
});

const embeddingResponseSchema = z.object({
    data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

const extractionSchema = z.object({
    entities: z
        .array(
            z.object({
                name: z.string().min(1),
                type: z.enum(ENTITY_TYPES),
                description: z.string().optional(),
            })
        )
        .default([]),
    relationships: z
        .array(
            z.object({
                source: z.string().min(1),
                target: z.string().min(1),
                type: z.string(),
                weight: z.number().min(0).max(1).optional(),
            })
        )
        .default([]),
});

const critiqueSchema = z.object({
    pass: z.boolean(),
    issues: z.array(z.string()).default([]),
    suggestedQueries: z.array(z.string()).optional(),
    score: z.number().min(0).max(1).optional(),
});

// ─── Prompts ────────────────────────────────────────────────

const EXTRACTION_INSTRUCTIONS = [
    'Extract the entities and relationships discussed in the text.',
    `Entity types: ${ENTITY_TYPES.join(', ')}.`,
    `Relationship types: ${[...EXTRACTED_RELATIONSHIP_TYPES].join(', ')}.`,
    'Reply with JSON: {"entities":[{"name","type","description"}],"relationships":[{"source","target","type","weight"}]}.',
    'Relationship endpoints are entity names.',
].join('\n');

const CRITIQUE_INSTRUCTIONS = [
    'Check whether every claim in the answer is supported by the cited sources.',
    'Reply with JSON: {"pass":boolean,"issues":[string],"suggestedQueries":[string],"score":number}.',
    'Suggest reformulated search queries when sources are missing.',
].join('\n');

export interface OpenAiCompatibleOptions {
    config: ProviderConfig;
    apiKey?: string;
    http?: HttpClient;
}

/**
 * Extraction, generation, critique and embedding over an OpenAI-compatible
 * HTTP API (OpenAI, or Ollama's `/v1` endpoint). Replies are validated with zod.
 */
export class OpenAiCompatibleProvider
    implements ExtractionProvider, GenerationProvider, CritiqueProvider, EmbeddingProvider
{
    readonly name: string;
    readonly dimensions: number;
    private readonly config: ProviderConfig;
    private readonly baseUrl: string;
    private readonly apiKey?: string;
    private readonly http: HttpClient;

    constructor(options: OpenAiCompatibleOptions) {
        this.config = options.config;
        this.name = `${options.config.kind}:${options.config.model}`;
        this.dimensions = options.config.dimensions;
        this.apiKey = options.apiKey;

        const kind = options.config.kind === 'ollama' ? 'ollama' : 'openai';
        this.baseUrl = (options.config.baseUrl ?? DEFAULT_BASE_URLS[kind]).replace(/\/+$/, '');
        this.http = options.http ?? new HttpClient({
            timeout: options.config.timeoutMs,
            rateLimits: {
                [kind]: {
                    tokensPerSecond: options.config.requestsPerSecond,
                    maxBurst: Math.max(1, Math.ceil(options.config.requestsPerSecond)),
                },
            },
        });
    }

    private get source(): string {
        return this.config.kind === 'ollama' ? 'ollama' : 'openai';
    }

    private headers(): Record<string, string> {
        return this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
    }

    private async chat(system: string, user: string, json: boolean, signal?: AbortSignal): Promise<string> {
        const response = await this.http.post(
            `${this.baseUrl}/chat/completions`,
            {
                model: this.config.model,
                messages: [
                    { role: 'system', content: system },
                    { role: 'user', content: user },
                ],
                temperature: 0,
                ...(json ? { response_format: { type: 'json_object' } } : {}),
            },
            { headers: this.headers(), source: this.source, signal }
        );

        const parsed = chatCompletionSchema.parse(response.data);
        return parsed.choices[0]?.message.content ?? '';
    }

    async extract(sectionText: string, signal?: AbortSignal): Promise<ExtractionResult> {
        let payload: unknown;
        try {
            payload = parseJson(await this.chat(EXTRACTION_INSTRUCTIONS, sectionText, true, signal));
        } catch (error) {
            throw new ExtractionUnavailableError(`Extraction call failed: ${errorMessage(error)}`, { cause: error });
        }

        const result = extractionSchema.safeParse(payload);
        if (!result.success) {
            throw new ExtractionUnavailableError(`Malformed extraction reply: ${result.error.issues[0]?.message ?? 'invalid'}`);
        }

        const relationships: ExtractionResult['relationships'] = [];
        for (const rel of result.data.relationships) {
            if (!isRelationshipType(rel.type) || !EXTRACTED_RELATIONSHIP_TYPES.has(rel.type)) {
                logger.debug({ type: rel.type }, 'Dropping relationship of unknown type');
                continue;
            }
            relationships.push({ source: rel.source, target: rel.target, type: rel.type, weight: rel.weight });
        }

        return { entities: result.data.entities, relationships };
    }

    async generate(prompt: string, _context: GenerationContext, signal?: AbortSignal): Promise<string> {
        return this.chat('You answer questions from the supplied sources only.', prompt, false, signal);
    }

    async critique(
        response: string,
        citations: readonly Citation[],
        context: readonly RetrievalResult[],
        signal?: AbortSignal
    ): Promise<CritiqueResult> {
        const sources = context
            .filter((result) => citations.some((citation) => citation.sectionId === result.section.id))
            .map((result) => `[${result.section.id}] (pages ${result.section.pageStart}-${result.section.pageEnd})\n${result.section.text}`);

        const content = await this.chat(
            CRITIQUE_INSTRUCTIONS,
            `Answer:\n${response}\n\nCited sources:\n${sources.join('\n\n') || '(none)'}`,
            true,
            signal
        );
        return critiqueSchema.parse(parseJson(content));
    }

    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        try {
            const response = await this.http.post(
                `${this.baseUrl}/embeddings`,
                { model: this.config.embeddingModel, input: text, dimensions: this.dimensions },
                { headers: this.headers(), source: this.source, signal }
            );
            const embedding = embeddingResponseSchema.parse(response.data).data[0]?.embedding ?? [];
            if (embedding.length !== this.dimensions) {
                throw new Error(`expected ${this.dimensions} dimensions, got ${embedding.length}`);
            }
            return embedding;
        } catch (error) {
            if (error instanceof HttpError && error.status === 401) {
                logger.error({ provider: this.name }, 'Embedding provider rejected the API key');
            }
            throw new EmbeddingUnavailableError(`Embedding call failed: ${errorMessage(error)}`, { cause: error });
        }
    }
}

/**
 * Parse a JSON reply, tolerating a surrounding markdown code fence.
 */
function parseJson(content: string): unknown {
    const trimmed = content.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
    try {
        return JSON.parse(trimmed);
    } catch (error) {
        throw new Error(`Reply is not JSON: ${errorMessage(error)}`);
    }
}
