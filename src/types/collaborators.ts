import type { ExtractedEntity } from './entity.js';
import type { ExtractedRelationship } from './relationship.js';
import type { RetrievalResult } from './retrieval.js';

/**
 * Structured output of the extraction collaborator for one section.
 */
export interface ExtractionResult {
    entities: ExtractedEntity[];
    relationships: ExtractedRelationship[];
}

/**
 * Text-to-structure extraction capability.
 * Implementations throw `ExtractionUnavailable` on provider outage.
 */
export interface ExtractionProvider {
    readonly name: string;

    extract(sectionText: string, signal?: AbortSignal): Promise<ExtractionResult>;
}

/**
 * Retrieval context handed to the generation collaborator.
 */
export interface GenerationContext {
    query: string;
    results: readonly RetrievalResult[];
}

/**
 * Text generation capability. Streaming is not used.
 */
export interface GenerationProvider {
    readonly name: string;

    generate(prompt: string, context: GenerationContext, signal?: AbortSignal): Promise<string>;
}

/**
 * A citation marker parsed from a generated response: `[<sectionId> p.<page>]`.
 */
export interface Citation {
    sectionId: string;
    page: number;

    /** The marker text exactly as it appeared */
    marker: string;
}

export interface CritiqueResult {
    pass: boolean;
    issues: string[];

    /** Reformulated queries the critic recommends for the next retrieval */
    suggestedQueries?: string[];

    /** Overall grounding score (0.0 to 1.0) when the critic reports one */
    score?: number;
}

/**
 * Groundedness critique capability.
 */
export interface CritiqueProvider {
    readonly name: string;

    critique(
        response: string,
        citations: readonly Citation[],
        context: readonly RetrievalResult[],
        signal?: AbortSignal
    ): Promise<CritiqueResult>;
}

/**
 * Text embedding capability returning fixed-length vectors.
 * Implementations throw `EmbeddingUnavailable` on provider outage.
 */
export interface EmbeddingProvider {
    readonly name: string;
    readonly dimensions: number;

    embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
