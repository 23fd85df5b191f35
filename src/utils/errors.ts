import type { NodeRef, StrategyName } from '../types/index.js';

export type GroundworkErrorCode =
    | 'DANGLING_EDGE'
    | 'EXTRACTION_UNAVAILABLE'
    | 'EMBEDDING_UNAVAILABLE'
    | 'RETRIEVAL_UNAVAILABLE'
    | 'STRATEGY_TIMEOUT'
    | 'TREE_BOUNDS'
    | 'DOCUMENT_VALIDATION'
    | 'QUERY_CANCELLED';

/**
 * Base class for every error the engine raises on purpose.
 */
export class GroundworkError extends Error {
    constructor(
        message: string,
        public readonly code: GroundworkErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'GroundworkError';
    }
}

/**
 * Relationship write whose source or target is not in the graph.
 * Rejected, never retried automatically.
 */
export class DanglingEdgeError extends GroundworkError {
    constructor(
        public readonly relationshipType: string,
        public readonly source: NodeRef,
        public readonly target: NodeRef,
        public readonly missing: NodeRef[]
    ) {
        super(
            `Dangling ${relationshipType} edge: missing ${missing.map((ref) => `${ref.kind}:${ref.id}`).join(', ')}`,
            'DANGLING_EDGE'
        );
        this.name = 'DanglingEdgeError';
    }
}

export class ExtractionUnavailableError extends GroundworkError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'EXTRACTION_UNAVAILABLE', options);
        this.name = 'ExtractionUnavailableError';
    }
}

export class EmbeddingUnavailableError extends GroundworkError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'EMBEDDING_UNAVAILABLE', options);
        this.name = 'EmbeddingUnavailableError';
    }
}

/**
 * Every retrieval strategy failed or timed out; no partial answer is produced.
 */
export class RetrievalUnavailableError extends GroundworkError {
    constructor(
        public readonly failures: ReadonlyArray<{ strategy: StrategyName; reason: string }>
    ) {
        super(
            failures.length === 0
                ? 'No retrieval strategies are configured'
                : `All retrieval strategies failed: ${failures.map((f) => `${f.strategy} (${f.reason})`).join(', ')}`,
            'RETRIEVAL_UNAVAILABLE'
        );
        this.name = 'RetrievalUnavailableError';
    }
}

export class StrategyTimeoutError extends GroundworkError {
    constructor(
        public readonly label: string,
        public readonly timeoutMs: number
    ) {
        super(`${label} timed out after ${timeoutMs}ms`, 'STRATEGY_TIMEOUT');
        this.name = 'StrategyTimeoutError';
    }
}

/**
 * A tree node's page range escapes its parent, overlaps a sibling,
 * or the root does not span the document.
 */
export class TreeBoundsError extends GroundworkError {
    constructor(
        message: string,
        public readonly nodeId: string
    ) {
        super(message, 'TREE_BOUNDS');
        this.name = 'TreeBoundsError';
    }
}

export class DocumentValidationError extends GroundworkError {
    constructor(
        message: string,
        public readonly documentId: string
    ) {
        super(message, 'DOCUMENT_VALIDATION');
        this.name = 'DocumentValidationError';
    }
}

export class QueryCancelledError extends GroundworkError {
    constructor(public readonly state: string) {
        super(`Query cancelled at ${state}`, 'QUERY_CANCELLED');
        this.name = 'QueryCancelledError';
    }
}

/**
 * Render an unknown thrown value as a message for logs and reports.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
