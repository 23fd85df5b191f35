import pLimit from 'p-limit';
import {
    DEFAULT_CONFIG,
    RelationshipType,
    nodeKey,
    sectionId,
    type Document,
    type DocumentInput,
    type EmbeddingProvider,
    type ExtractionProvider,
    type ExtractionResult,
    type NodeRef,
    type Section,
    type TreeNodeInput,
} from '../types/index.js';
import type { GraphStore } from '../graph/graph-store.js';
import type { EntityResolver, EntityMerge, FlaggedCandidate, UnresolvedCandidate } from '../resolver/entity-resolver.js';
import type { VectorIndex } from '../indexes/vector-index.js';
import type { LexicalIndex } from '../indexes/lexical-index.js';
import { buildTree, type TreeIndex } from '../tree/tree-index.js';
import type { RetrievalCache } from '../cache/retrieval-cache.js';
import { normalizeKey } from '../nlp/tokenizer.js';
import { withTimeout } from '../utils/concurrency.js';
import {
    DanglingEdgeError,
    DocumentValidationError,
    EmbeddingUnavailableError,
    TreeBoundsError,
    errorMessage,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface IngestPipelineOptions {
    store: GraphStore;
    resolver: EntityResolver;
    extractor: ExtractionProvider;
    embedder: EmbeddingProvider;
    vectorIndex: VectorIndex;
    lexicalIndex: LexicalIndex;
    trees: TreeIndex;

    /** Cleared after every batch so stale retrievals are not served */
    cache?: RetrievalCache;

    /** Documents processed at once */
    concurrency?: number;

    /** Deadline for one extraction call */
    extractionTimeoutMs?: number;
}

export type DocumentStatus = 'ingested' | 'rejected' | 'failed';

export interface DocumentReport {
    documentId: string;
    version?: number;
    status: DocumentStatus;
    sections: number;
    entities: number;
    relationships: number;
    error?: string;
}

export interface DanglingEdgeReport {
    documentId: string;
    sectionId: string;
    type: RelationshipType;
    source: string;
    target: string;
    missing: string[];
}

/**
 * Outcome of one ingestion batch. Isolated failures are listed here
 * instead of aborting the batch.
 */
export interface IngestionReport {
    documents: DocumentReport[];
    entitiesCreated: number;
    merges: EntityMerge[];
    flagged: Array<FlaggedCandidate & { sectionId: string }>;
    unresolved: Array<UnresolvedCandidate & { sectionId: string }>;
    danglingEdges: DanglingEdgeReport[];
    extractionFailures: Array<{ documentId: string; sectionId: string; error: string }>;
    treeErrors: Array<{ documentId: string; nodeId: string; error: string }>;
    durationMs: number;
}

/**
 * Reject documents that cannot be ingested as given.
 *
 * @throws DocumentValidationError
 */
export function validateDocument(input: DocumentInput): void {
    const fail = (message: string): never => {
        throw new DocumentValidationError(message, input.id);
    };

    if (input.id.trim().length === 0) fail('Document id is empty');
    if (/[@#\s]/.test(input.id)) fail(`Document id "${input.id}" contains '@', '#' or whitespace`);
    if (input.domain.trim().length === 0) fail(`Document ${input.id} has no domain`);
    if (!Number.isInteger(input.pageCount) || input.pageCount < 1) {
        fail(`Document ${input.id} has an invalid page count: ${input.pageCount}`);
    }
    if (input.sections.length === 0) fail(`Document ${input.id} has no sections`);

    input.sections.forEach((section, i) => {
        const { pageStart, pageEnd } = section;
        if (!Number.isInteger(pageStart) || !Number.isInteger(pageEnd) || pageStart < 1 || pageStart > pageEnd || pageEnd > input.pageCount) {
            fail(`Section ${i} of ${input.id} spans pages ${pageStart}-${pageEnd}, outside 1-${input.pageCount}`);
        }
        if (section.text.trim().length === 0) fail(`Section ${i} of ${input.id} has no text`);
    });
}

/**
 * Ingestion pipeline. For each document:
 *
 * 1. Validate and reserve the next version
 * 2. Embed sections
 * 3. Check the supplied tree (falls back to a generated one)
 * 4. Register the document, its sections and indexes
 * 5. Extract, resolve and link entities section by section
 *
 * Documents run through a p-limit pool; entity writes are serialized per
 * entity by the store's mutex. A final consolidation pass merges duplicates
 * that concurrent documents created side by side.
 */
export class IngestPipeline {
    private readonly store: GraphStore;
    private readonly resolver: EntityResolver;
    private readonly extractor: ExtractionProvider;
    private readonly embedder: EmbeddingProvider;
    private readonly vectorIndex: VectorIndex;
    private readonly lexicalIndex: LexicalIndex;
    private readonly trees: TreeIndex;
    private readonly cache?: RetrievalCache;
    private readonly concurrency: number;
    private readonly extractionTimeoutMs: number;

    constructor(options: IngestPipelineOptions) {
        this.store = options.store;
        this.resolver = options.resolver;
        this.extractor = options.extractor;
        this.embedder = options.embedder;
        this.vectorIndex = options.vectorIndex;
        this.lexicalIndex = options.lexicalIndex;
        this.trees = options.trees;
        this.cache = options.cache;
        this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONFIG.ingest.concurrency);
        this.extractionTimeoutMs = options.extractionTimeoutMs ?? DEFAULT_CONFIG.provider.timeoutMs;
    }

    async ingest(inputs: readonly DocumentInput[]): Promise<IngestionReport> {
        const startTime = Date.now();
        const report: IngestionReport = {
            documents: [],
            entitiesCreated: 0,
            merges: [],
            flagged: [],
            unresolved: [],
            danglingEdges: [],
            extractionFailures: [],
            treeErrors: [],
            durationMs: 0,
        };
        const touched = new Set<string>();

        logger.info({ documents: inputs.length, concurrency: this.concurrency }, 'Starting ingestion');

        const limit = pLimit(this.concurrency);
        const documentReports = await Promise.all(
            inputs.map((input) => limit(() => this.ingestDocument(input, report, touched)))
        );
        report.documents.push(...documentReports);

        // Duplicates created by documents processed side by side
        const merges = await this.resolver.consolidate(touched);
        report.merges.push(...merges);

        this.cache?.clear();

        report.durationMs = Date.now() - startTime;
        logger.info(
            {
                ingested: report.documents.filter((d) => d.status === 'ingested').length,
                rejected: report.documents.filter((d) => d.status !== 'ingested').length,
                entitiesCreated: report.entitiesCreated,
                merges: report.merges.length,
                danglingEdges: report.danglingEdges.length,
                durationMs: report.durationMs,
            },
            'Ingestion complete'
        );
        return report;
    }

    private async ingestDocument(
        input: DocumentInput,
        report: IngestionReport,
        touched: Set<string>
    ): Promise<DocumentReport> {
        const result: DocumentReport = {
            documentId: input.id,
            status: 'ingested',
            sections: input.sections.length,
            entities: 0,
            relationships: 0,
        };

        try {
            validateDocument(input);
        } catch (error) {
            logger.warn({ documentId: input.id, error: errorMessage(error) }, 'Document rejected');
            return { ...result, status: 'rejected', error: errorMessage(error) };
        }

        const version = this.store.reserveDocumentVersion(input.id);
        result.version = version;

        // ──────────────────────────────────────────────────
        // Embed sections
        // ──────────────────────────────────────────────────
        let sections: Section[];
        try {
            sections = await this.embedSections(input, version);
        } catch (error) {
            logger.warn({ documentId: input.id, version, error: errorMessage(error) }, 'Embedding failed, document skipped');
            return { ...result, status: 'failed', error: errorMessage(error) };
        }

        const document: Document = {
            id: input.id,
            version,
            domain: input.domain,
            title: input.title,
            pageCount: input.pageCount,
            sections,
            ingestedAt: new Date().toISOString(),
        };

        // ──────────────────────────────────────────────────
        // Tree: a supplied tree that breaks bounds is replaced by a generated one
        // ──────────────────────────────────────────────────
        let treeInput: TreeNodeInput | undefined = input.tree;
        if (treeInput) {
            try {
                buildTree(document.id, treeInput, sections, document.pageCount);
            } catch (error) {
                if (!(error instanceof TreeBoundsError)) throw error;
                report.treeErrors.push({ documentId: document.id, nodeId: error.nodeId, error: error.message });
                logger.warn({ documentId: document.id, nodeId: error.nodeId, error: error.message }, 'Supplied tree rejected');
                treeInput = undefined;
            }
        }

        // ──────────────────────────────────────────────────
        // Register document, sections and indexes
        // ──────────────────────────────────────────────────
        this.store.putDocument(document);
        for (const section of sections) {
            this.lexicalIndex.add(section.id, `${section.title}\n${section.text}`);
            this.vectorIndex.add(section.id, section.embedding);
        }
        this.trees.register(document, treeInput);

        // ──────────────────────────────────────────────────
        // Extract → resolve → link, per section
        // ──────────────────────────────────────────────────
        const entityIds = new Set<string>();
        for (const section of sections) {
            const linked = await this.linkSection(document, section, report);
            for (const id of linked.entityIds) {
                entityIds.add(id);
                touched.add(id);
            }
            result.relationships += linked.relationships;
        }
        result.entities = entityIds.size;

        logger.info(
            { documentId: document.id, version, sections: sections.length, entities: result.entities, relationships: result.relationships },
            'Document ingested'
        );
        return result;
    }

    /**
     * @throws EmbeddingUnavailableError
     */
    private async embedSections(input: DocumentInput, version: number): Promise<Section[]> {
        const expected = this.vectorIndex.dimensions ?? this.embedder.dimensions;
        const sections: Section[] = [];

        for (const [sequence, section] of input.sections.entries()) {
            const embedding = await this.embedder.embed(`${section.title}\n${section.text}`);
            if (embedding.length !== expected || !embedding.every(Number.isFinite)) {
                throw new EmbeddingUnavailableError(
                    `Section ${sequence} of ${input.id}: embedding has ${embedding.length} dimensions, expected ${expected}`
                );
            }
            sections.push({
                id: sectionId(input.id, version, sequence),
                documentId: input.id,
                documentVersion: version,
                sequence,
                title: section.title,
                text: section.text,
                pageStart: section.pageStart,
                pageEnd: section.pageEnd,
                embedding,
            });
        }

        return sections;
    }

    private async linkSection(
        document: Document,
        section: Section,
        report: IngestionReport
    ): Promise<{ entityIds: string[]; relationships: number }> {
        let extraction: ExtractionResult;
        try {
            extraction = await withTimeout(
                (signal) => this.extractor.extract(section.text, signal),
                this.extractionTimeoutMs,
                `extraction of ${section.id}`
            );
        } catch (error) {
            report.extractionFailures.push({ documentId: document.id, sectionId: section.id, error: errorMessage(error) });
            logger.warn({ sectionId: section.id, error: errorMessage(error) }, 'Extraction failed, section left unlinked');
            return { entityIds: [], relationships: 0 };
        }

        const { plan, assignments } = await this.resolver.resolveAndApply(extraction.entities, { origin: section.id });
        report.entitiesCreated += plan.newEntities.length;
        report.merges.push(...plan.merges);
        report.flagged.push(...plan.flagged.map((flag) => ({ ...flag, sectionId: section.id })));
        report.unresolved.push(...plan.unresolved.map((entry) => ({ ...entry, sectionId: section.id })));

        // Names as extracted → canonical ids, for relationship endpoints
        const byName = new Map<string, string>();
        for (const [index, entityId] of assignments) {
            const candidate = extraction.entities[index];
            if (candidate) byName.set(normalizeKey(candidate.name), entityId);
        }

        const sectionRef: NodeRef = { kind: 'section', id: section.id };
        const entityIds = [...new Set(assignments.values())].sort();
        let relationships = 0;

        const write = (type: RelationshipType, source: NodeRef, target: NodeRef, weight?: number): void => {
            try {
                this.store.putRelationship({ type, source, target, weight });
                relationships++;
            } catch (error) {
                if (!(error instanceof DanglingEdgeError)) throw error;
                report.danglingEdges.push({
                    documentId: document.id,
                    sectionId: section.id,
                    type,
                    source: nodeKey(source),
                    target: nodeKey(target),
                    missing: error.missing.map(nodeKey),
                });
            }
        };

        for (const entityId of entityIds) {
            write(RelationshipType.DISCUSSES, sectionRef, { kind: 'entity', id: entityId });
        }

        for (const rel of extraction.relationships) {
            write(rel.type, this.entityRef(rel.source, byName), this.entityRef(rel.target, byName), rel.weight);
        }

        return { entityIds, relationships };
    }

    /**
     * Reference for an extracted endpoint name. Names that match neither this
     * section's entities nor a stored alias keep the raw name, which the store
     * then rejects as dangling.
     */
    private entityRef(name: string, byName: ReadonlyMap<string, string>): NodeRef {
        const key = normalizeKey(name);
        const id = byName.get(key) ?? this.store.findByKey(key)[0]?.id ?? name;
        return { kind: 'entity', id };
    }
}
