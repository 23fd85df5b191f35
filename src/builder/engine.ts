import {
    DEFAULT_CONFIG,
    type CommunityAssignment,
    type DocumentInput,
    type GroundworkConfig,
    type RetrievalResponse,
    type RetrieveOptions,
} from '../types/index.js';
import { GraphStore, type GraphStats, type IntegrityReport } from '../graph/graph-store.js';
import { CommunityDetector, crossDomainEntities } from '../graph/community-detector.js';
import { CommunityRegistry } from '../graph/community-registry.js';
import { EntityResolver, type PotentialDuplicate } from '../resolver/entity-resolver.js';
import { AliasTable } from '../resolver/alias-table.js';
import { VectorIndex } from '../indexes/vector-index.js';
import { LexicalIndex } from '../indexes/lexical-index.js';
import { TreeIndex } from '../tree/tree-index.js';
import { GenerationScorer, KeywordScorer, type NodeScorer } from '../tree/tree-search.js';
import { HybridRetriever } from '../retrieval/hybrid-retriever.js';
import { VectorStrategy } from '../retrieval/strategies/vector.js';
import { GraphStrategy } from '../retrieval/strategies/graph.js';
import { LexicalStrategy } from '../retrieval/strategies/lexical.js';
import { TreeStrategy } from '../retrieval/strategies/tree.js';
import { RetrievalCache } from '../cache/retrieval-cache.js';
import { SelfCorrectionLoop, type AnswerOptions, type LoopOutcome } from '../loop/self-correction.js';
import { createProviders, type Providers } from '../providers/index.js';
import type { GraphDatabase } from '../storage/database.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { IngestPipeline, type IngestionReport } from './ingest-pipeline.js';

const logger = getLogger();

export interface EngineOptions {
    config?: GroundworkConfig;

    /** Replace some or all of the configured collaborators */
    providers?: Partial<Providers>;
}

export interface EngineInspection {
    graph: GraphStats;
    integrity: IntegrityReport;
    trees: number;
    communities: { version: number; count: number; modularity: number } | null;
    potentialDuplicates: PotentialDuplicate[];
    crossDomainEntities: Array<{ entityId: string; domains: string[] }>;
    cache: ReturnType<RetrievalCache['getStats']>;
}

/**
 * Wires the stores, indexes, retriever and self-correction loop together
 * from a single configuration.
 */
export class GroundworkEngine {
    readonly config: GroundworkConfig;
    readonly providers: Providers;
    readonly store: GraphStore;
    readonly resolver: EntityResolver;
    readonly vectorIndex: VectorIndex;
    readonly lexicalIndex: LexicalIndex;
    readonly trees: TreeIndex;
    readonly communities: CommunityRegistry;
    readonly cache: RetrievalCache;
    readonly retriever: HybridRetriever;
    readonly loop: SelfCorrectionLoop;
    private readonly pipeline: IngestPipeline;
    private readonly detector: CommunityDetector;

    constructor(options: EngineOptions = {}) {
        const config = options.config ?? DEFAULT_CONFIG;
        this.config = config;
        this.providers = { ...createProviders(config.provider), ...options.providers };

        const { extractor, generator, critic, embedder } = this.providers;

        this.store = new GraphStore(config.graph);
        this.resolver = new EntityResolver(this.store, {
            config: config.resolver,
            aliases: AliasTable.builtin(),
            embedder,
        });
        this.vectorIndex = new VectorIndex();
        this.lexicalIndex = new LexicalIndex(config.retrieval.bm25);
        this.trees = new TreeIndex();
        this.communities = new CommunityRegistry();
        this.cache = new RetrievalCache(config.cache);
        this.detector = new CommunityDetector();

        const useGeneration = config.tree.scorer === 'generation' && this.providers.scoresTreeNodes;
        const scorer: NodeScorer = useGeneration ? new GenerationScorer(generator) : new KeywordScorer();
        // Per-node deadline stays well inside the strategy deadline
        const nodeTimeoutMs = useGeneration
            ? Math.min(config.provider.timeoutMs, Math.floor(config.retrieval.strategyTimeoutMs / 4))
            : undefined;

        this.retriever = new HybridRetriever({
            strategies: [
                new VectorStrategy(this.store, this.vectorIndex, embedder),
                new GraphStrategy(this.store, this.resolver.matcher, {
                    maxHops: config.graph.maxHops,
                    communities: this.communities,
                }),
                new LexicalStrategy(this.store, this.lexicalIndex),
                new TreeStrategy(this.store, this.trees, scorer, config.tree, nodeTimeoutMs),
            ],
            getSection: (id) => this.store.getSection(id),
            config: config.retrieval,
            cache: this.cache,
        });

        this.loop = new SelfCorrectionLoop({
            retriever: this.retriever,
            generator,
            critic,
            maxIterations: config.loop.maxIterations,
            topK: config.retrieval.topK,
            documentFrequency: (term) => this.lexicalIndex.documentFrequency(term),
        });

        this.pipeline = new IngestPipeline({
            store: this.store,
            resolver: this.resolver,
            extractor,
            embedder,
            vectorIndex: this.vectorIndex,
            lexicalIndex: this.lexicalIndex,
            trees: this.trees,
            cache: this.cache,
            concurrency: config.ingest.concurrency,
            extractionTimeoutMs: config.provider.timeoutMs,
        });

        logger.debug(
            { provider: config.provider.kind, treeScorer: scorer.name, db: config.db },
            'Engine initialized'
        );
    }

    // ─── Ingestion & communities ──────────────────────────────

    async ingest(documents: readonly DocumentInput[]): Promise<IngestionReport> {
        return this.pipeline.ingest(documents);
    }

    /**
     * Detect communities on a snapshot and publish them as the next version.
     */
    detectCommunities(): CommunityAssignment {
        const startTime = Date.now();
        const result = this.detector.detect(this.store.snapshot());
        const published = this.communities.publish(result);
        this.cache.clear();

        logger.info(
            { version: published.version, communities: published.communities.length, modularity: published.modularity, durationMs: Date.now() - startTime },
            'Community detection complete'
        );
        return published;
    }

    // ─── Query ────────────────────────────────────────────────

    async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResponse> {
        return this.retriever.retrieve(query, options);
    }

    async answer(query: string, options: AnswerOptions = {}): Promise<LoopOutcome> {
        return this.loop.answer(query, options);
    }

    inspect(): EngineInspection {
        const current = this.communities.current();
        const state = this.store.snapshot();
        return {
            graph: this.store.stats(),
            integrity: this.store.verifyIntegrity(),
            trees: this.trees.size,
            communities: current
                ? { version: current.version, count: current.communities.length, modularity: current.modularity }
                : null,
            potentialDuplicates: this.resolver.findPotentialDuplicates(),
            crossDomainEntities: crossDomainEntities(state),
            cache: this.cache.getStats(),
        };
    }

    // ─── Persistence ──────────────────────────────────────────

    save(db: GraphDatabase): void {
        const trees = this.trees.documentIds().flatMap((documentId) => {
            const root = this.trees.get(documentId);
            const version = this.trees.version(documentId);
            return root && version !== undefined ? [{ documentId, version, pageCount: root.pageEnd, root }] : [];
        });

        db.transaction(() => {
            db.saveGraph(this.store.snapshot());
            db.saveTrees(trees);
            const current = this.communities.current();
            if (current) db.saveCommunities(current);
        });

        logger.info({ documents: this.store.stats().documents, trees: trees.length }, 'Engine state saved');
    }

    /**
     * Replace the in-memory state with the database contents and rebuild the indexes.
     */
    load(db: GraphDatabase): void {
        this.store.load(db.loadGraph());

        for (const document of this.store.listDocuments()) {
            for (const section of document.sections) {
                this.lexicalIndex.add(section.id, `${section.title}\n${section.text}`);
                this.vectorIndex.add(section.id, section.embedding);
            }
        }

        const stored = new Map(db.loadTrees().map((tree) => [tree.documentId, tree]));
        for (const document of this.store.latestDocuments()) {
            const tree = stored.get(document.id);
            try {
                if (tree && tree.version === document.version) {
                    this.trees.restore(document.id, tree.version, tree.root, document.pageCount);
                    continue;
                }
            } catch (error) {
                logger.warn({ documentId: document.id, error: errorMessage(error) }, 'Stored tree rejected, regenerating');
            }
            this.trees.register(document);
        }

        const communities = db.loadLatestCommunities();
        if (communities) this.communities.restore(communities);

        this.cache.clear();
        logger.info(
            { ...this.store.stats(), trees: this.trees.size, communityVersion: communities?.version ?? null },
            'Engine state loaded'
        );
    }
}
