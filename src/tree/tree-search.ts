import type { GenerationProvider, TreeAggregate, TreeNode, TreeSearchHit } from '../types/index.js';
import { bigrams, tokenize } from '../nlp/tokenizer.js';
import { errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/concurrency.js';
import { getLogger } from '../utils/logger.js';
import { isLeaf, walkTree } from './tree-index.js';

const logger = getLogger();

/**
 * Relevance of one tree node to a query, in [0, 1].
 */
export interface NodeScorer {
    readonly name: string;

    score(query: string, node: TreeNode, signal?: AbortSignal): Promise<number>;
}

export interface TreeSearchOptions {
    nodeBudget: number;
    pruneThreshold: number;
    minConfidence: number;
    aggregate: TreeAggregate;

    /** Deadline for a single node scoring; a slow scorer degrades to keyword scoring */
    nodeTimeoutMs?: number;

    signal?: AbortSignal;
}

export interface TreeSearchResult {
    hits: TreeSearchHit[];

    /** Node scorings spent */
    evaluated: number;

    /** The primary scorer failed and keyword scoring took over */
    degraded: boolean;
}

// ─── Scorers ────────────────────────────────────────────────

const KEYWORD_WEIGHTS = {
    title: 3,
    summary: 2,
    descendants: 1,
    bigramTitle: 4,
    bigramSummary: 3,
    bigramDescendants: 1.5,
} as const;

/**
 * Keyword-overlap scorer. Query terms and bigrams found in the node's title,
 * summary or descendant titles add weight; the total is normalized by the
 * best achievable score.
 */
export class KeywordScorer implements NodeScorer {
    readonly name = 'keyword';

    async score(query: string, node: TreeNode): Promise<number> {
        return keywordScore(query, node);
    }
}

export function keywordScore(query: string, node: TreeNode): number {
    const terms = [...new Set(tokenize(query))];
    if (terms.length === 0) return 0;
    const pairs = [...new Set(bigrams(tokenize(query)))];

    const titleTokens = tokenize(node.title);
    const summaryTokens = tokenize(node.summary);
    const descendantTokens: string[] = [];
    for (const descendant of walkTree(node)) {
        if (descendant !== node) descendantTokens.push(...tokenize(descendant.title));
    }

    const title = new Set(titleTokens);
    const summary = new Set(summaryTokens);
    const descendants = new Set(descendantTokens);
    const titlePairs = new Set(bigrams(titleTokens));
    const summaryPairs = new Set(bigrams(summaryTokens));
    const descendantPairs = new Set(bigrams(descendantTokens));

    let score = 0;
    for (const term of terms) {
        if (title.has(term)) score += KEYWORD_WEIGHTS.title;
        else if (summary.has(term)) score += KEYWORD_WEIGHTS.summary;
        else if (descendants.has(term)) score += KEYWORD_WEIGHTS.descendants;
    }
    for (const pair of pairs) {
        if (titlePairs.has(pair)) score += KEYWORD_WEIGHTS.bigramTitle;
        else if (summaryPairs.has(pair)) score += KEYWORD_WEIGHTS.bigramSummary;
        else if (descendantPairs.has(pair)) score += KEYWORD_WEIGHTS.bigramDescendants;
    }

    const best = terms.length * KEYWORD_WEIGHTS.title + pairs.length * KEYWORD_WEIGHTS.bigramTitle;
    return Math.min(1, score / best);
}

/**
 * Asks the generation collaborator to rate a node. Throws when the reply
 * holds no number in [0, 1].
 */
export class GenerationScorer implements NodeScorer {
    readonly name = 'generation';

    constructor(private readonly generator: GenerationProvider) {}

    async score(query: string, node: TreeNode, signal?: AbortSignal): Promise<number> {
        const prompt = [
            'Rate how likely the document part below contains the answer to the question.',
            'Reply with a single number between 0 and 1.',
            '',
            `Question: ${query}`,
            `Part: ${node.title} (pages ${node.pageStart}-${node.pageEnd})`,
            `Summary: ${node.summary || '(none)'}`,
        ].join('\n');

        const reply = await this.generator.generate(prompt, { query, results: [] }, signal);
        const match = /-?\d+(?:\.\d+)?/.exec(reply);
        const value = match ? Number(match[0]) : Number.NaN;
        if (!Number.isFinite(value) || value < 0 || value > 1) {
            throw new Error(`Unparseable node score: ${JSON.stringify(reply.slice(0, 80))}`);
        }
        return value;
    }
}

// ─── Search ─────────────────────────────────────────────────

interface FrontierEntry {
    node: TreeNode;
    confidence: number;
    path: string[];
}

function aggregate(mode: TreeAggregate, parent: number, child: number): number {
    return mode === 'min' ? Math.min(parent, child) : parent * child;
}

function byPriority(a: { node: TreeNode; confidence: number }, b: { node: TreeNode; confidence: number }): number {
    return (
        b.confidence - a.confidence ||
        a.node.pageStart - b.node.pageStart ||
        a.node.id.localeCompare(b.node.id)
    );
}

/**
 * Best-first descent of a document tree.
 *
 * The most confident frontier node is expanded next; each child scoring
 * spends one unit of the node budget. Path confidence is aggregated from the
 * root (product or min), branches under `pruneThreshold` are dropped, and
 * leaves at or above `minConfidence` are returned, most confident first.
 *
 * If the scorer fails once, the rest of the search uses keyword scoring.
 */
export async function searchTree(
    root: TreeNode,
    query: string,
    scorer: NodeScorer,
    options: TreeSearchOptions
): Promise<TreeSearchResult> {
    const fallback = new KeywordScorer();
    let active: NodeScorer = scorer;
    let degraded = false;
    let evaluated = 0;

    const scoreNode = async (node: TreeNode): Promise<number> => {
        evaluated++;
        if (active !== fallback) {
            const primary = active;
            try {
                const value = options.nodeTimeoutMs === undefined
                    ? await primary.score(query, node, options.signal)
                    : await withTimeout(
                        (signal) => primary.score(query, node, signal),
                        options.nodeTimeoutMs,
                        `${primary.name} node scorer`,
                        options.signal
                    );
                return Math.max(0, Math.min(1, value));
            } catch (error) {
                if (options.signal?.aborted) throw error;
                logger.warn(
                    { scorer: primary.name, nodeId: node.id, error: errorMessage(error) },
                    'Node scorer failed, falling back to keyword scoring'
                );
                active = fallback;
                degraded = true;
            }
        }
        return fallback.score(query, node);
    };

    const hits: TreeSearchHit[] = [];
    const collect = (entry: FrontierEntry): void => {
        if (entry.confidence >= options.minConfidence) {
            hits.push({ node: entry.node, confidence: entry.confidence, path: entry.path });
        }
    };

    const frontier: FrontierEntry[] = [];
    if (isLeaf(root)) {
        if (options.nodeBudget > 0) {
            const confidence = await scoreNode(root);
            if (confidence >= options.pruneThreshold) collect({ node: root, confidence, path: [root.title] });
        }
    } else {
        frontier.push({ node: root, confidence: 1, path: [root.title] });
    }

    let exhausted = false;
    while (frontier.length > 0 && !exhausted) {
        options.signal?.throwIfAborted();

        frontier.sort(byPriority);
        const entry = frontier.shift();
        if (!entry) break;

        if (isLeaf(entry.node)) {
            collect(entry);
            continue;
        }

        for (const child of entry.node.children) {
            if (evaluated >= options.nodeBudget) {
                exhausted = true;
                break;
            }
            const confidence = aggregate(options.aggregate, entry.confidence, await scoreNode(child));
            if (confidence < options.pruneThreshold) continue;
            frontier.push({ node: child, confidence, path: [...entry.path, child.title] });
        }
    }

    // Leaves already scored but never popped still count
    for (const entry of frontier) {
        if (isLeaf(entry.node)) collect(entry);
    }

    hits.sort(byPriority);

    logger.debug(
        { documentId: root.documentId, evaluated, hits: hits.length, degraded, exhausted },
        'Tree search complete'
    );
    return { hits, evaluated, degraded };
}
