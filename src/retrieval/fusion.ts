import {
    STRATEGY_NAMES,
    type RetrievalResult,
    type Section,
    type StrategyHit,
    type StrategyName,
} from '../types/index.js';

/**
 * Hits returned by one strategy that completed in time.
 */
export interface StrategyRun {
    strategy: StrategyName;
    hits: readonly StrategyHit[];
}

export interface FusionOptions {
    weights: Record<StrategyName, number>;
    topK: number;

    /** Section lookup; hits whose section is unknown are dropped */
    getSection: (sectionId: string) => Section | undefined;
}

interface NormalizedHit {
    raw: number;
    normalized: number;
}

/**
 * Min-max normalize one strategy's scores into [0, 1]. A section reported
 * more than once keeps its best raw score. When every score is equal
 * (including a single hit) all normalize to 1.
 */
export function normalizeHits(hits: readonly StrategyHit[]): Map<string, NormalizedHit> {
    const best = new Map<string, number>();
    for (const hit of hits) {
        if (!Number.isFinite(hit.score)) continue;
        const previous = best.get(hit.sectionId);
        if (previous === undefined || hit.score > previous) best.set(hit.sectionId, hit.score);
    }

    const scores = [...best.values()];
    const min = Math.min(...scores);
    const max = Math.max(...scores);
    const range = max - min;

    const normalized = new Map<string, NormalizedHit>();
    for (const [sectionId, raw] of best) {
        normalized.set(sectionId, { raw, normalized: range > 0 ? (raw - min) / range : 1 });
    }
    return normalized;
}

/**
 * Descending fused score, then more contributing strategies, then earlier
 * section in its document, then section id.
 */
export function compareResults(a: RetrievalResult, b: RetrievalResult): number {
    return (
        b.fusedScore - a.fusedScore ||
        b.strategies.length - a.strategies.length ||
        a.section.sequence - b.section.sequence ||
        a.section.id.localeCompare(b.section.id)
    );
}

/**
 * Merge per-strategy hit lists into one ranked list, one entry per section.
 *
 * fused(section) = Σ weight(strategy) · normalized(strategy, section)
 */
export function fuseResults(runs: readonly StrategyRun[], options: FusionOptions): RetrievalResult[] {
    const merged = new Map<string, RetrievalResult>();

    for (const { strategy, hits } of runs) {
        const weight = options.weights[strategy];

        for (const [sectionId, { raw, normalized }] of normalizeHits(hits)) {
            let result = merged.get(sectionId);
            if (!result) {
                const section = options.getSection(sectionId);
                if (!section) continue;
                result = { section, fusedScore: 0, scores: {}, rawScores: {}, strategies: [] };
                merged.set(sectionId, result);
            }

            result.fusedScore += weight * normalized;
            result.scores[strategy] = normalized;
            result.rawScores[strategy] = raw;
            result.strategies.push(strategy);
        }
    }

    const results = [...merged.values()];
    for (const result of results) {
        result.strategies.sort((a, b) => STRATEGY_NAMES.indexOf(a) - STRATEGY_NAMES.indexOf(b));
    }

    return results.sort(compareResults).slice(0, Math.max(0, options.topK));
}
