import type { CritiqueResult } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';

export type RefinementKind = 'suggested-query' | 'widen-domains' | 'drop-term' | 'unchanged';

export interface Refinement {
    kind: RefinementKind;
    query: string;
    domains: readonly string[] | null;
}

export interface RefinementInput {
    query: string;
    domains: readonly string[] | null;
    critique: CritiqueResult | null;

    /** Queries already retrieved for (normalized) */
    tried: ReadonlySet<string>;

    /** Number of indexed sections containing a term */
    documentFrequency: (term: string) => number;
}

export function normalizeQuery(query: string): string {
    return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Reformulate a query after a failed critique. In order of preference:
 * the critic's first untried suggested query; dropping the domain filter;
 * dropping the most common (least informative) term. Otherwise the query
 * is kept as it is.
 */
export function refineQuery(input: RefinementInput): Refinement {
    const { query, domains, critique, tried } = input;

    for (const suggestion of critique?.suggestedQueries ?? []) {
        if (suggestion.trim().length > 0 && !tried.has(normalizeQuery(suggestion))) {
            return { kind: 'suggested-query', query: suggestion.trim(), domains };
        }
    }

    if (domains && domains.length > 0) {
        return { kind: 'widen-domains', query, domains: null };
    }

    const terms = tokenize(query);
    if (terms.length > 1) {
        let dropAt = 0;
        let highest = -1;
        terms.forEach((term, i) => {
            const df = input.documentFrequency(term);
            if (df >= highest) {
                highest = df;
                dropAt = i;
            }
        });
        const rephrased = terms.filter((_, i) => i !== dropAt).join(' ');
        if (!tried.has(normalizeQuery(rephrased))) {
            return { kind: 'drop-term', query: rephrased, domains };
        }
    }

    return { kind: 'unchanged', query, domains };
}
