import { tokenize } from './tokenizer.js';

/**
 * TF-IDF corpus built from short texts (entity names and descriptions).
 * Fully deterministic: identical input produces identical output.
 */
export interface TfIdfCorpus {
    /** Document ID → TF-IDF vector (term → weight) */
    documents: Map<string, Map<string, number>>;
    /** Term → document frequency (how many documents contain this term) */
    df: Map<string, number>;
    /** Total number of documents */
    size: number;
}

/**
 * Build a TF-IDF corpus from `{ id, text }` pairs. Texts without tokens are skipped.
 */
export function buildCorpus(texts: Iterable<{ id: string; text: string }>): TfIdfCorpus {
    const df = new Map<string, number>();
    const documents = new Map<string, Map<string, number>>();

    for (const { id, text } of texts) {
        const tokens = tokenize(text);
        if (tokens.length === 0) continue;

        // Compute term frequency (TF)
        const tf = new Map<string, number>();
        for (const token of tokens) {
            tf.set(token, (tf.get(token) ?? 0) + 1);
        }

        // Normalize TF by the most frequent term
        const maxTf = Math.max(...tf.values());
        for (const [term, count] of tf) {
            tf.set(term, count / maxTf);
        }

        documents.set(id, tf);

        for (const term of tf.keys()) {
            df.set(term, (df.get(term) ?? 0) + 1);
        }
    }

    // Smoothed IDF so terms shared by every document keep a small weight
    const N = documents.size;
    for (const [, docTf] of documents) {
        for (const [term, tf] of docTf) {
            const termDf = df.get(term) ?? 1;
            const idf = Math.log((N + 1) / termDf);
            docTf.set(term, tf * idf);
        }
    }

    return { documents, df, size: N };
}

/**
 * Get the top-N TF-IDF terms from a set of document IDs.
 * Ties are broken alphabetically. Used for community labels.
 */
export function getTopTerms(corpus: TfIdfCorpus, docIds: Iterable<string>, topN = 5): string[] {
    const termScores = new Map<string, number>();

    for (const docId of docIds) {
        const vector = corpus.documents.get(docId);
        if (!vector) continue;

        for (const [term, weight] of vector) {
            termScores.set(term, (termScores.get(term) ?? 0) + weight);
        }
    }

    return Array.from(termScores.entries())
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .slice(0, topN)
        .map(([term]) => term);
}
