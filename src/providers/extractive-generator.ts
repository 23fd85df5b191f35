import type { GenerationContext, GenerationProvider, RetrievalResult } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';
import { formatCitation } from '../loop/citations.js';

/** Sources quoted in an answer */
const MAX_SOURCES = 3;

function sentencesOf(text: string): string[] {
    return text
        .split(/(?<=[.!?])\s+|\n+/)
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence.length > 0);
}

/**
 * Sentence of a section sharing the most terms with the query (first on ties).
 */
export function bestSentence(query: string, result: RetrievalResult): string | undefined {
    const terms = new Set(tokenize(query));
    let best: string | undefined;
    let bestOverlap = -1;

    for (const sentence of sentencesOf(result.section.text)) {
        const overlap = new Set(tokenize(sentence).filter((token) => terms.has(token))).size;
        if (overlap > bestOverlap) {
            best = sentence;
            bestOverlap = overlap;
        }
    }
    return best;
}

/**
 * Local generation collaborator. Answers with the most query-relevant
 * sentence of each of the top sources, each followed by its citation marker.
 * The prompt is not used.
 */
export class ExtractiveGenerator implements GenerationProvider {
    readonly name = 'extractive';

    async generate(_prompt: string, context: GenerationContext): Promise<string> {
        const lines: string[] = [];

        for (const result of context.results.slice(0, MAX_SOURCES)) {
            const sentence = bestSentence(context.query, result);
            if (sentence) {
                lines.push(`${sentence} ${formatCitation(result.section, result.section.pageStart)}`);
            }
        }

        return lines.length > 0 ? lines.join('\n') : `No source in the corpus addresses: ${context.query}`;
    }
}
