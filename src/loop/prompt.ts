import type { RetrievalResult } from '../types/index.js';
import { formatCitation } from './citations.js';

/** Characters of section text included per source */
const SOURCE_EXCERPT_LENGTH = 1200;

/**
 * Answer prompt for the generation collaborator: numbered sources with their
 * citation markers, the question, and any issues raised by the last critique.
 */
export function buildAnswerPrompt(
    query: string,
    results: readonly RetrievalResult[],
    feedback: readonly string[] = []
): string {
    const sources = results.map((result, i) => {
        const { section } = result;
        return [
            `Source ${i + 1} ${formatCitation(section, section.pageStart)} (pages ${section.pageStart}-${section.pageEnd})`,
            section.title,
            section.text.slice(0, SOURCE_EXCERPT_LENGTH),
        ].join('\n');
    });

    const lines = [
        'Answer the question using only the sources below.',
        'Cite every claim with the source marker, e.g. [doc@v1#0 p.3], using a page inside the source\'s range.',
        '',
        ...sources.flatMap((source) => [source, '']),
        `Question: ${query}`,
    ];

    if (feedback.length > 0) {
        lines.push('', 'A previous answer was rejected:', ...feedback.map((issue) => `- ${issue}`));
    }

    return lines.join('\n');
}
