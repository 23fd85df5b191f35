import type { Citation, CritiqueProvider, CritiqueResult, RetrievalResult } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';
import { parseCitations } from '../loop/citations.js';

/**
 * Local critique collaborator. Every line of the response must carry a
 * citation, and at least `minSupport` of the line's terms must appear in
 * the text of the sections it cites.
 */
export class CitationCritic implements CritiqueProvider {
    readonly name = 'citation';

    constructor(private readonly minSupport = 0.5) {}

    async critique(
        response: string,
        _citations: readonly Citation[],
        context: readonly RetrievalResult[]
    ): Promise<CritiqueResult> {
        const sectionText = new Map(context.map((result) => [result.section.id, result.section.text]));
        const lines = response.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
        const issues: string[] = [];
        let supported = 0;

        for (const line of lines) {
            const cited = parseCitations(line);
            if (cited.length === 0) {
                issues.push(`Uncited claim: ${line.slice(0, 80)}`);
                continue;
            }

            const claim = cited.reduce((text, citation) => text.replace(citation.marker, ''), line);
            const terms = [...new Set(tokenize(claim))];
            const source = new Set(cited.flatMap((citation) => tokenize(sectionText.get(citation.sectionId) ?? '')));
            const support = terms.length === 0 ? 0 : terms.filter((term) => source.has(term)).length / terms.length;

            if (support >= this.minSupport) {
                supported++;
            } else {
                issues.push(`Claim not supported by ${cited.map((citation) => citation.marker).join(' ')}`);
            }
        }

        const score = lines.length === 0 ? 0 : supported / lines.length;
        return { pass: lines.length > 0 && issues.length === 0, issues, score };
    }
}
