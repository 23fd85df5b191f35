import type { Citation, RetrievalResult, Section } from '../types/index.js';

/** `[<documentId>@v<version>#<sequence> p.<page>]` */
const CITATION_PATTERN = /\[([^\s[\]]+@v\d+#\d+) p\.(\d+)\]/g;

export function formatCitation(section: Pick<Section, 'id'>, page: number): string {
    return `[${section.id} p.${page}]`;
}

/**
 * Citation markers in a generated response, in order of appearance, without repeats.
 */
export function parseCitations(text: string): Citation[] {
    const seen = new Set<string>();
    const citations: Citation[] = [];

    for (const match of text.matchAll(CITATION_PATTERN)) {
        const [marker, sectionId, page] = match;
        if (sectionId === undefined || page === undefined || seen.has(marker)) continue;
        seen.add(marker);
        citations.push({ sectionId, page: Number(page), marker });
    }

    return citations;
}

/**
 * Local grounding check: every citation must point at a section of the
 * retrieval context, on a page that section covers. A response without
 * citations is not grounded.
 *
 * @returns issues found; empty when the citations are valid
 */
export function validateCitations(citations: readonly Citation[], context: readonly RetrievalResult[]): string[] {
    if (citations.length === 0) {
        return ['Response contains no citations'];
    }

    const sections = new Map(context.map((result) => [result.section.id, result.section]));
    const issues: string[] = [];

    for (const citation of citations) {
        const section = sections.get(citation.sectionId);
        if (!section) {
            issues.push(`${citation.marker} cites a section outside the retrieved context`);
        } else if (citation.page < section.pageStart || citation.page > section.pageEnd) {
            issues.push(
                `${citation.marker} cites page ${citation.page}, section covers pages ${section.pageStart}-${section.pageEnd}`
            );
        }
    }

    return issues;
}
