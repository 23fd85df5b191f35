import {
    sectionId,
    type Document,
    type EntityType,
    type NewEntity,
    type SectionInput,
} from '../types/index.js';
import { normalizeKey } from '../nlp/tokenizer.js';

export function newEntity(id: string, type: EntityType, name: string, extraAliases: string[] = []): NewEntity {
    return {
        id,
        type,
        name,
        aliases: [normalizeKey(name), ...extraAliases],
        description: '',
        embedding: null,
    };
}

/**
 * A document with sections numbered from 0; every section embedding is `[1, 0]` unless given.
 */
export function makeDocument(
    id: string,
    options: {
        version?: number;
        domain?: string;
        title?: string;
        pageCount?: number;
        sections: Array<SectionInput & { embedding?: number[] }>;
    }
): Document {
    const version = options.version ?? 1;
    return {
        id,
        version,
        domain: options.domain ?? 'general',
        title: options.title ?? id,
        pageCount: options.pageCount ?? Math.max(...options.sections.map((s) => s.pageEnd)),
        ingestedAt: '2026-01-01T00:00:00.000Z',
        sections: options.sections.map((section, sequence) => ({
            id: sectionId(id, version, sequence),
            documentId: id,
            documentVersion: version,
            sequence,
            title: section.title,
            text: section.text,
            pageStart: section.pageStart,
            pageEnd: section.pageEnd,
            embedding: section.embedding ?? [1, 0],
        })),
    };
}
