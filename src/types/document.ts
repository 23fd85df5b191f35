import type { TreeNodeInput } from './tree.js';

/**
 * Document interface: an ingested source text split into ordered sections.
 * Immutable once ingested; re-ingesting the same id creates a new version.
 */
export interface Document {
    /** Caller-supplied identifier, stable across versions */
    id: string;

    /** Version number, starting at 1 and incremented on every re-ingestion */
    version: number;

    /** Domain tag used for retrieval filtering (e.g. "privacy", "cbdc") */
    domain: string;

    title: string;

    /** Total number of pages; section and tree ranges must stay inside 1..pageCount */
    pageCount: number;

    /** Ordered sections (by sequence index) */
    sections: Section[];

    /** ISO timestamp of ingestion */
    ingestedAt: string;
}

/**
 * Section interface: the unit of retrieval. Every retrieval result points at one.
 */
export interface Section {
    /** `<documentId>@v<version>#<sequence>` */
    id: string;

    documentId: string;
    documentVersion: number;

    /** 0-based position inside the document */
    sequence: number;

    title: string;
    text: string;

    pageStart: number;
    pageEnd: number;

    /** Section embedding (fixed dimensionality per index) */
    embedding: number[];
}

/**
 * Raw document handed to the ingestion pipeline, before versioning and embedding.
 */
export interface DocumentInput {
    id: string;
    domain: string;
    title: string;
    pageCount: number;
    sections: SectionInput[];

    /** Optional table-of-contents tree; the root must span the whole document */
    tree?: TreeNodeInput;
}

export interface SectionInput {
    title: string;
    text: string;
    pageStart: number;
    pageEnd: number;
}

/**
 * Build the identifier of a section from its document, version and sequence.
 */
export function sectionId(documentId: string, version: number, sequence: number): string {
    return `${documentId}@v${version}#${sequence}`;
}
