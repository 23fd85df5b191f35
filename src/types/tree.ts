/**
 * TreeNode interface: one entry of a document's hierarchical index.
 *
 * A child's page range lies inside its parent's, siblings never overlap,
 * and the root spans the whole document.
 */
export interface TreeNode {
    /** `<documentId>/<path>` where path is the dotted child index from the root ("0", "0.2.1") */
    id: string;

    documentId: string;
    title: string;
    summary: string;
    pageStart: number;
    pageEnd: number;
    children: TreeNode[];

    /** Sections this node maps to (usually only set on leaves) */
    sectionIds: string[];
}

/**
 * Tree data as supplied with a document; ids and section links are filled in at registration.
 */
export interface TreeNodeInput {
    title: string;
    summary?: string;
    pageStart: number;
    pageEnd: number;
    children?: TreeNodeInput[];

    /** Sequence indexes of the sections covered by this node */
    sections?: number[];
}

/**
 * A leaf reached by tree search, with its accumulated path confidence.
 */
export interface TreeSearchHit {
    node: TreeNode;
    confidence: number;

    /** Titles from the root to the leaf */
    path: string[];
}
