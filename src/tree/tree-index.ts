import type { Document, Section, TreeNode, TreeNodeInput } from '../types/index.js';
import { TreeBoundsError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/** Characters of section text used as a generated leaf summary */
const SUMMARY_LENGTH = 240;

/**
 * Check the page-range invariants of a tree:
 * the root spans 1..pageCount, every child lies inside its parent,
 * and siblings do not overlap.
 *
 * @throws TreeBoundsError naming the first offending node
 */
export function checkTreeBounds(root: TreeNode, pageCount: number): void {
    if (root.pageStart !== 1 || root.pageEnd !== pageCount) {
        throw new TreeBoundsError(
            `Root ${root.id} spans ${root.pageStart}-${root.pageEnd}, document spans 1-${pageCount}`,
            root.id
        );
    }

    const visit = (node: TreeNode): void => {
        if (!Number.isInteger(node.pageStart) || !Number.isInteger(node.pageEnd) || node.pageStart > node.pageEnd) {
            throw new TreeBoundsError(`Node ${node.id} has invalid range ${node.pageStart}-${node.pageEnd}`, node.id);
        }

        const siblings = [...node.children].sort((a, b) => a.pageStart - b.pageStart);
        for (const [i, child] of siblings.entries()) {
            if (child.pageStart < node.pageStart || child.pageEnd > node.pageEnd) {
                throw new TreeBoundsError(
                    `Node ${child.id} (${child.pageStart}-${child.pageEnd}) escapes parent ${node.id} (${node.pageStart}-${node.pageEnd})`,
                    child.id
                );
            }
            const previous = siblings[i - 1];
            if (previous && child.pageStart <= previous.pageEnd) {
                throw new TreeBoundsError(
                    `Node ${child.id} (${child.pageStart}-${child.pageEnd}) overlaps sibling ${previous.id} (${previous.pageStart}-${previous.pageEnd})`,
                    child.id
                );
            }
            visit(child);
        }
    };

    visit(root);
}

/**
 * Build a tree from its input form: assign ids, link leaves to sections,
 * and validate page ranges.
 *
 * Leaves without explicit `sections` are linked to every section whose
 * page range overlaps theirs.
 *
 * @throws TreeBoundsError
 */
export function buildTree(documentId: string, input: TreeNodeInput, sections: readonly Section[], pageCount: number): TreeNode {
    const bySequence = new Map(sections.map((section) => [section.sequence, section]));

    const build = (node: TreeNodeInput, path: string): TreeNode => {
        const id = `${documentId}/${path}`;
        const children = (node.children ?? []).map((child, i) => build(child, `${path}.${i}`));

        let sectionIds: string[];
        if (node.sections) {
            sectionIds = node.sections.map((sequence) => {
                const section = bySequence.get(sequence);
                if (!section) {
                    throw new TreeBoundsError(`Node ${id} links unknown section ${sequence}`, id);
                }
                return section.id;
            });
        } else if (children.length === 0) {
            sectionIds = sections
                .filter((section) => section.pageStart <= node.pageEnd && section.pageEnd >= node.pageStart)
                .map((section) => section.id);
        } else {
            sectionIds = [];
        }

        return {
            id,
            documentId,
            title: node.title,
            summary: node.summary ?? '',
            pageStart: node.pageStart,
            pageEnd: node.pageEnd,
            children,
            sectionIds,
        };
    };

    const root = build(input, '0');
    checkTreeBounds(root, pageCount);
    return root;
}

/**
 * Tree derived from a document's sections when none is supplied: one leaf per
 * run of page-overlapping sections under a root spanning the document.
 */
export function defaultTreeInput(document: Pick<Document, 'title' | 'pageCount' | 'sections'>): TreeNodeInput {
    const leaves: Array<TreeNodeInput & { sections: number[] }> = [];

    for (const section of [...document.sections].sort((a, b) => a.pageStart - b.pageStart || a.sequence - b.sequence)) {
        const last = leaves.at(-1);
        if (last && section.pageStart <= last.pageEnd) {
            last.pageEnd = Math.max(last.pageEnd, section.pageEnd);
            last.title = `${last.title}; ${section.title}`;
            last.sections.push(section.sequence);
            continue;
        }
        leaves.push({
            title: section.title,
            summary: section.text.slice(0, SUMMARY_LENGTH),
            pageStart: section.pageStart,
            pageEnd: section.pageEnd,
            sections: [section.sequence],
        });
    }

    return {
        title: document.title,
        summary: leaves.map((leaf) => leaf.title).join('; '),
        pageStart: 1,
        pageEnd: document.pageCount,
        children: leaves,
    };
}

export function isLeaf(node: TreeNode): boolean {
    return node.children.length === 0;
}

export function* walkTree(node: TreeNode): Generator<TreeNode> {
    yield node;
    for (const child of node.children) yield* walkTree(child);
}

/**
 * Per-document hierarchical indexes. Holds the tree of the latest version of each document.
 */
export class TreeIndex {
    private trees = new Map<string, { version: number; root: TreeNode }>();

    /**
     * Build and register the tree of a document version. A rejected tree
     * leaves any previously registered tree in place.
     *
     * @throws TreeBoundsError
     */
    register(document: Document, input?: TreeNodeInput): TreeNode {
        const root = buildTree(document.id, input ?? defaultTreeInput(document), document.sections, document.pageCount);

        const current = this.trees.get(document.id);
        if (!current || current.version <= document.version) {
            this.trees.set(document.id, { version: document.version, root });
        }

        logger.debug({ documentId: document.id, version: document.version, generated: !input }, 'Tree registered');
        return root;
    }

    /**
     * Register an already-built tree (e.g. loaded from the database) after re-checking its bounds.
     */
    restore(documentId: string, version: number, root: TreeNode, pageCount: number): void {
        checkTreeBounds(root, pageCount);
        this.trees.set(documentId, { version, root });
    }

    get(documentId: string): TreeNode | undefined {
        return this.trees.get(documentId)?.root;
    }

    version(documentId: string): number | undefined {
        return this.trees.get(documentId)?.version;
    }

    documentIds(): string[] {
        return [...this.trees.keys()].sort();
    }

    get size(): number {
        return this.trees.size;
    }
}
