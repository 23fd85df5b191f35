import type { GraphStore } from '../../graph/graph-store.js';

/**
 * Sections eligible for retrieval: from the latest version of their document,
 * and from one of `domains` when a domain filter is given.
 */
export function sectionFilter(store: GraphStore, domains: readonly string[] | null): (sectionId: string) => boolean {
    const allowed = domains && domains.length > 0 ? new Set(domains) : null;

    return (sectionId) => {
        if (!store.isLatestSection(sectionId)) return false;
        if (!allowed) return true;
        const domain = store.sectionDomain(sectionId);
        return domain !== undefined && allowed.has(domain);
    };
}
