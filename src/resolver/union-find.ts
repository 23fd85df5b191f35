/**
 * Disjoint-set forest with path compression and union by rank.
 * Iteration order of `groups()` follows first insertion, so results are deterministic.
 */
export class UnionFind<T = string> {
    private parent = new Map<T, T>();
    private rank = new Map<T, number>();

    add(item: T): void {
        if (!this.parent.has(item)) {
            this.parent.set(item, item);
            this.rank.set(item, 0);
        }
    }

    has(item: T): boolean {
        return this.parent.has(item);
    }

    find(item: T): T {
        this.add(item);

        let root = item;
        let next = this.parent.get(root);
        while (next !== undefined && next !== root) {
            root = next;
            next = this.parent.get(root);
        }

        // Path compression
        let current = item;
        while (current !== root) {
            const up = this.parent.get(current);
            this.parent.set(current, root);
            if (up === undefined) break;
            current = up;
        }

        return root;
    }

    union(a: T, b: T): T {
        const rootA = this.find(a);
        const rootB = this.find(b);
        if (rootA === rootB) return rootA;

        const rankA = this.rank.get(rootA) ?? 0;
        const rankB = this.rank.get(rootB) ?? 0;

        if (rankA < rankB) {
            this.parent.set(rootA, rootB);
            return rootB;
        }
        this.parent.set(rootB, rootA);
        if (rankA === rankB) this.rank.set(rootA, rankA + 1);
        return rootA;
    }

    connected(a: T, b: T): boolean {
        return this.find(a) === this.find(b);
    }

    /**
     * Members grouped by set, each group in insertion order.
     */
    groups(): T[][] {
        const byRoot = new Map<T, T[]>();
        for (const item of this.parent.keys()) {
            const root = this.find(item);
            const group = byRoot.get(root);
            if (group) group.push(item);
            else byRoot.set(root, [item]);
        }
        return [...byRoot.values()];
    }
}
