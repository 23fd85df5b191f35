import { z } from 'zod';
import { normalizeKey } from '../nlp/tokenizer.js';
import { readDataFile } from '../utils/data.js';

/**
 * Well-known abbreviations and spellings mapped to a canonical name.
 * Keys on either side are compared in normalized form.
 */
export class AliasTable {
    private groupOf = new Map<string, string>();
    private members = new Map<string, Set<string>>();

    constructor(entries: Record<string, string> = {}) {
        for (const [variant, canonical] of Object.entries(entries)) {
            this.add(variant, canonical);
        }
    }

    /**
     * The alias table shipped in `data/aliases.json`.
     */
    static builtin(): AliasTable {
        return new AliasTable(readDataFile('aliases.json', z.record(z.string())));
    }

    add(variant: string, canonical: string): void {
        const variantKey = normalizeKey(variant);
        const canonicalKey = normalizeKey(canonical);
        if (!variantKey || !canonicalKey) return;

        const group = this.groupOf.get(canonicalKey) ?? canonicalKey;
        for (const key of [canonicalKey, variantKey]) {
            this.groupOf.set(key, group);
            let set = this.members.get(group);
            if (!set) {
                set = new Set();
                this.members.set(group, set);
            }
            set.add(key);
        }
    }

    /**
     * Canonical key for a normalized key, or undefined when it is not listed.
     */
    canonicalOf(key: string): string | undefined {
        return this.groupOf.get(key);
    }

    /**
     * Every listed key equivalent to `key`, excluding `key` itself.
     */
    equivalentKeys(key: string): string[] {
        const group = this.groupOf.get(key);
        if (group === undefined) return [];
        return [...(this.members.get(group) ?? [])].filter((member) => member !== key);
    }

    areEquivalent(a: string, b: string): boolean {
        const group = this.groupOf.get(a);
        return group !== undefined && group === this.groupOf.get(b);
    }

    get size(): number {
        return this.groupOf.size;
    }
}
