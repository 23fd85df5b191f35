import { createHash } from 'node:crypto';
import type { RetrievalResponse } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

interface CacheEntry {
    timestamp: number;
    response: RetrievalResponse;
}

export interface CacheKeyParts {
    query: string;
    domains: readonly string[] | null;
    topK: number;
}

/**
 * In-memory cache of fused retrieval responses.
 *
 * Cache key = SHA-256 of the normalized query text, sorted domain filter and topK.
 * Entries expire after `ttlMs`; beyond `maxEntries` the oldest entry is evicted.
 */
export class RetrievalCache {
    private entries = new Map<string, CacheEntry>();
    private ttlMs: number;
    private maxEntries: number;
    private enabled: boolean;
    private hits = 0;
    private misses = 0;

    constructor(options: {
        ttlMs?: number;
        maxEntries?: number;
        enabled?: boolean;
    } = {}) {
        this.ttlMs = options.ttlMs ?? 5 * 60 * 1000;
        this.maxEntries = options.maxEntries ?? 256;
        this.enabled = options.enabled ?? true;
    }

    /**
     * Generate a deterministic cache key.
     */
    static makeKey(parts: CacheKeyParts): string {
        const normalized = {
            query: parts.query.trim().toLowerCase().replace(/\s+/g, ' '),
            domains: parts.domains && parts.domains.length > 0 ? [...new Set(parts.domains)].sort() : null,
            topK: parts.topK,
        };
        return createHash('sha256').update(JSON.stringify(normalized)).digest('hex');
    }

    /**
     * Get a cached response, or null if not found/expired.
     */
    get(parts: CacheKeyParts): RetrievalResponse | null {
        if (!this.enabled) return null;

        const key = RetrievalCache.makeKey(parts);
        const entry = this.entries.get(key);
        if (!entry) {
            this.misses++;
            return null;
        }

        // Check TTL
        if (Date.now() - entry.timestamp > this.ttlMs) {
            this.entries.delete(key);
            this.misses++;
            logger.debug({ query: parts.query.slice(0, 80) }, 'Cache expired');
            return null;
        }

        this.hits++;
        logger.debug({ query: parts.query.slice(0, 80) }, 'Cache hit');
        return { ...entry.response, cached: true };
    }

    /**
     * Store a response in the cache.
     */
    set(parts: CacheKeyParts, response: RetrievalResponse): void {
        if (!this.enabled || this.maxEntries <= 0) return;

        const key = RetrievalCache.makeKey(parts);
        this.entries.delete(key);
        this.entries.set(key, { timestamp: Date.now(), response: { ...response, cached: false } });

        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
    }

    /**
     * Drop every entry (after the indexes change).
     */
    clear(): void {
        if (this.entries.size > 0) {
            logger.debug({ entries: this.entries.size }, 'Cache cleared');
        }
        this.entries.clear();
    }

    /**
     * Get cache stats.
     */
    getStats(): { enabled: boolean; entries: number; hits: number; misses: number } {
        return {
            enabled: this.enabled,
            entries: this.entries.size,
            hits: this.hits,
            misses: this.misses,
        };
    }
}
