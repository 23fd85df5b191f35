import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize text into an array of lowercase tokens.
 * - Lowercase
 * - Split on whitespace and punctuation
 * - Remove stopwords
 * - Remove single-character tokens
 * - No stemming (deterministic)
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .replace(/[^a-z0-9\s-]/g, ' ')  // Remove non-alphanumeric except hyphens
        .split(/[\s-]+/)
        .filter((token) =>
            token.length > 1 &&
            !STOPWORDS.has(token) &&
            !/^\d+$/.test(token)  // Remove pure numbers
        );
}

/**
 * Normalized matching key for an entity name:
 * lowercase, punctuation replaced by spaces, whitespace collapsed.
 *
 * "Zero-Knowledge Proof" → "zero knowledge proof"
 */
export function normalizeKey(name: string): string {
    return name
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim();
}

/**
 * URL-safe slug of a normalized key ("zero knowledge proof" → "zero-knowledge-proof").
 */
export function slugify(key: string): string {
    return normalizeKey(key).replace(/ /g, '-');
}

/**
 * All contiguous word n-grams of `words` with length in [minN, maxN], longest first.
 */
export function ngrams(words: readonly string[], minN = 1, maxN = 4): string[] {
    const result: string[] = [];
    for (let n = Math.min(maxN, words.length); n >= minN; n--) {
        for (let i = 0; i + n <= words.length; i++) {
            result.push(words.slice(i, i + n).join(' '));
        }
    }
    return result;
}

/**
 * Adjacent token pairs, joined by a space.
 */
export function bigrams(tokens: readonly string[]): string[] {
    const result: string[] = [];
    for (let i = 0; i + 1 < tokens.length; i++) {
        result.push(`${tokens[i]} ${tokens[i + 1]}`);
    }
    return result;
}
