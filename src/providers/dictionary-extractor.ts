import { z } from 'zod';
import {
    ENTITY_TYPES,
    RelationshipType,
    type EntityType,
    type ExtractedEntity,
    type ExtractedRelationship,
    type ExtractionProvider,
    type ExtractionResult,
} from '../types/index.js';
import { normalizeKey } from '../nlp/tokenizer.js';
import { readDataFile } from '../utils/data.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const lexiconSchema = z.record(z.enum(ENTITY_TYPES), z.array(z.string().min(1)));

/**
 * Entity names per type, matched case-insensitively as whole words.
 */
export type Lexicon = Partial<Record<EntityType, readonly string[]>>;

/** "Full Name (ACR)": a capitalized phrase defining an acronym */
const ACRONYM_DEFINITION = /\b((?:[A-Z][\w-]*\s+){1,5}[A-Z][\w-]*)\s+\(([A-Z][A-Za-z0-9-]{1,9})\)/g;

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function splitSentences(text: string): string[] {
    return text.split(/(?<=[.!?])\s+|\n+/).filter((sentence) => sentence.trim().length > 0);
}

interface Mention {
    name: string;
    type: EntityType;
    pattern: RegExp;
}

/**
 * Local extraction collaborator.
 *
 * Entities come from a built-in lexicon (dictionary match) and from acronym
 * definitions such as "Central Bank Digital Currency (CBDC)". Entities
 * mentioned in the same sentence are linked: a Method and a Concept by
 * `applied-to`, a Method and a Result by `reports-result`, anything else by
 * `related-to`, weighted by the share of sentences they co-occur in.
 */
export class DictionaryExtractor implements ExtractionProvider {
    readonly name = 'dictionary';
    private readonly mentions: Mention[];

    constructor(lexicon: Lexicon = DictionaryExtractor.builtinLexicon()) {
        this.mentions = [];
        for (const type of ENTITY_TYPES) {
            for (const name of lexicon[type] ?? []) {
                this.mentions.push({ name, type, pattern: new RegExp(`\\b${escapeRegExp(name)}\\b`, 'i') });
            }
        }
    }

    static builtinLexicon(): Lexicon {
        return readDataFile('lexicon.json', lexiconSchema);
    }

    async extract(sectionText: string): Promise<ExtractionResult> {
        const entities = new Map<string, ExtractedEntity>();
        const add = (name: string, type: EntityType, description?: string): void => {
            const key = `${type}:${normalizeKey(name)}`;
            if (!entities.has(key)) entities.set(key, { name, type, ...(description ? { description } : {}) });
        };

        for (const mention of this.mentions) {
            if (mention.pattern.test(sectionText)) add(mention.name, mention.type);
        }

        for (const match of sectionText.matchAll(ACRONYM_DEFINITION)) {
            const [, fullName, acronym] = match;
            if (fullName === undefined || acronym === undefined) continue;
            const known = this.mentions.find((mention) => normalizeKey(mention.name) === normalizeKey(fullName));
            add(known?.name ?? fullName, known?.type ?? 'Concept', `Abbreviated ${acronym}`);
        }

        const relationships = this.coOccurrences(sectionText, [...entities.values()]);

        logger.debug({ entities: entities.size, relationships: relationships.length }, 'Dictionary extraction');
        return { entities: [...entities.values()], relationships };
    }

    private coOccurrences(text: string, entities: readonly ExtractedEntity[]): ExtractedRelationship[] {
        const sentences = splitSentences(text);
        if (sentences.length === 0 || entities.length < 2) return [];

        const patterns = entities.map((entity) => new RegExp(`\\b${escapeRegExp(entity.name)}\\b`, 'i'));
        const counts = new Map<string, { source: ExtractedEntity; target: ExtractedEntity; count: number }>();

        for (const sentence of sentences) {
            const present = entities.filter((_, i) => patterns[i]?.test(sentence));
            for (let i = 0; i < present.length; i++) {
                for (let j = i + 1; j < present.length; j++) {
                    const a = present[i];
                    const b = present[j];
                    if (!a || !b || normalizeKey(a.name) === normalizeKey(b.name)) continue;
                    const [source, target] = orient(a, b);
                    const key = `${source.name}|${target.name}`;
                    const entry = counts.get(key);
                    if (entry) entry.count++;
                    else counts.set(key, { source, target, count: 1 });
                }
            }
        }

        return [...counts.values()].map(({ source, target, count }) => ({
            source: source.name,
            target: target.name,
            type: relationshipFor(source.type, target.type),
            weight: Math.min(1, count / sentences.length + 0.5),
        }));
    }
}

/**
 * Methods point at what they are applied to or what they report.
 */
function orient(a: ExtractedEntity, b: ExtractedEntity): [ExtractedEntity, ExtractedEntity] {
    if (b.type === 'Method' && a.type !== 'Method') return [b, a];
    if (a.type === 'Method' || a.name.localeCompare(b.name) <= 0) return [a, b];
    return [b, a];
}

function relationshipFor(source: EntityType, target: EntityType): RelationshipType {
    if (source === 'Method' && target === 'Concept') return RelationshipType.APPLIED_TO;
    if (source === 'Method' && target === 'Result') return RelationshipType.REPORTS_RESULT;
    return RelationshipType.RELATED_TO;
}
