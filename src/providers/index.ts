import type {
    CritiqueProvider,
    EmbeddingProvider,
    ExtractionProvider,
    GenerationProvider,
    ProviderConfig,
} from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { CitationCritic } from './citation-critic.js';
import { DictionaryExtractor } from './dictionary-extractor.js';
import { ExtractiveGenerator } from './extractive-generator.js';
import { HashingEmbedder } from './hashing-embedder.js';
import { OpenAiCompatibleProvider } from './openai-compatible.js';

export { CitationCritic } from './citation-critic.js';
export { DictionaryExtractor, type Lexicon } from './dictionary-extractor.js';
export { ExtractiveGenerator, bestSentence } from './extractive-generator.js';
export { HashingEmbedder } from './hashing-embedder.js';
export { OpenAiCompatibleProvider, type OpenAiCompatibleOptions } from './openai-compatible.js';

/**
 * The four collaborators the engine consumes.
 */
export interface Providers {
    extractor: ExtractionProvider;
    generator: GenerationProvider;
    critic: CritiqueProvider;
    embedder: EmbeddingProvider;

    /** Whether the generator can rate tree nodes (the extractive generator cannot) */
    scoresTreeNodes: boolean;
}

/**
 * Resolve the providers for a configuration. `local` needs no network.
 */
export function createProviders(config: ProviderConfig): Providers {
    switch (config.kind) {
        case 'openai':
        case 'ollama': {
            const provider = new OpenAiCompatibleProvider({
                config,
                apiKey: config.kind === 'openai' ? getApiKey('OPENAI_API_KEY') : undefined,
            });
            return {
                extractor: provider,
                generator: provider,
                critic: provider,
                embedder: provider,
                scoresTreeNodes: true,
            };
        }
        case 'local':
        default:
            return {
                extractor: new DictionaryExtractor(),
                generator: new ExtractiveGenerator(),
                critic: new CitationCritic(),
                embedder: new HashingEmbedder(config.dimensions),
                scoresTreeNodes: false,
            };
    }
}
