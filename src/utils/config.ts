import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type GroundworkConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const logger = getLogger();

type DeepPartial<T> = {
    [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/**
 * Partial configuration as accepted from a file, env vars, or CLI flags.
 */
export type GroundworkConfigOverrides = DeepPartial<GroundworkConfig>;

const unitInterval = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();
const maxHopsSchema = z.number().int().min(1).max(3);
const providerKindSchema = z.enum(['local', 'openai', 'ollama']);

const strategyRecord = z
    .object({
        vector: z.number().nonnegative(),
        graph: z.number().nonnegative(),
        lexical: z.number().nonnegative(),
        tree: z.number().nonnegative(),
    })
    .partial();

const configFileSchema = z
    .object({
        db: z.string(),
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
        resolver: z
            .object({
                mergeThreshold: unitInterval,
                stringThreshold: unitInterval,
            })
            .partial(),
        graph: z
            .object({
                maxHops: maxHopsSchema,
                fanOut: positiveInt,
            })
            .partial(),
        retrieval: z
            .object({
                weights: strategyRecord,
                topN: z
                    .object({
                        vector: z.number().int().nonnegative(),
                        graph: z.number().int().nonnegative(),
                        lexical: z.number().int().nonnegative(),
                        tree: z.number().int().nonnegative(),
                    })
                    .partial(),
                topK: z.number().int().positive(),
                strategyTimeoutMs: positiveInt,
                bm25: z.object({ k1: z.number().nonnegative(), b: z.number().min(0).max(1) }).partial(),
            })
            .partial(),
        tree: z
            .object({
                nodeBudget: z.number().int().positive(),
                pruneThreshold: z.number().min(0).max(1),
                minConfidence: z.number().min(0).max(1),
                aggregate: z.enum(['product', 'min']),
                scorer: z.enum(['generation', 'keyword']),
            })
            .partial(),
        loop: z.object({ maxIterations: z.number().int().positive() }).partial(),
        ingest: z.object({ concurrency: z.number().int().positive() }).partial(),
        cache: z
            .object({
                enabled: z.boolean(),
                ttlMs: z.number().int().nonnegative(),
                maxEntries: z.number().int().positive(),
            })
            .partial(),
        provider: z
            .object({
                kind: providerKindSchema,
                model: z.string(),
                embeddingModel: z.string(),
                baseUrl: z.string().url(),
                dimensions: z.number().int().positive(),
                requestsPerSecond: z.number().positive(),
                timeoutMs: z.number().int().positive(),
            })
            .partial(),
    })
    .partial()
    .strict();

/**
 * Load configuration from groundwork.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<GroundworkConfigOverrides | null> {
    const explorer = cosmiconfig('groundwork', {
        searchPlaces: ['groundwork.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = configFileSchema.safeParse(result.config);
            if (!parsed.success) {
                logger.warn(
                    { path: result.filepath, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            logger.debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        logger.warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read one environment variable through the same rule the config file uses.
 * Invalid values are logged and ignored.
 */
function envValue<T>(name: string, schema: z.ZodType<T>): T | undefined {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return undefined;

    const parsed = schema.safeParse(raw.trim());
    if (!parsed.success) {
        logger.warn(
            { name, value: raw, issues: parsed.error.issues.map((i) => i.message) },
            'Ignoring invalid environment variable'
        );
        return undefined;
    }
    return parsed.data;
}

const envNumber = (schema: z.ZodNumber) => z.coerce.number().pipe(schema);

/**
 * Read GROUNDWORK_* environment variables.
 */
function loadEnvVars(): GroundworkConfigOverrides {
    const env: GroundworkConfigOverrides = {};

    const db = envValue('GROUNDWORK_DB', z.string());
    if (db !== undefined) env.db = db;

    const mergeThreshold = envValue('GROUNDWORK_MERGE_THRESHOLD', envNumber(unitInterval));
    if (mergeThreshold !== undefined) env.resolver = { mergeThreshold };

    const fanOut = envValue('GROUNDWORK_FAN_OUT', envNumber(positiveInt));
    const maxHops = envValue('GROUNDWORK_MAX_HOPS', envNumber(maxHopsSchema));
    if (fanOut !== undefined || maxHops !== undefined) {
        env.graph = {};
        if (fanOut !== undefined) env.graph.fanOut = fanOut;
        if (maxHops !== undefined) env.graph.maxHops = maxHops;
    }

    const timeout = envValue('GROUNDWORK_STRATEGY_TIMEOUT_MS', envNumber(positiveInt));
    if (timeout !== undefined) env.retrieval = { strategyTimeoutMs: timeout };

    const provider = envValue('GROUNDWORK_PROVIDER', providerKindSchema);
    if (provider !== undefined) env.provider = { kind: provider };

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: GroundworkConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<GroundworkConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    return mergeConfig(fileConfig ?? {}, loadEnvVars(), cliFlags);
}

/**
 * Deep-merge overrides onto the defaults, later sources winning.
 */
export function mergeConfig(...sources: GroundworkConfigOverrides[]): GroundworkConfig {
    return sources.reduce<GroundworkConfig>(
        (merged, source) => ({
            db: source.db ?? merged.db,
            logLevel: source.logLevel ?? merged.logLevel,
            jsonLogs: source.jsonLogs ?? merged.jsonLogs,
            resolver: { ...merged.resolver, ...source.resolver },
            graph: { ...merged.graph, ...source.graph },
            retrieval: {
                ...merged.retrieval,
                ...source.retrieval,
                weights: { ...merged.retrieval.weights, ...source.retrieval?.weights },
                topN: { ...merged.retrieval.topN, ...source.retrieval?.topN },
                bm25: { ...merged.retrieval.bm25, ...source.retrieval?.bm25 },
            },
            tree: { ...merged.tree, ...source.tree },
            loop: { ...merged.loop, ...source.loop },
            ingest: { ...merged.ingest, ...source.ingest },
            cache: { ...merged.cache, ...source.cache },
            provider: { ...merged.provider, ...source.provider },
        }),
        DEFAULT_CONFIG
    );
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
