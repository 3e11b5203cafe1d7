import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type ReconcileConfig,
    type MatchingConfig,
    type VerificationConfig,
    type SearchConfig,
    type CacheConfig,
} from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Overrides accepted from the config file, env vars and CLI flags.
 * Nested sections may be given partially.
 */
export type ConfigOverrides = Partial<Omit<ReconcileConfig, 'matching' | 'verification' | 'search' | 'cache'>> & {
    matching?: Partial<MatchingConfig>;
    verification?: Partial<VerificationConfig>;
    search?: Partial<SearchConfig>;
    cache?: Partial<CacheConfig>;
};

const sourceTag = z.enum(['crossref', 'pubmed', 'semantic_scholar']);
const similarity = z.number().min(0).max(1);

/**
 * Shape of paperrecon.config.json. Unknown keys are ignored.
 */
const ConfigFileSchema = z.object({
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
    email: z.string().email().optional(),
    sessionDir: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    precedence: z
        .array(sourceTag)
        .min(1)
        .refine((tags) => new Set(tags).size === tags.length, 'precedence must not repeat a source')
        .optional(),
    matching: z.object({ titleSimilarityThreshold: similarity.optional() }).optional(),
    verification: z
        .object({
            titleThreshold: similarity.optional(),
            journalThreshold: similarity.optional(),
            fallbackThreshold: similarity.optional(),
            checkRetractions: z.boolean().optional(),
        })
        .optional(),
    search: z
        .object({
            limit: z.number().int().positive().max(100).optional(),
            includeCrossref: z.boolean().optional(),
            fieldsOfStudy: z.string().optional(),
        })
        .optional(),
    cache: z
        .object({
            enabled: z.boolean().optional(),
            dir: z.string().min(1).optional(),
            ttlHours: z.number().positive().optional(),
        })
        .optional(),
});

/**
 * Load configuration from paperrecon.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('paperrecon', {
        searchPlaces: ['paperrecon.config.json'],
    });

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * API keys are read where needed (`getApiKey`), not stored in config.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const email = process.env['PAPERRECON_EMAIL'];
    if (email) {
        env.email = email;
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(cliFlags: ConfigOverrides): Promise<ReconcileConfig> {
    const fileConfig = await loadConfigFile();
    const envConfig = loadEnvVars();
    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Layer overrides over the defaults, later layers winning.
 * Undefined values never override.
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null>): ReconcileConfig {
    const merged: ReconcileConfig = {
        ...DEFAULT_CONFIG,
        matching: { ...DEFAULT_CONFIG.matching },
        verification: { ...DEFAULT_CONFIG.verification },
        search: { ...DEFAULT_CONFIG.search },
        cache: { ...DEFAULT_CONFIG.cache },
    };

    for (const layer of layers) {
        if (!layer) continue;
        const { matching, verification, search, cache, ...top } = layer;

        Object.assign(merged, definedOnly(top));
        // Deep merge nested objects
        merged.matching = { ...merged.matching, ...definedOnly(matching) };
        merged.verification = { ...merged.verification, ...definedOnly(verification) };
        merged.search = { ...merged.search, ...definedOnly(search) };
        merged.cache = { ...merged.cache, ...definedOnly(cache) };
    }

    return merged;
}

function definedOnly<T extends object>(value: T | undefined): Partial<T> {
    if (!value) return {};
    const out: Partial<T> = {};
    for (const key in value) {
        if (Object.hasOwn(value, key) && value[key] !== undefined) {
            out[key] = value[key];
        }
    }
    return out;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}
