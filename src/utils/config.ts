import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type GenderscopeConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * CLI/file overrides: every nested section may be given in part.
 */
export type ConfigOverrides = Partial<Omit<GenderscopeConfig, 'prn' | 'knowledgeBase' | 'output'>> & {
    prn?: Partial<GenderscopeConfig['prn']>;
    knowledgeBase?: Partial<GenderscopeConfig['knowledgeBase']>;
    output?: Partial<GenderscopeConfig['output']>;
};

const fileConfigSchema = z
    .object({
        db: z.string(),
        lexiconPath: z.string(),
        givenNamesPath: z.string(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
        prn: z
            .object({
                listPath: z.string(),
                adjustedPath: z.string(),
                conflictPolicy: z.enum(['ambiguous', 'drop']),
            })
            .partial(),
        knowledgeBase: z
            .object({
                provider: z.enum(['wikidata', 'fixture']),
                endpoint: z.string().url(),
                fixturePath: z.string(),
                cache: z.boolean(),
                cacheDir: z.string(),
                ttlHours: z.number().positive(),
                concurrency: z.number().int().positive(),
                timeoutMs: z.number().int().positive(),
                contact: z.string(),
                resolveAuthors: z.boolean(),
            })
            .partial(),
        output: z
            .object({
                dir: z.string(),
                csv: z.boolean(),
            })
            .partial(),
    })
    .partial();

/**
 * Load configuration from genderscope.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('genderscope', {
        searchPlaces: ['genderscope.config.json'],
    });

    let result;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        getLogger().warn({ error }, 'Failed to read config file, using defaults');
        return null;
    }

    if (!result || result.isEmpty) return null;

    const parsed = fileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const key = issue?.path.join('.') ?? '';
        throw new ConfigError(`Invalid value in ${result.filepath} at "${key}": ${issue?.message ?? 'unknown'}`, key);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const knowledgeBase: Partial<GenderscopeConfig['knowledgeBase']> = {};

    const endpoint = process.env['GENDERSCOPE_KB_ENDPOINT'];
    if (endpoint) knowledgeBase.endpoint = endpoint;

    const contact = process.env['GENDERSCOPE_CONTACT'];
    if (contact) knowledgeBase.contact = contact;

    return Object.keys(knowledgeBase).length > 0 ? { knowledgeBase } : {};
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * Overrides must leave unset keys out rather than set them to undefined.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<GenderscopeConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    const merged: GenderscopeConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        prn: {
            ...DEFAULT_CONFIG.prn,
            ...fileConfig?.prn,
            ...cliFlags.prn,
        },
        knowledgeBase: {
            ...DEFAULT_CONFIG.knowledgeBase,
            ...fileConfig?.knowledgeBase,
            ...envConfig.knowledgeBase,
            ...cliFlags.knowledgeBase,
        },
        output: {
            ...DEFAULT_CONFIG.output,
            ...fileConfig?.output,
            ...cliFlags.output,
        },
    };

    if (merged.knowledgeBase.provider === 'fixture' && !merged.knowledgeBase.fixturePath) {
        throw new ConfigError('knowledgeBase.fixturePath is required for the fixture provider', 'knowledgeBase.fixturePath');
    }

    return merged;
}
