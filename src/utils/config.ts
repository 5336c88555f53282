import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type LitScoutConfig, type ApiKeysConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const LeadingWordsSchema = z
    .object({
        wordCount: z.number().int().min(1),
        base: z.number().min(0).max(100),
        perMatch: z.number().min(0),
        cap: z.number().min(0).max(100),
    })
    .partial()
    .strict();

const AnyWordsSchema = z
    .object({
        base: z.number().min(0).max(100),
        ratioWeight: z.number().min(0),
        perMatch: z.number().min(0),
        cap: z.number().min(0).max(100),
    })
    .partial()
    .strict();

const MatchingSchema = z
    .object({
        acceptanceThreshold: z.number().min(0).max(100),
        sequentialConfidence: z.number().min(0).max(100),
        identifierConfidence: z.number().min(0).max(100),
        leadingWords: LeadingWordsSchema,
        anyWords: AnyWordsSchema,
        authorYearConfidence: z.number().min(0).max(100),
        topicalKeywords: z.array(z.string().min(1)),
        topicalBonus: z.number().min(0),
    })
    .partial()
    .strict();

/**
 * Shape accepted in `litscout.config.json`. Every field is optional; omitted fields keep defaults.
 */
export const FileConfigSchema = z
    .object({
        sources: z.array(z.string().min(1)).min(1),
        maxResultsPerSource: z.number().int().min(1),
        earlyExitRatio: z.number().gt(0).max(1),
        concurrency: z.number().int().min(1),
        delayRangeMs: z
            .tuple([z.number().min(0), z.number().min(0)])
            .refine(([min, max]) => min <= max, { message: 'delayRangeMs must be [min, max] with min <= max' }),
        requestTimeoutMs: z.number().int().min(1),
        runTimeoutMs: z.number().int().min(1),
        maxRetries: z.number().int().min(0),
        userAgents: z.array(z.string().min(1)).min(1),
        email: z.string().email(),
        apiKeys: z
            .object({
                core: z.string(),
                semanticScholar: z.string(),
                openalex: z.string(),
                pubmed: z.string(),
            })
            .partial()
            .strict(),
        matching: MatchingSchema,
        out: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Structured validation error for the config file.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: Array<{ path: string; message: string }>
    ) {
        super(message);
        this.name = 'ConfigError';
    }

    /**
     * Format errors for display.
     */
    format(): string {
        const lines = [this.message];
        for (const issue of this.issues) {
            lines.push(`  - ${issue.path || '(root)'}: ${issue.message}`);
        }
        return lines.join('\n');
    }
}

/**
 * Validate raw config file content.
 * @throws ConfigError listing every invalid field
 */
export function parseFileConfig(raw: unknown, filepath = 'config'): FileConfig {
    const result = FileConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration in ${filepath}`,
            result.error.issues.map((issue) => ({
                path: issue.path.join('.'),
                message: issue.message,
            }))
        );
    }
    return result.data;
}

/**
 * Load configuration from litscout.config.json using cosmiconfig.
 * Returns null when no config file is found.
 */
async function loadConfigFile(explicitPath?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('litscout', {
        searchPlaces: ['litscout.config.json'],
    });

    const result = explicitPath ? await explorer.load(explicitPath) : await explorer.search();
    if (!result || result.isEmpty) {
        return null;
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parseFileConfig(result.config, result.filepath);
}

/**
 * Read API keys from environment variables.
 */
function loadEnvVars(): { apiKeys: ApiKeysConfig } {
    const apiKeys: ApiKeysConfig = {};

    const core = getApiKey('CORE_API_KEY');
    if (core) apiKeys.core = core;
    const semanticScholar = getApiKey('S2_API_KEY');
    if (semanticScholar) apiKeys.semanticScholar = semanticScholar;
    const openalex = getApiKey('OPENALEX_API_KEY');
    if (openalex) apiKeys.openalex = openalex;
    const pubmed = getApiKey('PUBMED_API_KEY');
    if (pubmed) apiKeys.pubmed = pubmed;

    return { apiKeys };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<LitScoutConfig>,
    options: { configPath?: string } = {}
): Promise<LitScoutConfig> {
    const fileConfig = await loadConfigFile(options.configPath);
    const envConfig = loadEnvVars();
    return mergeConfig(fileConfig ?? {}, envConfig, cliFlags);
}

/**
 * Layer file, environment and CLI settings over the defaults.
 * Callers must omit unset CLI keys rather than pass `undefined`.
 */
export function mergeConfig(
    fileConfig: FileConfig,
    envConfig: { apiKeys: ApiKeysConfig },
    cliFlags: Partial<LitScoutConfig>
): LitScoutConfig {
    const fileMatching = fileConfig.matching ?? {};
    const cliMatching = cliFlags.matching;

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...cliFlags,
        // Deep merge nested objects
        apiKeys: {
            ...DEFAULT_CONFIG.apiKeys,
            ...fileConfig.apiKeys,
            ...envConfig.apiKeys,
            ...cliFlags.apiKeys,
        },
        matching: {
            ...DEFAULT_CONFIG.matching,
            ...fileMatching,
            ...cliMatching,
            leadingWords: {
                ...DEFAULT_CONFIG.matching.leadingWords,
                ...fileMatching.leadingWords,
                ...cliMatching?.leadingWords,
            },
            anyWords: {
                ...DEFAULT_CONFIG.matching.anyWords,
                ...fileMatching.anyWords,
                ...cliMatching?.anyWords,
            },
        },
    };
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    const value = process.env[name]?.trim();
    return value ? value : undefined;
}
