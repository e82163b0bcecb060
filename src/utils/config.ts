import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type BiblioRagConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Overrides a caller may pass: top-level values plus partial nested sections.
 */
export type ConfigOverrides = Partial<Omit<BiblioRagConfig, 'retrieval' | 'graph' | 'embedding' | 'llm'>> & {
    retrieval?: Partial<BiblioRagConfig['retrieval']>;
    graph?: Partial<BiblioRagConfig['graph']>;
    embedding?: Partial<BiblioRagConfig['embedding']>;
    llm?: Partial<BiblioRagConfig['llm']>;
};

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

/**
 * Shape of bibliorag.config.json. Every key is optional; unknown keys are rejected
 * so a typo does not silently fall back to a default.
 */
const ConfigFileSchema = z
    .object({
        dataDir: z.string().min(1),
        keepGenerations: z.number().int().min(1),
        logLevel: LogLevelSchema,
        jsonLogs: z.boolean(),
        retrieval: z
            .object({
                topK: z.number().int().min(1).max(100),
                threshold: z.number().min(-1).max(1),
                queryDeadlineMs: z.number().int().positive(),
            })
            .strict()
            .partial(),
        graph: z
            .object({
                enabled: z.boolean(),
                resultLimit: z.number().int().min(1),
                nlFallback: z.boolean(),
                sameYearBucketWarning: z.number().int().min(1),
            })
            .strict()
            .partial(),
        embedding: z
            .object({
                provider: z.enum(['hashing', 'ollama', 'openai']),
                model: z.string().min(1),
                baseUrl: z.string().url(),
                dimensions: z.number().int().min(8),
            })
            .strict()
            .partial(),
        llm: z
            .object({
                enabled: z.boolean(),
                provider: z.enum(['ollama', 'openai']),
                model: z.string().min(1),
                baseUrl: z.string().url(),
                temperature: z.number().min(0).max(2),
                maxTokens: z.number().int().positive(),
                timeoutMs: z.number().int().positive(),
                classifierTimeoutMs: z.number().int().positive(),
            })
            .strict()
            .partial(),
    })
    .strict()
    .partial();

/**
 * Load configuration from bibliorag.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 * A file that exists but fails validation is an error.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('bibliorag', {
        searchPlaces: ['bibliorag.config.json', '.biblioragrc.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new Error(`Invalid config file ${result.filepath}: ${issues.join('; ')}`);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const dataDir = env['BIBLIORAG_DATA_DIR'];
    if (dataDir) overrides.dataDir = dataDir;

    const llm: Partial<BiblioRagConfig['llm']> = {};
    const provider = env['BIBLIORAG_LLM_PROVIDER'];
    if (provider === 'ollama' || provider === 'openai') llm.provider = provider;
    const model = env['BIBLIORAG_LLM_MODEL'];
    if (model) llm.model = model;
    const ollamaUrl = env['OLLAMA_BASE_URL'];
    if (ollamaUrl) llm.baseUrl = ollamaUrl;
    if (Object.keys(llm).length > 0) overrides.llm = llm;

    // API keys are read where needed (getApiKey), never stored in config.
    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides = {},
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<BiblioRagConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return mergeConfig(DEFAULT_CONFIG, fileConfig ?? {}, envConfig, cliFlags);
}

/**
 * Deep-merge override layers onto a base, later layers winning.
 * Undefined values never overwrite.
 */
export function mergeConfig(base: BiblioRagConfig, ...layers: ConfigOverrides[]): BiblioRagConfig {
    let merged: BiblioRagConfig = base;

    for (const layer of layers) {
        merged = {
            dataDir: layer.dataDir ?? merged.dataDir,
            keepGenerations: layer.keepGenerations ?? merged.keepGenerations,
            logLevel: layer.logLevel ?? merged.logLevel,
            jsonLogs: layer.jsonLogs ?? merged.jsonLogs,
            retrieval: { ...merged.retrieval, ...definedOnly(layer.retrieval) },
            graph: { ...merged.graph, ...definedOnly(layer.graph) },
            embedding: { ...merged.embedding, ...definedOnly(layer.embedding) },
            llm: { ...merged.llm, ...definedOnly(layer.llm) },
        };
    }

    return merged;
}

function definedOnly<T extends object>(section: Partial<T> | undefined): Partial<T> {
    if (!section) return {};
    const out: Partial<T> = {};
    for (const key in section) {
        const value = section[key];
        if (value !== undefined) out[key] = value;
    }
    return out;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
