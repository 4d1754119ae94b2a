import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type LitSearchConfig, type NcbiConfig } from '../types/index.js';
import { getLogger, initLogger } from './logger.js';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

/**
 * Shape of litsearch.config.json. Every field is optional.
 */
const ConfigFileSchema = z
    .object({
        userAgent: z.string().min(1),
        mailto: z.string().email(),
        ncbi: z
            .object({
                apiKey: z.string(),
                email: z.string(),
                tool: z.string().min(1),
            })
            .partial(),
        plosApiKey: z.string(),
        semanticScholarApiKey: z.string(),
        doajApiKey: z.string(),
        osfProvider: z.string().min(1),
        rows: z.number().int().positive(),
        logLevel: LogLevelSchema,
        jsonLogs: z.boolean(),
    })
    .partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Partial settings from one configuration layer (env, CLI flags).
 */
export type ConfigOverrides = Omit<Partial<LitSearchConfig>, 'ncbi'> & {
    ncbi?: Partial<NcbiConfig>;
};

export interface ResolveConfigOptions {
    /** Environment to read; defaults to process.env */
    env?: NodeJS.ProcessEnv;
    /** Directory to look for litsearch.config.json in; defaults to cwd */
    searchFrom?: string;
}

/**
 * Load configuration from litsearch.config.json using cosmiconfig.
 * Returns null when there is no usable config file; defaults apply then.
 */
export async function loadConfigFile(searchFrom?: string): Promise<ConfigFile | null> {
    const explorer = cosmiconfig('litsearch', {
        searchPlaces: ['litsearch.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (!result || result.isEmpty) {
            return null;
        }

        const parsed = ConfigFileSchema.safeParse(result.config);
        if (!parsed.success) {
            getLogger().warn(
                { path: result.filepath, issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
                'Invalid config file, using defaults'
            );
            return null;
        }

        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parsed.data;
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }
}

/**
 * Read relevant environment variables. Blank values count as unset.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv): ConfigOverrides {
    const read = (name: string): string | undefined => env[name]?.trim() || undefined;

    const config: ConfigOverrides = {};

    const userAgent = read('LITSEARCH_USER_AGENT') ?? read('USER_AGENT');
    if (userAgent) config.userAgent = userAgent;

    const mailto = read('CROSSREF_MAILTO');
    if (mailto) config.mailto = mailto;

    const plosApiKey = read('PLOS_API_KEY');
    if (plosApiKey) config.plosApiKey = plosApiKey;

    const semanticScholarApiKey = read('SEMANTIC_SCHOLAR_API_KEY');
    if (semanticScholarApiKey) config.semanticScholarApiKey = semanticScholarApiKey;

    const doajApiKey = read('DOAJ_API_KEY');
    if (doajApiKey) config.doajApiKey = doajApiKey;

    const osfProvider = read('OSF_PROVIDER');
    if (osfProvider) config.osfProvider = osfProvider;

    const logLevel = LogLevelSchema.safeParse(read('LITSEARCH_LOG_LEVEL'));
    if (logLevel.success) config.logLevel = logLevel.data;

    const ncbi: Partial<NcbiConfig> = {};
    const ncbiApiKey = read('NCBI_API_KEY');
    if (ncbiApiKey) ncbi.apiKey = ncbiApiKey;
    const ncbiEmail = read('NCBI_EMAIL');
    if (ncbiEmail) ncbi.email = ncbiEmail;
    const ncbiTool = read('NCBI_TOOL');
    if (ncbiTool) ncbi.tool = ncbiTool;
    if (Object.keys(ncbi).length > 0) config.ncbi = ncbi;

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * Layers must leave unset keys out rather than set them to undefined.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: ResolveConfigOptions = {}
): Promise<LitSearchConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        ncbi: {
            ...DEFAULT_CONFIG.ncbi,
            ...fileConfig?.ncbi,
            ...envConfig.ncbi,
            ...cliFlags.ncbi,
        },
    };
}

/**
 * Resolve configuration for a CLI run and configure logging from it.
 *
 * The logger is started from env vars and flags before the config file is
 * read, so file warnings go to a configured logger. It is restarted only when
 * the file changes the log level or format.
 */
export async function resolveRuntimeConfig(
    cliFlags: ConfigOverrides,
    options: ResolveConfigOptions = {}
): Promise<LitSearchConfig> {
    const early = { ...DEFAULT_CONFIG, ...loadEnvVars(options.env ?? process.env), ...cliFlags };
    initLogger({ level: early.logLevel, jsonLogs: early.jsonLogs });

    const config = await resolveConfig(cliFlags, options);
    if (config.logLevel !== early.logLevel || config.jsonLogs !== early.jsonLogs) {
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    }
    return config;
}
