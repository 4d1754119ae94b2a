/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * NCBI E-utilities identification (PubMed).
 */
export interface NcbiConfig {
    apiKey?: string;
    email?: string;
    tool: string;
}

/**
 * Full litsearch configuration merged from CLI flags, env vars, and config file.
 */
export interface LitSearchConfig {
    // Identification sent to every source
    userAgent: string;
    mailto?: string;

    // Per-source credentials and parameters
    ncbi: NcbiConfig;
    plosApiKey?: string;
    semanticScholarApiKey?: string;
    doajApiKey?: string;
    osfProvider: string;

    // Result size
    rows: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: LitSearchConfig = {
    userAgent: 'litsearch/1.0.0',
    ncbi: {
        tool: 'litsearch',
    },
    osfProvider: 'psyarxiv',
    rows: 5,
    logLevel: 'info',
    jsonLogs: false,
};
