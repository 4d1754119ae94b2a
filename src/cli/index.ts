import { Command, InvalidArgumentError, Option } from 'commander';
import { resolveRuntimeConfig, type ConfigOverrides } from '../utils/config.js';
import { DEFAULT_CONFIG, type LogLevel } from '../types/index.js';
import { executeCommand, runAuthor, runDoi, runFind, runSources, type CommandRunner } from './commands.js';

const VERSION = '1.0.0';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

interface CommonOptions {
    rows?: number;
    json?: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    mailto?: string;
}

function parsePositiveInt(value: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Attach the options every search command takes.
 */
function withCommonOptions(command: Command): Command {
    return command
        .option('-r, --rows <n>', `Maximum number of results (default: ${DEFAULT_CONFIG.rows})`, parsePositiveInt)
        .option('--json', 'Print results as JSON', false)
        .addOption(new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS))
        .option('--json-logs', 'Output JSON logs', false)
        .option('--mailto <email>', 'Contact email sent to polite-pool APIs');
}

function toOverrides(opts: CommonOptions): ConfigOverrides {
    const flags: ConfigOverrides = {};
    if (opts.rows !== undefined) flags.rows = opts.rows;
    if (isLogLevel(opts.logLevel)) flags.logLevel = opts.logLevel;
    if (opts.jsonLogs) flags.jsonLogs = true;
    if (opts.mailto) flags.mailto = opts.mailto;
    return flags;
}

/**
 * Resolve config and logging, run one command, and set the exit code.
 */
async function execute(opts: CommonOptions, run: CommandRunner): Promise<void> {
    const config = await resolveRuntimeConfig(toOverrides(opts));
    process.exitCode = await executeCommand(config, opts.json ?? false, run);
}

const program = new Command();

program
    .name('litsearch')
    .description('Find scholarly papers by title or DOI across open bibliographic APIs.')
    .version(VERSION);

// ─── FIND command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('find')
        .description('Search by title, or look up a DOI when the query is one')
        .argument('<query...>', 'Paper title or DOI')
).action(async (words: string[], opts: CommonOptions) => {
    await execute(opts, (ctx) => runFind(ctx, words.join(' ')));
});

// ─── DOI command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('doi')
        .description('Look up metadata for a DOI')
        .argument('<doi>', 'DOI, doi: label or https://doi.org/ URL')
).action(async (doi: string, opts: CommonOptions) => {
    await execute(opts, (ctx) => runDoi(ctx, doi));
});

// ─── AUTHOR command ───────────────────────────────────────

withCommonOptions(
    program
        .command('author')
        .description('List journal articles by an author (Crossref)')
        .argument('<name...>', 'Author name')
).action(async (words: string[], opts: CommonOptions) => {
    await execute(opts, (ctx) => runAuthor(ctx, words.join(' ')));
});

// ─── SOURCES command ──────────────────────────────────────

withCommonOptions(
    program
        .command('sources')
        .description('List sources in priority order with their capabilities')
).action(async (opts: CommonOptions) => {
    await execute(opts, runSources);
});

await program.parseAsync();
