#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';

// Domain
import { DirectoryComparator } from './domain/services/DirectoryComparator';
import { HunkExtractor } from './domain/services/HunkExtractor';
import { HunkReconciler } from './domain/services/HunkReconciler';
import { IOError } from './domain/errors/IOError';

// Application - Use Cases
import {
    MergeSessionUseCase,
    ResolveEntryUseCase,
    ResolveModifiedFileUseCase,
} from './application/useCases';
import { SessionSummary } from './application/ports/inbound/IMergeSessionUseCase';
import { LogLevel } from './application/ports/outbound/ILoggerPort';

// Adapters - Gateways
import {
    ConsoleLoggerGateway,
    FastGlobPathIndexer,
    JsDiffLineAligner,
    NodeFileSystemGateway,
    ReadlineDecisionGateway,
    StdoutReportGateway,
} from './adapters/gateways';

// Infrastructure
import { ConfigError, ConfigLoader, ConfigOverrides, TreemergeConfig } from './infrastructure/config/ConfigLoader';
import { NodeFileComparator } from './infrastructure/filesystem/NodeFileComparator';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;

const USAGE = `Usage: treemerge [options] <left-dir> <right-dir>

Compare two directory trees and reconcile every difference interactively.

Options:
  --dry-run              Show every decision's effect without touching any file
  --skip-binary          Skip binary files silently
  --context <n>          Context lines shown around each hunk (default 3)
  --exclude-left <glob>  Ignore paths on the left side (repeatable)
  --exclude-right <glob> Ignore paths on the right side (repeatable)
  --config <file>        Read settings from this file instead of .treemergerc.json
  --debug                Verbose diagnostics on stderr
  --quiet                No diagnostics on stderr except errors
  -h, --help             Show this help
  -v, --version          Show the version`;

export interface CliArguments {
    leftRoot: string;
    rightRoot: string;
    configPath?: string;
    overrides: ConfigOverrides;
}

export type ParsedCommand =
    | { command: 'help' }
    | { command: 'version' }
    | { command: 'run'; args: CliArguments };

/**
 * Turns argv (without the node and script entries) into a command.
 * Usage errors are reported as ConfigError.
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommand {
    const { values, positionals } = parseOptions(argv);
    if (values.help) {
        return { command: 'help' };
    }
    if (values.version) {
        return { command: 'version' };
    }
    if (positionals.length !== 2) {
        throw new ConfigError(`Expected exactly two directories, got ${positionals.length}`);
    }
    if (values.debug && values.quiet) {
        throw new ConfigError('--debug and --quiet cannot be combined');
    }

    const overrides: ConfigOverrides = {};
    if (values['dry-run']) overrides.dryRun = true;
    if (values['skip-binary']) overrides.skipBinary = true;
    if (values['exclude-left']) overrides.excludeLeft = values['exclude-left'];
    if (values['exclude-right']) overrides.excludeRight = values['exclude-right'];
    if (values.context !== undefined) overrides.contextLines = parseContext(values.context);
    const logLevel: LogLevel | undefined = values.debug ? 'debug' : values.quiet ? 'silent' : undefined;
    if (logLevel) overrides.logLevel = logLevel;

    return {
        command: 'run',
        args: {
            leftRoot: positionals[0],
            rightRoot: positionals[1],
            configPath: values.config,
            overrides,
        },
    };
}

function parseOptions(argv: readonly string[]) {
    try {
        return parseArgs({
            args: [...argv],
            allowPositionals: true,
            options: {
                'dry-run': { type: 'boolean' },
                'skip-binary': { type: 'boolean' },
                context: { type: 'string' },
                'exclude-left': { type: 'string', multiple: true },
                'exclude-right': { type: 'string', multiple: true },
                config: { type: 'string' },
                debug: { type: 'boolean' },
                quiet: { type: 'boolean' },
                help: { type: 'boolean', short: 'h' },
                version: { type: 'boolean', short: 'v' },
            },
        });
    } catch (e) {
        throw new ConfigError(e instanceof Error ? e.message : String(e));
    }
}

function parseContext(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new ConfigError(`--context expects a non-negative integer, got "${value}"`);
    }
    return Number(value);
}

/** Exit status for a finished session: 1 when any entry failed */
export function exitCodeFor(summary: SessionSummary): number {
    return summary.failures.length > 0 ? EXIT_FAILURES : EXIT_OK;
}

function readVersion(): string {
    try {
        const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
    } catch (e) {
        console.error('Failed to read package version:', e);
    }
    return 'unknown';
}

interface Invocation {
    args: CliArguments;
    config: TreemergeConfig;
}

/** Parse argv and load config; a number means the CLI is already done */
function prepare(argv: readonly string[]): Invocation | number {
    try {
        const command = parseCommandLine(argv);
        if (command.command === 'help') {
            console.log(USAGE);
            return EXIT_OK;
        }
        if (command.command === 'version') {
            console.log(readVersion());
            return EXIT_OK;
        }
        const config = new ConfigLoader().load(command.args.configPath, command.args.overrides);
        return { args: command.args, config };
    } catch (e) {
        if (e instanceof ConfigError) {
            console.error(`treemerge: ${e.message}`);
            console.error(USAGE);
            return EXIT_USAGE;
        }
        throw e;
    }
}

export async function main(argv: readonly string[]): Promise<number> {
    const invocation = prepare(argv);
    if (typeof invocation === 'number') {
        return invocation;
    }
    const { args, config } = invocation;

    // ===== Adapters Layer - Gateways =====
    const logger = new ConsoleLoggerGateway(config.logLevel);
    const reportGateway = new StdoutReportGateway();
    const fileSystemGateway = new NodeFileSystemGateway();
    const decisionGateway = new ReadlineDecisionGateway();
    const lineAligner = new JsDiffLineAligner();

    // ===== Domain Layer =====
    const fileComparator = new NodeFileComparator();
    const directoryComparator = new DirectoryComparator(new FastGlobPathIndexer(), fileComparator);
    const hunkExtractor = new HunkExtractor(lineAligner);
    const hunkReconciler = new HunkReconciler(lineAligner);

    // ===== Application Layer - Use Cases =====
    const resolveEntryUseCase = new ResolveEntryUseCase(fileSystemGateway, decisionGateway, reportGateway, logger);
    const resolveModifiedFileUseCase = new ResolveModifiedFileUseCase(
        fileComparator,
        hunkExtractor,
        hunkReconciler,
        fileSystemGateway,
        decisionGateway,
        reportGateway,
        logger
    );
    const mergeSessionUseCase = new MergeSessionUseCase(
        directoryComparator,
        fileComparator,
        fileSystemGateway,
        resolveEntryUseCase,
        resolveModifiedFileUseCase,
        reportGateway,
        logger
    );

    logger.debug(`config: ${JSON.stringify(config)}`);
    try {
        const summary = await mergeSessionUseCase.execute({
            leftRoot: path.resolve(args.leftRoot),
            rightRoot: path.resolve(args.rightRoot),
            contextLines: config.contextLines,
            dryRun: config.dryRun,
            skipBinary: config.skipBinary,
            exclude: config.exclude,
        });
        return exitCodeFor(summary);
    } catch (e) {
        if (e instanceof IOError) {
            logger.logError('session', e);
            return EXIT_USAGE;
        }
        throw e;
    } finally {
        decisionGateway.close();
    }
}

if (require.main === module) {
    main(process.argv.slice(2)).then(
        code => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error('treemerge: unexpected error:', error);
            process.exitCode = EXIT_FAILURES;
        }
    );
}
