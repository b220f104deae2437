import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LogLevel } from '../../application/ports/outbound/ILoggerPort';
import { DEFAULT_CONTEXT_LINES } from '../../domain/services/HunkExtractor';

export const CONFIG_FILE_NAME = '.treemergerc.json';

export const configSchema = z.object({
    contextLines: z.number().int().nonnegative().default(DEFAULT_CONTEXT_LINES),
    dryRun: z.boolean().default(false),
    skipBinary: z.boolean().default(false),
    exclude: z.object({
        left: z.array(z.string()).default([]),
        right: z.array(z.string()).default([]),
    }).strict().default({}),
    logLevel: z.enum(['silent', 'info', 'debug']).default('info'),
}).strict();

export type TreemergeConfig = z.infer<typeof configSchema>;

/** Values given on the command line; each one overrides the config file */
export interface ConfigOverrides {
    contextLines?: number;
    dryRun?: boolean;
    skipBinary?: boolean;
    excludeLeft?: string[];
    excludeRight?: string[];
    logLevel?: LogLevel;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Reads `.treemergerc.json` (or an explicit file) and merges command-line
 * overrides on top of it. Exclusion patterns from both sources add up.
 */
export class ConfigLoader {
    constructor(private readonly cwd: string = process.cwd()) {}

    load(explicitPath: string | undefined, overrides: ConfigOverrides = {}): TreemergeConfig {
        const fileConfig = this.readFile(explicitPath);
        return {
            contextLines: overrides.contextLines ?? fileConfig.contextLines,
            dryRun: overrides.dryRun ?? fileConfig.dryRun,
            skipBinary: overrides.skipBinary ?? fileConfig.skipBinary,
            exclude: {
                left: [...fileConfig.exclude.left, ...(overrides.excludeLeft ?? [])],
                right: [...fileConfig.exclude.right, ...(overrides.excludeRight ?? [])],
            },
            logLevel: overrides.logLevel ?? fileConfig.logLevel,
        };
    }

    private readFile(explicitPath: string | undefined): TreemergeConfig {
        const configPath = explicitPath
            ? path.resolve(this.cwd, explicitPath)
            : path.join(this.cwd, CONFIG_FILE_NAME);

        if (!explicitPath && !fs.existsSync(configPath)) {
            return configSchema.parse({});
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigError(`Failed to read config ${configPath}: ${reason}`);
        }

        const parsed = configSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            throw new ConfigError(`Invalid config ${configPath}: ${field}: ${issue.message}`);
        }
        return parsed.data;
    }
}
