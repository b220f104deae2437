import { ILoggerPort, LogLevel } from '../../application/ports/outbound/ILoggerPort';

export type LineWriter = (line: string) => void;

/**
 * Timestamped diagnostics on stderr, kept apart from the report on stdout.
 * Errors are always written; `silent` only mutes debug, info and warnings.
 */
export class ConsoleLoggerGateway implements ILoggerPort {
    constructor(
        private readonly level: LogLevel = 'info',
        private readonly write: LineWriter = line => console.error(line)
    ) {}

    debug(message: string): void {
        if (this.level !== 'debug') return;
        this.log(message);
    }

    info(message: string): void {
        if (this.level === 'silent') return;
        this.log(message);
    }

    warn(message: string): void {
        if (this.level === 'silent') return;
        this.log(`⚠️ ${message}`);
    }

    logError(context: string, error: unknown): void {
        const errorMsg = error instanceof Error ? error.message : String(error);
        const stack = error instanceof Error ? error.stack : '';
        this.log(`❌ ERROR [${context}]: ${errorMsg}`);
        if (stack && this.level === 'debug') {
            this.log(`  Stack: ${stack.split('\n').slice(0, 3).join(' -> ')}`);
        }
    }

    private log(message: string): void {
        const timestamp = new Date().toISOString().substring(11, 23);
        this.write(`[treemerge] [${timestamp}] ${message}`);
    }
}
