export type LogLevel = 'silent' | 'info' | 'debug';

export interface ILoggerPort {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    logError(context: string, error: unknown): void;
}
