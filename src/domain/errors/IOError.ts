export type IOOperation = 'read' | 'write' | 'walk' | 'stat' | 'copy' | 'remove';

/**
 * A filesystem failure tied to one path. Fatal to the affected entry only.
 */
export class IOError extends Error {
    readonly path: string;
    readonly operation: IOOperation;
    readonly code?: string;

    constructor(operation: IOOperation, path: string, cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : cause === undefined ? 'failed' : String(cause);
        super(`Cannot ${operation} ${path}: ${reason}`, { cause });
        this.name = 'IOError';
        this.path = path;
        this.operation = operation;
        this.code = errorCode(cause);
    }

    static wrap(operation: IOOperation, path: string, error: unknown): IOError {
        return error instanceof IOError ? error : new IOError(operation, path, error);
    }
}

function errorCode(cause: unknown): string | undefined {
    if (typeof cause === 'object' && cause !== null && 'code' in cause) {
        const code = cause.code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}
