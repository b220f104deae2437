export type TextReadResult =
    | { kind: 'text'; text: string }
    | { kind: 'binary' };

/** Number of leading bytes inspected by the binary heuristic */
export const BINARY_PROBE_BYTES = 8192;

export interface IFileComparator {
    /** Byte-for-byte equality of two files */
    identical(leftPath: string, rightPath: string): Promise<boolean>;
    /** True when a zero byte occurs in the first {@link BINARY_PROBE_BYTES} bytes */
    isBinary(path: string): Promise<boolean>;
    /** Lossy UTF-8 decode, or `binary` when the heuristic triggers */
    readAsText(path: string): Promise<TextReadResult>;
}

export function containsZeroByte(bytes: Uint8Array): boolean {
    const limit = Math.min(bytes.length, BINARY_PROBE_BYTES);
    for (let i = 0; i < limit; i++) {
        if (bytes[i] === 0) {
            return true;
        }
    }
    return false;
}
