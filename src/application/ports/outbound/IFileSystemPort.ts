export type PathType = 'file' | 'directory' | 'missing';

/**
 * Filesystem writes and probes used while resolving entries.
 * Every method rejects with an IOError naming the failing path.
 */
export interface IFileSystemPort {
    pathType(absolutePath: string): Promise<PathType>;
    /** Replace the whole file; readers never observe a partially written file */
    writeText(absolutePath: string, content: string): Promise<void>;
    /** Copy a file or a whole directory tree, creating missing parent directories */
    copy(source: string, destination: string): Promise<void>;
    /** Remove a file or a whole directory tree */
    remove(absolutePath: string): Promise<void>;
}
