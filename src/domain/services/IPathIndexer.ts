/**
 * Every relative path under a root (`/`-separated, root itself excluded),
 * mapped to whether that path is a directory.
 */
export type PathIndex = ReadonlyMap<string, boolean>;

export interface IPathIndexer {
    /** Rejects with an IOError when the root cannot be walked */
    index(root: string): Promise<PathIndex>;
}
