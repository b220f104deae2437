export type DiffKind = 'leftOnly' | 'rightOnly' | 'modified' | 'typeMismatch';

export interface DiffEntryData {
    path: string;
    kind: DiffKind;
    leftIsDir?: boolean;
    rightIsDir?: boolean;
}

/**
 * One path-level difference between two directory trees.
 *
 * `path` is relative to both roots and always uses `/` separators.
 * The directory flags are present only for the side(s) where the path exists.
 */
export class DiffEntry {
    readonly path: string;
    readonly kind: DiffKind;
    readonly leftIsDir?: boolean;
    readonly rightIsDir?: boolean;

    constructor(data: DiffEntryData) {
        this.path = data.path;
        this.kind = data.kind;
        this.leftIsDir = data.leftIsDir;
        this.rightIsDir = data.rightIsDir;
    }

    /** True when this is a one-sided entry describing a whole directory */
    get isOnlyDirectory(): boolean {
        return (this.kind === 'leftOnly' && this.leftIsDir === true)
            || (this.kind === 'rightOnly' && this.rightIsDir === true);
    }

    static leftOnly(path: string, isDir: boolean): DiffEntry {
        return new DiffEntry({ path, kind: 'leftOnly', leftIsDir: isDir });
    }

    static rightOnly(path: string, isDir: boolean): DiffEntry {
        return new DiffEntry({ path, kind: 'rightOnly', rightIsDir: isDir });
    }

    static modified(path: string): DiffEntry {
        return new DiffEntry({ path, kind: 'modified', leftIsDir: false, rightIsDir: false });
    }

    static typeMismatch(path: string, leftIsDir: boolean, rightIsDir: boolean): DiffEntry {
        return new DiffEntry({ path, kind: 'typeMismatch', leftIsDir, rightIsDir });
    }
}
