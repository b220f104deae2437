import * as path from 'path';
import { DiffEntry, DiffKind } from '../entities/DiffEntry';
import { IOError } from '../errors/IOError';
import { IFileComparator } from './IFileComparator';
import { IPathIndexer, PathIndex } from './IPathIndexer';

export interface EntryFailure {
    path: string;
    error: IOError;
}

export interface DirectoryComparison {
    /** Differences in path order, nested one-sided entries already removed */
    entries: DiffEntry[];
    /** Paths present on both sides whose contents could not be compared */
    failures: EntryFailure[];
}

export interface IDirectoryComparator {
    compare(leftRoot: string, rightRoot: string): Promise<DirectoryComparison>;
}

/**
 * Orders relative paths component by component, so a directory always sorts
 * directly before its own contents (`a/b` < `a-b`).
 */
export function comparePaths(a: string, b: string): number {
    const partsA = a.split('/');
    const partsB = b.split('/');
    const shared = Math.min(partsA.length, partsB.length);
    for (let i = 0; i < shared; i++) {
        if (partsA[i] !== partsB[i]) {
            return partsA[i] < partsB[i] ? -1 : 1;
        }
    }
    return partsA.length - partsB.length;
}

/** Strict ancestors of a relative path, nearest first: `a/b/c` → `a/b`, `a` */
export function ancestorsOf(relativePath: string): string[] {
    const result: string[] = [];
    let index = relativePath.lastIndexOf('/');
    while (index > 0) {
        const ancestor = relativePath.slice(0, index);
        result.push(ancestor);
        index = ancestor.lastIndexOf('/');
    }
    return result;
}

/**
 * Drops every one-sided entry that lies anywhere beneath a one-sided
 * directory entry of the same kind. Ancestors are looked up in the
 * unfiltered set, so a suppressed intermediate directory still hides
 * everything below it.
 */
export function suppressNestedEntries(entries: readonly DiffEntry[]): DiffEntry[] {
    const onlyDirs: Record<'leftOnly' | 'rightOnly', Set<string>> = {
        leftOnly: new Set(),
        rightOnly: new Set(),
    };
    for (const entry of entries) {
        if (entry.isOnlyDirectory && (entry.kind === 'leftOnly' || entry.kind === 'rightOnly')) {
            onlyDirs[entry.kind].add(entry.path);
        }
    }

    return entries.filter(entry => {
        if (entry.kind !== 'leftOnly' && entry.kind !== 'rightOnly') {
            return true;
        }
        const dirs = onlyDirs[entry.kind];
        return !ancestorsOf(entry.path).some(ancestor => dirs.has(ancestor));
    });
}

export class DirectoryComparator implements IDirectoryComparator {
    constructor(
        private readonly pathIndexer: IPathIndexer,
        private readonly fileComparator: IFileComparator
    ) {}

    async compare(leftRoot: string, rightRoot: string): Promise<DirectoryComparison> {
        const [leftIndex, rightIndex] = await Promise.all([
            this.pathIndexer.index(leftRoot),
            this.pathIndexer.index(rightRoot),
        ]);

        const allPaths = unionOf(leftIndex, rightIndex).sort(comparePaths);
        const entries: DiffEntry[] = [];
        const failures: EntryFailure[] = [];

        for (const relativePath of allPaths) {
            const leftIsDir = leftIndex.get(relativePath);
            const rightIsDir = rightIndex.get(relativePath);

            if (rightIsDir === undefined) {
                if (leftIsDir !== undefined) {
                    entries.push(DiffEntry.leftOnly(relativePath, leftIsDir));
                }
                continue;
            }
            if (leftIsDir === undefined) {
                entries.push(DiffEntry.rightOnly(relativePath, rightIsDir));
                continue;
            }
            if (leftIsDir !== rightIsDir) {
                entries.push(DiffEntry.typeMismatch(relativePath, leftIsDir, rightIsDir));
                continue;
            }
            // Matching directories produce no entry of their own
            if (leftIsDir) {
                continue;
            }

            try {
                const same = await this.fileComparator.identical(
                    path.join(leftRoot, relativePath),
                    path.join(rightRoot, relativePath)
                );
                if (!same) {
                    entries.push(DiffEntry.modified(relativePath));
                }
            } catch (error) {
                failures.push({ path: relativePath, error: IOError.wrap('read', relativePath, error) });
            }
        }

        return { entries: suppressNestedEntries(entries), failures };
    }
}

function unionOf(left: PathIndex, right: PathIndex): string[] {
    const paths = new Set<string>(left.keys());
    for (const key of right.keys()) {
        paths.add(key);
    }
    return [...paths];
}

export function countByKind(entries: readonly DiffEntry[]): Record<DiffKind, number> {
    const counts: Record<DiffKind, number> = { leftOnly: 0, rightOnly: 0, modified: 0, typeMismatch: 0 };
    for (const entry of entries) {
        counts[entry.kind]++;
    }
    return counts;
}
