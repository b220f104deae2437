/**
 * Entry Component
 *
 * One-line descriptions of directory comparison results.
 */

import { DiffEntry } from '../../../../../../domain/entities/DiffEntry';
import { countByKind } from '../../../../../../domain/services/DirectoryComparator';

function kindOf(isDir: boolean | undefined): string {
    return isDir ? 'directory' : 'file';
}

export function renderEntryHeader(entry: DiffEntry): string {
    switch (entry.kind) {
        case 'leftOnly':
            return `File: ${entry.path} (${kindOf(entry.leftIsDir)} only in left)`;
        case 'rightOnly':
            return `File: ${entry.path} (${kindOf(entry.rightIsDir)} only in right)`;
        case 'modified':
            return `File: ${entry.path} (modified)`;
        case 'typeMismatch':
            return `File: ${entry.path} (type mismatch: left is ${kindOf(entry.leftIsDir)}, right is ${kindOf(entry.rightIsDir)})`;
    }
}

export function renderDifferencesFound(entries: readonly DiffEntry[]): string {
    const counts = countByKind(entries);
    const parts = [
        counts.leftOnly > 0 ? `${counts.leftOnly} only in left` : '',
        counts.rightOnly > 0 ? `${counts.rightOnly} only in right` : '',
        counts.modified > 0 ? `${counts.modified} modified` : '',
        counts.typeMismatch > 0 ? `${counts.typeMismatch} type mismatch` : '',
    ].filter(part => part.length > 0);

    const head = `Found ${entries.length} difference(s).`;
    return parts.length > 0 ? `${head} (${parts.join(', ')})` : head;
}
