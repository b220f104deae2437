import { DiffEntry, DiffEntryData, DiffKind } from '../../domain/entities/DiffEntry';

/** Plain record of an entry, without the flags that are absent */
export function entryData(entry: DiffEntry): DiffEntryData {
    const data: DiffEntryData = { path: entry.path, kind: entry.kind };
    if (entry.leftIsDir !== undefined) data.leftIsDir = entry.leftIsDir;
    if (entry.rightIsDir !== undefined) data.rightIsDir = entry.rightIsDir;
    return data;
}

/** The entry seen from the other side: one-sided kinds and directory flags swap */
export function mirrorEntry(entry: DiffEntry): DiffEntry {
    const kind: DiffKind = entry.kind === 'leftOnly'
        ? 'rightOnly'
        : entry.kind === 'rightOnly'
            ? 'leftOnly'
            : entry.kind;
    return new DiffEntry({
        path: entry.path,
        kind,
        leftIsDir: entry.rightIsDir,
        rightIsDir: entry.leftIsDir,
    });
}
