import * as path from 'path';
import ignore, { Ignore } from 'ignore';
import { DiffEntry } from '../../domain/entities/DiffEntry';
import { HunkChoice } from '../../domain/entities/Hunk';
import { IOError } from '../../domain/errors/IOError';
import { ancestorsOf, IDirectoryComparator } from '../../domain/services/DirectoryComparator';
import { IFileComparator } from '../../domain/services/IFileComparator';
import {
    emptySummary,
    IMergeSessionUseCase,
    SessionOptions,
    SessionSummary,
} from '../ports/inbound/IMergeSessionUseCase';
import { IFileSystemPort } from '../ports/outbound/IFileSystemPort';
import { ILoggerPort } from '../ports/outbound/ILoggerPort';
import { IReportPort } from '../ports/outbound/IReportPort';
import { endsSession, EntryOutcome } from './EntryOutcome';
import { ResolveEntryUseCase } from './ResolveEntryUseCase';
import { ResolveModifiedFileUseCase } from './ResolveModifiedFileUseCase';

interface ExclusionRules {
    left: Ignore;
    right: Ignore;
}

export class MergeSessionUseCase implements IMergeSessionUseCase {
    constructor(
        private readonly directoryComparator: IDirectoryComparator,
        private readonly fileComparator: IFileComparator,
        private readonly fileSystemPort: IFileSystemPort,
        private readonly resolveEntryUseCase: ResolveEntryUseCase,
        private readonly resolveModifiedFileUseCase: ResolveModifiedFileUseCase,
        private readonly reportPort: IReportPort,
        private readonly logger: ILoggerPort
    ) {}

    async execute(options: SessionOptions): Promise<SessionSummary> {
        await this.requireDirectory(options.leftRoot);
        await this.requireDirectory(options.rightRoot);

        const summary = emptySummary(options.dryRun);
        this.reportPort.comparing(options.leftRoot, options.rightRoot);

        const { entries, failures } = await this.directoryComparator.compare(options.leftRoot, options.rightRoot);
        summary.differences = entries.length + failures.length;
        this.logger.info(
            `compared ${options.leftRoot} with ${options.rightRoot}: ` +
            `${entries.length} difference(s), ${failures.length} unreadable pair(s)`
        );
        for (const failure of failures) {
            this.logger.warn(`cannot compare ${failure.path}: ${failure.error.message}`);
            this.recordFailure(summary, failure.path, failure.error);
        }

        if (summary.differences === 0) {
            this.reportPort.notice('Directories are identical!');
            return summary;
        }
        this.reportPort.differencesFound(entries);

        const rules: ExclusionRules = {
            left: ignore().add(options.exclude.left),
            right: ignore().add(options.exclude.right),
        };
        // Paths whose whole subtree was already replaced by a type-mismatch resolution
        const replacedRoots = new Set<string>();

        for (const entry of entries) {
            if (this.isExcluded(entry, rules)) {
                this.logger.debug(`excluded: ${entry.path}`);
                summary.excluded++;
                continue;
            }
            if (ancestorsOf(entry.path).some(ancestor => replacedRoots.has(ancestor))) {
                this.logger.debug(`already replaced with its parent: ${entry.path}`);
                continue;
            }

            const outcome = await this.resolve(entry, options);
            this.tally(summary, entry, outcome);

            if (outcome.status === 'replaced') {
                replacedRoots.add(entry.path);
            }
            if (endsSession(outcome)) {
                this.reportPort.notice('Quitting...');
                summary.cancelled = true;
                break;
            }
        }

        this.reportPort.summary(summary);
        return summary;
    }

    private async resolve(entry: DiffEntry, options: SessionOptions): Promise<EntryOutcome> {
        const resolveOptions = {
            leftRoot: options.leftRoot,
            rightRoot: options.rightRoot,
            dryRun: options.dryRun,
        };

        if (entry.kind === 'modified') {
            this.reportPort.entry(entry);
            return this.resolveModifiedFileUseCase.execute(entry, {
                ...resolveOptions,
                contextLines: options.contextLines,
                skipBinary: options.skipBinary,
            });
        }

        if (options.skipBinary && (entry.kind === 'leftOnly' || entry.kind === 'rightOnly') && !entry.isOnlyDirectory) {
            const root = entry.kind === 'leftOnly' ? options.leftRoot : options.rightRoot;
            try {
                if (await this.fileComparator.isBinary(path.join(root, entry.path))) {
                    return { status: 'binary' };
                }
            } catch (error) {
                return { status: 'failed', error: IOError.wrap('read', entry.path, error), choices: [] };
            }
        }

        this.reportPort.entry(entry);
        return this.resolveEntryUseCase.execute(entry, resolveOptions);
    }

    private isExcluded(entry: DiffEntry, rules: ExclusionRules): boolean {
        const isDir = entry.kind === 'leftOnly'
            ? entry.leftIsDir === true
            : entry.kind === 'rightOnly'
                ? entry.rightIsDir === true
                : false;
        const candidate = isDir ? `${entry.path}/` : entry.path;

        switch (entry.kind) {
            case 'leftOnly':
                return rules.left.ignores(candidate);
            case 'rightOnly':
                return rules.right.ignores(candidate);
            case 'modified':
            case 'typeMismatch':
                return rules.left.ignores(entry.path) || rules.right.ignores(entry.path);
        }
    }

    private tally(summary: SessionSummary, entry: DiffEntry, outcome: EntryOutcome): void {
        switch (outcome.status) {
            case 'copied':
                summary.copied++;
                break;
            case 'deleted':
                summary.deleted++;
                break;
            case 'replaced':
                summary.replaced++;
                if (outcome.winner === 'left') {
                    summary.leftChoices++;
                } else {
                    summary.rightChoices++;
                }
                break;
            case 'skipped':
                summary.skipped++;
                break;
            case 'binary':
                summary.binarySkipped++;
                break;
            case 'reconciled':
                this.countChoices(summary, outcome.choices);
                break;
            case 'failed':
                this.countChoices(summary, outcome.choices);
                this.recordFailure(summary, entry.path, outcome.error);
                break;
            case 'quit':
                break;
        }
    }

    private countChoices(summary: SessionSummary, choices: readonly HunkChoice[]): void {
        summary.hunksDecided += choices.length;
        for (const choice of choices) {
            if (choice === 'left') summary.leftChoices++;
            else if (choice === 'right') summary.rightChoices++;
            else summary.skipped++;
        }
    }

    private recordFailure(summary: SessionSummary, entryPath: string, error: IOError): void {
        summary.failures.push({ path: entryPath, message: error.message });
        this.reportPort.failure(entryPath, error);
    }

    private async requireDirectory(root: string): Promise<void> {
        const type = await this.fileSystemPort.pathType(root);
        if (type !== 'directory') {
            throw new IOError('stat', root, 'not a directory');
        }
    }
}
