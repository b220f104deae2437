import * as path from 'path';
import { DiffEntry } from '../../domain/entities/DiffEntry';
import { HunkChoice } from '../../domain/entities/Hunk';
import { IOError } from '../../domain/errors/IOError';
import { HunkExtractor } from '../../domain/services/HunkExtractor';
import { HunkReconciler } from '../../domain/services/HunkReconciler';
import { IFileComparator, TextReadResult } from '../../domain/services/IFileComparator';
import { IDecisionPort } from '../ports/outbound/IDecisionPort';
import { IFileSystemPort } from '../ports/outbound/IFileSystemPort';
import { ILoggerPort } from '../ports/outbound/ILoggerPort';
import { IReportPort } from '../ports/outbound/IReportPort';
import { EntryOutcome, ResolveOptions } from './EntryOutcome';

export interface ModifiedFileOptions extends ResolveOptions {
    contextLines: number;
    skipBinary: boolean;
}

/**
 * Walks the hunks of one modified file pair, one decision at a time.
 *
 * After every left/right decision both files are rebuilt from the original
 * texts and the decisions made so far, then rewritten whole. Whatever point
 * the session stops at, each file on disk reflects a complete set of
 * decisions.
 */
export class ResolveModifiedFileUseCase {
    constructor(
        private readonly fileComparator: IFileComparator,
        private readonly hunkExtractor: HunkExtractor,
        private readonly hunkReconciler: HunkReconciler,
        private readonly fileSystemPort: IFileSystemPort,
        private readonly decisionPort: IDecisionPort,
        private readonly reportPort: IReportPort,
        private readonly logger: ILoggerPort
    ) {}

    async execute(entry: DiffEntry, options: ModifiedFileOptions): Promise<EntryOutcome> {
        const leftPath = path.join(options.leftRoot, entry.path);
        const rightPath = path.join(options.rightRoot, entry.path);

        let leftContent: TextReadResult;
        let rightContent: TextReadResult;
        try {
            leftContent = await this.fileComparator.readAsText(leftPath);
            rightContent = await this.fileComparator.readAsText(rightPath);
        } catch (error) {
            this.logger.logError(`read ${entry.path}`, error);
            return { status: 'failed', error: IOError.wrap('read', entry.path, error), choices: [] };
        }

        if (leftContent.kind === 'binary' || rightContent.kind === 'binary') {
            if (!options.skipBinary) {
                this.reportPort.notice(`${entry.path} (binary file - skipping)`);
            }
            return { status: 'binary' };
        }

        const leftText = leftContent.text;
        const rightText = rightContent.text;
        const hunks = this.hunkExtractor.extract(leftText, rightText, options.contextLines);
        this.logger.debug(`${entry.path}: ${hunks.length} hunk(s)`);

        const choices: HunkChoice[] = [];
        let writes = 0;
        if (hunks.length === 0) {
            return { status: 'reconciled', choices, writes };
        }

        this.reportPort.fileHunkCount(entry.path, hunks.length);

        for (let index = 0; index < hunks.length; index++) {
            const prompt = { path: entry.path, hunk: hunks[index], index, total: hunks.length };
            this.reportPort.hunk(prompt);

            const decision = await this.decisionPort.chooseHunk(prompt);
            if (decision === 'skipFile' || decision === 'quit') {
                return { status: 'reconciled', choices, writes, stoppedBy: decision };
            }

            choices.push(decision);
            if (decision === 'skip' || options.dryRun) {
                continue;
            }

            const merged = this.hunkReconciler.reconcile(leftText, rightText, choices);
            try {
                await this.fileSystemPort.writeText(leftPath, merged.left);
                await this.fileSystemPort.writeText(rightPath, merged.right);
            } catch (error) {
                this.logger.logError(`write ${entry.path}`, error);
                return { status: 'failed', error: IOError.wrap('write', entry.path, error), choices };
            }
            writes++;
            this.reportPort.applied('Applied.');
        }

        return { status: 'reconciled', choices, writes };
    }
}
