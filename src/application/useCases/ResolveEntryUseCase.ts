import * as path from 'path';
import { DiffEntry } from '../../domain/entities/DiffEntry';
import { IOError } from '../../domain/errors/IOError';
import { IDecisionPort } from '../ports/outbound/IDecisionPort';
import { IFileSystemPort } from '../ports/outbound/IFileSystemPort';
import { ILoggerPort } from '../ports/outbound/ILoggerPort';
import { IReportPort } from '../ports/outbound/IReportPort';
import { EntryOutcome, ResolveOptions } from './EntryOutcome';

/**
 * Resolves LeftOnly, RightOnly and TypeMismatch entries by copying or
 * removing whole paths. Modified files go through ResolveModifiedFileUseCase.
 */
export class ResolveEntryUseCase {
    constructor(
        private readonly fileSystemPort: IFileSystemPort,
        private readonly decisionPort: IDecisionPort,
        private readonly reportPort: IReportPort,
        private readonly logger: ILoggerPort
    ) {}

    async execute(entry: DiffEntry, options: ResolveOptions): Promise<EntryOutcome> {
        const leftPath = path.join(options.leftRoot, entry.path);
        const rightPath = path.join(options.rightRoot, entry.path);

        switch (entry.kind) {
            case 'leftOnly':
                return this.resolveOneSided(entry, leftPath, rightPath, 'right', options.dryRun);
            case 'rightOnly':
                return this.resolveOneSided(entry, rightPath, leftPath, 'left', options.dryRun);
            case 'typeMismatch':
                return this.resolveMismatch(entry, leftPath, rightPath, options.dryRun);
            case 'modified':
                throw new Error(`Modified entry ${entry.path} must be resolved hunk by hunk`);
        }
    }

    private async resolveOneSided(
        entry: DiffEntry,
        existing: string,
        counterpart: string,
        counterpartSide: 'left' | 'right',
        dryRun: boolean
    ): Promise<EntryOutcome> {
        const ownSide = counterpartSide === 'left' ? 'right' : 'left';
        const decision = await this.decisionPort.chooseOneSided(entry);

        switch (decision) {
            case 'copy':
                this.reportPort.applied(`Copying to ${counterpartSide}...`);
                return this.run(entry, 'copy', dryRun, { status: 'copied' }, async () => {
                    await this.fileSystemPort.copy(existing, counterpart);
                });
            case 'delete':
                this.reportPort.applied(`Deleting from ${ownSide}...`);
                return this.run(entry, 'remove', dryRun, { status: 'deleted' }, async () => {
                    await this.fileSystemPort.remove(existing);
                });
            case 'skip':
                return { status: 'skipped' };
            case 'quit':
                return { status: 'quit' };
        }
    }

    private async resolveMismatch(
        entry: DiffEntry,
        leftPath: string,
        rightPath: string,
        dryRun: boolean
    ): Promise<EntryOutcome> {
        const decision = await this.decisionPort.chooseMismatch(entry);

        switch (decision) {
            case 'useLeft':
                this.reportPort.applied('Using left (replacing right)...');
                return this.run(entry, 'copy', dryRun, { status: 'replaced', winner: 'left' }, async () => {
                    await this.fileSystemPort.remove(rightPath);
                    await this.fileSystemPort.copy(leftPath, rightPath);
                });
            case 'useRight':
                this.reportPort.applied('Using right (replacing left)...');
                return this.run(entry, 'copy', dryRun, { status: 'replaced', winner: 'right' }, async () => {
                    await this.fileSystemPort.remove(leftPath);
                    await this.fileSystemPort.copy(rightPath, leftPath);
                });
            case 'skip':
                return { status: 'skipped' };
            case 'quit':
                return { status: 'quit' };
        }
    }

    /**
     * Dry runs report the outcome the action would have had without touching
     * the filesystem.
     */
    private async run(
        entry: DiffEntry,
        operation: 'copy' | 'remove',
        dryRun: boolean,
        outcome: EntryOutcome,
        action: () => Promise<void>
    ): Promise<EntryOutcome> {
        if (dryRun) {
            this.logger.debug(`dry run: ${operation} not performed for ${entry.path}`);
            return outcome;
        }
        try {
            await action();
            return outcome;
        } catch (error) {
            this.logger.logError(`resolve ${entry.path}`, error);
            return { status: 'failed', error: IOError.wrap(operation, entry.path, error), choices: [] };
        }
    }
}
