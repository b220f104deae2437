import { DiffEntry } from '../../../domain/entities/DiffEntry';
import { HunkPrompt } from './IDecisionPort';
import { SessionSummary } from '../inbound/IMergeSessionUseCase';

/**
 * User-facing progress output.
 *
 * The adapter receives domain values and decides how to present them.
 */
export interface IReportPort {
    comparing(leftRoot: string, rightRoot: string): void;
    differencesFound(entries: readonly DiffEntry[]): void;
    entry(entry: DiffEntry): void;
    hunk(prompt: HunkPrompt): void;
    fileHunkCount(path: string, count: number): void;
    notice(message: string): void;
    applied(message: string): void;
    failure(path: string, error: Error): void;
    summary(summary: SessionSummary): void;
}
