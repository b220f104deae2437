import { DiffEntry } from '../../domain/entities/DiffEntry';
import { HunkPrompt } from '../../application/ports/outbound/IDecisionPort';
import { IReportPort } from '../../application/ports/outbound/IReportPort';
import { SessionSummary } from '../../application/ports/inbound/IMergeSessionUseCase';
import {
    renderDifferencesFound,
    renderEntryHeader,
    renderFileHeader,
    renderHunk,
    renderSummary,
} from '../inbound/ui/terminal/components';

export type TextWriter = (text: string) => void;

export class StdoutReportGateway implements IReportPort {
    constructor(private readonly write: TextWriter = text => { process.stdout.write(text); }) {}

    comparing(leftRoot: string, rightRoot: string): void {
        this.line(`Comparing ${leftRoot} with ${rightRoot}...`);
    }

    differencesFound(entries: readonly DiffEntry[]): void {
        this.line(renderDifferencesFound(entries));
    }

    entry(entry: DiffEntry): void {
        this.line('');
        this.line(renderEntryHeader(entry));
    }

    fileHunkCount(path: string, count: number): void {
        this.line(renderFileHeader(path, count));
    }

    hunk(prompt: HunkPrompt): void {
        this.line('');
        this.line(renderHunk(prompt.hunk, prompt.index, prompt.total, prompt.path));
    }

    notice(message: string): void {
        this.line(`  ${message}`);
    }

    applied(message: string): void {
        this.line(`  ✓ ${message}`);
    }

    failure(path: string, error: Error): void {
        this.line(`  ✗ ${path}: ${error.message}`);
    }

    summary(summary: SessionSummary): void {
        this.line('');
        this.line(renderSummary(summary));
    }

    private line(text: string): void {
        this.write(`${text}\n`);
    }
}
