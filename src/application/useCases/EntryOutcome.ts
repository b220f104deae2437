import { HunkChoice } from '../../domain/entities/Hunk';
import { IOError } from '../../domain/errors/IOError';

/**
 * Result of resolving one diff entry. Failures are values, so the caller
 * decides whether to continue with the remaining entries.
 */
export type EntryOutcome =
    | { status: 'copied' }
    | { status: 'deleted' }
    | { status: 'replaced'; winner: 'left' | 'right' }
    | { status: 'skipped' }
    | { status: 'binary' }
    | { status: 'reconciled'; choices: HunkChoice[]; writes: number; stoppedBy?: 'skipFile' | 'quit' }
    | { status: 'quit' }
    | { status: 'failed'; error: IOError; choices: HunkChoice[] };

export function endsSession(outcome: EntryOutcome): boolean {
    return outcome.status === 'quit'
        || (outcome.status === 'reconciled' && outcome.stoppedBy === 'quit');
}

export interface ResolveOptions {
    leftRoot: string;
    rightRoot: string;
    dryRun: boolean;
}
