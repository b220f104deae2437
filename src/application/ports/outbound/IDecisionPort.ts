import { DiffEntry } from '../../../domain/entities/DiffEntry';
import { Hunk, HunkChoice } from '../../../domain/entities/Hunk';

export type HunkDecision = HunkChoice | 'skipFile' | 'quit';

/** Answer for a LeftOnly/RightOnly entry */
export type OneSidedDecision = 'copy' | 'delete' | 'skip' | 'quit';

/** Answer for a TypeMismatch entry */
export type MismatchDecision = 'useLeft' | 'useRight' | 'skip' | 'quit';

export interface HunkPrompt {
    path: string;
    hunk: Hunk;
    index: number;
    total: number;
}

/**
 * Interactive decision source. Questions are asked strictly one at a time.
 */
export interface IDecisionPort {
    chooseHunk(prompt: HunkPrompt): Promise<HunkDecision>;
    chooseOneSided(entry: DiffEntry): Promise<OneSidedDecision>;
    chooseMismatch(entry: DiffEntry): Promise<MismatchDecision>;
}
