/**
 * A contiguous block of line differences produced from one non-equal edit
 * operation.
 *
 * Every line keeps its own trailing newline, except the last line of a source
 * text that had none. Context lines are always taken from the left text.
 */
export interface Hunk {
    readonly leftStart: number;
    readonly leftCount: number;
    readonly rightStart: number;
    readonly rightCount: number;
    readonly leftLines: readonly string[];
    readonly rightLines: readonly string[];
    readonly contextBefore: readonly string[];
    readonly contextAfter: readonly string[];
}

/**
 * Decision for one hunk.
 * - `left`: both sides take the left version
 * - `right`: both sides take the right version
 * - `skip`: each side keeps its own version
 */
export type HunkChoice = 'left' | 'right' | 'skip';

export interface ReconciledTexts {
    left: string;
    right: string;
}
