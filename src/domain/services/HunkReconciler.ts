import { ChangeOp, LineRange } from '../entities/EditOp';
import { HunkChoice, ReconciledTexts } from '../entities/Hunk';
import { TextLines } from '../entities/TextLines';
import { ILineAligner } from './ILineAligner';
import { alignTexts } from './HunkExtractor';

/**
 * Rebuilds both texts from one decision per non-equal edit operation.
 *
 * | op      | left                 | skip                         | right                |
 * |---------|----------------------|------------------------------|----------------------|
 * | delete  | keep in both         | keep in left only            | drop from both       |
 * | insert  | drop from both       | keep in right only           | add to both          |
 * | replace | left lines in both   | each side keeps its own      | right lines in both  |
 *
 * The edit script is recomputed from the texts on every call instead of
 * reusing stored hunks, so `choices[i]` always belongs to the i-th change.
 */
export class HunkReconciler {
    constructor(private readonly aligner: ILineAligner) {}

    reconcile(leftText: string, rightText: string, choices: readonly HunkChoice[]): ReconciledTexts {
        const { left, right, ops } = alignTexts(this.aligner, leftText, rightText);
        const buffers = new MergeBuffers(left, right);

        let changeIndex = 0;
        for (const op of ops) {
            if (op.type === 'equal') {
                buffers.applyEqual(op.left);
                continue;
            }
            // Missing decisions never destroy anything
            const choice = choices[changeIndex] ?? 'skip';
            buffers.applyChange(op, choice);
            changeIndex++;
        }

        const [leftTrailing, rightTrailing] = resolveTrailingNewlines(
            choices,
            left.endsWithNewline,
            right.endsWithNewline
        );

        return {
            left: TextLines.join(buffers.left, leftTrailing),
            right: TextLines.join(buffers.right, rightTrailing),
        };
    }
}

/**
 * The last decisive choice settles the final newline for both sides; with no
 * decisive choice each side keeps its own.
 */
export function resolveTrailingNewlines(
    choices: readonly HunkChoice[],
    leftEndsWithNewline: boolean,
    rightEndsWithNewline: boolean
): [boolean, boolean] {
    for (let i = choices.length - 1; i >= 0; i--) {
        if (choices[i] === 'left') {
            return [leftEndsWithNewline, leftEndsWithNewline];
        }
        if (choices[i] === 'right') {
            return [rightEndsWithNewline, rightEndsWithNewline];
        }
    }
    return [leftEndsWithNewline, rightEndsWithNewline];
}

class MergeBuffers {
    readonly left: string[] = [];
    readonly right: string[] = [];

    constructor(
        private readonly source: TextLines,
        private readonly target: TextLines
    ) {}

    applyEqual(range: LineRange): void {
        const lines = slice(this.source, range);
        this.left.push(...lines);
        this.right.push(...lines);
    }

    applyChange(op: ChangeOp, choice: HunkChoice): void {
        const leftLines = op.type === 'insert' ? [] : slice(this.source, op.left);
        const rightLines = op.type === 'delete' ? [] : slice(this.target, op.right);

        switch (choice) {
            case 'left':
                this.left.push(...leftLines);
                this.right.push(...leftLines);
                break;
            case 'right':
                this.left.push(...rightLines);
                this.right.push(...rightLines);
                break;
            case 'skip':
                this.left.push(...leftLines);
                this.right.push(...rightLines);
                break;
        }
    }
}

/** Raw lines in range; indices outside the text are skipped */
function slice(text: TextLines, range: LineRange): string[] {
    const result: string[] = [];
    for (let i = Math.max(0, range.start); i < range.end; i++) {
        if (text.has(i)) {
            result.push(text.lines[i]);
        }
    }
    return result;
}
