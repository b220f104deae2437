import { ChangeOp, EditOp, isChange, rangeLength } from '../entities/EditOp';
import { Hunk } from '../entities/Hunk';
import { TextLines } from '../entities/TextLines';
import { ILineAligner } from './ILineAligner';

export const DEFAULT_CONTEXT_LINES = 3;

export interface AlignedTexts {
    left: TextLines;
    right: TextLines;
    ops: EditOp[];
}

/**
 * Split both texts and run the aligner over their rendered lines.
 *
 * Shared by extraction and reconciliation so both walk the very same
 * operation sequence for the same pair of texts.
 */
export function alignTexts(aligner: ILineAligner, leftText: string, rightText: string): AlignedTexts {
    const left = TextLines.from(leftText);
    const right = TextLines.from(rightText);
    const ops = aligner.align(left.renderAll(), right.renderAll());
    return { left, right, ops };
}

export class HunkExtractor {
    constructor(private readonly aligner: ILineAligner) {}

    /**
     * One hunk per non-equal edit operation, in operation order.
     */
    extract(leftText: string, rightText: string, contextRadius: number = DEFAULT_CONTEXT_LINES): Hunk[] {
        const { left, right, ops } = alignTexts(this.aligner, leftText, rightText);
        const radius = Math.max(0, Math.floor(contextRadius));

        return ops.filter(isChange).map(op => this.toHunk(op, left, right, radius));
    }

    private toHunk(op: ChangeOp, left: TextLines, right: TextLines, radius: number): Hunk {
        switch (op.type) {
            case 'delete':
                return {
                    leftStart: op.left.start,
                    leftCount: rangeLength(op.left),
                    rightStart: op.rightAt,
                    rightCount: 0,
                    leftLines: left.renderRange(op.left.start, op.left.end),
                    rightLines: [],
                    ...contextAround(left, op.left.start, op.left.end, radius),
                };
            case 'insert':
                // An insertion is anchored between two left lines
                return {
                    leftStart: op.leftAt,
                    leftCount: 0,
                    rightStart: op.right.start,
                    rightCount: rangeLength(op.right),
                    leftLines: [],
                    rightLines: right.renderRange(op.right.start, op.right.end),
                    ...contextAround(left, op.leftAt, op.leftAt, radius),
                };
            case 'replace':
                return {
                    leftStart: op.left.start,
                    leftCount: rangeLength(op.left),
                    rightStart: op.right.start,
                    rightCount: rangeLength(op.right),
                    leftLines: left.renderRange(op.left.start, op.left.end),
                    rightLines: right.renderRange(op.right.start, op.right.end),
                    ...contextAround(left, op.left.start, op.left.end, radius),
                };
        }
    }
}

function contextAround(
    left: TextLines,
    start: number,
    end: number,
    radius: number
): Pick<Hunk, 'contextBefore' | 'contextAfter'> {
    return {
        contextBefore: left.renderRange(start - radius, start),
        contextAfter: left.renderRange(end, Math.min(end + radius, left.length)),
    };
}
