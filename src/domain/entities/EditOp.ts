/**
 * Half-open range of 0-based line indices: `start` inclusive, `end` exclusive.
 */
export interface LineRange {
    start: number;
    end: number;
}

/**
 * One unit of a line-level alignment between two texts.
 *
 * A valid sequence is ordered, contiguous and covers both line ranges.
 * Consumers still treat out-of-range indices as absent lines, since the
 * sequence comes from an external aligner.
 */
export type EditOp =
    | { type: 'equal'; left: LineRange; right: LineRange }
    | { type: 'delete'; left: LineRange; rightAt: number }
    | { type: 'insert'; leftAt: number; right: LineRange }
    | { type: 'replace'; left: LineRange; right: LineRange };

export type ChangeOp = Exclude<EditOp, { type: 'equal' }>;

export function isChange(op: EditOp): op is ChangeOp {
    return op.type !== 'equal';
}

export function rangeLength(range: LineRange): number {
    return Math.max(0, range.end - range.start);
}
