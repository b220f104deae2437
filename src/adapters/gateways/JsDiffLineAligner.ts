import { diffArrays } from 'diff';
import { EditOp } from '../../domain/entities/EditOp';
import { ILineAligner } from '../../domain/services/ILineAligner';

/**
 * Line aligner backed by jsdiff's `diffArrays`.
 *
 * jsdiff reports removed and added runs separately; every run of changes
 * between two equal runs is folded into one delete, insert or replace.
 */
export class JsDiffLineAligner implements ILineAligner {
    align(leftLines: readonly string[], rightLines: readonly string[]): EditOp[] {
        const changes = diffArrays([...leftLines], [...rightLines]);
        const ops: EditOp[] = [];

        let leftPos = 0;
        let rightPos = 0;
        let removed = 0;
        let added = 0;

        const flushChange = () => {
            if (removed === 0 && added === 0) return;

            const left = { start: leftPos, end: leftPos + removed };
            const right = { start: rightPos, end: rightPos + added };
            if (added === 0) {
                ops.push({ type: 'delete', left, rightAt: rightPos });
            } else if (removed === 0) {
                ops.push({ type: 'insert', leftAt: leftPos, right });
            } else {
                ops.push({ type: 'replace', left, right });
            }

            leftPos += removed;
            rightPos += added;
            removed = 0;
            added = 0;
        };

        for (const change of changes) {
            const count = change.value.length;
            if (count === 0) continue;

            if (change.removed) {
                removed += count;
            } else if (change.added) {
                added += count;
            } else {
                flushChange();
                ops.push({
                    type: 'equal',
                    left: { start: leftPos, end: leftPos + count },
                    right: { start: rightPos, end: rightPos + count },
                });
                leftPos += count;
                rightPos += count;
            }
        }
        flushChange();

        return ops;
    }
}
