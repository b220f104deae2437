import * as assert from 'assert';
import { JsDiffLineAligner } from '../../../adapters/gateways/JsDiffLineAligner';

suite('JsDiffLineAligner', () => {
    const aligner = new JsDiffLineAligner();

    test('changed middle line is a replace between equal runs', () => {
        assert.deepStrictEqual(aligner.align(['a', 'b', 'c'], ['a', 'x', 'c']), [
            { type: 'equal', left: { start: 0, end: 1 }, right: { start: 0, end: 1 } },
            { type: 'replace', left: { start: 1, end: 2 }, right: { start: 1, end: 2 } },
            { type: 'equal', left: { start: 2, end: 3 }, right: { start: 2, end: 3 } },
        ]);
    });

    test('appended line is an insert after the last left line', () => {
        assert.deepStrictEqual(aligner.align(['a'], ['a', 'b']), [
            { type: 'equal', left: { start: 0, end: 1 }, right: { start: 0, end: 1 } },
            { type: 'insert', leftAt: 1, right: { start: 1, end: 2 } },
        ]);
    });

    test('removed first line is a delete anchored at the right start', () => {
        assert.deepStrictEqual(aligner.align(['a', 'b'], ['b']), [
            { type: 'delete', left: { start: 0, end: 1 }, rightAt: 0 },
            { type: 'equal', left: { start: 1, end: 2 }, right: { start: 0, end: 1 } },
        ]);
    });

    test('adjacent removals and additions fold into one replace', () => {
        assert.deepStrictEqual(aligner.align(['a', 'b'], ['c', 'd', 'e']), [
            { type: 'replace', left: { start: 0, end: 2 }, right: { start: 0, end: 3 } },
        ]);
    });

    test('two empty inputs give no operations', () => {
        assert.deepStrictEqual(aligner.align([], []), []);
    });
});
