import * as assert from 'assert';
import { TextLines } from '../../../domain/entities/TextLines';

suite('TextLines', () => {
    suite('from', () => {
        test('empty text has no lines and no trailing newline', () => {
            const text = TextLines.from('');
            assert.deepStrictEqual(text.lines, []);
            assert.strictEqual(text.endsWithNewline, false);
        });

        test('drops exactly one trailing newline', () => {
            const text = TextLines.from('a\n\n');
            assert.deepStrictEqual(text.lines, ['a', '']);
            assert.strictEqual(text.endsWithNewline, true);
        });

        test('a lone newline is one empty line', () => {
            const text = TextLines.from('\n');
            assert.deepStrictEqual(text.lines, ['']);
            assert.strictEqual(text.endsWithNewline, true);
        });

        test('splits on LF only and keeps CR in the line', () => {
            assert.deepStrictEqual(TextLines.from('a\r\nb\r\n').lines, ['a\r', 'b\r']);
        });
    });

    suite('rendering', () => {
        test('last line stays bare without a trailing newline', () => {
            const text = TextLines.from('a\nb');
            assert.deepStrictEqual(text.renderAll(), ['a\n', 'b']);
        });

        test('renderRange skips indices outside the text', () => {
            const text = TextLines.from('a\nb\nc\n');
            assert.deepStrictEqual(text.renderRange(-2, 1), ['a\n']);
            assert.deepStrictEqual(text.renderRange(2, 9), ['c\n']);
        });

        test('toString restores the original text', () => {
            for (const raw of ['', 'x', 'x\n', 'a\n\nb', '\n\n']) {
                assert.strictEqual(TextLines.from(raw).toString(), raw);
            }
        });
    });

    suite('join', () => {
        test('appends a newline only when asked', () => {
            assert.strictEqual(TextLines.join(['a', 'b'], true), 'a\nb\n');
            assert.strictEqual(TextLines.join(['a', 'b'], false), 'a\nb');
        });

        test('empty buffer never gets a newline', () => {
            assert.strictEqual(TextLines.join([], true), '');
        });
    });
});
