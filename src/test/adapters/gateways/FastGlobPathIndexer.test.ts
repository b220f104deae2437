import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { FastGlobPathIndexer } from '../../../adapters/gateways/FastGlobPathIndexer';
import { IOError } from '../../../domain/errors/IOError';
import { makeTempDir, removeTempDir, writeFile } from '../../helpers/tempDir';

suite('FastGlobPathIndexer', () => {
    let root: string;
    const indexer = new FastGlobPathIndexer();

    setup(() => {
        root = makeTempDir();
    });

    teardown(() => {
        removeTempDir(root);
    });

    test('indexes files, hidden files and empty directories', async () => {
        writeFile(root, 'a/b.txt', 'b');
        writeFile(root, '.hidden', 'h');
        fs.mkdirSync(path.join(root, 'empty'));

        const index = await indexer.index(root);

        assert.deepStrictEqual([...index.entries()].sort(), [
            ['.hidden', false],
            ['a', true],
            ['a/b.txt', false],
            ['empty', true],
        ]);
    });

    test('empty root gives an empty index', async () => {
        assert.strictEqual((await indexer.index(root)).size, 0);
    });

    test('missing root is a walk error', async () => {
        await assert.rejects(indexer.index(path.join(root, 'nope')), (error: unknown) => {
            assert.ok(error instanceof IOError);
            assert.strictEqual(error.operation, 'walk');
            return true;
        });
    });

    test('a file as root is a walk error', async () => {
        const file = writeFile(root, 'f.txt', 'x');
        await assert.rejects(indexer.index(file), IOError);
    });
});
