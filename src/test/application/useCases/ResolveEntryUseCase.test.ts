import * as assert from 'assert';
import { ResolveEntryUseCase } from '../../../application/useCases';
import { MismatchDecision, OneSidedDecision } from '../../../application/ports/outbound/IDecisionPort';
import { DiffEntry } from '../../../domain/entities/DiffEntry';
import { MemoryFileSystem, RecordingLogger, RecordingReport, ScriptedDecisions } from '../../helpers/fakes';

suite('ResolveEntryUseCase', () => {
    let fs: MemoryFileSystem;
    let report: RecordingReport;
    let dryRun: boolean;

    const resolve = (entry: DiffEntry, oneSided: OneSidedDecision[], mismatches: MismatchDecision[] = []) => {
        const useCase = new ResolveEntryUseCase(
            fs,
            new ScriptedDecisions([], oneSided, mismatches),
            report,
            new RecordingLogger()
        );
        return useCase.execute(entry, { leftRoot: '/L', rightRoot: '/R', dryRun });
    };

    setup(() => {
        fs = new MemoryFileSystem().addDir('/L').addDir('/R');
        report = new RecordingReport();
        dryRun = false;
    });

    suite('one-sided entries', () => {
        test('copy a left-only file to the right', async () => {
            fs.addFile('/L/new.txt', 'n');
            const outcome = await resolve(DiffEntry.leftOnly('new.txt', false), ['copy']);

            assert.deepStrictEqual(outcome, { status: 'copied' });
            assert.strictEqual(fs.files.get('/R/new.txt'), 'n');
            assert.deepStrictEqual(report.events, ['applied Copying to right...']);
        });

        test('copy a right-only directory tree to the left', async () => {
            fs.addFile('/R/docs/a/b.md', 'b');
            await resolve(DiffEntry.rightOnly('docs', true), ['copy']);
            assert.strictEqual(fs.files.get('/L/docs/a/b.md'), 'b');
        });

        test('delete a right-only file', async () => {
            fs.addFile('/R/old.txt', 'o');
            const outcome = await resolve(DiffEntry.rightOnly('old.txt', false), ['delete']);

            assert.deepStrictEqual(outcome, { status: 'deleted' });
            assert.strictEqual(fs.files.has('/R/old.txt'), false);
            assert.deepStrictEqual(report.events, ['applied Deleting from right...']);
        });

        test('dry run reports without touching anything', async () => {
            dryRun = true;
            fs.addFile('/L/new.txt', 'n');
            const outcome = await resolve(DiffEntry.leftOnly('new.txt', false), ['copy']);

            assert.deepStrictEqual(outcome, { status: 'copied' });
            assert.strictEqual(fs.files.has('/R/new.txt'), false);
        });

        test('skip and quit', async () => {
            const entry = DiffEntry.leftOnly('x', false);
            assert.deepStrictEqual(await resolve(entry, ['skip']), { status: 'skipped' });
            assert.deepStrictEqual(await resolve(entry, ['quit']), { status: 'quit' });
        });

        test('a failed copy is returned as an outcome', async () => {
            fs.addFile('/L/new.txt', 'n');
            fs.failures.add('copy:/L/new.txt');
            const outcome = await resolve(DiffEntry.leftOnly('new.txt', false), ['copy']);

            assert.strictEqual(outcome.status, 'failed');
            if (outcome.status === 'failed') {
                assert.strictEqual(outcome.error.operation, 'copy');
                assert.deepStrictEqual(outcome.choices, []);
            }
        });
    });

    suite('type mismatches', () => {
        setup(() => {
            fs.addFile('/L/m', 'file');
            fs.addFile('/R/m/inner.txt', 'i');
        });

        test('use left replaces the right directory with the file', async () => {
            const outcome = await resolve(DiffEntry.typeMismatch('m', false, true), [], ['useLeft']);

            assert.deepStrictEqual(outcome, { status: 'replaced', winner: 'left' });
            assert.strictEqual(fs.files.get('/R/m'), 'file');
            assert.strictEqual(fs.files.has('/R/m/inner.txt'), false);
            assert.strictEqual(await fs.pathType('/R/m'), 'file');
        });

        test('use right replaces the left file with the directory', async () => {
            const outcome = await resolve(DiffEntry.typeMismatch('m', false, true), [], ['useRight']);

            assert.deepStrictEqual(outcome, { status: 'replaced', winner: 'right' });
            assert.strictEqual(await fs.pathType('/L/m'), 'directory');
            assert.strictEqual(fs.files.get('/L/m/inner.txt'), 'i');
        });
    });

    test('modified entries are refused', async () => {
        await assert.rejects(resolve(DiffEntry.modified('f'), []), /hunk by hunk/);
    });
});
