import * as assert from 'assert';
import { ResolveModifiedFileUseCase, ModifiedFileOptions } from '../../../application/useCases';
import { HunkDecision } from '../../../application/ports/outbound/IDecisionPort';
import { JsDiffLineAligner } from '../../../adapters/gateways/JsDiffLineAligner';
import { DiffEntry } from '../../../domain/entities/DiffEntry';
import { HunkExtractor } from '../../../domain/services/HunkExtractor';
import { HunkReconciler } from '../../../domain/services/HunkReconciler';
import { MemoryFileSystem, RecordingLogger, RecordingReport, ScriptedDecisions } from '../../helpers/fakes';

const LEFT = '1\nA\n3\n4\n5\n6\nB\n8\n';
const RIGHT = '1\nX\n3\n4\n5\n6\nY\n8\n';

suite('ResolveModifiedFileUseCase', () => {
    let fs: MemoryFileSystem;
    let report: RecordingReport;
    let options: ModifiedFileOptions;

    const run = (decisions: HunkDecision[]) => {
        const aligner = new JsDiffLineAligner();
        const useCase = new ResolveModifiedFileUseCase(
            fs,
            new HunkExtractor(aligner),
            new HunkReconciler(aligner),
            fs,
            new ScriptedDecisions(decisions),
            report,
            new RecordingLogger()
        );
        return useCase.execute(DiffEntry.modified('f.txt'), options);
    };

    setup(() => {
        fs = new MemoryFileSystem().addFile('/L/f.txt', LEFT).addFile('/R/f.txt', RIGHT);
        report = new RecordingReport();
        options = { leftRoot: '/L', rightRoot: '/R', dryRun: false, contextLines: 3, skipBinary: false };
    });

    test('rewrites both files after every decisive choice', async () => {
        const outcome = await run(['left', 'right']);

        assert.deepStrictEqual(outcome, { status: 'reconciled', choices: ['left', 'right'], writes: 2 });
        assert.deepStrictEqual(fs.writes, [
            ['/L/f.txt', LEFT],
            ['/R/f.txt', '1\nA\n3\n4\n5\n6\nY\n8\n'],
            ['/L/f.txt', '1\nA\n3\n4\n5\n6\nY\n8\n'],
            ['/R/f.txt', '1\nA\n3\n4\n5\n6\nY\n8\n'],
        ]);
        assert.deepStrictEqual(report.events, [
            'hunks f.txt 2',
            'hunk 1/2',
            'applied Applied.',
            'hunk 2/2',
            'applied Applied.',
        ]);
    });

    test('skip writes nothing and quit stops the file', async () => {
        const outcome = await run(['skip', 'quit']);
        assert.deepStrictEqual(outcome, { status: 'reconciled', choices: ['skip'], writes: 0, stoppedBy: 'quit' });
        assert.deepStrictEqual(fs.writes, []);
    });

    test('skip file keeps earlier writes', async () => {
        const outcome = await run(['right', 'skipFile']);
        assert.deepStrictEqual(outcome, { status: 'reconciled', choices: ['right'], writes: 1, stoppedBy: 'skipFile' });
        assert.strictEqual(fs.files.get('/L/f.txt'), '1\nX\n3\n4\n5\n6\nB\n8\n');
        assert.strictEqual(fs.files.get('/R/f.txt'), RIGHT);
    });

    test('dry run records choices without writing', async () => {
        options.dryRun = true;
        const outcome = await run(['left', 'left']);
        assert.deepStrictEqual(outcome, { status: 'reconciled', choices: ['left', 'left'], writes: 0 });
        assert.deepStrictEqual(fs.writes, []);
    });

    test('binary files are reported and skipped', async () => {
        fs.addFile('/L/f.txt', 'a\0b');
        const outcome = await run([]);
        assert.deepStrictEqual(outcome, { status: 'binary' });
        assert.deepStrictEqual(report.events, ['notice f.txt (binary file - skipping)']);
    });

    test('binary files are silent with skipBinary', async () => {
        fs.addFile('/R/f.txt', '\0');
        options.skipBinary = true;
        assert.deepStrictEqual(await run([]), { status: 'binary' });
        assert.deepStrictEqual(report.events, []);
    });

    test('files equal as text produce no prompt', async () => {
        fs.addFile('/R/f.txt', LEFT);
        assert.deepStrictEqual(await run([]), { status: 'reconciled', choices: [], writes: 0 });
    });

    test('a failed write ends the file with the choices made so far', async () => {
        fs.failures.add('write:/R/f.txt');
        const outcome = await run(['left', 'left']);

        assert.strictEqual(outcome.status, 'failed');
        if (outcome.status === 'failed') {
            assert.deepStrictEqual(outcome.choices, ['left']);
            assert.strictEqual(outcome.error.operation, 'write');
        }
    });

    test('a failed read is reported as a failure', async () => {
        fs.failures.add('read:/L/f.txt');
        const outcome = await run([]);
        assert.strictEqual(outcome.status, 'failed');
    });
});
