import * as assert from 'assert';
import { EXIT_FAILURES, EXIT_OK, exitCodeFor, parseCommandLine } from '../cli';
import { emptySummary } from '../application/ports/inbound/IMergeSessionUseCase';
import { ConfigError } from '../infrastructure/config/ConfigLoader';

suite('cli', () => {
    suite('parseCommandLine', () => {
        test('collects flags as overrides', () => {
            const parsed = parseCommandLine([
                '--dry-run', '--context', '5',
                '--exclude-left', 'a', '--exclude-left', 'b',
                '--debug', 'left', 'right',
            ]);
            assert.deepStrictEqual(parsed, {
                command: 'run',
                args: {
                    leftRoot: 'left',
                    rightRoot: 'right',
                    configPath: undefined,
                    overrides: { dryRun: true, excludeLeft: ['a', 'b'], contextLines: 5, logLevel: 'debug' },
                },
            });
        });

        test('no flags means no overrides', () => {
            const parsed = parseCommandLine(['--config', 'c.json', 'l', 'r']);
            assert.deepStrictEqual(parsed, {
                command: 'run',
                args: { leftRoot: 'l', rightRoot: 'r', configPath: 'c.json', overrides: {} },
            });
        });

        test('help and version need no directories', () => {
            assert.deepStrictEqual(parseCommandLine(['--help']), { command: 'help' });
            assert.deepStrictEqual(parseCommandLine(['-v']), { command: 'version' });
        });

        test('usage errors', () => {
            assert.throws(() => parseCommandLine(['only-one']), ConfigError);
            assert.throws(() => parseCommandLine(['--context', 'x', 'l', 'r']), ConfigError);
            assert.throws(() => parseCommandLine(['--debug', '--quiet', 'l', 'r']), ConfigError);
            assert.throws(() => parseCommandLine(['--bogus', 'l', 'r']), ConfigError);
        });
    });

    test('exit code reflects failures', () => {
        assert.strictEqual(exitCodeFor(emptySummary(false)), EXIT_OK);
        assert.strictEqual(exitCodeFor({ ...emptySummary(false), cancelled: true }), EXIT_OK);
        assert.strictEqual(
            exitCodeFor({ ...emptySummary(false), failures: [{ path: 'a', message: 'boom' }] }),
            EXIT_FAILURES
        );
    });
});
