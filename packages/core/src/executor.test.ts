import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { PipelineCancelledError, ProvisionError } from './errors.js';
import { MatrixExecutor, provisionFailedResults } from './executor.js';
import { FakeRunner, RecordingLogger, testConfig } from './test-fakes.js';
import type { ProvisionedEnvironment } from './types.js';

function environments(...identifiers: string[]): ProvisionedEnvironment[] {
    return identifiers.map(identifier => ({ identifier, location: `/runtimes/${identifier}` }));
}

describe('MatrixExecutor', () => {
    let tempDir: string;

    before(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'matrix-ci-executor-'));
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('runs install, lint and test in order for each environment', async () => {
        const runner = new FakeRunner();
        const results = await new MatrixExecutor(runner, testConfig(tempDir, { concurrency: 1 }))
            .execute(environments('3.5', '3.6'));

        assert.deepEqual(runner.labels(), [
            '3.5:install', '3.5:lint', '3.5:test',
            '3.6:install', '3.6:lint', '3.6:test',
        ]);
        assert.deepEqual(
            results.map(r => [r.environment, r.phase, r.status, r.exitCode]),
            [
                ['3.5', 'install', 'passed', 0],
                ['3.5', 'lint', 'passed', 0],
                ['3.5', 'test', 'passed', 0],
                ['3.6', 'install', 'passed', 0],
                ['3.6', 'lint', 'passed', 0],
                ['3.6', 'test', 'passed', 0],
            ]
        );
    });

    it('expands commands and passes the environment to the runner', async () => {
        const runner = new FakeRunner();
        await new MatrixExecutor(runner, testConfig(tempDir)).execute(environments('3.6'));

        const test = runner.calls[2];
        assert.equal(test.command, 'tox -e py3.6');
        assert.equal(test.cwd, path.resolve(tempDir));
        assert.deepEqual(test.env, { MATRIX_ENV: '3.6', MATRIX_RUNTIME_DIR: '/runtimes/3.6' });
    });

    it('skips lint and test after an install failure without touching other environments', async () => {
        const logger = new RecordingLogger();
        const runner = new FakeRunner({ exitCodes: { '3.5:install': 2 } });
        const results = await new MatrixExecutor(runner, testConfig(tempDir), { logger })
            .execute(environments('3.5', '3.6'));

        const failed = results.filter(r => r.environment === '3.5');
        assert.deepEqual(failed.map(r => [r.phase, r.status, r.exitCode]), [
            ['install', 'failed', 2],
            ['lint', 'skipped', null],
            ['test', 'skipped', null],
        ]);
        assert.deepEqual(failed[0].error, { code: 'INSTALL_FAILED', message: '[3.5] install exited with code 2' });
        assert.deepEqual(
            results.filter(r => r.environment === '3.6').map(r => r.status),
            ['passed', 'passed', 'passed']
        );
        assert.ok(!runner.labels().includes('3.5:lint'));
        assert.deepEqual(logger.messages('warn'), ['[3.5] install exited with code 2']);
    });

    it('keeps going after a lint failure', async () => {
        const runner = new FakeRunner({ exitCodes: { '3.6:lint': 1 } });
        const results = await new MatrixExecutor(runner, testConfig(tempDir)).execute(environments('3.6'));

        assert.deepEqual(results.map(r => r.status), ['passed', 'failed', 'passed']);
        assert.equal(results[1].error?.code, 'LINT_FAILED');
    });

    it('records a command that cannot be started as a failure without exit code', async () => {
        const runner = new FakeRunner({ throwFor: ['3.6:test'] });
        const results = await new MatrixExecutor(runner, testConfig(tempDir)).execute(environments('3.6'));

        assert.equal(results[2].status, 'failed');
        assert.equal(results[2].exitCode, null);
        assert.deepEqual(results[2].error, {
            code: 'TEST_FAILED',
            message: '[3.6] test could not be run: spawn fake ENOENT',
        });
    });

    it('respects the concurrency limit', async () => {
        const runner = new FakeRunner({ delayMs: 20 });
        await new MatrixExecutor(runner, testConfig(tempDir, { concurrency: 2 }))
            .execute(environments('2.7', '3.3', '3.4', '3.5', '3.6'));

        assert.equal(runner.maxActive, 2);
        assert.equal(runner.calls.length, 15);
    });

    it('collects test reports into a directory per environment', async () => {
        const runner = new FakeRunner({
            exitCodes: { '3.5:test': 1 },
            onRun: async spec => {
                if (spec.label?.endsWith(':test') && spec.env) {
                    const reports = path.join(tempDir, 'test-reports', spec.env.MATRIX_ENV);
                    await fs.mkdir(reports, { recursive: true });
                    await fs.writeFile(path.join(reports, 'junit.xml'), `<testsuite name="${spec.env.MATRIX_ENV}"/>`);
                }
            },
        });
        const results = await new MatrixExecutor(runner, testConfig(tempDir)).execute(environments('3.5', '3.6'));

        const artifactRoot = path.join(path.resolve(tempDir), '.matrix-ci', 'artifacts');
        const tests = results.filter(r => r.phase === 'test');
        assert.deepEqual(tests.map(r => r.artifactPaths), [
            [path.join(artifactRoot, '3.5', 'junit.xml')],
            [path.join(artifactRoot, '3.6', 'junit.xml')],
        ]);
        assert.equal(
            await fs.readFile(path.join(artifactRoot, '3.5', 'junit.xml'), 'utf-8'),
            '<testsuite name="3.5"/>'
        );
        assert.deepEqual(results.filter(r => r.phase !== 'test').flatMap(r => r.artifactPaths), []);
    });

    it('produces frozen results', async () => {
        const results = await new MatrixExecutor(new FakeRunner(), testConfig(tempDir)).execute(environments('3.6'));
        assert.ok(results.every(result => Object.isFrozen(result)));
    });

    it('discards partial results when cancelled', async () => {
        const controller = new AbortController();
        const runner = new FakeRunner({ delayMs: 200 });
        const pending = new MatrixExecutor(runner, testConfig(tempDir)).execute(environments('3.5', '3.6'), controller.signal);
        setTimeout(() => controller.abort(), 10);

        await assert.rejects(pending, PipelineCancelledError);
    });
});

describe('provisionFailedResults', () => {
    it('records a failed provision step and skips every phase', () => {
        const results = provisionFailedResults(new ProvisionError('3.3', 'download failed'));
        assert.deepEqual(results.map(r => [r.phase, r.status, r.exitCode]), [
            ['provision', 'failed', null],
            ['install', 'skipped', null],
            ['lint', 'skipped', null],
            ['test', 'skipped', null],
        ]);
        assert.deepEqual(results[0].error, {
            code: 'PROVISION_FAILED',
            message: 'Provisioning 3.3 failed: download failed',
        });
    });
});
