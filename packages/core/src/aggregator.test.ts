import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { aggregateResults } from './aggregator.js';
import { ProvisionError } from './errors.js';
import { provisionFailedResults } from './executor.js';
import type { ExecutionResult, Phase, ResultStatus } from './types.js';

const ALL: Phase[] = ['install', 'lint', 'test'];

function result(
    environment: string,
    phase: Phase,
    exitCode: number | null,
    status: ResultStatus = exitCode === 0 ? 'passed' : exitCode === null ? 'skipped' : 'failed'
): ExecutionResult {
    return { environment, phase, status, exitCode, artifactPaths: [], durationMs: 0 };
}

function environmentResults(environment: string, codes: [number | null, number | null, number | null]): ExecutionResult[] {
    return ALL.map((phase, index) => result(environment, phase, codes[index]));
}

describe('aggregateResults', () => {
    it('treats an empty matrix as success', () => {
        assert.deepEqual(aggregateResults([], { failOn: ALL }), {
            status: 'success',
            perEnvironment: {},
            summary: { environments: 0, passed: 0, failed: 0, skippedPhases: 0 },
        });
    });

    it('fails on a single failing test and keeps per-phase detail', () => {
        const results = [
            ...environmentResults('3.5', [0, 0, 1]),
            ...environmentResults('3.6', [0, 0, 0]),
        ];
        const aggregate = aggregateResults(results, { failOn: ALL, environments: ['3.5', '3.6'] });

        assert.equal(aggregate.status, 'failure');
        assert.equal(aggregate.perEnvironment['3.5'].status, 'failed');
        assert.equal(aggregate.perEnvironment['3.5'].phases.test?.exitCode, 1);
        assert.deepEqual(
            ALL.map(phase => aggregate.perEnvironment['3.6'].phases[phase]?.exitCode),
            [0, 0, 0]
        );
        assert.deepEqual(aggregate.summary, { environments: 2, passed: 1, failed: 1, skippedPhases: 0 });
    });

    it('is idempotent and independent of arrival order', () => {
        const results = [
            ...environmentResults('3.5', [0, 1, 0]),
            ...environmentResults('3.6', [2, null, null]),
            ...environmentResults('2.7', [0, 0, 0]),
        ];
        const shuffled = [results[5], results[0], results[7], results[3], results[1], results[8], results[2], results[6], results[4]];
        const options = { failOn: ALL, environments: ['2.7', '3.5', '3.6'] };

        const first = aggregateResults(results, options);
        assert.deepEqual(aggregateResults(results, options), first);
        assert.deepEqual(aggregateResults(shuffled, options), first);
        assert.deepEqual(Object.keys(first.perEnvironment), ['2.7', '3.5', '3.6']);
    });

    it('orders environments by identifier when no matrix order is given', () => {
        const aggregate = aggregateResults([
            ...environmentResults('3.6', [0, 0, 0]),
            ...environmentResults('3.5', [0, 0, 0]),
        ], { failOn: ALL });
        assert.deepEqual(Object.keys(aggregate.perEnvironment), ['3.5', '3.6']);
    });

    it('counts skipped phases after an install failure', () => {
        const aggregate = aggregateResults(environmentResults('3.6', [1, null, null]), { failOn: ALL });
        assert.equal(aggregate.status, 'failure');
        assert.equal(aggregate.summary.skippedPhases, 2);
        assert.equal(aggregate.perEnvironment['3.6'].phases.lint?.status, 'skipped');
    });

    it('ignores failures after the last fatal phase for the overall status', () => {
        const aggregate = aggregateResults(environmentResults('3.6', [0, 1, 0]), { failOn: ['install'] });
        assert.equal(aggregate.status, 'success');
        assert.equal(aggregate.perEnvironment['3.6'].status, 'failed');
    });

    it('counts a lint failure when only test is fatal', () => {
        const aggregate = aggregateResults(environmentResults('3.6', [0, 1, 0]), { failOn: ['test'] });
        assert.equal(aggregate.status, 'failure');
    });

    it('counts an install failure when only test is fatal', () => {
        const aggregate = aggregateResults(environmentResults('3.6', [1, null, null]), { failOn: ['test'] });
        assert.equal(aggregate.status, 'failure');
        assert.equal(aggregate.summary.skippedPhases, 2);
    });

    it('counts an install failure even when no phase is fatal', () => {
        const aggregate = aggregateResults(environmentResults('3.6', [1, null, null]), { failOn: [] });
        assert.equal(aggregate.status, 'failure');
    });

    it('always fails on a provisioning failure', () => {
        const aggregate = aggregateResults(
            [
                ...provisionFailedResults(new ProvisionError('3.3', 'disk full')),
                ...environmentResults('3.6', [0, 0, 0]),
            ],
            { failOn: [] }
        );
        assert.equal(aggregate.status, 'failure');
        assert.equal(aggregate.perEnvironment['3.3'].provision?.error?.code, 'PROVISION_FAILED');
        assert.deepEqual(aggregate.summary, { environments: 2, passed: 1, failed: 1, skippedPhases: 3 });
    });
});
