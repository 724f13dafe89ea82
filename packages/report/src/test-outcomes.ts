/**
 * Outcome builders for tests. Not exported from the package index.
 */

import {
    PHASES,
    aggregateResults,
    loadPipelineConfig,
    type CacheState,
    type ExecutionResult,
    type PipelineOutcome,
} from '@matrix-ci/core';

export type ExitCodes = [number | null, number | null, number | null];

/**
 * Results of one environment; null means the phase was skipped.
 */
export function phaseResults(
    environment: string,
    codes: ExitCodes,
    artifactPaths: string[] = []
): ExecutionResult[] {
    return PHASES.map((phase, index): ExecutionResult => {
        const exitCode = codes[index];
        return {
            environment,
            phase,
            status: exitCode === 0 ? 'passed' : exitCode === null ? 'skipped' : 'failed',
            exitCode,
            artifactPaths: phase === 'test' ? artifactPaths : [],
            durationMs: 100,
        };
    });
}

export function outcomeOf(
    results: ExecutionResult[],
    options: { basePath?: string; cache?: CacheState; environments?: string[] } = {}
): PipelineOutcome {
    const environments = options.environments ?? [...new Set(results.map(r => r.environment))];
    const config = loadPipelineConfig({
        environments,
        manifest: 'tox.ini',
        provision: { command: 'pyenv install -s {env}' },
        phases: { install: 'pip install -e .', lint: 'flake8', test: 'tox -e py{env}' },
    }, {}, options.basePath ?? '/work');

    return {
        ...aggregateResults(results, { failOn: config.failOn, environments }),
        metadata: {
            startTime: '2024-05-01T10:00:00.000Z',
            durationMs: 1200,
            version: '0.1.0',
            fingerprint: 'v1-dependencies-abc-def',
            cache: options.cache ?? 'hit',
            config,
        },
    };
}
