import * as path from 'node:path';
import {
    ConfigError,
    DEFAULT_CONFIG_FILE,
    parsePhaseList,
    type ConfigOverrides,
    type PipelineOutcome,
} from '@matrix-ci/core';

export interface ActionInputs {
    configPath: string;
    overrides: ConfigOverrides;

    /** JSON report destination; empty when not requested */
    reportPath: string;

    /** Bearer token for the coverage service; overrides the configured environment variable */
    coverageToken: string;

    /** Token for posting a commit status; empty disables it */
    githubToken: string;
}

export type InputReader = (name: string) => string;

/**
 * Read and validate the workflow inputs.
 *
 * @throws ConfigError on an invalid concurrency, fail-on or cache value
 */
export function readActionInputs(getInput: InputReader, workspace: string): ActionInputs {
    const overrides: ConfigOverrides = {};

    const basePath = getInput('base-path');
    if (basePath) {
        overrides.basePath = path.resolve(workspace, basePath);
    }

    const concurrency = getInput('concurrency');
    if (concurrency) {
        const value = Number(concurrency);
        if (!Number.isInteger(value) || value < 1) {
            throw new ConfigError(`Input concurrency must be a positive integer, got "${concurrency}"`);
        }
        overrides.concurrency = value;
    }

    const failOn = getInput('fail-on');
    if (failOn) {
        overrides.failOn = parsePhaseList(failOn);
    }

    const cache = getInput('cache');
    if (cache === 'false') {
        overrides.cacheEnabled = false;
    } else if (cache && cache !== 'true') {
        throw new ConfigError(`Input cache must be "true" or "false", got "${cache}"`);
    }

    return {
        configPath: path.resolve(workspace, getInput('config') || DEFAULT_CONFIG_FILE),
        overrides,
        reportPath: getInput('report') && path.resolve(workspace, getInput('report')),
        coverageToken: getInput('coverage-token'),
        githubToken: getInput('github-token'),
    };
}

/**
 * Identifiers of the failed environments, in matrix order.
 */
export function failedEnvironments(outcome: Pick<PipelineOutcome, 'perEnvironment'>): string[] {
    return Object.values(outcome.perEnvironment)
        .filter(env => env.status === 'failed')
        .map(env => env.identifier);
}
