/**
 * JSON report.
 *
 * A stable, flattened view of the outcome for tooling: environments as an
 * ordered array, artifact paths relative to the project with forward
 * slashes, and the publishing summary when reporting ran.
 */

import * as path from 'node:path';
import {
    PHASES,
    type CacheState,
    type ErrorInfo,
    type OverallStatus,
    type PipelineOutcome,
    type PipelineSummary,
    type ReportSummary,
    type ResultStatus,
    type Step,
} from '@matrix-ci/core';

export interface JsonStepReport {
    phase: Step;
    status: ResultStatus;
    exitCode: number | null;
    durationMs: number;
    artifacts: string[];
    error?: ErrorInfo;
}

export interface JsonEnvironmentReport {
    identifier: string;
    status: 'passed' | 'failed';
    steps: JsonStepReport[];
}

export interface JsonReport {
    version: string;
    status: OverallStatus;
    startTime: string;
    durationMs: number;
    fingerprint: string;
    cache: CacheState;
    summary: PipelineSummary;
    environments: JsonEnvironmentReport[];
    publishing?: {
        artifacts: string;
        coverage: string;
        errors: string[];
    };
}

export interface JsonReportOptions {
    /** Publishing summary from the reporter */
    report?: ReportSummary;
}

export function buildJsonReport(outcome: PipelineOutcome, options: JsonReportOptions = {}): JsonReport {
    const basePath = outcome.metadata.config.basePath;

    const environments = Object.values(outcome.perEnvironment).map(env => {
        const results = [env.provision, ...PHASES.map(phase => env.phases[phase])];
        const steps = results.flatMap(result => result ? [{
            phase: result.phase,
            status: result.status,
            exitCode: result.exitCode,
            durationMs: result.durationMs,
            artifacts: result.artifactPaths.map(file => toRelativeUri(basePath, file)),
            ...(result.error ? { error: result.error } : {}),
        }] : []);
        return { identifier: env.identifier, status: env.status, steps };
    });

    const report: JsonReport = {
        version: outcome.metadata.version,
        status: outcome.status,
        startTime: outcome.metadata.startTime,
        durationMs: outcome.metadata.durationMs,
        fingerprint: outcome.metadata.fingerprint,
        cache: outcome.metadata.cache,
        summary: outcome.summary,
        environments,
    };

    if (options.report) {
        report.publishing = {
            artifacts: options.report.artifacts,
            coverage: options.report.coverage,
            errors: options.report.errors.map(error => error.message),
        };
    }

    return report;
}

/**
 * @returns The report as JSON with 2-space indentation
 */
export function generateJsonReport(outcome: PipelineOutcome, options: JsonReportOptions = {}): string {
    return JSON.stringify(buildJsonReport(outcome, options), null, 2);
}

function toRelativeUri(basePath: string, file: string): string {
    const relative = path.isAbsolute(file) ? path.relative(basePath, file) : file;
    return relative.split(path.sep).join('/');
}
