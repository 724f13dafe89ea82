/**
 * Error taxonomy.
 *
 * Only ConfigError and PipelineCancelledError ever escape a pipeline run.
 * ProvisionError and PhaseError are recorded on the failing environment's
 * results; CacheError and ReportError are logged and recovered where they
 * happen.
 */

import type { ErrorInfo, Phase } from './types.js';

export class MatrixCiError extends Error {
    readonly code: string;

    constructor(message: string, code: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MatrixCiError';
        this.code = code;
    }

    toInfo(): ErrorInfo {
        return { code: this.code, message: this.message };
    }
}

/**
 * An environment could not be made ready (download failure, unknown version, disk full).
 */
export class ProvisionError extends MatrixCiError {
    readonly identifier: string;

    constructor(identifier: string, message: string, options?: { cause?: unknown }) {
        super(`Provisioning ${identifier} failed: ${message}`, 'PROVISION_FAILED', options);
        this.name = 'ProvisionError';
        this.identifier = identifier;
    }
}

/**
 * A phase command exited non-zero or could not be started.
 * `exitCode` is null in the latter case.
 */
export abstract class PhaseError extends MatrixCiError {
    abstract readonly phase: Phase;
    readonly identifier: string;
    readonly exitCode: number | null;

    constructor(
        identifier: string,
        exitCode: number | null,
        message: string,
        code: string,
        options?: { cause?: unknown }
    ) {
        super(message, code, options);
        this.identifier = identifier;
        this.exitCode = exitCode;
    }
}

/** Fatal for its environment: lint and test are skipped. */
export class InstallFailed extends PhaseError {
    readonly phase = 'install';

    constructor(identifier: string, exitCode: number | null, detail: string, options?: { cause?: unknown }) {
        super(identifier, exitCode, `[${identifier}] install ${detail}`, 'INSTALL_FAILED', options);
        this.name = 'InstallFailed';
    }
}

export class LintFailed extends PhaseError {
    readonly phase = 'lint';

    constructor(identifier: string, exitCode: number | null, detail: string, options?: { cause?: unknown }) {
        super(identifier, exitCode, `[${identifier}] lint ${detail}`, 'LINT_FAILED', options);
        this.name = 'LintFailed';
    }
}

export class TestFailed extends PhaseError {
    readonly phase = 'test';

    constructor(identifier: string, exitCode: number | null, detail: string, options?: { cause?: unknown }) {
        super(identifier, exitCode, `[${identifier}] test ${detail}`, 'TEST_FAILED', options);
        this.name = 'TestFailed';
    }
}

/**
 * Build the PhaseError subtype for a phase.
 *
 * @param exitCode - Exit code of the command, or null when it never ran
 * @param cause - The startup error when the command never ran
 */
export function createPhaseError(
    phase: Phase,
    identifier: string,
    exitCode: number | null,
    cause?: unknown
): PhaseError {
    const detail = exitCode === null
        ? `could not be run: ${errorMessage(cause)}`
        : `exited with code ${exitCode}`;
    const options = cause === undefined ? undefined : { cause };

    switch (phase) {
        case 'install':
            return new InstallFailed(identifier, exitCode, detail, options);
        case 'lint':
            return new LintFailed(identifier, exitCode, detail, options);
        case 'test':
            return new TestFailed(identifier, exitCode, detail, options);
    }
}

/**
 * The cache backend could not be reached. Provisioning continues cold.
 */
export class CacheError extends MatrixCiError {
    readonly operation: 'get' | 'put' | 'lookup' | 'snapshot' | 'restore';
    readonly key: string;

    constructor(operation: CacheError['operation'], key: string, cause: unknown) {
        super(`Cache ${operation} failed for "${key}": ${errorMessage(cause)}`, 'CACHE_UNAVAILABLE', { cause });
        this.name = 'CacheError';
        this.operation = operation;
        this.key = key;
    }
}

/**
 * Publishing artifacts or coverage failed. Never changes the outcome.
 */
export class ReportError extends MatrixCiError {
    readonly target: 'artifacts' | 'coverage';

    constructor(target: ReportError['target'], cause: unknown) {
        super(`Publishing ${target} failed: ${errorMessage(cause)}`, 'REPORT_FAILED', { cause });
        this.name = 'ReportError';
        this.target = target;
    }
}

/**
 * Individual configuration problem.
 */
export interface ConfigIssue {
    /** Path to the invalid field */
    path: (string | number)[];
    message: string;
    code: string;
}

export class ConfigError extends MatrixCiError {
    readonly issues: ConfigIssue[];

    constructor(message: string, issues: ConfigIssue[] = [], options?: { cause?: unknown }) {
        super(message, 'INVALID_CONFIG', options);
        this.name = 'ConfigError';
        this.issues = issues;
    }

    format(): string {
        if (this.issues.length === 0) {
            return this.message;
        }
        const lines = [this.message];
        for (const issue of this.issues) {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            lines.push(`  - ${path}: ${issue.message}`);
        }
        return lines.join('\n');
    }
}

/**
 * The run was cancelled from outside. Partial results are discarded.
 */
export class PipelineCancelledError extends MatrixCiError {
    constructor() {
        super('Pipeline cancelled', 'CANCELLED');
        this.name = 'PipelineCancelledError';
    }
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new PipelineCancelledError();
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
